import { describe, expect, it } from 'vitest';
import { evaluateConditional } from '../source/handler/conditional.js';
import { formatHttpDate, parseHttpDate } from '../source/utilities/http-date.js';

describe('evaluateConditional', () => {
  const lastModified = Date.UTC(2026, 2, 1, 12, 30, 15, 640);

  it('is not modified when the header matches to the second', () => {
    expect(
      evaluateConditional(lastModified, Date.UTC(2026, 2, 1, 12, 30, 15)),
    ).toBe('not-modified');
  });

  it('is not modified when the header is later', () => {
    expect(
      evaluateConditional(lastModified, Date.UTC(2026, 2, 1, 13, 0, 0)),
    ).toBe('not-modified');
  });

  it('proceeds when the header is a second earlier', () => {
    expect(
      evaluateConditional(lastModified, Date.UTC(2026, 2, 1, 12, 30, 14, 999)),
    ).toBe('proceed');
  });

  it('proceeds without a last-modified time or header', () => {
    expect(evaluateConditional(undefined, lastModified)).toBe('proceed');
    expect(evaluateConditional(lastModified, undefined)).toBe('proceed');
  });
});

describe('http dates', () => {
  it('round-trips at second precision', () => {
    const value = formatHttpDate(Date.UTC(2026, 2, 1, 12, 30, 15, 640));

    expect(value).toBe('Sun, 01 Mar 2026 12:30:15 GMT');
    expect(parseHttpDate(value)).toBe(Date.UTC(2026, 2, 1, 12, 30, 15));
  });

  it('ignores unparsable values', () => {
    expect(parseHttpDate('garbage')).toBeUndefined();
    expect(parseHttpDate(undefined)).toBeUndefined();
  });
});
