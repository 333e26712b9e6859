import { describe, expect, it } from 'vitest';
import { applyHeaders, cacheHeaders } from '../source/handler/cache-control.js';
import { MockResponse } from './helpers/mock-response.js';
import type { CachePolicy } from '../source/handler/cache-control.js';

const NOW = Date.UTC(2026, 0, 5, 10, 0, 0);

const policy = (overrides: Partial<CachePolicy> = {}): CachePolicy => ({
  cacheSeconds: -1,
  useExpiresHeader: false,
  useCacheControlHeader: true,
  useCacheControlNoStore: true,
  alwaysMustRevalidate: false,
  legacy: false,
  ...overrides,
});

describe('cacheHeaders', () => {
  it('emits nothing for a negative cache period', () => {
    expect(cacheHeaders(policy(), NOW)).toEqual([]);
    expect(cacheHeaders(policy({ legacy: true }), NOW)).toEqual([]);
  });

  it('emits max-age for a positive cache period', () => {
    expect(cacheHeaders(policy({ cacheSeconds: 3600 }), NOW)).toEqual([
      ['Cache-Control', 'max-age=3600'],
    ]);
  });

  it('emits no-store for a zero cache period', () => {
    expect(cacheHeaders(policy({ cacheSeconds: 0 }), NOW)).toEqual([
      ['Cache-Control', 'no-store'],
    ]);
  });

  it('emits no-cache when no-store is turned off', () => {
    expect(
      cacheHeaders(
        policy({ cacheSeconds: 0, useCacheControlNoStore: false }),
        NOW,
      ),
    ).toEqual([['Cache-Control', 'no-cache']]);
  });

  it('emits the legacy caching headers', () => {
    expect(
      cacheHeaders(
        policy({
          cacheSeconds: 3600,
          useExpiresHeader: true,
          alwaysMustRevalidate: true,
          legacy: true,
        }),
        NOW,
      ),
    ).toEqual([
      ['Expires', 'Mon, 05 Jan 2026 11:00:00 GMT'],
      ['Cache-Control', 'max-age=3600, must-revalidate'],
    ]);
  });

  it('emits the legacy no-cache headers', () => {
    expect(cacheHeaders(policy({ cacheSeconds: 0, legacy: true }), NOW)).toEqual(
      [
        ['Pragma', 'no-cache'],
        ['Cache-Control', 'no-cache'],
        ['Cache-Control', 'no-store'],
        ['Expires', 'Mon, 05 Jan 2026 10:00:00 GMT'],
      ],
    );
  });

  it('omits Cache-Control in legacy mode when the header is turned off', () => {
    expect(
      cacheHeaders(
        policy({
          cacheSeconds: 60,
          useCacheControlHeader: false,
          useExpiresHeader: true,
          legacy: true,
        }),
        NOW,
      ),
    ).toEqual([['Expires', 'Mon, 05 Jan 2026 10:01:00 GMT']]);
  });

  it('prefers an explicit Cache-Control value', () => {
    expect(
      cacheHeaders(
        policy({ cacheSeconds: 3600, cacheControl: 'public, immutable' }),
        NOW,
      ),
    ).toEqual([['Cache-Control', 'public, immutable']]);
  });
});

describe('applyHeaders', () => {
  it('merges repeated names in order', () => {
    const response = new MockResponse();

    applyHeaders(response, [
      ['Pragma', 'no-cache'],
      ['Cache-Control', 'no-cache'],
      ['Cache-Control', 'no-store'],
    ]);

    expect(response.getHeader('pragma')).toBe('no-cache');
    expect(response.getHeader('cache-control')).toEqual([
      'no-cache',
      'no-store',
    ]);
  });
});
