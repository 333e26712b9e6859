// source/handler/ranges.ts
// Range header parsing and multipart/byteranges framing.

import { randomBytes } from 'node:crypto';
import type { ByteWindow } from './resources.js';

/** One comma separated unit of a Range header; at least one bound is set. */
export interface RangeSpec {
  start?: number;
  end?: number;
}

/** Concrete inclusive range inside `[0, length - 1]`. */
export type ResolvedRange = ByteWindow;

export type RangeOutcome =
  | { type: 'none' }
  | { type: 'single'; range: ResolvedRange }
  | { type: 'multipart'; ranges: ResolvedRange[] }
  | { type: 'unsatisfiable' };

const BYTES_PREFIX = 'bytes=';
const SPEC_PATTERN = /^(?<first>\d*)-(?<last>\d*)$/;

/**
 * Splits `bytes=0-1, 4-5, -3` into specs. Returns `null` when the unit is
 * not bytes or any spec is malformed.
 */
export const parseRangeSpecs = (header: string): RangeSpec[] | null => {
  const trimmed = header.trim();

  if (trimmed.slice(0, BYTES_PREFIX.length).toLowerCase() !== BYTES_PREFIX) {
    return null;
  }

  const specs: RangeSpec[] = [];

  for (const unit of trimmed.slice(BYTES_PREFIX.length).split(',')) {
    const match = SPEC_PATTERN.exec(unit.trim());
    const first = match?.groups?.first ?? '';
    const last = match?.groups?.last ?? '';

    if (!match || (first === '' && last === '')) {
      return null;
    }

    const spec: RangeSpec = {};
    if (first !== '') spec.start = Number(first);
    if (last !== '') spec.end = Number(last);
    specs.push(spec);
  }

  return specs;
};

/** Resolves a spec against the resource length, or `null` if unsatisfiable. */
export const resolveRange = (
  spec: RangeSpec,
  length: number,
): ResolvedRange | null => {
  const lastByte = length - 1;

  if (spec.start === undefined) {
    const suffix = spec.end ?? 0;
    if (suffix <= 0 || length <= 0) return null;
    return { start: Math.max(0, length - suffix), end: lastByte };
  }

  const { start } = spec;
  if (start >= length) return null;

  if (spec.end === undefined) {
    return { start, end: lastByte };
  }

  if (spec.end < start) return null;

  return { start, end: Math.min(spec.end, lastByte) };
};

export const processRanges = (
  header: string | undefined,
  length: number,
): RangeOutcome => {
  if (header === undefined) {
    return { type: 'none' };
  }

  const specs = parseRangeSpecs(header);
  if (!specs) {
    return { type: 'unsatisfiable' };
  }

  const ranges: ResolvedRange[] = [];

  for (const spec of specs) {
    const range = resolveRange(spec, length);
    if (!range) return { type: 'unsatisfiable' };
    ranges.push(range);
  }

  const [first] = ranges;

  if (ranges.length === 1 && first) {
    return { type: 'single', range: first };
  }

  return { type: 'multipart', ranges };
};

export const rangeLength = (range: ResolvedRange): number =>
  range.end - range.start + 1;

export const contentRange = (range: ResolvedRange, length: number): string =>
  `bytes ${range.start}-${range.end}/${length}`;

export const unsatisfiedRange = (length: number): string => `bytes */${length}`;

/** Opaque token; never derived from the content it separates. */
export const generateBoundary = (): string => randomBytes(18).toString('hex');

export const multipartContentType = (boundary: string): string =>
  `multipart/byteranges; boundary=${boundary}`;

export const partHeader = (
  boundary: string,
  range: ResolvedRange,
  length: number,
  contentType?: string,
): string => {
  const lines = [`--${boundary}`];
  if (contentType) lines.push(`Content-Type: ${contentType}`);
  lines.push(`Content-Range: ${contentRange(range, length)}`);

  return `\r\n${lines.join('\r\n')}\r\n\r\n`;
};

export const closingDelimiter = (boundary: string): string =>
  `\r\n--${boundary}--`;

/** Exact byte size of a multipart/byteranges body. */
export const multipartLength = (
  boundary: string,
  ranges: readonly ResolvedRange[],
  length: number,
  contentType?: string,
): number =>
  ranges.reduce(
    (total, range) =>
      total +
      Buffer.byteLength(partHeader(boundary, range, length, contentType)) +
      rangeLength(range),
    Buffer.byteLength(closingDelimiter(boundary)),
  );
