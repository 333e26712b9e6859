// source/handler/cache-control.ts
// Cache-Control, Expires and Pragma headers derived from the cache policy.

import { formatHttpDate } from '../utilities/http-date.js';

export interface CachePolicy {
  /** Negative: no caching headers; zero: prevent caching; positive: max-age. */
  readonly cacheSeconds: number;
  readonly useExpiresHeader: boolean;
  readonly useCacheControlHeader: boolean;
  readonly useCacheControlNoStore: boolean;
  readonly alwaysMustRevalidate: boolean;
  /**
   * Set when any of the four flags above was configured explicitly. The
   * flags then drive the HTTP 1.0 compatible header set instead of a single
   * Cache-Control directive.
   */
  readonly legacy: boolean;
  /** Verbatim Cache-Control value, overriding `cacheSeconds`. */
  readonly cacheControl?: string | undefined;
}

export type HeaderEntry = readonly [name: string, value: string];

const legacyHeaders = (policy: CachePolicy, now: number): HeaderEntry[] => {
  const { cacheSeconds } = policy;
  const headers: HeaderEntry[] = [];

  if (cacheSeconds > 0) {
    if (policy.useExpiresHeader) {
      headers.push(['Expires', formatHttpDate(now + cacheSeconds * 1000)]);
    }

    if (policy.useCacheControlHeader) {
      const mustRevalidate = policy.alwaysMustRevalidate
        ? ', must-revalidate'
        : '';
      headers.push([
        'Cache-Control',
        `max-age=${cacheSeconds}${mustRevalidate}`,
      ]);
    }
  } else if (cacheSeconds === 0) {
    headers.push(['Pragma', 'no-cache']);

    if (policy.useCacheControlHeader) {
      headers.push(['Cache-Control', 'no-cache']);

      if (policy.useCacheControlNoStore) {
        headers.push(['Cache-Control', 'no-store']);
      }
    }

    headers.push(['Expires', formatHttpDate(now)]);
  }

  return headers;
};

const cacheControlHeaders = (policy: CachePolicy): HeaderEntry[] => {
  const { cacheSeconds } = policy;

  if (cacheSeconds > 0) {
    return [['Cache-Control', `max-age=${cacheSeconds}`]];
  }

  if (cacheSeconds === 0) {
    return [
      [
        'Cache-Control',
        policy.useCacheControlNoStore ? 'no-store' : 'no-cache',
      ],
    ];
  }

  return [];
};

/**
 * Caching headers for a response produced at `now`. Repeated names (two
 * Cache-Control values in legacy no-cache mode) keep their order.
 */
export const cacheHeaders = (
  policy: CachePolicy,
  now: number,
): HeaderEntry[] => {
  if (policy.cacheControl !== undefined) {
    return [['Cache-Control', policy.cacheControl]];
  }

  return policy.legacy
    ? legacyHeaders(policy, now)
    : cacheControlHeaders(policy);
};

/** Sets header entries on a response, merging repeated names into a list. */
export const applyHeaders = (
  response: { setHeader: (name: string, value: string | string[]) => unknown },
  entries: readonly HeaderEntry[],
): void => {
  const grouped = new Map<string, string[]>();

  for (const [name, value] of entries) {
    const values = grouped.get(name);
    if (values) {
      values.push(value);
    } else {
      grouped.set(name, [value]);
    }
  }

  for (const [name, values] of grouped) {
    const [first] = values;
    if (first === undefined) continue;
    response.setHeader(name, values.length === 1 ? first : values);
  }
};
