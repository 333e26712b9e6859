// source/handler/path.ts
// Canonicalization and validation of the path-within-mapping.

const isNoise = (code: number): boolean => code <= 0x20 || code === 0x7f;

/**
 * Collapses any leading run of control characters, spaces and slashes into
 * at most one leading slash. Returns the input itself when nothing needs to
 * be stripped.
 */
export const processPath = (raw: string): string => {
  let slash = false;

  for (let index = 0; index < raw.length; index++) {
    const code = raw.charCodeAt(index);

    if (code === 0x2f) {
      slash = true;
      continue;
    }

    if (isNoise(code)) {
      continue;
    }

    if (index === 0 || (slash && index === 1)) {
      return raw;
    }

    return slash ? `/${raw.slice(index)}` : raw.slice(index);
  }

  return slash ? '/' : '';
};

const segmentsOf = (value: string): string[] => value.split(/[\\/]+/);

/**
 * A path is rejected before any lookup when it carries a NUL byte, walks up
 * with a `..` segment, or names a scheme or drive (`file:`, `url:`, `C:`)
 * in its first segment.
 */
export const isInvalidPath = (value: string): boolean => {
  if (value.includes('\0')) {
    return true;
  }

  const segments = segmentsOf(value).filter(Boolean);

  if (segments.includes('..')) {
    return true;
  }

  const first = segments[0];
  return first !== undefined && first.includes(':');
};

/**
 * Percent-decodes a processed path. A malformed escape sequence yields
 * `null` rather than an exception.
 */
export const decodePath = (value: string): string | null => {
  if (!value.includes('%')) {
    return value;
  }

  try {
    return decodeURIComponent(value);
  } catch {
    return null;
  }
};
