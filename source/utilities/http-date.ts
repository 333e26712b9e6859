// source/utilities/http-date.ts

/** Epoch milliseconds as an IMF-fixdate, `Sun, 06 Nov 1994 08:49:37 GMT`. */
export const formatHttpDate = (millis: number): string =>
  new Date(millis).toUTCString();

export const parseHttpDate = (
  value: string | undefined,
): number | undefined => {
  if (value === undefined) {
    return undefined;
  }

  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? undefined : parsed;
};
