// source/handler/conditional.ts
// If-Modified-Since evaluation.

export type ConditionalOutcome = 'not-modified' | 'proceed';

const toSeconds = (millis: number): number => Math.floor(millis / 1000);

/**
 * HTTP dates carry whole seconds only, so both sides are truncated before
 * they are compared.
 */
export const evaluateConditional = (
  lastModified: number | undefined,
  ifModifiedSince: number | undefined,
): ConditionalOutcome => {
  if (lastModified === undefined || ifModifiedSince === undefined) {
    return 'proceed';
  }

  return toSeconds(lastModified) <= toSeconds(ifModifiedSince)
    ? 'not-modified'
    : 'proceed';
};
