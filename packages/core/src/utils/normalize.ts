/**
 * Text normalization used for validation and content equality
 *
 * @module normalize
 */

/**
 * Trims, collapses whitespace runs to one space and strips control characters
 *
 * @remarks
 * Total and idempotent; case is preserved. Absent or whitespace-only input yields `''`.
 *
 * @example
 * ```typescript
 * normalizeText('  Smith   Trust  '); // => 'Smith Trust'
 * normalizeText(undefined);           // => ''
 * ```
 */
export const normalizeText = (text: string | null | undefined): string => {
  if (text === null || text === undefined) {
    return '';
  }
  return text
    .replace(/\s+/g, ' ')
    .replace(/\p{Cc}/gu, '')
    .replace(/ {2,}/g, ' ')
    .trim();
};

/** Case-insensitive comparison key of a name or description */
export const foldText = (text: string | null | undefined): string => normalizeText(text).toLowerCase();

/**
 * Canonical form of an activity name
 *
 * Spaces, underscores and hyphens are interchangeable separators.
 *
 * @example
 * ```typescript
 * normalizeActivityName(' checked_in '); // => 'CHECKED IN'
 * ```
 */
export const normalizeActivityName = (name: string | null | undefined): string =>
  normalizeText(name)
    .toUpperCase()
    .replace(/[\s_-]+/g, ' ')
    .trim();

/** True when both texts are non-empty and equal once normalized and folded */
export const areTextsEquivalent = (a: string | null | undefined, b: string | null | undefined): boolean => {
  const foldedA = foldText(a);
  return foldedA !== '' && foldedA === foldText(b);
};
