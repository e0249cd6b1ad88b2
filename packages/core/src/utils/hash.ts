/**
 * 32-bit hash helpers
 *
 * Hash codes only need to agree with the equality they accompany; they are
 * not stable across releases and must not be persisted.
 */

/** Polynomial (×31) hash of a string */
export const hashString = (value: string): number => {
  let hash = 0;
  for (let index = 0; index < value.length; index++) {
    hash = (Math.imul(31, hash) + value.charCodeAt(index)) | 0;
  }
  return hash;
};

/** Hash of a boolean flag */
export const hashBoolean = (value: boolean): number => (value ? 1231 : 1237);

/** Hash of a numeric value, including Date instants */
export const hashNumber = (value: number): number => hashString(String(value));

/** Order-sensitive combination of component hashes */
export const combineHashes = (...hashes: readonly number[]): number =>
  hashes.reduce((accumulator, hash) => (Math.imul(accumulator, 31) + hash) | 0, 17);
