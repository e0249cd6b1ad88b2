import type { ValidationOptionsInput } from '../config.types.js';
import { canonicalizeId, isPresentId, sameId } from '../domain/branded-types.js';
import type { Violation } from '../domain/result.js';
import { hashString } from '../utils/hash.js';
import { isValidIdentifier, validateIdentifier } from '../validation/identifier.js';

/** Options of entity validators */
export type EntityValidationOptions = ValidationOptionsInput & {
  /**
   * Report a missing identifier; attached sub-records and converted entities set this
   *
   * @default false
   */
  requireIdentifier?: boolean;
};

/** @internal */
export const validateRecordId = (id: string | undefined, options?: EntityValidationOptions): Violation[] =>
  options?.requireIdentifier ? validateIdentifier(id, 'id') : [];

/** @internal */
export const isRecordIdValid = (id: string | undefined, options?: EntityValidationOptions): boolean =>
  options?.requireIdentifier ? isValidIdentifier(id) : true;

/**
 * Identity-then-content equality
 *
 * @remarks
 * Two persisted records compare by identifier; two unpersisted ones by content.
 * A persisted record never equals an unpersisted one, which keeps the
 * accompanying hash consistent.
 */
export const equalsByIdentity = <T extends { readonly id?: string }>(
  a: T,
  b: T,
  sameContent: (a: T, b: T) => boolean,
): boolean => {
  if (a === b) {
    return true;
  }
  const aPersisted = isPresentId(a.id);
  const bPersisted = isPresentId(b.id);
  if (aPersisted && bPersisted) {
    return sameId(a.id, b.id);
  }
  if (aPersisted || bPersisted) {
    return false;
  }
  return sameContent(a, b);
};

/** Hash agreeing with {@link equalsByIdentity} */
export const hashByIdentity = <T extends { readonly id?: string }>(record: T, contentHash: (record: T) => number): number =>
  isPresentId(record.id) ? hashString(canonicalizeId(record.id)) : contentHash(record);
