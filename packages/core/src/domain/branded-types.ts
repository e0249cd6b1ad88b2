/**
 * Branded Types Module - Type-safe identifier wrappers with validation
 */

import { NIL_ID } from '../constants.js';

/**
 * Branded type utility
 *
 * @template T - Underlying primitive type
 * @template TBrand - Brand identifier (e.g., 'MatterId', 'UserId')
 *
 * @example
 * ```typescript
 * const matterId: MatterId = createMatterId('3f2a...');
 * const userId: UserId = matterId; // ❌ Type error
 * ```
 */
type Brand<T, TBrand> = T & { readonly __brand: TBrand };

/** Matter identifier */
export type MatterId = Brand<string, 'MatterId'>;
/** Document identifier */
export type DocumentId = Brand<string, 'DocumentId'>;
/** Revision identifier */
export type RevisionId = Brand<string, 'RevisionId'>;
/** User identifier */
export type UserId = Brand<string, 'UserId'>;
/** Activity identifier */
export type ActivityId = Brand<string, 'ActivityId'>;
/** Union type of all branded ID types */
export type AnyBrandedId = MatterId | DocumentId | RevisionId | UserId | ActivityId;

/** Validation error thrown when ID creation fails */
export class IdValidationError extends Error {
  constructor(
    public readonly idType: string,
    public readonly value: string,
    message: string,
  ) {
    super(`[${idType}] ${message}: received "${value}"`);
    this.name = 'IdValidationError';
  }
}

/**
 * Comparison form of an identifier: trimmed, lower-cased
 *
 * @example
 * ```typescript
 * canonicalizeId(' 3F2A-01 '); // => '3f2a-01'
 * ```
 */
export const canonicalizeId = (id: string): string => id.trim().toLowerCase();

/** True for null, undefined, empty and whitespace-only values */
export const isBlankId = (id: string | null | undefined): boolean => id === null || id === undefined || id.trim() === '';

/**
 * True for the nil sentinel, in any case, with or without dashes or braces
 *
 * @example
 * ```typescript
 * isNilId('00000000-0000-0000-0000-000000000000'); // => true
 * isNilId('{00000000000000000000000000000000}');    // => true
 * ```
 */
export const isNilId = (id: string | null | undefined): boolean => {
  if (isBlankId(id) || id === null || id === undefined) {
    return false;
  }
  return canonicalizeId(id).replace(/[{}-]/g, '') === NIL_ID.replace(/-/g, '');
};

/** True when the value identifies a persisted record */
export const isPresentId = (id: string | null | undefined): id is string => !isBlankId(id) && !isNilId(id);

/** True when both identifiers are present and canonically equal */
export const sameId = (a: string | null | undefined, b: string | null | undefined): boolean =>
  isPresentId(a) && isPresentId(b) && canonicalizeId(a) === canonicalizeId(b);

/** @internal */
const validatePresentId = (id: string, idType: string): void => {
  if (isBlankId(id)) {
    throw new IdValidationError(idType, id, `${idType} cannot be empty or whitespace-only`);
  }
  if (isNilId(id)) {
    throw new IdValidationError(idType, id, `${idType} cannot be the nil identifier`);
  }
};

/**
 * Creates a validated MatterId
 *
 * @throws {IdValidationError} If id is empty, whitespace-only or the nil identifier
 *
 * @example
 * ```typescript
 * const matterId = createMatterId('6c1f0c4e-9a51-4f8e-8f4e-1d2b3c4d5e6f');
 * createMatterId(''); // ❌ Throws IdValidationError
 * ```
 */
export const createMatterId = (id: string): MatterId => {
  validatePresentId(id, 'MatterId');
  return id as MatterId;
};

/** Creates a validated DocumentId */
export const createDocumentId = (id: string): DocumentId => {
  validatePresentId(id, 'DocumentId');
  return id as DocumentId;
};

/** Creates a validated RevisionId */
export const createRevisionId = (id: string): RevisionId => {
  validatePresentId(id, 'RevisionId');
  return id as RevisionId;
};

/** Creates a validated UserId */
export const createUserId = (id: string): UserId => {
  validatePresentId(id, 'UserId');
  return id as UserId;
};

/** Creates a validated ActivityId */
export const createActivityId = (id: string): ActivityId => {
  validatePresentId(id, 'ActivityId');
  return id as ActivityId;
};

/** Type guard for MatterId */
export const isMatterId = (value: unknown): value is MatterId => typeof value === 'string' && isPresentId(value);
/** Type guard for DocumentId */
export const isDocumentId = (value: unknown): value is DocumentId => typeof value === 'string' && isPresentId(value);
/** Type guard for RevisionId */
export const isRevisionId = (value: unknown): value is RevisionId => typeof value === 'string' && isPresentId(value);
/** Type guard for UserId */
export const isUserId = (value: unknown): value is UserId => typeof value === 'string' && isPresentId(value);
/** Type guard for ActivityId */
export const isActivityId = (value: unknown): value is ActivityId => typeof value === 'string' && isPresentId(value);

/**
 * Unwraps a branded ID to its underlying string value
 */
export const unwrapId = (id: AnyBrandedId): string => {
  return id as string;
};
