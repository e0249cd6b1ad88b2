import { resolveValidationOptions } from '../config.js';
import type { EntityConversionOptions, UserEntity, UserRecord } from '../domain/entity-types.js';
import { fromViolations, ModelValidationError, type Result, type Violation } from '../domain/result.js';
import { hashString } from '../utils/hash.js';
import { foldText, normalizeText } from '../utils/normalize.js';
import { isUsernameValid, validateUsername } from '../validation/text.js';
import {
  type EntityValidationOptions,
  equalsByIdentity,
  hashByIdentity,
  isRecordIdValid,
  validateRecordId,
} from './identity.js';

/** @internal */
export const freezeUser = (user: UserRecord): UserRecord => Object.freeze({ ...user });

export const validateUser = (user: UserRecord, options?: EntityValidationOptions): Violation[] => [
  ...validateRecordId(user.id, options),
  ...validateUsername(user.name, 'name', resolveValidationOptions(options)),
];

export const isUserValid = (user: UserRecord, options?: EntityValidationOptions): boolean =>
  isRecordIdValid(user.id, options) && isUsernameValid(user.name, resolveValidationOptions(options));

/**
 * Creates a validated user record
 *
 * @example
 * ```typescript
 * const result = createUser({ name: 'jsmith' });
 * if (result.success) {
 *   result.value.name; // => 'jsmith'
 * }
 * ```
 */
export const createUser = (input: UserRecord, options?: EntityValidationOptions): Result<UserRecord> =>
  fromViolations(validateUser(input, options), () => freezeUser(input));

/**
 * Converts a stored user
 *
 * @throws {ModelValidationError} If the stored user is invalid
 */
export const userFromEntity = (entity: UserEntity, options: EntityConversionOptions = {}): UserRecord => {
  const record: UserRecord = { id: entity.id, name: entity.name };
  const violations = validateUser(record, { ...options.validation, requireIdentifier: true });
  if (violations.length > 0) {
    throw new ModelValidationError('User', violations);
  }
  return freezeUser(record);
};

/** Identifier equality for stored users, case-insensitive name equality otherwise */
export const userEquals = (a: UserRecord, b: UserRecord): boolean =>
  equalsByIdentity(a, b, (x, y) => foldText(x.name) === foldText(y.name));

export const userHashCode = (user: UserRecord): number =>
  hashByIdentity(user, (record) => hashString(foldText(record.name)));

/** Display name; `'Unknown User'` when blank */
export const describeUser = (user: UserRecord): string => normalizeText(user.name) || 'Unknown User';
