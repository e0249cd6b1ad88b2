import { resolveValidationOptions } from '../config.js';
import { canonicalizeId, isBlankId } from '../domain/branded-types.js';
import type { EntityConversionOptions, RevisionEntity, RevisionInput, RevisionRecord } from '../domain/entity-types.js';
import { fromViolations, ModelValidationError, type Result, type Violation } from '../domain/result.js';
import { combineHashes, hashBoolean, hashNumber, hashString } from '../utils/hash.js';
import { freezeRecord } from '../utils/immutable.js';
import { isValidIdentifier, validateIdentifier } from '../validation/identifier.js';
import { evaluateRules, type Rule, satisfiesRules } from '../validation/rules.js';
import { isTimestampValid, validateTimestamp, validateTimestampOrder } from '../validation/timestamp.js';
import {
  type EntityValidationOptions,
  equalsByIdentity,
  hashByIdentity,
  isRecordIdValid,
  validateRecordId,
} from './identity.js';

const REVISION_NUMBER_RULES: readonly Rule<number>[] = [
  {
    test: (value) => Number.isInteger(value) && value >= 1,
    message: (field) => `${field} must be a positive whole number.`,
  },
];

/** @internal */
export const freezeRevision = (revision: RevisionRecord): RevisionRecord =>
  freezeRecord(revision, ['creationDate', 'modificationDate']);

const validateOwner = (documentId: string | undefined): Violation[] =>
  isBlankId(documentId) ? [] : validateIdentifier(documentId, 'documentId');

export const validateRevision = (revision: RevisionRecord, options?: EntityValidationOptions): Violation[] => {
  const resolved = resolveValidationOptions(options);
  return [
    ...validateRecordId(revision.id, options),
    ...validateOwner(revision.documentId),
    ...evaluateRules(REVISION_NUMBER_RULES, revision.revisionNumber, 'revisionNumber'),
    ...validateTimestamp(revision.creationDate, 'creationDate', resolved),
    ...validateTimestamp(revision.modificationDate, 'modificationDate', resolved),
    ...validateTimestampOrder(revision.creationDate, revision.modificationDate, 'creationDate', 'modificationDate'),
  ];
};

export const isRevisionValid = (revision: RevisionRecord, options?: EntityValidationOptions): boolean => {
  const resolved = resolveValidationOptions(options);
  return (
    isRecordIdValid(revision.id, options) &&
    (isBlankId(revision.documentId) || isValidIdentifier(revision.documentId)) &&
    satisfiesRules(REVISION_NUMBER_RULES, revision.revisionNumber) &&
    isTimestampValid(revision.creationDate, resolved) &&
    isTimestampValid(revision.modificationDate, resolved) &&
    validateTimestampOrder(revision.creationDate, revision.modificationDate, 'creationDate', 'modificationDate')
      .length === 0
  );
};

/**
 * Creates a validated revision record
 *
 * @example
 * ```typescript
 * createRevision({ revisionNumber: 1, creationDate: now, modificationDate: now });
 * ```
 */
export const createRevision = (input: RevisionInput, options?: EntityValidationOptions): Result<RevisionRecord> => {
  const record: RevisionRecord = { ...input, isDeleted: input.isDeleted ?? false };
  return fromViolations(validateRevision(record, options), () => freezeRevision(record));
};

/**
 * Converts a stored revision
 *
 * @throws {ModelValidationError} If the stored revision is invalid
 */
export const revisionFromEntity = (entity: RevisionEntity, options: EntityConversionOptions = {}): RevisionRecord => {
  const violations = validateRevision(entity, { ...options.validation, requireIdentifier: true });
  if (violations.length > 0) {
    throw new ModelValidationError('Revision', violations);
  }
  return freezeRevision(entity);
};

const sameContent = (a: RevisionRecord, b: RevisionRecord): boolean =>
  canonicalizeId(a.documentId ?? '') === canonicalizeId(b.documentId ?? '') &&
  a.revisionNumber === b.revisionNumber &&
  a.isDeleted === b.isDeleted;

export const revisionEquals = (a: RevisionRecord, b: RevisionRecord): boolean => equalsByIdentity(a, b, sameContent);

export const revisionHashCode = (revision: RevisionRecord): number =>
  hashByIdentity(revision, (record) =>
    combineHashes(
      hashString(canonicalizeId(record.documentId ?? '')),
      hashNumber(record.revisionNumber),
      hashBoolean(record.isDeleted),
    ),
  );

export const describeRevision = (revision: RevisionRecord): string => `Revision ${revision.revisionNumber}`;
