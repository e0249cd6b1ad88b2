/**
 * Document records
 *
 * @module entities/document
 */

import { resolveValidationOptions } from '../config.js';
import { FILE_LIMITS } from '../constants.js';
import type { SubjectState } from '../validation/activity.js';
import type {
  DocumentEntity,
  DocumentInput,
  DocumentRecord,
  EntityConversionOptions,
  RevisionRecord,
} from '../domain/entity-types.js';
import { fromViolations, ModelValidationError, type Result, type Violation, violation } from '../domain/result.js';
import fileExtensions from '../data/file-extensions.json' with { type: 'json' };
import { combineHashes, hashBoolean, hashString } from '../utils/hash.js';
import { freezeRecord } from '../utils/immutable.js';
import { foldText, normalizeText } from '../utils/normalize.js';
import { isCollectionValid, validateCollection } from '../validation/collection.js';
import { evaluateRules, type Rule, satisfiesRules } from '../validation/rules.js';
import { isDescriptionValid, validateDescription } from '../validation/text.js';
import { isTimestampValid, validateTimestamp } from '../validation/timestamp.js';
import {
  type EntityValidationOptions,
  equalsByIdentity,
  hashByIdentity,
  isRecordIdValid,
  validateRecordId,
} from './identity.js';
import { freezeRevision, revisionFromEntity, validateRevision } from './revision.js';

const ALLOWED_EXTENSIONS: ReadonlySet<string> = new Set(fileExtensions.allowed);

/**
 * Lower-cased extension with a leading dot
 *
 * @example
 * ```typescript
 * normalizeExtension(' PDF '); // => '.pdf'
 * ```
 */
export const normalizeExtension = (extension: string | null | undefined): string => {
  const text = normalizeText(extension).toLowerCase();
  if (text === '') {
    return '';
  }
  return text.startsWith('.') ? text : `.${text}`;
};

const EXTENSION_RULES: readonly Rule<string>[] = [
  { test: (value) => normalizeExtension(value) !== '', message: (field) => `${field} is required.`, halt: true },
  {
    test: (value) => ALLOWED_EXTENSIONS.has(normalizeExtension(value)),
    message: (field, value) =>
      `${field} '${normalizeExtension(value)}' is not an allowed file type. Allowed types: ${[...ALLOWED_EXTENSIONS].join(', ')}.`,
  },
];

const FILE_SIZE_RULES: readonly Rule<number>[] = [
  {
    test: (value) => Number.isInteger(value) && value >= FILE_LIMITS.MIN_SIZE_BYTES,
    message: (field) => `${field} must be at least ${FILE_LIMITS.MIN_SIZE_BYTES} byte.`,
  },
  {
    test: (value) => value <= FILE_LIMITS.MAX_SIZE_BYTES,
    message: (field) => `${field} cannot exceed ${FILE_LIMITS.MAX_SIZE_BYTES / (1024 * 1024)} MB.`,
  },
];

const CHECKSUM_RULES: readonly Rule<string | undefined>[] = [
  {
    test: (value) => value === undefined || FILE_LIMITS.CHECKSUM_PATTERN.test(value),
    message: (field) => `${field} must be a 64-character hexadecimal SHA-256 digest.`,
  },
];

const isStateConsistent = (document: DocumentRecord): boolean => !(document.isDeleted && document.isCheckedOut);

const validateRevisions = (
  revisions: readonly RevisionRecord[] | undefined,
  options: EntityValidationOptions,
): Violation[] =>
  validateCollection(revisions, 'revisions', { validateItem: (revision) => validateRevision(revision, options) });

/** @internal */
export const freezeDocument = (document: DocumentRecord): DocumentRecord => {
  const { revisions, ...rest } = document;
  const record: DocumentRecord = {
    ...rest,
    ...(revisions ? { revisions: Object.freeze(revisions.map(freezeRevision)) } : {}),
  };
  return freezeRecord(record, ['creationDate']);
};

export const validateDocument = (document: DocumentRecord, options?: EntityValidationOptions): Violation[] => {
  const resolved = resolveValidationOptions(options);
  const violations: Violation[] = [
    ...validateRecordId(document.id, options),
    ...validateDescription(document.fileName, 'fileName', { ...resolved, vocabulary: 'fileNames' }),
    ...evaluateRules(EXTENSION_RULES, document.extension, 'extension'),
    ...evaluateRules(FILE_SIZE_RULES, document.fileSize, 'fileSize'),
    ...evaluateRules(CHECKSUM_RULES, document.checksum, 'checksum'),
    ...validateTimestamp(document.creationDate, 'creationDate', resolved),
  ];
  if (!isStateConsistent(document)) {
    violations.push(violation('A deleted document cannot be checked out.', 'isCheckedOut', 'isDeleted'));
  }
  violations.push(
    ...validateRevisions(document.revisions, { ...resolved, requireIdentifier: options?.requireIdentifier ?? false }),
  );
  return violations;
};

export const isDocumentValid = (document: DocumentRecord, options?: EntityValidationOptions): boolean => {
  const resolved = resolveValidationOptions(options);
  const nested = { ...resolved, requireIdentifier: options?.requireIdentifier ?? false };
  return (
    isRecordIdValid(document.id, options) &&
    isDescriptionValid(document.fileName, { ...resolved, vocabulary: 'fileNames' }) &&
    satisfiesRules(EXTENSION_RULES, document.extension) &&
    satisfiesRules(FILE_SIZE_RULES, document.fileSize) &&
    satisfiesRules(CHECKSUM_RULES, document.checksum) &&
    isTimestampValid(document.creationDate, resolved) &&
    isStateConsistent(document) &&
    isCollectionValid(document.revisions, { validateItem: (revision) => validateRevision(revision, nested) })
  );
};

/**
 * Creates a validated document record
 *
 * @example
 * ```typescript
 * const result = createDocument({
 *   fileName: 'engagement-letter',
 *   extension: '.pdf',
 *   fileSize: 20480,
 *   creationDate: new Date(),
 * });
 * ```
 */
export const createDocument = (input: DocumentInput, options?: EntityValidationOptions): Result<DocumentRecord> => {
  const record: DocumentRecord = {
    ...input,
    isCheckedOut: input.isCheckedOut ?? false,
    isDeleted: input.isDeleted ?? false,
  };
  return fromViolations(validateDocument(record, options), () => freezeDocument(record));
};

/**
 * Converts a stored document, and its revisions when relations are included
 *
 * @throws {ModelValidationError} If the stored document or one of its revisions is invalid
 */
export const documentFromEntity = (entity: DocumentEntity, options: EntityConversionOptions = {}): DocumentRecord => {
  const { revisions, ...rest } = entity;
  const record: DocumentRecord = {
    ...rest,
    ...(options.includeRelations !== false && revisions
      ? { revisions: revisions.map((revision) => revisionFromEntity(revision, options)) }
      : {}),
  };
  const violations = validateDocument(record, { ...options.validation, requireIdentifier: true });
  if (violations.length > 0) {
    throw new ModelValidationError('Document', violations);
  }
  return freezeDocument(record);
};

const sameContent = (a: DocumentRecord, b: DocumentRecord): boolean =>
  foldText(a.fileName) === foldText(b.fileName) &&
  normalizeExtension(a.extension) === normalizeExtension(b.extension) &&
  a.isDeleted === b.isDeleted;

export const documentEquals = (a: DocumentRecord, b: DocumentRecord): boolean => equalsByIdentity(a, b, sameContent);

export const documentHashCode = (document: DocumentRecord): number =>
  hashByIdentity(document, (record) =>
    combineHashes(
      hashString(foldText(record.fileName)),
      hashString(normalizeExtension(record.extension)),
      hashBoolean(record.isDeleted),
    ),
  );

/**
 * File name with its extension
 *
 * @example
 * ```typescript
 * fullFileName({ fileName: 'brief', extension: 'PDF', ... });     // => 'brief.pdf'
 * fullFileName({ fileName: 'brief.pdf', extension: '.pdf', ... }); // => 'brief.pdf'
 * ```
 */
export const fullFileName = (document: Pick<DocumentRecord, 'fileName' | 'extension'>): string => {
  const name = normalizeText(document.fileName);
  const extension = normalizeExtension(document.extension);
  return name.toLowerCase().endsWith(extension) ? name : `${name}${extension}`;
};

/** State flags for activity appropriateness */
export const documentState = (document: DocumentRecord): SubjectState => ({
  isDeleted: document.isDeleted,
  isCheckedOut: document.isCheckedOut,
});

/** e.g. `'engagement-letter.pdf (checked out)'` */
export const describeDocument = (document: DocumentRecord): string => {
  const status = document.isDeleted ? 'deleted' : document.isCheckedOut ? 'checked out' : 'available';
  return `${fullFileName(document) || 'Untitled Document'} (${status})`;
};
