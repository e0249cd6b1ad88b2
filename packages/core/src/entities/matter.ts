/**
 * Matter records
 *
 * A matter is the top-level grouping of documents. Deleted matters stay
 * archived so that their audit trail remains reachable.
 *
 * @module entities/matter
 */

import { resolveValidationOptions } from '../config.js';
import { sameId } from '../domain/branded-types.js';
import type {
  DocumentRecord,
  EntityConversionOptions,
  MatterEntity,
  MatterInput,
  MatterRecord,
} from '../domain/entity-types.js';
import { fromViolations, ModelValidationError, type Result, type Violation, violation } from '../domain/result.js';
import { combineHashes, hashBoolean, hashString } from '../utils/hash.js';
import { freezeRecord } from '../utils/immutable.js';
import { foldText, normalizeText } from '../utils/normalize.js';
import type { SubjectState } from '../validation/activity.js';
import { isCollectionValid, validateCollection } from '../validation/collection.js';
import { isDescriptionValid, validateDescription, validateDescriptionUniqueness } from '../validation/text.js';
import { isTimestampValid, validateTimestamp } from '../validation/timestamp.js';
import { documentFromEntity, freezeDocument, validateDocument } from './document.js';
import {
  type EntityValidationOptions,
  equalsByIdentity,
  hashByIdentity,
  isRecordIdValid,
  validateRecordId,
} from './identity.js';

export type MatterStatus = 'active' | 'archived' | 'deleted';

/** A deleted matter must also be archived */
const isStateConsistent = (matter: MatterRecord): boolean => !matter.isDeleted || matter.isArchived;

const validateDocuments = (
  documents: readonly DocumentRecord[] | undefined,
  options: EntityValidationOptions,
): Violation[] =>
  validateCollection(documents, 'documents', { validateItem: (document) => validateDocument(document, options) });

/** @internal */
export const freezeMatter = (matter: MatterRecord): MatterRecord => {
  const { documents, ...rest } = matter;
  const record: MatterRecord = {
    ...rest,
    ...(documents ? { documents: Object.freeze(documents.map(freezeDocument)) } : {}),
  };
  return freezeRecord(record, ['creationDate']);
};

/**
 * Validates a matter and any documents it carries
 *
 * @example
 * ```typescript
 * validateMatter({ description: 'Smith Trust', isArchived: false, isDeleted: true, creationDate: now })
 *   .map((v) => v.message);
 * // => ['Deleted matters must be archived for audit trail integrity.']
 * ```
 */
export const validateMatter = (matter: MatterRecord, options?: EntityValidationOptions): Violation[] => {
  const resolved = resolveValidationOptions(options);
  const violations: Violation[] = [
    ...validateRecordId(matter.id, options),
    ...validateDescription(matter.description, 'description', resolved),
    ...validateTimestamp(matter.creationDate, 'creationDate', resolved),
  ];
  if (!isStateConsistent(matter)) {
    violations.push(
      violation('Deleted matters must be archived for audit trail integrity.', 'isArchived', 'isDeleted'),
    );
  }
  violations.push(
    ...validateDocuments(matter.documents, { ...resolved, requireIdentifier: options?.requireIdentifier ?? false }),
  );
  return violations;
};

export const isMatterValid = (matter: MatterRecord, options?: EntityValidationOptions): boolean => {
  const resolved = resolveValidationOptions(options);
  const nested = { ...resolved, requireIdentifier: options?.requireIdentifier ?? false };
  return (
    isRecordIdValid(matter.id, options) &&
    isDescriptionValid(matter.description, resolved) &&
    isTimestampValid(matter.creationDate, resolved) &&
    isStateConsistent(matter) &&
    isCollectionValid(matter.documents, { validateItem: (document) => validateDocument(document, nested) })
  );
};

/**
 * Reports a description already used by another matter
 *
 * The matter itself (same identifier) is ignored.
 */
export const validateMatterUniqueness = (matter: MatterRecord, existing: readonly MatterRecord[]): Violation[] =>
  validateDescriptionUniqueness(
    matter.description,
    existing.filter((other) => !sameId(other.id, matter.id)).map((other) => other.description),
    'description',
  );

/**
 * Creates a validated matter record
 *
 * @example
 * ```typescript
 * const result = createMatter({ description: 'Smith Trust', creationDate: new Date() });
 * if (result.success) {
 *   result.value.isArchived; // => false
 * }
 * ```
 */
export const createMatter = (input: MatterInput, options?: EntityValidationOptions): Result<MatterRecord> => {
  const record: MatterRecord = {
    ...input,
    isArchived: input.isArchived ?? false,
    isDeleted: input.isDeleted ?? false,
  };
  return fromViolations(validateMatter(record, options), () => freezeMatter(record));
};

/**
 * Converts a stored matter, and its documents when relations are included
 *
 * @throws {ModelValidationError} If the stored matter or a nested record is invalid
 */
export const matterFromEntity = (entity: MatterEntity, options: EntityConversionOptions = {}): MatterRecord => {
  const { documents, ...rest } = entity;
  const record: MatterRecord = {
    ...rest,
    ...(options.includeRelations !== false && documents
      ? { documents: documents.map((document) => documentFromEntity(document, options)) }
      : {}),
  };
  const violations = validateMatter(record, { ...options.validation, requireIdentifier: true });
  if (violations.length > 0) {
    throw new ModelValidationError('Matter', violations);
  }
  return freezeMatter(record);
};

const sameContent = (a: MatterRecord, b: MatterRecord): boolean =>
  foldText(a.description) === foldText(b.description) &&
  a.isArchived === b.isArchived &&
  a.isDeleted === b.isDeleted;

/**
 * Identifier equality for stored matters, content equality otherwise
 *
 * @example
 * ```typescript
 * matterEquals(
 *   { description: '  Smith   Trust  ', isArchived: false, isDeleted: false, creationDate: a },
 *   { description: 'Smith Trust', isArchived: false, isDeleted: false, creationDate: b },
 * ); // => true
 * ```
 */
export const matterEquals = (a: MatterRecord, b: MatterRecord): boolean => equalsByIdentity(a, b, sameContent);

export const matterHashCode = (matter: MatterRecord): number =>
  hashByIdentity(matter, (record) =>
    combineHashes(
      hashString(foldText(record.description)),
      hashBoolean(record.isArchived),
      hashBoolean(record.isDeleted),
    ),
  );

export const matterStatus = (matter: Pick<MatterRecord, 'isArchived' | 'isDeleted'>): MatterStatus => {
  if (matter.isDeleted) {
    return 'deleted';
  }
  return matter.isArchived ? 'archived' : 'active';
};

/** e.g. `'Smith Trust (archived)'` */
export const describeMatter = (matter: MatterRecord): string =>
  `${normalizeText(matter.description) || 'Untitled Matter'} (${matterStatus(matter)})`;

/** State flags for activity appropriateness */
export const matterState = (matter: MatterRecord): SubjectState => ({
  isArchived: matter.isArchived,
  isDeleted: matter.isDeleted,
});
