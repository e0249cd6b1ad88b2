/**
 * Association model factory
 *
 * Every association kind is a definition (its foreign keys, record builder,
 * persistence mapping and rendering) turned into a model exposing the same
 * operations.
 *
 * @module associations/define
 *
 * @example
 * ```typescript
 * const result = matterActivityUsers.fromSource(matterId, activityId, userId);
 * if (!result.success) {
 *   console.log(summarizeViolations(result.errors));
 * }
 * ```
 */

import { resolveValidationOptions } from '../config.js';
import type { ValidationOptionsInput } from '../config.types.js';
import type { ActivityKind } from '../constants.js';
import type { AssociationInputBase, AuditAssociation, TransferDirection } from '../domain/association-types.js';
import type { EntityConversionOptions } from '../domain/entity-types.js';
import { fromViolations, ModelValidationError, type Result, referentialViolation, type Violation } from '../domain/result.js';
import { conversionLog, validationLog } from '../utils/debug.js';
import { createErrorHandler, type ErrorHandler, type ErrorStrategy, withErrorHandlingSync } from '../utils/error-handler.js';
import { isValidIdentifier, validateIdentifier } from '../validation/identifier.js';
import { isTimestampValid, validateTimestamp } from '../validation/timestamp.js';
import { activityNameOf, ageInDays } from './classification.js';
import {
  auditMessageOf,
  describeAssociation,
  type DisplayBinding,
  type MissingPlaceholder,
  summarizeAssociation,
} from './display.js';
import { associationEquals, associationHashCode, compareAssociations, sortAssociations } from './ordering.js';
import type { RelationBinding } from './relations.js';

// ============================================================================
// Type Definitions
// ============================================================================

/** Options of `fromEntity`; `validation` also applies to every attached sub-record */
export type ConversionOptions = EntityConversionOptions;

/** Options of `fromEntities` */
export interface BatchConversionOptions extends ConversionOptions {
  /**
   * What happens to an entity that fails conversion
   *
   * @default 'log'
   */
  errorStrategy?: ErrorStrategy;
  /** Called with each conversion failure before the strategy applies */
  onError?: ErrorHandler;
}

/** Structured facts about a record, for reports */
export interface AssociationInfo {
  kind: AuditAssociation['kind'];
  summary: string;
  /** Canonical name of the attached activity */
  operation: string | undefined;
  direction: TransferDirection | undefined;
  /** Every sub-record is attached */
  hasCompleteInformation: boolean;
  /** Every foreign key is a usable identifier and the timestamp is a valid date */
  requiredFieldsPresent: boolean;
  ageInDays: number;
}

/**
 * Description of one association kind
 *
 * @template TInput - Unvalidated input shape
 * @template TRecord - Validated record
 * @template TSubject - Subject key accepted by `fromSource`
 * @template TEntity - Persistence shape
 */
export interface AssociationDefinition<
  TInput extends AssociationInputBase,
  TRecord extends AuditAssociation & TInput,
  TSubject,
  TEntity,
> {
  readonly kind: TRecord['kind'];
  /** Name used in errors and logs, e.g. `MatterActivityUser` */
  readonly modelName: string;
  readonly activityKind: ActivityKind;
  /** Foreign keys in validation order */
  readonly relations: readonly RelationBinding<TInput>[];
  readonly compose: (subject: TSubject, base: AssociationInputBase) => TInput;
  /** Brands and freezes a validated input, attached sub-records included */
  readonly build: (input: TInput) => TRecord;
  /** Maps a persisted row, converting attached rows under the same validation options */
  readonly mapEntity: (entity: TEntity, options: EntityConversionOptions) => TInput;
  readonly display: DisplayBinding<TRecord>;
}

/** Operations of one association kind */
export interface AssociationModel<TInput extends AssociationInputBase, TRecord extends AuditAssociation & TInput, TSubject, TEntity> {
  readonly kind: TRecord['kind'];
  readonly modelName: string;
  readonly activityKind: ActivityKind;
  /**
   * Builds a record from identifiers; the timestamp defaults to the clock's "now"
   *
   * @returns Failure carrying every violation when any rule fails
   */
  fromSource(
    subject: TSubject,
    activityId: string,
    userId: string,
    timestamp?: Date,
    options?: ValidationOptionsInput,
  ): Result<TRecord>;
  /** Builds a record from a full input, attached sub-records included */
  create(input: TInput, options?: ValidationOptionsInput): Result<TRecord>;
  validate(input: TInput, options?: ValidationOptionsInput): Violation[];
  isValid(input: TInput, options?: ValidationOptionsInput): boolean;
  /**
   * Converts a persisted row
   *
   * @throws {ModelValidationError} If the row does not form a valid record
   */
  fromEntity(entity: TEntity, options?: ConversionOptions): TRecord;
  /** Converts persisted rows, handing failures to the configured error strategy */
  fromEntities(entities: readonly TEntity[], options?: BatchConversionOptions): TRecord[];
  equals(a: TRecord, b: TRecord): boolean;
  hashCode(record: TRecord): number;
  compare(a: TRecord, b: TRecord): number;
  sort(records: readonly TRecord[]): TRecord[];
  summarize(record: TRecord, missing?: MissingPlaceholder): string;
  auditMessage(record: TRecord, missing?: MissingPlaceholder): string;
  describe(record: TRecord): string;
  inspect(record: TRecord, options?: ValidationOptionsInput): AssociationInfo;
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Turns an association definition into its model
 *
 * @remarks
 * Validation order: foreign keys, timestamp, attached sub-records (re-scoped
 * under their relation), then referential integrity. `validate` and `isValid`
 * evaluate the same rules.
 */
export const defineAssociation = <
  TInput extends AssociationInputBase,
  TRecord extends AuditAssociation & TInput,
  TSubject,
  TEntity,
>(
  definition: AssociationDefinition<TInput, TRecord, TSubject, TEntity>,
): AssociationModel<TInput, TRecord, TSubject, TEntity> => {
  const { relations, modelName } = definition;

  const validate = (input: TInput, options?: ValidationOptionsInput): Violation[] => {
    const resolved = resolveValidationOptions(options);
    const violations: Violation[] = [
      ...relations.flatMap((relation) => validateIdentifier(relation.id(input), relation.key)),
      ...validateTimestamp(input.createdAt, 'createdAt', resolved),
      ...relations.flatMap((relation) => relation.validateAttached(input, resolved)),
      ...relations
        .filter((relation) => relation.mismatches(input))
        .map((relation) => referentialViolation(relation.relation, relation.key)),
    ];
    if (violations.length > 0) {
      validationLog('%s failed validation with %d violation(s)', modelName, violations.length);
    }
    return violations;
  };

  const isValid = (input: TInput, options?: ValidationOptionsInput): boolean => {
    const resolved = resolveValidationOptions(options);
    return (
      relations.every((relation) => isValidIdentifier(relation.id(input))) &&
      isTimestampValid(input.createdAt, resolved) &&
      relations.every((relation) => relation.isAttachedValid(input, resolved)) &&
      !relations.some((relation) => relation.mismatches(input))
    );
  };

  const create = (input: TInput, options?: ValidationOptionsInput): Result<TRecord> =>
    fromViolations(validate(input, options), () => definition.build(input));

  const fromEntity = (entity: TEntity, options: ConversionOptions = {}): TRecord => {
    const input = definition.mapEntity(entity, options);
    const violations = validate(input, options.validation);
    if (violations.length > 0) {
      throw new ModelValidationError(modelName, violations);
    }
    return definition.build(input);
  };

  const model: AssociationModel<TInput, TRecord, TSubject, TEntity> = {
    kind: definition.kind,
    modelName,
    activityKind: definition.activityKind,

    fromSource: (subject, activityId, userId, timestamp, options) => {
      const createdAt = timestamp ?? resolveValidationOptions(options).clock();
      return create(definition.compose(subject, { activityId, userId, createdAt }), options);
    },

    create,
    validate,
    isValid,
    fromEntity,

    fromEntities: (entities, options = {}) => {
      const handler = createErrorHandler(options.errorStrategy ?? 'log', options.onError);
      const records: TRecord[] = [];
      entities.forEach((entity, index) => {
        const record = withErrorHandlingSync(() => fromEntity(entity, options), handler, `${modelName}[${index}]`);
        if (record === undefined) {
          conversionLog('Skipped %s at index %d', modelName, index);
          return;
        }
        records.push(record);
      });
      conversionLog('Converted %d of %d %s entities', records.length, entities.length, modelName);
      return records;
    },

    equals: associationEquals,
    hashCode: associationHashCode,
    compare: compareAssociations,
    sort: (records) => sortAssociations(records),

    summarize: (record, missing) => summarizeAssociation(definition.display, record, missing),
    auditMessage: (record, missing) => auditMessageOf(definition.display, record, missing),
    describe: (record) => describeAssociation(definition.display, record),

    inspect: (record, options) => ({
      kind: record.kind,
      summary: summarizeAssociation(definition.display, record),
      operation: activityNameOf(record),
      direction: definition.display.transfer?.direction,
      hasCompleteInformation: relations.every((relation) => relation.isAttached(record)),
      requiredFieldsPresent:
        relations.every((relation) => isValidIdentifier(relation.id(record))) &&
        !Number.isNaN(record.createdAt.getTime()),
      ageInDays: ageInDays(record, options),
    }),
  };

  return Object.freeze(model);
};
