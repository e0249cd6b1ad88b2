/**
 * Foreign keys and their optionally attached sub-records
 *
 * @module associations/relations
 */

import type { ResolvedValidationOptions } from '../config.types.js';
import type { ActivityKind } from '../constants.js';
import type { AssociationInputBase } from '../domain/association-types.js';
import { canonicalizeId } from '../domain/branded-types.js';
import type { ActivityRecord, EntityConversionOptions, UserRecord } from '../domain/entity-types.js';
import { prefixViolations, type Violation } from '../domain/result.js';
import { freezeActivity, isActivityRecordValid, validateActivityRecord } from '../entities/activity.js';
import type { EntityValidationOptions } from '../entities/identity.js';
import { freezeUser, isUserValid, validateUser } from '../entities/user.js';

/** A foreign key of an association input, with type-erased access to its attached record */
export interface RelationBinding<TInput> {
  /** Foreign-key field, e.g. `matterId` */
  readonly key: string;
  /** Attached relation field, e.g. `matter` */
  readonly relation: string;
  /** Prefix of the attached record's violation messages */
  readonly label: string;
  readonly id: (input: TInput) => string;
  readonly isAttached: (input: TInput) => boolean;
  readonly validateAttached: (input: TInput, options: ResolvedValidationOptions) => Violation[];
  readonly isAttachedValid: (input: TInput, options: ResolvedValidationOptions) => boolean;
  /** True when an attached record's identifier differs from the foreign key */
  readonly mismatches: (input: TInput) => boolean;
}

export interface RelationSpec<TInput, TAttached extends { readonly id?: string }> {
  key: string;
  relation: string;
  label: string;
  id: (input: TInput) => string;
  attached: (input: TInput) => TAttached | undefined;
  validate: (record: TAttached, options: EntityValidationOptions) => Violation[];
  isValid: (record: TAttached, options: EntityValidationOptions) => boolean;
}

/**
 * Binds a foreign key to its attached record type
 *
 * Attached records are validated with their identifier required.
 */
export const bindRelation = <TInput, TAttached extends { readonly id?: string }>(
  spec: RelationSpec<TInput, TAttached>,
): RelationBinding<TInput> => ({
  key: spec.key,
  relation: spec.relation,
  label: spec.label,
  id: spec.id,
  isAttached: (input) => spec.attached(input) !== undefined,
  validateAttached: (input, options) => {
    const record = spec.attached(input);
    return record
      ? prefixViolations(spec.validate(record, { ...options, requireIdentifier: true }), spec.relation, spec.label)
      : [];
  },
  isAttachedValid: (input, options) => {
    const record = spec.attached(input);
    return record ? spec.isValid(record, { ...options, requireIdentifier: true }) : true;
  },
  mismatches: (input) => {
    const record = spec.attached(input);
    return record !== undefined && canonicalizeId(record.id ?? '') !== canonicalizeId(spec.id(input));
  },
});

export const activityRelation = <TInput extends AssociationInputBase>(kind: ActivityKind): RelationBinding<TInput> =>
  bindRelation<TInput, ActivityRecord>({
    key: 'activityId',
    relation: 'activity',
    label: 'Activity',
    id: (input) => input.activityId,
    attached: (input) => input.activity,
    validate: (record, options) => validateActivityRecord(kind, record, options),
    isValid: (record, options) => isActivityRecordValid(kind, record, options),
  });

export const userRelation = <TInput extends AssociationInputBase>(): RelationBinding<TInput> =>
  bindRelation<TInput, UserRecord>({
    key: 'userId',
    relation: 'user',
    label: 'User',
    id: (input) => input.userId,
    attached: (input) => input.user,
    validate: validateUser,
    isValid: isUserValid,
  });

/** Frozen copies of the attached activity and user, for record builders */
export const attachedActorFields = (input: AssociationInputBase): Pick<AssociationInputBase, 'activity' | 'user'> => ({
  ...(input.activity ? { activity: freezeActivity(input.activity) } : {}),
  ...(input.user ? { user: freezeUser(input.user) } : {}),
});

/** Options for converting a row's attached rows, or undefined when relations are excluded */
export const attachedConversion = (options: EntityConversionOptions): EntityConversionOptions | undefined =>
  options.includeRelations === false ? undefined : { includeRelations: false, validation: options.validation };
