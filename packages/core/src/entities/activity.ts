/**
 * Activity vocabulary records
 *
 * @module entities/activity
 */

import { resolveValidationOptions } from '../config.js';
import type { ActivityKind } from '../constants.js';
import { canonicalizeId, isPresentId } from '../domain/branded-types.js';
import type { ActivityEntity, ActivityRecord, EntityConversionOptions } from '../domain/entity-types.js';
import { fromViolations, ModelValidationError, type Result, type Violation, violation } from '../domain/result.js';
import { hashString } from '../utils/hash.js';
import { normalizeActivityName } from '../utils/normalize.js';
import { getSeededActivityId, getSeededActivityName, isActivityNameValid, validateActivityName } from '../validation/activity.js';
import {
  type EntityValidationOptions,
  equalsByIdentity,
  hashByIdentity,
  isRecordIdValid,
  validateRecordId,
} from './identity.js';

/** @internal */
export const freezeActivity = (record: ActivityRecord): ActivityRecord => Object.freeze({ ...record });

/** True when a seeded identifier is paired with a different name */
const contradictsSeed = (kind: ActivityKind, record: ActivityRecord): boolean => {
  if (!isPresentId(record.id)) {
    return false;
  }
  const seededName = getSeededActivityName(kind, record.id);
  return seededName !== undefined && seededName !== normalizeActivityName(record.activity);
};

/**
 * Validates an activity record against its kind's vocabulary
 *
 * @example
 * ```typescript
 * validateActivityRecord('matter', { activity: 'CHECKED OUT' }).length; // => 1
 * validateActivityRecord('matter', { activity: 'CHECKED OUT', isCustom: true }); // => []
 * ```
 */
export const validateActivityRecord = (
  kind: ActivityKind,
  record: ActivityRecord,
  options?: EntityValidationOptions,
): Violation[] => {
  const violations = [
    ...validateRecordId(record.id, options),
    ...validateActivityName(record.activity, kind, 'activity', {
      ...resolveValidationOptions(options),
      custom: record.isCustom ?? false,
    }),
  ];
  if (contradictsSeed(kind, record)) {
    violations.push(
      violation(
        `activity '${normalizeActivityName(record.activity)}' does not match the seeded activity of id ${canonicalizeId(record.id ?? '')}.`,
        'activity',
        'id',
      ),
    );
  }
  return violations;
};

export const isActivityRecordValid = (
  kind: ActivityKind,
  record: ActivityRecord,
  options?: EntityValidationOptions,
): boolean =>
  isRecordIdValid(record.id, options) &&
  isActivityNameValid(record.activity, kind, {
    ...resolveValidationOptions(options),
    custom: record.isCustom ?? false,
  }) &&
  !contradictsSeed(kind, record);

export const createActivityRecord = (
  kind: ActivityKind,
  input: ActivityRecord,
  options?: EntityValidationOptions,
): Result<ActivityRecord> => fromViolations(validateActivityRecord(kind, input, options), () => freezeActivity(input));

/**
 * The seeded record for a canonical activity
 *
 * @returns undefined for names outside the kind's vocabulary
 *
 * @example
 * ```typescript
 * seededActivity('matter', 'archived');
 * // => { id: '30000000-0000-0000-0000-000000000001', activity: 'ARCHIVED' }
 * ```
 */
export const seededActivity = (kind: ActivityKind, name: string): ActivityRecord | undefined => {
  const id = getSeededActivityId(kind, name);
  if (!isPresentId(id)) {
    return undefined;
  }
  return freezeActivity({ id, activity: normalizeActivityName(name) });
};

/**
 * Converts a stored activity
 *
 * @throws {ModelValidationError} If the stored activity is invalid for its kind
 */
export const activityFromEntity = (
  kind: ActivityKind,
  entity: ActivityEntity,
  options: EntityConversionOptions = {},
): ActivityRecord => {
  const record: ActivityRecord = { ...entity };
  const violations = validateActivityRecord(kind, record, { ...options.validation, requireIdentifier: true });
  if (violations.length > 0) {
    throw new ModelValidationError('Activity', violations);
  }
  return freezeActivity(record);
};

export const activityRecordEquals = (a: ActivityRecord, b: ActivityRecord): boolean =>
  equalsByIdentity(a, b, (x, y) => normalizeActivityName(x.activity) === normalizeActivityName(y.activity));

export const activityRecordHashCode = (record: ActivityRecord): number =>
  hashByIdentity(record, (value) => hashString(normalizeActivityName(value.activity)));
