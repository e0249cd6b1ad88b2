/**
 * Activity-based predicates over association records
 *
 * All predicates read the attached activity; without one they return false.
 *
 * @module associations/classification
 */

import { DEFAULTS, MS_PER_DAY } from '../constants.js';
import { resolveValidationOptions } from '../config.js';
import type { ValidationOptionsInput } from '../config.types.js';
import type { ActivityRecord } from '../domain/entity-types.js';
import { normalizeActivityName } from '../utils/normalize.js';

interface WithActivity {
  readonly activity?: ActivityRecord;
}

interface WithTimestamp {
  readonly createdAt: Date;
}

/** Canonical name of the attached activity */
export const activityNameOf = (association: WithActivity): string | undefined =>
  association.activity ? normalizeActivityName(association.activity.activity) : undefined;

const hasActivity =
  (...names: readonly string[]) =>
  (association: WithActivity): boolean => {
    const name = activityNameOf(association);
    return name !== undefined && names.includes(name);
  };

export const isCreation = hasActivity('CREATED');
export const isDeletion = hasActivity('DELETED');
export const isRestoration = hasActivity('RESTORED');
export const isArchival = hasActivity('ARCHIVED');
export const isUnarchival = hasActivity('UNARCHIVED');
export const isViewing = hasActivity('VIEWED');
export const isSave = hasActivity('SAVED');
export const isCheckIn = hasActivity('CHECKED IN');
export const isCheckOut = hasActivity('CHECKED OUT');
/** Check-in or check-out */
export const isVersionControl = hasActivity('CHECKED IN', 'CHECKED OUT');
export const isMove = hasActivity('MOVED');
export const isCopy = hasActivity('COPIED');
/** Move or copy */
export const isTransfer = hasActivity('MOVED', 'COPIED');
/** Creation, archival, unarchival, deletion or restoration */
export const isLifecycleChange = hasActivity('CREATED', 'ARCHIVED', 'UNARCHIVED', 'DELETED', 'RESTORED');

export type DocumentActivityCategory = 'lifecycle' | 'version-control' | 'content' | 'unknown';

/**
 * Reporting category of a document activity
 *
 * @example
 * ```typescript
 * documentActivityCategory({ activity: { activity: 'CHECKED OUT' } }); // => 'version-control'
 * ```
 */
export const documentActivityCategory = (association: WithActivity): DocumentActivityCategory => {
  switch (activityNameOf(association)) {
    case 'CREATED':
    case 'DELETED':
    case 'RESTORED':
      return 'lifecycle';
    case 'CHECKED IN':
    case 'CHECKED OUT':
      return 'version-control';
    case 'SAVED':
      return 'content';
    default:
      return 'unknown';
  }
};

/** Days elapsed since the record was created, fractional; negative for future-dated records */
export const ageInDays = (association: WithTimestamp, options?: ValidationOptionsInput): number =>
  (resolveValidationOptions(options).clock().getTime() - association.createdAt.getTime()) / MS_PER_DAY;

/**
 * Whether the record was created within the last `withinDays` days
 *
 * @example
 * ```typescript
 * isRecent(record);     // within 7 days
 * isRecent(record, 30); // within 30 days
 * ```
 */
export const isRecent = (
  association: WithTimestamp,
  withinDays: number = DEFAULTS.RECENT_WITHIN_DAYS,
  options?: ValidationOptionsInput,
): boolean => ageInDays(association, options) <= withinDays;
