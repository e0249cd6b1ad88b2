/**
 * Activity vocabularies, seeded identifiers and state appropriateness
 *
 * @module validation/activity
 */

import { resolveValidationOptions } from '../config.js';
import type { ValidationOptionsInput } from '../config.types.js';
import { ACTIVITY_NAMES, type ActivityKind, NIL_ID, SEEDED_ACTIVITY_IDS, TEXT_LIMITS } from '../constants.js';
import { canonicalizeId } from '../domain/branded-types.js';
import { type Violation, violation } from '../domain/result.js';
import { foldText, normalizeActivityName, normalizeText } from '../utils/normalize.js';
import { evaluateRules, type Rule, satisfiesRules } from './rules.js';

type TextValue = string | null | undefined;

const ACTIVITY_CHARACTERS = /^[\p{L}\p{N} ._-]+$/u;

const KIND_LABELS: Record<ActivityKind, string> = {
  matter: 'matter',
  document: 'document',
  revision: 'revision',
  'matter-document': 'document transfer',
};

/** Canonical activity names of a kind */
export const getAllowedActivities = (kind: ActivityKind): readonly string[] => ACTIVITY_NAMES[kind];

/** True when the name (in any separator or case form) is one of the kind's canonical activities */
export const isKnownActivity = (kind: ActivityKind, name: TextValue): boolean =>
  getAllowedActivities(kind).includes(normalizeActivityName(name));

export interface ActivityNameOptions {
  /** Skip the allowed-set membership rule */
  custom?: boolean;
}

const activityNameRules = (
  kind: ActivityKind,
  reserved: ReadonlySet<string>,
  custom: boolean,
): readonly Rule<TextValue>[] => {
  const rules: Rule<TextValue>[] = [
    {
      test: (value) => normalizeText(value) !== '',
      message: (field) => `${field} is required and cannot be empty.`,
      halt: true,
    },
    {
      test: (value) => normalizeText(value).length >= TEXT_LIMITS.ACTIVITY_MIN,
      message: (field) => `${field} must be at least ${TEXT_LIMITS.ACTIVITY_MIN} characters long.`,
    },
    {
      test: (value) => normalizeText(value).length <= TEXT_LIMITS.ACTIVITY_MAX,
      message: (field) => `${field} cannot exceed ${TEXT_LIMITS.ACTIVITY_MAX} characters.`,
    },
    {
      test: (value) => ACTIVITY_CHARACTERS.test(normalizeText(value)),
      message: (field) => `${field} can only contain letters, numbers, spaces, periods, hyphens, and underscores.`,
    },
    {
      test: (value) => !reserved.has(foldText(normalizeActivityName(value))),
      message: (field, value) =>
        `${field} '${normalizeActivityName(value)}' is a reserved word and cannot be used as an activity.`,
    },
  ];
  if (!custom) {
    rules.push({
      test: (value) => isKnownActivity(kind, value),
      message: (field, value) =>
        `${field} '${normalizeActivityName(value)}' is not an allowed ${KIND_LABELS[kind]} activity. ` +
        `Allowed activities: ${getAllowedActivities(kind).join(', ')}.`,
    });
  }
  return rules;
};

/**
 * Validates an activity name for its kind
 *
 * @example
 * ```typescript
 * validateActivityName('checked_in', 'document', 'activity'); // => []
 * validateActivityName('ARCHIVED', 'revision', 'activity').length; // => 1
 * ```
 */
export const validateActivityName = (
  value: TextValue,
  kind: ActivityKind,
  field: string,
  options?: ValidationOptionsInput & ActivityNameOptions,
): Violation[] =>
  evaluateRules(
    activityNameRules(kind, resolveValidationOptions(options).reserved.activities, options?.custom ?? false),
    value,
    field,
  );

export const isActivityNameValid = (
  value: TextValue,
  kind: ActivityKind,
  options?: ValidationOptionsInput & ActivityNameOptions,
): boolean =>
  satisfiesRules(
    activityNameRules(kind, resolveValidationOptions(options).reserved.activities, options?.custom ?? false),
    value,
  );

// ============================================================================
// Seeded identifiers
// ============================================================================

const seededTable = (kind: ActivityKind): Readonly<Record<string, string>> => SEEDED_ACTIVITY_IDS[kind];

/**
 * Identifier the activity table is seeded with for a name
 *
 * @returns The seeded identifier, or {@link NIL_ID} for names outside the vocabulary
 *
 * @example
 * ```typescript
 * getSeededActivityId('document', 'CHECKED IN'); // => '20000000-0000-0000-0000-000000000001'
 * getSeededActivityId('document', 'SHREDDED');   // => '00000000-0000-0000-0000-000000000000'
 * ```
 */
export const getSeededActivityId = (kind: ActivityKind, name: TextValue): string =>
  seededTable(kind)[normalizeActivityName(name)] ?? NIL_ID;

/** Reverse of {@link getSeededActivityId}; undefined for identifiers that were not seeded */
export const getSeededActivityName = (kind: ActivityKind, id: string): string | undefined => {
  const canonical = canonicalizeId(id);
  return Object.entries(seededTable(kind)).find(([, seededId]) => seededId === canonical)?.[0];
};

// ============================================================================
// State appropriateness
// ============================================================================

/** Subject state as known to the caller */
export interface SubjectState {
  /** @default true */
  exists?: boolean;
  isArchived?: boolean;
  isDeleted?: boolean;
  isCheckedOut?: boolean;
}

/**
 * Whether an activity makes sense for a subject in the given state
 *
 * @remarks
 * Pure over the supplied flags. Names outside the vocabulary are considered appropriate.
 *
 * @example
 * ```typescript
 * isActivityAppropriate('matter', 'ARCHIVED', { isArchived: true }); // => false
 * isActivityAppropriate('document', 'CHECKED IN', { isCheckedOut: true }); // => true
 * ```
 */
export const isActivityAppropriate = (kind: ActivityKind, activity: TextValue, state: SubjectState): boolean => {
  const name = normalizeActivityName(activity);
  const exists = state.exists ?? true;
  const archived = state.isArchived ?? false;
  const deleted = state.isDeleted ?? false;
  const checkedOut = state.isCheckedOut ?? false;

  if (name === 'CREATED') {
    return !exists;
  }
  if (!exists) {
    return false;
  }

  switch (name) {
    case 'ARCHIVED':
      return !archived && !deleted;
    case 'UNARCHIVED':
      return archived && !deleted;
    case 'DELETED':
      return !deleted;
    case 'RESTORED':
      return deleted;
    case 'VIEWED':
    case 'MOVED':
    case 'COPIED':
      return !deleted;
    case 'CHECKED IN':
      return checkedOut && !deleted;
    case 'CHECKED OUT':
      return !checkedOut && !deleted;
    case 'SAVED':
      return kind === 'document' ? checkedOut && !deleted : !deleted;
    default:
      return true;
  }
};

const describeState = (state: SubjectState): string => {
  if (state.exists === false) {
    return 'new';
  }
  if (state.isDeleted) {
    return 'deleted';
  }
  if (state.isArchived) {
    return 'archived';
  }
  return state.isCheckedOut ? 'checked-out' : 'active';
};

const withArticle = (word: string): string => (/^[aeiou]/i.test(word) ? `an ${word}` : `a ${word}`);

const SUBJECT_LABELS: Record<ActivityKind, string> = {
  matter: 'matter',
  document: 'document',
  revision: 'revision',
  'matter-document': 'document',
};

/**
 * Violation form of {@link isActivityAppropriate}
 *
 * @example
 * ```typescript
 * validateActivityContext('matter', 'ARCHIVED', { isArchived: true });
 * // => [{ message: "Activity 'ARCHIVED' is not appropriate for an archived matter.", fields: ['activity'], ... }]
 * ```
 */
export const validateActivityContext = (
  kind: ActivityKind,
  activity: TextValue,
  state: SubjectState,
  field = 'activity',
): Violation[] =>
  isActivityAppropriate(kind, activity, state)
    ? []
    : [
        violation(
          `Activity '${normalizeActivityName(activity)}' is not appropriate for ${withArticle(describeState(state))} ${SUBJECT_LABELS[kind]}.`,
          field,
        ),
      ];
