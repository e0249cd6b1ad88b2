import { describe, expect, it } from 'vitest';
import {
  getAllowedActivities,
  getSeededActivityId,
  getSeededActivityName,
  isActivityAppropriate,
  isActivityNameValid,
  isKnownActivity,
  NIL_ID,
  validateActivityContext,
  validateActivityName,
} from '../../src/index.js';

describe('activity vocabulary', () => {
  it('should list canonical names per kind', () => {
    expect(getAllowedActivities('revision')).toEqual(['CREATED', 'SAVED', 'DELETED', 'RESTORED']);
    expect(getAllowedActivities('matter-document')).toEqual(['MOVED', 'COPIED']);
  });

  it('should recognize names in any separator or case form', () => {
    expect(isKnownActivity('document', 'checked-out')).toBe(true);
    expect(isKnownActivity('document', 'Checked_In')).toBe(true);
    expect(isKnownActivity('matter', 'CHECKED IN')).toBe(false);
  });
});

describe('validateActivityName', () => {
  const messages = (value: string, kind: Parameters<typeof validateActivityName>[1], custom = false) =>
    validateActivityName(value, kind, 'activity', { custom }).map((item) => item.message);

  it('should accept known activities', () => {
    expect(messages('checked_in', 'document')).toEqual([]);
    expect(isActivityNameValid('moved', 'matter-document')).toBe(true);
  });

  it('should reject activities from another vocabulary', () => {
    expect(messages('ARCHIVED', 'revision')).toEqual([
      "activity 'ARCHIVED' is not an allowed revision activity. Allowed activities: CREATED, SAVED, DELETED, RESTORED.",
    ]);
    expect(messages('saved', 'matter-document')).toEqual([
      "activity 'SAVED' is not an allowed document transfer activity. Allowed activities: MOVED, COPIED.",
    ]);
  });

  it('should require a name', () => {
    expect(messages('  ', 'matter')).toEqual(['activity is required and cannot be empty.']);
  });

  it('should reject reserved words', () => {
    expect(messages('system', 'matter', true)).toEqual([
      "activity 'SYSTEM' is a reserved word and cannot be used as an activity.",
    ]);
  });

  it('should skip the vocabulary check for custom activities', () => {
    expect(messages('SHREDDED', 'document', true)).toEqual([]);
    expect(isActivityNameValid('SHREDDED', 'document')).toBe(false);
  });

  it('should report every failing rule', () => {
    expect(messages('@', 'matter', true)).toEqual([
      'activity must be at least 2 characters long.',
      'activity can only contain letters, numbers, spaces, periods, hyphens, and underscores.',
    ]);
  });
});

describe('seeded activity identifiers', () => {
  it.each([
    ['revision', 'CREATED', '10000000-0000-0000-0000-000000000001'],
    ['document', 'CHECKED IN', '20000000-0000-0000-0000-000000000001'],
    ['document', 'checked_out', '20000000-0000-0000-0000-000000000002'],
    ['matter', 'VIEWED', '30000000-0000-0000-0000-000000000006'],
    ['matter-document', 'MOVED', '40000000-0000-0000-0000-000000000002'],
  ] as const)('should map %s %s to %s', (kind, name, id) => {
    expect(getSeededActivityId(kind, name)).toBe(id);
    expect(getSeededActivityName(kind, id)).toBe(name.toUpperCase().replace('_', ' '));
  });

  it('should return the nil identifier for unknown names', () => {
    expect(getSeededActivityId('document', 'SHREDDED')).toBe(NIL_ID);
    expect(getSeededActivityId('matter', 'CHECKED IN')).toBe(NIL_ID);
  });

  it('should return undefined for identifiers that were not seeded', () => {
    expect(getSeededActivityName('matter', '20000000-0000-0000-0000-000000000001')).toBeUndefined();
  });
});

describe('isActivityAppropriate', () => {
  it.each([
    ['matter', 'CREATED', { exists: false }, true],
    ['matter', 'CREATED', {}, false],
    ['matter', 'VIEWED', { exists: false }, false],
    ['matter', 'ARCHIVED', {}, true],
    ['matter', 'ARCHIVED', { isArchived: true }, false],
    ['matter', 'UNARCHIVED', { isArchived: true }, true],
    ['matter', 'UNARCHIVED', {}, false],
    ['matter', 'DELETED', { isDeleted: true }, false],
    ['matter', 'RESTORED', { isDeleted: true }, true],
    ['matter', 'RESTORED', {}, false],
    ['document', 'CHECKED IN', { isCheckedOut: true }, true],
    ['document', 'CHECKED IN', {}, false],
    ['document', 'CHECKED OUT', { isCheckedOut: true }, false],
    ['document', 'SAVED', {}, false],
    ['document', 'SAVED', { isCheckedOut: true }, true],
    ['revision', 'SAVED', {}, true],
    ['matter-document', 'MOVED', { isDeleted: true }, false],
    ['document', 'SHREDDED', {}, true],
  ] as const)('%s %s in %o should be %s', (kind, activity, state, expected) => {
    expect(isActivityAppropriate(kind, activity, state)).toBe(expected);
  });
});

describe('validateActivityContext', () => {
  it.each([
    ['matter', 'ARCHIVED', { isArchived: true }, "Activity 'ARCHIVED' is not appropriate for an archived matter."],
    ['matter', 'VIEWED', { exists: false }, "Activity 'VIEWED' is not appropriate for a new matter."],
    ['document', 'CHECKED IN', {}, "Activity 'CHECKED IN' is not appropriate for an active document."],
    [
      'document',
      'checked_out',
      { isCheckedOut: true },
      "Activity 'CHECKED OUT' is not appropriate for a checked-out document.",
    ],
    ['matter-document', 'MOVED', { isDeleted: true }, "Activity 'MOVED' is not appropriate for a deleted document."],
  ] as const)('should report %s %s', (kind, activity, state, message) => {
    expect(validateActivityContext(kind, activity, state)).toEqual([{ message, fields: ['activity'], kind: 'validation' }]);
  });

  it('should accept appropriate activities', () => {
    expect(validateActivityContext('document', 'CHECKED IN', { isCheckedOut: true }, 'operation')).toEqual([]);
  });
});
