import { describe, expect, it } from 'vitest';
import {
  activityFromEntity,
  activityRecordEquals,
  activityRecordHashCode,
  createActivityRecord,
  isActivityRecordValid,
  ModelValidationError,
  seededActivity,
  validateActivityRecord,
} from '../../src/index.js';
import { DOCUMENT_CHECKED_OUT_ID, MATTER_CREATED_ID } from '../fixtures.js';

describe('validateActivityRecord', () => {
  it('should accept a seeded activity', () => {
    expect(validateActivityRecord('matter', { id: MATTER_CREATED_ID, activity: 'created' })).toEqual([]);
  });

  it('should reject names outside the vocabulary unless custom', () => {
    expect(validateActivityRecord('matter', { activity: 'CHECKED OUT' })).toHaveLength(1);
    expect(validateActivityRecord('matter', { activity: 'CHECKED OUT', isCustom: true })).toEqual([]);
  });

  it('should reject a name contradicting its seeded identifier', () => {
    const record = { id: MATTER_CREATED_ID, activity: 'archived' };

    expect(validateActivityRecord('matter', record)).toEqual([
      {
        message: "activity 'ARCHIVED' does not match the seeded activity of id 30000000-0000-0000-0000-000000000002.",
        fields: ['activity', 'id'],
        kind: 'validation',
      },
    ]);
    expect(isActivityRecordValid('matter', record)).toBe(false);
  });

  it('should create a frozen record', () => {
    const result = createActivityRecord('document', { activity: 'SAVED' });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(Object.isFrozen(result.value)).toBe(true);
    }
  });
});

describe('seededActivity', () => {
  it('should return the seeded record in canonical form', () => {
    expect(seededActivity('matter', 'archived')).toEqual({ id: '30000000-0000-0000-0000-000000000001', activity: 'ARCHIVED' });
  });

  it('should return undefined outside the vocabulary', () => {
    expect(seededActivity('revision', 'ARCHIVED')).toBeUndefined();
  });
});

describe('activityFromEntity', () => {
  it('should convert a stored activity', () => {
    expect(activityFromEntity('document', { id: DOCUMENT_CHECKED_OUT_ID, activity: 'CHECKED OUT' })).toEqual({
      id: DOCUMENT_CHECKED_OUT_ID,
      activity: 'CHECKED OUT',
    });
  });

  it('should throw for an activity of another kind', () => {
    expect(() => activityFromEntity('revision', { id: DOCUMENT_CHECKED_OUT_ID, activity: 'CHECKED OUT' })).toThrow(
      ModelValidationError,
    );
  });
});

describe('activity equality', () => {
  it('should compare unsaved activities by canonical name', () => {
    const a = { activity: 'checked in' };
    const b = { activity: 'CHECKED_IN' };

    expect(activityRecordEquals(a, b)).toBe(true);
    expect(activityRecordHashCode(a)).toBe(activityRecordHashCode(b));
  });
});
