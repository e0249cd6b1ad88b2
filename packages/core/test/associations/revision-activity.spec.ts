import { describe, expect, it } from 'vitest';
import { type RevisionActivityInput, revisionActivityUsers } from '../../src/index.js';
import { EARLIER, makeActivity, makeRevision, makeUser, options, REVISION_ID, REVISION_SAVED_ID, USER_ID } from '../fixtures.js';

const attached = (overrides: Partial<RevisionActivityInput> = {}): RevisionActivityInput => ({
  revisionId: REVISION_ID,
  activityId: REVISION_SAVED_ID,
  userId: USER_ID,
  createdAt: EARLIER,
  revision: makeRevision(),
  activity: makeActivity('revision', 'SAVED'),
  user: makeUser(),
  ...overrides,
});

describe('revisionActivityUsers', () => {
  it('should build a record from keys', () => {
    const result = revisionActivityUsers.fromSource(REVISION_ID, REVISION_SAVED_ID, USER_ID, EARLIER, options);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.value.kind).toBe('revision-activity');
      expect(result.value.revisionId).toBe(REVISION_ID);
    }
  });

  it('should scope attached revision violations', () => {
    expect(revisionActivityUsers.validate(attached({ revision: makeRevision({ revisionNumber: 0 }) }), options)).toEqual([
      {
        message: 'Revision: revisionNumber must be a positive whole number.',
        fields: ['revision.revisionNumber'],
        kind: 'validation',
      },
    ]);
  });

  it('should reject activities outside the revision vocabulary', () => {
    const violations = revisionActivityUsers.validate(
      attached({ activity: { id: REVISION_SAVED_ID, activity: 'CHECKED IN' } }),
      options,
    );

    expect(violations.map((item) => item.message)).toEqual([
      "Activity: activity 'CHECKED IN' is not an allowed revision activity. Allowed activities: CREATED, SAVED, DELETED, RESTORED.",
      `Activity: activity 'CHECKED IN' does not match the seeded activity of id ${REVISION_SAVED_ID}.`,
    ]);
  });

  it('should render revisions by number', () => {
    const result = revisionActivityUsers.create(attached(), options);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(revisionActivityUsers.summarize(result.value)).toBe('Revision 1 SAVED by rbrown');
      expect(revisionActivityUsers.describe(result.value)).toBe(
        `Revision Activity: SAVED on Revision (${REVISION_ID}) by User (${USER_ID}) at 2024-05-20 08:30:00`,
      );
    }
  });

  it('should convert a stored row', () => {
    const record = revisionActivityUsers.fromEntity(
      {
        revisionId: REVISION_ID,
        revisionActivityId: REVISION_SAVED_ID,
        userId: USER_ID,
        createdAt: EARLIER,
        revision: { ...makeRevision(), id: REVISION_ID },
        revisionActivity: { id: REVISION_SAVED_ID, activity: 'SAVED' },
        user: { id: USER_ID, name: 'rbrown' },
      },
      { validation: options },
    );

    expect(revisionActivityUsers.summarize(record)).toBe('Revision 1 SAVED by rbrown');
  });
});
