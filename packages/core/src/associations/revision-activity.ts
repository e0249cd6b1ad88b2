/**
 * Revision activity associations
 *
 * @module associations/revision-activity
 */

import type {
  RevisionActivityInput,
  RevisionActivityUser,
  RevisionActivityUserEntity,
} from '../domain/association-types.js';
import { createActivityId, createRevisionId, createUserId } from '../domain/branded-types.js';
import type { RevisionRecord } from '../domain/entity-types.js';
import { activityFromEntity } from '../entities/activity.js';
import {
  describeRevision,
  freezeRevision,
  isRevisionValid,
  revisionFromEntity,
  validateRevision,
} from '../entities/revision.js';
import { userFromEntity } from '../entities/user.js';
import { freezeRecord } from '../utils/immutable.js';
import { type AssociationModel, defineAssociation } from './define.js';
import { activityRelation, attachedActorFields, attachedConversion, bindRelation, userRelation } from './relations.js';

export type RevisionActivityUserModel = AssociationModel<
  RevisionActivityInput,
  RevisionActivityUser,
  string,
  RevisionActivityUserEntity
>;

export const revisionActivityUsers: RevisionActivityUserModel = defineAssociation<RevisionActivityInput, RevisionActivityUser, string, RevisionActivityUserEntity>({
  kind: 'revision-activity',
  modelName: 'RevisionActivityUser',
  activityKind: 'revision',
  relations: [
    bindRelation<RevisionActivityInput, RevisionRecord>({
      key: 'revisionId',
      relation: 'revision',
      label: 'Revision',
      id: (input) => input.revisionId,
      attached: (input) => input.revision,
      validate: validateRevision,
      isValid: isRevisionValid,
    }),
    activityRelation<RevisionActivityInput>('revision'),
    userRelation<RevisionActivityInput>(),
  ],
  compose: (revisionId: string, base) => ({ ...base, revisionId }),
  build: (input) => {
    const record: RevisionActivityUser = {
      kind: 'revision-activity',
      revisionId: createRevisionId(input.revisionId),
      activityId: createActivityId(input.activityId),
      userId: createUserId(input.userId),
      createdAt: input.createdAt,
      ...(input.revision ? { revision: freezeRevision(input.revision) } : {}),
      ...attachedActorFields(input),
    };
    return freezeRecord(record, ['createdAt']);
  },
  mapEntity: (entity: RevisionActivityUserEntity, options): RevisionActivityInput => {
    const related = attachedConversion(options);
    return {
      revisionId: entity.revisionId,
      activityId: entity.revisionActivityId,
      userId: entity.userId,
      createdAt: entity.createdAt,
      ...(related && entity.revision ? { revision: revisionFromEntity(entity.revision, related) } : {}),
      ...(related && entity.revisionActivity
        ? { activity: activityFromEntity('revision', entity.revisionActivity, related) }
        : {}),
      ...(related && entity.user ? { user: userFromEntity(entity.user, related) } : {}),
    };
  },
  display: {
    label: 'Revision Activity',
    placeholders: { subject: 'Revision', activity: 'ACTIVITY', user: 'User', matter: 'Matter' },
    subject: (record) => (record.revision ? describeRevision(record.revision) : undefined),
    keyText: (record) => `Revision (${record.revisionId})`,
  },
});
