/**
 * Matter activity associations: who did what to a matter, and when
 *
 * @module associations/matter-activity
 */

import type { MatterActivityInput, MatterActivityUser, MatterActivityUserEntity } from '../domain/association-types.js';
import { createActivityId, createMatterId, createUserId } from '../domain/branded-types.js';
import type { MatterRecord } from '../domain/entity-types.js';
import { activityFromEntity } from '../entities/activity.js';
import { freezeMatter, isMatterValid, matterFromEntity, validateMatter } from '../entities/matter.js';
import { userFromEntity } from '../entities/user.js';
import { freezeRecord } from '../utils/immutable.js';
import { normalizeText } from '../utils/normalize.js';
import { type AssociationModel, defineAssociation } from './define.js';
import { activityRelation, attachedActorFields, attachedConversion, bindRelation, userRelation } from './relations.js';

export type MatterActivityUserModel = AssociationModel<
  MatterActivityInput,
  MatterActivityUser,
  string,
  MatterActivityUserEntity
>;

/**
 * Matter activity model
 *
 * @example
 * ```typescript
 * const result = matterActivityUsers.fromSource(
 *   matter.id,
 *   getSeededActivityId('matter', 'CREATED'),
 *   user.id,
 * );
 * ```
 */
export const matterActivityUsers: MatterActivityUserModel = defineAssociation<MatterActivityInput, MatterActivityUser, string, MatterActivityUserEntity>({
  kind: 'matter-activity',
  modelName: 'MatterActivityUser',
  activityKind: 'matter',
  relations: [
    bindRelation<MatterActivityInput, MatterRecord>({
      key: 'matterId',
      relation: 'matter',
      label: 'Matter',
      id: (input) => input.matterId,
      attached: (input) => input.matter,
      validate: validateMatter,
      isValid: isMatterValid,
    }),
    activityRelation<MatterActivityInput>('matter'),
    userRelation<MatterActivityInput>(),
  ],
  compose: (matterId: string, base) => ({ ...base, matterId }),
  build: (input) => {
    const record: MatterActivityUser = {
      kind: 'matter-activity',
      matterId: createMatterId(input.matterId),
      activityId: createActivityId(input.activityId),
      userId: createUserId(input.userId),
      createdAt: input.createdAt,
      ...(input.matter ? { matter: freezeMatter(input.matter) } : {}),
      ...attachedActorFields(input),
    };
    return freezeRecord(record, ['createdAt']);
  },
  mapEntity: (entity: MatterActivityUserEntity, options): MatterActivityInput => {
    const related = attachedConversion(options);
    return {
      matterId: entity.matterId,
      activityId: entity.matterActivityId,
      userId: entity.userId,
      createdAt: entity.createdAt,
      ...(related && entity.matter ? { matter: matterFromEntity(entity.matter, related) } : {}),
      ...(related && entity.matterActivity
        ? { activity: activityFromEntity('matter', entity.matterActivity, related) }
        : {}),
      ...(related && entity.user ? { user: userFromEntity(entity.user, related) } : {}),
    };
  },
  display: {
    label: 'Matter Activity',
    placeholders: { subject: 'Matter', activity: 'ACTIVITY', user: 'User', matter: 'Matter' },
    subject: (record) => (record.matter ? normalizeText(record.matter.description) : undefined),
    keyText: (record) => `Matter (${record.matterId})`,
  },
});
