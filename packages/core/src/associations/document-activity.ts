/**
 * Document activity associations
 *
 * @module associations/document-activity
 */

import type {
  DocumentActivityInput,
  DocumentActivityUser,
  DocumentActivityUserEntity,
} from '../domain/association-types.js';
import { createActivityId, createDocumentId, createUserId } from '../domain/branded-types.js';
import type { DocumentRecord } from '../domain/entity-types.js';
import { activityFromEntity } from '../entities/activity.js';
import {
  documentFromEntity,
  freezeDocument,
  fullFileName,
  isDocumentValid,
  validateDocument,
} from '../entities/document.js';
import { userFromEntity } from '../entities/user.js';
import { freezeRecord } from '../utils/immutable.js';
import { type AssociationModel, defineAssociation } from './define.js';
import { activityRelation, attachedActorFields, attachedConversion, bindRelation, userRelation } from './relations.js';

export type DocumentActivityUserModel = AssociationModel<
  DocumentActivityInput,
  DocumentActivityUser,
  string,
  DocumentActivityUserEntity
>;

export const documentActivityUsers: DocumentActivityUserModel = defineAssociation<DocumentActivityInput, DocumentActivityUser, string, DocumentActivityUserEntity>({
  kind: 'document-activity',
  modelName: 'DocumentActivityUser',
  activityKind: 'document',
  relations: [
    bindRelation<DocumentActivityInput, DocumentRecord>({
      key: 'documentId',
      relation: 'document',
      label: 'Document',
      id: (input) => input.documentId,
      attached: (input) => input.document,
      validate: validateDocument,
      isValid: isDocumentValid,
    }),
    activityRelation<DocumentActivityInput>('document'),
    userRelation<DocumentActivityInput>(),
  ],
  compose: (documentId: string, base) => ({ ...base, documentId }),
  build: (input) => {
    const record: DocumentActivityUser = {
      kind: 'document-activity',
      documentId: createDocumentId(input.documentId),
      activityId: createActivityId(input.activityId),
      userId: createUserId(input.userId),
      createdAt: input.createdAt,
      ...(input.document ? { document: freezeDocument(input.document) } : {}),
      ...attachedActorFields(input),
    };
    return freezeRecord(record, ['createdAt']);
  },
  mapEntity: (entity: DocumentActivityUserEntity, options): DocumentActivityInput => {
    const related = attachedConversion(options);
    return {
      documentId: entity.documentId,
      activityId: entity.documentActivityId,
      userId: entity.userId,
      createdAt: entity.createdAt,
      ...(related && entity.document ? { document: documentFromEntity(entity.document, related) } : {}),
      ...(related && entity.documentActivity
        ? { activity: activityFromEntity('document', entity.documentActivity, related) }
        : {}),
      ...(related && entity.user ? { user: userFromEntity(entity.user, related) } : {}),
    };
  },
  display: {
    label: 'Document Activity',
    placeholders: { subject: 'Document', activity: 'ACTIVITY', user: 'User', matter: 'Matter' },
    subject: (record) => (record.document ? fullFileName(record.document) : undefined),
    keyText: (record) => `Document (${record.documentId})`,
  },
});
