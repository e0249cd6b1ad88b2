/**
 * Document transfers between matters
 *
 * A move or copy writes two records: the source side (`transfer-from`, the
 * matter the document left) and the destination side (`transfer-to`).
 *
 * @module associations/transfer
 */

import type {
  AssociationInputBase,
  TransferDirection,
  TransferEntity,
  TransferFrom,
  TransferInput,
  TransferSubject,
  TransferTo,
} from '../domain/association-types.js';
import { createActivityId, createDocumentId, createMatterId, createUserId } from '../domain/branded-types.js';
import type { DocumentRecord, EntityConversionOptions, MatterRecord } from '../domain/entity-types.js';
import { activityFromEntity } from '../entities/activity.js';
import {
  documentFromEntity,
  freezeDocument,
  fullFileName,
  isDocumentValid,
  validateDocument,
} from '../entities/document.js';
import { freezeMatter, isMatterValid, matterFromEntity, validateMatter } from '../entities/matter.js';
import { userFromEntity } from '../entities/user.js';
import { freezeRecord } from '../utils/immutable.js';
import { normalizeText } from '../utils/normalize.js';
import { type AssociationModel, defineAssociation } from './define.js';
import type { DisplayBinding } from './display.js';
import {
  activityRelation,
  attachedActorFields,
  attachedConversion,
  bindRelation,
  type RelationBinding,
  userRelation,
} from './relations.js';

export type TransferFromModel = AssociationModel<TransferInput, TransferFrom, TransferSubject, TransferEntity>;
export type TransferToModel = AssociationModel<TransferInput, TransferTo, TransferSubject, TransferEntity>;

type TransferFields = Omit<TransferFrom, 'kind'>;

const transferRelations = (direction: TransferDirection): readonly RelationBinding<TransferInput>[] => [
  bindRelation<TransferInput, MatterRecord>({
    key: 'matterId',
    relation: 'matter',
    label: direction === 'from' ? 'Source Matter' : 'Destination Matter',
    id: (input) => input.matterId,
    attached: (input) => input.matter,
    validate: validateMatter,
    isValid: isMatterValid,
  }),
  bindRelation<TransferInput, DocumentRecord>({
    key: 'documentId',
    relation: 'document',
    label: 'Document',
    id: (input) => input.documentId,
    attached: (input) => input.document,
    validate: validateDocument,
    isValid: isDocumentValid,
  }),
  activityRelation<TransferInput>('matter-document'),
  userRelation<TransferInput>(),
];

const composeTransfer = (subject: TransferSubject, base: AssociationInputBase): TransferInput => ({
  ...base,
  matterId: subject.matterId,
  documentId: subject.documentId,
});

const buildTransferFields = (input: TransferInput): TransferFields => ({
  matterId: createMatterId(input.matterId),
  documentId: createDocumentId(input.documentId),
  activityId: createActivityId(input.activityId),
  userId: createUserId(input.userId),
  createdAt: input.createdAt,
  ...(input.matter ? { matter: freezeMatter(input.matter) } : {}),
  ...(input.document ? { document: freezeDocument(input.document) } : {}),
  ...attachedActorFields(input),
});

const mapTransferEntity = (entity: TransferEntity, options: EntityConversionOptions): TransferInput => {
  const related = attachedConversion(options);
  return {
    matterId: entity.matterId,
    documentId: entity.documentId,
    activityId: entity.matterDocumentActivityId,
    userId: entity.userId,
    createdAt: entity.createdAt,
    ...(related && entity.matter ? { matter: matterFromEntity(entity.matter, related) } : {}),
    ...(related && entity.document ? { document: documentFromEntity(entity.document, related) } : {}),
    ...(related && entity.matterDocumentActivity
      ? { activity: activityFromEntity('matter-document', entity.matterDocumentActivity, related) }
      : {}),
    ...(related && entity.user ? { user: userFromEntity(entity.user, related) } : {}),
  };
};

const transferDisplay = <TRecord extends TransferFrom | TransferTo>(
  direction: TransferDirection,
): DisplayBinding<TRecord> => ({
  label: direction === 'from' ? 'Document Transfer From' : 'Document Transfer To',
  placeholders: { subject: 'Document', activity: 'TRANSFERRED', user: 'User', matter: 'Matter' },
  subject: (record) => (record.document ? fullFileName(record.document) : undefined),
  keyText: (record) => `Document (${record.documentId}) ${direction} Matter (${record.matterId})`,
  transfer: {
    direction,
    matter: (record) => (record.matter ? normalizeText(record.matter.description) : undefined),
  },
});

/**
 * Source side of transfers
 *
 * @example
 * ```typescript
 * transfersFrom.fromSource(
 *   { matterId: sourceMatter.id, documentId: document.id },
 *   getSeededActivityId('matter-document', 'MOVED'),
 *   user.id,
 * );
 * ```
 */
export const transfersFrom: TransferFromModel = defineAssociation<
  TransferInput,
  TransferFrom,
  TransferSubject,
  TransferEntity
>({
  kind: 'transfer-from',
  modelName: 'MatterDocumentActivityUserFrom',
  activityKind: 'matter-document',
  relations: transferRelations('from'),
  compose: composeTransfer,
  build: (input) => {
    const record: TransferFrom = { kind: 'transfer-from', ...buildTransferFields(input) };
    return freezeRecord(record, ['createdAt']);
  },
  mapEntity: mapTransferEntity,
  display: transferDisplay<TransferFrom>('from'),
});

/** Destination side of transfers */
export const transfersTo: TransferToModel = defineAssociation<TransferInput, TransferTo, TransferSubject, TransferEntity>({
  kind: 'transfer-to',
  modelName: 'MatterDocumentActivityUserTo',
  activityKind: 'matter-document',
  relations: transferRelations('to'),
  compose: composeTransfer,
  build: (input) => {
    const record: TransferTo = { kind: 'transfer-to', ...buildTransferFields(input) };
    return freezeRecord(record, ['createdAt']);
  },
  mapEntity: mapTransferEntity,
  display: transferDisplay<TransferTo>('to'),
});
