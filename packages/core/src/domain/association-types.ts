/**
 * Audit association records
 *
 * Each association links one subject (or, for transfers, a matter and a
 * document), one activity and one user at one instant. The tuple is the
 * record's identity.
 */

import type { ActivityId, DocumentId, MatterId, RevisionId, UserId } from './branded-types.js';
import type {
  ActivityEntity,
  ActivityRecord,
  DocumentEntity,
  DocumentRecord,
  MatterEntity,
  MatterRecord,
  RevisionEntity,
  RevisionRecord,
  UserEntity,
  UserRecord,
} from './entity-types.js';

export type AssociationKind = 'matter-activity' | 'document-activity' | 'revision-activity' | 'transfer-from' | 'transfer-to';

/** Side of a matter-to-matter document transfer */
export type TransferDirection = 'from' | 'to';

// ============================================================================
// Inputs - unvalidated, as received from callers
// ============================================================================

/** Fields every association input carries */
export interface AssociationInputBase {
  readonly activityId: string;
  readonly userId: string;
  readonly createdAt: Date;
  readonly activity?: ActivityRecord;
  readonly user?: UserRecord;
}

export interface MatterActivityInput extends AssociationInputBase {
  readonly matterId: string;
  readonly matter?: MatterRecord;
}

export interface DocumentActivityInput extends AssociationInputBase {
  readonly documentId: string;
  readonly document?: DocumentRecord;
}

export interface RevisionActivityInput extends AssociationInputBase {
  readonly revisionId: string;
  readonly revision?: RevisionRecord;
}

export interface TransferInput extends AssociationInputBase {
  readonly matterId: string;
  readonly documentId: string;
  readonly matter?: MatterRecord;
  readonly document?: DocumentRecord;
}

/** Subject key of a transfer */
export interface TransferSubject {
  readonly matterId: string;
  readonly documentId: string;
}

// ============================================================================
// Records - validated and frozen
// ============================================================================

interface AssociationRecordBase<TKind extends AssociationKind> {
  readonly kind: TKind;
  readonly activityId: ActivityId;
  readonly userId: UserId;
  readonly createdAt: Date;
  readonly activity?: ActivityRecord;
  readonly user?: UserRecord;
}

/** A user performed an activity on a matter */
export interface MatterActivityUser extends AssociationRecordBase<'matter-activity'> {
  readonly matterId: MatterId;
  readonly matter?: MatterRecord;
}

/** A user performed an activity on a document */
export interface DocumentActivityUser extends AssociationRecordBase<'document-activity'> {
  readonly documentId: DocumentId;
  readonly document?: DocumentRecord;
}

/** A user performed an activity on a revision */
export interface RevisionActivityUser extends AssociationRecordBase<'revision-activity'> {
  readonly revisionId: RevisionId;
  readonly revision?: RevisionRecord;
}

/** One side of a document moved or copied between matters */
export interface MatterDocumentTransfer<TKind extends 'transfer-from' | 'transfer-to'> extends AssociationRecordBase<TKind> {
  readonly matterId: MatterId;
  readonly documentId: DocumentId;
  readonly matter?: MatterRecord;
  readonly document?: DocumentRecord;
}

/** Source side: `matterId` is the matter the document left */
export type TransferFrom = MatterDocumentTransfer<'transfer-from'>;
/** Destination side: `matterId` is the matter the document arrived in */
export type TransferTo = MatterDocumentTransfer<'transfer-to'>;

export type AuditAssociation = MatterActivityUser | DocumentActivityUser | RevisionActivityUser | TransferFrom | TransferTo;

// ============================================================================
// Persistence shapes
// ============================================================================

interface AssociationEntityBase {
  readonly userId: string;
  readonly createdAt: Date;
  readonly user?: UserEntity | null;
}

export interface MatterActivityUserEntity extends AssociationEntityBase {
  readonly matterId: string;
  readonly matterActivityId: string;
  readonly matter?: MatterEntity | null;
  readonly matterActivity?: ActivityEntity | null;
}

export interface DocumentActivityUserEntity extends AssociationEntityBase {
  readonly documentId: string;
  readonly documentActivityId: string;
  readonly document?: DocumentEntity | null;
  readonly documentActivity?: ActivityEntity | null;
}

export interface RevisionActivityUserEntity extends AssociationEntityBase {
  readonly revisionId: string;
  readonly revisionActivityId: string;
  readonly revision?: RevisionEntity | null;
  readonly revisionActivity?: ActivityEntity | null;
}

export interface TransferEntity extends AssociationEntityBase {
  readonly matterId: string;
  readonly documentId: string;
  readonly matterDocumentActivityId: string;
  readonly matter?: MatterEntity | null;
  readonly document?: DocumentEntity | null;
  readonly matterDocumentActivity?: ActivityEntity | null;
}
