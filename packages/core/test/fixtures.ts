import type {
  ActivityKind,
  ActivityRecord,
  DocumentEntity,
  DocumentRecord,
  MatterEntity,
  MatterRecord,
  RevisionRecord,
  UserRecord,
  ValidationOptions,
} from '../src/index.js';
import { getSeededActivityId } from '../src/index.js';

export const NOW = new Date('2024-06-01T12:00:00.000Z');
export const EARLIER = new Date('2024-05-20T08:30:00.000Z');

/** Validation options pinned to {@link NOW} */
export const options: ValidationOptions = { clock: () => new Date(NOW.getTime()) };

export const MATTER_ID = '6c1f0c4e-9a51-4f8e-8f4e-1d2b3c4d5e6f';
export const OTHER_MATTER_ID = '7d2a1b3c-0b62-4a9f-9a5f-2e3c4d5e6f70';
export const DOCUMENT_ID = 'a3d2c1b0-1111-4222-8333-444455556666';
export const REVISION_ID = 'b4e3d2c1-2222-4333-8444-555566667777';
export const USER_ID = '50000000-0000-0000-0000-000000000001';
export const OTHER_USER_ID = 'c5f4e3d2-3333-4444-8555-666677778888';

export const MATTER_CREATED_ID = getSeededActivityId('matter', 'CREATED');
export const DOCUMENT_CHECKED_OUT_ID = getSeededActivityId('document', 'CHECKED OUT');
export const REVISION_SAVED_ID = getSeededActivityId('revision', 'SAVED');
export const TRANSFER_MOVED_ID = getSeededActivityId('matter-document', 'MOVED');

export const makeMatter = (overrides: Partial<MatterRecord> = {}): MatterRecord => ({
  id: MATTER_ID,
  description: 'Smith Trust',
  isArchived: false,
  isDeleted: false,
  creationDate: new Date('2024-01-15T09:00:00.000Z'),
  ...overrides,
});

export const makeDocument = (overrides: Partial<DocumentRecord> = {}): DocumentRecord => ({
  id: DOCUMENT_ID,
  fileName: 'engagement-letter',
  extension: '.pdf',
  fileSize: 20480,
  isCheckedOut: false,
  isDeleted: false,
  creationDate: new Date('2024-02-01T10:00:00.000Z'),
  ...overrides,
});

/** Stored matter row without nested documents */
export const makeMatterEntity = (overrides: Partial<MatterEntity> = {}): MatterEntity => ({
  id: MATTER_ID,
  description: 'Smith Trust',
  isArchived: false,
  isDeleted: false,
  creationDate: new Date('2024-01-15T09:00:00.000Z'),
  ...overrides,
});

/** Stored document row without nested revisions */
export const makeDocumentEntity = (overrides: Partial<DocumentEntity> = {}): DocumentEntity => ({
  id: DOCUMENT_ID,
  fileName: 'engagement-letter',
  extension: '.pdf',
  fileSize: 20480,
  isCheckedOut: false,
  isDeleted: false,
  creationDate: new Date('2024-02-01T10:00:00.000Z'),
  ...overrides,
});

export const makeRevision = (overrides: Partial<RevisionRecord> = {}): RevisionRecord => ({
  id: REVISION_ID,
  documentId: DOCUMENT_ID,
  revisionNumber: 1,
  creationDate: new Date('2024-02-01T10:00:00.000Z'),
  modificationDate: new Date('2024-02-02T10:00:00.000Z'),
  isDeleted: false,
  ...overrides,
});

export const makeUser = (overrides: Partial<UserRecord> = {}): UserRecord => ({
  id: USER_ID,
  name: 'rbrown',
  ...overrides,
});

export const makeActivity = (kind: ActivityKind, name: string): ActivityRecord => ({
  id: getSeededActivityId(kind, name),
  activity: name,
});
