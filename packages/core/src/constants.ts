/** Constants and Configuration Values for Audit Validation */

/** Nil identifier, the "no value" sentinel of persisted identifiers */
export const NIL_ID = '00000000-0000-0000-0000-000000000000';

/** Kind of activity vocabulary a record belongs to */
export type ActivityKind = 'matter' | 'document' | 'revision' | 'matter-document';

/** Activity kind constants */
export const ACTIVITY_KIND = {
  MATTER: 'matter',
  DOCUMENT: 'document',
  REVISION: 'revision',
  MATTER_DOCUMENT: 'matter-document',
} as const satisfies Record<string, ActivityKind>;

/** Canonical activity names, per kind */
export const ACTIVITY_NAMES = {
  matter: ['CREATED', 'ARCHIVED', 'DELETED', 'RESTORED', 'UNARCHIVED', 'VIEWED'],
  document: ['CHECKED IN', 'CHECKED OUT', 'CREATED', 'DELETED', 'RESTORED', 'SAVED'],
  revision: ['CREATED', 'SAVED', 'DELETED', 'RESTORED'],
  'matter-document': ['MOVED', 'COPIED'],
} as const satisfies Record<ActivityKind, readonly string[]>;

export type MatterActivityName = (typeof ACTIVITY_NAMES.matter)[number];
export type DocumentActivityName = (typeof ACTIVITY_NAMES.document)[number];
export type RevisionActivityName = (typeof ACTIVITY_NAMES.revision)[number];
export type TransferActivityName = (typeof ACTIVITY_NAMES)['matter-document'][number];

/**
 * Identifiers the activity tables are seeded with.
 *
 * Lookups go through {@link getSeededActivityId}; names here are canonical.
 */
export const SEEDED_ACTIVITY_IDS = {
  revision: {
    CREATED: '10000000-0000-0000-0000-000000000001',
    DELETED: '10000000-0000-0000-0000-000000000002',
    RESTORED: '10000000-0000-0000-0000-000000000003',
    SAVED: '10000000-0000-0000-0000-000000000004',
  },
  document: {
    'CHECKED IN': '20000000-0000-0000-0000-000000000001',
    'CHECKED OUT': '20000000-0000-0000-0000-000000000002',
    CREATED: '20000000-0000-0000-0000-000000000003',
    DELETED: '20000000-0000-0000-0000-000000000004',
    RESTORED: '20000000-0000-0000-0000-000000000005',
    SAVED: '20000000-0000-0000-0000-000000000006',
  },
  matter: {
    ARCHIVED: '30000000-0000-0000-0000-000000000001',
    CREATED: '30000000-0000-0000-0000-000000000002',
    DELETED: '30000000-0000-0000-0000-000000000003',
    RESTORED: '30000000-0000-0000-0000-000000000004',
    UNARCHIVED: '30000000-0000-0000-0000-000000000005',
    VIEWED: '30000000-0000-0000-0000-000000000006',
  },
  'matter-document': {
    COPIED: '40000000-0000-0000-0000-000000000001',
    MOVED: '40000000-0000-0000-0000-000000000002',
  },
} as const satisfies {
  revision: Record<RevisionActivityName, string>;
  document: Record<DocumentActivityName, string>;
  matter: Record<MatterActivityName, string>;
  'matter-document': Record<TransferActivityName, string>;
};

/** Length limits of validated text fields */
export const TEXT_LIMITS = {
  USERNAME_MIN: 2,
  USERNAME_MAX: 50,
  ACTIVITY_MIN: 2,
  ACTIVITY_MAX: 50,
  DESCRIPTION_MIN: 3,
  DESCRIPTION_MAX: 128,
} as const;

/** Limits on document files */
export const FILE_LIMITS = {
  MIN_SIZE_BYTES: 1,
  MAX_SIZE_BYTES: 100 * 1024 * 1024,
  CHECKSUM_PATTERN: /^[0-9a-fA-F]{64}$/,
} as const;

/** Default configuration values for validation */
export const DEFAULTS = {
  FUTURE_TOLERANCE_MINUTES: 5,
  HISTORICAL_FLOOR: '1980-01-01T00:00:00.000Z',
  RECENT_WITHIN_DAYS: 7,
  MAX_COLLECTION_ITEMS: 10_000,
} as const;

export const MS_PER_MINUTE = 60_000;
export const MS_PER_DAY = 86_400_000;
