/**
 * Subject records referenced by audit associations
 *
 * `id` is optional: records built before persistence have none yet.
 */

import type { ValidationOptionsInput } from '../config.types.js';

/** A person acting on matters and documents */
export interface UserRecord {
  readonly id?: string;
  readonly name: string;
}

/** An entry of an activity vocabulary */
export interface ActivityRecord {
  readonly id?: string;
  readonly activity: string;
  /** Outside the canonical vocabulary of its kind */
  readonly isCustom?: boolean;
}

/** One saved state of a document */
export interface RevisionRecord {
  readonly id?: string;
  readonly documentId?: string;
  readonly revisionNumber: number;
  readonly creationDate: Date;
  readonly modificationDate: Date;
  readonly isDeleted: boolean;
}

/** A file held in a matter */
export interface DocumentRecord {
  readonly id?: string;
  readonly fileName: string;
  readonly extension: string;
  readonly fileSize: number;
  /** SHA-256, hex encoded */
  readonly checksum?: string;
  readonly isCheckedOut: boolean;
  readonly isDeleted: boolean;
  readonly creationDate: Date;
  readonly revisions?: readonly RevisionRecord[];
}

/** A legal case or file grouping documents */
export interface MatterRecord {
  readonly id?: string;
  readonly description: string;
  readonly isArchived: boolean;
  readonly isDeleted: boolean;
  readonly creationDate: Date;
  readonly documents?: readonly DocumentRecord[];
}

// ============================================================================
// Creation inputs - flags default to false
// ============================================================================

type WithOptionalFlags<T, K extends keyof T> = Omit<T, K> & Partial<Pick<T, K>>;

export type MatterInput = WithOptionalFlags<MatterRecord, 'isArchived' | 'isDeleted'>;
export type DocumentInput = WithOptionalFlags<DocumentRecord, 'isCheckedOut' | 'isDeleted'>;
export type RevisionInput = WithOptionalFlags<RevisionRecord, 'isDeleted'>;

// ============================================================================
// Persistence shapes - always carry an identifier
// ============================================================================

export type UserEntity = UserRecord & { readonly id: string };
export type ActivityEntity = ActivityRecord & { readonly id: string };
export type RevisionEntity = RevisionRecord & { readonly id: string };
export type DocumentEntity = Omit<DocumentRecord, 'revisions'> & {
  readonly id: string;
  readonly revisions?: readonly RevisionEntity[] | null;
};
export type MatterEntity = Omit<MatterRecord, 'documents'> & {
  readonly id: string;
  readonly documents?: readonly DocumentEntity[] | null;
};

/** Options of `fromEntity` conversions */
export interface EntityConversionOptions {
  /**
   * Carry nested collections and attached sub-records over
   *
   * @default true
   */
  includeRelations?: boolean;
  /** Options for validating the converted record and everything converted with it */
  validation?: ValidationOptionsInput;
}
