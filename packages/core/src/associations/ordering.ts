/**
 * Identity, hashing and total order of association records
 *
 * @module associations/ordering
 */

import type { AuditAssociation } from '../domain/association-types.js';
import { canonicalizeId } from '../domain/branded-types.js';
import { combineHashes, hashNumber, hashString } from '../utils/hash.js';

/**
 * Identifier components of the composite key, in ordering precedence
 *
 * Transfers order by document before matter.
 */
export const associationKeyIds = (association: AuditAssociation): readonly string[] => {
  switch (association.kind) {
    case 'matter-activity':
      return [association.matterId, association.activityId, association.userId];
    case 'document-activity':
      return [association.documentId, association.activityId, association.userId];
    case 'revision-activity':
      return [association.revisionId, association.activityId, association.userId];
    case 'transfer-from':
    case 'transfer-to':
      return [association.documentId, association.matterId, association.activityId, association.userId];
    default: {
      const exhaustiveCheck: never = association;
      return exhaustiveCheck;
    }
  }
};

const canonicalKey = (association: AuditAssociation): string[] => associationKeyIds(association).map(canonicalizeId);

const sameKeyIds = (a: AuditAssociation, b: AuditAssociation): boolean => {
  const keyA = canonicalKey(a);
  const keyB = canonicalKey(b);
  return keyA.length === keyB.length && keyA.every((id, index) => id === keyB[index]);
};

/**
 * Composite-key equality
 *
 * @remarks
 * Identifiers compare case-insensitively; timestamps compare by instant.
 * Attached sub-records do not take part.
 */
export const associationEquals = (a: AuditAssociation, b: AuditAssociation): boolean =>
  a === b || (a.kind === b.kind && a.createdAt.getTime() === b.createdAt.getTime() && sameKeyIds(a, b));

/** Hash agreeing with {@link associationEquals} */
export const associationHashCode = (association: AuditAssociation): number =>
  combineHashes(
    hashString(association.kind),
    ...canonicalKey(association).map(hashString),
    hashNumber(association.createdAt.getTime()),
  );

/** True when both records describe the same operation, regardless of when */
export const isSameOperation = (a: AuditAssociation, b: AuditAssociation): boolean =>
  a.kind === b.kind && sameKeyIds(a, b);

const compareStrings = (a: string, b: string): number => {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
};

/**
 * Total order: timestamp, then key identifiers, then kind
 *
 * @example
 * ```typescript
 * [...records].sort(compareAssociations);
 * ```
 */
export const compareAssociations = (a: AuditAssociation, b: AuditAssociation): number => {
  const byTime = a.createdAt.getTime() - b.createdAt.getTime();
  if (byTime !== 0) {
    return byTime < 0 ? -1 : 1;
  }
  const keyA = canonicalKey(a);
  const keyB = canonicalKey(b);
  const length = Math.min(keyA.length, keyB.length);
  for (let index = 0; index < length; index++) {
    const byId = compareStrings(keyA[index] ?? '', keyB[index] ?? '');
    if (byId !== 0) {
      return byId;
    }
  }
  return compareStrings(a.kind, b.kind);
};

/** Sorted copy; the input is left untouched */
export const sortAssociations = <T extends AuditAssociation>(associations: readonly T[]): T[] =>
  [...associations].sort(compareAssociations);
