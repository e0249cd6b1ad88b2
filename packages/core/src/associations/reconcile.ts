/**
 * Pairing of transfer source and destination records
 *
 * Both sides of a move or copy share document, activity, user and instant.
 * Unpaired sides are compliance findings, reported as data.
 *
 * @module associations/reconcile
 */

import type { TransferFrom, TransferTo } from '../domain/association-types.js';
import { canonicalizeId, sameId } from '../domain/branded-types.js';
import { transferLog } from '../utils/debug.js';
import { sortAssociations } from './ordering.js';

export interface TransferPair {
  from: TransferFrom;
  to: TransferTo;
}

export interface TransferReconciliation {
  matched: TransferPair[];
  unmatchedFrom: TransferFrom[];
  unmatchedTo: TransferTo[];
}

export interface ReconcileOptions {
  /**
   * Largest gap between the two sides' timestamps, in milliseconds
   *
   * @default 0
   */
  toleranceMs?: number;
}

export type TransferIssueKind = 'missing-destination' | 'missing-source' | 'same-matter';

export interface TransferComplianceIssue {
  kind: TransferIssueKind;
  message: string;
  record: TransferFrom | TransferTo;
}

const operationKey = (record: TransferFrom | TransferTo): string =>
  [record.documentId, record.activityId, record.userId].map(canonicalizeId).join('|');

/**
 * Pairs each source record with the earliest unused destination record of the same operation
 *
 * @example
 * ```typescript
 * const { matched, unmatchedFrom } = reconcileTransfers(froms, tos);
 * ```
 */
export const reconcileTransfers = (
  froms: readonly TransferFrom[],
  tos: readonly TransferTo[],
  options: ReconcileOptions = {},
): TransferReconciliation => {
  const tolerance = options.toleranceMs ?? 0;
  const remaining = sortAssociations(tos);
  const matched: TransferPair[] = [];
  const unmatchedFrom: TransferFrom[] = [];

  for (const from of sortAssociations(froms)) {
    const key = operationKey(from);
    const index = remaining.findIndex(
      (to) =>
        operationKey(to) === key && Math.abs(to.createdAt.getTime() - from.createdAt.getTime()) <= tolerance,
    );
    const to = index >= 0 ? remaining[index] : undefined;
    if (to === undefined) {
      unmatchedFrom.push(from);
      continue;
    }
    remaining.splice(index, 1);
    matched.push({ from, to });
  }

  if (unmatchedFrom.length > 0 || remaining.length > 0) {
    transferLog('Unmatched transfers: %d source, %d destination', unmatchedFrom.length, remaining.length);
  }

  return { matched, unmatchedFrom, unmatchedTo: remaining };
};

/**
 * Compliance findings of a set of transfer records
 *
 * Reports sources without a destination, destinations without a source, and
 * pairs whose source and destination matter are the same.
 */
export const findTransferComplianceIssues = (
  froms: readonly TransferFrom[],
  tos: readonly TransferTo[],
  options: ReconcileOptions = {},
): TransferComplianceIssue[] => {
  const { matched, unmatchedFrom, unmatchedTo } = reconcileTransfers(froms, tos, options);
  return [
    ...unmatchedFrom.map(
      (record): TransferComplianceIssue => ({
        kind: 'missing-destination',
        message: `Transfer of document ${record.documentId} from matter ${record.matterId} has no matching destination record.`,
        record,
      }),
    ),
    ...unmatchedTo.map(
      (record): TransferComplianceIssue => ({
        kind: 'missing-source',
        message: `Transfer of document ${record.documentId} to matter ${record.matterId} has no matching source record.`,
        record,
      }),
    ),
    ...matched
      .filter((pair) => sameId(pair.from.matterId, pair.to.matterId))
      .map(
        (pair): TransferComplianceIssue => ({
          kind: 'same-matter',
          message: `Transfer of document ${pair.from.documentId} has the same source and destination matter ${pair.from.matterId}.`,
          record: pair.from,
        }),
      ),
  ];
};
