/**
 * Human-readable renderings of association records
 *
 * Rendering never throws: missing sub-records are replaced by placeholders.
 *
 * @module associations/display
 */

import type { AuditAssociation, TransferDirection } from '../domain/association-types.js';
import { normalizeActivityName, normalizeText } from '../utils/normalize.js';

/** Text used in place of sub-records that are not attached */
export interface DisplayPlaceholders {
  subject: string;
  activity: string;
  user: string;
  matter: string;
}

/** A single placeholder for every slot, or overrides of the defaults */
export type MissingPlaceholder = string | Partial<DisplayPlaceholders>;

/** How a kind renders its subject */
export interface DisplayBinding<TRecord extends AuditAssociation> {
  /** Prefix of {@link describeAssociation}, e.g. `Matter Activity` */
  readonly label: string;
  readonly placeholders: DisplayPlaceholders;
  readonly subject: (record: TRecord) => string | undefined;
  /** Key-oriented subject text, e.g. `Matter (<id>)` */
  readonly keyText: (record: TRecord) => string;
  readonly transfer?: {
    readonly direction: TransferDirection;
    readonly matter: (record: TRecord) => string | undefined;
  };
}

export const resolvePlaceholders = (
  defaults: DisplayPlaceholders,
  missing?: MissingPlaceholder,
): DisplayPlaceholders => {
  if (typeof missing === 'string') {
    return { subject: missing, activity: missing, user: missing, matter: missing };
  }
  return { ...defaults, ...missing };
};

/**
 * UTC timestamp as `YYYY-MM-DD HH:mm:ss`
 *
 * @example
 * ```typescript
 * formatAuditTimestamp(new Date('2024-03-05T14:07:09.250Z')); // => '2024-03-05 14:07:09'
 * ```
 */
export const formatAuditTimestamp = (date: Date): string => {
  if (Number.isNaN(date.getTime())) {
    return 'Invalid Date';
  }
  return date.toISOString().slice(0, 19).replace('T', ' ');
};

const nonBlank = (text: string | undefined): string | undefined => {
  const normalized = normalizeText(text);
  return normalized === '' ? undefined : normalized;
};

const activityText = (record: AuditAssociation): string | undefined =>
  record.activity ? nonBlank(normalizeActivityName(record.activity.activity)) : undefined;

const userText = (record: AuditAssociation): string | undefined => nonBlank(record.user?.name);

/**
 * `<subject> <ACTIVITY> by <user>`, with `from|to <matter>` for transfers
 *
 * @example
 * ```typescript
 * summarizeAssociation(binding, record);
 * // => 'Smith Trust CREATED by jsmith'
 * summarizeAssociation(binding, recordWithoutUser, 'N/A');
 * // => 'Smith Trust CREATED by N/A'
 * ```
 */
export const summarizeAssociation = <TRecord extends AuditAssociation>(
  binding: DisplayBinding<TRecord>,
  record: TRecord,
  missing?: MissingPlaceholder,
): string => {
  const placeholders = resolvePlaceholders(binding.placeholders, missing);
  const parts = [
    nonBlank(binding.subject(record)) ?? placeholders.subject,
    activityText(record) ?? placeholders.activity,
  ];
  if (binding.transfer) {
    parts.push(binding.transfer.direction, nonBlank(binding.transfer.matter(record)) ?? placeholders.matter);
  }
  parts.push('by', userText(record) ?? placeholders.user);
  return parts.join(' ');
};

/**
 * `On <time>, <user> <ACTIVITY> <subject>`, with `FROM|TO <matter>` for transfers
 */
export const auditMessageOf = <TRecord extends AuditAssociation>(
  binding: DisplayBinding<TRecord>,
  record: TRecord,
  missing?: MissingPlaceholder,
): string => {
  const placeholders = resolvePlaceholders(binding.placeholders, missing);
  const message =
    `On ${formatAuditTimestamp(record.createdAt)}, ${userText(record) ?? placeholders.user} ` +
    `${activityText(record) ?? placeholders.activity} ${nonBlank(binding.subject(record)) ?? placeholders.subject}`;
  if (!binding.transfer) {
    return message;
  }
  const matter = nonBlank(binding.transfer.matter(record)) ?? placeholders.matter;
  return `${message} ${binding.transfer.direction.toUpperCase()} ${matter}`;
};

/**
 * Key-oriented description
 *
 * @example
 * ```typescript
 * describeAssociation(binding, record);
 * // => 'Matter Activity: CREATED on Matter (m-1) by User (u-1) at 2024-03-05 14:07:09'
 * ```
 */
export const describeAssociation = <TRecord extends AuditAssociation>(
  binding: DisplayBinding<TRecord>,
  record: TRecord,
): string =>
  `${binding.label}: ${activityText(record) ?? `Activity (${record.activityId})`} on ${binding.keyText(record)} ` +
  `by User (${record.userId}) at ${formatAuditTimestamp(record.createdAt)}`;
