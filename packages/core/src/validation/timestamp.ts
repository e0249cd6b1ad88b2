/**
 * Timestamp plausibility rules
 *
 * A timestamp must exist, must not be the zero instant, must not lie beyond
 * "now" plus the clock-skew tolerance, and must not precede the historical floor.
 *
 * @module validation/timestamp
 */

import { resolveValidationOptions } from '../config.js';
import type { ResolvedValidationOptions, ValidationOptionsInput } from '../config.types.js';
import { type Violation, violation } from '../domain/result.js';
import { evaluateRules, type Rule, satisfiesRules } from './rules.js';

type TimestampValue = Date | null | undefined;

const isValidDate = (value: TimestampValue): value is Date => value instanceof Date && !Number.isNaN(value.getTime());

const timestampRules = (options: ResolvedValidationOptions): readonly Rule<TimestampValue>[] => {
  const latest = options.clock().getTime() + options.futureToleranceMs;
  const earliest = options.historicalFloor.getTime();
  return [
    { test: isValidDate, message: (field) => `${field} is required.`, halt: true },
    {
      test: (value) => isValidDate(value) && value.getTime() !== 0,
      message: (field) => `${field} must be a valid date for audit trail integrity.`,
      halt: true,
    },
    {
      test: (value) => isValidDate(value) && value.getTime() <= latest,
      message: (field) => `${field} must not be in the future.`,
    },
    {
      test: (value) => isValidDate(value) && value.getTime() >= earliest,
      message: (field) => `${field} is unreasonably far in the past.`,
    },
  ];
};

/**
 * Validates an audit timestamp against the injected clock
 *
 * @example
 * ```typescript
 * validateTimestamp(new Date('2200-01-01'), 'createdAt');
 * // => [{ message: 'createdAt must not be in the future.', fields: ['createdAt'], kind: 'validation' }]
 * ```
 */
export const validateTimestamp = (value: TimestampValue, field: string, options?: ValidationOptionsInput): Violation[] =>
  evaluateRules(timestampRules(resolveValidationOptions(options)), value, field);

export const isTimestampValid = (value: TimestampValue, options?: ValidationOptionsInput): boolean =>
  satisfiesRules(timestampRules(resolveValidationOptions(options)), value);

/** Reports `later` preceding `earlier`; absent or invalid dates are left to {@link validateTimestamp} */
export const validateTimestampOrder = (
  earlier: TimestampValue,
  later: TimestampValue,
  earlierField: string,
  laterField: string,
): Violation[] => {
  if (!isValidDate(earlier) || !isValidDate(later) || later.getTime() >= earlier.getTime()) {
    return [];
  }
  return [violation(`${laterField} cannot be earlier than ${earlierField}.`, laterField, earlierField)];
};
