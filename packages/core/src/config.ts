/**
 * Validation Options Resolution
 *
 * Merges caller options with {@link DEFAULTS} and the built-in reserved word
 * lists, and rejects invalid configuration up front.
 *
 * @module config
 */

import type {
  ReservedWordSets,
  ReservedWordsConfig,
  ResolvedValidationOptions,
  ValidationOptionsInput,
} from './config.types.js';
import { DEFAULTS, MS_PER_MINUTE } from './constants.js';
import reservedWords from './data/reserved-words.json' with { type: 'json' };
import { foldText } from './utils/normalize.js';

const toFoldedSet = (builtIn: readonly string[], extra: readonly string[] = []): ReadonlySet<string> =>
  new Set([...builtIn, ...extra].map(foldText).filter((word) => word !== ''));

const buildReservedSets = (extra: ReservedWordsConfig = {}): ReservedWordSets => ({
  usernames: toFoldedSet(reservedWords.usernames, extra.usernames),
  descriptions: toFoldedSet(reservedWords.descriptions, extra.descriptions),
  activities: toFoldedSet(reservedWords.activities, extra.activities),
  fileNames: toFoldedSet(reservedWords.fileNames, extra.fileNames),
});

const systemClock = (): Date => new Date();

const DEFAULT_OPTIONS: ResolvedValidationOptions = Object.freeze({
  resolved: true,
  clock: systemClock,
  futureToleranceMs: DEFAULTS.FUTURE_TOLERANCE_MINUTES * MS_PER_MINUTE,
  historicalFloor: new Date(DEFAULTS.HISTORICAL_FLOOR),
  reserved: buildReservedSets(),
});

const isResolved = (options: ValidationOptionsInput): options is ResolvedValidationOptions =>
  'resolved' in options && options.resolved === true;

/**
 * Applies defaults to validation options
 *
 * @throws {Error} If the tolerance is negative or not finite, or the floor is not a valid date
 *
 * @example
 * ```typescript
 * const options = resolveValidationOptions({ futureToleranceMinutes: 1 });
 * options.futureToleranceMs; // => 60000
 * ```
 */
export const resolveValidationOptions = (options?: ValidationOptionsInput): ResolvedValidationOptions => {
  if (!options) {
    return DEFAULT_OPTIONS;
  }
  if (isResolved(options)) {
    return options;
  }

  const toleranceMinutes = options.futureToleranceMinutes ?? DEFAULTS.FUTURE_TOLERANCE_MINUTES;
  if (!Number.isFinite(toleranceMinutes) || toleranceMinutes < 0) {
    throw new Error(
      `Configuration error: 'futureToleranceMinutes' must be a finite number of minutes >= 0, received ${String(toleranceMinutes)}.`,
    );
  }

  const historicalFloor = options.historicalFloor ?? DEFAULT_OPTIONS.historicalFloor;
  if (!(historicalFloor instanceof Date) || Number.isNaN(historicalFloor.getTime())) {
    throw new Error(`Configuration error: 'historicalFloor' must be a valid Date.`);
  }

  return {
    resolved: true,
    clock: options.clock ?? systemClock,
    futureToleranceMs: toleranceMinutes * MS_PER_MINUTE,
    historicalFloor: new Date(historicalFloor.getTime()),
    reserved: options.reserved ? buildReservedSets(options.reserved) : DEFAULT_OPTIONS.reserved,
  };
};
