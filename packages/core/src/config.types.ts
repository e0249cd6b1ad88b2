/** Source of the current instant */
export type Clock = () => Date;

/**
 * Reserved words added on top of the built-in lists
 *
 * @remarks
 * Entries are compared case-insensitively after whitespace normalization.
 */
export interface ReservedWordsConfig {
  usernames?: readonly string[];
  descriptions?: readonly string[];
  activities?: readonly string[];
  fileNames?: readonly string[];
}

/** Options accepted by every validator and factory */
export interface ValidationOptions {
  /**
   * Source of "now" for timestamp checks and defaults
   *
   * @default () => new Date()
   */
  clock?: Clock;
  /**
   * How far past "now" a timestamp may lie before it counts as future-dated
   *
   * @default 5
   */
  futureToleranceMinutes?: number;
  /**
   * Earliest timestamp accepted as genuine audit data
   *
   * @default 1980-01-01T00:00:00Z
   */
  historicalFloor?: Date;
  /** Extra reserved words */
  reserved?: ReservedWordsConfig;
}

/** Reserved word sets, folded to lower case */
export interface ReservedWordSets {
  usernames: ReadonlySet<string>;
  descriptions: ReadonlySet<string>;
  activities: ReadonlySet<string>;
  fileNames: ReadonlySet<string>;
}

/** Validation options after defaults are applied */
export interface ResolvedValidationOptions {
  readonly resolved: true;
  readonly clock: Clock;
  readonly futureToleranceMs: number;
  readonly historicalFloor: Date;
  readonly reserved: ReservedWordSets;
}

/** Anything a validator accepts as options */
export type ValidationOptionsInput = ValidationOptions | ResolvedValidationOptions;
