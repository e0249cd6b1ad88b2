/**
 * Rejected-row handling for batch conversion
 *
 * @module error-handler
 *
 * @remarks
 * `fromEntities` hands every row that fails conversion to an {@link ErrorHandler}.
 * The strategy decides whether the batch aborts, reports the row and skips it,
 * or drops it unreported.
 *
 * @example
 * ```typescript
 * const rejected: string[] = [];
 * const records = matterActivityUsers.fromEntities(rows, {
 *   errorStrategy: 'ignore',
 *   onError: (_error, context) => rejected.push(context),
 * });
 * ```
 */

import { ModelValidationError, summarizeViolations } from '../domain/result.js';

/**
 * What happens to a rejected row
 * - `throw`: the batch fails with the row's error
 * - `log`: the row is reported on stderr and skipped
 * - `ignore`: the row is skipped
 */
export type ErrorStrategy = 'throw' | 'log' | 'ignore';

/** Receives the error and the row's context, e.g. `MatterActivityUser[3]` */
export type ErrorHandler = (error: Error, context: string) => void;

const LOG_PREFIX = '[casefile-audit]';

const runCallback = (onError: ErrorHandler, error: Error, context: string): void => {
  try {
    onError(error, context);
  } catch (callbackError) {
    console.error(
      `${LOG_PREFIX} Error in custom error handler:`,
      callbackError instanceof Error ? callbackError.message : String(callbackError),
    );
  }
};

const reportRejectedRow = (error: Error, context: string): void => {
  console.error(`${LOG_PREFIX} Error in ${context}:`, error.message);
  // Multi-violation rows get the per-field breakdown
  if (error instanceof ModelValidationError && error.violations.length > 1) {
    console.error(summarizeViolations(error.violations));
  }
};

/**
 * Creates a handler applying `strategy` after the optional callback
 *
 * @remarks
 * A callback that throws is reported and does not change the outcome.
 */
export const createErrorHandler = (strategy: ErrorStrategy = 'log', onError?: ErrorHandler): ErrorHandler => {
  return (error: Error, context: string): void => {
    if (onError) {
      runCallback(onError, error, context);
    }

    switch (strategy) {
      case 'throw':
        throw error;

      case 'log':
        reportRejectedRow(error, context);
        break;

      case 'ignore':
        break;

      default: {
        const exhaustiveCheck: never = strategy;
        console.error(`${LOG_PREFIX} Unknown error strategy: ${String(exhaustiveCheck)}`);
      }
    }
  };
};

/** Wraps a thrown non-Error value */
export const normalizeError = (thrownValue: unknown): Error =>
  thrownValue instanceof Error ? thrownValue : new Error(String(thrownValue));

/**
 * Runs `fn`, routing anything it throws through `errorHandler`
 *
 * @returns The result, or undefined when `fn` threw and the handler did not
 */
export const withErrorHandlingSync = <T>(fn: () => T, errorHandler: ErrorHandler, context: string): T | undefined => {
  try {
    return fn();
  } catch (thrownValue: unknown) {
    errorHandler(normalizeError(thrownValue), context);
    return undefined;
  }
};
