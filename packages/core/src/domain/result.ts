/**
 * Result Module - Violations and the success/failure union
 *
 * Validators return violations as data; factories wrap them in a {@link Result}.
 * Only persistence-shape conversion throws ({@link ModelValidationError}).
 */

// ============================================================================
// Type Definitions
// ============================================================================

/** Category of a violation */
export type ViolationKind = 'validation' | 'referential-integrity';

/**
 * A single failed rule
 *
 * @example
 * ```typescript
 * const violation: Violation = {
 *   message: 'matter.id does not match matterId - referential integrity violation.',
 *   fields: ['matter', 'matterId'],
 *   kind: 'referential-integrity',
 * };
 * ```
 */
export interface Violation {
  /** Human-readable message */
  readonly message: string;
  /** Fields the violation concerns, most specific first */
  readonly fields: readonly string[];
  readonly kind: ViolationKind;
}

/**
 * Result type for operations that can fail
 *
 * Discriminated union type representing success or failure, following Railway Oriented Programming pattern.
 *
 * @template T - Type of the successful value
 * @template E - Type of error (defaults to Violation)
 *
 * @example
 * ```typescript
 * const result = matterActivityUsers.fromSource(matterId, activityId, userId);
 * if (result.success) {
 *   store(result.value);
 * } else {
 *   report(result.errors);
 * }
 * ```
 */
export type Result<T, E = Violation> = { success: true; value: T } | { success: false; errors: E[] };

/** Creates a successful Result */
export const success = <T>(value: T): Result<T, never> => ({
  success: true,
  value,
});

/** Creates a failed Result */
export const failure = <E = Violation>(errors: E[]): Result<never, E> => ({
  success: false,
  errors,
});

/** Success when there are no violations, failure carrying them otherwise */
export const fromViolations = <T>(violations: Violation[], build: () => T): Result<T> =>
  violations.length === 0 ? success(build()) : failure(violations);

// ============================================================================
// Violation helpers
// ============================================================================

/** Creates a validation violation */
export const violation = (message: string, ...fields: string[]): Violation => ({
  message,
  fields,
  kind: 'validation',
});

/** Creates a referential-integrity violation between an attached record and its foreign key */
export const referentialViolation = (relation: string, foreignKey: string): Violation => ({
  message: `${relation}.id does not match ${foreignKey} - referential integrity violation.`,
  fields: [relation, foreignKey],
  kind: 'referential-integrity',
});

/**
 * Re-scopes violations of a nested record under a parent field
 *
 * @example
 * ```typescript
 * prefixViolations([violation('name is required.', 'name')], 'user', 'User');
 * // => [{ message: 'User: name is required.', fields: ['user.name'], kind: 'validation' }]
 * ```
 */
export const prefixViolations = (violations: readonly Violation[], scope: string, label?: string): Violation[] =>
  violations.map((item) => ({
    message: label ? `${label}: ${item.message}` : item.message,
    fields: item.fields.length > 0 ? item.fields.map((field) => `${scope}.${field}`) : [scope],
    kind: item.kind,
  }));

/**
 * Formats violations for logs and reports
 *
 * @example
 * ```typescript
 * summarizeViolations([violation('userId is required.', 'userId')]);
 * // => 'Validation failed with 1 error(s):\n  - userId is required. (userId)'
 * ```
 */
export const summarizeViolations = (violations: readonly Violation[]): string => {
  if (violations.length === 0) {
    return 'No validation errors.';
  }
  const lines = violations.map((item) =>
    item.fields.length > 0 ? `  - ${item.message} (${item.fields.join(', ')})` : `  - ${item.message}`,
  );
  return [`Validation failed with ${violations.length} error(s):`, ...lines].join('\n');
};

/** Thrown when a persisted record cannot be converted into a valid model */
export class ModelValidationError extends Error {
  constructor(
    public readonly modelName: string,
    public readonly violations: readonly Violation[],
  ) {
    super(`Invalid ${modelName}: ${violations.map((item) => item.message).join(' ')}`);
    this.name = 'ModelValidationError';
  }
}
