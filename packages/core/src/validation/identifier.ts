import type { Violation } from '../domain/result.js';
import { isBlankId, isNilId } from '../domain/branded-types.js';
import { evaluateRules, type Rule, satisfiesRules } from './rules.js';

type IdentifierValue = string | null | undefined;

const IDENTIFIER_RULES: readonly Rule<IdentifierValue>[] = [
  { test: (value) => !isBlankId(value), message: (field) => `${field} is required.`, halt: true },
  { test: (value) => !isNilId(value), message: (field) => `${field} must be a valid non-empty identifier.` },
];

/**
 * Validates a required identifier
 *
 * @example
 * ```typescript
 * validateIdentifier('', 'matterId');
 * // => [{ message: 'matterId is required.', fields: ['matterId'], kind: 'validation' }]
 * ```
 */
export const validateIdentifier = (value: IdentifierValue, field: string): Violation[] =>
  evaluateRules(IDENTIFIER_RULES, value, field);

export const isValidIdentifier = (value: IdentifierValue): boolean => satisfiesRules(IDENTIFIER_RULES, value);
