/**
 * Rule tables shared by every validator
 *
 * `validateX` and `isXValid` evaluate the same table: the violation list is
 * empty exactly when every predicate holds.
 *
 * @module validation/rules
 */

import { type Violation, violation } from '../domain/result.js';

/** One predicate with the message reported when it fails */
export interface Rule<T> {
  readonly test: (value: T) => boolean;
  readonly message: (field: string, value: T) => string;
  /** Skip the remaining rules when this one fails */
  readonly halt?: boolean;
}

/** Collects a violation for every failing rule, stopping after a failed halting rule */
export const evaluateRules = <T>(rules: readonly Rule<T>[], value: T, field: string): Violation[] => {
  const violations: Violation[] = [];
  for (const rule of rules) {
    if (rule.test(value)) {
      continue;
    }
    violations.push(violation(rule.message(field, value), field));
    if (rule.halt) {
      break;
    }
  }
  return violations;
};

/** Short-circuit form of {@link evaluateRules} */
export const satisfiesRules = <T>(rules: readonly Rule<T>[], value: T): boolean => rules.every((rule) => rule.test(value));
