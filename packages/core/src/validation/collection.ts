import { DEFAULTS } from '../constants.js';
import { prefixViolations, type Violation, violation } from '../domain/result.js';

/** An element that can validate itself */
export interface Validatable {
  validate(): readonly Violation[];
}

/** Type guard for elements exposing `validate()` */
export const isValidatable = (value: unknown): value is Validatable =>
  typeof value === 'object' && value !== null && 'validate' in value && typeof value.validate === 'function';

export interface CollectionOptions<T> {
  /** Report an absent collection instead of treating it as empty */
  required?: boolean;
  /** @default 10000 */
  maxItems?: number;
  /** Element validator; elements exposing `validate()` are used when omitted */
  validateItem?: (item: T) => readonly Violation[];
}

/**
 * Validates an optional collection and each of its elements
 *
 * Element violations are re-scoped under `field[index]`.
 *
 * @example
 * ```typescript
 * validateCollection([doc, null], 'documents', { validateItem: validateDocument });
 * // => [{ message: 'documents[1] cannot be null.', fields: ['documents[1]'], kind: 'validation' }]
 * ```
 */
export const validateCollection = <T>(
  items: readonly (T | null | undefined)[] | null | undefined,
  field: string,
  options: CollectionOptions<T> = {},
): Violation[] => {
  if (items === null || items === undefined) {
    return options.required ? [violation(`${field} is required.`, field)] : [];
  }

  const violations: Violation[] = [];
  const maxItems = options.maxItems ?? DEFAULTS.MAX_COLLECTION_ITEMS;
  if (items.length > maxItems) {
    violations.push(violation(`${field} cannot contain more than ${maxItems} items.`, field));
  }

  items.forEach((item, index) => {
    const scope = `${field}[${index}]`;
    if (item === null || item === undefined) {
      violations.push(violation(`${scope} cannot be null.`, scope));
      return;
    }
    const itemViolations = options.validateItem
      ? options.validateItem(item)
      : isValidatable(item)
        ? item.validate()
        : [];
    violations.push(...prefixViolations(itemViolations, scope));
  });

  return violations;
};

export const isCollectionValid = <T>(
  items: readonly (T | null | undefined)[] | null | undefined,
  options: CollectionOptions<T> = {},
): boolean => validateCollection(items, 'items', options).length === 0;
