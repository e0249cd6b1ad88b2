/**
 * Username and description text rules
 *
 * @module validation/text
 */

import { resolveValidationOptions } from '../config.js';
import type { ValidationOptionsInput } from '../config.types.js';
import { TEXT_LIMITS } from '../constants.js';
import { type Violation, violation } from '../domain/result.js';
import { areTextsEquivalent, foldText, normalizeText } from '../utils/normalize.js';
import { evaluateRules, type Rule, satisfiesRules } from './rules.js';

type TextValue = string | null | undefined;

const NAME_CHARACTERS = /^[\p{L}\p{N} ._-]+$/u;
const STARTS_ALPHANUMERIC = /^[\p{L}\p{N}]/u;
const ENDS_ALPHANUMERIC = /[\p{L}\p{N}]$/u;
const CONSECUTIVE_SPECIALS = /\.\.|__|--/;
const FILE_NAME_FORBIDDEN = /[<>:"/\\|?*]/;

const trimmed = (value: TextValue): string => (value ?? '').trim();

// ============================================================================
// Usernames
// ============================================================================

const usernameRules = (reserved: ReadonlySet<string>): readonly Rule<TextValue>[] => [
  {
    test: (value) => trimmed(value) !== '',
    message: (field) => `${field} is required and cannot be empty.`,
    halt: true,
  },
  {
    test: (value) => trimmed(value).length >= TEXT_LIMITS.USERNAME_MIN,
    message: (field) => `${field} must be at least ${TEXT_LIMITS.USERNAME_MIN} characters long.`,
  },
  {
    test: (value) => trimmed(value).length <= TEXT_LIMITS.USERNAME_MAX,
    message: (field) => `${field} cannot exceed ${TEXT_LIMITS.USERNAME_MAX} characters.`,
  },
  {
    test: (value) => NAME_CHARACTERS.test(trimmed(value)),
    message: (field) => `${field} can only contain letters, numbers, spaces, periods, hyphens, and underscores.`,
  },
  {
    test: (value) => STARTS_ALPHANUMERIC.test(trimmed(value)),
    message: (field) => `${field} cannot start with a special character.`,
  },
  {
    test: (value) => ENDS_ALPHANUMERIC.test(trimmed(value)),
    message: (field) => `${field} cannot end with a special character.`,
  },
  {
    test: (value) => !CONSECUTIVE_SPECIALS.test(trimmed(value)),
    message: (field) => `${field} cannot contain consecutive special characters.`,
  },
  {
    test: (value) => !trimmed(value).includes('  '),
    message: (field) => `${field} cannot contain multiple consecutive spaces.`,
  },
  {
    test: (value) => !reserved.has(foldText(value)),
    message: (field) => `${field} is a reserved name and cannot be used. Please choose a different name.`,
  },
];

/**
 * Validates a user name
 *
 * @example
 * ```typescript
 * validateUsername('admin', 'name').map((v) => v.message);
 * // => ['name is a reserved name and cannot be used. Please choose a different name.']
 * ```
 */
export const validateUsername = (value: TextValue, field: string, options?: ValidationOptionsInput): Violation[] =>
  evaluateRules(usernameRules(resolveValidationOptions(options).reserved.usernames), value, field);

export const isUsernameValid = (value: TextValue, options?: ValidationOptionsInput): boolean =>
  satisfiesRules(usernameRules(resolveValidationOptions(options).reserved.usernames), value);

// ============================================================================
// Descriptions and file names
// ============================================================================

/** Which reserved vocabulary a description is checked against */
export type DescriptionVocabulary = 'descriptions' | 'fileNames';

export interface DescriptionOptions {
  /** @default 'descriptions' */
  vocabulary?: DescriptionVocabulary;
}

const descriptionRules = (
  reserved: ReadonlySet<string>,
  vocabulary: DescriptionVocabulary,
): readonly Rule<TextValue>[] => {
  const rules: Rule<TextValue>[] = [
    {
      test: (value) => normalizeText(value) !== '',
      message: (field) => `${field} is required and cannot be empty.`,
      halt: true,
    },
    {
      test: (value) => normalizeText(value).length >= TEXT_LIMITS.DESCRIPTION_MIN,
      message: (field) => `${field} must be at least ${TEXT_LIMITS.DESCRIPTION_MIN} characters long.`,
    },
    {
      test: (value) => normalizeText(value).length <= TEXT_LIMITS.DESCRIPTION_MAX,
      message: (field) => `${field} cannot exceed ${TEXT_LIMITS.DESCRIPTION_MAX} characters.`,
    },
    {
      test: (value) => /\p{L}/u.test(normalizeText(value)),
      message: (field) => `${field} must contain at least one letter.`,
    },
    {
      test: (value) => {
        const text = normalizeText(value);
        return STARTS_ALPHANUMERIC.test(text) && ENDS_ALPHANUMERIC.test(text);
      },
      message: (field) => `${field} must start and end with a letter or number.`,
    },
    {
      test: (value) => !reserved.has(foldText(value)),
      message: (field, value) => `${field} '${normalizeText(value)}' is a reserved term and cannot be used.`,
    },
  ];
  if (vocabulary === 'fileNames') {
    rules.push({
      test: (value) => !FILE_NAME_FORBIDDEN.test(normalizeText(value)),
      message: (field) => `${field} contains characters that are not allowed in file names.`,
    });
  }
  return rules;
};

/**
 * Validates a matter description or document file name
 *
 * @remarks
 * Length and edge rules apply to the normalized text, so surrounding and
 * repeated whitespace never counts.
 */
export const validateDescription = (
  value: TextValue,
  field: string,
  options?: ValidationOptionsInput & DescriptionOptions,
): Violation[] => {
  const vocabulary = options?.vocabulary ?? 'descriptions';
  const reserved = resolveValidationOptions(options).reserved[vocabulary];
  return evaluateRules(descriptionRules(reserved, vocabulary), value, field);
};

export const isDescriptionValid = (value: TextValue, options?: ValidationOptionsInput & DescriptionOptions): boolean => {
  const vocabulary = options?.vocabulary ?? 'descriptions';
  const reserved = resolveValidationOptions(options).reserved[vocabulary];
  return satisfiesRules(descriptionRules(reserved, vocabulary), value);
};

/**
 * Reports a description equivalent to one already in use
 *
 * @example
 * ```typescript
 * validateDescriptionUniqueness('smith  trust', ['Smith Trust'], 'description');
 * // => [{ message: "description 'smith trust' is already in use.", ... }]
 * ```
 */
export const validateDescriptionUniqueness = (
  value: TextValue,
  existing: readonly string[],
  field: string,
): Violation[] =>
  existing.some((candidate) => areTextsEquivalent(value, candidate))
    ? [violation(`${field} '${normalizeText(value)}' is already in use.`, field)]
    : [];
