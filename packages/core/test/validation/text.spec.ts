import { describe, expect, it } from 'vitest';
import {
  isDescriptionValid,
  isUsernameValid,
  validateDescription,
  validateDescriptionUniqueness,
  validateUsername,
} from '../../src/index.js';

const usernameMessages = (value: string | null | undefined) => validateUsername(value, 'name').map((item) => item.message);

describe('validateUsername', () => {
  it.each(['rbrown', 'Rachel Brown', 'r.brown-2', 'José_Núñez'])('should accept %j', (value) => {
    expect(validateUsername(value, 'name')).toEqual([]);
    expect(isUsernameValid(value)).toBe(true);
  });

  it.each([
    ['', 'name is required and cannot be empty.'],
    ['   ', 'name is required and cannot be empty.'],
    [null, 'name is required and cannot be empty.'],
    ['a', 'name must be at least 2 characters long.'],
    ['x'.repeat(51), 'name cannot exceed 50 characters.'],
    ['r@brown', 'name can only contain letters, numbers, spaces, periods, hyphens, and underscores.'],
    ['.rbrown', 'name cannot start with a special character.'],
    ['rbrown_', 'name cannot end with a special character.'],
    ['john..smith', 'name cannot contain consecutive special characters.'],
    ['john  smith', 'name cannot contain multiple consecutive spaces.'],
    ['Admin', 'name is a reserved name and cannot be used. Please choose a different name.'],
  ])('should report %j', (value, message) => {
    expect(usernameMessages(value)).toEqual([message]);
    expect(isUsernameValid(value)).toBe(false);
  });

  it('should report every failing rule after the required check', () => {
    expect(usernameMessages('-')).toEqual([
      'name must be at least 2 characters long.',
      'name cannot start with a special character.',
      'name cannot end with a special character.',
    ]);
  });

  it('should accept extra reserved names from options', () => {
    const violations = validateUsername('paralegal', 'name', { reserved: { usernames: ['Paralegal'] } });

    expect(violations.map((item) => item.message)).toEqual([
      'name is a reserved name and cannot be used. Please choose a different name.',
    ]);
  });
});

describe('validateDescription', () => {
  const messages = (value: string) => validateDescription(value, 'description').map((item) => item.message);

  it('should accept a normalized description', () => {
    expect(messages('  Smith   Trust  ')).toEqual([]);
    expect(isDescriptionValid('Smith Trust')).toBe(true);
  });

  it.each([
    ['', 'description is required and cannot be empty.'],
    ['ab', 'description must be at least 3 characters long.'],
    ['y'.repeat(129), 'description cannot exceed 128 characters.'],
    ['1234', 'description must contain at least one letter.'],
    ['-Smith Trust', 'description must start and end with a letter or number.'],
    ['Matter', "description 'Matter' is a reserved term and cannot be used."],
    ['  new  ', "description 'new' is a reserved term and cannot be used."],
  ])('should report %j', (value, message) => {
    expect(messages(value)).toEqual([message]);
    expect(isDescriptionValid(value)).toBe(false);
  });

  it('should measure length after normalization', () => {
    expect(messages('  a   b  ')).toEqual([]);
  });

  describe('file names', () => {
    const fileNameMessages = (value: string) =>
      validateDescription(value, 'fileName', { vocabulary: 'fileNames' }).map((item) => item.message);

    it('should accept ordinary names', () => {
      expect(fileNameMessages('engagement-letter')).toEqual([]);
    });

    it('should reject device names', () => {
      expect(fileNameMessages('CON')).toEqual(["fileName 'CON' is a reserved term and cannot be used."]);
    });

    it('should reject forbidden characters', () => {
      expect(fileNameMessages('report?final')).toEqual(['fileName contains characters that are not allowed in file names.']);
    });

    it('should not apply the description vocabulary', () => {
      expect(fileNameMessages('matter')).toEqual([]);
    });
  });
});

describe('validateDescriptionUniqueness', () => {
  it('should report an equivalent description', () => {
    expect(validateDescriptionUniqueness('smith  trust', ['Jones Estate', 'Smith Trust'], 'description')).toEqual([
      { message: "description 'smith trust' is already in use.", fields: ['description'], kind: 'validation' },
    ]);
  });

  it('should accept a new description', () => {
    expect(validateDescriptionUniqueness('Smith Trust II', ['Smith Trust'], 'description')).toEqual([]);
  });
});
