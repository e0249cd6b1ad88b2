import { describe, expect, it } from 'vitest';
import { isValidIdentifier, NIL_ID, validateIdentifier } from '../../src/index.js';
import { MATTER_ID } from '../fixtures.js';

describe('validateIdentifier', () => {
  it('should accept a present identifier', () => {
    expect(validateIdentifier(MATTER_ID, 'matterId')).toEqual([]);
    expect(isValidIdentifier(MATTER_ID)).toBe(true);
  });

  it.each(['', '   ', null, undefined])('should require a value for %j', (value) => {
    expect(validateIdentifier(value, 'matterId')).toEqual([
      { message: 'matterId is required.', fields: ['matterId'], kind: 'validation' },
    ]);
    expect(isValidIdentifier(value)).toBe(false);
  });

  it('should reject the nil identifier', () => {
    expect(validateIdentifier(NIL_ID, 'userId')).toEqual([
      { message: 'userId must be a valid non-empty identifier.', fields: ['userId'], kind: 'validation' },
    ]);
    expect(isValidIdentifier(NIL_ID)).toBe(false);
  });
});
