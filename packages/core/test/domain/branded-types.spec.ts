import { describe, expect, it } from 'vitest';
import {
  canonicalizeId,
  createMatterId,
  createUserId,
  IdValidationError,
  isActivityId,
  isBlankId,
  isDocumentId,
  isMatterId,
  isNilId,
  isPresentId,
  isRevisionId,
  isUserId,
  NIL_ID,
  sameId,
  unwrapId,
} from '../../src/index.js';
import { MATTER_ID } from '../fixtures.js';

describe('Branded Types', () => {
  describe('createMatterId', () => {
    it('should create a MatterId from a present identifier', () => {
      const matterId = createMatterId(MATTER_ID);

      expect(unwrapId(matterId)).toBe(MATTER_ID);
    });

    it.each(['', '   '])('should reject blank value %j', (value) => {
      expect(() => createMatterId(value)).toThrow(IdValidationError);
      expect(() => createMatterId(value)).toThrow('MatterId cannot be empty or whitespace-only');
    });

    it('should reject the nil identifier', () => {
      expect(() => createMatterId(NIL_ID)).toThrow('MatterId cannot be the nil identifier');
    });
  });

  it('should carry the id type and value on errors', () => {
    try {
      createUserId(' ');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(IdValidationError);
      if (error instanceof IdValidationError) {
        expect(error.idType).toBe('UserId');
        expect(error.value).toBe(' ');
        expect(error.message).toBe('[UserId] UserId cannot be empty or whitespace-only: received " "');
      }
    }
  });

  describe('isNilId', () => {
    it.each([
      [NIL_ID, true],
      ['{00000000-0000-0000-0000-000000000000}', true],
      ['00000000000000000000000000000000', true],
      [MATTER_ID, false],
      ['', false],
      [undefined, false],
    ])('should classify %j as %s', (value, expected) => {
      expect(isNilId(value)).toBe(expected);
    });
  });

  describe('isPresentId', () => {
    it.each([
      [MATTER_ID, true],
      ['  ', false],
      [null, false],
      [NIL_ID, false],
    ])('should classify %j as %s', (value, expected) => {
      expect(isPresentId(value)).toBe(expected);
    });
  });

  it('should detect blank identifiers', () => {
    expect(isBlankId(null)).toBe(true);
    expect(isBlankId('\t')).toBe(true);
    expect(isBlankId('x')).toBe(false);
  });

  it('should canonicalize for comparison', () => {
    expect(canonicalizeId(' 3F2A-01 ')).toBe('3f2a-01');
    expect(sameId(MATTER_ID.toUpperCase(), ` ${MATTER_ID} `)).toBe(true);
    expect(sameId(NIL_ID, NIL_ID)).toBe(false);
  });

  describe.each([
    ['isMatterId', isMatterId],
    ['isDocumentId', isDocumentId],
    ['isRevisionId', isRevisionId],
    ['isUserId', isUserId],
    ['isActivityId', isActivityId],
  ])('%s', (_name, guard) => {
    it('should accept a present identifier', () => {
      expect(guard(MATTER_ID)).toBe(true);
    });

    it.each([42, null, undefined, '', '  ', NIL_ID])('should reject %j', (value) => {
      expect(guard(value)).toBe(false);
    });
  });
});
