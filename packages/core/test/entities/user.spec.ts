import { describe, expect, it } from 'vitest';
import {
  createUser,
  describeUser,
  isUserValid,
  ModelValidationError,
  userEquals,
  userFromEntity,
  userHashCode,
  validateUser,
} from '../../src/index.js';
import { makeUser, OTHER_USER_ID, USER_ID } from '../fixtures.js';

describe('createUser', () => {
  it('should create a frozen user', () => {
    const result = createUser({ name: 'jsmith' });

    expect(result).toEqual({ success: true, value: { name: 'jsmith' } });
    if (result.success) {
      expect(Object.isFrozen(result.value)).toBe(true);
    }
  });

  it('should report name violations on the name field', () => {
    expect(validateUser({ name: 'root' })).toEqual([
      {
        message: 'name is a reserved name and cannot be used. Please choose a different name.',
        fields: ['name'],
        kind: 'validation',
      },
    ]);
    expect(isUserValid({ name: 'root' })).toBe(false);
  });

  it('should require the identifier when asked', () => {
    expect(validateUser({ name: 'jsmith' }, { requireIdentifier: true }).map((item) => item.message)).toEqual([
      'id is required.',
    ]);
  });
});

describe('userFromEntity', () => {
  it('should convert a stored user', () => {
    expect(userFromEntity({ id: USER_ID, name: 'rbrown' })).toEqual({ id: USER_ID, name: 'rbrown' });
  });

  it('should throw for an invalid stored user', () => {
    expect(() => userFromEntity({ id: '', name: 'rbrown' })).toThrow(ModelValidationError);
    expect(() => userFromEntity({ id: '', name: 'rbrown' })).toThrow('Invalid User: id is required.');
  });
});

describe('user equality', () => {
  it('should compare unsaved users by folded name', () => {
    const a = { name: 'RBrown' };
    const b = { name: ' rbrown ' };

    expect(userEquals(a, b)).toBe(true);
    expect(userHashCode(a)).toBe(userHashCode(b));
  });

  it('should compare saved users by identifier', () => {
    expect(userEquals(makeUser(), makeUser({ name: 'someone-else' }))).toBe(true);
    expect(userEquals(makeUser(), makeUser({ id: OTHER_USER_ID }))).toBe(false);
  });

  it('should describe a user', () => {
    expect(describeUser(makeUser())).toBe('rbrown');
    expect(describeUser({ name: '  ' })).toBe('Unknown User');
  });
});
