import { describe, expect, it } from 'vitest';
import { isCollectionValid, isValidatable, type Validatable, validateCollection, violation } from '../../src/index.js';

const requireName = (item: { name: string }) => (item.name === '' ? [violation('name is required.', 'name')] : []);

describe('validateCollection', () => {
  it('should treat an absent optional collection as valid', () => {
    expect(validateCollection(null, 'documents')).toEqual([]);
    expect(validateCollection(undefined, 'documents')).toEqual([]);
  });

  it('should report an absent required collection', () => {
    expect(validateCollection(null, 'documents', { required: true })).toEqual([
      { message: 'documents is required.', fields: ['documents'], kind: 'validation' },
    ]);
  });

  it('should report null elements by index', () => {
    expect(validateCollection([{ name: 'a' }, null], 'documents', { validateItem: requireName })).toEqual([
      { message: 'documents[1] cannot be null.', fields: ['documents[1]'], kind: 'validation' },
    ]);
  });

  it('should scope element violations under their index', () => {
    expect(validateCollection([{ name: 'a' }, { name: '' }], 'documents', { validateItem: requireName })).toEqual([
      { message: 'name is required.', fields: ['documents[1].name'], kind: 'validation' },
    ]);
  });

  it('should enforce the item limit', () => {
    const violations = validateCollection([{ name: 'a' }, { name: 'b' }], 'documents', {
      maxItems: 1,
      validateItem: requireName,
    });

    expect(violations.map((item) => item.message)).toEqual(['documents cannot contain more than 1 items.']);
  });

  it('should use self-validating elements', () => {
    const broken: Validatable = { validate: () => [violation('broken.')] };

    expect(validateCollection([broken], 'items')).toEqual([
      { message: 'broken.', fields: ['items[0]'], kind: 'validation' },
    ]);
  });

  it('should agree with isCollectionValid', () => {
    expect(isCollectionValid([{ name: 'a' }], { validateItem: requireName })).toBe(true);
    expect(isCollectionValid([{ name: '' }], { validateItem: requireName })).toBe(false);
    expect(isCollectionValid(null, { required: true })).toBe(false);
  });
});

describe('isValidatable', () => {
  it('should detect a validate method', () => {
    expect(isValidatable({ validate: () => [] })).toBe(true);
    expect(isValidatable({ validate: true })).toBe(false);
    expect(isValidatable(null)).toBe(false);
  });
});
