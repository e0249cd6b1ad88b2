import { describe, expect, it } from 'vitest';
import {
  failure,
  fromViolations,
  ModelValidationError,
  prefixViolations,
  referentialViolation,
  success,
  summarizeViolations,
  violation,
} from '../../src/index.js';

describe('Result', () => {
  it('should create success and failure values', () => {
    expect(success(1)).toEqual({ success: true, value: 1 });
    expect(failure(['boom'])).toEqual({ success: false, errors: ['boom'] });
  });

  it('should build only when there are no violations', () => {
    let built = 0;
    const build = () => {
      built++;
      return 'record';
    };

    expect(fromViolations([], build)).toEqual({ success: true, value: 'record' });
    expect(fromViolations([violation('x is required.', 'x')], build).success).toBe(false);
    expect(built).toBe(1);
  });
});

describe('violation helpers', () => {
  it('should create validation violations', () => {
    expect(violation('name is required.', 'name')).toEqual({
      message: 'name is required.',
      fields: ['name'],
      kind: 'validation',
    });
  });

  it('should create referential violations', () => {
    expect(referentialViolation('user', 'userId')).toEqual({
      message: 'user.id does not match userId - referential integrity violation.',
      fields: ['user', 'userId'],
      kind: 'referential-integrity',
    });
  });

  it('should prefix nested violations with label and scope', () => {
    expect(prefixViolations([violation('name is required.', 'name')], 'user', 'User')).toEqual([
      { message: 'User: name is required.', fields: ['user.name'], kind: 'validation' },
    ]);
  });

  it('should scope violations without fields to the scope itself', () => {
    expect(prefixViolations([violation('broken.')], 'documents[0]')).toEqual([
      { message: 'broken.', fields: ['documents[0]'], kind: 'validation' },
    ]);
  });

  it('should summarize violations', () => {
    expect(summarizeViolations([])).toBe('No validation errors.');
    expect(summarizeViolations([violation('userId is required.', 'userId'), violation('broken.')])).toBe(
      'Validation failed with 2 error(s):\n  - userId is required. (userId)\n  - broken.',
    );
  });
});

describe('ModelValidationError', () => {
  it('should join violation messages', () => {
    const error = new ModelValidationError('User', [
      violation('name is required and cannot be empty.', 'name'),
      violation('id is required.', 'id'),
    ]);

    expect(error.name).toBe('ModelValidationError');
    expect(error.modelName).toBe('User');
    expect(error.violations).toHaveLength(2);
    expect(error.message).toBe('Invalid User: name is required and cannot be empty. id is required.');
  });
});
