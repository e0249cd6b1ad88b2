import { describe, expect, it } from 'vitest';
import { isTimestampValid, validateTimestamp, validateTimestampOrder } from '../../src/index.js';
import { NOW, options } from '../fixtures.js';

const messagesOf = (value: Date | null | undefined) =>
  validateTimestamp(value, 'createdAt', options).map((item) => item.message);

describe('validateTimestamp', () => {
  it('should accept a recent instant', () => {
    expect(messagesOf(new Date('2024-05-01T00:00:00.000Z'))).toEqual([]);
  });

  it.each([
    [null, 'createdAt is required.'],
    [undefined, 'createdAt is required.'],
    [new Date('invalid'), 'createdAt is required.'],
    [new Date(0), 'createdAt must be a valid date for audit trail integrity.'],
    [new Date('2200-01-01T00:00:00.000Z'), 'createdAt must not be in the future.'],
    [new Date('1975-01-01T00:00:00.000Z'), 'createdAt is unreasonably far in the past.'],
  ])('should report %s', (value, message) => {
    expect(messagesOf(value)).toEqual([message]);
    expect(isTimestampValid(value, options)).toBe(false);
  });

  it('should allow the clock-skew tolerance', () => {
    expect(messagesOf(new Date(NOW.getTime() + 4 * 60_000))).toEqual([]);
    expect(messagesOf(new Date(NOW.getTime() + 5 * 60_000))).toEqual([]);
    expect(messagesOf(new Date(NOW.getTime() + 6 * 60_000))).toEqual(['createdAt must not be in the future.']);
  });

  it('should honor a custom tolerance and floor', () => {
    const strict = { ...options, futureToleranceMinutes: 0, historicalFloor: new Date('2020-01-01T00:00:00.000Z') };

    expect(validateTimestamp(new Date(NOW.getTime() + 1000), 'at', strict).map((item) => item.message)).toEqual([
      'at must not be in the future.',
    ]);
    expect(validateTimestamp(new Date('2019-12-31T23:59:59.000Z'), 'at', strict).map((item) => item.message)).toEqual([
      'at is unreasonably far in the past.',
    ]);
  });

  it('should accept the historical floor itself', () => {
    expect(messagesOf(new Date('1980-01-01T00:00:00.000Z'))).toEqual([]);
  });
});

describe('validateTimestampOrder', () => {
  const created = new Date('2024-02-01T10:00:00.000Z');

  it('should accept ordered or equal instants', () => {
    expect(validateTimestampOrder(created, new Date('2024-02-02T10:00:00.000Z'), 'creationDate', 'modificationDate')).toEqual(
      [],
    );
    expect(validateTimestampOrder(created, created, 'creationDate', 'modificationDate')).toEqual([]);
  });

  it('should report a later field preceding the earlier one', () => {
    expect(
      validateTimestampOrder(created, new Date('2024-01-31T10:00:00.000Z'), 'creationDate', 'modificationDate'),
    ).toEqual([
      {
        message: 'modificationDate cannot be earlier than creationDate.',
        fields: ['modificationDate', 'creationDate'],
        kind: 'validation',
      },
    ]);
  });

  it('should ignore absent dates', () => {
    expect(validateTimestampOrder(undefined, created, 'creationDate', 'modificationDate')).toEqual([]);
  });
});
