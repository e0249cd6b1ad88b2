/**
 * Serialization Utilities for Audit Records
 *
 * Converts records to JSON-ready plain objects for transport and storage.
 * Dates become ISO-8601 strings so that consumers reading the payload back
 * never see `{}` where a timestamp was.
 *
 * @example
 * ```typescript
 * toPlainObject({ matterId: 'm-1', createdAt: new Date('2025-01-01') });
 * // => { matterId: 'm-1', createdAt: '2025-01-01T00:00:00.000Z' }
 * ```
 */

const isPlainObject = (value: unknown): value is Record<string, unknown> => {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  if (Array.isArray(value) || value instanceof Date) {
    return false;
  }

  return true;
};

/**
 * Recursively convert Date objects to ISO strings
 *
 * @example
 * ```typescript
 * convertDatesToISOStrings({
 *   id: '123',
 *   createdAt: new Date('2025-01-01'),
 *   matter: { creationDate: new Date('2025-01-02') }
 * });
 * // => {
 * //   id: '123',
 * //   createdAt: '2025-01-01T00:00:00.000Z',
 * //   matter: { creationDate: '2025-01-02T00:00:00.000Z' }
 * // }
 * ```
 */
export const convertDatesToISOStrings = (obj: unknown): unknown => {
  if (obj === null || typeof obj !== 'object') {
    return obj;
  }

  if (obj instanceof Date) {
    return obj.toISOString();
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => convertDatesToISOStrings(item));
  }

  if (isPlainObject(obj)) {
    const convertedObj: Record<string, unknown> = {};
    for (const key in obj) {
      if (Object.hasOwn(obj, key) && obj[key] !== undefined) {
        convertedObj[key] = convertDatesToISOStrings(obj[key]);
      }
    }
    return convertedObj;
  }

  return obj;
};

/** Plain, JSON-ready copy of a record; absent optional fields are omitted */
export const toPlainObject = (record: object): Record<string, unknown> => {
  const converted = convertDatesToISOStrings(record);
  return isPlainObject(converted) ? converted : {};
};
