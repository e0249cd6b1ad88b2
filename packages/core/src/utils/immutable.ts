/**
 * Frozen record copies
 *
 * `Object.freeze` leaves a `Date` mutable through its setters, so date fields
 * are stored as an epoch instant and read back through an accessor returning a
 * fresh `Date` each time.
 *
 * @example
 * ```typescript
 * const record = freezeRecord({ createdAt: new Date('2024-05-20T08:30:00Z') }, ['createdAt']);
 * record.createdAt.setUTCFullYear(2300);
 * record.createdAt.toISOString(); // => '2024-05-20T08:30:00.000Z'
 * ```
 */

/** Keys of `T` holding a `Date` */
export type DateKey<T> = {
  [K in keyof T]-?: NonNullable<T[K]> extends Date ? K : never;
}[keyof T] &
  keyof T;

/**
 * Shallow, frozen copy of `record` whose `dateKeys` fields cannot change
 *
 * @remarks
 * Accessors are enumerable, so spreading and serializing the copy see plain
 * `Date` values.
 */
export const freezeRecord = <T extends object>(record: T, dateKeys: readonly DateKey<T>[]): Readonly<T> => {
  const copy = { ...record };
  for (const key of dateKeys) {
    const value: unknown = record[key];
    if (value instanceof Date) {
      const epochMs = value.getTime();
      Object.defineProperty(copy, key, {
        enumerable: true,
        configurable: false,
        get: () => new Date(epochMs),
      });
    }
  }
  return Object.freeze(copy);
};
