/**
 * ID Generation Utilities
 *
 * Client-side identifiers for records created before they reach the store.
 *
 * **Supported generators:**
 * - `uuid`: UUID v4 (the format of seeded and persisted identifiers)
 * - `cuid`: CUID v2
 *
 * @example
 * ```typescript
 * const matter = withIdentity({ description: 'Smith Trust', ... });
 * matter.id; // => 'f47ac10b-58cc-4372-a567-0e02b2c3d479'
 * ```
 */

import { randomUUID } from 'node:crypto';
import { createId } from '@paralleldrive/cuid2';

/**
 * ID generator function type
 */
export type IdGenerator = () => string;

export type IdStrategy = 'uuid' | 'cuid';

/**
 * Supported ID generation strategies
 */
export const ID_GENERATORS: Record<IdStrategy, IdGenerator> = {
  uuid: () => randomUUID(),
  cuid: () => createId(),
};

/** Generates a new identifier */
export const generateId = (strategy: IdStrategy = 'uuid'): string => ID_GENERATORS[strategy]();

/**
 * Returns the record with an identifier assigned
 *
 * Records that already carry a non-blank `id` are returned unchanged.
 */
export const withIdentity = <T extends object>(
  record: T & { readonly id?: string },
  strategy: IdStrategy = 'uuid',
): T & { readonly id: string } => {
  const { id } = record;
  if (id !== undefined && id.trim() !== '') {
    return { ...record, id };
  }
  return { ...record, id: generateId(strategy) };
};
