/**
 * ID Generation Utilities
 *
 * Client-side ids for documents that carry no natural id (influencers written
 * without an explicit `id`).
 *
 * @example
 * ```typescript
 * const generate = getIdGenerator('cuid2');
 * const id = generate?.(); // => 'tz4a98xxat96iws9zmbrgj3a'
 * ```
 */

import { createId } from '@paralleldrive/cuid2';

/**
 * ID generator function type
 */
export type IdGenerator = () => string;

/**
 * Supported ID generation strategies
 */
export const ID_GENERATORS: Record<string, IdGenerator> = {
  cuid: () => createId(),
  cuid2: () => createId(),
  uuid: () => {
    if (typeof crypto !== 'undefined' && crypto.randomUUID) {
      return crypto.randomUUID();
    }
    throw new Error('UUID generation requires crypto.randomUUID(). Consider using cuid2 instead.');
  },
};

/**
 * Get ID generator by strategy name (case-insensitive)
 */
export const getIdGenerator = (name: string): IdGenerator | undefined => {
  return ID_GENERATORS[name.toLowerCase()];
};

export const defaultIdGenerator: IdGenerator = () => createId();
