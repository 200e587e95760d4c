/**
 * Write Batch Tests
 */

import { describe, expect, it } from 'vitest';
import { createWriteBatch } from '../../src/writers/write-batch.js';

const operation = (id: string) => ({ target: 'results', id, document: `{"id":"${id}"}` });

describe('createWriteBatch', () => {
  it('should start empty', () => {
    const batch = createWriteBatch();
    expect(batch.numberOfActions()).toBe(0);
    expect(batch.drain()).toEqual([]);
  });

  it('should drain operations in insertion order and reset', () => {
    const batch = createWriteBatch();
    batch.add(operation('a'));
    batch.add(operation('b'));

    expect(batch.numberOfActions()).toBe(2);
    expect(batch.drain().map((drained) => drained.id)).toEqual(['a', 'b']);
    expect(batch.numberOfActions()).toBe(0);
  });

  it('should not share drained operations with later adds', () => {
    const batch = createWriteBatch();
    batch.add(operation('a'));
    const drained = batch.drain();
    batch.add(operation('b'));

    expect(drained).toHaveLength(1);
    expect(batch.drain().map((next) => next.id)).toEqual(['b']);
  });
});
