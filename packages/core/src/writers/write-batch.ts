/**
 * Ordered sequence of pending bulk operations
 *
 * @module writers/write-batch
 */

import type { BulkOperation } from '../store/interfaces.js';

export interface WriteBatch {
  add: (operation: BulkOperation) => void;
  numberOfActions: () => number;
  /** Returns the pending operations in insertion order and resets the batch */
  drain: () => BulkOperation[];
}

export const createWriteBatch = (): WriteBatch => {
  let operations: BulkOperation[] = [];

  return {
    add: (operation) => {
      operations.push(operation);
    },
    numberOfActions: () => operations.length,
    drain: () => {
      const drained = operations;
      operations = [];
      return drained;
    },
  };
};
