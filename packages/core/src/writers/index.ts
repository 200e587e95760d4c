/**
 * Writers Module
 *
 * @module writers
 *
 * @remarks
 * Three write paths:
 * 1. **Batch** - Accumulates a job's results and writes them in bulk
 * 2. **Direct** - Writes one document with an explicit refresh policy
 * 3. **Commit** - Refreshes targets so flushed writes become visible
 */

export type { BatchWriter } from './batch-writer.js';
export { createBatchWriter } from './batch-writer.js';
export type { BulkAccumulator } from './bulk-accumulator.js';
export { buildFailureMessage, collectBulkFailures, createBulkAccumulator } from './bulk-accumulator.js';
export type { Committer } from './commit.js';
export { createCommitter } from './commit.js';
export type { DirectWriter } from './direct-writer.js';
export { createDirectWriter } from './direct-writer.js';
export { deleteInterimResults } from './interim-results.js';
export type {
  IdentifiedInfluencer,
  Normalizable,
  RenormalizableDocument,
  RenormalizedResultsWriter,
} from './renormalized-writer.js';
export { createRenormalizedResultsWriter } from './renormalized-writer.js';
export type {
  CompletedFlush,
  DroppedDocument,
  FlushOutcome,
  PersistListener,
  SkippedFlush,
  WriterDependencies,
} from './types.js';
export type { WriteBatch } from './write-batch.js';
export { createWriteBatch } from './write-batch.js';
