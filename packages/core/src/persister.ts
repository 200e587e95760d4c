/**
 * Results Persister
 *
 * Entry point used by the analysis pipeline. Bucket, record, influencer,
 * model plot and forecast results go through a per-job {@link BatchWriter};
 * quantiles, model snapshots, model size stats and category definitions are
 * written one at a time.
 *
 * @module persister
 */

import type { RefreshPolicy } from './constants.js';
import { REFRESH_POLICY } from './constants.js';
import type { ResultsPersisterOptions } from './config/options.js';
import { resolvePersisterConfig } from './config/options.js';
import type { JobId } from './domain/branded-types.js';
import { categoryDefinitionId, modelSizeStatsId, modelSnapshotId, quantilesId } from './domain/document-ids.js';
import type { CategoryDefinition, ModelSizeStats, ModelSnapshot, Quantiles } from './domain/result-types.js';
import type { IndexResponse } from './store/interfaces.js';
import { directLog } from './utils/debug.js';
import type { BatchWriter } from './writers/batch-writer.js';
import { createBatchWriter } from './writers/batch-writer.js';
import { createCommitter } from './writers/commit.js';
import { createDirectWriter } from './writers/direct-writer.js';
import { deleteInterimResults } from './writers/interim-results.js';
import type { RenormalizedResultsWriter } from './writers/renormalized-writer.js';
import { createRenormalizedResultsWriter } from './writers/renormalized-writer.js';
import type { PersistListener } from './writers/types.js';

export interface ResultsPersister {
  /** New batch writer for one processing cycle of a job */
  bulkPersisterBuilder: (jobId: JobId) => BatchWriter;
  /** New writer for renormalized result updates of a job */
  renormalizedPersisterBuilder: (jobId: JobId) => RenormalizedResultsWriter;

  /**
   * Persist a category definition without refreshing
   *
   * @remarks
   * Categories are written in large numbers and not read back by the writer,
   * so they are never committed individually.
   */
  persistCategoryDefinition: (category: CategoryDefinition) => Promise<IndexResponse>;
  persistQuantiles: (quantiles: Quantiles) => Promise<IndexResponse>;
  persistQuantilesAsync: (quantiles: Quantiles, refreshPolicy: RefreshPolicy, listener: PersistListener) => void;
  persistModelSnapshot: (snapshot: ModelSnapshot, refreshPolicy: RefreshPolicy) => Promise<IndexResponse>;
  persistModelSizeStats: (stats: ModelSizeStats) => Promise<IndexResponse>;
  persistModelSizeStatsAsync: (stats: ModelSizeStats, refreshPolicy: RefreshPolicy, listener: PersistListener) => void;

  /** Delete the job's interim results; resolves with the number deleted */
  deleteInterimResults: (jobId: JobId) => Promise<number>;
  commitResultWrites: (jobId: JobId) => Promise<void>;
  commitStateWrites: (jobId: JobId) => Promise<void>;
}

/**
 * Create a results persister
 *
 * @throws {Error} When options are invalid
 *
 * @example
 * ```typescript
 * const persister = createResultsPersister({ store, onDiagnostic: report });
 *
 * const writer = persister.bulkPersisterBuilder(jobId);
 * await writer.persistBucket(bucket);
 * await writer.persistRecords(bucket.records);
 * await writer.flush();
 *
 * await persister.persistQuantiles(quantiles);
 * await persister.commitResultWrites(jobId);
 * ```
 */
export const createResultsPersister = (options: ResultsPersisterOptions): ResultsPersister => {
  const deps = resolvePersisterConfig(options);
  const directWriter = createDirectWriter(deps);
  const committer = createCommitter(deps);

  return {
    bulkPersisterBuilder: (jobId) => createBatchWriter(jobId, deps),
    renormalizedPersisterBuilder: (jobId) => createRenormalizedResultsWriter(jobId, deps),

    persistCategoryDefinition: (category) =>
      directWriter.persist(category, categoryDefinitionId(category), REFRESH_POLICY.NONE),

    persistQuantiles: (quantiles) => directWriter.persist(quantiles, quantilesId(quantiles), REFRESH_POLICY.NONE),

    persistQuantilesAsync: (quantiles, refreshPolicy, listener) =>
      directWriter.persistAsync(quantiles, quantilesId(quantiles), refreshPolicy, listener),

    persistModelSnapshot: (snapshot, refreshPolicy) =>
      directWriter.persist(snapshot, modelSnapshotId(snapshot), refreshPolicy),

    persistModelSizeStats: (stats) => {
      directLog('[%s] persisting model size stats, for size %d', stats.jobId, stats.modelBytes);
      return directWriter.persist(stats, modelSizeStatsId(stats), REFRESH_POLICY.NONE);
    },

    persistModelSizeStatsAsync: (stats, refreshPolicy, listener) => {
      directLog('[%s] persisting model size stats, for size %d', stats.jobId, stats.modelBytes);
      directWriter.persistAsync(stats, modelSizeStatsId(stats), refreshPolicy, listener);
    },

    deleteInterimResults: (jobId) => deleteInterimResults(jobId, deps),
    commitResultWrites: committer.commitResultWrites,
    commitStateWrites: committer.commitStateWrites,
  };
};
