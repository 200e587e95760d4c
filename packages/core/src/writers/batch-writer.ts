/**
 * Batch Writer
 *
 * @module writers/batch-writer
 */

import { RESULT_TYPE_LABELS } from '../constants.js';
import type { JobId } from '../domain/branded-types.js';
import { bucketId, documentIdOf } from '../domain/document-ids.js';
import type {
  AnomalyRecord,
  BatchResultDocument,
  Bucket,
  Forecast,
  ForecastRequestStats,
  Influencer,
  ModelPlot,
} from '../domain/result-types.js';
import { withoutRecords } from '../domain/result-types.js';
import { bulkLog } from '../utils/debug.js';
import { createBulkAccumulator } from './bulk-accumulator.js';
import type { FlushOutcome, WriterDependencies } from './types.js';

/**
 * Accumulates the results of one job and writes them in bulk
 *
 * @remarks
 * One instance serves one job for one processing cycle. Await every call
 * before issuing the next one.
 */
export interface BatchWriter {
  readonly jobId: JobId;
  /** Write alias every queued document is sent to */
  readonly target: string;
  /**
   * Queue a result document
   *
   * Buckets go through {@link BatchWriter.persistBucket}. Influencers without an
   * id get a generated one.
   */
  add: (document: BatchResultDocument, resultTypeLabel?: string) => Promise<void>;
  /** Queue a bucket without its nested records, then each of its bucket influencers */
  persistBucket: (bucket: Bucket) => Promise<void>;
  persistRecords: (records: AnomalyRecord[]) => Promise<void>;
  persistInfluencers: (influencers: Influencer[]) => Promise<void>;
  persistModelPlot: (modelPlot: ModelPlot) => Promise<void>;
  persistForecast: (forecast: Forecast) => Promise<void>;
  persistForecastRequestStats: (stats: ForecastRequestStats) => Promise<void>;
  /** Send everything queued as one bulk request; no-op when nothing is queued */
  flush: () => Promise<FlushOutcome>;
  numberOfActions: () => number;
}

/**
 * Create a batch writer for a job
 *
 * @example
 * ```typescript
 * const writer = createBatchWriter(jobId, deps);
 * await writer.persistBucket(bucket);
 * await writer.persistRecords(bucket.records);
 * await writer.persistInfluencers(influencers);
 * const outcome = await writer.flush();
 * ```
 */
export const createBatchWriter = (jobId: JobId, deps: WriterDependencies): BatchWriter => {
  const target = deps.naming.resultsWriteAlias(jobId);
  const accumulator = createBulkAccumulator(jobId, target, deps, bulkLog);

  const belongsToJob = (document: BatchResultDocument): boolean => {
    if (document.jobId === jobId) {
      return true;
    }
    deps.handleDiagnostic({
      kind: 'job-mismatch',
      jobId,
      documentJobId: document.jobId,
      resultType: RESULT_TYPE_LABELS[document.resultType],
    });
    return false;
  };

  const persistBucket = async (bucket: Bucket): Promise<void> => {
    if (!belongsToJob(bucket)) {
      return;
    }

    const bucketWithoutRecords = withoutRecords(bucket);
    await accumulator.append(target, bucketId(bucketWithoutRecords), bucketWithoutRecords, RESULT_TYPE_LABELS.bucket);

    for (const bucketInfluencer of bucketWithoutRecords.bucketInfluencers) {
      await add(bucketInfluencer);
    }
  };

  const add = async (document: BatchResultDocument, resultTypeLabel?: string): Promise<void> => {
    if (document.resultType === 'bucket') {
      await persistBucket(document);
      return;
    }
    if (!belongsToJob(document)) {
      return;
    }

    const id = documentIdOf(document) ?? deps.idGenerator();
    await accumulator.append(target, id, document, resultTypeLabel ?? RESULT_TYPE_LABELS[document.resultType]);
  };

  const addAll = async (documents: BatchResultDocument[]): Promise<void> => {
    for (const document of documents) {
      await add(document);
    }
  };

  return {
    jobId,
    target,
    add,
    persistBucket,
    persistRecords: addAll,
    persistInfluencers: addAll,
    persistModelPlot: (modelPlot) => add(modelPlot),
    persistForecast: (forecast) => add(forecast),
    persistForecastRequestStats: (stats) => add(stats),
    flush: accumulator.flush,
    numberOfActions: accumulator.numberOfActions,
  };
};
