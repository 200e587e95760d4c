/**
 * Renormalized Results Writer
 *
 * Re-writes results whose scores changed after renormalization. Updates go to
 * the index each result was read from, which after a rollover is not
 * necessarily the job's current write alias.
 *
 * @module writers/renormalized-writer
 */

import { RESULT_TYPE_LABELS } from '../constants.js';
import type { JobId } from '../domain/branded-types.js';
import { bucketId, bucketInfluencerId, recordId } from '../domain/document-ids.js';
import type { AnomalyRecord, Bucket, BucketInfluencer, Influencer } from '../domain/result-types.js';
import { withoutRecords } from '../domain/result-types.js';
import { renormalizeLog } from '../utils/debug.js';
import { createBulkAccumulator } from './bulk-accumulator.js';
import type { FlushOutcome, WriterDependencies } from './types.js';

/** Influencers can only be updated in place when their id is known */
export type IdentifiedInfluencer = Influencer & { id: string };

export type RenormalizableDocument = Bucket | BucketInfluencer | AnomalyRecord | IdentifiedInfluencer;

/** A result paired with the physical index it was read from */
export interface Normalizable {
  target: string;
  document: RenormalizableDocument;
}

export interface RenormalizedResultsWriter {
  readonly jobId: JobId;
  updateResult: (normalizable: Normalizable) => Promise<void>;
  updateResults: (normalizables: Normalizable[]) => Promise<void>;
  /** Update a bucket (records stripped) and its bucket influencers in `target` */
  updateBucket: (bucket: Bucket, target: string) => Promise<void>;
  executeRequest: () => Promise<FlushOutcome>;
  numberOfActions: () => number;
}

const idOf = (document: RenormalizableDocument): string => {
  switch (document.resultType) {
    case 'bucket':
      return bucketId(document);
    case 'bucket_influencer':
      return bucketInfluencerId(document);
    case 'record':
      return recordId(document);
    case 'influencer':
      return document.id;
    default: {
      const exhaustiveCheck: never = document;
      throw new Error(`Unknown result type: ${String(exhaustiveCheck)}`);
    }
  }
};

export const createRenormalizedResultsWriter = (jobId: JobId, deps: WriterDependencies): RenormalizedResultsWriter => {
  const accumulator = createBulkAccumulator(jobId, deps.naming.resultsReadAlias(jobId), deps, renormalizeLog);

  const updateBucket = async (bucket: Bucket, target: string): Promise<void> => {
    const bucketWithoutRecords = withoutRecords(bucket);
    await accumulator.append(target, idOf(bucketWithoutRecords), bucketWithoutRecords, RESULT_TYPE_LABELS.bucket);

    for (const bucketInfluencer of bucketWithoutRecords.bucketInfluencers) {
      await accumulator.append(
        target,
        idOf(bucketInfluencer),
        bucketInfluencer,
        RESULT_TYPE_LABELS.bucket_influencer,
      );
    }
  };

  const updateResult = async ({ target, document }: Normalizable): Promise<void> => {
    if (document.resultType === 'bucket') {
      await updateBucket(document, target);
      return;
    }
    await accumulator.append(target, idOf(document), document, RESULT_TYPE_LABELS[document.resultType]);
  };

  return {
    jobId,
    updateResult,
    updateResults: async (normalizables) => {
      for (const normalizable of normalizables) {
        await updateResult(normalizable);
      }
    },
    updateBucket,
    executeRequest: accumulator.flush,
    numberOfActions: accumulator.numberOfActions,
  };
};
