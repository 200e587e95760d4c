/**
 * Result and state document types produced by the analysis pipeline
 *
 * Every variant carries its owning job and a `resultType` discriminator that is
 * persisted with the document.
 */

import type { ResultType } from '../constants.js';
import type { JobId } from './branded-types.js';

interface ResultBase<TType extends ResultType> {
  resultType: TType;
  jobId: JobId;
}

/** Field values that partition a detector's analysis */
export interface PartitioningFields {
  byFieldName?: string;
  byFieldValue?: string;
  overFieldName?: string;
  overFieldValue?: string;
  partitionFieldName?: string;
  partitionFieldValue?: string;
}

export interface AnomalyCauseInfluence {
  influencerFieldName: string;
  influencerFieldValues: string[];
}

export interface BucketInfluencer extends ResultBase<'bucket_influencer'> {
  timestamp: Date;
  /** Bucket span in seconds */
  bucketSpan: number;
  influencerFieldName: string;
  initialAnomalyScore: number;
  anomalyScore: number;
  rawAnomalyScore: number;
  probability: number;
  isInterim: boolean;
}

export interface AnomalyRecord extends ResultBase<'record'>, PartitioningFields {
  timestamp: Date;
  bucketSpan: number;
  detectorIndex: number;
  /** Disambiguates records that share every other id component */
  sequenceNum: number;
  probability: number;
  recordScore: number;
  initialRecordScore: number;
  isInterim: boolean;
  functionName?: string;
  fieldName?: string;
  actual?: number[];
  typical?: number[];
  influencers?: AnomalyCauseInfluence[];
}

/**
 * Time-window aggregation of results
 *
 * `records` is populated by the pipeline for convenience but is never
 * persisted inside the bucket; records are written as their own documents.
 */
export interface Bucket extends ResultBase<'bucket'> {
  timestamp: Date;
  bucketSpan: number;
  anomalyScore: number;
  initialAnomalyScore: number;
  eventCount: number;
  isInterim: boolean;
  processingTimeMs: number;
  records: AnomalyRecord[];
  bucketInfluencers: BucketInfluencer[];
  scheduledEvents?: string[];
}

export interface Influencer extends ResultBase<'influencer'> {
  /** Document id; generated at write time when absent */
  id?: string;
  timestamp: Date;
  bucketSpan: number;
  influencerFieldName: string;
  influencerFieldValue: string;
  probability: number;
  influencerScore: number;
  initialInfluencerScore: number;
  isInterim: boolean;
}

export interface ModelPlot extends ResultBase<'model_plot'>, PartitioningFields {
  timestamp: Date;
  bucketSpan: number;
  detectorIndex: number;
  modelFeature?: string;
  modelLower: number;
  modelUpper: number;
  modelMedian: number;
  actual?: number;
}

export interface Forecast extends ResultBase<'model_forecast'>, PartitioningFields {
  forecastId: string;
  timestamp: Date;
  bucketSpan: number;
  detectorIndex: number;
  modelFeature?: string;
  forecastLower: number;
  forecastUpper: number;
  forecastPrediction: number;
}

export type ForecastRequestStatus = 'scheduled' | 'started' | 'finished' | 'failed';

export interface ForecastRequestStats extends ResultBase<'model_forecast_request_stats'> {
  forecastId: string;
  recordCount: number;
  messages: string[];
  timestamp: Date;
  startTime: Date;
  endTime: Date;
  expiryTime: Date;
  progress: number;
  processingTimeMs: number;
  memoryUsage: number;
  status: ForecastRequestStatus;
}

export interface CategoryDefinition extends ResultBase<'category_definition'> {
  categoryId: number;
  terms: string;
  regex: string;
  maxMatchingLength: number;
  examples: string[];
}

export interface Quantiles extends ResultBase<'quantiles'> {
  timestamp: Date;
  /** Opaque normalizer state */
  quantileState: string;
}

export type MemoryStatus = 'ok' | 'soft_limit' | 'hard_limit';

export interface ModelSizeStats extends ResultBase<'model_size_stats'> {
  modelBytes: number;
  totalByFieldCount: number;
  totalOverFieldCount: number;
  totalPartitionFieldCount: number;
  bucketAllocationFailuresCount: number;
  memoryStatus: MemoryStatus;
  logTime: Date;
  timestamp?: Date;
}

export interface ModelSnapshot extends ResultBase<'model_snapshot'> {
  snapshotId: string;
  timestamp: Date;
  description?: string;
  snapshotDocCount: number;
  latestRecordTimeStamp?: Date;
  latestResultTimeStamp?: Date;
  retain: boolean;
  modelSizeStats?: Omit<ModelSizeStats, 'resultType' | 'jobId'>;
}

/** Documents written through the bulk results path */
export type BatchResultDocument =
  | Bucket
  | BucketInfluencer
  | AnomalyRecord
  | Influencer
  | ModelPlot
  | Forecast
  | ForecastRequestStats;

/** Documents written one at a time with a refresh policy */
export type DirectResultDocument = CategoryDefinition | Quantiles | ModelSnapshot | ModelSizeStats;

export type ResultDocument = BatchResultDocument | DirectResultDocument;

/**
 * Returns the bucket without its nested records
 *
 * The input is returned as-is when it has no records; otherwise a shallow copy
 * with an empty record list is returned and the input is left untouched.
 */
export const withoutRecords = (bucket: Bucket): Bucket => {
  if (bucket.records.length === 0) {
    return bucket;
  }
  return { ...bucket, records: [] };
};
