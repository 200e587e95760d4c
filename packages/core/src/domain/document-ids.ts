/**
 * Deterministic document ids
 *
 * Re-writing the same result produces the same id, so a replayed write is an
 * upsert rather than a duplicate.
 *
 * @module domain/document-ids
 */

import type {
  AnomalyRecord,
  Bucket,
  BucketInfluencer,
  CategoryDefinition,
  Forecast,
  ForecastRequestStats,
  ModelPlot,
  ModelSizeStats,
  ModelSnapshot,
  PartitioningFields,
  Quantiles,
  ResultDocument,
} from './result-types.js';

/**
 * 32-bit string hash rendered as an unsigned decimal
 *
 * @example
 * ```typescript
 * hashFieldValues('a'); // => '97'
 * ```
 */
export const hashFieldValues = (...values: Array<string | undefined>): string => {
  let hash = 0;
  for (const value of values) {
    let valueHash = 0;
    for (const char of value ?? '') {
      valueHash = (Math.imul(valueHash, 31) + (char.codePointAt(0) ?? 0)) | 0;
    }
    hash = (Math.imul(hash, 31) + valueHash) | 0;
  }
  return String(hash >>> 0);
};

const partitioningHash = (fields: PartitioningFields): string =>
  hashFieldValues(fields.byFieldValue, fields.overFieldValue, fields.partitionFieldValue);

export const bucketId = (bucket: Bucket): string =>
  `${bucket.jobId}_bucket_${bucket.timestamp.getTime()}_${bucket.bucketSpan}`;

export const bucketInfluencerId = (influencer: BucketInfluencer): string =>
  `${influencer.jobId}_bucket_influencer_${influencer.timestamp.getTime()}_${influencer.bucketSpan}_${influencer.influencerFieldName}`;

export const recordId = (record: AnomalyRecord): string =>
  `${record.jobId}_record_${record.timestamp.getTime()}_${record.bucketSpan}_${record.detectorIndex}_${partitioningHash(record)}_${record.sequenceNum}`;

export const modelPlotId = (modelPlot: ModelPlot): string =>
  `${modelPlot.jobId}_model_plot_${modelPlot.timestamp.getTime()}_${modelPlot.bucketSpan}_${modelPlot.detectorIndex}_${partitioningHash(modelPlot)}`;

export const forecastId = (forecast: Forecast): string =>
  `${forecast.jobId}_model_forecast_${forecast.forecastId}_${forecast.timestamp.getTime()}_${forecast.bucketSpan}_${forecast.detectorIndex}_${partitioningHash(forecast)}`;

export const forecastRequestStatsId = (stats: ForecastRequestStats): string =>
  `${stats.jobId}_model_forecast_request_stats_${stats.forecastId}`;

export const categoryDefinitionId = (category: CategoryDefinition): string =>
  `${category.jobId}_category_definition_${category.categoryId}`;

export const quantilesId = (quantiles: Quantiles): string => `${quantiles.jobId}_quantiles`;

export const modelSnapshotId = (snapshot: ModelSnapshot): string =>
  `${snapshot.jobId}_model_snapshot_${snapshot.snapshotId}`;

export const modelSizeStatsId = (stats: ModelSizeStats): string =>
  `${stats.jobId}_model_size_stats_${stats.logTime.getTime()}`;

/**
 * Resolves the document id of any result variant
 *
 * @returns The id, or `undefined` for an influencer without an explicit id
 */
export const documentIdOf = (document: ResultDocument): string | undefined => {
  switch (document.resultType) {
    case 'bucket':
      return bucketId(document);
    case 'bucket_influencer':
      return bucketInfluencerId(document);
    case 'record':
      return recordId(document);
    case 'influencer':
      return document.id;
    case 'model_plot':
      return modelPlotId(document);
    case 'model_forecast':
      return forecastId(document);
    case 'model_forecast_request_stats':
      return forecastRequestStatsId(document);
    case 'category_definition':
      return categoryDefinitionId(document);
    case 'quantiles':
      return quantilesId(document);
    case 'model_snapshot':
      return modelSnapshotId(document);
    case 'model_size_stats':
      return modelSizeStatsId(document);
    default: {
      const exhaustiveCheck: never = document;
      throw new Error(`Unknown result type: ${String(exhaustiveCheck)}`);
    }
  }
};
