/**
 * Document Id Tests
 */

import { describe, expect, it } from 'vitest';
import {
  bucketId,
  bucketInfluencerId,
  categoryDefinitionId,
  documentIdOf,
  forecastId,
  forecastRequestStatsId,
  hashFieldValues,
  modelPlotId,
  modelSizeStatsId,
  modelSnapshotId,
  quantilesId,
  recordId,
} from '../../src/domain/document-ids.js';
import {
  createMockBucket,
  createMockBucketInfluencer,
  createMockCategoryDefinition,
  createMockForecast,
  createMockForecastRequestStats,
  createMockInfluencer,
  createMockModelPlot,
  createMockModelSizeStats,
  createMockModelSnapshot,
  createMockQuantiles,
  createMockRecord,
} from '../helpers/fixtures.js';

describe('hashFieldValues', () => {
  it('should hash a single value like a 31-multiplier string hash', () => {
    expect(hashFieldValues('a')).toBe('97');
    expect(hashFieldValues('ab')).toBe('3105');
  });

  it('should combine value hashes in order', () => {
    expect(hashFieldValues('a', 'b')).toBe('3105');
    expect(hashFieldValues('a', undefined, undefined)).toBe('93217');
  });

  it('should hash absent values as empty strings', () => {
    expect(hashFieldValues(undefined, undefined, undefined)).toBe('0');
    expect(hashFieldValues('', '', '')).toBe('0');
  });

  it('should render overflowing hashes as unsigned decimals', () => {
    const hash = hashFieldValues('a-rather-long-partition-field-value');
    expect(hash).toMatch(/^\d+$/);
    expect(Number(hash)).toBeLessThan(2 ** 32);
  });

  it('should be deterministic', () => {
    expect(hashFieldValues('host', 'web-01', 'eu')).toBe(hashFieldValues('host', 'web-01', 'eu'));
  });
});

describe('document ids', () => {
  it('should build the bucket id from job, time and span', () => {
    expect(bucketId(createMockBucket())).toBe('job-1_bucket_1704067200000_300');
  });

  it('should build the bucket influencer id with the field name', () => {
    expect(bucketInfluencerId(createMockBucketInfluencer({ influencerFieldName: 'host' }))).toBe(
      'job-1_bucket_influencer_1704067200000_300_host',
    );
  });

  it('should build the record id with detector, partition hash and sequence number', () => {
    expect(recordId(createMockRecord())).toBe('job-1_record_1704067200000_300_0_0_1');
    expect(recordId(createMockRecord({ byFieldValue: 'a', sequenceNum: 4, detectorIndex: 2 }))).toBe(
      'job-1_record_1704067200000_300_2_93217_4',
    );
  });

  it('should give records that differ only in partition values different ids', () => {
    const first = recordId(createMockRecord({ partitionFieldValue: 'eu' }));
    const second = recordId(createMockRecord({ partitionFieldValue: 'us' }));
    expect(first).not.toBe(second);
  });

  it('should build model plot and forecast ids', () => {
    expect(modelPlotId(createMockModelPlot())).toBe('job-1_model_plot_1704067200000_300_0_0');
    expect(forecastId(createMockForecast())).toBe('job-1_model_forecast_fc-1_1704067200000_300_0_0');
    expect(forecastRequestStatsId(createMockForecastRequestStats())).toBe('job-1_model_forecast_request_stats_fc-1');
  });

  it('should build state and category ids', () => {
    expect(categoryDefinitionId(createMockCategoryDefinition())).toBe('job-1_category_definition_7');
    expect(quantilesId(createMockQuantiles())).toBe('job-1_quantiles');
    expect(modelSnapshotId(createMockModelSnapshot())).toBe('job-1_model_snapshot_1704067200');
    expect(modelSizeStatsId(createMockModelSizeStats())).toBe('job-1_model_size_stats_1704067200000');
  });

  describe('documentIdOf', () => {
    it('should dispatch on the result type', () => {
      expect(documentIdOf(createMockBucket())).toBe('job-1_bucket_1704067200000_300');
      expect(documentIdOf(createMockQuantiles())).toBe('job-1_quantiles');
      expect(documentIdOf(createMockRecord())).toBe('job-1_record_1704067200000_300_0_0_1');
    });

    it('should return the explicit influencer id or undefined', () => {
      expect(documentIdOf(createMockInfluencer({ id: 'influencer-1' }))).toBe('influencer-1');
      expect(documentIdOf(createMockInfluencer())).toBeUndefined();
    });
  });
});
