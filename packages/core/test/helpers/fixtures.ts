/**
 * Result document factories for tests
 */

import type { ResultsPersisterOptions } from '../../src/config/options.js';
import { resolvePersisterConfig } from '../../src/config/options.js';
import type { JobId } from '../../src/domain/branded-types.js';
import { createJobId } from '../../src/domain/branded-types.js';
import type {
  AnomalyRecord,
  Bucket,
  BucketInfluencer,
  CategoryDefinition,
  Forecast,
  ForecastRequestStats,
  Influencer,
  ModelPlot,
  ModelSizeStats,
  ModelSnapshot,
  Quantiles,
} from '../../src/domain/result-types.js';
import type { InMemoryDocumentStore, InMemoryDocumentStoreOptions } from '../../src/testing/index.js';
import { createInMemoryDocumentStore, createJobAliases } from '../../src/testing/index.js';
import type { PersistDiagnostic } from '../../src/utils/error-handler.js';
import type { WriterDependencies } from '../../src/writers/types.js';

export const JOB_ID: JobId = createJobId('job-1');
export const OTHER_JOB_ID: JobId = createJobId('job-2');
/** 2024-01-01T00:00:00.000Z */
export const BUCKET_TIME = new Date('2024-01-01T00:00:00.000Z');
export const BUCKET_TIME_MS = 1704067200000;
export const BUCKET_SPAN = 300;

export const createMockBucketInfluencer = (overrides: Partial<BucketInfluencer> = {}): BucketInfluencer => ({
  resultType: 'bucket_influencer',
  jobId: JOB_ID,
  timestamp: BUCKET_TIME,
  bucketSpan: BUCKET_SPAN,
  influencerFieldName: 'bucket_time',
  initialAnomalyScore: 12.5,
  anomalyScore: 12.5,
  rawAnomalyScore: 0.8,
  probability: 0.01,
  isInterim: false,
  ...overrides,
});

export const createMockRecord = (overrides: Partial<AnomalyRecord> = {}): AnomalyRecord => ({
  resultType: 'record',
  jobId: JOB_ID,
  timestamp: BUCKET_TIME,
  bucketSpan: BUCKET_SPAN,
  detectorIndex: 0,
  sequenceNum: 1,
  probability: 0.001,
  recordScore: 80,
  initialRecordScore: 80,
  isInterim: false,
  functionName: 'mean',
  fieldName: 'responsetime',
  actual: [250],
  typical: [100],
  ...overrides,
});

export const createMockBucket = (overrides: Partial<Bucket> = {}): Bucket => ({
  resultType: 'bucket',
  jobId: JOB_ID,
  timestamp: BUCKET_TIME,
  bucketSpan: BUCKET_SPAN,
  anomalyScore: 42,
  initialAnomalyScore: 42,
  eventCount: 120,
  isInterim: false,
  processingTimeMs: 3,
  records: [],
  bucketInfluencers: [],
  ...overrides,
});

export function createMockInfluencer(overrides: Partial<Influencer> & { id: string }): Influencer & { id: string };
export function createMockInfluencer(overrides?: Partial<Influencer>): Influencer;
export function createMockInfluencer(overrides: Partial<Influencer> = {}): Influencer {
  return {
    resultType: 'influencer',
    jobId: JOB_ID,
    timestamp: BUCKET_TIME,
    bucketSpan: BUCKET_SPAN,
    influencerFieldName: 'host',
    influencerFieldValue: 'web-01',
    probability: 0.02,
    influencerScore: 30,
    initialInfluencerScore: 30,
    isInterim: false,
    ...overrides,
  };
}

export const createMockModelPlot = (overrides: Partial<ModelPlot> = {}): ModelPlot => ({
  resultType: 'model_plot',
  jobId: JOB_ID,
  timestamp: BUCKET_TIME,
  bucketSpan: BUCKET_SPAN,
  detectorIndex: 0,
  modelLower: 10,
  modelUpper: 90,
  modelMedian: 50,
  ...overrides,
});

export const createMockForecast = (overrides: Partial<Forecast> = {}): Forecast => ({
  resultType: 'model_forecast',
  jobId: JOB_ID,
  forecastId: 'fc-1',
  timestamp: BUCKET_TIME,
  bucketSpan: BUCKET_SPAN,
  detectorIndex: 0,
  forecastLower: 5,
  forecastUpper: 95,
  forecastPrediction: 50,
  ...overrides,
});

export const createMockForecastRequestStats = (overrides: Partial<ForecastRequestStats> = {}): ForecastRequestStats => ({
  resultType: 'model_forecast_request_stats',
  jobId: JOB_ID,
  forecastId: 'fc-1',
  recordCount: 24,
  messages: [],
  timestamp: BUCKET_TIME,
  startTime: BUCKET_TIME,
  endTime: new Date('2024-01-02T00:00:00.000Z'),
  expiryTime: new Date('2024-01-15T00:00:00.000Z'),
  progress: 1,
  processingTimeMs: 40,
  memoryUsage: 2048,
  status: 'finished',
  ...overrides,
});

export const createMockCategoryDefinition = (overrides: Partial<CategoryDefinition> = {}): CategoryDefinition => ({
  resultType: 'category_definition',
  jobId: JOB_ID,
  categoryId: 7,
  terms: 'connection refused',
  regex: '.*?connection.+?refused.*',
  maxMatchingLength: 64,
  examples: ['connection refused by upstream'],
  ...overrides,
});

export const createMockQuantiles = (overrides: Partial<Quantiles> = {}): Quantiles => ({
  resultType: 'quantiles',
  jobId: JOB_ID,
  timestamp: BUCKET_TIME,
  quantileState: 'quantile-state',
  ...overrides,
});

export const createMockModelSizeStats = (overrides: Partial<ModelSizeStats> = {}): ModelSizeStats => ({
  resultType: 'model_size_stats',
  jobId: JOB_ID,
  modelBytes: 65536,
  totalByFieldCount: 3,
  totalOverFieldCount: 0,
  totalPartitionFieldCount: 2,
  bucketAllocationFailuresCount: 0,
  memoryStatus: 'ok',
  logTime: BUCKET_TIME,
  ...overrides,
});

export const createMockModelSnapshot = (overrides: Partial<ModelSnapshot> = {}): ModelSnapshot => ({
  resultType: 'model_snapshot',
  jobId: JOB_ID,
  snapshotId: '1704067200',
  timestamp: BUCKET_TIME,
  description: 'State persisted due to job close',
  snapshotDocCount: 1,
  retain: false,
  ...overrides,
});

/** Job-1 store whose write and read aliases share one physical index */
export const createJobStore = (
  options: Pick<InMemoryDocumentStoreOptions, 'rejectItem'> = {},
): InMemoryDocumentStore => {
  const aliases = createJobAliases(JOB_ID);
  return createInMemoryDocumentStore({ ...aliases, rejectItem: options.rejectItem });
};

export interface TestDependencies {
  deps: WriterDependencies;
  diagnostics: PersistDiagnostic[];
}

/**
 * Resolve writer dependencies with console output silenced and diagnostics collected
 */
export const createTestDependencies = (
  options: Omit<ResultsPersisterOptions, 'errorStrategy' | 'onDiagnostic'>,
): TestDependencies => {
  const diagnostics: PersistDiagnostic[] = [];
  const deps = resolvePersisterConfig({
    ...options,
    errorStrategy: 'ignore',
    onDiagnostic: (diagnostic) => {
      diagnostics.push(diagnostic);
    },
  });
  return { deps, diagnostics };
};

/** Wait for queued microtasks and timers to settle */
export const waitForAsync = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 10));
