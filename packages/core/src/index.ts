/** @anomaly-results/core - Bulk persistence of anomaly analysis results to a document store */

// Config
export type { ResultsPersisterOptions } from './config/index.js';
export { resolvePersisterConfig, validatePersisterOptions } from './config/index.js';
// Constants
export type { RefreshPolicy, ResultType } from './constants.js';
export { DEFAULTS, REFRESH_POLICY, RESULT_TYPE_LABELS, STATE_RESULT_TYPES } from './constants.js';
// Domain - Branded Types
export type { JobId } from './domain/branded-types.js';
export { createJobId, IdValidationError } from './domain/branded-types.js';
// Domain - Document Ids
export {
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
} from './domain/document-ids.js';
// Domain - Result Types
export type {
  AnomalyCauseInfluence,
  AnomalyRecord,
  BatchResultDocument,
  Bucket,
  BucketInfluencer,
  CategoryDefinition,
  DirectResultDocument,
  Forecast,
  ForecastRequestStats,
  ForecastRequestStatus,
  Influencer,
  MemoryStatus,
  ModelPlot,
  ModelSizeStats,
  ModelSnapshot,
  PartitioningFields,
  Quantiles,
  ResultDocument,
} from './domain/result-types.js';
export { withoutRecords } from './domain/result-types.js';
// Persister
export type { ResultsPersister } from './persister.js';
export { createResultsPersister } from './persister.js';
// Store
export type {
  BulkItemError,
  BulkItemResponse,
  BulkOperation,
  BulkRequest,
  BulkResponse,
  DeleteByQueryRequest,
  DeleteByQueryResponse,
  DocumentStore,
  IndexRequest,
  IndexResponse,
  IndexResult,
  RefreshRequest,
  TargetOptions,
} from './store/interfaces.js';
export { LENIENT_EXPAND_OPEN } from './store/interfaces.js';
export type { IndexNaming } from './store/naming.js';
export { defaultIndexNaming, RESULTS_INDEX_PREFIX, STATE_INDEX } from './store/naming.js';
// Utils - Debug
export { bulkLog, commitLog, directLog, renormalizeLog } from './utils/debug.js';
// Utils - Error Handler
export type {
  BulkFailureDiagnostic,
  BulkItemFailure,
  DiagnosticHandler,
  ErrorStrategy,
  JobMismatchDiagnostic,
  ListenerFailureDiagnostic,
  PersistDiagnostic,
  SerializationFailureDiagnostic,
} from './utils/error-handler.js';
export { createDiagnosticHandler, describeDiagnostic, normalizeError } from './utils/error-handler.js';
// Utils - ID Generator
export type { IdGenerator } from './utils/id-generator.js';
export { defaultIdGenerator, getIdGenerator, ID_GENERATORS } from './utils/id-generator.js';
// Utils - Serialization
export type { DocumentSerializer } from './utils/serialization.js';
export { convertDatesToISOStrings, serializeDocument, toSnakeCase, toSnakeCaseKeys } from './utils/serialization.js';
// Writers
export type {
  BatchWriter,
  BulkAccumulator,
  Committer,
  CompletedFlush,
  DirectWriter,
  DroppedDocument,
  FlushOutcome,
  IdentifiedInfluencer,
  Normalizable,
  PersistListener,
  RenormalizableDocument,
  RenormalizedResultsWriter,
  SkippedFlush,
  WriteBatch,
  WriterDependencies,
} from './writers/index.js';
export {
  buildFailureMessage,
  collectBulkFailures,
  createBatchWriter,
  createBulkAccumulator,
  createCommitter,
  createDirectWriter,
  createRenormalizedResultsWriter,
  createWriteBatch,
  deleteInterimResults,
} from './writers/index.js';
