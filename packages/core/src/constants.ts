/** Constants and Configuration Values for Result Persistence */

/** Refresh policy for single-document writes */
export type RefreshPolicy = 'none' | 'wait_until' | 'immediate';

/** Refresh policy constants */
export const REFRESH_POLICY = {
  NONE: 'none',
  WAIT_UNTIL: 'wait_until',
  IMMEDIATE: 'immediate',
} as const satisfies Record<string, RefreshPolicy>;

/** Result type discriminator written with every result document */
export type ResultType =
  | 'bucket'
  | 'bucket_influencer'
  | 'record'
  | 'influencer'
  | 'model_plot'
  | 'model_forecast'
  | 'model_forecast_request_stats'
  | 'category_definition'
  | 'quantiles'
  | 'model_snapshot'
  | 'model_size_stats';

/** Result types that live in the state index rather than the job's results index */
export const STATE_RESULT_TYPES: ReadonlySet<ResultType> = new Set<ResultType>([
  'quantiles',
  'model_snapshot',
  'model_size_stats',
]);

/** Human-readable labels used in log lines and diagnostics */
export const RESULT_TYPE_LABELS = {
  bucket: 'bucket',
  bucket_influencer: 'bucket influencer',
  record: 'record',
  influencer: 'influencer',
  model_plot: 'model plot',
  model_forecast: 'forecast',
  model_forecast_request_stats: 'forecast request stats',
  category_definition: 'category definition',
  quantiles: 'quantiles',
  model_snapshot: 'model snapshot',
  model_size_stats: 'model size stats',
} as const satisfies Record<ResultType, string>;

/** Default configuration values for the results persister */
export const DEFAULTS = {
  /** Action count that triggers an implicit bulk flush; shared by the results and renormalization writers */
  BULK_LIMIT: 10_000,
  ERROR_STRATEGY: 'log',
} as const;

/** Log prefix used for console output */
export const LOG_PREFIX = '[anomaly-results]';
