/**
 * Index naming strategy
 *
 * Results are written through a per-job write alias and read (and refreshed)
 * through a per-job read alias. After a rollover the write alias points at a
 * new physical index while the read alias spans all of them.
 *
 * @module store/naming
 */

import type { JobId } from '../domain/branded-types.js';

export interface IndexNaming {
  resultsWriteAlias: (jobId: JobId) => string;
  resultsReadAlias: (jobId: JobId) => string;
  /** Index that state documents are written to */
  stateIndex: () => string;
  /** Pattern matching every state index */
  stateIndexPattern: () => string;
}

export const RESULTS_INDEX_PREFIX = 'anomaly-results-';
export const STATE_INDEX = 'anomaly-state';

export const defaultIndexNaming: IndexNaming = {
  resultsWriteAlias: (jobId) => `${RESULTS_INDEX_PREFIX}write-${jobId}`,
  resultsReadAlias: (jobId) => `${RESULTS_INDEX_PREFIX}${jobId}`,
  stateIndex: () => STATE_INDEX,
  stateIndexPattern: () => `${STATE_INDEX}*`,
};
