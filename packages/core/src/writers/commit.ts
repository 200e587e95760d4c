/**
 * Commit (refresh) operations
 *
 * Refreshing is expensive, so it is decoupled from the write path and issued
 * once per processing cycle rather than per write.
 *
 * @module writers/commit
 */

import type { JobId } from '../domain/branded-types.js';
import { LENIENT_EXPAND_OPEN } from '../store/interfaces.js';
import { commitLog } from '../utils/debug.js';
import type { WriterDependencies } from './types.js';

export interface Committer {
  /**
   * Make every flushed result of the job visible to readers
   *
   * @remarks
   * Refreshes the read alias, not the write alias: a rollover between the
   * writes and this call leaves earlier results in an index the write alias no
   * longer points at.
   */
  commitResultWrites: (jobId: JobId) => Promise<void>;
  /** Make every state document visible to readers */
  commitStateWrites: (jobId: JobId) => Promise<void>;
}

export const createCommitter = (deps: Pick<WriterDependencies, 'store' | 'naming'>): Committer => {
  const refresh = async (jobId: JobId, target: string): Promise<void> => {
    commitLog('[%s] refresh index %s', jobId, target);
    await deps.store.refresh({ target, ...LENIENT_EXPAND_OPEN });
  };

  return {
    commitResultWrites: (jobId) => refresh(jobId, deps.naming.resultsReadAlias(jobId)),
    commitStateWrites: (jobId) => refresh(jobId, deps.naming.stateIndexPattern()),
  };
};
