/**
 * Interim result deletion
 *
 * Interim results are provisional scores for a bucket that has not closed yet.
 * They are replaced by final results and deleted before the next cycle writes.
 *
 * @module writers/interim-results
 */

import type { JobId } from '../domain/branded-types.js';
import { LENIENT_EXPAND_OPEN } from '../store/interfaces.js';
import { commitLog } from '../utils/debug.js';
import type { WriterDependencies } from './types.js';

/**
 * Delete every interim result of the job and wait until the deletion is visible
 *
 * @returns Number of deleted documents
 */
export const deleteInterimResults = async (
  jobId: JobId,
  deps: Pick<WriterDependencies, 'store' | 'naming'>,
): Promise<number> => {
  const target = deps.naming.resultsReadAlias(jobId);
  commitLog('[%s] delete interim results from index %s', jobId, target);

  const response = await deps.store.deleteByQuery({
    target,
    match: { job_id: jobId, is_interim: true },
    refresh: true,
    ...LENIENT_EXPAND_OPEN,
  });

  commitLog('[%s] deleted %d interim results', jobId, response.deleted);
  return response.deleted;
};
