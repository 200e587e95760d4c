/**
 * Direct Writer
 *
 * @module writers/direct-writer
 *
 * @remarks
 * Writes one document with an explicit refresh policy. Used for state
 * documents and category definitions, whose visibility timing is independent
 * of bulk result flushing.
 *
 * A document that cannot be serialized is reported as a diagnostic and
 * answered with a synthetic `noop` response. Store errors propagate.
 */

import type { RefreshPolicy } from '../constants.js';
import { RESULT_TYPE_LABELS, STATE_RESULT_TYPES } from '../constants.js';
import type { ResultDocument } from '../domain/result-types.js';
import type { IndexResponse } from '../store/interfaces.js';
import { directLog } from '../utils/debug.js';
import { normalizeError } from '../utils/error-handler.js';
import { trySerialize } from './bulk-accumulator.js';
import type { PersistListener, WriterDependencies } from './types.js';

export interface DirectWriter {
  /**
   * Write a document and wait for the store's response
   *
   * @param id - Document id, or `undefined` to let the store assign one
   */
  persist: (document: ResultDocument, id: string | undefined, refreshPolicy: RefreshPolicy) => Promise<IndexResponse>;
  /**
   * Write a document without waiting; the outcome is delivered to `listener`
   */
  persistAsync: (
    document: ResultDocument,
    id: string | undefined,
    refreshPolicy: RefreshPolicy,
    listener: PersistListener,
  ) => void;
  /** Target index the document is written to */
  targetFor: (document: ResultDocument) => string;
}

const describeId = (id: string | undefined): string => (id === undefined ? 'auto-generated ID' : `ID [${id}]`);

/**
 * Create a direct writer
 *
 * @example
 * ```typescript
 * const writer = createDirectWriter(deps);
 * await writer.persist(quantiles, quantilesId(quantiles), 'none');
 *
 * writer.persistAsync(modelSizeStats, modelSizeStatsId(modelSizeStats), 'wait_until', {
 *   onResponse: (response) => log('stored %s', response.result),
 *   onFailure: (error) => log('failed: %s', error.message),
 * });
 * ```
 */
export const createDirectWriter = (deps: WriterDependencies): DirectWriter => {
  const targetFor = (document: ResultDocument): string => {
    if (STATE_RESULT_TYPES.has(document.resultType)) {
      return deps.naming.stateIndex();
    }
    return deps.naming.resultsWriteAlias(document.jobId);
  };

  const persist = async (
    document: ResultDocument,
    id: string | undefined,
    refreshPolicy: RefreshPolicy,
  ): Promise<IndexResponse> => {
    const target = targetFor(document);
    directLog('[%s] index %s to index %s with %s', document.jobId, document.resultType, target, describeId(id));

    const serialized = trySerialize(deps.serializer, document);
    if (!serialized.success) {
      deps.handleDiagnostic({
        kind: 'serialization-failure',
        jobId: document.jobId,
        documentId: id,
        resultType: RESULT_TYPE_LABELS[document.resultType],
        error: serialized.error,
      });
      return { id, target, result: 'noop' };
    }

    return deps.store.index({ target, id, document: serialized.value, refresh: refreshPolicy });
  };

  const reportListenerFailure = (document: ResultDocument, id: string | undefined, thrownValue: unknown): void => {
    deps.handleDiagnostic({
      kind: 'listener-failure',
      jobId: document.jobId,
      documentId: id,
      error: normalizeError(thrownValue),
    });
  };

  const persistAsync = (
    document: ResultDocument,
    id: string | undefined,
    refreshPolicy: RefreshPolicy,
    listener: PersistListener,
  ): void => {
    void Promise.resolve()
      .then(() => persist(document, id, refreshPolicy))
      .then(
        (response) => listener.onResponse(response),
        (thrownValue: unknown) => listener.onFailure(normalizeError(thrownValue)),
      )
      .catch((thrownValue: unknown) => reportListenerFailure(document, id, thrownValue));
  };

  return { persist, persistAsync, targetFor };
};
