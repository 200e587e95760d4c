/**
 * Bulk accumulation shared by the results and renormalization writers
 *
 * @module writers/bulk-accumulator
 *
 * @remarks
 * Serialization failures drop the single document and are reported as
 * diagnostics. Items the store rejects inside a bulk request are reported and
 * never retried. The batch is reset before the store is called, so it is empty
 * after every flush whatever the store answers.
 *
 * Drops and item failures of implicit flushes are kept and returned by the
 * next explicit {@link BulkAccumulator.flush}, together with its own.
 */

import type { Debugger } from 'debug';
import type { JobId } from '../domain/branded-types.js';
import type { ResultDocument } from '../domain/result-types.js';
import type { BulkOperation, BulkResponse } from '../store/interfaces.js';
import type { BulkItemFailure } from '../utils/error-handler.js';
import { normalizeError } from '../utils/error-handler.js';
import type { DocumentSerializer } from '../utils/serialization.js';
import type { DroppedDocument, FlushOutcome, WriterDependencies } from './types.js';
import { createWriteBatch } from './write-batch.js';

export interface BulkAccumulator {
  /**
   * Serializes and queues one document, flushing once the bulk limit is reached
   */
  append: (target: string, id: string, document: ResultDocument, resultTypeLabel: string) => Promise<void>;
  /** Send pending actions; the outcome covers everything since the previous explicit flush */
  flush: () => Promise<FlushOutcome>;
  numberOfActions: () => number;
}

type SerializeResult = { success: true; value: string } | { success: false; error: Error };

export const trySerialize = (serializer: DocumentSerializer, document: ResultDocument): SerializeResult => {
  try {
    return { success: true, value: serializer(document) };
  } catch (thrownValue: unknown) {
    return { success: false, error: normalizeError(thrownValue) };
  }
};

/**
 * Collects the rejected items of a bulk response
 */
export const collectBulkFailures = (operations: BulkOperation[], response: BulkResponse): BulkItemFailure[] => {
  const failures: BulkItemFailure[] = [];
  response.items.forEach((item, position) => {
    if (!item.error) {
      return;
    }
    const operation = operations[position];
    failures.push({
      position,
      id: item.id || operation?.id || '',
      target: item.target || operation?.target || '',
      cause: `${item.error.type}: ${item.error.reason}`,
    });
  });
  return failures;
};

/**
 * @example
 * ```typescript
 * buildFailureMessage([{ position: 0, id: 'a', target: 'results', cause: 'mapper_parsing_exception: bad' }]);
 * // => 'failure in bulk execution:\n[0]: index [results], id [a], message [mapper_parsing_exception: bad]'
 * ```
 */
export const buildFailureMessage = (failures: BulkItemFailure[]): string => {
  const lines = failures.map(
    (failure) => `[${failure.position}]: index [${failure.target}], id [${failure.id}], message [${failure.cause}]`,
  );
  return ['failure in bulk execution:', ...lines].join('\n');
};

/**
 * @param target - Target reported with bulk failures; the write alias, or the read alias for renormalized updates
 */
export const createBulkAccumulator = (
  jobId: JobId,
  target: string,
  deps: WriterDependencies,
  log: Debugger,
): BulkAccumulator => {
  const batch = createWriteBatch();
  let dropped: DroppedDocument[] = [];
  let failures: BulkItemFailure[] = [];

  const takeReported = (): { dropped: DroppedDocument[]; failures: BulkItemFailure[] } => {
    const reported = { dropped, failures };
    dropped = [];
    failures = [];
    return reported;
  };

  const sendPending = async (): Promise<number> => {
    const operations = batch.drain();
    log('[%s] bulk request with %d actions', jobId, operations.length);

    const response = await deps.store.bulk({ operations });
    const itemFailures = collectBulkFailures(operations, response);

    if (itemFailures.length > 0) {
      failures.push(...itemFailures);
      deps.handleDiagnostic({
        kind: 'bulk-failure',
        jobId,
        target,
        failures: itemFailures,
        message: buildFailureMessage(itemFailures),
      });
    }
    return operations.length;
  };

  const flush = async (): Promise<FlushOutcome> => {
    if (batch.numberOfActions() === 0) {
      return {
        _tag: 'Skipped',
        reason: 'no pending actions',
        ...takeReported(),
        createdAt: new Date(),
      };
    }

    const actions = await sendPending();
    return {
      _tag: 'Flushed',
      actions,
      ...takeReported(),
      createdAt: new Date(),
    };
  };

  const append = async (
    documentTarget: string,
    id: string,
    document: ResultDocument,
    resultTypeLabel: string,
  ): Promise<void> => {
    const serialized = trySerialize(deps.serializer, document);

    if (serialized.success) {
      log('[%s] bulk action: index %s to index [%s] with ID [%s]', jobId, resultTypeLabel, documentTarget, id);
      batch.add({ target: documentTarget, id, document: serialized.value });
    } else {
      dropped.push({ id, resultType: document.resultType, error: serialized.error });
      deps.handleDiagnostic({
        kind: 'serialization-failure',
        jobId,
        documentId: id,
        resultType: resultTypeLabel,
        error: serialized.error,
      });
    }

    if (batch.numberOfActions() >= deps.bulkLimit) {
      await sendPending();
    }
  };

  return {
    append,
    flush,
    numberOfActions: () => batch.numberOfActions(),
  };
};
