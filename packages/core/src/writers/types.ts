/**
 * Writer Type Definitions
 *
 * @module writers/types
 */

import type { DocumentStore, IndexResponse } from '../store/interfaces.js';
import type { IndexNaming } from '../store/naming.js';
import type { BulkItemFailure, DiagnosticHandler } from '../utils/error-handler.js';
import type { IdGenerator } from '../utils/id-generator.js';
import type { DocumentSerializer } from '../utils/serialization.js';

/** Collaborators shared by every writer, resolved once from the persister options */
export interface WriterDependencies {
  store: DocumentStore;
  naming: IndexNaming;
  /** Pending action count that triggers an implicit flush */
  bulkLimit: number;
  serializer: DocumentSerializer;
  idGenerator: IdGenerator;
  handleDiagnostic: DiagnosticHandler;
}

/** A document skipped because it could not be serialized */
export interface DroppedDocument {
  id: string | undefined;
  resultType: string;
  error: Error;
}

export interface SkippedFlush {
  _tag: 'Skipped';
  reason: string;
  /** Item failures of implicit flushes since the previous explicit flush */
  failures: BulkItemFailure[];
  dropped: DroppedDocument[];
  createdAt: Date;
}

export interface CompletedFlush {
  _tag: 'Flushed';
  /** Number of actions sent in the bulk request */
  actions: number;
  /** Item failures of this request and of implicit flushes since the previous explicit flush */
  failures: BulkItemFailure[];
  dropped: DroppedDocument[];
  createdAt: Date;
}

/**
 * Flush outcome ADT
 *
 * @example
 * ```typescript
 * const outcome = await writer.flush();
 *
 * switch (outcome._tag) {
 *   case 'Skipped':
 *     break;
 *   case 'Flushed':
 *     if (outcome.failures.length > 0) {
 *       markDegraded(outcome.failures);
 *     }
 *     break;
 * }
 * ```
 */
export type FlushOutcome = SkippedFlush | CompletedFlush;

/**
 * Completion listener for non-blocking single writes
 *
 * Invoked on a later tick, never on the caller's stack.
 */
export interface PersistListener {
  onResponse: (response: IndexResponse) => void;
  onFailure: (error: Error) => void;
}
