/**
 * Diagnostic handling for result persistence
 *
 * @module error-handler
 *
 * @remarks
 * Persistence failures that must not stop the analysis pipeline (a document
 * that cannot be serialized, items rejected inside a bulk request) are reported
 * as diagnostics rather than thrown. A handler built with
 * {@link createDiagnosticHandler} logs them, ignores them, and forwards them to
 * an optional custom handler.
 *
 * @example
 * ```typescript
 * // Log to console (default)
 * const handler = createDiagnosticHandler('log');
 *
 * // Forward to monitoring, no console output
 * const monitored = createDiagnosticHandler('ignore', (diagnostic) => {
 *   monitoringService.capture(diagnostic);
 * });
 * ```
 */

import { LOG_PREFIX } from '../constants.js';

/**
 * Diagnostic handling strategy
 * - `log`: Log to console
 * - `ignore`: Silent
 */
export type ErrorStrategy = 'log' | 'ignore';

/** A single item rejected by the store inside a bulk request */
export interface BulkItemFailure {
  /** Position of the item in the bulk request */
  position: number;
  id: string;
  target: string;
  cause: string;
}

export interface SerializationFailureDiagnostic {
  kind: 'serialization-failure';
  jobId: string;
  documentId: string | undefined;
  resultType: string;
  error: Error;
}

export interface BulkFailureDiagnostic {
  kind: 'bulk-failure';
  jobId: string;
  target: string;
  failures: BulkItemFailure[];
  message: string;
}

export interface JobMismatchDiagnostic {
  kind: 'job-mismatch';
  jobId: string;
  documentJobId: string;
  resultType: string;
}

export interface ListenerFailureDiagnostic {
  kind: 'listener-failure';
  jobId: string;
  documentId: string | undefined;
  error: Error;
}

export type PersistDiagnostic =
  | SerializationFailureDiagnostic
  | BulkFailureDiagnostic
  | JobMismatchDiagnostic
  | ListenerFailureDiagnostic;

export type DiagnosticHandler = (diagnostic: PersistDiagnostic) => void;

/**
 * Normalizes any thrown value to an Error instance
 */
export const normalizeError = (thrownValue: unknown): Error => {
  if (thrownValue instanceof Error) {
    return thrownValue;
  }
  return new Error(String(thrownValue));
};

const describeDocumentId = (documentId: string | undefined): string => documentId ?? 'auto-generated ID';

/**
 * Formats the first console line for a diagnostic
 *
 * @example
 * ```typescript
 * describeDiagnostic({ kind: 'job-mismatch', jobId: 'a', documentJobId: 'b', resultType: 'record' });
 * // => '[a] Skipping record belonging to job [b]'
 * ```
 */
export const describeDiagnostic = (diagnostic: PersistDiagnostic): string => {
  switch (diagnostic.kind) {
    case 'serialization-failure':
      return `[${diagnostic.jobId}] Error serialising ${diagnostic.resultType} [${describeDocumentId(diagnostic.documentId)}]`;
    case 'bulk-failure':
      return `[${diagnostic.jobId}] Bulk index of results has errors: ${diagnostic.message}`;
    case 'job-mismatch':
      return `[${diagnostic.jobId}] Skipping ${diagnostic.resultType} belonging to job [${diagnostic.documentJobId}]`;
    case 'listener-failure':
      return `[${diagnostic.jobId}] Error in persist listener for [${describeDocumentId(diagnostic.documentId)}]`;
    default: {
      const exhaustiveCheck: never = diagnostic;
      return `Unknown diagnostic: ${JSON.stringify(exhaustiveCheck)}`;
    }
  }
};

const logDiagnosticToConsole = (diagnostic: PersistDiagnostic): void => {
  const line = `${LOG_PREFIX} ${describeDiagnostic(diagnostic)}`;
  if (diagnostic.kind === 'serialization-failure' || diagnostic.kind === 'listener-failure') {
    console.error(`${line}:`, diagnostic.error.message);
    if (diagnostic.error.stack) {
      console.error(diagnostic.error.stack);
    }
    return;
  }
  console.error(line);
};

/**
 * Safely executes a custom diagnostic handler
 *
 * @remarks
 * A throwing handler is logged and swallowed so persistence continues
 */
const executeCustomHandler = (customHandler: DiagnosticHandler, diagnostic: PersistDiagnostic): void => {
  try {
    customHandler(diagnostic);
  } catch (handlerError) {
    console.error(
      `${LOG_PREFIX} Error in custom diagnostic handler:`,
      handlerError instanceof Error ? handlerError.message : String(handlerError),
    );
  }
};

/**
 * Creates a diagnostic handler with the specified strategy
 *
 * @param strategy - Console handling strategy (default: 'log')
 * @param customHandler - Optional handler executed before the strategy is applied
 */
export const createDiagnosticHandler = (
  strategy: ErrorStrategy = 'log',
  customHandler?: DiagnosticHandler,
): DiagnosticHandler => {
  return (diagnostic: PersistDiagnostic): void => {
    if (customHandler) {
      executeCustomHandler(customHandler, diagnostic);
    }

    switch (strategy) {
      case 'log':
        logDiagnosticToConsole(diagnostic);
        break;

      case 'ignore':
        break;

      default: {
        const exhaustiveCheck: never = strategy;
        console.error(`${LOG_PREFIX} Unknown error strategy: ${String(exhaustiveCheck)}`);
      }
    }
  };
};
