/**
 * Persister Configuration
 *
 * @module config/options
 */

import { DEFAULTS } from '../constants.js';
import type { DocumentStore } from '../store/interfaces.js';
import type { IndexNaming } from '../store/naming.js';
import { defaultIndexNaming } from '../store/naming.js';
import type { DiagnosticHandler, ErrorStrategy } from '../utils/error-handler.js';
import { createDiagnosticHandler } from '../utils/error-handler.js';
import type { IdGenerator } from '../utils/id-generator.js';
import { defaultIdGenerator, getIdGenerator, ID_GENERATORS } from '../utils/id-generator.js';
import type { DocumentSerializer } from '../utils/serialization.js';
import { serializeDocument } from '../utils/serialization.js';
import type { WriterDependencies } from '../writers/types.js';

export interface ResultsPersisterOptions {
  store: DocumentStore;

  /**
   * Index naming strategy
   * @default defaultIndexNaming
   */
  naming?: IndexNaming;

  /**
   * Pending action count that triggers an implicit bulk flush
   * @default 10000
   */
  bulkLimit?: number;

  /**
   * Console handling of diagnostics
   * @default 'log'
   */
  errorStrategy?: ErrorStrategy;

  /**
   * Receives every diagnostic before the error strategy is applied
   *
   * @example
   * ```typescript
   * onDiagnostic: (diagnostic) => {
   *   if (diagnostic.kind === 'bulk-failure') {
   *     metrics.increment('results.bulk_failures', diagnostic.failures.length);
   *   }
   * }
   * ```
   */
  onDiagnostic?: DiagnosticHandler;

  /** @default serializeDocument */
  serializer?: DocumentSerializer;

  /**
   * Id generator for influencers written without an id, or the name of a
   * built-in strategy (`cuid`, `cuid2`, `uuid`; case-insensitive)
   * @default cuid2
   */
  idGenerator?: IdGenerator | string;
}

const ERROR_STRATEGIES: ReadonlySet<string> = new Set<ErrorStrategy>(['log', 'ignore']);

/**
 * Validates persister options
 *
 * @throws {Error} When a value is out of range
 */
export const validatePersisterOptions = (options: ResultsPersisterOptions): void => {
  if (typeof options.store !== 'object' || options.store === null) {
    throw new Error("Configuration error: 'store' is required.");
  }

  if (options.bulkLimit !== undefined && (!Number.isInteger(options.bulkLimit) || options.bulkLimit < 1)) {
    throw new Error(`Configuration error: 'bulkLimit' must be a positive integer, received ${options.bulkLimit}.`);
  }

  if (options.errorStrategy !== undefined && !ERROR_STRATEGIES.has(options.errorStrategy)) {
    throw new Error(
      `Configuration error: 'errorStrategy' must be one of ${[...ERROR_STRATEGIES].join(', ')}, received ${String(
        options.errorStrategy,
      )}.`,
    );
  }

  if (typeof options.idGenerator === 'string' && !getIdGenerator(options.idGenerator)) {
    throw new Error(
      `Configuration error: 'idGenerator' must be a function or one of ${Object.keys(ID_GENERATORS).join(
        ', ',
      )}, received ${options.idGenerator}.`,
    );
  }
};

const resolveIdGenerator = (idGenerator: IdGenerator | string | undefined): IdGenerator => {
  if (idGenerator === undefined) {
    return defaultIdGenerator;
  }
  if (typeof idGenerator === 'string') {
    return getIdGenerator(idGenerator) ?? defaultIdGenerator;
  }
  return idGenerator;
};

/**
 * Validates options and fills in defaults
 *
 * @example
 * ```typescript
 * const deps = resolvePersisterConfig({ store, bulkLimit: 500 });
 * const writer = createBatchWriter(createJobId('farequote'), deps);
 * ```
 */
export const resolvePersisterConfig = (options: ResultsPersisterOptions): WriterDependencies => {
  validatePersisterOptions(options);

  return {
    store: options.store,
    naming: options.naming ?? defaultIndexNaming,
    bulkLimit: options.bulkLimit ?? DEFAULTS.BULK_LIMIT,
    serializer: options.serializer ?? serializeDocument,
    idGenerator: resolveIdGenerator(options.idGenerator),
    handleDiagnostic: createDiagnosticHandler(options.errorStrategy ?? DEFAULTS.ERROR_STRATEGY, options.onDiagnostic),
  };
};
