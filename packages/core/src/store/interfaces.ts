/**
 * Document Store Interfaces
 *
 * The store is an external collaborator. Implementations adapt a concrete
 * client (search engine, document database) to these request shapes.
 *
 * @module store/interfaces
 */

import type { RefreshPolicy } from '../constants.js';

/** Options controlling how a target name expands to physical indices */
export interface TargetOptions {
  /** Skip missing or closed indices instead of failing */
  ignoreUnavailable: boolean;
  /** Succeed when a wildcard or alias resolves to no index */
  allowNoIndices: boolean;
  expandWildcards: 'open' | 'all' | 'none';
}

/** One upsert-by-id inside a bulk request */
export interface BulkOperation {
  target: string;
  id: string;
  /** Serialized JSON document */
  document: string;
}

export interface BulkRequest {
  operations: BulkOperation[];
}

export interface BulkItemError {
  type: string;
  reason: string;
}

export interface BulkItemResponse {
  id: string;
  target: string;
  status?: 'created' | 'updated';
  error?: BulkItemError;
}

/**
 * Bulk response
 *
 * `items` follow request order. A failed item does not abort the others.
 */
export interface BulkResponse {
  items: BulkItemResponse[];
}

export interface IndexRequest {
  target: string;
  /** Omit to let the store assign an id */
  id?: string;
  document: string;
  refresh: RefreshPolicy;
}

export type IndexResult = 'created' | 'updated' | 'noop';

export interface IndexResponse {
  id: string | undefined;
  target: string;
  result: IndexResult;
}

export interface RefreshRequest extends TargetOptions {
  /** Index, alias or wildcard pattern */
  target: string;
}

export interface DeleteByQueryRequest extends TargetOptions {
  target: string;
  /** Exact-match terms on stored (snake_case) fields */
  match: Record<string, string | number | boolean>;
  /** Make the deletions visible before resolving */
  refresh: boolean;
}

export interface DeleteByQueryResponse {
  deleted: number;
}

/**
 * Document store interface
 *
 * @example
 * ```typescript
 * const store: DocumentStore = {
 *   bulk: async ({ operations }) => client.bulk(toBulkBody(operations)).then(fromBulkResponse),
 *   index: async (request) => client.index(toIndexParams(request)).then(fromIndexResponse),
 *   refresh: async (request) => { await client.indices.refresh(toRefreshParams(request)); },
 *   deleteByQuery: async (request) => client.deleteByQuery(toDeleteParams(request)),
 * };
 * ```
 */
export interface DocumentStore {
  bulk: (request: BulkRequest) => Promise<BulkResponse>;
  index: (request: IndexRequest) => Promise<IndexResponse>;
  refresh: (request: RefreshRequest) => Promise<void>;
  deleteByQuery: (request: DeleteByQueryRequest) => Promise<DeleteByQueryResponse>;
}

/** Open indices only, tolerant of missing and closed ones */
export const LENIENT_EXPAND_OPEN: TargetOptions = {
  ignoreUnavailable: true,
  allowNoIndices: true,
  expandWildcards: 'open',
};
