/**
 * Serialization Utilities for Result Documents
 *
 * Converts result objects to the store's JSON source format: Dates become ISO
 * strings, camelCase keys become snake_case, undefined fields are dropped.
 *
 * @example
 * ```typescript
 * serializeDocument({ resultType: 'quantiles', jobId, timestamp: new Date(0), quantileState: 'q' });
 * // => '{"result_type":"quantiles","job_id":"farequote","timestamp":"1970-01-01T00:00:00.000Z","quantile_state":"q"}'
 * ```
 */

import type { ResultDocument } from '../domain/result-types.js';

const isPlainObject = (value: unknown): value is Record<string, unknown> => {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  if (Array.isArray(value) || value instanceof Date) {
    return false;
  }

  return true;
};

/**
 * Recursively convert Date objects to ISO strings
 *
 * @throws {RangeError} For an invalid Date
 *
 * @example
 * ```typescript
 * convertDatesToISOStrings({ nested: { at: new Date('2025-01-02') } });
 * // => { nested: { at: '2025-01-02T00:00:00.000Z' } }
 * ```
 */
export const convertDatesToISOStrings = (obj: unknown): unknown => {
  if (obj === null || typeof obj !== 'object') {
    return obj;
  }

  if (obj instanceof Date) {
    return obj.toISOString();
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => convertDatesToISOStrings(item));
  }

  if (isPlainObject(obj)) {
    const convertedObj: Record<string, unknown> = {};
    for (const key in obj) {
      if (Object.hasOwn(obj, key)) {
        convertedObj[key] = convertDatesToISOStrings(obj[key]);
      }
    }
    return convertedObj;
  }

  return obj;
};

/**
 * @example
 * ```typescript
 * toSnakeCase('initialAnomalyScore'); // => 'initial_anomaly_score'
 * ```
 */
export const toSnakeCase = (key: string): string => key.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);

/**
 * Recursively rename object keys to snake_case and drop undefined values
 */
export const toSnakeCaseKeys = (obj: unknown): unknown => {
  if (Array.isArray(obj)) {
    return obj.map((item) => toSnakeCaseKeys(item));
  }

  if (isPlainObject(obj)) {
    const convertedObj: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (value !== undefined) {
        convertedObj[toSnakeCase(key)] = toSnakeCaseKeys(value);
      }
    }
    return convertedObj;
  }

  return obj;
};

/** Converts a result document to its serialized JSON source */
export type DocumentSerializer = (document: ResultDocument) => string;

/**
 * Default serializer
 *
 * @throws When the document holds an invalid Date or a value JSON cannot encode (bigint)
 */
export const serializeDocument: DocumentSerializer = (document) => {
  return JSON.stringify(toSnakeCaseKeys(convertDatesToISOStrings(document)));
};
