/**
 * Debug logging utilities using the `debug` package
 *
 * Enable logging by setting the DEBUG environment variable.
 *
 * @example Environment variable configuration
 * ```bash
 * # Enable all persistence logs
 * DEBUG=anomaly-results:* node app.js
 *
 * # Enable specific namespaces
 * DEBUG=anomaly-results:bulk npm test
 * DEBUG=anomaly-results:commit npm start
 * ```
 */

import type { Debugger } from 'debug';
import debug from 'debug';

/**
 * Debug logger for bulk result writes
 */
export const bulkLog: Debugger = debug('anomaly-results:bulk');

/**
 * Debug logger for single-document writes
 */
export const directLog: Debugger = debug('anomaly-results:direct');

/**
 * Debug logger for refresh and delete calls
 */
export const commitLog: Debugger = debug('anomaly-results:commit');

/**
 * Debug logger for renormalized result updates
 */
export const renormalizeLog: Debugger = debug('anomaly-results:renormalize');
