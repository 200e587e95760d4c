/**
 * Configuration Module - Re-exports
 *
 * @module config
 */

export { type ResultsPersisterOptions, resolvePersisterConfig, validatePersisterOptions } from './options.js';
