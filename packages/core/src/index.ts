/**
 * @strata/core
 *
 * Values, policies, records and errors shared by the storage and temporal
 * packages.
 */

// Types - values, timestamps, temporal policies and records
export * from './types/index.js';

// Errors - structured error handling
export * from './errors/index.js';
