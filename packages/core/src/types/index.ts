/**
 * Strata Type Definitions
 */

export * from './value.js';
export * from './timestamp.js';
export * from './policy.js';
export * from './record.js';
