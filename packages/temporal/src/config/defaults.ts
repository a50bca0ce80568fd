/**
 * Default Configuration Values
 */

import { DEFAULT_MAX_IDENTIFIER_LENGTH, DEFAULT_PRAGMAS, MIN_IDENTIFIER_LENGTH } from '@strata/storage';
import type { Configuration } from './types.js';

// ============================================================================
// Constants
// ============================================================================

/** Default database file, relative to the `.strata` directory */
export const DEFAULT_DATABASE = 'strata.db';

/** In-memory database path */
export const MEMORY_DATABASE = ':memory:';

/** Longest busy timeout accepted (1 minute) */
export const MAX_BUSY_TIMEOUT = 60_000;

/** Shortest identifier limit accepted */
export const MIN_MAX_IDENTIFIER_LENGTH = MIN_IDENTIFIER_LENGTH;

// ============================================================================
// Default Configuration
// ============================================================================

/**
 * Built-in defaults
 */
export const DEFAULT_CONFIG: Readonly<Configuration> = Object.freeze({
  database: DEFAULT_DATABASE,
  recording: Object.freeze({
    strictScope: false,
  }),
  storage: Object.freeze({
    busyTimeout: DEFAULT_PRAGMAS.busy_timeout,
  }),
  identifiers: Object.freeze({
    maxLength: DEFAULT_MAX_IDENTIFIER_LENGTH,
  }),
});

/**
 * Returns a mutable copy of the defaults
 */
export function getDefaultConfig(): Configuration {
  return {
    database: DEFAULT_CONFIG.database,
    recording: { ...DEFAULT_CONFIG.recording },
    storage: { ...DEFAULT_CONFIG.storage },
    identifiers: { ...DEFAULT_CONFIG.identifiers },
  };
}
