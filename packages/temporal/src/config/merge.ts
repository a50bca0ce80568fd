/**
 * Configuration Merging
 *
 * Combines configuration from several sources; later sources win.
 */

import type { Configuration, PartialConfiguration } from './types.js';

/**
 * Merges a partial configuration into a complete one
 *
 * @param base - Base configuration (typically defaults)
 * @param partial - Values that override the base
 */
export function mergeConfiguration(
  base: Configuration,
  partial: PartialConfiguration
): Configuration {
  return {
    database: partial.database ?? base.database,
    recording: {
      strictScope: partial.recording?.strictScope ?? base.recording.strictScope,
    },
    storage: {
      busyTimeout: partial.storage?.busyTimeout ?? base.storage.busyTimeout,
    },
    identifiers: {
      maxLength: partial.identifiers?.maxLength ?? base.identifiers.maxLength,
    },
  };
}

/**
 * Merges multiple partial configurations in order
 * Later configurations override earlier ones
 */
export function mergeConfigurations(
  base: Configuration,
  ...partials: PartialConfiguration[]
): Configuration {
  let result = base;
  for (const partial of partials) {
    result = mergeConfiguration(result, partial);
  }
  return result;
}

/**
 * Creates a deep clone of a configuration
 */
export function cloneConfiguration(config: Configuration): Configuration {
  return mergeConfiguration(config, {});
}
