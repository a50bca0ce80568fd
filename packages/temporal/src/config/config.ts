/**
 * Configuration Loading
 *
 * Implements the precedence hierarchy: overrides > environment > file > defaults
 */

import * as path from 'node:path';
import type { Configuration, LoadConfigOptions } from './types.js';
import { DEFAULT_DATABASE, getDefaultConfig } from './defaults.js';
import { mergeConfiguration } from './merge.js';
import { validateConfiguration, validatePartialConfiguration } from './validation.js';
import { discoverConfigFile, readConfigFile } from './file.js';
import { getEnvConfigPath, loadEnvConfig } from './env.js';

/**
 * Loads configuration with full precedence chain
 *
 * Precedence (highest to lowest):
 * 1. Overrides (if provided)
 * 2. Environment variables
 * 3. Config file (explicit path, STRATA_CONFIG, or `.strata/config.yaml` found by walking up)
 * 4. Built-in defaults
 *
 * When a `.strata` directory is found, the default database lives inside it.
 *
 * @throws ValidationError if any source holds an invalid value
 */
export function loadConfig(options: LoadConfigOptions = {}): Configuration {
  const env = options.env ?? process.env;
  let config = getDefaultConfig();

  if (!options.skipFile) {
    const envConfigPath = options.skipEnv ? undefined : getEnvConfigPath(env);
    const discovery = discoverConfigFile(options.configPath ?? envConfigPath, options.startDir);
    if (discovery?.strataDir) {
      config.database = path.join(discovery.strataDir, DEFAULT_DATABASE);
    }
    if (discovery?.exists) {
      const fileConfig = readConfigFile(discovery.path);
      validatePartialConfiguration(fileConfig);
      config = mergeConfiguration(config, fileConfig);
    }
  }

  if (!options.skipEnv) {
    const envConfig = loadEnvConfig(env);
    validatePartialConfiguration(envConfig);
    config = mergeConfiguration(config, envConfig);
  }

  if (options.overrides) {
    validatePartialConfiguration(options.overrides);
    config = mergeConfiguration(config, options.overrides);
  }

  return validateConfiguration(config);
}
