/**
 * Configuration Module
 *
 * Loads store settings from overrides, environment variables, a YAML file
 * and built-in defaults.
 */

export type {
  Configuration,
  PartialConfiguration,
  RecordingConfig,
  StorageSettings,
  IdentifierConfig,
  YamlConfigFile,
  ConfigFileDiscovery,
  EnvVar,
  Environment,
  LoadConfigOptions,
} from './types.js';
export { EnvVars } from './types.js';

export {
  DEFAULT_CONFIG,
  DEFAULT_DATABASE,
  MEMORY_DATABASE,
  MAX_BUSY_TIMEOUT,
  getDefaultConfig,
} from './defaults.js';

export { parseEnvBoolean, parseEnvInteger, getEnvVar, loadEnvConfig, getEnvConfigPath } from './env.js';

export {
  CONFIG_FILE_NAME,
  STRATA_DIR,
  findStrataDir,
  discoverConfigFile,
  parseYamlConfig,
  convertYamlToConfig,
  readConfigFile,
  resolveDatabasePath,
} from './file.js';

export { mergeConfiguration, mergeConfigurations, cloneConfiguration } from './merge.js';

export {
  isValidDatabase,
  isValidBusyTimeout,
  isValidMaxIdentifierLength,
  validateConfiguration,
  validatePartialConfiguration,
} from './validation.js';

export { loadConfig } from './config.js';
