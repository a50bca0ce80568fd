/**
 * Configuration Type Definitions
 *
 * Settings for opening a temporal store: where the database lives, how
 * strictly recording scopes are enforced, and storage limits.
 */

// ============================================================================
// Configuration Interfaces
// ============================================================================

/**
 * Recording behaviour
 */
export interface RecordingConfig {
  /** Treat every policy as scope-required */
  strictScope: boolean;
}

/**
 * SQLite connection settings
 */
export interface StorageSettings {
  /** Milliseconds to wait on a locked database before failing */
  busyTimeout: number;
}

/**
 * Derived table naming
 */
export interface IdentifierConfig {
  /** Longest table or column name emitted; longer names are truncated with a hash suffix */
  maxLength: number;
}

/**
 * Complete configuration
 */
export interface Configuration {
  /** Database path, or `:memory:` */
  database: string;
  recording: RecordingConfig;
  storage: StorageSettings;
  identifiers: IdentifierConfig;
}

/**
 * Partial configuration, as read from one source
 */
export interface PartialConfiguration {
  database?: string;
  recording?: Partial<RecordingConfig>;
  storage?: Partial<StorageSettings>;
  identifiers?: Partial<IdentifierConfig>;
}

// ============================================================================
// YAML File Structure
// ============================================================================

/**
 * Configuration file layout (snake_case keys)
 */
export interface YamlConfigFile {
  database?: string;
  recording?: {
    strict_scope?: boolean;
  };
  storage?: {
    busy_timeout?: number;
  };
  identifiers?: {
    max_length?: number;
  };
}

/**
 * Result of looking for a configuration file
 */
export interface ConfigFileDiscovery {
  /** Path that was checked */
  path: string;
  exists: boolean;
  /** The `.strata` directory containing the file, if any */
  strataDir?: string;
}

// ============================================================================
// Environment Variables
// ============================================================================

/**
 * Environment variables read by loadEnvConfig
 */
export const EnvVars = {
  DATABASE: 'STRATA_DATABASE',
  STRICT_SCOPE: 'STRATA_STRICT_SCOPE',
  BUSY_TIMEOUT: 'STRATA_BUSY_TIMEOUT',
  CONFIG: 'STRATA_CONFIG',
} as const;

export type EnvVar = (typeof EnvVars)[keyof typeof EnvVars];

/**
 * Environment lookup; defaults to process.env
 */
export type Environment = Readonly<Record<string, string | undefined>>;

// ============================================================================
// Loading Options
// ============================================================================

/**
 * Options for loadConfig
 */
export interface LoadConfigOptions {
  /** Explicit config file path (takes precedence over STRATA_CONFIG and discovery) */
  configPath?: string;
  /** Directory to start file discovery from (default: cwd) */
  startDir?: string;
  /** Ignore environment variables */
  skipEnv?: boolean;
  /** Ignore the config file */
  skipFile?: boolean;
  /** Highest-precedence values */
  overrides?: PartialConfiguration;
  /** Environment to read instead of process.env */
  env?: Environment;
}
