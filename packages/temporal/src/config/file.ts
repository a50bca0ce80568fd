/**
 * Configuration File Loading
 *
 * Handles YAML configuration file parsing and discovery.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as yaml from 'yaml';
import { ErrorCode, ValidationError } from '@strata/core';
import type { ConfigFileDiscovery, PartialConfiguration, YamlConfigFile } from './types.js';

// ============================================================================
// Constants
// ============================================================================

/** Default config file name */
export const CONFIG_FILE_NAME = 'config.yaml';

/** Project directory holding the config file and default database */
export const STRATA_DIR = '.strata';

// ============================================================================
// File Discovery
// ============================================================================

function isDirectory(candidate: string): boolean {
  return fs.existsSync(candidate) && fs.statSync(candidate).isDirectory();
}

/**
 * Finds the nearest .strata directory by walking up from the given directory
 *
 * @returns Path to the .strata directory, or undefined if not found
 */
export function findStrataDir(startDir: string): string | undefined {
  let currentDir = path.resolve(startDir);
  const root = path.parse(currentDir).root;

  while (currentDir !== root) {
    const candidate = path.join(currentDir, STRATA_DIR);
    if (isDirectory(candidate)) {
      return candidate;
    }
    currentDir = path.dirname(currentDir);
  }

  const rootCandidate = path.join(root, STRATA_DIR);
  return isDirectory(rootCandidate) ? rootCandidate : undefined;
}

/**
 * Discovers the configuration file location
 *
 * @param overridePath - Explicit path to use instead of discovery
 * @param startDir - Directory to start searching from (default: cwd)
 * @returns Discovery result, or undefined when no .strata directory exists
 */
export function discoverConfigFile(
  overridePath?: string,
  startDir: string = process.cwd()
): ConfigFileDiscovery | undefined {
  if (overridePath) {
    const resolvedPath = path.resolve(startDir, overridePath);
    return {
      path: resolvedPath,
      exists: fs.existsSync(resolvedPath),
    };
  }

  const strataDir = findStrataDir(startDir);
  if (!strataDir) {
    return undefined;
  }
  const configPath = path.join(strataDir, CONFIG_FILE_NAME);
  return {
    path: configPath,
    exists: fs.existsSync(configPath),
    strataDir,
  };
}

// ============================================================================
// YAML Parsing
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fileError(message: string, filePath: string | undefined, details: Record<string, unknown>): ValidationError {
  return new ValidationError(
    `${message}${filePath ? ` (${filePath})` : ''}`,
    ErrorCode.INVALID_INPUT,
    { filePath, ...details }
  );
}

function readSection(
  parsed: Record<string, unknown>,
  key: string,
  filePath: string | undefined
): Record<string, unknown> | undefined {
  const section = parsed[key];
  if (section === undefined || section === null) {
    return undefined;
  }
  if (!isRecord(section)) {
    throw fileError(`Configuration section '${key}' must be a mapping`, filePath, { field: key, value: section });
  }
  return section;
}

function readField<T>(
  section: Record<string, unknown>,
  key: string,
  field: string,
  expected: string,
  guard: (value: unknown) => value is T,
  filePath: string | undefined
): T | undefined {
  const value = section[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!guard(value)) {
    throw fileError(`Configuration value '${field}' must be a ${expected}`, filePath, { field, value, expected });
  }
  return value;
}

const isString = (value: unknown): value is string => typeof value === 'string';
const isBoolean = (value: unknown): value is boolean => typeof value === 'boolean';
const isNumber = (value: unknown): value is number => typeof value === 'number';

/**
 * Parses YAML content into a config file structure. Unknown keys are
 * ignored; known keys of the wrong type are rejected.
 *
 * @param content - YAML string content
 * @param filePath - Path to file (for error messages)
 */
export function parseYamlConfig(content: string, filePath?: string): YamlConfigFile {
  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (err) {
    throw fileError(
      `Failed to parse YAML configuration: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
      {}
    );
  }
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw fileError('Configuration file must contain an object', filePath, { value: parsed });
  }

  const result: YamlConfigFile = {};
  const database = readField(parsed, 'database', 'database', 'string', isString, filePath);
  if (database !== undefined) {
    result.database = database;
  }

  const recording = readSection(parsed, 'recording', filePath);
  if (recording) {
    result.recording = {
      strict_scope: readField(recording, 'strict_scope', 'recording.strict_scope', 'boolean', isBoolean, filePath),
    };
  }

  const storage = readSection(parsed, 'storage', filePath);
  if (storage) {
    result.storage = {
      busy_timeout: readField(storage, 'busy_timeout', 'storage.busy_timeout', 'number', isNumber, filePath),
    };
  }

  const identifiers = readSection(parsed, 'identifiers', filePath);
  if (identifiers) {
    result.identifiers = {
      max_length: readField(identifiers, 'max_length', 'identifiers.max_length', 'number', isNumber, filePath),
    };
  }

  return result;
}

/**
 * Converts YAML config (snake_case) to internal format (camelCase)
 */
export function convertYamlToConfig(yamlConfig: YamlConfigFile): PartialConfiguration {
  const result: PartialConfiguration = {};

  if (yamlConfig.database !== undefined) {
    result.database = yamlConfig.database;
  }
  if (yamlConfig.recording?.strict_scope !== undefined) {
    result.recording = { strictScope: yamlConfig.recording.strict_scope };
  }
  if (yamlConfig.storage?.busy_timeout !== undefined) {
    result.storage = { busyTimeout: yamlConfig.storage.busy_timeout };
  }
  if (yamlConfig.identifiers?.max_length !== undefined) {
    result.identifiers = { maxLength: yamlConfig.identifiers.max_length };
  }

  return result;
}

/**
 * Reads and parses a configuration file. A relative database path is
 * resolved against the directory holding the file.
 *
 * @returns Partial configuration from the file (empty if the file is missing)
 */
export function readConfigFile(filePath: string): PartialConfiguration {
  if (!fs.existsSync(filePath)) {
    return {};
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw fileError(
      `Failed to read configuration file: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
      {}
    );
  }

  const config = convertYamlToConfig(parseYamlConfig(content, filePath));
  if (config.database !== undefined) {
    config.database = resolveDatabasePath(config.database, path.dirname(filePath));
  }
  return config;
}

/**
 * Resolves a database path against a base directory, leaving `:memory:`
 * and absolute paths untouched
 */
export function resolveDatabasePath(database: string, baseDir: string): string {
  if (database === ':memory:' || path.isAbsolute(database)) {
    return database;
  }
  return path.join(baseDir, database);
}
