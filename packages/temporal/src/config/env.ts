/**
 * Environment Variable Configuration
 *
 * Handles reading configuration from environment variables.
 */

import { ErrorCode, ValidationError } from '@strata/core';
import type { Environment, PartialConfiguration } from './types.js';
import { EnvVars } from './types.js';

// ============================================================================
// Value Parsing
// ============================================================================

/**
 * Truthy values for environment variables (case-insensitive)
 */
const TRUTHY_VALUES = new Set(['1', 'true', 'yes', 'on']);

/**
 * Falsy values for environment variables (case-insensitive)
 */
const FALSY_VALUES = new Set(['0', 'false', 'no', 'off']);

/**
 * Parses a boolean from an environment variable value
 *
 * @returns Parsed boolean, or undefined if not a recognized boolean value
 */
export function parseEnvBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  const lower = value.toLowerCase().trim();
  if (TRUTHY_VALUES.has(lower)) {
    return true;
  }
  if (FALSY_VALUES.has(lower)) {
    return false;
  }
  return undefined;
}

/**
 * Parses a non-negative integer from an environment variable value
 *
 * @returns Parsed integer, or undefined if the value is not a plain integer
 */
export function parseEnvInteger(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    return undefined;
  }
  return parseInt(trimmed, 10);
}

/**
 * Gets a non-empty environment variable
 */
export function getEnvVar(name: string, env: Environment = process.env): string | undefined {
  const value = env[name];
  return value === undefined || value.trim() === '' ? undefined : value;
}

// ============================================================================
// Environment Loading
// ============================================================================

/**
 * Reads configuration from environment variables
 *
 * @throws ValidationError if a variable is set to an unparseable value
 */
export function loadEnvConfig(env: Environment = process.env): PartialConfiguration {
  const result: PartialConfiguration = {};

  const database = getEnvVar(EnvVars.DATABASE, env);
  if (database !== undefined) {
    result.database = database;
  }

  const strictScopeRaw = getEnvVar(EnvVars.STRICT_SCOPE, env);
  if (strictScopeRaw !== undefined) {
    const strictScope = parseEnvBoolean(strictScopeRaw);
    if (strictScope === undefined) {
      throw invalidEnvValue(EnvVars.STRICT_SCOPE, strictScopeRaw, 'boolean (true/false, 1/0, yes/no, on/off)');
    }
    result.recording = { strictScope };
  }

  const busyTimeoutRaw = getEnvVar(EnvVars.BUSY_TIMEOUT, env);
  if (busyTimeoutRaw !== undefined) {
    const busyTimeout = parseEnvInteger(busyTimeoutRaw);
    if (busyTimeout === undefined) {
      throw invalidEnvValue(EnvVars.BUSY_TIMEOUT, busyTimeoutRaw, 'non-negative integer (milliseconds)');
    }
    result.storage = { busyTimeout };
  }

  return result;
}

/**
 * Gets the config file path from STRATA_CONFIG, if set
 */
export function getEnvConfigPath(env: Environment = process.env): string | undefined {
  return getEnvVar(EnvVars.CONFIG, env);
}

function invalidEnvValue(name: string, value: string, expected: string): ValidationError {
  return new ValidationError(
    `Invalid value for ${name}: '${value}'. Expected ${expected}`,
    ErrorCode.INVALID_INPUT,
    { field: name, value, expected }
  );
}
