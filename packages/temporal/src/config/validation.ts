/**
 * Configuration Validation
 *
 * Validates configuration values for correctness.
 */

import { ErrorCode, ValidationError } from '@strata/core';
import type { Configuration, PartialConfiguration } from './types.js';
import { MAX_BUSY_TIMEOUT, MIN_MAX_IDENTIFIER_LENGTH } from './defaults.js';

// ============================================================================
// Field Validators
// ============================================================================

/**
 * Validates a database path: a non-empty string without NUL bytes
 */
export function isValidDatabase(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0 && !value.includes('\0');
}

/**
 * Validates a busy timeout in milliseconds
 */
export function isValidBusyTimeout(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= MAX_BUSY_TIMEOUT;
}

/**
 * Validates an identifier length limit
 */
export function isValidMaxIdentifierLength(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= MIN_MAX_IDENTIFIER_LENGTH;
}

function invalidConfigValue(field: string, value: unknown, expected: string): ValidationError {
  return new ValidationError(
    `Invalid configuration value for ${field}: expected ${expected}`,
    ErrorCode.INVALID_INPUT,
    { field, value, expected }
  );
}

// ============================================================================
// Configuration Validation
// ============================================================================

/**
 * Validates the fields present in a partial configuration
 *
 * @throws ValidationError on the first invalid value
 */
export function validatePartialConfiguration(config: PartialConfiguration): void {
  if (config.database !== undefined && !isValidDatabase(config.database)) {
    throw invalidConfigValue('database', config.database, 'non-empty path or :memory:');
  }
  const strictScope = config.recording?.strictScope;
  if (strictScope !== undefined && typeof strictScope !== 'boolean') {
    throw invalidConfigValue('recording.strictScope', strictScope, 'boolean');
  }
  const busyTimeout = config.storage?.busyTimeout;
  if (busyTimeout !== undefined && !isValidBusyTimeout(busyTimeout)) {
    throw invalidConfigValue('storage.busyTimeout', busyTimeout, `integer between 0 and ${MAX_BUSY_TIMEOUT}`);
  }
  const maxLength = config.identifiers?.maxLength;
  if (maxLength !== undefined && !isValidMaxIdentifierLength(maxLength)) {
    throw invalidConfigValue('identifiers.maxLength', maxLength, `integer >= ${MIN_MAX_IDENTIFIER_LENGTH}`);
  }
}

/**
 * Validates a complete configuration
 *
 * @returns The same configuration
 * @throws ValidationError on the first invalid value
 */
export function validateConfiguration(config: Configuration): Configuration {
  validatePartialConfiguration(config);
  return config;
}
