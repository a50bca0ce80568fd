/**
 * Logger Utility
 *
 * Leveled logging with a `[name]` prefix. The minimum level comes from the
 * LOG_LEVEL environment variable.
 *
 * Usage:
 *   import { createLogger } from '../utils/logger.js';
 *   const logger = createLogger('flush');
 *   logger.debug('versioned note/n-1 at vclock 2');
 *   logger.warn('flush rejected', error);
 *
 * Environment:
 *   LOG_LEVEL=DEBUG|INFO|WARNING|ERROR (default: INFO)
 *
 * @module
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Supported log levels in ascending severity order.
 */
export type LogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

/**
 * Logger interface with leveled logging methods.
 */
export interface Logger {
  /** Per-entity flush detail (versions written, rows closed) */
  debug(message: string, ...args: unknown[]): void;
  /** Key events (schema installed, session opened) */
  info(message: string, ...args: unknown[]): void;
  /** Rejected flushes and other recoverable failures */
  warn(message: string, ...args: unknown[]): void;
  /** Failures the caller is not expected to handle */
  error(message: string, ...args: unknown[]): void;
}

// ============================================================================
// Constants
// ============================================================================

/**
 * Log level severity values, ascending
 */
const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  ERROR: 3,
};

/**
 * Default log level when LOG_LEVEL env var is not set or invalid.
 */
const DEFAULT_LOG_LEVEL: LogLevel = 'INFO';

// ============================================================================
// Log Level Resolution
// ============================================================================

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_VALUES, value);
}

/**
 * Resolves the current log level from LOG_LEVEL, falling back to INFO.
 * Read on every call so tests and long-running hosts can change it.
 */
export function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toUpperCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return DEFAULT_LOG_LEVEL;
}

function shouldLog(messageLevel: LogLevel): boolean {
  return LOG_LEVEL_VALUES[messageLevel] >= LOG_LEVEL_VALUES[getLogLevel()];
}

// ============================================================================
// Logger Factory
// ============================================================================

type ConsoleMethod = (...data: unknown[]) => void;

/**
 * Creates a logger whose lines start with `[name]`
 *
 * @example
 * ```ts
 * const logger = createLogger('flush');
 * logger.info('installed 2 entity types');
 * // Output: [flush] installed 2 entity types
 * ```
 */
export function createLogger(name: string): Logger {
  const prefix = `[${name}]`;

  const emit = (level: LogLevel, write: ConsoleMethod, message: string, args: unknown[]): void => {
    if (shouldLog(level)) {
      write(prefix, message, ...args);
    }
  };

  return {
    debug: (message, ...args) => emit('DEBUG', console.debug, message, args),
    info: (message, ...args) => emit('INFO', console.log, message, args),
    warn: (message, ...args) => emit('WARNING', console.warn, message, args),
    error: (message, ...args) => emit('ERROR', console.error, message, args),
  };
}
