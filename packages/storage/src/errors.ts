/**
 * Storage Error Mapping
 *
 * Maps SQLite error codes and messages to Strata error types so callers
 * can branch on error codes instead of driver messages.
 */

import {
  StrataError,
  StorageError,
  ConflictError,
  ConstraintError,
  ErrorCode,
  isStrataError,
  migrationFailed,
} from '@strata/core';

// ============================================================================
// SQLite Error Codes
// ============================================================================

/**
 * SQLite result codes that we need to handle
 * @see https://www.sqlite.org/rescode.html
 */
export const SqliteResultCode = {
  /** Generic error */
  ERROR: 1,
  /** Database file is locked */
  BUSY: 5,
  /** Table in the database is locked */
  LOCKED: 6,
  /** Attempt to write a readonly database */
  READONLY: 8,
  /** Database disk image is malformed */
  CORRUPT: 11,
  /** Unable to open database file */
  CANTOPEN: 14,
  /** Constraint violation */
  CONSTRAINT: 19,
  /** File opened that is not a database file */
  NOTADB: 26,
} as const;

export type SqliteResultCode = (typeof SqliteResultCode)[keyof typeof SqliteResultCode];

// ============================================================================
// Constraint Violation Detection
// ============================================================================

/**
 * Patterns for detecting specific constraint violations from error messages
 */
const CONSTRAINT_PATTERNS = {
  /** UNIQUE constraint violation */
  UNIQUE: /UNIQUE constraint failed/i,
  /** PRIMARY KEY constraint violation */
  PRIMARY_KEY: /PRIMARY KEY constraint failed/i,
  /** FOREIGN KEY constraint violation */
  FOREIGN_KEY: /FOREIGN KEY constraint failed/i,
  /** NOT NULL constraint violation */
  NOT_NULL: /NOT NULL constraint failed/i,
  /** CHECK constraint violation */
  CHECK: /CHECK constraint failed/i,
} as const;

/**
 * Extract table and column from constraint error message
 */
function parseConstraintError(message: string): { table?: string; column?: string } {
  // SQLite format: "UNIQUE constraint failed: tablename.columnname, ..."
  const match = message.match(/constraint failed: (\w+)\.(\w+)/i);
  if (match) {
    return { table: match[1], column: match[2] };
  }
  return {};
}

/**
 * Driver error code: numeric result code, or better-sqlite3's
 * `SQLITE_*` string
 */
function driverCode(error: Error): unknown {
  return 'code' in error ? error.code : undefined;
}

function hasCode(error: Error, numeric: number, name: string): boolean {
  const code = driverCode(error);
  return code === numeric || (typeof code === 'string' && code.startsWith(name));
}

// ============================================================================
// Error Detection
// ============================================================================

/**
 * Check if an error is a SQLite busy/locked error
 */
export function isBusyError(error: unknown): boolean {
  if (error instanceof Error) {
    if (
      hasCode(error, SqliteResultCode.BUSY, 'SQLITE_BUSY') ||
      hasCode(error, SqliteResultCode.LOCKED, 'SQLITE_LOCKED')
    ) {
      return true;
    }
    // Also check message for some drivers
    if (/database is locked/i.test(error.message)) {
      return true;
    }
  }
  return false;
}

/**
 * Check if an error is a SQLite constraint violation
 */
export function isConstraintError(error: unknown): boolean {
  if (error instanceof Error) {
    if (hasCode(error, SqliteResultCode.CONSTRAINT, 'SQLITE_CONSTRAINT')) {
      return true;
    }
    // Check message patterns
    for (const pattern of Object.values(CONSTRAINT_PATTERNS)) {
      if (pattern.test(error.message)) {
        return true;
      }
    }
  }
  return false;
}

/**
 * Check if an error is a unique constraint violation
 */
export function isUniqueViolation(error: unknown): boolean {
  if (error instanceof Error) {
    return (
      CONSTRAINT_PATTERNS.UNIQUE.test(error.message) ||
      CONSTRAINT_PATTERNS.PRIMARY_KEY.test(error.message)
    );
  }
  return false;
}

/**
 * Check if an error is a foreign key constraint violation
 */
export function isForeignKeyViolation(error: unknown): boolean {
  if (error instanceof Error) {
    return CONSTRAINT_PATTERNS.FOREIGN_KEY.test(error.message);
  }
  return false;
}

/**
 * Check if an error indicates database corruption
 */
export function isCorruptionError(error: unknown): boolean {
  if (error instanceof Error) {
    if (
      hasCode(error, SqliteResultCode.CORRUPT, 'SQLITE_CORRUPT') ||
      hasCode(error, SqliteResultCode.NOTADB, 'SQLITE_NOTADB')
    ) {
      return true;
    }
    if (/malformed|corrupt|not a database/i.test(error.message)) {
      return true;
    }
  }
  return false;
}

// ============================================================================
// Error Conversion
// ============================================================================

/**
 * Context attached to mapped errors
 */
export interface StorageErrorContext {
  operation?: string;
  entityId?: string;
  table?: string;
}

/**
 * Convert a SQLite error to an appropriate Strata error type.
 * Strata errors (including those thrown by transaction callbacks) pass
 * through unchanged.
 *
 * @param error - The original error
 * @param context - Optional context about the operation that failed
 */
export function mapStorageError(error: unknown, context?: StorageErrorContext): StrataError {
  if (isStrataError(error)) {
    return error;
  }

  // Not an error object
  if (!(error instanceof Error)) {
    return new StorageError(
      `Storage operation failed: ${String(error)}`,
      ErrorCode.DATABASE_ERROR,
      { operation: context?.operation }
    );
  }

  const message = error.message;

  // Handle unique constraint violations
  if (isUniqueViolation(error)) {
    const { table, column } = parseConstraintError(message);
    return new ConflictError(
      `Row already exists${column ? ` (duplicate ${column})` : ''}`,
      ErrorCode.ALREADY_EXISTS,
      {
        entityId: context?.entityId,
        table: table ?? context?.table,
        column,
        operation: context?.operation,
      },
      error
    );
  }

  // Handle other constraint violations
  if (isConstraintError(error)) {
    const { table, column } = parseConstraintError(message);
    return new ConstraintError(
      `Database constraint violation: ${message}`,
      ErrorCode.CONSTRAINT_VIOLATION,
      {
        entityId: context?.entityId,
        table: table ?? context?.table,
        column,
        operation: context?.operation,
      },
      error
    );
  }

  // Handle busy/locked errors
  if (isBusyError(error)) {
    return new StorageError(
      'Database is busy. Please retry the operation.',
      ErrorCode.DATABASE_BUSY,
      {
        operation: context?.operation,
        retryable: true,
      },
      error
    );
  }

  // Handle corruption errors
  if (isCorruptionError(error)) {
    return new StorageError(
      'Database is corrupted or not a valid database file',
      ErrorCode.DATABASE_ERROR,
      {
        operation: context?.operation,
        corrupted: true,
      },
      error
    );
  }

  // Generic storage error for everything else
  return new StorageError(
    `Database operation failed: ${message}`,
    ErrorCode.DATABASE_ERROR,
    {
      sqliteCode: driverCode(error),
      operation: context?.operation,
      entityId: context?.entityId,
    },
    error
  );
}

// ============================================================================
// Error Helper Functions
// ============================================================================

/**
 * Create a storage error for connection failures
 */
export function connectionError(path: string, error: unknown): StorageError {
  if (!(error instanceof Error)) {
    return new StorageError(
      `Failed to open database at ${path}: ${String(error)}`,
      ErrorCode.DATABASE_ERROR,
      { path }
    );
  }

  return new StorageError(
    `Failed to open database at ${path}: ${error.message}`,
    ErrorCode.DATABASE_ERROR,
    { path },
    error
  );
}

/**
 * Create a storage error for schema migration failures
 */
export function migrationError(version: number, error: unknown): StorageError {
  const cause = error instanceof Error ? error : undefined;
  return migrationFailed(version, cause?.message ?? String(error), cause, { operation: 'migrate' });
}
