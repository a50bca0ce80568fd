import {
  ErrorCode,
  ValidationErrorCode,
  NotFoundErrorCode,
  ConflictErrorCode,
  ConstraintErrorCode,
  StorageErrorCode,
} from './codes.js';

/**
 * Additional context for errors
 */
export interface ErrorDetails {
  /** Field that caused the error */
  field?: string;
  /** The invalid value */
  value?: unknown;
  /** Expected format or value */
  expected?: unknown;
  /** Actual value received */
  actual?: unknown;
  /** Entity type of the affected record */
  entityType?: string;
  /** Related entity ID */
  entityId?: string;
  /** Tracked attribute (field or composite group name) */
  attribute?: string;
  /** Additional arbitrary context */
  [key: string]: unknown;
}

/**
 * Base error class for all Strata errors.
 * Provides structured error information with code, message, and details.
 */
export class StrataError extends Error {
  /** Machine-readable error code */
  readonly code: ErrorCode;
  /** Additional context about the error */
  readonly details: ErrorDetails;

  constructor(
    message: string,
    code: ErrorCode,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message);
    this.name = 'StrataError';
    this.code = code;
    this.details = details;
    this.cause = cause;

    // Maintains proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StrataError);
    }
  }

  /**
   * Returns a JSON representation of the error
   */
  toJSON(): {
    name: string;
    message: string;
    code: ErrorCode;
    details: ErrorDetails;
  } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

/**
 * Error for input validation failures
 */
export class ValidationError extends StrataError {
  constructor(
    message: string,
    code: ValidationErrorCode = ErrorCode.INVALID_INPUT,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'ValidationError';
  }
}

/**
 * Error for records that cannot be found
 */
export class NotFoundError extends StrataError {
  constructor(
    message: string,
    code: NotFoundErrorCode = ErrorCode.NOT_FOUND,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'NotFoundError';
  }
}

/**
 * Error for state conflicts (duplicate IDs, concurrent writers)
 */
export class ConflictError extends StrataError {
  constructor(
    message: string,
    code: ConflictErrorCode,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'ConflictError';
  }
}

/**
 * Error for business rule constraint violations
 */
export class ConstraintError extends StrataError {
  constructor(
    message: string,
    code: ConstraintErrorCode,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'ConstraintError';
  }
}

/**
 * Error for storage/database operations
 */
export class StorageError extends StrataError {
  constructor(
    message: string,
    code: StorageErrorCode = ErrorCode.DATABASE_ERROR,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'StorageError';
  }
}

// ============================================================================
// Temporal Errors
// ============================================================================

/**
 * The clock ledger was asked to advance with a timestamp earlier than the
 * start of the entity's open interval.
 */
export class OutOfOrderError extends ConstraintError {
  constructor(message: string, details: ErrorDetails = {}, cause?: Error) {
    super(message, ErrorCode.OUT_OF_ORDER, details, cause);
    this.name = 'OutOfOrderError';
  }
}

/**
 * An entity whose policy requires a recording scope was mutated while no
 * scope was active. Raised at flush time.
 */
export class UnscopedMutationError extends ConstraintError {
  constructor(message: string, details: ErrorDetails = {}, cause?: Error) {
    super(message, ErrorCode.UNSCOPED_MUTATION, details, cause);
    this.name = 'UnscopedMutationError';
  }
}

/**
 * A composite group was observed with some but not all member values.
 */
export class CompositeIntegrityError extends ConstraintError {
  constructor(message: string, details: ErrorDetails = {}, cause?: Error) {
    super(message, ErrorCode.COMPOSITE_INTEGRITY, details, cause);
    this.name = 'CompositeIntegrityError';
  }
}

/**
 * Another transaction changed the entity first.
 */
export class ConcurrentModificationError extends ConflictError {
  constructor(message: string, details: ErrorDetails = {}, cause?: Error) {
    super(message, ErrorCode.CONCURRENT_MODIFICATION, details, cause);
    this.name = 'ConcurrentModificationError';
  }
}

/**
 * Unbalanced recording scope usage. Raised immediately, never deferred.
 */
export class ScopeMisuseError extends StrataError {
  constructor(message: string, details: ErrorDetails = {}, cause?: Error) {
    super(message, ErrorCode.SCOPE_MISUSE, details, cause);
    this.name = 'ScopeMisuseError';
  }
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Type guard to check if an error is a StrataError
 */
export function isStrataError(error: unknown): error is StrataError {
  return error instanceof StrataError;
}

/**
 * Type guard to check if an error is a ValidationError
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/**
 * Type guard to check if an error is a NotFoundError
 */
export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

/**
 * Type guard to check if an error is a ConflictError
 */
export function isConflictError(error: unknown): error is ConflictError {
  return error instanceof ConflictError;
}

/**
 * Type guard to check if an error is a ConstraintError
 */
export function isConstraintError(error: unknown): error is ConstraintError {
  return error instanceof ConstraintError;
}

/**
 * Type guard to check if an error is a StorageError
 */
export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError;
}

/**
 * Type guard to check if an error has a specific error code
 */
export function hasErrorCode(
  error: unknown,
  code: ErrorCode
): error is StrataError {
  return isStrataError(error) && error.code === code;
}
