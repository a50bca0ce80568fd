/**
 * Error codes for the Strata system.
 * Categorized by error type for consistent handling.
 */

/**
 * Validation error codes - Input validation failures
 */
export const ValidationErrorCode = {
  /** General validation failure */
  INVALID_INPUT: 'INVALID_INPUT',
  /** Entity ID format invalid */
  INVALID_ID: 'INVALID_ID',
  /** Timestamp format invalid */
  INVALID_TIMESTAMP: 'INVALID_TIMESTAMP',
  /** Value is not representable as a temporal value */
  INVALID_VALUE: 'INVALID_VALUE',
  /** Temporal policy declaration is malformed */
  INVALID_POLICY: 'INVALID_POLICY',
  /** Required field missing */
  MISSING_REQUIRED_FIELD: 'MISSING_REQUIRED_FIELD',
  /** Version recorded without the activity its policy requires */
  ACTIVITY_REQUIRED: 'ACTIVITY_REQUIRED',
  /** Installed tables do not match the registered policy */
  SCHEMA_MISMATCH: 'SCHEMA_MISMATCH',
} as const;

export type ValidationErrorCode = typeof ValidationErrorCode[keyof typeof ValidationErrorCode];

/**
 * Not Found error codes - Resource not found
 */
export const NotFoundErrorCode = {
  /** Generic record not found */
  NOT_FOUND: 'NOT_FOUND',
  /** Entity row missing */
  ENTITY_NOT_FOUND: 'ENTITY_NOT_FOUND',
  /** Entity type was never registered */
  POLICY_NOT_FOUND: 'POLICY_NOT_FOUND',
  /** Attribute is not tracked by the policy */
  ATTRIBUTE_NOT_TRACKED: 'ATTRIBUTE_NOT_TRACKED',
} as const;

export type NotFoundErrorCode = typeof NotFoundErrorCode[keyof typeof NotFoundErrorCode];

/**
 * Conflict error codes - State conflicts
 */
export const ConflictErrorCode = {
  /** Record with ID already exists */
  ALREADY_EXISTS: 'ALREADY_EXISTS',
  /** Activity already used for another version of the same entity */
  DUPLICATE_ACTIVITY: 'DUPLICATE_ACTIVITY',
  /** Entity was modified by another transaction (optimistic locking failure) */
  CONCURRENT_MODIFICATION: 'CONCURRENT_MODIFICATION',
} as const;

export type ConflictErrorCode = typeof ConflictErrorCode[keyof typeof ConflictErrorCode];

/**
 * Constraint error codes - Business rule violations
 */
export const ConstraintErrorCode = {
  /** Cannot delete or rewrite temporal records */
  IMMUTABLE: 'IMMUTABLE',
  /** Generic database constraint violation */
  CONSTRAINT_VIOLATION: 'CONSTRAINT_VIOLATION',
  /** Clock advanced with a timestamp before the open interval */
  OUT_OF_ORDER: 'OUT_OF_ORDER',
  /** Scope-required entity mutated outside a recording scope */
  UNSCOPED_MUTATION: 'UNSCOPED_MUTATION',
  /** Composite group could not be resolved as a whole */
  COMPOSITE_INTEGRITY: 'COMPOSITE_INTEGRITY',
} as const;

export type ConstraintErrorCode = typeof ConstraintErrorCode[keyof typeof ConstraintErrorCode];

/**
 * Usage error codes - Programming errors in how the API is driven
 */
export const UsageErrorCode = {
  /** Recording scope exited without a matching enter, or left open at commit */
  SCOPE_MISUSE: 'SCOPE_MISUSE',
} as const;

export type UsageErrorCode = typeof UsageErrorCode[keyof typeof UsageErrorCode];

/**
 * Storage error codes - Database and persistence errors
 */
export const StorageErrorCode = {
  /** SQLite error */
  DATABASE_ERROR: 'DATABASE_ERROR',
  /** Database is busy/locked */
  DATABASE_BUSY: 'DATABASE_BUSY',
  /** Schema migration failed */
  MIGRATION_FAILED: 'MIGRATION_FAILED',
} as const;

export type StorageErrorCode = typeof StorageErrorCode[keyof typeof StorageErrorCode];

/**
 * All error codes combined
 */
export const ErrorCode = {
  ...ValidationErrorCode,
  ...NotFoundErrorCode,
  ...ConflictErrorCode,
  ...ConstraintErrorCode,
  ...UsageErrorCode,
  ...StorageErrorCode,
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];
