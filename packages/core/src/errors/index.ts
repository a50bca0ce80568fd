/**
 * Error handling module for Strata
 *
 * Provides structured errors with codes, messages, and details
 * for consistent error handling across the storage and temporal layers.
 */

// Error codes
export {
  ErrorCode,
  ValidationErrorCode,
  NotFoundErrorCode,
  ConflictErrorCode,
  ConstraintErrorCode,
  UsageErrorCode,
  StorageErrorCode,
} from './codes.js';

// Error classes
export {
  StrataError,
  ValidationError,
  NotFoundError,
  ConflictError,
  ConstraintError,
  StorageError,
  OutOfOrderError,
  UnscopedMutationError,
  CompositeIntegrityError,
  ConcurrentModificationError,
  ScopeMisuseError,
  isStrataError,
  isValidationError,
  isNotFoundError,
  isConflictError,
  isConstraintError,
  isStorageError,
  hasErrorCode,
  type ErrorDetails,
} from './error.js';

// Factory functions
export {
  // Not Found
  notFound,
  entityNotFound,
  policyNotFound,
  attributeNotTracked,
  // Validation
  invalidInput,
  invalidId,
  invalidTimestamp,
  invalidValue,
  invalidPolicy,
  missingRequiredField,
  activityRequired,
  schemaMismatch,
  // Conflict
  alreadyExists,
  duplicateActivity,
  concurrentModification,
  // Constraint
  immutable,
  outOfOrder,
  unscopedMutation,
  compositeIntegrity,
  // Storage
  databaseError,
  migrationFailed,
} from './factories.js';
