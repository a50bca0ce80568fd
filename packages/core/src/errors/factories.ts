import { ErrorCode } from './codes.js';
import {
  ValidationError,
  NotFoundError,
  ConflictError,
  ConstraintError,
  StorageError,
  OutOfOrderError,
  UnscopedMutationError,
  CompositeIntegrityError,
  ConcurrentModificationError,
  type ErrorDetails,
} from './error.js';

// =============================================================================
// Not Found Factories
// =============================================================================

/**
 * Creates a NotFoundError for a record that doesn't exist
 */
export function notFound(
  type: string,
  id: string,
  details: ErrorDetails = {}
): NotFoundError {
  return new NotFoundError(`${capitalize(type)} not found: ${id}`, ErrorCode.NOT_FOUND, {
    entityId: id,
    ...details,
  });
}

/**
 * Creates a NotFoundError for a missing entity row
 */
export function entityNotFound(
  entityType: string,
  id: string,
  details: ErrorDetails = {}
): NotFoundError {
  return new NotFoundError(`Entity not found: ${entityType}/${id}`, ErrorCode.ENTITY_NOT_FOUND, {
    entityType,
    entityId: id,
    ...details,
  });
}

/**
 * Creates a NotFoundError for an entity type with no registered policy
 */
export function policyNotFound(entityType: string, details: ErrorDetails = {}): NotFoundError {
  return new NotFoundError(
    `No temporal policy registered for entity type: ${entityType}`,
    ErrorCode.POLICY_NOT_FOUND,
    { entityType, ...details }
  );
}

/**
 * Creates a NotFoundError for an attribute the policy does not track
 */
export function attributeNotTracked(
  entityType: string,
  attribute: string,
  details: ErrorDetails = {}
): NotFoundError {
  return new NotFoundError(
    `Attribute ${attribute} is not tracked on ${entityType}`,
    ErrorCode.ATTRIBUTE_NOT_TRACKED,
    { entityType, attribute, ...details }
  );
}

// =============================================================================
// Validation Factories
// =============================================================================

/**
 * Creates a ValidationError for invalid input
 */
export function invalidInput(
  field: string,
  value: unknown,
  expected: unknown,
  details: ErrorDetails = {}
): ValidationError {
  const valueStr = truncateValue(value);
  return new ValidationError(
    `Invalid ${field}: ${valueStr}`,
    ErrorCode.INVALID_INPUT,
    {
      field,
      value,
      expected,
      ...details,
    }
  );
}

/**
 * Creates a ValidationError for invalid entity ID format
 */
export function invalidId(value: unknown, details: ErrorDetails = {}): ValidationError {
  return new ValidationError(
    `Invalid entity ID: ${truncateValue(value)}`,
    ErrorCode.INVALID_ID,
    {
      value,
      expected: 'non-empty string without surrounding whitespace',
      ...details,
    }
  );
}

/**
 * Creates a ValidationError for an invalid timestamp
 */
export function invalidTimestamp(
  value: unknown,
  field = 'timestamp',
  details: ErrorDetails = {}
): ValidationError {
  return new ValidationError(
    `Invalid timestamp format for ${field}. Expected ISO 8601 format (YYYY-MM-DDTHH:mm:ss.sssZ)`,
    ErrorCode.INVALID_TIMESTAMP,
    { field, value, expected: 'YYYY-MM-DDTHH:mm:ss.sssZ', ...details }
  );
}

/**
 * Creates a ValidationError for a value that cannot be stored in history
 */
export function invalidValue(
  field: string,
  value: unknown,
  details: ErrorDetails = {}
): ValidationError {
  return new ValidationError(
    `Invalid value for ${field}: ${describeValue(value)}`,
    ErrorCode.INVALID_VALUE,
    {
      field,
      expected: 'null, boolean, finite number, string, array or plain object',
      ...details,
    }
  );
}

/**
 * Creates a ValidationError for a malformed temporal policy
 */
export function invalidPolicy(
  entityType: string,
  reason: string,
  details: ErrorDetails = {}
): ValidationError {
  return new ValidationError(
    `Invalid temporal policy for ${entityType}: ${reason}`,
    ErrorCode.INVALID_POLICY,
    { entityType, ...details }
  );
}

/**
 * Creates a ValidationError for missing required field
 */
export function missingRequiredField(field: string): ValidationError {
  return new ValidationError(
    `Missing required field: ${field}`,
    ErrorCode.MISSING_REQUIRED_FIELD,
    { field }
  );
}

/**
 * Creates a ValidationError for a version without its required activity
 */
export function activityRequired(
  entityType: string,
  entityId: string,
  details: ErrorDetails = {}
): ValidationError {
  return new ValidationError(
    `Activity is required to version ${entityType}/${entityId}`,
    ErrorCode.ACTIVITY_REQUIRED,
    { entityType, entityId, ...details }
  );
}

/**
 * Creates a ValidationError for tables installed from a different policy
 */
export function schemaMismatch(
  entityType: string,
  expected: string,
  actual: string
): ValidationError {
  return new ValidationError(
    `Installed tables for ${entityType} were created from a different policy`,
    ErrorCode.SCHEMA_MISMATCH,
    { entityType, expected, actual }
  );
}

// =============================================================================
// Conflict Factories
// =============================================================================

/**
 * Creates a ConflictError for duplicate record
 */
export function alreadyExists(
  type: string,
  id: string,
  details: ErrorDetails = {}
): ConflictError {
  return new ConflictError(
    `${capitalize(type)} already exists: ${id}`,
    ErrorCode.ALREADY_EXISTS,
    { entityId: id, ...details }
  );
}

/**
 * Creates a ConflictError for an activity reused on the same entity
 */
export function duplicateActivity(
  entityType: string,
  entityId: string,
  activityId: string,
  details: ErrorDetails = {}
): ConflictError {
  return new ConflictError(
    `Activity ${activityId} already recorded a version of ${entityType}/${entityId}`,
    ErrorCode.DUPLICATE_ACTIVITY,
    { entityType, entityId, activityId, ...details }
  );
}

/**
 * Creates a ConcurrentModificationError (optimistic locking failure)
 */
export function concurrentModification(
  entityType: string,
  entityId: string,
  expectedVclock: number,
  details: ErrorDetails = {},
  cause?: Error
): ConcurrentModificationError {
  return new ConcurrentModificationError(
    `Entity was modified by another transaction: ${entityType}/${entityId}. Expected vclock: ${expectedVclock}`,
    { entityType, entityId, expected: expectedVclock, ...details },
    cause
  );
}

// =============================================================================
// Constraint Factories
// =============================================================================

/**
 * Creates a ConstraintError for immutable record modification
 */
export function immutable(
  type: string,
  id: string,
  details: ErrorDetails = {}
): ConstraintError {
  return new ConstraintError(
    `Cannot delete or rewrite temporal ${type}: ${id}`,
    ErrorCode.IMMUTABLE,
    { entityType: type, entityId: id, ...details }
  );
}

/**
 * Creates an OutOfOrderError for a clock that would move backwards
 */
export function outOfOrder(
  entityType: string,
  entityId: string,
  openTickStart: string,
  atTime: string
): OutOfOrderError {
  return new OutOfOrderError(
    `Clock for ${entityType}/${entityId} cannot advance to ${atTime}: current tick started at ${openTickStart}`,
    { entityType, entityId, expected: `>= ${openTickStart}`, actual: atTime }
  );
}

/**
 * Creates an UnscopedMutationError naming the offending attributes
 */
export function unscopedMutation(
  entityType: string,
  entityId: string,
  attributes: readonly string[]
): UnscopedMutationError {
  return new UnscopedMutationError(
    `${entityType}/${entityId} changed ${attributes.join(', ')} outside a recording scope`,
    { entityType, entityId, attribute: attributes[0], attributes: [...attributes] }
  );
}

/**
 * Creates a CompositeIntegrityError for a partially resolvable group
 */
export function compositeIntegrity(
  entityType: string,
  entityId: string,
  attribute: string,
  missingFields: readonly string[]
): CompositeIntegrityError {
  return new CompositeIntegrityError(
    `Composite ${attribute} on ${entityType}/${entityId} is missing ${missingFields.join(', ')}`,
    { entityType, entityId, attribute, missingFields: [...missingFields] }
  );
}

// =============================================================================
// Storage Factories
// =============================================================================

/**
 * Creates a StorageError for database operations
 */
export function databaseError(
  message: string,
  cause?: Error,
  details: ErrorDetails = {}
): StorageError {
  return new StorageError(
    `Database error: ${message}`,
    ErrorCode.DATABASE_ERROR,
    details,
    cause
  );
}

/**
 * Creates a StorageError for migration failures
 */
export function migrationFailed(
  version: number,
  message: string,
  cause?: Error,
  details: ErrorDetails = {}
): StorageError {
  return new StorageError(
    `Migration to version ${version} failed: ${message}`,
    ErrorCode.MIGRATION_FAILED,
    { ...details, version },
    cause
  );
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Capitalizes the first letter of a string
 */
function capitalize(str: string): string {
  return str.charAt(0).toUpperCase() + str.slice(1);
}

/**
 * Truncates a value for display in error messages
 */
function truncateValue(value: unknown, maxLength = 50): string {
  const str = typeof value === 'string' ? value : String(JSON.stringify(value));
  if (str.length <= maxLength) {
    return str;
  }
  return str.slice(0, maxLength - 3) + '...';
}

/**
 * Short description of a value that JSON cannot always render
 */
function describeValue(value: unknown): string {
  if (value === undefined) return 'undefined';
  if (typeof value === 'function') return 'function';
  if (typeof value === 'bigint') return `${value}n`;
  if (typeof value === 'symbol') return value.toString();
  if (typeof value === 'number' && !Number.isFinite(value)) return String(value);
  if (value instanceof Date) return isNaN(value.getTime()) ? 'Invalid Date' : `Date(${value.toISOString()})`;
  return truncateValue(value);
}
