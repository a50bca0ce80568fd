/**
 * Temporal Values
 *
 * The values an entity attribute may hold and that history tables record:
 * JSON-compatible data, compared structurally.
 */

import { invalidValue } from '../errors/factories.js';

// ============================================================================
// Types
// ============================================================================

/**
 * A value that can be stored in history.
 * `null` is a real value; an attribute that was never assigned is `undefined`.
 */
export type TemporalValue =
  | null
  | boolean
  | number
  | string
  | TemporalValue[]
  | { [key: string]: TemporalValue };

/**
 * Values of several fields keyed by field name
 */
export type FieldValues = Readonly<Record<string, TemporalValue>>;

// ============================================================================
// Validation
// ============================================================================

/**
 * Checks if a value is a plain object (not array, null, Date, etc.)
 */
function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Validates that a value can be recorded in history
 */
export function isTemporalValue(value: unknown): value is TemporalValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'boolean':
    case 'string':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) {
        return value.every(isTemporalValue);
      }
      return isPlainObject(value) && Object.values(value).every(isTemporalValue);
    default:
      return false;
  }
}

/**
 * Validates a value and throws if it cannot be recorded
 */
export function validateTemporalValue(value: unknown, field: string): TemporalValue {
  if (!isTemporalValue(value)) {
    throw invalidValue(field, value);
  }
  return value;
}

// ============================================================================
// Comparison
// ============================================================================

/**
 * Deep equality comparison for attribute values.
 * Handles primitives, arrays, and plain objects; object key order is ignored.
 */
export function valuesEqual(a: TemporalValue | undefined, b: TemporalValue | undefined): boolean {
  if (a === b) return true;
  if (a === null || b === null) return false;
  if (a === undefined || b === undefined) return false;
  if (typeof a !== typeof b) return false;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b)) return false;
    if (a.length !== b.length) return false;
    return a.every((item, index) => valuesEqual(item, b[index]));
  }

  if (typeof a === 'object' && typeof b === 'object') {
    const aKeys = Object.keys(a).sort();
    const bKeys = Object.keys(b).sort();

    if (aKeys.length !== bKeys.length) return false;
    return aKeys.every((key, i) => key === bKeys[i] && valuesEqual(a[key], b[key]));
  }

  return false;
}

/**
 * Copies a value so later mutation of the caller's object cannot leak into
 * a recorded snapshot
 */
export function cloneValue<T extends TemporalValue>(value: T): T {
  if (value === null || typeof value !== 'object') {
    return value;
  }
  return structuredClone(value);
}

// ============================================================================
// Encoding
// ============================================================================

/**
 * Encodes a value for a TEXT column
 */
export function encodeValue(value: TemporalValue): string {
  return JSON.stringify(value);
}

/**
 * Decodes a TEXT column written by encodeValue
 */
export function decodeValue(text: string, field: string): TemporalValue {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw invalidValue(field, text, { cause: error instanceof Error ? error.message : String(error) });
  }
  return validateTemporalValue(parsed, field);
}
