/**
 * Timestamps
 *
 * Validity intervals are stored as ISO 8601 UTC strings with millisecond
 * precision. An interval whose end is `null` is open.
 */

import { invalidTimestamp } from '../errors/factories.js';

/**
 * Timestamp type - ISO 8601 formatted string
 * Format: YYYY-MM-DDTHH:mm:ss.sssZ
 */
export type Timestamp = string;

/** ISO 8601 timestamp pattern */
const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d{3})?Z$/;

/**
 * Validates a timestamp string is in ISO 8601 format
 */
export function isValidTimestamp(value: unknown): value is Timestamp {
  if (typeof value !== 'string') {
    return false;
  }
  if (!TIMESTAMP_PATTERN.test(value)) {
    return false;
  }
  const date = new Date(value);
  if (isNaN(date.getTime())) {
    return false;
  }
  // Catches dates JS rolls over (Feb 30 becomes Mar 2)
  const normalizedInput = value.includes('.') ? value : value.replace('Z', '.000Z');
  return date.toISOString() === normalizedInput;
}

/**
 * Validates a timestamp and throws if invalid.
 * Returns the normalized form with milliseconds so string order matches time order.
 */
export function validateTimestamp(value: unknown, field: string): Timestamp {
  if (!isValidTimestamp(value)) {
    throw invalidTimestamp(value, field);
  }
  return new Date(value).toISOString();
}

/**
 * Creates a new timestamp in ISO 8601 format (UTC)
 */
export function createTimestamp(): Timestamp {
  return new Date().toISOString();
}

/**
 * Parses a timestamp string to a Date object
 */
export function parseTimestamp(timestamp: Timestamp): Date {
  return new Date(timestamp);
}

/**
 * Orders two timestamps: negative if a is earlier, positive if later
 */
export function compareTimestamps(a: Timestamp, b: Timestamp): number {
  return new Date(a).getTime() - new Date(b).getTime();
}

/**
 * Whether an instant falls inside a half-open interval [start, end)
 */
export function isWithinInterval(
  instant: Timestamp,
  start: Timestamp,
  end: Timestamp | null
): boolean {
  if (compareTimestamps(instant, start) < 0) {
    return false;
  }
  return end === null || compareTimestamps(instant, end) < 0;
}
