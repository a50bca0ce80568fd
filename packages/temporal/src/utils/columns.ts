/**
 * Column Readers
 *
 * Narrow untyped result rows to the column types the temporal tables
 * declare. A column holding anything else means the table was written by
 * something other than this package.
 */

import { databaseError, decodeValue, type TemporalValue } from '@strata/core';
import type { Row } from '@strata/storage';

function unexpected(column: string, value: unknown, expected: string): Error {
  return databaseError(`column ${column} holds ${typeof value}, expected ${expected}`, undefined, {
    column,
    expected,
  });
}

export function readText(row: Row, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') {
    throw unexpected(column, value, 'text');
  }
  return value;
}

export function readNullableText(row: Row, column: string): string | null {
  const value = row[column];
  return value === null ? null : readText(row, column);
}

export function readInteger(row: Row, column: string): number {
  const value = row[column];
  if (typeof value === 'bigint') {
    return Number(value);
  }
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw unexpected(column, value, 'integer');
  }
  return value;
}

export function readNullableInteger(row: Row, column: string): number | null {
  return row[column] === null ? null : readInteger(row, column);
}

/** Decodes a JSON value column */
export function readValue(row: Row, column: string, field: string): TemporalValue {
  return decodeValue(readText(row, column), field);
}
