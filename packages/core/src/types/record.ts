/**
 * Temporal Records
 *
 * The two kinds of rows the temporal layer writes:
 * - ClockRecord: one per version of an entity (the clock ledger)
 * - HistoryRow: one per version of a tracked unit (field or composite)
 *
 * Both are append-only. The only update ever applied is closing an open
 * interval, which happens exactly once per row.
 */

import { invalidId } from '../errors/factories.js';
import type { Timestamp } from './timestamp.js';
import type { FieldValues } from './value.js';

// ============================================================================
// Branded Types
// ============================================================================

/**
 * Branded type for the IDs of temporal entities
 */
declare const EntityIdBrand: unique symbol;
export type EntityId = string & { readonly [EntityIdBrand]: typeof EntityIdBrand };

/** Cast a string to EntityId (use at trust boundaries only) */
export function asEntityId(id: string): EntityId {
  return id as unknown as EntityId;
}

/** Upper bound on ID length */
export const MAX_ENTITY_ID_LENGTH = 256;

/**
 * Validates an entity ID: a non-empty string with no surrounding whitespace
 */
export function isValidEntityId(value: unknown): value is EntityId {
  return (
    typeof value === 'string' &&
    value.length > 0 &&
    value.length <= MAX_ENTITY_ID_LENGTH &&
    value.trim() === value
  );
}

/**
 * Validates an entity ID and throws if invalid
 */
export function validateEntityId(value: unknown): EntityId {
  if (!isValidEntityId(value)) {
    throw invalidId(value);
  }
  return value;
}

// ============================================================================
// References
// ============================================================================

/**
 * Identifies one entity across all registered types
 */
export interface EntityRef {
  readonly entityType: string;
  readonly id: EntityId;
}

/**
 * Orders entity references by type, then ID. Flushes write entities in
 * this order so that concurrent writers lock rows in the same sequence.
 */
export function compareEntityRefs(a: EntityRef, b: EntityRef): number {
  if (a.entityType !== b.entityType) {
    return a.entityType < b.entityType ? -1 : 1;
  }
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

// ============================================================================
// Records
// ============================================================================

/**
 * One version of an entity. The ledger for an entity holds a gapless run
 * of vclocks starting at 1 whose transaction-time intervals tile without
 * overlap; only the newest record is open.
 */
export interface ClockRecord {
  readonly entityId: EntityId;
  /** Version number, 1-based */
  readonly vclock: number;
  /** Transaction time at which this version took effect */
  readonly tickStart: Timestamp;
  /** When the next version took over; null while current */
  readonly tickEnd: Timestamp | null;
  /** Activity that caused this version, if any */
  readonly activityId: string | null;
}

/**
 * One version of a tracked unit. `vclock` is the entity version at which
 * these values took effect; `vclockEnd` is the version that replaced them.
 */
export interface HistoryRow {
  readonly entityId: EntityId;
  /** Field name, or composite group name */
  readonly attribute: string;
  readonly vclock: number;
  readonly vclockEnd: number | null;
  /** Member values; a single-field unit has one key */
  readonly values: FieldValues;
  readonly tickStart: Timestamp;
  readonly tickEnd: Timestamp | null;
}

/**
 * Whether a record's interval is still open
 */
export function isOpen(record: { readonly tickEnd: Timestamp | null }): boolean {
  return record.tickEnd === null;
}
