/**
 * Clock Ledger
 *
 * Per-entity append-only sequence of versions. Each advance closes the open
 * clock record at `atTime` and opens the next one, so an entity's records
 * form a gapless run of vclocks whose intervals tile without overlap.
 */

import {
  asEntityId,
  compareTimestamps,
  duplicateActivity,
  outOfOrder,
  type ClockRecord,
  type EntityRef,
  type Timestamp,
} from '@strata/core';
import {
  quoteIdentifier,
  type EntityTables,
  type Row,
  type SqlExecutor,
  type TableRegistry,
  type Transaction,
} from '@strata/storage';
import { readInteger, readNullableText, readText } from '../utils/columns.js';

const CLOCK_COLUMNS = 'entity_id, vclock, tick_start, tick_end, activity_id';

function toClockRecord(row: Row): ClockRecord {
  return {
    entityId: asEntityId(readText(row, 'entity_id')),
    vclock: readInteger(row, 'vclock'),
    tickStart: readText(row, 'tick_start'),
    tickEnd: readNullableText(row, 'tick_end'),
    activityId: readNullableText(row, 'activity_id'),
  };
}

export class ClockLedger {
  constructor(private readonly registry: TableRegistry) {}

  /**
   * Closes the entity's open clock record and opens the next version.
   * The first advance of an entity produces vclock 1.
   *
   * Call at most once per entity per flush, after every change in the
   * batch has been written, so the version covers the whole batch.
   *
   * An advance at exactly the open record's start is accepted: the previous
   * record closes as the zero-width interval `[atTime, atTime)`.
   *
   * @returns The new vclock
   * @throws OutOfOrderError if `atTime` is before the open record's start
   * @throws ConflictError (DUPLICATE_ACTIVITY) if the activity already versioned this entity
   */
  advance(
    tx: Transaction,
    entity: EntityRef,
    atTime: Timestamp,
    activityId: string | null = null
  ): number {
    const tables = this.registry.get(entity.entityType);
    const clock = quoteIdentifier(tables.clockTable);
    const open = this.openRecord(tx, tables, entity);

    if (open && compareTimestamps(atTime, open.tickStart) < 0) {
      throw outOfOrder(entity.entityType, entity.id, open.tickStart, atTime);
    }

    if (activityId !== null) {
      const used = tx.queryOne(
        `SELECT vclock FROM ${clock} WHERE entity_id = ? AND activity_id = ?`,
        [entity.id, activityId]
      );
      if (used) {
        throw duplicateActivity(entity.entityType, entity.id, activityId, {
          vclock: readInteger(used, 'vclock'),
        });
      }
    }

    if (open) {
      tx.run(`UPDATE ${clock} SET tick_end = ? WHERE entity_id = ? AND vclock = ?`, [
        atTime,
        entity.id,
        open.vclock,
      ]);
    }

    // Every versioned entity has exactly one open record
    const vclock = (open?.vclock ?? 0) + 1;
    tx.run(
      `INSERT INTO ${clock} (entity_id, vclock, tick_start, tick_end, activity_id) VALUES (?, ?, ?, NULL, ?)`,
      [entity.id, vclock, atTime, activityId]
    );
    return vclock;
  }

  /**
   * All clock records of an entity, ascending by vclock
   */
  records(db: SqlExecutor, entity: EntityRef): ClockRecord[] {
    const tables = this.registry.get(entity.entityType);
    return db
      .query(
        `SELECT ${CLOCK_COLUMNS} FROM ${quoteIdentifier(tables.clockTable)} WHERE entity_id = ? ORDER BY vclock ASC`,
        [entity.id]
      )
      .map(toClockRecord);
  }

  /**
   * The open clock record of an entity, if it has been versioned
   */
  current(db: SqlExecutor, entity: EntityRef): ClockRecord | undefined {
    return this.openRecord(db, this.registry.get(entity.entityType), entity);
  }

  private openRecord(db: SqlExecutor, tables: EntityTables, entity: EntityRef): ClockRecord | undefined {
    const row = db.queryOne(
      `SELECT ${CLOCK_COLUMNS} FROM ${quoteIdentifier(tables.clockTable)} WHERE entity_id = ? AND tick_end IS NULL`,
      [entity.id]
    );
    return row ? toClockRecord(row) : undefined;
  }
}
