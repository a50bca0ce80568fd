/**
 * History Writer
 *
 * Appends one immutable row per changed tracked unit. All rows written for
 * one version share its vclock and transaction time, so the version can be
 * reassembled from them. The only update ever made to a row is closing it
 * when the next version of the unit is written.
 */

import {
  ConstraintError,
  ErrorCode,
  alreadyExists,
  asEntityId,
  attributeNotTracked,
  compareTimestamps,
  compositeIntegrity,
  encodeValue,
  outOfOrder,
  valuesEqual,
  type EntityRef,
  type HistoryRow,
  type TemporalValue,
  type Timestamp,
} from '@strata/core';
import {
  quoteIdentifier,
  type HistoryTable,
  type Row,
  type SqlExecutor,
  type TableRegistry,
  type Transaction,
} from '@strata/storage';
import type { AttributeChange } from '../detector/change-set.js';
import {
  readInteger,
  readNullableInteger,
  readNullableText,
  readText,
  readValue,
} from '../utils/columns.js';

// ============================================================================
// Row Mapping
// ============================================================================

function columnFor(history: HistoryTable, field: string): string {
  const column = history.columns[field];
  if (column === undefined) {
    throw attributeNotTracked(history.unit.name, field);
  }
  return column;
}

function selectList(history: HistoryTable): string {
  const valueColumns = history.unit.fields.map((field) => quoteIdentifier(columnFor(history, field)));
  return ['entity_id', 'vclock', 'vclock_end', 'tick_start', 'tick_end', ...valueColumns].join(', ');
}

function toHistoryRow(history: HistoryTable, row: Row): HistoryRow {
  const values: Record<string, TemporalValue> = {};
  for (const field of history.unit.fields) {
    values[field] = readValue(row, columnFor(history, field), field);
  }
  return {
    entityId: asEntityId(readText(row, 'entity_id')),
    attribute: history.unit.name,
    vclock: readInteger(row, 'vclock'),
    vclockEnd: readNullableInteger(row, 'vclock_end'),
    values,
    tickStart: readText(row, 'tick_start'),
    tickEnd: readNullableText(row, 'tick_end'),
  };
}

// ============================================================================
// History Writer
// ============================================================================

export class HistoryWriter {
  constructor(private readonly registry: TableRegistry) {}

  /**
   * Writes one history row per change at `vclock`, closing each unit's
   * previous open row at `atTime`.
   *
   * Replaying a change already written at this vclock with the same values
   * writes nothing.
   *
   * @returns Number of rows inserted
   * @throws ConflictError (ALREADY_EXISTS) if a row at this vclock holds different values
   * @throws OutOfOrderError if `atTime` is before the open row's start
   */
  record(
    tx: Transaction,
    entity: EntityRef,
    vclock: number,
    atTime: Timestamp,
    changes: readonly AttributeChange[]
  ): number {
    let inserted = 0;
    for (const change of changes) {
      if (this.recordChange(tx, entity, vclock, atTime, change)) {
        inserted++;
      }
    }
    return inserted;
  }

  /**
   * History rows of one tracked unit, ascending by vclock
   *
   * @throws NotFoundError (ATTRIBUTE_NOT_TRACKED) if the unit is not in the policy
   */
  rows(db: SqlExecutor, entity: EntityRef, attribute: string): HistoryRow[] {
    const history = this.historyTable(entity.entityType, attribute);
    return db
      .query(
        `SELECT ${selectList(history)} FROM ${quoteIdentifier(history.table)} WHERE entity_id = ? ORDER BY vclock ASC`,
        [entity.id]
      )
      .map((row) => toHistoryRow(history, row));
  }

  /**
   * The open row of one tracked unit, if the unit has been recorded
   */
  openRow(db: SqlExecutor, entity: EntityRef, attribute: string): HistoryRow | undefined {
    const history = this.historyTable(entity.entityType, attribute);
    const row = db.queryOne(
      `SELECT ${selectList(history)} FROM ${quoteIdentifier(history.table)} WHERE entity_id = ? AND tick_end IS NULL`,
      [entity.id]
    );
    return row ? toHistoryRow(history, row) : undefined;
  }

  private historyTable(entityType: string, attribute: string): HistoryTable {
    const history = this.registry.get(entityType).history.get(attribute);
    if (!history) {
      throw attributeNotTracked(entityType, attribute);
    }
    return history;
  }

  private recordChange(
    tx: Transaction,
    entity: EntityRef,
    vclock: number,
    atTime: Timestamp,
    change: AttributeChange
  ): boolean {
    const history = this.historyTable(entity.entityType, change.attribute);
    const table = quoteIdentifier(history.table);
    const fields = history.unit.fields;

    const missing = fields.filter((field) => !Object.prototype.hasOwnProperty.call(change.newValues, field));
    if (missing.length > 0) {
      throw compositeIntegrity(entity.entityType, entity.id, change.attribute, missing);
    }

    const written = tx.queryOne(
      `SELECT ${selectList(history)} FROM ${table} WHERE entity_id = ? AND vclock = ?`,
      [entity.id, vclock]
    );
    if (written) {
      const existing = toHistoryRow(history, written);
      if (fields.every((field) => valuesEqual(existing.values[field], change.newValues[field]))) {
        return false;
      }
      throw alreadyExists('history row', `${entity.entityType}/${entity.id}`, {
        attribute: change.attribute,
        vclock,
      });
    }

    const open = this.openRow(tx, entity, change.attribute);
    if (open) {
      if (open.vclock > vclock) {
        throw new ConstraintError(
          `History of ${change.attribute} on ${entity.entityType}/${entity.id} is already at vclock ${open.vclock}`,
          ErrorCode.CONSTRAINT_VIOLATION,
          { entityType: entity.entityType, entityId: entity.id, attribute: change.attribute, expected: vclock, actual: open.vclock }
        );
      }
      if (compareTimestamps(atTime, open.tickStart) < 0) {
        throw outOfOrder(entity.entityType, entity.id, open.tickStart, atTime);
      }
      tx.run(`UPDATE ${table} SET tick_end = ?, vclock_end = ? WHERE entity_id = ? AND vclock = ?`, [
        atTime,
        vclock,
        entity.id,
        open.vclock,
      ]);
    }

    const valueColumns = fields.map((field) => quoteIdentifier(columnFor(history, field)));
    const placeholders = fields.map(() => '?');
    tx.run(
      `INSERT INTO ${table} (entity_id, vclock, vclock_end, tick_start, tick_end, ${valueColumns.join(', ')})
       VALUES (?, ?, NULL, ?, NULL, ${placeholders.join(', ')})`,
      [entity.id, vclock, atTime, ...fields.map((field) => encodeValue(change.newValues[field]))]
    );
    return true;
  }
}
