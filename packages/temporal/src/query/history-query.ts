/**
 * History Queries
 *
 * Read paths over the clock ledger and history tables. Nothing here writes.
 */

import {
  getTrackedUnits,
  isWithinInterval,
  validateTimestamp,
  type ClockRecord,
  type EntityRef,
  type FieldValues,
  type HistoryRow,
  type TemporalValue,
  type Timestamp,
} from '@strata/core';
import type { SqlExecutor, TableRegistry } from '@strata/storage';
import type { ClockLedger } from '../ledger/clock-ledger.js';
import type { HistoryWriter } from '../history/history-writer.js';

export class HistoryQuery {
  constructor(
    private readonly db: SqlExecutor,
    private readonly registry: TableRegistry,
    private readonly ledger: ClockLedger,
    private readonly writer: HistoryWriter
  ) {}

  /** History rows of a tracked field or composite, ascending by vclock */
  history(entity: EntityRef, attribute: string): HistoryRow[] {
    return this.writer.rows(this.db, entity, attribute);
  }

  /** Clock records of an entity, ascending by vclock */
  clock(entity: EntityRef): ClockRecord[] {
    return this.ledger.records(this.db, entity);
  }

  /**
   * Values of a tracked unit as of entity version `vclock`
   *
   * @returns undefined if the unit had no recorded value at that version
   */
  valueAt(entity: EntityRef, attribute: string, vclock: number): FieldValues | undefined {
    const row = this.history(entity, attribute).find(
      (candidate) => candidate.vclock <= vclock && (candidate.vclockEnd === null || vclock < candidate.vclockEnd)
    );
    return row?.values;
  }

  /**
   * Tracked values in effect at an instant. Units with no row covering the
   * instant are left out.
   *
   * @returns undefined if the entity did not exist yet at `at`
   */
  snapshotAt(entity: EntityRef, at: Timestamp): FieldValues | undefined {
    const instant = validateTimestamp(at, 'at');
    const version = this.clock(entity).find((record) =>
      isWithinInterval(instant, record.tickStart, record.tickEnd)
    );
    if (!version) {
      return undefined;
    }

    const values: Record<string, TemporalValue> = {};
    const policy = this.registry.get(entity.entityType).policy;
    for (const unit of getTrackedUnits(policy)) {
      const row = this.history(entity, unit.name).find((candidate) =>
        isWithinInterval(instant, candidate.tickStart, candidate.tickEnd)
      );
      if (row) {
        Object.assign(values, row.values);
      }
    }
    return values;
  }

  /** When the entity's first version took effect */
  dateCreated(entity: EntityRef): Timestamp | undefined {
    return this.clock(entity)[0]?.tickStart;
  }

  /** When the entity's current version took effect */
  dateModified(entity: EntityRef): Timestamp | undefined {
    return this.ledger.current(this.db, entity)?.tickStart;
  }
}
