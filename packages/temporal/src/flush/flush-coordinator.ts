/**
 * Flush Coordinator
 *
 * Runs from the store's before-commit hook and turns the pending changes of
 * every dirty entity into history rows, clock records and entity rows, all
 * inside the committing transaction. Entities are processed in (type, id)
 * order. Any failure aborts the whole flush; nothing is retried.
 */

import {
  ErrorCode,
  activityRequired,
  alreadyExists,
  compareEntityRefs,
  concurrentModification,
  encodeValue,
  entityNotFound,
  hasErrorCode,
  unscopedMutation,
  type EntityRef,
  type Timestamp,
} from '@strata/core';
import { quoteIdentifier, type TableRegistry, type Transaction } from '@strata/storage';
import { changedAttributes, diff, type DiffContext } from '../detector/change-set.js';
import type { TemporalEntity } from '../entity/temporal-entity.js';
import type { HistoryWriter } from '../history/history-writer.js';
import type { ClockLedger } from '../ledger/clock-ledger.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { readInteger } from '../utils/columns.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Outcome of flushing one entity
 */
export interface FlushedEntity {
  readonly entity: TemporalEntity;
  /** vclock after the flush; unchanged when no tracked unit changed */
  readonly vclock: number;
  /** Tracked units written at `vclock` */
  readonly attributes: readonly string[];
  readonly created: boolean;
}

export interface FlushResult {
  readonly atTime: Timestamp;
  readonly entities: readonly FlushedEntity[];
}

export interface FlushCoordinatorOptions {
  registry: TableRegistry;
  ledger: ClockLedger;
  writer: HistoryWriter;
  /** Treat every policy as scope-required */
  strictScope?: boolean;
  logger?: Logger;
}

// ============================================================================
// Flush Coordinator
// ============================================================================

export class FlushCoordinator {
  private readonly registry: TableRegistry;
  private readonly ledger: ClockLedger;
  private readonly writer: HistoryWriter;
  private readonly strictScope: boolean;
  private readonly logger: Logger;

  constructor(options: FlushCoordinatorOptions) {
    this.registry = options.registry;
    this.ledger = options.ledger;
    this.writer = options.writer;
    this.strictScope = options.strictScope ?? false;
    this.logger = options.logger ?? createLogger('flush');
  }

  /**
   * Flushes every dirty entity inside `tx`.
   *
   * @throws UnscopedMutationError if a scope-required entity was changed outside a scope
   * @throws ConcurrentModificationError if another transaction versioned an entity first
   * @throws CompositeIntegrityError, OutOfOrderError, ValidationError (ACTIVITY_REQUIRED)
   */
  flush(tx: Transaction, entities: Iterable<TemporalEntity>, atTime: Timestamp): FlushResult {
    const dirty = [...new Set(entities)].filter((entity) => entity.isDirty).sort(compareEntityRefs);

    try {
      this.rejectUnscoped(dirty);
      const flushed = dirty.map((entity) => this.flushEntity(tx, entity, atTime));
      return { atTime, entities: flushed };
    } catch (error) {
      this.logger.warn(
        `flush rejected: ${error instanceof Error ? error.message : String(error)}`
      );
      throw error;
    }
  }

  private requiresScope(entity: TemporalEntity): boolean {
    return this.strictScope || entity.policy.scopeRequired;
  }

  private rejectUnscoped(entities: readonly TemporalEntity[]): void {
    for (const entity of entities) {
      if (entity.unscopedDirty && this.requiresScope(entity)) {
        throw unscopedMutation(entity.entityType, entity.id, entity.unscopedFields);
      }
    }
  }

  private requireActivity(entity: TemporalEntity): void {
    if (entity.policy.activityRequired && entity.activityId === null) {
      throw activityRequired(entity.entityType, entity.id);
    }
  }

  /**
   * Inserts the entity row, opens vclock 1 and records every provided value
   */
  private flushNew(tx: Transaction, entity: TemporalEntity, atTime: Timestamp): FlushedEntity {
    const tables = this.registry.get(entity.entityType);
    const table = quoteIdentifier(tables.entityTable);

    const changes = diff(entity.policy, {}, entity.pending(), diffContext(entity));
    this.requireActivity(entity);

    if (tx.queryOne(`SELECT 1 AS present FROM ${table} WHERE id = ?`, [entity.id])) {
      throw alreadyExists(entity.entityType, entity.id, { entityType: entity.entityType });
    }
    tx.run(
      `INSERT INTO ${table} (id, vclock, data, created_at, updated_at) VALUES (?, 1, ?, ?, ?)`,
      [entity.id, encodeValue(entity.pending()), atTime, atTime]
    );

    this.writer.record(tx, entity, 1, atTime, changes);
    this.expectVersion(entity, this.ledger.advance(tx, entity, atTime, entity.activityId), 1);

    const attributes = changedAttributes(changes);
    this.logger.debug(
      `created ${entity.entityType}/${entity.id} at vclock 1 (${attributes.join(', ') || 'no tracked values'})`
    );
    return { entity, vclock: 1, attributes, created: true };
  }

  /**
   * A busy or locked store means another transaction holds the entity
   */
  private flushEntity(tx: Transaction, entity: TemporalEntity, atTime: Timestamp): FlushedEntity {
    try {
      return entity.isNew ? this.flushNew(tx, entity, atTime) : this.flushExisting(tx, entity, atTime);
    } catch (error) {
      if (hasErrorCode(error, ErrorCode.DATABASE_BUSY)) {
        throw concurrentModification(entity.entityType, entity.id, entity.vclock, {}, error);
      }
      throw error;
    }
  }

  /**
   * Versions an existing entity: detector, writer, ledger, then the entity
   * row under an optimistic check on the vclock it was loaded at
   */
  private flushExisting(tx: Transaction, entity: TemporalEntity, atTime: Timestamp): FlushedEntity {
    const tables = this.registry.get(entity.entityType);
    const table = quoteIdentifier(tables.entityTable);
    const expected = entity.vclock;

    const row = tx.queryOne(`SELECT vclock FROM ${table} WHERE id = ?`, [entity.id]);
    if (!row) {
      throw entityNotFound(entity.entityType, entity.id);
    }
    const stored = readInteger(row, 'vclock');
    if (stored !== expected) {
      throw concurrentModification(entity.entityType, entity.id, expected, { actual: stored });
    }

    const changes = diff(entity.policy, entity.snapshot(), entity.pending(), diffContext(entity));
    if (changes.length === 0 && !entity.hasUntrackedChanges()) {
      return { entity, vclock: expected, attributes: [], created: false };
    }

    let vclock = expected;
    if (changes.length > 0) {
      this.requireActivity(entity);
      vclock = expected + 1;
      this.writer.record(tx, entity, vclock, atTime, changes);
      this.expectVersion(entity, this.ledger.advance(tx, entity, atTime, entity.activityId), vclock);
    }

    const result = tx.run(
      `UPDATE ${table} SET vclock = ?, data = ?, updated_at = ? WHERE id = ? AND vclock = ?`,
      [vclock, encodeValue(entity.pending()), atTime, entity.id, expected]
    );
    if (result.changes === 0) {
      throw concurrentModification(entity.entityType, entity.id, expected);
    }

    const attributes = changedAttributes(changes);
    if (attributes.length > 0) {
      this.logger.debug(
        `versioned ${entity.entityType}/${entity.id} at vclock ${vclock} (${attributes.join(', ')})`
      );
    }
    return { entity, vclock, attributes, created: false };
  }

  /** The ledger must land on the version the history rows were written at */
  private expectVersion(entity: TemporalEntity, actual: number, expected: number): void {
    if (actual !== expected) {
      throw concurrentModification(entity.entityType, entity.id, entity.vclock, { actual: actual - 1 });
    }
  }
}

function diffContext(entity: EntityRef): DiffContext {
  return { entityType: entity.entityType, entityId: entity.id };
}
