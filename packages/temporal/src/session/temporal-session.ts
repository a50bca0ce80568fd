/**
 * Temporal Session
 *
 * Unit of work over temporal entities. A session keeps an identity map of
 * the entities it created or loaded, buffers their changes in memory, and
 * flushes them through the FlushCoordinator from the store's before-commit
 * hook, so history, clock records and entity rows commit together or not
 * at all.
 *
 * @example
 * ```typescript
 * const session = new TemporalSession({ backend, registry });
 * const note = session.create('note', 'n-1', { description: 'first description' });
 * session.commit();
 *
 * session.recording(() => note.set('description', 'second description'));
 * session.commit();
 * session.history(note, 'description'); // two rows, vclock 1 and 2
 * ```
 */

import {
  ScopeMisuseError,
  alreadyExists,
  compareEntityRefs,
  createTimestamp,
  decodeValue,
  entityNotFound,
  getTrackedUnits,
  immutable,
  invalidValue,
  resolveDefault,
  validateEntityId,
  validateTimestamp,
  type ClockRecord,
  type EntityId,
  type EntityRef,
  type FieldValues,
  type HistoryRow,
  type TemporalValue,
  type Timestamp,
} from '@strata/core';
import {
  quoteIdentifier,
  type StorageBackend,
  type TableRegistry,
  type Transaction,
} from '@strata/storage';
import {
  TemporalEntity,
  type ChangeListener,
  type PendingState,
} from '../entity/temporal-entity.js';
import { FlushCoordinator, type FlushResult } from '../flush/flush-coordinator.js';
import { HistoryWriter } from '../history/history-writer.js';
import { ClockLedger } from '../ledger/clock-ledger.js';
import { HistoryQuery } from '../query/history-query.js';
import { RecordingScope, type ScopeOptions } from '../scope/recording-scope.js';
import { readInteger, readText } from '../utils/columns.js';
import { createLogger, type Logger } from '../utils/logger.js';

// ============================================================================
// Types
// ============================================================================

export interface TemporalSessionOptions {
  backend: StorageBackend;
  /** Registry whose tables are installed in `backend` */
  registry: TableRegistry;
  /** Treat every policy as scope-required (default: false) */
  strictScope?: boolean;
  /** Transaction-time clock (default: wall clock) */
  now?: () => Timestamp;
  logger?: Logger;
}

export interface CreateOptions {
  /** Activity recorded on the creating version */
  activity?: string;
}

interface SessionState {
  readonly entities: ReadonlyMap<string, TemporalEntity>;
  readonly outside: ReadonlySet<TemporalEntity>;
  readonly batch: readonly TemporalEntity[];
  readonly pending: ReadonlyMap<TemporalEntity, PendingState>;
}

function entityKey(entityType: string, id: string): string {
  return `${entityType}/${id}`;
}

function isFieldValues(value: TemporalValue): value is { [key: string]: TemporalValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// Temporal Session
// ============================================================================

export class TemporalSession implements ChangeListener {
  /** Recording scope shared by every entity of this session */
  readonly scope = new RecordingScope();

  private readonly backend: StorageBackend;
  private readonly registry: TableRegistry;
  private readonly coordinator: FlushCoordinator;
  private readonly queries: HistoryQuery;
  private readonly now: () => Timestamp;
  private readonly logger: Logger;

  private entities = new Map<string, TemporalEntity>();
  /** Entities created or changed with no scope active; scoped ones sit in the scope buffer */
  private outside = new Set<TemporalEntity>();
  private transactionDepth = 0;

  constructor(options: TemporalSessionOptions) {
    this.backend = options.backend;
    this.registry = options.registry;
    this.now = options.now ?? createTimestamp;
    this.logger = options.logger ?? createLogger('session');

    const ledger = new ClockLedger(this.registry);
    const writer = new HistoryWriter(this.registry);
    this.coordinator = new FlushCoordinator({
      registry: this.registry,
      ledger,
      writer,
      strictScope: options.strictScope,
      logger: options.logger,
    });
    this.queries = new HistoryQuery(this.backend, this.registry, ledger, writer);
  }

  // --------------------------------------------------------------------------
  // Entities
  // --------------------------------------------------------------------------

  /**
   * Creates an entity. Policy defaults fill tracked fields missing from
   * `values` and count as provided; a tracked field with neither stays
   * unset and gets no history row. Creation is never an unscoped mutation.
   *
   * @throws NotFoundError (POLICY_NOT_FOUND) if the type is not registered
   * @throws ConflictError (ALREADY_EXISTS) if the session already holds this entity
   */
  create(
    entityType: string,
    id: string,
    values: FieldValues = {},
    options: CreateOptions = {}
  ): TemporalEntity {
    const { policy } = this.registry.get(entityType);
    const entityId = validateEntityId(id);
    const key = entityKey(entityType, entityId);
    if (this.entities.has(key)) {
      throw alreadyExists(entityType, entityId, { entityType });
    }

    const initial: Record<string, TemporalValue> = { ...values };
    for (const unit of getTrackedUnits(policy)) {
      for (const field of unit.fields) {
        if (Object.prototype.hasOwnProperty.call(initial, field)) continue;
        const fallback = resolveDefault(policy, field);
        if (fallback !== undefined) {
          initial[field] = fallback;
        }
      }
    }

    const entity = new TemporalEntity({ policy, id: entityId, initial, listener: this });
    if (options.activity !== undefined) {
      entity.attachActivity(options.activity);
    }
    if (!this.scope.touch(entity)) {
      this.outside.add(entity);
    }
    this.entities.set(key, entity);
    return entity;
  }

  /**
   * Loads an entity, returning the session's instance if it already has one
   *
   * @throws NotFoundError (ENTITY_NOT_FOUND) if no row exists
   */
  load(entityType: string, id: string): TemporalEntity {
    const entityId = validateEntityId(id);
    const existing = this.entities.get(entityKey(entityType, entityId));
    if (existing) {
      return existing;
    }

    const tables = this.registry.get(entityType);
    const row = this.backend.queryOne(
      `SELECT vclock, data FROM ${quoteIdentifier(tables.entityTable)} WHERE id = ?`,
      [entityId]
    );
    if (!row) {
      throw entityNotFound(entityType, entityId);
    }
    const data = decodeValue(readText(row, 'data'), 'data');
    if (!isFieldValues(data)) {
      throw invalidValue('data', data, { entityType, entityId });
    }

    const entity = new TemporalEntity({
      policy: tables.policy,
      id: entityId,
      baseline: data,
      vclock: readInteger(row, 'vclock'),
      listener: this,
    });
    this.entities.set(entityKey(entityType, entityId), entity);
    return entity;
  }

  /**
   * Temporal entities are never deleted; their history stays reachable
   *
   * @throws ConstraintError (IMMUTABLE) always
   */
  delete(entity: EntityRef): never {
    throw immutable(entity.entityType, entity.id);
  }

  /** Entities with changes the next commit will flush, in (type, id) order */
  get pendingEntities(): TemporalEntity[] {
    return [...this.pendingSet()]
      .filter((entity) => entity.isDirty)
      .sort(compareEntityRefs);
  }

  /** @internal Called by entities on every attribute write */
  entityChanged(entity: TemporalEntity, field: string): void {
    if (!this.scope.touch(entity)) {
      entity.markUnscoped(field);
      this.outside.add(entity);
    }
  }

  private pendingSet(): Set<TemporalEntity> {
    return new Set([...this.scope.entities, ...this.outside]);
  }

  // --------------------------------------------------------------------------
  // Recording scopes
  // --------------------------------------------------------------------------

  /**
   * Runs `fn` inside a recording scope. Changes made in it are versioned
   * together at the next commit.
   */
  recording<T>(fn: () => T, options: ScopeOptions = {}): T {
    return this.scope.run(fn, options);
  }

  // --------------------------------------------------------------------------
  // Transactions
  // --------------------------------------------------------------------------

  /**
   * Runs `fn` in a store transaction and flushes pending changes before it
   * commits. Nested calls run in savepoints; when one throws, the pending
   * state captured at its start is restored.
   *
   * @throws ScopeMisuseError if a recording scope is still open at commit
   */
  transaction<T>(fn: (session: this) => T): T {
    if (this.transactionDepth > 0) {
      return this.nestedTransaction(fn);
    }
    return this.outermostTransaction(fn).value;
  }

  /**
   * Flushes all pending changes in their own transaction
   *
   * @throws ScopeMisuseError if a recording scope is open or a transaction is running
   */
  commit(): FlushResult {
    if (this.transactionDepth > 0) {
      throw new ScopeMisuseError('commit() cannot run inside transaction()', {
        depth: this.transactionDepth,
      });
    }
    return this.outermostTransaction(() => undefined).flush;
  }

  /**
   * Discards every pending change: new entities are forgotten, loaded ones
   * return to their last flushed values, and the recording scope resets
   */
  rollback(): void {
    if (this.transactionDepth > 0) {
      throw new ScopeMisuseError('rollback() cannot run inside transaction()', {
        depth: this.transactionDepth,
      });
    }
    for (const entity of this.pendingSet()) {
      if (entity.isNew) {
        this.entities.delete(entityKey(entity.entityType, entity.id));
      } else {
        entity.revert();
      }
    }
    this.outside.clear();
    this.scope.reset();
  }

  private outermostTransaction<T>(fn: (session: this) => T): { value: T; flush: FlushResult } {
    if (this.backend.inTransaction) {
      throw new ScopeMisuseError('Session transactions cannot start inside a transaction the session did not open');
    }

    const saved = this.capture();
    const outcome: { flush?: FlushResult; flushFailed: boolean } = { flushFailed: false };
    this.transactionDepth++;
    try {
      const value = this.backend.transaction((tx) => {
        tx.onBeforeCommit((commitTx) => {
          try {
            outcome.flush = this.flushPending(commitTx);
          } catch (error) {
            outcome.flushFailed = true;
            throw error;
          }
        });
        return fn(this);
      });
      const flush = outcome.flush ?? { atTime: this.now(), entities: [] };
      this.applyFlush(flush);
      return { value, flush };
    } catch (error) {
      // A rejected flush leaves changes pending; a failed callback drops its own
      if (!outcome.flushFailed) {
        this.restore(saved);
      }
      throw error;
    } finally {
      this.transactionDepth--;
    }
  }

  private nestedTransaction<T>(fn: (session: this) => T): T {
    const saved = this.capture();
    this.transactionDepth++;
    try {
      return this.backend.transaction(() => fn(this));
    } catch (error) {
      this.restore(saved);
      throw error;
    } finally {
      this.transactionDepth--;
    }
  }

  private flushPending(tx: Transaction): FlushResult {
    if (this.scope.isActive) {
      throw new ScopeMisuseError('Cannot commit while a recording scope is open', {
        depth: this.scope.depth,
      });
    }
    const atTime = validateTimestamp(this.now(), 'atTime');
    const batch = this.scope.takeBatch();
    try {
      return this.coordinator.flush(tx, [...batch, ...this.outside], atTime);
    } catch (error) {
      this.scope.restoreBatch(batch);
      throw error;
    }
  }

  private applyFlush(result: FlushResult): void {
    for (const flushed of result.entities) {
      flushed.entity.markFlushed(flushed.vclock);
    }
    this.outside.clear();
    const versioned = result.entities.filter((flushed) => flushed.attributes.length > 0).length;
    this.logger.debug(`committed ${result.entities.length} entities, ${versioned} versioned`);
  }

  private capture(): SessionState {
    const pending = new Map<TemporalEntity, PendingState>();
    for (const entity of this.entities.values()) {
      pending.set(entity, entity.capture());
    }
    return {
      entities: new Map(this.entities),
      outside: new Set(this.outside),
      batch: this.scope.entities,
      pending,
    };
  }

  private restore(state: SessionState): void {
    this.entities = new Map(state.entities);
    this.outside = new Set(state.outside);
    this.scope.restoreBatch(state.batch);
    for (const [entity, pending] of state.pending) {
      entity.restore(pending);
    }
  }

  // --------------------------------------------------------------------------
  // Queries
  // --------------------------------------------------------------------------

  /** History rows of a tracked field or composite, ascending by vclock */
  history(entity: EntityRef, attribute: string): HistoryRow[] {
    return this.queries.history(entity, attribute);
  }

  /** Clock records of an entity, ascending by vclock */
  clock(entity: EntityRef): ClockRecord[] {
    return this.queries.clock(entity);
  }

  valueAt(entity: EntityRef, attribute: string, vclock: number): FieldValues | undefined {
    return this.queries.valueAt(entity, attribute, vclock);
  }

  snapshotAt(entity: EntityRef, at: Timestamp): FieldValues | undefined {
    return this.queries.snapshotAt(entity, at);
  }

  dateCreated(entity: EntityRef): Timestamp | undefined {
    return this.queries.dateCreated(entity);
  }

  dateModified(entity: EntityRef): Timestamp | undefined {
    return this.queries.dateModified(entity);
  }

  /** Looks up an entity the session already holds */
  get(entityType: string, id: EntityId): TemporalEntity | undefined {
    return this.entities.get(entityKey(entityType, id));
  }
}
