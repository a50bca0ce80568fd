/**
 * Node.js SQLite Backend Implementation
 *
 * Implements the StorageBackend interface using better-sqlite3.
 * Nested transactions run as savepoints on the same connection.
 */

import Database from 'better-sqlite3';
import type { Database as DatabaseType, RunResult } from 'better-sqlite3';
import type { StorageBackend } from './backend.js';
import type {
  Row,
  MutationResult,
  Transaction,
  TransactionOptions,
  BeforeCommitHook,
  IsolationLevel,
  StorageConfig,
  Migration,
  MigrationResult,
  SqlitePragmas,
} from './types.js';
import { DEFAULT_PRAGMAS } from './types.js';
import { connectionError, mapStorageError, migrationError } from './errors.js';

// ============================================================================
// Helpers
// ============================================================================

/**
 * SQLite doesn't accept undefined; bind it as NULL
 */
function bindParams(params?: unknown[]): unknown[] {
  return params ? params.map((p) => (p === undefined ? null : p)) : [];
}

function toMutationResult(result: RunResult): MutationResult {
  return {
    changes: result.changes,
    lastInsertRowid: result.lastInsertRowid,
  };
}

// ============================================================================
// Transaction Implementation
// ============================================================================

/**
 * One level of an open transaction: the outermost BEGIN, or a savepoint
 */
interface TransactionFrame {
  /** Savepoint name; null for the outermost transaction */
  savepoint: string | null;
  /** Hooks registered at this level, handed to the parent on release */
  hooks: BeforeCommitHook[];
}

/**
 * Transaction context for better-sqlite3
 */
class NodeTransaction implements Transaction {
  constructor(
    private db: DatabaseType,
    private frames: TransactionFrame[]
  ) {}

  get depth(): number {
    return this.frames.length;
  }

  exec(sql: string): void {
    try {
      this.db.exec(sql);
    } catch (error) {
      throw mapStorageError(error, { operation: 'exec' });
    }
  }

  query<T extends Row = Row>(sql: string, params?: unknown[]): T[] {
    try {
      return this.db.prepare<unknown[], T>(sql).all(...bindParams(params));
    } catch (error) {
      throw mapStorageError(error, { operation: 'query' });
    }
  }

  queryOne<T extends Row = Row>(sql: string, params?: unknown[]): T | undefined {
    try {
      return this.db.prepare<unknown[], T>(sql).get(...bindParams(params));
    } catch (error) {
      throw mapStorageError(error, { operation: 'queryOne' });
    }
  }

  run(sql: string, params?: unknown[]): MutationResult {
    try {
      const stmt = this.db.prepare(sql);
      return toMutationResult(stmt.run(...bindParams(params)));
    } catch (error) {
      throw mapStorageError(error, { operation: 'run' });
    }
  }

  onBeforeCommit(hook: BeforeCommitHook): void {
    const frame = this.frames.at(-1);
    if (!frame) {
      throw new Error('Transaction has already finished');
    }
    frame.hooks.push(hook);
  }
}

// ============================================================================
// Node.js Storage Backend
// ============================================================================

/**
 * Node.js SQLite storage backend implementation using better-sqlite3
 */
export class NodeStorageBackend implements StorageBackend {
  private db: DatabaseType | null;
  private _path: string;
  private frames: TransactionFrame[] = [];
  private savepointCounter = 0;

  constructor(config: StorageConfig) {
    this._path = config.path;

    try {
      this.db = new Database(config.path, {
        readonly: config.readonly ?? false,
      });

      this.applyPragmas(config.pragmas);
    } catch (error) {
      throw connectionError(config.path, error);
    }
  }

  private applyPragmas(pragmas?: SqlitePragmas): void {
    const settings = { ...DEFAULT_PRAGMAS, ...pragmas };

    if (!this.db) return;

    // In-memory databases ignore WAL and report 'memory'
    this.db.pragma(`journal_mode = ${settings.journal_mode}`);
    this.db.pragma(`synchronous = ${settings.synchronous}`);
    this.db.pragma(`foreign_keys = ${settings.foreign_keys ? 'ON' : 'OFF'}`);
    this.db.pragma(`busy_timeout = ${settings.busy_timeout}`);
  }

  // --------------------------------------------------------------------------
  // Connection Management
  // --------------------------------------------------------------------------

  get isOpen(): boolean {
    return this.db !== null;
  }

  get path(): string {
    return this._path;
  }

  get inTransaction(): boolean {
    return this.frames.length > 0;
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private ensureOpen(): DatabaseType {
    if (!this.db) {
      throw new Error('Database is closed');
    }
    return this.db;
  }

  // --------------------------------------------------------------------------
  // SQL Execution
  // --------------------------------------------------------------------------

  exec(sql: string): void {
    try {
      this.ensureOpen().exec(sql);
    } catch (error) {
      throw mapStorageError(error, { operation: 'exec' });
    }
  }

  query<T extends Row = Row>(sql: string, params?: unknown[]): T[] {
    try {
      return this.ensureOpen().prepare<unknown[], T>(sql).all(...bindParams(params));
    } catch (error) {
      throw mapStorageError(error, { operation: 'query' });
    }
  }

  queryOne<T extends Row = Row>(sql: string, params?: unknown[]): T | undefined {
    try {
      return this.ensureOpen().prepare<unknown[], T>(sql).get(...bindParams(params));
    } catch (error) {
      throw mapStorageError(error, { operation: 'queryOne' });
    }
  }

  run(sql: string, params?: unknown[]): MutationResult {
    try {
      const stmt = this.ensureOpen().prepare(sql);
      return toMutationResult(stmt.run(...bindParams(params)));
    } catch (error) {
      throw mapStorageError(error, { operation: 'run' });
    }
  }

  // --------------------------------------------------------------------------
  // Transactions
  // --------------------------------------------------------------------------

  transaction<T>(fn: (tx: Transaction) => T, options?: TransactionOptions): T {
    const db = this.ensureOpen();
    if (this.frames.length > 0) {
      return this.nestedTransaction(db, fn);
    }

    const beginSql = this.getBeginSql(options?.isolation ?? 'deferred');
    try {
      db.exec(beginSql);
    } catch (error) {
      throw mapStorageError(error, { operation: 'begin' });
    }

    const frame: TransactionFrame = { savepoint: null, hooks: [] };
    this.frames.push(frame);
    try {
      const tx = new NodeTransaction(db, this.frames);
      const result = fn(tx);
      // Hooks may register further hooks while running
      for (let i = 0; i < frame.hooks.length; i++) {
        frame.hooks[i](tx);
      }
      db.exec('COMMIT');
      return result;
    } catch (error) {
      // SQLite may already have rolled back (e.g. SQLITE_FULL)
      if (db.inTransaction) {
        db.exec('ROLLBACK');
      }
      throw mapStorageError(error, { operation: 'transaction' });
    } finally {
      this.frames.length = 0;
    }
  }

  private nestedTransaction<T>(db: DatabaseType, fn: (tx: Transaction) => T): T {
    const parent = this.frames[this.frames.length - 1];
    const name = `sp_${++this.savepointCounter}`;
    db.exec(`SAVEPOINT ${name}`);

    const frame: TransactionFrame = { savepoint: name, hooks: [] };
    this.frames.push(frame);
    let released = false;
    try {
      const result = fn(new NodeTransaction(db, this.frames));
      db.exec(`RELEASE SAVEPOINT ${name}`);
      released = true;
      return result;
    } catch (error) {
      if (db.inTransaction) {
        db.exec(`ROLLBACK TO SAVEPOINT ${name}`);
        db.exec(`RELEASE SAVEPOINT ${name}`);
      }
      throw mapStorageError(error, { operation: 'savepoint' });
    } finally {
      this.frames.pop();
      if (released) {
        parent.hooks.push(...frame.hooks);
      }
    }
  }

  private getBeginSql(isolation: IsolationLevel): string {
    switch (isolation) {
      case 'immediate':
        return 'BEGIN IMMEDIATE';
      case 'exclusive':
        return 'BEGIN EXCLUSIVE';
      case 'deferred':
      default:
        return 'BEGIN DEFERRED';
    }
  }

  // --------------------------------------------------------------------------
  // Schema Management
  // --------------------------------------------------------------------------

  getSchemaVersion(): number {
    const db = this.ensureOpen();
    const result: unknown = db.pragma('user_version', { simple: true });
    return typeof result === 'number' ? result : 0;
  }

  setSchemaVersion(version: number): void {
    const db = this.ensureOpen();
    db.pragma(`user_version = ${Math.trunc(version)}`);
  }

  migrate(migrations: Migration[]): MigrationResult {
    const fromVersion = this.getSchemaVersion();
    const pending = migrations
      .filter((m) => m.version > fromVersion)
      .sort((a, b) => a.version - b.version);

    if (pending.length === 0) {
      return {
        fromVersion,
        toVersion: fromVersion,
        applied: [],
        success: true,
      };
    }

    const applied: number[] = [];

    for (const migration of pending) {
      try {
        this.transaction(() => {
          this.exec(migration.up);
          this.setSchemaVersion(migration.version);
        });
      } catch (error) {
        throw migrationError(migration.version, error);
      }
      applied.push(migration.version);
    }

    return {
      fromVersion,
      toVersion: this.getSchemaVersion(),
      applied,
      success: true,
    };
  }
}

// ============================================================================
// Factory Function
// ============================================================================

/**
 * Create a new Node.js storage backend
 *
 * @example
 * ```typescript
 * const storage = createStorage({ path: ':memory:' });
 * ```
 */
export function createStorage(config: StorageConfig): StorageBackend {
  return new NodeStorageBackend(config);
}
