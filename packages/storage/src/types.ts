/**
 * Storage System Type Definitions
 *
 * Core types for the storage abstraction layer:
 * - Query result types
 * - Transaction interfaces
 * - Configuration types
 */

// ============================================================================
// Query Result Types
// ============================================================================

/**
 * A single row result from a query
 */
export type Row = Record<string, unknown>;

/**
 * Result of a mutation (INSERT, UPDATE, DELETE)
 */
export interface MutationResult {
  /** Number of rows affected by the mutation */
  changes: number;
  /** Last inserted row ID (for auto-increment tables) */
  lastInsertRowid?: number | bigint;
}

// ============================================================================
// SQL Execution
// ============================================================================

/**
 * Parameterized SQL execution shared by the backend and open transactions.
 * Code that only reads and writes rows accepts this so it runs the same
 * inside or outside a transaction.
 */
export interface SqlExecutor {
  /** Query with parameters and return all results */
  query<T extends Row = Row>(sql: string, params?: unknown[]): T[];

  /** Query and return single result */
  queryOne<T extends Row = Row>(sql: string, params?: unknown[]): T | undefined;

  /** Execute a mutation (INSERT, UPDATE, DELETE) */
  run(sql: string, params?: unknown[]): MutationResult;
}

// ============================================================================
// Transaction Interface
// ============================================================================

/**
 * Transaction isolation levels
 */
export type IsolationLevel = 'deferred' | 'immediate' | 'exclusive';

/**
 * Options for transaction execution
 */
export interface TransactionOptions {
  /** Isolation level for the transaction */
  isolation?: IsolationLevel;
}

/**
 * Hook run just before the outermost transaction commits
 */
export type BeforeCommitHook = (tx: Transaction) => void;

/**
 * A database transaction context
 */
export interface Transaction extends SqlExecutor {
  /** Execute a SQL statement within the transaction */
  exec(sql: string): void;

  /** Nesting depth: 1 for the outermost transaction */
  readonly depth: number;

  /**
   * Register a hook to run before the outermost COMMIT.
   * A hook that throws aborts the commit and rolls everything back.
   * Hooks registered inside a nested transaction that rolls back are dropped.
   */
  onBeforeCommit(hook: BeforeCommitHook): void;
}

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * SQLite pragma settings for database configuration
 */
export interface SqlitePragmas {
  /** Journal mode (default: WAL) */
  journal_mode?: 'delete' | 'truncate' | 'persist' | 'memory' | 'wal' | 'off';
  /** Synchronous mode (default: NORMAL) */
  synchronous?: 'off' | 'normal' | 'full' | 'extra';
  /** Foreign key enforcement (default: ON) */
  foreign_keys?: boolean;
  /** Busy timeout in milliseconds (default: 5000) */
  busy_timeout?: number;
}

/**
 * Configuration for storage backend initialization
 */
export interface StorageConfig {
  /** Path to the database file (or :memory: for in-memory) */
  path: string;
  /** SQLite pragma settings */
  pragmas?: SqlitePragmas;
  /** Open in read-only mode (default: false) */
  readonly?: boolean;
}

/**
 * Default pragma settings
 */
export const DEFAULT_PRAGMAS: Required<SqlitePragmas> = {
  journal_mode: 'wal',
  synchronous: 'normal',
  foreign_keys: true,
  busy_timeout: 5000,
};

// ============================================================================
// Schema Migration Types
// ============================================================================

/**
 * A database schema migration
 */
export interface Migration {
  /** Migration version number */
  version: number;
  /** Human-readable description */
  description: string;
  /** SQL to apply the migration */
  up: string;
}

/**
 * Result of running migrations
 */
export interface MigrationResult {
  /** Previous schema version */
  fromVersion: number;
  /** New schema version */
  toVersion: number;
  /** Migrations that were applied */
  applied: number[];
  /** Whether any migrations were run */
  success: boolean;
}
