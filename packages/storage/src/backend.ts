/**
 * Storage Backend Interface
 *
 * Defines the interface the temporal layer writes through. The Node.js
 * backend (better-sqlite3) is the only implementation; tests use it
 * against `:memory:` or a temporary file.
 */

import type {
  Row,
  MutationResult,
  SqlExecutor,
  Transaction,
  TransactionOptions,
  Migration,
  MigrationResult,
} from './types.js';

// ============================================================================
// Storage Backend Interface
// ============================================================================

/**
 * The core storage backend interface.
 *
 * The interface is synchronous: SQLite operations are synchronous, and
 * keeping them that way lets a flush run entirely inside one transaction
 * callback.
 */
export interface StorageBackend extends SqlExecutor {
  // --------------------------------------------------------------------------
  // Connection Management
  // --------------------------------------------------------------------------

  /**
   * Check if the database connection is open
   */
  readonly isOpen: boolean;

  /**
   * Get the path to the database file
   */
  readonly path: string;

  /**
   * Close the database connection.
   * After closing, no further operations can be performed.
   */
  close(): void;

  // --------------------------------------------------------------------------
  // SQL Execution
  // --------------------------------------------------------------------------

  /**
   * Execute a SQL statement without returning results.
   * Use for DDL statements (CREATE, DROP, ALTER) and batch operations.
   *
   * @throws StorageError on SQL syntax error or constraint violation
   */
  exec(sql: string): void;

  /**
   * Execute a parameterized query and return all matching rows.
   *
   * @param sql - The SQL query with ? placeholders
   * @param params - Parameter values to bind to placeholders
   * @throws StorageError on query error
   */
  query<T extends Row = Row>(sql: string, params?: unknown[]): T[];

  /**
   * Execute a parameterized query and return the first matching row.
   *
   * @returns The first row or undefined if no match
   * @throws StorageError on query error
   */
  queryOne<T extends Row = Row>(sql: string, params?: unknown[]): T | undefined;

  /**
   * Execute a parameterized mutation (INSERT, UPDATE, DELETE).
   *
   * @returns Mutation result with changes count and last insert ID
   * @throws ConflictError on unique violations, StorageError otherwise
   */
  run(sql: string, params?: unknown[]): MutationResult;

  // --------------------------------------------------------------------------
  // Transactions
  // --------------------------------------------------------------------------

  /**
   * Execute a function within a database transaction.
   *
   * The transaction is committed if the function completes, or rolled back
   * if it throws. Called while a transaction is already open, the function
   * runs inside a savepoint instead, and only the outermost call commits.
   * Before-commit hooks run immediately before that outermost COMMIT.
   *
   * @param fn - Function to execute within the transaction
   * @param options - Transaction options (isolation level, outermost only)
   * @returns The return value of the function
   * @throws The original error after rollback
   */
  transaction<T>(fn: (tx: Transaction) => T, options?: TransactionOptions): T;

  /**
   * Check if currently inside a transaction
   */
  readonly inTransaction: boolean;

  // --------------------------------------------------------------------------
  // Schema Management
  // --------------------------------------------------------------------------

  /**
   * Get the current schema version
   */
  getSchemaVersion(): number;

  /**
   * Set the schema version
   */
  setSchemaVersion(version: number): void;

  /**
   * Run pending migrations to bring schema up to date
   *
   * @returns Result indicating which migrations were applied
   */
  migrate(migrations: Migration[]): MigrationResult;
}
