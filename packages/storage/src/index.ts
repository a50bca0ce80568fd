/**
 * @strata/storage
 *
 * SQLite storage layer for Strata: the better-sqlite3 backend, transactions
 * with before-commit hooks, error mapping, catalog migrations and the
 * policy-derived table mapping.
 */

// Type definitions
export type {
  Row,
  MutationResult,
  SqlExecutor,
  IsolationLevel,
  TransactionOptions,
  BeforeCommitHook,
  Transaction,
  SqlitePragmas,
  StorageConfig,
  Migration,
  MigrationResult,
} from './types.js';

export { DEFAULT_PRAGMAS } from './types.js';

// Backend interface
export type { StorageBackend } from './backend.js';

// Node.js backend
export { NodeStorageBackend, createStorage } from './node-backend.js';

// Error mapping
export {
  SqliteResultCode,
  isBusyError,
  isConstraintError,
  isUniqueViolation,
  isForeignKeyViolation,
  isCorruptionError,
  mapStorageError,
  connectionError,
  migrationError,
  type StorageErrorContext,
} from './errors.js';

// Schema management
export {
  CURRENT_SCHEMA_VERSION,
  CATALOG_TABLE,
  MIGRATIONS,
  initializeSchema,
} from './schema.js';

// Table mapping
export {
  DEFAULT_MAX_IDENTIFIER_LENGTH,
  MIN_IDENTIFIER_LENGTH,
  TableRegistry,
  truncateIdentifier,
  quoteIdentifier,
  policyFingerprint,
  createTableSql,
  type HistoryTable,
  type EntityTables,
  type TableRegistryOptions,
} from './mapping.js';
