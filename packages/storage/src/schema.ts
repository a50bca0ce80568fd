/**
 * Schema Management
 *
 * Migrations for the tables the storage layer owns. Per-entity-type tables
 * (entity rows, clock ledger, history) are derived from temporal policies
 * and installed by the TableRegistry; this module only versions the catalog
 * that records which policy each installed table set came from.
 */

import type { Migration, MigrationResult } from './types.js';
import type { StorageBackend } from './backend.js';

// ============================================================================
// Schema Constants
// ============================================================================

/**
 * Current schema version
 */
export const CURRENT_SCHEMA_VERSION = 2;

/**
 * Catalog table name
 */
export const CATALOG_TABLE = 'temporal_catalog';

// ============================================================================
// Migrations
// ============================================================================

/**
 * Migration 1: Catalog of installed temporal entity types
 */
const migration001: Migration = {
  version: 1,
  description: 'Catalog of installed temporal entity types',
  up: `
CREATE TABLE ${CATALOG_TABLE} (
    entity_type TEXT PRIMARY KEY,
    fingerprint TEXT NOT NULL,
    installed_at TEXT NOT NULL
);
`,
};

/**
 * Migration 2: Record the table names derived for each entity type, so
 * truncated identifiers can be traced back to their unit
 */
const migration002: Migration = {
  version: 2,
  description: 'Derived table names per entity type',
  up: `
CREATE TABLE ${CATALOG_TABLE}_tables (
    entity_type TEXT NOT NULL REFERENCES ${CATALOG_TABLE}(entity_type) ON DELETE CASCADE,
    unit TEXT NOT NULL,
    table_name TEXT NOT NULL UNIQUE,
    PRIMARY KEY (entity_type, unit)
);
`,
};

/**
 * All migrations in order
 */
export const MIGRATIONS: readonly Migration[] = [migration001, migration002];

// ============================================================================
// Schema Functions
// ============================================================================

/**
 * Initialize the database schema
 *
 * Applies all pending migrations to bring the database up to the current version.
 *
 * @returns Migration result with details of what was applied
 */
export function initializeSchema(backend: StorageBackend): MigrationResult {
  return backend.migrate([...MIGRATIONS]);
}
