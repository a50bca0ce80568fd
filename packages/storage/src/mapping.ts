/**
 * Table Mapping
 *
 * Derives the tables of each temporal entity type from its policy:
 * - `<type>`: current entity rows (id, vclock, JSON data)
 * - `<type>_clock`: the clock ledger
 * - `<type>_history_<unit>`: one history table per tracked unit
 *
 * The registry is built once at schema setup and passed to the temporal
 * layer; nothing is looked up through global state.
 */

import { createHash } from 'node:crypto';
import {
  alreadyExists,
  createTimestamp,
  getTrackedUnits,
  invalidInput,
  invalidPolicy,
  policyNotFound,
  schemaMismatch,
  type TemporalPolicy,
  type TrackedUnit,
} from '@strata/core';
import type { StorageBackend } from './backend.js';
import type { Transaction } from './types.js';
import { CATALOG_TABLE, initializeSchema } from './schema.js';

// ============================================================================
// Identifiers
// ============================================================================

/** Longest identifier emitted by default (PostgreSQL's limit, kept for portability) */
export const DEFAULT_MAX_IDENTIFIER_LENGTH = 63;

/** Hex characters of the md5 suffix on truncated identifiers */
const HASH_SUFFIX_LENGTH = 8;

/** Shortest usable limit: room for a prefix plus the hash suffix */
export const MIN_IDENTIFIER_LENGTH = 16;

/**
 * Shortens an identifier to `maxLength`, replacing the tail with an md5
 * suffix of the full name so distinct long names stay distinct
 */
export function truncateIdentifier(
  name: string,
  maxLength: number = DEFAULT_MAX_IDENTIFIER_LENGTH
): string {
  if (name.length <= maxLength) {
    return name;
  }
  const hash = createHash('md5').update(name).digest('hex').slice(0, HASH_SUFFIX_LENGTH);
  return `${name.slice(0, maxLength - HASH_SUFFIX_LENGTH - 1)}_${hash}`;
}

/**
 * Quotes an identifier for SQLite
 */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

// ============================================================================
// Mapping Types
// ============================================================================

/**
 * History table of one tracked unit
 */
export interface HistoryTable {
  readonly unit: TrackedUnit;
  readonly table: string;
  /** Column holding each member field's JSON-encoded value */
  readonly columns: Readonly<Record<string, string>>;
  /** Partial unique index allowing one open row per entity */
  readonly openIndex: string;
}

/**
 * All tables derived from one policy
 */
export interface EntityTables {
  readonly policy: TemporalPolicy;
  readonly entityTable: string;
  readonly clockTable: string;
  readonly clockOpenIndex: string;
  /** History tables keyed by unit name, in tracked-unit order */
  readonly history: ReadonlyMap<string, HistoryTable>;
  /** Stable description of the policy's shape, stored in the catalog */
  readonly fingerprint: string;
}

/**
 * Registry options
 */
export interface TableRegistryOptions {
  /** Longest identifier to emit (default: 63) */
  maxIdentifierLength?: number;
}

/** Catalog `unit` values for the non-history tables */
const ENTITY_UNIT = '@entity';
const CLOCK_UNIT = '@clock';

// ============================================================================
// Fingerprint
// ============================================================================

/**
 * Describes the parts of a policy that determine table layout. Flags and
 * defaults change behaviour, not tables, and are left out.
 */
export function policyFingerprint(policy: TemporalPolicy): string {
  return JSON.stringify({
    entityType: policy.entityType,
    units: getTrackedUnits(policy).map((unit) => [unit.kind, unit.name, ...unit.fields]),
  });
}

// ============================================================================
// Table Registry
// ============================================================================

/**
 * Maps entity types to their policies and derived tables
 *
 * @example
 * ```typescript
 * const registry = new TableRegistry();
 * registry.register(notePolicy);
 * registry.install(backend);
 * ```
 */
export class TableRegistry {
  private readonly entries = new Map<string, EntityTables>();
  private readonly maxLength: number;

  constructor(options: TableRegistryOptions = {}) {
    const maxLength = options.maxIdentifierLength ?? DEFAULT_MAX_IDENTIFIER_LENGTH;
    if (!Number.isInteger(maxLength) || maxLength < MIN_IDENTIFIER_LENGTH) {
      throw invalidInput('maxIdentifierLength', maxLength, `integer >= ${MIN_IDENTIFIER_LENGTH}`);
    }
    this.maxLength = maxLength;
  }

  /**
   * Registers a policy. Registering the same policy shape again returns the
   * existing mapping; a different shape under the same entity type is a
   * conflict.
   */
  register(policy: TemporalPolicy): EntityTables {
    const fingerprint = policyFingerprint(policy);
    const existing = this.entries.get(policy.entityType);
    if (existing) {
      if (existing.fingerprint !== fingerprint) {
        throw alreadyExists('entity type', policy.entityType, { entityType: policy.entityType });
      }
      return existing;
    }

    const tables = this.deriveTables(policy, fingerprint);
    const taken = new Set([
      CATALOG_TABLE,
      `${CATALOG_TABLE}_tables`,
      ...this.list().flatMap((entry) => schemaObjectNames(entry)),
    ]);
    const own = new Set<string>();
    for (const name of schemaObjectNames(tables)) {
      if (taken.has(name)) {
        throw invalidPolicy(policy.entityType, `name ${name} is already used by another entity type`, {
          field: name,
        });
      }
      if (own.has(name)) {
        throw invalidPolicy(policy.entityType, `name ${name} is derived twice`, { field: name });
      }
      own.add(name);
    }

    this.entries.set(policy.entityType, tables);
    return tables;
  }

  /**
   * Gets the mapping for an entity type
   *
   * @throws NotFoundError (POLICY_NOT_FOUND) if the type is not registered
   */
  get(entityType: string): EntityTables {
    const entry = this.entries.get(entityType);
    if (!entry) {
      throw policyNotFound(entityType);
    }
    return entry;
  }

  has(entityType: string): boolean {
    return this.entries.has(entityType);
  }

  list(): EntityTables[] {
    return [...this.entries.values()];
  }

  /**
   * Applies catalog migrations and creates the tables of every registered
   * type. Types already in the catalog must match their registered shape.
   *
   * @throws ValidationError (SCHEMA_MISMATCH) if installed tables came from a different policy
   */
  install(backend: StorageBackend): void {
    initializeSchema(backend);
    backend.transaction(
      (tx) => {
        for (const tables of this.entries.values()) {
          installTables(tx, tables);
        }
      },
      { isolation: 'immediate' }
    );
  }

  private deriveTables(policy: TemporalPolicy, fingerprint: string): EntityTables {
    const type = policy.entityType;
    const history = new Map<string, HistoryTable>();
    for (const unit of getTrackedUnits(policy)) {
      const columns: Record<string, string> = {};
      for (const field of unit.fields) {
        columns[field] = truncateIdentifier(field, this.maxLength);
      }
      const table = truncateIdentifier(`${type}_history_${unit.name}`, this.maxLength);
      history.set(unit.name, {
        unit,
        table,
        columns,
        openIndex: truncateIdentifier(`${table}_open`, this.maxLength),
      });
    }

    const clockTable = truncateIdentifier(`${type}_clock`, this.maxLength);
    return {
      policy,
      entityTable: truncateIdentifier(type, this.maxLength),
      clockTable,
      clockOpenIndex: truncateIdentifier(`${clockTable}_open`, this.maxLength),
      history,
      fingerprint,
    };
  }
}

// ============================================================================
// DDL
// ============================================================================

/**
 * Tables and indexes share one namespace in SQLite. Lowercased, since
 * SQLite compares names case-insensitively.
 */
function schemaObjectNames(tables: EntityTables): string[] {
  return [
    tables.entityTable,
    tables.clockTable,
    tables.clockOpenIndex,
    ...[...tables.history.values()].flatMap((h) => [h.table, h.openIndex]),
  ].map((name) => name.toLowerCase());
}

function installTables(tx: Transaction, tables: EntityTables): void {
  const type = tables.policy.entityType;
  const installed = tx.queryOne<{ fingerprint: string }>(
    `SELECT fingerprint FROM ${CATALOG_TABLE} WHERE entity_type = ?`,
    [type]
  );
  if (installed) {
    if (installed.fingerprint !== tables.fingerprint) {
      throw schemaMismatch(type, tables.fingerprint, installed.fingerprint);
    }
    return;
  }

  tx.exec(createTableSql(tables));
  tx.run(
    `INSERT INTO ${CATALOG_TABLE} (entity_type, fingerprint, installed_at) VALUES (?, ?, ?)`,
    [type, tables.fingerprint, createTimestamp()]
  );
  const units: Array<[string, string]> = [
    [ENTITY_UNIT, tables.entityTable],
    [CLOCK_UNIT, tables.clockTable],
    ...[...tables.history.values()].map((h): [string, string] => [h.unit.name, h.table]),
  ];
  for (const [unit, table] of units) {
    tx.run(
      `INSERT INTO ${CATALOG_TABLE}_tables (entity_type, unit, table_name) VALUES (?, ?, ?)`,
      [type, unit, table]
    );
  }
}

/**
 * DDL for all tables of one entity type
 */
export function createTableSql(tables: EntityTables): string {
  const entity = quoteIdentifier(tables.entityTable);
  const clock = quoteIdentifier(tables.clockTable);

  const statements = [
    `CREATE TABLE IF NOT EXISTS ${entity} (
    id TEXT PRIMARY KEY,
    vclock INTEGER NOT NULL CHECK (vclock >= 1),
    data TEXT NOT NULL,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
)`,
    `CREATE TABLE IF NOT EXISTS ${clock} (
    entity_id TEXT NOT NULL REFERENCES ${entity}(id),
    vclock INTEGER NOT NULL CHECK (vclock >= 1),
    tick_start TEXT NOT NULL,
    tick_end TEXT,
    activity_id TEXT,
    PRIMARY KEY (entity_id, vclock),
    UNIQUE (entity_id, activity_id)
)`,
    `CREATE UNIQUE INDEX IF NOT EXISTS ${quoteIdentifier(tables.clockOpenIndex)} ON ${clock}(entity_id) WHERE tick_end IS NULL`,
  ];

  for (const history of tables.history.values()) {
    const table = quoteIdentifier(history.table);
    const valueColumns = history.unit.fields
      .map((field) => `    ${quoteIdentifier(history.columns[field])} TEXT NOT NULL,`)
      .join('\n');
    statements.push(
      `CREATE TABLE IF NOT EXISTS ${table} (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    entity_id TEXT NOT NULL REFERENCES ${entity}(id),
    vclock INTEGER NOT NULL CHECK (vclock >= 1),
    vclock_end INTEGER,
    tick_start TEXT NOT NULL,
    tick_end TEXT,
${valueColumns}
    UNIQUE (entity_id, vclock)
)`,
      `CREATE UNIQUE INDEX IF NOT EXISTS ${quoteIdentifier(history.openIndex)} ON ${table}(entity_id) WHERE tick_end IS NULL`
    );
  }

  return statements.map((sql) => `${sql};`).join('\n');
}
