/**
 * Tests for Schema Management
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createStorage } from './node-backend.js';
import type { StorageBackend } from './backend.js';
import {
  CURRENT_SCHEMA_VERSION,
  CATALOG_TABLE,
  MIGRATIONS,
  initializeSchema,
} from './schema.js';

function tableNames(backend: StorageBackend): string[] {
  return backend
    .query<{ name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
    )
    .map((row) => row.name);
}

describe('Schema Management', () => {
  let backend: StorageBackend;

  beforeEach(() => {
    backend = createStorage({ path: ':memory:' });
  });

  afterEach(() => {
    if (backend.isOpen) {
      backend.close();
    }
  });

  describe('Schema Constants', () => {
    it('should number migrations from 1 in ascending order', () => {
      expect(MIGRATIONS.map((m) => m.version)).toEqual([1, 2]);
      expect(MIGRATIONS[MIGRATIONS.length - 1].version).toBe(CURRENT_SCHEMA_VERSION);
    });
  });

  describe('initializeSchema', () => {
    it('should apply all migrations to a fresh database', () => {
      expect(backend.getSchemaVersion()).toBe(0);

      const result = initializeSchema(backend);

      expect(result.applied).toEqual([1, 2]);
      expect(backend.getSchemaVersion()).toBe(CURRENT_SCHEMA_VERSION);
    });

    it('should be idempotent', () => {
      initializeSchema(backend);
      const result = initializeSchema(backend);
      expect(result.applied).toEqual([]);
      expect(result.toVersion).toBe(CURRENT_SCHEMA_VERSION);
    });

    it('should create the catalog tables', () => {
      initializeSchema(backend);
      expect(tableNames(backend)).toEqual([CATALOG_TABLE, `${CATALOG_TABLE}_tables`]);
    });
  });
});
