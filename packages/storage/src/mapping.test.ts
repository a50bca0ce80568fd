/**
 * Tests for the policy-derived table mapping
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  ConflictError,
  ErrorCode,
  NotFoundError,
  ValidationError,
  defineTemporalPolicy,
} from '@strata/core';
import { createStorage } from './node-backend.js';
import type { StorageBackend } from './backend.js';
import {
  TableRegistry,
  truncateIdentifier,
  quoteIdentifier,
  policyFingerprint,
} from './mapping.js';

function schemaObjects(backend: StorageBackend, type: 'table' | 'index', table?: string): string[] {
  const filter = table === undefined ? '' : ' AND tbl_name = ?';
  return backend
    .query<{ name: string }>(
      `SELECT name FROM sqlite_master WHERE type = ? AND name NOT LIKE 'sqlite_%'${filter} ORDER BY name`,
      table === undefined ? [type] : [type, table]
    )
    .map((row) => row.name);
}

const notePolicy = defineTemporalPolicy({
  entityType: 'note',
  track: ['title', 'body'],
  composites: { span: ['startsAt', 'endsAt'] },
});

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('truncateIdentifier', () => {
  it('should leave short names alone', () => {
    expect(truncateIdentifier('note_history_title')).toBe('note_history_title');
    expect(truncateIdentifier('x'.repeat(63))).toBe('x'.repeat(63));
  });

  it('should shorten long names with an md5 suffix', () => {
    const truncated = truncateIdentifier('a'.repeat(70));
    expect(truncated).toHaveLength(63);
    expect(truncated).toMatch(/^a{54}_[0-9a-f]{8}$/);
  });

  it('should keep distinct long names distinct', () => {
    const prefix = 'p'.repeat(60);
    expect(truncateIdentifier(`${prefix}_one`)).not.toBe(truncateIdentifier(`${prefix}_two`));
  });

  it('should honour a custom limit', () => {
    expect(truncateIdentifier('observation_history_value', 20)).toHaveLength(20);
    expect(truncateIdentifier('observation_history_value', 20).startsWith('observation_')).toBe(true);
  });
});

describe('quoteIdentifier', () => {
  it('should double embedded quotes', () => {
    expect(quoteIdentifier('note')).toBe('"note"');
    expect(quoteIdentifier('a"b')).toBe('"a""b"');
  });
});

describe('policyFingerprint', () => {
  it('should ignore flags and defaults', () => {
    const strict = defineTemporalPolicy({
      entityType: 'note',
      track: ['title', 'body'],
      composites: { span: ['startsAt', 'endsAt'] },
      scopeRequired: true,
      defaults: { body: '' },
    });
    expect(policyFingerprint(strict)).toBe(policyFingerprint(notePolicy));
  });

  it('should change when tracked units change', () => {
    const fewer = defineTemporalPolicy({ entityType: 'note', track: ['title'] });
    expect(policyFingerprint(fewer)).not.toBe(policyFingerprint(notePolicy));
  });
});

describe('TableRegistry', () => {
  it('should derive table names from the policy', () => {
    const tables = new TableRegistry().register(notePolicy);

    expect(tables.entityTable).toBe('note');
    expect(tables.clockTable).toBe('note_clock');
    expect(tables.clockOpenIndex).toBe('note_clock_open');
    expect([...tables.history.keys()]).toEqual(['title', 'body', 'span']);
    expect(tables.history.get('title')?.table).toBe('note_history_title');
    expect(tables.history.get('span')?.columns).toEqual({ startsAt: 'startsAt', endsAt: 'endsAt' });
  });

  it('should return the existing mapping for the same shape', () => {
    const registry = new TableRegistry();
    const first = registry.register(notePolicy);
    expect(registry.register(notePolicy)).toBe(first);
  });

  it('should reject a different shape under a registered type', () => {
    const registry = new TableRegistry();
    registry.register(notePolicy);
    const other = defineTemporalPolicy({ entityType: 'note', track: ['title'] });

    const error = captureError(() => registry.register(other));
    expect(error).toBeInstanceOf(ConflictError);
    expect(error).toMatchObject({ code: ErrorCode.ALREADY_EXISTS });
  });

  it('should reject entity types whose tables collide', () => {
    const registry = new TableRegistry();
    registry.register(notePolicy);
    const clash = defineTemporalPolicy({ entityType: 'note_clock', track: ['tick'] });

    expect(() => registry.register(clash)).toThrow(
      'Invalid temporal policy for note_clock: name note_clock is already used by another entity type'
    );
  });

  it('should reject an entity type named like another type\'s index', () => {
    const registry = new TableRegistry();
    registry.register(defineTemporalPolicy({ entityType: 'a', track: ['x'] }));
    const clash = defineTemporalPolicy({ entityType: 'a_clock_open', track: ['y'] });

    expect(() => registry.register(clash)).toThrow(
      'Invalid temporal policy for a_clock_open: name a_clock_open is already used by another entity type'
    );
    expect(registry.has('a_clock_open')).toBe(false);
  });

  it('should reject a policy whose own table and index names collide', () => {
    const clash = defineTemporalPolicy({ entityType: 'a', track: ['x', 'x_open'] });

    expect(() => new TableRegistry().register(clash)).toThrow(
      'Invalid temporal policy for a: name a_history_x_open is derived twice'
    );
  });

  it('should reject the catalog table names', () => {
    const clash = defineTemporalPolicy({ entityType: 'temporal_catalog', track: ['x'] });
    expect(() => new TableRegistry().register(clash)).toThrow(ValidationError);
  });

  it('should throw POLICY_NOT_FOUND for unknown types', () => {
    const error = captureError(() => new TableRegistry().get('ghost'));
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toMatchObject({
      code: ErrorCode.POLICY_NOT_FOUND,
      message: 'No temporal policy registered for entity type: ghost',
    });
  });

  it('should truncate derived names to the configured length', () => {
    const policy = defineTemporalPolicy({ entityType: 'observation', track: ['measuredValue'] });
    const tables = new TableRegistry({ maxIdentifierLength: 20 }).register(policy);

    const history = tables.history.get('measuredValue');
    expect(history?.table).toHaveLength(20);
    expect(history?.table).toBe(truncateIdentifier('observation_history_measuredValue', 20));
    expect(tables.clockTable).toBe('observation_clock');
  });

  it('should reject identifier limits too short for the hash suffix', () => {
    expect(() => new TableRegistry({ maxIdentifierLength: 10 })).toThrow(ValidationError);
  });
});

describe('TableRegistry.install', () => {
  let backend: StorageBackend;
  let registry: TableRegistry;

  beforeEach(() => {
    backend = createStorage({ path: ':memory:' });
    registry = new TableRegistry();
    registry.register(notePolicy);
  });

  afterEach(() => {
    backend.close();
  });

  it('should create entity, clock and history tables', () => {
    registry.install(backend);

    expect(schemaObjects(backend, 'table')).toEqual([
      'note',
      'note_clock',
      'note_history_body',
      'note_history_span',
      'note_history_title',
      'temporal_catalog',
      'temporal_catalog_tables',
    ]);
  });

  it('should give composite tables one column per member', () => {
    registry.install(backend);

    expect(
      backend
        .query<{ name: string }>('SELECT name FROM pragma_table_info(?)', ['note_history_span'])
        .map((c) => c.name)
    ).toEqual([
      'id',
      'entity_id',
      'vclock',
      'vclock_end',
      'tick_start',
      'tick_end',
      'startsAt',
      'endsAt',
    ]);
    expect(schemaObjects(backend, 'index', 'note_history_span')).toEqual(['note_history_span_open']);
  });

  it('should record the catalog', () => {
    registry.install(backend);

    const catalog = backend.queryOne<{ fingerprint: string }>(
      'SELECT fingerprint FROM temporal_catalog WHERE entity_type = ?',
      ['note']
    );
    expect(catalog?.fingerprint).toBe(policyFingerprint(notePolicy));
    expect(
      backend.query('SELECT unit, table_name FROM temporal_catalog_tables ORDER BY unit')
    ).toEqual([
      { unit: '@clock', table_name: 'note_clock' },
      { unit: '@entity', table_name: 'note' },
      { unit: 'body', table_name: 'note_history_body' },
      { unit: 'span', table_name: 'note_history_span' },
      { unit: 'title', table_name: 'note_history_title' },
    ]);
  });

  it('should be idempotent', () => {
    registry.install(backend);
    expect(() => registry.install(backend)).not.toThrow();
    expect(backend.query('SELECT * FROM temporal_catalog')).toHaveLength(1);
  });

  it('should reject a changed policy against installed tables', () => {
    registry.install(backend);

    const changed = new TableRegistry();
    changed.register(defineTemporalPolicy({ entityType: 'note', track: ['title'] }));

    const error = captureError(() => changed.install(backend));
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ code: ErrorCode.SCHEMA_MISMATCH });
  });

  it('should allow only one open clock record per entity', () => {
    registry.install(backend);
    const now = '2025-01-01T00:00:00.000Z';
    backend.run(
      'INSERT INTO note (id, vclock, data, created_at, updated_at) VALUES (?, 1, ?, ?, ?)',
      ['n-1', '{}', now, now]
    );
    backend.run('INSERT INTO note_clock (entity_id, vclock, tick_start) VALUES (?, 1, ?)', ['n-1', now]);

    expect(() =>
      backend.run('INSERT INTO note_clock (entity_id, vclock, tick_start) VALUES (?, 2, ?)', [
        'n-1',
        now,
      ])
    ).toThrow(ConflictError);
  });
});
