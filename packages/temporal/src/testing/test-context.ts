/**
 * Test Context
 *
 * In-memory store, manual clock and capturing logger shared by the
 * temporal package's tests.
 */

import {
  defineTemporalPolicy,
  type EntityRef,
  type TemporalPolicy,
  type Timestamp,
} from '@strata/core';
import {
  TableRegistry,
  createStorage,
  quoteIdentifier,
  type StorageBackend,
} from '@strata/storage';
import { TemporalSession } from '../session/temporal-session.js';
import type { Logger, LogLevel } from '../utils/logger.js';

// ============================================================================
// Policies
// ============================================================================

/**
 * Scope-required notes: two single fields, a defaulted field and a composite
 */
export const notePolicy: TemporalPolicy = defineTemporalPolicy({
  entityType: 'note',
  track: ['title', 'description', 'priority'],
  composites: { span: ['startsAt', 'endsAt'] },
  scopeRequired: true,
  defaults: { priority: 0 },
});

/**
 * Tasks whose every version names an activity
 */
export const taskPolicy: TemporalPolicy = defineTemporalPolicy({
  entityType: 'task',
  track: ['status'],
  activityRequired: true,
});

/**
 * Memos with no scope requirement
 */
export const memoPolicy: TemporalPolicy = defineTemporalPolicy({
  entityType: 'memo',
  track: ['body'],
});

export const TEST_POLICIES: readonly TemporalPolicy[] = [notePolicy, taskPolicy, memoPolicy];

// ============================================================================
// Clock
// ============================================================================

export const TEST_EPOCH = '2025-01-01T00:00:00.000Z';

export interface TestClock {
  /** Current instant; does not advance on its own */
  now(): Timestamp;
  /** Moves the clock forward and returns the new instant */
  tick(ms?: number): Timestamp;
  set(at: Timestamp): void;
}

export function createTestClock(start: Timestamp = TEST_EPOCH): TestClock {
  let current = new Date(start).getTime();
  return {
    now: () => new Date(current).toISOString(),
    tick(ms = 1000) {
      current += ms;
      return new Date(current).toISOString();
    },
    set(at) {
      current = new Date(at).getTime();
    },
  };
}

/**
 * ISO timestamp `seconds` after the test epoch
 */
export function at(seconds: number): Timestamp {
  return new Date(new Date(TEST_EPOCH).getTime() + seconds * 1000).toISOString();
}

// ============================================================================
// Logger
// ============================================================================

export interface LogEntry {
  level: LogLevel;
  message: string;
}

export interface MemoryLogger extends Logger {
  readonly entries: LogEntry[];
}

/**
 * Logger that keeps every line instead of printing it
 */
export function createMemoryLogger(): MemoryLogger {
  const entries: LogEntry[] = [];
  const push = (level: LogLevel) => (message: string) => {
    entries.push({ level, message });
  };
  return {
    entries,
    debug: push('DEBUG'),
    info: push('INFO'),
    warn: push('WARNING'),
    error: push('ERROR'),
  };
}

// ============================================================================
// Context
// ============================================================================

export interface TestContext {
  backend: StorageBackend;
  registry: TableRegistry;
  clock: TestClock;
  logger: MemoryLogger;
  openSession(options?: { strictScope?: boolean }): TemporalSession;
  close(): void;
}

/**
 * Installs the given policies in a fresh in-memory database
 */
export function setupTestContext(policies: readonly TemporalPolicy[] = TEST_POLICIES): TestContext {
  const backend = createStorage({ path: ':memory:' });
  const registry = new TableRegistry();
  for (const policy of policies) {
    registry.register(policy);
  }
  registry.install(backend);

  const clock = createTestClock();
  const logger = createMemoryLogger();

  return {
    backend,
    registry,
    clock,
    logger,
    openSession: (options = {}) =>
      new TemporalSession({
        backend,
        registry,
        now: clock.now,
        strictScope: options.strictScope,
        logger,
      }),
    close: () => {
      if (backend.isOpen) {
        backend.close();
      }
    },
  };
}

/**
 * Inserts a bare entity row so ledger and history rows can reference it
 */
export function insertEntityRow(context: TestContext, entity: EntityRef, vclock = 1): void {
  const table = quoteIdentifier(context.registry.get(entity.entityType).entityTable);
  context.backend.run(
    `INSERT INTO ${table} (id, vclock, data, created_at, updated_at) VALUES (?, ?, '{}', ?, ?)`,
    [entity.id, vclock, TEST_EPOCH, TEST_EPOCH]
  );
}
