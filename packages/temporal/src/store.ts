/**
 * Temporal Store
 *
 * Opens a database from configuration, registers and installs the given
 * policies, and hands out sessions bound to it.
 */

import type { TemporalPolicy, Timestamp } from '@strata/core';
import { TableRegistry, createStorage, type StorageBackend } from '@strata/storage';
import { loadConfig } from './config/config.js';
import type { Configuration } from './config/types.js';
import { TemporalSession } from './session/temporal-session.js';
import { createLogger, type Logger } from './utils/logger.js';

export interface TemporalStoreOptions {
  policies: readonly TemporalPolicy[];
  /** Resolved configuration (default: loadConfig()) */
  config?: Configuration;
  logger?: Logger;
}

export interface SessionOptions {
  /** Overrides `recording.strictScope` for this session */
  strictScope?: boolean;
  now?: () => Timestamp;
}

export interface TemporalStore {
  readonly config: Configuration;
  readonly backend: StorageBackend;
  readonly registry: TableRegistry;
  openSession(options?: SessionOptions): TemporalSession;
  close(): void;
}

/**
 * Opens a temporal store
 *
 * @example
 * ```typescript
 * const store = openTemporalStore({ policies: [notePolicy] });
 * const session = store.openSession();
 * ```
 *
 * @throws ValidationError (SCHEMA_MISMATCH) if the database was installed from different policies
 */
export function openTemporalStore(options: TemporalStoreOptions): TemporalStore {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? createLogger('store');

  const registry = new TableRegistry({ maxIdentifierLength: config.identifiers.maxLength });
  for (const policy of options.policies) {
    registry.register(policy);
  }

  const backend = createStorage({
    path: config.database,
    pragmas: { busy_timeout: config.storage.busyTimeout },
  });
  try {
    registry.install(backend);
  } catch (error) {
    backend.close();
    throw error;
  }
  logger.info(`opened ${config.database} with ${registry.list().length} entity types`);

  return {
    config,
    backend,
    registry,
    openSession(sessionOptions: SessionOptions = {}): TemporalSession {
      return new TemporalSession({
        backend,
        registry,
        strictScope: sessionOptions.strictScope ?? config.recording.strictScope,
        now: sessionOptions.now,
        logger: options.logger,
      });
    },
    close(): void {
      if (backend.isOpen) {
        backend.close();
      }
    },
  };
}
