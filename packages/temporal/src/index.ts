/**
 * @strata/temporal
 *
 * Bitemporal change capture: recording scopes batch attribute changes into
 * versions, and each commit writes history rows and clock records for them
 * in the committing transaction.
 */

// Entities
export {
  TemporalEntity,
  type ChangeListener,
  type PendingState,
  type TemporalEntityInit,
} from './entity/temporal-entity.js';

// Change set detection
export { diff, changedAttributes, type AttributeChange, type DiffContext } from './detector/change-set.js';

// Recording scopes
export { RecordingScope, ScopeState, type ScopeOptions } from './scope/recording-scope.js';

// Clock ledger and history
export { ClockLedger } from './ledger/clock-ledger.js';
export { HistoryWriter } from './history/history-writer.js';
export { HistoryQuery } from './query/history-query.js';

// Flush
export {
  FlushCoordinator,
  type FlushCoordinatorOptions,
  type FlushResult,
  type FlushedEntity,
} from './flush/flush-coordinator.js';

// Sessions and stores
export {
  TemporalSession,
  type TemporalSessionOptions,
  type CreateOptions,
} from './session/temporal-session.js';
export {
  openTemporalStore,
  type TemporalStore,
  type TemporalStoreOptions,
  type SessionOptions,
} from './store.js';

// Configuration
export * from './config/index.js';

// Logging
export { createLogger, getLogLevel, type Logger, type LogLevel } from './utils/logger.js';
