export { ReleaseWatcher } from './release-watcher.js';
export type { TypedReleaseWatcherEmitter } from './release-watcher.js';
export { SyncCycle } from './sync-cycle.js';
export type { SyncCycleOptions } from './sync-cycle.js';
export { createContext } from './context.js';
export type { ReleaseSyncContext } from './context.js';
export type {
  CycleState,
  CycleOutcome,
  TransferOutcome,
  WatcherState,
  ReleaseWatcherStats,
  ReleaseWatcherEvents,
} from './types.js';
