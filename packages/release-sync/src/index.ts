// Release model
export { ArtifactRecord, parseRfc2822Date } from './release/index.js';
export type { ArtifactRecordFields, FeedFields } from './release/index.js';

// Feed module
export { FeedEntryResolver, recordFromItem, fileNameFromTitle, parseFeed, FeedParseError } from './feed/index.js';
export type { ParsedFeed, FeedItem, FeedMediaContent, FeedHash } from './feed/index.js';

// Transfer module
export {
  alreadyFetched,
  destinationPathFor,
  ResumableTransfer,
  completionMessage,
  DEFAULT_RETRY_LIMIT,
} from './transfer/index.js';
export type { TransferResult, ResumableTransferOptions } from './transfer/index.js';

// Engine module
export { ReleaseWatcher, SyncCycle, createContext } from './engine/index.js';
export type {
  TypedReleaseWatcherEmitter,
  SyncCycleOptions,
  ReleaseSyncContext,
  CycleState,
  CycleOutcome,
  TransferOutcome,
  WatcherState,
  ReleaseWatcherStats,
  ReleaseWatcherEvents,
} from './engine/index.js';

// Collaborators
export { ReleaseHttpClient, DEFAULT_REQUEST_HEADERS, isSuccessStatus, readBody } from './http/index.js';
export type { HttpClient, HttpResponse, HttpRequestOptions, ReleaseHttpClientOptions } from './http/index.js';
export { SlackNotifier } from './notify/index.js';
export type { Notifier, SlackNotifierOptions } from './notify/index.js';
export { buildStaticServer, listenStaticServer } from './server/index.js';
export type { StaticServerContext } from './server/index.js';

// Config, app, errors, logging
export {
  buildSyncConfig,
  validateSyncConfig,
  parseListenAddr,
  publicUrlPrefix,
  DEFAULT_SYNC_CONFIG,
} from './config/index.js';
export type { SyncConfig, ListenAddress } from './config/index.js';
export { startReleaseSync } from './app.js';
export type { ReleaseSyncApp, StartOptions } from './app.js';
export {
  ReleaseSyncError,
  ResolutionError,
  TransferError,
  NotificationError,
  ConfigError,
  errorMessage,
} from './errors.js';
export type { ResolutionErrorKind, TransferErrorKind, TransferErrorDetails } from './errors.js';
export { createLogger } from './logger.js';
export type { LoggerOptions } from './logger.js';
