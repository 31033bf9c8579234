export { buildSyncConfig, validateSyncConfig, parseListenAddr, publicUrlPrefix } from './config.js';
export type { SyncConfig, ListenAddress } from './types.js';
export { DEFAULT_SYNC_CONFIG } from './types.js';
