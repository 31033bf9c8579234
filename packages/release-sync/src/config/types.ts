/**
 * Types for release-sync configuration.
 */

/** Process start parameters for the release-sync engine */
export interface SyncConfig {
  /** RSS feed announcing releases (required) */
  feedUrl: string;
  /** Slack channel or user ID that receives completion messages (required) */
  recipient: string;
  /** Slack bot token (required) */
  token: string;
  /** Directory downloaded artifacts are saved to and served from */
  saveDir: string;
  /** URL path prefix the save directory is served under */
  assetsPath: string;
  /** Public origin used to build artifact URLs in notifications */
  domain: string;
  /** Cron expression, seconds first (6 fields) */
  cron: string;
  /** Static server listen address as host:port */
  listenAddr: string;
  /** Connect timeout for outbound HTTP requests (ms) */
  connectTimeoutMs: number;
  /** Total attempts a download may make before giving up */
  retryLimit: number;
  /** User-Agent sent with every outbound request */
  userAgent: string;
}

export const DEFAULT_SYNC_CONFIG: Omit<SyncConfig, 'feedUrl' | 'recipient' | 'token'> = {
  saveDir: 'assets',
  assetsPath: '/assets',
  domain: 'http://localhost:8080',
  cron: '*/20 * * * * *',
  listenAddr: '0.0.0.0:8080',
  connectTimeoutMs: 10_000,
  retryLimit: 5,
  userAgent: 'Wget/1.21.4',
};

export interface ListenAddress {
  host: string;
  port: number;
}
