/**
 * Sync configuration builder.
 *
 * Reads from environment variables with defaults.
 * All values can be overridden programmatically (the CLI passes its
 * arguments as overrides).
 */

import { Cron } from 'croner';
import type { ListenAddress, SyncConfig } from './types.js';
import { DEFAULT_SYNC_CONFIG } from './types.js';

function getEnv(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function getEnvNumber(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined) return fallback;
  const parsed = parseInt(raw, 10);
  return isNaN(parsed) ? fallback : parsed;
}

/**
 * Build sync config from environment variables and optional overrides.
 *
 * Environment variables:
 * - RELEASE_SYNC_FEED_URL: RSS feed URL
 * - RELEASE_SYNC_RECIPIENT: Slack channel/user ID
 * - RELEASE_SYNC_TOKEN: Slack bot token
 * - RELEASE_SYNC_SAVE_DIR: Save directory (default: assets)
 * - RELEASE_SYNC_ASSETS_PATH: Static URL prefix (default: /assets)
 * - RELEASE_SYNC_DOMAIN: Public origin (default: http://localhost:8080)
 * - RELEASE_SYNC_CRON: Cron expression (default: every 20 seconds)
 * - RELEASE_SYNC_LISTEN_ADDR: Listen address (default: 0.0.0.0:8080)
 * - RELEASE_SYNC_CONNECT_TIMEOUT_MS: Connect timeout (default: 10000)
 * - RELEASE_SYNC_RETRY_LIMIT: Download attempts (default: 5)
 */
export function buildSyncConfig(overrides?: Partial<SyncConfig>): SyncConfig {
  return {
    feedUrl: overrides?.feedUrl ?? getEnv('RELEASE_SYNC_FEED_URL', ''),
    recipient: overrides?.recipient ?? getEnv('RELEASE_SYNC_RECIPIENT', ''),
    token: overrides?.token ?? getEnv('RELEASE_SYNC_TOKEN', ''),
    saveDir: overrides?.saveDir ?? getEnv('RELEASE_SYNC_SAVE_DIR', DEFAULT_SYNC_CONFIG.saveDir),
    assetsPath:
      overrides?.assetsPath ?? getEnv('RELEASE_SYNC_ASSETS_PATH', DEFAULT_SYNC_CONFIG.assetsPath),
    domain: overrides?.domain ?? getEnv('RELEASE_SYNC_DOMAIN', DEFAULT_SYNC_CONFIG.domain),
    cron: overrides?.cron ?? getEnv('RELEASE_SYNC_CRON', DEFAULT_SYNC_CONFIG.cron),
    listenAddr:
      overrides?.listenAddr ?? getEnv('RELEASE_SYNC_LISTEN_ADDR', DEFAULT_SYNC_CONFIG.listenAddr),
    connectTimeoutMs:
      overrides?.connectTimeoutMs ??
      getEnvNumber('RELEASE_SYNC_CONNECT_TIMEOUT_MS', DEFAULT_SYNC_CONFIG.connectTimeoutMs),
    retryLimit:
      overrides?.retryLimit ??
      getEnvNumber('RELEASE_SYNC_RETRY_LIMIT', DEFAULT_SYNC_CONFIG.retryLimit),
    userAgent: overrides?.userAgent ?? DEFAULT_SYNC_CONFIG.userAgent,
  };
}

/**
 * Parse a `host:port` listen address. IPv6 hosts may be bracketed
 * (`[::]:8080`). Returns null when the address is malformed.
 */
export function parseListenAddr(listenAddr: string): ListenAddress | null {
  const sep = listenAddr.lastIndexOf(':');
  if (sep <= 0) return null;

  let host = listenAddr.slice(0, sep);
  const portText = listenAddr.slice(sep + 1);
  if (host.startsWith('[') && host.endsWith(']')) {
    host = host.slice(1, -1);
  }

  if (!/^\d+$/.test(portText)) return null;
  const port = parseInt(portText, 10);
  if (port > 65_535 || host.length === 0) return null;

  return { host, port };
}

/** `{domain}{assetsPath}` with no trailing slash */
export function publicUrlPrefix(config: Pick<SyncConfig, 'domain' | 'assetsPath'>): string {
  return `${config.domain}${config.assetsPath}`.replace(/\/+$/, '');
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

function cronProblem(expression: string): string | null {
  try {
    const probe = new Cron(expression, { paused: true });
    probe.stop();
    return null;
  } catch (err) {
    return err instanceof Error ? err.message : String(err);
  }
}

/**
 * Validate a sync configuration.
 * Returns an array of error messages (empty = valid).
 */
export function validateSyncConfig(config: SyncConfig): string[] {
  const errors: string[] = [];

  if (!config.feedUrl) {
    errors.push('feedUrl is required');
  } else if (!isHttpUrl(config.feedUrl)) {
    errors.push(`feedUrl must be an http(s) URL: ${config.feedUrl}`);
  }

  if (!config.recipient) {
    errors.push('recipient is required');
  }

  if (!config.token) {
    errors.push('token is required');
  }

  if (!config.saveDir) {
    errors.push('saveDir is required');
  }

  if (!config.assetsPath.startsWith('/')) {
    errors.push('assetsPath must start with "/"');
  }

  if (!isHttpUrl(config.domain)) {
    errors.push(`domain must be an http(s) URL: ${config.domain}`);
  }

  const cronError = cronProblem(config.cron);
  if (cronError) {
    errors.push(`cron is invalid: ${cronError}`);
  }

  if (!parseListenAddr(config.listenAddr)) {
    errors.push(`listenAddr must be host:port: ${config.listenAddr}`);
  }

  if (config.connectTimeoutMs < 1) {
    errors.push('connectTimeoutMs must be at least 1');
  }

  if (config.retryLimit < 1) {
    errors.push('retryLimit must be at least 1');
  }

  return errors;
}
