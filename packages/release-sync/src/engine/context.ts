/**
 * Shared handle passed to both the scheduled cycles and the static server.
 *
 * Everything that would otherwise be a process-wide singleton (config,
 * logger, HTTP client with its cookie jar, notifier) lives here and is
 * handed to each consumer explicitly.
 */

import type { Logger } from 'pino';
import type { SyncConfig } from '../config/types.js';
import { ReleaseHttpClient } from '../http/http-client.js';
import type { HttpClient } from '../http/http-client.js';
import { SlackNotifier } from '../notify/slack-notifier.js';
import type { Notifier } from '../notify/types.js';

export interface ReleaseSyncContext {
  readonly config: SyncConfig;
  readonly logger: Logger;
  readonly http: HttpClient;
  readonly notifier: Notifier;
}

export function createContext(
  config: SyncConfig,
  logger: Logger,
  overrides?: { http?: HttpClient; notifier?: Notifier }
): ReleaseSyncContext {
  const http =
    overrides?.http ??
    new ReleaseHttpClient({
      userAgent: config.userAgent,
      connectTimeoutMs: config.connectTimeoutMs,
      logger,
    });

  const notifier =
    overrides?.notifier ??
    new SlackNotifier({ recipient: config.recipient, token: config.token }, logger);

  return Object.freeze({ config, logger, http, notifier });
}
