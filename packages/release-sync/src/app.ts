/**
 * Wires the engine and the static server around one shared context.
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import type { SyncConfig } from './config/types.js';
import { validateSyncConfig } from './config/config.js';
import { ConfigError } from './errors.js';
import { createContext } from './engine/context.js';
import type { ReleaseSyncContext } from './engine/context.js';
import { ReleaseWatcher } from './engine/release-watcher.js';
import { buildStaticServer, listenStaticServer } from './server/static-server.js';
import type { HttpClient } from './http/http-client.js';
import type { Notifier } from './notify/types.js';

export interface ReleaseSyncApp {
  readonly context: ReleaseSyncContext;
  readonly watcher: ReleaseWatcher;
  readonly server: FastifyInstance;
  /** Address the static server is bound to */
  readonly url: string;
  /** Stop the schedule and the server. Running transfers are not cancelled. */
  close(): Promise<void>;
}

export interface StartOptions {
  http?: HttpClient;
  notifier?: Notifier;
  /** Start the cron schedule (default true). `--once` runs cycles by hand. */
  schedule?: boolean;
}

/**
 * Start the static server and the release watcher.
 * Rejects on an invalid config or a bind failure; both are fatal.
 */
export async function startReleaseSync(
  config: SyncConfig,
  logger: Logger,
  options?: StartOptions
): Promise<ReleaseSyncApp> {
  const errors = validateSyncConfig(config);
  if (errors.length > 0) {
    throw new ConfigError(errors);
  }

  const context = createContext(config, logger, {
    http: options?.http,
    notifier: options?.notifier,
  });

  const server = await buildStaticServer(context);
  let url: string;
  try {
    url = await listenStaticServer(server, context);
  } catch (err) {
    await server.close();
    throw err;
  }

  const watcher = new ReleaseWatcher(context);
  if (options?.schedule ?? true) {
    try {
      watcher.start();
    } catch (err) {
      await server.close();
      throw err;
    }
  }

  return {
    context,
    watcher,
    server,
    url,
    async close(): Promise<void> {
      watcher.stop();
      await server.close();
    },
  };
}
