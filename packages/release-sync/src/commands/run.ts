/**
 * release-sync run command (the default command).
 *
 *   release-sync <feedUrl> <recipient> <token> [options]
 *
 * Starts the static file server and polls the feed on the cron schedule
 * until the process is stopped. With --once, runs a single cycle, waits
 * for its transfer and exits.
 */

import { Command } from 'commander';
import type { Logger } from 'pino';
import { buildSyncConfig } from '../config/config.js';
import type { SyncConfig } from '../config/types.js';
import { DEFAULT_SYNC_CONFIG } from '../config/types.js';
import { startReleaseSync } from '../app.js';
import type { ReleaseSyncApp, StartOptions } from '../app.js';
import { errorMessage } from '../errors.js';

export interface RunOptions {
  saveDir?: string;
  assetsPath?: string;
  domain?: string;
  cron?: string;
  listenAddr?: string;
  once?: boolean;
}

/**
 * Map CLI arguments onto a SyncConfig. Options left unset fall back to
 * environment variables, then defaults.
 */
export function configFromArgs(
  feedUrl: string,
  recipient: string,
  token: string,
  options: RunOptions
): SyncConfig {
  return buildSyncConfig({
    feedUrl,
    recipient,
    token,
    ...(options.saveDir !== undefined && { saveDir: options.saveDir }),
    ...(options.assetsPath !== undefined && { assetsPath: options.assetsPath }),
    ...(options.domain !== undefined && { domain: options.domain }),
    ...(options.cron !== undefined && { cron: options.cron }),
    ...(options.listenAddr !== undefined && { listenAddr: options.listenAddr }),
  });
}

/** Run one cycle and wait for its transfer. Resolves to an exit code. */
export async function runOnce(app: ReleaseSyncApp): Promise<number> {
  const outcome = await app.watcher.triggerCycle();

  switch (outcome.status) {
    case 'aborted':
      return 1;
    case 'skipped':
    case 'in_flight':
      return 0;
    case 'downloading': {
      const result = await outcome.transfer;
      return result.ok ? 0 : 1;
    }
  }
}

export function registerRunCommand(
  program: Command,
  logger: Logger,
  startOptions?: StartOptions
): void {
  program
    .argument('<feedUrl>', 'release RSS feed URL')
    .argument('<recipient>', 'Slack channel or user ID to notify')
    .argument('<token>', 'Slack bot token')
    .option('--save-dir <dir>', `file save directory (default: ${DEFAULT_SYNC_CONFIG.saveDir})`)
    .option('--assets-path <path>', `static file URL path (default: ${DEFAULT_SYNC_CONFIG.assetsPath})`)
    .option('--domain <url>', `public domain for file URLs (default: ${DEFAULT_SYNC_CONFIG.domain})`)
    .option('--cron <expr>', `cron expression, seconds first (default: "${DEFAULT_SYNC_CONFIG.cron}")`)
    .option('--listen-addr <addr>', `static server listen address (default: ${DEFAULT_SYNC_CONFIG.listenAddr})`)
    .option('--once', 'run a single cycle, wait for the download and exit')
    .action(async (feedUrl: string, recipient: string, token: string, options: RunOptions) => {
      const config = configFromArgs(feedUrl, recipient, token, options);

      let app: ReleaseSyncApp;
      try {
        app = await startReleaseSync(config, logger, {
          ...startOptions,
          schedule: !options.once,
        });
      } catch (err) {
        logger.fatal({ error: errorMessage(err) }, 'Startup failed');
        process.exitCode = 1;
        return;
      }

      if (options.once) {
        const code = await runOnce(app);
        await app.close();
        process.exitCode = code;
        return;
      }

      const shutdown = (signal: string): void => {
        logger.info({ signal, inFlight: app.watcher.getStats().inFlight }, 'Shutting down');
        app
          .close()
          .catch((err: unknown) => {
            logger.error({ error: errorMessage(err) }, 'Error during shutdown');
          })
          .finally(() => {
            process.exit(0);
          });
      };

      process.once('SIGINT', () => shutdown('SIGINT'));
      process.once('SIGTERM', () => shutdown('SIGTERM'));
    });
}
