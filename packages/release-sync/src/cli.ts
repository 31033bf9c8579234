#!/usr/bin/env node

/**
 * release-sync - watch a release feed, download each new artifact once,
 * serve it and announce it on Slack.
 */

import { Command } from 'commander';
import { createRequire } from 'node:module';
import { registerRunCommand } from './commands/run.js';
import { createLogger } from './logger.js';
import { errorMessage } from './errors.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

const logger = createLogger();
const program = new Command();

program
  .name('release-sync')
  .description('Download the newest release from a feed, serve it and notify Slack')
  .version(pkg.version);

registerRunCommand(program, logger);

program.parseAsync().catch((err: unknown) => {
  logger.fatal({ error: errorMessage(err) }, 'Fatal error');
  process.exit(1);
});
