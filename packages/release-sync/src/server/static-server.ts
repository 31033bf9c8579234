/**
 * Static file server for downloaded artifacts.
 *
 * Serves the save directory under the assets prefix. Files show up as soon
 * as a transfer creates them; there is no registration step.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import Fastify from 'fastify';
import fastifyStatic from '@fastify/static';
import type { FastifyInstance } from 'fastify';
import { parseListenAddr } from '../config/config.js';
import { ConfigError } from '../errors.js';
import type { ReleaseSyncContext } from '../engine/context.js';

/** The parts of the shared context the server reads */
export type StaticServerContext = Pick<ReleaseSyncContext, 'config' | 'logger'>;

function normalizePrefix(assetsPath: string): string {
  return assetsPath.endsWith('/') ? assetsPath : `${assetsPath}/`;
}

export async function buildStaticServer(ctx: StaticServerContext): Promise<FastifyInstance> {
  const { saveDir, assetsPath } = ctx.config;
  const root = path.resolve(saveDir);
  fs.mkdirSync(root, { recursive: true });

  const app = Fastify({ logger: false });

  await app.register(fastifyStatic, {
    root,
    prefix: normalizePrefix(assetsPath),
    index: false,
    list: false,
    dotfiles: 'deny',
  });

  app.get('/healthz', async () => ({ status: 'ok' }));

  return app;
}

/**
 * Bind the server. A bind failure rejects; the CLI treats it as fatal.
 */
export async function listenStaticServer(
  app: FastifyInstance,
  ctx: StaticServerContext
): Promise<string> {
  const { listenAddr } = ctx.config;
  const address = parseListenAddr(listenAddr);
  if (!address) {
    throw new ConfigError([`listenAddr must be host:port: ${listenAddr}`]);
  }

  const url = await app.listen({ host: address.host, port: address.port });
  ctx.logger.child({ component: 'static-server' }).info({ url }, 'Static file server listening');
  return url;
}
