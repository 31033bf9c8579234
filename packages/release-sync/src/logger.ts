import pino from 'pino';
import type { Logger } from 'pino';

export interface LoggerOptions {
  level?: string;
  /** Human-readable output via pino-pretty instead of JSON lines */
  pretty?: boolean;
}

// Root application logger, written to stderr. Components derive children
// with `logger.child({ component })`.
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? process.env['LOG_LEVEL'] ?? 'info';
  const pretty = options.pretty ?? process.env['NODE_ENV'] === 'development';

  if (pretty) {
    return pino({
      name: 'release-sync',
      level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination: 2 },
      },
    });
  }

  return pino({ name: 'release-sync', level }, pino.destination(2));
}

export type { Logger };
