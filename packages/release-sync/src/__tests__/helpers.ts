import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { HttpClient, HttpRequestOptions, HttpResponse } from '../http/http-client.js';
import type { Notifier } from '../notify/types.js';
import { buildSyncConfig } from '../config/config.js';
import type { SyncConfig } from '../config/types.js';

export interface MockLogger {
  child: ReturnType<typeof vi.fn>;
  trace: ReturnType<typeof vi.fn>;
  debug: ReturnType<typeof vi.fn>;
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
  fatal: ReturnType<typeof vi.fn>;
}

/** child() hands back the same mock so calls can be asserted in one place */
export function createMockLogger(): { logger: Logger; mock: MockLogger } {
  const mock: MockLogger = {
    child: vi.fn(),
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  };
  mock.child.mockReturnValue(mock);
  return { logger: mock as unknown as Logger, mock };
}

export function createMockNotifier(): Notifier & { notify: ReturnType<typeof vi.fn> } {
  return { notify: vi.fn().mockResolvedValue(undefined) };
}

export function makeConfig(saveDir: string, overrides?: Partial<SyncConfig>): SyncConfig {
  return buildSyncConfig({
    feedUrl: 'http://feed.test/rss',
    recipient: 'C0123',
    token: 'test-token',
    saveDir,
    assetsPath: '/assets',
    domain: 'http://localhost:8080',
    cron: '*/20 * * * * *',
    listenAddr: '127.0.0.1:0',
    connectTimeoutMs: 10_000,
    retryLimit: 5,
    ...overrides,
  });
}

// ─── Scripted HTTP ────────────────────────────────────────────────

/** One scripted answer. An Error in `chunks` breaks the stream there. */
export interface ScriptedResponse {
  status?: number;
  chunks: Array<string | Error>;
  /** Hold the body until this settles */
  gate?: Promise<void>;
}

export interface RecordedRequest {
  url: string;
  headers: Record<string, string>;
}

async function* scriptedBody(response: ScriptedResponse): AsyncGenerator<Uint8Array> {
  if (response.gate) {
    await response.gate;
  }
  for (const chunk of response.chunks) {
    if (chunk instanceof Error) throw chunk;
    yield Buffer.from(chunk);
  }
}

/**
 * HttpClient that answers from per-URL queues. The last queued answer for
 * a URL is reused once the others are used up.
 */
export class FakeHttpClient implements HttpClient {
  readonly requests: RecordedRequest[] = [];
  /** URLs whose response body was discarded unread */
  readonly discarded: string[] = [];
  private readonly routes = new Map<string, Array<ScriptedResponse | Error>>();

  on(url: string, ...responses: Array<ScriptedResponse | Error>): this {
    this.routes.set(url, [...(this.routes.get(url) ?? []), ...responses]);
    return this;
  }

  requestsTo(url: string): RecordedRequest[] {
    return this.requests.filter((r) => r.url === url);
  }

  get(url: string, options?: HttpRequestOptions): Promise<HttpResponse> {
    this.requests.push({ url, headers: { ...options?.headers } });

    const queue = this.routes.get(url);
    const next = queue && queue.length > 1 ? queue.shift() : queue?.[0];
    if (!next) {
      return Promise.reject(new Error(`No scripted response for ${url}`));
    }
    if (next instanceof Error) {
      return Promise.reject(next);
    }

    return Promise.resolve({
      status: next.status ?? 200,
      url,
      contentLength: null,
      body: scriptedBody(next),
      discard: (): Promise<void> => {
        this.discarded.push(url);
        return Promise.resolve();
      },
    });
  }
}

// ─── Feed fixtures ────────────────────────────────────────────────

export interface ItemFields {
  title?: string;
  pubDate?: string;
  link?: string;
  hash?: string;
  /** Leave out <media:content> entirely */
  noMedia?: boolean;
}

export function rssItem(fields: ItemFields): string {
  const parts: string[] = [];
  if (fields.title !== undefined) parts.push(`<title>${fields.title}</title>`);
  if (fields.link !== undefined) parts.push(`<link>${fields.link}</link>`);
  if (fields.pubDate !== undefined) parts.push(`<pubDate>${fields.pubDate}</pubDate>`);
  if (!fields.noMedia) {
    const hash = fields.hash !== undefined ? `<media:hash algo="md5">${fields.hash}</media:hash>` : '';
    parts.push(`<media:content url="${fields.link ?? ''}" type="application/zip">${hash}</media:content>`);
  }
  return `<item>${parts.join('')}</item>`;
}

export function rssFeed(items: string[]): string {
  return [
    '<?xml version="1.0" encoding="utf-8"?>',
    '<rss version="2.0" xmlns:media="http://video.search.yahoo.com/mrss/">',
    '<channel>',
    '<title>Release feed</title>',
    ...items,
    '</channel>',
    '</rss>',
  ].join('\n');
}

export const BUILD_42: Required<Omit<ItemFields, 'noMedia'>> = {
  title: 'rom/build-42.zip',
  pubDate: 'Mon, 01 Jan 2024 00:00:00 GMT',
  link: 'http://x/f.zip',
  hash: 'abc123',
};

/** A promise plus the function that resolves it, for holding a body open */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
