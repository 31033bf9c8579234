/**
 * Shared outbound HTTP client.
 *
 * One instance is shared by the feed resolver and every transfer so that
 * cookies set by the feed host (or its download mirrors) are replayed on
 * later requests. Some feed hosts reject default accept-encoding
 * negotiation, so every request pins identity encoding.
 */

import { Agent, fetch } from 'undici';
import type { Dispatcher, Response } from 'undici';
import { CookieJar } from 'tough-cookie';
import type { Logger } from 'pino';

/** Headers sent with every request, before per-request headers */
export const DEFAULT_REQUEST_HEADERS: Readonly<Record<string, string>> = {
  accept: '*/*',
  'accept-encoding': 'identity',
};

const MAX_REDIRECTS = 10;
const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export interface HttpRequestOptions {
  headers?: Record<string, string>;
}

export interface HttpResponse {
  status: number;
  /** Final URL after redirects */
  url: string;
  /** Parsed Content-Length, or null when absent */
  contentLength: number | null;
  /** Body chunks in arrival order; iteration throws on a read error */
  body: AsyncIterable<Uint8Array>;
  /** Release an unread body so the connection can be reused */
  discard(): Promise<void>;
}

/**
 * Minimal GET-only client the engine depends on. Tests provide their own
 * implementation to script responses and stream failures.
 */
export interface HttpClient {
  get(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
}

export interface ReleaseHttpClientOptions {
  userAgent: string;
  connectTimeoutMs: number;
  /** Override the undici dispatcher (e.g. a MockAgent in tests) */
  dispatcher?: Dispatcher;
  cookieJar?: CookieJar;
  logger?: Logger;
}

async function* iterateBody(body: Response['body']): AsyncGenerator<Uint8Array> {
  if (!body) return;
  for await (const chunk of body) {
    yield chunk;
  }
}

/**
 * undici-backed HttpClient with a cookie jar and a connect-only timeout.
 *
 * Headers and body timeouts are disabled: a slow transfer that is still
 * connected is allowed to run as long as it needs.
 */
export class ReleaseHttpClient implements HttpClient {
  private readonly dispatcher: Dispatcher;
  private readonly jar: CookieJar;
  private readonly userAgent: string;
  private readonly logger: Logger | undefined;

  constructor(options: ReleaseHttpClientOptions) {
    this.dispatcher =
      options.dispatcher ??
      new Agent({
        connect: { timeout: options.connectTimeoutMs },
        headersTimeout: 0,
        bodyTimeout: 0,
      });
    this.jar = options.cookieJar ?? new CookieJar();
    this.userAgent = options.userAgent;
    this.logger = options.logger?.child({ component: 'http-client' });
  }

  /**
   * GET a URL, following redirects by hand so cookies set on any hop are
   * captured in the jar.
   */
  async get(url: string, options?: HttpRequestOptions): Promise<HttpResponse> {
    let current = url;

    for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
      const headers: Record<string, string> = {
        ...DEFAULT_REQUEST_HEADERS,
        'user-agent': this.userAgent,
        ...options?.headers,
      };

      const cookie = await this.jar.getCookieString(current);
      if (cookie) {
        headers['cookie'] = cookie;
      }

      const response = await fetch(current, {
        method: 'GET',
        headers,
        redirect: 'manual',
        dispatcher: this.dispatcher,
      });

      await this.storeCookies(current, response.headers);

      const location = response.headers.get('location');
      if (REDIRECT_STATUSES.has(response.status) && location) {
        await response.body?.cancel();
        const next = new URL(location, current).toString();
        this.logger?.debug({ from: current, to: next, status: response.status }, 'Following redirect');
        current = next;
        continue;
      }

      const body = response.body;
      return {
        status: response.status,
        url: current,
        contentLength: parseContentLength(response.headers.get('content-length')),
        body: iterateBody(body),
        discard: async (): Promise<void> => {
          if (body && !body.locked) {
            await body.cancel();
          }
        },
      };
    }

    throw new Error(`Too many redirects (>${MAX_REDIRECTS}) fetching ${url}`);
  }

  async close(): Promise<void> {
    await this.dispatcher.close();
  }

  private async storeCookies(url: string, headers: Response['headers']): Promise<void> {
    for (const setCookie of headers.getSetCookie()) {
      await this.jar.setCookie(setCookie, url, { ignoreError: true });
    }
  }
}

function parseContentLength(raw: string | null): number | null {
  if (raw === null) return null;
  const parsed = parseInt(raw, 10);
  return isNaN(parsed) ? null : parsed;
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/** Read a whole response body into one Buffer */
export async function readBody(response: HttpResponse): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of response.body) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}
