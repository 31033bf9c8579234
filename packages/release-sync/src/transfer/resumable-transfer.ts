/**
 * ResumableTransfer - download a release artifact with resume and retry.
 *
 * Every attempt asks for `Range: bytes={saved}-`, so a retry after a broken
 * stream continues from the bytes already on disk instead of starting over.
 * Only stream-read failures are retried; a request that cannot be sent or a
 * non-2xx answer fails the transfer at once.
 *
 * The origin is trusted to honour Range. A server that ignores it and sends
 * the whole body again will have that body appended.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { FileHandle } from 'node:fs/promises';
import type { Logger } from 'pino';
import type { HttpClient, HttpResponse } from '../http/http-client.js';
import { isSuccessStatus } from '../http/http-client.js';
import type { Notifier } from '../notify/types.js';
import type { ArtifactRecord } from '../release/artifact-record.js';
import { TransferError, errorMessage } from '../errors.js';

export const DEFAULT_RETRY_LIMIT = 5;

export interface TransferResult {
  fileName: string;
  destinationPath: string;
  bytesWritten: number;
  /** Attempts made, including the first */
  attempts: number;
  durationMs: number;
}

export interface ResumableTransferOptions {
  /** Total attempts allowed (first request plus resumes) */
  retryLimit?: number;
}

export function completionMessage(record: ArtifactRecord): string {
  return `download complete:\n${record.describe()}`;
}

async function writeFully(handle: FileHandle, chunk: Uint8Array): Promise<void> {
  let offset = 0;
  while (offset < chunk.length) {
    const { bytesWritten } = await handle.write(chunk, offset, chunk.length - offset);
    offset += bytesWritten;
  }
}

interface StreamOutcome {
  /** Bytes written to disk during this attempt */
  written: number;
  /** Read error that cut the stream short, if any */
  error: unknown;
  done: boolean;
}

export class ResumableTransfer {
  private readonly http: HttpClient;
  private readonly notifier: Notifier;
  private readonly logger: Logger;
  private readonly retryLimit: number;

  constructor(
    http: HttpClient,
    notifier: Notifier,
    logger: Logger,
    options?: ResumableTransferOptions
  ) {
    this.http = http;
    this.notifier = notifier;
    this.logger = logger.child({ component: 'resumable-transfer' });
    this.retryLimit = Math.max(1, options?.retryLimit ?? DEFAULT_RETRY_LIMIT);
  }

  /**
   * Download `record.downloadUrl` to `destinationPath`, then announce it.
   *
   * Rejects with TransferError. The file handle is closed on every path
   * and a partial file is left where it is.
   */
  async download(record: ArtifactRecord, destinationPath: string): Promise<TransferResult> {
    const startTime = Date.now();
    const handle = await this.openDestination(destinationPath);

    let savedLength = 0;
    let attempt = 1;

    try {
      this.logger.info(
        { fileName: record.fileName, url: record.downloadUrl, destinationPath },
        'Transfer started'
      );

      for (;;) {
        const response = await this.request(record.downloadUrl, savedLength, destinationPath, attempt);

        const outcome = await this.pump(response, handle, destinationPath, attempt, savedLength);
        savedLength += outcome.written;

        if (outcome.done) break;

        if (attempt >= this.retryLimit) {
          throw new TransferError(
            `Download of ${record.fileName} failed after ${attempt} attempts: ${errorMessage(outcome.error)}`,
            {
              kind: 'stream_failed',
              destinationPath,
              bytesWritten: savedLength,
              attempts: attempt,
              cause: outcome.error,
            }
          );
        }

        this.logger.warn(
          {
            fileName: record.fileName,
            attempt,
            retryLimit: this.retryLimit,
            resumeFrom: savedLength,
            error: errorMessage(outcome.error),
          },
          'Download stream failed, resuming'
        );
        attempt++;
      }

      await this.flush(handle, destinationPath, savedLength, attempt);
    } finally {
      await handle.close().catch((err: unknown) => {
        this.logger.error({ destinationPath, error: errorMessage(err) }, 'Failed to close destination file');
      });
    }

    const result: TransferResult = {
      fileName: record.fileName,
      destinationPath,
      bytesWritten: savedLength,
      attempts: attempt,
      durationMs: Date.now() - startTime,
    };

    this.logger.info(
      { fileName: record.fileName, bytesWritten: savedLength, attempts: attempt },
      'Transfer complete'
    );

    await this.notifier.notify(completionMessage(record));

    return result;
  }

  private async openDestination(destinationPath: string): Promise<FileHandle> {
    try {
      await fs.promises.mkdir(path.dirname(destinationPath), { recursive: true });
      return await fs.promises.open(destinationPath, 'w');
    } catch (err) {
      throw new TransferError(`Cannot open ${destinationPath}: ${errorMessage(err)}`, {
        kind: 'filesystem',
        destinationPath,
        bytesWritten: 0,
        attempts: 0,
        cause: err,
      });
    }
  }

  private async request(
    url: string,
    offset: number,
    destinationPath: string,
    attempt: number
  ): Promise<HttpResponse> {
    let response: HttpResponse;
    try {
      response = await this.http.get(url, { headers: { range: `bytes=${offset}-` } });
    } catch (err) {
      throw new TransferError(`Download request failed: ${errorMessage(err)}`, {
        kind: 'request_failed',
        destinationPath,
        bytesWritten: offset,
        attempts: attempt,
        cause: err,
      });
    }

    if (!isSuccessStatus(response.status)) {
      await response.discard().catch((err: unknown) => {
        this.logger.debug({ url, error: errorMessage(err) }, 'Failed to discard response body');
      });
      throw new TransferError(`Download request failed with HTTP ${response.status}`, {
        kind: 'bad_status',
        destinationPath,
        bytesWritten: offset,
        attempts: attempt,
        statusCode: response.status,
      });
    }

    this.logger.debug(
      { url: response.url, status: response.status, offset, contentLength: response.contentLength },
      'Download response received'
    );

    return response;
  }

  /**
   * Copy the body to disk chunk by chunk. A read error is returned, not
   * thrown, so the caller can resume; a write error is fatal.
   */
  private async pump(
    response: HttpResponse,
    handle: FileHandle,
    destinationPath: string,
    attempt: number,
    offset: number
  ): Promise<StreamOutcome> {
    const iterator = response.body[Symbol.asyncIterator]();
    let written = 0;

    for (;;) {
      let next: IteratorResult<Uint8Array>;
      try {
        next = await iterator.next();
      } catch (err) {
        return { written, error: err, done: false };
      }

      if (next.done) return { written, error: null, done: true };

      try {
        await writeFully(handle, next.value);
      } catch (err) {
        throw new TransferError(`Cannot write ${destinationPath}: ${errorMessage(err)}`, {
          kind: 'filesystem',
          destinationPath,
          bytesWritten: offset + written,
          attempts: attempt,
          cause: err,
        });
      }
      written += next.value.length;
    }
  }

  private async flush(
    handle: FileHandle,
    destinationPath: string,
    bytesWritten: number,
    attempts: number
  ): Promise<void> {
    try {
      await handle.sync();
    } catch (err) {
      throw new TransferError(`Cannot flush ${destinationPath}: ${errorMessage(err)}`, {
        kind: 'filesystem',
        destinationPath,
        bytesWritten,
        attempts,
        cause: err,
      });
    }
  }
}
