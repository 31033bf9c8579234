import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  ResumableTransfer,
  completionMessage,
  DEFAULT_RETRY_LIMIT,
} from '../transfer/resumable-transfer.js';
import { ArtifactRecord } from '../release/artifact-record.js';
import { TransferError } from '../errors.js';
import { FakeHttpClient, createMockLogger, createMockNotifier } from './helpers.js';

const DOWNLOAD_URL = 'http://x/f.zip';

const record = new ArtifactRecord({
  publishedAt: new Date('2024-01-01T00:00:00Z'),
  downloadUrl: DOWNLOAD_URL,
  contentHash: 'abc123',
  fileName: 'build-42.zip',
  publicUrl: 'http://localhost:8080/assets/build-42.zip',
});

async function transferFailure(promise: Promise<unknown>): Promise<TransferError> {
  const error: unknown = await promise.then(
    () => null,
    (err: unknown) => err
  );
  if (!(error instanceof TransferError)) {
    throw new Error(`Expected TransferError, got ${String(error)}`);
  }
  return error;
}

describe('ResumableTransfer', () => {
  let tmpDir: string;
  let destination: string;
  let http: FakeHttpClient;
  let notifier: ReturnType<typeof createMockNotifier>;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'release-sync-transfer-'));
    destination = path.join(tmpDir, 'build-42.zip');
    http = new FakeHttpClient();
    notifier = createMockNotifier();
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function makeTransfer(retryLimit?: number): ResumableTransfer {
    return new ResumableTransfer(http, notifier, createMockLogger().logger, { retryLimit });
  }

  it('should allow five attempts by default', () => {
    expect(DEFAULT_RETRY_LIMIT).toBe(5);
  });

  it('should download the body and announce it', async () => {
    http.on(DOWNLOAD_URL, { chunks: ['hello ', 'world'] });

    const result = await makeTransfer().download(record, destination);

    expect(fs.readFileSync(destination, 'utf-8')).toBe('hello world');
    expect(result).toMatchObject({
      fileName: 'build-42.zip',
      destinationPath: destination,
      bytesWritten: 11,
      attempts: 1,
    });
    expect(notifier.notify).toHaveBeenCalledTimes(1);
    expect(notifier.notify).toHaveBeenCalledWith(
      [
        'download complete:',
        'file name: build-42.zip',
        'pub date: 2024-01-01T00:00:00.000Z',
        'download url: http://x/f.zip',
        'md5: abc123',
        'static file url: http://localhost:8080/assets/build-42.zip',
      ].join('\n')
    );
  });

  it('should ask for the whole file on the first attempt', async () => {
    http.on(DOWNLOAD_URL, { chunks: ['data'] });

    await makeTransfer().download(record, destination);

    expect(http.requestsTo(DOWNLOAD_URL).map((r) => r.headers['range'])).toEqual(['bytes=0-']);
  });

  it('should resume from the saved length after a broken stream', async () => {
    http.on(
      DOWNLOAD_URL,
      { chunks: ['aaa', 'bbb', new Error('socket hang up')] },
      { chunks: ['ccc', new Error('socket hang up')] },
      { chunks: ['ddd'] }
    );

    const result = await makeTransfer().download(record, destination);

    expect(fs.readFileSync(destination, 'utf-8')).toBe('aaabbbcccddd');
    expect(result.attempts).toBe(3);
    expect(result.bytesWritten).toBe(12);
    expect(http.requestsTo(DOWNLOAD_URL).map((r) => r.headers['range'])).toEqual([
      'bytes=0-',
      'bytes=6-',
      'bytes=9-',
    ]);
    expect(notifier.notify).toHaveBeenCalledTimes(1);
  });

  it('should give up after the fifth broken stream', async () => {
    http.on(DOWNLOAD_URL, { chunks: ['xx', new Error('connection reset')] });

    const error = await transferFailure(makeTransfer().download(record, destination));

    expect(error.kind).toBe('stream_failed');
    expect(error.attempts).toBe(5);
    expect(error.bytesWritten).toBe(10);
    expect(error.message).toBe('Download of build-42.zip failed after 5 attempts: connection reset');
    expect(http.requestsTo(DOWNLOAD_URL)).toHaveLength(5);
    expect(fs.readFileSync(destination, 'utf-8')).toBe('xxxxxxxxxx');
    expect(notifier.notify).not.toHaveBeenCalled();
  });

  it('should honour a custom retry limit', async () => {
    http.on(DOWNLOAD_URL, { chunks: ['x', new Error('connection reset')] });

    const error = await transferFailure(makeTransfer(2).download(record, destination));

    expect(error.attempts).toBe(2);
    expect(http.requestsTo(DOWNLOAD_URL)).toHaveLength(2);
  });

  it('should fail at once on a non-2xx status', async () => {
    http.on(DOWNLOAD_URL, { status: 404, chunks: ['not found'] });

    const error = await transferFailure(makeTransfer().download(record, destination));

    expect(error.kind).toBe('bad_status');
    expect(error.statusCode).toBe(404);
    expect(error.attempts).toBe(1);
    expect(http.requestsTo(DOWNLOAD_URL)).toHaveLength(1);
    expect(fs.readFileSync(destination, 'utf-8')).toBe('');
    expect(notifier.notify).not.toHaveBeenCalled();
  });

  it('should release the body of a non-2xx response', async () => {
    http.on(DOWNLOAD_URL, { status: 416, chunks: ['range not satisfiable'] });

    await transferFailure(makeTransfer().download(record, destination));

    expect(http.discarded).toEqual([DOWNLOAD_URL]);
  });

  it('should leave the body of a successful response to the stream', async () => {
    http.on(DOWNLOAD_URL, { chunks: ['data'] });

    await makeTransfer().download(record, destination);

    expect(http.discarded).toEqual([]);
  });

  it('should fail at once when the request cannot be sent', async () => {
    http.on(DOWNLOAD_URL, new Error('getaddrinfo ENOTFOUND x'));

    const error = await transferFailure(makeTransfer().download(record, destination));

    expect(error.kind).toBe('request_failed');
    expect(error.message).toBe('Download request failed: getaddrinfo ENOTFOUND x');
    expect(http.requestsTo(DOWNLOAD_URL)).toHaveLength(1);
  });

  it('should stop resuming when a later request fails', async () => {
    http.on(
      DOWNLOAD_URL,
      { chunks: ['abc', new Error('socket hang up')] },
      { status: 500, chunks: [] }
    );

    const error = await transferFailure(makeTransfer().download(record, destination));

    expect(error.kind).toBe('bad_status');
    expect(error.bytesWritten).toBe(3);
    expect(error.attempts).toBe(2);
    expect(fs.readFileSync(destination, 'utf-8')).toBe('abc');
  });

  it('should complete an empty body', async () => {
    http.on(DOWNLOAD_URL, { chunks: [] });

    const result = await makeTransfer().download(record, destination);

    expect(result.bytesWritten).toBe(0);
    expect(fs.statSync(destination).size).toBe(0);
    expect(notifier.notify).toHaveBeenCalledTimes(1);
  });

  it('should create missing parent directories', async () => {
    const nested = path.join(tmpDir, 'a', 'b', 'build-42.zip');
    http.on(DOWNLOAD_URL, { chunks: ['data'] });

    await makeTransfer().download(record, nested);

    expect(fs.readFileSync(nested, 'utf-8')).toBe('data');
  });

  it('should report a filesystem error when the destination cannot be opened', async () => {
    const blocker = path.join(tmpDir, 'not-a-dir');
    fs.writeFileSync(blocker, '');

    const error = await transferFailure(
      makeTransfer().download(record, path.join(blocker, 'build-42.zip'))
    );

    expect(error.kind).toBe('filesystem');
    expect(error.attempts).toBe(0);
    expect(http.requests).toHaveLength(0);
  });
});

describe('completionMessage', () => {
  it('should prefix the record description', () => {
    expect(completionMessage(record)).toBe(`download complete:\n${record.describe()}`);
  });
});
