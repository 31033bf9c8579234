/**
 * SyncCycle - one scheduler tick.
 *
 *   idle -> resolving -> checking -> (skipped | downloading) -> idle
 *
 * Resolve and check run to completion inside run(). The download is
 * detached: run() returns as soon as the transfer has been spawned, and the
 * transfer's own promise settles later with a TransferOutcome. A failed
 * transfer is logged here and never reaches the scheduler.
 *
 * The gate and the file creation are not atomic. Ticks in this process are
 * kept apart by the in-flight map; separate processes sharing a save
 * directory can still race on the same file.
 */

import type { Logger } from 'pino';
import { FeedEntryResolver } from '../feed/feed-resolver.js';
import { publicUrlPrefix } from '../config/config.js';
import { alreadyFetched, destinationPathFor } from '../transfer/dedup-gate.js';
import { ResumableTransfer } from '../transfer/resumable-transfer.js';
import type { ArtifactRecord } from '../release/artifact-record.js';
import { ResolutionError, TransferError, errorMessage } from '../errors.js';
import type { ReleaseSyncContext } from './context.js';
import type { CycleOutcome, CycleState, TransferOutcome } from './types.js';

export interface SyncCycleOptions {
  resolver?: FeedEntryResolver;
  transfer?: ResumableTransfer;
}

export class SyncCycle {
  private readonly ctx: ReleaseSyncContext;
  private readonly resolver: FeedEntryResolver;
  private readonly transfer: ResumableTransfer;
  private readonly logger: Logger;
  private readonly inFlight = new Map<string, Promise<TransferOutcome>>();
  private cycleCount = 0;

  constructor(ctx: ReleaseSyncContext, options?: SyncCycleOptions) {
    this.ctx = ctx;
    this.logger = ctx.logger.child({ component: 'sync-cycle' });
    this.resolver =
      options?.resolver ??
      new FeedEntryResolver(ctx.http, publicUrlPrefix(ctx.config), ctx.logger);
    this.transfer =
      options?.transfer ??
      new ResumableTransfer(ctx.http, ctx.notifier, ctx.logger, {
        retryLimit: ctx.config.retryLimit,
      });
  }

  /** Number of detached transfers still running */
  get inFlightCount(): number {
    return this.inFlight.size;
  }

  /**
   * Run one tick. Never rejects because of the feed or the transfer;
   * resolution failures come back as an `aborted` outcome.
   */
  async run(): Promise<CycleOutcome> {
    const cycle = ++this.cycleCount;
    const { feedUrl, saveDir } = this.ctx.config;

    this.transition(cycle, 'resolving');
    let record: ArtifactRecord;
    try {
      record = await this.resolver.resolve(feedUrl);
    } catch (err) {
      const error =
        err instanceof ResolutionError
          ? err
          : new ResolutionError('fetch_failed', 'feed', `Resolution failed: ${errorMessage(err)}`, {
              cause: err,
            });
      this.logger.warn(
        { cycle, kind: error.kind, field: error.field, error: error.message },
        'Could not resolve latest release; skipping cycle'
      );
      this.transition(cycle, 'idle');
      return { status: 'aborted', error };
    }

    this.transition(cycle, 'checking');
    const destinationPath = destinationPathFor(saveDir, record.fileName);

    if (this.inFlight.has(destinationPath)) {
      this.logger.debug({ cycle, destinationPath }, 'Transfer already in progress');
      this.transition(cycle, 'idle');
      return { status: 'in_flight', record, destinationPath };
    }

    if (alreadyFetched(saveDir, record.fileName)) {
      this.transition(cycle, 'skipped');
      this.logger.debug({ cycle, destinationPath }, 'Release already fetched');
      this.transition(cycle, 'idle');
      return { status: 'skipped', record, destinationPath };
    }

    this.transition(cycle, 'downloading');
    const transfer = this.spawn(record, destinationPath);
    this.transition(cycle, 'idle');

    return { status: 'downloading', record, destinationPath, transfer };
  }

  /**
   * Resolve once every transfer running now (or spawned while waiting)
   * has settled. Does not cancel anything.
   */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight.values());
    }
  }

  private spawn(record: ArtifactRecord, destinationPath: string): Promise<TransferOutcome> {
    const task = this.transfer
      .download(record, destinationPath)
      .then(
        (result): TransferOutcome => ({ ok: true, result }),
        (err: unknown): TransferOutcome => {
          const error =
            err instanceof TransferError
              ? err
              : new TransferError(`Transfer failed: ${errorMessage(err)}`, {
                  kind: 'request_failed',
                  destinationPath,
                  bytesWritten: 0,
                  attempts: 0,
                  cause: err,
                });
          this.logger.error(
            {
              fileName: record.fileName,
              kind: error.kind,
              bytesWritten: error.bytesWritten,
              attempts: error.attempts,
              error: error.message,
            },
            'Download failed'
          );
          return { ok: false, error };
        }
      )
      .finally(() => {
        this.inFlight.delete(destinationPath);
      });

    this.inFlight.set(destinationPath, task);
    return task;
  }

  private transition(cycle: number, state: CycleState): void {
    this.logger.trace({ cycle, state }, 'Cycle state');
  }
}
