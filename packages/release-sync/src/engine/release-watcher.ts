/**
 * ReleaseWatcher - drives SyncCycle from a cron schedule.
 *
 * Lifecycle: idle -> starting -> running -> stopping -> stopped
 *
 * Ticks may overlap: a slow resolve does not hold back the next tick, and
 * transfers run detached from the tick that spawned them. Ticks missed while
 * the host is busy are skipped by the scheduler, never batched. Stopping the
 * watcher stops the schedule only; running transfers carry on.
 */

import { EventEmitter } from 'node:events';
import { Cron } from 'croner';
import type { Logger } from 'pino';
import { validateSyncConfig } from '../config/config.js';
import { ConfigError, errorMessage } from '../errors.js';
import type { ReleaseSyncContext } from './context.js';
import { SyncCycle } from './sync-cycle.js';
import type {
  CycleOutcome,
  ReleaseWatcherEvents,
  ReleaseWatcherStats,
  TransferOutcome,
  WatcherState,
} from './types.js';

/**
 * Typed event emitter interface for the watcher.
 */
export interface TypedReleaseWatcherEmitter {
  on<K extends keyof ReleaseWatcherEvents>(event: K, listener: ReleaseWatcherEvents[K]): this;
  off<K extends keyof ReleaseWatcherEvents>(event: K, listener: ReleaseWatcherEvents[K]): this;
  emit<K extends keyof ReleaseWatcherEvents>(
    event: K,
    ...args: Parameters<ReleaseWatcherEvents[K]>
  ): boolean;
}

export class ReleaseWatcher extends EventEmitter implements TypedReleaseWatcherEmitter {
  private _state: WatcherState = 'idle';
  private readonly ctx: ReleaseSyncContext;
  private readonly cycle: SyncCycle;
  private readonly logger: Logger;
  private job: Cron | null = null;

  // Stats
  private _startedAt: number | null = null;
  private _cyclesRun = 0;
  private _cyclesAborted = 0;
  private _cyclesSkipped = 0;
  private _transfersStarted = 0;
  private _transfersCompleted = 0;
  private _transfersFailed = 0;
  private _lastCycleAt: number | null = null;

  constructor(ctx: ReleaseSyncContext, cycle?: SyncCycle) {
    super();
    this.ctx = ctx;
    this.cycle = cycle ?? new SyncCycle(ctx);
    this.logger = ctx.logger.child({ component: 'release-watcher' });
  }

  /** Current watcher state */
  get state(): WatcherState {
    return this._state;
  }

  /**
   * Validate config and start the schedule.
   * Throws ConfigError on a bad config (including a bad cron expression).
   */
  start(): void {
    if (this._state !== 'idle' && this._state !== 'stopped') {
      throw new Error(`Cannot start watcher from state: ${this._state}`);
    }

    this.setState('starting');

    const errors = validateSyncConfig(this.ctx.config);
    if (errors.length > 0) {
      this.setState('stopped');
      throw new ConfigError(errors);
    }

    try {
      this.job = new Cron(this.ctx.config.cron, { name: 'release-sync' }, (): void => {
        this.tick().catch((err: unknown) => {
          this.logger.error({ error: errorMessage(err) }, 'Scheduled cycle failed');
        });
      });
    } catch (err) {
      this.setState('stopped');
      throw new ConfigError([`cron is invalid: ${errorMessage(err)}`]);
    }

    this._startedAt = Date.now();
    this.setState('running');

    this.logger.info(
      {
        feedUrl: this.ctx.config.feedUrl,
        cron: this.ctx.config.cron,
        saveDir: this.ctx.config.saveDir,
        nextRunAt: this.job.nextRun()?.toISOString() ?? null,
      },
      'Release watcher started'
    );
  }

  /**
   * Stop scheduling new ticks. Transfers already running are not
   * cancelled; use whenIdle() to wait for them.
   */
  stop(): void {
    if (this._state !== 'running') {
      return;
    }

    this.setState('stopping');

    if (this.job) {
      this.job.stop();
      this.job = null;
    }

    this.setState('stopped');
    this.emit('stopped');
  }

  /**
   * Run one cycle now, outside the schedule (manual run or tests).
   */
  async triggerCycle(): Promise<CycleOutcome> {
    return this.tick();
  }

  /** Wait for every detached transfer to settle */
  async whenIdle(): Promise<void> {
    await this.cycle.whenIdle();
  }

  getStats(): ReleaseWatcherStats {
    return {
      state: this._state,
      startedAt: this._startedAt,
      cyclesRun: this._cyclesRun,
      cyclesAborted: this._cyclesAborted,
      cyclesSkipped: this._cyclesSkipped,
      transfersStarted: this._transfersStarted,
      transfersCompleted: this._transfersCompleted,
      transfersFailed: this._transfersFailed,
      inFlight: this.cycle.inFlightCount,
      lastCycleAt: this._lastCycleAt,
      nextRunAt: this.job?.nextRun()?.getTime() ?? null,
    };
  }

  // ─── Private helpers ──────────────────────────────────────────────

  private setState(newState: WatcherState): void {
    const oldState = this._state;
    this._state = newState;
    this.emit('stateChange', newState, oldState);
  }

  private async tick(): Promise<CycleOutcome> {
    const outcome = await this.cycle.run();

    this._cyclesRun++;
    this._lastCycleAt = Date.now();

    switch (outcome.status) {
      case 'aborted':
        this._cyclesAborted++;
        break;
      case 'skipped':
      case 'in_flight':
        this._cyclesSkipped++;
        break;
      case 'downloading':
        this._transfersStarted++;
        void outcome.transfer.then((result) => {
          this.recordTransfer(result);
        });
        break;
    }

    this.emit('cycle', outcome);
    return outcome;
  }

  private recordTransfer(outcome: TransferOutcome): void {
    if (outcome.ok) {
      this._transfersCompleted++;
      this.emit('transferComplete', outcome.result);
    } else {
      this._transfersFailed++;
      this.emit('transferFailed', outcome.error);
    }
  }
}
