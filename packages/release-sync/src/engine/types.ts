/**
 * Types for the sync engine.
 */

import type { ArtifactRecord } from '../release/artifact-record.js';
import type { ResolutionError, TransferError } from '../errors.js';
import type { TransferResult } from '../transfer/resumable-transfer.js';

/** Where a single tick is in its resolve → check → download sequence */
export type CycleState = 'idle' | 'resolving' | 'checking' | 'skipped' | 'downloading';

/** Watcher lifecycle states */
export type WatcherState = 'idle' | 'starting' | 'running' | 'stopping' | 'stopped';

/** Settled result of a detached transfer; never a rejection */
export type TransferOutcome =
  | { ok: true; result: TransferResult }
  | { ok: false; error: TransferError };

/** What a single tick did */
export type CycleOutcome =
  | {
      status: 'aborted';
      error: ResolutionError;
    }
  | {
      status: 'skipped';
      record: ArtifactRecord;
      destinationPath: string;
    }
  | {
      /** A transfer to the same path is already running in this process */
      status: 'in_flight';
      record: ArtifactRecord;
      destinationPath: string;
    }
  | {
      status: 'downloading';
      record: ArtifactRecord;
      destinationPath: string;
      /** Detached transfer; the cycle does not wait for it */
      transfer: Promise<TransferOutcome>;
    };

export interface ReleaseWatcherStats {
  state: WatcherState;
  /** Timestamp when the watcher started (or null if not started) */
  startedAt: number | null;
  cyclesRun: number;
  cyclesAborted: number;
  cyclesSkipped: number;
  transfersStarted: number;
  transfersCompleted: number;
  transfersFailed: number;
  /** Transfers currently running */
  inFlight: number;
  /** Timestamp of the last finished cycle (or null) */
  lastCycleAt: number | null;
  /** Next scheduled tick (or null when not running) */
  nextRunAt: number | null;
}

/** Events emitted by the ReleaseWatcher */
export interface ReleaseWatcherEvents {
  stateChange: (newState: WatcherState, oldState: WatcherState) => void;
  /** A tick finished its resolve/check phase */
  cycle: (outcome: CycleOutcome) => void;
  transferComplete: (result: TransferResult) => void;
  transferFailed: (error: TransferError) => void;
  stopped: () => void;
}
