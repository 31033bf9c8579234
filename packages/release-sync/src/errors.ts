/**
 * Error taxonomy for the release-sync engine.
 *
 * Every error the engine raises derives from ReleaseSyncError so callers can
 * tell engine failures apart from programming errors with one instanceof check.
 */

export class ReleaseSyncError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ReleaseSyncError';
  }
}

// ─── Resolution ─────────────────────────────────────────────────────

export type ResolutionErrorKind =
  | 'fetch_failed'
  | 'parse_failed'
  | 'not_found'
  | 'missing_field'
  | 'invalid_field';

/**
 * The feed could not be turned into an ArtifactRecord.
 * Recovered at the cycle boundary; the next tick tries again.
 */
export class ResolutionError extends ReleaseSyncError {
  public readonly kind: ResolutionErrorKind;
  /** Feed element the failure relates to (e.g. "pubDate", "media:hash") */
  public readonly field: string;

  constructor(
    kind: ResolutionErrorKind,
    field: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ResolutionError';
    this.kind = kind;
    this.field = field;
  }

  static missing(field: string): ResolutionError {
    return new ResolutionError('missing_field', field, `${field} not found`);
  }
}

// ─── Transfer ───────────────────────────────────────────────────────

export type TransferErrorKind = 'request_failed' | 'bad_status' | 'stream_failed' | 'filesystem';

export interface TransferErrorDetails {
  kind: TransferErrorKind;
  destinationPath: string;
  bytesWritten: number;
  attempts: number;
  statusCode?: number;
  cause?: unknown;
}

/**
 * A download could not be completed. Any partial file stays on disk.
 */
export class TransferError extends ReleaseSyncError {
  public readonly kind: TransferErrorKind;
  public readonly destinationPath: string;
  public readonly bytesWritten: number;
  public readonly attempts: number;
  public readonly statusCode: number | undefined;

  constructor(message: string, details: TransferErrorDetails) {
    super(message, { cause: details.cause });
    this.name = 'TransferError';
    this.kind = details.kind;
    this.destinationPath = details.destinationPath;
    this.bytesWritten = details.bytesWritten;
    this.attempts = details.attempts;
    this.statusCode = details.statusCode;
  }
}

// ─── Notification ───────────────────────────────────────────────────

/** Created and logged by notifiers only; never thrown to callers. */
export class NotificationError extends ReleaseSyncError {
  public readonly recipient: string;

  constructor(recipient: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NotificationError';
    this.recipient = recipient;
  }
}

// ─── Startup ────────────────────────────────────────────────────────

export class ConfigError extends ReleaseSyncError {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid release-sync config: ${problems.join('; ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
