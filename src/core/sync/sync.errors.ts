export type SyncErrorCode =
  | "report_timeout"
  | "report_fatal"
  | "rate_limit_exceeded"
  | "parse_failed"
  | "persistence_conflict"
  | "persistence_failed"
  | "invalid_record"
  | "sync_fatal";

export type SyncErrorContext = Partial<{
  workUnit: string;
  batchId: string;
  reportId: string;
  quotaClass: string;
  status: string;
  attempts: number;
  elapsedMs: number;
  field: string;
}>;

type SyncErrorArgs = {
  message: string;
  context?: SyncErrorContext;
  cause?: unknown;
};

/**
 * Base for every error the engine classifies. `retryable` means the next
 * scheduled invocation is expected to heal it through checkpointing.
 */
export abstract class SyncError extends Error {
  abstract readonly code: SyncErrorCode;
  abstract readonly retryable: boolean;
  readonly context: SyncErrorContext;

  protected constructor(args: SyncErrorArgs) {
    super(args.message, { cause: args.cause });
    this.name = new.target.name;
    this.context = args.context ?? {};
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Poll budget exceeded before the report reached a terminal state. */
export class ReportTimeoutError extends SyncError {
  readonly code = "report_timeout";
  readonly retryable = true;

  constructor(args: SyncErrorArgs) {
    super(args);
  }
}

export type TerminalFailureStatus = "FATAL" | "CANCELLED";

/**
 * Upstream marked report generation itself as failed or cancelled. Retryable on a
 * later invocation, but repeated occurrences for one scope usually mean an upstream block.
 */
export class FatalReportError extends SyncError {
  readonly code = "report_fatal";
  readonly retryable = true;
  readonly terminalStatus: TerminalFailureStatus;

  constructor(args: SyncErrorArgs & { terminalStatus: TerminalFailureStatus }) {
    super(args);
    this.terminalStatus = args.terminalStatus;
  }
}

export class RateLimitExceededError extends SyncError {
  readonly code = "rate_limit_exceeded";
  readonly retryable = true;

  constructor(args: SyncErrorArgs) {
    super(args);
  }
}

export class ParseError extends SyncError {
  readonly code = "parse_failed";
  readonly retryable = true;

  constructor(args: SyncErrorArgs) {
    super(args);
  }
}

/** Identity-key race lost against a concurrent writer; resolved by re-running precedence. */
export class PersistenceConflictError extends SyncError {
  readonly code = "persistence_conflict";
  readonly retryable = true;
  readonly identityKeys: string[];

  constructor(args: SyncErrorArgs & { identityKeys: string[] }) {
    super(args);
    this.identityKeys = args.identityKeys;
  }
}

export class PersistenceError extends SyncError {
  readonly code = "persistence_failed";
  readonly retryable = true;

  constructor(args: SyncErrorArgs) {
    super(args);
  }
}

export class InvalidRecordError extends SyncError {
  readonly code = "invalid_record";
  readonly retryable = false;

  constructor(args: SyncErrorArgs) {
    super(args);
  }
}

/** Aborts the whole invocation: bad configuration or an unusable checkpoint store. */
export class SyncFatalError extends SyncError {
  readonly code = "sync_fatal";
  readonly retryable = false;

  constructor(args: SyncErrorArgs) {
    super(args);
  }
}

export const isSyncError = (value: unknown): value is SyncError => value instanceof SyncError;
