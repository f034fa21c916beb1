import type { Period } from "../sync/periods";
import type { SourceType } from "../sync/workUnit";

export type CheckpointStatus = "pending" | "in_progress" | "done" | "partial" | "failed";

export type BatchStatus = "pending" | "completed" | "failed";

export type BatchError = {
  code: string;
  message: string;
};

export type BatchEntry = {
  status: BatchStatus;
  rowCount: number;
  attempts: number;
  items: string[];
  error?: BatchError;
  updatedAt: Date;
};

/** batchId -> progress of that batch. */
export type BatchState = Record<string, BatchEntry>;

export type CheckpointHistoryEntry = {
  at: Date;
  event: "claimed" | "reset" | "finalized";
  status: CheckpointStatus;
  attempt: number;
  rowCount: number;
  note?: string;
};

export type Checkpoint = {
  id: string;                 // work unit identity
  sourceType: SourceType;
  marketplace: string;
  period: Period;
  status: CheckpointStatus;
  attempts: number;
  rowCount: number;           // sum over completed required batches
  lastError?: BatchError;
  batches: BatchState;
  requiredBatchIds: string[];
  consecutiveFatalErrors: number;
  needsAttention: boolean;
  history: CheckpointHistoryEntry[];
  revision: number;           // optimistic concurrency token
  leaseOwner?: string;        // invocation currently working the unit
  leaseUntil?: Date;
  createdAt: Date;
  updatedAt: Date;
  completedAt?: Date;
};

export type BatchResult =
  | { status: "completed"; rowCount: number }
  | { status: "failed"; error: BatchError };

export type ClaimAction = "claimed" | "skipped_done" | "skipped_attention" | "skipped_leased";

export type ClaimLease = {
  owner: string;
  durationMs: number;
};

export type ClaimResult = {
  checkpoint: Checkpoint;
  action: ClaimAction;
};

export type FinalizeOutcome = {
  /** At least one batch of this run ended with the upstream marking the report FATAL/CANCELLED. */
  sawFatalReport: boolean;
};

export type CheckpointQuery = {
  sourceType?: SourceType;
  marketplace?: string;
  statuses?: CheckpointStatus[];
  needsAttention?: boolean;
  limit?: number;
};
