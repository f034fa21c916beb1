import type { Batch } from "../batching/partition";
import type { WorkUnit } from "../sync/workUnit";
import { workUnitKey } from "../sync/workUnit";
import type {
  BatchEntry,
  BatchResult,
  Checkpoint,
  CheckpointHistoryEntry,
  CheckpointStatus,
  ClaimLease,
  ClaimResult,
  FinalizeOutcome
} from "./checkpoint.types";

/*
 * Pure state transitions for checkpoints. Every function returns a new checkpoint and
 * leaves revision handling to the store, so the same rules apply to any backend.
 */

const historyEntry = (
  checkpoint: Checkpoint,
  event: CheckpointHistoryEntry["event"],
  at: Date,
  note?: string
): CheckpointHistoryEntry => {
  const entry: CheckpointHistoryEntry = {
    at,
    event,
    status: checkpoint.status,
    attempt: checkpoint.attempts,
    rowCount: checkpoint.rowCount
  };
  if (note) entry.note = note;
  return entry;
};

export const newCheckpoint = (unit: WorkUnit, now: Date): Checkpoint => ({
  id: workUnitKey(unit),
  sourceType: unit.sourceType,
  marketplace: unit.scope.marketplace,
  period: { ...unit.scope.period },
  status: "pending",
  attempts: 0,
  rowCount: 0,
  batches: {},
  requiredBatchIds: [],
  consecutiveFatalErrors: 0,
  needsAttention: false,
  history: [],
  revision: 0,
  createdAt: now,
  updatedAt: now
});

export const sumCompletedRows = (checkpoint: Pick<Checkpoint, "batches" | "requiredBatchIds">): number =>
  checkpoint.requiredBatchIds.reduce((sum, batchId) => {
    const entry = checkpoint.batches[batchId];
    return entry?.status === "completed" ? sum + entry.rowCount : sum;
  }, 0);

const holdsLiveLease = (checkpoint: Checkpoint, now: Date, owner: string | undefined): boolean =>
  checkpoint.leaseUntil !== undefined &&
  checkpoint.leaseUntil.getTime() > now.getTime() &&
  checkpoint.leaseOwner !== owner;

/**
 * `done` and flagged units are returned untouched unless forced. A forced claim wipes their
 * batch progress (after recording it in history) so every batch is pulled again; units left
 * `partial` or `in_progress` by an earlier run resume where they stopped, forced or not.
 * A live lease held by another invocation refuses the claim even when forced.
 */
export const applyClaim = (
  checkpoint: Checkpoint,
  opts: { now: Date; force?: boolean; lease?: ClaimLease }
): ClaimResult => {
  const { now, force = false, lease } = opts;

  if (holdsLiveLease(checkpoint, now, lease?.owner)) {
    return { checkpoint, action: "skipped_leased" };
  }
  if (!force && checkpoint.status === "done") {
    return { checkpoint, action: "skipped_done" };
  }
  if (!force && checkpoint.needsAttention) {
    return { checkpoint, action: "skipped_attention" };
  }

  const history = [...checkpoint.history];
  let base = checkpoint;
  if (force && (checkpoint.status === "done" || checkpoint.needsAttention)) {
    history.push(historyEntry(checkpoint, "reset", now, "forced re-pull"));
    base = {
      ...checkpoint,
      batches: {},
      requiredBatchIds: [],
      rowCount: 0,
      consecutiveFatalErrors: 0,
      needsAttention: false,
      lastError: undefined,
      completedAt: undefined
    };
  }

  const claimed: Checkpoint = {
    ...base,
    status: "in_progress",
    attempts: base.attempts + 1,
    leaseOwner: lease?.owner,
    leaseUntil: lease ? new Date(now.getTime() + lease.durationMs) : undefined,
    updatedAt: now
  };
  claimed.history = [...history, historyEntry(claimed, "claimed", now)];
  return { checkpoint: claimed, action: "claimed" };
};

/**
 * The plan an earlier run registered, rebuilt from the items stored on each batch, so a
 * resumed unit keeps its batch ids even when the item catalog has moved since.
 */
export const storedBatchPlan = (checkpoint: Checkpoint): Batch[] | undefined => {
  if (checkpoint.requiredBatchIds.length === 0) return undefined;

  const batches: Batch[] = [];
  for (const batchId of checkpoint.requiredBatchIds) {
    const entry = checkpoint.batches[batchId];
    if (!entry) return undefined;
    batches.push({ batchId, items: [...entry.items] });
  }
  return batches;
};

/** Registers the current batch plan; completed batches outside the plan stop counting. */
export const applyBatchPlan = (checkpoint: Checkpoint, batches: readonly Batch[], now: Date): Checkpoint => {
  const nextBatches = { ...checkpoint.batches };
  for (const batch of batches) {
    if (!nextBatches[batch.batchId]) {
      nextBatches[batch.batchId] = {
        status: "pending",
        rowCount: 0,
        attempts: 0,
        items: [...batch.items],
        updatedAt: now
      };
    }
  }

  const next: Checkpoint = {
    ...checkpoint,
    batches: nextBatches,
    requiredBatchIds: batches.map((batch) => batch.batchId),
    updatedAt: now
  };
  next.rowCount = sumCompletedRows(next);
  return next;
};

/**
 * Records one batch outcome. A batch that is already completed is never overwritten,
 * which keeps replays of the same commit from counting rows twice.
 */
export const applyCommit = (
  checkpoint: Checkpoint,
  batchId: string,
  result: BatchResult,
  now: Date
): { checkpoint: Checkpoint; changed: boolean } => {
  const current = checkpoint.batches[batchId];
  if (!current) {
    throw new Error(`Batch ${batchId} is not part of checkpoint ${checkpoint.id}`);
  }
  if (current.status === "completed") {
    return { checkpoint, changed: false };
  }

  const entry: BatchEntry =
    result.status === "completed"
      ? { status: "completed", rowCount: result.rowCount, attempts: current.attempts + 1, items: current.items, updatedAt: now }
      : {
          status: "failed",
          rowCount: 0,
          attempts: current.attempts + 1,
          items: current.items,
          error: result.error,
          updatedAt: now
        };

  const next: Checkpoint = {
    ...checkpoint,
    batches: { ...checkpoint.batches, [batchId]: entry },
    lastError: result.status === "failed" ? result.error : checkpoint.lastError,
    updatedAt: now
  };
  next.rowCount = sumCompletedRows(next);
  return { checkpoint: next, changed: true };
};

export type BatchTally = {
  required: number;
  completed: number;
  failed: number;
  pending: number;
};

export const tallyBatches = (checkpoint: Pick<Checkpoint, "batches" | "requiredBatchIds">): BatchTally => {
  const tally: BatchTally = { required: checkpoint.requiredBatchIds.length, completed: 0, failed: 0, pending: 0 };
  for (const batchId of checkpoint.requiredBatchIds) {
    const status = checkpoint.batches[batchId]?.status ?? "pending";
    tally[status === "completed" ? "completed" : status === "failed" ? "failed" : "pending"] += 1;
  }
  return tally;
};

/** An empty plan has nothing to complete yet, so the unit stays pending until items appear. */
export const deriveStatus = (tally: BatchTally): CheckpointStatus => {
  if (tally.required === 0) return "pending";
  if (tally.completed === tally.required) return "done";
  if (tally.pending > 0) return tally.completed > 0 ? "partial" : "in_progress";
  return tally.completed > 0 ? "partial" : "failed";
};

/**
 * Settles the unit's status after a run. Hard failures (every batch unparseable, or the
 * upstream failing the report `fatalErrorThreshold` times in a row) flag the unit for an
 * operator instead of letting it burn report quota on every invocation.
 */
export const applyFinalize = (
  checkpoint: Checkpoint,
  outcome: FinalizeOutcome,
  opts: { now: Date; fatalErrorThreshold: number }
): Checkpoint => {
  const tally = tallyBatches(checkpoint);
  const status = deriveStatus(tally);

  const consecutiveFatalErrors =
    status === "done" ? 0 : outcome.sawFatalReport ? checkpoint.consecutiveFatalErrors + 1 : checkpoint.consecutiveFatalErrors;

  const allUnparseable =
    tally.required > 0 &&
    tally.failed === tally.required &&
    checkpoint.requiredBatchIds.every((batchId) => checkpoint.batches[batchId]?.error?.code === "parse_failed");

  const next: Checkpoint = {
    ...checkpoint,
    status,
    rowCount: sumCompletedRows(checkpoint),
    consecutiveFatalErrors,
    needsAttention: status !== "done" && (allUnparseable || consecutiveFatalErrors >= opts.fatalErrorThreshold),
    leaseOwner: undefined,
    leaseUntil: undefined,
    updatedAt: opts.now,
    completedAt: status === "done" ? opts.now : checkpoint.completedAt
  };
  next.history = [...checkpoint.history, historyEntry(next, "finalized", opts.now)];
  return next;
};
