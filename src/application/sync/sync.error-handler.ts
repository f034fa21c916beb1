import type { BatchError } from "../../core/checkpoints/checkpoint.types";
import { FatalReportError, isSyncError, SyncFatalError, type SyncErrorContext } from "../../core/sync/sync.errors";
import { toErrorMessage } from "../../shared/logging/logger";

export type BatchFailureDecision =
  | {
      action: "record";
      error: BatchError;
      fatalReport: boolean;
      expected: boolean;
    }
  | {
      action: "abort";
      error: SyncFatalError;
    };

/**
 * Batch failures are recorded on the checkpoint and the run moves on; only failures of
 * the run itself (configuration, checkpoint store) abort the invocation.
 */
export const classifyBatchFailure = (reason: unknown, context: Required<Pick<SyncErrorContext, "workUnit" | "batchId">>): BatchFailureDecision => {
  if (reason instanceof SyncFatalError) {
    return { action: "abort", error: reason };
  }

  if (isSyncError(reason)) {
    return {
      action: "record",
      error: { code: reason.code, message: reason.message },
      fatalReport: reason instanceof FatalReportError,
      expected: true
    };
  }

  return {
    action: "record",
    error: {
      code: "unexpected",
      message: `Unexpected failure in ${context.workUnit} batch ${context.batchId}: ${toErrorMessage(reason)}`
    },
    fatalReport: false,
    expected: false
  };
};

export type SyncRunSummary = {
  rowsWritten: number;
  workUnitsPlanned: number;
  workUnitsCompleted: number;
  workUnitsPartial: number;
  workUnitsFailed: number;
  workUnitsSkipped: number;
  workUnitsDeferred: number;
  recordsSkippedInvalid: number;
  /** Work unit ids an operator has to look at before they are pulled again. */
  needsAttention: string[];
};

export type UnitOutcome = "completed" | "partial" | "failed" | "skipped" | "deferred";

export const createSyncRunSummaryTracker = (workUnitsPlanned: number) => {
  let rowsWritten = 0;
  let recordsSkippedInvalid = 0;
  const outcomes: Record<UnitOutcome, number> = { completed: 0, partial: 0, failed: 0, skipped: 0, deferred: 0 };
  const needsAttention = new Set<string>();

  return {
    addRows: (count: number) => {
      rowsWritten += count;
    },
    addInvalid: (count: number) => {
      recordsSkippedInvalid += count;
    },
    addOutcome: (outcome: UnitOutcome) => {
      outcomes[outcome] += 1;
    },
    flagAttention: (workUnit: string) => {
      needsAttention.add(workUnit);
    },
    summary: (): SyncRunSummary => ({
      rowsWritten,
      workUnitsPlanned,
      workUnitsCompleted: outcomes.completed,
      workUnitsPartial: outcomes.partial,
      workUnitsFailed: outcomes.failed,
      workUnitsSkipped: outcomes.skipped,
      workUnitsDeferred: outcomes.deferred,
      recordsSkippedInvalid,
      needsAttention: Array.from(needsAttention).sort()
    })
  };
};

export type SyncRunSummaryTracker = ReturnType<typeof createSyncRunSummaryTracker>;
