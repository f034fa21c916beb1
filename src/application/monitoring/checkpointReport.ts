import type { Checkpoint, CheckpointStatus } from "../../core/checkpoints/checkpoint.types";
import { tallyBatches } from "../../core/checkpoints/checkpoint.transitions";
import type { Period } from "../../core/sync/periods";
import type { SourceType } from "../../core/sync/workUnit";
import type { CheckpointRepository } from "../../ports/CheckpointRepository";

export type CheckpointReportFilter = {
  sourceType?: SourceType;
  marketplace?: string;
  limit?: number;
};

export type CheckpointReportRow = {
  id: string;
  sourceType: SourceType;
  marketplace: string;
  period: Period;
  status: CheckpointStatus;
  rowCount: number;
  attempts: number;
  batches: { required: number; completed: number; failed: number; pending: number };
  lastError?: string;
  updatedAt: string;
};

export type CheckpointReport = {
  generatedAt: string;
  scanned: number;
  totals: Record<CheckpointStatus, number>;
  partial: CheckpointReportRow[];
  failed: CheckpointReportRow[];
  needsAttention: CheckpointReportRow[];
  /** Done, but nothing came back; usually worth a refresh. */
  zeroRowDone: CheckpointReportRow[];
  inProgress: CheckpointReportRow[];
};

export const toReportRow = (checkpoint: Checkpoint): CheckpointReportRow => {
  const row: CheckpointReportRow = {
    id: checkpoint.id,
    sourceType: checkpoint.sourceType,
    marketplace: checkpoint.marketplace,
    period: checkpoint.period,
    status: checkpoint.status,
    rowCount: checkpoint.rowCount,
    attempts: checkpoint.attempts,
    batches: tallyBatches(checkpoint),
    updatedAt: checkpoint.updatedAt.toISOString()
  };
  if (checkpoint.lastError) row.lastError = `${checkpoint.lastError.code}: ${checkpoint.lastError.message}`;
  return row;
};

export const buildCheckpointReport = async (
  repo: CheckpointRepository,
  filter: CheckpointReportFilter = {},
  now: Date = new Date()
): Promise<CheckpointReport> => {
  const checkpoints = await repo.find({
    sourceType: filter.sourceType,
    marketplace: filter.marketplace,
    limit: filter.limit ?? 1000
  });

  const report: CheckpointReport = {
    generatedAt: now.toISOString(),
    scanned: checkpoints.length,
    totals: { pending: 0, in_progress: 0, done: 0, partial: 0, failed: 0 },
    partial: [],
    failed: [],
    needsAttention: [],
    zeroRowDone: [],
    inProgress: []
  };

  for (const checkpoint of checkpoints) {
    report.totals[checkpoint.status] += 1;
    const row = toReportRow(checkpoint);
    if (checkpoint.needsAttention) report.needsAttention.push(row);
    if (checkpoint.status === "partial") report.partial.push(row);
    else if (checkpoint.status === "failed") report.failed.push(row);
    else if (checkpoint.status === "in_progress") report.inProgress.push(row);
    else if (checkpoint.status === "done" && checkpoint.rowCount === 0) report.zeroRowDone.push(row);
  }

  return report;
};
