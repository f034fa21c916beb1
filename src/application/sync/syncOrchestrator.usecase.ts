import type { Batch } from "../../core/batching/partition";
import { storedBatchPlan } from "../../core/checkpoints/checkpoint.transitions";
import type { Checkpoint } from "../../core/checkpoints/checkpoint.types";
import { toCanonicalRecord } from "../../core/records/canonicalize";
import type { CanonicalRecord } from "../../core/records/record.types";
import { sourceCatalog, type SourceDefinition } from "../../core/sources/sourceCatalog";
import { InvalidRecordError, SyncFatalError } from "../../core/sync/sync.errors";
import type { SourceType, WorkUnit } from "../../core/sync/workUnit";
import { workUnitKey } from "../../core/sync/workUnit";
import type { ItemCatalog } from "../../ports/RecordRepository";
import type { ReportParsers } from "../../ports/ReportParser";
import { createLimiter } from "../../shared/concurrency/limiter";
import { logEvent, toErrorMessage } from "../../shared/logging/logger";
import type { CheckpointStore } from "../checkpoints/checkpointStore";
import type { RecordWriter } from "../records/recordWriter";
import type { ReportExecutor } from "../report-lifecycle/reportLifecycle.driver";
import type { SyncConfigInput } from "./sync.config";
import { resolveSyncConfig } from "./sync.config";
import {
  classifyBatchFailure,
  createSyncRunSummaryTracker,
  type SyncRunSummary
} from "./sync.error-handler";
import { planBatches, planWorkUnits, type SyncRequest } from "./workUnitPlanner";

export type SyncDeps = {
  reports: ReportExecutor;
  checkpoints: CheckpointStore;
  writer: RecordWriter;
  parsers: ReportParsers;
  catalog: ItemCatalog;
  config: SyncConfigInput;
  sources?: Readonly<Record<SourceType, SourceDefinition>>;
  now?: () => Date;
};

type BatchOutcome = { status: "completed" | "failed" | "deferred"; fatalReport: boolean };

/** Settles every task before surfacing the first invocation-level failure. */
const settleAll = async (tasks: Array<Promise<unknown>>): Promise<void> => {
  const results = await Promise.allSettled(tasks);
  for (const result of results) {
    if (result.status === "rejected") throw result.reason;
  }
};

/**
 * One time-boxed sync invocation: plans work units, claims each one, runs its pending
 * and failed batches, and commits every batch only after its rows are persisted.
 * Stopping the process at any point leaves checkpoints a later invocation can resume from.
 */
export const runSync = async (deps: SyncDeps, request: SyncRequest): Promise<SyncRunSummary> => {
  const { reports, checkpoints, writer, parsers, catalog } = deps;
  const config = resolveSyncConfig(deps.config);
  const now = deps.now ?? (() => new Date());
  const definition = (deps.sources ?? sourceCatalog)[request.sourceType];

  const startedAt = now().getTime();
  const deadline = startedAt + config.timeBudgetMs - config.safetyMarginMs;
  const pastDeadline = () => now().getTime() >= deadline;

  const units = planWorkUnits(definition, request, {
    now: new Date(startedAt),
    lookbackPeriods: config.lookbackPeriods,
    maxWorkUnits: config.maxWorkUnits
  });
  const tracker = createSyncRunSummaryTracker(units.length);
  logEvent("info", "sync.started", {
    sourceType: request.sourceType,
    mode: request.mode,
    workUnits: units.length,
    newest: units[0]?.scope.period.start,
    oldest: units[units.length - 1]?.scope.period.start
  });

  const runBatch = async (unit: WorkUnit, batch: Batch): Promise<BatchOutcome> => {
    const context = { workUnit: workUnitKey(unit), batchId: batch.batchId };
    if (pastDeadline()) {
      logEvent("info", "sync.batch_deferred", context);
      return { status: "deferred", fatalReport: false };
    }

    try {
      const payload = await reports.execute({
        request: definition.buildRequest(unit, batch),
        parser: parsers[unit.sourceType],
        context
      });

      const ingestedAt = now();
      const scopeFields = definition.scopeFields(unit);
      const records: CanonicalRecord[] = [];
      let invalid = 0;
      for (const raw of payload.records) {
        try {
          records.push(toCanonicalRecord(raw, { sourceType: unit.sourceType, marketplace: unit.scope.marketplace, scopeFields, ingestedAt }));
        } catch (err) {
          if (!(err instanceof InvalidRecordError)) throw err;
          invalid += 1;
        }
      }
      if (invalid > 0) {
        tracker.addInvalid(invalid);
        logEvent("warn", "sync.records_skipped", { ...context, invalid, received: payload.records.length });
      }

      const written = await writer.writeBatch(records, { allowEqualAuthority: unit.mode === "refresh", context });
      await checkpoints.commit(unit, batch.batchId, { status: "completed", rowCount: written.accepted });
      tracker.addRows(written.inserted + written.overwritten);

      logEvent("info", "sync.batch_completed", {
        ...context,
        reportId: payload.reportId,
        rows: written.accepted,
        inserted: written.inserted,
        overwritten: written.overwritten,
        skipped: written.skipped
      });
      return { status: "completed", fatalReport: false };
    } catch (err) {
      const decision = classifyBatchFailure(err, context);
      if (decision.action === "abort") throw decision.error;

      await checkpoints.commit(unit, batch.batchId, { status: "failed", error: decision.error });
      logEvent(decision.expected ? "warn" : "error", "sync.batch_failed", { ...context, ...decision.error });
      return { status: "failed", fatalReport: decision.fatalReport };
    }
  };

  /** Reuses the plan a claimed checkpoint already holds; only fresh or reset units ask the catalog. */
  const resolvePlan = async (unit: WorkUnit, claimed: Checkpoint): Promise<{ batches: Batch[]; checkpoint: Checkpoint }> => {
    const stored = storedBatchPlan(claimed);
    if (stored) {
      logEvent("info", "sync.plan_resumed", { workUnit: claimed.id, batches: stored.length });
      return { batches: stored, checkpoint: claimed };
    }

    let batches: Batch[];
    try {
      batches = await planBatches(definition, unit, catalog);
    } catch (err) {
      throw new SyncFatalError({
        message: `Could not plan batches for ${claimed.id}: ${toErrorMessage(err)}`,
        context: { workUnit: claimed.id },
        cause: err
      });
    }
    return { batches, checkpoint: await checkpoints.planBatches(unit, batches) };
  };

  const runWorkUnit = async (unit: WorkUnit): Promise<void> => {
    const id = workUnitKey(unit);
    if (pastDeadline()) {
      tracker.addOutcome("deferred");
      logEvent("info", "sync.unit_deferred", { workUnit: id });
      return;
    }

    const claim = await checkpoints.claim(unit, { force: unit.mode === "refresh", leaseMs: config.timeBudgetMs });
    if (claim.action !== "claimed") {
      tracker.addOutcome("skipped");
      if (claim.action === "skipped_attention") {
        tracker.flagAttention(id);
        logEvent("warn", "sync.unit_needs_attention", { workUnit: id, lastError: claim.checkpoint.lastError?.code });
      } else if (claim.action === "skipped_leased") {
        logEvent("info", "sync.unit_leased", {
          workUnit: id,
          leaseOwner: claim.checkpoint.leaseOwner,
          leaseUntil: claim.checkpoint.leaseUntil?.toISOString()
        });
      }
      return;
    }

    const { batches, checkpoint: planned } = await resolvePlan(unit, claim.checkpoint);
    const runnable = batches.filter((batch) => planned.batches[batch.batchId]?.status !== "completed");

    const limitBatch = createLimiter(config.batchConcurrency);
    const results: BatchOutcome[] = [];
    await settleAll(
      runnable.map((batch) =>
        limitBatch(async () => {
          results.push(await runBatch(unit, batch));
        })
      )
    );

    const deferred = results.some((result) => result.status === "deferred");
    const finalized = await checkpoints.finalize(unit, {
      sawFatalReport: results.some((result) => result.fatalReport)
    });

    if (finalized.needsAttention) tracker.flagAttention(id);
    if (deferred || finalized.status === "in_progress" || finalized.status === "pending") tracker.addOutcome("deferred");
    else if (finalized.status === "done") tracker.addOutcome("completed");
    else if (finalized.status === "partial") tracker.addOutcome("partial");
    else tracker.addOutcome("failed");

    logEvent("info", "sync.unit_finalized", {
      workUnit: id,
      status: finalized.status,
      rowCount: finalized.rowCount,
      batches: batches.length,
      ran: runnable.length,
      deferred,
      needsAttention: finalized.needsAttention
    });
  };

  const limitUnit = createLimiter(config.concurrency);
  await settleAll(units.map((unit) => limitUnit(() => runWorkUnit(unit))));

  const summary = tracker.summary();
  logEvent("info", "sync.completed", {
    sourceType: request.sourceType,
    mode: request.mode,
    ...summary,
    elapsedMs: now().getTime() - startedAt
  });
  return summary;
};
