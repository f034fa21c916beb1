import { defaultSyncConfig, resolveSyncConfig } from "../../src/application/sync/sync.config";
import { classifyBatchFailure, createSyncRunSummaryTracker } from "../../src/application/sync/sync.error-handler";
import { FatalReportError, ParseError, SyncFatalError } from "../../src/core/sync/sync.errors";

describe("resolveSyncConfig", () => {
  it("falls back to defaults", () => {
    expect(resolveSyncConfig()).toEqual(defaultSyncConfig);
    expect(resolveSyncConfig({ concurrency: 4 })).toEqual({ ...defaultSyncConfig, concurrency: 4 });
  });

  it.each([
    [{ concurrency: 0 }, "concurrency=0 is out of allowed range [1..16]"],
    [{ batchConcurrency: 1.5 }, "batchConcurrency=1.5 is out of allowed range [1..8]"],
    [{ lookbackPeriods: 91 }, "lookbackPeriods=91 is out of allowed range [1..90]"],
    [{ timeBudgetMs: 60_000, safetyMarginMs: 60_000 }, "safetyMarginMs=60000 must be lower than timeBudgetMs=60000"]
  ])("rejects %o", (input, message) => {
    expect(() => resolveSyncConfig(input)).toThrow(message);
  });
});

describe("classifyBatchFailure", () => {
  const context = { workUnit: "orders|USA|DAY|2024-03-06..2024-03-06", batchId: "b_1" };

  it("records classified failures as expected", () => {
    const decision = classifyBatchFailure(new ParseError({ message: "bad document" }), context);

    expect(decision).toEqual({
      action: "record",
      error: { code: "parse_failed", message: "bad document" },
      fatalReport: false,
      expected: true
    });
  });

  it("marks upstream report failures", () => {
    const decision = classifyBatchFailure(
      new FatalReportError({ message: "Report rep-1 failed with status FATAL", terminalStatus: "FATAL" }),
      context
    );

    expect(decision).toMatchObject({ action: "record", fatalReport: true, error: { code: "report_fatal" } });
  });

  it("records anything else as unexpected", () => {
    expect(classifyBatchFailure(new TypeError("x is undefined"), context)).toEqual({
      action: "record",
      error: {
        code: "unexpected",
        message: "Unexpected failure in orders|USA|DAY|2024-03-06..2024-03-06 batch b_1: x is undefined"
      },
      fatalReport: false,
      expected: false
    });
  });

  it("aborts on failures of the run itself", () => {
    const fatal = new SyncFatalError({ message: "Checkpoint store failed during commit: timeout" });

    expect(classifyBatchFailure(fatal, context)).toEqual({ action: "abort", error: fatal });
  });
});

describe("createSyncRunSummaryTracker", () => {
  it("tallies outcomes, rows and flagged units", () => {
    const tracker = createSyncRunSummaryTracker(5);
    tracker.addRows(7);
    tracker.addRows(3);
    tracker.addInvalid(2);
    tracker.addOutcome("completed");
    tracker.addOutcome("completed");
    tracker.addOutcome("partial");
    tracker.addOutcome("deferred");
    tracker.addOutcome("skipped");
    tracker.flagAttention("wu-b");
    tracker.flagAttention("wu-a");
    tracker.flagAttention("wu-b");

    expect(tracker.summary()).toEqual({
      rowsWritten: 10,
      workUnitsPlanned: 5,
      workUnitsCompleted: 2,
      workUnitsPartial: 1,
      workUnitsFailed: 0,
      workUnitsSkipped: 1,
      workUnitsDeferred: 1,
      recordsSkippedInvalid: 2,
      needsAttention: ["wu-a", "wu-b"]
    });
  });
});
