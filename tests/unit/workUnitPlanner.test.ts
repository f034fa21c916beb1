import { planBatches, planWorkUnits, type SyncRequest } from "../../src/application/sync/workUnitPlanner";
import { sourceCatalog } from "../../src/core/sources/sourceCatalog";
import { SyncFatalError } from "../../src/core/sync/sync.errors";
import { createWorkUnit, workUnitKey } from "../../src/core/sync/workUnit";
import { staticCatalog } from "../support/fakes";

const opts = (now: string, overrides: Partial<{ lookbackPeriods: number; maxWorkUnits: number }> = {}) => ({
  now: new Date(now),
  lookbackPeriods: 3,
  maxWorkUnits: 200,
  ...overrides
});

const plan = (request: SyncRequest, now: string, overrides?: Partial<{ lookbackPeriods: number; maxWorkUnits: number }>) =>
  planWorkUnits(sourceCatalog[request.sourceType], request, opts(now, overrides));

describe("planWorkUnits", () => {
  it("plans the latest available days for every default marketplace, newest first", () => {
    const units = plan({ sourceType: "sales_traffic", mode: "incremental" }, "2024-03-10T12:00:00Z");

    expect(units.map(workUnitKey)).toEqual([
      "sales_traffic|USA|DAY|2024-03-06..2024-03-06",
      "sales_traffic|CA|DAY|2024-03-06..2024-03-06",
      "sales_traffic|MX|DAY|2024-03-06..2024-03-06",
      "sales_traffic|USA|DAY|2024-03-05..2024-03-05",
      "sales_traffic|CA|DAY|2024-03-05..2024-03-05",
      "sales_traffic|MX|DAY|2024-03-05..2024-03-05",
      "sales_traffic|USA|DAY|2024-03-04..2024-03-04",
      "sales_traffic|CA|DAY|2024-03-04..2024-03-04",
      "sales_traffic|MX|DAY|2024-03-04..2024-03-04"
    ]);
    expect(units.every((unit) => unit.mode === "incremental")).toBe(true);
  });

  it("normalizes and de-duplicates requested marketplaces", () => {
    const units = plan(
      { sourceType: "reimbursements", mode: "incremental", scopeFilter: { marketplaces: [" ca", "CA", "usa"] } },
      "2024-03-12T10:00:00Z",
      { lookbackPeriods: 1 }
    );

    expect(units.map((unit) => unit.scope.marketplace)).toEqual(["CA", "USA"]);
    expect(units[0]?.scope.period).toEqual({ start: "2024-03-03", end: "2024-03-09", granularity: "WEEK" });
  });

  it("clips an explicit range to what is already published and ignores the lookback", () => {
    const units = plan(
      {
        sourceType: "sales_traffic",
        mode: "refresh",
        scopeFilter: { marketplaces: ["USA"], from: "2024-03-01", to: "2024-03-31" }
      },
      "2024-03-10T12:00:00Z"
    );

    expect(units.map((unit) => unit.scope.period.start)).toEqual([
      "2024-03-06",
      "2024-03-05",
      "2024-03-04",
      "2024-03-03",
      "2024-03-02",
      "2024-03-01"
    ]);
  });

  it("walks back to the backfill start in backfill mode, capped by maxWorkUnits", () => {
    const request: SyncRequest = { sourceType: "financial_events", mode: "backfill", scopeFilter: { marketplaces: ["USA"] } };

    expect(plan(request, "2024-03-12T10:00:00Z")).toHaveLength(9);
    expect(plan(request, "2024-03-12T10:00:00Z", { maxWorkUnits: 4 }).map((unit) => unit.scope.period.start)).toEqual([
      "2024-03-03",
      "2024-02-25",
      "2024-02-18",
      "2024-02-11"
    ]);
  });

  it("plans complete months when asked for monthly periods", () => {
    const units = plan(
      {
        sourceType: "search_query_performance",
        mode: "incremental",
        scopeFilter: { marketplaces: ["USA"], granularity: "MONTH" }
      },
      "2024-03-12T10:00:00Z"
    );

    expect(units.map((unit) => unit.scope.period)).toEqual([
      { start: "2024-02-01", end: "2024-02-29", granularity: "MONTH" },
      { start: "2024-01-01", end: "2024-01-31", granularity: "MONTH" },
      { start: "2023-12-01", end: "2023-12-31", granularity: "MONTH" }
    ]);
  });

  it.each([
    [{ marketplaces: ["USA", "zz"] }, "Unknown marketplace(s): ZZ"],
    [{ granularity: "MONTH" as const }, "sales_traffic does not support MONTH periods"],
    [{ from: "2024-3-1" }, "scopeFilter.from=2024-3-1 is not a YYYY-MM-DD date"],
    [{ to: "2024-02-30" }, "scopeFilter.to=2024-02-30 is not a YYYY-MM-DD date"],
    [{ from: "2024-03-08" }, "scopeFilter.from=2024-03-08 is after 2024-03-06"]
  ])("rejects the scope filter %o", (scopeFilter, message) => {
    const planning = () => plan({ sourceType: "sales_traffic", mode: "incremental", scopeFilter }, "2024-03-10T12:00:00Z");

    expect(planning).toThrow(SyncFatalError);
    expect(planning).toThrow(message);
  });
});

describe("planBatches", () => {
  it("uses one batch for single-report sources", async () => {
    const unit = createWorkUnit(
      "sales_traffic",
      { marketplace: "USA", period: { start: "2024-03-06", end: "2024-03-06", granularity: "DAY" } },
      "incremental"
    );

    const batches = await planBatches(sourceCatalog.sales_traffic, unit, staticCatalog([]));

    expect(batches.map((batch) => batch.items)).toEqual([["2024-03-06"]]);
  });

  it("splits a financial week into day ranges and builds one request per range", async () => {
    const unit = createWorkUnit(
      "financial_events",
      { marketplace: "USA", period: { start: "2024-03-03", end: "2024-03-09", granularity: "WEEK" } },
      "incremental"
    );

    const batches = await planBatches(sourceCatalog.financial_events, unit, staticCatalog([]));

    expect(batches.map((batch) => batch.items)).toEqual([
      ["2024-03-03", "2024-03-04", "2024-03-05", "2024-03-06", "2024-03-07"],
      ["2024-03-08", "2024-03-09"]
    ]);
    const second = batches[1];
    expect(second && sourceCatalog.financial_events.buildRequest(unit, second)).toEqual({
      reportType: "GET_DATE_RANGE_FINANCIAL_TRANSACTION_DATA",
      marketplaceIds: ["ATVPDKIKX0DER"],
      dataStartTime: "2024-03-08T00:00:00Z",
      dataEndTime: "2024-03-09T23:59:59Z"
    });
  });

  it("batches catalog ASINs for search query reports", async () => {
    const asins = Array.from({ length: 20 }, (_, index) => `B0TEST${String(index + 1).padStart(4, "0")}`);
    const catalog = staticCatalog(asins);
    const listSpy = jest.spyOn(catalog, "listActiveAsins");
    const unit = createWorkUnit(
      "search_query_performance",
      { marketplace: "ca", period: { start: "2024-03-03", end: "2024-03-09", granularity: "WEEK" } },
      "incremental"
    );

    const batches = await planBatches(sourceCatalog.search_query_performance, unit, catalog);

    expect(listSpy).toHaveBeenCalledWith("CA");
    expect(batches.map((batch) => batch.items.length)).toEqual([18, 2]);
    const last = batches[1];
    expect(last && sourceCatalog.search_query_performance.buildRequest(unit, last).reportOptions).toEqual({
      reportPeriod: "WEEK",
      asin: "B0TEST0019 B0TEST0020"
    });
  });
});
