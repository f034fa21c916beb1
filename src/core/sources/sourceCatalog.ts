import type { Batch } from "../batching/partition";
import type { RawRecord } from "../records/record.types";
import type { Granularity, IsoDate } from "../sync/periods";
import type { SourceType, WorkUnit } from "../sync/workUnit";
import type { ReportRequest } from "../../ports/ReportApiClient";

/** Shared upstream quotas; every report type draws from the same creation quota. */
export const reportQuotaClasses = {
  create: "reports_create",
  get: "reports_get"
} as const;

export const marketplaceIds: Readonly<Record<string, { id: string; region: "NA" | "EU" | "FE" }>> = Object.freeze({
  USA: { id: "ATVPDKIKX0DER", region: "NA" },
  CA: { id: "A2EUQ1WTGCTBG2", region: "NA" },
  MX: { id: "A1AM78C64UM0Y8", region: "NA" },
  BR: { id: "A2Q3Y263D00KWC", region: "NA" },
  UK: { id: "A1F83G8C2ARO7P", region: "EU" },
  DE: { id: "A1PA6795UKMFR9", region: "EU" },
  FR: { id: "A13V1IB3VIYZZH", region: "EU" },
  IT: { id: "APJ6JRA9NG5V4", region: "EU" },
  ES: { id: "A1RKKUPIHCS9HS", region: "EU" },
  UAE: { id: "A2VIGQ35RCS4UG", region: "EU" },
  AU: { id: "A39IBJ37TRP1C6", region: "FE" },
  JP: { id: "A1VC38T7YXB528", region: "FE" }
});

export const isKnownMarketplace = (code: string): boolean => code.toUpperCase() in marketplaceIds;

export type BatchingStrategy =
  | { kind: "single" }
  | { kind: "days"; maxDaysPerBatch: number }
  | { kind: "asins"; maxAsinsPerBatch: number; maxChars: number };

export type SourceDefinition = {
  sourceType: SourceType;
  reportType: string;
  granularities: readonly Granularity[];   // first one is the default
  availabilityDelayHours: number;
  backfillStart: IsoDate;
  defaultMarketplaces: readonly string[];
  batching: BatchingStrategy;
  buildRequest(unit: WorkUnit, batch: Batch): ReportRequest;
  /** Fields implied by the scope that report rows do not repeat. */
  scopeFields(unit: WorkUnit): RawRecord;
};

const startOfDay = (day: IsoDate) => `${day}T00:00:00Z`;
const endOfDay = (day: IsoDate) => `${day}T23:59:59Z`;

const marketplaceIdOf = (unit: WorkUnit): string => {
  const entry = marketplaceIds[unit.scope.marketplace];
  if (!entry) throw new Error(`Unknown marketplace: ${unit.scope.marketplace}`);
  return entry.id;
};

const periodRequest = (reportType: string, unit: WorkUnit, from: IsoDate, to: IsoDate, reportOptions?: Record<string, string>): ReportRequest => {
  const request: ReportRequest = {
    reportType,
    marketplaceIds: [marketplaceIdOf(unit)],
    dataStartTime: startOfDay(from),
    dataEndTime: endOfDay(to)
  };
  if (reportOptions) request.reportOptions = reportOptions;
  return request;
};

const firstAndLast = (batch: Batch): { first: IsoDate; last: IsoDate } => ({
  first: batch.items[0] ?? "",
  last: batch.items[batch.items.length - 1] ?? ""
});

const NA_MARKETPLACES = ["USA", "CA", "MX"] as const;

export const sourceCatalog: Readonly<Record<SourceType, SourceDefinition>> = Object.freeze({
  sales_traffic: {
    sourceType: "sales_traffic",
    reportType: "GET_SALES_AND_TRAFFIC_REPORT",
    granularities: ["DAY"],
    availabilityDelayHours: 72,
    backfillStart: "2024-01-01",
    defaultMarketplaces: NA_MARKETPLACES,
    batching: { kind: "single" },
    buildRequest: (unit) => ({
      reportType: "GET_SALES_AND_TRAFFIC_REPORT",
      marketplaceIds: [marketplaceIdOf(unit)],
      dataStartTime: startOfDay(unit.scope.period.start),
      dataEndTime: startOfDay(unit.scope.period.start),
      reportOptions: { dateGranularity: "DAY", asinGranularity: "CHILD" }
    }),
    scopeFields: (unit) => ({ date: unit.scope.period.start })
  },
  orders: {
    sourceType: "orders",
    reportType: "GET_FLAT_FILE_ALL_ORDERS_DATA_BY_ORDER_DATE_GENERAL",
    granularities: ["DAY"],
    availabilityDelayHours: 0,
    backfillStart: "2024-01-01",
    defaultMarketplaces: NA_MARKETPLACES,
    batching: { kind: "single" },
    buildRequest: (unit) =>
      periodRequest("GET_FLAT_FILE_ALL_ORDERS_DATA_BY_ORDER_DATE_GENERAL", unit, unit.scope.period.start, unit.scope.period.end),
    scopeFields: (unit) => ({ date: unit.scope.period.start })
  },
  inventory: {
    sourceType: "inventory",
    reportType: "GET_FBA_MYI_UNSUPPRESSED_INVENTORY_DATA",
    granularities: ["DAY"],
    availabilityDelayHours: 0,
    backfillStart: "2024-01-01",
    defaultMarketplaces: NA_MARKETPLACES,
    batching: { kind: "single" },
    buildRequest: (unit) =>
      periodRequest("GET_FBA_MYI_UNSUPPRESSED_INVENTORY_DATA", unit, unit.scope.period.start, unit.scope.period.end),
    scopeFields: (unit) => ({ snapshotDate: unit.scope.period.start })
  },
  search_query_performance: {
    sourceType: "search_query_performance",
    reportType: "GET_BRAND_ANALYTICS_SEARCH_QUERY_PERFORMANCE_REPORT",
    granularities: ["WEEK", "MONTH"],
    availabilityDelayHours: 48,
    backfillStart: "2023-12-03",
    defaultMarketplaces: ["USA", "CA"],
    batching: { kind: "asins", maxAsinsPerBatch: 18, maxChars: 200 },
    buildRequest: (unit, batch) =>
      periodRequest(
        "GET_BRAND_ANALYTICS_SEARCH_QUERY_PERFORMANCE_REPORT",
        unit,
        unit.scope.period.start,
        unit.scope.period.end,
        { reportPeriod: unit.scope.period.granularity, asin: batch.items.join(" ") }
      ),
    scopeFields: (unit) => ({
      periodStart: unit.scope.period.start,
      periodEnd: unit.scope.period.end,
      periodType: unit.scope.period.granularity
    })
  },
  financial_events: {
    sourceType: "financial_events",
    reportType: "GET_DATE_RANGE_FINANCIAL_TRANSACTION_DATA",
    granularities: ["WEEK", "MONTH", "DAY"],
    availabilityDelayHours: 48,
    backfillStart: "2024-01-01",
    defaultMarketplaces: NA_MARKETPLACES,
    batching: { kind: "days", maxDaysPerBatch: 5 },
    buildRequest: (unit, batch) => {
      const { first, last } = firstAndLast(batch);
      return periodRequest("GET_DATE_RANGE_FINANCIAL_TRANSACTION_DATA", unit, first, last);
    },
    scopeFields: () => ({})
  },
  reimbursements: {
    sourceType: "reimbursements",
    reportType: "GET_FBA_REIMBURSEMENTS_DATA",
    granularities: ["WEEK"],
    availabilityDelayHours: 24,
    backfillStart: "2024-01-01",
    defaultMarketplaces: NA_MARKETPLACES,
    batching: { kind: "single" },
    buildRequest: (unit) =>
      periodRequest("GET_FBA_REIMBURSEMENTS_DATA", unit, unit.scope.period.start, unit.scope.period.end),
    scopeFields: () => ({})
  }
});
