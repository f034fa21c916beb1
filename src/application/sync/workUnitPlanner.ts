import { partition, type Batch } from "../../core/batching/partition";
import { isKnownMarketplace, type SourceDefinition } from "../../core/sources/sourceCatalog";
import {
  daysOf,
  enumeratePeriods,
  isIsoDate,
  latestAvailablePeriod,
  type Granularity,
  type IsoDate,
  type Period
} from "../../core/sync/periods";
import { SyncFatalError } from "../../core/sync/sync.errors";
import { createWorkUnit, type SourceType, type SyncMode, type WorkUnit } from "../../core/sync/workUnit";
import type { ItemCatalog } from "../../ports/RecordRepository";

export type ScopeFilter = {
  marketplaces?: string[];
  from?: IsoDate;
  to?: IsoDate;
  granularity?: Granularity;
};

export type SyncRequest = {
  sourceType: SourceType;
  mode: SyncMode;
  scopeFilter?: ScopeFilter;
};

export type PlanOptions = {
  now: Date;
  lookbackPeriods: number;
  maxWorkUnits: number;
};

const invalidRequest = (message: string) => new SyncFatalError({ message });

const resolveMarketplaces = (definition: SourceDefinition, filter: ScopeFilter): string[] => {
  const requested = filter.marketplaces && filter.marketplaces.length > 0 ? filter.marketplaces : definition.defaultMarketplaces;
  const marketplaces = Array.from(new Set(requested.map((code) => code.trim().toUpperCase())));
  const unknown = marketplaces.filter((code) => !isKnownMarketplace(code));
  if (unknown.length > 0) throw invalidRequest(`Unknown marketplace(s): ${unknown.join(", ")}`);
  return marketplaces;
};

const resolveGranularity = (definition: SourceDefinition, filter: ScopeFilter): Granularity => {
  const granularity = filter.granularity ?? definition.granularities[0];
  if (!granularity || !definition.granularities.includes(granularity)) {
    throw invalidRequest(`${definition.sourceType} does not support ${String(filter.granularity)} periods`);
  }
  return granularity;
};

const resolvePeriods = (definition: SourceDefinition, granularity: Granularity, request: SyncRequest, opts: PlanOptions): Period[] => {
  const filter = request.scopeFilter ?? {};
  for (const [name, value] of [["from", filter.from], ["to", filter.to]] as const) {
    if (value != null && !isIsoDate(value)) throw invalidRequest(`scopeFilter.${name}=${value} is not a YYYY-MM-DD date`);
  }

  const latest = latestAvailablePeriod(granularity, opts.now, definition.availabilityDelayHours);
  const to = filter.to != null && filter.to < latest.end ? filter.to : latest.end;

  if (filter.from != null) {
    if (filter.from > to) throw invalidRequest(`scopeFilter.from=${filter.from} is after ${to}`);
    return enumeratePeriods(granularity, filter.from, to);
  }

  const from = definition.backfillStart <= to ? definition.backfillStart : to;
  const periods = enumeratePeriods(granularity, from, to);
  return request.mode === "backfill" ? periods : periods.slice(0, opts.lookbackPeriods);
};

/**
 * Expands a sync request into work units, newest period first and marketplaces in the
 * order requested. Periods that end after the source's publication delay are never planned.
 */
export const planWorkUnits = (definition: SourceDefinition, request: SyncRequest, opts: PlanOptions): WorkUnit[] => {
  const filter = request.scopeFilter ?? {};
  const granularity = resolveGranularity(definition, filter);
  const marketplaces = resolveMarketplaces(definition, filter);
  const periods = resolvePeriods(definition, granularity, request, opts);

  const units = periods.flatMap((period) =>
    marketplaces.map((marketplace) => createWorkUnit(request.sourceType, { marketplace, period }, request.mode))
  );
  return units.slice(0, opts.maxWorkUnits);
};

/** Batches for one work unit; the same unit always yields the same batch ids. */
export const planBatches = async (definition: SourceDefinition, unit: WorkUnit, catalog: ItemCatalog): Promise<Batch[]> => {
  const { batching } = definition;
  switch (batching.kind) {
    case "single":
      return partition([unit.scope.period.start], { maxBatchSize: 1 });
    case "days":
      return partition(daysOf(unit.scope.period), { maxBatchSize: batching.maxDaysPerBatch });
    case "asins": {
      const asins = await catalog.listActiveAsins(unit.scope.marketplace);
      return partition(asins, { maxBatchSize: batching.maxAsinsPerBatch, maxChars: batching.maxChars });
    }
  }
};

