import type { Period } from "./periods";

export const sourceTypes = [
  "sales_traffic",
  "orders",
  "inventory",
  "search_query_performance",
  "financial_events",
  "reimbursements"
] as const;

export type SourceType = (typeof sourceTypes)[number];

export const isSourceType = (value: string): value is SourceType =>
  sourceTypes.some((sourceType) => sourceType === value);

export const syncModes = ["incremental", "backfill", "refresh"] as const;

export type SyncMode = (typeof syncModes)[number];

export const isSyncMode = (value: string): value is SyncMode =>
  syncModes.some((mode) => mode === value);

export type Scope = {
  marketplace: string;
  period: Period;
};

/**
 * Atomic pull task. Identity is `(sourceType, scope)`; the mode only changes how the
 * unit is claimed and how equal-authority records are treated.
 */
export type WorkUnit = Readonly<{
  sourceType: SourceType;
  scope: Readonly<Scope>;
  mode: SyncMode;
}>;

export const createWorkUnit = (sourceType: SourceType, scope: Scope, mode: SyncMode): WorkUnit =>
  Object.freeze({
    sourceType,
    scope: Object.freeze({
      marketplace: scope.marketplace.toUpperCase(),
      period: Object.freeze({ ...scope.period })
    }),
    mode
  });

export const scopeKey = (scope: Scope): string =>
  `${scope.marketplace.toUpperCase()}|${scope.period.granularity}|${scope.period.start}..${scope.period.end}`;

export const workUnitKey = (unit: Pick<WorkUnit, "sourceType" | "scope">): string =>
  `${unit.sourceType}|${scopeKey(unit.scope)}`;
