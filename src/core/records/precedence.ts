import type { SourceType } from "../sync/workUnit";
import type { SourceTag } from "./record.types";

/**
 * Authority per source. Near-real-time orders land first and are replaced once the
 * attribution-corrected sales & traffic report for the same day arrives.
 */
export const sourceAuthority: Readonly<Record<SourceType, number>> = Object.freeze({
  orders: 10,
  sales_traffic: 20,
  inventory: 20,
  search_query_performance: 20,
  financial_events: 20,
  reimbursements: 20
});

export const sourceTagFor = (source: SourceType): SourceTag => ({ source, authority: sourceAuthority[source] });

export type PrecedenceDecision = "insert" | "overwrite" | "skip";

export type ResolveOptions = {
  /** Lets a re-pull from an equally authoritative source replace the stored row. */
  allowEqualAuthority?: boolean;
};

export const resolvePrecedence = (
  existing: { source: SourceTag } | undefined,
  incoming: { source: SourceTag },
  options: ResolveOptions = {}
): PrecedenceDecision => {
  if (!existing) return "insert";

  const incomingAuthority = incoming.source.authority;
  const existingAuthority = existing.source.authority;
  if (incomingAuthority > existingAuthority) return "overwrite";
  if (options.allowEqualAuthority && incomingAuthority === existingAuthority) return "overwrite";
  return "skip";
};
