import type { SourceType } from "../sync/workUnit";
import { identify, keySchemes, renderIdentityKey } from "./identity";
import { sourceTagFor } from "./precedence";
import type { CanonicalRecord, RawRecord } from "./record.types";

export type CanonicalizeContext = {
  sourceType: SourceType;
  marketplace: string;
  /** Values implied by the work unit scope (e.g. the report date); the row's own values win. */
  scopeFields: RawRecord;
  ingestedAt: Date;
};

export const toCanonicalRecord = (raw: RawRecord, ctx: CanonicalizeContext): CanonicalRecord => {
  const fields: RawRecord = { ...ctx.scopeFields };
  for (const [name, value] of Object.entries(raw)) {
    if (value !== undefined) fields[name] = value;
  }
  // Reports are requested per marketplace; the work unit is authoritative for it.
  fields.marketplace = ctx.marketplace.toUpperCase();

  const identity = identify(fields, ctx.sourceType);
  return {
    key: renderIdentityKey(identity),
    identity,
    entity: keySchemes[ctx.sourceType].entity,
    marketplace: ctx.marketplace.toUpperCase(),
    source: sourceTagFor(ctx.sourceType),
    fields,
    ingestedAt: ctx.ingestedAt
  };
};

/**
 * Collapses records sharing an identity key inside one batch. The last occurrence wins,
 * matching what a sequential upsert of the same rows would leave behind.
 */
export const dedupeByIdentityKey = (records: CanonicalRecord[]): CanonicalRecord[] => {
  const byKey = new Map<string, CanonicalRecord>();
  for (const record of records) {
    byKey.delete(record.key);
    byKey.set(record.key, record);
  }
  return Array.from(byKey.values());
};
