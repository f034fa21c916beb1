import { createHash } from "crypto";
import type { SourceType } from "../sync/workUnit";
import { InvalidRecordError } from "../sync/sync.errors";
import type { ContentIdentityKey, IdentityKey, NaturalIdentityKey, RawRecord } from "./record.types";

export type NaturalKeyScheme = {
  kind: "natural";
  entity: string;
  fields: readonly string[];
};

/**
 * Hash-based identity for rows the upstream gives no identifier. The field list and
 * its order are part of the sync contract: changing either requires a new version,
 * since every previously computed key would stop matching.
 */
export type ContentKeyScheme = {
  kind: "content";
  entity: string;
  scheme: string;
  version: number;
  fields: readonly string[];
};

export type KeyScheme = NaturalKeyScheme | ContentKeyScheme;

export const financialEventKeyFieldsV1 = Object.freeze([
  "marketplace",
  "postedDate",
  "transactionType",
  "orderId",
  "sku",
  "quantity",
  "amountType",
  "amountDescription",
  "amount",
  "currency",
  "settlementId"
] as const);

const dailyAsinKey: NaturalKeyScheme = {
  kind: "natural",
  entity: "daily_asin_metrics",
  fields: ["marketplace", "date", "childAsin"]
};

export const keySchemes: Readonly<Record<SourceType, KeyScheme>> = Object.freeze({
  sales_traffic: dailyAsinKey,
  orders: dailyAsinKey,
  inventory: {
    kind: "natural",
    entity: "inventory_snapshots",
    fields: ["marketplace", "snapshotDate", "sku"]
  },
  search_query_performance: {
    kind: "natural",
    entity: "search_query_performance",
    fields: ["marketplace", "childAsin", "searchQuery", "periodStart", "periodEnd", "periodType"]
  },
  financial_events: {
    kind: "content",
    entity: "financial_events",
    scheme: "financial_event",
    version: 1,
    fields: financialEventKeyFieldsV1
  },
  reimbursements: {
    kind: "natural",
    entity: "reimbursements",
    fields: ["marketplace", "reimbursementId", "sku"]
  }
});

/**
 * Canonical string form of one key field. Strings are trimmed and empty means absent;
 * numeric strings are kept verbatim so identifiers like "007" survive.
 */
export const normalizeKeyValue = (value: unknown): string | null => {
  if (value == null) return null;
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed === "" ? null : trimmed;
  }
  if (typeof value === "number") return Number.isFinite(value) ? String(value) : null;
  if (typeof value === "boolean" || typeof value === "bigint") return String(value);
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString();
  return JSON.stringify(value);
};

export const contentHash = (values: Array<string | null>): string =>
  createHash("sha256").update(JSON.stringify(values)).digest("hex");

const naturalKey = (raw: RawRecord, scheme: NaturalKeyScheme): NaturalIdentityKey => {
  const parts = scheme.fields.map((field) => {
    const value = normalizeKeyValue(raw[field]);
    if (value == null) {
      throw new InvalidRecordError({
        message: `Record has no value for key field ${field}`,
        context: { field }
      });
    }
    return field === "marketplace" ? value.toUpperCase() : value;
  });
  return { kind: "natural", entity: scheme.entity, parts };
};

const contentKey = (raw: RawRecord, scheme: ContentKeyScheme): ContentIdentityKey => {
  const values = scheme.fields.map((field) => {
    const value = normalizeKeyValue(raw[field]);
    return field === "marketplace" && value != null ? value.toUpperCase() : value;
  });
  if (values.every((value) => value == null)) {
    throw new InvalidRecordError({ message: `Record has no values for content key ${scheme.scheme}` });
  }
  return { kind: "content", scheme: scheme.scheme, version: scheme.version, hash: contentHash(values) };
};

export const identifyWithScheme = (raw: RawRecord, scheme: KeyScheme): IdentityKey =>
  scheme.kind === "natural" ? naturalKey(raw, scheme) : contentKey(raw, scheme);

/** Deterministic identity for a raw record of the given source type. */
export const identify = (raw: RawRecord, sourceType: SourceType): IdentityKey =>
  identifyWithScheme(raw, keySchemes[sourceType]);

export const renderIdentityKey = (key: IdentityKey): string => {
  switch (key.kind) {
    case "natural":
      return `${key.entity}:${key.parts.map((part) => encodeURIComponent(part)).join("|")}`;
    case "content":
      return `${key.scheme}@v${key.version}:${key.hash}`;
  }
};
