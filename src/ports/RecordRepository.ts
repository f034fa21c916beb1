import type { CanonicalRecord, StoredRecordHead } from "../core/records/record.types";

export type RecordWriteOp =
  | { kind: "insert"; record: CanonicalRecord }
  | { kind: "overwrite"; record: CanonicalRecord; expectedRevision: number };

export type RecordWriteResult = {
  applied: string[];    // identity keys written
  conflicts: string[];  // identity keys that lost a race and need re-resolution
};

export interface RecordRepository {
  findHeads(entity: string, keys: string[]): Promise<Map<string, StoredRecordHead>>;
  write(entity: string, ops: RecordWriteOp[]): Promise<RecordWriteResult>;
}

/** Source of batch items that are not derived from the period (e.g. ASINs to query). */
export interface ItemCatalog {
  listActiveAsins(marketplace: string): Promise<string[]>;
}
