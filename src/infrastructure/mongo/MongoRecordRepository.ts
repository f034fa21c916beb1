import { randomUUID } from "crypto";
import { MongoBulkWriteError, type AnyBulkWriteOperation, type Collection, type WriteError } from "mongodb";
import { addDays, formatIsoDate } from "../../core/sync/periods";
import type { CanonicalRecord, IdentityKey, RawRecord, SourceTag, StoredRecordHead } from "../../core/records/record.types";
import type { ItemCatalog, RecordRepository, RecordWriteOp, RecordWriteResult } from "../../ports/RecordRepository";
import type { MongoConnection } from "./MongoClientFactory";
import { mongoIndexes } from "./mongo.indexes";

export type RecordDoc = {
  _id: string;            // rendered identity key
  identity: IdentityKey;
  marketplace: string;
  source: SourceTag;
  fields: RawRecord;
  ingestedAt: Date;
  revision: number;
  writeId: string;        // last write that touched the document
};

const DUPLICATE_KEY = 11000;

const toRecordDoc = (record: CanonicalRecord, revision: number, writeId: string): RecordDoc => ({
  _id: record.key,
  identity: record.identity,
  marketplace: record.marketplace,
  source: record.source,
  fields: record.fields,
  ingestedAt: record.ingestedAt,
  revision,
  writeId
});

const writeErrorsOf = (err: MongoBulkWriteError): WriteError[] =>
  Array.isArray(err.writeErrors) ? err.writeErrors : [err.writeErrors];

/**
 * One collection per entity, documents keyed by identity key. Inserts rely on `_id`
 * uniqueness; overwrites are conditional on the revision the caller decided against.
 */
export class MongoRecordRepository implements RecordRepository {
  private readonly collections = new Map<string, Collection<RecordDoc>>();

  constructor(private readonly connection: MongoConnection) {}

  private async getCollection(entity: string): Promise<Collection<RecordDoc>> {
    const cached = this.collections.get(entity);
    if (cached) return cached;

    const db = await this.connection.db();
    const col = db.collection<RecordDoc>(entity);
    for (const idx of mongoIndexes.recordCollection) {
      await col.createIndex(idx.keys, idx.options);
    }
    if (entity === "daily_asin_metrics") {
      for (const idx of mongoIndexes.dailyAsinMetrics) {
        await col.createIndex(idx.keys, idx.options);
      }
    }

    this.collections.set(entity, col);
    return col;
  }

  async findHeads(entity: string, keys: string[]): Promise<Map<string, StoredRecordHead>> {
    const heads = new Map<string, StoredRecordHead>();
    if (keys.length === 0) return heads;

    const col = await this.getCollection(entity);
    const docs = await col
      .find({ _id: { $in: keys } }, { projection: { source: 1, revision: 1 } })
      .toArray();
    for (const doc of docs) {
      heads.set(doc._id, { key: doc._id, source: doc.source, revision: doc.revision });
    }
    return heads;
  }

  async write(entity: string, ops: RecordWriteOp[]): Promise<RecordWriteResult> {
    if (ops.length === 0) return { applied: [], conflicts: [] };

    const col = await this.getCollection(entity);
    const writeId = randomUUID();
    const bulk: AnyBulkWriteOperation<RecordDoc>[] = ops.map((op) =>
      op.kind === "insert"
        ? { insertOne: { document: toRecordDoc(op.record, 1, writeId) } }
        : {
            updateOne: {
              filter: { _id: op.record.key, revision: op.expectedRevision },
              update: {
                $set: {
                  identity: op.record.identity,
                  marketplace: op.record.marketplace,
                  source: op.record.source,
                  fields: op.record.fields,
                  ingestedAt: op.record.ingestedAt,
                  revision: op.expectedRevision + 1,
                  writeId
                }
              }
            }
          }
    );

    const failed = new Set<number>();
    try {
      await col.bulkWrite(bulk, { ordered: false });
    } catch (err) {
      if (!(err instanceof MongoBulkWriteError)) throw err;
      for (const writeError of writeErrorsOf(err)) {
        if (writeError.code !== DUPLICATE_KEY) throw err;
        failed.add(writeError.index);
      }
    }

    // An overwrite whose revision moved on matches nothing; only the writeId tells.
    const overwriteKeys = ops.filter((op) => op.kind === "overwrite").map((op) => op.record.key);
    const written = new Set<string>();
    if (overwriteKeys.length > 0) {
      const docs = await col.find({ _id: { $in: overwriteKeys }, writeId }, { projection: { _id: 1 } }).toArray();
      for (const doc of docs) written.add(doc._id);
    }

    const applied: string[] = [];
    const conflicts: string[] = [];
    ops.forEach((op, index) => {
      const ok = op.kind === "insert" ? !failed.has(index) : written.has(op.record.key);
      (ok ? applied : conflicts).push(op.record.key);
    });
    return { applied, conflicts };
  }
}

/** ASINs with sales in the recent window, used to build search-query batches. */
export class MongoItemCatalog implements ItemCatalog {
  constructor(
    private readonly connection: MongoConnection,
    private readonly activeWindowDays = 30,
    private readonly now: () => Date = () => new Date()
  ) {}

  async listActiveAsins(marketplace: string): Promise<string[]> {
    const db = await this.connection.db();
    const since = addDays(formatIsoDate(this.now()), -this.activeWindowDays);
    const asins = await db
      .collection<RecordDoc>("daily_asin_metrics")
      .distinct("fields.childAsin", { marketplace: marketplace.toUpperCase(), "fields.date": { $gte: since } });
    return asins.filter((asin): asin is string => typeof asin === "string" && asin.trim() !== "");
  }
}
