import { MongoServerError, type Collection, type Filter } from "mongodb";
import type { Checkpoint, CheckpointQuery } from "../../core/checkpoints/checkpoint.types";
import type { CheckpointRepository } from "../../ports/CheckpointRepository";
import type { MongoConnection } from "./MongoClientFactory";
import { mongoIndexes } from "./mongo.indexes";

export type CheckpointDoc = Omit<Checkpoint, "id"> & { _id: string };

const DUPLICATE_KEY = 11000;

export const toCheckpointDoc = ({ id, ...rest }: Checkpoint): CheckpointDoc => ({ _id: id, ...rest });

export const fromCheckpointDoc = ({ _id, ...rest }: CheckpointDoc): Checkpoint => ({ id: _id, ...rest });

export const buildCheckpointFilter = (query: CheckpointQuery): Filter<CheckpointDoc> => {
  const filter: Filter<CheckpointDoc> = {};
  if (query.sourceType) filter.sourceType = query.sourceType;
  if (query.marketplace) filter.marketplace = query.marketplace.toUpperCase();
  if (query.statuses && query.statuses.length > 0) filter.status = { $in: query.statuses };
  if (query.needsAttention != null) filter.needsAttention = query.needsAttention;
  return filter;
};

/**
 * Checkpoints keyed by work unit identity, batch state embedded. `_id` uniqueness
 * settles concurrent first claims; `revision` guards every later replace.
 */
export class MongoCheckpointRepository implements CheckpointRepository {
  private collection?: Collection<CheckpointDoc>;

  constructor(
    private readonly connection: MongoConnection,
    private readonly collectionName = "sync_checkpoints"
  ) {}

  private async getCollection(): Promise<Collection<CheckpointDoc>> {
    if (this.collection) return this.collection;

    const db = await this.connection.db();
    const col = db.collection<CheckpointDoc>(this.collectionName);
    for (const idx of mongoIndexes.checkpointCollection) {
      await col.createIndex(idx.keys, idx.options);
    }

    this.collection = col;
    return col;
  }

  async get(id: string): Promise<Checkpoint | undefined> {
    const col = await this.getCollection();
    const doc = await col.findOne({ _id: id });
    return doc ? fromCheckpointDoc(doc) : undefined;
  }

  async insert(checkpoint: Checkpoint): Promise<boolean> {
    const col = await this.getCollection();
    try {
      await col.insertOne(toCheckpointDoc(checkpoint));
      return true;
    } catch (err) {
      if (err instanceof MongoServerError && err.code === DUPLICATE_KEY) return false;
      throw err;
    }
  }

  async replace(checkpoint: Checkpoint, expectedRevision: number): Promise<boolean> {
    const col = await this.getCollection();
    const res = await col.replaceOne({ _id: checkpoint.id, revision: expectedRevision }, toCheckpointDoc(checkpoint));
    return res.matchedCount === 1;
  }

  async find(query: CheckpointQuery): Promise<Checkpoint[]> {
    const col = await this.getCollection();
    const docs = await col
      .find(buildCheckpointFilter(query))
      .sort({ updatedAt: -1 })
      .limit(query.limit ?? 500)
      .toArray();
    return docs.map(fromCheckpointDoc);
  }
}
