import type { Checkpoint, CheckpointQuery } from "../core/checkpoints/checkpoint.types";

/**
 * Persistence for checkpoints keyed by work unit identity. The id is a uniqueness
 * constraint in the store; `replace` is a compare-and-set on `revision`.
 */
export interface CheckpointRepository {
  get(id: string): Promise<Checkpoint | undefined>;
  /** Resolves false when a checkpoint with the same id already exists. */
  insert(checkpoint: Checkpoint): Promise<boolean>;
  /** Resolves false when the stored revision no longer equals `expectedRevision`. */
  replace(checkpoint: Checkpoint, expectedRevision: number): Promise<boolean>;
  find(query: CheckpointQuery): Promise<Checkpoint[]>;
}
