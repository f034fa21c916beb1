import { randomUUID } from "crypto";
import type { Batch } from "../../core/batching/partition";
import {
  applyBatchPlan,
  applyClaim,
  applyCommit,
  applyFinalize,
  newCheckpoint
} from "../../core/checkpoints/checkpoint.transitions";
import type {
  BatchResult,
  Checkpoint,
  CheckpointQuery,
  ClaimResult,
  FinalizeOutcome
} from "../../core/checkpoints/checkpoint.types";
import { isSyncError, SyncFatalError } from "../../core/sync/sync.errors";
import type { WorkUnit } from "../../core/sync/workUnit";
import { workUnitKey } from "../../core/sync/workUnit";
import type { CheckpointRepository } from "../../ports/CheckpointRepository";
import { logEvent, toErrorMessage } from "../../shared/logging/logger";

export type CheckpointStoreOptions = {
  fatalErrorThreshold: number;
  maxCasAttempts?: number;
  /** Identifies this invocation on the leases it takes; random per store by default. */
  owner?: string;
  /** How long a claim keeps other invocations off the unit unless it is finalized first. */
  leaseMs?: number;
  now?: () => Date;
};

const DEFAULT_LEASE_MS = 15 * 60_000;

type Mutation = (checkpoint: Checkpoint) => { checkpoint: Checkpoint; changed: boolean };

/**
 * The only write path for checkpoints. Every mutation is read -> pure transition ->
 * compare-and-set on `revision`; a lost race re-reads and re-applies the transition.
 */
export class CheckpointStore {
  private readonly maxCasAttempts: number;
  private readonly now: () => Date;
  readonly owner: string;
  private readonly leaseMs: number;

  constructor(
    private readonly repo: CheckpointRepository,
    private readonly options: CheckpointStoreOptions
  ) {
    this.maxCasAttempts = options.maxCasAttempts ?? 5;
    this.now = options.now ?? (() => new Date());
    this.owner = options.owner ?? randomUUID();
    this.leaseMs = options.leaseMs ?? DEFAULT_LEASE_MS;
  }

  async get(unit: WorkUnit): Promise<Checkpoint | undefined> {
    const id = workUnitKey(unit);
    return this.guard(id, "get", () => this.repo.get(id));
  }

  async isComplete(unit: WorkUnit): Promise<boolean> {
    const checkpoint = await this.get(unit);
    return checkpoint?.status === "done";
  }

  async find(query: CheckpointQuery): Promise<Checkpoint[]> {
    return this.guard("*", "find", () => this.repo.find(query));
  }

  async claim(unit: WorkUnit, opts: { force?: boolean; leaseMs?: number } = {}): Promise<ClaimResult> {
    const id = workUnitKey(unit);
    const lease = { owner: this.owner, durationMs: opts.leaseMs ?? this.leaseMs };

    for (let attempt = 1; attempt <= this.maxCasAttempts; attempt += 1) {
      const now = this.now();
      const existing = await this.guard(id, "claim", () => this.repo.get(id));

      if (!existing) {
        const claimed = applyClaim(newCheckpoint(unit, now), { now, force: opts.force, lease });
        const created: Checkpoint = { ...claimed.checkpoint, revision: 1 };
        if (await this.guard(id, "claim", () => this.repo.insert(created))) {
          return { checkpoint: created, action: claimed.action };
        }
      } else {
        const claimed = applyClaim(existing, { now, force: opts.force, lease });
        if (claimed.action !== "claimed") return claimed;

        const next: Checkpoint = { ...claimed.checkpoint, revision: existing.revision + 1 };
        if (await this.guard(id, "claim", () => this.repo.replace(next, existing.revision))) {
          return { checkpoint: next, action: "claimed" };
        }
      }

      logEvent("warn", "checkpoint.cas_retry", { workUnit: id, operation: "claim", attempt });
    }

    throw this.contentionError(id, "claim");
  }

  async planBatches(unit: WorkUnit, batches: readonly Batch[]): Promise<Checkpoint> {
    return this.mutate(unit, "planBatches", (checkpoint) => ({
      checkpoint: applyBatchPlan(checkpoint, batches, this.now()),
      changed: true
    }));
  }

  /** Call only after the batch's rows are durably persisted. */
  async commit(unit: WorkUnit, batchId: string, result: BatchResult): Promise<Checkpoint> {
    return this.mutate(unit, "commit", (checkpoint) => applyCommit(checkpoint, batchId, result, this.now()));
  }

  async finalize(unit: WorkUnit, outcome: FinalizeOutcome): Promise<Checkpoint> {
    return this.mutate(unit, "finalize", (checkpoint) => ({
      checkpoint: applyFinalize(checkpoint, outcome, {
        now: this.now(),
        fatalErrorThreshold: this.options.fatalErrorThreshold
      }),
      changed: true
    }));
  }

  private async mutate(unit: WorkUnit, operation: string, mutation: Mutation): Promise<Checkpoint> {
    const id = workUnitKey(unit);

    for (let attempt = 1; attempt <= this.maxCasAttempts; attempt += 1) {
      const current = await this.guard(id, operation, () => this.repo.get(id));
      if (!current) {
        throw new SyncFatalError({
          message: `Checkpoint ${id} does not exist; ${operation} requires a prior claim`,
          context: { workUnit: id }
        });
      }

      let applied: { checkpoint: Checkpoint; changed: boolean };
      try {
        applied = mutation(current);
      } catch (err) {
        throw new SyncFatalError({
          message: `Checkpoint ${id} rejected ${operation}: ${toErrorMessage(err)}`,
          context: { workUnit: id },
          cause: err
        });
      }
      if (!applied.changed) return current;

      const next: Checkpoint = { ...applied.checkpoint, revision: current.revision + 1 };
      if (await this.guard(id, operation, () => this.repo.replace(next, current.revision))) {
        return next;
      }

      logEvent("warn", "checkpoint.cas_retry", { workUnit: id, operation, attempt });
    }

    throw this.contentionError(id, operation);
  }

  private contentionError(id: string, operation: string): SyncFatalError {
    return new SyncFatalError({
      message: `Checkpoint ${id}: ${operation} lost ${this.maxCasAttempts} concurrent updates in a row`,
      context: { workUnit: id, attempts: this.maxCasAttempts }
    });
  }

  private async guard<T>(id: string, operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (isSyncError(err)) throw err;
      throw new SyncFatalError({
        message: `Checkpoint store failed during ${operation}: ${toErrorMessage(err)}`,
        context: { workUnit: id },
        cause: err
      });
    }
  }
}
