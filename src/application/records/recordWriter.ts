import { dedupeByIdentityKey } from "../../core/records/canonicalize";
import { resolvePrecedence, type ResolveOptions } from "../../core/records/precedence";
import type { CanonicalRecord } from "../../core/records/record.types";
import {
  isSyncError,
  PersistenceConflictError,
  PersistenceError,
  type SyncErrorContext
} from "../../core/sync/sync.errors";
import type { RecordRepository, RecordWriteOp } from "../../ports/RecordRepository";
import { logEvent, toErrorMessage } from "../../shared/logging/logger";

export type RecordWriteSummary = {
  /** Distinct identity keys handled by the batch, whether written or already held by the store. */
  accepted: number;
  inserted: number;
  overwritten: number;
  skipped: number;
};

export type WriteBatchOptions = ResolveOptions & {
  context?: Pick<SyncErrorContext, "workUnit" | "batchId">;
};

const emptySummary = (): RecordWriteSummary => ({ accepted: 0, inserted: 0, overwritten: 0, skipped: 0 });

/**
 * Persists one batch of canonical records. Precedence is decided against what the store
 * currently holds; records that lose a write race are re-read and re-decided.
 */
export class RecordWriter {
  private readonly maxConflictRetries: number;

  constructor(
    private readonly repo: RecordRepository,
    opts: { maxConflictRetries?: number } = {}
  ) {
    this.maxConflictRetries = opts.maxConflictRetries ?? 3;
  }

  async writeBatch(records: CanonicalRecord[], options: WriteBatchOptions = {}): Promise<RecordWriteSummary> {
    const summary = emptySummary();
    const byEntity = new Map<string, CanonicalRecord[]>();
    for (const record of dedupeByIdentityKey(records)) {
      const group = byEntity.get(record.entity) ?? [];
      group.push(record);
      byEntity.set(record.entity, group);
    }

    for (const [entity, group] of byEntity) {
      const result = await this.writeEntity(entity, group, options);
      summary.accepted += group.length;
      summary.inserted += result.inserted;
      summary.overwritten += result.overwritten;
      summary.skipped += result.skipped;
    }
    return summary;
  }

  private async writeEntity(
    entity: string,
    records: CanonicalRecord[],
    options: WriteBatchOptions
  ): Promise<Omit<RecordWriteSummary, "accepted">> {
    const result = { inserted: 0, overwritten: 0, skipped: 0 };
    let pending = records;

    for (let attempt = 0; pending.length > 0; attempt += 1) {
      if (attempt > this.maxConflictRetries) {
        throw new PersistenceConflictError({
          message: `${pending.length} ${entity} record(s) kept conflicting after ${this.maxConflictRetries} re-resolutions`,
          context: { ...options.context, attempts: attempt },
          identityKeys: pending.map((record) => record.key)
        });
      }

      const heads = await this.persist(entity, options, () =>
        this.repo.findHeads(
          entity,
          pending.map((record) => record.key)
        )
      );

      const ops: RecordWriteOp[] = [];
      for (const record of pending) {
        const head = heads.get(record.key);
        const decision = resolvePrecedence(head, record, options);
        if (decision === "insert") ops.push({ kind: "insert", record });
        else if (decision === "overwrite" && head) ops.push({ kind: "overwrite", record, expectedRevision: head.revision });
        else result.skipped += 1;
      }
      if (ops.length === 0) break;

      const written = await this.persist(entity, options, () => this.repo.write(entity, ops));
      const applied = new Set(written.applied);
      for (const op of ops) {
        if (!applied.has(op.record.key)) continue;
        if (op.kind === "insert") result.inserted += 1;
        else result.overwritten += 1;
      }

      const conflicts = new Set(written.conflicts);
      pending = ops.filter((op) => conflicts.has(op.record.key)).map((op) => op.record);
      if (pending.length > 0) {
        logEvent("warn", "records.conflict_retry", { ...options.context, entity, conflicts: pending.length, attempt: attempt + 1 });
      }
    }

    return result;
  }

  private async persist<T>(entity: string, options: WriteBatchOptions, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (isSyncError(err)) throw err;
      throw new PersistenceError({
        message: `Writing ${entity} records failed: ${toErrorMessage(err)}`,
        context: { ...options.context },
        cause: err
      });
    }
  }
}
