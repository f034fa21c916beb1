/**
 * Index plan, applied idempotently when a repository first touches its collection.
 * Checkpoints and records are keyed by `_id` (work unit identity / identity key), which
 * is the uniqueness constraint both rely on.
 */
export const mongoIndexes = {
  checkpointCollection: [
    { keys: { sourceType: 1, status: 1, updatedAt: -1 }, options: { name: "source_status_updated" } },
    { keys: { needsAttention: 1, sourceType: 1 }, options: { name: "needs_attention" } },
    { keys: { marketplace: 1, "period.start": -1 }, options: { name: "marketplace_period" } }
  ],
  recordCollection: [
    { keys: { marketplace: 1, "source.source": 1 }, options: { name: "marketplace_source" } },
    { keys: { ingestedAt: -1 }, options: { name: "ingested_at" } }
  ],
  dailyAsinMetrics: [
    { keys: { marketplace: 1, "fields.date": -1 }, options: { name: "marketplace_date" } }
  ]
} as const;
