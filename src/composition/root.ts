import { CheckpointStore } from "../application/checkpoints/checkpointStore";
import { RecordWriter } from "../application/records/recordWriter";
import { ReportLifecycleDriver } from "../application/report-lifecycle/reportLifecycle.driver";
import type { SyncRunSummary } from "../application/sync/sync.error-handler";
import { runSync } from "../application/sync/syncOrchestrator.usecase";
import type { SyncRequest } from "../application/sync/workUnitPlanner";
import { reportQuotaClasses } from "../core/sources/sourceCatalog";
import { MongoCheckpointRepository } from "../infrastructure/mongo/MongoCheckpointRepository";
import { MongoConnection } from "../infrastructure/mongo/MongoClientFactory";
import { MongoItemCatalog, MongoRecordRepository } from "../infrastructure/mongo/MongoRecordRepository";
import { createReportParsers } from "../infrastructure/parsers/parserRegistry";
import { isTransientReportingError, ReportingHttpClient } from "../infrastructure/reporting/ReportingHttpClient";
import { createAlertNotifier } from "../shared/alerting/alertNotifier";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";
import { toErrorMessage } from "../shared/logging/logger";
import { RateLimiter } from "../shared/rate-limit/rateLimiter";

export const runSyncJob = async (request: SyncRequest): Promise<SyncRunSummary> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv();

  const client = new ReportingHttpClient(env.REPORTS_API_BASE_URL, env.REPORTS_API_TOKEN, runtime.timeoutMs, {
    retries: runtime.httpRetries
  });
  const limiter = new RateLimiter(runtime.quotaClasses, runtime.throttle, {
    isTransient: isTransientReportingError,
    transientRetries: runtime.httpRetries
  });
  const reports = new ReportLifecycleDriver({
    client,
    gate: limiter,
    quotaClasses: reportQuotaClasses,
    config: runtime.reportLifecycle
  });

  const connection = new MongoConnection(env.MONGO_URI, env.MONGO_DB_NAME);
  const checkpoints = new CheckpointStore(new MongoCheckpointRepository(connection), {
    fatalErrorThreshold: runtime.syncConfig.fatalErrorThreshold,
    leaseMs: runtime.syncConfig.timeBudgetMs
  });
  const writer = new RecordWriter(new MongoRecordRepository(connection));
  const catalog = new MongoItemCatalog(connection);
  const alerts = createAlertNotifier(env.SLACK_WEBHOOK_URL);
  const alertScope = { sourceType: request.sourceType, mode: request.mode };

  try {
    const summary = await runSync(
      { reports, checkpoints, writer, parsers: createReportParsers(), catalog, config: runtime.syncConfig },
      request
    );
    if (summary.needsAttention.length > 0) {
      await alerts.notify({ kind: "needs_attention", ...alertScope, workUnits: summary.needsAttention });
    }
    return summary;
  } catch (err) {
    await alerts.notify({ kind: "sync_failed", ...alertScope, error: toErrorMessage(err) });
    throw err;
  } finally {
    await connection.close();
  }
};
