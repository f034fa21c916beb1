import { promisify } from "util";
import { gunzip } from "zlib";
import type { RawRecord } from "../../core/records/record.types";
import { canTransition, isTerminalState, mapUpstreamStatus, type ReportState } from "../../core/reports/reportLifecycle";
import { FatalReportError, ParseError, ReportTimeoutError, type SyncErrorContext } from "../../core/sync/sync.errors";
import type { ReportApiClient, ReportRequest, ResultLocation } from "../../ports/ReportApiClient";
import { ResultLocationExpiredError } from "../../ports/ReportApiClient";
import type { ReportParser } from "../../ports/ReportParser";
import { logEvent, toErrorMessage } from "../../shared/logging/logger";
import type { QuotaGate } from "../../shared/rate-limit/rateLimiter";
import { sleep as defaultSleep } from "../../shared/retry/retry";

const gunzipAsync = promisify(gunzip);

export type ReportLifecycleConfig = {
  pollIntervalMs: number;
  maxPollWaitMs: number;
  /** Resolve a new pre-signed URL when the current one expires within this margin. */
  locationExpiryMarginMs: number;
  maxLocationRefreshes: number;
};

export const defaultReportLifecycleConfig: ReportLifecycleConfig = {
  pollIntervalMs: 10_000,
  maxPollWaitMs: 300_000,
  locationExpiryMarginMs: 30_000,
  maxLocationRefreshes: 2
};

export type ReportQuotaClasses = {
  create: string;
  get: string;
};

export type ReportExecution = {
  request: ReportRequest;
  parser: ReportParser;
  context?: Pick<SyncErrorContext, "workUnit" | "batchId">;
};

export type ParsedPayload = {
  reportId: string;
  records: RawRecord[];
  polls: number;
  byteLength: number;
};

export interface ReportExecutor {
  execute(execution: ReportExecution): Promise<ParsedPayload>;
}

const GZIP_MAGIC = [0x1f, 0x8b];

const looksGzipped = (bytes: Uint8Array): boolean => bytes.length >= 2 && bytes[0] === GZIP_MAGIC[0] && bytes[1] === GZIP_MAGIC[1];

/**
 * Drives one asynchronous report from creation to parsed rows:
 * REQUESTED -> QUEUED -> PROCESSING -> DONE | FATAL | CANCELLED.
 * Every API call goes through the quota gate; waiting between polls only suspends
 * the calling worker.
 */
export class ReportLifecycleDriver implements ReportExecutor {
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly deps: {
      client: ReportApiClient;
      gate: QuotaGate;
      quotaClasses: ReportQuotaClasses;
      config: ReportLifecycleConfig;
      now?: () => number;
      sleep?: (ms: number) => Promise<void>;
    }
  ) {
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  async execute(execution: ReportExecution): Promise<ParsedPayload> {
    const { client, gate, quotaClasses } = this.deps;
    const baseContext: SyncErrorContext = { ...execution.context };

    const reportId = await gate.run(quotaClasses.create, () => client.createReport(execution.request));
    const context: SyncErrorContext = { ...baseContext, reportId };
    logEvent("info", "report.created", { ...context, reportType: execution.request.reportType });

    const { resultRef, polls } = await this.pollUntilDone(reportId, context);
    const bytes = await this.download(resultRef, context);

    const records = this.parse(bytes, execution.parser, context);
    logEvent("info", "report.parsed", { ...context, polls, records: records.length });
    return { reportId, records, polls, byteLength: bytes.length };
  }

  private async pollUntilDone(reportId: string, context: SyncErrorContext): Promise<{ resultRef: string; polls: number }> {
    const { client, gate, quotaClasses, config } = this.deps;
    const startedAt = this.now();
    let state: ReportState = "REQUESTED";
    let polls = 0;

    while (true) {
      const snapshot = await gate.run(quotaClasses.get, () => client.getReportStatus(reportId));
      polls += 1;

      const next = mapUpstreamStatus(snapshot.status);
      if (!next || !canTransition(state, next)) {
        throw new FatalReportError({
          message: `Report ${reportId} reported unexpected status ${snapshot.status} after ${state}`,
          context: { ...context, status: snapshot.status },
          terminalStatus: "FATAL"
        });
      }
      state = next;

      if (isTerminalState(state)) {
        if (state === "DONE") {
          if (!snapshot.resultRef) {
            throw new FatalReportError({
              message: `Report ${reportId} is DONE without a result document`,
              context: { ...context, status: state },
              terminalStatus: "FATAL"
            });
          }
          return { resultRef: snapshot.resultRef, polls };
        }
        throw new FatalReportError({
          message: `Report ${reportId} failed with status ${state}`,
          context: { ...context, status: state },
          terminalStatus: state
        });
      }

      const elapsedMs = this.now() - startedAt;
      if (elapsedMs >= config.maxPollWaitMs) {
        throw new ReportTimeoutError({
          message: `Report ${reportId} did not complete within ${config.maxPollWaitMs}ms (last status ${state})`,
          context: { ...context, status: state, elapsedMs, attempts: polls }
        });
      }
      await this.sleep(config.pollIntervalMs);
    }
  }

  private isExpiring(location: ResultLocation): boolean {
    if (!location.expiresAt) return false;
    return location.expiresAt.getTime() - this.now() <= this.deps.config.locationExpiryMarginMs;
  }

  private async download(resultRef: string, context: SyncErrorContext): Promise<Uint8Array> {
    const { client, gate, quotaClasses, config } = this.deps;
    const resolve = () => gate.run(quotaClasses.get, () => client.getResultLocation(resultRef));

    let location = await resolve();
    let refreshes = 0;
    while (true) {
      if (!this.isExpiring(location)) {
        try {
          const raw = await client.downloadResult(location);
          return await this.decompress(raw, location, context);
        } catch (err) {
          if (!(err instanceof ResultLocationExpiredError)) throw err;
        }
      }

      if (refreshes >= config.maxLocationRefreshes) {
        throw new ReportTimeoutError({
          message: `Result location for ${resultRef} kept expiring before download`,
          context: { ...context, attempts: refreshes + 1 }
        });
      }
      refreshes += 1;
      logEvent("warn", "report.location_refreshed", { ...context, refreshes });
      location = await resolve();
    }
  }

  private async decompress(raw: Uint8Array, location: ResultLocation, context: SyncErrorContext): Promise<Uint8Array> {
    if (location.compression !== "GZIP" && !looksGzipped(raw)) return raw;
    try {
      return await gunzipAsync(raw);
    } catch (err) {
      throw new ParseError({
        message: `Report document could not be decompressed: ${toErrorMessage(err)}`,
        context,
        cause: err
      });
    }
  }

  private parse(bytes: Uint8Array, parser: ReportParser, context: SyncErrorContext): RawRecord[] {
    try {
      return parser.parse(bytes);
    } catch (err) {
      if (err instanceof ParseError) throw err;
      throw new ParseError({
        message: `Report document could not be parsed: ${toErrorMessage(err)}`,
        context,
        cause: err
      });
    }
  }
}
