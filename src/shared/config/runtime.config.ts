import {
  defaultReportLifecycleConfig,
  type ReportLifecycleConfig
} from "../../application/report-lifecycle/reportLifecycle.driver";
import { defaultSyncConfig, syncCaps, type SyncConfig, validateSyncConfig } from "../../application/sync/sync.config";
import { reportQuotaClasses } from "../../core/sources/sourceCatalog";
import type { QuotaClassConfig, ThrottleBackoff } from "../rate-limit/rateLimiter";

export const runtimeCaps = {
  timeoutMs: { min: 1000, max: 30000 },
  httpRetries: { min: 0, max: 10 },
  pollIntervalMs: { min: 100, max: 60_000 },
  maxPollWaitMs: { min: 1000, max: 60 * 60_000 },
  ratePerSecond: { min: 0.001, max: 100 },
  burst: { min: 1, max: 100 },
  maxInFlight: { min: 1, max: 32 },
  throttleRetries: { min: 0, max: 20 }
} as const;

export type RuntimeConfig = {
  syncConfig: SyncConfig;
  timeoutMs: number;
  httpRetries: number;
  reportLifecycle: ReportLifecycleConfig;
  quotaClasses: Record<string, QuotaClassConfig>;
  throttle: ThrottleBackoff;
};

type Range = { min: number; max: number };

const readNumber = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: Range,
  integer: boolean
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if ((integer ? !Number.isInteger(value) : !Number.isFinite(value)) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const parseOptionalIntInRange = (env: NodeJS.ProcessEnv, name: string, range: Range): number | undefined =>
  readNumber(env, name, range, true);

const parseOptionalNumberInRange = (env: NodeJS.ProcessEnv, name: string, range: Range): number | undefined =>
  readNumber(env, name, range, false);

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const syncConfig = validateSyncConfig({
    concurrency: parseOptionalIntInRange(env, "SYNC_CONCURRENCY", syncCaps.concurrency) ?? defaultSyncConfig.concurrency,
    batchConcurrency:
      parseOptionalIntInRange(env, "SYNC_BATCH_CONCURRENCY", syncCaps.batchConcurrency) ?? defaultSyncConfig.batchConcurrency,
    timeBudgetMs: parseOptionalIntInRange(env, "SYNC_TIME_BUDGET_MS", syncCaps.timeBudgetMs) ?? defaultSyncConfig.timeBudgetMs,
    safetyMarginMs:
      parseOptionalIntInRange(env, "SYNC_SAFETY_MARGIN_MS", syncCaps.safetyMarginMs) ?? defaultSyncConfig.safetyMarginMs,
    lookbackPeriods:
      parseOptionalIntInRange(env, "SYNC_LOOKBACK_PERIODS", syncCaps.lookbackPeriods) ?? defaultSyncConfig.lookbackPeriods,
    maxWorkUnits: parseOptionalIntInRange(env, "SYNC_MAX_WORK_UNITS", syncCaps.maxWorkUnits) ?? defaultSyncConfig.maxWorkUnits,
    fatalErrorThreshold:
      parseOptionalIntInRange(env, "SYNC_FATAL_ERROR_THRESHOLD", syncCaps.fatalErrorThreshold) ??
      defaultSyncConfig.fatalErrorThreshold
  });

  const timeoutMs = parseOptionalIntInRange(env, "REPORTS_TIMEOUT_MS", runtimeCaps.timeoutMs) ?? 8000;
  const httpRetries = parseOptionalIntInRange(env, "REPORTS_HTTP_RETRIES", runtimeCaps.httpRetries) ?? 3;

  const reportLifecycle: ReportLifecycleConfig = {
    ...defaultReportLifecycleConfig,
    pollIntervalMs:
      parseOptionalIntInRange(env, "REPORT_POLL_INTERVAL_MS", runtimeCaps.pollIntervalMs) ??
      defaultReportLifecycleConfig.pollIntervalMs,
    maxPollWaitMs:
      parseOptionalIntInRange(env, "REPORT_MAX_POLL_WAIT_MS", runtimeCaps.maxPollWaitMs) ??
      defaultReportLifecycleConfig.maxPollWaitMs
  };

  const quotaClasses: Record<string, QuotaClassConfig> = {
    [reportQuotaClasses.create]: {
      ratePerSecond: parseOptionalNumberInRange(env, "REPORTS_CREATE_RATE_PER_SEC", runtimeCaps.ratePerSecond) ?? 0.0167,
      burst: parseOptionalIntInRange(env, "REPORTS_CREATE_BURST", runtimeCaps.burst) ?? 1,
      maxInFlight: parseOptionalIntInRange(env, "REPORTS_CREATE_MAX_IN_FLIGHT", runtimeCaps.maxInFlight) ?? 2
    },
    [reportQuotaClasses.get]: {
      ratePerSecond: parseOptionalNumberInRange(env, "REPORTS_GET_RATE_PER_SEC", runtimeCaps.ratePerSecond) ?? 2,
      burst: parseOptionalIntInRange(env, "REPORTS_GET_BURST", runtimeCaps.burst) ?? 1,
      maxInFlight: parseOptionalIntInRange(env, "REPORTS_GET_MAX_IN_FLIGHT", runtimeCaps.maxInFlight) ?? 4
    }
  };

  const throttle: ThrottleBackoff = {
    maxRetries: parseOptionalIntInRange(env, "THROTTLE_MAX_RETRIES", runtimeCaps.throttleRetries) ?? 5,
    minDelayMs: 1000,
    maxDelayMs: 60_000,
    jitterRatio: 0.1
  };

  return { syncConfig, timeoutMs, httpRetries, reportLifecycle, quotaClasses, throttle };
};
