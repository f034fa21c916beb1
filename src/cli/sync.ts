import { Command, CommanderError } from "commander";
import type { SyncRunSummary } from "../application/sync/sync.error-handler";
import type { ScopeFilter, SyncRequest } from "../application/sync/workUnitPlanner";
import { runSyncJob } from "../composition/root";
import type { Granularity } from "../core/sync/periods";
import { isSourceType, isSyncMode, sourceTypes, syncModes } from "../core/sync/workUnit";
import { SyncFatalError } from "../core/sync/sync.errors";
import { logEvent } from "../shared/logging/logger";

type ErrorContext = Partial<{
  workUnit: string;
  batchId: string;
  reportId: string;
  quotaClass: string;
  status: string;
  attempts: number;
  elapsedMs: number;
}>;

type CliErrorEnvelope = {
  event: "sync.failed";
  name: string;
  message: string;
  code?: string;
  context?: ErrorContext;
  status?: number;
  stack?: string;
};

const stringContextKeys = ["workUnit", "batchId", "reportId", "quotaClass", "status"] as const;
const numberContextKeys = ["attempts", "elapsedMs"] as const;

const granularities: readonly Granularity[] = ["DAY", "WEEK", "MONTH"];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const extractContext = (value: unknown): ErrorContext | undefined => {
  if (!isRecord(value)) return undefined;

  const sanitizedContext: ErrorContext = {};
  for (const key of stringContextKeys) {
    const raw = value[key];
    if (typeof raw === "string" && raw.length <= 200) sanitizedContext[key] = raw;
  }
  for (const key of numberContextKeys) {
    const raw = value[key];
    if (typeof raw === "number" && Number.isFinite(raw)) sanitizedContext[key] = raw;
  }

  return Object.keys(sanitizedContext).length > 0 ? sanitizedContext : undefined;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event: "sync.failed",
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }

  const context = extractContext(errorRecord.context);
  if (context) {
    envelope.context = context;
  }

  if (typeof errorRecord.status === "number" && Number.isFinite(errorRecord.status)) {
    envelope.status = errorRecord.status;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

const invalidArgument = (message: string) => new SyncFatalError({ message });

export const parseSyncArgs = (argv: string[]): SyncRequest => {
  const program = new Command()
    .name("report-sync")
    .description("Pull marketplace reports into the store, resuming from checkpoints")
    .exitOverride()
    .configureOutput({ writeErr: () => undefined })
    .requiredOption("-s, --source <type>", `source type (${sourceTypes.join(" | ")})`)
    .option("-m, --mode <mode>", `sync mode (${syncModes.join(" | ")})`, "incremental")
    .option("--marketplaces <codes>", "comma-separated marketplace codes, e.g. USA,CA")
    .option("--from <date>", "first day to cover (YYYY-MM-DD)")
    .option("--to <date>", "last day to cover (YYYY-MM-DD)")
    .option("--granularity <granularity>", `period granularity (${granularities.join(" | ")})`);

  program.parse(argv, { from: "user" });
  const opts = program.opts<{
    source: string;
    mode: string;
    marketplaces?: string;
    from?: string;
    to?: string;
    granularity?: string;
  }>();

  if (!isSourceType(opts.source)) throw invalidArgument(`Unknown source: ${opts.source}`);
  if (!isSyncMode(opts.mode)) throw invalidArgument(`Unknown mode: ${opts.mode}`);

  const scopeFilter: ScopeFilter = {};
  if (opts.marketplaces) {
    scopeFilter.marketplaces = opts.marketplaces.split(",").map((code) => code.trim()).filter((code) => code !== "");
  }
  if (opts.from) scopeFilter.from = opts.from;
  if (opts.to) scopeFilter.to = opts.to;
  if (opts.granularity) {
    const granularity = granularities.find((value) => value === opts.granularity?.toUpperCase());
    if (!granularity) throw invalidArgument(`Unknown granularity: ${opts.granularity}`);
    scopeFilter.granularity = granularity;
  }
  return { sourceType: opts.source, mode: opts.mode, scopeFilter };
};

/** Exit codes: 0 success, 1 invocation failed, 2 finished but some work units need an operator. */
export const executeSyncCli = async (argv: string[] = process.argv.slice(2)): Promise<void> => {
  let summary: SyncRunSummary;
  try {
    summary = await runSyncJob(parseSyncArgs(argv));
  } catch (err) {
    if (err instanceof CommanderError && err.exitCode === 0) return;
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  }

  if (summary.needsAttention.length > 0) {
    logEvent("warn", "sync.needs_attention", { workUnits: summary.needsAttention });
    process.exit(2);
  }
};

if (require.main === module) {
  void executeSyncCli();
}
