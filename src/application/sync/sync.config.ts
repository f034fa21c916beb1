export type SyncConfig = {
  concurrency: number;          // work units in flight
  batchConcurrency: number;     // batches in flight per work unit
  timeBudgetMs: number;
  safetyMarginMs: number;
  lookbackPeriods: number;
  maxWorkUnits: number;
  fatalErrorThreshold: number;
};

export type SyncConfigInput = Partial<SyncConfig>;

export const defaultSyncConfig: SyncConfig = {
  concurrency: 2,
  batchConcurrency: 2,
  timeBudgetMs: 15 * 60_000,
  safetyMarginMs: 60_000,
  lookbackPeriods: 3,
  maxWorkUnits: 200,
  fatalErrorThreshold: 3
};

export const syncCaps = {
  concurrency: { min: 1, max: 16 },
  batchConcurrency: { min: 1, max: 8 },
  timeBudgetMs: { min: 1000, max: 6 * 60 * 60_000 },
  safetyMarginMs: { min: 0, max: 30 * 60_000 },
  lookbackPeriods: { min: 1, max: 90 },
  maxWorkUnits: { min: 1, max: 10000 },
  fatalErrorThreshold: { min: 1, max: 100 }
} as const;

const syncConfigKeys: ReadonlyArray<keyof SyncConfig> = [
  "concurrency",
  "batchConcurrency",
  "timeBudgetMs",
  "safetyMarginMs",
  "lookbackPeriods",
  "maxWorkUnits",
  "fatalErrorThreshold"
];

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validateSyncConfig = (config: SyncConfig): SyncConfig => {
  for (const name of syncConfigKeys) {
    assertIntegerInRange(name, config[name], syncCaps[name].min, syncCaps[name].max);
  }
  if (config.safetyMarginMs >= config.timeBudgetMs) {
    throw new Error(`safetyMarginMs=${config.safetyMarginMs} must be lower than timeBudgetMs=${config.timeBudgetMs}`);
  }
  return config;
};

export const resolveSyncConfig = (input: SyncConfigInput = {}): SyncConfig =>
  validateSyncConfig({ ...defaultSyncConfig, ...input });
