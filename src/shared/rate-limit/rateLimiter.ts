import { RateLimitExceededError } from "../../core/sync/sync.errors";
import { logEvent } from "../logging/logger";
import { retry, sleep as defaultSleep } from "../retry/retry";

export type QuotaClassConfig = {
  ratePerSecond: number;
  burst: number;
  maxInFlight: number;
};

export type ThrottleBackoff = {
  maxRetries: number;
  minDelayMs: number;
  maxDelayMs: number;
  jitterRatio?: number;
};

/** Raised by API clients when the upstream answers with a throttling signal (HTTP 429). */
export class ThrottledError extends Error {
  readonly retryAfterMs?: number;
  readonly advertisedRatePerSecond?: number;

  constructor(message: string, opts: { retryAfterMs?: number; advertisedRatePerSecond?: number } = {}) {
    super(message);
    this.name = "ThrottledError";
    this.retryAfterMs = opts.retryAfterMs;
    this.advertisedRatePerSecond = opts.advertisedRatePerSecond;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type Permit = {
  readonly quotaClass: string;
  readonly grantedAt: number;
  release(): void;
};

/** What callers depend on; tests substitute their own implementation. */
export interface QuotaGate {
  run<T>(quotaClass: string, fn: () => Promise<T>): Promise<T>;
}

type Bucket = {
  config: QuotaClassConfig;
  tokens: number;
  lastRefill: number;
  pausedUntil: number;
  inFlight: number;
  tail: Promise<void>;
  onRelease?: () => void;
};

export type RateLimiterOptions = {
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  randomFn?: () => number;
  /** Failures worth sending again (5xx, dropped GETs); each new attempt waits for its own permit. */
  isTransient?: (err: unknown) => boolean;
  transientRetries?: number;
};

/**
 * Process-wide throttle for shared upstream quotas: a token bucket plus an in-flight cap
 * per quota class. Permits are handed out strictly in request order within a class and
 * are held only for the duration of one call.
 */
export class RateLimiter implements QuotaGate {
  private readonly buckets = new Map<string, Bucket>();
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly randomFn: () => number;
  private readonly isTransient: (err: unknown) => boolean;
  private readonly transientRetries: number;

  constructor(
    classes: Record<string, QuotaClassConfig>,
    private readonly backoff: ThrottleBackoff,
    opts: RateLimiterOptions = {}
  ) {
    this.now = opts.now ?? Date.now;
    this.sleep = opts.sleep ?? defaultSleep;
    this.randomFn = opts.randomFn ?? Math.random;
    this.isTransient = opts.isTransient ?? (() => false);
    this.transientRetries = opts.transientRetries ?? 0;

    for (const [name, config] of Object.entries(classes)) {
      if (!(config.ratePerSecond > 0) || !(config.burst >= 1) || !Number.isInteger(config.maxInFlight) || config.maxInFlight < 1) {
        throw new Error(`Invalid quota class config for ${name}`);
      }
      this.buckets.set(name, {
        config: { ...config },
        tokens: config.burst,
        lastRefill: this.now(),
        pausedUntil: 0,
        inFlight: 0,
        tail: Promise.resolve()
      });
    }
  }

  private bucket(quotaClass: string): Bucket {
    const bucket = this.buckets.get(quotaClass);
    if (!bucket) throw new Error(`Unknown quota class: ${quotaClass}`);
    return bucket;
  }

  private refill(bucket: Bucket): void {
    const now = this.now();
    const elapsedSeconds = Math.max(0, now - bucket.lastRefill) / 1000;
    bucket.tokens = Math.min(bucket.config.burst, bucket.tokens + elapsedSeconds * bucket.config.ratePerSecond);
    bucket.lastRefill = now;
  }

  private async waitForSlot(bucket: Bucket): Promise<void> {
    while (true) {
      if (bucket.inFlight >= bucket.config.maxInFlight) {
        await new Promise<void>((resolve) => {
          bucket.onRelease = resolve;
        });
        continue;
      }

      const pausedFor = bucket.pausedUntil - this.now();
      if (pausedFor > 0) {
        await this.sleep(pausedFor);
        continue;
      }

      this.refill(bucket);
      if (bucket.tokens >= 1) {
        bucket.tokens -= 1;
        bucket.inFlight += 1;
        return;
      }
      await this.sleep(Math.ceil(((1 - bucket.tokens) / bucket.config.ratePerSecond) * 1000));
    }
  }

  async acquire(quotaClass: string): Promise<Permit> {
    const bucket = this.bucket(quotaClass);
    const turn = bucket.tail.then(() => this.waitForSlot(bucket));
    bucket.tail = turn.catch(() => undefined);
    await turn;

    let released = false;
    return {
      quotaClass,
      grantedAt: this.now(),
      release: () => {
        if (released) return;
        released = true;
        bucket.inFlight -= 1;
        const wake = bucket.onRelease;
        bucket.onRelease = undefined;
        wake?.();
      }
    };
  }

  /** Pauses the whole class; returns the pause applied in milliseconds. */
  onThrottled(quotaClass: string, retryAfterMs?: number): number {
    const bucket = this.bucket(quotaClass);
    const pauseMs =
      typeof retryAfterMs === "number" && Number.isFinite(retryAfterMs) && retryAfterMs >= 0
        ? Math.min(retryAfterMs, this.backoff.maxDelayMs)
        : this.backoff.minDelayMs;
    bucket.pausedUntil = Math.max(bucket.pausedUntil, this.now() + pauseMs);
    bucket.tokens = 0;
    bucket.lastRefill = this.now();
    return pauseMs;
  }

  /** Applies a rate the upstream advertised for this class. */
  updateRate(quotaClass: string, ratePerSecond: number): void {
    if (!(ratePerSecond > 0) || !Number.isFinite(ratePerSecond)) return;
    const bucket = this.bucket(quotaClass);
    this.refill(bucket);
    bucket.config = { ...bucket.config, ratePerSecond };
  }

  /**
   * acquire -> call -> release. Throttled calls are retried with exponential backoff and
   * jitter until the throttle budget runs out (RateLimitExceededError); transient failures
   * get their own, separate budget. Every attempt of either kind goes through acquire again.
   */
  async run<T>(quotaClass: string, fn: () => Promise<T>): Promise<T> {
    return retry(() => this.runThrottled(quotaClass, fn), {
      retries: this.transientRetries,
      minDelayMs: this.backoff.minDelayMs,
      maxDelayMs: this.backoff.maxDelayMs,
      jitterRatio: this.backoff.jitterRatio,
      randomFn: this.randomFn,
      sleepFn: this.sleep,
      shouldRetry: (err) => this.isTransient(err),
      onRetry: ({ attempt, maxAttempts, delayMs }) => {
        logEvent("warn", "rate_limit.transient_retry", { quotaClass, attempt, maxAttempts, delayMs });
      }
    });
  }

  private async runThrottled<T>(quotaClass: string, fn: () => Promise<T>): Promise<T> {
    const attempt = async () => {
      const permit = await this.acquire(quotaClass);
      try {
        return await fn();
      } finally {
        permit.release();
      }
    };

    try {
      return await retry(attempt, {
        retries: this.backoff.maxRetries,
        minDelayMs: this.backoff.minDelayMs,
        maxDelayMs: this.backoff.maxDelayMs,
        jitterRatio: this.backoff.jitterRatio,
        randomFn: this.randomFn,
        sleepFn: this.sleep,
        shouldRetry: (err) =>
          err instanceof ThrottledError ? { retry: true, delayMs: err.retryAfterMs } : false,
        onRetry: ({ attempt: retryAttempt, maxAttempts, delayMs, error }) => {
          if (error instanceof ThrottledError && error.advertisedRatePerSecond != null) {
            this.updateRate(quotaClass, error.advertisedRatePerSecond);
          }
          this.onThrottled(quotaClass, delayMs);
          logEvent("warn", "rate_limit.throttled", { quotaClass, attempt: retryAttempt, maxAttempts, delayMs });
        }
      });
    } catch (err) {
      if (err instanceof ThrottledError) {
        logEvent("warn", "rate_limit.exhausted", { quotaClass, attempts: this.backoff.maxRetries + 1 });
        throw new RateLimitExceededError({
          message: `Rate limit retries exhausted for ${quotaClass} after ${this.backoff.maxRetries + 1} attempts`,
          context: { quotaClass, attempts: this.backoff.maxRetries + 1 },
          cause: err
        });
      }
      throw err;
    }
  }
}
