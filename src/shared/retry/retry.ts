export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type BackoffOptions = {
  minDelayMs: number;       // base delay for backoff
  maxDelayMs: number;       // max delay cap
  randomFn?: () => number;
  jitterRatio?: number;
};

export type RetryOptions = BackoffOptions & {
  retries: number;          // max attempts after initial try (e.g. 5 means up to 6 total tries)
  shouldRetry: (err: unknown) => RetryDecision;
  onRetry?: (ctx: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; error: unknown }) => void;
  sleepFn?: (ms: number) => Promise<void>;
};

export const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/**
 * Exponential backoff for the given zero-based attempt, with jitter added on top.
 * A server-provided delay replaces the exponential part but is still capped.
 */
export const computeBackoffDelay = (attempt: number, opts: BackoffOptions, customDelayMs?: number): number => {
  const { minDelayMs, maxDelayMs, randomFn = Math.random, jitterRatio = 0.2 } = opts;

  const validCustomDelay =
    typeof customDelayMs === "number" && Number.isFinite(customDelayMs) && customDelayMs >= 0
      ? customDelayMs
      : undefined;
  const backoff = validCustomDelay != null
    ? Math.min(maxDelayMs, validCustomDelay)
    : Math.min(maxDelayMs, minDelayMs * Math.pow(2, attempt));

  const normalizedJitterRatio = Math.min(1, Math.max(0, jitterRatio));
  const normalizedRandom = Math.min(1, Math.max(0, randomFn()));
  const jitter = Math.floor(backoff * normalizedJitterRatio * normalizedRandom);
  return backoff + jitter;
};

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const { retries, shouldRetry, onRetry, onGiveUp, sleepFn = sleep } = opts;

  let attempt = 0;
  const maxAttempts = retries + 1;
  while (true) {
    try {
      return await fn();
    } catch (err) {
      const decision = shouldRetry(err);
      const normalized =
        typeof decision === "boolean"
          ? { retry: decision, delayMs: undefined }
          : decision;
      if (attempt >= retries || !normalized.retry) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err });
        throw err;
      }

      const waitMs = computeBackoffDelay(attempt, opts, normalized.delayMs);
      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs: waitMs, error: err });
      await sleepFn(waitMs);
      attempt += 1;
    }
  }
};
