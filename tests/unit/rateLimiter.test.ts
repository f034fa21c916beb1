import { RateLimitExceededError } from "../../src/core/sync/sync.errors";
import { loadRuntimeConfigFromEnv } from "../../src/shared/config/runtime.config";
import { RateLimiter, ThrottledError } from "../../src/shared/rate-limit/rateLimiter";
import { loggedEvents, manualClock } from "../support/fakes";

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("RateLimiter", () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  const backoff = { maxRetries: 3, minDelayMs: 100, maxDelayMs: 10_000, jitterRatio: 0 };

  it("spends the burst immediately and then paces calls at the configured rate", async () => {
    const clock = manualClock();
    const limiter = new RateLimiter({ reports_create: { ratePerSecond: 1, burst: 2, maxInFlight: 5 } }, backoff, clock);

    const results = await Promise.all([1, 2, 3, 4].map((n) => limiter.run("reports_create", async () => n)));

    expect(results).toEqual([1, 2, 3, 4]);
    expect(clock.sleeps).toEqual([1000, 1000]);
    expect(clock.now()).toBe(2000);
  });

  it("keeps no more calls in flight than the class allows", async () => {
    const clock = manualClock();
    const limiter = new RateLimiter({ reports_get: { ratePerSecond: 100, burst: 10, maxInFlight: 1 } }, backoff, clock);

    let releaseFirst: () => void = () => undefined;
    let secondStarted = false;
    const first = limiter.run("reports_get", () => new Promise<string>((resolve) => {
      releaseFirst = () => resolve("first");
    }));
    const second = limiter.run("reports_get", async () => {
      secondStarted = true;
      return "second";
    });

    await flush();
    expect(secondStarted).toBe(false);

    releaseFirst();
    await expect(Promise.all([first, second])).resolves.toEqual(["first", "second"]);
    expect(secondStarted).toBe(true);
  });

  it("pauses the class for the advertised retry-after and retries throttled calls", async () => {
    const clock = manualClock();
    const limiter = new RateLimiter({ reports_get: { ratePerSecond: 1, burst: 5, maxInFlight: 2 } }, backoff, clock);

    let calls = 0;
    const result = await limiter.run("reports_get", async () => {
      calls += 1;
      if (calls === 1) throw new ThrottledError("429", { retryAfterMs: 2000 });
      return "ok";
    });

    expect(result).toBe("ok");
    expect(calls).toBe(2);
    expect(clock.sleeps).toEqual([2000]);
    expect(loggedEvents(warnSpy)).toEqual([
      { event: "rate_limit.throttled", quotaClass: "reports_get", attempt: 1, maxAttempts: 4, delayMs: 2000 }
    ]);
  });

  it("fails with RateLimitExceededError once throttle retries are exhausted", async () => {
    const clock = manualClock();
    const limiter = new RateLimiter(
      { reports_create: { ratePerSecond: 10, burst: 1, maxInFlight: 1 } },
      { maxRetries: 2, minDelayMs: 100, maxDelayMs: 1000, jitterRatio: 0 },
      clock
    );

    let calls = 0;
    const run = limiter.run("reports_create", async () => {
      calls += 1;
      throw new ThrottledError("429");
    });

    await expect(run).rejects.toBeInstanceOf(RateLimitExceededError);
    await expect(run).rejects.toThrow("Rate limit retries exhausted for reports_create after 3 attempts");
    expect(calls).toBe(3);
    expect(loggedEvents(warnSpy).map((event) => event.event)).toEqual([
      "rate_limit.throttled",
      "rate_limit.throttled",
      "rate_limit.exhausted"
    ]);
  });

  it("passes other failures through without retrying", async () => {
    const limiter = new RateLimiter({ reports_get: { ratePerSecond: 1, burst: 1, maxInFlight: 1 } }, backoff, manualClock());
    let calls = 0;

    await expect(limiter.run("reports_get", async () => {
      calls += 1;
      throw new Error("socket hang up");
    })).rejects.toThrow("socket hang up");
    expect(calls).toBe(1);
  });

  it("slows the class down to a rate advertised by the upstream", async () => {
    const clock = manualClock();
    const limiter = new RateLimiter({ reports_create: { ratePerSecond: 1, burst: 1, maxInFlight: 1 } }, backoff, clock);

    let calls = 0;
    await limiter.run("reports_create", async () => {
      calls += 1;
      if (calls === 1) throw new ThrottledError("429", { retryAfterMs: 0, advertisedRatePerSecond: 0.5 });
    });

    // bucket was emptied by the throttle; one token at 0.5/s takes two seconds
    expect(clock.sleeps).toEqual([0, 2000]);
  });

  it("rejects unknown quota classes and invalid class configuration", async () => {
    const limiter = new RateLimiter({ reports_get: { ratePerSecond: 1, burst: 1, maxInFlight: 1 } }, backoff, manualClock());

    await expect(limiter.run("reports_delete", async () => "x")).rejects.toThrow("Unknown quota class: reports_delete");
    expect(() => new RateLimiter({ broken: { ratePerSecond: 0, burst: 1, maxInFlight: 1 } }, backoff)).toThrow(
      "Invalid quota class config for broken"
    );
  });

  it("holds concurrent callers sharing the default get class to its rate in every one-second window", async () => {
    const clock = manualClock();
    const { quotaClasses, throttle } = loadRuntimeConfigFromEnv({});
    const limiter = new RateLimiter(quotaClasses, throttle, clock);
    const acquire = jest.spyOn(limiter, "acquire");

    const worker = async () => {
      for (let call = 0; call < 3; call += 1) {
        await limiter.run("reports_get", async () => "ok");
      }
    };
    await Promise.all(Array.from({ length: 6 }, worker));

    const grantedAt: number[] = await Promise.all(acquire.mock.results.map(async (result) => (await result.value).grantedAt));
    expect(grantedAt).toHaveLength(18);
    expect(grantedAt[grantedAt.length - 1]).toBe(8500);
    const busiestWindow = Math.max(...grantedAt.map((start) => grantedAt.filter((at) => at >= start && at < start + 1000).length));
    expect(busiestWindow).toBe(2);
  });

  describe("transient failures", () => {
    const transient = new Error("Reporting request failed: 503");
    const paced = { maxRetries: 3, minDelayMs: 250, maxDelayMs: 10_000, jitterRatio: 0 };

    it("retries them under a fresh permit each time", async () => {
      const clock = manualClock();
      const limiter = new RateLimiter({ reports_get: { ratePerSecond: 1, burst: 1, maxInFlight: 1 } }, paced, {
        ...clock,
        isTransient: (err) => err === transient,
        transientRetries: 2
      });
      const startedAt: number[] = [];

      const result = await limiter.run("reports_get", async () => {
        startedAt.push(clock.now());
        if (startedAt.length < 3) throw transient;
        return "ok";
      });

      expect(result).toBe("ok");
      // backoff first, then whatever the bucket still needs before the next permit
      expect(clock.sleeps).toEqual([250, 750, 500, 500]);
      expect(startedAt).toEqual([0, 1000, 2000]);
      expect(loggedEvents(warnSpy)).toEqual([
        { event: "rate_limit.transient_retry", quotaClass: "reports_get", attempt: 1, maxAttempts: 3, delayMs: 250 },
        { event: "rate_limit.transient_retry", quotaClass: "reports_get", attempt: 2, maxAttempts: 3, delayMs: 500 }
      ]);
    });

    it("gives up with the last failure once the transient budget is spent", async () => {
      const clock = manualClock();
      const limiter = new RateLimiter({ reports_get: { ratePerSecond: 10, burst: 1, maxInFlight: 1 } }, paced, {
        ...clock,
        isTransient: (err) => err === transient,
        transientRetries: 1
      });
      let calls = 0;

      await expect(limiter.run("reports_get", async () => {
        calls += 1;
        throw transient;
      })).rejects.toBe(transient);
      expect(calls).toBe(2);
    });
  });
});
