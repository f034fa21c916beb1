import { RateLimiter, ThrottledError } from "../../src/shared/rate-limit/rateLimiter";
import { computeBackoffDelay } from "../../src/shared/retry/retry";
import { loggedEvents, manualClock } from "../support/fakes";

// Same shape as the default throttle backoff the sync runs with.
const throttle = { minDelayMs: 1000, maxDelayMs: 60_000, jitterRatio: 0.1 };

describe("computeBackoffDelay", () => {
  it("doubles from the minimum delay and stops at the cap", () => {
    const delays = [0, 1, 2, 3, 4, 6].map((attempt) => computeBackoffDelay(attempt, { ...throttle, randomFn: () => 0 }));

    expect(delays).toEqual([1000, 2000, 4000, 8000, 16_000, 60_000]);
  });

  it("adds jitter proportional to the delay and clamps its inputs", () => {
    expect(computeBackoffDelay(2, { ...throttle, randomFn: () => 0.5 })).toBe(4200);
    expect(computeBackoffDelay(2, { ...throttle, randomFn: () => 5 })).toBe(4400);
    expect(computeBackoffDelay(2, { ...throttle, jitterRatio: 3, randomFn: () => 0.5 })).toBe(6000);
  });

  it("uses a server-provided delay in place of the exponential part, still capped", () => {
    const opts = { ...throttle, randomFn: () => 0.5 };

    expect(computeBackoffDelay(4, opts, 2500)).toBe(2625);
    expect(computeBackoffDelay(0, opts, 90_000)).toBe(63_000);
    expect(computeBackoffDelay(1, opts, -1)).toBe(2100);
    expect(computeBackoffDelay(1, opts, Number.NaN)).toBe(2100);
  });
});

describe("throttle backoff inside the rate limiter", () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  const limiterWith = (clock: ReturnType<typeof manualClock>) =>
    new RateLimiter(
      { reports_create: { ratePerSecond: 1, burst: 1, maxInFlight: 1 } },
      { maxRetries: 3, ...throttle },
      { ...clock, randomFn: () => 0.5 }
    );

  it("sleeps the jittered exponential delay between throttled attempts", async () => {
    const clock = manualClock();
    let calls = 0;

    const result = await limiterWith(clock).run("reports_create", async () => {
      calls += 1;
      if (calls < 3) throw new ThrottledError("429");
      return "created";
    });

    expect(result).toBe("created");
    expect(clock.sleeps).toEqual([1050, 2100]);
    expect(loggedEvents(warnSpy).map((event) => event.delayMs)).toEqual([1050, 2100]);
  });

  it("caps an oversized retry-after and pauses the class no longer than the cap", async () => {
    const clock = manualClock();
    let calls = 0;

    await limiterWith(clock).run("reports_create", async () => {
      calls += 1;
      if (calls === 1) throw new ThrottledError("429", { retryAfterMs: 90_000 });
    });

    expect(calls).toBe(2);
    expect(clock.sleeps).toEqual([63_000]);
    expect(clock.now()).toBe(63_000);
  });
});
