import { describe, it, expect } from "vitest";
import { Registry } from "prom-client";
import { TtlCache, cacheKey } from "../src/utils/ttlCache";
import { SlidingWindowRateLimiter } from "../src/utils/rateLimiter";
import { raceTimeout, withAbortTimeout } from "../src/utils/timeout";
import { safeSerialize } from "../src/utils/safeSerialize";
import { PrometheusMetrics, DURATION_METRIC, ERROR_METRIC } from "../src/services/MetricsCollector";

function manualClock(start = 0) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

describe("TtlCache", () => {
  it("should return values until they expire", () => {
    const clock = manualClock(1000);
    const cache = new TtlCache<string>(100, clock.now);

    cache.set("a", "one");
    clock.advance(99);
    expect(cache.get("a")).toBe("one");

    clock.advance(1);
    expect(cache.get("a")).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("should honor a per-entry ttl", () => {
    const clock = manualClock();
    const cache = new TtlCache<number>(100, clock.now);

    cache.set("long", 1, 500);
    clock.advance(200);
    expect(cache.get("long")).toBe(1);
  });

  it("should delete and clear entries", () => {
    const cache = new TtlCache<number>(1000);
    cache.set("a", 1);
    cache.set("b", 2);

    expect(cache.delete("a")).toBe(true);
    expect(cache.size).toBe(1);
    cache.clear();
    expect(cache.get("b")).toBeUndefined();
  });

  it("should build colon-separated keys", () => {
    expect(cacheKey("page", "42", true, false)).toBe("page:42:true:false");
  });
});

describe("SlidingWindowRateLimiter", () => {
  it("should allow up to the limit inside a window", () => {
    const clock = manualClock();
    const limiter = new SlidingWindowRateLimiter(2, 1000, clock.now);

    expect(limiter.tryAcquire("k")).toBe(true);
    expect(limiter.tryAcquire("k")).toBe(true);
    expect(limiter.tryAcquire("k")).toBe(false);
    expect(limiter.tryAcquire("other")).toBe(true);
  });

  it("should free capacity once hits leave the window", () => {
    const clock = manualClock();
    const limiter = new SlidingWindowRateLimiter(1, 1000, clock.now);

    expect(limiter.tryAcquire("k")).toBe(true);
    clock.advance(1000);
    expect(limiter.tryAcquire("k")).toBe(true);
  });

  it("should reset one key or all", () => {
    const limiter = new SlidingWindowRateLimiter(1, 60_000);
    limiter.tryAcquire("a");
    limiter.tryAcquire("b");

    limiter.reset("a");
    expect(limiter.tryAcquire("a")).toBe(true);
    expect(limiter.tryAcquire("b")).toBe(false);

    limiter.reset();
    expect(limiter.tryAcquire("b")).toBe(true);
    expect(limiter.windowLength).toBe(60_000);
  });
});

describe("PrometheusMetrics", () => {
  it("should observe durations per operation", async () => {
    const metrics = new PrometheusMetrics();
    metrics.recordDuration("process_page", 0.5);
    metrics.recordDuration("process_page", 1.5);
    metrics.recordDuration("confluence_request", 0.25);

    const snapshot = await metrics.snapshot();
    expect(snapshot.durations.process_page).toEqual({ count: 2, totalSeconds: 2 });
    expect(snapshot.durations.confluence_request).toEqual({ count: 1, totalSeconds: 0.25 });
  });

  it("should count errors and reset", async () => {
    const metrics = new PrometheusMetrics();
    metrics.recordError("extract_tables");
    metrics.recordError("extract_tables");

    expect((await metrics.snapshot()).errors).toEqual({ extract_tables: 2 });
    expect(await metrics.exposition()).toContain(`${ERROR_METRIC}{type="extract_tables"} 2`);
    metrics.reset();
    expect(await metrics.snapshot()).toEqual({ durations: {}, errors: {} });
  });

  it("should register on an injected registry and share it between instances", async () => {
    const registry = new Registry();
    const first = new PrometheusMetrics({ registry });
    const second = new PrometheusMetrics({ registry });
    first.recordError("rate_limited");
    second.recordError("rate_limited");

    expect(registry.getSingleMetric(DURATION_METRIC)).toBeDefined();
    expect((await first.snapshot()).errors).toEqual({ rate_limited: 2 });
  });

  it("should keep separate registries apart", async () => {
    const first = new PrometheusMetrics();
    const second = new PrometheusMetrics();
    first.recordError("extract_code");

    expect((await second.snapshot()).errors).toEqual({});
    expect(first.registry).not.toBe(second.registry);
  });
});

describe("timeouts", () => {
  it("should settle with the task when it is fast enough", async () => {
    await expect(raceTimeout(Promise.resolve(5), 1000, () => new Error("late"))).resolves.toBe(5);
  });

  it("should reject with the timeout error", async () => {
    const never = new Promise<number>(() => {});
    await expect(raceTimeout(never, 10, () => new Error("late"))).rejects.toThrow("late");
  });

  it("should abort the signal after the deadline", async () => {
    const result = withAbortTimeout(
      10,
      (signal) =>
        new Promise<string>((_, reject) => {
          signal.addEventListener("abort", () => reject(new Error("aborted")));
        })
    );
    await expect(result).rejects.toThrow("aborted");
  });
});

describe("safeSerialize", () => {
  it("should convert values to plain JSON", () => {
    const result = safeSerialize({
      a: 1,
      d: new Date("2024-01-01T00:00:00.000Z"),
      f: () => 1,
      u: undefined,
      n: Number.NaN,
      b: BigInt(10),
      nested: { x: [1, undefined] },
    });

    expect(result).toEqual({
      a: 1,
      d: "2024-01-01T00:00:00.000Z",
      n: null,
      b: "10",
      nested: { x: [1, null] },
    });
  });

  it("should replace circular references", () => {
    const obj: Record<string, unknown> = { name: "x" };
    obj.self = obj;

    expect(safeSerialize(obj)).toEqual({ name: "x", self: "[Circular]" });
  });
});
