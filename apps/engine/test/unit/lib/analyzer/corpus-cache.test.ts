import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { CorpusCache } from "@/lib/analyzer/corpus-cache";
import { AggregationTimeout } from "@/lib/errors";
import { deferred } from "@test/helpers/test-helpers";

const TTL_MS = 1_000;

describe("CorpusCache", () => {
  let now: number;
  let cache: CorpusCache<string>;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    now = 10_000;
    cache = new CorpusCache<string>({ ttlMs: TTL_MS, timeoutMs: 1_000, now: () => now });
    cache.init();
  });

  afterEach(async () => {
    await cache.dispose();
    vi.restoreAllMocks();
  });

  it("refuses reads before init", async () => {
    const uninitialized = new CorpusCache<string>({ ttlMs: TTL_MS, timeoutMs: 1_000 });
    expect(uninitialized.isReady).toBe(false);
    await expect(uninitialized.get("k", async () => "v")).rejects.toThrow(
      "CorpusCache.init() must be called before use",
    );
  });

  it("computes on a miss and serves hits while fresh", async () => {
    const compute = vi.fn(async () => "report-1");

    expect(await cache.get("corpus", compute)).toEqual({ value: "report-1", stale: false });
    now += TTL_MS - 1;
    expect(await cache.get("corpus", compute)).toEqual({ value: "report-1", stale: false });

    expect(compute).toHaveBeenCalledTimes(1);
    expect(cache.stats).toMatchObject({ hits: 1, misses: 1, recomputes: 1 });
  });

  it("recomputes once the entry expires", async () => {
    const compute = vi.fn().mockResolvedValueOnce("old").mockResolvedValueOnce("new");

    await cache.get("corpus", compute);
    now += TTL_MS;
    expect(await cache.get("corpus", compute)).toEqual({ value: "new", stale: false });
    expect(compute).toHaveBeenCalledTimes(2);
  });

  it("shares one recompute between concurrent callers without a cached value", async () => {
    const gate = deferred<string>();
    const compute = vi.fn(() => gate.promise);

    const first = cache.get("corpus", compute);
    const second = cache.get("corpus", compute);
    gate.resolve("shared");

    expect(await first).toEqual({ value: "shared", stale: false });
    expect(await second).toEqual({ value: "shared", stale: false });
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it("serves the stale value to callers while a recompute is in flight", async () => {
    await cache.get("corpus", async () => "old");
    now += TTL_MS;

    const gate = deferred<string>();
    const refreshing = cache.get("corpus", () => gate.promise);
    expect(await cache.get("corpus", async () => "unused")).toEqual({ value: "old", stale: true });

    gate.resolve("new");
    expect(await refreshing).toEqual({ value: "new", stale: false });
    expect(cache.peek("corpus")).toEqual({ value: "new", stale: false });
    expect(cache.stats.staleServed).toBe(1);
  });

  it("lets a recompute for an older corpus finish for its own caller", async () => {
    const gate = deferred<string>();
    let firstSignal: AbortSignal | undefined;
    const first = cache.get("corpus-a", (signal) => {
      firstSignal = signal;
      return gate.promise;
    });

    expect(await cache.get("corpus-b", async () => "b")).toEqual({ value: "b", stale: false });
    gate.resolve("a");

    expect(await first).toEqual({ value: "a", stale: false });
    expect(firstSignal?.aborted).toBe(false);
    expect(cache.peek("corpus-a")).toBeNull();
    expect(cache.peek("corpus-b")).toEqual({ value: "b", stale: false });
  });

  it("does not store an older corpus that finishes after a newer one started", async () => {
    const gateA = deferred<string>();
    const gateB = deferred<string>();
    const first = cache.get("corpus-a", () => gateA.promise);
    const second = cache.get("corpus-b", () => gateB.promise);

    gateA.resolve("a");
    expect(await first).toEqual({ value: "a", stale: false });
    expect(cache.peek("corpus-a")).toBeNull();

    gateB.resolve("b");
    expect(await second).toEqual({ value: "b", stale: false });
    expect(cache.peek("corpus-b")).toEqual({ value: "b", stale: false });
  });

  it("keeps an invalidated entry for stale peeks", async () => {
    await cache.get("corpus", async () => "value");
    cache.invalidate();
    expect(cache.peek("corpus")).toEqual({ value: "value", stale: true });

    cache.clear();
    expect(cache.peek("corpus")).toBeNull();
  });

  describe("time budget", () => {
    let fast: CorpusCache<string>;

    beforeEach(() => {
      fast = new CorpusCache<string>({ ttlMs: TTL_MS, timeoutMs: 20, now: () => now });
      fast.init();
    });

    afterEach(async () => {
      await fast.dispose();
    });

    it("serves the last good value when a recompute times out", async () => {
      await fast.get("corpus", async () => "last-good");
      fast.invalidate();

      let observed: AbortSignal | undefined;
      const result = await fast.get("corpus", (signal) => {
        observed = signal;
        return new Promise<string>(() => undefined);
      });

      expect(result).toEqual({ value: "last-good", stale: true });
      expect(observed?.aborted).toBe(true);
      expect(fast.stats.timeouts).toBe(1);
      expect(console.warn).toHaveBeenCalledWith(
        "[Corpus-Cache] Corpus recompute exceeded 20ms; serving last good value",
      );
    });

    it("raises AggregationTimeout when nothing was cached", async () => {
      await expect(fast.get("corpus", () => new Promise<string>(() => undefined))).rejects.toBeInstanceOf(
        AggregationTimeout,
      );
    });
  });

  describe("dispose", () => {
    it("aborts the in-flight recompute and refuses further use", async () => {
      const pending = cache.get("corpus", () => new Promise<string>(() => undefined));
      const aborted = expect(pending).rejects.toThrow("CorpusCache disposed");

      await cache.dispose();
      await aborted;

      expect(cache.isReady).toBe(false);
      await expect(cache.get("corpus", async () => "v")).rejects.toThrow("CorpusCache was disposed");
      expect(() => cache.init()).toThrow("CorpusCache was disposed");
    });
  });
});
