import { describe, it, expect, vi } from "vitest";
import { CacheStore, rangeKey } from "../src/cache/cacheStore";
import { InFlightRegistry } from "../src/cache/inFlightRegistry";
import { createReportCaches } from "../src/cache/reportCaches";

function makeClock(start = 1_000_000) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

describe("CacheStore", () => {
  it("builds range keys", () => {
    expect(rangeKey({ start: "2026-01-01", end: "2026-01-31" })).toBe("2026-01-01|2026-01-31");
  });

  it("expires entries after their TTL", () => {
    const clock = makeClock();
    const cache = new CacheStore<number>({ ttlMs: 1000, now: clock.now });
    cache.set("a", 1);
    cache.set("b", 2, { ttlMs: 5000 });
    clock.advance(999);
    expect(cache.get("a")).toBe(1);
    clock.advance(1);
    expect(cache.get("a")).toBeUndefined();
    expect(cache.get("b")).toBe(2);
    expect(cache.size()).toBe(1);
  });

  it("honours an explicit storedAt", () => {
    const clock = makeClock();
    const cache = new CacheStore<string>({ ttlMs: 1000, now: clock.now });
    cache.set("old", "x", { storedAt: clock.now() - 1000 });
    expect(cache.get("old")).toBeUndefined();
  });

  it("does not call the loader again while the entry is fresh", async () => {
    const clock = makeClock();
    const cache = new CacheStore<string>({ ttlMs: 60_000, now: clock.now });
    const loader = vi.fn(async () => "report");
    expect(await cache.getOrLoad("k", loader)).toBe("report");
    expect(await cache.getOrLoad("k", loader)).toBe("report");
    expect(loader).toHaveBeenCalledTimes(1);
    clock.advance(60_000);
    await cache.getOrLoad("k", loader);
    expect(loader).toHaveBeenCalledTimes(2);
  });

  it("shares one pending load between concurrent callers", async () => {
    const cache = new CacheStore<number>({ ttlMs: 1000 });
    let release: (value: number) => void = () => undefined;
    const loader = vi.fn(
      () =>
        new Promise<number>((resolve) => {
          release = resolve;
        })
    );
    const first = cache.getOrLoad("k", loader);
    const second = cache.getOrLoad("k", loader);
    release(7);
    expect(await Promise.all([first, second])).toEqual([7, 7]);
    expect(loader).toHaveBeenCalledTimes(1);
  });

  it("stores nothing when the loader fails or the value is rejected", async () => {
    const cache = new CacheStore<Record<string, number>>({ ttlMs: 1000 });
    await expect(
      cache.getOrLoad("k", async () => {
        throw new Error("tracking report failed");
      })
    ).rejects.toThrow("tracking report failed");
    const empty = await cache.getOrLoad("k", async () => ({}), {
      shouldStore: (value) => Object.keys(value).length > 0,
    });
    expect(empty).toEqual({});
    expect(cache.size()).toBe(0);
  });

  it("applies a per-value TTL from the load options", async () => {
    const clock = makeClock();
    const cache = new CacheStore<string>({ ttlMs: 1000, now: clock.now });
    await cache.getOrLoad("k", async () => "exact", { ttlMs: () => 10_000 });
    expect(cache.entry("k")?.ttlMs).toBe(10_000);
  });
});

describe("InFlightRegistry", () => {
  it("joins a running task instead of launching a second one", async () => {
    const registry = new InFlightRegistry<string>();
    let release: (value: string) => void = () => undefined;
    const task = vi.fn(
      () =>
        new Promise<string>((resolve) => {
          release = resolve;
        })
    );
    const first = registry.launch("range", task);
    const second = registry.launch("range", task);
    expect(first.launched).toBe(true);
    expect(second.launched).toBe(false);
    expect(registry.has("range")).toBe(true);
    release("done");
    expect(await second.promise).toBe("done");
    await registry.settled("range");
    expect(task).toHaveBeenCalledTimes(1);
    expect(registry.size()).toBe(0);
  });

  it("removes failed tasks", async () => {
    const registry = new InFlightRegistry<string>();
    const { promise } = registry.launch("range", async () => {
      throw new Error("export failed");
    });
    await expect(promise).rejects.toThrow("export failed");
    await registry.drain();
    expect(registry.has("range")).toBe(false);
  });
});

describe("createReportCaches", () => {
  it("builds the four range caches", () => {
    const caches = createReportCaches({ partnerCacheRefreshMs: 600_000, volumeEstimateTtlMs: 1_800_000 });
    caches.volume.set("2026-01-01|2026-01-31", { mode: "segment", volumes: { GLB_BR: 10 } });
    expect(caches.volume.entry("2026-01-01|2026-01-31")?.ttlMs).toBe(1_800_000);
    expect(caches.partnerClicks.size()).toBe(0);
    expect(caches.conversions.size()).toBe(0);
    expect(caches.offerPartnerClicks.size()).toBe(0);
  });
});
