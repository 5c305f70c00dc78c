import { describe, it, expect, vi } from "vitest";
import { NoopCache, TtlCache } from "../ttl-cache";

function createClock(start = 1_000_000) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

describe("TtlCache", () => {
  it("computes once within the TTL", async () => {
    const clock = createClock();
    const cache = new TtlCache<string>({ now: clock.now });
    const compute = vi.fn().mockResolvedValue("METAR");

    expect(await cache.getOrCompute("KJFK", 60, compute)).toBe("METAR");
    clock.advance(59_000);
    expect(await cache.getOrCompute("KJFK", 60, compute)).toBe("METAR");

    expect(compute).toHaveBeenCalledTimes(1);
  });

  it("recomputes after the TTL elapses", async () => {
    const clock = createClock();
    const cache = new TtlCache<string>({ now: clock.now });
    const compute = vi
      .fn<() => Promise<string>>()
      .mockResolvedValueOnce("first")
      .mockResolvedValueOnce("second");

    await cache.getOrCompute("KJFK", 60, compute);
    clock.advance(60_000);

    expect(await cache.getOrCompute("KJFK", 60, compute)).toBe("second");
    expect(compute).toHaveBeenCalledTimes(2);
  });

  it("keys entries separately", async () => {
    const cache = new TtlCache<string>();

    await cache.getOrCompute("KJFK", 60, async () => "jfk");
    await cache.getOrCompute("KLAX", 60, async () => "lax");

    expect(await cache.getOrCompute("KJFK", 60, async () => "other")).toBe("jfk");
    expect(cache.size).toBe(2);
  });

  it("stores nothing when the TTL is zero", async () => {
    const cache = new TtlCache<string>();
    const compute = vi.fn().mockResolvedValue("value");

    await cache.getOrCompute("KJFK", 0, compute);
    await cache.getOrCompute("KJFK", 0, compute);

    expect(compute).toHaveBeenCalledTimes(2);
    expect(cache.size).toBe(0);
  });

  it("does not cache a rejected computation", async () => {
    const cache = new TtlCache<string>();

    await expect(
      cache.getOrCompute("KJFK", 60, async () => {
        throw new Error("upstream down");
      })
    ).rejects.toThrow("upstream down");

    expect(cache.size).toBe(0);
    expect(await cache.getOrCompute("KJFK", 60, async () => "recovered")).toBe(
      "recovered"
    );
  });

  it("evicts the oldest entry at capacity", async () => {
    const clock = createClock();
    const cache = new TtlCache<string>({ maxEntries: 2, now: clock.now });

    await cache.getOrCompute("a", 60, async () => "A");
    clock.advance(1);
    await cache.getOrCompute("b", 60, async () => "B");
    clock.advance(1);
    await cache.getOrCompute("c", 60, async () => "C");

    expect(cache.size).toBe(2);
    expect(await cache.getOrCompute("a", 60, async () => "A2")).toBe("A2");
  });

  it("sweeps expired entries before evicting live ones", async () => {
    const clock = createClock();
    const cache = new TtlCache<string>({ maxEntries: 2, now: clock.now });

    await cache.getOrCompute("live", 600, async () => "L");
    await cache.getOrCompute("stale", 1, async () => "S");
    clock.advance(2_000);
    await cache.getOrCompute("fresh", 600, async () => "F");

    expect(cache.size).toBe(2);
    expect(await cache.getOrCompute("live", 600, async () => "L2")).toBe("L");
  });

  it("clear empties the cache", async () => {
    const cache = new TtlCache<string>();
    await cache.getOrCompute("KJFK", 60, async () => "x");

    cache.clear();

    expect(cache.size).toBe(0);
  });
});

describe("NoopCache", () => {
  it("always computes", async () => {
    const cache = new NoopCache<number>();
    const compute = vi.fn().mockResolvedValue(1);

    await cache.getOrCompute("k", 60, compute);
    await cache.getOrCompute("k", 60, compute);

    expect(compute).toHaveBeenCalledTimes(2);
  });
});
