import { describe, expect, it, vi } from "vitest";
import { TtlCache } from "@/lib/education/cache";
import { FakeClock } from "@/lib/education/testing";

describe("TtlCache", () => {
  it("serves the same promise until the entry expires", async () => {
    const clock = new FakeClock(1_000);
    const cache = new TtlCache<number>(500, clock.now);
    const load = vi.fn(async () => 42);

    await expect(cache.getOrLoad("k", load)).resolves.toBe(42);
    clock.advance(499);
    await expect(cache.getOrLoad("k", load)).resolves.toBe(42);
    expect(load).toHaveBeenCalledTimes(1);

    clock.advance(1);
    await cache.getOrLoad("k", load);
    expect(load).toHaveBeenCalledTimes(2);
  });

  it("keeps keys apart", async () => {
    const cache = new TtlCache<string>(1_000, () => 0);
    await expect(cache.getOrLoad("a", async () => "A")).resolves.toBe("A");
    await expect(cache.getOrLoad("b", async () => "B")).resolves.toBe("B");
    expect(cache.size).toBe(2);
  });

  it("drops rejected loads so the next call retries", async () => {
    const cache = new TtlCache<number>(1_000, () => 0);
    const load = vi
      .fn<() => Promise<number>>()
      .mockRejectedValueOnce(new Error("boom"))
      .mockResolvedValueOnce(7);

    await expect(cache.getOrLoad("k", load)).rejects.toThrow("boom");
    await expect(cache.getOrLoad("k", load)).resolves.toBe(7);
    expect(load).toHaveBeenCalledTimes(2);
  });
});
