import { describe, expect, it, vi } from "vitest";
import { OnceCache, cacheKey } from "../lib/once-cache";

describe("OnceCache", () => {
    it("computes each key once, even for concurrent callers", async () => {
        const cache = new OnceCache<number>();
        const compute = vi.fn(async () => 42);
        const [a, b] = await Promise.all([cache.get("k", compute), cache.get("k", compute)]);
        expect([a, b]).toEqual([42, 42]);
        expect(compute).toHaveBeenCalledTimes(1);
        expect(cache.misses).toBe(1);
        expect(cache.has("k")).toBe(true);
        expect(cache.has("other")).toBe(false);
    });

    it("hands the same rejection to every caller", async () => {
        const cache = new OnceCache<number>();
        const compute = vi.fn(async (): Promise<number> => {
            throw new Error("down");
        });
        await expect(cache.get("k", compute)).rejects.toThrow("down");
        await expect(cache.get("k", compute)).rejects.toThrow("down");
        expect(compute).toHaveBeenCalledTimes(1);
    });
});

describe("cacheKey", () => {
    it("keeps parts apart", () => {
        expect(cacheKey("a,b", "c")).not.toBe(cacheKey("a", "b,c"));
        expect(cacheKey("Milan", "2026-10-22")).toBe("[\"Milan\",\"2026-10-22\"]");
    });
});
