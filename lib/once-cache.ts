// lib/once-cache.ts — per-run memo where the first caller for a key does the work
// and everyone else awaits the same promise.

export const cacheKey = (...parts: string[]) => JSON.stringify(parts);

export class OnceCache<V> {
    private readonly entries = new Map<string, Promise<V>>();
    private computed = 0;

    get(key: string, compute: () => Promise<V>): Promise<V> {
        const hit = this.entries.get(key);
        if (hit) return hit;
        this.computed++;
        const pending = Promise.resolve().then(compute);
        this.entries.set(key, pending);
        return pending;
    }

    has(key: string): boolean {
        return this.entries.has(key);
    }

    /** Number of keys that triggered a computation. */
    get misses(): number {
        return this.computed;
    }
}
