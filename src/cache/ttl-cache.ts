/**
 * Read-through cache with a fixed time-to-live.
 *
 * Entries are served for at most `ttlMs` after they were loaded and are
 * never returned past expiry. Within that window a value changed at the
 * source may be stale; callers that write through the owning service
 * invalidate the key so their own changes are visible immediately.
 * Invalidation also detaches a load already in flight for the key, so a
 * snapshot taken before the write is never stored.
 */

export type NowFn = () => number;

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export class TtlCache<V> {
  private entries = new Map<string, CacheEntry<V>>();
  private inflight = new Map<string, Promise<V>>();

  constructor(
    private ttlMs: number,
    private now: NowFn = Date.now,
  ) {}

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: V): void {
    if (this.ttlMs <= 0) return;
    this.entries.set(key, { value, expiresAt: this.now() + this.ttlMs });
  }

  delete(key: string): void {
    this.entries.delete(key);
    this.inflight.delete(key);
  }

  clear(): void {
    this.entries.clear();
    this.inflight.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Return the cached value or load, store and return a fresh one.
   * Concurrent misses for the same key share one load.
   */
  async getOrLoad(key: string, loader: () => Promise<V>): Promise<V> {
    const cached = this.get(key);
    if (cached !== undefined) return cached;

    const pending = this.inflight.get(key);
    if (pending) return pending;

    const load: Promise<V> = loader()
      .then((value) => {
        if (this.inflight.get(key) === load) this.set(key, value);
        return value;
      })
      .finally(() => {
        if (this.inflight.get(key) === load) this.inflight.delete(key);
      });
    this.inflight.set(key, load);
    return load;
  }
}
