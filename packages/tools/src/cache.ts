const DEFAULT_TTL_MS = 5 * 60 * 1000;

/**
 * In-memory cache with a freshness window. Expired entries are kept so a
 * failing provider can still be answered with the last known value.
 */
export class TtlCache<T> {
  private readonly entries = new Map<string, { data: T; timestamp: number }>();

  constructor(private readonly ttlMs: number = DEFAULT_TTL_MS) {}

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (Date.now() - entry.timestamp > this.ttlMs) {
      return undefined;
    }
    return entry.data;
  }

  /** Entry of any age, for fallback when the provider fails. */
  getStale(key: string): T | undefined {
    return this.entries.get(key)?.data;
  }

  set(key: string, data: T): void {
    this.entries.set(key, { data, timestamp: Date.now() });
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Serve fresh data from cache, otherwise call `load`; on failure fall back
   * to a stale entry if one exists.
   */
  async getOrLoad(key: string, load: () => Promise<T>): Promise<{ data: T; stale: boolean }> {
    const cached = this.get(key);
    if (cached !== undefined) return { data: cached, stale: false };

    try {
      const data = await load();
      this.set(key, data);
      return { data, stale: false };
    } catch (err) {
      const stale = this.getStale(key);
      if (stale !== undefined) {
        return { data: stale, stale: true };
      }
      throw err;
    }
  }
}
