type CacheEntry<T> = {
  value: T;
  expiresAt: number;
};

export class TtlCache<T> {
  private cache = new Map<string, CacheEntry<T>>();
  private pending = new Map<string, Promise<T>>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(ttlMs: number, now: () => number = Date.now) {
    this.ttlMs = ttlMs;
    this.now = now;
  }

  get = (key: string): T | null => {
    const entry = this.cache.get(key);
    if (!entry) return null;
    if (this.now() > entry.expiresAt) {
      this.cache.delete(key);
      return null;
    }
    return entry.value;
  };

  set = (key: string, value: T): void => {
    this.cache.set(key, {
      value,
      expiresAt: this.now() + this.ttlMs,
    });
  };

  /**
   * Returns the cached value or runs `load` once per key, so concurrent callers
   * asking for the same key share a single in-flight request. Failed loads are
   * not cached.
   */
  getOrLoad = async (key: string, load: () => Promise<T>): Promise<T> => {
    const cached = this.get(key);
    if (cached !== null) return cached;

    const inFlight = this.pending.get(key);
    if (inFlight) return inFlight;

    const request = load()
      .then((value) => {
        this.set(key, value);
        return value;
      })
      .finally(() => {
        this.pending.delete(key);
      });

    this.pending.set(key, request);
    return request;
  };

  clear = (): void => {
    this.cache.clear();
    this.pending.clear();
  };

  size = (): number => {
    this.evictExpired();
    return this.cache.size;
  };

  private evictExpired = (): void => {
    const now = this.now();
    for (const [key, entry] of this.cache) {
      if (now > entry.expiresAt) {
        this.cache.delete(key);
      }
    }
  };
}
