export type CacheEntry<T> = {
  value: T;
  expiresAtMs: number;
};

export type TTLCacheOptions = {
  ttlMs: number;
  maxSize?: number;
  /** Clock override for tests */
  now?: () => number;
};

/**
 * In-memory cache with a per-entry time to live and a size cap. When full,
 * the oldest inserted key goes first.
 */
export class TTLCache<T> {
  private readonly map = new Map<string, CacheEntry<T>>();
  private readonly ttlMs: number;
  private readonly maxSize: number;
  private readonly now: () => number;
  private readonly sweepTimer: NodeJS.Timeout;

  constructor(opts: TTLCacheOptions) {
    this.ttlMs = opts.ttlMs;
    this.maxSize = opts.maxSize ?? 1000;
    this.now = opts.now ?? Date.now;

    // Unref'd: a pending sweep must not keep the process alive
    this.sweepTimer = setInterval(() => this.sweep(), 60_000);
    this.sweepTimer.unref();
  }

  private sweep(): void {
    const now = this.now();
    for (const [key, entry] of this.map) {
      if (now >= entry.expiresAtMs) {
        this.map.delete(key);
      }
    }
  }

  get(key: string): T | null {
    const entry = this.map.get(key);
    if (!entry) return null;

    if (this.now() >= entry.expiresAtMs) {
      this.map.delete(key);
      return null;
    }

    return entry.value;
  }

  set(key: string, value: T): void {
    if (this.map.size >= this.maxSize && !this.map.has(key)) {
      const oldest = this.map.keys().next();
      if (!oldest.done) this.map.delete(oldest.value);
    }
    this.map.set(key, { value, expiresAtMs: this.now() + this.ttlMs });
  }

  delete(key: string): void {
    this.map.delete(key);
  }

  clear(): void {
    this.map.clear();
  }

  destroy(): void {
    clearInterval(this.sweepTimer);
    this.map.clear();
  }

  get size(): number {
    return this.map.size;
  }
}
