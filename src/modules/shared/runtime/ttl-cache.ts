/**
 * TTL CACHE
 * =========
 *
 * In-memory TTL cache. Used to memoize country → currency lookups across
 * pipeline runs.
 */

type CacheEntry<T> = {
  value: T;
  expiresAt: number;
};

export class TtlCache<T> {
  private map = new Map<string, CacheEntry<T>>();

  constructor(
    private defaultTtlMs: number,
    private now: () => number = Date.now
  ) {}

  /**
   * Value if present and not expired
   */
  get(key: string): T | undefined {
    const e = this.map.get(key);
    if (!e) return undefined;
    if (this.now() > e.expiresAt) {
      this.map.delete(key);
      return undefined;
    }
    return e.value;
  }

  set(key: string, value: T, ttlMs?: number): void {
    this.map.set(key, {
      value,
      expiresAt: this.now() + (ttlMs ?? this.defaultTtlMs),
    });
  }

  size(): number {
    return this.map.size;
  }
}
