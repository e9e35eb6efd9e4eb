/**
 * In-process key/value cache with a TTL per entry.
 * Expired entries are evicted lazily, on the read that finds them.
 */

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export class TtlCache<V> {
  private entries = new Map<string, CacheEntry<V>>();

  constructor(
    private readonly defaultTtlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: V, ttlMs: number = this.defaultTtlMs): void {
    this.entries.set(key, { value, expiresAt: this.now() + ttlMs });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

/** `cacheKey("page", "42", true)` → "page:42:true" */
export function cacheKey(prefix: string, ...parts: Array<string | number | boolean>): string {
  return [prefix, ...parts.map(String)].join(":");
}
