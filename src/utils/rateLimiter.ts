/**
 * Sliding-window request counter, one window per key.
 */
export class SlidingWindowRateLimiter {
  private hits = new Map<string, number[]>();

  constructor(
    private readonly limit: number,
    private readonly windowMs: number,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Record a hit for `key`. Returns false once the key has gone over
   * `limit` hits inside the current window; the hit is still recorded.
   */
  tryAcquire(key: string): boolean {
    const now = this.now();
    const cutoff = now - this.windowMs;
    const recent = (this.hits.get(key) ?? []).filter((at) => at > cutoff);
    recent.push(now);
    this.hits.set(key, recent);
    return recent.length <= this.limit;
  }

  get windowLength(): number {
    return this.windowMs;
  }

  reset(key?: string): void {
    if (key === undefined) this.hits.clear();
    else this.hits.delete(key);
  }
}
