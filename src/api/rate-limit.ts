export interface RateLimiterOptions {
  limit?: number;
  windowMs?: number;
  now?: () => number;
}

/**
 * Sliding window of request timestamps per credential. `check` is the pre-flight
 * guard; `record` is called once an attempt has finished, successful or not.
 */
export class SlidingWindowRateLimiter {
  private readonly limit: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  private readonly windows = new Map<string, number[]>();

  constructor(options: RateLimiterOptions = {}) {
    this.limit = options.limit ?? 100;
    this.windowMs = options.windowMs ?? 60_000;
    this.now = options.now ?? Date.now;
  }

  check(key: string): boolean {
    return this.evict(key).length < this.limit;
  }

  record(key: string): void {
    const timestamps = this.evict(key);
    timestamps.push(this.now());
    this.windows.set(key, timestamps);
  }

  remaining(key: string): number {
    return Math.max(0, this.limit - this.evict(key).length);
  }

  /** Milliseconds until the oldest timestamp leaves the window, 0 when a slot is free. */
  retryAfterMs(key: string): number {
    const timestamps = this.evict(key);
    if (timestamps.length < this.limit) return 0;
    return Math.max(0, timestamps[0] + this.windowMs - this.now());
  }

  private evict(key: string): number[] {
    const cutoff = this.now() - this.windowMs;
    const timestamps = (this.windows.get(key) ?? []).filter((ts) => ts > cutoff);
    if (timestamps.length) {
      this.windows.set(key, timestamps);
    } else {
      this.windows.delete(key);
    }
    return timestamps;
  }
}
