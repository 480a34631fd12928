export interface RateLimiterOptions {
  /** Events allowed per key inside one window */
  maxEvents: number;
  windowMs: number;
  now?: () => number;
}

/**
 * Sliding-window limiter keyed by source (remote address, session id).
 * Only accepted events count toward the window.
 */
export class RateLimiter {
  private readonly windows = new Map<string, number[]>();
  private readonly maxEvents: number;
  private readonly windowMs: number;
  private readonly now: () => number;

  constructor(options: RateLimiterOptions) {
    this.maxEvents = options.maxEvents;
    this.windowMs = options.windowMs;
    this.now = options.now ?? Date.now;
  }

  /** Record an event for `key` if the window has room; returns whether it was allowed */
  tryAcquire(key: string): boolean {
    if (this.maxEvents <= 0) return true; // 0 disables the limit

    const now = this.now();
    const timestamps = this.prune(key, now);
    if (timestamps.length >= this.maxEvents) return false;

    timestamps.push(now);
    this.windows.set(key, timestamps);
    return true;
  }

  remaining(key: string): number {
    if (this.maxEvents <= 0) return Number.POSITIVE_INFINITY;
    return Math.max(0, this.maxEvents - this.prune(key, this.now()).length);
  }

  /** Drop keys whose windows are empty */
  sweep(): void {
    const now = this.now();
    for (const key of Array.from(this.windows.keys())) {
      if (this.prune(key, now).length === 0) this.windows.delete(key);
    }
  }

  get size(): number {
    return this.windows.size;
  }

  private prune(key: string, now: number): number[] {
    const windowStart = now - this.windowMs;
    const timestamps = (this.windows.get(key) ?? []).filter((t) => t > windowStart);
    if (timestamps.length > 0) this.windows.set(key, timestamps);
    return timestamps;
  }
}
