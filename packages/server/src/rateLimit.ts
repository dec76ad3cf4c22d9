export interface RateLimiterOptions {
  /**
   * Events allowed within one window. Zero or a negative value disables the limiter.
   */
  maxEvents: number;
  windowMs: number;
}

export interface RateLimitCheckResult {
  allowed: boolean;
  retryAfterMs?: number;
}

/**
 * Sliding-window event counter kept in memory, one per session.
 */
export class RateLimiter {
  private timestamps: number[] = [];

  constructor(private readonly options: RateLimiterOptions) {}

  get enabled(): boolean {
    return Number.isFinite(this.options.maxEvents) && this.options.maxEvents > 0;
  }

  check(now = Date.now()): RateLimitCheckResult {
    if (!this.enabled) {
      return { allowed: true };
    }

    const cutoff = now - this.options.windowMs;
    const firstLive = this.timestamps.findIndex((timestamp) => timestamp > cutoff);
    this.timestamps = firstLive === -1 ? [] : this.timestamps.slice(firstLive);

    if (this.timestamps.length < this.options.maxEvents) {
      this.timestamps.push(now);
      return { allowed: true };
    }

    const oldest = this.timestamps[0] ?? now;
    return { allowed: false, retryAfterMs: Math.max(0, oldest + this.options.windowMs - now) };
  }
}
