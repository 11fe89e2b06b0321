const DEFAULT_LIMIT = 2000;
const DEFAULT_WINDOW = 60 * 1000; // 1 minute

export interface RateLimiterOptions {
  /** Admissions allowed inside one window (default: 2000) */
  limit?: number;
  /** Window length in milliseconds (default: 60000) */
  windowMs?: number;
  /** Clock in milliseconds (default: Date.now) */
  now?: () => number;
}

/**
 * Sliding-window admission gate.
 *
 * Rejected admissions are not queued: the caller drops the item.
 * Timestamps strictly older than `now - windowMs` are pruned on every check,
 * so an admission recorded exactly one window ago still counts.
 */
export class SlidingWindowRateLimiter {
  readonly limit: number;
  readonly windowMs: number;
  private readonly now: () => number;
  private readonly timestamps: number[] = [];

  constructor(options: RateLimiterOptions = {}) {
    this.limit = options.limit ?? DEFAULT_LIMIT;
    this.windowMs = options.windowMs ?? DEFAULT_WINDOW;
    this.now = options.now ?? Date.now;
  }

  /**
   * Record an admission if the window has room.
   * @returns false when the window is full
   */
  admit(): boolean {
    const now = this.now();
    this.prune(now);

    if (this.timestamps.length >= this.limit) {
      return false;
    }

    this.timestamps.push(now);
    return true;
  }

  /**
   * Admissions inside the current window.
   */
  count(): number {
    this.prune(this.now());
    return this.timestamps.length;
  }

  reset(): void {
    this.timestamps.length = 0;
  }

  private prune(now: number): void {
    const cutoff = now - this.windowMs;
    while (this.timestamps.length > 0 && this.timestamps[0] < cutoff) {
      this.timestamps.shift();
    }
  }
}
