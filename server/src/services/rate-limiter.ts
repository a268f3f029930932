/**
 * Rate limiter service - fixed window request counter
 */
import type { RateLimitStatus } from '../types/index';

export interface RateLimiterOptions {
  maxRequests: number;
  windowMs: number;
}

/**
 * Caps POST /reply calls per window across all contacts
 */
export class RateLimiterService {
  private requestCount: number = 0;
  private windowStartTime: number;
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly now: () => number;

  /**
   * @param now - Clock, replaceable in tests
   */
  constructor(options: RateLimiterOptions, now: () => number = Date.now) {
    this.maxRequests = options.maxRequests;
    this.windowMs = options.windowMs;
    this.now = now;
    this.windowStartTime = now();
  }

  /**
   * Counts the request when the window still has room; an expired window starts over
   */
  check(): RateLimitStatus {
    const now = this.now();
    if (now - this.windowStartTime > this.windowMs) {
      this.requestCount = 0;
      this.windowStartTime = now;
    }

    const allowed = this.requestCount < this.maxRequests;
    if (allowed) {
      this.requestCount++;
    }
    return { ...this.getStatus(), allowed };
  }

  getStatus(): RateLimitStatus {
    return {
      allowed: this.requestCount < this.maxRequests,
      current: this.requestCount,
      max: this.maxRequests,
      resetTime: this.windowStartTime + this.windowMs,
    };
  }
}
