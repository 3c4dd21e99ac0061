import type { Clock } from "../db/store.js";

/** Sliding-window rate limiter, one per connection */
export class RateLimiter {
  private timestamps: number[] = [];

  constructor(
    private maxRequests: number,
    private windowMs: number,
    private now: Clock = Date.now
  ) {}

  /** Returns true if the request is allowed */
  check(): boolean {
    const now = this.now();
    this.timestamps = this.timestamps.filter((t) => now - t < this.windowMs);

    if (this.timestamps.length >= this.maxRequests) {
      return false;
    }

    this.timestamps.push(now);
    return true;
  }
}
