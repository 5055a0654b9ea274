import { sleep } from "./backoff.js";
import type { RateLimiter, RateLimiterConfig, Sleep } from "./types.js";

/**
 * Minimum gap between provider calls, plus an optional sliding window.
 */
export class SlidingWindowRateLimiter implements RateLimiter {
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly minDelayMs: number;
  private readonly sleepFn: Sleep;

  private requestTimestamps: number[] = [];
  private lastCallAt = 0;

  constructor(config: RateLimiterConfig = {}, sleepFn: Sleep = sleep) {
    this.maxRequests = config.maxRequests ?? Infinity;
    this.windowMs = config.windowMs ?? 60_000;
    this.minDelayMs = config.minDelayMs ?? 0;
    this.sleepFn = sleepFn;
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    if (this.minDelayMs > 0) {
      const elapsed = Date.now() - this.lastCallAt;
      if (elapsed < this.minDelayMs) {
        await this.sleepFn(this.minDelayMs - elapsed, signal);
      }
    }

    if (this.maxRequests < Infinity) {
      this.prune();
      if (this.requestTimestamps.length >= this.maxRequests) {
        const oldest = this.requestTimestamps[0] ?? Date.now();
        const waitMs = this.windowMs - (Date.now() - oldest) + 50;
        await this.sleepFn(waitMs, signal);
        this.prune();
      }
      this.requestTimestamps.push(Date.now());
    }

    this.lastCallAt = Date.now();
  }

  private prune(): void {
    const now = Date.now();
    this.requestTimestamps = this.requestTimestamps.filter(
      (ts) => now - ts < this.windowMs,
    );
  }
}

export function createRateLimiter(config: RateLimiterConfig = {}): RateLimiter {
  return new SlidingWindowRateLimiter(config);
}
