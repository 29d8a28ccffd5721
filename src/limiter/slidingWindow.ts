import { RateLimiter, nowSeconds } from "./rateLimiter";
import { RateLimitPolicy } from "../types/policy";
import { RateLimitResult } from "../types/decision";
import { ConfigurationError } from "../utils/errors";

export const DEFAULT_POLICY: RateLimitPolicy = {
  limit: 10,
  windowSeconds: 60,
};

/**
 * Per-key sliding-window log kept in process memory.
 *
 * Every public method runs to completion without yielding to the event loop,
 * so evict + count + append for a key is a single indivisible step: no two
 * callers can both observe spare capacity for the last slot. Keys share no
 * state, so traffic for one user never waits on another.
 */
export class SlidingWindowLimiter implements RateLimiter {
  readonly policy: RateLimitPolicy;

  // oldest-first request timestamps (seconds) per key
  private readonly windows = new Map<string, number[]>();

  constructor(policy: Partial<RateLimitPolicy> = {}) {
    const limit = policy.limit ?? DEFAULT_POLICY.limit;
    const windowSeconds = policy.windowSeconds ?? DEFAULT_POLICY.windowSeconds;

    const issues: string[] = [];
    if (!Number.isInteger(limit) || limit <= 0) {
      issues.push(`limit must be a positive integer (got ${limit})`);
    }
    if (!Number.isFinite(windowSeconds) || windowSeconds <= 0) {
      issues.push(`windowSeconds must be positive (got ${windowSeconds})`);
    }
    if (issues.length) {
      throw new ConfigurationError("Invalid rate limit policy", issues);
    }

    this.policy = { limit, windowSeconds };
  }

  consume(key: string, now: number = nowSeconds()): RateLimitResult {
    const window = this.evict(key, now) ?? [];

    if (window.length >= this.policy.limit) {
      return {
        allowed: false,
        remaining: 0,
        resetAt: window[0] + this.policy.windowSeconds,
      };
    }

    // keep the log non-decreasing even if a caller's clock steps backwards
    const last = window.length ? window[window.length - 1] : now;
    window.push(Math.max(now, last));
    this.windows.set(key, window);

    return {
      allowed: true,
      remaining: this.policy.limit - window.length,
      resetAt: window[0] + this.policy.windowSeconds,
    };
  }

  check(key: string, now: number = nowSeconds()): boolean {
    return this.consume(key, now).allowed;
  }

  remaining(key: string, now: number = nowSeconds()): number {
    const used = this.evict(key, now)?.length ?? 0;
    return Math.max(0, this.policy.limit - used);
  }

  /** Seconds until a slot frees up; 0 while the key still has capacity. */
  resetTime(key: string, now: number = nowSeconds()): number {
    const window = this.evict(key, now);
    if (!window || window.length < this.policy.limit) {
      return 0;
    }
    return Math.max(0, window[0] + this.policy.windowSeconds - now);
  }

  /** Drops keys with no request left inside the window. Returns how many went. */
  sweep(now: number = nowSeconds()): number {
    let removed = 0;

    for (const key of [...this.windows.keys()]) {
      const window = this.evict(key, now);
      if (window && window.length === 0) {
        this.windows.delete(key);
        removed++;
      }
    }

    if (removed > 0) {
      console.log(`Rate limiter: cleaned up ${removed} inactive key(s)`);
    }
    return removed;
  }

  /**
   * Runs `sweep` every `intervalSeconds` until the returned function is
   * called. The timer does not keep the process alive.
   */
  startSweeper(intervalSeconds: number): () => void {
    const timer = setInterval(() => this.sweep(), intervalSeconds * 1000);
    timer.unref();
    return () => clearInterval(timer);
  }

  get trackedKeys(): number {
    return this.windows.size;
  }

  private evict(key: string, now: number): number[] | undefined {
    const window = this.windows.get(key);
    if (!window) {
      return undefined;
    }

    let expired = 0;
    while (
      expired < window.length &&
      now - window[expired] > this.policy.windowSeconds
    ) {
      expired++;
    }
    if (expired > 0) {
      window.splice(0, expired);
    }
    return window;
  }
}
