import { RateLimitResult } from "../types/decision";

export interface RateLimiter {
  /**
   * Consume one unit of capacity for `key` if any is left. A denied attempt
   * is not recorded.
   */
  consume(key: string, now?: number): RateLimitResult;
  remaining(key: string, now?: number): number;
  resetTime(key: string, now?: number): number;
  sweep(now?: number): number;
}

export function nowSeconds(): number {
  return Date.now() / 1000;
}
