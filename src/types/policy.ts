export interface RateLimitPolicy {
  limit: number;          // max admitted requests per window
  windowSeconds: number;  // trailing window length
}
