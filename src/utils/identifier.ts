/**
 * Key the limiter tracks a message under: the user id reported by the chat
 * transport. The transport is the only client, so there is no IP fallback.
 */
export function getRateLimitKey(userId: string | number): string {
  return `rl:user:${String(userId).trim()}`;
}
