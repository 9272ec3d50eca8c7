// ============================================================================
// src/application/ports/RateLimitPolicy.ts
// ============================================================================

export interface RateLimitPolicy {
  /** Records an attempt and answers whether it fits in the window. Rejected attempts are not recorded. */
  checkLimit(key: string, limit: number, windowMs: number): boolean;
  getRemaining(key: string, limit: number, windowMs: number): number;
  /** Milliseconds until the oldest attempt leaves the window; 0 when nothing is tracked. */
  getTimeUntilReset(key: string, windowMs: number): number;
  /** Drops keys whose last attempt is older than `idleMs`. Resolves the number of keys removed. */
  compact(idleMs: number): number;
}
