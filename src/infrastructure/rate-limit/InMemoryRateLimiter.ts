// ============================================================================
// src/infrastructure/rate-limit/InMemoryRateLimiter.ts
// ============================================================================

import type { RateLimitPolicy } from '@/application/ports/RateLimitPolicy';

/**
 * Sliding-window limiter keyed by `<action>:<userId>`. State lives in process
 * memory only, so limits reset on restart.
 */
export class InMemoryRateLimiter implements RateLimitPolicy {
  private readonly attempts = new Map<string, number[]>();

  public constructor(private readonly now: () => number = () => Date.now()) {}

  public checkLimit(key: string, limit: number, windowMs: number): boolean {
    const recent = this.prune(key, windowMs);

    if (recent.length >= limit) {
      return false;
    }

    recent.push(this.now());
    this.attempts.set(key, recent);
    return true;
  }

  public getRemaining(key: string, limit: number, windowMs: number): number {
    return Math.max(0, limit - this.prune(key, windowMs).length);
  }

  public getTimeUntilReset(key: string, windowMs: number): number {
    const recent = this.prune(key, windowMs);
    const [oldest] = recent;

    if (oldest === undefined) {
      return 0;
    }

    return Math.max(0, oldest + windowMs - this.now());
  }

  public compact(idleMs: number): number {
    let removed = 0;

    for (const key of [...this.attempts.keys()]) {
      if (this.prune(key, idleMs).length === 0) {
        removed += 1;
      }
    }

    return removed;
  }

  public get size(): number {
    return this.attempts.size;
  }

  private prune(key: string, windowMs: number): number[] {
    const threshold = this.now() - windowMs;
    const recent = (this.attempts.get(key) ?? []).filter((timestamp) => timestamp > threshold);

    if (recent.length === 0) {
      this.attempts.delete(key);
    } else {
      this.attempts.set(key, recent);
    }

    return recent;
  }
}
