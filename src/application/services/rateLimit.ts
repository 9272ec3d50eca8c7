// ============================================================================
// src/application/services/rateLimit.ts
// ============================================================================

import type { RateLimitPolicy } from '@/application/ports/RateLimitPolicy';
import type { RateLimitRule } from '@/shared/config/constants';
import { RateLimitExceededError } from '@/shared/errors/domain.errors';

export const rateLimitKey = (rule: RateLimitRule, userId: string): string => `${rule.action}:${userId}`;

export const enforceRateLimit = (policy: RateLimitPolicy, rule: RateLimitRule, userId: string): void => {
  const key = rateLimitKey(rule, userId);

  if (!policy.checkLimit(key, rule.limit, rule.windowMs)) {
    throw new RateLimitExceededError(rule.action, policy.getTimeUntilReset(key, rule.windowMs));
  }
};
