// ============================================================================
// src/application/usecases/account/GetRateLimitStatusUseCase.ts
// ============================================================================

import { type ClientLookupDTO, ClientLookupSchema } from '@/application/dto/request.dto';
import type { RateLimitPolicy } from '@/application/ports/RateLimitPolicy';
import { rateLimitKey } from '@/application/services/rateLimit';
import { RATE_LIMITS, type RateLimitRule } from '@/shared/config/constants';

export interface RateLimitStatus {
  readonly action: RateLimitRule['action'];
  readonly limit: number;
  readonly windowMs: number;
  readonly remaining: number;
  /** 0 when the user has not used the action inside the window. */
  readonly resetInMs: number;
}

const SHOWN_RULES: ReadonlyArray<RateLimitRule> = [
  RATE_LIMITS.newRequest,
  RATE_LIMITS.masterRegistration,
  RATE_LIMITS.complaint,
  RATE_LIMITS.offerActions,
];

/** Read-only view of the user's limits; nothing is recorded against them. */
export class GetRateLimitStatusUseCase {
  public constructor(private readonly rateLimiter: RateLimitPolicy) {}

  public execute(dto: ClientLookupDTO): RateLimitStatus[] {
    const { userId } = ClientLookupSchema.parse(dto);

    return SHOWN_RULES.map((rule) => {
      const key = rateLimitKey(rule, userId);
      return {
        action: rule.action,
        limit: rule.limit,
        windowMs: rule.windowMs,
        remaining: this.rateLimiter.getRemaining(key, rule.limit, rule.windowMs),
        resetInMs: this.rateLimiter.getTimeUntilReset(key, rule.windowMs),
      };
    });
  }
}
