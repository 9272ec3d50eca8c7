// ============================================================================
// src/application/usecases/masters/RegisterMasterUseCase.ts
// ============================================================================

import type { Logger } from 'pino';

import { type RegisterMasterDTO, RegisterMasterSchema } from '@/application/dto/master.dto';
import type { MarketplaceNotifier } from '@/application/ports/MarketplaceNotifier';
import type { RateLimitPolicy } from '@/application/ports/RateLimitPolicy';
import { enforceRateLimit } from '@/application/services/rateLimit';
import type { Master } from '@/domain/entities/Master';
import type { IMasterRepository } from '@/domain/repositories/IMasterRepository';
import { ENTITLEMENTS, RATE_LIMITS, serviceCategoryLabel } from '@/shared/config/constants';
import { DuplicateMasterProfileError } from '@/shared/errors/domain.errors';

export class RegisterMasterUseCase {
  public constructor(
    private readonly masterRepo: IMasterRepository,
    private readonly rateLimiter: RateLimitPolicy,
    private readonly notifier: MarketplaceNotifier,
    private readonly logger: Logger,
  ) {}

  public async execute(dto: RegisterMasterDTO): Promise<Master> {
    const payload = RegisterMasterSchema.parse(dto);

    const existing = await this.masterRepo.findByUserId(payload.userId);
    if (existing) {
      throw new DuplicateMasterProfileError(payload.userId);
    }

    enforceRateLimit(this.rateLimiter, RATE_LIMITS.masterRegistration, payload.userId);

    const master = await this.masterRepo.create({
      userId: payload.userId,
      fullName: payload.fullName,
      phone: payload.phone,
      categories: payload.categories.map(serviceCategoryLabel),
      experienceBucket: payload.experienceBucket,
      experienceText: payload.experienceText,
      portfolio: payload.portfolio,
      references: payload.references,
      taxId: payload.taxId,
      freeOrdersLeft: ENTITLEMENTS.freeOrdersStart,
    });

    this.logger.info({ masterId: master.id, userId: master.userId }, 'Мастер зарегистрирован.');

    const outcome = await this.notifier.notifyAdmin({ kind: 'master_registered', master });
    if (outcome !== 'delivered') {
      this.logger.warn({ masterId: master.id, outcome }, 'Администратор не получил анкету мастера.');
    }

    return master;
  }
}
