// ============================================================================
// src/application/usecases/offers/SkipOfferUseCase.ts
// ============================================================================

import type { Logger } from 'pino';

import { type OfferActionDTO, OfferActionSchema } from '@/application/dto/order.dto';
import type { RateLimitPolicy } from '@/application/ports/RateLimitPolicy';
import { enforceRateLimit } from '@/application/services/rateLimit';
import type { IMasterRepository } from '@/domain/repositories/IMasterRepository';
import type { IOfferRepository } from '@/domain/repositories/IOfferRepository';
import { OfferStatus } from '@/domain/value-objects/OfferStatus';
import { RATE_LIMITS } from '@/shared/config/constants';
import { OfferNotFoundError, UnauthorizedActionError } from '@/shared/errors/domain.errors';

export interface SkipOfferResult {
  readonly offerId: number;
  readonly status: OfferStatus;
  readonly changed: boolean;
}

export class SkipOfferUseCase {
  public constructor(
    private readonly offerRepo: IOfferRepository,
    private readonly masterRepo: IMasterRepository,
    private readonly rateLimiter: RateLimitPolicy,
    private readonly logger: Logger,
  ) {}

  public async execute(dto: OfferActionDTO): Promise<SkipOfferResult> {
    const payload = OfferActionSchema.parse(dto);
    enforceRateLimit(this.rateLimiter, RATE_LIMITS.offerActions, payload.actorUserId);

    const offer = await this.offerRepo.findById(payload.offerId);
    if (!offer) {
      throw new OfferNotFoundError(payload.offerId);
    }

    const master = await this.masterRepo.findByUserId(payload.actorUserId);
    if (!master || !offer.belongsTo(master.id)) {
      throw new UnauthorizedActionError('offer:skip');
    }

    if (offer.status !== OfferStatus.SENT) {
      return { offerId: offer.id, status: offer.status, changed: false };
    }

    const changed = await this.offerRepo.transitionStatus(offer.id, OfferStatus.SENT, OfferStatus.SKIPPED);

    this.logger.info({ offerId: offer.id, requestId: offer.requestId, masterId: master.id }, 'Мастер пропустил заявку.');

    return { offerId: offer.id, status: changed ? OfferStatus.SKIPPED : offer.status, changed };
  }
}
