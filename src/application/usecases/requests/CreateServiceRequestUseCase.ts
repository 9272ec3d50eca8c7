// ============================================================================
// src/application/usecases/requests/CreateServiceRequestUseCase.ts
// ============================================================================

import type { Logger } from 'pino';

import { type CreateServiceRequestDTO, CreateServiceRequestSchema } from '@/application/dto/request.dto';
import type { MarketplaceNotifier } from '@/application/ports/MarketplaceNotifier';
import type { RateLimitPolicy } from '@/application/ports/RateLimitPolicy';
import { enforceRateLimit } from '@/application/services/rateLimit';
import type { BroadcastOffersUseCase, BroadcastSummary } from '@/application/usecases/offers/BroadcastOffersUseCase';
import type { ServiceRequest } from '@/domain/entities/ServiceRequest';
import type { IServiceRequestRepository } from '@/domain/repositories/IServiceRequestRepository';
import { RATE_LIMITS, serviceCategoryLabel } from '@/shared/config/constants';

export interface CreateServiceRequestResult {
  readonly request: ServiceRequest;
  readonly broadcast: BroadcastSummary;
}

export class CreateServiceRequestUseCase {
  public constructor(
    private readonly requestRepo: IServiceRequestRepository,
    private readonly broadcastOffers: BroadcastOffersUseCase,
    private readonly rateLimiter: RateLimitPolicy,
    private readonly notifier: MarketplaceNotifier,
    private readonly logger: Logger,
  ) {}

  public async execute(dto: CreateServiceRequestDTO): Promise<CreateServiceRequestResult> {
    const payload = CreateServiceRequestSchema.parse(dto);
    enforceRateLimit(this.rateLimiter, RATE_LIMITS.newRequest, payload.clientUserId);

    const request = await this.requestRepo.create({
      clientUserId: payload.clientUserId,
      clientName: payload.clientName,
      contact: payload.contact,
      category: serviceCategoryLabel(payload.category),
      address: payload.address,
      description: payload.description,
      desiredTime: payload.desiredTime,
    });

    this.logger.info(
      { requestId: request.id, clientUserId: request.clientUserId, category: request.category },
      'Новая заявка создана.',
    );

    const adminOutcome = await this.notifier.notifyAdmin({ kind: 'request_created', request });
    if (adminOutcome !== 'delivered') {
      this.logger.warn({ requestId: request.id, outcome: adminOutcome }, 'Администратор не получил уведомление о заявке.');
    }

    const broadcast = await this.broadcastOffers.execute(request);

    return { request, broadcast };
  }
}
