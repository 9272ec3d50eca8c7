// ============================================================================
// src/application/usecases/reviews/SkipReviewUseCase.ts
// ============================================================================

import type { Logger } from 'pino';

import { type OrderActionDTO, OrderActionSchema } from '@/application/dto/order.dto';
import type { IServiceRequestRepository } from '@/domain/repositories/IServiceRequestRepository';
import { RequestNotFoundError, UnauthorizedActionError } from '@/shared/errors/domain.errors';

/** Nothing is persisted; the client simply declines to leave a comment. */
export class SkipReviewUseCase {
  public constructor(
    private readonly requestRepo: IServiceRequestRepository,
    private readonly logger: Logger,
  ) {}

  public async execute(dto: OrderActionDTO): Promise<void> {
    const payload = OrderActionSchema.parse(dto);

    const request = await this.requestRepo.findById(payload.requestId);
    if (!request) {
      throw new RequestNotFoundError(payload.requestId);
    }

    if (!request.isOwnedBy(payload.actorUserId)) {
      throw new UnauthorizedActionError('review:skip');
    }

    this.logger.debug({ requestId: request.id }, 'Клиент пропустил отзыв.');
  }
}
