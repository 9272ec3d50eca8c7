// ============================================================================
// src/application/services/ReviewPromptService.ts
// ============================================================================

import type { Logger } from 'pino';

import type { MarketplaceNotifier } from '@/application/ports/MarketplaceNotifier';
import type { IMasterRepository } from '@/domain/repositories/IMasterRepository';
import type { IReviewRepository } from '@/domain/repositories/IReviewRepository';
import type { IServiceRequestRepository } from '@/domain/repositories/IServiceRequestRepository';
import { RequestNotFoundError } from '@/shared/errors/domain.errors';

export type ReviewPromptResult = 'prompted' | 'already_requested' | 'already_reviewed';

/** Sends the rating prompt to the client at most once per request. */
export class ReviewPromptService {
  public constructor(
    private readonly requestRepo: IServiceRequestRepository,
    private readonly reviewRepo: IReviewRepository,
    private readonly masterRepo: IMasterRepository,
    private readonly notifier: MarketplaceNotifier,
    private readonly logger: Logger,
  ) {}

  public async requestReview(requestId: number): Promise<ReviewPromptResult> {
    const request = await this.requestRepo.findById(requestId);
    if (!request) {
      throw new RequestNotFoundError(requestId);
    }

    if (request.reviewRequested) {
      return 'already_requested';
    }

    const existing = await this.reviewRepo.findByRequestId(requestId);
    if (existing) {
      return 'already_reviewed';
    }

    // The flag is committed before the prompt goes out; a lost prompt is not retried.
    const claimed = await this.requestRepo.markReviewRequested(requestId);
    if (!claimed) {
      return 'already_requested';
    }

    const master = request.masterId !== null ? await this.masterRepo.findById(request.masterId) : null;
    const outcome = await this.notifier.sendReviewPrompt(request.with({ reviewRequested: true }), master);

    if (outcome !== 'delivered') {
      this.logger.warn({ requestId, outcome }, 'Не удалось отправить клиенту запрос на отзыв.');
    } else {
      this.logger.info({ requestId }, 'Клиенту отправлен запрос на отзыв.');
    }

    return 'prompted';
  }
}
