// ============================================================================
// src/application/usecases/reviews/SubmitReviewCommentUseCase.ts
// ============================================================================

import type { Logger } from 'pino';

import { type SubmitReviewCommentDTO, SubmitReviewCommentSchema } from '@/application/dto/review.dto';
import type { IReviewRepository } from '@/domain/repositories/IReviewRepository';
import type { IServiceRequestRepository } from '@/domain/repositories/IServiceRequestRepository';
import { RequestNotFoundError, ReviewNotFoundError, UnauthorizedActionError } from '@/shared/errors/domain.errors';

export class SubmitReviewCommentUseCase {
  public constructor(
    private readonly requestRepo: IServiceRequestRepository,
    private readonly reviewRepo: IReviewRepository,
    private readonly logger: Logger,
  ) {}

  public async execute(dto: SubmitReviewCommentDTO): Promise<void> {
    const payload = SubmitReviewCommentSchema.parse(dto);

    const request = await this.requestRepo.findById(payload.requestId);
    if (!request) {
      throw new RequestNotFoundError(payload.requestId);
    }

    if (!request.isOwnedBy(payload.actorUserId)) {
      throw new UnauthorizedActionError('review:comment');
    }

    const updated = await this.reviewRepo.updateComment(request.id, payload.comment);
    if (!updated) {
      throw new ReviewNotFoundError(request.id);
    }

    this.logger.info({ requestId: request.id, length: payload.comment.length }, 'Текст отзыва сохранён.');
  }
}
