// ============================================================================
// src/application/usecases/reviews/SubmitRatingUseCase.ts
// ============================================================================

import type { Logger } from 'pino';

import { type SubmitRatingDTO, SubmitRatingSchema } from '@/application/dto/review.dto';
import type { Review } from '@/domain/entities/Review';
import type { IMasterRepository } from '@/domain/repositories/IMasterRepository';
import type { IReviewRepository } from '@/domain/repositories/IReviewRepository';
import type { IServiceRequestRepository } from '@/domain/repositories/IServiceRequestRepository';
import type { TransactionManager } from '@/domain/repositories/transaction';
import { Rating } from '@/domain/value-objects/Rating';
import {
  InvalidRequestStateError,
  MasterNotFoundError,
  RequestNotFoundError,
  UnauthorizedActionError,
} from '@/shared/errors/domain.errors';

export interface SubmitRatingResult {
  readonly review: Review;
  readonly duplicate: boolean;
  readonly avgRating: number | null;
  readonly reviewsCount: number | null;
}

export class SubmitRatingUseCase {
  public constructor(
    private readonly transactions: TransactionManager,
    private readonly requestRepo: IServiceRequestRepository,
    private readonly reviewRepo: IReviewRepository,
    private readonly masterRepo: IMasterRepository,
    private readonly logger: Logger,
  ) {}

  public async execute(dto: SubmitRatingDTO): Promise<SubmitRatingResult> {
    const payload = SubmitRatingSchema.parse(dto);
    const rating = Rating.create(payload.rating);

    const request = await this.requestRepo.findById(payload.requestId);
    if (!request) {
      throw new RequestNotFoundError(payload.requestId);
    }

    if (!request.isOwnedBy(payload.actorUserId)) {
      throw new UnauthorizedActionError('review:rate');
    }

    const masterId = request.masterId;
    if (masterId === null) {
      throw new InvalidRequestStateError(request.status, 'assigned_master');
    }

    const existing = await this.reviewRepo.findByRequestId(request.id);
    if (existing) {
      return { review: existing, duplicate: true, avgRating: null, reviewsCount: null };
    }

    const result = await this.transactions.run<SubmitRatingResult>(async (context) => {
      const reviews = this.reviewRepo.withTransaction(context);
      const masters = this.masterRepo.withTransaction(context);

      if (!(await masters.lockForRatingUpdate(masterId))) {
        throw new MasterNotFoundError(String(masterId));
      }

      const created = await reviews.create({
        requestId: request.id,
        masterId,
        clientUserId: payload.actorUserId,
        rating,
      });

      if (!created) {
        const winner = await reviews.findByRequestId(request.id);
        if (!winner) {
          throw new InvalidRequestStateError('review_missing', 'review_present');
        }

        return { review: winner, duplicate: true, avgRating: null, reviewsCount: null };
      }

      const aggregate = await reviews.getAggregate(masterId);
      await masters.updateRatingStats(masterId, aggregate.average ?? 0, aggregate.count);

      return { review: created, duplicate: false, avgRating: aggregate.average, reviewsCount: aggregate.count };
    });

    if (!result.duplicate) {
      this.logger.info(
        { requestId: request.id, masterId, rating: rating.getValue(), avgRating: result.avgRating },
        'Оценка сохранена.',
      );
    }

    return result;
  }
}
