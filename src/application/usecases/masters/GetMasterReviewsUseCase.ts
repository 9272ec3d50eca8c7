// ============================================================================
// src/application/usecases/masters/GetMasterReviewsUseCase.ts
// ============================================================================

import { type MasterLookupDTO, MasterLookupSchema } from '@/application/dto/master.dto';
import type { IMasterRepository } from '@/domain/repositories/IMasterRepository';
import type { IReviewRepository, RatingDistribution } from '@/domain/repositories/IReviewRepository';
import { REVIEW_LIMITS } from '@/shared/config/constants';
import { MasterNotFoundError } from '@/shared/errors/domain.errors';
import { truncateText } from '@/shared/utils/text';

export interface ReviewPreview {
  readonly requestId: number;
  readonly rating: number;
  readonly comment: string;
  readonly createdAt: Date;
}

export interface MasterReviewsOverview {
  readonly average: number | null;
  readonly count: number;
  readonly distribution: RatingDistribution;
  readonly latest: ReadonlyArray<ReviewPreview>;
}

export class GetMasterReviewsUseCase {
  public constructor(
    private readonly masterRepo: IMasterRepository,
    private readonly reviewRepo: IReviewRepository,
  ) {}

  public async execute(dto: MasterLookupDTO): Promise<MasterReviewsOverview> {
    const { userId } = MasterLookupSchema.parse(dto);

    const master = await this.masterRepo.findByUserId(userId);
    if (!master) {
      throw new MasterNotFoundError(userId);
    }

    const [aggregate, distribution, latest] = await Promise.all([
      this.reviewRepo.getAggregate(master.id),
      this.reviewRepo.getDistribution(master.id),
      this.reviewRepo.listLatestWithComment(master.id, REVIEW_LIMITS.latestShown),
    ]);

    return {
      average: aggregate.average,
      count: aggregate.count,
      distribution,
      latest: latest.map((review) => ({
        requestId: review.requestId,
        rating: review.rating.getValue(),
        comment: truncateText(review.comment ?? '', REVIEW_LIMITS.previewLength),
        createdAt: review.createdAt,
      })),
    };
  }
}
