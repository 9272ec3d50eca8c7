// ============================================================================
// src/domain/repositories/IReviewRepository.ts
// ============================================================================

import type { Review } from '@/domain/entities/Review';
import type { Transactional } from '@/domain/repositories/transaction';
import type { Rating } from '@/domain/value-objects/Rating';

export interface NewReview {
  readonly requestId: number;
  readonly masterId: number;
  readonly clientUserId: string;
  readonly rating: Rating;
}

export interface RatingAggregate {
  readonly average: number | null;
  readonly count: number;
}

/** Number of reviews per star value, keys 1 to 5. */
export type RatingDistribution = Readonly<Record<1 | 2 | 3 | 4 | 5, number>>;

export interface IReviewRepository extends Transactional<IReviewRepository> {
  /** Inserts the review. Resolves `null` when the request already has one. */
  create(data: NewReview): Promise<Review | null>;
  findByRequestId(requestId: number): Promise<Review | null>;
  updateComment(requestId: number, comment: string): Promise<boolean>;
  getAggregate(masterId: number): Promise<RatingAggregate>;
  getDistribution(masterId: number): Promise<RatingDistribution>;
  listLatestWithComment(masterId: number, limit: number): Promise<Review[]>;
  count(): Promise<number>;
}
