// ============================================================================
// src/domain/entities/Review.ts
// ============================================================================

import type { Rating } from '@/domain/value-objects/Rating';

export class Review {
  public constructor(
    public readonly id: number,
    public readonly requestId: number,
    public readonly masterId: number,
    public readonly clientUserId: string,
    public readonly rating: Rating,
    public readonly comment: string | null,
    public readonly createdAt: Date,
  ) {}

  public hasComment(): boolean {
    return this.comment !== null && this.comment.length > 0;
  }
}
