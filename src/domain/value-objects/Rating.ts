// ============================================================================
// src/domain/value-objects/Rating.ts
// ============================================================================

import { InvalidRatingError } from '@/shared/errors/domain.errors';

export class Rating {
  private constructor(private readonly value: number) {}

  public static create(value: number): Rating {
    if (!Number.isInteger(value) || value < 1 || value > 5) {
      throw new InvalidRatingError(value);
    }

    return new Rating(value);
  }

  public getValue(): number {
    return this.value;
  }

  public toStars(): string {
    return `${'⭐'.repeat(this.value)}${'☆'.repeat(5 - this.value)}`;
  }
}

export const roundRating = (value: number): number => Math.round(value * 10) / 10;

export const averageRating = (ratings: ReadonlyArray<number>): number | null => {
  if (ratings.length === 0) {
    return null;
  }

  const sum = ratings.reduce((total, rating) => total + rating, 0);
  return roundRating(sum / ratings.length);
};

export const formatRatingStars = (rating: number): string => {
  const full = Math.floor(rating);
  const half = rating - full >= 0.5;
  const empty = 5 - full - (half ? 1 : 0);

  return `${'⭐'.repeat(full)}${half ? '✨' : ''}${'☆'.repeat(Math.max(0, empty))}`;
};
