// ============================================================================
// src/application/dto/review.dto.ts
// ============================================================================

import { z } from 'zod';

import { REVIEW_LIMITS } from '@/shared/config/constants';
import { PositiveIdSchema, SnowflakeSchema } from '@/shared/utils/validation';

export const SubmitRatingSchema = z.object({
  requestId: PositiveIdSchema,
  actorUserId: SnowflakeSchema,
  rating: z.number().int().min(1).max(5),
});

export type SubmitRatingDTO = z.input<typeof SubmitRatingSchema>;

export const SubmitReviewCommentSchema = z.object({
  requestId: PositiveIdSchema,
  actorUserId: SnowflakeSchema,
  comment: z
    .string()
    .trim()
    .min(1, 'Отзыв не может быть пустым.')
    .max(REVIEW_LIMITS.commentMaxLength, `Отзыв не может быть длиннее ${REVIEW_LIMITS.commentMaxLength} символов.`),
});

export type SubmitReviewCommentDTO = z.input<typeof SubmitReviewCommentSchema>;
