// ============================================================================
// src/application/dto/order.dto.ts
// ============================================================================

import { z } from 'zod';

import { PositiveIdSchema, SnowflakeSchema } from '@/shared/utils/validation';

export const OfferActionSchema = z.object({
  offerId: PositiveIdSchema,
  actorUserId: SnowflakeSchema,
});

export type OfferActionDTO = z.input<typeof OfferActionSchema>;

export const OrderActionSchema = z.object({
  requestId: PositiveIdSchema,
  actorUserId: SnowflakeSchema,
});

export type OrderActionDTO = z.input<typeof OrderActionSchema>;
