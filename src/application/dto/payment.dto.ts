// ============================================================================
// src/application/dto/payment.dto.ts
// ============================================================================

import { z } from 'zod';

import { SnowflakeSchema } from '@/shared/utils/validation';

export const GrantEntitlementSchema = z.object({
  masterUserId: SnowflakeSchema,
  payload: z.string().trim().min(1),
  providerChargeId: z
    .string()
    .trim()
    .max(128)
    .optional()
    .transform((value) => (value ? value : null)),
});

export type GrantEntitlementDTO = z.input<typeof GrantEntitlementSchema>;
