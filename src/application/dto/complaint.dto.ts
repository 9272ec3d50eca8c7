// ============================================================================
// src/application/dto/complaint.dto.ts
// ============================================================================

import { z } from 'zod';

import { ComplaintRole } from '@/domain/value-objects/ComplaintRole';
import { COMPLAINT_LIMITS } from '@/shared/config/constants';
import { SnowflakeSchema } from '@/shared/utils/validation';

/** Accepts `12`, `#12` or an empty field; empty means the reporter does not know the number. */
const OptionalReferenceSchema = z
  .string()
  .trim()
  .regex(/^#?\d*$/u, 'Укажите номер цифрами или оставьте поле пустым.')
  .optional()
  .transform((value) => {
    const digits = value?.replace('#', '') ?? '';
    return digits.length > 0 ? Number(digits) : null;
  })
  .refine((value) => value === null || value > 0, 'Номер должен быть больше нуля.');

export const FileComplaintSchema = z.object({
  reporterUserId: SnowflakeSchema,
  role: z.nativeEnum(ComplaintRole),
  requestId: OptionalReferenceSchema,
  masterId: OptionalReferenceSchema,
  text: z
    .string()
    .trim()
    .min(COMPLAINT_LIMITS.textMinLength, 'Опишите проблему подробнее.')
    .max(COMPLAINT_LIMITS.textMaxLength),
});

export type FileComplaintDTO = z.input<typeof FileComplaintSchema>;
