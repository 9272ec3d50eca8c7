// ============================================================================
// src/application/dto/request.dto.ts
// ============================================================================

import { z } from 'zod';

import { isServiceCategoryCode } from '@/shared/config/constants';
import { SnowflakeSchema } from '@/shared/utils/validation';

export const ServiceCategorySchema = z
  .string()
  .trim()
  .refine(isServiceCategoryCode, { message: 'Неизвестная категория услуг.' });

export const CreateServiceRequestSchema = z.object({
  clientUserId: SnowflakeSchema,
  clientName: z.string().trim().min(1, 'Укажите имя.').max(100),
  contact: z.string().trim().min(3, 'Укажите контакт для связи.').max(100),
  category: ServiceCategorySchema,
  address: z.string().trim().min(5, 'Адрес слишком короткий.').max(200),
  description: z.string().trim().min(1, 'Опишите задачу.').max(1_000),
  desiredTime: z.string().trim().min(1, 'Укажите удобное время.').max(100),
});

export type CreateServiceRequestDTO = z.input<typeof CreateServiceRequestSchema>;

export const ClientLookupSchema = z.object({
  userId: SnowflakeSchema,
});

export type ClientLookupDTO = z.input<typeof ClientLookupSchema>;
