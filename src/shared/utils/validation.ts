// ============================================================================
// src/shared/utils/validation.ts
// ============================================================================

import { z } from 'zod';

export const SnowflakeSchema = z.string().regex(/^\d{17,20}$/u, 'Некорректный Discord ID');

export const PositiveIdSchema = z.coerce.number().int().positive();
