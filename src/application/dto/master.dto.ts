// ============================================================================
// src/application/dto/master.dto.ts
// ============================================================================

import { z } from 'zod';

import { ServiceCategorySchema } from '@/application/dto/request.dto';
import { isExperienceBucket } from '@/shared/config/constants';
import { SnowflakeSchema } from '@/shared/utils/validation';

/**
 * Accepts Russian mobile numbers written as `+7XXXXXXXXXX`, `7XXXXXXXXXX`,
 * `8XXXXXXXXXX` or `9XXXXXXXXX` with any separators, and returns `+7XXXXXXXXXX`.
 */
export const normalizePhone = (raw: string): string | null => {
  const digits = raw.replace(/\D/gu, '');

  if (digits.length === 11 && (digits.startsWith('7') || digits.startsWith('8'))) {
    return `+7${digits.slice(1)}`;
  }

  if (digits.length === 10 && digits.startsWith('9')) {
    return `+7${digits}`;
  }

  return null;
};

const optionalText = (max: number) =>
  z
    .string()
    .trim()
    .max(max)
    .optional()
    .transform((value) => (value ? value : null));

export const PhoneSchema = z.string().transform((value, ctx) => {
  const phone = normalizePhone(value);
  if (!phone) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Номер телефона должен быть в формате +7XXXXXXXXXX.' });
    return z.NEVER;
  }

  return phone;
});

export const RegisterMasterSchema = z.object({
  userId: SnowflakeSchema,
  fullName: z.string().trim().min(2, 'Укажите имя и фамилию.').max(100),
  phone: PhoneSchema,
  categories: z
    .array(ServiceCategorySchema)
    .min(1, 'Выберите хотя бы одну категорию.')
    .max(2, 'Можно выбрать не более двух категорий.')
    .refine((values) => new Set(values).size === values.length, { message: 'Категории не должны повторяться.' }),
  experienceBucket: z
    .string()
    .refine(isExperienceBucket, { message: 'Неизвестный вариант опыта.' })
    .optional()
    .transform((value) => value ?? null),
  experienceText: optionalText(500),
  portfolio: optionalText(500),
  references: optionalText(500),
  taxId: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : null))
    .refine((value) => value === null || /^(?:\d{10}|\d{12})$/u.test(value), {
      message: 'ИНН должен содержать 10 или 12 цифр.',
    }),
});

export type RegisterMasterDTO = z.input<typeof RegisterMasterSchema>;

const DocumentReferenceSchema = z
  .string()
  .trim()
  .url('Ссылка на документ должна быть URL.')
  .max(512)
  .optional();

export const AttachDocumentsSchema = z
  .object({
    userId: SnowflakeSchema,
    passportScan: DocumentReferenceSchema,
    facePhoto: DocumentReferenceSchema,
    selfEmploymentDoc: DocumentReferenceSchema,
  })
  .refine((value) => Boolean(value.passportScan || value.facePhoto || value.selfEmploymentDoc), {
    message: 'Приложите хотя бы один документ.',
  });

export type AttachDocumentsDTO = z.input<typeof AttachDocumentsSchema>;

export const MasterLookupSchema = z.object({
  userId: SnowflakeSchema,
});

export type MasterLookupDTO = z.input<typeof MasterLookupSchema>;
