// ============================================================================
// src/infrastructure/repositories/mysqlValues.ts
// ============================================================================

export const isDuplicateEntryError = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'ER_DUP_ENTRY';

export const toNullableDate = (value: Date | string | null): Date | null => {
  if (value === null) {
    return null;
  }

  const date = value instanceof Date ? value : new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
};

export const toDate = (value: Date | string): Date => toNullableDate(value) ?? new Date(0);
