// ============================================================================
// src/shared/utils/discord.utils.ts
// ============================================================================

import { EMBED_LIMITS } from '@/shared/config/constants';
import { truncateText } from '@/shared/utils/text';

const EMPTY_FIELD = '—';

export const clampEmbedField = (value: string): string => {
  const trimmed = value.trim();
  return trimmed.length > 0 ? truncateText(trimmed, EMBED_LIMITS.fieldValue) : EMPTY_FIELD;
};

export const splitIntoEmbedFields = (value: string, size: number = EMBED_LIMITS.fieldValue): string[] => {
  const chunks: string[] = [];

  for (let index = 0; index < value.length; index += size) {
    chunks.push(value.slice(index, index + size));
  }

  return chunks;
};

export const userMention = (userId: string): string => `<@${userId}>`;
