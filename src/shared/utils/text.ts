// ============================================================================
// src/shared/utils/text.ts
// ============================================================================

const ELLIPSIS = '…';

export const truncateText = (value: string, maxLength: number): string => {
  if (value.length <= maxLength) {
    return value;
  }

  if (maxLength <= ELLIPSIS.length) {
    return value.slice(0, maxLength);
  }

  return `${value.slice(0, maxLength - ELLIPSIS.length)}${ELLIPSIS}`;
};

/**
 * Keeps the first `maxLines` entries and replaces the rest with a single
 * "… и ещё N" line.
 */
export const clipLines = (lines: ReadonlyArray<string>, maxLines: number): string[] => {
  if (lines.length <= maxLines) {
    return [...lines];
  }

  return [...lines.slice(0, maxLines), `${ELLIPSIS} и ещё ${lines.length - maxLines}`];
};

export const formatDate = (value: Date): string => value.toISOString().slice(0, 10);

export const formatDateTime = (value: Date): string => `${value.toISOString().slice(0, 16).replace('T', ' ')} UTC`;
