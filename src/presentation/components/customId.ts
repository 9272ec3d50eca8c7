// ============================================================================
// src/presentation/components/customId.ts
// ============================================================================

export const CUSTOM_ID_VERSION = 'v1';

export const encodeNumericId = (value: number): string => value.toString(36);

export const decodeNumericId = (fragment: string | undefined): number | null => {
  if (!fragment || !/^[0-9a-z]+$/u.test(fragment)) {
    return null;
  }

  const value = Number.parseInt(fragment, 36);
  return Number.isSafeInteger(value) && value > 0 ? value : null;
};

export const buildCustomId = (prefix: string, ...segments: ReadonlyArray<string>): string =>
  [prefix, CUSTOM_ID_VERSION, ...segments].join(':');

/** Returns the segments after the version, or `null` when the prefix or version differ. */
export const splitCustomId = (customId: string, prefix: string): string[] | null => {
  const [head, version, ...segments] = customId.split(':');

  if (head !== prefix || version !== CUSTOM_ID_VERSION) {
    return null;
  }

  return segments;
};
