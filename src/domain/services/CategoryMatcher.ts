// ============================================================================
// src/domain/services/CategoryMatcher.ts
// ============================================================================

const NON_LETTERS = /[^\p{L}]/gu;

/**
 * Reduces a category label to its comparable core: the text before the first
 * `/`, letters only, lower case. `"🛠 Ремонт/отделка"` becomes `"ремонт"`.
 */
export const normalizeCategoryTag = (raw: string): string => {
  const [head = ''] = raw.split('/', 1);
  return head.replace(NON_LETTERS, '').toLowerCase();
};

export const parseCategoryList = (stored: string | null | undefined): string[] => {
  if (!stored) {
    return [];
  }

  return stored
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
};

export const joinCategoryList = (categories: ReadonlyArray<string>): string =>
  categories.map((category) => category.trim()).filter((category) => category.length > 0).join(', ');

export const categoryMatches = (masterCategories: ReadonlyArray<string>, requestCategory: string): boolean => {
  const wanted = normalizeCategoryTag(requestCategory);
  if (!wanted) {
    return false;
  }

  return masterCategories.some((category) => {
    const tag = normalizeCategoryTag(category);
    return tag.length > 0 && (tag.includes(wanted) || wanted.includes(tag));
  });
};
