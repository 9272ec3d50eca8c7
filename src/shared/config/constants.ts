// ============================================================================
// src/shared/config/constants.ts
// ============================================================================

export const COLORS = Object.freeze({
  primary: 0x2f80ed,
  success: 0x27ae60,
  warning: 0xf2c94c,
  danger: 0xeb5757,
  info: 0x56ccf2,
  neutral: 0x2a2d43,
});

export const EMBED_LIMITS = Object.freeze({
  title: 256,
  description: 4096,
  fieldName: 256,
  fieldValue: 1024,
  footerText: 2048,
  maxFields: 25,
});

export const MODAL_LIMITS = Object.freeze({
  textInput: 1024,
  title: 45,
  customId: 100,
  maxComponents: 5,
});

export const SERVICE_CATEGORIES = Object.freeze([
  { code: 'remont', title: 'Ремонт', emoji: '🛠' },
  { code: 'uborka', title: 'Уборка', emoji: '🧹' },
  { code: 'pereezd', title: 'Переезд', emoji: '🚚' },
  { code: 'krasota', title: 'Красота', emoji: '💅' },
  { code: 'person', title: 'Персонал', emoji: '👶' },
] as const);

export type ServiceCategoryCode = (typeof SERVICE_CATEGORIES)[number]['code'];

export const isServiceCategoryCode = (value: string): value is ServiceCategoryCode =>
  SERVICE_CATEGORIES.some((category) => category.code === value);

/** Label stored on requests and master profiles, e.g. `🛠 Ремонт`. */
export const serviceCategoryLabel = (code: ServiceCategoryCode): string => {
  const category = SERVICE_CATEGORIES.find((entry) => entry.code === code);
  return category ? `${category.emoji} ${category.title}` : code;
};

export const EXPERIENCE_BUCKETS = Object.freeze({
  '<=1': 'до 1 года',
  '1-3': '1–3 года',
  '3-5': '3–5 лет',
  '5-10': '5–10 лет',
  '>10': 'более 10 лет',
} as const);

export type ExperienceBucket = keyof typeof EXPERIENCE_BUCKETS;

export const isExperienceBucket = (value: string): value is ExperienceBucket => value in EXPERIENCE_BUCKETS;

export const MATCHING = Object.freeze({
  maxOffersPerRequest: 5,
});

export const ENTITLEMENTS = Object.freeze({
  freeOrdersStart: 3,
});

export const RATE_LIMITS = Object.freeze({
  newRequest: { action: 'new_request', limit: 3, windowMs: 60 * 60 * 1000 },
  masterRegistration: { action: 'master_registration', limit: 1, windowMs: 24 * 60 * 60 * 1000 },
  offerActions: { action: 'offer_actions', limit: 10, windowMs: 60 * 60 * 1000 },
  complaint: { action: 'complaint', limit: 5, windowMs: 24 * 60 * 60 * 1000 },
});

export type RateLimitRule = (typeof RATE_LIMITS)[keyof typeof RATE_LIMITS];

export const REVIEW_LIMITS = Object.freeze({
  commentMaxLength: 500,
  previewLength: 150,
  latestShown: 5,
});

export const SWEEP_REPORT = Object.freeze({
  maxDetailLines: 10,
  maxLength: 4000,
});

export const CLIENT_REQUESTS = Object.freeze({
  fetchLimit: 20,
  shownPerGroup: 5,
});

export const COMPLAINT_LIMITS = Object.freeze({
  textMinLength: 5,
  textMaxLength: 1_000,
});
