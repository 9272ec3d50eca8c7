// ============================================================================
// src/domain/value-objects/Entitlement.ts
// ============================================================================

const DAY_MS = 24 * 60 * 60 * 1000;

export type EntitlementKind = 'subscription' | 'priority' | 'pin';

export interface EntitlementProduct {
  readonly payload: PaymentPayload;
  readonly kind: EntitlementKind;
  readonly durationDays: number;
  /** Price in kopecks, as the payment provider expects it. */
  readonly priceMinor: number;
  readonly title: string;
  readonly description: string;
}

export const PAYMENT_PAYLOADS = ['sub_30d', 'priority_30d', 'pin_7d'] as const;

export type PaymentPayload = (typeof PAYMENT_PAYLOADS)[number];

export const ENTITLEMENT_PRODUCTS: Readonly<Record<PaymentPayload, EntitlementProduct>> = Object.freeze({
  sub_30d: {
    payload: 'sub_30d',
    kind: 'subscription',
    durationDays: 30,
    priceMinor: 99_000,
    title: 'Подписка (30 дней)',
    description: 'Безлимит заказов',
  },
  priority_30d: {
    payload: 'priority_30d',
    kind: 'priority',
    durationDays: 30,
    priceMinor: 49_000,
    title: 'Приоритет (30 дней)',
    description: 'Ранний доступ к рассылкам заявок',
  },
  pin_7d: {
    payload: 'pin_7d',
    kind: 'pin',
    durationDays: 7,
    priceMinor: 19_000,
    title: 'Закреп (7 дней)',
    description: 'Выше видимость анкеты',
  },
});

export const isPaymentPayload = (value: string): value is PaymentPayload =>
  PAYMENT_PAYLOADS.some((payload) => payload === value);

export const toValidDate = (value: Date | string | null | undefined): Date | null => {
  if (value === null || value === undefined) {
    return null;
  }

  const date = value instanceof Date ? value : new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
};

/**
 * A grant is active only while its expiry lies strictly in the future.
 * Missing or unparsable expiries count as inactive.
 */
export const isGrantActive = (until: Date | string | null | undefined, now: Date): boolean => {
  const expiry = toValidDate(until);
  return expiry !== null && expiry.getTime() > now.getTime();
};

// Grants replace the previous expiry; remaining time is not carried over.
export const grantExpiry = (product: EntitlementProduct, now: Date): Date =>
  new Date(now.getTime() + product.durationDays * DAY_MS);

export const formatPrice = (priceMinor: number): string => `${Math.round(priceMinor / 100)} ₽`;
