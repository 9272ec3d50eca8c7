// ============================================================================
// src/domain/value-objects/OfferStatus.ts
// ============================================================================

export enum OfferStatus {
  SENT = 'sent',
  TAKEN = 'taken',
  SKIPPED = 'skipped',
}

const isOfferStatus = (value: string): value is OfferStatus =>
  Object.values<string>(OfferStatus).includes(value);

export const parseOfferStatus = (value: string): OfferStatus => {
  if (!isOfferStatus(value)) {
    throw new Error(`Unknown offer status: ${value}`);
  }

  return value;
};
