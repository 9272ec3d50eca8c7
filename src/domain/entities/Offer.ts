// ============================================================================
// src/domain/entities/Offer.ts
// ============================================================================

import { OfferStatus } from '@/domain/value-objects/OfferStatus';

export class Offer {
  public constructor(
    public readonly id: number,
    public readonly requestId: number,
    public readonly masterId: number,
    public readonly status: OfferStatus,
    public readonly createdAt: Date,
  ) {}

  public isResolved(): boolean {
    return this.status !== OfferStatus.SENT;
  }

  public belongsTo(masterId: number): boolean {
    return this.masterId === masterId;
  }
}
