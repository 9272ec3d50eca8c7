// ============================================================================
// src/domain/repositories/IOfferRepository.ts
// ============================================================================

import type { Offer } from '@/domain/entities/Offer';
import type { Transactional } from '@/domain/repositories/transaction';
import type { OfferStatus } from '@/domain/value-objects/OfferStatus';

export type OfferCounts = Readonly<Record<OfferStatus, number>>;

export interface IOfferRepository extends Transactional<IOfferRepository> {
  create(requestId: number, masterId: number): Promise<Offer>;
  findById(id: number): Promise<Offer | null>;
  transitionStatus(offerId: number, from: OfferStatus, to: OfferStatus): Promise<boolean>;
  countByMaster(masterId: number): Promise<OfferCounts>;
}
