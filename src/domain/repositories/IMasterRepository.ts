// ============================================================================
// src/domain/repositories/IMasterRepository.ts
// ============================================================================

import type { Master, VerificationDocuments } from '@/domain/entities/Master';
import type { Transactional } from '@/domain/repositories/transaction';
import type { EntitlementKind } from '@/domain/value-objects/Entitlement';
import type { MasterLevel } from '@/domain/value-objects/MasterLevel';
import type { SkillTier } from '@/domain/value-objects/SkillTier';

export interface NewMaster {
  readonly userId: string;
  readonly fullName: string;
  readonly phone: string;
  readonly categories: ReadonlyArray<string>;
  readonly experienceBucket: string | null;
  readonly experienceText: string | null;
  readonly portfolio: string | null;
  readonly references: string | null;
  readonly taxId: string | null;
  readonly freeOrdersLeft: number;
}

export interface MasterStats {
  readonly total: number;
  readonly active: number;
  readonly byLevel: Readonly<Record<MasterLevel, number>>;
  readonly activeSubscriptions: number;
}

export interface IMasterRepository extends Transactional<IMasterRepository> {
  create(data: NewMaster): Promise<Master>;
  findById(id: number): Promise<Master | null>;
  findByUserId(userId: string): Promise<Master | null>;
  /** Active masters in storage order; ranking relies on that order for ties. */
  listActive(): Promise<Master[]>;
  deactivate(masterId: number): Promise<void>;
  /** Guarded `free_orders_left - 1`. Resolves `false` when the balance is already zero. */
  debitFreeOrder(masterId: number): Promise<boolean>;
  /** Increments `orders_completed` and resolves the new count, or `null` for an unknown master. */
  incrementOrdersCompleted(masterId: number): Promise<number | null>;
  setSkillTier(masterId: number, tier: SkillTier): Promise<void>;
  /**
   * Takes the row lock that serializes rating recomputation for one master.
   * Resolves `false` for an unknown master.
   */
  lockForRatingUpdate(masterId: number): Promise<boolean>;
  updateRatingStats(masterId: number, avgRating: number, reviewsCount: number): Promise<void>;
  setEntitlement(masterId: number, kind: EntitlementKind, until: Date): Promise<void>;
  attachDocuments(masterId: number, documents: Partial<VerificationDocuments>): Promise<void>;
  listWithDocumentsCreatedBefore(cutoff: Date): Promise<Master[]>;
  clearDocuments(masterId: number): Promise<void>;
  getStats(now: Date): Promise<MasterStats>;
}
