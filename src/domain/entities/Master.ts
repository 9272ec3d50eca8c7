// ============================================================================
// src/domain/entities/Master.ts
// ============================================================================

import { categoryMatches } from '@/domain/services/CategoryMatcher';
import { isGrantActive } from '@/domain/value-objects/Entitlement';
import { type MasterLevel, masterLevelRank } from '@/domain/value-objects/MasterLevel';
import type { SkillTier } from '@/domain/value-objects/SkillTier';

export interface VerificationDocuments {
  readonly passportScan: string | null;
  readonly facePhoto: string | null;
  readonly selfEmploymentDoc: string | null;
}

export const EMPTY_DOCUMENTS: VerificationDocuments = Object.freeze({
  passportScan: null,
  facePhoto: null,
  selfEmploymentDoc: null,
});

export interface MasterProps {
  readonly id: number;
  readonly userId: string;
  readonly fullName: string;
  readonly phone: string;
  readonly level: MasterLevel;
  readonly categories: ReadonlyArray<string>;
  readonly experienceBucket: string | null;
  readonly experienceText: string | null;
  readonly portfolio: string | null;
  readonly references: string | null;
  readonly taxId: string | null;
  readonly freeOrdersLeft: number;
  readonly subUntil: Date | null;
  readonly priorityUntil: Date | null;
  readonly pinUntil: Date | null;
  readonly isActive: boolean;
  readonly ordersCompleted: number;
  readonly skillTier: SkillTier;
  readonly avgRating: number;
  readonly reviewsCount: number;
  readonly documents: VerificationDocuments;
  readonly createdAt: Date;
}

export class Master {
  public constructor(private readonly props: MasterProps) {}

  public get id(): number {
    return this.props.id;
  }

  public get userId(): string {
    return this.props.userId;
  }

  public get fullName(): string {
    return this.props.fullName;
  }

  public get phone(): string {
    return this.props.phone;
  }

  public get level(): MasterLevel {
    return this.props.level;
  }

  public get categories(): ReadonlyArray<string> {
    return this.props.categories;
  }

  public get freeOrdersLeft(): number {
    return this.props.freeOrdersLeft;
  }

  public get subUntil(): Date | null {
    return this.props.subUntil;
  }

  public get priorityUntil(): Date | null {
    return this.props.priorityUntil;
  }

  public get pinUntil(): Date | null {
    return this.props.pinUntil;
  }

  public get isActive(): boolean {
    return this.props.isActive;
  }

  public get ordersCompleted(): number {
    return this.props.ordersCompleted;
  }

  public get skillTier(): SkillTier {
    return this.props.skillTier;
  }

  public get avgRating(): number {
    return this.props.avgRating;
  }

  public get reviewsCount(): number {
    return this.props.reviewsCount;
  }

  public get documents(): VerificationDocuments {
    return this.props.documents;
  }

  public get createdAt(): Date {
    return this.props.createdAt;
  }

  public get levelRank(): number {
    return masterLevelRank(this.props.level);
  }

  public hasActiveSubscription(now: Date): boolean {
    return isGrantActive(this.props.subUntil, now);
  }

  public hasActivePriority(now: Date): boolean {
    return isGrantActive(this.props.priorityUntil, now);
  }

  public hasActivePin(now: Date): boolean {
    return isGrantActive(this.props.pinUntil, now);
  }

  /** Whether a claim right now would be covered by the subscription or the free balance. */
  public canClaim(now: Date): boolean {
    return this.hasActiveSubscription(now) || this.props.freeOrdersLeft > 0;
  }

  public matchesCategory(requestCategory: string): boolean {
    return categoryMatches(this.props.categories, requestCategory);
  }

  public hasDocuments(): boolean {
    const { passportScan, facePhoto, selfEmploymentDoc } = this.props.documents;
    return Boolean(passportScan || facePhoto || selfEmploymentDoc);
  }

  public toProps(): MasterProps {
    return { ...this.props };
  }

  public with(changes: Partial<Omit<MasterProps, 'id' | 'userId' | 'createdAt'>>): Master {
    return new Master({ ...this.props, ...changes });
  }
}
