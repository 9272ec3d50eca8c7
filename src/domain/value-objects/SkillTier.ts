// ============================================================================
// src/domain/value-objects/SkillTier.ts
// ============================================================================

export enum SkillTier {
  NOVICE = 'novice',
  MASTER = 'master',
  PROFESSIONAL = 'professional',
}

const TIER_LABELS: Record<SkillTier, string> = {
  [SkillTier.NOVICE]: 'Новичок',
  [SkillTier.MASTER]: 'Мастер',
  [SkillTier.PROFESSIONAL]: 'Профессионал',
};

export const deriveSkillTier = (ordersCompleted: number): SkillTier => {
  if (ordersCompleted < 20) {
    return SkillTier.NOVICE;
  }

  if (ordersCompleted < 50) {
    return SkillTier.MASTER;
  }

  return SkillTier.PROFESSIONAL;
};

export const skillTierLabel = (tier: SkillTier): string => TIER_LABELS[tier];

const isSkillTier = (value: string): value is SkillTier =>
  Object.values<string>(SkillTier).includes(value);

export const parseSkillTier = (value: string): SkillTier =>
  isSkillTier(value) ? value : SkillTier.NOVICE;
