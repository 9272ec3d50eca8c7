// ============================================================================
// src/domain/value-objects/MasterLevel.ts
// ============================================================================

export enum MasterLevel {
  CANDIDATE = 'candidate',
  CHECKED = 'checked',
  VERIFIED = 'verified',
}

const LEVEL_RANK: Record<MasterLevel, number> = {
  [MasterLevel.CANDIDATE]: 0,
  [MasterLevel.CHECKED]: 1,
  [MasterLevel.VERIFIED]: 2,
};

const LEVEL_LABELS: Record<MasterLevel, string> = {
  [MasterLevel.CANDIDATE]: 'Кандидат',
  [MasterLevel.CHECKED]: 'Проверенный',
  [MasterLevel.VERIFIED]: 'Верифицированный',
};

export const masterLevelRank = (level: MasterLevel): number => LEVEL_RANK[level];

export const masterLevelLabel = (level: MasterLevel): string => LEVEL_LABELS[level];

const isMasterLevel = (value: string): value is MasterLevel =>
  Object.values<string>(MasterLevel).includes(value);

export const parseMasterLevel = (value: string): MasterLevel =>
  isMasterLevel(value) ? value : MasterLevel.CANDIDATE;
