// ============================================================================
// src/domain/services/MasterRanking.ts
// ============================================================================

import type { Master } from '@/domain/entities/Master';
import { MATCHING } from '@/shared/config/constants';

interface RankKey {
  readonly priority: number;
  readonly subscription: number;
  readonly level: number;
}

const rankKey = (master: Master, now: Date): RankKey => ({
  priority: master.hasActivePriority(now) ? 1 : 0,
  subscription: master.hasActiveSubscription(now) ? 1 : 0,
  level: master.levelRank,
});

const compareKeys = (left: RankKey, right: RankKey): number =>
  right.priority - left.priority || right.subscription - left.subscription || right.level - left.level;

/** Orders masters for broadcast. Ties keep the order in which they were fetched. */
export const rankMasters = (masters: ReadonlyArray<Master>, now: Date): Master[] =>
  masters
    .map((master, index) => ({ master, index, key: rankKey(master, now) }))
    .sort((left, right) => compareKeys(left.key, right.key) || left.index - right.index)
    .map(({ master }) => master);

export const selectOfferRecipients = (
  candidates: ReadonlyArray<Master>,
  requestCategory: string,
  now: Date,
  limit: number = MATCHING.maxOffersPerRequest,
): Master[] => {
  const matching = candidates.filter((master) => master.isActive && master.matchesCategory(requestCategory));
  return rankMasters(matching, now).slice(0, limit);
};
