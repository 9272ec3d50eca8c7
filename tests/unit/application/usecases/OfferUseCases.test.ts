import { beforeEach, describe, expect, it, vi } from 'vitest';

import { BroadcastOffersUseCase } from '@/application/usecases/offers/BroadcastOffersUseCase';
import { ClaimOfferUseCase } from '@/application/usecases/offers/ClaimOfferUseCase';
import { SkipOfferUseCase } from '@/application/usecases/offers/SkipOfferUseCase';
import { OfferStatus } from '@/domain/value-objects/OfferStatus';
import { RequestStatus } from '@/domain/value-objects/RequestStatus';
import { InMemoryRateLimiter } from '@/infrastructure/rate-limit/InMemoryRateLimiter';
import {
  OfferNotFoundError,
  QuotaExhaustedError,
  RateLimitExceededError,
  RequestAlreadyTakenError,
  UnauthorizedActionError,
} from '@/shared/errors/domain.errors';

import {
  buildRequest,
  CLIENT_ID,
  MASTER_USER_ID,
  masterProps,
  NOW,
  OTHER_MASTER_USER_ID,
  requestProps,
  STRANGER_ID,
} from '../../../support/fixtures';
import { createInMemoryMarketplace } from '../../../support/InMemoryMarketplace';
import { silentLogger } from '../../../support/logger';
import { RecordingNotifier } from '../../../support/RecordingNotifier';

const FUTURE = new Date('2024-06-01T00:00:00.000Z');

const setup = () => {
  const marketplace = createInMemoryMarketplace(() => NOW);
  const notifier = new RecordingNotifier();
  const rateLimiter = new InMemoryRateLimiter(() => NOW.getTime());
  const claim = new ClaimOfferUseCase(
    marketplace.transactions,
    marketplace.offerRepo,
    marketplace.requestRepo,
    marketplace.masterRepo,
    notifier,
    rateLimiter,
    silentLogger,
    () => NOW,
  );
  const skip = new SkipOfferUseCase(marketplace.offerRepo, marketplace.masterRepo, rateLimiter, silentLogger);

  return { ...marketplace, notifier, rateLimiter, claim, skip };
};

describe('ClaimOfferUseCase', () => {
  let ctx: ReturnType<typeof setup>;

  beforeEach(() => {
    ctx = setup();
    ctx.store.insertMaster(masterProps({ id: 1 }));
    ctx.store.insertMaster(masterProps({ id: 2, userId: OTHER_MASTER_USER_ID, fullName: 'Олег Сидоров' }));
    ctx.store.insertRequest(requestProps({ id: 10 }));
  });

  it('assigns the request, debits one free order and notifies everyone', async () => {
    const offer = ctx.store.insertOffer(10, 1);

    const result = await ctx.claim.execute({ offerId: offer.id, actorUserId: MASTER_USER_ID });

    expect(result.usedSubscription).toBe(false);
    expect(result.master.freeOrdersLeft).toBe(2);
    expect(result.request.status).toBe(RequestStatus.ASSIGNED);
    expect(ctx.store.request(10)).toMatchObject({ status: RequestStatus.ASSIGNED, masterId: 1 });
    expect(ctx.store.master(1)?.freeOrdersLeft).toBe(2);
    expect(ctx.store.offer(offer.id)?.status).toBe(OfferStatus.TAKEN);
    expect(ctx.notifier.kinds()).toEqual(['notifyClientAssigned', 'sendAssignment']);
    expect(ctx.notifier.of('notifyClientAssigned')[0]?.recipient).toBe(CLIENT_ID);
    expect(ctx.notifier.adminNotices.map((notice) => notice.kind)).toEqual(['request_assigned']);
  });

  it('does not touch the free balance when a subscription is active', async () => {
    ctx.store.insertMaster(masterProps({ id: 1, freeOrdersLeft: 0, subUntil: FUTURE }));
    const offer = ctx.store.insertOffer(10, 1);

    const result = await ctx.claim.execute({ offerId: offer.id, actorUserId: MASTER_USER_ID });

    expect(result.usedSubscription).toBe(true);
    expect(ctx.store.master(1)?.freeOrdersLeft).toBe(0);
  });

  it('rejects a master with no free orders and rolls the transaction back', async () => {
    ctx.store.insertMaster(masterProps({ id: 1, freeOrdersLeft: 0 }));
    const offer = ctx.store.insertOffer(10, 1);

    await expect(ctx.claim.execute({ offerId: offer.id, actorUserId: MASTER_USER_ID })).rejects.toBeInstanceOf(
      QuotaExhaustedError,
    );

    expect(ctx.store.request(10)?.status).toBe(RequestStatus.NEW);
    expect(ctx.store.offer(offer.id)?.status).toBe(OfferStatus.SENT);
    expect(ctx.transactions.rollbacks).toBe(1);
    expect(ctx.notifier.sent).toEqual([]);
  });

  it.each([2, 6])('lets exactly one of %i concurrent claims win', async (contenders) => {
    const claimants = Array.from({ length: contenders }, (_, index) => {
      const id = index + 1;
      const userId = `90000000000000000${id}`;
      ctx.store.insertMaster(masterProps({ id, userId, fullName: `Мастер ${id}` }));
      return { id, userId, offerId: ctx.store.insertOffer(10, id).id };
    });
    // Every transaction reads the request before any of them commits.
    vi.spyOn(ctx.requestRepo, 'findById').mockResolvedValue(buildRequest({ id: 10 }));
    const assignIfNew = vi.spyOn(ctx.requestRepo, 'assignIfNew');

    const outcomes = await Promise.allSettled(
      claimants.map((claimant) => ctx.claim.execute({ offerId: claimant.offerId, actorUserId: claimant.userId })),
    );

    const fulfilled = outcomes.filter((outcome) => outcome.status === 'fulfilled');
    const rejected = outcomes.flatMap((outcome) => (outcome.status === 'rejected' ? [outcome.reason] : []));

    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(contenders - 1);
    for (const reason of rejected) {
      expect(reason).toBeInstanceOf(RequestAlreadyTakenError);
    }

    expect(assignIfNew).toHaveBeenCalledTimes(contenders);
    const assignResults = await Promise.all(assignIfNew.mock.results.map((result) => result.value));
    expect(assignResults.filter(Boolean)).toHaveLength(1);

    const winnerId = ctx.store.request(10)?.masterId;
    for (const claimant of claimants) {
      expect(ctx.store.master(claimant.id)?.freeOrdersLeft).toBe(claimant.id === winnerId ? 2 : 3);
      expect(ctx.store.offer(claimant.offerId)?.status).toBe(
        claimant.id === winnerId ? OfferStatus.TAKEN : OfferStatus.SENT,
      );
    }
    expect(ctx.transactions.rollbacks).toBe(contenders - 1);
    expect(ctx.notifier.of('sendAssignment')).toHaveLength(1);
  });

  it('loses the compare-and-set when the request was taken after it was read', async () => {
    const offer = ctx.store.insertOffer(10, 1);
    ctx.store.insertRequest(requestProps({ id: 10, status: RequestStatus.ASSIGNED, masterId: 2 }));
    vi.spyOn(ctx.requestRepo, 'findById').mockResolvedValueOnce(buildRequest({ id: 10 }));

    await expect(ctx.claim.execute({ offerId: offer.id, actorUserId: MASTER_USER_ID })).rejects.toBeInstanceOf(
      RequestAlreadyTakenError,
    );

    expect(ctx.store.request(10)?.masterId).toBe(2);
    expect(ctx.store.master(1)?.freeOrdersLeft).toBe(3);
  });

  it('refuses offers addressed to another master', async () => {
    const offer = ctx.store.insertOffer(10, 2);

    await expect(ctx.claim.execute({ offerId: offer.id, actorUserId: MASTER_USER_ID })).rejects.toBeInstanceOf(
      UnauthorizedActionError,
    );
    await expect(ctx.claim.execute({ offerId: offer.id, actorUserId: STRANGER_ID })).rejects.toBeInstanceOf(
      UnauthorizedActionError,
    );
  });

  it('reports unknown offers', async () => {
    await expect(ctx.claim.execute({ offerId: 999, actorUserId: MASTER_USER_ID })).rejects.toBeInstanceOf(
      OfferNotFoundError,
    );
  });

  it('limits offer actions to ten per hour', async () => {
    for (let attempt = 0; attempt < 10; attempt += 1) {
      await expect(ctx.claim.execute({ offerId: 999, actorUserId: MASTER_USER_ID })).rejects.toBeInstanceOf(
        OfferNotFoundError,
      );
    }

    await expect(ctx.claim.execute({ offerId: 999, actorUserId: MASTER_USER_ID })).rejects.toBeInstanceOf(
      RateLimitExceededError,
    );
  });
});

describe('SkipOfferUseCase', () => {
  it('marks a sent offer as skipped once', async () => {
    const ctx = setup();
    ctx.store.insertMaster(masterProps({ id: 1 }));
    ctx.store.insertRequest(requestProps({ id: 10 }));
    const offer = ctx.store.insertOffer(10, 1);

    const first = await ctx.skip.execute({ offerId: offer.id, actorUserId: MASTER_USER_ID });
    const second = await ctx.skip.execute({ offerId: offer.id, actorUserId: MASTER_USER_ID });

    expect(first).toEqual({ offerId: offer.id, status: OfferStatus.SKIPPED, changed: true });
    expect(second).toEqual({ offerId: offer.id, status: OfferStatus.SKIPPED, changed: false });
  });

  it('still lets the master claim a skipped offer while the request is open', async () => {
    const ctx = setup();
    ctx.store.insertMaster(masterProps({ id: 1 }));
    ctx.store.insertRequest(requestProps({ id: 10 }));
    const offer = ctx.store.insertOffer(10, 1, OfferStatus.SKIPPED);

    await ctx.claim.execute({ offerId: offer.id, actorUserId: MASTER_USER_ID });

    expect(ctx.store.offer(offer.id)?.status).toBe(OfferStatus.TAKEN);
  });

  it('refuses to skip someone else’s offer', async () => {
    const ctx = setup();
    ctx.store.insertMaster(masterProps({ id: 1 }));
    ctx.store.insertRequest(requestProps({ id: 10 }));
    const offer = ctx.store.insertOffer(10, 1);

    await expect(ctx.skip.execute({ offerId: offer.id, actorUserId: STRANGER_ID })).rejects.toBeInstanceOf(
      UnauthorizedActionError,
    );
  });
});

describe('BroadcastOffersUseCase', () => {
  it('offers the request to matching masters and deactivates unreachable ones', async () => {
    const ctx = setup();
    ctx.store.insertMaster(masterProps({ id: 1 }));
    ctx.store.insertMaster(masterProps({ id: 2, userId: OTHER_MASTER_USER_ID }));
    ctx.store.insertMaster(masterProps({ id: 3, userId: STRANGER_ID, categories: ['🧹 Уборка'] }));
    ctx.notifier.outcomes.set(OTHER_MASTER_USER_ID, 'unreachable');
    const broadcast = new BroadcastOffersUseCase(ctx.masterRepo, ctx.offerRepo, ctx.notifier, silentLogger, () => NOW);

    const summary = await broadcast.execute(ctx.store.insertRequest(requestProps({ id: 10 })));

    expect(summary).toEqual({ requestId: 10, matched: 2, offered: 1, deactivated: 1, failed: 1 });
    expect(ctx.notifier.of('sendOffer').map((entry) => entry.recipient)).toEqual([MASTER_USER_ID, OTHER_MASTER_USER_ID]);
    expect(ctx.store.master(2)?.isActive).toBe(false);
    expect(ctx.store.master(1)?.isActive).toBe(true);
  });

  it('keeps going when one recipient fails transiently', async () => {
    const ctx = setup();
    ctx.store.insertMaster(masterProps({ id: 1 }));
    ctx.store.insertMaster(masterProps({ id: 2, userId: OTHER_MASTER_USER_ID }));
    ctx.notifier.outcomes.set(MASTER_USER_ID, 'failed');
    const broadcast = new BroadcastOffersUseCase(ctx.masterRepo, ctx.offerRepo, ctx.notifier, silentLogger, () => NOW);

    const summary = await broadcast.execute(ctx.store.insertRequest(requestProps({ id: 10 })));

    expect(summary).toEqual({ requestId: 10, matched: 2, offered: 1, deactivated: 0, failed: 1 });
    expect(ctx.store.master(1)?.isActive).toBe(true);
  });
});
