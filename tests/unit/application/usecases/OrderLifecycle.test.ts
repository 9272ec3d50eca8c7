import { beforeEach, describe, expect, it, vi } from 'vitest';

import { OrderCompletionService } from '@/application/services/OrderCompletionService';
import { ReviewPromptService } from '@/application/services/ReviewPromptService';
import { ConfirmCompletionUseCase } from '@/application/usecases/orders/ConfirmCompletionUseCase';
import { DisputeCompletionUseCase } from '@/application/usecases/orders/DisputeCompletionUseCase';
import { MarkWorkDoneUseCase } from '@/application/usecases/orders/MarkWorkDoneUseCase';
import { Rating } from '@/domain/value-objects/Rating';
import { RequestStatus } from '@/domain/value-objects/RequestStatus';
import { SkillTier } from '@/domain/value-objects/SkillTier';
import { InvalidRequestStateError, UnauthorizedActionError } from '@/shared/errors/domain.errors';

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

const PENDING_SINCE = new Date('2024-05-10T11:00:00.000Z');

const setup = () => {
  const marketplace = createInMemoryMarketplace(() => NOW);
  const notifier = new RecordingNotifier();
  const { requestRepo, reviewRepo, masterRepo, transactions } = marketplace;
  const reviewPrompts = new ReviewPromptService(requestRepo, reviewRepo, masterRepo, notifier, silentLogger);
  const completion = new OrderCompletionService(
    transactions,
    requestRepo,
    masterRepo,
    reviewPrompts,
    notifier,
    silentLogger,
    () => NOW,
  );

  return {
    ...marketplace,
    notifier,
    reviewPrompts,
    completion,
    markDone: new MarkWorkDoneUseCase(requestRepo, masterRepo, notifier, silentLogger, () => NOW),
    confirm: new ConfirmCompletionUseCase(requestRepo, completion, silentLogger),
    dispute: new DisputeCompletionUseCase(requestRepo, masterRepo, notifier, silentLogger, () => NOW),
  };
};

describe('order lifecycle', () => {
  let ctx: ReturnType<typeof setup>;

  beforeEach(() => {
    ctx = setup();
    ctx.store.insertMaster(masterProps({ id: 1 }));
    ctx.store.insertMaster(masterProps({ id: 2, userId: OTHER_MASTER_USER_ID }));
  });

  describe('MarkWorkDoneUseCase', () => {
    beforeEach(() => {
      ctx.store.insertRequest(requestProps({ id: 10, status: RequestStatus.ASSIGNED, masterId: 1 }));
    });

    it('moves the request to pending confirmation and prompts the client once', async () => {
      await expect(ctx.markDone.execute({ requestId: 10, actorUserId: MASTER_USER_ID })).resolves.toBe('marked');
      await expect(ctx.markDone.execute({ requestId: 10, actorUserId: MASTER_USER_ID })).resolves.toBe(
        'already_pending',
      );

      expect(ctx.store.request(10)).toMatchObject({
        status: RequestStatus.PENDING_CONFIRMATION,
        pendingSince: NOW,
      });
      expect(ctx.notifier.of('sendCompletionPrompt')).toEqual([
        { kind: 'sendCompletionPrompt', recipient: CLIENT_ID, requestId: 10 },
      ]);
    });

    it('only accepts the assigned master', async () => {
      await expect(
        ctx.markDone.execute({ requestId: 10, actorUserId: OTHER_MASTER_USER_ID }),
      ).rejects.toBeInstanceOf(UnauthorizedActionError);
      await expect(ctx.markDone.execute({ requestId: 10, actorUserId: STRANGER_ID })).rejects.toBeInstanceOf(
        UnauthorizedActionError,
      );
    });

    it('reports where a concurrent click left the request', async () => {
      ctx.store.insertRequest(
        requestProps({ id: 10, status: RequestStatus.PENDING_CONFIRMATION, masterId: 1, pendingSince: PENDING_SINCE }),
      );
      vi.spyOn(ctx.requestRepo, 'findById').mockResolvedValueOnce(
        buildRequest({ id: 10, status: RequestStatus.ASSIGNED, masterId: 1 }),
      );

      await expect(ctx.markDone.execute({ requestId: 10, actorUserId: MASTER_USER_ID })).resolves.toBe(
        'already_pending',
      );
      expect(ctx.store.request(10)?.pendingSince).toEqual(PENDING_SINCE);
      expect(ctx.notifier.sent).toEqual([]);
    });

    it('tells the master when the order is already completed', async () => {
      ctx.store.insertRequest(requestProps({ id: 10, status: RequestStatus.COMPLETED, masterId: 1 }));

      await expect(ctx.markDone.execute({ requestId: 10, actorUserId: MASTER_USER_ID })).resolves.toBe(
        'already_completed',
      );
    });
  });

  describe('ConfirmCompletionUseCase', () => {
    beforeEach(() => {
      ctx.store.insertRequest(
        requestProps({ id: 10, status: RequestStatus.PENDING_CONFIRMATION, masterId: 1, pendingSince: PENDING_SINCE }),
      );
    });

    it('completes the order, credits the master and asks for a review', async () => {
      await expect(ctx.confirm.execute({ requestId: 10, actorUserId: CLIENT_ID })).resolves.toBe('completed');

      expect(ctx.store.request(10)).toMatchObject({
        status: RequestStatus.COMPLETED,
        completedAt: NOW,
        reviewRequested: true,
      });
      expect(ctx.store.master(1)?.ordersCompleted).toBe(1);
      expect(ctx.notifier.kinds()).toEqual(['sendReviewPrompt', 'notifyMasterCompleted']);
      expect(ctx.notifier.of('notifyMasterCompleted')[0]).toEqual({
        kind: 'notifyMasterCompleted',
        recipient: MASTER_USER_ID,
        requestId: 10,
        detail: 'client_confirmed',
      });
    });

    it('is idempotent for repeated confirmations', async () => {
      await ctx.confirm.execute({ requestId: 10, actorUserId: CLIENT_ID });
      await expect(ctx.confirm.execute({ requestId: 10, actorUserId: CLIENT_ID })).resolves.toBe('already_completed');

      expect(ctx.store.master(1)?.ordersCompleted).toBe(1);
      expect(ctx.notifier.of('sendReviewPrompt')).toHaveLength(1);
    });

    it('promotes the master when the completed count crosses a tier threshold', async () => {
      ctx.store.insertMaster(masterProps({ id: 1, ordersCompleted: 19 }));

      await ctx.confirm.execute({ requestId: 10, actorUserId: CLIENT_ID });

      expect(ctx.store.master(1)).toMatchObject({ ordersCompleted: 20, skillTier: SkillTier.MASTER });
    });

    it('refuses anyone but the client', async () => {
      await expect(ctx.confirm.execute({ requestId: 10, actorUserId: MASTER_USER_ID })).rejects.toBeInstanceOf(
        UnauthorizedActionError,
      );
    });

    it('rejects confirmation before the master marked the work done', async () => {
      ctx.store.insertRequest(requestProps({ id: 10, status: RequestStatus.ASSIGNED, masterId: 1 }));

      await expect(ctx.confirm.execute({ requestId: 10, actorUserId: CLIENT_ID })).rejects.toBeInstanceOf(
        InvalidRequestStateError,
      );
      expect(ctx.transactions.rollbacks).toBe(1);
      expect(ctx.store.master(1)?.ordersCompleted).toBe(0);
    });
  });

  describe('DisputeCompletionUseCase', () => {
    beforeEach(() => {
      ctx.store.insertRequest(
        requestProps({ id: 10, status: RequestStatus.PENDING_CONFIRMATION, masterId: 1, pendingSince: PENDING_SINCE }),
      );
    });

    it('returns the request to the master and alerts the admin', async () => {
      await expect(ctx.dispute.execute({ requestId: 10, actorUserId: CLIENT_ID })).resolves.toBe('disputed');
      await expect(ctx.dispute.execute({ requestId: 10, actorUserId: CLIENT_ID })).resolves.toBe('already_disputed');

      expect(ctx.store.request(10)).toMatchObject({ status: RequestStatus.ASSIGNED, pendingSince: null });
      expect(ctx.notifier.kinds()).toEqual(['notifyMasterDisputed']);
      expect(ctx.notifier.adminNotices.map((notice) => notice.kind)).toEqual(['completion_disputed']);
    });

    it('lets the master mark the work done again after a dispute', async () => {
      await ctx.dispute.execute({ requestId: 10, actorUserId: CLIENT_ID });

      await expect(ctx.markDone.execute({ requestId: 10, actorUserId: MASTER_USER_ID })).resolves.toBe('marked');
      expect(ctx.store.request(10)?.status).toBe(RequestStatus.PENDING_CONFIRMATION);
    });

    it('cannot reopen a completed order', async () => {
      ctx.store.insertRequest(requestProps({ id: 10, status: RequestStatus.COMPLETED, masterId: 1 }));

      await expect(ctx.dispute.execute({ requestId: 10, actorUserId: CLIENT_ID })).rejects.toBeInstanceOf(
        InvalidRequestStateError,
      );
    });
  });

  describe('OrderCompletionService', () => {
    it('notifies the client about an automatic completion before asking for a review', async () => {
      ctx.store.insertRequest(
        requestProps({ id: 10, status: RequestStatus.PENDING_CONFIRMATION, masterId: 1, pendingSince: PENDING_SINCE }),
      );

      const result = await ctx.completion.complete(10, 'auto_timeout');

      expect(result.completed).toBe(true);
      expect(ctx.notifier.kinds()).toEqual(['notifyClientAutoCompleted', 'sendReviewPrompt', 'notifyMasterCompleted']);
      expect(ctx.notifier.of('notifyMasterCompleted')[0]?.detail).toBe('auto_timeout');
    });

    it('still notifies the master when the review prompt fails', async () => {
      ctx.store.insertRequest(
        requestProps({ id: 10, status: RequestStatus.PENDING_CONFIRMATION, masterId: 1, pendingSince: PENDING_SINCE }),
      );
      vi.spyOn(ctx.reviewPrompts, 'requestReview').mockRejectedValueOnce(new Error('boom'));

      await ctx.completion.complete(10, 'client_confirmed');

      expect(ctx.notifier.kinds()).toEqual(['notifyMasterCompleted']);
    });
  });

  describe('ReviewPromptService', () => {
    it('does not prompt twice for the same request', async () => {
      ctx.store.insertRequest(requestProps({ id: 10, status: RequestStatus.COMPLETED, masterId: 1 }));

      await expect(ctx.reviewPrompts.requestReview(10)).resolves.toBe('prompted');
      await expect(ctx.reviewPrompts.requestReview(10)).resolves.toBe('already_requested');
      expect(ctx.notifier.of('sendReviewPrompt')).toHaveLength(1);
    });

    it('skips requests that already have a review', async () => {
      ctx.store.insertRequest(requestProps({ id: 10, status: RequestStatus.COMPLETED, masterId: 1 }));
      await ctx.reviewRepo.create({
        requestId: 10,
        masterId: 1,
        clientUserId: CLIENT_ID,
        rating: Rating.create(5),
      });

      await expect(ctx.reviewPrompts.requestReview(10)).resolves.toBe('already_reviewed');
      expect(ctx.store.request(10)?.reviewRequested).toBe(false);
    });
  });
});
