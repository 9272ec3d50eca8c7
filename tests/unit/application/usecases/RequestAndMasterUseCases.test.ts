import { beforeEach, describe, expect, it } from 'vitest';
import { ZodError } from 'zod';

import { GetRateLimitStatusUseCase } from '@/application/usecases/account/GetRateLimitStatusUseCase';
import { GetServiceStatsUseCase } from '@/application/usecases/admin/GetServiceStatsUseCase';
import { GrantEntitlementUseCase } from '@/application/usecases/billing/GrantEntitlementUseCase';
import { FileComplaintUseCase } from '@/application/usecases/complaints/FileComplaintUseCase';
import { AttachVerificationDocumentsUseCase } from '@/application/usecases/masters/AttachVerificationDocumentsUseCase';
import { GetMasterCabinetUseCase } from '@/application/usecases/masters/GetMasterCabinetUseCase';
import { GetMasterReviewsUseCase } from '@/application/usecases/masters/GetMasterReviewsUseCase';
import { RegisterMasterUseCase } from '@/application/usecases/masters/RegisterMasterUseCase';
import { BroadcastOffersUseCase } from '@/application/usecases/offers/BroadcastOffersUseCase';
import { CreateServiceRequestUseCase } from '@/application/usecases/requests/CreateServiceRequestUseCase';
import { GetClientRequestsUseCase } from '@/application/usecases/requests/GetClientRequestsUseCase';
import { ComplaintRole } from '@/domain/value-objects/ComplaintRole';
import { MasterLevel } from '@/domain/value-objects/MasterLevel';
import { OfferStatus } from '@/domain/value-objects/OfferStatus';
import { Rating } from '@/domain/value-objects/Rating';
import { RequestStatus } from '@/domain/value-objects/RequestStatus';
import { InMemoryRateLimiter } from '@/infrastructure/rate-limit/InMemoryRateLimiter';
import {
  DuplicateMasterProfileError,
  MasterNotFoundError,
  RateLimitExceededError,
  UnknownPaymentPayloadError,
} from '@/shared/errors/domain.errors';

import {
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
  const { requestRepo, masterRepo, offerRepo, reviewRepo, complaintRepo } = marketplace;
  const broadcast = new BroadcastOffersUseCase(masterRepo, offerRepo, notifier, silentLogger, () => NOW);

  return {
    ...marketplace,
    notifier,
    rateLimiter,
    createRequest: new CreateServiceRequestUseCase(requestRepo, broadcast, rateLimiter, notifier, silentLogger),
    register: new RegisterMasterUseCase(masterRepo, rateLimiter, notifier, silentLogger),
    attachDocuments: new AttachVerificationDocumentsUseCase(masterRepo, silentLogger),
    cabinet: new GetMasterCabinetUseCase(masterRepo, offerRepo, requestRepo, () => NOW),
    reviews: new GetMasterReviewsUseCase(masterRepo, reviewRepo),
    grant: new GrantEntitlementUseCase(masterRepo, notifier, silentLogger, () => NOW),
    stats: new GetServiceStatsUseCase(masterRepo, requestRepo, reviewRepo, complaintRepo, () => NOW),
    fileComplaint: new FileComplaintUseCase(complaintRepo, rateLimiter, notifier, silentLogger),
    clientRequests: new GetClientRequestsUseCase(requestRepo),
    limits: new GetRateLimitStatusUseCase(rateLimiter),
  };
};

const requestForm = {
  clientUserId: CLIENT_ID,
  clientName: 'Анна',
  contact: '+79990000000',
  category: 'remont',
  address: 'ул. Ленина, 1',
  description: 'Починить кран',
  desiredTime: 'завтра вечером',
};

const registrationForm = {
  userId: MASTER_USER_ID,
  fullName: 'Иван Петров',
  phone: '8 (999) 123-45-67',
  categories: ['remont', 'uborka'],
  experienceBucket: '1-3',
  taxId: '1234567890',
};

describe('CreateServiceRequestUseCase', () => {
  let ctx: ReturnType<typeof setup>;

  beforeEach(() => {
    ctx = setup();
    ctx.store.insertMaster(masterProps({ id: 1 }));
  });

  it('stores the request under its category label and broadcasts it', async () => {
    const { request, broadcast } = await ctx.createRequest.execute(requestForm);

    expect(request.category).toBe('🛠 Ремонт');
    expect(request.status).toBe(RequestStatus.NEW);
    expect(broadcast).toEqual({ requestId: request.id, matched: 1, offered: 1, deactivated: 0, failed: 0 });
    expect(ctx.notifier.adminNotices.map((notice) => notice.kind)).toEqual(['request_created']);
    expect(ctx.notifier.of('sendOffer')[0]?.recipient).toBe(MASTER_USER_ID);
  });

  it('still stores the request when no master matches', async () => {
    const { request, broadcast } = await ctx.createRequest.execute({ ...requestForm, category: 'pereezd' });

    expect(broadcast.matched).toBe(0);
    expect(ctx.store.request(request.id)?.category).toBe('🚚 Переезд');
  });

  it('allows three requests per hour', async () => {
    for (let attempt = 0; attempt < 3; attempt += 1) {
      await ctx.createRequest.execute(requestForm);
    }

    await expect(ctx.createRequest.execute(requestForm)).rejects.toThrow(
      new RateLimitExceededError('new_request', 60 * 60 * 1000),
    );
  });

  it('rejects unknown categories before touching storage', async () => {
    await expect(ctx.createRequest.execute({ ...requestForm, category: 'cooking' })).rejects.toBeInstanceOf(ZodError);
    expect(ctx.store.tables.requests.size).toBe(0);
  });
});

describe('RegisterMasterUseCase', () => {
  it('creates a candidate profile with normalized data and the starting free orders', async () => {
    const ctx = setup();

    const master = await ctx.register.execute(registrationForm);

    expect(master).toMatchObject({
      phone: '+79991234567',
      categories: ['🛠 Ремонт', '🧹 Уборка'],
      level: MasterLevel.CANDIDATE,
      freeOrdersLeft: 3,
    });
    expect(ctx.notifier.adminNotices.map((notice) => notice.kind)).toEqual(['master_registered']);
  });

  it('refuses a second profile for the same user', async () => {
    const ctx = setup();
    await ctx.register.execute(registrationForm);

    await expect(ctx.register.execute(registrationForm)).rejects.toBeInstanceOf(DuplicateMasterProfileError);
  });

  it('allows one registration attempt per day', async () => {
    const ctx = setup();
    const master = await ctx.register.execute(registrationForm);
    ctx.store.tables.masters.delete(master.id);

    await expect(ctx.register.execute(registrationForm)).rejects.toBeInstanceOf(RateLimitExceededError);
  });
});

describe('master self-service', () => {
  let ctx: ReturnType<typeof setup>;

  beforeEach(() => {
    ctx = setup();
    ctx.store.insertMaster(masterProps({ id: 1, subUntil: FUTURE, freeOrdersLeft: 2 }));
  });

  it('merges attached documents into the profile', async () => {
    await ctx.attachDocuments.execute({ userId: MASTER_USER_ID, passportScan: 'https://cdn.test/passport.jpg' });
    await ctx.attachDocuments.execute({ userId: MASTER_USER_ID, facePhoto: 'https://cdn.test/face.jpg' });

    expect(ctx.store.master(1)?.documents).toEqual({
      passportScan: 'https://cdn.test/passport.jpg',
      facePhoto: 'https://cdn.test/face.jpg',
      selfEmploymentDoc: null,
    });
  });

  it('requires a profile before documents are attached', async () => {
    await expect(
      ctx.attachDocuments.execute({ userId: STRANGER_ID, facePhoto: 'https://cdn.test/face.jpg' }),
    ).rejects.toBeInstanceOf(MasterNotFoundError);
  });

  it('summarizes entitlements, offers and recent orders in the cabinet', async () => {
    ctx.store.insertRequest(requestProps({ id: 10, status: RequestStatus.ASSIGNED, masterId: 1 }));
    ctx.store.insertRequest(requestProps({ id: 11, status: RequestStatus.COMPLETED, masterId: 1 }));
    ctx.store.insertRequest(requestProps({ id: 12 }));
    ctx.store.insertOffer(10, 1, OfferStatus.TAKEN);
    ctx.store.insertOffer(11, 1, OfferStatus.TAKEN);
    ctx.store.insertOffer(12, 1, OfferStatus.SKIPPED);

    const cabinet = await ctx.cabinet.execute({ userId: MASTER_USER_ID });

    expect(cabinet.subscription).toEqual({ active: true, until: FUTURE });
    expect(cabinet.priority).toEqual({ active: false, until: null });
    expect(cabinet.freeOrdersLeft).toBe(2);
    expect(cabinet.freeOrdersStart).toBe(3);
    expect(cabinet.offers).toEqual({ [OfferStatus.SENT]: 0, [OfferStatus.TAKEN]: 2, [OfferStatus.SKIPPED]: 1 });
    expect(cabinet.recentOrders.map((order) => order.id)).toEqual([11, 10]);
  });

  it('shows the rating distribution and trimmed latest comments', async () => {
    for (const [requestId, value] of [
      [10, 5],
      [11, 4],
      [12, 5],
    ] as const) {
      ctx.store.insertRequest(requestProps({ id: requestId, status: RequestStatus.COMPLETED, masterId: 1 }));
      await ctx.reviewRepo.create({ requestId, masterId: 1, clientUserId: CLIENT_ID, rating: Rating.create(value) });
    }
    await ctx.reviewRepo.updateComment(10, 'а'.repeat(200));
    await ctx.reviewRepo.updateComment(12, 'Отлично');

    const overview = await ctx.reviews.execute({ userId: MASTER_USER_ID });

    expect(overview.average).toBe(4.7);
    expect(overview.count).toBe(3);
    expect(overview.distribution).toEqual({ 1: 0, 2: 0, 3: 0, 4: 1, 5: 2 });
    expect(overview.latest.map((review) => review.requestId)).toEqual([12, 10]);
    expect(overview.latest[1]?.comment).toBe(`${'а'.repeat(149)}…`);
  });
});

describe('admin use cases', () => {
  let ctx: ReturnType<typeof setup>;

  beforeEach(() => {
    ctx = setup();
    ctx.store.insertMaster(masterProps({ id: 1 }));
    ctx.store.insertMaster(masterProps({ id: 2, userId: OTHER_MASTER_USER_ID, isActive: false, level: MasterLevel.VERIFIED }));
  });

  it('grants a pin for seven days and tells the admin', async () => {
    const result = await ctx.grant.execute({ masterUserId: MASTER_USER_ID, payload: 'pin_7d', providerChargeId: 'ch_1' });

    expect(result).toEqual({
      masterId: 1,
      payload: 'pin_7d',
      kind: 'pin',
      until: new Date('2024-05-17T12:00:00.000Z'),
    });
    expect(ctx.store.master(1)?.pinUntil).toEqual(new Date('2024-05-17T12:00:00.000Z'));
    expect(ctx.notifier.adminNotices).toHaveLength(1);
  });

  it('rejects unknown payment payloads', async () => {
    await expect(ctx.grant.execute({ masterUserId: MASTER_USER_ID, payload: 'gold_1y' })).rejects.toBeInstanceOf(
      UnknownPaymentPayloadError,
    );
    expect(ctx.store.master(1)?.pinUntil).toBeNull();
  });

  it('rejects payments for users without a profile', async () => {
    await expect(ctx.grant.execute({ masterUserId: STRANGER_ID, payload: 'sub_30d' })).rejects.toBeInstanceOf(
      MasterNotFoundError,
    );
  });

  it('counts masters, requests, reviews and complaints', async () => {
    ctx.store.insertRequest(requestProps({ id: 10 }));
    ctx.store.insertRequest(requestProps({ id: 11, status: RequestStatus.COMPLETED, masterId: 1 }));
    await ctx.reviewRepo.create({ requestId: 11, masterId: 1, clientUserId: CLIENT_ID, rating: Rating.create(5) });
    await ctx.fileComplaint.execute({ reporterUserId: CLIENT_ID, role: ComplaintRole.CLIENT, text: 'Мастер не пришёл' });

    const stats = await ctx.stats.execute();

    expect(stats.masters).toEqual({
      total: 2,
      active: 1,
      byLevel: { [MasterLevel.CANDIDATE]: 1, [MasterLevel.CHECKED]: 0, [MasterLevel.VERIFIED]: 1 },
      activeSubscriptions: 0,
    });
    expect(stats.requests.total).toBe(2);
    expect(stats.requests.byStatus[RequestStatus.COMPLETED]).toBe(1);
    expect(stats.reviews).toBe(1);
    expect(stats.complaints).toBe(1);
  });
});

describe('FileComplaintUseCase', () => {
  const complaintForm = {
    reporterUserId: CLIENT_ID,
    role: ComplaintRole.CLIENT,
    requestId: '#12',
    masterId: '',
    text: '  Мастер опоздал на три часа  ',
  };

  it('stores the complaint and forwards it to the admin', async () => {
    const ctx = setup();

    const complaint = await ctx.fileComplaint.execute(complaintForm);

    expect(complaint).toMatchObject({
      reporterUserId: CLIENT_ID,
      reporterRole: ComplaintRole.CLIENT,
      requestId: 12,
      masterId: null,
      text: 'Мастер опоздал на три часа',
      createdAt: NOW,
    });
    expect(ctx.store.tables.complaints.size).toBe(1);
    expect(ctx.notifier.adminNotices).toEqual([{ kind: 'complaint_filed', complaint }]);
  });

  it('keeps the complaint when the admin channel is unreachable', async () => {
    const ctx = setup();
    ctx.notifier.adminOutcome = 'unreachable';

    await ctx.fileComplaint.execute(complaintForm);

    expect(ctx.store.tables.complaints.size).toBe(1);
  });

  it('allows five complaints per day', async () => {
    const ctx = setup();
    for (let attempt = 0; attempt < 5; attempt += 1) {
      await ctx.fileComplaint.execute(complaintForm);
    }

    await expect(ctx.fileComplaint.execute(complaintForm)).rejects.toThrow(
      new RateLimitExceededError('complaint', 24 * 60 * 60 * 1000),
    );
    expect(ctx.store.tables.complaints.size).toBe(5);
  });

  it('rejects order numbers that are not digits', async () => {
    const ctx = setup();

    await expect(ctx.fileComplaint.execute({ ...complaintForm, requestId: 'вчерашний' })).rejects.toBeInstanceOf(
      ZodError,
    );
    expect(ctx.store.tables.complaints.size).toBe(0);
  });

  it('needs at least five characters of description after trimming', async () => {
    const ctx = setup();

    await expect(ctx.fileComplaint.execute({ ...complaintForm, text: ' плохо ' })).resolves.toBeDefined();
    await expect(ctx.fileComplaint.execute({ ...complaintForm, text: 'ну' })).rejects.toBeInstanceOf(ZodError);
  });
});

describe('GetClientRequestsUseCase', () => {
  it('splits the client requests into active and completed, newest first', async () => {
    const ctx = setup();
    ctx.store.insertRequest(requestProps({ id: 1, status: RequestStatus.COMPLETED }));
    ctx.store.insertRequest(requestProps({ id: 2, status: RequestStatus.ASSIGNED }));
    ctx.store.insertRequest(requestProps({ id: 3, clientUserId: STRANGER_ID }));
    ctx.store.insertRequest(requestProps({ id: 4, status: RequestStatus.PENDING_CONFIRMATION }));

    const overview = await ctx.clientRequests.execute({ userId: CLIENT_ID });

    expect(overview.active.total).toBe(2);
    expect(overview.active.shown.map((request) => request.id)).toEqual([4, 2]);
    expect(overview.completed.total).toBe(1);
    expect(overview.completed.shown.map((request) => request.id)).toEqual([1]);
  });

  it('shows at most five requests per group but counts them all', async () => {
    const ctx = setup();
    for (let id = 1; id <= 7; id += 1) {
      ctx.store.insertRequest(requestProps({ id }));
    }

    const overview = await ctx.clientRequests.execute({ userId: CLIENT_ID });

    expect(overview.active.total).toBe(7);
    expect(overview.active.shown.map((request) => request.id)).toEqual([7, 6, 5, 4, 3]);
    expect(overview.completed).toEqual({ total: 0, shown: [] });
  });
});

describe('GetRateLimitStatusUseCase', () => {
  it('reports full limits for a new user', () => {
    const ctx = setup();

    const statuses = ctx.limits.execute({ userId: CLIENT_ID });

    expect(statuses.map(({ action, remaining, resetInMs }) => ({ action, remaining, resetInMs }))).toEqual([
      { action: 'new_request', remaining: 3, resetInMs: 0 },
      { action: 'master_registration', remaining: 1, resetInMs: 0 },
      { action: 'complaint', remaining: 5, resetInMs: 0 },
      { action: 'offer_actions', remaining: 10, resetInMs: 0 },
    ]);
  });

  it('reflects used actions without recording new ones', async () => {
    const ctx = setup();
    await ctx.createRequest.execute(requestForm);

    const first = ctx.limits.execute({ userId: CLIENT_ID });
    const second = ctx.limits.execute({ userId: CLIENT_ID });

    expect(first[0]).toEqual({
      action: 'new_request',
      limit: 3,
      windowMs: 60 * 60 * 1000,
      remaining: 2,
      resetInMs: 60 * 60 * 1000,
    });
    expect(second).toEqual(first);
  });
});
