// ============================================================================
// src/container.ts
// ============================================================================

import type { MarketplaceNotifier } from '@/application/ports/MarketplaceNotifier';
import type { RateLimitPolicy } from '@/application/ports/RateLimitPolicy';
import { OrderCompletionService } from '@/application/services/OrderCompletionService';
import { ReconciliationSweep, type SweepSettings } from '@/application/services/ReconciliationSweep';
import { ReviewPromptService } from '@/application/services/ReviewPromptService';
import { GetServiceStatsUseCase } from '@/application/usecases/admin/GetServiceStatsUseCase';
import { GetRateLimitStatusUseCase } from '@/application/usecases/account/GetRateLimitStatusUseCase';
import { GrantEntitlementUseCase } from '@/application/usecases/billing/GrantEntitlementUseCase';
import { FileComplaintUseCase } from '@/application/usecases/complaints/FileComplaintUseCase';
import { AttachVerificationDocumentsUseCase } from '@/application/usecases/masters/AttachVerificationDocumentsUseCase';
import { GetMasterCabinetUseCase } from '@/application/usecases/masters/GetMasterCabinetUseCase';
import { GetMasterReviewsUseCase } from '@/application/usecases/masters/GetMasterReviewsUseCase';
import { RegisterMasterUseCase } from '@/application/usecases/masters/RegisterMasterUseCase';
import { BroadcastOffersUseCase } from '@/application/usecases/offers/BroadcastOffersUseCase';
import { ClaimOfferUseCase } from '@/application/usecases/offers/ClaimOfferUseCase';
import { SkipOfferUseCase } from '@/application/usecases/offers/SkipOfferUseCase';
import { ConfirmCompletionUseCase } from '@/application/usecases/orders/ConfirmCompletionUseCase';
import { DisputeCompletionUseCase } from '@/application/usecases/orders/DisputeCompletionUseCase';
import { MarkWorkDoneUseCase } from '@/application/usecases/orders/MarkWorkDoneUseCase';
import { CreateServiceRequestUseCase } from '@/application/usecases/requests/CreateServiceRequestUseCase';
import { GetClientRequestsUseCase } from '@/application/usecases/requests/GetClientRequestsUseCase';
import { SkipReviewUseCase } from '@/application/usecases/reviews/SkipReviewUseCase';
import { SubmitRatingUseCase } from '@/application/usecases/reviews/SubmitRatingUseCase';
import { SubmitReviewCommentUseCase } from '@/application/usecases/reviews/SubmitReviewCommentUseCase';
import type { IComplaintRepository } from '@/domain/repositories/IComplaintRepository';
import type { IMasterRepository } from '@/domain/repositories/IMasterRepository';
import type { IOfferRepository } from '@/domain/repositories/IOfferRepository';
import type { IReviewRepository } from '@/domain/repositories/IReviewRepository';
import type { IServiceRequestRepository } from '@/domain/repositories/IServiceRequestRepository';
import type { TransactionManager } from '@/domain/repositories/transaction';
import { registerCompletionButtons } from '@/presentation/components/buttons/CompletionButtons';
import { registerOfferButtons } from '@/presentation/components/buttons/OfferButtons';
import { registerReviewButtons } from '@/presentation/components/buttons/ReviewButtons';
import { registerComplaintModal } from '@/presentation/components/modals/ComplaintModal';
import { registerMasterRegistrationModal } from '@/presentation/components/modals/MasterRegistrationModal';
import { registerReviewCommentModal } from '@/presentation/components/modals/ReviewCommentModal';
import { registerServiceRequestModal } from '@/presentation/components/modals/ServiceRequestModal';
import { createChildLogger } from '@/shared/logger/pino';

export interface MarketplaceInfrastructure {
  readonly requestRepo: IServiceRequestRepository;
  readonly masterRepo: IMasterRepository;
  readonly offerRepo: IOfferRepository;
  readonly reviewRepo: IReviewRepository;
  readonly complaintRepo: IComplaintRepository;
  readonly transactions: TransactionManager;
  readonly notifier: MarketplaceNotifier;
  readonly rateLimiter: RateLimitPolicy;
  readonly sweepSettings: SweepSettings;
  readonly clock?: () => Date;
}

export type Marketplace = ReturnType<typeof createMarketplace>;

export const createMarketplace = (infra: MarketplaceInfrastructure) => {
  const { requestRepo, masterRepo, offerRepo, reviewRepo, complaintRepo, transactions, notifier, rateLimiter } = infra;
  const clock = infra.clock ?? (() => new Date());

  const ordersLogger = createChildLogger({ module: 'orders' });
  const offersLogger = createChildLogger({ module: 'offers' });
  const reviewsLogger = createChildLogger({ module: 'reviews' });
  const mastersLogger = createChildLogger({ module: 'masters' });

  const reviewPrompts = new ReviewPromptService(requestRepo, reviewRepo, masterRepo, notifier, reviewsLogger);
  const completion = new OrderCompletionService(
    transactions,
    requestRepo,
    masterRepo,
    reviewPrompts,
    notifier,
    ordersLogger,
    clock,
  );
  const broadcastOffers = new BroadcastOffersUseCase(masterRepo, offerRepo, notifier, offersLogger, clock);

  return {
    reviewPrompts,
    completion,
    broadcastOffers,
    createRequest: new CreateServiceRequestUseCase(
      requestRepo,
      broadcastOffers,
      rateLimiter,
      notifier,
      createChildLogger({ module: 'requests' }),
    ),
    getClientRequests: new GetClientRequestsUseCase(requestRepo),
    getRateLimits: new GetRateLimitStatusUseCase(rateLimiter),
    fileComplaint: new FileComplaintUseCase(
      complaintRepo,
      rateLimiter,
      notifier,
      createChildLogger({ module: 'complaints' }),
    ),
    claimOffer: new ClaimOfferUseCase(
      transactions,
      offerRepo,
      requestRepo,
      masterRepo,
      notifier,
      rateLimiter,
      offersLogger,
      clock,
    ),
    skipOffer: new SkipOfferUseCase(offerRepo, masterRepo, rateLimiter, offersLogger),
    markWorkDone: new MarkWorkDoneUseCase(requestRepo, masterRepo, notifier, ordersLogger, clock),
    confirmCompletion: new ConfirmCompletionUseCase(requestRepo, completion, ordersLogger),
    disputeCompletion: new DisputeCompletionUseCase(requestRepo, masterRepo, notifier, ordersLogger, clock),
    submitRating: new SubmitRatingUseCase(transactions, requestRepo, reviewRepo, masterRepo, reviewsLogger),
    submitReviewComment: new SubmitReviewCommentUseCase(requestRepo, reviewRepo, reviewsLogger),
    skipReview: new SkipReviewUseCase(requestRepo, reviewsLogger),
    registerMaster: new RegisterMasterUseCase(masterRepo, rateLimiter, notifier, mastersLogger),
    attachDocuments: new AttachVerificationDocumentsUseCase(masterRepo, mastersLogger),
    getCabinet: new GetMasterCabinetUseCase(masterRepo, offerRepo, requestRepo, clock),
    getReviews: new GetMasterReviewsUseCase(masterRepo, reviewRepo),
    grantEntitlement: new GrantEntitlementUseCase(masterRepo, notifier, createChildLogger({ module: 'billing' }), clock),
    getStats: new GetServiceStatsUseCase(masterRepo, requestRepo, reviewRepo, complaintRepo, clock),
    sweep: new ReconciliationSweep(
      requestRepo,
      masterRepo,
      completion,
      rateLimiter,
      notifier,
      infra.sweepSettings,
      createChildLogger({ module: 'sweep' }),
      clock,
    ),
  };
};

export const registerComponentHandlers = (marketplace: Marketplace): void => {
  registerOfferButtons(marketplace.claimOffer, marketplace.skipOffer);
  registerCompletionButtons(marketplace);
  registerReviewButtons(marketplace.submitRating, marketplace.skipReview);
  registerReviewCommentModal(marketplace.submitReviewComment);
  registerServiceRequestModal(marketplace.createRequest);
  registerMasterRegistrationModal(marketplace.registerMaster);
  registerComplaintModal(marketplace.fileComplaint);
};
