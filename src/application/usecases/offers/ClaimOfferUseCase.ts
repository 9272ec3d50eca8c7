// ============================================================================
// src/application/usecases/offers/ClaimOfferUseCase.ts
// ============================================================================

import type { Logger } from 'pino';

import { type OfferActionDTO, OfferActionSchema } from '@/application/dto/order.dto';
import type { MarketplaceNotifier } from '@/application/ports/MarketplaceNotifier';
import type { RateLimitPolicy } from '@/application/ports/RateLimitPolicy';
import { enforceRateLimit } from '@/application/services/rateLimit';
import type { Master } from '@/domain/entities/Master';
import type { ServiceRequest } from '@/domain/entities/ServiceRequest';
import type { IMasterRepository } from '@/domain/repositories/IMasterRepository';
import type { IOfferRepository } from '@/domain/repositories/IOfferRepository';
import type { IServiceRequestRepository } from '@/domain/repositories/IServiceRequestRepository';
import type { TransactionManager } from '@/domain/repositories/transaction';
import { OfferStatus } from '@/domain/value-objects/OfferStatus';
import { RequestStatus } from '@/domain/value-objects/RequestStatus';
import { ENTITLEMENTS, RATE_LIMITS } from '@/shared/config/constants';
import {
  OfferNotFoundError,
  QuotaExhaustedError,
  RequestAlreadyTakenError,
  RequestNotFoundError,
  UnauthorizedActionError,
} from '@/shared/errors/domain.errors';

export interface ClaimOfferResult {
  readonly request: ServiceRequest;
  readonly master: Master;
  readonly usedSubscription: boolean;
}

export class ClaimOfferUseCase {
  public constructor(
    private readonly transactions: TransactionManager,
    private readonly offerRepo: IOfferRepository,
    private readonly requestRepo: IServiceRequestRepository,
    private readonly masterRepo: IMasterRepository,
    private readonly notifier: MarketplaceNotifier,
    private readonly rateLimiter: RateLimitPolicy,
    private readonly logger: Logger,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  public async execute(dto: OfferActionDTO): Promise<ClaimOfferResult> {
    const payload = OfferActionSchema.parse(dto);
    enforceRateLimit(this.rateLimiter, RATE_LIMITS.offerActions, payload.actorUserId);

    const now = this.clock();

    const result = await this.transactions.run<ClaimOfferResult>(async (context) => {
      const offers = this.offerRepo.withTransaction(context);
      const requests = this.requestRepo.withTransaction(context);
      const masters = this.masterRepo.withTransaction(context);

      const offer = await offers.findById(payload.offerId);
      if (!offer) {
        throw new OfferNotFoundError(payload.offerId);
      }

      const master = await masters.findByUserId(payload.actorUserId);
      if (!master || !offer.belongsTo(master.id)) {
        throw new UnauthorizedActionError('offer:claim');
      }

      const request = await requests.findById(offer.requestId);
      if (!request) {
        throw new RequestNotFoundError(offer.requestId);
      }

      if (!request.isOpenForClaims()) {
        throw new RequestAlreadyTakenError(request.id);
      }

      const usedSubscription = master.hasActiveSubscription(now);
      if (!master.canClaim(now)) {
        throw new QuotaExhaustedError(master.id, ENTITLEMENTS.freeOrdersStart);
      }

      // Affected rows decide the winner among concurrent claims.
      const assigned = await requests.assignIfNew(request.id, master.id);
      if (!assigned) {
        throw new RequestAlreadyTakenError(request.id);
      }

      if (!usedSubscription) {
        const debited = await masters.debitFreeOrder(master.id);
        if (!debited) {
          throw new QuotaExhaustedError(master.id, ENTITLEMENTS.freeOrdersStart);
        }
      }

      if (offer.status !== OfferStatus.TAKEN) {
        await offers.transitionStatus(offer.id, offer.status, OfferStatus.TAKEN);
      }

      return {
        request: request.with({ status: RequestStatus.ASSIGNED, masterId: master.id }),
        master: usedSubscription ? master : master.with({ freeOrdersLeft: master.freeOrdersLeft - 1 }),
        usedSubscription,
      };
    });

    this.logger.info(
      {
        requestId: result.request.id,
        masterId: result.master.id,
        usedSubscription: result.usedSubscription,
        freeOrdersLeft: result.master.freeOrdersLeft,
      },
      'Заказ взят мастером.',
    );

    await this.notifyParticipants(result.request, result.master);

    return result;
  }

  private async notifyParticipants(request: ServiceRequest, master: Master): Promise<void> {
    const [client, assignment, admin] = await Promise.all([
      this.notifier.notifyClientAssigned(request, master),
      this.notifier.sendAssignment(master, request),
      this.notifier.notifyAdmin({ kind: 'request_assigned', request, master }),
    ]);

    if (client !== 'delivered' || assignment !== 'delivered' || admin !== 'delivered') {
      this.logger.warn(
        { requestId: request.id, masterId: master.id, client, assignment, admin },
        'Часть уведомлений о назначении не доставлена.',
      );
    }
  }
}
