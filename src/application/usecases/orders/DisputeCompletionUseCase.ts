// ============================================================================
// src/application/usecases/orders/DisputeCompletionUseCase.ts
// ============================================================================

import type { Logger } from 'pino';

import { type OrderActionDTO, OrderActionSchema } from '@/application/dto/order.dto';
import type { MarketplaceNotifier } from '@/application/ports/MarketplaceNotifier';
import type { IMasterRepository } from '@/domain/repositories/IMasterRepository';
import type { IServiceRequestRepository } from '@/domain/repositories/IServiceRequestRepository';
import { RequestStatus } from '@/domain/value-objects/RequestStatus';
import {
  InvalidRequestStateError,
  RequestNotFoundError,
  UnauthorizedActionError,
} from '@/shared/errors/domain.errors';

export type DisputeCompletionOutcome = 'disputed' | 'already_disputed';

export class DisputeCompletionUseCase {
  public constructor(
    private readonly requestRepo: IServiceRequestRepository,
    private readonly masterRepo: IMasterRepository,
    private readonly notifier: MarketplaceNotifier,
    private readonly logger: Logger,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  public async execute(dto: OrderActionDTO): Promise<DisputeCompletionOutcome> {
    const payload = OrderActionSchema.parse(dto);

    const request = await this.requestRepo.findById(payload.requestId);
    if (!request) {
      throw new RequestNotFoundError(payload.requestId);
    }

    if (!request.isOwnedBy(payload.actorUserId)) {
      throw new UnauthorizedActionError('order:dispute');
    }

    if (request.status === RequestStatus.ASSIGNED) {
      return 'already_disputed';
    }

    request.assertCanTransitionTo(RequestStatus.ASSIGNED);

    const moved = await this.requestRepo.transitionStatus(
      request.id,
      RequestStatus.PENDING_CONFIRMATION,
      RequestStatus.ASSIGNED,
      this.clock(),
    );
    if (!moved) {
      throw new InvalidRequestStateError(request.status, RequestStatus.PENDING_CONFIRMATION);
    }

    const disputed = request.with({ status: RequestStatus.ASSIGNED, pendingSince: null });
    const master = request.masterId !== null ? await this.masterRepo.findById(request.masterId) : null;

    const admin = await this.notifier.notifyAdmin({ kind: 'completion_disputed', request: disputed, master });
    const masterOutcome = master ? await this.notifier.notifyMasterDisputed(master, disputed) : 'failed';

    if (admin !== 'delivered' || masterOutcome !== 'delivered') {
      this.logger.warn(
        { requestId: request.id, admin, master: masterOutcome },
        'Не все участники получили уведомление о споре.',
      );
    }

    this.logger.warn({ requestId: request.id, masterId: request.masterId }, 'Клиент сообщил о проблеме с заказом.');

    return 'disputed';
  }
}
