// ============================================================================
// src/application/usecases/orders/MarkWorkDoneUseCase.ts
// ============================================================================

import type { Logger } from 'pino';

import { type OrderActionDTO, OrderActionSchema } from '@/application/dto/order.dto';
import type { MarketplaceNotifier } from '@/application/ports/MarketplaceNotifier';
import type { IMasterRepository } from '@/domain/repositories/IMasterRepository';
import type { IServiceRequestRepository } from '@/domain/repositories/IServiceRequestRepository';
import { RequestStatus } from '@/domain/value-objects/RequestStatus';
import { RequestNotFoundError, UnauthorizedActionError } from '@/shared/errors/domain.errors';

export type MarkWorkDoneOutcome = 'marked' | 'already_pending' | 'already_completed';

const outcomeForStatus = (status: RequestStatus): MarkWorkDoneOutcome | null => {
  switch (status) {
    case RequestStatus.COMPLETED:
      return 'already_completed';
    case RequestStatus.PENDING_CONFIRMATION:
      return 'already_pending';
    default:
      return null;
  }
};

export class MarkWorkDoneUseCase {
  public constructor(
    private readonly requestRepo: IServiceRequestRepository,
    private readonly masterRepo: IMasterRepository,
    private readonly notifier: MarketplaceNotifier,
    private readonly logger: Logger,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  public async execute(dto: OrderActionDTO): Promise<MarkWorkDoneOutcome> {
    const payload = OrderActionSchema.parse(dto);

    const request = await this.requestRepo.findById(payload.requestId);
    if (!request) {
      throw new RequestNotFoundError(payload.requestId);
    }

    const master = await this.masterRepo.findByUserId(payload.actorUserId);
    if (!master || !request.isAssignedTo(master.id)) {
      throw new UnauthorizedActionError('order:mark_done');
    }

    const settled = outcomeForStatus(request.status);
    if (settled) {
      return settled;
    }

    request.assertCanTransitionTo(RequestStatus.PENDING_CONFIRMATION);

    const now = this.clock();
    const moved = await this.requestRepo.transitionStatus(
      request.id,
      RequestStatus.ASSIGNED,
      RequestStatus.PENDING_CONFIRMATION,
      now,
    );

    if (!moved) {
      // A concurrent click already moved it; report where it ended up.
      const current = await this.requestRepo.findById(request.id);
      return (current && outcomeForStatus(current.status)) ?? 'already_pending';
    }

    const pending = request.with({ status: RequestStatus.PENDING_CONFIRMATION, pendingSince: now });
    const outcome = await this.notifier.sendCompletionPrompt(pending, master);
    if (outcome !== 'delivered') {
      this.logger.warn({ requestId: request.id, outcome }, 'Клиент не получил запрос на подтверждение.');
    }

    this.logger.info({ requestId: request.id, masterId: master.id }, 'Мастер отметил заказ выполненным.');

    return 'marked';
  }
}
