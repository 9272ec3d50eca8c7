// ============================================================================
// src/application/usecases/orders/ConfirmCompletionUseCase.ts
// ============================================================================

import type { Logger } from 'pino';

import { type OrderActionDTO, OrderActionSchema } from '@/application/dto/order.dto';
import type { OrderCompletionService } from '@/application/services/OrderCompletionService';
import type { IServiceRequestRepository } from '@/domain/repositories/IServiceRequestRepository';
import { RequestStatus } from '@/domain/value-objects/RequestStatus';
import { RequestNotFoundError, UnauthorizedActionError } from '@/shared/errors/domain.errors';

export type ConfirmCompletionOutcome = 'completed' | 'already_completed';

export class ConfirmCompletionUseCase {
  public constructor(
    private readonly requestRepo: IServiceRequestRepository,
    private readonly completion: OrderCompletionService,
    private readonly logger: Logger,
  ) {}

  public async execute(dto: OrderActionDTO): Promise<ConfirmCompletionOutcome> {
    const payload = OrderActionSchema.parse(dto);

    const request = await this.requestRepo.findById(payload.requestId);
    if (!request) {
      throw new RequestNotFoundError(payload.requestId);
    }

    if (!request.isOwnedBy(payload.actorUserId)) {
      throw new UnauthorizedActionError('order:confirm');
    }

    if (request.status === RequestStatus.COMPLETED) {
      return 'already_completed';
    }

    const result = await this.completion.complete(request.id, 'client_confirmed');

    this.logger.info({ requestId: request.id, completed: result.completed }, 'Клиент подтвердил выполнение заказа.');

    return result.completed ? 'completed' : 'already_completed';
  }
}
