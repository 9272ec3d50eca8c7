// ============================================================================
// src/application/services/OrderCompletionService.ts
// ============================================================================

import type { Logger } from 'pino';

import type { CompletionReason, MarketplaceNotifier } from '@/application/ports/MarketplaceNotifier';
import type { ReviewPromptService } from '@/application/services/ReviewPromptService';
import type { Master } from '@/domain/entities/Master';
import type { ServiceRequest } from '@/domain/entities/ServiceRequest';
import type { IMasterRepository } from '@/domain/repositories/IMasterRepository';
import type { IServiceRequestRepository } from '@/domain/repositories/IServiceRequestRepository';
import type { TransactionManager } from '@/domain/repositories/transaction';
import { RequestStatus } from '@/domain/value-objects/RequestStatus';
import { deriveSkillTier } from '@/domain/value-objects/SkillTier';
import { RequestNotFoundError } from '@/shared/errors/domain.errors';

export type CompletionResult =
  | { readonly completed: true; readonly request: ServiceRequest; readonly master: Master | null }
  | { readonly completed: false; readonly request: ServiceRequest };

/**
 * Moves a request from `pending_confirmation` to `completed`. Shared by the
 * client confirmation and the reconciliation sweep so both credit the master
 * exactly once.
 */
export class OrderCompletionService {
  public constructor(
    private readonly transactions: TransactionManager,
    private readonly requestRepo: IServiceRequestRepository,
    private readonly masterRepo: IMasterRepository,
    private readonly reviewPrompts: ReviewPromptService,
    private readonly notifier: MarketplaceNotifier,
    private readonly logger: Logger,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  public async complete(requestId: number, reason: CompletionReason): Promise<CompletionResult> {
    const now = this.clock();

    const result = await this.transactions.run<CompletionResult>(async (context) => {
      const requests = this.requestRepo.withTransaction(context);
      const masters = this.masterRepo.withTransaction(context);

      const request = await requests.findById(requestId);
      if (!request) {
        throw new RequestNotFoundError(requestId);
      }

      if (request.status === RequestStatus.COMPLETED) {
        return { completed: false, request };
      }

      request.assertCanTransitionTo(RequestStatus.COMPLETED);

      const moved = await requests.transitionStatus(
        requestId,
        RequestStatus.PENDING_CONFIRMATION,
        RequestStatus.COMPLETED,
        now,
      );
      if (!moved) {
        return { completed: false, request };
      }

      let master: Master | null = null;
      if (request.masterId !== null) {
        const ordersCompleted = await masters.incrementOrdersCompleted(request.masterId);
        if (ordersCompleted !== null) {
          await masters.setSkillTier(request.masterId, deriveSkillTier(ordersCompleted));
          master = await masters.findById(request.masterId);
        }
      }

      return {
        completed: true,
        request: request.with({ status: RequestStatus.COMPLETED, completedAt: now }),
        master,
      };
    });

    if (!result.completed) {
      this.logger.debug({ requestId, reason }, 'Заявка уже завершена, повторное завершение пропущено.');
      return result;
    }

    this.logger.info({ requestId, masterId: result.master?.id ?? null, reason }, 'Заявка завершена.');
    await this.afterCommit(result.request, result.master, reason);

    return result;
  }

  private async afterCommit(request: ServiceRequest, master: Master | null, reason: CompletionReason): Promise<void> {
    if (reason === 'auto_timeout') {
      const outcome = await this.notifier.notifyClientAutoCompleted(request);
      if (outcome !== 'delivered') {
        this.logger.warn({ requestId: request.id, outcome }, 'Клиент не получил уведомление об автозавершении.');
      }
    }

    try {
      await this.reviewPrompts.requestReview(request.id);
    } catch (error) {
      this.logger.error({ err: error, requestId: request.id }, 'Не удалось запросить отзыв после завершения.');
    }

    if (master) {
      const outcome = await this.notifier.notifyMasterCompleted(master, request, reason);
      if (outcome !== 'delivered') {
        this.logger.warn({ requestId: request.id, masterId: master.id, outcome }, 'Мастер не получил уведомление о завершении.');
      }
    }
  }
}
