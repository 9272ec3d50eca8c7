// ============================================================================
// src/application/usecases/offers/BroadcastOffersUseCase.ts
// ============================================================================

import type { Logger } from 'pino';

import type { MarketplaceNotifier } from '@/application/ports/MarketplaceNotifier';
import type { ServiceRequest } from '@/domain/entities/ServiceRequest';
import type { IMasterRepository } from '@/domain/repositories/IMasterRepository';
import type { IOfferRepository } from '@/domain/repositories/IOfferRepository';
import { selectOfferRecipients } from '@/domain/services/MasterRanking';

export interface BroadcastSummary {
  readonly requestId: number;
  readonly matched: number;
  readonly offered: number;
  readonly deactivated: number;
  readonly failed: number;
}

export class BroadcastOffersUseCase {
  public constructor(
    private readonly masterRepo: IMasterRepository,
    private readonly offerRepo: IOfferRepository,
    private readonly notifier: MarketplaceNotifier,
    private readonly logger: Logger,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  public async execute(request: ServiceRequest): Promise<BroadcastSummary> {
    const candidates = await this.masterRepo.listActive();
    const recipients = selectOfferRecipients(candidates, request.category, this.clock());

    let offered = 0;
    let deactivated = 0;
    let failed = 0;

    for (const master of recipients) {
      try {
        const offer = await this.offerRepo.create(request.id, master.id);
        const outcome = await this.notifier.sendOffer(master, offer.id, request);

        if (outcome === 'delivered') {
          offered += 1;
          continue;
        }

        failed += 1;

        if (outcome === 'unreachable') {
          await this.masterRepo.deactivate(master.id);
          deactivated += 1;
          this.logger.warn(
            { requestId: request.id, masterId: master.id },
            'Мастер недоступен для сообщений и деактивирован.',
          );
        } else {
          this.logger.warn({ requestId: request.id, masterId: master.id }, 'Не удалось доставить предложение мастеру.');
        }
      } catch (error) {
        failed += 1;
        this.logger.error({ err: error, requestId: request.id, masterId: master.id }, 'Ошибка при рассылке предложения.');
      }
    }

    const summary: BroadcastSummary = {
      requestId: request.id,
      matched: recipients.length,
      offered,
      deactivated,
      failed,
    };

    this.logger.info(summary, 'Рассылка предложений завершена.');

    return summary;
  }
}
