// ============================================================================
// src/application/services/ReconciliationSweep.ts
// ============================================================================

import type { Logger } from 'pino';

import type { MarketplaceNotifier } from '@/application/ports/MarketplaceNotifier';
import type { RateLimitPolicy } from '@/application/ports/RateLimitPolicy';
import type { OrderCompletionService } from '@/application/services/OrderCompletionService';
import type { Master } from '@/domain/entities/Master';
import type { IMasterRepository } from '@/domain/repositories/IMasterRepository';
import type { IServiceRequestRepository } from '@/domain/repositories/IServiceRequestRepository';
import { masterLevelLabel } from '@/domain/value-objects/MasterLevel';
import { SWEEP_REPORT } from '@/shared/config/constants';
import { clipLines, formatDateTime, truncateText } from '@/shared/utils/text';

export interface SweepSettings {
  readonly intervalMs: number;
  readonly backoffMs: number;
  readonly autoCompleteAfterMs: number;
  readonly documentRetentionMs: number;
  readonly rateLimitIdleMs: number;
}

export type SweepDuty = 'auto_complete' | 'document_purge' | 'rate_limit_compaction';

export interface SweepReport {
  readonly startedAt: Date;
  readonly finishedAt: Date;
  readonly autoCompleted: number;
  readonly autoCompleteErrors: number;
  readonly documentsPurged: number;
  readonly purgeErrors: number;
  readonly rateLimitKeysRemoved: number;
  readonly purgeDetails: ReadonlyArray<string>;
  readonly failedDuties: ReadonlyArray<SweepDuty>;
}

const describeDocuments = (master: Master): string => {
  const { passportScan, facePhoto, selfEmploymentDoc } = master.documents;
  const removed: string[] = [];
  if (passportScan) removed.push('паспорт');
  if (facePhoto) removed.push('фото лица');
  if (selfEmploymentDoc) removed.push('документ НПД/ИП');
  return removed.join(', ');
};

export const formatPurgeReport = (details: ReadonlyArray<string>, purged: number, finishedAt: Date): string => {
  const lines = [
    '🧹 Автоочистка документов завершена',
    `📊 Обработано мастеров: ${purged}`,
    '',
    'Детали очистки:',
    ...clipLines(details, SWEEP_REPORT.maxDetailLines),
    '',
    `⏰ Время выполнения: ${formatDateTime(finishedAt)}`,
  ];

  return truncateText(lines.join('\n'), SWEEP_REPORT.maxLength);
};

/**
 * Periodic housekeeping: auto-completes forgotten confirmations, purges old
 * verification documents and compacts the rate limiter. The three duties run
 * independently; one failing does not stop the others.
 */
export class ReconciliationSweep {
  private timer: NodeJS.Timeout | null = null;

  private inFlight: Promise<SweepReport> | null = null;

  public constructor(
    private readonly requestRepo: IServiceRequestRepository,
    private readonly masterRepo: IMasterRepository,
    private readonly completion: OrderCompletionService,
    private readonly rateLimiter: RateLimitPolicy,
    private readonly notifier: MarketplaceNotifier,
    private readonly settings: SweepSettings,
    private readonly logger: Logger,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  public get isScheduled(): boolean {
    return this.timer !== null;
  }

  /** Callers that arrive while a cycle is running share its report. */
  public runCycle(): Promise<SweepReport> {
    if (!this.inFlight) {
      this.inFlight = this.executeCycle().finally(() => {
        this.inFlight = null;
      });
    }

    return this.inFlight;
  }

  private async executeCycle(): Promise<SweepReport> {
    const startedAt = this.clock();
    const failedDuties: SweepDuty[] = [];

    const autoComplete = await this.guard('auto_complete', failedDuties, () => this.autoComplete(startedAt), {
      completed: 0,
      errors: 0,
    });
    const purge = await this.guard('document_purge', failedDuties, () => this.purgeDocuments(startedAt), {
      purged: 0,
      errors: 0,
      details: [],
    });
    const rateLimitKeysRemoved = await this.guard(
      'rate_limit_compaction',
      failedDuties,
      async () => this.rateLimiter.compact(this.settings.rateLimitIdleMs),
      0,
    );

    const finishedAt = this.clock();

    if (purge.purged > 0) {
      const outcome = await this.notifier.notifyAdmin({
        kind: 'sweep_report',
        text: formatPurgeReport(purge.details, purge.purged, finishedAt),
      });
      if (outcome !== 'delivered') {
        this.logger.warn({ outcome }, 'Отчёт об очистке документов не доставлен администратору.');
      }
    }

    const report: SweepReport = {
      startedAt,
      finishedAt,
      autoCompleted: autoComplete.completed,
      autoCompleteErrors: autoComplete.errors,
      documentsPurged: purge.purged,
      purgeErrors: purge.errors,
      rateLimitKeysRemoved,
      purgeDetails: purge.details,
      failedDuties,
    };

    this.logger.info(
      {
        autoCompleted: report.autoCompleted,
        documentsPurged: report.documentsPurged,
        rateLimitKeysRemoved,
        failedDuties,
      },
      'Цикл обслуживания завершён.',
    );

    return report;
  }

  /** Runs a cycle right away, then keeps running on the configured cadence. */
  public start(): void {
    if (this.timer) {
      return;
    }

    this.logger.info({ intervalMs: this.settings.intervalMs }, 'Фоновое обслуживание запущено.');
    this.schedule(0);
  }

  public stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /** Number of masters whose documents are due for removal. */
  public async pendingDocumentCount(): Promise<number> {
    const cutoff = new Date(this.clock().getTime() - this.settings.documentRetentionMs);
    const masters = await this.masterRepo.listWithDocumentsCreatedBefore(cutoff);
    return masters.length;
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      void this.tick();
    }, delayMs);
    this.timer.unref();
  }

  private async tick(): Promise<void> {
    let nextDelay = this.settings.intervalMs;

    try {
      const report = await this.runCycle();
      if (report.failedDuties.length > 0) {
        nextDelay = this.settings.backoffMs;
      }
    } catch (error) {
      this.logger.error({ err: error }, 'Цикл обслуживания завершился ошибкой.');
      nextDelay = this.settings.backoffMs;
    }

    if (this.timer) {
      this.schedule(nextDelay);
    }
  }

  private async guard<T>(duty: SweepDuty, failed: SweepDuty[], work: () => Promise<T>, fallback: T): Promise<T> {
    try {
      return await work();
    } catch (error) {
      failed.push(duty);
      this.logger.error({ err: error, duty }, 'Задача обслуживания завершилась ошибкой.');
      return fallback;
    }
  }

  private async autoComplete(now: Date): Promise<{ completed: number; errors: number }> {
    const cutoff = new Date(now.getTime() - this.settings.autoCompleteAfterMs);
    const stale = await this.requestRepo.listPendingConfirmationSince(cutoff);

    let completed = 0;
    let errors = 0;

    for (const request of stale) {
      try {
        const result = await this.completion.complete(request.id, 'auto_timeout');
        if (result.completed) {
          completed += 1;
        }
      } catch (error) {
        errors += 1;
        this.logger.error({ err: error, requestId: request.id }, 'Не удалось автоматически завершить заявку.');
      }
    }

    return { completed, errors };
  }

  private async purgeDocuments(now: Date): Promise<{ purged: number; errors: number; details: string[] }> {
    const cutoff = new Date(now.getTime() - this.settings.documentRetentionMs);
    const masters = await this.masterRepo.listWithDocumentsCreatedBefore(cutoff);

    let purged = 0;
    let errors = 0;
    const details: string[] = [];

    for (const master of masters) {
      const description = describeDocuments(master);

      try {
        await this.masterRepo.clearDocuments(master.id);
        purged += 1;
        details.push(`#${master.id} ${master.fullName} (${masterLevelLabel(master.level)}): ${description}`);
        this.logger.info({ masterId: master.id, removed: description }, 'Документы мастера удалены.');
      } catch (error) {
        errors += 1;
        details.push(`#${master.id} - ОШИБКА`);
        this.logger.error({ err: error, masterId: master.id }, 'Не удалось удалить документы мастера.');
      }
    }

    return { purged, errors, details };
  }
}
