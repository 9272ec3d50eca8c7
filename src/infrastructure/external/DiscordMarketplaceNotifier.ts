// ============================================================================
// src/infrastructure/external/DiscordMarketplaceNotifier.ts
// ============================================================================

import { DiscordAPIError, type MessageCreateOptions } from 'discord.js';
import { RESTJSONErrorCodes } from 'discord-api-types/v10';
import type { Logger } from 'pino';

import type {
  AdminNotice,
  CompletionReason,
  DeliveryOutcome,
  MarketplaceNotifier,
} from '@/application/ports/MarketplaceNotifier';
import type { Master } from '@/domain/entities/Master';
import type { ServiceRequest } from '@/domain/entities/ServiceRequest';
import { complaintRoleLabel } from '@/domain/value-objects/ComplaintRole';
import { ENTITLEMENT_PRODUCTS } from '@/domain/value-objects/Entitlement';
import { buildConfirmationRow, buildMarkDoneRow } from '@/presentation/components/buttons/CompletionButtons';
import { buildOfferButtonRow } from '@/presentation/components/buttons/OfferButtons';
import { buildCommentRow, buildRatingRow } from '@/presentation/components/buttons/ReviewButtons';
import { embedFactory } from '@/presentation/embeds/EmbedFactory';
import { userMention } from '@/shared/utils/discord.utils';
import { formatDate } from '@/shared/utils/text';

export interface MessageTarget {
  send(options: MessageCreateOptions): Promise<unknown>;
}

/** The slice of the discord.js client the notifier needs. */
export interface NotifierClient {
  readonly users: { fetch(userId: string): Promise<MessageTarget> };
  readonly channels: { fetch(channelId: string): Promise<unknown> };
}

const UNREACHABLE_CODES: ReadonlySet<number | string> = new Set([
  RESTJSONErrorCodes.CannotSendMessagesToThisUser,
  RESTJSONErrorCodes.UnknownUser,
]);

const isMessageTarget = (value: unknown): value is MessageTarget =>
  typeof value === 'object' && value !== null && 'send' in value && typeof value.send === 'function';

const COMPLETION_TEXT: Record<CompletionReason, string> = {
  client_confirmed: 'Клиент подтвердил выполнение.',
  auto_timeout: 'Клиент не ответил вовремя, заказ закрыт автоматически.',
};

export class DiscordMarketplaceNotifier implements MarketplaceNotifier {
  public constructor(
    private readonly client: NotifierClient,
    private readonly adminChannelId: string | undefined,
    private readonly logger: Logger,
  ) {}

  public sendOffer(master: Master, offerId: number, request: ServiceRequest): Promise<DeliveryOutcome> {
    return this.sendToUser(master.userId, {
      embeds: [embedFactory.offer(request)],
      components: [buildOfferButtonRow(offerId)],
    });
  }

  public sendAssignment(master: Master, request: ServiceRequest): Promise<DeliveryOutcome> {
    return this.sendToUser(master.userId, {
      embeds: [embedFactory.assignment(request)],
      components: [buildMarkDoneRow(request.id)],
    });
  }

  public notifyClientAssigned(request: ServiceRequest, master: Master): Promise<DeliveryOutcome> {
    return this.sendToUser(request.clientUserId, { embeds: [embedFactory.clientAssigned(request, master)] });
  }

  public sendCompletionPrompt(request: ServiceRequest, master: Master): Promise<DeliveryOutcome> {
    return this.sendToUser(request.clientUserId, {
      embeds: [embedFactory.completionPrompt(request, master)],
      components: [buildConfirmationRow(request.id)],
    });
  }

  public notifyMasterCompleted(
    master: Master,
    request: ServiceRequest,
    reason: CompletionReason,
  ): Promise<DeliveryOutcome> {
    return this.sendToUser(master.userId, {
      embeds: [
        embedFactory.success({
          title: `🏁 Заказ #${request.id} завершён`,
          description: `${COMPLETION_TEXT[reason]} Выполнено заказов: ${master.ordersCompleted}.`,
        }),
      ],
    });
  }

  public notifyMasterDisputed(master: Master, request: ServiceRequest): Promise<DeliveryOutcome> {
    return this.sendToUser(master.userId, {
      embeds: [
        embedFactory.warning({
          title: `⚠️ Клиент сообщил о проблеме по заказу #${request.id}`,
          description: 'Свяжитесь с клиентом. Когда всё будет исправлено, снова нажмите «Завершить заказ».',
        }),
      ],
      components: [buildMarkDoneRow(request.id)],
    });
  }

  public notifyClientAutoCompleted(request: ServiceRequest): Promise<DeliveryOutcome> {
    return this.sendToUser(request.clientUserId, {
      embeds: [
        embedFactory.info({
          title: `Заказ #${request.id} закрыт автоматически`,
          description: 'Мы не получили ответа, поэтому считаем заказ выполненным.',
        }),
      ],
    });
  }

  public sendReviewPrompt(request: ServiceRequest, master: Master | null): Promise<DeliveryOutcome> {
    return this.sendToUser(request.clientUserId, {
      embeds: [embedFactory.reviewPrompt(request, master)],
      components: [buildRatingRow(request.id), buildCommentRow(request.id)],
    });
  }

  public async notifyAdmin(notice: AdminNotice): Promise<DeliveryOutcome> {
    if (!this.adminChannelId) {
      this.logger.debug({ kind: notice.kind }, 'Канал администратора не настроен, уведомление пропущено.');
      return 'unreachable';
    }

    try {
      const channel = await this.client.channels.fetch(this.adminChannelId);
      if (!isMessageTarget(channel)) {
        this.logger.warn({ channelId: this.adminChannelId }, 'Канал администратора недоступен для отправки.');
        return 'unreachable';
      }

      await channel.send(this.renderAdminNotice(notice));
      return 'delivered';
    } catch (error) {
      return this.classifyFailure(error, { channelId: this.adminChannelId, kind: notice.kind });
    }
  }

  private renderAdminNotice(notice: AdminNotice): MessageCreateOptions {
    switch (notice.kind) {
      case 'request_created':
        return { content: '🆕 Новая заявка', embeds: [embedFactory.requestSummary(notice.request)] };
      case 'request_assigned':
        return {
          content: `✅ Заявку #${notice.request.id} взял мастер ${notice.master.fullName} (${userMention(notice.master.userId)})`,
        };
      case 'completion_disputed':
        return {
          content:
            `⚠️ Клиент ${userMention(notice.request.clientUserId)} оспорил завершение заказа #${notice.request.id}` +
            (notice.master ? `, мастер ${notice.master.fullName} (${userMention(notice.master.userId)})` : ''),
          embeds: [embedFactory.requestSummary(notice.request)],
        };
      case 'master_registered':
        return { content: '🧰 Новая анкета мастера', embeds: [embedFactory.masterProfile(notice.master)] };
      case 'entitlement_granted': {
        const product = ENTITLEMENT_PRODUCTS[notice.payload];
        const charge = notice.providerChargeId ? ` · платёж ${notice.providerChargeId}` : '';
        return {
          content: `💳 ${notice.master.fullName} (#${notice.master.id}): ${product.title} до ${formatDate(notice.until)}${charge}`,
        };
      }
      case 'complaint_filed': {
        const { complaint } = notice;
        return {
          content: [
            `🚨 Жалоба #${complaint.id} от ${userMention(complaint.reporterUserId)} (${complaintRoleLabel(complaint.reporterRole)})`,
            `Заказ: ${complaint.requestId === null ? '—' : `#${complaint.requestId}`}`,
            `Мастер: ${complaint.masterId === null ? '—' : `#${complaint.masterId}`}`,
            '',
            complaint.text,
          ].join('\n'),
        };
      }
      case 'sweep_report':
        return { content: notice.text };
    }
  }

  private async sendToUser(userId: string, message: MessageCreateOptions): Promise<DeliveryOutcome> {
    try {
      const user = await this.client.users.fetch(userId);
      await user.send(message);
      return 'delivered';
    } catch (error) {
      return this.classifyFailure(error, { userId });
    }
  }

  private classifyFailure(error: unknown, context: Record<string, unknown>): DeliveryOutcome {
    if (error instanceof DiscordAPIError && UNREACHABLE_CODES.has(error.code)) {
      this.logger.info({ ...context, code: error.code }, 'Получатель недоступен для личных сообщений.');
      return 'unreachable';
    }

    this.logger.warn({ ...context, err: error }, 'Не удалось отправить сообщение.');
    return 'failed';
  }
}
