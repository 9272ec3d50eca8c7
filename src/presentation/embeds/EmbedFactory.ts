// ============================================================================
// src/presentation/embeds/EmbedFactory.ts
// ============================================================================

import { type APIEmbedField, EmbedBuilder } from 'discord.js';

import type { RateLimitStatus } from '@/application/usecases/account/GetRateLimitStatusUseCase';
import type { ServiceStats } from '@/application/usecases/admin/GetServiceStatsUseCase';
import type { EntitlementStatus, MasterCabinet } from '@/application/usecases/masters/GetMasterCabinetUseCase';
import type { MasterReviewsOverview } from '@/application/usecases/masters/GetMasterReviewsUseCase';
import type { ClientRequestsOverview, RequestGroup } from '@/application/usecases/requests/GetClientRequestsUseCase';
import type { Master } from '@/domain/entities/Master';
import type { ServiceRequest } from '@/domain/entities/ServiceRequest';
import { ENTITLEMENT_PRODUCTS, formatPrice, PAYMENT_PAYLOADS } from '@/domain/value-objects/Entitlement';
import { MasterLevel, masterLevelLabel } from '@/domain/value-objects/MasterLevel';
import { OfferStatus } from '@/domain/value-objects/OfferStatus';
import { formatRatingStars } from '@/domain/value-objects/Rating';
import { RequestStatus, RequestStatusVO } from '@/domain/value-objects/RequestStatus';
import { skillTierLabel } from '@/domain/value-objects/SkillTier';
import { COLORS, EMBED_LIMITS, EXPERIENCE_BUCKETS, isExperienceBucket } from '@/shared/config/constants';
import { clampEmbedField, splitIntoEmbedFields, userMention } from '@/shared/utils/discord.utils';
import { formatDate, truncateText } from '@/shared/utils/text';

interface BaseEmbed {
  readonly title?: string;
  readonly description?: string;
  readonly fields?: ReadonlyArray<APIEmbedField>;
  readonly footer?: string;
  readonly timestamp?: Date;
}

interface StatsEmbedData {
  readonly title: string;
  readonly stats: Record<string, string | number>;
}

const describeEntitlement = (status: EntitlementStatus): string =>
  status.active && status.until ? `✅ до ${formatDate(status.until)}` : '❌ не активна';

const describeExperience = (master: Master): string => {
  const { experienceBucket, experienceText } = master.toProps();
  const bucket = experienceBucket && isExperienceBucket(experienceBucket) ? EXPERIENCE_BUCKETS[experienceBucket] : null;

  return [bucket, experienceText].filter((part): part is string => Boolean(part)).join('. ') || 'не указан';
};

const STATUS_EMOJI: Record<RequestStatus, string> = {
  [RequestStatus.NEW]: '🆕',
  [RequestStatus.ASSIGNED]: '👨‍🔧',
  [RequestStatus.PENDING_CONFIRMATION]: '⏳',
  [RequestStatus.COMPLETED]: '✅',
};

const RATE_LIMIT_LABELS: Readonly<Record<string, string>> = {
  new_request: '📝 Новые заявки',
  master_registration: '👨‍🔧 Регистрация мастера',
  complaint: '🚨 Жалобы',
  offer_actions: '⚡ Действия с заказами',
};

const HOUR_MS = 60 * 60 * 1000;

const describeWindow = (windowMs: number): string => {
  if (windowMs === HOUR_MS) return 'в час';
  if (windowMs === 24 * HOUR_MS) return 'в сутки';
  return `за ${Math.round(windowMs / 60_000)} мин`;
};

const describeRequestGroup = (group: RequestGroup, detailed: boolean, overflowLabel: string): string => {
  const lines = group.shown.map((request) => {
    const head = `${STATUS_EMOJI[request.status]} #${request.id} · ${request.category} · ${formatDate(request.createdAt)}`;
    return detailed ? `${head}\n📍 ${request.address}\n📊 ${RequestStatusVO.label(request.status)}` : head;
  });
  const hidden = group.total - group.shown.length;
  if (hidden > 0) {
    lines.push(`… и ещё ${hidden} ${overflowLabel}`);
  }

  return clampEmbedField(lines.join('\n'));
};

export class EmbedFactory {
  public success(payload: BaseEmbed): EmbedBuilder {
    return this.base({
      ...payload,
      color: COLORS.success,
      title: payload.title ?? 'Готово',
    });
  }

  public error(payload: BaseEmbed): EmbedBuilder {
    return this.base({
      ...payload,
      color: COLORS.danger,
      title: payload.title ?? 'Произошла ошибка',
    });
  }

  public info(payload: BaseEmbed): EmbedBuilder {
    return this.base({
      ...payload,
      color: COLORS.info,
      title: payload.title ?? 'Информация',
    });
  }

  public warning(payload: BaseEmbed): EmbedBuilder {
    return this.base({
      ...payload,
      color: COLORS.warning,
      title: payload.title ?? 'Внимание',
    });
  }

  public stats(data: StatsEmbedData): EmbedBuilder {
    const fields = Object.entries(data.stats).map(([key, value]) => ({
      name: truncateText(key, EMBED_LIMITS.fieldName),
      value: clampEmbedField(String(value)),
      inline: true,
    }));

    return this.base({
      color: COLORS.info,
      title: data.title,
      fields,
    });
  }

  /** Summary a master sees before deciding; contact details stay hidden until the claim. */
  public offer(request: ServiceRequest): EmbedBuilder {
    return this.base({
      color: COLORS.primary,
      title: `🆕 Заявка #${request.id}`,
      description: request.description,
      fields: [
        { name: 'Категория', value: request.category, inline: true },
        { name: 'Район / адрес', value: request.address, inline: true },
        { name: 'Когда', value: request.desiredTime, inline: true },
      ],
      footer: 'Первый, кто возьмёт заказ, получит контакты клиента.',
    });
  }

  public assignment(request: ServiceRequest): EmbedBuilder {
    return this.base({
      color: COLORS.success,
      title: `✅ Заказ #${request.id} ваш`,
      description: request.description,
      fields: [
        { name: 'Клиент', value: request.clientName, inline: true },
        { name: 'Контакт', value: request.contact, inline: true },
        { name: 'Категория', value: request.category, inline: true },
        { name: 'Адрес', value: request.address, inline: true },
        { name: 'Когда', value: request.desiredTime, inline: true },
      ],
      footer: 'Когда работа будет выполнена, нажмите «Завершить заказ».',
    });
  }

  public clientAssigned(request: ServiceRequest, master: Master): EmbedBuilder {
    return this.base({
      color: COLORS.success,
      title: `👷 Мастер найден для заявки #${request.id}`,
      fields: [
        { name: 'Мастер', value: master.fullName, inline: true },
        { name: 'Телефон', value: master.phone, inline: true },
        { name: 'Уровень', value: masterLevelLabel(master.level), inline: true },
      ],
      footer: 'Мастер свяжется с вами в ближайшее время.',
    });
  }

  public completionPrompt(request: ServiceRequest, master: Master): EmbedBuilder {
    return this.base({
      color: COLORS.info,
      title: `Заказ #${request.id} выполнен?`,
      description: `Мастер ${master.fullName} отметил заказ как выполненный. Подтвердите, пожалуйста, или сообщите о проблеме.`,
      footer: 'Если ответа не будет, заказ завершится автоматически через 24 часа.',
    });
  }

  public reviewPrompt(request: ServiceRequest, master: Master | null): EmbedBuilder {
    return this.base({
      color: COLORS.primary,
      title: `⭐ Оцените работу по заказу #${request.id}`,
      description: master
        ? `Как вам работа мастера ${master.fullName}? Выберите оценку от 1 до 5.`
        : 'Выберите оценку от 1 до 5.',
    });
  }

  public requestSummary(request: ServiceRequest): EmbedBuilder {
    return this.base({
      color: COLORS.neutral,
      title: `📋 Заявка #${request.id}`,
      description: request.description,
      fields: [
        { name: 'Клиент', value: `${request.clientName} (${userMention(request.clientUserId)})`, inline: true },
        { name: 'Контакт', value: request.contact, inline: true },
        { name: 'Категория', value: request.category, inline: true },
        { name: 'Адрес', value: request.address, inline: true },
        { name: 'Когда', value: request.desiredTime, inline: true },
        { name: 'Статус', value: RequestStatusVO.label(request.status), inline: true },
      ],
      timestamp: request.createdAt,
    });
  }

  public masterProfile(master: Master): EmbedBuilder {
    const { portfolio, references, taxId } = master.toProps();

    return this.base({
      color: COLORS.neutral,
      title: `🧰 Анкета мастера #${master.id}`,
      fields: [
        { name: 'Имя', value: `${master.fullName} (${userMention(master.userId)})`, inline: true },
        { name: 'Телефон', value: master.phone, inline: true },
        { name: 'Уровень', value: masterLevelLabel(master.level), inline: true },
        { name: 'Категории', value: master.categories.join(', ') || '—' },
        { name: 'Опыт', value: describeExperience(master) },
        { name: 'Портфолио', value: portfolio ?? '—' },
        { name: 'Рекомендации', value: references ?? '—' },
        { name: 'ИНН', value: taxId ?? 'не указан', inline: true },
      ],
      timestamp: master.createdAt,
    });
  }

  public masterCabinet(cabinet: MasterCabinet): EmbedBuilder {
    const { master } = cabinet;
    const rating = master.reviewsCount > 0
      ? `${formatRatingStars(master.avgRating)} ${master.avgRating.toFixed(1)} (${master.reviewsCount})`
      : 'пока нет отзывов';
    const recent = cabinet.recentOrders.length > 0
      ? cabinet.recentOrders
          .map((order) => `#${order.id} · ${order.category} · ${RequestStatusVO.label(order.status)}`)
          .join('\n')
      : 'заказов пока нет';

    return this.base({
      color: COLORS.primary,
      title: `👤 Кабинет мастера: ${master.fullName}`,
      fields: [
        { name: 'Уровень', value: masterLevelLabel(master.level), inline: true },
        { name: 'Квалификация', value: skillTierLabel(master.skillTier), inline: true },
        { name: 'Рейтинг', value: rating, inline: true },
        { name: 'Выполнено заказов', value: String(master.ordersCompleted), inline: true },
        {
          name: 'Бесплатные заказы',
          value: `${cabinet.freeOrdersLeft}/${cabinet.freeOrdersStart}`,
          inline: true,
        },
        { name: 'Статус', value: master.isActive ? 'активен' : 'неактивен', inline: true },
        { name: 'Подписка', value: describeEntitlement(cabinet.subscription), inline: true },
        { name: 'Приоритет', value: describeEntitlement(cabinet.priority), inline: true },
        { name: 'Закреп', value: describeEntitlement(cabinet.pin), inline: true },
        {
          name: 'Предложения',
          value: `получено ${cabinet.offers[OfferStatus.SENT] + cabinet.offers[OfferStatus.TAKEN] + cabinet.offers[OfferStatus.SKIPPED]} · взято ${cabinet.offers[OfferStatus.TAKEN]} · пропущено ${cabinet.offers[OfferStatus.SKIPPED]}`,
        },
        { name: 'Последние заказы', value: recent },
      ],
    });
  }

  public masterReviews(overview: MasterReviewsOverview): EmbedBuilder {
    if (overview.count === 0 || overview.average === null) {
      return this.info({
        title: '⭐ Ваши отзывы',
        description: 'Отзывов пока нет. Они появятся после первых завершённых заказов.',
      });
    }

    const distribution = ([5, 4, 3, 2, 1] as const)
      .map((stars) => `${'⭐'.repeat(stars)} — ${overview.distribution[stars]}`)
      .join('\n');

    const latest = overview.latest.length > 0
      ? overview.latest
          .map((review) => `${'⭐'.repeat(review.rating)} #${review.requestId}: ${review.comment}`)
          .join('\n\n')
      : 'Текстовых отзывов пока нет.';

    return this.base({
      color: COLORS.primary,
      title: '⭐ Ваши отзывы',
      description: `${formatRatingStars(overview.average)} ${overview.average.toFixed(1)} из 5 · ${overview.count} отзывов`,
      fields: [
        { name: 'Распределение', value: distribution },
        { name: 'Последние отзывы', value: latest },
      ],
    });
  }

  public serviceStats(stats: ServiceStats): EmbedBuilder {
    return this.stats({
      title: '📊 Статистика сервиса',
      stats: {
        'Мастеров всего': stats.masters.total,
        'Активных мастеров': stats.masters.active,
        [masterLevelLabel(MasterLevel.CANDIDATE)]: stats.masters.byLevel[MasterLevel.CANDIDATE],
        [masterLevelLabel(MasterLevel.CHECKED)]: stats.masters.byLevel[MasterLevel.CHECKED],
        [masterLevelLabel(MasterLevel.VERIFIED)]: stats.masters.byLevel[MasterLevel.VERIFIED],
        'Активных подписок': stats.masters.activeSubscriptions,
        'Заявок всего': stats.requests.total,
        'Новых заявок': stats.requests.byStatus[RequestStatus.NEW],
        'Завершённых заявок': stats.requests.byStatus[RequestStatus.COMPLETED],
        'Отзывов': stats.reviews,
        'Жалоб': stats.complaints,
      },
    });
  }

  public clientRequests(overview: ClientRequestsOverview): EmbedBuilder {
    if (overview.active.total === 0 && overview.completed.total === 0) {
      return this.info({
        title: '📝 Мои заявки',
        description: 'У вас пока нет заявок. Оставьте первую через `/request`.',
      });
    }

    const fields: APIEmbedField[] = [];
    if (overview.active.total > 0) {
      fields.push({
        name: `🟢 Активные (${overview.active.total})`,
        value: describeRequestGroup(overview.active, true, 'активных'),
      });
    }
    if (overview.completed.total > 0) {
      fields.push({
        name: `✅ Завершённые (${overview.completed.total})`,
        value: describeRequestGroup(overview.completed, false, 'завершённых'),
      });
    }

    return this.base({ color: COLORS.primary, title: '📝 Мои заявки', fields });
  }

  public rateLimits(statuses: ReadonlyArray<RateLimitStatus>): EmbedBuilder {
    const lines = statuses.map((status) => {
      const label = RATE_LIMIT_LABELS[status.action] ?? status.action;
      const reset =
        status.remaining < status.limit && status.resetInMs > 0
          ? ` · сброс через ${Math.max(1, Math.ceil(status.resetInMs / 60_000))} мин`
          : '';
      return `${label}: ${status.remaining}/${status.limit} (${describeWindow(status.windowMs)})${reset}`;
    });

    return this.info({
      title: '📊 Ваши лимиты',
      description: lines.join('\n'),
      footer: 'Лимиты сбрасываются автоматически.',
    });
  }

  public priceList(): EmbedBuilder {
    return this.base({
      color: COLORS.primary,
      title: '💳 Платные опции',
      fields: PAYMENT_PAYLOADS.map((payload) => {
        const product = ENTITLEMENT_PRODUCTS[payload];
        return {
          name: `${product.title} — ${formatPrice(product.priceMinor)}`,
          value: `${product.description} · код \`${product.payload}\``,
        };
      }),
    });
  }

  private base(options: BaseEmbed & { readonly color: number; readonly title: string }): EmbedBuilder {
    const embed = new EmbedBuilder()
      .setColor(options.color)
      .setTitle(truncateText(options.title, EMBED_LIMITS.title))
      .setTimestamp(options.timestamp ?? new Date());

    if (options.description) {
      embed.setDescription(truncateText(options.description, EMBED_LIMITS.description));

      if (options.description.length > EMBED_LIMITS.description) {
        const overflow = options.description.slice(EMBED_LIMITS.description);
        const extraFields = splitIntoEmbedFields(overflow).map((value, index) => ({
          name: `Продолжение ${index + 1}`,
          value: clampEmbedField(value),
        }));
        embed.addFields(extraFields.slice(0, EMBED_LIMITS.maxFields));
      }
    }

    if (options.fields) {
      const sanitized = options.fields.slice(0, EMBED_LIMITS.maxFields).map((field) => ({
        name: truncateText(field.name, EMBED_LIMITS.fieldName),
        value: clampEmbedField(field.value),
        inline: field.inline ?? false,
      }));

      embed.addFields(sanitized);
    }

    if (options.footer) {
      embed.setFooter({ text: truncateText(options.footer, EMBED_LIMITS.footerText) });
    }

    return embed;
  }
}

export const embedFactory = new EmbedFactory();
