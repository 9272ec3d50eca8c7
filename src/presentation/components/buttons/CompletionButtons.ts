// ============================================================================
// src/presentation/components/buttons/CompletionButtons.ts
// ============================================================================

import { ActionRowBuilder, ButtonBuilder, type ButtonInteraction, ButtonStyle } from 'discord.js';

import type { ConfirmCompletionUseCase } from '@/application/usecases/orders/ConfirmCompletionUseCase';
import type { DisputeCompletionUseCase } from '@/application/usecases/orders/DisputeCompletionUseCase';
import type { MarkWorkDoneUseCase } from '@/application/usecases/orders/MarkWorkDoneUseCase';
import { buildCustomId, decodeNumericId, encodeNumericId, splitCustomId } from '@/presentation/components/customId';
import { registerButtonHandler } from '@/presentation/components/registry';
import { replyWithError } from '@/presentation/components/respond';
import { embedFactory } from '@/presentation/embeds/EmbedFactory';

export const ORDER_BUTTON_PREFIX = 'order';

export type OrderButtonAction = 'done' | 'confirm' | 'dispute';

const ORDER_ACTIONS: ReadonlyArray<OrderButtonAction> = ['done', 'confirm', 'dispute'];

const isOrderAction = (value: string | undefined): value is OrderButtonAction =>
  ORDER_ACTIONS.some((action) => action === value);

export const buildOrderButtonCustomId = (action: OrderButtonAction, requestId: number): string =>
  buildCustomId(ORDER_BUTTON_PREFIX, action, encodeNumericId(requestId));

export const parseOrderButtonCustomId = (
  customId: string,
): { action: OrderButtonAction; requestId: number } | null => {
  const segments = splitCustomId(customId, ORDER_BUTTON_PREFIX);
  if (!segments || segments.length !== 2) {
    return null;
  }

  const [action, fragment] = segments;
  const requestId = decodeNumericId(fragment);
  if (!isOrderAction(action) || requestId === null) {
    return null;
  }

  return { action, requestId };
};

export const buildMarkDoneRow = (requestId: number): ActionRowBuilder<ButtonBuilder> =>
  new ActionRowBuilder<ButtonBuilder>().addComponents(
    new ButtonBuilder()
      .setCustomId(buildOrderButtonCustomId('done', requestId))
      .setLabel('Завершить заказ')
      .setEmoji('🏁')
      .setStyle(ButtonStyle.Primary),
  );

export const buildConfirmationRow = (requestId: number): ActionRowBuilder<ButtonBuilder> =>
  new ActionRowBuilder<ButtonBuilder>().addComponents(
    new ButtonBuilder()
      .setCustomId(buildOrderButtonCustomId('confirm', requestId))
      .setLabel('Да, всё выполнено')
      .setEmoji('✅')
      .setStyle(ButtonStyle.Success),
    new ButtonBuilder()
      .setCustomId(buildOrderButtonCustomId('dispute', requestId))
      .setLabel('Есть проблема')
      .setEmoji('⚠️')
      .setStyle(ButtonStyle.Danger),
  );

interface CompletionUseCases {
  readonly markWorkDone: MarkWorkDoneUseCase;
  readonly confirmCompletion: ConfirmCompletionUseCase;
  readonly disputeCompletion: DisputeCompletionUseCase;
}

const MARK_DONE_MESSAGES = {
  marked: 'Клиенту отправлен запрос на подтверждение. Ожидаем ответа.',
  already_pending: 'Ожидаем подтверждения от клиента.',
  already_completed: 'Этот заказ уже завершён.',
} as const;

const runAction = async (
  interaction: ButtonInteraction,
  action: OrderButtonAction,
  requestId: number,
  useCases: CompletionUseCases,
): Promise<void> => {
  const dto = { requestId, actorUserId: interaction.user.id };

  switch (action) {
    case 'done': {
      const outcome = await useCases.markWorkDone.execute(dto);
      await interaction.editReply({
        embeds: [embedFactory.info({ title: `Заказ #${requestId}`, description: MARK_DONE_MESSAGES[outcome] })],
        components: [],
      });
      return;
    }
    case 'confirm': {
      const outcome = await useCases.confirmCompletion.execute(dto);
      await interaction.editReply({
        embeds: [
          embedFactory.success({
            title: `Заказ #${requestId} завершён`,
            description: outcome === 'completed' ? 'Спасибо, что подтвердили выполнение!' : 'Заказ уже был завершён.',
          }),
        ],
        components: [],
      });
      return;
    }
    case 'dispute': {
      await useCases.disputeCompletion.execute(dto);
      await interaction.editReply({
        embeds: [
          embedFactory.warning({
            title: `Заказ #${requestId}`,
            description: 'Мы передали информацию администратору и мастеру. С вами свяжутся.',
          }),
        ],
        components: [],
      });
    }
  }
};

export const registerCompletionButtons = (useCases: CompletionUseCases): void => {
  registerButtonHandler(ORDER_BUTTON_PREFIX, async (interaction) => {
    const parsed = parseOrderButtonCustomId(interaction.customId);
    if (!parsed) {
      await replyWithError(interaction, new Error(`Malformed order button: ${interaction.customId}`), 'order');
      return;
    }

    await interaction.deferUpdate();

    try {
      await runAction(interaction, parsed.action, parsed.requestId, useCases);
    } catch (error) {
      await replyWithError(interaction, error, `order:${parsed.action}`);
    }
  });
};
