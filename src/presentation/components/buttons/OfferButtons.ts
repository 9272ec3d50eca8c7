// ============================================================================
// src/presentation/components/buttons/OfferButtons.ts
// ============================================================================

import { ActionRowBuilder, ButtonBuilder, type ButtonInteraction, ButtonStyle } from 'discord.js';

import type { ClaimOfferUseCase } from '@/application/usecases/offers/ClaimOfferUseCase';
import type { SkipOfferUseCase } from '@/application/usecases/offers/SkipOfferUseCase';
import { buildCustomId, decodeNumericId, encodeNumericId, splitCustomId } from '@/presentation/components/customId';
import { registerButtonHandler } from '@/presentation/components/registry';
import { replyWithError } from '@/presentation/components/respond';
import { embedFactory } from '@/presentation/embeds/EmbedFactory';
import { RequestAlreadyTakenError } from '@/shared/errors/domain.errors';

export const OFFER_BUTTON_PREFIX = 'offer';

export type OfferButtonAction = 'take' | 'skip';

export const buildOfferButtonCustomId = (action: OfferButtonAction, offerId: number): string =>
  buildCustomId(OFFER_BUTTON_PREFIX, action, encodeNumericId(offerId));

export const parseOfferButtonCustomId = (
  customId: string,
): { action: OfferButtonAction; offerId: number } | null => {
  const segments = splitCustomId(customId, OFFER_BUTTON_PREFIX);
  if (!segments || segments.length !== 2) {
    return null;
  }

  const [action, fragment] = segments;
  const offerId = decodeNumericId(fragment);
  if ((action !== 'take' && action !== 'skip') || offerId === null) {
    return null;
  }

  return { action, offerId };
};

export const buildOfferButtonRow = (offerId: number): ActionRowBuilder<ButtonBuilder> =>
  new ActionRowBuilder<ButtonBuilder>().addComponents(
    new ButtonBuilder()
      .setCustomId(buildOfferButtonCustomId('take', offerId))
      .setLabel('Взять заказ')
      .setEmoji('✅')
      .setStyle(ButtonStyle.Success),
    new ButtonBuilder()
      .setCustomId(buildOfferButtonCustomId('skip', offerId))
      .setLabel('Пропустить')
      .setStyle(ButtonStyle.Secondary),
  );

const handleTake = async (interaction: ButtonInteraction, useCase: ClaimOfferUseCase, offerId: number) => {
  try {
    const result = await useCase.execute({ offerId, actorUserId: interaction.user.id });
    const balance = result.usedSubscription
      ? 'Заказ оплачен подпиской.'
      : `Осталось бесплатных заказов: ${result.master.freeOrdersLeft}.`;

    await interaction.editReply({
      embeds: [
        embedFactory.success({
          title: `Заказ #${result.request.id} взят`,
          description: `Подробности отправлены отдельным сообщением. ${balance}`,
        }),
      ],
      components: [],
    });
  } catch (error) {
    if (error instanceof RequestAlreadyTakenError) {
      await interaction.editReply({
        embeds: [embedFactory.warning({ title: 'Заказ недоступен', description: error.message })],
        components: [],
      });
      return;
    }

    await replyWithError(interaction, error, 'offer:take');
  }
};

const handleSkip = async (interaction: ButtonInteraction, useCase: SkipOfferUseCase, offerId: number) => {
  try {
    await useCase.execute({ offerId, actorUserId: interaction.user.id });
    await interaction.editReply({
      embeds: [embedFactory.info({ title: 'Заявка пропущена', description: 'Мы пришлём следующую подходящую заявку.' })],
      components: [],
    });
  } catch (error) {
    await replyWithError(interaction, error, 'offer:skip');
  }
};

export const registerOfferButtons = (claimOffer: ClaimOfferUseCase, skipOffer: SkipOfferUseCase): void => {
  registerButtonHandler(OFFER_BUTTON_PREFIX, async (interaction) => {
    const parsed = parseOfferButtonCustomId(interaction.customId);
    if (!parsed) {
      await replyWithError(interaction, new Error(`Malformed offer button: ${interaction.customId}`), 'offer');
      return;
    }

    await interaction.deferUpdate();

    if (parsed.action === 'take') {
      await handleTake(interaction, claimOffer, parsed.offerId);
    } else {
      await handleSkip(interaction, skipOffer, parsed.offerId);
    }
  });
};
