// ============================================================================
// src/presentation/components/buttons/ReviewButtons.ts
// ============================================================================

import { ActionRowBuilder, ButtonBuilder, type ButtonInteraction, ButtonStyle } from 'discord.js';

import type { SkipReviewUseCase } from '@/application/usecases/reviews/SkipReviewUseCase';
import type { SubmitRatingUseCase } from '@/application/usecases/reviews/SubmitRatingUseCase';
import { buildCustomId, decodeNumericId, encodeNumericId, splitCustomId } from '@/presentation/components/customId';
import { ReviewCommentModal } from '@/presentation/components/modals/ReviewCommentModal';
import { registerButtonHandler } from '@/presentation/components/registry';
import { replyWithError } from '@/presentation/components/respond';
import { embedFactory } from '@/presentation/embeds/EmbedFactory';

export const REVIEW_BUTTON_PREFIX = 'review';

export type ReviewButtonPayload =
  | { readonly action: 'rate'; readonly requestId: number; readonly rating: number }
  | { readonly action: 'comment' | 'skip'; readonly requestId: number };

export const buildReviewButtonCustomId = (payload: ReviewButtonPayload): string =>
  payload.action === 'rate'
    ? buildCustomId(REVIEW_BUTTON_PREFIX, 'rate', encodeNumericId(payload.requestId), String(payload.rating))
    : buildCustomId(REVIEW_BUTTON_PREFIX, payload.action, encodeNumericId(payload.requestId));

export const parseReviewButtonCustomId = (customId: string): ReviewButtonPayload | null => {
  const segments = splitCustomId(customId, REVIEW_BUTTON_PREFIX);
  if (!segments) {
    return null;
  }

  const [action, fragment, ratingRaw] = segments;
  const requestId = decodeNumericId(fragment);
  if (requestId === null) {
    return null;
  }

  if (action === 'rate' && segments.length === 3) {
    const rating = Number(ratingRaw);
    return Number.isInteger(rating) && rating >= 1 && rating <= 5 ? { action, requestId, rating } : null;
  }

  if ((action === 'comment' || action === 'skip') && segments.length === 2) {
    return { action, requestId };
  }

  return null;
};

export const buildRatingRow = (requestId: number): ActionRowBuilder<ButtonBuilder> =>
  new ActionRowBuilder<ButtonBuilder>().addComponents(
    [1, 2, 3, 4, 5].map((rating) =>
      new ButtonBuilder()
        .setCustomId(buildReviewButtonCustomId({ action: 'rate', requestId, rating }))
        .setLabel(`${rating} ⭐`)
        .setStyle(rating >= 4 ? ButtonStyle.Success : ButtonStyle.Secondary),
    ),
  );

export const buildCommentRow = (requestId: number): ActionRowBuilder<ButtonBuilder> =>
  new ActionRowBuilder<ButtonBuilder>().addComponents(
    new ButtonBuilder()
      .setCustomId(buildReviewButtonCustomId({ action: 'comment', requestId }))
      .setLabel('Написать отзыв')
      .setEmoji('✍️')
      .setStyle(ButtonStyle.Primary),
    new ButtonBuilder()
      .setCustomId(buildReviewButtonCustomId({ action: 'skip', requestId }))
      .setLabel('Пропустить')
      .setStyle(ButtonStyle.Secondary),
  );

const handleRate = async (
  interaction: ButtonInteraction,
  useCase: SubmitRatingUseCase,
  requestId: number,
  rating: number,
): Promise<void> => {
  await interaction.deferUpdate();

  const result = await useCase.execute({ requestId, actorUserId: interaction.user.id, rating });
  const description = result.duplicate
    ? 'Вы уже оценили этот заказ. Можно добавить текстовый отзыв.'
    : `Ваша оценка: ${'⭐'.repeat(result.review.rating.getValue())}. Хотите добавить пару слов?`;

  await interaction.editReply({
    embeds: [embedFactory.success({ title: 'Спасибо за оценку!', description })],
    components: [buildCommentRow(requestId)],
  });
};

export const registerReviewButtons = (submitRating: SubmitRatingUseCase, skipReview: SkipReviewUseCase): void => {
  registerButtonHandler(REVIEW_BUTTON_PREFIX, async (interaction) => {
    const parsed = parseReviewButtonCustomId(interaction.customId);

    try {
      if (!parsed) {
        throw new Error(`Malformed review button: ${interaction.customId}`);
      }

      switch (parsed.action) {
        case 'rate':
          await handleRate(interaction, submitRating, parsed.requestId, parsed.rating);
          return;
        case 'comment':
          await interaction.showModal(ReviewCommentModal.build(parsed.requestId));
          return;
        case 'skip':
          await interaction.deferUpdate();
          await skipReview.execute({ requestId: parsed.requestId, actorUserId: interaction.user.id });
          await interaction.editReply({
            embeds: [embedFactory.info({ title: 'Спасибо!', description: 'Будем рады видеть вас снова.' })],
            components: [],
          });
      }
    } catch (error) {
      await replyWithError(interaction, error, `review:${parsed?.action ?? 'unknown'}`);
    }
  });
};
