// ============================================================================
// src/presentation/components/modals/ReviewCommentModal.ts
// ============================================================================

import { ActionRowBuilder, ModalBuilder, TextInputBuilder, TextInputStyle } from 'discord.js';

import type { SubmitReviewCommentUseCase } from '@/application/usecases/reviews/SubmitReviewCommentUseCase';
import { buildRatingRow } from '@/presentation/components/buttons/ReviewButtons';
import { buildCustomId, decodeNumericId, encodeNumericId, splitCustomId } from '@/presentation/components/customId';
import { registerModalHandler } from '@/presentation/components/registry';
import { replyWithError } from '@/presentation/components/respond';
import { embedFactory } from '@/presentation/embeds/EmbedFactory';
import { REVIEW_LIMITS } from '@/shared/config/constants';
import { ReviewNotFoundError } from '@/shared/errors/domain.errors';

export const REVIEW_COMMENT_MODAL_PREFIX = 'review-comment';

const COMMENT_ID = 'comment';

export class ReviewCommentModal {
  public static build(requestId: number): ModalBuilder {
    return new ModalBuilder()
      .setCustomId(buildCustomId(REVIEW_COMMENT_MODAL_PREFIX, encodeNumericId(requestId)))
      .setTitle(`Отзыв по заказу #${requestId}`)
      .addComponents(
        new ActionRowBuilder<TextInputBuilder>().addComponents(
          new TextInputBuilder()
            .setCustomId(COMMENT_ID)
            .setLabel('Ваш отзыв')
            .setStyle(TextInputStyle.Paragraph)
            .setRequired(true)
            .setMaxLength(REVIEW_LIMITS.commentMaxLength)
            .setPlaceholder('Расскажите, как прошла работа.'),
        ),
      );
  }

  public static parseRequestId(customId: string): number | null {
    const segments = splitCustomId(customId, REVIEW_COMMENT_MODAL_PREFIX);
    return segments && segments.length === 1 ? decodeNumericId(segments[0]) : null;
  }

  public static parseFields(interaction: { fields: { getTextInputValue(id: string): string } }): string {
    return interaction.fields.getTextInputValue(COMMENT_ID).trim();
  }
}

export const registerReviewCommentModal = (useCase: SubmitReviewCommentUseCase): void => {
  registerModalHandler(REVIEW_COMMENT_MODAL_PREFIX, async (interaction) => {
    const requestId = ReviewCommentModal.parseRequestId(interaction.customId);

    try {
      if (requestId === null) {
        throw new Error(`Malformed review modal: ${interaction.customId}`);
      }

      await useCase.execute({
        requestId,
        actorUserId: interaction.user.id,
        comment: ReviewCommentModal.parseFields(interaction),
      });

      await interaction.reply({
        embeds: [embedFactory.success({ title: 'Спасибо за отзыв!', description: 'Ваш отзыв сохранён.' })],
      });
    } catch (error) {
      if (error instanceof ReviewNotFoundError && requestId !== null) {
        await interaction.reply({
          embeds: [
            embedFactory.info({
              title: 'Сначала оценка',
              description: 'Поставьте оценку от 1 до 5, затем снова нажмите «Написать отзыв».',
            }),
          ],
          components: [buildRatingRow(requestId)],
        });
        return;
      }

      await replyWithError(interaction, error, 'review:comment');
    }
  });
};
