// ============================================================================
// src/presentation/components/modals/ComplaintModal.ts
// ============================================================================

import { ActionRowBuilder, MessageFlags, ModalBuilder, TextInputBuilder, TextInputStyle } from 'discord.js';

import type { FileComplaintDTO } from '@/application/dto/complaint.dto';
import type { FileComplaintUseCase } from '@/application/usecases/complaints/FileComplaintUseCase';
import { type ComplaintRole, parseComplaintRole } from '@/domain/value-objects/ComplaintRole';
import { buildCustomId, splitCustomId } from '@/presentation/components/customId';
import { registerModalHandler } from '@/presentation/components/registry';
import { replyWithError } from '@/presentation/components/respond';
import { embedFactory } from '@/presentation/embeds/EmbedFactory';
import { COMPLAINT_LIMITS } from '@/shared/config/constants';

export const COMPLAINT_MODAL_PREFIX = 'complaint-form';

const FIELD_IDS = {
  requestId: 'order_id',
  masterId: 'master_id',
  text: 'text',
} as const;

interface FieldReader {
  readonly fields: { getTextInputValue(id: string): string };
}

const textRow = (input: TextInputBuilder): ActionRowBuilder<TextInputBuilder> =>
  new ActionRowBuilder<TextInputBuilder>().addComponents(input);

const referenceInput = (id: string, label: string): TextInputBuilder =>
  new TextInputBuilder()
    .setCustomId(id)
    .setLabel(label)
    .setStyle(TextInputStyle.Short)
    .setRequired(false)
    .setMaxLength(12)
    .setPlaceholder('Например, 42');

export class ComplaintModal {
  public static build(role: ComplaintRole): ModalBuilder {
    return new ModalBuilder()
      .setCustomId(buildCustomId(COMPLAINT_MODAL_PREFIX, role))
      .setTitle('Жалоба')
      .addComponents(
        textRow(referenceInput(FIELD_IDS.requestId, 'Номер заказа (если есть)')),
        textRow(referenceInput(FIELD_IDS.masterId, 'Номер мастера (если есть)')),
        textRow(
          new TextInputBuilder()
            .setCustomId(FIELD_IDS.text)
            .setLabel('Что случилось?')
            .setStyle(TextInputStyle.Paragraph)
            .setRequired(true)
            .setMinLength(COMPLAINT_LIMITS.textMinLength)
            .setMaxLength(COMPLAINT_LIMITS.textMaxLength),
        ),
      );
  }

  public static parseRole(customId: string): ComplaintRole | null {
    const segments = splitCustomId(customId, COMPLAINT_MODAL_PREFIX);
    if (!segments || segments.length !== 1) {
      return null;
    }
    return parseComplaintRole(segments[0] ?? '');
  }

  public static parseFields(interaction: FieldReader, reporterUserId: string, role: ComplaintRole): FileComplaintDTO {
    const read = (id: string) => interaction.fields.getTextInputValue(id);

    return {
      reporterUserId,
      role,
      requestId: read(FIELD_IDS.requestId),
      masterId: read(FIELD_IDS.masterId),
      text: read(FIELD_IDS.text),
    };
  }
}

export const registerComplaintModal = (useCase: FileComplaintUseCase): void => {
  registerModalHandler(COMPLAINT_MODAL_PREFIX, async (interaction) => {
    try {
      const role = ComplaintModal.parseRole(interaction.customId);
      if (!role) {
        throw new Error(`Malformed complaint modal: ${interaction.customId}`);
      }

      const complaint = await useCase.execute(ComplaintModal.parseFields(interaction, interaction.user.id, role));

      await interaction.reply({
        embeds: [
          embedFactory.success({
            title: `Жалоба #${complaint.id} принята`,
            description: 'Администраторы рассмотрят её и свяжутся с вами при необходимости.',
          }),
        ],
        flags: MessageFlags.Ephemeral,
      });
    } catch (error) {
      await replyWithError(interaction, error, 'complaint:file');
    }
  });
};
