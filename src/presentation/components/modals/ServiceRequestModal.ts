// ============================================================================
// src/presentation/components/modals/ServiceRequestModal.ts
// ============================================================================

import { ActionRowBuilder, ModalBuilder, TextInputBuilder, TextInputStyle } from 'discord.js';

import type { CreateServiceRequestDTO } from '@/application/dto/request.dto';
import type { CreateServiceRequestUseCase } from '@/application/usecases/requests/CreateServiceRequestUseCase';
import { buildCustomId, splitCustomId } from '@/presentation/components/customId';
import { registerModalHandler } from '@/presentation/components/registry';
import { replyWithError } from '@/presentation/components/respond';
import { embedFactory } from '@/presentation/embeds/EmbedFactory';
import { isServiceCategoryCode, type ServiceCategoryCode, serviceCategoryLabel } from '@/shared/config/constants';

export const SERVICE_REQUEST_MODAL_PREFIX = 'request-form';

const FIELD_IDS = {
  name: 'name',
  contact: 'contact',
  address: 'address',
  description: 'description',
  time: 'time',
} as const;

interface FieldReader {
  readonly fields: { getTextInputValue(id: string): string };
}

const textRow = (input: TextInputBuilder): ActionRowBuilder<TextInputBuilder> =>
  new ActionRowBuilder<TextInputBuilder>().addComponents(input);

export class ServiceRequestModal {
  public static build(category: ServiceCategoryCode): ModalBuilder {
    return new ModalBuilder()
      .setCustomId(buildCustomId(SERVICE_REQUEST_MODAL_PREFIX, category))
      .setTitle(`Заявка: ${serviceCategoryLabel(category)}`)
      .addComponents(
        textRow(
          new TextInputBuilder()
            .setCustomId(FIELD_IDS.name)
            .setLabel('Ваше имя')
            .setStyle(TextInputStyle.Short)
            .setRequired(true)
            .setMaxLength(100),
        ),
        textRow(
          new TextInputBuilder()
            .setCustomId(FIELD_IDS.contact)
            .setLabel('Телефон или другой контакт')
            .setStyle(TextInputStyle.Short)
            .setRequired(true)
            .setMinLength(3)
            .setMaxLength(100),
        ),
        textRow(
          new TextInputBuilder()
            .setCustomId(FIELD_IDS.address)
            .setLabel('Адрес')
            .setStyle(TextInputStyle.Short)
            .setRequired(true)
            .setMinLength(5)
            .setMaxLength(200),
        ),
        textRow(
          new TextInputBuilder()
            .setCustomId(FIELD_IDS.description)
            .setLabel('Что нужно сделать')
            .setStyle(TextInputStyle.Paragraph)
            .setRequired(true)
            .setMaxLength(1_000),
        ),
        textRow(
          new TextInputBuilder()
            .setCustomId(FIELD_IDS.time)
            .setLabel('Удобное время')
            .setStyle(TextInputStyle.Short)
            .setRequired(true)
            .setPlaceholder('Например: завтра после 18:00')
            .setMaxLength(100),
        ),
      );
  }

  public static parseCategory(customId: string): ServiceCategoryCode | null {
    const segments = splitCustomId(customId, SERVICE_REQUEST_MODAL_PREFIX);
    const [code] = segments ?? [];
    return segments?.length === 1 && code !== undefined && isServiceCategoryCode(code) ? code : null;
  }

  public static parseFields(
    interaction: FieldReader,
    clientUserId: string,
    category: ServiceCategoryCode,
  ): CreateServiceRequestDTO {
    const read = (id: string) => interaction.fields.getTextInputValue(id);

    return {
      clientUserId,
      category,
      clientName: read(FIELD_IDS.name),
      contact: read(FIELD_IDS.contact),
      address: read(FIELD_IDS.address),
      description: read(FIELD_IDS.description),
      desiredTime: read(FIELD_IDS.time),
    };
  }
}

export const registerServiceRequestModal = (useCase: CreateServiceRequestUseCase): void => {
  registerModalHandler(SERVICE_REQUEST_MODAL_PREFIX, async (interaction) => {
    try {
      const category = ServiceRequestModal.parseCategory(interaction.customId);
      if (!category) {
        throw new Error(`Malformed request modal: ${interaction.customId}`);
      }

      await interaction.deferReply();

      const { request, broadcast } = await useCase.execute(
        ServiceRequestModal.parseFields(interaction, interaction.user.id, category),
      );

      const description =
        broadcast.offered > 0
          ? `Заявка #${request.id} отправлена мастерам (${broadcast.offered}). Как только кто-то возьмёт заказ, мы сообщим вам.`
          : `Заявка #${request.id} принята. Сейчас нет свободных мастеров в этой категории, администратор подберёт исполнителя.`;

      await interaction.editReply({
        embeds: [embedFactory.success({ title: 'Заявка создана', description }), embedFactory.requestSummary(request)],
      });
    } catch (error) {
      await replyWithError(interaction, error, 'request:create');
    }
  });
};
