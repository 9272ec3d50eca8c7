// ============================================================================
// src/presentation/components/modals/MasterRegistrationModal.ts
// ============================================================================

import { ActionRowBuilder, MessageFlags, ModalBuilder, TextInputBuilder, TextInputStyle } from 'discord.js';

import type { RegisterMasterDTO } from '@/application/dto/master.dto';
import type { RegisterMasterUseCase } from '@/application/usecases/masters/RegisterMasterUseCase';
import { buildCustomId, splitCustomId } from '@/presentation/components/customId';
import { registerModalHandler } from '@/presentation/components/registry';
import { replyWithError } from '@/presentation/components/respond';
import { embedFactory } from '@/presentation/embeds/EmbedFactory';
import {
  type ExperienceBucket,
  isExperienceBucket,
  isServiceCategoryCode,
  type ServiceCategoryCode,
} from '@/shared/config/constants';

export const MASTER_REGISTRATION_MODAL_PREFIX = 'master-form';

const EMPTY_SEGMENT = '-';
const CATEGORY_SEPARATOR = '+';

const FIELD_IDS = {
  fullName: 'full_name',
  phone: 'phone',
  experience: 'experience',
  portfolio: 'portfolio',
  references: 'references',
} as const;

/** Choices made through slash-command options, carried into the modal's custom id. */
export interface MasterRegistrationChoices {
  readonly categories: ReadonlyArray<ServiceCategoryCode>;
  readonly experienceBucket: ExperienceBucket | null;
  readonly taxId: string | null;
}

interface FieldReader {
  readonly fields: { getTextInputValue(id: string): string };
}

const textRow = (input: TextInputBuilder): ActionRowBuilder<TextInputBuilder> =>
  new ActionRowBuilder<TextInputBuilder>().addComponents(input);

const optionalInput = (id: string, label: string, placeholder: string): TextInputBuilder =>
  new TextInputBuilder()
    .setCustomId(id)
    .setLabel(label)
    .setStyle(TextInputStyle.Paragraph)
    .setRequired(false)
    .setMaxLength(500)
    .setPlaceholder(placeholder);

export class MasterRegistrationModal {
  public static build(choices: MasterRegistrationChoices): ModalBuilder {
    const customId = buildCustomId(
      MASTER_REGISTRATION_MODAL_PREFIX,
      choices.categories.join(CATEGORY_SEPARATOR),
      choices.experienceBucket ?? EMPTY_SEGMENT,
      choices.taxId ?? EMPTY_SEGMENT,
    );

    return new ModalBuilder()
      .setCustomId(customId)
      .setTitle('Анкета мастера')
      .addComponents(
        textRow(
          new TextInputBuilder()
            .setCustomId(FIELD_IDS.fullName)
            .setLabel('Имя и фамилия')
            .setStyle(TextInputStyle.Short)
            .setRequired(true)
            .setMinLength(2)
            .setMaxLength(100),
        ),
        textRow(
          new TextInputBuilder()
            .setCustomId(FIELD_IDS.phone)
            .setLabel('Телефон')
            .setStyle(TextInputStyle.Short)
            .setRequired(true)
            .setPlaceholder('+7XXXXXXXXXX')
            .setMaxLength(20),
        ),
        textRow(optionalInput(FIELD_IDS.experience, 'Опыт работы', 'Где и чем занимались.')),
        textRow(optionalInput(FIELD_IDS.portfolio, 'Портфолио', 'Ссылки на работы.')),
        textRow(optionalInput(FIELD_IDS.references, 'Рекомендации', 'Кто может подтвердить ваш опыт.')),
      );
  }

  public static parseChoices(customId: string): MasterRegistrationChoices | null {
    const segments = splitCustomId(customId, MASTER_REGISTRATION_MODAL_PREFIX);
    if (!segments || segments.length !== 3) {
      return null;
    }

    const [categoriesRaw = '', bucketRaw = EMPTY_SEGMENT, taxIdRaw = EMPTY_SEGMENT] = segments;
    const categories = categoriesRaw.split(CATEGORY_SEPARATOR).filter(isServiceCategoryCode);
    if (categories.length === 0) {
      return null;
    }

    let experienceBucket: ExperienceBucket | null = null;
    if (bucketRaw !== EMPTY_SEGMENT) {
      if (!isExperienceBucket(bucketRaw)) {
        return null;
      }
      experienceBucket = bucketRaw;
    }

    return {
      categories,
      experienceBucket,
      taxId: taxIdRaw === EMPTY_SEGMENT ? null : taxIdRaw,
    };
  }

  public static parseFields(
    interaction: FieldReader,
    userId: string,
    choices: MasterRegistrationChoices,
  ): RegisterMasterDTO {
    const read = (id: string) => interaction.fields.getTextInputValue(id);

    return {
      userId,
      categories: [...choices.categories],
      experienceBucket: choices.experienceBucket ?? undefined,
      taxId: choices.taxId ?? undefined,
      fullName: read(FIELD_IDS.fullName),
      phone: read(FIELD_IDS.phone),
      experienceText: read(FIELD_IDS.experience),
      portfolio: read(FIELD_IDS.portfolio),
      references: read(FIELD_IDS.references),
    };
  }
}

export const registerMasterRegistrationModal = (useCase: RegisterMasterUseCase): void => {
  registerModalHandler(MASTER_REGISTRATION_MODAL_PREFIX, async (interaction) => {
    try {
      const choices = MasterRegistrationModal.parseChoices(interaction.customId);
      if (!choices) {
        throw new Error(`Malformed master modal: ${interaction.customId}`);
      }

      const master = await useCase.execute(
        MasterRegistrationModal.parseFields(interaction, interaction.user.id, choices),
      );

      await interaction.reply({
        embeds: [
          embedFactory.success({
            title: 'Анкета сохранена',
            description:
              'Вы зарегистрированы как мастер. Новые заявки будут приходить в личные сообщения. ' +
              'Приложите документы командой `/master documents`.',
          }),
          embedFactory.masterProfile(master),
        ],
        flags: MessageFlags.Ephemeral,
      });
    } catch (error) {
      await replyWithError(interaction, error, 'master:register');
    }
  });
};
