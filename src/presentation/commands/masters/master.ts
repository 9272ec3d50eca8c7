// ============================================================================
// src/presentation/commands/masters/master.ts
// ============================================================================

import { type ChatInputCommandInteraction, MessageFlags, SlashCommandBuilder } from 'discord.js';

import type { AttachVerificationDocumentsUseCase } from '@/application/usecases/masters/AttachVerificationDocumentsUseCase';
import type { GetMasterCabinetUseCase } from '@/application/usecases/masters/GetMasterCabinetUseCase';
import type { GetMasterReviewsUseCase } from '@/application/usecases/masters/GetMasterReviewsUseCase';
import type { Command } from '@/presentation/commands/types';
import { MasterRegistrationModal } from '@/presentation/components/modals/MasterRegistrationModal';
import { embedFactory } from '@/presentation/embeds/EmbedFactory';
import {
  EXPERIENCE_BUCKETS,
  type ExperienceBucket,
  isExperienceBucket,
  isServiceCategoryCode,
  SERVICE_CATEGORIES,
  type ServiceCategoryCode,
} from '@/shared/config/constants';
import { ValidationFailedError } from '@/shared/errors/domain.errors';

export interface MasterCommandDeps {
  readonly attachDocuments: AttachVerificationDocumentsUseCase;
  readonly getCabinet: GetMasterCabinetUseCase;
  readonly getReviews: GetMasterReviewsUseCase;
}

const TAX_ID_PATTERN = /^(?:\d{10}|\d{12})$/u;

const CATEGORY_CHOICES = SERVICE_CATEGORIES.map((category) => ({
  name: `${category.emoji} ${category.title}`,
  value: category.code,
}));

const EXPERIENCE_CHOICES = Object.entries(EXPERIENCE_BUCKETS).map(([value, name]) => ({ name, value }));

const readCategory = (interaction: ChatInputCommandInteraction, name: string, required: boolean) => {
  const value = interaction.options.getString(name, required);
  if (value === null) {
    return null;
  }
  if (!isServiceCategoryCode(value)) {
    throw new ValidationFailedError({ [name]: value });
  }
  return value;
};

const handleRegister = async (interaction: ChatInputCommandInteraction): Promise<void> => {
  const primary = readCategory(interaction, 'category', true);
  const secondary = readCategory(interaction, 'category2', false);
  const categories: ServiceCategoryCode[] = [];
  if (primary) categories.push(primary);
  if (secondary && secondary !== primary) categories.push(secondary);

  const experienceRaw = interaction.options.getString('experience');
  let experienceBucket: ExperienceBucket | null = null;
  if (experienceRaw !== null) {
    if (!isExperienceBucket(experienceRaw)) {
      throw new ValidationFailedError({ experience: experienceRaw });
    }
    experienceBucket = experienceRaw;
  }

  const taxId = interaction.options.getString('tax_id')?.trim() || null;
  if (taxId !== null && !TAX_ID_PATTERN.test(taxId)) {
    throw new ValidationFailedError({ tax_id: 'ИНН должен содержать 10 или 12 цифр.' });
  }

  await interaction.showModal(MasterRegistrationModal.build({ categories, experienceBucket, taxId }));
};

const handleDocuments = async (
  interaction: ChatInputCommandInteraction,
  useCase: AttachVerificationDocumentsUseCase,
): Promise<void> => {
  await interaction.deferReply({ flags: MessageFlags.Ephemeral });

  await useCase.execute({
    userId: interaction.user.id,
    passportScan: interaction.options.getAttachment('passport')?.url,
    facePhoto: interaction.options.getAttachment('face_photo')?.url,
    selfEmploymentDoc: interaction.options.getAttachment('self_employment')?.url,
  });

  await interaction.editReply({
    embeds: [
      embedFactory.success({
        title: 'Документы получены',
        description: 'Администратор проверит их и повысит уровень анкеты. Документы хранятся не дольше 72 часов.',
      }),
    ],
  });
};

export const createMasterCommand = (deps: MasterCommandDeps): Command => ({
  data: new SlashCommandBuilder()
    .setName('master')
    .setDescription('Анкета и кабинет мастера.')
    .addSubcommand((sub) =>
      sub
        .setName('register')
        .setDescription('Заполнить анкету мастера.')
        .addStringOption((option) =>
          option.setName('category').setDescription('Основная категория').setRequired(true).addChoices(...CATEGORY_CHOICES),
        )
        .addStringOption((option) =>
          option.setName('category2').setDescription('Дополнительная категория').addChoices(...CATEGORY_CHOICES),
        )
        .addStringOption((option) =>
          option.setName('experience').setDescription('Опыт работы').addChoices(...EXPERIENCE_CHOICES),
        )
        .addStringOption((option) =>
          option.setName('tax_id').setDescription('ИНН (10 или 12 цифр)').setMaxLength(12),
        ),
    )
    .addSubcommand((sub) =>
      sub
        .setName('documents')
        .setDescription('Приложить документы для проверки.')
        .addAttachmentOption((option) => option.setName('passport').setDescription('Скан паспорта'))
        .addAttachmentOption((option) => option.setName('face_photo').setDescription('Фото лица'))
        .addAttachmentOption((option) =>
          option.setName('self_employment').setDescription('Справка о самозанятости или ИП'),
        ),
    )
    .addSubcommand((sub) => sub.setName('cabinet').setDescription('Статус, подписки и последние заказы.'))
    .addSubcommand((sub) => sub.setName('reviews').setDescription('Рейтинг и отзывы клиентов.')),
  category: 'Мастерам',
  examples: ['/master register category:Ремонт', '/master cabinet'],
  async execute(interaction) {
    switch (interaction.options.getSubcommand()) {
      case 'register':
        await handleRegister(interaction);
        return;
      case 'documents':
        await handleDocuments(interaction, deps.attachDocuments);
        return;
      case 'cabinet': {
        await interaction.deferReply({ flags: MessageFlags.Ephemeral });
        const cabinet = await deps.getCabinet.execute({ userId: interaction.user.id });
        await interaction.editReply({ embeds: [embedFactory.masterCabinet(cabinet)] });
        return;
      }
      case 'reviews': {
        await interaction.deferReply({ flags: MessageFlags.Ephemeral });
        const overview = await deps.getReviews.execute({ userId: interaction.user.id });
        await interaction.editReply({ embeds: [embedFactory.masterReviews(overview)] });
        return;
      }
      default:
        throw new ValidationFailedError({ subcommand: interaction.options.getSubcommand() });
    }
  },
});
