// ============================================================================
// src/presentation/commands/requests/request.ts
// ============================================================================

import { SlashCommandBuilder } from 'discord.js';

import type { Command } from '@/presentation/commands/types';
import { ServiceRequestModal } from '@/presentation/components/modals/ServiceRequestModal';
import { isServiceCategoryCode, SERVICE_CATEGORIES } from '@/shared/config/constants';
import { ValidationFailedError } from '@/shared/errors/domain.errors';

export const requestCommand: Command = {
  data: new SlashCommandBuilder()
    .setName('request')
    .setDescription('Оставить заявку на услугу.')
    .addStringOption((option) =>
      option
        .setName('category')
        .setDescription('Категория услуги')
        .setRequired(true)
        .addChoices(...SERVICE_CATEGORIES.map((category) => ({
          name: `${category.emoji} ${category.title}`,
          value: category.code,
        }))),
    ),
  category: 'Клиентам',
  examples: ['/request category:Ремонт'],
  async execute(interaction) {
    const category = interaction.options.getString('category', true);
    if (!isServiceCategoryCode(category)) {
      throw new ValidationFailedError({ category });
    }

    await interaction.showModal(ServiceRequestModal.build(category));
  },
};
