// ============================================================================
// src/presentation/commands/general/complaint.ts
// ============================================================================

import { SlashCommandBuilder } from 'discord.js';

import { ComplaintRole, isComplaintRole } from '@/domain/value-objects/ComplaintRole';
import type { Command } from '@/presentation/commands/types';
import { ComplaintModal } from '@/presentation/components/modals/ComplaintModal';
import { ValidationFailedError } from '@/shared/errors/domain.errors';

const ROLE_CHOICES = [
  { name: 'Я клиент', value: ComplaintRole.CLIENT },
  { name: 'Я мастер', value: ComplaintRole.MASTER },
  { name: 'Другое', value: ComplaintRole.OTHER },
];

export const complaintCommand: Command = {
  data: new SlashCommandBuilder()
    .setName('complaint')
    .setDescription('Пожаловаться администрации.')
    .addStringOption((option) =>
      option.setName('role').setDescription('Кто вы в этой ситуации').setRequired(true).addChoices(...ROLE_CHOICES),
    ),
  category: 'Общее',
  examples: ['/complaint role:Я клиент'],
  async execute(interaction) {
    const role = interaction.options.getString('role', true);
    if (!isComplaintRole(role)) {
      throw new ValidationFailedError({ role });
    }

    await interaction.showModal(ComplaintModal.build(role));
  },
};
