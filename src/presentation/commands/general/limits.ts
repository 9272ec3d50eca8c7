// ============================================================================
// src/presentation/commands/general/limits.ts
// ============================================================================

import { MessageFlags, SlashCommandBuilder } from 'discord.js';

import type { GetRateLimitStatusUseCase } from '@/application/usecases/account/GetRateLimitStatusUseCase';
import type { Command } from '@/presentation/commands/types';
import { embedFactory } from '@/presentation/embeds/EmbedFactory';

export interface LimitsCommandDeps {
  readonly getRateLimits: GetRateLimitStatusUseCase;
}

export const createLimitsCommand = (deps: LimitsCommandDeps): Command => ({
  data: new SlashCommandBuilder().setName('limits').setDescription('Сколько действий вам ещё доступно.'),
  category: 'Общее',
  examples: ['/limits'],
  async execute(interaction) {
    const statuses = deps.getRateLimits.execute({ userId: interaction.user.id });
    await interaction.reply({ embeds: [embedFactory.rateLimits(statuses)], flags: MessageFlags.Ephemeral });
  },
});
