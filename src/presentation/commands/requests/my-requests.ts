// ============================================================================
// src/presentation/commands/requests/my-requests.ts
// ============================================================================

import { MessageFlags, SlashCommandBuilder } from 'discord.js';

import type { GetClientRequestsUseCase } from '@/application/usecases/requests/GetClientRequestsUseCase';
import type { Command } from '@/presentation/commands/types';
import { embedFactory } from '@/presentation/embeds/EmbedFactory';

export interface MyRequestsCommandDeps {
  readonly getClientRequests: GetClientRequestsUseCase;
}

export const createMyRequestsCommand = (deps: MyRequestsCommandDeps): Command => ({
  data: new SlashCommandBuilder().setName('my_requests').setDescription('Ваши заявки: активные и завершённые.'),
  category: 'Клиентам',
  examples: ['/my_requests'],
  async execute(interaction) {
    await interaction.deferReply({ flags: MessageFlags.Ephemeral });
    const overview = await deps.getClientRequests.execute({ userId: interaction.user.id });
    await interaction.editReply({ embeds: [embedFactory.clientRequests(overview)] });
  },
});
