// ============================================================================
// src/presentation/commands/general/ping.ts
// ============================================================================

import { MessageFlags, SlashCommandBuilder } from 'discord.js';

import type { Command } from '@/presentation/commands/types';
import { embedFactory } from '@/presentation/embeds/EmbedFactory';
import { logger } from '@/shared/logger/pino';

export const pingCommand: Command = {
  data: new SlashCommandBuilder().setName('ping').setDescription('Проверяет задержку бота и соединение с Discord.'),
  category: 'Общее',
  examples: ['/ping'],
  async execute(interaction) {
    const interactionLatency = Date.now() - interaction.createdTimestamp;
    const websocketLatency = Math.round(interaction.client.ws.ping);

    logger.debug({ interactionLatency, websocketLatency }, 'Выполнен ping.');

    await interaction.reply({
      embeds: [
        embedFactory.success({
          title: '🏓 Pong!',
          description: `Задержка REST: **${interactionLatency} мс**\nЗадержка WebSocket: **${websocketLatency} мс**`,
        }),
      ],
      flags: MessageFlags.Ephemeral,
    });
  },
};
