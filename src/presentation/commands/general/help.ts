// ============================================================================
// src/presentation/commands/general/help.ts
// ============================================================================

import { type EmbedBuilder, MessageFlags, SlashCommandBuilder } from 'discord.js';

import { getRegisteredCommands } from '@/presentation/commands/command-registry';
import type { Command, CommandCategory } from '@/presentation/commands/types';
import { embedFactory } from '@/presentation/embeds/EmbedFactory';
import { clampEmbedField } from '@/shared/utils/discord.utils';

const CATEGORY_ORDER: ReadonlyArray<CommandCategory> = ['Клиентам', 'Мастерам', 'Общее', 'Администрирование'];

const buildFieldValue = (commands: ReadonlyArray<Command>): string =>
  commands
    .map((command) => {
      const base = `• **/${command.data.name}** — ${command.data.description}`;
      const examples = command.examples?.length
        ? `\n   Примеры: ${command.examples.map((example) => `\`${example}\``).join(', ')}`
        : '';
      return `${base}${examples}`;
    })
    .join('\n');

export const createHelpEmbed = (commands: ReadonlyArray<Command>): EmbedBuilder => {
  const fields = CATEGORY_ORDER.map((category) => ({
    category,
    commands: commands.filter((command) => (command.category ?? 'Общее') === category),
  }))
    .filter((group) => group.commands.length > 0)
    .map((group) => ({ name: group.category, value: clampEmbedField(buildFieldValue(group.commands)) }));

  return embedFactory.info({
    title: '📚 Доступные команды',
    description: 'Оставьте заявку через `/request`, а мастера получат её в личные сообщения.',
    fields,
  });
};

export const helpCommand: Command = {
  data: new SlashCommandBuilder().setName('help').setDescription('Показывает список команд.'),
  category: 'Общее',
  examples: ['/help'],
  async execute(interaction) {
    await interaction.reply({
      embeds: [createHelpEmbed(getRegisteredCommands())],
      flags: MessageFlags.Ephemeral,
    });
  },
};
