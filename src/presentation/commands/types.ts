// ============================================================================
// src/presentation/commands/types.ts
// ============================================================================

import type {
  ChatInputCommandInteraction,
  SlashCommandBuilder,
  SlashCommandOptionsOnlyBuilder,
  SlashCommandSubcommandsOnlyBuilder,
} from 'discord.js';

type SlashBuilder =
  | SlashCommandBuilder
  | SlashCommandOptionsOnlyBuilder
  | SlashCommandSubcommandsOnlyBuilder;

export type CommandCategory = 'Общее' | 'Клиентам' | 'Мастерам' | 'Администрирование';

export interface CommandMeta {
  readonly category?: CommandCategory;
  readonly examples?: ReadonlyArray<string>;
}

export interface Command extends CommandMeta {
  readonly data: SlashBuilder;
  readonly execute: (interaction: ChatInputCommandInteraction) => Promise<void>;
}
