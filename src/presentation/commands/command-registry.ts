// ============================================================================
// src/presentation/commands/command-registry.ts
// ============================================================================

import { Collection, type RESTPostAPIApplicationCommandsJSONBody } from 'discord.js';

import type { Command } from '@/presentation/commands/types';

export const commandRegistry = new Collection<string, Command>();

export const registerCommands = (commands: ReadonlyArray<Command>): void => {
  for (const command of commands) {
    const name = command.data.name;

    if (commandRegistry.has(name)) {
      throw new Error(`Команда ${name} уже зарегистрирована.`);
    }

    commandRegistry.set(name, command);
  }
};

export const getRegisteredCommands = (): ReadonlyArray<Command> => [...commandRegistry.values()];

export const serializeCommands = (): RESTPostAPIApplicationCommandsJSONBody[] =>
  getRegisteredCommands().map((command) => command.data.toJSON());
