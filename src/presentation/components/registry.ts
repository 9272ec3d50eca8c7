// ============================================================================
// src/presentation/components/registry.ts
// ============================================================================

import { Collection } from 'discord.js';
import type { ButtonInteraction, ModalSubmitInteraction } from 'discord.js';

export type ButtonHandler = (interaction: ButtonInteraction) => Promise<void>;
export type ModalHandler = (interaction: ModalSubmitInteraction) => Promise<void>;

export const buttonHandlers = new Collection<string, ButtonHandler>();
export const modalHandlers = new Collection<string, ModalHandler>();

/** Handlers are keyed by the custom id prefix (the text before the first `:`). */
export const registerButtonHandler = (prefix: string, handler: ButtonHandler): void => {
  buttonHandlers.set(prefix, handler);
};

export const registerModalHandler = (prefix: string, handler: ModalHandler): void => {
  modalHandlers.set(prefix, handler);
};

export const resolveComponentHandler = <T>(handlers: Collection<string, T>, customId: string): T | undefined => {
  const [prefix = customId] = customId.split(':', 1);
  return handlers.get(customId) ?? handlers.get(prefix);
};
