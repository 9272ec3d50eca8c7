// ============================================================================
// src/presentation/components/respond.ts
// ============================================================================

import type { ButtonInteraction, ModalSubmitInteraction } from 'discord.js';

import { mapErrorToDiscordResponse } from '@/shared/errors/discord-error-mapper';
import { logger } from '@/shared/logger/pino';

type ComponentInteraction = ButtonInteraction | ModalSubmitInteraction;

/** Logs the failure and answers the user with an ephemeral embed. */
export const replyWithError = async (
  interaction: ComponentInteraction,
  error: unknown,
  action: string,
): Promise<void> => {
  const { shouldLogStack, referenceId, embeds, flags } = mapErrorToDiscordResponse(error);
  const logPayload = { err: error, referenceId, action, userId: interaction.user.id, customId: interaction.customId };

  if (shouldLogStack) {
    logger.error(logPayload, 'Ошибка при обработке действия.');
  } else {
    logger.warn(logPayload, 'Действие отклонено.');
  }

  if (interaction.deferred || interaction.replied) {
    await interaction.followUp({ embeds, flags });
  } else {
    await interaction.reply({ embeds, flags });
  }
};
