// ============================================================================
// src/presentation/events/interactionCreate.ts
// ============================================================================

import type { ButtonInteraction, ChatInputCommandInteraction, Interaction, ModalSubmitInteraction } from 'discord.js';
import { DiscordAPIError, Events, MessageFlags } from 'discord.js';
import { RESTJSONErrorCodes } from 'discord-api-types/v10';

import { commandRegistry } from '@/presentation/commands/command-registry';
import { buttonHandlers, modalHandlers, resolveComponentHandler } from '@/presentation/components/registry';
import { embedFactory } from '@/presentation/embeds/EmbedFactory';
import type { EventDescriptor } from '@/presentation/events/types';
import { mapErrorToDiscordResponse } from '@/shared/errors/discord-error-mapper';
import { logger } from '@/shared/logger/pino';

const handleChatInput = async (interaction: ChatInputCommandInteraction): Promise<void> => {
  const command = commandRegistry.get(interaction.commandName);

  if (!command) {
    logger.warn({ commandName: interaction.commandName }, 'Попытка вызвать незарегистрированную команду.');

    await interaction.reply({
      embeds: [
        embedFactory.warning({
          title: 'Команда недоступна',
          description: 'Эта команда больше не зарегистрирована. Список актуальных команд: `/help`.',
        }),
      ],
      flags: MessageFlags.Ephemeral,
    });

    return;
  }

  logger.debug({ commandName: interaction.commandName, userId: interaction.user.id }, 'Выполнение команды.');
  await command.execute(interaction);
};

const handleButton = async (interaction: ButtonInteraction): Promise<void> => {
  const handler = resolveComponentHandler(buttonHandlers, interaction.customId);

  if (!handler) {
    logger.warn({ customId: interaction.customId }, 'Нет обработчика для кнопки.');

    await interaction.reply({
      embeds: [
        embedFactory.warning({
          title: 'Действие недоступно',
          description: 'Эта кнопка больше не активна.',
        }),
      ],
      flags: MessageFlags.Ephemeral,
    });

    return;
  }

  await handler(interaction);
};

const handleModal = async (interaction: ModalSubmitInteraction): Promise<void> => {
  const handler = resolveComponentHandler(modalHandlers, interaction.customId);

  if (!handler) {
    logger.warn({ customId: interaction.customId }, 'Нет обработчика для формы.');

    await interaction.reply({
      embeds: [
        embedFactory.warning({
          title: 'Форма устарела',
          description: 'Эта форма больше не действует. Запустите команду заново.',
        }),
      ],
      flags: MessageFlags.Ephemeral,
    });

    return;
  }

  await handler(interaction);
};

export const interactionCreateEvent: EventDescriptor<typeof Events.InteractionCreate> = {
  name: Events.InteractionCreate,
  once: false,
  async execute(interaction: Interaction): Promise<void> {
    try {
      if (interaction.isChatInputCommand()) {
        await handleChatInput(interaction);
        return;
      }

      if (interaction.isButton()) {
        await handleButton(interaction);
        return;
      }

      if (interaction.isModalSubmit()) {
        await handleModal(interaction);
      }
    } catch (error) {
      const baseLog = { interactionType: interaction.type, userId: interaction.user.id };

      if (error instanceof DiscordAPIError) {
        if (error.code === RESTJSONErrorCodes.UnknownInteraction) {
          logger.warn({ ...baseLog, err: error }, 'Взаимодействие истекло до ответа.');
          return;
        }

        if (error.code === RESTJSONErrorCodes.InteractionHasAlreadyBeenAcknowledged) {
          logger.warn({ ...baseLog, err: error }, 'Взаимодействие уже было подтверждено.');
          return;
        }
      }

      const { shouldLogStack, referenceId, ...response } = mapErrorToDiscordResponse(error);
      const logPayload = { ...baseLog, referenceId, err: error };

      if (shouldLogStack) {
        logger.error(logPayload, 'Непредвиденная ошибка при обработке взаимодействия.');
      } else {
        logger.warn(logPayload, 'Обработанная ошибка при обработке взаимодействия.');
      }

      if (interaction.isRepliable()) {
        if (interaction.deferred || interaction.replied) {
          await interaction.followUp(response);
        } else {
          await interaction.reply(response);
        }
      }
    }
  },
};
