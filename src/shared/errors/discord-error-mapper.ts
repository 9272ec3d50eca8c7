// ============================================================================
// src/shared/errors/discord-error-mapper.ts
// ============================================================================

import { randomUUID } from 'node:crypto';

import { type EmbedBuilder, MessageFlags } from 'discord.js';
import { ZodError } from 'zod';

import { embedFactory } from '@/presentation/embeds/EmbedFactory';
import { isMasterMatchError } from '@/shared/errors/base.error';

export interface DiscordErrorResponse {
  readonly embeds: EmbedBuilder[];
  readonly flags: MessageFlags.Ephemeral;
  readonly shouldLogStack: boolean;
  readonly referenceId: string;
}

const describeZodError = (error: ZodError): string =>
  error.issues
    .map((issue) => (issue.path.length > 0 ? `• ${issue.path.join('.')}: ${issue.message}` : `• ${issue.message}`))
    .join('\n');

export const mapErrorToDiscordResponse = (error: unknown): DiscordErrorResponse => {
  const referenceId = randomUUID().slice(0, 8);

  if (error instanceof ZodError) {
    return {
      embeds: [
        embedFactory.warning({
          title: 'Проверьте введённые данные',
          description: describeZodError(error),
        }),
      ],
      flags: MessageFlags.Ephemeral,
      shouldLogStack: false,
      referenceId,
    };
  }

  if (isMasterMatchError(error) && error.exposeMessage) {
    return {
      embeds: [
        embedFactory.error({
          title: 'Действие невозможно',
          description: error.message,
        }),
      ],
      flags: MessageFlags.Ephemeral,
      shouldLogStack: false,
      referenceId,
    };
  }

  return {
    embeds: [
      embedFactory.error({
        title: 'Что-то пошло не так',
        description: 'Произошла внутренняя ошибка. Попробуйте позже или обратитесь к администратору.',
        footer: `Код обращения: ${referenceId}`,
      }),
    ],
    flags: MessageFlags.Ephemeral,
    shouldLogStack: true,
    referenceId,
  };
};
