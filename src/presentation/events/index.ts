// ============================================================================
// src/presentation/events/index.ts
// ============================================================================

import type { Client } from 'discord.js';

import { interactionCreateEvent } from '@/presentation/events/interactionCreate';
import { readyEvent } from '@/presentation/events/ready';
import { bindEvent } from '@/presentation/events/types';
import { logger } from '@/shared/logger/pino';

const reportEventFailure = (error: unknown, name: string): void => {
  logger.error({ err: error, event: name }, 'Необработанная ошибка в обработчике события.');
};

export const registerEvents = (client: Client): void => {
  bindEvent(client, readyEvent, reportEventFailure);
  bindEvent(client, interactionCreateEvent, reportEventFailure);
};
