// ============================================================================
// src/presentation/events/ready.ts
// ============================================================================

import { ActivityType, type Client, Events } from 'discord.js';

import type { EventDescriptor } from '@/presentation/events/types';
import { logger } from '@/shared/logger/pino';

export const readyEvent: EventDescriptor<typeof Events.ClientReady> = {
  name: Events.ClientReady,
  once: true,
  async execute(client: Client<true>): Promise<void> {
    client.user.setPresence({
      activities: [{ name: 'заявки /request', type: ActivityType.Watching }],
      status: 'online',
    });

    logger.info({ tag: client.user.tag, guilds: client.guilds.cache.size }, 'Бот подключён к Discord.');
  },
};
