// ============================================================================
// src/index.ts
// ============================================================================

import { Client, GatewayIntentBits, Partials, REST, Routes } from 'discord.js';

import { createMarketplace, registerComponentHandlers } from '@/container';
import { MysqlTransactionManager } from '@/infrastructure/db/MysqlTransactionManager';
import { disconnectDatabase, ensureDatabaseConnection, pool } from '@/infrastructure/db/mysql';
import { DiscordMarketplaceNotifier } from '@/infrastructure/external/DiscordMarketplaceNotifier';
import { InMemoryRateLimiter } from '@/infrastructure/rate-limit/InMemoryRateLimiter';
import { MysqlComplaintRepository } from '@/infrastructure/repositories/MysqlComplaintRepository';
import { MysqlMasterRepository } from '@/infrastructure/repositories/MysqlMasterRepository';
import { MysqlOfferRepository } from '@/infrastructure/repositories/MysqlOfferRepository';
import { MysqlReviewRepository } from '@/infrastructure/repositories/MysqlReviewRepository';
import { MysqlServiceRequestRepository } from '@/infrastructure/repositories/MysqlServiceRequestRepository';
import { registerMarketplaceCommands, serializeCommands } from '@/presentation/commands';
import { registerEvents } from '@/presentation/events';
import { env } from '@/shared/config/env';
import { logger } from '@/shared/logger/pino';
import { versionInfo } from '@/shared/version';

const client = new Client({
  intents: [GatewayIntentBits.Guilds, GatewayIntentBits.DirectMessages],
  partials: [Partials.Channel],
});

const marketplace = createMarketplace({
  requestRepo: new MysqlServiceRequestRepository(pool),
  masterRepo: new MysqlMasterRepository(pool),
  offerRepo: new MysqlOfferRepository(pool),
  reviewRepo: new MysqlReviewRepository(pool),
  complaintRepo: new MysqlComplaintRepository(pool),
  transactions: new MysqlTransactionManager(pool, logger.child({ module: 'transactions' })),
  notifier: new DiscordMarketplaceNotifier(client, env.ADMIN_CHANNEL_ID, logger.child({ module: 'notifier' })),
  rateLimiter: new InMemoryRateLimiter(),
  sweepSettings: {
    intervalMs: env.SWEEP_INTERVAL_MS,
    backoffMs: env.SWEEP_BACKOFF_MS,
    autoCompleteAfterMs: env.AUTO_COMPLETE_AFTER_MS,
    documentRetentionMs: env.DOCUMENT_RETENTION_MS,
    rateLimitIdleMs: env.RATE_LIMIT_IDLE_MS,
  },
});

registerComponentHandlers(marketplace);
registerMarketplaceCommands({ ...marketplace, adminUserIds: env.ADMIN_USER_IDS });
registerEvents(client);

const deployCommands = async (): Promise<void> => {
  const rest = new REST({ version: '10' }).setToken(env.DISCORD_TOKEN);
  const body = serializeCommands();
  const route = env.DISCORD_GUILD_ID
    ? Routes.applicationGuildCommands(env.DISCORD_CLIENT_ID, env.DISCORD_GUILD_ID)
    : Routes.applicationCommands(env.DISCORD_CLIENT_ID);

  await rest.put(route, { body });
  logger.info({ count: body.length, guildId: env.DISCORD_GUILD_ID ?? null }, 'Slash-команды зарегистрированы.');
};

let shuttingDown = false;

const shutdown = async (signal: string): Promise<void> => {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;

  logger.info({ signal }, 'Завершение работы.');
  marketplace.sweep.stop();

  try {
    await client.destroy();
    await disconnectDatabase();
  } catch (error) {
    logger.error({ err: error }, 'Ошибка при завершении работы.');
    process.exitCode = 1;
  }
};

const bootstrap = async (): Promise<void> => {
  logger.info({ version: versionInfo.version, env: env.NODE_ENV }, 'Запуск бота.');

  await ensureDatabaseConnection();
  await deployCommands();
  await client.login(env.DISCORD_TOKEN);

  marketplace.sweep.start();
};

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    void shutdown(signal);
  });
}

process.on('unhandledRejection', (reason) => {
  logger.error({ err: reason }, 'Необработанное отклонение промиса.');
});

bootstrap().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Не удалось запустить бота.');
  process.exitCode = 1;
  void shutdown('bootstrap_failure');
});
