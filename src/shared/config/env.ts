// ============================================================================
// src/shared/config/env.ts
// ============================================================================

import { z } from 'zod';

const HOUR_MS = 60 * 60 * 1000;

const booleanLike = z
  .union([z.boolean(), z.string()])
  .transform((value) => {
    if (typeof value === 'boolean') {
      return value;
    }

    const normalized = value.trim().toLowerCase();
    if (['1', 'true', 'yes', 'y'].includes(normalized)) {
      return true;
    }
    if (['0', 'false', 'no', 'n', ''].includes(normalized)) {
      return false;
    }

    throw new Error(`Некорректное логическое значение: ${value}`);
  });

const emptyToUndefined = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => {
    if (value === undefined || value === null) {
      return undefined;
    }

    if (typeof value === 'string' && value.trim().length === 0) {
      return undefined;
    }

    return value;
  }, schema.optional());

const optionalUrl = emptyToUndefined(z.string().url());

const snowflakePattern = /^\d{17,20}$/u;

const snowflake = (name: string) =>
  z.string().regex(snowflakePattern, `${name} должен быть Discord snowflake`);

const commaSeparatedSnowflakes = z.preprocess((raw) => {
  if (raw === undefined || raw === null) {
    return [];
  }

  const text = typeof raw === 'string' ? raw : String(raw);

  return text
    .split(',')
    .map((value) => value.trim())
    .filter((value) => snowflakePattern.test(value));
}, z.array(z.string().regex(snowflakePattern)));

const durationMs = (fallback: number) => z.coerce.number().int().min(1_000).default(fallback);

export const EnvSchema = z.object({
  DISCORD_TOKEN: z.string().min(1, 'DISCORD_TOKEN обязателен'),
  DISCORD_CLIENT_ID: snowflake('DISCORD_CLIENT_ID'),
  DISCORD_GUILD_ID: emptyToUndefined(snowflake('DISCORD_GUILD_ID')),
  DATABASE_URL: optionalUrl,
  DB_AUTO_APPLY_SCHEMA: booleanLike.default(true),
  ADMIN_CHANNEL_ID: emptyToUndefined(snowflake('ADMIN_CHANNEL_ID')),
  ADMIN_USER_IDS: commaSeparatedSnowflakes.default([]),
  SWEEP_INTERVAL_MS: durationMs(6 * HOUR_MS),
  SWEEP_BACKOFF_MS: durationMs(HOUR_MS),
  AUTO_COMPLETE_AFTER_MS: durationMs(24 * HOUR_MS),
  DOCUMENT_RETENTION_MS: durationMs(72 * HOUR_MS),
  RATE_LIMIT_IDLE_MS: durationMs(24 * HOUR_MS),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  MYSQL_HOST: emptyToUndefined(z.string()),
  MYSQL_PORT: emptyToUndefined(z.string().regex(/^\d+$/u, 'MYSQL_PORT должен быть числом')),
  MYSQL_USER: emptyToUndefined(z.string()),
  MYSQL_PASSWORD: emptyToUndefined(z.string()),
  MYSQL_DATABASE: emptyToUndefined(z.string()),
  MYSQL_CONNECTION_LIMIT: z.coerce.number().int().min(1).max(100).default(10),
});

export type RawEnv = z.infer<typeof EnvSchema>;

export const buildDatabaseUrl = (config: RawEnv): string | undefined => {
  if (config.DATABASE_URL) {
    return config.DATABASE_URL;
  }

  const { MYSQL_HOST: host, MYSQL_USER: user, MYSQL_PASSWORD: password, MYSQL_DATABASE: database } = config;

  if (!host || !user || password === undefined || !database) {
    return undefined;
  }

  const encode = (value: string) => encodeURIComponent(value);
  const port = config.MYSQL_PORT ?? '3306';

  return `mysql://${encode(user)}:${encode(password)}@${host}:${port}/${encode(database)}`;
};

const parsedEnv = EnvSchema.parse(process.env);
const resolvedDatabaseUrl = buildDatabaseUrl(parsedEnv);

if (!resolvedDatabaseUrl) {
  throw new Error(
    'Нужно указать DATABASE_URL либо MYSQL_HOST, MYSQL_USER, MYSQL_PASSWORD и MYSQL_DATABASE.',
  );
}

export type Env = RawEnv & { DATABASE_URL: string };

export const env: Env = {
  ...parsedEnv,
  DATABASE_URL: resolvedDatabaseUrl,
};
