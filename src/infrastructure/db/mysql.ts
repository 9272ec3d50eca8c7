// ============================================================================
// src/infrastructure/db/mysql.ts
// ============================================================================

import { readFile } from 'node:fs/promises';

import { createPool, type Pool } from 'mysql2/promise';

import { env } from '@/shared/config/env';
import { DatabaseUnavailableError } from '@/shared/errors/domain.errors';
import { logger } from '@/shared/logger/pino';

const SCHEMA_FILE = new URL('../../../db/schema.sql', import.meta.url);

export const pool: Pool = createPool({
  uri: env.DATABASE_URL,
  connectionLimit: env.MYSQL_CONNECTION_LIMIT,
  waitForConnections: true,
  timezone: 'Z',
  charset: 'utf8mb4',
});

/** Splits a SQL file into statements, dropping `--` comment lines. */
export const splitSqlStatements = (sql: string): string[] =>
  sql
    .split('\n')
    .filter((line) => !line.trim().startsWith('--'))
    .join('\n')
    .split(';')
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);

let schemaApplied = false;
let schemaPromise: Promise<void> | null = null;

const applySchemaInternal = async (): Promise<void> => {
  if (!env.DB_AUTO_APPLY_SCHEMA) {
    logger.info('Автоматическое применение схемы отключено настройками.');
    return;
  }

  const sql = await readFile(SCHEMA_FILE, 'utf8');
  const statements = splitSqlStatements(sql);

  for (const statement of statements) {
    await pool.query(statement);
  }

  logger.info({ statements: statements.length }, 'Схема базы данных применена.');
};

export const applyDatabaseSchema = async (): Promise<void> => {
  if (schemaApplied) {
    return;
  }

  if (!schemaPromise) {
    schemaPromise = applySchemaInternal()
      .then(() => {
        schemaApplied = true;
      })
      .catch((error: unknown) => {
        schemaPromise = null;
        throw error;
      });
  }

  await schemaPromise;
};

export const ensureDatabaseConnection = async (): Promise<void> => {
  try {
    await pool.query('SELECT 1');
    await applyDatabaseSchema();
    logger.debug('Соединение с MySQL установлено.');
  } catch (error) {
    logger.error({ err: error }, 'Не удалось подключиться к базе данных.');
    throw new DatabaseUnavailableError(undefined, error);
  }
};

export const disconnectDatabase = async (): Promise<void> => {
  await pool.end();
};
