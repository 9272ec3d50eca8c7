import type { Pool } from 'mysql2/promise';
import { describe, expect, it, vi } from 'vitest';

import { isSqlConnection, MysqlTransactionManager } from '@/infrastructure/db/MysqlTransactionManager';

import { silentLogger } from '../../../support/logger';

const buildPool = () => {
  const connection = {
    beginTransaction: vi.fn(async () => {}),
    commit: vi.fn(async () => {}),
    rollback: vi.fn(async () => {}),
    release: vi.fn(),
    execute: vi.fn(),
    query: vi.fn(),
  };
  const pool = { getConnection: vi.fn(async () => connection) } as unknown as Pick<Pool, 'getConnection'>;

  return { connection, pool };
};

describe('MysqlTransactionManager', () => {
  it('commits and releases the connection when the work succeeds', async () => {
    const { connection, pool } = buildPool();
    const manager = new MysqlTransactionManager(pool, silentLogger);

    const result = await manager.run(async (context) => {
      expect(context).toBe(connection);
      return 'done';
    });

    expect(result).toBe('done');
    expect(connection.beginTransaction).toHaveBeenCalledTimes(1);
    expect(connection.commit).toHaveBeenCalledTimes(1);
    expect(connection.rollback).not.toHaveBeenCalled();
    expect(connection.release).toHaveBeenCalledTimes(1);
  });

  it('rolls back and rethrows when the work fails', async () => {
    const { connection, pool } = buildPool();
    const manager = new MysqlTransactionManager(pool, silentLogger);

    await expect(
      manager.run(async () => {
        throw new Error('conflict');
      }),
    ).rejects.toThrow('conflict');

    expect(connection.commit).not.toHaveBeenCalled();
    expect(connection.rollback).toHaveBeenCalledTimes(1);
    expect(connection.release).toHaveBeenCalledTimes(1);
  });

  it('keeps the original error when the rollback fails too', async () => {
    const { connection, pool } = buildPool();
    connection.rollback.mockRejectedValueOnce(new Error('connection closed'));
    const manager = new MysqlTransactionManager(pool, silentLogger);

    await expect(
      manager.run(async () => {
        throw new Error('conflict');
      }),
    ).rejects.toThrow('conflict');
    expect(connection.release).toHaveBeenCalledTimes(1);
  });
});

describe('isSqlConnection', () => {
  it('recognises objects that can run queries', () => {
    expect(isSqlConnection({ execute: () => undefined, query: () => undefined })).toBe(true);
    expect(isSqlConnection({ execute: () => undefined })).toBe(false);
    expect(isSqlConnection(null)).toBe(false);
  });
});
