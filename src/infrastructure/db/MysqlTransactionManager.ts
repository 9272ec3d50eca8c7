// ============================================================================
// src/infrastructure/db/MysqlTransactionManager.ts
// ============================================================================

import type { Connection, Pool } from 'mysql2/promise';
import type { Logger } from 'pino';

import type { TransactionContext, TransactionManager } from '@/domain/repositories/transaction';

/** What the repositories need from a pool or a pooled connection. */
export type SqlExecutor = Pick<Connection, 'execute' | 'query'>;

export const isSqlConnection = (context: TransactionContext): context is SqlExecutor =>
  typeof context === 'object' &&
  context !== null &&
  'execute' in context &&
  typeof context.execute === 'function' &&
  'query' in context &&
  typeof context.query === 'function';

export class MysqlTransactionManager implements TransactionManager {
  public constructor(
    private readonly pool: Pick<Pool, 'getConnection'>,
    private readonly logger: Logger,
  ) {}

  public async run<T>(work: (context: TransactionContext) => Promise<T>): Promise<T> {
    const connection = await this.pool.getConnection();

    try {
      await connection.beginTransaction();
      const result = await work(connection);
      await connection.commit();
      return result;
    } catch (error) {
      try {
        await connection.rollback();
      } catch (rollbackError) {
        this.logger.error({ err: rollbackError }, 'Не удалось откатить транзакцию.');
      }

      throw error;
    } finally {
      connection.release();
    }
  }
}
