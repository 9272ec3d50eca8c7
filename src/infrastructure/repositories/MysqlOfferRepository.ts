// ============================================================================
// src/infrastructure/repositories/MysqlOfferRepository.ts
// ============================================================================

import type { ResultSetHeader, RowDataPacket } from 'mysql2/promise';

import { Offer } from '@/domain/entities/Offer';
import type { IOfferRepository, OfferCounts } from '@/domain/repositories/IOfferRepository';
import type { TransactionContext } from '@/domain/repositories/transaction';
import { OfferStatus, parseOfferStatus } from '@/domain/value-objects/OfferStatus';
import { isSqlConnection, type SqlExecutor } from '@/infrastructure/db/MysqlTransactionManager';
import { toDate } from '@/infrastructure/repositories/mysqlValues';

interface OfferRow extends RowDataPacket {
  id: number;
  request_id: number;
  master_id: number;
  status: string;
  created_at: Date | string;
}

interface OfferCountRow extends RowDataPacket {
  status: string;
  total: number;
}

export class MysqlOfferRepository implements IOfferRepository {
  public constructor(private readonly db: SqlExecutor) {}

  public withTransaction(context: TransactionContext): IOfferRepository {
    if (!isSqlConnection(context)) {
      throw new Error('Invalid MySQL transaction context provided to offer repository.');
    }

    return new MysqlOfferRepository(context);
  }

  public async create(requestId: number, masterId: number): Promise<Offer> {
    const createdAt = new Date();
    const [result] = await this.db.execute<ResultSetHeader>(
      "INSERT INTO offers (request_id, master_id, status, created_at) VALUES (?, ?, 'sent', ?)",
      [requestId, masterId, createdAt],
    );

    return new Offer(result.insertId, requestId, masterId, OfferStatus.SENT, createdAt);
  }

  public async findById(id: number): Promise<Offer | null> {
    const [rows] = await this.db.execute<OfferRow[]>(
      'SELECT id, request_id, master_id, status, created_at FROM offers WHERE id = ?',
      [id],
    );
    const [row] = rows;

    return row
      ? new Offer(row.id, row.request_id, row.master_id, parseOfferStatus(row.status), toDate(row.created_at))
      : null;
  }

  public async transitionStatus(offerId: number, from: OfferStatus, to: OfferStatus): Promise<boolean> {
    const [result] = await this.db.execute<ResultSetHeader>(
      'UPDATE offers SET status = ? WHERE id = ? AND status = ?',
      [to, offerId, from],
    );

    return result.affectedRows === 1;
  }

  public async countByMaster(masterId: number): Promise<OfferCounts> {
    const [rows] = await this.db.execute<OfferCountRow[]>(
      'SELECT status, COUNT(*) AS total FROM offers WHERE master_id = ? GROUP BY status',
      [masterId],
    );

    const counts: Record<OfferStatus, number> = {
      [OfferStatus.SENT]: 0,
      [OfferStatus.TAKEN]: 0,
      [OfferStatus.SKIPPED]: 0,
    };

    for (const row of rows) {
      counts[parseOfferStatus(row.status)] = Number(row.total);
    }

    return counts;
  }
}
