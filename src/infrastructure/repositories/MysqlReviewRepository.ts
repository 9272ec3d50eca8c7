// ============================================================================
// src/infrastructure/repositories/MysqlReviewRepository.ts
// ============================================================================

import type { ResultSetHeader, RowDataPacket } from 'mysql2/promise';

import { Review } from '@/domain/entities/Review';
import type {
  IReviewRepository,
  NewReview,
  RatingAggregate,
  RatingDistribution,
} from '@/domain/repositories/IReviewRepository';
import type { TransactionContext } from '@/domain/repositories/transaction';
import { Rating, roundRating } from '@/domain/value-objects/Rating';
import { isSqlConnection, type SqlExecutor } from '@/infrastructure/db/MysqlTransactionManager';
import { isDuplicateEntryError, toDate } from '@/infrastructure/repositories/mysqlValues';

interface ReviewRow extends RowDataPacket {
  id: number;
  request_id: number;
  master_id: number;
  client_user_id: string;
  rating: number;
  comment: string | null;
  created_at: Date | string;
}

interface AggregateRow extends RowDataPacket {
  average: number | string | null;
  total: number;
}

interface CountRow extends RowDataPacket {
  total: number;
}

interface DistributionRow extends RowDataPacket {
  rating: number;
  total: number;
}

const COLUMNS = 'id, request_id, master_id, client_user_id, rating, comment, created_at';

export class MysqlReviewRepository implements IReviewRepository {
  public constructor(private readonly db: SqlExecutor) {}

  public withTransaction(context: TransactionContext): IReviewRepository {
    if (!isSqlConnection(context)) {
      throw new Error('Invalid MySQL transaction context provided to review repository.');
    }

    return new MysqlReviewRepository(context);
  }

  public async create(data: NewReview): Promise<Review | null> {
    const createdAt = new Date();

    try {
      const [result] = await this.db.execute<ResultSetHeader>(
        `INSERT INTO reviews (request_id, master_id, client_user_id, rating, comment, created_at)
         VALUES (?, ?, ?, ?, NULL, ?)`,
        [data.requestId, data.masterId, data.clientUserId, data.rating.getValue(), createdAt],
      );

      return new Review(result.insertId, data.requestId, data.masterId, data.clientUserId, data.rating, null, createdAt);
    } catch (error) {
      if (isDuplicateEntryError(error)) {
        return null;
      }

      throw error;
    }
  }

  public async findByRequestId(requestId: number): Promise<Review | null> {
    const [rows] = await this.db.execute<ReviewRow[]>(`SELECT ${COLUMNS} FROM reviews WHERE request_id = ?`, [
      requestId,
    ]);
    const [row] = rows;
    return row ? this.toDomain(row) : null;
  }

  public async updateComment(requestId: number, comment: string): Promise<boolean> {
    const [result] = await this.db.execute<ResultSetHeader>('UPDATE reviews SET comment = ? WHERE request_id = ?', [
      comment,
      requestId,
    ]);

    // affectedRows counts matched rows, so rewriting the same text still reports success.
    return result.affectedRows === 1;
  }

  public async getAggregate(masterId: number): Promise<RatingAggregate> {
    const [rows] = await this.db.execute<AggregateRow[]>(
      'SELECT AVG(rating) AS average, COUNT(*) AS total FROM reviews WHERE master_id = ?',
      [masterId],
    );
    const [row] = rows;
    const count = Number(row?.total ?? 0);

    if (!row || count === 0 || row.average === null) {
      return { average: null, count };
    }

    return { average: roundRating(Number(row.average)), count };
  }

  public async getDistribution(masterId: number): Promise<RatingDistribution> {
    const [rows] = await this.db.execute<DistributionRow[]>(
      'SELECT rating, COUNT(*) AS total FROM reviews WHERE master_id = ? GROUP BY rating',
      [masterId],
    );

    const distribution = { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 };
    for (const row of rows) {
      const rating = Number(row.rating);
      if (rating === 1 || rating === 2 || rating === 3 || rating === 4 || rating === 5) {
        distribution[rating] = Number(row.total);
      }
    }

    return distribution;
  }

  public async listLatestWithComment(masterId: number, limit: number): Promise<Review[]> {
    const [rows] = await this.db.query<ReviewRow[]>(
      `SELECT ${COLUMNS} FROM reviews
       WHERE master_id = ? AND comment IS NOT NULL AND comment <> ''
       ORDER BY created_at DESC, id DESC LIMIT ?`,
      [masterId, limit],
    );

    return rows.map((row) => this.toDomain(row));
  }

  public async count(): Promise<number> {
    const [rows] = await this.db.query<CountRow[]>('SELECT COUNT(*) AS total FROM reviews');
    return Number(rows[0]?.total ?? 0);
  }

  private toDomain(row: ReviewRow): Review {
    return new Review(
      row.id,
      row.request_id,
      row.master_id,
      row.client_user_id,
      Rating.create(Number(row.rating)),
      row.comment,
      toDate(row.created_at),
    );
  }
}
