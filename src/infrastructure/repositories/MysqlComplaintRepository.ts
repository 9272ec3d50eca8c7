// ============================================================================
// src/infrastructure/repositories/MysqlComplaintRepository.ts
// ============================================================================

import type { ResultSetHeader, RowDataPacket } from 'mysql2/promise';

import { Complaint } from '@/domain/entities/Complaint';
import type { IComplaintRepository, NewComplaint } from '@/domain/repositories/IComplaintRepository';
import type { TransactionContext } from '@/domain/repositories/transaction';
import { isSqlConnection, type SqlExecutor } from '@/infrastructure/db/MysqlTransactionManager';

interface CountRow extends RowDataPacket {
  total: number;
}

// request_id and master_id are unchecked user input: no foreign keys.
export class MysqlComplaintRepository implements IComplaintRepository {
  public constructor(private readonly db: SqlExecutor) {}

  public withTransaction(context: TransactionContext): IComplaintRepository {
    if (!isSqlConnection(context)) {
      throw new Error('Invalid MySQL transaction context provided to complaint repository.');
    }

    return new MysqlComplaintRepository(context);
  }

  public async create(data: NewComplaint): Promise<Complaint> {
    const createdAt = new Date();
    const [result] = await this.db.execute<ResultSetHeader>(
      `INSERT INTO complaints (reporter_user_id, reporter_role, request_id, master_id, text, created_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [data.reporterUserId, data.reporterRole, data.requestId, data.masterId, data.text, createdAt],
    );

    return new Complaint(
      result.insertId,
      data.reporterUserId,
      data.reporterRole,
      data.requestId,
      data.masterId,
      data.text,
      createdAt,
    );
  }

  public async count(): Promise<number> {
    const [rows] = await this.db.query<CountRow[]>('SELECT COUNT(*) AS total FROM complaints');
    return Number(rows[0]?.total ?? 0);
  }
}
