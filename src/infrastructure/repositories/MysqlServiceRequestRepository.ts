// ============================================================================
// src/infrastructure/repositories/MysqlServiceRequestRepository.ts
// ============================================================================

import type { ResultSetHeader, RowDataPacket } from 'mysql2/promise';

import { ServiceRequest } from '@/domain/entities/ServiceRequest';
import type {
  IServiceRequestRepository,
  NewServiceRequest,
  RequestCounts,
} from '@/domain/repositories/IServiceRequestRepository';
import type { TransactionContext } from '@/domain/repositories/transaction';
import { RequestStatus, RequestStatusVO } from '@/domain/value-objects/RequestStatus';
import { isSqlConnection, type SqlExecutor } from '@/infrastructure/db/MysqlTransactionManager';
import { toDate, toNullableDate } from '@/infrastructure/repositories/mysqlValues';

interface RequestRow extends RowDataPacket {
  id: number;
  client_user_id: string;
  client_name: string;
  contact: string;
  category: string;
  address: string;
  description: string;
  desired_time: string;
  status: string;
  master_id: number | null;
  review_requested: number;
  created_at: Date | string;
  pending_since: Date | string | null;
  completed_at: Date | string | null;
}

interface StatusCountRow extends RowDataPacket {
  status: string;
  total: number;
}

const COLUMNS = `id, client_user_id, client_name, contact, category, address, description, desired_time,
  status, master_id, review_requested, created_at, pending_since, completed_at`;

export class MysqlServiceRequestRepository implements IServiceRequestRepository {
  public constructor(private readonly db: SqlExecutor) {}

  public withTransaction(context: TransactionContext): IServiceRequestRepository {
    if (!isSqlConnection(context)) {
      throw new Error('Invalid MySQL transaction context provided to request repository.');
    }

    return new MysqlServiceRequestRepository(context);
  }

  public async create(data: NewServiceRequest): Promise<ServiceRequest> {
    const createdAt = new Date();
    const [result] = await this.db.execute<ResultSetHeader>(
      `INSERT INTO requests
        (client_user_id, client_name, contact, category, address, description, desired_time, status, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, 'new', ?)`,
      [
        data.clientUserId,
        data.clientName,
        data.contact,
        data.category,
        data.address,
        data.description,
        data.desiredTime,
        createdAt,
      ],
    );

    return new ServiceRequest({
      ...data,
      id: result.insertId,
      status: RequestStatus.NEW,
      masterId: null,
      reviewRequested: false,
      createdAt,
      pendingSince: null,
      completedAt: null,
    });
  }

  public async findById(id: number): Promise<ServiceRequest | null> {
    const [rows] = await this.db.execute<RequestRow[]>(`SELECT ${COLUMNS} FROM requests WHERE id = ?`, [id]);
    const [row] = rows;
    return row ? this.toDomain(row) : null;
  }

  public async assignIfNew(requestId: number, masterId: number): Promise<boolean> {
    const [result] = await this.db.execute<ResultSetHeader>(
      "UPDATE requests SET status = 'assigned', master_id = ? WHERE id = ? AND status = 'new'",
      [masterId, requestId],
    );

    return result.affectedRows === 1;
  }

  public async transitionStatus(
    requestId: number,
    from: RequestStatus,
    to: RequestStatus,
    at: Date,
  ): Promise<boolean> {
    const assignments = ['status = ?'];
    const values: Array<string | number | Date | null> = [to];

    if (to === RequestStatus.PENDING_CONFIRMATION) {
      assignments.push('pending_since = ?');
      values.push(at);
    } else if (to === RequestStatus.COMPLETED) {
      assignments.push('completed_at = ?');
      values.push(at);
    } else if (to === RequestStatus.ASSIGNED) {
      assignments.push('pending_since = NULL');
    }

    values.push(requestId, from);

    const [result] = await this.db.execute<ResultSetHeader>(
      `UPDATE requests SET ${assignments.join(', ')} WHERE id = ? AND status = ?`,
      values,
    );

    return result.affectedRows === 1;
  }

  public async markReviewRequested(requestId: number): Promise<boolean> {
    const [result] = await this.db.execute<ResultSetHeader>(
      'UPDATE requests SET review_requested = 1 WHERE id = ? AND review_requested = 0',
      [requestId],
    );

    return result.affectedRows === 1;
  }

  public async listPendingConfirmationSince(cutoff: Date): Promise<ServiceRequest[]> {
    const [rows] = await this.db.execute<RequestRow[]>(
      `SELECT ${COLUMNS} FROM requests
       WHERE status = 'pending_confirmation' AND pending_since IS NOT NULL AND pending_since <= ?
       ORDER BY pending_since ASC`,
      [cutoff],
    );

    return rows.map((row) => this.toDomain(row));
  }

  public async listByMaster(masterId: number, limit: number): Promise<ServiceRequest[]> {
    // LIMIT placeholders are rejected by prepared statements on MySQL 8.
    const [rows] = await this.db.query<RequestRow[]>(
      `SELECT ${COLUMNS} FROM requests WHERE master_id = ? ORDER BY id DESC LIMIT ?`,
      [masterId, limit],
    );

    return rows.map((row) => this.toDomain(row));
  }

  public async listByClient(clientUserId: string, limit: number): Promise<ServiceRequest[]> {
    const [rows] = await this.db.query<RequestRow[]>(
      `SELECT ${COLUMNS} FROM requests WHERE client_user_id = ? ORDER BY id DESC LIMIT ?`,
      [clientUserId, limit],
    );

    return rows.map((row) => this.toDomain(row));
  }

  public async countByStatus(): Promise<RequestCounts> {
    const [rows] = await this.db.query<StatusCountRow[]>(
      'SELECT status, COUNT(*) AS total FROM requests GROUP BY status',
    );

    const byStatus: Record<RequestStatus, number> = {
      [RequestStatus.NEW]: 0,
      [RequestStatus.ASSIGNED]: 0,
      [RequestStatus.PENDING_CONFIRMATION]: 0,
      [RequestStatus.COMPLETED]: 0,
    };

    let total = 0;
    for (const row of rows) {
      const count = Number(row.total);
      byStatus[RequestStatusVO.parse(row.status)] = count;
      total += count;
    }

    return { total, byStatus };
  }

  private toDomain(row: RequestRow): ServiceRequest {
    return new ServiceRequest({
      id: row.id,
      clientUserId: row.client_user_id,
      clientName: row.client_name,
      contact: row.contact,
      category: row.category,
      address: row.address,
      description: row.description,
      desiredTime: row.desired_time,
      status: RequestStatusVO.parse(row.status),
      masterId: row.master_id,
      reviewRequested: Boolean(row.review_requested),
      createdAt: toDate(row.created_at),
      pendingSince: toNullableDate(row.pending_since),
      completedAt: toNullableDate(row.completed_at),
    });
  }
}
