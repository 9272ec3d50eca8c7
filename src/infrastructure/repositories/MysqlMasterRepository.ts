// ============================================================================
// src/infrastructure/repositories/MysqlMasterRepository.ts
// ============================================================================

import type { ResultSetHeader, RowDataPacket } from 'mysql2/promise';

import { EMPTY_DOCUMENTS, Master, type VerificationDocuments } from '@/domain/entities/Master';
import type { IMasterRepository, MasterStats, NewMaster } from '@/domain/repositories/IMasterRepository';
import type { TransactionContext } from '@/domain/repositories/transaction';
import { joinCategoryList, parseCategoryList } from '@/domain/services/CategoryMatcher';
import type { EntitlementKind } from '@/domain/value-objects/Entitlement';
import { MasterLevel, parseMasterLevel } from '@/domain/value-objects/MasterLevel';
import { parseSkillTier, SkillTier } from '@/domain/value-objects/SkillTier';
import { isSqlConnection, type SqlExecutor } from '@/infrastructure/db/MysqlTransactionManager';
import { toDate, toNullableDate } from '@/infrastructure/repositories/mysqlValues';

interface MasterRow extends RowDataPacket {
  id: number;
  user_id: string;
  full_name: string;
  phone: string;
  level: string;
  categories: string;
  experience_bucket: string | null;
  experience_text: string | null;
  portfolio: string | null;
  references_text: string | null;
  tax_id: string | null;
  free_orders_left: number;
  sub_until: Date | string | null;
  priority_until: Date | string | null;
  pin_until: Date | string | null;
  is_active: number;
  orders_completed: number;
  skill_tier: string;
  avg_rating: number | string;
  reviews_count: number;
  passport_scan: string | null;
  face_photo: string | null;
  self_employment_doc: string | null;
  created_at: Date | string;
}

interface CountRow extends RowDataPacket {
  total: number;
}

interface LevelCountRow extends RowDataPacket {
  level: string;
  total: number;
}

interface OrdersCompletedRow extends RowDataPacket {
  orders_completed: number;
}

const COLUMNS = `id, user_id, full_name, phone, level, categories, experience_bucket, experience_text, portfolio,
  references_text, tax_id, free_orders_left, sub_until, priority_until, pin_until, is_active, orders_completed,
  skill_tier, avg_rating, reviews_count, passport_scan, face_photo, self_employment_doc, created_at`;

const ENTITLEMENT_COLUMNS: Record<EntitlementKind, string> = {
  subscription: 'sub_until',
  priority: 'priority_until',
  pin: 'pin_until',
};

const DOCUMENT_COLUMNS: Record<keyof VerificationDocuments, string> = {
  passportScan: 'passport_scan',
  facePhoto: 'face_photo',
  selfEmploymentDoc: 'self_employment_doc',
};

const DOCUMENT_KEYS: ReadonlyArray<keyof VerificationDocuments> = ['passportScan', 'facePhoto', 'selfEmploymentDoc'];

const HAS_DOCUMENTS = '(passport_scan IS NOT NULL OR face_photo IS NOT NULL OR self_employment_doc IS NOT NULL)';

export class MysqlMasterRepository implements IMasterRepository {
  public constructor(private readonly db: SqlExecutor) {}

  public withTransaction(context: TransactionContext): IMasterRepository {
    if (!isSqlConnection(context)) {
      throw new Error('Invalid MySQL transaction context provided to master repository.');
    }

    return new MysqlMasterRepository(context);
  }

  public async create(data: NewMaster): Promise<Master> {
    const createdAt = new Date();
    const [result] = await this.db.execute<ResultSetHeader>(
      `INSERT INTO masters
        (user_id, full_name, phone, level, categories, experience_bucket, experience_text, portfolio,
         references_text, tax_id, free_orders_left, created_at)
       VALUES (?, ?, ?, 'candidate', ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        data.userId,
        data.fullName,
        data.phone,
        joinCategoryList(data.categories),
        data.experienceBucket,
        data.experienceText,
        data.portfolio,
        data.references,
        data.taxId,
        data.freeOrdersLeft,
        createdAt,
      ],
    );

    return new Master({
      ...data,
      id: result.insertId,
      level: MasterLevel.CANDIDATE,
      categories: [...data.categories],
      subUntil: null,
      priorityUntil: null,
      pinUntil: null,
      isActive: true,
      ordersCompleted: 0,
      skillTier: SkillTier.NOVICE,
      avgRating: 0,
      reviewsCount: 0,
      documents: EMPTY_DOCUMENTS,
      createdAt,
    });
  }

  public async findById(id: number): Promise<Master | null> {
    const [rows] = await this.db.execute<MasterRow[]>(`SELECT ${COLUMNS} FROM masters WHERE id = ?`, [id]);
    const [row] = rows;
    return row ? this.toDomain(row) : null;
  }

  public async findByUserId(userId: string): Promise<Master | null> {
    const [rows] = await this.db.execute<MasterRow[]>(`SELECT ${COLUMNS} FROM masters WHERE user_id = ?`, [userId]);
    const [row] = rows;
    return row ? this.toDomain(row) : null;
  }

  public async listActive(): Promise<Master[]> {
    const [rows] = await this.db.execute<MasterRow[]>(
      `SELECT ${COLUMNS} FROM masters WHERE is_active = 1 ORDER BY id ASC`,
    );

    return rows.map((row) => this.toDomain(row));
  }

  public async deactivate(masterId: number): Promise<void> {
    await this.db.execute('UPDATE masters SET is_active = 0 WHERE id = ?', [masterId]);
  }

  public async debitFreeOrder(masterId: number): Promise<boolean> {
    const [result] = await this.db.execute<ResultSetHeader>(
      'UPDATE masters SET free_orders_left = free_orders_left - 1 WHERE id = ? AND free_orders_left > 0',
      [masterId],
    );

    return result.affectedRows === 1;
  }

  public async incrementOrdersCompleted(masterId: number): Promise<number | null> {
    const [result] = await this.db.execute<ResultSetHeader>(
      'UPDATE masters SET orders_completed = orders_completed + 1 WHERE id = ?',
      [masterId],
    );

    if (result.affectedRows !== 1) {
      return null;
    }

    const [rows] = await this.db.execute<OrdersCompletedRow[]>(
      'SELECT orders_completed FROM masters WHERE id = ?',
      [masterId],
    );
    const [row] = rows;
    return row ? Number(row.orders_completed) : null;
  }

  public async setSkillTier(masterId: number, tier: SkillTier): Promise<void> {
    await this.db.execute('UPDATE masters SET skill_tier = ? WHERE id = ?', [tier, masterId]);
  }

  public async lockForRatingUpdate(masterId: number): Promise<boolean> {
    const [rows] = await this.db.execute<RowDataPacket[]>('SELECT id FROM masters WHERE id = ? FOR UPDATE', [masterId]);
    return rows.length > 0;
  }

  public async updateRatingStats(masterId: number, avgRating: number, reviewsCount: number): Promise<void> {
    await this.db.execute('UPDATE masters SET avg_rating = ?, reviews_count = ? WHERE id = ?', [
      avgRating,
      reviewsCount,
      masterId,
    ]);
  }

  public async setEntitlement(masterId: number, kind: EntitlementKind, until: Date): Promise<void> {
    await this.db.execute(`UPDATE masters SET ${ENTITLEMENT_COLUMNS[kind]} = ? WHERE id = ?`, [until, masterId]);
  }

  public async attachDocuments(masterId: number, documents: Partial<VerificationDocuments>): Promise<void> {
    const assignments: string[] = [];
    const values: Array<string | number | null> = [];

    for (const key of DOCUMENT_KEYS) {
      const value = documents[key];
      if (value !== undefined) {
        assignments.push(`${DOCUMENT_COLUMNS[key]} = ?`);
        values.push(value);
      }
    }

    if (assignments.length === 0) {
      return;
    }

    values.push(masterId);
    await this.db.execute(`UPDATE masters SET ${assignments.join(', ')} WHERE id = ?`, values);
  }

  public async listWithDocumentsCreatedBefore(cutoff: Date): Promise<Master[]> {
    const [rows] = await this.db.execute<MasterRow[]>(
      `SELECT ${COLUMNS} FROM masters WHERE created_at < ? AND ${HAS_DOCUMENTS} ORDER BY id ASC`,
      [cutoff],
    );

    return rows.map((row) => this.toDomain(row));
  }

  public async clearDocuments(masterId: number): Promise<void> {
    await this.db.execute(
      'UPDATE masters SET passport_scan = NULL, face_photo = NULL, self_employment_doc = NULL WHERE id = ?',
      [masterId],
    );
  }

  public async getStats(now: Date): Promise<MasterStats> {
    const [[levelRows], [activeRows], [subscriptionRows]] = await Promise.all([
      this.db.query<LevelCountRow[]>('SELECT level, COUNT(*) AS total FROM masters GROUP BY level'),
      this.db.query<CountRow[]>('SELECT COUNT(*) AS total FROM masters WHERE is_active = 1'),
      this.db.execute<CountRow[]>('SELECT COUNT(*) AS total FROM masters WHERE sub_until > ?', [now]),
    ]);

    const byLevel: Record<MasterLevel, number> = {
      [MasterLevel.CANDIDATE]: 0,
      [MasterLevel.CHECKED]: 0,
      [MasterLevel.VERIFIED]: 0,
    };

    let total = 0;
    for (const row of levelRows) {
      const count = Number(row.total);
      byLevel[parseMasterLevel(row.level)] += count;
      total += count;
    }

    return {
      total,
      active: Number(activeRows[0]?.total ?? 0),
      byLevel,
      activeSubscriptions: Number(subscriptionRows[0]?.total ?? 0),
    };
  }

  private toDomain(row: MasterRow): Master {
    return new Master({
      id: row.id,
      userId: row.user_id,
      fullName: row.full_name,
      phone: row.phone,
      level: parseMasterLevel(row.level),
      categories: parseCategoryList(row.categories),
      experienceBucket: row.experience_bucket,
      experienceText: row.experience_text,
      portfolio: row.portfolio,
      references: row.references_text,
      taxId: row.tax_id,
      freeOrdersLeft: Number(row.free_orders_left),
      subUntil: toNullableDate(row.sub_until),
      priorityUntil: toNullableDate(row.priority_until),
      pinUntil: toNullableDate(row.pin_until),
      isActive: Boolean(row.is_active),
      ordersCompleted: Number(row.orders_completed),
      skillTier: parseSkillTier(row.skill_tier),
      avgRating: Number(row.avg_rating),
      reviewsCount: Number(row.reviews_count),
      documents: {
        passportScan: row.passport_scan,
        facePhoto: row.face_photo,
        selfEmploymentDoc: row.self_employment_doc,
      },
      createdAt: toDate(row.created_at),
    });
  }
}
