import { Pool } from 'pg';
import { AttendanceRecord, AttendanceStatus, WorkType } from '../models/Attendance.js';
import { StaleWrite, UniquenessViolation } from '../errors.js';
import { UserRepository } from './UserRepository.js';

interface AttendanceRow {
  id: string;
  user_id: string;
  date: string;
  login_time: Date | null;
  logout_time: Date | null;
  status: AttendanceStatus;
  work_type: WorkType;
  notes: string | null;
  version: number;
  created_at: string;
  updated_at: string;
}

const COLUMNS = `id, user_id, date::text AS date, login_time, logout_time, status, work_type, notes, version, created_at, updated_at`;

function toRecord(row: AttendanceRow): AttendanceRecord {
  return {
    id: row.id,
    userId: row.user_id,
    date: row.date,
    loginTime: row.login_time,
    logoutTime: row.logout_time,
    status: row.status,
    workType: row.work_type,
    notes: row.notes,
    version: row.version,
    createdAt: Number(row.created_at),
    updatedAt: Number(row.updated_at),
  };
}

function isUniqueViolation(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === '23505';
}

const keyOf = (userId: string, date: string) => `${userId}|${date}`;

/**
 * One attendance row per (user, date). The UNIQUE constraint (or the keyed
 * map in memory) is the only thing preventing duplicate rows; callers are
 * expected to recover from {@link UniquenessViolation} and {@link StaleWrite}
 * by re-reading.
 */
export class AttendanceRepository {
  private attendanceStore: Map<string, AttendanceRecord> = new Map();

  constructor(
    private readonly users: UserRepository,
    private readonly pool: Pool | null = null
  ) {}

  async init(): Promise<void> {
    if (!this.pool) return;

    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS attendance (
        id VARCHAR(255) PRIMARY KEY,
        user_id VARCHAR(255) NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        date DATE NOT NULL,
        login_time TIMESTAMPTZ NULL,
        logout_time TIMESTAMPTZ NULL,
        status VARCHAR(10) NOT NULL DEFAULT 'Absent' CHECK (status IN ('Present', 'Absent', 'Leave', 'Remote')),
        work_type VARCHAR(10) NOT NULL DEFAULT 'Office' CHECK (work_type IN ('Office', 'Remote', 'Leave')),
        notes TEXT NULL,
        version INTEGER NOT NULL DEFAULT 1,
        created_at BIGINT NOT NULL,
        updated_at BIGINT NOT NULL,
        UNIQUE(user_id, date),
        CHECK (logout_time IS NULL OR login_time IS NULL OR logout_time >= login_time)
      );
    `);

    await this.pool.query(`
      CREATE INDEX IF NOT EXISTS idx_attendance_date ON attendance(date);
      CREATE INDEX IF NOT EXISTS idx_attendance_status ON attendance(status);
    `);
  }

  /**
   * Inserts a record that has never been stored (version 0) or updates one
   * whose stored version still matches. Returns the stored row.
   */
  async upsert(record: AttendanceRecord): Promise<AttendanceRecord> {
    const now = Date.now();

    if (!this.pool) {
      const key = keyOf(record.userId, record.date);
      const existing = this.attendanceStore.get(key);

      if (record.version === 0) {
        if (existing) throw new UniquenessViolation(record.userId, record.date);
      } else if (!existing || existing.version !== record.version) {
        throw new StaleWrite(record.userId, record.date);
      }

      const stored: AttendanceRecord = {
        ...record,
        version: record.version + 1,
        createdAt: existing?.createdAt ?? now,
        updatedAt: now,
      };
      this.attendanceStore.set(key, stored);
      return { ...stored };
    }

    if (record.version === 0) {
      try {
        const result = await this.pool.query<AttendanceRow>(
          `INSERT INTO attendance (id, user_id, date, login_time, logout_time, status, work_type, notes, version, created_at, updated_at)
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8, 1, $9, $9)
           RETURNING ${COLUMNS}`,
          [
            record.id,
            record.userId,
            record.date,
            record.loginTime,
            record.logoutTime,
            record.status,
            record.workType,
            record.notes,
            now,
          ]
        );
        return toRecord(result.rows[0]);
      } catch (error) {
        if (isUniqueViolation(error)) {
          throw new UniquenessViolation(record.userId, record.date);
        }
        throw error;
      }
    }

    const result = await this.pool.query<AttendanceRow>(
      `UPDATE attendance
       SET login_time = $3, logout_time = $4, status = $5, work_type = $6, notes = $7,
           version = version + 1, updated_at = $8
       WHERE user_id = $1 AND date = $2 AND version = $9
       RETURNING ${COLUMNS}`,
      [
        record.userId,
        record.date,
        record.loginTime,
        record.logoutTime,
        record.status,
        record.workType,
        record.notes,
        now,
        record.version,
      ]
    );

    const row = result.rows[0];
    if (!row) throw new StaleWrite(record.userId, record.date);
    return toRecord(row);
  }

  async get(userId: string, date: string): Promise<AttendanceRecord | null> {
    if (!this.pool) {
      const record = this.attendanceStore.get(keyOf(userId, date));
      return record ? { ...record } : null;
    }

    const result = await this.pool.query<AttendanceRow>(
      `SELECT ${COLUMNS}
       FROM attendance
       WHERE user_id = $1 AND date = $2`,
      [userId, date]
    );

    const row = result.rows[0];
    return row ? toRecord(row) : null;
  }

  async listForUser(userId: string, from: string, to: string): Promise<AttendanceRecord[]> {
    if (!this.pool) {
      return Array.from(this.attendanceStore.values())
        .filter((a) => a.userId === userId && a.date >= from && a.date <= to)
        .sort((a, b) => a.date.localeCompare(b.date))
        .map((a) => ({ ...a }));
    }

    const result = await this.pool.query<AttendanceRow>(
      `SELECT ${COLUMNS}
       FROM attendance
       WHERE user_id = $1 AND date BETWEEN $2 AND $3
       ORDER BY date`,
      [userId, from, to]
    );

    return result.rows.map(toRecord);
  }

  /** Active staff ids with no record on `date`, as a single set difference. */
  async listForSweep(date: string): Promise<string[]> {
    if (!this.pool) {
      const staff = await this.users.listActiveStaff();
      const recorded = new Set(
        Array.from(this.attendanceStore.values())
          .filter((a) => a.date === date)
          .map((a) => a.userId)
      );
      return staff.map((u) => u.id).filter((id) => !recorded.has(id));
    }

    const result = await this.pool.query<{ id: string }>(
      `SELECT u.id
       FROM users u
       WHERE u.role = 'staff' AND u.status = 'active'
         AND NOT EXISTS (SELECT 1 FROM attendance a WHERE a.user_id = u.id AND a.date = $1)
       ORDER BY u.id`,
      [date]
    );

    return result.rows.map((row) => row.id);
  }
}
