import { Pool } from 'pg';
import { v4 as uuid } from 'uuid';
import { DeliveryStatus, NotificationEntry, NotificationType } from '../models/Notification.js';

interface NotificationRow {
  id: string;
  user_id: string;
  message: string;
  type: NotificationType;
  status: DeliveryStatus;
  sent_at: Date | null;
  error_message: string | null;
  created_at: string;
}

const COLUMNS = `id, user_id, message, type, status, sent_at, error_message, created_at`;

function toEntry(row: NotificationRow): NotificationEntry {
  return {
    id: row.id,
    userId: row.user_id,
    message: row.message,
    type: row.type,
    status: row.status,
    sentAt: row.sent_at,
    errorMessage: row.error_message,
    createdAt: Number(row.created_at),
  };
}

export type DeliveryCounts = Record<DeliveryStatus, number>;

/**
 * Append-only log of outbound messages. Entries leave `pending` exactly once,
 * through {@link markSent} or {@link markFailed}.
 */
export class NotificationRepository {
  // Map iteration order doubles as creation order
  private memoryStore: Map<string, NotificationEntry> = new Map();

  constructor(private readonly pool: Pool | null = null) {}

  async init(): Promise<void> {
    if (!this.pool) return;

    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS notifications (
        seq BIGSERIAL UNIQUE,
        id VARCHAR(255) PRIMARY KEY,
        user_id VARCHAR(255) NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        message TEXT NOT NULL,
        type VARCHAR(10) NOT NULL CHECK (type IN ('login', 'logout', 'reminder', 'alert')),
        status VARCHAR(10) NOT NULL DEFAULT 'pending' CHECK (status IN ('pending', 'sent', 'failed')),
        sent_at TIMESTAMPTZ NULL,
        error_message TEXT NULL,
        created_at BIGINT NOT NULL
      );
    `);

    await this.pool.query(`
      CREATE INDEX IF NOT EXISTS idx_notifications_user_id ON notifications(user_id);
      CREATE INDEX IF NOT EXISTS idx_notifications_status ON notifications(status);
    `);
  }

  async enqueue(userId: string, message: string, type: NotificationType): Promise<string> {
    const id = uuid();
    const now = Date.now();

    if (!this.pool) {
      this.memoryStore.set(id, {
        id,
        userId,
        message,
        type,
        status: 'pending',
        sentAt: null,
        errorMessage: null,
        createdAt: now,
      });
      return id;
    }

    await this.pool.query(
      `INSERT INTO notifications (id, user_id, message, type, status, created_at)
       VALUES ($1, $2, $3, $4, 'pending', $5)`,
      [id, userId, message, type, now]
    );
    return id;
  }

  /** @returns false when the entry was not pending (already terminal or unknown) */
  async markSent(id: string, sentAt: Date): Promise<boolean> {
    return this.settle(id, { status: 'sent', sentAt, errorMessage: null });
  }

  /** @returns false when the entry was not pending (already terminal or unknown) */
  async markFailed(id: string, errorMessage: string): Promise<boolean> {
    return this.settle(id, { status: 'failed', sentAt: null, errorMessage });
  }

  private async settle(
    id: string,
    outcome: { status: Exclude<DeliveryStatus, 'pending'>; sentAt: Date | null; errorMessage: string | null }
  ): Promise<boolean> {
    if (!this.pool) {
      const entry = this.memoryStore.get(id);
      if (!entry || entry.status !== 'pending') return false;
      this.memoryStore.set(id, { ...entry, ...outcome });
      return true;
    }

    const result = await this.pool.query(
      `UPDATE notifications
       SET status = $2, sent_at = $3, error_message = $4
       WHERE id = $1 AND status = 'pending'`,
      [id, outcome.status, outcome.sentAt, outcome.errorMessage]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async get(id: string): Promise<NotificationEntry | null> {
    if (!this.pool) {
      const entry = this.memoryStore.get(id);
      return entry ? { ...entry } : null;
    }

    const result = await this.pool.query<NotificationRow>(`SELECT ${COLUMNS} FROM notifications WHERE id = $1`, [id]);
    const row = result.rows[0];
    return row ? toEntry(row) : null;
  }

  /** Oldest first. */
  async listPending(limit = 100): Promise<NotificationEntry[]> {
    if (!this.pool) {
      return Array.from(this.memoryStore.values())
        .filter((n) => n.status === 'pending')
        .slice(0, limit)
        .map((n) => ({ ...n }));
    }

    const result = await this.pool.query<NotificationRow>(
      `SELECT ${COLUMNS}
       FROM notifications
       WHERE status = 'pending'
       ORDER BY seq
       LIMIT $1`,
      [limit]
    );
    return result.rows.map(toEntry);
  }

  async listForUser(userId: string): Promise<NotificationEntry[]> {
    if (!this.pool) {
      return Array.from(this.memoryStore.values())
        .filter((n) => n.userId === userId)
        .map((n) => ({ ...n }));
    }

    const result = await this.pool.query<NotificationRow>(
      `SELECT ${COLUMNS}
       FROM notifications
       WHERE user_id = $1
       ORDER BY seq`,
      [userId]
    );
    return result.rows.map(toEntry);
  }

  async countByStatus(): Promise<DeliveryCounts> {
    const counts: DeliveryCounts = { pending: 0, sent: 0, failed: 0 };

    if (!this.pool) {
      for (const entry of this.memoryStore.values()) counts[entry.status]++;
      return counts;
    }

    const result = await this.pool.query<{ status: DeliveryStatus; count: string }>(
      `SELECT status, COUNT(*) AS count FROM notifications GROUP BY status`
    );
    for (const row of result.rows) counts[row.status] = Number(row.count);
    return counts;
  }
}
