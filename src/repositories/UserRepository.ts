import { Pool } from 'pg';
import { ImportUser, User, UserRole, UserStatus } from '../models/User.js';

interface UserRow {
  id: string;
  name: string;
  phone: string;
  department: string;
  role: UserRole;
  status: UserStatus;
  created_at: string;
  updated_at: string;
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    name: row.name,
    phone: row.phone,
    department: row.department,
    role: row.role,
    status: row.status,
    // BIGINT columns come back as strings
    createdAt: Number(row.created_at),
    updatedAt: Number(row.updated_at),
  };
}

/**
 * Read side of the identity collaborator. Users are only written through
 * {@link importUsers}, which seeds or refreshes the directory.
 */
export class UserRepository {
  private memoryStore: Map<string, User> = new Map();

  constructor(private readonly pool: Pool | null = null) {}

  async init(): Promise<void> {
    if (!this.pool) return;

    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS users (
        id VARCHAR(255) PRIMARY KEY,
        name VARCHAR(100) NOT NULL,
        phone VARCHAR(20) NOT NULL,
        department VARCHAR(50) NOT NULL,
        role VARCHAR(10) NOT NULL DEFAULT 'staff' CHECK (role IN ('staff', 'admin')),
        status VARCHAR(10) NOT NULL DEFAULT 'active' CHECK (status IN ('active', 'inactive')),
        created_at BIGINT NOT NULL,
        updated_at BIGINT NOT NULL
      );
    `);

    await this.pool.query(`
      CREATE INDEX IF NOT EXISTS idx_users_role_status ON users(role, status);
    `);
  }

  async importUsers(users: ImportUser[]): Promise<number> {
    const now = Date.now();
    let count = 0;

    if (!this.pool) {
      for (const user of users) {
        const existing = this.memoryStore.get(user.id);
        if (!existing) count++;
        this.memoryStore.set(user.id, {
          ...user,
          createdAt: existing?.createdAt ?? now,
          updatedAt: now,
        });
      }
      return count;
    }

    for (const user of users) {
      const result = await this.pool.query<{ inserted: boolean }>(
        `INSERT INTO users (id, name, phone, department, role, status, created_at, updated_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $7)
         ON CONFLICT (id)
         DO UPDATE SET name = $2, phone = $3, department = $4, role = $5, status = $6, updated_at = $7
         RETURNING (xmax = 0) AS inserted`,
        [user.id, user.name, user.phone, user.department, user.role, user.status, now]
      );
      if (result.rows[0]?.inserted) count++;
    }

    return count;
  }

  async getById(userId: string): Promise<User | null> {
    if (!this.pool) {
      return this.memoryStore.get(userId) ?? null;
    }

    const result = await this.pool.query<UserRow>(
      `SELECT id, name, phone, department, role, status, created_at, updated_at
       FROM users
       WHERE id = $1`,
      [userId]
    );

    const row = result.rows[0];
    return row ? toUser(row) : null;
  }

  async listActiveStaff(): Promise<User[]> {
    if (!this.pool) {
      return Array.from(this.memoryStore.values()).filter((u) => u.role === 'staff' && u.status === 'active');
    }

    const result = await this.pool.query<UserRow>(
      `SELECT id, name, phone, department, role, status, created_at, updated_at
       FROM users
       WHERE role = 'staff' AND status = 'active'
       ORDER BY name`
    );

    return result.rows.map(toUser);
  }
}
