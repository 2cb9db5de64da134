import type Database from 'better-sqlite3';
import type { UserDirectory } from '../authz/types.js';

export interface UserRecord {
  id: string;
  username: string;
  position_id: string | null;
  created_at: string;
  updated_at: string;
}

export interface NewUser {
  id: string;
  username: string;
  position_id?: string | null;
}

/**
 * Minimal user table standing in for the user-management service. The
 * authorization side only reads and re-points `position_id`.
 */
export class SqliteUserDirectory implements UserDirectory {
  constructor(private readonly db: Database.Database) {}

  addUser(user: NewUser): UserRecord {
    const now = new Date().toISOString();
    const record: UserRecord = {
      id: user.id,
      username: user.username,
      position_id: user.position_id ?? null,
      created_at: now,
      updated_at: now,
    };
    this.db
      .prepare(
        `INSERT INTO users (id, username, position_id, created_at, updated_at)
         VALUES (@id, @username, @position_id, @created_at, @updated_at)`,
      )
      .run(record);
    return record;
  }

  findById(userId: string): UserRecord | null {
    const row = this.db.prepare('SELECT * FROM users WHERE id = ?').get(userId) as
      | UserRecord
      | undefined;
    return row ?? null;
  }

  async exists(userId: string): Promise<boolean> {
    return this.db.prepare('SELECT 1 FROM users WHERE id = ?').get(userId) !== undefined;
  }

  async getPositionId(userId: string): Promise<string | null> {
    const row = this.db.prepare('SELECT position_id FROM users WHERE id = ?').get(userId) as
      | { position_id: string | null }
      | undefined;
    return row?.position_id ?? null;
  }

  async setPositionId(userId: string, positionId: string, updatedAt: string): Promise<void> {
    this.db
      .prepare('UPDATE users SET position_id = ?, updated_at = ? WHERE id = ?')
      .run(positionId, updatedAt, userId);
  }

  async countByPosition(positionId: string): Promise<number> {
    const row = this.db
      .prepare('SELECT COUNT(*) AS n FROM users WHERE position_id = ?')
      .get(positionId) as { n: number };
    return row.n;
  }
}
