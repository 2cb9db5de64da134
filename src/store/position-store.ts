import type Database from 'better-sqlite3';
import { DuplicateNameError } from '../authz/errors.js';
import type { PermissionId, Position, PositionDetailsPatch, PositionStore } from '../authz/types.js';

interface PositionRow {
  id: string;
  name_en: string;
  name_ar: string | null;
  description: string | null;
  level: number;
  is_active: number;
  is_full_catalog_grant: number;
  created_at: string;
  updated_at: string;
}

interface PermissionLinkRow {
  position_id: string;
  permission_id: string;
}

function rowToPosition(row: PositionRow, permissionIds: PermissionId[]): Position {
  return {
    ...row,
    is_active: row.is_active === 1,
    is_full_catalog_grant: row.is_full_catalog_grant === 1,
    permission_ids: permissionIds,
  };
}

function isUniqueViolation(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    err.code === 'SQLITE_CONSTRAINT_UNIQUE'
  );
}

const DETAIL_COLUMNS = ['name_en', 'name_ar', 'description', 'level', 'is_active'] as const;

export class SqlitePositionStore implements PositionStore {
  constructor(private readonly db: Database.Database) {}

  async list(): Promise<Position[]> {
    const rows = this.db.prepare('SELECT * FROM positions').all() as PositionRow[];
    const links = this.db
      .prepare('SELECT position_id, permission_id FROM position_permissions ORDER BY permission_id')
      .all() as PermissionLinkRow[];

    const byPosition = new Map<string, PermissionId[]>();
    for (const link of links) {
      const ids = byPosition.get(link.position_id) ?? [];
      ids.push(link.permission_id);
      byPosition.set(link.position_id, ids);
    }
    return rows.map((row) => rowToPosition(row, byPosition.get(row.id) ?? []));
  }

  async findById(id: string): Promise<Position | null> {
    const row = this.db.prepare('SELECT * FROM positions WHERE id = ?').get(id) as
      | PositionRow
      | undefined;
    return row ? rowToPosition(row, this.permissionsOf(id)) : null;
  }

  async findFullCatalogGrant(): Promise<Position | null> {
    const row = this.db
      .prepare('SELECT * FROM positions WHERE is_full_catalog_grant = 1 ORDER BY created_at LIMIT 1')
      .get() as PositionRow | undefined;
    return row ? rowToPosition(row, this.permissionsOf(row.id)) : null;
  }

  async insert(position: Position): Promise<void> {
    const insertPosition = this.db.prepare(`
      INSERT INTO positions
        (id, name_en, name_ar, description, level, is_active, is_full_catalog_grant, created_at, updated_at)
      VALUES
        (@id, @name_en, @name_ar, @description, @level, @is_active, @is_full_catalog_grant, @created_at, @updated_at)
    `);
    const insertLink = this.db.prepare(
      'INSERT INTO position_permissions (position_id, permission_id) VALUES (?, ?)',
    );

    const tx = this.db.transaction(() => {
      insertPosition.run({
        id: position.id,
        name_en: position.name_en,
        name_ar: position.name_ar,
        description: position.description,
        level: position.level,
        is_active: position.is_active ? 1 : 0,
        is_full_catalog_grant: position.is_full_catalog_grant ? 1 : 0,
        created_at: position.created_at,
        updated_at: position.updated_at,
      });
      for (const permissionId of position.permission_ids) {
        insertLink.run(position.id, permissionId);
      }
    });

    try {
      tx();
    } catch (err) {
      if (isUniqueViolation(err)) throw new DuplicateNameError(position.name_en);
      throw err;
    }
  }

  async replacePermissions(id: string, permissionIds: PermissionId[], updatedAt: string): Promise<void> {
    const clear = this.db.prepare('DELETE FROM position_permissions WHERE position_id = ?');
    const insertLink = this.db.prepare(
      'INSERT INTO position_permissions (position_id, permission_id) VALUES (?, ?)',
    );
    const touch = this.db.prepare('UPDATE positions SET updated_at = ? WHERE id = ?');

    this.db.transaction(() => {
      clear.run(id);
      for (const permissionId of permissionIds) {
        insertLink.run(id, permissionId);
      }
      touch.run(updatedAt, id);
    })();
  }

  async updateDetails(id: string, patch: PositionDetailsPatch, updatedAt: string): Promise<void> {
    const assignments: string[] = [];
    const params: unknown[] = [];

    for (const column of DETAIL_COLUMNS) {
      const value = patch[column];
      if (value === undefined) continue;
      assignments.push(`${column} = ?`);
      params.push(typeof value === 'boolean' ? (value ? 1 : 0) : value);
    }
    assignments.push('updated_at = ?');
    params.push(updatedAt, id);

    try {
      this.db.prepare(`UPDATE positions SET ${assignments.join(', ')} WHERE id = ?`).run(...params);
    } catch (err) {
      if (isUniqueViolation(err)) throw new DuplicateNameError(patch.name_en ?? patch.name_ar ?? id);
      throw err;
    }
  }

  async delete(id: string): Promise<void> {
    this.db.transaction(() => {
      this.db.prepare('DELETE FROM position_permissions WHERE position_id = ?').run(id);
      this.db.prepare('DELETE FROM positions WHERE id = ?').run(id);
    })();
  }

  private permissionsOf(id: string): PermissionId[] {
    const rows = this.db
      .prepare('SELECT permission_id FROM position_permissions WHERE position_id = ? ORDER BY permission_id')
      .all(id) as { permission_id: string }[];
    return rows.map((r) => r.permission_id);
  }
}
