import Database from 'better-sqlite3';

export function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS positions (
      id TEXT PRIMARY KEY,
      name_en TEXT NOT NULL,
      name_ar TEXT,
      description TEXT,
      level INTEGER NOT NULL DEFAULT 1,
      is_active INTEGER NOT NULL DEFAULT 1,
      is_full_catalog_grant INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE UNIQUE INDEX IF NOT EXISTS idx_positions_name_en ON positions(lower(name_en));
    CREATE UNIQUE INDEX IF NOT EXISTS idx_positions_name_ar ON positions(lower(name_ar));

    CREATE TABLE IF NOT EXISTS position_permissions (
      position_id TEXT NOT NULL REFERENCES positions(id) ON DELETE CASCADE,
      permission_id TEXT NOT NULL,
      PRIMARY KEY (position_id, permission_id)
    );

    CREATE TABLE IF NOT EXISTS users (
      id TEXT PRIMARY KEY,
      username TEXT NOT NULL UNIQUE,
      position_id TEXT REFERENCES positions(id),
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_users_position ON users(position_id);
  `);
}

export function openDatabase(path: string): Database.Database {
  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  initSchema(db);
  return db;
}
