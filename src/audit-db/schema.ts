import type Database from 'better-sqlite3';
import type {
  AuthorizationDecision,
  CheckMode,
  DecisionOutcome,
  DenyReason,
  MutationAction,
  MutationAuditEntry,
} from '../authz/types.js';

export function initAuditSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS authz_decisions (
      id TEXT PRIMARY KEY,
      timestamp TEXT NOT NULL,
      user_id TEXT NOT NULL,
      mode TEXT NOT NULL,
      required TEXT NOT NULL,
      effective TEXT NOT NULL,
      missing TEXT NOT NULL,
      outcome TEXT NOT NULL,
      reason TEXT,
      position_id TEXT,
      catalog_version INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS audit_log (
      id TEXT PRIMARY KEY,
      timestamp TEXT NOT NULL,
      actor_id TEXT,
      table_name TEXT NOT NULL,
      record_id TEXT NOT NULL,
      action TEXT NOT NULL,
      old_values TEXT,
      new_values TEXT,
      ip_address TEXT,
      user_agent TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_decisions_timestamp ON authz_decisions(timestamp);
    CREATE INDEX IF NOT EXISTS idx_decisions_user ON authz_decisions(user_id);
    CREATE INDEX IF NOT EXISTS idx_decisions_outcome ON authz_decisions(outcome);
    CREATE INDEX IF NOT EXISTS idx_audit_timestamp ON audit_log(timestamp);
    CREATE INDEX IF NOT EXISTS idx_audit_record ON audit_log(table_name, record_id);

    CREATE VIEW IF NOT EXISTS security_events AS
    SELECT * FROM authz_decisions
    WHERE outcome = 'DENY'
    ORDER BY timestamp DESC;
  `);
}

interface DecisionRow {
  id: string;
  timestamp: string;
  user_id: string;
  mode: CheckMode;
  required: string;
  effective: string;
  missing: string;
  outcome: DecisionOutcome;
  reason: DenyReason | null;
  position_id: string | null;
  catalog_version: number;
}

interface MutationRow {
  id: string;
  timestamp: string;
  actor_id: string | null;
  table_name: string;
  record_id: string;
  action: MutationAction;
  old_values: string | null;
  new_values: string | null;
  ip_address: string | null;
  user_agent: string | null;
}

function parseIds(json: string): string[] {
  const value: unknown = JSON.parse(json);
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function parseValues(json: string | null): Record<string, unknown> | null {
  if (json === null) return null;
  const value: unknown = JSON.parse(json);
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : null;
}

function rowToDecision(row: DecisionRow): AuthorizationDecision {
  return {
    decision_id: row.id,
    timestamp: row.timestamp,
    user_id: row.user_id,
    mode: row.mode,
    required: parseIds(row.required),
    effective: parseIds(row.effective),
    missing: parseIds(row.missing),
    outcome: row.outcome,
    reason: row.reason,
    position_id: row.position_id,
    catalog_version: row.catalog_version,
  };
}

function rowToMutation(row: MutationRow): MutationAuditEntry {
  return {
    ...row,
    old_values: parseValues(row.old_values),
    new_values: parseValues(row.new_values),
  };
}

export function insertDecision(db: Database.Database, decision: AuthorizationDecision): void {
  db.prepare(`
    INSERT INTO authz_decisions (id, timestamp, user_id, mode, required, effective, missing,
      outcome, reason, position_id, catalog_version)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    decision.decision_id, decision.timestamp, decision.user_id, decision.mode,
    JSON.stringify(decision.required), JSON.stringify(decision.effective),
    JSON.stringify(decision.missing), decision.outcome, decision.reason,
    decision.position_id, decision.catalog_version,
  );
}

export function insertMutation(db: Database.Database, entry: MutationAuditEntry): void {
  db.prepare(`
    INSERT INTO audit_log (id, timestamp, actor_id, table_name, record_id, action,
      old_values, new_values, ip_address, user_agent)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    entry.id, entry.timestamp, entry.actor_id, entry.table_name, entry.record_id, entry.action,
    entry.old_values === null ? null : JSON.stringify(entry.old_values),
    entry.new_values === null ? null : JSON.stringify(entry.new_values),
    entry.ip_address, entry.user_agent,
  );
}

export function queryDecisions(
  db: Database.Database,
  opts: { limit?: number; user_id?: string; outcome?: DecisionOutcome },
): AuthorizationDecision[] {
  let query = 'SELECT * FROM authz_decisions WHERE 1=1';
  const params: unknown[] = [];

  if (opts.user_id) {
    query += ' AND user_id = ?';
    params.push(opts.user_id);
  }
  if (opts.outcome) {
    query += ' AND outcome = ?';
    params.push(opts.outcome);
  }

  query += ' ORDER BY timestamp DESC, rowid DESC LIMIT ?';
  params.push(opts.limit ?? 100);

  return (db.prepare(query).all(...params) as DecisionRow[]).map(rowToDecision);
}

export function queryMutations(
  db: Database.Database,
  opts: { limit?: number; table_name?: string; record_id?: string },
): MutationAuditEntry[] {
  let query = 'SELECT * FROM audit_log WHERE 1=1';
  const params: unknown[] = [];

  if (opts.table_name) {
    query += ' AND table_name = ?';
    params.push(opts.table_name);
  }
  if (opts.record_id) {
    query += ' AND record_id = ?';
    params.push(opts.record_id);
  }

  query += ' ORDER BY timestamp DESC, rowid DESC LIMIT ?';
  params.push(opts.limit ?? 100);

  return (db.prepare(query).all(...params) as MutationRow[]).map(rowToMutation);
}

export function querySecurityEvents(db: Database.Database, limit = 100): AuthorizationDecision[] {
  const rows = db
    .prepare('SELECT * FROM security_events ORDER BY timestamp DESC LIMIT ?')
    .all(limit) as DecisionRow[];
  return rows.map(rowToDecision);
}
