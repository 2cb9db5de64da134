import type Database from 'better-sqlite3';
import type { AuditSink, AuthorizationDecision, MutationAuditEntry } from '../authz/types.js';
import { sanitizeValues } from './sanitize.js';
import { insertDecision, insertMutation } from './schema.js';

export function sanitizeMutation(entry: MutationAuditEntry): MutationAuditEntry {
  return {
    ...entry,
    old_values: entry.old_values && sanitizeValues(entry.old_values),
    new_values: entry.new_values && sanitizeValues(entry.new_values),
  };
}

/** Writes straight into the audit database when it lives in the same process. */
export class SqliteAuditSink implements AuditSink {
  constructor(private readonly db: Database.Database) {}

  async recordDecision(decision: AuthorizationDecision): Promise<void> {
    insertDecision(this.db, decision);
  }

  async recordMutation(entry: MutationAuditEntry): Promise<void> {
    insertMutation(this.db, sanitizeMutation(entry));
  }
}
