import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import type { AuthorizationDecision, MutationAuditEntry } from '../../authz/types.js';
import {
  initAuditSchema,
  insertDecision,
  insertMutation,
  queryDecisions,
  queryMutations,
  querySecurityEvents,
} from '../schema.js';

function decision(overrides: Partial<AuthorizationDecision> = {}): AuthorizationDecision {
  return {
    decision_id: 'd-1',
    user_id: 'user-1',
    mode: 'single',
    required: ['view_assets'],
    effective: ['view_assets', 'view_company'],
    missing: [],
    outcome: 'ALLOW',
    reason: null,
    position_id: 'pos-1',
    catalog_version: 1,
    timestamp: '2026-05-01T10:00:00.000Z',
    ...overrides,
  };
}

function mutation(overrides: Partial<MutationAuditEntry> = {}): MutationAuditEntry {
  return {
    id: 'm-1',
    timestamp: '2026-05-01T10:00:00.000Z',
    actor_id: 'admin-1',
    table_name: 'positions',
    record_id: 'pos-1',
    action: 'UPDATE',
    old_values: { permission_ids: ['view_assets'] },
    new_values: { permission_ids: ['manage_assets', 'view_assets'] },
    ip_address: '10.0.0.5',
    user_agent: null,
    ...overrides,
  };
}

describe('audit schema', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(':memory:');
    initAuditSchema(db);
  });

  afterEach(() => {
    db.close();
  });

  it('should be idempotent', () => {
    expect(() => initAuditSchema(db)).not.toThrow();
  });

  it('should round-trip a decision', () => {
    insertDecision(db, decision());
    expect(queryDecisions(db, {})).toEqual([decision()]);
  });

  it('should refuse a second decision with the same id', () => {
    insertDecision(db, decision());
    expect(() => insertDecision(db, decision())).toThrow();
  });

  it('should filter decisions by user and outcome, newest first', () => {
    insertDecision(db, decision({ decision_id: 'd-1', timestamp: '2026-05-01T10:00:00.000Z' }));
    insertDecision(
      db,
      decision({ decision_id: 'd-2', outcome: 'DENY', reason: 'NoPosition', timestamp: '2026-05-01T11:00:00.000Z' }),
    );
    insertDecision(db, decision({ decision_id: 'd-3', user_id: 'user-2', timestamp: '2026-05-01T12:00:00.000Z' }));

    expect(queryDecisions(db, { user_id: 'user-1' }).map((d) => d.decision_id)).toEqual(['d-2', 'd-1']);
    expect(queryDecisions(db, { outcome: 'DENY' }).map((d) => d.decision_id)).toEqual(['d-2']);
    expect(queryDecisions(db, { limit: 1 }).map((d) => d.decision_id)).toEqual(['d-3']);
  });

  it('should list only denials as security events', () => {
    insertDecision(db, decision({ decision_id: 'd-1' }));
    insertDecision(
      db,
      decision({
        decision_id: 'd-2',
        outcome: 'DENY',
        reason: 'InsufficientPermission',
        timestamp: '2026-05-01T11:00:00.000Z',
      }),
    );
    insertDecision(
      db,
      decision({ decision_id: 'd-3', outcome: 'DENY', reason: 'StorageUnavailable', timestamp: '2026-05-01T12:00:00.000Z' }),
    );

    const events = querySecurityEvents(db);
    expect(events.map((e) => e.decision_id)).toEqual(['d-3', 'd-2']);
    expect(events[0].reason).toBe('StorageUnavailable');
  });

  it('should round-trip a mutation with JSON values', () => {
    insertMutation(db, mutation());
    expect(queryMutations(db, {})).toEqual([mutation()]);
  });

  it('should keep null snapshots as null', () => {
    insertMutation(db, mutation({ action: 'CREATE', old_values: null }));
    expect(queryMutations(db, {})[0].old_values).toBeNull();
  });

  it('should filter mutations by table and record', () => {
    insertMutation(db, mutation({ id: 'm-1' }));
    insertMutation(db, mutation({ id: 'm-2', table_name: 'users', record_id: 'user-1' }));

    expect(queryMutations(db, { table_name: 'users' }).map((m) => m.id)).toEqual(['m-2']);
    expect(queryMutations(db, { record_id: 'pos-1' }).map((m) => m.id)).toEqual(['m-1']);
  });
});
