import { PermissionCatalog } from '../catalog.js';
import { createAuthorizationService, type AuthorizationService } from '../index.js';
import type {
  AuditSink,
  AuthorizationDecision,
  MutationAuditEntry,
  Permission,
  PermissionId,
  Position,
  PositionDetailsPatch,
  PositionStore,
  UserDirectory,
} from '../types.js';

export function permission(id: string, module = 'asset'): Permission {
  return { id, label: id.replace(/_/g, ' '), description: '', module };
}

export const TEST_PERMISSIONS: Permission[] = [
  permission('view_company', 'company'),
  permission('view_branches', 'branch'),
  permission('view_users', 'user'),
  permission('manage_users', 'user'),
  permission('view_positions', 'position'),
  permission('manage_positions', 'position'),
  permission('view_permissions', 'permission'),
  permission('view_assets'),
  permission('manage_assets'),
  permission('delete_assets'),
  permission('generate_reports', 'report'),
  permission('view_audit_logs', 'system'),
];

export function testCatalog(): PermissionCatalog {
  return new PermissionCatalog(TEST_PERMISSIONS);
}

export class MemoryAuditSink implements AuditSink {
  decisions: AuthorizationDecision[] = [];
  mutations: MutationAuditEntry[] = [];
  failDecisions = false;
  failMutations = false;
  hangDecisions = false;

  async recordDecision(decision: AuthorizationDecision): Promise<void> {
    if (this.hangDecisions) return new Promise<void>(() => undefined);
    if (this.failDecisions) throw new Error('audit sink down');
    this.decisions.push(decision);
  }

  async recordMutation(entry: MutationAuditEntry): Promise<void> {
    if (this.failMutations) throw new Error('audit sink down');
    this.mutations.push(entry);
  }
}

export class MemoryPositionStore implements PositionStore {
  positions = new Map<string, Position>();
  failing = false;
  reads = 0;
  /** Delays every write before it lands. */
  writeDelayMs = 0;
  /** Writes in the order they landed. */
  writes: string[] = [];

  async list(): Promise<Position[]> {
    this.check();
    return [...this.positions.values()].map(clone);
  }

  async findById(id: string): Promise<Position | null> {
    this.check();
    this.reads += 1;
    const position = this.positions.get(id);
    return position ? clone(position) : null;
  }

  async findFullCatalogGrant(): Promise<Position | null> {
    this.check();
    const position = [...this.positions.values()].find((p) => p.is_full_catalog_grant);
    return position ? clone(position) : null;
  }

  async insert(position: Position): Promise<void> {
    await this.beforeWrite('insert');
    this.positions.set(position.id, clone(position));
  }

  async replacePermissions(id: string, permissionIds: PermissionId[], updatedAt: string): Promise<void> {
    await this.beforeWrite('replacePermissions');
    const position = this.positions.get(id);
    if (position) this.positions.set(id, { ...position, permission_ids: [...permissionIds], updated_at: updatedAt });
  }

  async updateDetails(id: string, patch: PositionDetailsPatch, updatedAt: string): Promise<void> {
    await this.beforeWrite('updateDetails');
    const position = this.positions.get(id);
    if (position) this.positions.set(id, { ...position, ...patch, updated_at: updatedAt });
  }

  async delete(id: string): Promise<void> {
    await this.beforeWrite('delete');
    this.positions.delete(id);
  }

  private check(): void {
    if (this.failing) throw new Error('database is locked');
  }

  private async beforeWrite(name: string): Promise<void> {
    this.check();
    const delay = this.writeDelayMs;
    if (delay > 0) await sleep(delay);
    this.writes.push(name);
  }
}

export class MemoryUserDirectory implements UserDirectory {
  positions = new Map<string, string | null>();
  failing = false;

  add(userId: string, positionId: string | null = null): void {
    this.positions.set(userId, positionId);
  }

  async exists(userId: string): Promise<boolean> {
    this.check();
    return this.positions.has(userId);
  }

  async getPositionId(userId: string): Promise<string | null> {
    this.check();
    return this.positions.get(userId) ?? null;
  }

  async setPositionId(userId: string, positionId: string): Promise<void> {
    this.check();
    this.positions.set(userId, positionId);
  }

  async countByPosition(positionId: string): Promise<number> {
    this.check();
    return [...this.positions.values()].filter((p) => p === positionId).length;
  }

  private check(): void {
    if (this.failing) throw new Error('connection refused');
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function clone(position: Position): Position {
  return { ...position, permission_ids: [...position.permission_ids] };
}

export interface TestService extends AuthorizationService {
  store: MemoryPositionStore;
  users: MemoryUserDirectory;
  sink: MemoryAuditSink;
}

export function createTestService(catalog: PermissionCatalog = testCatalog(), storageTimeoutMs = 200): TestService {
  const store = new MemoryPositionStore();
  const users = new MemoryUserDirectory();
  const sink = new MemoryAuditSink();
  const service = createAuthorizationService({ catalog, positions: store, users, audit: sink, storageTimeoutMs });
  return { ...service, store, users, sink };
}
