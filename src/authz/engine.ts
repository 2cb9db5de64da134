import { v4 as uuidv4 } from 'uuid';
import type { PermissionCatalog } from './catalog.js';
import {
  AccessDeniedError,
  StorageUnavailableError,
  UnknownPermissionError,
  UnknownUserError,
  errorMessage,
} from './errors.js';
import type { PermissionSetCache } from './permission-cache.js';
import type { PositionRegistry } from './position-registry.js';
import { DEFAULT_STORAGE_TIMEOUT_MS, guardStorage } from './storage-guard.js';
import type {
  AuditSink,
  AuthorizationDecision,
  CheckMode,
  DenyReason,
  PermissionId,
} from './types.js';
import type { UserPositionBinding } from './user-binding.js';

export interface AuthorizationEngineDeps {
  catalog: PermissionCatalog;
  registry: PositionRegistry;
  binding: UserPositionBinding;
  cache: PermissionSetCache;
  audit: AuditSink;
  storageTimeoutMs?: number;
}

type Resolution =
  | { granted: true; positionId: string; permissions: ReadonlySet<PermissionId> }
  | { granted: false; positionId: string | null; reason: DenyReason };

export class AuthorizationEngine {
  private readonly timeoutMs: number;

  constructor(private readonly deps: AuthorizationEngineDeps) {
    this.timeoutMs = deps.storageTimeoutMs ?? DEFAULT_STORAGE_TIMEOUT_MS;
  }

  check(userId: string, permission: PermissionId): Promise<AuthorizationDecision> {
    return this.evaluate(userId, [permission], 'single');
  }

  checkAll(userId: string, permissions: PermissionId[]): Promise<AuthorizationDecision> {
    return this.evaluate(userId, permissions, 'all');
  }

  checkAny(userId: string, permissions: PermissionId[]): Promise<AuthorizationDecision> {
    return this.evaluate(userId, permissions, 'any');
  }

  /**
   * Same as the check methods, but a denial is thrown: StorageUnavailableError
   * for storage faults, AccessDeniedError for everything else.
   */
  async authorize(
    userId: string,
    permissions: PermissionId | PermissionId[],
    mode: CheckMode = 'all',
  ): Promise<AuthorizationDecision> {
    const required = typeof permissions === 'string' ? [permissions] : permissions;
    const decision = await this.evaluate(userId, required, mode);
    if (decision.outcome === 'ALLOW') return decision;
    if (decision.reason === 'StorageUnavailable') {
      throw new StorageUnavailableError('authorization check');
    }
    throw new AccessDeniedError(decision);
  }

  /** Sorted effective permissions; empty for users without an active position. */
  async effectivePermissions(userId: string): Promise<PermissionId[]> {
    const resolution = await this.resolve(userId);
    if (!resolution.granted) {
      if (resolution.reason === 'StorageUnavailable') {
        throw new StorageUnavailableError('effective permission lookup');
      }
      return [];
    }
    return [...resolution.permissions].sort();
  }

  private async evaluate(
    userId: string,
    required: PermissionId[],
    mode: CheckMode,
  ): Promise<AuthorizationDecision> {
    const requiredIds = [...new Set(required)];

    // A typo in a route's permission must not pass as an ordinary denial.
    const unknown = this.deps.catalog.unknownOf(requiredIds);
    if (unknown.length > 0) {
      // eslint-disable-next-line no-console
      console.error(`Authorization check for user ${userId} names unknown permission(s): ${unknown.join(', ')}`);
      throw new UnknownPermissionError(unknown);
    }

    const catalogVersion = this.deps.catalog.version;
    const resolution = await this.resolve(userId);
    const decision = this.decide(userId, requiredIds, mode, resolution, catalogVersion);
    return this.deliver(decision);
  }

  private async resolve(userId: string): Promise<Resolution> {
    try {
      const positionId = await this.deps.binding.currentPositionId(userId);
      if (positionId === null) return { granted: false, positionId: null, reason: 'NoPosition' };

      const catalogVersion = this.deps.catalog.version;
      const cached = this.deps.cache.get(positionId, catalogVersion);
      if (cached) return { granted: true, positionId, permissions: cached };

      const epoch = this.deps.cache.epoch;
      const position = await this.deps.registry.find(positionId);
      if (!position) return { granted: false, positionId, reason: 'NoPosition' };
      if (!position.is_active) return { granted: false, positionId, reason: 'PositionInactive' };

      const permissions = this.deps.registry.resolvePermissions(position);
      this.deps.cache.set(positionId, permissions, epoch, catalogVersion);
      return { granted: true, positionId, permissions };
    } catch (err) {
      if (err instanceof UnknownUserError) {
        return { granted: false, positionId: null, reason: 'NoPosition' };
      }
      if (err instanceof StorageUnavailableError) {
        return { granted: false, positionId: null, reason: 'StorageUnavailable' };
      }
      throw err;
    }
  }

  private decide(
    userId: string,
    required: PermissionId[],
    mode: CheckMode,
    resolution: Resolution,
    catalogVersion: number,
  ): AuthorizationDecision {
    const base = {
      decision_id: uuidv4(),
      user_id: userId,
      mode,
      required,
      position_id: resolution.positionId,
      catalog_version: catalogVersion,
      timestamp: new Date().toISOString(),
    };

    if (!resolution.granted) {
      return { ...base, effective: [], missing: [...required], outcome: 'DENY', reason: resolution.reason };
    }

    const granted = resolution.permissions;
    const missing = required.filter((id) => !granted.has(id));
    const allowed = mode === 'any' ? missing.length < required.length : missing.length === 0;

    return {
      ...base,
      effective: [...granted].sort(),
      missing,
      outcome: allowed ? 'ALLOW' : 'DENY',
      reason: allowed ? null : 'InsufficientPermission',
    };
  }

  /** A decision the sink did not accept is never returned as ALLOW. */
  private async deliver(decision: AuthorizationDecision): Promise<AuthorizationDecision> {
    try {
      await guardStorage('audit.recordDecision', () => this.deps.audit.recordDecision(decision), this.timeoutMs);
      return decision;
    } catch (err) {
      // eslint-disable-next-line no-console
      console.error('Decision audit failed, denying:', errorMessage(err), JSON.stringify(decision));
      return { ...decision, outcome: 'DENY', reason: 'StorageUnavailable' };
    }
  }
}
