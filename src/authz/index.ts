import type { PermissionCatalog } from './catalog.js';
import { AuthorizationEngine } from './engine.js';
import { KeyedLock } from './keyed-lock.js';
import { PermissionSetCache } from './permission-cache.js';
import { PositionRegistry } from './position-registry.js';
import type { AuditSink, PositionStore, UserDirectory } from './types.js';
import { UserPositionBinding } from './user-binding.js';

export interface AuthorizationServiceOptions {
  catalog: PermissionCatalog;
  positions: PositionStore;
  users: UserDirectory;
  audit: AuditSink;
  storageTimeoutMs?: number;
  cacheSize?: number;
}

export interface AuthorizationService {
  catalog: PermissionCatalog;
  cache: PermissionSetCache;
  registry: PositionRegistry;
  binding: UserPositionBinding;
  engine: AuthorizationEngine;
}

/** Wires registry, binding and engine around one shared cache and lock table. */
export function createAuthorizationService(options: AuthorizationServiceOptions): AuthorizationService {
  const { catalog, audit, storageTimeoutMs } = options;
  const cache = new PermissionSetCache(options.cacheSize);
  const registry = new PositionRegistry({
    store: options.positions,
    users: options.users,
    catalog,
    cache,
    audit,
    locks: new KeyedLock(),
    storageTimeoutMs,
  });
  const binding = new UserPositionBinding({ users: options.users, registry, audit, storageTimeoutMs });
  const engine = new AuthorizationEngine({ catalog, registry, binding, cache, audit, storageTimeoutMs });

  return { catalog, cache, registry, binding, engine };
}
