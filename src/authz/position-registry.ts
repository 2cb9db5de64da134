import { v4 as uuidv4 } from 'uuid';
import { buildMutationEntry, recordMutation, SYSTEM_CONTEXT } from './audit.js';
import type { PermissionCatalog } from './catalog.js';
import {
  DuplicateNameError,
  InvalidInputError,
  InvalidPermissionSetError,
  PositionInUseError,
  ProtectedPositionError,
  UnknownPositionError,
} from './errors.js';
import { KeyedLock, type Hold } from './keyed-lock.js';
import type { PermissionSetCache } from './permission-cache.js';
import { DEFAULT_STORAGE_TIMEOUT_MS, guardStorage } from './storage-guard.js';
import type {
  AuditSink,
  CreatePositionInput,
  MutationAction,
  MutationContext,
  PermissionId,
  Position,
  PositionDetailsPatch,
  PositionStore,
  UserDirectory,
} from './types.js';

export const MIN_LEVEL = 1;
export const MAX_LEVEL = 10;

export interface PositionRegistryDeps {
  store: PositionStore;
  users: UserDirectory;
  catalog: PermissionCatalog;
  cache: PermissionSetCache;
  audit: AuditSink;
  locks?: KeyedLock;
  storageTimeoutMs?: number;
}

export interface SystemAdministratorDetails {
  name_en: string;
  name_ar?: string | null;
  description?: string | null;
  level?: number;
}

function normalizeName(value: string, field: string): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) throw new InvalidInputError(`${field} must not be empty`);
  if (trimmed.length > 100) throw new InvalidInputError(`${field} must be at most 100 characters`);
  return trimmed;
}

function normalizeOptionalName(value: string | null | undefined, field: string): string | null {
  if (value === undefined || value === null) return null;
  return normalizeName(value, field);
}

function validateLevel(level: number): number {
  if (!Number.isInteger(level) || level < MIN_LEVEL || level > MAX_LEVEL) {
    throw new InvalidInputError(`level must be an integer between ${MIN_LEVEL} and ${MAX_LEVEL}`);
  }
  return level;
}

function sameName(a: string | null, b: string | null): boolean {
  return a !== null && b !== null && a.toLocaleLowerCase() === b.toLocaleLowerCase();
}

function nameKeys(...names: (string | null | undefined)[]): string[] {
  const keys: string[] = [];
  for (const name of names) {
    if (name) keys.push(`name:${name.toLocaleLowerCase()}`);
  }
  return keys;
}

function positionKey(id: string): string {
  return `position:${id}`;
}

export class PositionRegistry {
  private readonly locks: KeyedLock;
  private readonly timeoutMs: number;

  constructor(private readonly deps: PositionRegistryDeps) {
    this.locks = deps.locks ?? new KeyedLock();
    this.timeoutMs = deps.storageTimeoutMs ?? DEFAULT_STORAGE_TIMEOUT_MS;
  }

  /** Runs `task` while holding the mutation lock of one position. */
  lockPosition<T>(positionId: string, task: (hold: Hold) => Promise<T>): Promise<T> {
    return this.locks.run(positionKey(positionId), task);
  }

  async create(input: CreatePositionInput, ctx: MutationContext = SYSTEM_CONTEXT): Promise<Position> {
    const nameEn = normalizeName(input.name_en, 'name_en');
    const nameAr = normalizeOptionalName(input.name_ar, 'name_ar');
    const level = validateLevel(input.level ?? MIN_LEVEL);
    const permissionIds = this.validatePermissionSet(input.permission_ids);

    return this.locks.runAll(nameKeys(nameEn, nameAr), async (hold) => {
      await this.assertNamesFree(nameEn, nameAr, null);

      const now = new Date().toISOString();
      const position: Position = {
        id: uuidv4(),
        name_en: nameEn,
        name_ar: nameAr,
        description: input.description ?? null,
        level,
        is_active: true,
        is_full_catalog_grant: false,
        permission_ids: permissionIds,
        created_at: now,
        updated_at: now,
      };

      await this.write(position.id, hold, 'positions.insert', () => this.deps.store.insert(position));
      await this.audit(ctx, position.id, 'CREATE', null, { ...position });
      return position;
    });
  }

  /** Replaces the permission set of a position; validation happens before any write. */
  async update(
    id: string,
    permissionIds: PermissionId[],
    ctx: MutationContext = SYSTEM_CONTEXT,
  ): Promise<Position> {
    const next = this.validatePermissionSet(permissionIds);

    return this.lockPosition(id, async (hold) => {
      const current = await this.get(id);

      if (current.is_full_catalog_grant) {
        // next is deduplicated and known, so equal size means the full catalog
        if (next.length !== this.deps.catalog.size) {
          throw new ProtectedPositionError(id, 'the full-catalog grant cannot be narrowed');
        }
        return current;
      }

      const now = new Date().toISOString();
      await this.write(id, hold, 'positions.replacePermissions', () =>
        this.deps.store.replacePermissions(id, next, now),
      );

      await this.audit(
        ctx,
        id,
        'UPDATE',
        { permission_ids: current.permission_ids },
        { permission_ids: next },
      );
      return { ...current, permission_ids: next, updated_at: now };
    });
  }

  async updateDetails(
    id: string,
    patch: PositionDetailsPatch,
    ctx: MutationContext = SYSTEM_CONTEXT,
  ): Promise<Position> {
    return this.lockPosition(id, async (holdPosition) => {
      const current = await this.get(id);
      const changes: PositionDetailsPatch = {};

      if (patch.name_en !== undefined) changes.name_en = normalizeName(patch.name_en, 'name_en');
      if (patch.name_ar !== undefined) changes.name_ar = normalizeOptionalName(patch.name_ar, 'name_ar');
      if (patch.description !== undefined) changes.description = patch.description;
      if (patch.level !== undefined) changes.level = validateLevel(patch.level);
      if (patch.is_active !== undefined) {
        if (current.is_full_catalog_grant && !patch.is_active) {
          throw new ProtectedPositionError(id, 'the full-catalog position cannot be deactivated');
        }
        changes.is_active = patch.is_active;
      }

      if (Object.keys(changes).length === 0) return current;

      return this.locks.runAll(nameKeys(changes.name_en, changes.name_ar), async (holdNames) => {
        await this.assertNamesFree(changes.name_en ?? null, changes.name_ar ?? null, id);

        const now = new Date().toISOString();
        const hold: Hold = (pending) => {
          holdPosition(pending);
          holdNames(pending);
        };
        await this.write(id, hold, 'positions.updateDetails', () =>
          this.deps.store.updateDetails(id, changes, now),
        );

        const before: Record<string, unknown> = { ...current };
        const oldValues: Record<string, unknown> = {};
        for (const key of Object.keys(changes)) {
          oldValues[key] = before[key];
        }
        await this.audit(ctx, id, 'UPDATE', oldValues, { ...changes });
        return { ...current, ...changes, updated_at: now };
      });
    });
  }

  async delete(id: string, ctx: MutationContext = SYSTEM_CONTEXT): Promise<void> {
    await this.lockPosition(id, async (hold) => {
      const current = await this.get(id);
      if (current.is_full_catalog_grant) {
        throw new ProtectedPositionError(id, 'the full-catalog position cannot be deleted');
      }

      const userCount = await this.storage('users.countByPosition', () =>
        this.deps.users.countByPosition(id),
      );
      if (userCount > 0) throw new PositionInUseError(id, userCount);

      await this.write(id, hold, 'positions.delete', () => this.deps.store.delete(id));
      await this.audit(ctx, id, 'DELETE', { ...current }, null);
    });
  }

  async get(id: string): Promise<Position> {
    const position = await this.find(id);
    if (!position) throw new UnknownPositionError(id);
    return position;
  }

  async find(id: string): Promise<Position | null> {
    const position = await this.storage('positions.findById', () => this.deps.store.findById(id));
    return position ? this.present(position) : null;
  }

  async listAll(): Promise<Position[]> {
    const positions = await this.storage('positions.list', () => this.deps.store.list());
    return positions
      .map((p) => this.present(p))
      .sort((a, b) => b.level - a.level || a.name_en.localeCompare(b.name_en));
  }

  /**
   * Installs the built-in full-catalog position unless one already exists.
   * The grant is recognized by its flag, never by its name.
   */
  async ensureSystemAdministrator(
    details: SystemAdministratorDetails,
    ctx: MutationContext = SYSTEM_CONTEXT,
  ): Promise<Position> {
    const nameEn = normalizeName(details.name_en, 'name_en');
    const nameAr = normalizeOptionalName(details.name_ar, 'name_ar');
    const level = validateLevel(details.level ?? MAX_LEVEL);

    return this.locks.runAll(['full-catalog', ...nameKeys(nameEn, nameAr)], async (hold) => {
      const existing = await this.storage('positions.findFullCatalogGrant', () =>
        this.deps.store.findFullCatalogGrant(),
      );
      if (existing) return this.present(existing);

      await this.assertNamesFree(nameEn, nameAr, null);

      const now = new Date().toISOString();
      const position: Position = {
        id: uuidv4(),
        name_en: nameEn,
        name_ar: nameAr,
        description: details.description ?? null,
        level,
        is_active: true,
        is_full_catalog_grant: true,
        permission_ids: [],
        created_at: now,
        updated_at: now,
      };
      await this.write(position.id, hold, 'positions.insert', () => this.deps.store.insert(position));
      await this.audit(ctx, position.id, 'CREATE', null, { ...position });
      return this.present(position);
    });
  }

  resolvePermissions(position: Position): Set<PermissionId> {
    if (position.is_full_catalog_grant) return this.deps.catalog.ids();
    return new Set(position.permission_ids);
  }

  private present(position: Position): Position {
    if (!position.is_full_catalog_grant) return position;
    return { ...position, permission_ids: [...this.deps.catalog.ids()].sort() };
  }

  private validatePermissionSet(permissionIds: PermissionId[]): PermissionId[] {
    const unique = [...new Set(permissionIds)];
    const invalid = this.deps.catalog.unknownOf(unique);
    if (invalid.length > 0) throw new InvalidPermissionSetError(invalid);
    return unique.sort();
  }

  private async assertNamesFree(
    nameEn: string | null,
    nameAr: string | null,
    exceptId: string | null,
  ): Promise<void> {
    if (nameEn === null && nameAr === null) return;

    const positions = await this.storage('positions.list', () => this.deps.store.list());
    for (const other of positions) {
      if (other.id === exceptId) continue;
      if (nameEn !== null && sameName(other.name_en, nameEn)) throw new DuplicateNameError(nameEn);
      if (nameAr !== null && sameName(other.name_ar, nameAr)) throw new DuplicateNameError(nameAr);
    }
  }

  private storage<T>(label: string, operation: () => Promise<T>): Promise<T> {
    return guardStorage(label, operation, this.timeoutMs);
  }

  /**
   * Runs a store write under the timeout. A write that times out may still
   * commit later, so the cached set is dropped both when the call returns or
   * fails and again once the write itself settles. The locks stay taken until
   * then.
   */
  private async write(
    positionId: string,
    hold: Hold,
    label: string,
    operation: () => Promise<void>,
  ): Promise<void> {
    const pending = Promise.resolve().then(operation);
    const invalidate = (): void => this.deps.cache.invalidate(positionId);
    hold(pending.then(invalidate, invalidate));

    try {
      await this.storage(label, () => pending);
    } finally {
      invalidate();
    }
  }

  private audit(
    ctx: MutationContext,
    recordId: string,
    action: MutationAction,
    oldValues: Record<string, unknown> | null,
    newValues: Record<string, unknown> | null,
  ): Promise<void> {
    return recordMutation(
      this.deps.audit,
      buildMutationEntry(ctx, 'positions', recordId, action, oldValues, newValues),
    );
  }
}
