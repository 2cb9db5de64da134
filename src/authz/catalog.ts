import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { DuplicateNameError, InvalidInputError, UnknownPermissionError } from './errors.js';
import type { Permission, PermissionId } from './types.js';

const PERMISSION_ID = /^[a-z][a-z0-9_]*$/;

const permissionSchema = z.object({
  id: z.string().regex(PERMISSION_ID),
  label: z.string().min(1),
  description: z.string().default(''),
  module: z.string().min(1),
});

const catalogFileSchema = z.object({
  version: z.number().int().positive().optional(),
  permissions: z.array(permissionSchema).min(1),
});

/**
 * The closed set of permission ids. Entries can be added (each addition bumps
 * `version`) but never removed or redefined.
 */
export class PermissionCatalog {
  private permissions = new Map<PermissionId, Permission>();
  private currentVersion: number;

  /** `version` is the published catalog version the initial entries belong to. */
  constructor(initial: Permission[], version = 1) {
    if (!Number.isInteger(version) || version < 1) {
      throw new InvalidInputError(`Catalog version must be a positive integer, got ${version}`);
    }
    this.currentVersion = version;
    for (const permission of initial) {
      this.register(permission);
    }
  }

  get version(): number {
    return this.currentVersion;
  }

  get size(): number {
    return this.permissions.size;
  }

  listAll(): Permission[] {
    return [...this.permissions.values()];
  }

  ids(): Set<PermissionId> {
    return new Set(this.permissions.keys());
  }

  exists(id: string): boolean {
    return this.permissions.has(id);
  }

  get(id: string): Permission {
    const permission = this.permissions.get(id);
    if (!permission) throw new UnknownPermissionError([id]);
    return permission;
  }

  unknownOf(ids: Iterable<string>): PermissionId[] {
    const unknown: PermissionId[] = [];
    for (const id of ids) {
      if (!this.permissions.has(id) && !unknown.includes(id)) unknown.push(id);
    }
    return unknown;
  }

  assertKnown(ids: Iterable<string>): void {
    const unknown = this.unknownOf(ids);
    if (unknown.length > 0) throw new UnknownPermissionError(unknown);
  }

  byModule(): Map<string, Permission[]> {
    const groups = new Map<string, Permission[]>();
    for (const permission of this.permissions.values()) {
      const group = groups.get(permission.module) ?? [];
      group.push(permission);
      groups.set(permission.module, group);
    }
    return groups;
  }

  extend(permission: Permission): void {
    this.register(permission);
    this.currentVersion += 1;
  }

  private register(permission: Permission): void {
    const parsed = permissionSchema.safeParse(permission);
    if (!parsed.success) {
      throw new InvalidInputError(`Invalid permission definition: ${JSON.stringify(permission)}`);
    }
    if (this.permissions.has(parsed.data.id)) {
      throw new DuplicateNameError(parsed.data.id);
    }
    this.permissions.set(parsed.data.id, parsed.data);
  }
}

export function loadCatalog(path: string): PermissionCatalog {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  const file = catalogFileSchema.parse(raw);
  return new PermissionCatalog(file.permissions, file.version);
}
