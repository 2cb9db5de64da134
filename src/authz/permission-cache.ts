import type { PermissionId } from './types.js';

interface CacheEntry {
  epoch: number;
  catalogVersion: number;
  permissions: ReadonlySet<PermissionId>;
}

/**
 * Resolved permission sets keyed by position id.
 *
 * Every invalidation bumps the epoch. A reader captures the epoch before it
 * goes to storage and hands it back to `set`; if a write invalidated the cache
 * in between, the late result is dropped instead of cached.
 */
export class PermissionSetCache {
  private entries = new Map<string, CacheEntry>();
  private currentEpoch = 0;

  constructor(private readonly maxEntries = 1_000) {}

  get epoch(): number {
    return this.currentEpoch;
  }

  get size(): number {
    return this.entries.size;
  }

  get(positionId: string, catalogVersion: number): ReadonlySet<PermissionId> | null {
    const entry = this.entries.get(positionId);
    if (!entry) return null;
    if (entry.epoch !== this.currentEpoch || entry.catalogVersion !== catalogVersion) {
      this.entries.delete(positionId);
      return null;
    }
    return entry.permissions;
  }

  set(
    positionId: string,
    permissions: Iterable<PermissionId>,
    epoch: number,
    catalogVersion: number,
  ): boolean {
    if (epoch !== this.currentEpoch) return false;

    this.entries.delete(positionId);
    this.entries.set(positionId, { epoch, catalogVersion, permissions: new Set(permissions) });

    // Map keeps insertion order, so the first key is the oldest.
    if (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    return true;
  }

  invalidate(positionId?: string): void {
    this.currentEpoch += 1;
    if (positionId === undefined) {
      this.entries.clear();
    } else {
      this.entries.delete(positionId);
    }
  }
}
