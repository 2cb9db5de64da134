import { buildMutationEntry, recordMutation, SYSTEM_CONTEXT } from './audit.js';
import { UnknownUserError } from './errors.js';
import type { PositionRegistry } from './position-registry.js';
import { DEFAULT_STORAGE_TIMEOUT_MS, guardStorage } from './storage-guard.js';
import type { AuditSink, MutationContext, Position, UserDirectory } from './types.js';

export interface UserPositionBindingDeps {
  users: UserDirectory;
  registry: PositionRegistry;
  audit: AuditSink;
  storageTimeoutMs?: number;
}

export class UserPositionBinding {
  private readonly timeoutMs: number;

  constructor(private readonly deps: UserPositionBindingDeps) {
    this.timeoutMs = deps.storageTimeoutMs ?? DEFAULT_STORAGE_TIMEOUT_MS;
  }

  /**
   * Points a user at a position. Holds the target position's lock so a
   * concurrent delete of that position cannot slip in between.
   */
  async bind(
    userId: string,
    positionId: string,
    ctx: MutationContext = SYSTEM_CONTEXT,
  ): Promise<Position> {
    return this.deps.registry.lockPosition(positionId, async (hold) => {
      const position = await this.deps.registry.get(positionId);
      const previous = await this.currentPositionId(userId);
      if (previous === positionId) return position;

      const pending = Promise.resolve().then(() =>
        this.deps.users.setPositionId(userId, positionId, new Date().toISOString()),
      );
      // a write that outlives its timeout keeps the position locked against deletes
      hold(pending);
      await guardStorage('users.setPositionId', () => pending, this.timeoutMs);

      await recordMutation(
        this.deps.audit,
        buildMutationEntry(
          ctx,
          'users',
          userId,
          'UPDATE',
          { position_id: previous },
          { position_id: positionId },
        ),
      );
      return position;
    });
  }

  async currentPosition(userId: string): Promise<Position | null> {
    const positionId = await this.currentPositionId(userId);
    if (positionId === null) return null;
    return this.deps.registry.find(positionId);
  }

  async currentPositionId(userId: string): Promise<string | null> {
    const exists = await guardStorage(
      'users.exists',
      () => this.deps.users.exists(userId),
      this.timeoutMs,
    );
    if (!exists) throw new UnknownUserError(userId);

    return guardStorage('users.getPositionId', () => this.deps.users.getPositionId(userId), this.timeoutMs);
  }
}
