import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { PermissionCatalog } from '../authz/catalog.js';
import type { AuthorizationEngine } from '../authz/engine.js';
import type { CheckMode, PermissionId } from '../authz/types.js';
import { authenticatedUserId } from './auth.js';

export interface PermissionGuardConfig {
  engine: AuthorizationEngine;
  catalog: PermissionCatalog;
  /** Seconds suggested to the caller when storage is unavailable. */
  retryAfterSeconds?: number;
}

export interface PermissionGuard {
  require(permission: PermissionId): RequestHandler;
  requireAll(...permissions: PermissionId[]): RequestHandler;
  requireAny(...permissions: PermissionId[]): RequestHandler;
}

/**
 * Route-level permission checks. Ids are looked up in the catalog when the
 * guard is built, so a misspelled permission stops the server from starting.
 */
export function createPermissionGuard(config: PermissionGuardConfig): PermissionGuard {
  const retryAfter = String(config.retryAfterSeconds ?? 5);

  function gate(permissions: PermissionId[], mode: CheckMode): RequestHandler {
    config.catalog.assertKnown(permissions);

    return async (_req: Request, res: Response, next: NextFunction): Promise<void> => {
      const userId = authenticatedUserId(res);
      if (!userId) {
        res.status(401).json({ error: 'Not authenticated' });
        return;
      }

      try {
        const decision =
          mode === 'single'
            ? await config.engine.check(userId, permissions[0])
            : mode === 'all'
              ? await config.engine.checkAll(userId, permissions)
              : await config.engine.checkAny(userId, permissions);

        if (decision.outcome === 'ALLOW') {
          res.locals.decision = decision;
          next();
          return;
        }

        if (decision.reason === 'StorageUnavailable') {
          res.setHeader('Retry-After', retryAfter);
          res.status(503).json({
            error: 'StorageUnavailable',
            message: 'Authorization is temporarily unavailable, retry later',
            decision_id: decision.decision_id,
          });
          return;
        }

        res.status(403).json({
          error: 'AccessDenied',
          reason: decision.reason,
          mode,
          required: decision.required,
          missing: decision.missing,
          decision_id: decision.decision_id,
        });
      } catch (err) {
        next(err);
      }
    };
  }

  return {
    require: (permission) => gate([permission], 'single'),
    requireAll: (...permissions) => gate(permissions, 'all'),
    requireAny: (...permissions) => gate(permissions, 'any'),
  };
}
