import { Router } from 'express';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { PermissionCatalog } from '../authz/catalog.js';
import type { AuthorizationEngine } from '../authz/engine.js';
import type { PositionRegistry } from '../authz/position-registry.js';
import type { MutationContext } from '../authz/types.js';
import type { UserPositionBinding } from '../authz/user-binding.js';
import { authenticatedUserId } from '../shared/auth.js';
import type { PermissionGuard } from '../shared/guard.js';
import { ADMIN_PERMISSIONS } from './permissions.js';
import {
  bindPositionBody,
  checkBody,
  createPositionBody,
  replacePermissionsBody,
  updateDetailsBody,
} from './schemas.js';

export interface AdminRouterDeps {
  catalog: PermissionCatalog;
  registry: PositionRegistry;
  binding: UserPositionBinding;
  engine: AuthorizationEngine;
  guard: PermissionGuard;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function route(handler: AsyncHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

function mutationContext(req: Request, res: Response): MutationContext {
  return {
    actor_id: authenticatedUserId(res),
    ip_address: req.ip ?? null,
    user_agent: req.get('user-agent') ?? null,
  };
}

/** Position administration, user binding and self-service checks. Expects an authenticated caller. */
export function createAdminRouter(deps: AdminRouterDeps): Router {
  const { catalog, registry, binding, engine, guard } = deps;
  const router = Router();

  // GET /permissions
  router.get('/permissions', guard.require(ADMIN_PERMISSIONS.VIEW_PERMISSIONS), (_req, res) => {
    const modules = [...catalog.byModule()].map(([module, permissions]) => ({ module, permissions }));
    res.json({ version: catalog.version, modules });
  });

  // GET /positions
  router.get(
    '/positions',
    guard.require(ADMIN_PERMISSIONS.VIEW_POSITIONS),
    route(async (_req, res) => {
      res.json({ positions: await registry.listAll() });
    }),
  );

  // GET /positions/:id
  router.get(
    '/positions/:id',
    guard.require(ADMIN_PERMISSIONS.VIEW_POSITIONS),
    route(async (req, res) => {
      res.json(await registry.get(req.params.id));
    }),
  );

  // POST /positions
  router.post(
    '/positions',
    guard.require(ADMIN_PERMISSIONS.MANAGE_POSITIONS),
    route(async (req, res) => {
      const body = createPositionBody.parse(req.body);
      const position = await registry.create(body, mutationContext(req, res));
      res.status(201).json(position);
    }),
  );

  // PUT /positions/:id/permissions
  router.put(
    '/positions/:id/permissions',
    guard.require(ADMIN_PERMISSIONS.MANAGE_POSITIONS),
    route(async (req, res) => {
      const body = replacePermissionsBody.parse(req.body);
      res.json(await registry.update(req.params.id, body.permission_ids, mutationContext(req, res)));
    }),
  );

  // PATCH /positions/:id
  router.patch(
    '/positions/:id',
    guard.require(ADMIN_PERMISSIONS.MANAGE_POSITIONS),
    route(async (req, res) => {
      const body = updateDetailsBody.parse(req.body);
      res.json(await registry.updateDetails(req.params.id, body, mutationContext(req, res)));
    }),
  );

  // DELETE /positions/:id
  router.delete(
    '/positions/:id',
    guard.require(ADMIN_PERMISSIONS.MANAGE_POSITIONS),
    route(async (req, res) => {
      await registry.delete(req.params.id, mutationContext(req, res));
      res.status(204).end();
    }),
  );

  // GET /users/:id/position
  router.get(
    '/users/:id/position',
    guard.require(ADMIN_PERMISSIONS.VIEW_USERS),
    route(async (req, res) => {
      res.json({ user_id: req.params.id, position: await binding.currentPosition(req.params.id) });
    }),
  );

  // PUT /users/:id/position
  router.put(
    '/users/:id/position',
    guard.require(ADMIN_PERMISSIONS.MANAGE_USERS),
    route(async (req, res) => {
      const body = bindPositionBody.parse(req.body);
      const position = await binding.bind(req.params.id, body.position_id, mutationContext(req, res));
      res.json({ user_id: req.params.id, position });
    }),
  );

  // GET /me/permissions
  router.get(
    '/me/permissions',
    route(async (_req, res) => {
      const userId = authenticatedUserId(res);
      if (!userId) {
        res.status(401).json({ error: 'Not authenticated' });
        return;
      }
      res.json({
        user_id: userId,
        catalog_version: catalog.version,
        permissions: await engine.effectivePermissions(userId),
      });
    }),
  );

  // POST /check
  router.post(
    '/check',
    route(async (req, res) => {
      const userId = authenticatedUserId(res);
      if (!userId) {
        res.status(401).json({ error: 'Not authenticated' });
        return;
      }

      const body = checkBody.parse(req.body);
      // Client-supplied ids: unknown ones answer 400 instead of throwing.
      const unknown = catalog.unknownOf(body.permissions);
      if (unknown.length > 0) {
        res.status(400).json({ error: 'UnknownPermission', message: `Unknown permissions: ${unknown.join(', ')}` });
        return;
      }

      const decision =
        body.mode === 'single'
          ? await engine.check(userId, body.permissions[0])
          : body.mode === 'all'
            ? await engine.checkAll(userId, body.permissions)
            : await engine.checkAny(userId, body.permissions);
      res.json(decision);
    }),
  );

  return router;
}
