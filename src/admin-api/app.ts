import express from 'express';
import type { Express } from 'express';
import type { AuthorizationService } from '../authz/index.js';
import { authenticateUser } from '../shared/auth.js';
import { createPermissionGuard } from '../shared/guard.js';
import { errorHandler } from '../shared/http-errors.js';
import { createAdminRouter } from './routes.js';

export interface AdminAppOptions {
  service: AuthorizationService;
  jwtSecret: string;
  retryAfterSeconds?: number;
}

export function createAdminApp(options: AdminAppOptions): Express {
  const { catalog, registry, binding, engine } = options.service;
  const guard = createPermissionGuard({ engine, catalog, retryAfterSeconds: options.retryAfterSeconds });

  const app = express();
  app.use(express.json());

  const startTime = Date.now();
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      uptime_s: Math.floor((Date.now() - startTime) / 1000),
      catalog_version: catalog.version,
    });
  });

  app.use(authenticateUser(options.jwtSecret));
  app.use(createAdminRouter({ catalog, registry, binding, engine, guard }));
  app.use(errorHandler);

  return app;
}
