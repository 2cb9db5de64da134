import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AuthzError, StorageUnavailableError, UnknownPermissionError, errorMessage } from '../authz/errors.js';

/** Maps thrown errors to JSON responses; must be registered after the routes. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof ZodError) {
    res.status(400).json({
      error: 'InvalidInput',
      message: err.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; '),
    });
    return;
  }

  if (err instanceof AuthzError) {
    if (err instanceof UnknownPermissionError) {
      // eslint-disable-next-line no-console
      console.error('Request named an unknown permission:', err.message);
    }
    if (err instanceof StorageUnavailableError) res.setHeader('Retry-After', '5');
    res.status(err.statusCode).json({ error: err.code, message: err.message });
    return;
  }

  // eslint-disable-next-line no-console
  console.error('Unhandled request error:', errorMessage(err));
  res.status(500).json({ error: 'InternalError', message: 'Internal server error' });
}
