import jwt from 'jsonwebtoken';
import type { Request, Response, NextFunction } from 'express';

const INTERNAL_ISSUER = 'asset-authz';

export function verifyInternalToken(secret: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const header = req.headers.authorization;
    if (!header || !header.startsWith('Bearer ')) {
      res.status(401).json({ error: 'Missing authorization header' });
      return;
    }

    try {
      jwt.verify(header.slice(7), secret, { issuer: INTERNAL_ISSUER });
      next();
    } catch {
      res.status(401).json({ error: 'Invalid token' });
    }
  };
}

export function generateInternalToken(secret: string): string {
  return jwt.sign({ iat: Math.floor(Date.now() / 1000) }, secret, {
    issuer: INTERNAL_ISSUER,
    expiresIn: '5m',
  });
}

/** Signs a session token whose subject is the user id. */
export function issueUserToken(userId: string, secret: string, expiresInSeconds = 8 * 60 * 60): string {
  return jwt.sign({}, secret, { subject: userId, expiresIn: expiresInSeconds });
}

/**
 * Verifies a user session token and stores its subject in `res.locals.userId`.
 * Credentials are not re-checked downstream; the subject is trusted.
 */
export function authenticateUser(secret: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const header = req.headers.authorization;
    if (!header || !header.startsWith('Bearer ')) {
      res.status(401).json({ error: 'Missing authorization header' });
      return;
    }

    try {
      const payload = jwt.verify(header.slice(7), secret);
      if (typeof payload === 'string' || typeof payload.sub !== 'string' || payload.sub === '') {
        res.status(401).json({ error: 'Token has no subject' });
        return;
      }
      res.locals.userId = payload.sub;
      next();
    } catch {
      res.status(401).json({ error: 'Invalid token' });
    }
  };
}

export function authenticatedUserId(res: Response): string | null {
  const userId: unknown = res.locals.userId;
  return typeof userId === 'string' ? userId : null;
}
