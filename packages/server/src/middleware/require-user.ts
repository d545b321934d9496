import type { Request, Response, NextFunction } from 'express';
import { getAuthService } from '../services/index.js';
import { UnauthorizedError } from '../types/errors.js';

const BEARER_PREFIX = 'Bearer ';

/**
 * Resolve `Authorization: Bearer <token>` to a user on `res.locals.user`.
 */
export function requireUser(req: Request, res: Response, next: NextFunction): void {
  const header = req.get('authorization');
  if (!header?.startsWith(BEARER_PREFIX)) {
    next(new UnauthorizedError());
    return;
  }

  const user = getAuthService().authenticate(header.slice(BEARER_PREFIX.length).trim());
  if (!user) {
    next(new UnauthorizedError('Invalid API token'));
    return;
  }

  res.locals.user = user;
  next();
}
