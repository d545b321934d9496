import type { Request, Response, NextFunction } from 'express';
import type { PodcastRole, User } from '@showdesk/shared';
import { RequestCache } from '../services/request-cache.js';
import { ForbiddenError, UnauthorizedError } from '../types/errors.js';

declare global {
  namespace Express {
    interface Locals {
      cache?: RequestCache;
      user?: User;
      podcastRole?: PodcastRole;
    }
  }
}

/**
 * Give every request its own cache.
 */
export function requestContext(_req: Request, res: Response, next: NextFunction): void {
  res.locals.cache = new RequestCache();
  next();
}

export function getRequestCache(res: Response): RequestCache {
  if (!res.locals.cache) {
    res.locals.cache = new RequestCache();
  }
  return res.locals.cache;
}

export function getCurrentUser(res: Response): User {
  const user = res.locals.user;
  if (!user) {
    throw new UnauthorizedError();
  }
  return user;
}

/**
 * The caller's role in the addressed podcast, set by the podcast access middleware.
 */
export function getPodcastRole(res: Response): PodcastRole {
  const role = res.locals.podcastRole;
  if (!role) {
    throw new ForbiddenError('Podcast access required');
  }
  return role;
}
