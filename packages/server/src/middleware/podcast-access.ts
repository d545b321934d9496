import type { Request, Response, NextFunction } from 'express';
import { podcastParamsSchema, type PodcastRole } from '@showdesk/shared';
import { getPodcastService } from '../services/index.js';
import { ForbiddenError, NotFoundError } from '../types/errors.js';
import { getCurrentUser, getRequestCache } from './request-context.js';

function resolveRole(req: Request, res: Response): PodcastRole {
  const { podcastId } = podcastParamsSchema.parse(req.params);
  const user = getCurrentUser(res);
  const role = getRequestCache(res).podcastRole(podcastId, user.id, () =>
    getPodcastService().getRole(podcastId, user.id)
  );
  // Non-members cannot tell a podcast they are not in from one that does not exist.
  if (role === null) {
    throw new NotFoundError('Podcast', podcastId);
  }
  res.locals.podcastRole = role;
  return role;
}

export function requirePodcastAccess(req: Request, res: Response, next: NextFunction): void {
  try {
    resolveRole(req, res);
    next();
  } catch (error) {
    next(error);
  }
}

export function requirePodcastAdmin(req: Request, res: Response, next: NextFunction): void {
  try {
    if (resolveRole(req, res) !== 'admin') {
      throw new ForbiddenError('Admin role required for this podcast');
    }
    next();
  } catch (error) {
    next(error);
  }
}
