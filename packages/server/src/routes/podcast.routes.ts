import { Router, type Request, type Response, type NextFunction } from 'express';
import {
  createPodcastSchema,
  createSuccessResponse,
  podcastParamsSchema,
  updatePodcastSchema,
  type ApiResponse,
  type CreatePodcastInput,
  type PodcastWithRole,
  type UpdatePodcastInput,
} from '@showdesk/shared';
import { validate } from '../middleware/validate.js';
import { getCurrentUser, getPodcastRole } from '../middleware/request-context.js';
import { requirePodcastAccess, requirePodcastAdmin } from '../middleware/podcast-access.js';
import { getPodcastService } from '../services/index.js';
import { memberRouter } from './member.routes.js';
import { templateRouter } from './template.routes.js';
import { episodeRouter } from './episode.routes.js';

export const podcastRouter = Router();

// GET /api/podcasts
podcastRouter.get('/', (_req: Request, res: Response, next: NextFunction): void => {
  try {
    const user = getCurrentUser(res);
    const response: ApiResponse<PodcastWithRole[]> = {
      success: true,
      data: getPodcastService().listForUser(user.id),
    };
    res.json(response);
  } catch (error) {
    next(error);
  }
});

// POST /api/podcasts
podcastRouter.post(
  '/',
  validate(createPodcastSchema),
  (req: Request<Record<string, string>, unknown, CreatePodcastInput>, res: Response, next: NextFunction): void => {
    try {
      const user = getCurrentUser(res);
      const podcast = getPodcastService().create(user.id, req.body);
      res.status(201).json(createSuccessResponse(podcast));
    } catch (error) {
      next(error);
    }
  }
);

// GET /api/podcasts/:podcastId
podcastRouter.get(
  '/:podcastId',
  requirePodcastAccess,
  (req: Request, res: Response, next: NextFunction): void => {
    try {
      const { podcastId } = podcastParamsSchema.parse(req.params);
      const podcast = getPodcastService().getById(podcastId);
      const response: ApiResponse<PodcastWithRole> = {
        success: true,
        data: { ...podcast, role: getPodcastRole(res) },
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  }
);

// PUT /api/podcasts/:podcastId
podcastRouter.put(
  '/:podcastId',
  requirePodcastAdmin,
  validate(updatePodcastSchema),
  (req: Request<Record<string, string>, unknown, UpdatePodcastInput>, res: Response, next: NextFunction): void => {
    try {
      const { podcastId } = podcastParamsSchema.parse(req.params);
      const service = getPodcastService();
      const podcast = service.update(service.getById(podcastId), req.body);
      res.json(createSuccessResponse(podcast));
    } catch (error) {
      next(error);
    }
  }
);

// DELETE /api/podcasts/:podcastId
podcastRouter.delete(
  '/:podcastId',
  requirePodcastAdmin,
  (req: Request, res: Response, next: NextFunction): void => {
    try {
      const { podcastId } = podcastParamsSchema.parse(req.params);
      const service = getPodcastService();
      service.delete(service.getById(podcastId));
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  }
);

podcastRouter.use('/:podcastId/members', requirePodcastAccess, memberRouter);
podcastRouter.use('/:podcastId/templates', requirePodcastAccess, templateRouter);
podcastRouter.use('/:podcastId/episodes', requirePodcastAccess, episodeRouter);
