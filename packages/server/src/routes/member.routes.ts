import { Router, type Request, type Response, type NextFunction } from 'express';
import {
  addMemberSchema,
  createSuccessResponse,
  memberParamsSchema,
  podcastParamsSchema,
  updateMemberSchema,
  type AddMemberInput,
  type UpdateMemberInput,
} from '@showdesk/shared';
import { validate } from '../middleware/validate.js';
import { getCurrentUser } from '../middleware/request-context.js';
import { requirePodcastAdmin } from '../middleware/podcast-access.js';
import { getPodcastService } from '../services/index.js';

export const memberRouter = Router({ mergeParams: true });

// GET /api/podcasts/:podcastId/members
memberRouter.get('/', (req: Request, res: Response, next: NextFunction): void => {
  try {
    const { podcastId } = podcastParamsSchema.parse(req.params);
    res.json(createSuccessResponse(getPodcastService().listMembers(podcastId)));
  } catch (error) {
    next(error);
  }
});

// POST /api/podcasts/:podcastId/members
memberRouter.post(
  '/',
  requirePodcastAdmin,
  validate(addMemberSchema),
  (req: Request<Record<string, string>, unknown, AddMemberInput>, res: Response, next: NextFunction): void => {
    try {
      const { podcastId } = podcastParamsSchema.parse(req.params);
      const member = getPodcastService().addMember(podcastId, getCurrentUser(res).id, req.body);
      res.status(201).json(createSuccessResponse(member));
    } catch (error) {
      next(error);
    }
  }
);

// PUT /api/podcasts/:podcastId/members/:userId
memberRouter.put(
  '/:userId',
  requirePodcastAdmin,
  validate(updateMemberSchema),
  (req: Request<Record<string, string>, unknown, UpdateMemberInput>, res: Response, next: NextFunction): void => {
    try {
      const { podcastId, userId } = memberParamsSchema.parse(req.params);
      const member = getPodcastService().updateMemberRole(podcastId, userId, req.body.role);
      res.json(createSuccessResponse(member));
    } catch (error) {
      next(error);
    }
  }
);

// DELETE /api/podcasts/:podcastId/members/:userId
memberRouter.delete(
  '/:userId',
  requirePodcastAdmin,
  (req: Request, res: Response, next: NextFunction): void => {
    try {
      const { podcastId, userId } = memberParamsSchema.parse(req.params);
      getPodcastService().removeMember(podcastId, userId);
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  }
);
