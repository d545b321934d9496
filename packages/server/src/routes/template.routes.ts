import { Router, type Request, type Response, type NextFunction } from 'express';
import {
  createSuccessResponse,
  createTemplateSchema,
  idSchema,
  podcastParamsSchema,
  updateTemplateSchema,
  type CreateTemplateInput,
  type UpdateTemplateInput,
} from '@showdesk/shared';
import { validate } from '../middleware/validate.js';
import { getCurrentUser } from '../middleware/request-context.js';
import { requirePodcastAdmin } from '../middleware/podcast-access.js';
import { getTemplateService } from '../services/index.js';

export const templateRouter = Router({ mergeParams: true });

const templateParamsSchema = podcastParamsSchema.extend({ templateId: idSchema });

// GET /api/podcasts/:podcastId/templates
templateRouter.get('/', (req: Request, res: Response, next: NextFunction): void => {
  try {
    const { podcastId } = podcastParamsSchema.parse(req.params);
    res.json(createSuccessResponse(getTemplateService().list(podcastId)));
  } catch (error) {
    next(error);
  }
});

// POST /api/podcasts/:podcastId/templates
templateRouter.post(
  '/',
  requirePodcastAdmin,
  validate(createTemplateSchema),
  (req: Request<Record<string, string>, unknown, CreateTemplateInput>, res: Response, next: NextFunction): void => {
    try {
      const { podcastId } = podcastParamsSchema.parse(req.params);
      const template = getTemplateService().create(podcastId, getCurrentUser(res).id, req.body);
      res.status(201).json(createSuccessResponse(template));
    } catch (error) {
      next(error);
    }
  }
);

// GET /api/podcasts/:podcastId/templates/:templateId
templateRouter.get('/:templateId', (req: Request, res: Response, next: NextFunction): void => {
  try {
    const { podcastId, templateId } = templateParamsSchema.parse(req.params);
    res.json(createSuccessResponse(getTemplateService().getById(podcastId, templateId)));
  } catch (error) {
    next(error);
  }
});

// PUT /api/podcasts/:podcastId/templates/:templateId
templateRouter.put(
  '/:templateId',
  requirePodcastAdmin,
  validate(updateTemplateSchema),
  (req: Request<Record<string, string>, unknown, UpdateTemplateInput>, res: Response, next: NextFunction): void => {
    try {
      const { podcastId, templateId } = templateParamsSchema.parse(req.params);
      const service = getTemplateService();
      const template = service.update(service.getById(podcastId, templateId), req.body);
      res.json(createSuccessResponse(template));
    } catch (error) {
      next(error);
    }
  }
);

// DELETE /api/podcasts/:podcastId/templates/:templateId
templateRouter.delete(
  '/:templateId',
  requirePodcastAdmin,
  (req: Request, res: Response, next: NextFunction): void => {
    try {
      const { podcastId, templateId } = templateParamsSchema.parse(req.params);
      const service = getTemplateService();
      service.delete(service.getById(podcastId, templateId));
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  }
);
