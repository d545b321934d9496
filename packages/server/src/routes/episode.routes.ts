import { Router, type Request, type Response, type NextFunction } from 'express';
import {
  createEpisodeGuideSchema,
  createSuccessResponse,
  listEpisodeGuidesQuerySchema,
  podcastParamsSchema,
  updateEpisodeGuideSchema,
  updateStaticContentSchema,
  type ApiResponse,
  type CreateEpisodeGuideInput,
  type EpisodeGuideDetail,
  type EpisodeGuideListResult,
  type PositionIssue,
  type UpdateEpisodeGuideInput,
  type UpdateStaticContentInput,
} from '@showdesk/shared';
import { validate } from '../middleware/validate.js';
import { getRequestCache } from '../middleware/request-context.js';
import { requirePodcastAdmin } from '../middleware/podcast-access.js';
import { getEpisodeGuideService, getItemService } from '../services/index.js';
import { loadGuide } from './load-guide.js';
import { itemRouter } from './item.routes.js';
import { sectionRouter } from './section.routes.js';
import { recordingRouter } from './recording.routes.js';

export const episodeRouter = Router({ mergeParams: true });

// GET /api/podcasts/:podcastId/episodes
episodeRouter.get('/', (req: Request, res: Response, next: NextFunction): void => {
  try {
    const { podcastId } = podcastParamsSchema.parse(req.params);
    const query = listEpisodeGuidesQuerySchema.parse(req.query);
    const response: ApiResponse<EpisodeGuideListResult> = {
      success: true,
      data: getEpisodeGuideService().list(podcastId, query),
    };
    res.json(response);
  } catch (error) {
    next(error);
  }
});

// POST /api/podcasts/:podcastId/episodes
episodeRouter.post(
  '/',
  validate(createEpisodeGuideSchema),
  (req: Request<Record<string, string>, unknown, CreateEpisodeGuideInput>, res: Response, next: NextFunction): void => {
    try {
      const { podcastId } = podcastParamsSchema.parse(req.params);
      const service = getEpisodeGuideService();
      const guide = service.create(podcastId, req.body);
      res.status(201).json(createSuccessResponse(service.getDetail(guide, getRequestCache(res))));
    } catch (error) {
      next(error);
    }
  }
);

// GET /api/podcasts/:podcastId/episodes/:episodeId
episodeRouter.get('/:episodeId', (req: Request, res: Response, next: NextFunction): void => {
  try {
    const response: ApiResponse<EpisodeGuideDetail> = {
      success: true,
      data: getEpisodeGuideService().getDetail(loadGuide(req), getRequestCache(res)),
    };
    res.json(response);
  } catch (error) {
    next(error);
  }
});

// PUT /api/podcasts/:podcastId/episodes/:episodeId
episodeRouter.put(
  '/:episodeId',
  validate(updateEpisodeGuideSchema),
  (req: Request<Record<string, string>, unknown, UpdateEpisodeGuideInput>, res: Response, next: NextFunction): void => {
    try {
      const service = getEpisodeGuideService();
      const guide = service.update(loadGuide(req), req.body);
      res.json(createSuccessResponse(service.getDetail(guide, getRequestCache(res))));
    } catch (error) {
      next(error);
    }
  }
);

// PUT /api/podcasts/:podcastId/episodes/:episodeId/static-content
episodeRouter.put(
  '/:episodeId/static-content',
  validate(updateStaticContentSchema),
  (req: Request<Record<string, string>, unknown, UpdateStaticContentInput>, res: Response, next: NextFunction): void => {
    try {
      const guide = getEpisodeGuideService().updateStaticContent(loadGuide(req), req.body);
      res.json(
        createSuccessResponse({
          intro_static_content: guide.intro_static_content,
          outro_static_content: guide.outro_static_content,
        })
      );
    } catch (error) {
      next(error);
    }
  }
);

// POST /api/podcasts/:podcastId/episodes/:episodeId/copy
episodeRouter.post('/:episodeId/copy', (req: Request, res: Response, next: NextFunction): void => {
  try {
    const service = getEpisodeGuideService();
    const copy = service.copy(loadGuide(req));
    res.status(201).json(createSuccessResponse(service.getDetail(copy, getRequestCache(res))));
  } catch (error) {
    next(error);
  }
});

// DELETE /api/podcasts/:podcastId/episodes/:episodeId
episodeRouter.delete(
  '/:episodeId',
  requirePodcastAdmin,
  (req: Request, res: Response, next: NextFunction): void => {
    try {
      getEpisodeGuideService().delete(loadGuide(req));
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  }
);

// GET /api/podcasts/:podcastId/episodes/:episodeId/positions/audit
episodeRouter.get(
  '/:episodeId/positions/audit',
  (req: Request, res: Response, next: NextFunction): void => {
    try {
      const response: ApiResponse<PositionIssue[]> = {
        success: true,
        data: getItemService().auditPositions(loadGuide(req)),
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  }
);

// POST /api/podcasts/:podcastId/episodes/:episodeId/positions/normalize
episodeRouter.post(
  '/:episodeId/positions/normalize',
  requirePodcastAdmin,
  (req: Request, res: Response, next: NextFunction): void => {
    try {
      const updated = getItemService().normalizePositions(loadGuide(req));
      res.json(createSuccessResponse({ updated }));
    } catch (error) {
      next(error);
    }
  }
);

episodeRouter.use('/:episodeId/items', itemRouter);
episodeRouter.use('/:episodeId/sections', sectionRouter);
episodeRouter.use('/:episodeId', recordingRouter);
