import { Router, type Request, type Response, type NextFunction } from 'express';
import {
  addSectionSchema,
  createSuccessResponse,
  type AddSectionInput,
  type ApiResponse,
  type CatalogSection,
} from '@showdesk/shared';
import { validate } from '../middleware/validate.js';
import { getRequestCache } from '../middleware/request-context.js';
import { getSectionService } from '../services/index.js';
import { loadGuide } from './load-guide.js';

export const sectionRouter = Router({ mergeParams: true });

// GET /api/podcasts/:podcastId/episodes/:episodeId/sections
sectionRouter.get('/', (req: Request, res: Response, next: NextFunction): void => {
  try {
    const response: ApiResponse<CatalogSection[]> = {
      success: true,
      data: getSectionService().listSections(loadGuide(req), getRequestCache(res)),
    };
    res.json(response);
  } catch (error) {
    next(error);
  }
});

// POST /api/podcasts/:podcastId/episodes/:episodeId/sections
sectionRouter.post(
  '/',
  validate(addSectionSchema),
  (req: Request<Record<string, string>, unknown, AddSectionInput>, res: Response, next: NextFunction): void => {
    try {
      const result = getSectionService().addCustomSection(loadGuide(req), req.body, getRequestCache(res));
      res.status(201).json(createSuccessResponse(result));
    } catch (error) {
      next(error);
    }
  }
);

// DELETE /api/podcasts/:podcastId/episodes/:episodeId/sections/:sectionKey
sectionRouter.delete('/:sectionKey', (req: Request, res: Response, next: NextFunction): void => {
  try {
    const key = req.params['sectionKey'] ?? '';
    getSectionService().deleteCustomSection(loadGuide(req), key, getRequestCache(res));
    res.status(204).send();
  } catch (error) {
    next(error);
  }
});
