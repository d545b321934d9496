import { Router, type Request, type Response, type NextFunction } from 'express';
import {
  createItemSchema,
  createSuccessResponse,
  itemParamsSchema,
  moveItemSchema,
  reorderItemsSchema,
  updateItemSchema,
  type ApiResponse,
  type CreateItemInput,
  type EpisodeGuideItemWithTimestamp,
  type MoveItemInput,
  type MoveItemResult,
  type ReorderItemsInput,
  type UpdateItemInput,
} from '@showdesk/shared';
import { validate } from '../middleware/validate.js';
import { getRequestCache } from '../middleware/request-context.js';
import { getItemService } from '../services/index.js';
import { loadGuide } from './load-guide.js';

export const itemRouter = Router({ mergeParams: true });

// GET /api/podcasts/:podcastId/episodes/:episodeId/items
itemRouter.get('/', (req: Request, res: Response, next: NextFunction): void => {
  try {
    const response: ApiResponse<EpisodeGuideItemWithTimestamp[]> = {
      success: true,
      data: getItemService().list(loadGuide(req)),
    };
    res.json(response);
  } catch (error) {
    next(error);
  }
});

// POST /api/podcasts/:podcastId/episodes/:episodeId/items
itemRouter.post(
  '/',
  validate(createItemSchema),
  (req: Request<Record<string, string>, unknown, CreateItemInput>, res: Response, next: NextFunction): void => {
    try {
      const item = getItemService().create(loadGuide(req), req.body, getRequestCache(res));
      res.status(201).json(createSuccessResponse(item));
    } catch (error) {
      next(error);
    }
  }
);

// POST /api/podcasts/:podcastId/episodes/:episodeId/items/move
itemRouter.post(
  '/move',
  validate(moveItemSchema),
  (req: Request<Record<string, string>, unknown, MoveItemInput>, res: Response, next: NextFunction): void => {
    try {
      const response: ApiResponse<MoveItemResult> = {
        success: true,
        data: getItemService().move(loadGuide(req), req.body, getRequestCache(res)),
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  }
);

// POST /api/podcasts/:podcastId/episodes/:episodeId/items/reorder
itemRouter.post(
  '/reorder',
  validate(reorderItemsSchema),
  (req: Request<Record<string, string>, unknown, ReorderItemsInput>, res: Response, next: NextFunction): void => {
    try {
      const items = getItemService().reorder(loadGuide(req), req.body, getRequestCache(res));
      res.json(createSuccessResponse(items));
    } catch (error) {
      next(error);
    }
  }
);

// PUT /api/podcasts/:podcastId/episodes/:episodeId/items/:itemId
itemRouter.put(
  '/:itemId',
  validate(updateItemSchema),
  (req: Request<Record<string, string>, unknown, UpdateItemInput>, res: Response, next: NextFunction): void => {
    try {
      const { itemId } = itemParamsSchema.parse(req.params);
      const item = getItemService().update(loadGuide(req), itemId, req.body, getRequestCache(res));
      res.json(createSuccessResponse(item));
    } catch (error) {
      next(error);
    }
  }
);

// DELETE /api/podcasts/:podcastId/episodes/:episodeId/items/:itemId
itemRouter.delete('/:itemId', (req: Request, res: Response, next: NextFunction): void => {
  try {
    const { itemId } = itemParamsSchema.parse(req.params);
    getItemService().delete(loadGuide(req), itemId);
    res.status(204).send();
  } catch (error) {
    next(error);
  }
});
