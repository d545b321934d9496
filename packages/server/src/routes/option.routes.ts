import { Router, type Request, type Response, type NextFunction } from 'express';
import {
  createCustomOptionSchema,
  createSuccessResponse,
  idSchema,
  optionTypeSchema,
  type ApiResponse,
  type Choice,
  type CreateCustomOptionInput,
} from '@showdesk/shared';
import { validate } from '../middleware/validate.js';
import { getCurrentUser, getRequestCache } from '../middleware/request-context.js';
import { getCustomOptionService } from '../services/index.js';

export const optionRouter = Router();

// GET /api/options/types
optionRouter.get('/types', (_req: Request, res: Response, next: NextFunction): void => {
  try {
    res.json(createSuccessResponse(getCustomOptionService().listTypes()));
  } catch (error) {
    next(error);
  }
});

// GET /api/options
optionRouter.get('/', (_req: Request, res: Response, next: NextFunction): void => {
  try {
    res.json(createSuccessResponse(getCustomOptionService().listCustom(getCurrentUser(res).id)));
  } catch (error) {
    next(error);
  }
});

// GET /api/options/:type
optionRouter.get('/:type', (req: Request, res: Response, next: NextFunction): void => {
  try {
    const type = optionTypeSchema.parse(req.params['type']);
    const response: ApiResponse<Choice[]> = {
      success: true,
      data: getCustomOptionService().getChoices(getCurrentUser(res).id, type, getRequestCache(res)),
    };
    res.json(response);
  } catch (error) {
    next(error);
  }
});

// POST /api/options
optionRouter.post(
  '/',
  validate(createCustomOptionSchema),
  (req: Request<Record<string, string>, unknown, CreateCustomOptionInput>, res: Response, next: NextFunction): void => {
    try {
      const option = getCustomOptionService().create(getCurrentUser(res).id, req.body);
      res.status(201).json(createSuccessResponse(option));
    } catch (error) {
      next(error);
    }
  }
);

// DELETE /api/options/:id
optionRouter.delete('/:id', (req: Request, res: Response, next: NextFunction): void => {
  try {
    const id = idSchema.parse(req.params['id']);
    getCustomOptionService().delete(getCurrentUser(res).id, id);
    res.status(204).send();
  } catch (error) {
    next(error);
  }
});
