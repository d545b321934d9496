import { Router, type Request, type Response } from 'express';
import { APP_VERSION, createSuccessResponse } from '@showdesk/shared';
import { requireUser } from '../middleware/require-user.js';
import { podcastRouter } from './podcast.routes.js';
import { optionRouter } from './option.routes.js';

export const apiRouter = Router();

// Health check
apiRouter.get('/health', (_req: Request, res: Response): void => {
  res.json(
    createSuccessResponse({
      status: 'ok',
      version: APP_VERSION,
      timestamp: new Date().toISOString(),
    })
  );
});

apiRouter.use(requireUser);
apiRouter.use('/podcasts', podcastRouter);
apiRouter.use('/options', optionRouter);
