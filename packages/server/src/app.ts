import express, { type Express, type Request, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { APP_VERSION, createSuccessResponse } from '@showdesk/shared';
import { apiRouter } from './routes/index.js';
import { errorHandler, requestContext, requestLogger } from './middleware/index.js';

export interface AppOptions {
  corsOrigin?: string;
}

export function createApp(options: AppOptions = {}): Express {
  const app: Express = express();

  // Security middleware
  app.use(helmet());
  app.use(cors({ origin: options.corsOrigin ?? '*' }));

  // Body parsing
  app.use(express.json());

  // Per-request cache and request logging
  app.use(requestContext);
  app.use(requestLogger);

  // API routes
  app.use('/api', apiRouter);

  // Root endpoint
  app.get('/', (_req: Request, res: Response): void => {
    res.json(
      createSuccessResponse({
        message: 'Showdesk API',
        version: APP_VERSION,
      })
    );
  });

  // Error handling (must be last)
  app.use(errorHandler);

  return app;
}
