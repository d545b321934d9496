import { Router, type Request, type Response, type NextFunction } from 'express';
import {
  captureTimestampSchema,
  createSuccessResponse,
  itemParamsSchema,
  recordingActionSchema,
  type ApiResponse,
  type CaptureTimestampInput,
  type CaptureTimestampResult,
  type RecordingAction,
  type RecordingState,
} from '@showdesk/shared';
import { validate } from '../middleware/validate.js';
import { getRecordingService } from '../services/index.js';
import { loadGuide } from './load-guide.js';

export const recordingRouter = Router({ mergeParams: true });

// POST /api/podcasts/:podcastId/episodes/:episodeId/start
recordingRouter.post('/start', (req: Request, res: Response, next: NextFunction): void => {
  try {
    res.json(createSuccessResponse(getRecordingService().start(loadGuide(req))));
  } catch (error) {
    next(error);
  }
});

// POST /api/podcasts/:podcastId/episodes/:episodeId/stop
recordingRouter.post('/stop', (req: Request, res: Response, next: NextFunction): void => {
  try {
    res.json(createSuccessResponse(getRecordingService().stop(loadGuide(req))));
  } catch (error) {
    next(error);
  }
});

// POST /api/podcasts/:podcastId/episodes/:episodeId/reopen
recordingRouter.post('/reopen', (req: Request, res: Response, next: NextFunction): void => {
  try {
    res.json(createSuccessResponse(getRecordingService().reopen(loadGuide(req))));
  } catch (error) {
    next(error);
  }
});

// POST /api/podcasts/:podcastId/episodes/:episodeId/recording
recordingRouter.post(
  '/recording',
  validate(recordingActionSchema),
  (req: Request<Record<string, string>, unknown, { action: RecordingAction }>, res: Response, next: NextFunction): void => {
    try {
      const response: ApiResponse<RecordingState> = {
        success: true,
        data: getRecordingService().apply(loadGuide(req), req.body.action),
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  }
);

// POST /api/podcasts/:podcastId/episodes/:episodeId/timestamp/:itemId
recordingRouter.post(
  '/timestamp/:itemId',
  validate(captureTimestampSchema),
  (req: Request<Record<string, string>, unknown, CaptureTimestampInput>, res: Response, next: NextFunction): void => {
    try {
      const { itemId } = itemParamsSchema.parse(req.params);
      const response: ApiResponse<CaptureTimestampResult> = {
        success: true,
        data: getRecordingService().captureTimestamp(loadGuide(req), itemId, req.body),
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  }
);
