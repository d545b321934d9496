import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { error as logError, warn } from 'firebase-functions/logger';
import { createErrorResponse } from '@showdesk/shared';
import { AppError } from '../types/errors.js';

// Re-export error classes so routers can import them from one place
export {
  AppError,
  NotFoundError,
  ValidationError,
  ConflictError,
  ForbiddenError,
  UnauthorizedError,
} from '../types/errors.js';

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  // Handle Zod validation errors
  if (err instanceof ZodError) {
    warn('Request validation failed', { method: req.method, path: req.originalUrl, issues: err.errors });
    res.status(400).json(createErrorResponse('VALIDATION_ERROR', 'Invalid request data', err.errors));
    return;
  }

  // Handle known application errors
  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      logError(err.message, { code: err.code, path: req.originalUrl, cause: String(err.cause) });
    } else {
      warn(err.message, { code: err.code, method: req.method, path: req.originalUrl });
    }
    res.status(err.statusCode).json(createErrorResponse(err.code, err.message, err.details));
    return;
  }

  // Malformed JSON bodies rejected by express.json()
  if (err instanceof SyntaxError && 'body' in err) {
    res.status(400).json(createErrorResponse('VALIDATION_ERROR', 'Malformed JSON body'));
    return;
  }

  // Unknown errors
  logError('Unhandled error', { path: req.originalUrl, message: err.message, stack: err.stack });
  res.status(500).json(createErrorResponse('INTERNAL_ERROR', 'An unexpected error occurred'));
}
