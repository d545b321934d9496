import type { Request, Response, NextFunction } from 'express';
import { info } from 'firebase-functions/logger';

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();
  res.on('finish', () => {
    info(`${req.method} ${req.originalUrl}`, {
      status: res.statusCode,
      durationMs: Date.now() - start,
      userId: res.locals.user?.id,
    });
  });
  next();
}
