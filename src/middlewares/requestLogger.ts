import { Request, Response, NextFunction } from 'express';
import { logger } from '../utilities/logger';

/**
 * Logs every request once its response has finished.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - start;
    logger.info(`${req.method} ${req.originalUrl} - ${res.statusCode} (${duration}ms)`);
  });

  next();
}
