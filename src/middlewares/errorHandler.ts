import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { AppError, FileTooLargeError, ValidationError } from '../errors/appErrors';
import { logger } from '../utilities/logger';

export interface ErrorBody {
  message: string;
  code: string;
  status: number;
}

export function errorBody(err: AppError): ErrorBody {
  return { message: err.message, code: err.code, status: err.status };
}

// Errors raised by express and multer before a controller runs
function fromMiddleware(err: unknown, maxFileSizeBytes: number): AppError | undefined {
  if (err instanceof multer.MulterError) {
    return err.code === 'LIMIT_FILE_SIZE'
      ? new FileTooLargeError(maxFileSizeBytes)
      : new ValidationError(`Upload rejected: ${err.message}`);
  }
  if (err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed') {
    return new ValidationError('Request body is not valid JSON');
  }
  return undefined;
}

export function createErrorHandler(options: { isDev: boolean; maxFileSizeBytes: number }) {
  return function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction) {
    const appError = err instanceof AppError ? err : fromMiddleware(err, options.maxFileSizeBytes);
    if (appError) {
      logger.warn(`${req.method} ${req.originalUrl} failed: ${appError.code} ${appError.message}`);
    } else {
      logger.error('Request error', {
        url: req.originalUrl,
        method: req.method,
        error: err instanceof Error ? err.stack ?? err.message : String(err),
      });
    }
    if (res.headersSent) {
      return next(err);
    }

    if (appError) {
      res.status(appError.status).json({ error: errorBody(appError) });
      return;
    }
    const message = options.isDev && err instanceof Error ? err.message : 'An unexpected error occurred.';
    res.status(500).json({
      error: { message, code: 'INTERNAL_SERVER_ERROR', status: 500 },
    });
  };
}
