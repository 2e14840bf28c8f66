import type { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import { isUniqueViolation } from '../connections/db/connection';
import { AppError, ConflictError, isAppError, NotFoundError, RateLimitedError, ValidationError } from '../utils/errors';
import { logger, errorMessage } from '../utils/logging';
import { ResponseHandler } from '../utils/response';

const isJsonParseError = (err: unknown): boolean =>
  typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';

const toAppError = (err: unknown): AppError => {
  if (isAppError(err)) return err;

  if (err instanceof ZodError) {
    return new ValidationError(
      'Invalid request data',
      err.issues.map(issue => ({ field: issue.path.join('.'), message: issue.message }))
    );
  }

  if (err instanceof multer.MulterError) {
    return new ValidationError(err.code === 'LIMIT_FILE_SIZE' ? 'File is too large' : err.message, {
      field: err.field,
    });
  }

  if (isJsonParseError(err)) {
    return new ValidationError('Malformed JSON body');
  }

  if (isUniqueViolation(err)) {
    return new ConflictError();
  }

  return new AppError(500, 'INTERNAL_ERROR', 'Internal server error');
};

export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  const appError = toAppError(err);

  const context = {
    code: appError.code,
    status: appError.status,
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
  };

  if (appError.status >= 500) {
    logger.error('[Error Handler]', {
      ...context,
      error: errorMessage(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
  } else {
    logger.warn('[Error Handler]', { ...context, message: appError.message });
  }

  if (appError instanceof RateLimitedError) {
    res.setHeader('Retry-After', appError.retryAfterSeconds.toString());
  }

  return ResponseHandler.error(res, appError.message, appError.status, {
    code: appError.code,
    details: appError.details,
  });
};

export const notFoundHandler = (req: Request, _res: Response, next: NextFunction) => {
  next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
};
