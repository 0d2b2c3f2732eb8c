import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { appConfig } from '../connections/config/app.config';
import { logger } from '../utils/logging';
import { AppError } from '../utils/errors';
import { ResponseHandler } from '../utils/response';

// Postgres SQLSTATE codes the API translates
const PG_UNIQUE_VIOLATION = '23505';
const PG_FOREIGN_KEY_VIOLATION = '23503';
const PG_CHECK_VIOLATION = '23514';

const sqlStateOf = (err: unknown): string | undefined => {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
};

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  if (err instanceof ZodError) {
    return ResponseHandler.validationError(res, err.errors);
  }

  if (err instanceof AppError) {
    return ResponseHandler.error(res, err.message, err.statusCode, {
      code: err.code,
      details: err.details,
    });
  }

  const error = err instanceof Error ? err : new Error(String(err));
  logger.error('[Error Handler]', {
    message: error.message,
    stack: error.stack,
    url: req.originalUrl,
    method: req.method,
    params: req.params,
    query: req.query,
  });

  switch (sqlStateOf(err)) {
    case PG_UNIQUE_VIOLATION:
      return ResponseHandler.conflict(res, 'Conflicts with existing data');
    case PG_FOREIGN_KEY_VIOLATION:
      return ResponseHandler.error(res, 'Referenced record does not exist', 400, {
        code: 'FOREIGN_KEY_VIOLATION',
      });
    case PG_CHECK_VIOLATION:
      return ResponseHandler.error(res, 'Value violates a database constraint', 400, {
        code: 'CHECK_VIOLATION',
      });
    default:
      return ResponseHandler.internalError(
        res,
        'Internal server error',
        appConfig.nodeEnv === 'development' ? error.stack : undefined
      );
  }
};

export const notFoundHandler = (
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  ResponseHandler.notFound(res, `Route ${req.method} ${req.originalUrl} does not exist`);
};
