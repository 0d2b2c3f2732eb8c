import { Response } from 'express';
import { logger } from './logging';

/**
 * Response envelope shared by every route
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  error?: {
    code?: string;
    details?: unknown;
  };
  meta?: Record<string, unknown>;
}

export class ResponseHandler {
  static success<T>(
    res: Response,
    data?: T,
    message: string = 'OK',
    statusCode: number = 200,
    meta?: Record<string, unknown>
  ): Response {
    const response: ApiResponse<T> = {
      success: true,
      message,
      data,
      ...(meta && { meta }),
    };

    return res.status(statusCode).json(response);
  }

  /**
   * Created Response (201)
   */
  static created<T>(
    res: Response,
    data?: T,
    message: string = 'Created',
    meta?: Record<string, unknown>
  ): Response {
    return this.success(res, data, message, 201, meta);
  }

  static error(
    res: Response,
    message: string = 'Something went wrong',
    statusCode: number = 400,
    error?: {
      code?: string;
      details?: unknown;
    },
    meta?: Record<string, unknown>
  ): Response {
    const response: ApiResponse = {
      success: false,
      message,
      error,
      ...(meta && { meta }),
    };

    // Client mistakes are routine; only server-side failures are errors
    const log = statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
    log(`[API Error] ${message}`, { statusCode, error, meta });

    return res.status(statusCode).json(response);
  }

  static validationError(
    res: Response,
    errors: unknown[],
    message: string = 'Invalid data'
  ): Response {
    return this.error(res, message, 400, {
      code: 'VALIDATION_ERROR',
      details: errors,
    });
  }

  static notFound(
    res: Response,
    message: string = 'Not found'
  ): Response {
    return this.error(res, message, 404, {
      code: 'NOT_FOUND',
    });
  }

  /**
   * Conflict Response (409)
   */
  static conflict(
    res: Response,
    message: string = 'Conflicts with existing data',
    details?: unknown
  ): Response {
    return this.error(res, message, 409, {
      code: 'CONFLICT',
      details,
    });
  }

  static internalError(
    res: Response,
    message: string = 'Internal server error',
    details?: unknown
  ): Response {
    return this.error(res, message, 500, {
      code: 'INTERNAL_ERROR',
      details,
    });
  }
}
