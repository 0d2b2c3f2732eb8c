/**
 * Typed failures raised by the services. The HTTP layer maps them onto
 * status codes; everything that is not an AppError is treated as a
 * storage or programming failure.
 */
export type AppErrorCode = 'VALIDATION_ERROR' | 'NOT_FOUND' | 'CONFLICT';

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: AppErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(message: string, statusCode: number, code: AppErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'VALIDATION_ERROR', details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 404, 'NOT_FOUND', details);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 409, 'CONFLICT', details);
  }
}
