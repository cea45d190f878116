/**
 * Base error class for application errors
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly details: Record<string, unknown> | undefined;

  constructor(
    message: string,
    code: string,
    statusCode = 500,
    isOperational = true,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

/**
 * Validation error (400)
 */
export class ValidationError extends AppError {
  public readonly field: string | undefined;

  constructor(message: string, field?: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, true, details);
    this.field = field;
  }
}

/**
 * Not found error (404)
 */
export class NotFoundError extends AppError {
  public readonly resourceType: string;

  constructor(resourceType: string, code = 'RESOURCE_NOT_FOUND', details?: Record<string, unknown>) {
    super(`${resourceType} not found`, code, 404, true, { resourceType, ...details });
    this.resourceType = resourceType;
  }
}

/**
 * Conflict error. Defaults to 409; callers whose clients expect a plain
 * bad request pass 400.
 */
export class ConflictError extends AppError {
  constructor(
    message: string,
    code = 'RESOURCE_CONFLICT',
    statusCode = 409,
    details?: Record<string, unknown>
  ) {
    super(message, code, statusCode, true, details);
  }
}

/**
 * Check if an error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Check if an error is operational (expected/handled)
 */
export function isOperationalError(error: unknown): boolean {
  if (isAppError(error)) {
    return error.isOperational;
  }
  return false;
}

/**
 * Wrap an error in an AppError
 */
export function wrapError(error: unknown, defaultMessage = 'An unexpected error occurred'): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(error.message || defaultMessage, 'INTERNAL_ERROR', 500, false, {
      originalError: error.name,
    });
  }

  return new AppError(defaultMessage, 'INTERNAL_ERROR', 500, false);
}
