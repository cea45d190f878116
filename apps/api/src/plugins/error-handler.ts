import type { APIErrorResponse } from '@mergington/types';
import { isAppError } from '@mergington/utils';
import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';

function isDevelopment(): boolean {
  return process.env['NODE_ENV'] === 'development';
}

function buildResponse(
  request: FastifyRequest,
  code: string,
  message: string,
  details?: Record<string, unknown>,
  stack?: string
): APIErrorResponse {
  return {
    success: false,
    detail: message,
    error: {
      code,
      message,
      ...(details && { details }),
      ...(stack !== undefined && isDevelopment() ? { stack } : {}),
    },
    requestId: request.id,
    timestamp: new Date().toISOString(),
  };
}

export function errorHandler(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply
): FastifyReply {
  const isDev = isDevelopment();

  let response: APIErrorResponse;
  let statusCode = 500;

  // Handle our custom AppError types
  if (isAppError(error)) {
    statusCode = error.statusCode;
    response = buildResponse(request, error.code, error.message, error.details, error.stack);
  }
  // Handle Zod validation errors
  else if (error instanceof ZodError) {
    statusCode = 400;
    response = buildResponse(
      request,
      'VALIDATION_ERROR',
      'Validation failed',
      {
        errors: error.errors.map((e) => ({
          field: e.path.join('.'),
          message: e.message,
          code: e.code,
        })),
      },
      error.stack
    );
  }
  // Handle Fastify built-in errors (bad JSON, rate limit, payload too large...)
  else if (error.statusCode) {
    statusCode = error.statusCode;
    response = buildResponse(request, error.code || 'ERROR', error.message, undefined, error.stack);
  }
  // Handle unknown errors
  else {
    response = buildResponse(
      request,
      'INTERNAL_ERROR',
      isDev ? error.message : 'An unexpected error occurred',
      undefined,
      error.stack
    );
  }

  if (statusCode >= 500) {
    request.log.error({
      msg: 'error_response',
      error: {
        message: error.message,
        stack: error.stack,
        code: error.code,
      },
      statusCode,
      requestId: request.id,
    });
  } else if (statusCode >= 400) {
    request.log.warn({
      msg: 'client_error',
      error: {
        message: error.message,
        code: error.code,
      },
      statusCode,
      requestId: request.id,
    });
  }

  return reply.status(statusCode).send(response);
}

export function notFoundHandler(request: FastifyRequest, reply: FastifyReply): FastifyReply {
  return reply.status(404).send(buildResponse(request, 'RESOURCE_NOT_FOUND', 'Not Found'));
}
