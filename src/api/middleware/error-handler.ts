/**
 * Global Error Handler Middleware
 *
 * Turns anything thrown by a route or later middleware into the standard
 * error envelope:
 *
 * ```json
 * {
 *   "success": false,
 *   "error": {
 *     "code": "ERROR_CODE",
 *     "message": "Human-readable error message",
 *     "details": { ... }
 *   }
 * }
 * ```
 *
 * Routes throw `AppError` for expected failures; any other error becomes a
 * 500 whose message and stack are only exposed outside production.
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.use('*', errorHandler());
 *
 * app.get('/api/sessions/:id', (c) => {
 *   throw notFoundError('Session', c.req.param('id'));
 * });
 * ```
 */

import type { MiddlewareHandler, Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ApiErrorResponse } from '../types';

/**
 * Error codes used throughout the API.
 */
export const ErrorCodes = {
  // Client errors (4xx)
  BAD_REQUEST: 'BAD_REQUEST',
  NOT_FOUND: 'NOT_FOUND',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_JSON: 'INVALID_JSON',
  RATE_LIMITED: 'RATE_LIMITED',
  CONFLICT: 'CONFLICT',

  // Server errors (5xx)
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  LLM_ERROR: 'LLM_ERROR',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Error with a code and status the error handler turns into a response.
 *
 * @example
 * ```typescript
 * throw new AppError('VALIDATION_ERROR', 'Invalid mode', 400, { mode: 'draw' });
 * ```
 */
export class AppError extends Error {
  /** Machine-readable error code */
  public readonly code: ErrorCode;
  /** HTTP status code to return */
  public readonly statusCode: ContentfulStatusCode;
  /** Additional error context (optional) */
  public readonly details?: unknown;

  constructor(
    code: ErrorCode,
    message: string,
    statusCode: ContentfulStatusCode = 500,
    details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    Error.captureStackTrace?.(this, AppError);
  }
}

function formatErrorResponse(error: unknown): {
  response: ApiErrorResponse;
  statusCode: ContentfulStatusCode;
} {
  if (error instanceof AppError) {
    return {
      response: {
        success: false,
        error: {
          code: error.code,
          message: error.message,
          ...(error.details !== undefined && { details: error.details }),
        },
      },
      statusCode: error.statusCode,
    };
  }

  const isDev = process.env.NODE_ENV !== 'production';

  if (error instanceof Error) {
    return {
      response: {
        success: false,
        error: {
          code: ErrorCodes.INTERNAL_ERROR,
          message: isDev ? error.message : 'An unexpected error occurred. Please try again.',
          ...(isDev && { details: { stack: error.stack } }),
        },
      },
      statusCode: 500,
    };
  }

  // Non-Error throws
  return {
    response: {
      success: false,
      error: {
        code: ErrorCodes.INTERNAL_ERROR,
        message: 'An unexpected error occurred',
        ...(isDev && { details: { rawError: String(error) } }),
      },
    },
    statusCode: 500,
  };
}

/**
 * Logs server-side failures and renders the error envelope.
 */
export function renderError(error: unknown, c: Context): Response {
  if (!(error instanceof AppError) || error.statusCode >= 500) {
    console.error('[Error Handler]', error);
  }

  const { response, statusCode } = formatErrorResponse(error);
  return c.json(response, statusCode);
}

/**
 * Creates the global error handler middleware. Register it before everything
 * else so it wraps the whole pipeline.
 *
 * Hono hands Error instances thrown by handlers to `app.onError` before they
 * reach middleware, so apps register `renderError` there as well.
 */
export function errorHandler(): MiddlewareHandler {
  return async (c: Context, next) => {
    try {
      await next();
    } catch (error) {
      return renderError(error, c);
    }
  };
}

/**
 * @param resource - Name of the resource type (e.g., 'Session')
 */
export function notFoundError(resource: string, id: string): AppError {
  return new AppError(ErrorCodes.NOT_FOUND, `${resource} with ID '${id}' not found`, 404, {
    resource,
    id,
  });
}

export function validationError(message: string, details?: unknown): AppError {
  return new AppError(ErrorCodes.VALIDATION_ERROR, message, 400, details);
}

/**
 * 409 for a request that clashes with the resource's current state.
 */
export function conflictError(message: string, details?: unknown): AppError {
  return new AppError(ErrorCodes.CONFLICT, message, 409, details);
}
