/**
 * API Response Utilities
 *
 * Helpers that wrap route results in the standard envelopes from types.ts,
 * so handlers never build `{ success, data }` by hand.
 *
 * @example
 * ```typescript
 * app.get('/api/sessions/:id', (c) => {
 *   const session = store.get(c.req.param('id'));
 *   if (!session) {
 *     return notFound(c, 'Session', c.req.param('id'));
 *   }
 *   return success(c, toSessionPayload(session.toSnapshot()));
 * });
 * ```
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ApiResponse, ApiErrorResponse } from '../types';

// ============================================================================
// Success Response Helper
// ============================================================================

/**
 * Wraps `data` in a success envelope.
 *
 * @param statusCode - HTTP status code (default: 200)
 */
export function success<T>(
  c: Context,
  data: T,
  statusCode: ContentfulStatusCode = 200
): Response {
  const response: ApiResponse<T> = {
    success: true,
    data,
  };

  return c.json(response, statusCode);
}

// ============================================================================
// Error Response Helper
// ============================================================================

/**
 * Builds an error envelope.
 *
 * @param code - Machine-readable error code (e.g., 'NOT_FOUND', 'CONFLICT')
 * @param statusCode - HTTP status code (default: 400)
 * @param details - Optional additional error context
 */
export function error(
  c: Context,
  code: string,
  message: string,
  statusCode: ContentfulStatusCode = 400,
  details?: unknown
): Response {
  const response: ApiErrorResponse = {
    success: false,
    error: {
      code,
      message,
      // Only include details if provided (avoids undefined in JSON)
      ...(details !== undefined && { details }),
    },
  };

  return c.json(response, statusCode);
}

// ============================================================================
// Convenience Error Helpers
// ============================================================================

/**
 * 404 for a missing resource.
 *
 * @param resource - Name of the resource type (e.g., 'Session')
 */
export function notFound(c: Context, resource: string, id: string): Response {
  return error(c, 'NOT_FOUND', `${resource} with ID '${id}' not found`, 404, {
    resource,
    id,
  });
}

export function badRequest(c: Context, message: string, details?: unknown): Response {
  return error(c, 'BAD_REQUEST', message, 400, details);
}

/**
 * 409 for a request that clashes with the resource's current state, such as
 * a message sent while the previous one is still being answered.
 */
export function conflict(c: Context, message: string, details?: unknown): Response {
  return error(c, 'CONFLICT', message, 409, details);
}

/**
 * 500 for unexpected failures. Details are dropped in production.
 */
export function internalError(
  c: Context,
  message: string = 'An internal error occurred',
  details?: unknown
): Response {
  const safeDetails = process.env.NODE_ENV !== 'production' ? details : undefined;
  return error(c, 'INTERNAL_ERROR', message, 500, safeDetails);
}
