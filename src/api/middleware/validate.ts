/**
 * Zod Validation Middleware
 *
 * Parses the JSON request body, validates it against a zod schema and hands
 * the parsed value to the route as `c.get('validatedBody')`, typed from the
 * schema. Invalid bodies get a 400 with one entry per failing field; a body
 * that is not JSON at all gets a 400 INVALID_JSON.
 *
 * @example
 * ```typescript
 * app.post('/api/sessions/:id/mode', validate(setModeSchema), (c) => {
 *   const { mode } = c.get('validatedBody'); // 'evaluate' | 'chat'
 *   ...
 * });
 * ```
 */

import { createMiddleware } from 'hono/factory';
import type { z } from 'zod';
import type { ApiErrorResponse, ValidationErrorDetail } from '../types';
import { ErrorCodes } from './error-handler';

/**
 * Context variables the validate middleware adds for a given schema.
 */
export interface ValidatedBodyEnv<T extends z.ZodTypeAny> {
  Variables: {
    validatedBody: z.output<T>;
  };
}

export interface ValidateOptions {
  /** Treat a missing body as `{}` (for endpoints whose fields are all optional) */
  allowEmptyBody?: boolean;
}

export function validate<T extends z.ZodTypeAny>(schema: T, options: ValidateOptions = {}) {
  return createMiddleware<ValidatedBodyEnv<T>>(async (c, next) => {
    const raw = await c.req.text();

    let body: unknown;
    try {
      body = options.allowEmptyBody && raw.trim() === '' ? {} : JSON.parse(raw);
    } catch {
      const response: ApiErrorResponse = {
        success: false,
        error: {
          code: ErrorCodes.INVALID_JSON,
          message: 'Request body must be valid JSON',
        },
      };
      return c.json(response, 400);
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      const details: ValidationErrorDetail[] = result.error.errors.map((e) => ({
        path: e.path.join('.'),
        message: e.message,
      }));

      const response: ApiErrorResponse = {
        success: false,
        error: {
          code: ErrorCodes.VALIDATION_ERROR,
          message: 'Invalid request body',
          details,
        },
      };
      return c.json(response, 400);
    }

    c.set('validatedBody', result.data);
    await next();
  });
}
