/**
 * Hono Application Factory
 *
 * Builds the HTTP app from its dependencies without starting a server, so
 * tests can drive it with `app.request()`.
 *
 * Middleware order:
 * 1. Error handler (outermost, formats anything thrown)
 * 2. Request logger
 * 3. CORS
 * 4. General rate limit on /api/*, stricter limit on model-backed routes
 */

import { Hono } from 'hono';
import { config } from '../config';
import {
  corsMiddleware,
  corsConfigFromOrigins,
  errorHandler,
  loggerMiddleware,
  rateLimiter,
  renderError,
  type CorsConfig,
  type LoggerConfig,
} from './middleware';
import type { ApiDependencies } from './dependencies';
import { createApiRouter, healthRoutes } from './routes';
import { error } from './utils/response';

export interface AppOptions {
  /** Requests per window for /api/* */
  rateLimit?: { windowMs: number; maxRequests: number; llmMaxRequests: number } | false;
  cors?: Partial<CorsConfig>;
  logger?: Partial<LoggerConfig> | false;
}

/**
 * Paths whose handlers call the model.
 */
const MODEL_BACKED_PATHS = ['/api/evaluate', '/api/converse', '/api/sessions/:id/messages'];

export function createApp(deps: ApiDependencies, options: AppOptions = {}): Hono {
  const app = new Hono();
  const rateLimit = options.rateLimit ?? config.rateLimit;

  app.onError(renderError);
  app.use('*', errorHandler());

  if (options.logger !== false) {
    app.use('*', loggerMiddleware(options.logger ?? {}));
  }

  app.use('*', corsMiddleware(options.cors ?? corsConfigFromOrigins(config.cors.allowedOrigins)));

  app.route('/health', healthRoutes(() => deps.sessionStore.size));

  if (rateLimit !== false) {
    app.use(
      '/api/*',
      rateLimiter({ windowMs: rateLimit.windowMs, maxRequests: rateLimit.maxRequests })
    );

    const llmLimiter = rateLimiter({
      windowMs: rateLimit.windowMs,
      maxRequests: rateLimit.llmMaxRequests,
      message: 'Too many evaluation or chat requests. Please wait a moment.',
      // Only POSTs reach the model
      skip: (c) => c.req.method !== 'POST',
    });
    for (const path of MODEL_BACKED_PATHS) {
      app.use(path, llmLimiter);
    }
  }

  app.route('/api', createApiRouter(deps));

  app.notFound((c) => error(c, 'NOT_FOUND', `Route ${c.req.method} ${c.req.path} not found`, 404));

  return app;
}
