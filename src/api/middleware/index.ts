/**
 * API Middleware - Barrel Export
 *
 * Applied in this order by createApp():
 *
 * 1. Error Handler - catches and formats all errors
 * 2. Logger - logs request information
 * 3. CORS - handles cross-origin requests
 * 4. Rate Limiters - general limit on /api/*, stricter on model-backed routes
 */

export {
  corsMiddleware,
  corsConfigFromOrigins,
  DEFAULT_CORS_CONFIG,
  type CorsConfig,
} from './cors';

export {
  errorHandler,
  renderError,
  AppError,
  ErrorCodes,
  notFoundError,
  validationError,
  conflictError,
  type ErrorCode,
} from './error-handler';

export {
  loggerMiddleware,
  formatRequestLine,
  shortenSessionIds,
  DEFAULT_LOGGER_CONFIG,
  type LoggerConfig,
  type RequestLogEntry,
} from './logger';

export { rateLimiter, type RateLimitConfig } from './rate-limit';

export { validate, type ValidateOptions, type ValidatedBodyEnv } from './validate';
