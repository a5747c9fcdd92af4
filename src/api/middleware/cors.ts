/**
 * CORS Middleware
 *
 * Lets a browser front end on another origin call the API. Development
 * defaults cover the usual local dev-server ports; production uses the
 * origins from ALLOWED_ORIGINS.
 */

import { cors } from 'hono/cors';
import type { MiddlewareHandler } from 'hono';

export interface CorsConfig {
  /** Origins allowed to make cross-origin requests */
  allowedOrigins: string[];
  /** HTTP methods allowed for cross-origin requests */
  allowedMethods: string[];
  /** Headers allowed in cross-origin requests */
  allowedHeaders: string[];
  /** Whether credentials (cookies, authorization headers) are allowed */
  credentials: boolean;
  /** How long preflight responses can be cached (seconds) */
  maxAge: number;
}

export const DEFAULT_CORS_CONFIG: CorsConfig = {
  allowedOrigins: [
    'http://localhost:5173',
    'http://127.0.0.1:5173',
    'http://localhost:3000',
    'http://localhost:4173',
  ],
  allowedMethods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
  credentials: true,
  maxAge: 86400,
};

export function corsMiddleware(
  config: Partial<CorsConfig> = {}
): MiddlewareHandler {
  const finalConfig: CorsConfig = {
    ...DEFAULT_CORS_CONFIG,
    ...config,
  };

  return cors({
    origin: finalConfig.allowedOrigins,
    allowMethods: finalConfig.allowedMethods,
    allowHeaders: finalConfig.allowedHeaders,
    credentials: finalConfig.credentials,
    maxAge: finalConfig.maxAge,
  });
}

/**
 * CORS settings from configured origins; empty means keep the defaults.
 */
export function corsConfigFromOrigins(allowedOrigins: string[]): Partial<CorsConfig> {
  if (allowedOrigins.length === 0) {
    console.warn('[CORS] No ALLOWED_ORIGINS configured, using development defaults');
    return {};
  }
  return { allowedOrigins };
}
