/**
 * Rate Limiting Middleware
 *
 * Fixed-window, in-memory rate limiting per client. Every limiter keeps its own
 * counters, so the general API limit and the stricter limit on endpoints that
 * call the model are counted separately.
 *
 * Responses carry X-RateLimit-Limit / -Remaining / -Reset headers; a rejected
 * request gets 429 with Retry-After.
 */

import type { MiddlewareHandler, Context } from 'hono';
import { ErrorCodes } from './error-handler';

export interface RateLimitConfig {
  /** Time window in milliseconds */
  windowMs: number;
  /** Maximum number of requests allowed in the window */
  maxRequests: number;
  /** Custom key generator function (defaults to IP-based) */
  keyGenerator?: (c: Context) => string;
  /** Message returned when rate limited */
  message?: string;
  /** Skip rate limiting for certain conditions */
  skip?: (c: Context) => boolean;
}

interface RateLimitEntry {
  /** Number of requests made in current window */
  count: number;
  /** Timestamp when the current window started */
  windowStart: number;
}

/**
 * Extracts the client IP from proxy headers, falling back to a shared key.
 */
function defaultKeyGenerator(c: Context): string {
  const forwardedFor = c.req.header('x-forwarded-for');
  if (forwardedFor) {
    // x-forwarded-for can contain multiple IPs; the first is the client
    const [clientIp] = forwardedFor.split(',');
    return clientIp.trim();
  }

  const realIp = c.req.header('x-real-ip');
  if (realIp) {
    return realIp;
  }

  return 'unknown-client';
}

/**
 * Creates a rate limiting middleware.
 *
 * @example
 * ```typescript
 * app.use('/api/*', rateLimiter({ windowMs: 60_000, maxRequests: 100 }));
 * app.use('/api/evaluate', rateLimiter({ windowMs: 60_000, maxRequests: 10 }));
 * ```
 */
export function rateLimiter(config: RateLimitConfig): MiddlewareHandler {
  const {
    windowMs,
    maxRequests,
    keyGenerator = defaultKeyGenerator,
    message = 'Too many requests. Please try again later.',
    skip,
  } = config;

  const store = new Map<string, RateLimitEntry>();

  const cleanupInterval = setInterval(() => {
    const now = Date.now();
    for (const [key, entry] of Array.from(store.entries())) {
      if (now - entry.windowStart >= windowMs) {
        store.delete(key);
      }
    }
  }, 5 * 60 * 1000);

  // Must not keep the process alive
  cleanupInterval.unref?.();

  return async (c: Context, next) => {
    if (skip?.(c)) {
      return next();
    }

    const now = Date.now();
    const clientKey = keyGenerator(c);

    let entry = store.get(clientKey);
    if (!entry || now - entry.windowStart >= windowMs) {
      entry = { count: 0, windowStart: now };
      store.set(clientKey, entry);
    }

    const remaining = Math.max(0, maxRequests - entry.count - 1);
    const resetTime = Math.ceil((entry.windowStart + windowMs) / 1000);

    c.header('X-RateLimit-Limit', String(maxRequests));
    c.header('X-RateLimit-Remaining', String(remaining));
    c.header('X-RateLimit-Reset', String(resetTime));

    if (entry.count >= maxRequests) {
      const retryAfter = Math.ceil((entry.windowStart + windowMs - now) / 1000);
      c.header('Retry-After', String(retryAfter));

      return c.json(
        {
          success: false,
          error: {
            code: ErrorCodes.RATE_LIMITED,
            message,
            details: { retryAfter },
          },
        },
        429
      );
    }

    entry.count++;
    await next();
  };
}
