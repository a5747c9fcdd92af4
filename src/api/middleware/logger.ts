/**
 * Request Logger Middleware
 *
 * One line per request:
 *
 * ```
 * [API] POST    /api/evaluate 200 - 2.41s
 * [API] POST    /api/sessions/ws_9f1c2a7e…/messages 409 - 3ms
 * ```
 *
 * Evaluations take seconds (model latency plus retry waits), so durations
 * of a second or more are printed in seconds. Session ids are shortened so
 * lines stay aligned.
 */

import type { MiddlewareHandler } from 'hono';

export interface LoggerConfig {
  prefix: string;
  /** Prepend an ISO timestamp */
  includeTimestamp: boolean;
  /** Path prefixes that are not logged, e.g. health checks */
  skipPaths: string[];
  /** ANSI colors for method and status */
  colorize: boolean;
  /** Output sink; defaults to console.log */
  write: (line: string) => void;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  prefix: '[API]',
  includeTimestamp: false,
  skipPaths: ['/health'],
  colorize: process.env.NODE_ENV !== 'production',
  write: (line) => console.log(line),
};

/**
 * One finished request, as the logger sees it.
 */
export interface RequestLogEntry {
  method: string;
  path: string;
  status: number;
  durationMs: number;
}

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

const METHOD_COLORS = new Map<string, string>([
  ['GET', '\x1b[36m'],
  ['POST', '\x1b[32m'],
  ['PUT', '\x1b[33m'],
  ['PATCH', '\x1b[33m'],
  ['DELETE', '\x1b[31m'],
]);

function statusColor(status: number): string {
  if (status >= 500) return '\x1b[31m';
  if (status >= 400) return '\x1b[33m';
  if (status >= 300) return '\x1b[36m';
  return '\x1b[32m';
}

const SESSION_ID_PATTERN = /\bws_([0-9a-f]{8})[0-9a-f-]{28}\b/g;

/**
 * Shortens full session ids (`ws_` plus a UUID) to their first eight hex digits.
 */
export function shortenSessionIds(path: string): string {
  return path.replace(SESSION_ID_PATTERN, 'ws_$1…');
}

export function formatResponseTime(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(2)}s`;
}

/**
 * Renders a log line for one request according to `config`.
 *
 * @example
 * ```typescript
 * formatRequestLine(
 *   { method: 'POST', path: '/api/evaluate', status: 200, durationMs: 2410 },
 *   { ...DEFAULT_LOGGER_CONFIG, colorize: false }
 * );
 * // '[API] POST    /api/evaluate 200 - 2.41s'
 * ```
 */
export function formatRequestLine(
  entry: RequestLogEntry,
  config: Pick<LoggerConfig, 'prefix' | 'colorize' | 'includeTimestamp'>,
  now: Date = new Date()
): string {
  const method = entry.method.padEnd(7);
  const duration = formatResponseTime(entry.durationMs);
  const path = shortenSessionIds(entry.path);

  const line = config.colorize
    ? `${config.prefix} ${METHOD_COLORS.get(entry.method) ?? '\x1b[35m'}${method}${RESET} ${path} ${statusColor(entry.status)}${entry.status}${RESET} - ${DIM}${duration}${RESET}`
    : `${config.prefix} ${method} ${path} ${entry.status} - ${duration}`;

  return config.includeTimestamp ? `[${now.toISOString()}] ${line}` : line;
}

/**
 * @example
 * ```typescript
 * app.use('*', loggerMiddleware({ includeTimestamp: true }));
 * ```
 */
export function loggerMiddleware(config: Partial<LoggerConfig> = {}): MiddlewareHandler {
  const settings: LoggerConfig = { ...DEFAULT_LOGGER_CONFIG, ...config };

  return async (c, next) => {
    const path = c.req.path;
    if (settings.skipPaths.some((skip) => path.startsWith(skip))) {
      return next();
    }

    const start = performance.now();
    await next();

    settings.write(
      formatRequestLine(
        {
          method: c.req.method,
          path,
          status: c.res.status,
          durationMs: Math.round(performance.now() - start),
        },
        settings
      )
    );
  };
}
