/**
 * Health Check Route
 *
 * Liveness endpoint for load balancers and uptime checks. It does not call
 * the model.
 *
 * ```bash
 * curl http://localhost:3001/health
 * # { "success": true, "data": { "status": "ok", "activeSessions": 2, ... } }
 * ```
 */

import { Hono } from 'hono';
import { success } from '../utils/response';

export interface HealthCheckData {
  status: 'ok';
  /** ISO 8601 time of the check */
  timestamp: string;
  environment: string;
  version: string;
  uptimeSeconds: number;
  /** Live sessions in the in-memory store */
  activeSessions: number;
}

export const APP_VERSION = '0.1.0';

export function healthRoutes(getActiveSessions: () => number): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const healthData: HealthCheckData = {
      status: 'ok',
      timestamp: new Date().toISOString(),
      environment: process.env.NODE_ENV || 'development',
      version: APP_VERSION,
      uptimeSeconds: Math.round(process.uptime()),
      activeSessions: getActiveSessions(),
    };

    return success(c, healthData);
  });

  return router;
}
