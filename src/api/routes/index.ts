/**
 * API Routes Aggregator
 *
 * Combines the route modules into the router mounted at /api.
 *
 * Route Structure:
 * - /health - Health check (mounted at root by createApp, not under /api)
 * - /api - API info
 * - /api/options - Writing settings choices
 * - /api/evaluate - Stateless rubric evaluation
 * - /api/converse - Stateless chat reply
 * - /api/sessions - Server-held tutoring sessions
 */

import { Hono } from 'hono';
import type { ApiDependencies } from '../dependencies';
import { success } from '../utils/response';
import { converseRoutes, evaluateRoutes } from './evaluate';
import { APP_VERSION } from './health';
import { optionsRoutes } from './options';
import { sessionsRoutes } from './sessions';

export { healthRoutes, APP_VERSION, type HealthCheckData } from './health';
export { optionsRoutes } from './options';
export { evaluateRoutes, converseRoutes } from './evaluate';
export { sessionsRoutes } from './sessions';

/**
 * Returned by GET /api.
 */
export interface ApiInfo {
  name: string;
  version: string;
  endpoints: {
    method: string;
    path: string;
    description: string;
  }[];
}

export const API_ENDPOINTS: ApiInfo['endpoints'] = [
  { method: 'GET', path: '/api/options', description: 'Grade, subject and writing type choices' },
  { method: 'POST', path: '/api/evaluate', description: 'Score a writing sample against the rubric' },
  { method: 'POST', path: '/api/converse', description: 'Ask the tutor a question about writing' },
  { method: 'POST', path: '/api/sessions', description: 'Start a tutoring session' },
  { method: 'GET', path: '/api/sessions/:id', description: 'Session with its conversation' },
  { method: 'DELETE', path: '/api/sessions/:id', description: 'Discard a session' },
  { method: 'PUT', path: '/api/sessions/:id/mode', description: 'Switch between evaluate and chat' },
  { method: 'PATCH', path: '/api/sessions/:id/settings', description: 'Change writing settings' },
  { method: 'POST', path: '/api/sessions/:id/messages', description: 'Submit writing or a question' },
  { method: 'POST', path: '/api/sessions/:id/reset', description: 'Clear the conversation' },
  { method: 'GET', path: '/health', description: 'Health check' },
];

export function createApiRouter(deps: ApiDependencies): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const apiInfo: ApiInfo = {
      name: 'Writing Tutor API',
      version: APP_VERSION,
      endpoints: API_ENDPOINTS,
    };
    return success(c, apiInfo);
  });

  router.route('/options', optionsRoutes());
  router.route('/evaluate', evaluateRoutes(deps));
  router.route('/converse', converseRoutes(deps));
  router.route('/sessions', sessionsRoutes(deps));

  return router;
}
