/**
 * Writing Options Route
 *
 * GET /options - grade bands, subjects and writing types for the settings
 * pickers, plus the defaults a new session starts with.
 */

import { Hono } from 'hono';
import { getWritingOptions } from '../../core/settings';
import { success } from '../utils/response';

export function optionsRoutes(): Hono {
  const router = new Hono();

  router.get('/', (c) => success(c, getWritingOptions()));

  return router;
}
