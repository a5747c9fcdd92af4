/**
 * Sessions API Routes
 *
 * Server-held tutoring sessions. The server keeps the turns, mode and
 * writing settings; the client sends one message at a time.
 *
 * Endpoints:
 * - POST   /sessions               - Create a session (optional { mode, settings })
 * - GET    /sessions/:id           - Session snapshot with all turns
 * - DELETE /sessions/:id           - Discard a session
 * - PUT    /sessions/:id/mode      - Switch between 'evaluate' and 'chat'
 * - PATCH  /sessions/:id/settings  - Change grade, subject or writing type
 * - POST   /sessions/:id/messages  - Submit writing or a question
 * - POST   /sessions/:id/reset     - Clear the conversation, back to evaluate mode
 *
 * A session answers one message at a time. Anything sent to it while a
 * message is being answered gets 409 CONFLICT. Creating a session when the
 * store is full of busy sessions gets 503 SERVICE_UNAVAILABLE.
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import {
  EmptyMessageError,
  SessionBusyError,
  SessionLimitError,
  type WritingSession,
} from '../../core/session';
import type { ApiDependencies } from '../dependencies';
import {
  AppError,
  ErrorCodes,
  conflictError,
  notFoundError,
  validationError,
} from '../middleware/error-handler';
import { validate } from '../middleware/validate';
import {
  createSessionSchema,
  setModeSchema,
  settingsUpdateSchema,
  submitMessageSchema,
} from '../types';
import { success } from '../utils/response';
import { toSessionPayload, toSubmitMessagePayload } from '../utils/serialize';

/**
 * Maps session errors onto API errors; anything else passes through.
 */
function toApiError(error: unknown): unknown {
  if (error instanceof SessionBusyError) {
    return conflictError(error.message, { sessionId: error.sessionId });
  }
  if (error instanceof EmptyMessageError) {
    return validationError(error.message);
  }
  if (error instanceof SessionLimitError) {
    return new AppError(ErrorCodes.SERVICE_UNAVAILABLE, error.message, 503, {
      maxSessions: error.maxSessions,
    });
  }
  return error;
}

export function sessionsRoutes(deps: Pick<ApiDependencies, 'sessionStore' | 'sessionEngine'>): Hono {
  const router = new Hono();
  const { sessionStore, sessionEngine } = deps;

  function requireSession(c: Context): WritingSession {
    const id = c.req.param('id');
    const session = id ? sessionStore.get(id) : undefined;
    if (!session) {
      throw notFoundError('Session', id ?? '');
    }
    return session;
  }

  router.post('/', validate(createSessionSchema, { allowEmptyBody: true }), (c) => {
    const { mode, settings } = c.get('validatedBody');

    let session: WritingSession;
    try {
      session = sessionStore.create({ mode, settings });
    } catch (error) {
      throw toApiError(error);
    }

    console.log(`[Sessions] Created ${session.id} (${session.mode})`);
    return success(c, toSessionPayload(session.toSnapshot()), 201);
  });

  router.get('/:id', (c) => {
    const session = requireSession(c);
    return success(c, toSessionPayload(session.toSnapshot()));
  });

  router.delete('/:id', (c) => {
    const session = requireSession(c);
    if (session.isProcessing) {
      throw toApiError(new SessionBusyError(session.id));
    }
    sessionStore.delete(session.id);
    return success(c, { id: session.id, deleted: true });
  });

  router.put('/:id/mode', validate(setModeSchema), (c) => {
    const session = requireSession(c);
    const { mode } = c.get('validatedBody');

    try {
      sessionEngine.setMode(session, mode);
    } catch (error) {
      throw toApiError(error);
    }
    return success(c, toSessionPayload(session.toSnapshot()));
  });

  router.patch('/:id/settings', validate(settingsUpdateSchema), (c) => {
    const session = requireSession(c);

    try {
      sessionEngine.updateSettings(session, c.get('validatedBody'));
    } catch (error) {
      throw toApiError(error);
    }
    return success(c, toSessionPayload(session.toSnapshot()));
  });

  /**
   * POST /:id/messages
   *
   * Body: { text }
   * In evaluate mode the response includes the evaluation and its score band.
   */
  router.post('/:id/messages', validate(submitMessageSchema), async (c) => {
    const session = requireSession(c);
    const { text } = c.get('validatedBody');

    try {
      const result = await sessionEngine.submit(session, text);
      return success(c, toSubmitMessagePayload(result));
    } catch (error) {
      throw toApiError(error);
    }
  });

  router.post('/:id/reset', (c) => {
    const session = requireSession(c);

    try {
      sessionEngine.reset(session);
    } catch (error) {
      throw toApiError(error);
    }
    return success(c, toSessionPayload(session.toSnapshot()));
  });

  return router;
}
