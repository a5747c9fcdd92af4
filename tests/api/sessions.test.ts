/**
 * Sessions API Tests
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { createApp } from '../../src/api/app';
import { WritingEvaluator } from '../../src/core/evaluation';
import { WritingTutor } from '../../src/core/conversation';
import { InMemorySessionStore, TutorSessionEngine } from '../../src/core/session';
import {
  MockLLMClient,
  SAMPLE_WRITING,
  createRecordingSleep,
  evaluationReply,
  getData,
  getError,
  jsonRequest,
} from '../helpers';

const turnSchema = z.object({
  id: z.string(),
  role: z.enum(['student', 'tutor']),
  content: z.string(),
  score: z.number().optional(),
  createdAt: z.string(),
});

const sessionSchema = z.object({
  id: z.string(),
  mode: z.enum(['evaluate', 'chat']),
  settings: z.object({ grade: z.string(), subject: z.string(), writingType: z.string() }),
  turns: z.array(turnSchema),
  isProcessing: z.boolean(),
});

const submitSchema = z.object({
  mode: z.enum(['evaluate', 'chat']),
  studentTurn: turnSchema,
  tutorTurn: turnSchema,
  evaluation: z
    .object({ score: z.number(), band: z.object({ level: z.string() }) })
    .optional(),
});

function setup(replies: ConstructorParameters<typeof MockLLMClient>[0] = []) {
  const client = new MockLLMClient(replies);
  const { sleep } = createRecordingSleep();
  const evaluator = new WritingEvaluator(client, { sleep });
  const tutor = new WritingTutor(client);
  const sessionStore = new InMemorySessionStore({ ttlMs: 60_000, maxSessions: 10 });
  const app = createApp(
    {
      evaluator,
      tutor,
      sessionStore,
      sessionEngine: new TutorSessionEngine({ evaluator, tutor }),
    },
    { rateLimit: false, logger: false }
  );

  async function createSession(body?: unknown) {
    const response = await app.request('/api/sessions', jsonRequest('POST', body));
    return getData(response, sessionSchema);
  }

  return { app, client, sessionStore, createSession };
}

describe('Sessions API', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('POST /api/sessions', () => {
    it('creates a session with defaults from an empty body', async () => {
      const { app, sessionStore } = setup();

      const response = await app.request('/api/sessions', { method: 'POST' });
      const session = await getData(response, sessionSchema);

      expect(response.status).toBe(201);
      expect(session.id).toMatch(/^ws_/);
      expect(session.mode).toBe('evaluate');
      expect(session.settings).toEqual({ grade: 'Grades 3-4', subject: 'Language Arts', writingType: 'Diary' });
      expect(session.turns).toEqual([]);
      expect(sessionStore.size).toBe(1);
    });

    it('accepts a mode and partial settings', async () => {
      const { createSession } = setup();

      const session = await createSession({ mode: 'chat', settings: { subject: 'Math' } });

      expect(session.mode).toBe('chat');
      expect(session.settings.subject).toBe('Math');
      expect(session.settings.grade).toBe('Grades 3-4');
    });

    it('rejects an unknown mode', async () => {
      const { app } = setup();

      const response = await app.request('/api/sessions', jsonRequest('POST', { mode: 'draw' }));
      const error = await getError(response);

      expect(response.status).toBe(400);
      expect(error.code).toBe('VALIDATION_ERROR');
    });

    it('returns 503 when every session slot is busy', async () => {
      const { app, sessionStore, createSession } = setup();
      for (let i = 0; i < 10; i++) {
        const { id } = await createSession();
        sessionStore.get(id)?.setProcessing(true);
      }

      const response = await app.request('/api/sessions', { method: 'POST' });
      const error = await getError(response);

      expect(response.status).toBe(503);
      expect(error.code).toBe('SERVICE_UNAVAILABLE');
      expect(error.message).toBe('All 10 sessions are busy; try again shortly');
      expect(error.details).toEqual({ maxSessions: 10 });
      expect(sessionStore.size).toBe(10);
    });
  });

  describe('GET and DELETE /api/sessions/:id', () => {
    it('returns the session', async () => {
      const { app, createSession } = setup();
      const created = await createSession();

      const session = await getData(await app.request(`/api/sessions/${created.id}`), sessionSchema);

      expect(session.id).toBe(created.id);
    });

    it('returns 404 for an unknown session', async () => {
      const { app } = setup();

      const response = await app.request('/api/sessions/ws_missing');

      expect(response.status).toBe(404);
      expect(await getError(response)).toEqual({
        code: 'NOT_FOUND',
        message: "Session with ID 'ws_missing' not found",
        details: { resource: 'Session', id: 'ws_missing' },
      });
    });

    it('deletes the session', async () => {
      const { app, createSession } = setup();
      const created = await createSession();

      const response = await app.request(`/api/sessions/${created.id}`, { method: 'DELETE' });
      const data = await getData(response, z.object({ id: z.string(), deleted: z.boolean() }));

      expect(data).toEqual({ id: created.id, deleted: true });
      expect((await app.request(`/api/sessions/${created.id}`)).status).toBe(404);
    });
  });

  describe('POST /api/sessions/:id/messages', () => {
    it('evaluates writing in evaluate mode', async () => {
      const { app, createSession } = setup([evaluationReply(72, 'Try adding a clear ending.')]);
      const session = await createSession();

      const response = await app.request(
        `/api/sessions/${session.id}/messages`,
        jsonRequest('POST', { text: SAMPLE_WRITING })
      );
      const data = await getData(response, submitSchema);

      expect(data.mode).toBe('evaluate');
      expect(data.studentTurn).toMatchObject({ role: 'student', content: SAMPLE_WRITING });
      expect(data.studentTurn.score).toBeUndefined();
      expect(data.tutorTurn).toMatchObject({ role: 'tutor', content: 'Try adding a clear ending.', score: 72 });
      expect(data.evaluation).toEqual({ score: 72, band: { level: 'good' } });
    });

    it('chats in chat mode with the earlier turns as context', async () => {
      const { app, client, createSession } = setup([
        evaluationReply(72, 'Try adding a clear ending.'),
        'End with how you felt!',
      ]);
      const { id } = await createSession();

      await app.request(`/api/sessions/${id}/messages`, jsonRequest('POST', { text: SAMPLE_WRITING }));
      await app.request(`/api/sessions/${id}/mode`, jsonRequest('PUT', { mode: 'chat' }));
      const response = await app.request(
        `/api/sessions/${id}/messages`,
        jsonRequest('POST', { text: 'How do I end it?' })
      );
      const data = await getData(response, submitSchema);

      expect(data.mode).toBe('chat');
      expect(data.tutorTurn.content).toBe('End with how you felt!');
      expect(data.tutorTurn.score).toBeUndefined();
      expect(data.evaluation).toBeUndefined();
      expect(client.calls[1]?.prompt).toContain('Teacher: (Score: 72) Try adding a clear ending.');

      const session = await getData(await app.request(`/api/sessions/${id}`), sessionSchema);
      expect(session.turns.map((t) => t.role)).toEqual(['student', 'tutor', 'student', 'tutor']);
    });

    it('stores the message exactly as sent', async () => {
      const { app, createSession } = setup([evaluationReply(66, 'Lovely poem shape.')]);
      const { id } = await createSession();
      const poem = '  Beans in a cup,\n    reaching up.\n';

      const data = await getData(
        await app.request(`/api/sessions/${id}/messages`, jsonRequest('POST', { text: poem })),
        submitSchema
      );

      expect(data.studentTurn.content).toBe(poem);
    });

    it('rejects a blank message', async () => {
      const { app, createSession } = setup();
      const { id } = await createSession();

      const response = await app.request(`/api/sessions/${id}/messages`, jsonRequest('POST', { text: ' \n ' }));
      const error = await getError(response);

      expect(response.status).toBe(400);
      expect(error.code).toBe('VALIDATION_ERROR');
      expect(error.details).toEqual([{ path: 'text', message: 'Message must not be empty' }]);
    });

    it('returns 409 while the session is answering another message', async () => {
      const { app, sessionStore, createSession } = setup();
      const { id } = await createSession();
      sessionStore.get(id)?.setProcessing(true);

      const response = await app.request(
        `/api/sessions/${id}/messages`,
        jsonRequest('POST', { text: SAMPLE_WRITING })
      );
      const error = await getError(response);

      expect(response.status).toBe(409);
      expect(error.code).toBe('CONFLICT');
      expect(error.details).toEqual({ sessionId: id });
      expect((await app.request(`/api/sessions/${id}`, { method: 'DELETE' })).status).toBe(409);
      expect(
        (await app.request(`/api/sessions/${id}/mode`, jsonRequest('PUT', { mode: 'chat' }))).status
      ).toBe(409);
    });
  });

  describe('mode, settings and reset', () => {
    it('switches mode', async () => {
      const { app, createSession } = setup();
      const { id } = await createSession();

      const session = await getData(
        await app.request(`/api/sessions/${id}/mode`, jsonRequest('PUT', { mode: 'chat' })),
        sessionSchema
      );

      expect(session.mode).toBe('chat');
    });

    it('updates some settings and keeps the rest', async () => {
      const { app, createSession } = setup();
      const { id } = await createSession();

      const session = await getData(
        await app.request(
          `/api/sessions/${id}/settings`,
          jsonRequest('PATCH', { grade: 'Grades 5-6', writingType: 'Haiku' })
        ),
        sessionSchema
      );

      expect(session.settings).toEqual({ grade: 'Grades 5-6', subject: 'Language Arts', writingType: 'Haiku' });
    });

    it('rejects an empty settings update', async () => {
      const { app, createSession } = setup();
      const { id } = await createSession();

      const response = await app.request(`/api/sessions/${id}/settings`, jsonRequest('PATCH', {}));
      const error = await getError(response);

      expect(response.status).toBe(400);
      expect(error.details).toEqual([{ path: '', message: 'At least one setting must be provided' }]);
    });

    it('clears the conversation and returns to evaluate mode', async () => {
      const { app, createSession } = setup([evaluationReply(90, 'Done!')]);
      const { id } = await createSession({ settings: { subject: 'Science' } });
      await app.request(`/api/sessions/${id}/messages`, jsonRequest('POST', { text: SAMPLE_WRITING }));
      await app.request(`/api/sessions/${id}/mode`, jsonRequest('PUT', { mode: 'chat' }));

      const session = await getData(
        await app.request(`/api/sessions/${id}/reset`, { method: 'POST' }),
        sessionSchema
      );

      expect(session.turns).toEqual([]);
      expect(session.mode).toBe('evaluate');
      expect(session.settings.subject).toBe('Science');
    });
  });
});
