/**
 * Stateless API Tests
 *
 * Health, API info, options, /api/evaluate and /api/converse, driven through
 * app.request() with a scripted model client. No server is started.
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { createApp, type AppOptions } from '../../src/api/app';
import type { ApiDependencies } from '../../src/api/dependencies';
import { WritingEvaluator } from '../../src/core/evaluation';
import { TUTOR_APOLOGY, WritingTutor } from '../../src/core/conversation';
import { InMemorySessionStore, TutorSessionEngine } from '../../src/core/session';
import {
  MockLLMClient,
  SAMPLE_WRITING,
  TEST_CONTEXT,
  createRecordingSleep,
  evaluationReply,
  getData,
  getError,
  jsonRequest,
} from '../helpers';

const bandSchema = z.object({ level: z.string(), label: z.string(), summary: z.string() });

const evaluationSchema = z.object({
  score: z.number(),
  feedback: z.string(),
  status: z.string(),
  fallbackReason: z.string().optional(),
  attempts: z.number(),
  band: bandSchema,
});

function createTestApp(client: MockLLMClient, options: AppOptions = { rateLimit: false, logger: false }) {
  const { sleep } = createRecordingSleep();
  const evaluator = new WritingEvaluator(client, { sleep });
  const tutor = new WritingTutor(client);
  const deps: ApiDependencies = {
    evaluator,
    tutor,
    sessionStore: new InMemorySessionStore({ ttlMs: 60_000, maxSessions: 10 }),
    sessionEngine: new TutorSessionEngine({ evaluator, tutor }),
  };
  return createApp(deps, options);
}

describe('Tutor API', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('GET /health', () => {
    it('reports status and the live session count', async () => {
      const app = createTestApp(new MockLLMClient());

      const response = await app.request('/health');
      const data = await getData(
        response,
        z.object({ status: z.literal('ok'), version: z.string(), activeSessions: z.number() })
      );

      expect(response.status).toBe(200);
      expect(data).toEqual({ status: 'ok', version: '0.1.0', activeSessions: 0 });
    });
  });

  describe('GET /api', () => {
    it('lists the endpoints', async () => {
      const app = createTestApp(new MockLLMClient());

      const data = await getData(
        await app.request('/api'),
        z.object({
          name: z.string(),
          endpoints: z.array(z.object({ method: z.string(), path: z.string() })),
        })
      );

      expect(data.name).toBe('Writing Tutor API');
      expect(data.endpoints).toContainEqual({ method: 'POST', path: '/api/evaluate' });
    });
  });

  describe('GET /api/options', () => {
    it('returns the choices and defaults', async () => {
      const app = createTestApp(new MockLLMClient());

      const data = await getData(
        await app.request('/api/options'),
        z.object({
          grades: z.array(z.string()),
          subjects: z.array(z.string()),
          writingTypes: z.array(z.string()),
          defaults: z.object({ grade: z.string(), subject: z.string(), writingType: z.string() }),
        })
      );

      expect(data.grades).toEqual(['Grades 1-2', 'Grades 3-4', 'Grades 5-6']);
      expect(data.subjects).toContain('Science');
      expect(data.writingTypes).toContain('Book report');
      expect(data.defaults).toEqual({ grade: 'Grades 3-4', subject: 'Language Arts', writingType: 'Diary' });
    });
  });

  describe('POST /api/evaluate', () => {
    it('returns the score, feedback and band', async () => {
      const client = new MockLLMClient([evaluationReply(85, 'Wonderful work!')]);
      const app = createTestApp(client);

      const response = await app.request(
        '/api/evaluate',
        jsonRequest('POST', { ...TEST_CONTEXT, text: SAMPLE_WRITING })
      );
      const data = await getData(response, evaluationSchema);

      expect(response.status).toBe(200);
      expect(data).toEqual({
        score: 85,
        feedback: 'Wonderful work!',
        status: 'scored',
        attempts: 1,
        band: { level: 'excellent', label: 'Excellent!', summary: 'Excellent! Total: 85 / 100' },
      });
      expect(client.calls[0]?.prompt).toContain("writing related to 'Science'");
    });

    it('answers short text with the too-short result instead of an error', async () => {
      const client = new MockLLMClient();
      const app = createTestApp(client);

      const response = await app.request(
        '/api/evaluate',
        jsonRequest('POST', { ...TEST_CONTEXT, text: 'Hi' })
      );
      const data = await getData(response, evaluationSchema);

      expect(response.status).toBe(200);
      expect(data.score).toBe(0);
      expect(data.fallbackReason).toBe('too_short');
      expect(data.band.level).toBe('error');
      expect(client.callCount).toBe(0);
    });

    it('returns the transport fallback when the model is unreachable', async () => {
      const failure = new Error('connect ECONNREFUSED');
      const app = createTestApp(new MockLLMClient([failure, failure, failure]));

      const response = await app.request(
        '/api/evaluate',
        jsonRequest('POST', { ...TEST_CONTEXT, text: SAMPLE_WRITING })
      );
      const data = await getData(response, evaluationSchema);

      expect(response.status).toBe(200);
      expect(data.score).toBe(30);
      expect(data.band).toEqual({
        level: 'needs_work',
        label: 'Keep going!',
        summary: 'Keep going! Total: 30 / 100',
      });
    });

    it('rejects a body without settings', async () => {
      const app = createTestApp(new MockLLMClient());

      const response = await app.request('/api/evaluate', jsonRequest('POST', { text: SAMPLE_WRITING }));
      const error = await getError(response);

      expect(response.status).toBe(400);
      expect(error.code).toBe('VALIDATION_ERROR');
      expect(error.details).toContainEqual({ path: 'grade', message: 'Required' });
    });

    it('rejects a body that is not JSON', async () => {
      const app = createTestApp(new MockLLMClient());

      const response = await app.request('/api/evaluate', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"text": ',
      });

      expect(response.status).toBe(400);
      expect(await getError(response)).toEqual({
        code: 'INVALID_JSON',
        message: 'Request body must be valid JSON',
      });
    });
  });

  describe('POST /api/converse', () => {
    it('replies using the turns the client sends', async () => {
      const client = new MockLLMClient(['Try starting with a sound, like "Crack!"']);
      const app = createTestApp(client);

      const response = await app.request(
        '/api/converse',
        jsonRequest('POST', {
          ...TEST_CONTEXT,
          message: '  How do I start?  ',
          turns: [
            { role: 'student', content: 'I wrote about my beans.' },
            { role: 'tutor', content: 'Add how they looked.', score: 65 },
          ],
        })
      );
      const data = await getData(response, z.object({ reply: z.string() }));

      expect(data).toEqual({ reply: 'Try starting with a sound, like "Crack!"' });
      const prompt = client.calls[0]?.prompt ?? '';
      expect(prompt).toContain('Student: I wrote about my beans.\nTeacher: (Score: 65) Add how they looked.');
      expect(prompt.endsWith("Student's new question: How do I start?\n\nTeacher's reply:")).toBe(true);
    });

    it('returns the apology when the model fails', async () => {
      const app = createTestApp(new MockLLMClient([new Error('socket hang up')]));

      const response = await app.request(
        '/api/converse',
        jsonRequest('POST', { ...TEST_CONTEXT, message: 'Help?' })
      );

      expect(await getData(response, z.object({ reply: z.string() }))).toEqual({ reply: TUTOR_APOLOGY });
    });

    it('rejects a blank message', async () => {
      const app = createTestApp(new MockLLMClient());

      const response = await app.request(
        '/api/converse',
        jsonRequest('POST', { ...TEST_CONTEXT, message: '   ' })
      );
      const error = await getError(response);

      expect(response.status).toBe(400);
      expect(error.details).toEqual([{ path: 'message', message: 'Message must not be empty' }]);
    });
  });

  describe('unknown routes', () => {
    it('returns 404 with the method and path', async () => {
      const app = createTestApp(new MockLLMClient());

      const response = await app.request('/api/grades');

      expect(response.status).toBe(404);
      expect(await getError(response)).toEqual({
        code: 'NOT_FOUND',
        message: 'Route GET /api/grades not found',
      });
    });
  });

  describe('rate limiting', () => {
    it('limits model-backed requests separately from the rest of the API', async () => {
      const client = new MockLLMClient();
      const app = createTestApp(client, {
        rateLimit: { windowMs: 60_000, maxRequests: 100, llmMaxRequests: 2 },
        logger: false,
      });
      const request = () =>
        app.request('/api/evaluate', jsonRequest('POST', { ...TEST_CONTEXT, text: 'Hi' }));

      expect((await request()).status).toBe(200);
      expect((await request()).status).toBe(200);
      const limited = await request();

      expect(limited.status).toBe(429);
      expect(limited.headers.get('X-RateLimit-Limit')).toBe('2');
      expect(limited.headers.get('Retry-After')).not.toBeNull();
      expect((await getError(limited)).code).toBe('RATE_LIMITED');
      expect((await app.request('/api/options')).status).toBe(200);
    });
  });
});
