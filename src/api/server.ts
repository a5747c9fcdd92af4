/**
 * Writing Tutor API Server
 *
 * Node entry point: loads .env, validates configuration, wires the real
 * model client into the evaluator, tutor and session engine, and serves the
 * Hono app with @hono/node-server.
 *
 * Run with:
 * ```bash
 * npm run server
 * ```
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { config, validateConfig } from '../config';
import { WritingEvaluator } from '../core/evaluation';
import { WritingTutor } from '../core/conversation';
import { InMemorySessionStore, TutorSessionEngine, type SessionEvent } from '../core/session';
import { AnthropicClient } from '../llm';
import { createApp } from './app';
import type { ApiDependencies } from './dependencies';

/** How often expired sessions are swept */
const SESSION_SWEEP_INTERVAL_MS = 60 * 1000;

function describeEvent(event: SessionEvent): string {
  switch (event.type) {
    case 'student_message':
      return `student message (${event.turn.content.length} chars)`;
    case 'tutor_message':
      return event.turn.score !== undefined
        ? `tutor feedback (score ${event.turn.score})`
        : 'tutor reply';
    case 'mode_changed':
      return `mode -> ${event.mode}`;
    case 'settings_changed':
      return `settings -> ${event.settings.grade} / ${event.settings.subject} / ${event.settings.writingType}`;
    case 'session_reset':
      return 'reset';
  }
}

function createDependencies(): ApiDependencies {
  const client = new AnthropicClient({ model: config.anthropic.model });
  const requestTimeoutMs = config.anthropic.requestTimeoutMs;

  const evaluator = new WritingEvaluator(client, { requestTimeoutMs });
  const tutor = new WritingTutor(client, { requestTimeoutMs });
  const sessionStore = new InMemorySessionStore({
    ttlMs: config.sessions.ttlMs,
    maxSessions: config.sessions.maxSessions,
  });
  const sessionEngine = new TutorSessionEngine({ evaluator, tutor });

  sessionEngine.setEventListener((event) => {
    console.log(`[Session ${event.sessionId}] ${describeEvent(event)}`);
  });

  return { evaluator, tutor, sessionStore, sessionEngine };
}

function startServer(): void {
  try {
    validateConfig();

    const deps = createDependencies();
    const app = createApp(deps);

    const sweep = setInterval(() => {
      const removed = deps.sessionStore.pruneExpired();
      if (removed > 0) {
        console.log(`[Server] Removed ${removed} expired session(s)`);
      }
    }, SESSION_SWEEP_INTERVAL_MS);
    sweep.unref();

    const server = serve({ fetch: app.fetch, port: config.server.port, hostname: config.server.host }, (info) => {
      console.log('');
      console.log(`[Server] Writing Tutor API listening on http://localhost:${info.port}`);
      console.log(`[Server] Environment: ${config.server.nodeEnv}`);
      console.log(`[Server] Model: ${config.anthropic.model}`);
      console.log(
        `[Server] Rate limits: ${config.rateLimit.maxRequests} requests, ` +
          `${config.rateLimit.llmMaxRequests} evaluations/chats per ${config.rateLimit.windowMs / 1000}s`
      );
      console.log('');
    });

    const shutdown = (signal: string) => {
      console.log(`\n[Server] Received ${signal}, shutting down...`);
      clearInterval(sweep);
      server.close(() => process.exit(0));
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
  } catch (error) {
    console.error('[Server] Failed to start:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

startServer();
