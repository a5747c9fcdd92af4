/**
 * Services the HTTP layer needs. Built from real clients by the server entry
 * point, or from fakes in tests.
 */

import type { WritingEvaluator } from '../core/evaluation';
import type { WritingTutor } from '../core/conversation';
import type { InMemorySessionStore, TutorSessionEngine } from '../core/session';

export interface ApiDependencies {
  evaluator: Pick<WritingEvaluator, 'evaluate'>;
  tutor: Pick<WritingTutor, 'converse'>;
  sessionStore: InMemorySessionStore;
  sessionEngine: TutorSessionEngine;
}
