/**
 * Session Types
 *
 * Types shared by the writing session, the session engine and the store.
 */

import type { Turn, StudentTurn, TutorTurn, WritingContext, WritingEvaluation } from '../models';
import type { WritingEvaluator } from '../evaluation/writing-evaluator';
import type { WritingTutor } from '../conversation/writing-tutor';

/**
 * What a submission is used for.
 *
 * - 'evaluate': the text is a writing sample to score against the rubric
 * - 'chat': the text is a question or remark for the tutor
 */
export type TutorMode = 'evaluate' | 'chat';

export const TUTOR_MODES: readonly TutorMode[] = ['evaluate', 'chat'];

export function isTutorMode(value: string): value is TutorMode {
  return value === 'evaluate' || value === 'chat';
}

/**
 * Plain, serializable view of a session.
 */
export interface SessionSnapshot {
  id: string;
  mode: TutorMode;
  settings: WritingContext;
  turns: Turn[];
  isProcessing: boolean;
  createdAt: Date;
  lastActivityAt: Date;
}

/**
 * Result of submitting one message to a session.
 */
export interface SubmitResult {
  mode: TutorMode;
  studentTurn: StudentTurn;
  tutorTurn: TutorTurn;
  /** Present in evaluate mode */
  evaluation?: WritingEvaluation;
}

/**
 * Services the engine delegates to. Only the operation it calls is required,
 * so tests can pass plain objects.
 */
export interface SessionEngineDependencies {
  evaluator: Pick<WritingEvaluator, 'evaluate'>;
  tutor: Pick<WritingTutor, 'converse'>;
}

export type SessionEvent =
  | { type: 'student_message'; sessionId: string; turn: StudentTurn; timestamp: Date }
  | { type: 'tutor_message'; sessionId: string; turn: TutorTurn; timestamp: Date }
  | { type: 'mode_changed'; sessionId: string; mode: TutorMode; timestamp: Date }
  | { type: 'settings_changed'; sessionId: string; settings: WritingContext; timestamp: Date }
  | { type: 'session_reset'; sessionId: string; timestamp: Date };

export type SessionEventListener = (event: SessionEvent) => void;

// ============================================================================
// Errors
// ============================================================================

/**
 * Raised when a session is asked to do something while a submission is
 * still being answered.
 */
export class SessionBusyError extends Error {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super(`Session '${sessionId}' is still answering the previous message`);
    this.name = 'SessionBusyError';
    this.sessionId = sessionId;
  }
}

/**
 * Raised when a submission is empty or whitespace only.
 */
export class EmptyMessageError extends Error {
  constructor() {
    super('Message must not be empty');
    this.name = 'EmptyMessageError';
  }
}

/**
 * Raised when the store is full and every live session is answering a
 * message, so none can be evicted.
 */
export class SessionLimitError extends Error {
  readonly maxSessions: number;

  constructor(maxSessions: number) {
    super(`All ${maxSessions} sessions are busy; try again shortly`);
    this.name = 'SessionLimitError';
    this.maxSessions = maxSessions;
  }
}
