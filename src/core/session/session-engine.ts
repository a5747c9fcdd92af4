/**
 * Tutor Session Engine
 *
 * Drives a WritingSession the way the tutoring UI does: each submission is
 * recorded as a student turn, answered by the evaluator or the tutor
 * depending on the session's mode, and the answer is recorded as a tutor
 * turn. One submission per session is in flight at a time.
 *
 * Usage:
 * ```typescript
 * const engine = new TutorSessionEngine({
 *   evaluator: new WritingEvaluator(client),
 *   tutor: new WritingTutor(client),
 * });
 *
 * const session = new WritingSession({ settings: { grade: 'Grades 5-6' } });
 * const { tutorTurn } = await engine.submit(session, 'My dog Max is the best...');
 * console.log(tutorTurn.score, tutorTurn.content);
 *
 * engine.setMode(session, 'chat');
 * await engine.submit(session, 'How can I make my ending stronger?');
 * ```
 */

import {
  createStudentTurn,
  createTutorTurn,
  type TutorTurn,
  type WritingContext,
  type WritingEvaluation,
} from '../models';
import type { WritingSession } from './writing-session';
import {
  EmptyMessageError,
  SessionBusyError,
  type SessionEngineDependencies,
  type SessionEvent,
  type SessionEventListener,
  type SubmitResult,
  type TutorMode,
} from './types';

export class TutorSessionEngine {
  private readonly evaluator: SessionEngineDependencies['evaluator'];
  private readonly tutor: SessionEngineDependencies['tutor'];

  /** Optional observer for session activity (logging, UI updates) */
  private eventListener?: SessionEventListener;

  constructor(dependencies: SessionEngineDependencies) {
    this.evaluator = dependencies.evaluator;
    this.tutor = dependencies.tutor;
  }

  /**
   * Registers a listener for session events, or clears it with undefined.
   *
   * @example
   * ```typescript
   * engine.setEventListener((event) => {
   *   console.log(`[Session ${event.sessionId}] ${event.type}`);
   * });
   * ```
   */
  setEventListener(listener: SessionEventListener | undefined): void {
    this.eventListener = listener;
  }

  /**
   * Submits a student message and waits for the answer.
   *
   * In evaluate mode the text is scored and the tutor turn carries the score.
   * In chat mode the tutor replies with the turns that came before this
   * message as context. Mode and settings are read once, when the
   * submission starts.
   *
   * @throws EmptyMessageError if the text is blank
   * @throws SessionBusyError if the session is still answering another message
   */
  async submit(session: WritingSession, text: string): Promise<SubmitResult> {
    if (!text.trim()) {
      throw new EmptyMessageError();
    }
    this.assertIdle(session);

    const mode = session.mode;
    const settings = session.settings;
    const previousTurns = session.getTurns();

    session.setProcessing(true);
    try {
      const studentTurn = session.appendTurn(createStudentTurn(text));
      this.emit({ type: 'student_message', sessionId: session.id, turn: studentTurn, timestamp: new Date() });

      let tutorTurn: TutorTurn;
      let evaluation: WritingEvaluation | undefined;

      if (mode === 'evaluate') {
        evaluation = await this.evaluator.evaluate(text, settings);
        tutorTurn = createTutorTurn(evaluation.feedback, evaluation.score);
      } else {
        const reply = await this.tutor.converse(text, settings, previousTurns);
        tutorTurn = createTutorTurn(reply);
      }

      session.appendTurn(tutorTurn);
      this.emit({ type: 'tutor_message', sessionId: session.id, turn: tutorTurn, timestamp: new Date() });

      return evaluation
        ? { mode, studentTurn, tutorTurn, evaluation }
        : { mode, studentTurn, tutorTurn };
    } finally {
      session.setProcessing(false);
    }
  }

  /**
   * @throws SessionBusyError if a submission is in flight
   */
  setMode(session: WritingSession, mode: TutorMode): void {
    this.assertIdle(session);
    session.setMode(mode);
    this.emit({ type: 'mode_changed', sessionId: session.id, mode, timestamp: new Date() });
  }

  /**
   * @throws SessionBusyError if a submission is in flight
   */
  updateSettings(session: WritingSession, settings: Partial<WritingContext>): WritingContext {
    this.assertIdle(session);
    const updated = session.updateSettings(settings);
    this.emit({ type: 'settings_changed', sessionId: session.id, settings: updated, timestamp: new Date() });
    return updated;
  }

  /**
   * Clears the conversation and returns the session to evaluate mode.
   *
   * @throws SessionBusyError if a submission is in flight
   */
  reset(session: WritingSession): void {
    this.assertIdle(session);
    session.reset();
    this.emit({ type: 'session_reset', sessionId: session.id, timestamp: new Date() });
  }

  private assertIdle(session: WritingSession): void {
    if (session.isProcessing) {
      throw new SessionBusyError(session.id);
    }
  }

  private emit(event: SessionEvent): void {
    if (this.eventListener) {
      this.eventListener(event);
    }
  }
}
