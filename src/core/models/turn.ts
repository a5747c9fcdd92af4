/**
 * Turn Domain Types
 *
 * A Turn is one message in a tutoring session: either something the student
 * wrote or the tutor's reply. Tutor replies produced in evaluate mode carry the
 * rubric score; student turns never do, which the union below makes
 * unrepresentable rather than merely unlikely.
 *
 * Turns are frozen when created and live only as long as their session.
 */

import { randomUUID } from 'node:crypto';
import { clampScore } from './evaluation';

/**
 * Who produced a turn.
 *
 * - 'student': text the learner submitted (a writing sample or a question)
 * - 'tutor': the AI teacher's feedback or conversational reply
 */
export type TurnRole = 'student' | 'tutor';

interface TurnBase {
  /** Unique identifier, prefixed 'turn_' */
  readonly id: string;
  /** Message text as shown to the student */
  readonly content: string;
  /** When the turn was appended to the session */
  readonly createdAt: Date;
}

export interface StudentTurn extends TurnBase {
  readonly role: 'student';
}

export interface TutorTurn extends TurnBase {
  readonly role: 'tutor';
  /** Rubric score (integer 0-100); present only on evaluation feedback */
  readonly score?: number;
}

export type Turn = StudentTurn | TutorTurn;

function createTurnId(): string {
  return `turn_${randomUUID()}`;
}

/**
 * Creates an immutable student turn.
 */
export function createStudentTurn(content: string, createdAt: Date = new Date()): StudentTurn {
  const turn: StudentTurn = { id: createTurnId(), role: 'student', content, createdAt };
  return Object.freeze(turn);
}

/**
 * Creates an immutable tutor turn. A score, when given, is truncated to an
 * integer and clamped into [0, 100].
 */
export function createTutorTurn(
  content: string,
  score?: number,
  createdAt: Date = new Date()
): TutorTurn {
  const turn: TutorTurn =
    score === undefined
      ? { id: createTurnId(), role: 'tutor', content, createdAt }
      : { id: createTurnId(), role: 'tutor', content, score: clampScore(Math.trunc(score)), createdAt };
  return Object.freeze(turn);
}

/**
 * Narrows a turn to one that carries a score.
 */
export function hasScore(turn: Turn): turn is TutorTurn & { score: number } {
  return turn.role === 'tutor' && turn.score !== undefined;
}
