/**
 * Converts domain objects into the JSON payloads the API returns.
 * Dates become ISO strings; a student turn never gains a score key.
 */

import type { Turn, WritingEvaluation } from '../../core/models';
import { describeScore } from '../../core/scoring';
import type { SessionSnapshot, SubmitResult } from '../../core/session';
import type {
  EvaluationPayload,
  SessionPayload,
  SubmitMessagePayload,
  TurnPayload,
} from '../types';

export function toTurnPayload(turn: Turn): TurnPayload {
  const payload: TurnPayload = {
    id: turn.id,
    role: turn.role,
    content: turn.content,
    createdAt: turn.createdAt.toISOString(),
  };
  if (turn.role === 'tutor' && turn.score !== undefined) {
    payload.score = turn.score;
  }
  return payload;
}

export function toSessionPayload(snapshot: SessionSnapshot): SessionPayload {
  return {
    id: snapshot.id,
    mode: snapshot.mode,
    settings: snapshot.settings,
    turns: snapshot.turns.map(toTurnPayload),
    isProcessing: snapshot.isProcessing,
    createdAt: snapshot.createdAt.toISOString(),
    lastActivityAt: snapshot.lastActivityAt.toISOString(),
  };
}

export function toEvaluationPayload(evaluation: WritingEvaluation): EvaluationPayload {
  return { ...evaluation, band: describeScore(evaluation.score) };
}

export function toSubmitMessagePayload(result: SubmitResult): SubmitMessagePayload {
  const payload: SubmitMessagePayload = {
    mode: result.mode,
    studentTurn: toTurnPayload(result.studentTurn),
    tutorTurn: toTurnPayload(result.tutorTurn),
  };
  if (result.evaluation) {
    payload.evaluation = toEvaluationPayload(result.evaluation);
  }
  return payload;
}
