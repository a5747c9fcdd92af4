/**
 * Stateless Tutor Routes
 *
 * For clients that keep the conversation themselves:
 *
 * - POST /evaluate - score one writing sample against the rubric
 * - POST /converse - answer one chat message, given the earlier turns
 *
 * Neither endpoint fails because of the model: the evaluator falls back to a
 * fixed score and message, the tutor to an apology.
 */

import { Hono } from 'hono';
import { createStudentTurn, createTutorTurn, type Turn } from '../../core/models';
import type { ApiDependencies } from '../dependencies';
import { validate } from '../middleware/validate';
import {
  converseRequestSchema,
  evaluateRequestSchema,
  type ConversePayload,
  type ConverseRequest,
} from '../types';
import { success } from '../utils/response';
import { toEvaluationPayload } from '../utils/serialize';

function toTurns(turns: ConverseRequest['turns']): Turn[] {
  return turns.map((turn) =>
    turn.role === 'student'
      ? createStudentTurn(turn.content)
      : createTutorTurn(turn.content, turn.score)
  );
}

export function evaluateRoutes(deps: Pick<ApiDependencies, 'evaluator'>): Hono {
  const router = new Hono();

  /**
   * POST /
   *
   * Body: { text, grade, subject, writingType }
   * Response: WritingEvaluation plus the score band headline
   */
  router.post('/', validate(evaluateRequestSchema), async (c) => {
    const { text, grade, subject, writingType } = c.get('validatedBody');

    const evaluation = await deps.evaluator.evaluate(text, { grade, subject, writingType });
    return success(c, toEvaluationPayload(evaluation));
  });

  return router;
}

export function converseRoutes(deps: Pick<ApiDependencies, 'tutor'>): Hono {
  const router = new Hono();

  /**
   * POST /
   *
   * Body: { message, grade, subject, writingType, turns? }
   * Response: { reply }
   */
  router.post('/', validate(converseRequestSchema), async (c) => {
    const { message, grade, subject, writingType, turns } = c.get('validatedBody');

    const reply = await deps.tutor.converse(
      message,
      { grade, subject, writingType },
      toTurns(turns)
    );
    const payload: ConversePayload = { reply };
    return success(c, payload);
  });

  return router;
}
