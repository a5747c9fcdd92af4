/**
 * Evaluation Domain Types
 *
 * Results produced by the writing evaluator and the request shape handed to
 * the model client.
 */

/** Lowest and highest rubric totals */
export const MIN_SCORE = 0;
export const MAX_SCORE = 100;

/**
 * A rubric score with the feedback that accompanies it.
 */
export interface EvaluationResult {
  /** Integer in [0, 100] */
  score: number;
  feedback: string;
}

/**
 * Why an evaluation ended with a canned result instead of a model score.
 *
 * - 'too_short': the submission was rejected before any model call
 * - 'transport': the final attempt could not reach the model
 * - 'format': the final reply was not parseable JSON
 * - 'schema': the final reply lacked score/feedback or had unusable values
 * - 'exhausted': the attempt budget ran out without a terminal outcome
 */
export type FallbackReason = 'too_short' | 'transport' | 'format' | 'schema' | 'exhausted';

/**
 * Full outcome of one evaluate() call.
 */
export type WritingEvaluation = EvaluationResult &
  (
    | { status: 'scored'; attempts: number }
    | { status: 'fallback'; fallbackReason: FallbackReason; attempts: number }
  );

/**
 * Input to the external model client.
 */
export interface GenerationRequest {
  prompt: string;
  temperature: number;
  maxTokens: number;
  /** Per-attempt time limit in milliseconds */
  timeoutMs?: number;
}

/**
 * Pulls an out-of-range score to the nearest bound.
 */
export function clampScore(score: number): number {
  return Math.min(MAX_SCORE, Math.max(MIN_SCORE, score));
}
