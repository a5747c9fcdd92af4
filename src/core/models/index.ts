/**
 * Core Domain Models - Barrel Export
 *
 * @example
 * ```typescript
 * import { createStudentTurn, type Turn, type WritingContext } from '@/core/models';
 * ```
 */

export type { TurnRole, StudentTurn, TutorTurn, Turn } from './turn';
export { createStudentTurn, createTutorTurn, hasScore } from './turn';

export type {
  EvaluationResult,
  FallbackReason,
  WritingEvaluation,
  GenerationRequest,
} from './evaluation';
export { MIN_SCORE, MAX_SCORE, clampScore } from './evaluation';

export type { WritingContext } from './writing-context';
