/**
 * Evaluation Module - Barrel Export
 *
 * Rubric scoring of writing samples with a bounded retry policy.
 */

export {
  WritingEvaluator,
  FALLBACK_RESULTS,
  MIN_SUBMISSION_LENGTH,
  type WritingEvaluatorOptions,
} from './writing-evaluator';

export {
  runWithRetry,
  nextRetryStep,
  initialRetryState,
  defaultSleep,
  DEFAULT_RETRY_POLICY,
  type AttemptFailureKind,
  type AttemptOutcome,
  type RetryFailureReason,
  type RetryPolicy,
  type RetryResult,
  type RetryState,
  type RetryStep,
  type Sleep,
} from './retry-policy';
