/**
 * Writing Evaluator
 *
 * Scores a student's writing with the rubric prompt and turns whatever the
 * model returns into a score and feedback. The model is not guaranteed to
 * honor the requested format, so every deviation (fenced text, missing keys,
 * non-numeric score, out-of-range score, a failed call) is either corrected
 * or retried. When retries run out the student still gets a fixed score and
 * a canned message; evaluate() never throws.
 *
 * Usage:
 * ```typescript
 * const evaluator = new WritingEvaluator(new AnthropicClient());
 * const result = await evaluator.evaluate(text, {
 *   grade: 'Grades 3-4',
 *   subject: 'Science',
 *   writingType: 'Diary',
 * });
 * console.log(result.score, result.feedback);
 * ```
 */

import type { LLMCompletionClient } from '../../llm/types';
import {
  buildWritingEvaluatorPrompt,
  parseWritingEvaluationResponse,
  type ParsedWritingEvaluation,
} from '../../llm/prompts';
import type {
  EvaluationResult,
  FallbackReason,
  GenerationRequest,
  WritingContext,
  WritingEvaluation,
} from '../models';
import {
  DEFAULT_RETRY_POLICY,
  defaultSleep,
  runWithRetry,
  type AttemptOutcome,
  type RetryPolicy,
  type Sleep,
} from './retry-policy';

/** Submissions shorter than this (after trimming) are not sent to the model */
export const MIN_SUBMISSION_LENGTH = 10;

/**
 * Low temperature keeps scores consistent between similar submissions.
 */
const EVALUATION_TEMPERATURE = 0.3;

/**
 * Room for the JSON object with a few sentences of feedback.
 */
const EVALUATION_MAX_TOKENS = 800;

/**
 * Canned results, one per fallback reason.
 */
export const FALLBACK_RESULTS: Readonly<Record<FallbackReason, EvaluationResult>> = Object.freeze({
  too_short: {
    score: 0,
    feedback: `Your writing is too short. Please write at least ${MIN_SUBMISSION_LENGTH} characters and ask for an evaluation again.`,
  },
  transport: {
    score: 30,
    feedback: "Sorry, I couldn't finish the evaluation. Please try again in a moment.",
  },
  format: {
    score: 50,
    feedback: 'There was a problem processing the evaluation. Please try again.',
  },
  schema: {
    score: 50,
    feedback: 'There was a problem processing the evaluation. Please try again.',
  },
  exhausted: {
    score: 30,
    feedback:
      "I tried several times but couldn't finish the evaluation. Please check your network connection and try again.",
  },
});

export interface WritingEvaluatorOptions {
  /** Attempt budget and backoff; defaults to 3 attempts, 2s/1s waits */
  retryPolicy?: RetryPolicy;
  /** Time limit for each model call, in milliseconds */
  requestTimeoutMs?: number;
  /** Replaced in tests to avoid real waits */
  sleep?: Sleep;
}

export class WritingEvaluator {
  private readonly llmClient: LLMCompletionClient;
  private readonly retryPolicy: RetryPolicy;
  private readonly requestTimeoutMs: number | undefined;
  private readonly sleep: Sleep;

  constructor(llmClient: LLMCompletionClient, options: WritingEvaluatorOptions = {}) {
    this.llmClient = llmClient;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Scores one writing sample.
   *
   * Too-short input returns immediately with score 0 and no model call.
   * Otherwise the model is asked up to `maxAttempts` times; the first reply
   * that parses and validates wins, with its score clamped into [0, 100].
   *
   * @returns the score and feedback, plus whether they came from the model
   *   or from a fallback, and how many model calls were made
   */
  async evaluate(studentText: string, context: WritingContext): Promise<WritingEvaluation> {
    // Characters, not UTF-16 units: five emoji are five characters
    if (Array.from(studentText.trim()).length < MIN_SUBMISSION_LENGTH) {
      return this.fallback('too_short', 0);
    }

    const request: GenerationRequest = {
      prompt: buildWritingEvaluatorPrompt({ ...context, studentText }),
      temperature: EVALUATION_TEMPERATURE,
      maxTokens: EVALUATION_MAX_TOKENS,
      timeoutMs: this.requestTimeoutMs,
    };

    const result = await runWithRetry(
      (attemptNumber) => this.attempt(request, attemptNumber),
      this.retryPolicy,
      this.sleep
    );

    if (result.status === 'success') {
      return {
        score: result.value.score,
        feedback: result.value.feedback,
        status: 'scored',
        attempts: result.attempts,
      };
    }

    return this.fallback(result.reason, result.attempts);
  }

  /**
   * One model call plus parsing. Errors become failure outcomes.
   */
  private async attempt(
    request: GenerationRequest,
    attemptNumber: number
  ): Promise<AttemptOutcome<ParsedWritingEvaluation>> {
    const maxAttempts = this.retryPolicy.maxAttempts;

    let text: string;
    try {
      const response = await this.llmClient.complete(request.prompt, {
        temperature: request.temperature,
        maxTokens: request.maxTokens,
        timeoutMs: request.timeoutMs,
      });
      text = response.text;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(
        `[WritingEvaluator] Attempt ${attemptNumber}/${maxAttempts} failed (transport): ${message}`
      );
      return { kind: 'failure', reason: 'transport', message };
    }

    const parsed = parseWritingEvaluationResponse(text);
    if (!parsed.ok) {
      console.warn(
        `[WritingEvaluator] Attempt ${attemptNumber}/${maxAttempts} failed (${parsed.kind}): ${parsed.message}`
      );
      return { kind: 'failure', reason: parsed.kind, message: parsed.message };
    }

    return { kind: 'success', value: parsed.value };
  }

  private fallback(reason: FallbackReason, attempts: number): WritingEvaluation {
    const { score, feedback } = FALLBACK_RESULTS[reason];
    return { score, feedback, status: 'fallback', fallbackReason: reason, attempts };
  }
}
