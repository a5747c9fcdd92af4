/**
 * Retry Policy
 *
 * A bounded retry loop expressed as a small state machine, generic over the
 * value an attempt produces. Each attempt reports either success or a failure
 * kind; the policy decides from the kind and the remaining budget whether to
 * wait and try again or to stop with a fallback reason.
 *
 * ```
 *            ┌───────── failure(kind), attempts remain: wait backoff[kind] ─┐
 *            ▼                                                              │
 *   ┌──► Attempting ──── success(value) ──► Succeeded(value)                │
 *   │        │                                                              │
 *   │        └──── failure(kind), last attempt ──► Failed(kind)             │
 *   └───────────────────────────────────────────────────────────────────────┘
 *
 *   budget of zero attempts ──► Failed('exhausted')
 * ```
 */

import { setTimeout as delay } from 'node:timers/promises';

/**
 * Ways a single attempt can fail.
 *
 * - 'transport': the model call threw (network, timeout, quota, auth...)
 * - 'format': the reply was not parseable
 * - 'schema': the reply parsed but did not satisfy the contract
 */
export type AttemptFailureKind = 'transport' | 'format' | 'schema';

/** Terminal failure reasons: an attempt failure kind, or an empty budget */
export type RetryFailureReason = AttemptFailureKind | 'exhausted';

export type AttemptOutcome<T> =
  | { kind: 'success'; value: T }
  | { kind: 'failure'; reason: AttemptFailureKind; message: string };

export interface RetryPolicy {
  /** Total attempts, including the first */
  maxAttempts: number;
  /** Wait before the next attempt, per failure kind, in milliseconds */
  backoffMs: Readonly<Record<AttemptFailureKind, number>>;
}

export interface RetryState {
  /** 1-based number of the attempt about to run or just run */
  attempt: number;
  attemptsRemaining: number;
  lastFailure: AttemptFailureKind | null;
}

export type RetryStep<T> =
  | { type: 'succeeded'; value: T; state: RetryState }
  | { type: 'retry'; delayMs: number; state: RetryState }
  | { type: 'failed'; reason: RetryFailureReason; state: RetryState };

export type RetryResult<T> =
  | { status: 'success'; value: T; attempts: number }
  | { status: 'failure'; reason: RetryFailureReason; attempts: number };

/**
 * Resolves after the given number of milliseconds. Injectable so tests can
 * record waits instead of sleeping.
 */
export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

/**
 * Three attempts; two seconds after a transport failure, one second after a
 * malformed reply.
 */
export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxAttempts: 3,
  backoffMs: Object.freeze({ transport: 2000, format: 1000, schema: 1000 }),
});

export function initialRetryState(policy: RetryPolicy): RetryState {
  return {
    attempt: 1,
    attemptsRemaining: Math.max(0, policy.maxAttempts),
    lastFailure: null,
  };
}

/**
 * Pure transition: given the state before an attempt and that attempt's
 * outcome, returns what happens next.
 */
export function nextRetryStep<T>(
  state: RetryState,
  outcome: AttemptOutcome<T>,
  policy: RetryPolicy
): RetryStep<T> {
  const remaining = state.attemptsRemaining - 1;

  if (outcome.kind === 'success') {
    return {
      type: 'succeeded',
      value: outcome.value,
      state: { ...state, attemptsRemaining: remaining },
    };
  }

  if (remaining <= 0) {
    return {
      type: 'failed',
      reason: outcome.reason,
      state: { ...state, attemptsRemaining: 0, lastFailure: outcome.reason },
    };
  }

  return {
    type: 'retry',
    delayMs: policy.backoffMs[outcome.reason],
    state: {
      attempt: state.attempt + 1,
      attemptsRemaining: remaining,
      lastFailure: outcome.reason,
    },
  };
}

/**
 * Runs `attempt` under `policy` until it succeeds or the budget is spent.
 * Attempts run strictly one after another; there is no cancellation once
 * started.
 *
 * @param attempt - Performs one try; receives the 1-based attempt number.
 *   Must report failures as outcomes rather than throwing.
 *
 * @example
 * ```typescript
 * const result = await runWithRetry(async (n) => {
 *   try {
 *     return { kind: 'success', value: await fetchThing() };
 *   } catch (error) {
 *     return { kind: 'failure', reason: 'transport', message: String(error) };
 *   }
 * });
 * ```
 */
export async function runWithRetry<T>(
  attempt: (attemptNumber: number) => Promise<AttemptOutcome<T>>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  sleep: Sleep = defaultSleep
): Promise<RetryResult<T>> {
  let state = initialRetryState(policy);

  while (state.attemptsRemaining > 0) {
    const outcome = await attempt(state.attempt);
    const step = nextRetryStep(state, outcome, policy);

    switch (step.type) {
      case 'succeeded':
        return { status: 'success', value: step.value, attempts: state.attempt };
      case 'failed':
        return { status: 'failure', reason: step.reason, attempts: state.attempt };
      case 'retry':
        await sleep(step.delayMs);
        state = step.state;
        break;
    }
  }

  return { status: 'failure', reason: 'exhausted', attempts: 0 };
}
