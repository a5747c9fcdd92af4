/**
 * Test Helpers Module
 *
 * In-process stand-ins for the model and the clock, plus small helpers for
 * reading API envelopes. Nothing here touches the network.
 */

import { z } from 'zod';
import type { LLMCompletionClient, LLMConfig, LLMMessage, LLMResponse } from '../src/llm/types';
import type { Sleep } from '../src/core/evaluation';
import type { WritingContext } from '../src/core/models';

// ============================================================================
// Mock LLM Client
// ============================================================================

/**
 * One scripted step: a reply text, an error to throw, or a function that
 * answers from the prompt.
 */
export type ScriptedReply = string | Error | ((prompt: string) => string);

export interface RecordedCall {
  prompt: string;
  config: LLMConfig | undefined;
}

/**
 * Mock model client for deterministic testing.
 *
 * Replies are consumed in order; every call is recorded with its prompt and
 * generation settings. Running out of replies is a test bug and throws.
 *
 * @example
 * ```typescript
 * const client = new MockLLMClient([
 *   new Error('socket hang up'),
 *   '{"score": 85, "feedback": "Lovely!"}',
 * ]);
 * ```
 */
export class MockLLMClient implements LLMCompletionClient {
  readonly calls: RecordedCall[] = [];
  private readonly replies: ScriptedReply[];

  constructor(replies: ScriptedReply[] = []) {
    this.replies = [...replies];
  }

  /** Adds more scripted replies after the current ones */
  enqueue(...replies: ScriptedReply[]): void {
    this.replies.push(...replies);
  }

  get callCount(): number {
    return this.calls.length;
  }

  async complete(messages: string | LLMMessage[], config?: LLMConfig): Promise<LLMResponse> {
    const prompt =
      typeof messages === 'string' ? messages : messages.map((m) => m.content).join('\n');
    this.calls.push({ prompt, config });

    const next = this.replies.shift();
    if (next === undefined) {
      throw new Error(`MockLLMClient: no scripted reply for call ${this.calls.length}`);
    }
    if (next instanceof Error) {
      throw next;
    }

    const text = typeof next === 'function' ? next(prompt) : next;
    return {
      text,
      usage: { inputTokens: Math.ceil(prompt.length / 4), outputTokens: Math.ceil(text.length / 4) },
      stopReason: 'end_turn',
    };
  }
}

// ============================================================================
// Clock Stand-ins
// ============================================================================

/**
 * Sleep that resolves immediately and remembers every requested wait.
 */
export function createRecordingSleep(): { sleep: Sleep; waits: number[] } {
  const waits: number[] = [];
  const sleep: Sleep = async (ms) => {
    waits.push(ms);
  };
  return { sleep, waits };
}

/**
 * Manually advanced clock for session expiry tests.
 */
export function createManualClock(start: Date = new Date('2026-03-02T09:00:00Z')): {
  now: () => Date;
  advance: (ms: number) => void;
} {
  let current = start.getTime();
  return {
    now: () => new Date(current),
    advance: (ms) => {
      current += ms;
    },
  };
}

// ============================================================================
// Fixtures
// ============================================================================

export const TEST_CONTEXT: WritingContext = {
  grade: 'Grades 3-4',
  subject: 'Science',
  writingType: 'Diary',
};

export const SAMPLE_WRITING =
  'Today we planted bean seeds in paper cups. I gave mine water every morning and on Friday a tiny green sprout poked out of the soil!';

/**
 * Model reply in the requested format.
 */
export function evaluationReply(score: number | string, feedback: string): string {
  return JSON.stringify({ score, feedback });
}

// ============================================================================
// API Response Helpers
// ============================================================================

const errorEnvelopeSchema = z.object({
  success: z.literal(false),
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.unknown().optional(),
  }),
});

export type ErrorBody = z.infer<typeof errorEnvelopeSchema>['error'];

/**
 * Parses a success envelope and validates its data with `schema`.
 * Throws (failing the test) if the body has another shape.
 */
export async function getData<S extends z.ZodTypeAny>(
  response: Response,
  schema: S
): Promise<z.output<S>> {
  const body: unknown = await response.json();
  return z.object({ success: z.literal(true), data: schema }).parse(body).data;
}

/**
 * Parses an error envelope and returns its error object.
 */
export async function getError(response: Response): Promise<ErrorBody> {
  const body: unknown = await response.json();
  return errorEnvelopeSchema.parse(body).error;
}

export function jsonRequest(method: string, body?: unknown): RequestInit {
  return {
    method,
    headers: { 'Content-Type': 'application/json' },
    ...(body !== undefined && { body: JSON.stringify(body) }),
  };
}
