/**
 * Structured Response Parsing
 *
 * Models asked for "JSON only" still sometimes wrap the object in a markdown
 * code fence. Parsing is split into two steps so the retry logic can stay
 * generic over any response contract:
 *
 * 1. `stripCodeFence` normalizes the raw text (trim, remove an optional fence)
 * 2. `parseStructuredResponse` parses JSON and validates it against a zod schema
 *
 * Failures are reported as values, never thrown, and classified as either
 * 'format' (not JSON at all) or 'schema' (JSON of the wrong shape).
 */

import type { z } from 'zod';

/**
 * Outcome of parsing a model reply against a contract.
 */
export type ResponseParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; kind: 'format' | 'schema'; message: string };

/**
 * Matches a reply that opens with a fence. The language tag is optional, the
 * body may sit on the fence lines themselves, and the closing fence may be
 * missing (a reply cut off by the token limit).
 */
const FENCED_BLOCK = /^```([A-Za-z][\w+-]*)?[ \t]*\r?\n?([\s\S]*?)\s*(?:```)?$/;

/**
 * Trims the text and removes a surrounding triple-backtick fence, with or
 * without a language tag. Text that does not open with a fence is returned
 * trimmed and otherwise untouched.
 *
 * @example
 * ```typescript
 * stripCodeFence('```json\n{"score": 80}\n```'); // '{"score": 80}'
 * stripCodeFence('  {"score": 80}  ');           // '{"score": 80}'
 * ```
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith('```')) {
    return trimmed;
  }

  const match = FENCED_BLOCK.exec(trimmed);
  if (!match) {
    return trimmed;
  }
  return (match[2] ?? '').trim();
}

/**
 * Parses a model reply as JSON and validates it against `schema`.
 *
 * @example
 * ```typescript
 * const result = parseStructuredResponse(reply, z.object({ answer: z.string() }));
 * if (result.ok) {
 *   console.log(result.value.answer);
 * } else {
 *   console.warn(`Unusable reply (${result.kind}): ${result.message}`);
 * }
 * ```
 */
export function parseStructuredResponse<S extends z.ZodTypeAny>(
  response: string,
  schema: S
): ResponseParseResult<z.output<S>> {
  const body = stripCodeFence(response);

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    return {
      ok: false,
      kind: 'format',
      message: error instanceof Error ? error.message : 'Response is not valid JSON',
    };
  }

  const validation = schema.safeParse(parsed);
  if (!validation.success) {
    const details = validation.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return { ok: false, kind: 'schema', message: details };
  }

  return { ok: true, value: validation.data };
}
