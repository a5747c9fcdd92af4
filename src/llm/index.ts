/**
 * LLM Module - Barrel Export
 *
 * The model client, its types and errors, and the prompt builders and reply
 * parsers for evaluation and conversation.
 *
 * @example
 * ```typescript
 * import { AnthropicClient, buildWritingEvaluatorPrompt, parseWritingEvaluationResponse } from './llm';
 *
 * const client = new AnthropicClient();
 * const response = await client.complete(
 *   buildWritingEvaluatorPrompt({ grade, subject, writingType, studentText }),
 *   { temperature: 0.3, maxTokens: 800 }
 * );
 * const parsed = parseWritingEvaluationResponse(response.text);
 * ```
 */

export { AnthropicClient, toLLMError, type AnthropicClientOptions } from './client';

export type {
  LLMMessage,
  LLMConfig,
  LLMResponse,
  LLMErrorType,
  LLMCompletionClient,
} from './types';

export { LLMError } from './types';

export {
  buildWritingEvaluatorPrompt,
  buildWritingTutorPrompt,
  parseWritingEvaluationResponse,
  parseStructuredResponse,
  stripCodeFence,
  writingEvaluationSchema,
  WRITING_RUBRIC,
  PRAISE_THRESHOLD,
  type WritingEvaluatorPromptParams,
  type WritingTutorPromptParams,
  type ParsedWritingEvaluation,
  type ResponseParseResult,
  type RubricCriterion,
} from './prompts';
