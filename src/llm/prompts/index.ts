/**
 * Prompt builders and response parsers for the writing tutor.
 */

export {
  buildWritingEvaluatorPrompt,
  parseWritingEvaluationResponse,
  writingEvaluationSchema,
  WRITING_RUBRIC,
  PRAISE_THRESHOLD,
  type RubricCriterion,
  type WritingEvaluatorPromptParams,
  type ParsedWritingEvaluation,
} from './writing-evaluator';

export { buildWritingTutorPrompt, type WritingTutorPromptParams } from './writing-tutor';

export {
  stripCodeFence,
  parseStructuredResponse,
  type ResponseParseResult,
} from './json-response';
