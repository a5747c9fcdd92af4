/**
 * Writing Evaluator Prompt Builder
 *
 * Builds the prompt that asks the model to grade a student's writing against a
 * fixed three-criterion rubric, and parses the JSON object it returns.
 *
 * Key design decisions:
 *
 * 1. **Fixed rubric**: topic clarity (30), richness of content (40) and
 *    structure (30) always add up to 100, so a score is comparable across
 *    genres and subjects.
 *
 * 2. **Grade-aware feedback**: totals of 80 or more get a closing word of
 *    praise saying the piece is finished for the student's grade; lower totals
 *    get praise plus exactly one concrete improvement, tied to the subject
 *    where possible. One suggestion at a time is what a young writer can act on.
 *
 * 3. **Structured output**: the model must answer with only
 *    `{"score": <total>, "feedback": "<text>"}`. The parser still tolerates a
 *    code fence around it.
 */

import { z } from 'zod';
import type { WritingContext } from '../../core/models';
import { clampScore } from '../../core/models';
import { parseStructuredResponse, type ResponseParseResult } from './json-response';

/**
 * One rubric criterion with its share of the 100-point total.
 */
export interface RubricCriterion {
  name: string;
  points: number;
  question: string;
}

export const WRITING_RUBRIC: readonly RubricCriterion[] = [
  {
    name: 'Clarity of topic',
    points: 30,
    question: 'Does the main idea or story of the writing come through clearly?',
  },
  {
    name: 'Richness of content',
    points: 40,
    question:
      'Do concrete examples, descriptions and feelings make the writing vivid?',
  },
  {
    name: 'Structure and flow',
    points: 30,
    question:
      'Does it move naturally from introduction to body to conclusion, or from beginning to middle to end?',
  },
];

/** Totals at or above this get final praise instead of a suggestion */
export const PRAISE_THRESHOLD = 80;

export interface WritingEvaluatorPromptParams extends WritingContext {
  /** The student's submission */
  studentText: string;
}

/**
 * Builds the evaluation prompt for one writing sample.
 *
 * @example
 * ```typescript
 * const prompt = buildWritingEvaluatorPrompt({
 *   grade: 'Grades 3-4',
 *   subject: 'Science',
 *   writingType: 'Diary',
 *   studentText: 'Today we planted beans in cups and watched them...',
 * });
 * const response = await client.complete(prompt, { temperature: 0.3, maxTokens: 800 });
 * ```
 */
export function buildWritingEvaluatorPrompt(params: WritingEvaluatorPromptParams): string {
  const { grade, subject, writingType } = params;
  const studentText = sanitizeStudentText(params.studentText);

  const rubric = WRITING_RUBRIC.map(
    (criterion, index) =>
      `${index + 1}. ${criterion.name} (${criterion.points} points): ${criterion.question}`
  ).join('\n');

  return `You are a kind AI writing teacher for '${grade}' students, and an expert at advising on writing related to '${subject}'.
Score the student's '${writingType}' below using the rubric, then give feedback tailored to the student's grade and chosen subject.

<rubric>
${rubric}
</rubric>

<instructions>
1. Score the writing against the rubric and add up the total.
2. If the total is ${PRAISE_THRESHOLD} or higher, the feedback should be a final message of praise and encouragement saying no more revision is needed, such as "Wonderful work! For a ${grade} student, this piece looks finished."
3. If the total is below ${PRAISE_THRESHOLD}, praise what works and kindly explain ONE thing to improve, with a concrete example. Advice that reflects the nature of '${subject}' is even better.
4. Respond ONLY with a JSON object in exactly this format. Do not add any other explanation.

{
  "score": <total score>,
  "feedback": "<feedback matching the score>"
}
</instructions>

<student_writing>
${studentText}
</student_writing>`;
}

/**
 * Trims the submission and escapes a literal closing tag so the student text
 * cannot end the <student_writing> block early.
 */
function sanitizeStudentText(input: string): string {
  return input.trim().replace(/<\/student_writing>/gi, '&lt;/student_writing&gt;');
}

// ============================================================================
// Response parsing
// ============================================================================

/**
 * Accepts a finite number (truncated toward zero) or a string holding an
 * optionally signed integer. Anything else is a schema failure.
 */
const scoreSchema = z
  .union([
    z.number().finite(),
    z
      .string()
      .trim()
      .regex(/^[+-]?\d+$/, 'Score must be an integer')
      .transform((value) => parseInt(value, 10)),
  ])
  .transform((value) => clampScore(Math.trunc(value)));

/**
 * Feedback must be text; bare numbers and booleans are stringified.
 */
const feedbackSchema = z
  .union([z.string(), z.number().finite(), z.boolean()])
  .transform((value) => String(value));

export const writingEvaluationSchema = z.object({
  score: scoreSchema,
  feedback: feedbackSchema,
});

export type ParsedWritingEvaluation = z.output<typeof writingEvaluationSchema>;

/**
 * Parses the evaluator's reply into a clamped score and feedback.
 *
 * @example
 * ```typescript
 * const result = parseWritingEvaluationResponse('```json\n{"score": 150, "feedback": "Great!"}\n```');
 * // { ok: true, value: { score: 100, feedback: 'Great!' } }
 * ```
 */
export function parseWritingEvaluationResponse(
  response: string
): ResponseParseResult<ParsedWritingEvaluation> {
  return parseStructuredResponse(response, writingEvaluationSchema);
}
