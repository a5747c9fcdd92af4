/**
 * Writing Tutor Prompt Builder
 *
 * Builds the prompt for free conversation with the student about their
 * writing. The recent transcript is supplied already trimmed (see
 * core/conversation/transcript.ts); this module only frames it.
 */

import type { WritingContext } from '../../core/models';

export interface WritingTutorPromptParams extends WritingContext {
  /** Recent conversation, one "Role: content" line per turn; may be empty */
  transcript: string;
  /** What the student just asked or said */
  studentMessage: string;
}

const EMPTY_TRANSCRIPT = '(No earlier conversation)';

/**
 * Builds the conversation prompt.
 *
 * The reply is kept to 2-3 short, friendly sentences: the reader is a young
 * student, and a chat reply should invite the next question rather than
 * lecture.
 *
 * @example
 * ```typescript
 * const prompt = buildWritingTutorPrompt({
 *   grade: 'Grades 1-2',
 *   subject: 'Language Arts',
 *   writingType: 'Letter',
 *   transcript: 'Student: How do I start a letter?',
 *   studentMessage: 'Can I write to my grandma?',
 * });
 * ```
 */
export function buildWritingTutorPrompt(params: WritingTutorPromptParams): string {
  const { grade, subject, writingType } = params;
  const transcript = params.transcript.trim() || EMPTY_TRANSCRIPT;
  const studentMessage = params.studentMessage.trim();

  return `You are a kind and caring AI writing teacher for '${grade}' students.
Have a relaxed conversation with the student about writing.
Keep the conversation in the context of the subject '${subject}' and '${writingType}' writing.

Answer the student's question, and offer encouragement and advice that help them become a better writer.
Reply in 2-3 short, friendly, conversational sentences.

<recent_conversation>
${transcript}
</recent_conversation>

Student's new question: ${studentMessage}

Teacher's reply:`;
}
