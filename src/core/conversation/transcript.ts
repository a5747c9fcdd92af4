/**
 * Conversation Transcript
 *
 * Condenses a session's turns into the short "Role: content" transcript that
 * goes into the tutor prompt. Only a recent window is kept, and each turn is
 * cut to a fixed length, so prompt size stays bounded however long the
 * session runs.
 */

import type { Turn, TurnRole } from '../models';
import { hasScore } from '../models';

export interface TranscriptOptions {
  /** Most recent turns to keep (default 8) */
  maxTurns?: number;
  /** Longest content kept per turn, ellipsis included (default 100) */
  maxContentLength?: number;
}

export const DEFAULT_TRANSCRIPT_TURNS = 8;
export const DEFAULT_TRANSCRIPT_CONTENT_LENGTH = 100;

const ELLIPSIS = '...';

const ROLE_LABELS: Record<TurnRole, string> = {
  student: 'Student',
  tutor: 'Teacher',
};

/**
 * Shortens text longer than `maxLength` characters (code points) to
 * `maxLength - 3` characters plus an ellipsis.
 *
 * @example
 * ```typescript
 * truncateContent('a'.repeat(120), 100); // 97 'a's followed by '...'
 * ```
 */
export function truncateContent(content: string, maxLength: number): string {
  // Counted in code points so a surrogate pair is never split
  const chars = Array.from(content);
  if (chars.length <= maxLength) {
    return content;
  }
  return chars.slice(0, Math.max(0, maxLength - ELLIPSIS.length)).join('') + ELLIPSIS;
}

/**
 * Renders one turn as a transcript line. Scored turns carry the score
 * before the content.
 */
export function formatTranscriptLine(
  turn: Turn,
  maxContentLength: number = DEFAULT_TRANSCRIPT_CONTENT_LENGTH
): string {
  const label = ROLE_LABELS[turn.role];
  const content = truncateContent(turn.content, maxContentLength);
  return hasScore(turn)
    ? `${label}: (Score: ${turn.score}) ${content}`
    : `${label}: ${content}`;
}

/**
 * Builds the transcript for the most recent turns, oldest first.
 *
 * @example
 * ```typescript
 * buildTranscript([
 *   createStudentTurn('My summer diary...'),
 *   createTutorTurn('Lovely details about the beach!', 85),
 * ]);
 * // 'Student: My summer diary...\nTeacher: (Score: 85) Lovely details about the beach!'
 * ```
 */
export function buildTranscript(turns: readonly Turn[], options: TranscriptOptions = {}): string {
  const maxTurns = options.maxTurns ?? DEFAULT_TRANSCRIPT_TURNS;
  const maxContentLength = options.maxContentLength ?? DEFAULT_TRANSCRIPT_CONTENT_LENGTH;

  if (maxTurns <= 0) {
    return '';
  }

  return turns
    .slice(-maxTurns)
    .map((turn) => formatTranscriptLine(turn, maxContentLength))
    .join('\n');
}
