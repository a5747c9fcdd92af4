/**
 * Writing Settings Options
 *
 * The grade bands, subjects and genres a student can choose from. The core
 * accepts any label; these lists only drive the shells' pickers and defaults.
 */

import type { WritingContext } from '../models';

export const GRADE_OPTIONS = ['Grades 1-2', 'Grades 3-4', 'Grades 5-6'] as const;

export const SUBJECT_OPTIONS = [
  'Language Arts',
  'Math',
  'Social Studies',
  'Science',
  'Other',
] as const;

export const WRITING_TYPE_OPTIONS = [
  'Letter',
  'Persuasive essay',
  'Diary',
  'Book report',
  'Explanatory essay',
] as const;

/** Settings a new session starts with */
export const DEFAULT_WRITING_CONTEXT: Readonly<WritingContext> = Object.freeze({
  grade: 'Grades 3-4',
  subject: 'Language Arts',
  writingType: 'Diary',
});

export interface WritingOptions {
  grades: readonly string[];
  subjects: readonly string[];
  writingTypes: readonly string[];
  defaults: WritingContext;
}

/**
 * All choices plus defaults, in the shape the API and CLI present them.
 */
export function getWritingOptions(): WritingOptions {
  return {
    grades: GRADE_OPTIONS,
    subjects: SUBJECT_OPTIONS,
    writingTypes: WRITING_TYPE_OPTIONS,
    defaults: { ...DEFAULT_WRITING_CONTEXT },
  };
}
