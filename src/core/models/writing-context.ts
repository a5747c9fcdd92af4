/**
 * The labels a student picks before writing: grade band, subject and genre.
 * They are interpolated verbatim into prompts, so any string is accepted here;
 * the offered choices live in core/settings/options.ts.
 */
export interface WritingContext {
  /** Grade band, e.g. 'Grades 3-4' */
  grade: string;
  /** Subject the writing relates to, e.g. 'Science' */
  subject: string;
  /** Genre of the writing, e.g. 'Diary' */
  writingType: string;
}
