/**
 * Conversation Module - Barrel Export
 */

export {
  buildTranscript,
  formatTranscriptLine,
  truncateContent,
  DEFAULT_TRANSCRIPT_TURNS,
  DEFAULT_TRANSCRIPT_CONTENT_LENGTH,
  type TranscriptOptions,
} from './transcript';

export {
  WritingTutor,
  TUTOR_APOLOGY,
  type WritingTutorOptions,
} from './writing-tutor';
