export {
  GRADE_OPTIONS,
  SUBJECT_OPTIONS,
  WRITING_TYPE_OPTIONS,
  DEFAULT_WRITING_CONTEXT,
  getWritingOptions,
  type WritingOptions,
} from './options';
