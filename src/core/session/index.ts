/**
 * Session Module - Barrel Export
 *
 * @example
 * ```typescript
 * import { TutorSessionEngine, WritingSession, InMemorySessionStore } from '@/core/session';
 * ```
 */

export { TutorSessionEngine } from './session-engine';
export { WritingSession, type WritingSessionInit } from './writing-session';
export { InMemorySessionStore, type SessionStoreOptions } from './session-store';

export type {
  TutorMode,
  SessionSnapshot,
  SubmitResult,
  SessionEngineDependencies,
  SessionEvent,
  SessionEventListener,
} from './types';
export {
  TUTOR_MODES,
  isTutorMode,
  SessionBusyError,
  EmptyMessageError,
  SessionLimitError,
} from './types';
