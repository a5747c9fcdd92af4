/**
 * Writing Session
 *
 * One student's tutoring session: the ordered turns, the active mode and the
 * writing settings. A session object is created per student and passed to
 * the engine explicitly; nothing about it is global.
 *
 * Turns can only be appended. Reset clears them and returns to evaluate mode.
 */

import { randomUUID } from 'node:crypto';
import type { Turn, WritingContext } from '../models';
import { DEFAULT_WRITING_CONTEXT } from '../settings';
import type { SessionSnapshot, TutorMode } from './types';

export interface WritingSessionInit {
  id?: string;
  mode?: TutorMode;
  settings?: Partial<WritingContext>;
  /** Clock used for activity timestamps */
  now?: () => Date;
}

export class WritingSession {
  readonly id: string;
  readonly createdAt: Date;

  private turns: Turn[] = [];
  private currentMode: TutorMode;
  private currentSettings: WritingContext;
  private lastActivity: Date;
  private processing = false;
  private readonly now: () => Date;

  constructor(init: WritingSessionInit = {}) {
    this.now = init.now ?? (() => new Date());
    this.id = init.id ?? `ws_${randomUUID()}`;
    this.currentMode = init.mode ?? 'evaluate';
    this.currentSettings = { ...DEFAULT_WRITING_CONTEXT, ...init.settings };
    this.createdAt = this.now();
    this.lastActivity = this.createdAt;
  }

  get mode(): TutorMode {
    return this.currentMode;
  }

  get settings(): WritingContext {
    return { ...this.currentSettings };
  }

  get lastActivityAt(): Date {
    return this.lastActivity;
  }

  get isProcessing(): boolean {
    return this.processing;
  }

  get turnCount(): number {
    return this.turns.length;
  }

  /**
   * Returns a copy of the turns, oldest first.
   */
  getTurns(): Turn[] {
    return [...this.turns];
  }

  appendTurn<T extends Turn>(turn: T): T {
    this.turns.push(turn);
    this.touch();
    return turn;
  }

  setMode(mode: TutorMode): void {
    this.currentMode = mode;
    this.touch();
  }

  updateSettings(settings: Partial<WritingContext>): WritingContext {
    this.currentSettings = { ...this.currentSettings, ...settings };
    this.touch();
    return this.settings;
  }

  /**
   * Clears the conversation and returns to evaluate mode. Settings are kept.
   */
  reset(): void {
    this.turns = [];
    this.currentMode = 'evaluate';
    this.touch();
  }

  setProcessing(processing: boolean): void {
    this.processing = processing;
  }

  /**
   * Milliseconds since the last change, measured with the session's clock.
   */
  idleMs(): number {
    return this.now().getTime() - this.lastActivity.getTime();
  }

  toSnapshot(): SessionSnapshot {
    return {
      id: this.id,
      mode: this.currentMode,
      settings: this.settings,
      turns: this.getTurns(),
      isProcessing: this.processing,
      createdAt: this.createdAt,
      lastActivityAt: this.lastActivity,
    };
  }

  private touch(): void {
    this.lastActivity = this.now();
  }
}
