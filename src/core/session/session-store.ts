/**
 * In-Memory Session Store
 *
 * Holds live tutoring sessions by id for the HTTP API. Sessions exist only
 * in process memory: they expire after a period of inactivity and are lost
 * on restart.
 */

import { SessionLimitError } from './types';
import { WritingSession, type WritingSessionInit } from './writing-session';

export interface SessionStoreOptions {
  /** Idle time after which a session is discarded */
  ttlMs: number;
  /**
   * Upper bound on live sessions. At the bound the least recently active idle
   * session is evicted; if all are busy, create() refuses.
   */
  maxSessions: number;
  /** Clock shared with the sessions this store creates */
  now?: () => Date;
}

export class InMemorySessionStore {
  private readonly sessions = new Map<string, WritingSession>();
  private readonly ttlMs: number;
  private readonly maxSessions: number;
  private readonly now: () => Date;

  constructor(options: SessionStoreOptions) {
    this.ttlMs = options.ttlMs;
    this.maxSessions = options.maxSessions;
    this.now = options.now ?? (() => new Date());
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * @throws SessionLimitError if the store is full and no idle session can
   *   be evicted
   */
  create(init: Omit<WritingSessionInit, 'id' | 'now'> = {}): WritingSession {
    this.pruneExpired();
    if (this.sessions.size >= this.maxSessions && !this.evictLeastRecentlyActive()) {
      throw new SessionLimitError(this.maxSessions);
    }

    const session = new WritingSession({ ...init, now: this.now });
    this.sessions.set(session.id, session);
    return session;
  }

  /**
   * Returns the session, or undefined if it never existed or has expired.
   */
  get(id: string): WritingSession | undefined {
    const session = this.sessions.get(id);
    if (!session) {
      return undefined;
    }
    if (this.isExpired(session)) {
      this.sessions.delete(id);
      return undefined;
    }
    return session;
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }

  /**
   * Drops every expired session and returns how many were removed.
   */
  pruneExpired(): number {
    let removed = 0;
    for (const [id, session] of Array.from(this.sessions.entries())) {
      if (this.isExpired(session)) {
        this.sessions.delete(id);
        removed++;
      }
    }
    return removed;
  }

  // A session that is answering a message is never expired or evicted
  private isExpired(session: WritingSession): boolean {
    return !session.isProcessing && session.idleMs() >= this.ttlMs;
  }

  /** Returns false when every session is busy */
  private evictLeastRecentlyActive(): boolean {
    let oldest: WritingSession | undefined;
    for (const session of Array.from(this.sessions.values())) {
      if (session.isProcessing) continue;
      if (!oldest || session.lastActivityAt < oldest.lastActivityAt) {
        oldest = session;
      }
    }
    if (!oldest) {
      return false;
    }
    console.warn(`[SessionStore] Session limit reached; evicting ${oldest.id}`);
    this.sessions.delete(oldest.id);
    return true;
  }
}
