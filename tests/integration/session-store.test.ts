/**
 * In-Memory Session Store Tests
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { InMemorySessionStore, SessionLimitError } from '../../src/core/session';
import { createStudentTurn } from '../../src/core/models';
import { createManualClock } from '../helpers';

const MINUTE = 60_000;

describe('InMemorySessionStore', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('creates sessions with defaults and finds them by id', () => {
    const store = new InMemorySessionStore({ ttlMs: 30 * MINUTE, maxSessions: 10 });

    const session = store.create({ mode: 'chat', settings: { subject: 'Science' } });

    expect(session.id).toMatch(/^ws_/);
    expect(store.get(session.id)).toBe(session);
    expect(session.mode).toBe('chat');
    expect(session.settings).toEqual({ grade: 'Grades 3-4', subject: 'Science', writingType: 'Diary' });
    expect(store.size).toBe(1);
  });

  it('returns undefined for unknown ids and deletes sessions', () => {
    const store = new InMemorySessionStore({ ttlMs: 30 * MINUTE, maxSessions: 10 });
    const session = store.create();

    expect(store.get('ws_missing')).toBeUndefined();
    expect(store.delete(session.id)).toBe(true);
    expect(store.delete(session.id)).toBe(false);
    expect(store.get(session.id)).toBeUndefined();
  });

  it('expires sessions after the idle time', () => {
    const clock = createManualClock();
    const store = new InMemorySessionStore({ ttlMs: 30 * MINUTE, maxSessions: 10, now: clock.now });
    const session = store.create();

    clock.advance(30 * MINUTE - 1);
    expect(store.get(session.id)).toBe(session);

    clock.advance(1);
    expect(store.get(session.id)).toBeUndefined();
    expect(store.size).toBe(0);
  });

  it('counts idle time from the last activity', () => {
    const clock = createManualClock();
    const store = new InMemorySessionStore({ ttlMs: 30 * MINUTE, maxSessions: 10, now: clock.now });
    const session = store.create();

    clock.advance(20 * MINUTE);
    session.appendTurn(createStudentTurn('Still here'));
    clock.advance(20 * MINUTE);

    expect(store.get(session.id)).toBe(session);
  });

  it('prunes expired sessions and reports how many were removed', () => {
    const clock = createManualClock();
    const store = new InMemorySessionStore({ ttlMs: 10 * MINUTE, maxSessions: 10, now: clock.now });
    store.create();
    store.create();
    clock.advance(5 * MINUTE);
    const recent = store.create();
    clock.advance(6 * MINUTE);

    expect(store.pruneExpired()).toBe(2);
    expect(store.size).toBe(1);
    expect(store.get(recent.id)).toBe(recent);
  });

  it('never expires a session that is answering a message', () => {
    const clock = createManualClock();
    const store = new InMemorySessionStore({ ttlMs: 10 * MINUTE, maxSessions: 10, now: clock.now });
    const session = store.create();
    session.setProcessing(true);

    clock.advance(60 * MINUTE);

    expect(store.pruneExpired()).toBe(0);
    expect(store.get(session.id)).toBe(session);
  });

  it('evicts the least recently active idle session at the limit', () => {
    const clock = createManualClock();
    const store = new InMemorySessionStore({ ttlMs: 60 * MINUTE, maxSessions: 2, now: clock.now });
    const first = store.create();
    clock.advance(MINUTE);
    const second = store.create();
    clock.advance(MINUTE);
    first.setMode('chat');
    clock.advance(MINUTE);

    const third = store.create();

    expect(store.size).toBe(2);
    expect(store.get(second.id)).toBeUndefined();
    expect(store.get(first.id)).toBe(first);
    expect(store.get(third.id)).toBe(third);
  });

  it('skips busy sessions when evicting', () => {
    const clock = createManualClock();
    const store = new InMemorySessionStore({ ttlMs: 60 * MINUTE, maxSessions: 2, now: clock.now });
    const busy = store.create();
    busy.setProcessing(true);
    clock.advance(MINUTE);
    const idle = store.create();
    clock.advance(MINUTE);

    store.create();

    expect(store.get(busy.id)).toBe(busy);
    expect(store.get(idle.id)).toBeUndefined();
  });

  it('refuses a new session when the store is full of busy sessions', () => {
    const store = new InMemorySessionStore({ ttlMs: 60 * MINUTE, maxSessions: 2 });
    const first = store.create();
    const second = store.create();
    first.setProcessing(true);
    second.setProcessing(true);

    expect(() => store.create()).toThrow(SessionLimitError);
    expect(store.size).toBe(2);

    second.setProcessing(false);
    store.create();

    expect(store.size).toBe(2);
    expect(store.get(first.id)).toBe(first);
    expect(store.get(second.id)).toBeUndefined();
  });
});
