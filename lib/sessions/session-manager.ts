import { randomUUID } from 'node:crypto';

import type { Source } from '@/types';
import { KeyedLock } from './keyed-lock';
import { InMemorySessionStore, type SessionStore, type Turn } from './session-store';

export interface SessionManagerOptions {
  /** Turns kept per session; older turns are evicted first */
  maxHistoryTurns: number;
  store?: SessionStore;
}

function freezeTurn(userMessage: string, assistantMessage: string, sources: readonly Source[]): Turn {
  return Object.freeze({
    userMessage,
    assistantMessage,
    sources: Object.freeze(sources.map((source) => Object.freeze({ ...source }))),
  });
}

/**
 * Bounded conversation history keyed by session id.
 *
 * The lock is held only while a session's turn list is read or replaced.
 * Callers must not hold it across LLM or search calls.
 */
export class SessionManager {
  private readonly store: SessionStore;
  private readonly lock = new KeyedLock();
  private readonly maxHistoryTurns: number;

  constructor(options: SessionManagerOptions) {
    if (!Number.isInteger(options.maxHistoryTurns) || options.maxHistoryTurns < 0) {
      throw new Error(`maxHistoryTurns must be a non-negative integer, got ${options.maxHistoryTurns}`);
    }
    this.maxHistoryTurns = options.maxHistoryTurns;
    this.store = options.store ?? new InMemorySessionStore();
  }

  /**
   * A fresh id with nothing stored under it yet. The first appendTurn creates
   * the history, so a query that fails before answering leaves no trace.
   */
  newSessionId(): string {
    return randomUUID();
  }

  async createSession(): Promise<string> {
    const sessionId = this.newSessionId();
    await this.lock.run(sessionId, () => this.store.set(sessionId, []));
    console.log(`[Sessions] Created session ${sessionId}`);
    return sessionId;
  }

  /**
   * Most recent turns, oldest first. Empty for unknown sessions.
   */
  async getHistory(sessionId: string): Promise<readonly Turn[]> {
    return this.lock.run(sessionId, async () => (await this.store.get(sessionId)) ?? []);
  }

  /**
   * Append a turn, evicting the oldest ones beyond the window. An unknown
   * session id starts a new history.
   */
  async appendTurn(
    sessionId: string,
    userMessage: string,
    assistantMessage: string,
    sources: readonly Source[]
  ): Promise<void> {
    const turn = freezeTurn(userMessage, assistantMessage, sources);

    await this.lock.run(sessionId, async () => {
      const turns = [...((await this.store.get(sessionId)) ?? []), turn];
      const evicted = Math.max(0, turns.length - this.maxHistoryTurns);
      if (evicted > 0) {
        console.log(`[Sessions] Evicting ${evicted} turn(s) from ${sessionId}`);
      }
      await this.store.set(sessionId, Object.freeze(turns.slice(evicted)));
    });
  }

  async clearSession(sessionId: string): Promise<boolean> {
    return this.lock.run(sessionId, () => this.store.delete(sessionId));
  }

  async hasSession(sessionId: string): Promise<boolean> {
    return this.store.has(sessionId);
  }
}
