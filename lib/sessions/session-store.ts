import type { Source } from '@/types';

/**
 * One completed exchange. Immutable once recorded.
 */
export interface Turn {
  readonly userMessage: string;
  readonly assistantMessage: string;
  readonly sources: readonly Source[];
}

/**
 * Backing storage for session history. The manager serializes access per
 * session, so implementations need no locking of their own.
 */
export interface SessionStore {
  get(sessionId: string): Promise<readonly Turn[] | undefined>;
  set(sessionId: string, turns: readonly Turn[]): Promise<void>;
  delete(sessionId: string): Promise<boolean>;
  has(sessionId: string): Promise<boolean>;
}

/**
 * Process-local store. History is lost on restart; for several instances,
 * swap in a shared store behind the same interface.
 */
export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, readonly Turn[]>();

  async get(sessionId: string): Promise<readonly Turn[] | undefined> {
    return this.sessions.get(sessionId);
  }

  async set(sessionId: string, turns: readonly Turn[]): Promise<void> {
    this.sessions.set(sessionId, turns);
  }

  async delete(sessionId: string): Promise<boolean> {
    return this.sessions.delete(sessionId);
  }

  async has(sessionId: string): Promise<boolean> {
    return this.sessions.has(sessionId);
  }
}
