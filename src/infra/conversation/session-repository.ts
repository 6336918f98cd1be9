/**
 * Session Repository
 * Process-local session store keyed by session id
 */

import type { IChatSession } from '../../domain/conversation/session.js';
import { createEmptySession } from '../../domain/conversation/session.js';

export interface ISessionRepository {
  createSession(id: string): IChatSession;
  getSession(id: string): IChatSession | null;
  deleteSession(id: string): boolean;
}

/**
 * In-memory session repository.
 * Sessions hold API keys and are never written to disk.
 */
export class InMemorySessionRepository implements ISessionRepository {
  private sessions = new Map<string, IChatSession>();

  createSession(id: string): IChatSession {
    const session = createEmptySession(id);
    this.sessions.set(session.id, session);
    return session;
  }

  getSession(id: string): IChatSession | null {
    return this.sessions.get(id) || null;
  }

  deleteSession(id: string): boolean {
    return this.sessions.delete(id);
  }
}
