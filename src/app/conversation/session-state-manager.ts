/**
 * Session State Manager
 * Creates, resolves and resets chat sessions held in the process-local store
 */

import type { IChatSession } from '../../domain/conversation/session.js';
import { DEFAULT_SESSION_ID } from '../../domain/conversation/session.js';
import type { ISessionRepository } from '../../infra/conversation/session-repository.js';
import { debug } from '../../debug/index.js';

export class SessionStateManager {
  constructor(private sessionRepository: ISessionRepository) {}

  /**
   * Return the session for `sessionId`, creating an empty one only if none exists.
   * Calling it again never clobbers an in-progress session.
   */
  initialize(sessionId: string = DEFAULT_SESSION_ID): IChatSession {
    const existing = this.sessionRepository.getSession(sessionId);
    if (existing) {
      debug.sessionInitialized(sessionId, false);
      return existing;
    }

    const session = this.sessionRepository.createSession(sessionId);
    debug.sessionInitialized(sessionId, true);
    return session;
  }

  get(sessionId: string): IChatSession | null {
    return this.sessionRepository.getSession(sessionId);
  }

  /**
   * Start a new conversation: clears history and the ended flag, keeps credentials.
   */
  reset(session: IChatSession): void {
    const clearedMessages = session.history.length;
    session.history = [];
    session.ended = false;
    session.updatedAt = Date.now();
    debug.sessionReset(session.id, clearedMessages);
  }

  discard(sessionId: string): boolean {
    return this.sessionRepository.deleteSession(sessionId);
  }
}
