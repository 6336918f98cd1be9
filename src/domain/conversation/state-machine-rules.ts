/**
 * Chat Session State Machine Rules
 * Defines the gated phases a session moves through
 */

import type { IChatSession } from './session.js';

export type SessionPhase =
  | 'locked'
  | 'chatting'
  | 'ended';

export const SESSION_TRANSITIONS: Record<SessionPhase, SessionPhase[]> = {
  locked: ['chatting'],
  chatting: ['locked', 'ended'],
  ended: ['chatting', 'locked'],
};

export function canTransitionSession(from: SessionPhase, to: SessionPhase): boolean {
  return SESSION_TRANSITIONS[from].includes(to);
}

export function getSessionPhase(session: Pick<IChatSession, 'credentialsProvided' | 'ended'>): SessionPhase {
  if (session.ended) {
    return 'ended';
  }
  return session.credentialsProvided ? 'chatting' : 'locked';
}

/** Chat input is only accepted while credentials are valid and the session is open */
export function canAcceptChatInput(session: Pick<IChatSession, 'credentialsProvided' | 'ended'>): boolean {
  return getSessionPhase(session) === 'chatting';
}
