/**
 * Chat Session Domain Types
 */

export type MessageRole = 'user' | 'assistant';

export interface IChatMessage {
  readonly role: MessageRole;
  readonly content: string;
  readonly timestamp: number;
}

/**
 * One user's in-memory conversation state, from credential entry to reset.
 * Keys live here and nowhere else: never logged, never persisted.
 */
export interface IChatSession {
  id: string;
  credentialsProvided: boolean;
  ended: boolean;
  primaryApiKey?: string;
  secondaryApiKey?: string;
  history: IChatMessage[];
  createdAt: number;
  updatedAt: number;
}

export type Sentiment = 'Positive' | 'Negative' | 'Neutral';

export interface ISummaryResult {
  summaryText: string;
  sentiment: Sentiment;
  /** Label as returned by the model, before normalization */
  sentimentLabel: string;
}

export const DEFAULT_SESSION_ID = 'default';

export function createEmptySession(id: string = DEFAULT_SESSION_ID): IChatSession {
  const now = Date.now();
  return {
    id,
    credentialsProvided: false,
    ended: false,
    history: [],
    createdAt: now,
    updatedAt: now,
  };
}

export function createMessage(role: MessageRole, content: string): IChatMessage {
  return Object.freeze({ role, content, timestamp: Date.now() });
}

/**
 * Append a message to the session history.
 * History is append-only while the conversation is open.
 */
export function appendMessage(session: IChatSession, message: IChatMessage): void {
  if (session.ended) {
    throw new Error(`Cannot append to ended session ${session.id}`);
  }
  session.history.push(message);
  session.updatedAt = Date.now();
}
