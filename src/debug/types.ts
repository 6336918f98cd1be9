/**
 * Debug event types for chat session instrumentation.
 */

export type DebugEventType =
  | 'session.initialized'
  | 'session.reset'
  | 'session.ended'
  | 'credentials.submitted'
  | 'credentials.accepted'
  | 'credentials.rejected'
  | 'chat.turn.start'
  | 'chat.turn.complete'
  | 'chat.turn.failed'
  | 'summary.request'
  | 'summary.complete'
  | 'summary.failed'
  | 'llm.request'
  | 'llm.response'
  | 'llm.error';

export interface DebugEvent {
  /** UUID */
  id: string;
  timestamp: number;
  type: DebugEventType;
  /** Emitting module, e.g. "credential-gate" or "llm-provider" */
  source: string;
  /** Event payload, with key-shaped strings already redacted */
  data: Record<string, unknown>;
  sessionId?: string;
}

/**
 * Context for associating events with a session.
 */
export interface DebugContext {
  sessionId?: string;
}
