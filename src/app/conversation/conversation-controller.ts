/**
 * Conversation Controller
 * Entry point for user intents; resolves sessions by id and runs one intent
 * per session at a time
 */

import type { IChatMessage, IChatSession, ISummaryResult } from '../../domain/conversation/session.js';
import type {
  ChatError,
  ChatRelayError,
  CredentialError,
  Outcome,
  SummarizeError,
} from '../../domain/conversation/errors.js';
import { SessionPreconditionError, fail, succeed } from '../../domain/conversation/errors.js';
import type { SessionPhase } from '../../domain/conversation/state-machine-rules.js';
import { canTransitionSession, getSessionPhase } from '../../domain/conversation/state-machine-rules.js';
import type { SessionStateManager } from './session-state-manager.js';
import type { CredentialGate } from './credential-gate.js';
import type { PrimaryChatClient } from './chat-client.js';
import type { SummarizationClient } from './summarization-client.js';
import { debug } from '../../debug/index.js';

/**
 * What a front end may see of a session. Keys are never included.
 */
export interface ISessionView {
  id: string;
  phase: SessionPhase;
  credentialsProvided: boolean;
  ended: boolean;
  history: readonly IChatMessage[];
}

export function toSessionView(session: IChatSession): ISessionView {
  return {
    id: session.id,
    phase: getSessionPhase(session),
    credentialsProvided: session.credentialsProvided,
    ended: session.ended,
    history: [...session.history],
  };
}

export class ConversationController {
  private inFlight = new Set<string>();

  constructor(
    private sessionState: SessionStateManager,
    private credentialGate: CredentialGate,
    private chatClient: PrimaryChatClient,
    private summarizer: SummarizationClient
  ) {}

  openSession(sessionId?: string): ISessionView {
    return toSessionView(this.sessionState.initialize(sessionId));
  }

  getView(sessionId: string): ISessionView {
    return toSessionView(this.sessionState.initialize(sessionId));
  }

  isBusy(sessionId: string): boolean {
    return this.inFlight.has(sessionId);
  }

  async submitCredentials(
    sessionId: string,
    primaryKey: string,
    secondaryKey: string
  ): Promise<Outcome<void, CredentialError>> {
    return this.exclusive(sessionId, session =>
      this.credentialGate.submit(session, primaryKey, secondaryKey)
    );
  }

  async sendMessage(sessionId: string, text: string): Promise<Outcome<IChatMessage, ChatError>> {
    return this.exclusive(sessionId, session => this.chatClient.send(session, text));
  }

  async summarize(sessionId: string): Promise<Outcome<ISummaryResult, SummarizeError>> {
    return this.exclusive(sessionId, session => this.summarizer.summarize(session));
  }

  endConversation(sessionId: string): Outcome<ISessionView, SessionPreconditionError> {
    if (this.isBusy(sessionId)) {
      return fail(new SessionPreconditionError('busy'));
    }

    const session = this.sessionState.initialize(sessionId);
    const phase = getSessionPhase(session);
    if (!canTransitionSession(phase, 'ended')) {
      return fail(new SessionPreconditionError(phase === 'locked' ? 'locked' : 'ended'));
    }

    session.ended = true;
    session.updatedAt = Date.now();
    debug.sessionEnded(session.id, session.history.length);
    return succeed(toSessionView(session));
  }

  startNew(sessionId: string): Outcome<ISessionView, SessionPreconditionError> {
    if (this.isBusy(sessionId)) {
      return fail(new SessionPreconditionError('busy'));
    }

    const session = this.sessionState.initialize(sessionId);
    this.sessionState.reset(session);
    return succeed(toSessionView(session));
  }

  private async exclusive<T, E extends ChatRelayError>(
    sessionId: string,
    run: (session: IChatSession) => Promise<Outcome<T, E>>
  ): Promise<Outcome<T, E | SessionPreconditionError>> {
    if (this.inFlight.has(sessionId)) {
      return fail(new SessionPreconditionError('busy'));
    }

    const session = this.sessionState.initialize(sessionId);
    this.inFlight.add(sessionId);
    debug.setContext({ sessionId });
    try {
      return await run(session);
    } finally {
      this.inFlight.delete(sessionId);
      debug.clearContext();
    }
  }
}
