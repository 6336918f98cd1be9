/**
 * Primary Chat Client
 * Relays one user turn at a time to the primary completion API
 */

import type { IChatMessage, IChatSession } from '../../domain/conversation/session.js';
import { appendMessage, createMessage } from '../../domain/conversation/session.js';
import type { ChatError, Outcome } from '../../domain/conversation/errors.js';
import {
  AuthError,
  SessionPreconditionError,
  TransientRemoteError,
  fail,
  succeed,
} from '../../domain/conversation/errors.js';
import { canAcceptChatInput, getSessionPhase } from '../../domain/conversation/state-machine-rules.js';
import type { LLMProviderFactory, SafetyMode } from '../../infra/llm/llm-provider.js';
import { LLMProviderError, describeError } from '../../infra/llm/llm-provider.js';
import { debug } from '../../debug/index.js';

export interface ChatClientOptions {
  safety: SafetyMode;
}

export class PrimaryChatClient {
  constructor(
    private createPrimaryProvider: LLMProviderFactory,
    private options: ChatClientOptions
  ) {}

  /**
   * Send a single turn. The user message is recorded before the remote call,
   * so it stays in history even when the call fails. Only `userText` is sent:
   * the remote model sees no earlier turns.
   */
  async send(session: IChatSession, userText: string): Promise<Outcome<IChatMessage, ChatError>> {
    if (!canAcceptChatInput(session) || !session.primaryApiKey) {
      return fail(new SessionPreconditionError(getSessionPhase(session) === 'ended' ? 'ended' : 'locked'));
    }
    if (!userText.trim()) {
      return fail(new SessionPreconditionError('empty-message'));
    }

    appendMessage(session, createMessage('user', userText));
    debug.chatTurnStart(session.id, userText);

    let reply: string;
    try {
      const provider = this.createPrimaryProvider(session.primaryApiKey);
      const response = await provider.complete(
        [{ role: 'user', content: userText }],
        { safety: this.options.safety }
      );
      reply = response.content;
    } catch (error) {
      if (error instanceof LLMProviderError && error.isAuthError) {
        session.credentialsProvided = false;
        session.updatedAt = Date.now();
        const authError = new AuthError(error.message);
        debug.chatTurnFailed(session.id, authError.code, error.message);
        return fail(authError);
      }

      const transient = new TransientRemoteError(describeError(error));
      debug.chatTurnFailed(session.id, transient.code, transient.remoteMessage);
      return fail(transient);
    }

    const assistantMessage = createMessage('assistant', reply);
    appendMessage(session, assistantMessage);
    debug.chatTurnComplete(session.id, reply.length, session.history.length);

    return succeed(assistantMessage);
  }
}
