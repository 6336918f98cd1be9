/**
 * Convenient debug API for instrumentation.
 * Provides typed methods for emitting the chat session's debug events.
 */

import { debugEmitter } from './emitter.js';
import type { DebugContext } from './types.js';

const PREVIEW_LENGTH = 100;

function preview(text: string): string {
  return text.slice(0, PREVIEW_LENGTH);
}

/**
 * Debug API object with convenience methods for common event types.
 */
export const debug = {
  // ========== Context ==========

  setContext(ctx: DebugContext): void {
    debugEmitter.setContext(ctx);
  },

  clearContext(): void {
    debugEmitter.clearContext();
  },

  // ========== Session Events ==========

  sessionInitialized(sessionId: string, created: boolean): void {
    debugEmitter.emitDebug('session.initialized', 'session-state', { sessionId, created });
  },

  sessionReset(sessionId: string, clearedMessages: number): void {
    debugEmitter.emitDebug('session.reset', 'session-state', { sessionId, clearedMessages });
  },

  sessionEnded(sessionId: string, messageCount: number): void {
    debugEmitter.emitDebug('session.ended', 'conversation-controller', { sessionId, messageCount });
  },

  // ========== Credential Events ==========

  credentialsSubmitted(sessionId: string): void {
    debugEmitter.emitDebug('credentials.submitted', 'credential-gate', { sessionId });
  },

  credentialsAccepted(sessionId: string): void {
    debugEmitter.emitDebug('credentials.accepted', 'credential-gate', { sessionId });
  },

  credentialsRejected(sessionId: string, code: string, reason: string): void {
    debugEmitter.emitDebug('credentials.rejected', 'credential-gate', { sessionId, code, reason });
  },

  // ========== Chat Events ==========

  chatTurnStart(sessionId: string, userText: string): void {
    debugEmitter.emitDebug('chat.turn.start', 'chat-client', {
      sessionId,
      messagePreview: preview(userText),
      messageLength: userText.length,
    });
  },

  chatTurnComplete(sessionId: string, replyLength: number, historyLength: number): void {
    debugEmitter.emitDebug('chat.turn.complete', 'chat-client', { sessionId, replyLength, historyLength });
  },

  chatTurnFailed(sessionId: string, code: string, reason: string): void {
    debugEmitter.emitDebug('chat.turn.failed', 'chat-client', { sessionId, code, reason });
  },

  // ========== Summary Events ==========

  summaryRequest(sessionId: string, messageCount: number, promptLength: number): void {
    debugEmitter.emitDebug('summary.request', 'summarization-client', { sessionId, messageCount, promptLength });
  },

  summaryComplete(sessionId: string, sentiment: string, summaryLength: number): void {
    debugEmitter.emitDebug('summary.complete', 'summarization-client', { sessionId, sentiment, summaryLength });
  },

  summaryFailed(sessionId: string, reason: string): void {
    debugEmitter.emitDebug('summary.failed', 'summarization-client', { sessionId, reason });
  },

  // ========== LLM Events ==========

  llmRequest(provider: string, model: string, messageCount: number): void {
    debugEmitter.emitDebug('llm.request', 'llm-provider', { provider, model, messageCount });
  },

  llmResponse(provider: string, model: string, tokensUsed: number, durationMs: number): void {
    debugEmitter.emitDebug('llm.response', 'llm-provider', { provider, model, tokensUsed, durationMs });
  },

  llmError(provider: string, kind: string, error: string): void {
    debugEmitter.emitDebug('llm.error', 'llm-provider', { provider, kind, error });
  },
};
