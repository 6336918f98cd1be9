/**
 * Conversation Module - Re-exports
 */

export { SessionStateManager } from './session-state-manager.js';
export { CredentialGate, type CredentialGateOptions } from './credential-gate.js';
export { PrimaryChatClient, type ChatClientOptions } from './chat-client.js';
export {
  SummarizationClient,
  EMPTY_HISTORY_SUMMARY,
  normalizeSentiment,
  parseSummaryResponse,
  serializeHistory,
} from './summarization-client.js';
export { ConversationController, toSessionView, type ISessionView } from './conversation-controller.js';
export {
  createConversationController,
  createPrimaryProviderFactory,
  createSecondaryProviderFactory,
  type ConversationDependencies,
} from './create-conversation.js';
