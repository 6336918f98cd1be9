/**
 * Wires the conversation services from runtime configuration
 */

import type { ChatRelayRuntimeConfig } from '../../infra/config/runtime-config.js';
import type { LLMProviderFactory } from '../../infra/llm/llm-provider.js';
import { GeminiProvider } from '../../infra/llm/gemini-provider.js';
import { OpenAIProvider } from '../../infra/llm/providers.js';
import type { ISessionRepository } from '../../infra/conversation/session-repository.js';
import { InMemorySessionRepository } from '../../infra/conversation/session-repository.js';
import { SessionStateManager } from './session-state-manager.js';
import { CredentialGate } from './credential-gate.js';
import { PrimaryChatClient } from './chat-client.js';
import { SummarizationClient } from './summarization-client.js';
import { ConversationController } from './conversation-controller.js';

export interface ConversationDependencies {
  createPrimaryProvider?: LLMProviderFactory;
  createSecondaryProvider?: LLMProviderFactory;
  sessionRepository?: ISessionRepository;
}

export function createPrimaryProviderFactory(config: ChatRelayRuntimeConfig): LLMProviderFactory {
  const { model, baseUrl, timeoutMs, maxTokens, temperature } = config.primary;
  return apiKey => new GeminiProvider({ apiKey, model, baseUrl, timeout: timeoutMs, maxTokens, temperature });
}

export function createSecondaryProviderFactory(config: ChatRelayRuntimeConfig): LLMProviderFactory {
  const { model, baseUrl, timeoutMs, maxTokens, temperature } = config.secondary;
  return apiKey => new OpenAIProvider({ apiKey, model, baseUrl, timeout: timeoutMs, maxTokens, temperature });
}

export function createConversationController(
  config: ChatRelayRuntimeConfig,
  deps: ConversationDependencies = {}
): ConversationController {
  const createPrimaryProvider = deps.createPrimaryProvider ?? createPrimaryProviderFactory(config);
  const createSecondaryProvider = deps.createSecondaryProvider ?? createSecondaryProviderFactory(config);

  return new ConversationController(
    new SessionStateManager(deps.sessionRepository ?? new InMemorySessionRepository()),
    new CredentialGate(createPrimaryProvider, {
      ...config.credentials,
      primaryKeyLabel: 'Google API key',
      secondaryKeyLabel: 'OpenAI API key',
    }),
    new PrimaryChatClient(createPrimaryProvider, { safety: config.primary.chatSafety }),
    new SummarizationClient(createSecondaryProvider)
  );
}
