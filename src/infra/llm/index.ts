// Core types and interfaces
export type {
  ILLMProvider,
  LLMMessage,
  LLMResponse,
  LLMProviderConfig,
  LLMProviderFactory,
  LLMErrorKind,
  SafetyMode,
} from './llm-provider.js';

export { LLMProviderError, describeError } from './llm-provider.js';

// Provider implementations
export { OpenAIProvider, OPENAI_BASE_URL } from './providers.js';
export { GeminiProvider, GEMINI_BASE_URL, isGeminiAuthFailure } from './gemini-provider.js';
