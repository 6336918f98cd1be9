import type { ILLMProvider, LLMMessage, LLMResponse, LLMProviderConfig } from './llm-provider.js';
import { LLMProviderError, describeError, extractErrorMessage, isRecord } from './llm-provider.js';
import { debug } from '../../debug/index.js';

export const OPENAI_BASE_URL = 'https://api.openai.com/v1';

interface ParsedChoice {
  content: string;
  finishReason: 'stop' | 'length' | 'error';
}

function parseFirstChoice(data: unknown): ParsedChoice | null {
  if (!isRecord(data) || !Array.isArray(data.choices) || data.choices.length === 0) {
    return null;
  }

  const choice: unknown = data.choices[0];
  if (!isRecord(choice) || !isRecord(choice.message) || typeof choice.message.content !== 'string') {
    return null;
  }

  return {
    content: choice.message.content,
    finishReason: choice.finish_reason === 'stop' ? 'stop' :
                  choice.finish_reason === 'length' ? 'length' : 'error',
  };
}

function parseTotalTokens(data: unknown): number {
  if (isRecord(data) && isRecord(data.usage) && typeof data.usage.total_tokens === 'number') {
    return data.usage.total_tokens;
  }
  return 0;
}

export class OpenAIProvider implements ILLMProvider {
  constructor(private config: LLMProviderConfig) {
    if (!config.apiKey) {
      throw new Error('OpenAI API key is required');
    }
  }

  async complete(messages: LLMMessage[], options?: Partial<LLMProviderConfig>): Promise<LLMResponse> {
    const mergedConfig = { ...this.config, ...options };
    const baseUrl = mergedConfig.baseUrl || OPENAI_BASE_URL;

    debug.llmRequest(this.getName(), mergedConfig.model, messages.length);
    const startedAt = Date.now();

    let response: Response;
    try {
      response = await fetch(`${baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${mergedConfig.apiKey}`,
        },
        body: JSON.stringify({
          model: mergedConfig.model,
          messages: messages.map(m => ({
            role: m.role,
            content: m.content,
          })),
          max_tokens: mergedConfig.maxTokens || 4000,
          temperature: mergedConfig.temperature ?? 0.7,
        }),
        signal: AbortSignal.timeout(mergedConfig.timeout || 60000),
      });
    } catch (error) {
      const failure = new LLMProviderError(
        `OpenAI request failed: ${describeError(error)}`,
        'openai',
        'network',
        true
      );
      debug.llmError(this.getName(), failure.kind, failure.message);
      throw failure;
    }

    if (!response.ok) {
      const body: unknown = await response.json().catch(() => null);
      const kind = response.status === 401 || response.status === 403 ? 'auth' :
                   response.status === 429 ? 'rate-limit' : 'response';
      const failure = new LLMProviderError(
        `OpenAI API error: ${extractErrorMessage(body, response.statusText)}`,
        'openai',
        kind,
        response.status === 429,
        response.status
      );
      debug.llmError(this.getName(), failure.kind, failure.message);
      throw failure;
    }

    const data: unknown = await response.json().catch(() => null);
    const choice = parseFirstChoice(data);
    if (!choice) {
      const failure = new LLMProviderError('OpenAI returned a malformed response', 'openai', 'response', true);
      debug.llmError(this.getName(), failure.kind, failure.message);
      throw failure;
    }

    const tokensUsed = parseTotalTokens(data);
    debug.llmResponse(this.getName(), mergedConfig.model, tokensUsed, Date.now() - startedAt);

    return {
      content: choice.content,
      tokensUsed,
      model: isRecord(data) && typeof data.model === 'string' ? data.model : mergedConfig.model,
      finishReason: choice.finishReason,
    };
  }

  getName(): string {
    return `openai-${this.config.model}`;
  }
}
