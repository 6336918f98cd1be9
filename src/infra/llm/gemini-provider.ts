import type { ILLMProvider, LLMMessage, LLMResponse, LLMProviderConfig, SafetyMode } from './llm-provider.js';
import { LLMProviderError, describeError, extractErrorMessage, isRecord } from './llm-provider.js';
import { debug } from '../../debug/index.js';

export const GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';

const RELAXED_SAFETY_SETTINGS = [
  { category: 'HARM_CATEGORY_HARASSMENT', threshold: 'BLOCK_NONE' },
];

function safetySettingsFor(mode: SafetyMode | undefined): typeof RELAXED_SAFETY_SETTINGS | undefined {
  return mode === 'relaxed' ? RELAXED_SAFETY_SETTINGS : undefined;
}

/**
 * Google AI Studio rejects bad keys with 400 INVALID_ARGUMENT and an
 * `API_KEY_INVALID` reason; revoked or restricted keys come back as 401/403.
 */
export function isGeminiAuthFailure(status: number, body: unknown): boolean {
  if (status === 401 || status === 403) {
    return true;
  }
  if (status !== 400 || !isRecord(body) || !isRecord(body.error)) {
    return false;
  }

  const details = body.error.details;
  if (Array.isArray(details)) {
    for (const detail of details) {
      if (isRecord(detail) && detail.reason === 'API_KEY_INVALID') {
        return true;
      }
    }
  }

  const message = body.error.message;
  return typeof message === 'string' && /api key not valid|invalid api key/i.test(message);
}

function extractText(data: unknown): string {
  if (!isRecord(data) || !Array.isArray(data.candidates) || data.candidates.length === 0) {
    return '';
  }

  const first: unknown = data.candidates[0];
  if (!isRecord(first) || !isRecord(first.content) || !Array.isArray(first.content.parts)) {
    return '';
  }

  const textParts: string[] = [];
  for (const part of first.content.parts) {
    if (isRecord(part) && typeof part.text === 'string') {
      textParts.push(part.text);
    }
  }
  return textParts.join('');
}

function extractBlockReason(data: unknown): string | undefined {
  if (isRecord(data) && isRecord(data.promptFeedback) && typeof data.promptFeedback.blockReason === 'string') {
    return data.promptFeedback.blockReason;
  }
  return undefined;
}

function extractTokenCount(data: unknown): number {
  if (!isRecord(data) || !isRecord(data.usageMetadata)) {
    return 0;
  }
  const usage = data.usageMetadata;
  const prompt = typeof usage.promptTokenCount === 'number' ? usage.promptTokenCount : 0;
  const candidates = typeof usage.candidatesTokenCount === 'number' ? usage.candidatesTokenCount : 0;
  return prompt + candidates;
}

function extractFinishReason(data: unknown): string | undefined {
  if (!isRecord(data) || !Array.isArray(data.candidates)) {
    return undefined;
  }
  const first: unknown = data.candidates[0];
  return isRecord(first) && typeof first.finishReason === 'string' ? first.finishReason : undefined;
}

/**
 * Google AI Studio (Gemini) Provider
 * Uses the generativelanguage.googleapis.com API (not Cloud Vertex AI)
 */
export class GeminiProvider implements ILLMProvider {
  constructor(private config: LLMProviderConfig) {
    if (!config.apiKey) {
      throw new Error('Gemini API key is required');
    }
  }

  async complete(messages: LLMMessage[], options?: Partial<LLMProviderConfig>): Promise<LLMResponse> {
    const mergedConfig = { ...this.config, ...options };
    const model = mergedConfig.model || 'gemini-2.0-flash';
    const baseUrl = mergedConfig.baseUrl || GEMINI_BASE_URL;

    const systemMessage = messages.find(m => m.role === 'system');
    const conversationMessages = messages.filter(m => m.role !== 'system');

    const contents = conversationMessages.map(m => ({
      role: m.role === 'assistant' ? 'model' : 'user',
      parts: [{ text: m.content }],
    }));

    const systemInstruction = systemMessage
      ? { parts: [{ text: systemMessage.content }] }
      : undefined;

    debug.llmRequest(this.getName(), model, conversationMessages.length);
    const startedAt = Date.now();

    let response: Response;
    try {
      response = await fetch(
        `${baseUrl}/models/${model}:generateContent`,
        {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            'x-goog-api-key': mergedConfig.apiKey,
          },
          body: JSON.stringify({
            contents,
            systemInstruction,
            safetySettings: safetySettingsFor(mergedConfig.safety),
            generationConfig: {
              maxOutputTokens: mergedConfig.maxTokens || 4000,
              temperature: mergedConfig.temperature ?? 0.7,
            },
          }),
          signal: AbortSignal.timeout(mergedConfig.timeout || 60000),
        }
      );
    } catch (error) {
      const failure = new LLMProviderError(
        `Gemini request failed: ${describeError(error)}`,
        'gemini',
        'network',
        true
      );
      debug.llmError(this.getName(), failure.kind, failure.message);
      throw failure;
    }

    if (!response.ok) {
      const body: unknown = await response.json().catch(() => null);
      const authFailure = isGeminiAuthFailure(response.status, body);
      const failure = new LLMProviderError(
        `Gemini API error: ${extractErrorMessage(body, response.statusText)}`,
        'gemini',
        authFailure ? 'auth' : response.status === 429 ? 'rate-limit' : 'response',
        response.status === 429,
        response.status
      );
      debug.llmError(this.getName(), failure.kind, failure.message);
      throw failure;
    }

    const data: unknown = await response.json().catch(() => null);
    const content = extractText(data);

    if (!content) {
      const blockReason = extractBlockReason(data);
      const failure = blockReason
        ? new LLMProviderError(`Gemini blocked request: ${blockReason}`, 'gemini', 'blocked', false)
        : new LLMProviderError('Gemini returned an empty response', 'gemini', 'response', true);
      debug.llmError(this.getName(), failure.kind, failure.message);
      throw failure;
    }

    const tokensUsed = extractTokenCount(data);
    debug.llmResponse(this.getName(), model, tokensUsed, Date.now() - startedAt);

    return {
      content,
      tokensUsed,
      model,
      finishReason: this.mapFinishReason(extractFinishReason(data)),
    };
  }

  getName(): string {
    return `gemini-${this.config.model}`;
  }

  private mapFinishReason(reason?: string): 'stop' | 'length' | 'error' {
    switch (reason) {
      case 'STOP':
        return 'stop';
      case 'MAX_TOKENS':
        return 'length';
      case 'SAFETY':
      case 'RECITATION':
      case 'OTHER':
      default:
        return reason ? 'error' : 'stop';
    }
  }
}
