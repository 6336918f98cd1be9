export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMResponse {
  content: string;
  tokensUsed: number;
  model: string;
  finishReason: 'stop' | 'length' | 'error';
}

/**
 * Safety filter strictness for providers that support it.
 * `relaxed` turns the harassment filter off, as the credential probe does.
 */
export type SafetyMode = 'default' | 'relaxed';

export interface LLMProviderConfig {
  apiKey: string;
  model: string;
  baseUrl?: string;
  maxTokens?: number;
  temperature?: number;
  timeout?: number;
  safety?: SafetyMode;
}

export interface ILLMProvider {
  complete(messages: LLMMessage[], options?: Partial<LLMProviderConfig>): Promise<LLMResponse>;
  getName(): string;
}

/** Builds a provider bound to a single API key */
export type LLMProviderFactory = (apiKey: string) => ILLMProvider;

/**
 * Why a provider call failed.
 * `auth` means the remote service rejected the key itself.
 */
export type LLMErrorKind = 'auth' | 'rate-limit' | 'blocked' | 'network' | 'response';

export class LLMProviderError extends Error {
  constructor(
    message: string,
    public provider: string,
    public kind: LLMErrorKind,
    public recoverable: boolean = true,
    public status?: number
  ) {
    super(message);
    this.name = 'LLMProviderError';
  }

  get isAuthError(): boolean {
    return this.kind === 'auth';
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pull `error.message` out of a JSON error body, falling back to the status text.
 */
export function extractErrorMessage(body: unknown, fallback: string): string {
  if (isRecord(body) && isRecord(body.error) && typeof body.error.message === 'string') {
    return body.error.message;
  }
  return fallback;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
