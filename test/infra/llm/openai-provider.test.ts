import { OpenAIProvider, OPENAI_BASE_URL } from '../../../src/infra/llm/providers.js';
import { LLMProviderError } from '../../../src/infra/llm/llm-provider.js';

describe('OpenAIProvider', () => {
  const originalFetch = global.fetch;
  let mockFetch: jest.Mock;
  let provider: OpenAIProvider;

  beforeEach(() => {
    mockFetch = jest.fn();
    global.fetch = mockFetch;
    provider = new OpenAIProvider({
      apiKey: 'sk-test-secret',
      model: 'gpt-3.5-turbo',
      maxTokens: 400,
      temperature: 0.3,
    });
  });

  afterAll(() => {
    global.fetch = originalFetch;
  });

  it('sends a chat completion request with bearer auth', async () => {
    mockFetch.mockResolvedValue({
      ok: true,
      status: 200,
      json: async () => ({
        model: 'gpt-3.5-turbo-0125',
        choices: [{ message: { role: 'assistant', content: 'Summary\nSentiment: Neutral' }, finish_reason: 'stop' }],
        usage: { total_tokens: 42 },
      }),
    });

    const result = await provider.complete([{ role: 'user', content: 'Summarize' }]);

    expect(result).toEqual({
      content: 'Summary\nSentiment: Neutral',
      tokensUsed: 42,
      model: 'gpt-3.5-turbo-0125',
      finishReason: 'stop',
    });

    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe(`${OPENAI_BASE_URL}/chat/completions`);
    expect(init.headers.Authorization).toBe('Bearer sk-test-secret');
    expect(JSON.parse(init.body)).toEqual({
      model: 'gpt-3.5-turbo',
      messages: [{ role: 'user', content: 'Summarize' }],
      max_tokens: 400,
      temperature: 0.3,
    });
  });

  it.each([
    [401, 'auth'],
    [403, 'auth'],
    [429, 'rate-limit'],
    [500, 'response'],
  ])('classifies status %i as %s', async (status, kind) => {
    mockFetch.mockResolvedValue({
      ok: false,
      status,
      statusText: 'Error',
      json: async () => ({ error: { message: 'Incorrect API key provided' } }),
    });

    await expect(provider.complete([{ role: 'user', content: 'Hi' }])).rejects.toMatchObject({
      kind,
      status,
      message: 'OpenAI API error: Incorrect API key provided',
    });
  });

  it('rejects a reply without a message', async () => {
    mockFetch.mockResolvedValue({ ok: true, status: 200, json: async () => ({ choices: [] }) });

    await expect(provider.complete([{ role: 'user', content: 'Hi' }])).rejects.toThrow(LLMProviderError);
  });

  it('wraps network failures', async () => {
    mockFetch.mockRejectedValue(new Error('connect ECONNREFUSED'));

    await expect(provider.complete([{ role: 'user', content: 'Hi' }])).rejects.toMatchObject({
      kind: 'network',
      message: 'OpenAI request failed: connect ECONNREFUSED',
    });
  });
});
