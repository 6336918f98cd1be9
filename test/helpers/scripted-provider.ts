import type {
  ILLMProvider,
  LLMMessage,
  LLMProviderConfig,
  LLMProviderFactory,
  LLMResponse,
} from '../../src/infra/llm/llm-provider.js';

export interface RecordedCall {
  apiKey: string;
  messages: LLMMessage[];
  options?: Partial<LLMProviderConfig>;
}

type ScriptStep = { reply: string } | { error: Error };

/**
 * In-process stand-in for a completion API: plays back scripted replies or
 * errors in order and records every call it receives.
 */
export class ScriptedProvider {
  readonly calls: RecordedCall[] = [];
  private steps: ScriptStep[] = [];

  reply(text: string): this {
    this.steps.push({ reply: text });
    return this;
  }

  failWith(error: Error): this {
    this.steps.push({ error });
    return this;
  }

  factory(): LLMProviderFactory {
    return (apiKey: string): ILLMProvider => ({
      complete: async (messages: LLMMessage[], options?: Partial<LLMProviderConfig>): Promise<LLMResponse> => {
        this.calls.push({ apiKey, messages, options });
        const step = this.steps.shift();
        if (!step) {
          throw new Error('ScriptedProvider: no scripted response left');
        }
        if ('error' in step) {
          throw step.error;
        }
        return { content: step.reply, tokensUsed: 0, model: 'scripted', finishReason: 'stop' };
      },
      getName: () => 'scripted',
    });
  }
}
