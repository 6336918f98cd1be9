import { createConversationController } from '../../../src/app/conversation/create-conversation.js';
import type { ConversationController } from '../../../src/app/conversation/conversation-controller.js';
import { DEFAULT_RUNTIME_CONFIG } from '../../../src/infra/config/runtime-config.js';
import { InMemorySessionRepository } from '../../../src/infra/conversation/session-repository.js';
import {
  CredentialRejectedError,
  SessionPreconditionError,
} from '../../../src/domain/conversation/errors.js';
import { LLMProviderError } from '../../../src/infra/llm/llm-provider.js';
import { ScriptedProvider } from '../../helpers/scripted-provider.js';

describe('ConversationController', () => {
  let primary: ScriptedProvider;
  let secondary: ScriptedProvider;
  let repository: InMemorySessionRepository;
  let controller: ConversationController;

  beforeEach(() => {
    primary = new ScriptedProvider();
    secondary = new ScriptedProvider();
    repository = new InMemorySessionRepository();
    controller = createConversationController(DEFAULT_RUNTIME_CONFIG, {
      createPrimaryProvider: primary.factory(),
      createSecondaryProvider: secondary.factory(),
      sessionRepository: repository,
    });
  });

  it('opens a locked, empty session and never clobbers it on reopen', async () => {
    expect(controller.openSession('s1')).toEqual({
      id: 's1',
      phase: 'locked',
      credentialsProvided: false,
      ended: false,
      history: [],
    });

    primary.reply('ok').reply('Hi there!');
    await controller.submitCredentials('s1', 'AIza_valid', 'sk-valid');
    await controller.sendMessage('s1', 'Hello');

    const reopened = controller.openSession('s1');
    expect(reopened.phase).toBe('chatting');
    expect(reopened.history).toHaveLength(2);
  });

  it('runs a full conversation from credentials to summary', async () => {
    primary.reply('ok').reply('Hi there!');
    secondary.reply('The user greeted the assistant.\nSentiment: Positive');

    const unlocked = await controller.submitCredentials('s1', 'AIza_valid', 'sk-valid');
    expect(unlocked).toEqual({ success: true, value: undefined });

    const sent = await controller.sendMessage('s1', 'Hello');
    expect(sent.success).toBe(true);
    expect(controller.getView('s1').history.map(m => [m.role, m.content])).toEqual([
      ['user', 'Hello'],
      ['assistant', 'Hi there!'],
    ]);

    const ended = controller.endConversation('s1');
    expect(ended.success).toBe(true);
    if (ended.success) {
      expect(ended.value.phase).toBe('ended');
    }

    const summary = await controller.summarize('s1');
    expect(summary).toEqual({
      success: true,
      value: {
        summaryText: 'The user greeted the assistant.',
        sentiment: 'Positive',
        sentimentLabel: 'Positive',
      },
    });
    expect(secondary.calls.map(call => call.apiKey)).toEqual(['sk-valid']);
  });

  it('keeps the session locked when the probe is rejected and refuses chat without a remote call', async () => {
    primary.failWith(new LLMProviderError('Gemini API error: API key not valid', 'gemini', 'auth', false, 400));

    const outcome = await controller.submitCredentials('s1', 'AIza_bad', 'sk-valid');
    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.error).toBeInstanceOf(CredentialRejectedError);
      expect(outcome.error.message).toBe('API key verification failed: Gemini API error: API key not valid');
    }

    const sent = await controller.sendMessage('s1', 'Hello');
    expect(sent.success).toBe(false);
    if (!sent.success && sent.error instanceof SessionPreconditionError) {
      expect(sent.error.reason).toBe('locked');
    } else {
      throw new Error('expected SessionPreconditionError');
    }
    expect(primary.calls).toHaveLength(1);
    expect(controller.getView('s1').history).toHaveLength(0);
  });

  it('starts a new conversation with cleared history and the same keys', async () => {
    primary.reply('ok').reply('first reply').reply('second reply');
    await controller.submitCredentials('s1', 'AIza_valid', 'sk-valid');
    await controller.sendMessage('s1', 'first');
    controller.endConversation('s1');

    const fresh = controller.startNew('s1');
    expect(fresh).toEqual({
      success: true,
      value: { id: 's1', phase: 'chatting', credentialsProvided: true, ended: false, history: [] },
    });

    await controller.sendMessage('s1', 'second');
    expect(primary.calls.map(call => call.apiKey)).toEqual(['AIza_valid', 'AIza_valid', 'AIza_valid']);
    expect(controller.getView('s1').history.map(m => m.content)).toEqual(['second', 'second reply']);
  });

  it('never exposes keys through the session view', async () => {
    primary.reply('ok');
    await controller.submitCredentials('s1', 'AIza_valid', 'sk-valid');

    const view = controller.getView('s1');
    expect(Object.keys(view).sort()).toEqual(['credentialsProvided', 'ended', 'history', 'id', 'phase']);
    expect(repository.getSession('s1')?.primaryApiKey).toBe('AIza_valid');
  });

  it('refuses to end a locked session', () => {
    controller.openSession('s1');

    const outcome = controller.endConversation('s1');

    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.error.reason).toBe('locked');
    }
  });

  it('refuses to end a session twice', async () => {
    primary.reply('ok');
    await controller.submitCredentials('s1', 'AIza_valid', 'sk-valid');
    controller.endConversation('s1');

    const outcome = controller.endConversation('s1');

    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.error.reason).toBe('ended');
    }
  });

  it('rejects a second intent for a session while one is in flight', async () => {
    primary.reply('ok');
    await controller.submitCredentials('s1', 'AIza_valid', 'sk-valid');
    primary.reply('slow reply');

    const first = controller.sendMessage('s1', 'Hello');
    expect(controller.isBusy('s1')).toBe(true);

    const second = await controller.sendMessage('s1', 'Again');
    expect(second.success).toBe(false);
    if (!second.success && second.error instanceof SessionPreconditionError) {
      expect(second.error.reason).toBe('busy');
    } else {
      throw new Error('expected SessionPreconditionError');
    }

    const ending = controller.endConversation('s1');
    expect(ending.success).toBe(false);

    expect((await first).success).toBe(true);
    expect(controller.isBusy('s1')).toBe(false);
    expect(controller.getView('s1').history.map(m => m.content)).toEqual(['Hello', 'slow reply']);
  });

  it('keeps sessions independent', async () => {
    primary.reply('ok');
    await controller.submitCredentials('s1', 'AIza_valid', 'sk-valid');

    expect(controller.getView('s1').phase).toBe('chatting');
    expect(controller.getView('s2').phase).toBe('locked');
  });
});
