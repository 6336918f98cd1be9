jest.mock('chalk', () => {
  const chalk = {
    cyan: (value: string) => value,
    green: (value: string) => value,
    blue: (value: string) => value,
    red: (value: string) => value,
    gray: (value: string) => value,
  };

  return {
    __esModule: true,
    default: chalk,
    ...chalk,
  };
});

import {
  formatDebugEvent,
  formatError,
  formatHistory,
  formatMessage,
  formatSummary,
  sentimentEmoji,
} from '../../src/cli/lib/formatters.js';
import { createMessage } from '../../src/domain/conversation/session.js';
import {
  AuthError,
  MissingCredentialError,
  SummaryError,
  TransientRemoteError,
} from '../../src/domain/conversation/errors.js';

describe('formatters', () => {
  test('labels each speaker', () => {
    expect(formatHistory([createMessage('user', 'Hello'), createMessage('assistant', 'Hi there!')])).toBe(
      'You: Hello\nAssistant: Hi there!'
    );
    expect(formatMessage(createMessage('assistant', ''))).toBe('Assistant: ');
  });

  test.each([
    ['Positive', '😊'],
    ['Negative', '😞'],
    ['Neutral', '😐'],
    ['Mixed', '😐'],
  ])('maps %s to %s', (label, emoji) => {
    expect(sentimentEmoji(label)).toBe(emoji);
  });

  test('renders the summary block', () => {
    const output = formatSummary({
      summaryText: 'The user asked about the weather.',
      sentiment: 'Negative',
      sentimentLabel: 'Negative',
    });

    expect(output.split('\n')).toEqual([
      '📝 Conversation Summary',
      'The user asked about the weather.',
      '',
      '😊 Sentiment Analysis',
      '😞 Negative',
    ]);
  });

  test('adds a recovery hint to retryable chat errors', () => {
    expect(formatError(new AuthError('API key expired'))).toBe(
      '✗ Invalid API key. Please check your key and try again. Re-enter your API keys to continue.'
    );
    expect(formatError(new TransientRemoteError('timeout'))).toBe(
      '✗ Error getting response: timeout Send your message again to retry.'
    );
    expect(formatError(new MissingCredentialError())).toBe('✗ Please provide both API keys');
    expect(formatError(new SummaryError('quota'))).toBe('✗ Error generating summary: quota');
  });

  test('prints debug events on one line', () => {
    expect(formatDebugEvent({
      id: 'evt-1',
      timestamp: Date.UTC(2024, 0, 2, 3, 4, 5),
      type: 'session.ended',
      source: 'conversation-controller',
      data: { messageCount: 2 },
    })).toBe('[debug] 2024-01-02T03:04:05.000Z session.ended (conversation-controller) {"messageCount":2}');
  });
});
