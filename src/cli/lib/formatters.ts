/**
 * Terminal formatting for the chat front end
 */

import chalk from 'chalk';
import type { IChatMessage, ISummaryResult } from '../../domain/conversation/session.js';
import type { ChatRelayError } from '../../domain/conversation/errors.js';
import type { DebugEvent } from '../../debug/types.js';

export function formatMessage(message: IChatMessage): string {
  const speaker = message.role === 'user' ? chalk.green('You:') : chalk.blue('Assistant:');
  return `${speaker} ${message.content}`;
}

export function formatHistory(history: readonly IChatMessage[]): string {
  return history.map(formatMessage).join('\n');
}

/**
 * Emoji for the raw sentiment label, matched the same way the label is normalized.
 */
export function sentimentEmoji(label: string): string {
  if (label.includes('Positive')) return '😊';
  if (label.includes('Negative')) return '😞';
  return '😐';
}

export function formatSummary(result: ISummaryResult): string {
  return [
    chalk.cyan('📝 Conversation Summary'),
    result.summaryText,
    '',
    chalk.cyan('😊 Sentiment Analysis'),
    `${sentimentEmoji(result.sentimentLabel)} ${result.sentimentLabel}`,
  ].join('\n');
}

const ERROR_HINTS: Partial<Record<ChatRelayError['code'], string>> = {
  AuthError: 'Re-enter your API keys to continue.',
  TransientRemoteError: 'Send your message again to retry.',
};

export function formatError(error: ChatRelayError): string {
  const hint = ERROR_HINTS[error.code];
  return hint ? `✗ ${error.message} ${hint}` : `✗ ${error.message}`;
}

export function formatDebugEvent(event: DebugEvent): string {
  const time = new Date(event.timestamp).toISOString();
  return `[debug] ${time} ${event.type} (${event.source}) ${JSON.stringify(event.data)}`;
}
