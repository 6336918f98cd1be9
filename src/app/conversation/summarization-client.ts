/**
 * Summarization Client
 * Turns an ended conversation into a short summary and a sentiment label
 */

import type { IChatMessage, IChatSession, ISummaryResult, Sentiment } from '../../domain/conversation/session.js';
import type { Outcome, SummarizeError } from '../../domain/conversation/errors.js';
import { SessionPreconditionError, SummaryError, fail, succeed } from '../../domain/conversation/errors.js';
import type { LLMProviderFactory } from '../../infra/llm/llm-provider.js';
import { describeError } from '../../infra/llm/llm-provider.js';
import { SENTIMENT_MARKER, buildSummaryPrompt } from '../../infra/conversation/prompts/summary.js';
import { debug } from '../../debug/index.js';

export const EMPTY_HISTORY_SUMMARY: Readonly<ISummaryResult> = Object.freeze({
  summaryText: 'No conversation to summarize',
  sentiment: 'Neutral',
  sentimentLabel: 'Neutral',
});

/**
 * One `"<role>: <content>"` line per message, oldest first.
 */
export function serializeHistory(history: readonly IChatMessage[]): string {
  return history.map(message => `${message.role}: ${message.content}`).join('\n');
}

/**
 * Case-sensitive containment check, Positive before Negative.
 */
export function normalizeSentiment(label: string): Sentiment {
  if (label.includes('Positive')) {
    return 'Positive';
  }
  if (label.includes('Negative')) {
    return 'Negative';
  }
  return 'Neutral';
}

/**
 * Split a raw model reply at the last sentiment marker.
 * Without a marker the whole reply is the summary and the sentiment is Neutral.
 */
export function parseSummaryResponse(raw: string): ISummaryResult {
  const markerIndex = raw.lastIndexOf(SENTIMENT_MARKER);
  if (markerIndex === -1) {
    return { summaryText: raw.trim(), sentiment: 'Neutral', sentimentLabel: 'Neutral' };
  }

  const summaryText = raw.slice(0, markerIndex).trim();
  const label = raw.slice(markerIndex + SENTIMENT_MARKER.length).trim();

  return {
    summaryText,
    sentiment: normalizeSentiment(label),
    sentimentLabel: label || 'Neutral',
  };
}

export class SummarizationClient {
  constructor(private createSecondaryProvider: LLMProviderFactory) {}

  async summarize(session: IChatSession): Promise<Outcome<ISummaryResult, SummarizeError>> {
    if (!session.ended) {
      return fail(new SessionPreconditionError('not-ended'));
    }

    if (session.history.length === 0) {
      return succeed({ ...EMPTY_HISTORY_SUMMARY });
    }

    if (!session.secondaryApiKey) {
      const missing = new SummaryError('No secondary API key for this session');
      debug.summaryFailed(session.id, missing.remoteMessage);
      return fail(missing);
    }

    const prompt = buildSummaryPrompt(serializeHistory(session.history));
    debug.summaryRequest(session.id, session.history.length, prompt.length);

    let raw: string;
    try {
      const provider = this.createSecondaryProvider(session.secondaryApiKey);
      const response = await provider.complete([{ role: 'user', content: prompt }]);
      raw = response.content;
    } catch (error) {
      const failure = new SummaryError(describeError(error));
      debug.summaryFailed(session.id, failure.remoteMessage);
      return fail(failure);
    }

    const result = parseSummaryResponse(raw);
    debug.summaryComplete(session.id, result.sentiment, result.summaryText.length);
    return succeed(result);
  }
}
