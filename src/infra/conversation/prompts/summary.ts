/**
 * Conversation Summary Prompts
 */

/** Line prefix the model is asked to put in front of its sentiment label */
export const SENTIMENT_MARKER = 'Sentiment:';

export const CONVERSATION_PLACEHOLDER = '{conversation}';

export const SUMMARY_PROMPT_TEMPLATE = `Summarize this conversation in under 150 words.
Also provide one-word sentiment (Positive/Negative/Neutral).

Reply in exactly this format:
<summary text>
${SENTIMENT_MARKER} <Positive|Negative|Neutral>

Conversation:
${CONVERSATION_PLACEHOLDER}

Summary:`;

export function buildSummaryPrompt(conversation: string): string {
  return SUMMARY_PROMPT_TEMPLATE.replace(CONVERSATION_PLACEHOLDER, () => conversation);
}
