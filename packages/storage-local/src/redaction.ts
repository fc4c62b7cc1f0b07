export interface LoggedMessage {
  role: string;
  content: string;
}

export interface ConversationSummary {
  count: number;
  /** Role and a one-line preview of the newest message, or null for an empty history. */
  latest: string | null;
}

export function previewText(value: string, maxChars = 120): string {
  const single = value.replace(/\s+/g, ' ').trim();
  if (single.length <= maxChars) return single;
  return `${single.slice(0, maxChars)}...`;
}

/**
 * Log view of a conversation sent to the chat service. Full message text stays out of the
 * console; only the count and a short preview of the newest message are kept.
 */
export function summarizeConversation(messages: readonly LoggedMessage[], maxChars = 40): ConversationSummary {
  const latest = messages[messages.length - 1];
  return {
    count: messages.length,
    latest: latest ? `${latest.role}: ${previewText(latest.content, maxChars)}` : null,
  };
}
