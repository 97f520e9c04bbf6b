import { z } from 'zod';
import type { ConversationHistory, ConversationTurn } from '../../types';
import type { LLMMessage } from '../../ai/llm';
import { HistoryValidationError } from './errors';

const turnSchema = z.object({
  role: z.enum(['user', 'assistant', 'system']),
  content: z.string(),
});

const historySchema = z.array(turnSchema);

/** Validates untrusted history; returns a fresh copy so later appends never touch the caller's array. */
export function parseHistory(input: unknown): ConversationTurn[] {
  if (input === undefined || input === null) return [];
  const parsed = historySchema.safeParse(input);
  if (!parsed.success) {
    throw new HistoryValidationError(
      parsed.error.issues.map((issue) => `${issue.path.length ? `[${issue.path.join('.')}] ` : ''}${issue.message}`)
    );
  }
  return parsed.data.map((turn) => ({ role: turn.role, content: turn.content }));
}

/** Parses the JSON-string form used by multipart endpoints. Empty means no history. */
export function parseHistoryField(raw: unknown): ConversationTurn[] {
  if (raw === undefined || raw === null || raw === '') return [];
  if (typeof raw !== 'string') return parseHistory(raw);
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch {
    throw new HistoryValidationError(['conversation_history is not valid JSON']);
  }
  return parseHistory(decoded);
}

export function buildMessages(systemPrompt: string, history: ConversationHistory, message: string): LLMMessage[] {
  const messages: LLMMessage[] = [];
  if (systemPrompt) messages.push({ role: 'system', content: systemPrompt });
  for (const turn of history) messages.push({ role: turn.role, content: turn.content });
  messages.push({ role: 'user', content: message });
  return messages;
}

/** History as the client should send it next time: prior turns + this exchange, newest `limit` kept. */
export function appendExchange(
  history: ConversationHistory,
  message: string,
  reply: string,
  limit: number
): ConversationTurn[] {
  const updated: ConversationTurn[] = [
    ...history,
    { role: 'user', content: message },
    { role: 'assistant', content: reply },
  ];
  return updated.length > limit ? updated.slice(updated.length - limit) : updated;
}
