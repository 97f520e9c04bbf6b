/**
 * LLM abstraction: provider-agnostic completion interface. The model is chosen per
 * call so the chat orchestrator can walk its fallback list against one client.
 */

/** 'tool' carries data injected by the gateway (e.g. a weather lookup), not text the user typed. */
export type LLMRole = 'system' | 'user' | 'assistant' | 'tool';

export interface LLMMessage {
  role: LLMRole;
  content: string;
}

export interface LLMOptions {
  temperature?: number;
  maxTokens?: number;
  /** Timeout in ms; expiry rejects with a transient ProviderError. */
  timeoutMs?: number;
}

export interface LLMResponse {
  content: string;
  model: string;
  usage?: { promptTokens: number; completionTokens: number };
}

export interface ILLMService {
  readonly provider: string;
  /** Rejects with ProviderError; never retries internally. */
  chat(messages: readonly LLMMessage[], model: string, options?: LLMOptions): Promise<LLMResponse>;
}
