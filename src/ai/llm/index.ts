/**
 * Completion provider wiring. Groq is the only backend; the interface leaves room for others.
 */
import type { AppConfig } from '../../config';
import type { ILLMService } from './types';
import { GroqLLMService } from './GroqLLMService';

export function createLLMService(llm: AppConfig['llm']): ILLMService {
  return new GroqLLMService({
    apiKey: llm.groqApiKey,
    baseUrl: llm.baseUrl,
    temperature: llm.temperature,
    maxTokens: llm.maxTokens,
    timeoutMs: llm.timeoutMs,
  });
}

export { GroqLLMService } from './GroqLLMService';
export type { ILLMService, LLMMessage, LLMOptions, LLMResponse, LLMRole } from './types';
