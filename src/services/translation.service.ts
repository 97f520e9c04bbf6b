import type { CompletionResult, TargetLanguage } from '../types';
import { buildTranslatorPrompt } from '../ai/prompts/templates';
import type { ChatOrchestrator } from './chat';

/**
 * English/Japanese translation. Reuses the orchestrator's completion round so the
 * same fallback list applies; no history and no weather tool.
 */
export class TranslationService {
  constructor(private readonly chat: Pick<ChatOrchestrator, 'complete'>) {}

  async translate(text: string, target: TargetLanguage): Promise<CompletionResult> {
    const result = await this.chat.complete([
      { role: 'system', content: buildTranslatorPrompt(target) },
      { role: 'user', content: text },
    ]);
    return { text: result.text.trim(), modelUsed: result.modelUsed };
  }
}
