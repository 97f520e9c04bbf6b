/**
 * Assistant prompt templates. The system turn is composed as:
 * base prompt (request override or configured default) + reply-language rule + weather tool rule.
 */
import type { TargetLanguage } from '../../types';

export const LANGUAGE_NAMES: Readonly<Record<TargetLanguage, string>> = {
  en: 'English',
  ja: 'Japanese',
};

export const SYSTEM_PROMPT_TRANSLATOR = `You are a professional translator. Translate the user's text into {{language}}.
Preserve meaning, tone and formatting. Reply with only the translation: no notes, no quotes, no transliteration.`;

export function buildLanguageInstruction(language: string): string {
  return `Always reply in ${language}, whatever language the user writes in.`;
}

export function buildSystemPrompt(
  base: string,
  options: { forceLanguage?: string | null; weatherInstruction?: string | null }
): string {
  const parts = [base.trim()];
  if (options.forceLanguage) parts.push(buildLanguageInstruction(options.forceLanguage));
  if (options.weatherInstruction) parts.push(options.weatherInstruction.trim());
  return parts.filter(Boolean).join('\n\n');
}

export function buildWeatherToolContent(requestedLocation: string, summary: string): string {
  return `Weather lookup result for "${requestedLocation}": ${summary}\nUse this data to answer the user's last message.`;
}

export function buildTranslatorPrompt(target: TargetLanguage): string {
  return SYSTEM_PROMPT_TRANSLATOR.replace('{{language}}', LANGUAGE_NAMES[target]);
}
