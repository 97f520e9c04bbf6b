/**
 * Composition root: builds every provider and service from one frozen config.
 * Tests assemble AppServices from fakes instead.
 */
import type { AppConfig } from '../config';
import { createLLMService } from '../ai/llm';
import { createWeatherService, type IWeatherService } from '../ai/weather';
import { createSTTService, type ISTTService } from '../ai/stt';
import { createTTSService, type ITTSService } from '../ai/tts';
import { ChatOrchestrator, createToolCallParser, toCandidates } from './chat';
import { TranslationService } from './translation.service';

export interface AppServices {
  config: Readonly<AppConfig>;
  chat: ChatOrchestrator;
  weather: IWeatherService;
  stt: ISTTService;
  tts: ITTSService;
  translator: TranslationService;
}

export function createServices(config: Readonly<AppConfig>): AppServices {
  const weather = createWeatherService(config.weather);
  const chat = new ChatOrchestrator(
    {
      llm: createLLMService(config.llm),
      weather,
      toolCalls: createToolCallParser(config.weather.trigger),
    },
    {
      candidates: toCandidates(config.llm.models),
      defaultSystemPrompt: config.llm.systemPrompt,
      forceLanguage: config.llm.forceLanguage,
      weather: { enabled: config.weather.enabled, toolInstruction: config.weather.toolInstruction },
    }
  );

  return {
    config,
    chat,
    weather,
    stt: createSTTService(config.speech),
    tts: createTTSService(config.speech),
    translator: new TranslationService(chat),
  };
}
