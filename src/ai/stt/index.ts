import type { AppConfig } from '../../config';
import type { ISTTService } from './types';
import { ElevenLabsSTTService } from './ElevenLabsSTTService';

export function createSTTService(speech: AppConfig['speech']): ISTTService {
  return new ElevenLabsSTTService({
    apiKey: speech.elevenLabsApiKey,
    baseUrl: speech.baseUrl,
    model: speech.sttModel,
    timeoutMs: speech.timeoutMs,
  });
}

export { ElevenLabsSTTService, isSupportedAudioType } from './ElevenLabsSTTService';
export type { ISTTService, TranscribeOptions } from './types';
