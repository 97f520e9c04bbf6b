import type { AppConfig } from '../../config';
import type { ITTSService } from './types';
import { ElevenLabsTTSService } from './ElevenLabsTTSService';

export function createTTSService(speech: AppConfig['speech']): ITTSService {
  return new ElevenLabsTTSService({
    apiKey: speech.elevenLabsApiKey,
    baseUrl: speech.baseUrl,
    model: speech.ttsModel,
    voiceId: speech.voiceId,
    timeoutMs: speech.timeoutMs,
  });
}

export { ElevenLabsTTSService } from './ElevenLabsTTSService';
export type { ITTSService, SynthesizeOptions } from './types';
