import type { AxiosInstance } from 'axios';
import type { ITTSService, SynthesizeOptions } from './types';
import { ProviderError } from '../errors';
import { createHttpClient, providerErrorFromAxios } from '../http';

const PROVIDER = 'elevenlabs';

export interface ElevenLabsTTSOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  voiceId: string;
  timeoutMs: number;
  http?: AxiosInstance;
}

export class ElevenLabsTTSService implements ITTSService {
  private http: AxiosInstance;

  constructor(private readonly options: ElevenLabsTTSOptions) {
    this.http = options.http ?? createHttpClient({ baseURL: options.baseUrl, timeout: options.timeoutMs });
  }

  async synthesize(text: string, options?: SynthesizeOptions): Promise<Buffer> {
    if (!text.trim()) {
      throw new ProviderError(PROVIDER, 'invalid_request', 'Nothing to synthesize');
    }
    if (!this.options.apiKey) {
      throw new ProviderError(PROVIDER, 'auth', 'ELEVENLABS_API_KEY is not configured');
    }

    const voiceId = options?.voiceId || this.options.voiceId;
    try {
      const response = await this.http.post<ArrayBuffer>(
        `/text-to-speech/${encodeURIComponent(voiceId)}`,
        { text, model_id: options?.model || this.options.model },
        {
          headers: { 'xi-api-key': this.options.apiKey, accept: 'audio/mpeg' },
          responseType: 'arraybuffer',
        }
      );
      return Buffer.from(response.data);
    } catch (error) {
      throw providerErrorFromAxios(PROVIDER, error, 'Text-to-speech');
    }
  }
}
