import type { AxiosInstance } from 'axios';
import type { ISTTService, TranscribeOptions } from './types';
import { ProviderError, UnsupportedFormatError } from '../errors';
import { createHttpClient, providerErrorFromAxios } from '../http';

const PROVIDER = 'elevenlabs';

const SUPPORTED_LANGUAGES = [
  'en', 'es', 'fr', 'de', 'it', 'pt', 'pl', 'nl',
  'hi', 'ja', 'zh', 'ko', 'ar', 'ru', 'tr', 'sv',
  'id', 'fil', 'uk', 'cs', 'el', 'fi', 'hr', 'ms',
  'ro', 'sk', 'bg', 'bn', 'ta', 'te',
] as const;

interface ScribeResponse {
  text?: string;
  transcription?: string;
}

/** Strips parameters: "audio/webm;codecs=opus" -> "audio/webm". */
export function baseMimeType(mimeType: string | undefined): string {
  return (mimeType ?? '').split(';')[0].trim().toLowerCase();
}

export function isSupportedAudioType(mimeType: string | undefined): boolean {
  const base = baseMimeType(mimeType);
  return base === '' || base.startsWith('audio/') || base === 'video/webm' || base === 'application/octet-stream';
}

export interface ElevenLabsSTTOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
  http?: AxiosInstance;
}

/**
 * ElevenLabs Scribe speech-to-text. The upload keeps the client's filename and
 * content type so the provider can sniff the container.
 */
export class ElevenLabsSTTService implements ISTTService {
  private http: AxiosInstance;

  constructor(private readonly options: ElevenLabsSTTOptions) {
    this.http = options.http ?? createHttpClient({ baseURL: options.baseUrl, timeout: options.timeoutMs });
  }

  supportedLanguages(): readonly string[] {
    return SUPPORTED_LANGUAGES;
  }

  async transcribe(audio: Buffer, options?: TranscribeOptions): Promise<string> {
    if (!isSupportedAudioType(options?.mimeType)) {
      throw new UnsupportedFormatError(baseMimeType(options?.mimeType));
    }
    if (!audio.length) {
      throw new ProviderError(PROVIDER, 'invalid_request', 'Empty audio payload');
    }
    if (!this.options.apiKey) {
      throw new ProviderError(PROVIDER, 'auth', 'ELEVENLABS_API_KEY is not configured');
    }

    const form = new FormData();
    form.append(
      'file',
      new Blob([new Uint8Array(audio)], { type: baseMimeType(options?.mimeType) || 'audio/webm' }),
      options?.filename || 'recording.webm'
    );
    form.append('model_id', this.options.model);

    let data: ScribeResponse;
    try {
      const response = await this.http.post<ScribeResponse>('/speech-to-text', form, {
        headers: { 'xi-api-key': this.options.apiKey, accept: 'application/json' },
      });
      data = response.data;
    } catch (error) {
      throw providerErrorFromAxios(PROVIDER, error, 'Speech-to-text');
    }

    const text = (data.text || data.transcription || '').trim();
    if (!text) {
      throw new ProviderError(PROVIDER, 'unavailable', 'Speech-to-text returned no text');
    }
    return text;
  }
}
