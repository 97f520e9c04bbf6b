/**
 * Speech-to-Text abstraction; interface allows pluggable backends.
 */

export interface TranscribeOptions {
  /** Content type reported by the client, e.g. "audio/webm;codecs=opus". */
  mimeType?: string;
  filename?: string;
}

export interface ISTTService {
  /** One-shot transcription of an uploaded clip. Rejects with UnsupportedFormatError or ProviderError. */
  transcribe(audio: Buffer, options?: TranscribeOptions): Promise<string>;
  supportedLanguages(): readonly string[];
}
