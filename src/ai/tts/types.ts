/**
 * Text-to-Speech abstraction for spoken replies; interface allows pluggable backends.
 */

export interface SynthesizeOptions {
  voiceId?: string;
  model?: string;
}

export interface ITTSService {
  /** Resolves to MPEG audio. Rejects with ProviderError. */
  synthesize(text: string, options?: SynthesizeOptions): Promise<Buffer>;
}
