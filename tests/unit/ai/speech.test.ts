import { describe, it, expect } from 'vitest';
import { ElevenLabsSTTService, isSupportedAudioType } from '../../../src/ai/stt';
import { ElevenLabsTTSService } from '../../../src/ai/tts';
import { ProviderError, UnsupportedFormatError } from '../../../src/ai/errors';
import { fakeHttp, type AdapterHandler } from '../../helpers/fakes';

function stt(handler: AdapterHandler, apiKey = 'test-key') {
  const fake = fakeHttp(handler);
  const service = new ElevenLabsSTTService({
    apiKey,
    baseUrl: 'https://elevenlabs.invalid/v1',
    model: 'scribe_v1',
    timeoutMs: 1000,
    http: fake.http,
  });
  return { service, requests: fake.requests };
}

function tts(handler: AdapterHandler) {
  const fake = fakeHttp(handler);
  const service = new ElevenLabsTTSService({
    apiKey: 'test-key',
    baseUrl: 'https://elevenlabs.invalid/v1',
    model: 'eleven_multilingual_v2',
    voiceId: 'default-voice',
    timeoutMs: 1000,
    http: fake.http,
  });
  return { service, requests: fake.requests };
}

describe('isSupportedAudioType', () => {
  it.each([
    ['audio/webm', true],
    ['audio/webm;codecs=opus', true],
    ['AUDIO/MPEG', true],
    ['video/webm', true],
    ['application/octet-stream', true],
    ['', true],
    ['text/plain', false],
    ['image/png', false],
  ])('%s -> %s', (mime, expected) => {
    expect(isSupportedAudioType(mime)).toBe(expected);
  });
});

describe('ElevenLabsSTTService', () => {
  it('uploads the clip with its name and type and returns trimmed text', async () => {
    const { service, requests } = stt(() => ({ status: 200, data: { text: ' hello world ' } }));
    const text = await service.transcribe(Buffer.from('OggS-audio'), { mimeType: 'audio/ogg', filename: 'clip.ogg' });

    expect(text).toBe('hello world');
    const [request] = requests;
    expect(request.url).toBe('/speech-to-text');
    expect(request.method).toBe('post');
    expect(request.headers.get('xi-api-key')).toBe('test-key');

    const form: unknown = request.data;
    expect(form).toBeInstanceOf(FormData);
    if (!(form instanceof FormData)) return;
    expect(form.get('model_id')).toBe('scribe_v1');
    const file = form.get('file');
    expect(typeof file).not.toBe('string');
    if (file === null || typeof file === 'string') return;
    expect(file.name).toBe('clip.ogg');
    expect(file.type).toBe('audio/ogg');
    expect(file.size).toBe(10);
  });

  it('falls back to the transcription field', async () => {
    const { service } = stt(() => ({ status: 200, data: { transcription: 'from the other field' } }));
    await expect(service.transcribe(Buffer.from('a'), { mimeType: 'audio/webm' })).resolves.toBe('from the other field');
  });

  it('rejects non-audio uploads before calling out', async () => {
    const { service, requests } = stt(() => ({ status: 200, data: { text: 'x' } }));
    await expect(service.transcribe(Buffer.from('a'), { mimeType: 'text/plain' })).rejects.toBeInstanceOf(
      UnsupportedFormatError
    );
    expect(requests).toHaveLength(0);
  });

  it('rejects an empty clip', async () => {
    const { service } = stt(() => ({ status: 200, data: { text: 'x' } }));
    await expect(service.transcribe(Buffer.alloc(0))).rejects.toMatchObject({ kind: 'invalid_request' });
  });

  it('requires an API key', async () => {
    const { service, requests } = stt(() => ({ status: 200, data: { text: 'x' } }), '');
    await expect(service.transcribe(Buffer.from('a'))).rejects.toMatchObject({ kind: 'auth' });
    expect(requests).toHaveLength(0);
  });

  it('treats a response without text as a provider failure', async () => {
    const { service } = stt(() => ({ status: 200, data: {} }));
    const error = await service.transcribe(Buffer.from('a')).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({ kind: 'unavailable' });
  });

  it('keeps the upstream status and body in the error', async () => {
    const { service } = stt(() => ({ status: 401, data: { detail: { status: 'invalid_api_key' } } }));
    const error = await service.transcribe(Buffer.from('a')).catch((e: unknown) => e);
    expect(error).toMatchObject({ kind: 'auth', status: 401 });
    expect(error instanceof Error && error.message).toBe(
      'Speech-to-text failed: HTTP 401: {"detail":{"status":"invalid_api_key"}}'
    );
  });
});

describe('ElevenLabsTTSService', () => {
  it('posts text to the voice endpoint and returns the audio bytes', async () => {
    const { service, requests } = tts(() => ({ status: 200, data: Buffer.from('mp3-bytes') }));
    const audio = await service.synthesize('Hello');

    expect(audio.toString()).toBe('mp3-bytes');
    const [request] = requests;
    expect(request.url).toBe('/text-to-speech/default-voice');
    expect(request.responseType).toBe('arraybuffer');
    expect(request.headers.get('accept')).toBe('audio/mpeg');
    expect(JSON.parse(String(request.data))).toEqual({ text: 'Hello', model_id: 'eleven_multilingual_v2' });
  });

  it('honours voice and model overrides', async () => {
    const { service, requests } = tts(() => ({ status: 200, data: Buffer.from('x') }));
    await service.synthesize('Hi', { voiceId: 'custom voice', model: 'eleven_turbo_v2' });

    expect(requests[0].url).toBe('/text-to-speech/custom%20voice');
    expect(JSON.parse(String(requests[0].data))).toEqual({ text: 'Hi', model_id: 'eleven_turbo_v2' });
  });

  it('rejects empty text without calling out', async () => {
    const { service, requests } = tts(() => ({ status: 200, data: Buffer.from('x') }));
    await expect(service.synthesize('  ')).rejects.toMatchObject({ kind: 'invalid_request' });
    expect(requests).toHaveLength(0);
  });

  it('maps rate limiting', async () => {
    const { service } = tts(() => ({ status: 429, data: Buffer.from('slow down') }));
    await expect(service.synthesize('Hello')).rejects.toMatchObject({ kind: 'rate_limited', status: 429 });
  });
});
