import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  DEFAULT_MODELS,
  DEFAULT_SYSTEM_PROMPT,
  DEFAULT_WEATHER_TOOL_INSTRUCTION,
  DEFAULT_WEATHER_TRIGGER_PATTERN,
  loadConfig,
} from '../../src/config';

describe('loadConfig', () => {
  it('fills defaults from an empty environment', () => {
    const config = loadConfig({});

    expect(config.port).toBe(8000);
    expect(config.llm.models).toEqual(DEFAULT_MODELS);
    expect(config.llm.systemPrompt).toBe(DEFAULT_SYSTEM_PROMPT);
    expect(config.llm.forceLanguage).toBeNull();
    expect(config.llm.historyLimit).toBe(10);
    expect(config.weather.enabled).toBe(true);
    expect(config.weather.trigger).toEqual({ source: DEFAULT_WEATHER_TRIGGER_PATTERN, flags: 'i' });
    expect(config.weather.toolInstruction).toBe(DEFAULT_WEATHER_TOOL_INSTRUCTION);
    expect(config.speech.sttModel).toBe('scribe_v1');
  });

  it('is frozen all the way down', () => {
    const config = loadConfig({});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.llm)).toBe(true);
    expect(Object.isFrozen(config.llm.models)).toBe(true);
    expect(Object.isFrozen(config.weather.trigger)).toBe(true);
  });

  it('parses the model fallback list in order', () => {
    expect(loadConfig({ LLM_MODELS: ' fast , big,,tiny ' }).llm.models).toEqual(['fast', 'big', 'tiny']);
  });

  it('rejects a model list with no names', () => {
    expect(() => loadConfig({ LLM_MODELS: ' , ' })).toThrow(ConfigError);
  });

  it('reads flags, numbers and the forced language', () => {
    const config = loadConfig({
      WEATHER_ENABLED: 'false',
      PORT: '9001',
      LLM_TIMEOUT_MS: '5000',
      FORCE_LANGUAGE: ' Japanese ',
    });
    expect(config.weather.enabled).toBe(false);
    expect(config.port).toBe(9001);
    expect(config.llm.timeoutMs).toBe(5000);
    expect(config.llm.forceLanguage).toBe('Japanese');
    expect(loadConfig({ WEATHER_ENABLED: 'yes' }).weather.enabled).toBe(true);
  });

  it('rejects a trigger pattern without a capture group', () => {
    expect(() => loadConfig({ WEATHER_TRIGGER_PATTERN: 'WEATHER' })).toThrow(/capture group/);
  });

  it('rejects a trigger pattern that does not compile', () => {
    expect(() => loadConfig({ WEATHER_TRIGGER_PATTERN: '([a-z' })).toThrow(/invalid regular expression/);
  });

  it('compiles the trigger pattern with its flags', () => {
    expect(() =>
      loadConfig({ WEATHER_TRIGGER_PATTERN: String.raw`\[\[WEATHER\:(.+)\]\]`, WEATHER_TRIGGER_FLAGS: 'u' })
    ).toThrow(/WEATHER_TRIGGER_PATTERN: invalid regular expression/);
    expect(
      loadConfig({ WEATHER_TRIGGER_PATTERN: String.raw`\[\[WEATHER\:(.+)\]\]`, WEATHER_TRIGGER_FLAGS: 'i' }).weather.trigger
    ).toEqual({ source: String.raw`\[\[WEATHER\:(.+)\]\]`, flags: 'i' });
  });

  it('accepts a custom trigger pattern', () => {
    const config = loadConfig({ WEATHER_TRIGGER_PATTERN: '<weather>(.+?)</weather>', WEATHER_TRIGGER_FLAGS: '' });
    expect(config.weather.trigger).toEqual({ source: '<weather>(.+?)</weather>', flags: '' });
  });

  it('reports every invalid variable', () => {
    try {
      loadConfig({ PORT: 'not-a-port', LOG_LEVEL: 'loud' });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigError);
      if (e instanceof ConfigError) {
        expect(e.issues.map((i) => i.split(':')[0])).toEqual(['PORT', 'LOG_LEVEL']);
      }
    }
  });
});
