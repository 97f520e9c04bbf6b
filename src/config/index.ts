/**
 * Central configuration. All env vars are read here, validated once with zod and
 * frozen, so the rest of the app receives config explicitly and stays testable.
 */
import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

export const DEFAULT_SYSTEM_PROMPT =
  'You are a helpful, friendly AI assistant. Be concise, clear, and proactive. ' +
  'If weather data is provided, present it conversationally. Avoid repetition.';

export const DEFAULT_WEATHER_TRIGGER_PATTERN = String.raw`\[\[\s*WEATHER\s*:\s*([^\]]*?)\s*\]\]`;

export const DEFAULT_WEATHER_TOOL_INSTRUCTION =
  'You can look up live weather. When the user asks about current weather, temperature, ' +
  'or what to wear somewhere, reply with only [[WEATHER: <city>]] and nothing else. ' +
  'When weather data has been provided in the conversation, answer using it instead.';

export const DEFAULT_MODELS = ['llama-3.3-70b-versatile', 'llama-3.1-8b-instant'];

export interface WeatherTriggerConfig {
  /** RegExp source; capture group 1 is the location. */
  source: string;
  flags: string;
}

export interface AppConfig {
  env: string;
  host: string;
  port: number;
  logLevel: string;
  corsOrigin: string;

  llm: {
    groqApiKey: string;
    baseUrl: string;
    /** Fallback order: first entry is tried first. */
    models: readonly string[];
    systemPrompt: string;
    /** Language name appended to the system prompt as a reply-language instruction. */
    forceLanguage: string | null;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
    historyLimit: number;
  };

  weather: {
    enabled: boolean;
    trigger: WeatherTriggerConfig;
    toolInstruction: string;
    timeoutMs: number;
  };

  speech: {
    elevenLabsApiKey: string;
    baseUrl: string;
    sttModel: string;
    ttsModel: string;
    voiceId: string;
    timeoutMs: number;
  };
}

const flag = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? defaultValue : /^(1|true|yes|on)$/i.test(v.trim())));

const optionalText = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : null));

const modelList = z
  .string()
  .optional()
  .transform((v) =>
    v && v.trim()
      ? v
          .split(',')
          .map((m) => m.trim())
          .filter(Boolean)
      : DEFAULT_MODELS
  )
  .refine((models) => models.length > 0, { message: 'LLM_MODELS must name at least one model' });

/** Number of capture groups in a pattern: an alternation with the empty string always matches ''. */
function captureGroupCount(source: string, flags: string): number {
  const match = new RegExp(`${source}|`, flags).exec('');
  return match ? match.length - 1 : 0;
}

const triggerPattern = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v : DEFAULT_WEATHER_TRIGGER_PATTERN));

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().default(8000),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  CORS_ORIGIN: z.string().default('*'),

  GROQ_API_KEY: z.string().default(''),
  GROQ_BASE_URL: z.string().url().default('https://api.groq.com/openai/v1'),
  LLM_MODELS: modelList,
  LLM_SYSTEM_PROMPT: optionalText,
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(1024),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(12000),
  HISTORY_LIMIT: z.coerce.number().int().positive().default(10),
  FORCE_LANGUAGE: optionalText,

  WEATHER_ENABLED: flag(true),
  WEATHER_TRIGGER_PATTERN: triggerPattern,
  WEATHER_TRIGGER_FLAGS: z
    .string()
    .regex(/^[imsu]*$/, 'only i, m, s and u flags are allowed')
    .default('i'),
  WEATHER_TOOL_INSTRUCTION: optionalText,
  WEATHER_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

  ELEVENLABS_API_KEY: z.string().default(''),
  ELEVENLABS_BASE_URL: z.string().url().default('https://api.elevenlabs.io/v1'),
  ELEVENLABS_STT_MODEL: z.string().default('scribe_v1'),
  ELEVENLABS_TTS_MODEL: z.string().default('eleven_multilingual_v2'),
  ELEVENLABS_VOICE_ID: z.string().default('21m00Tcm4TlvDzCb8Y6k'),
  SPEECH_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),
}).superRefine((e, ctx) => {
  // pattern and flags compile together: `u` rejects escapes the plain syntax allows
  const path = ['WEATHER_TRIGGER_PATTERN'];
  try {
    if (captureGroupCount(e.WEATHER_TRIGGER_PATTERN, e.WEATHER_TRIGGER_FLAGS) < 1) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path, message: 'must contain a capture group for the location' });
    }
  } catch (err) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path,
      message: `invalid regular expression: ${err instanceof Error ? err.message : String(err)}`,
    });
  }
});

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv): Readonly<AppConfig> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  const e = parsed.data;

  return Object.freeze({
    env: e.NODE_ENV,
    host: e.HOST,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    corsOrigin: e.CORS_ORIGIN,
    llm: Object.freeze({
      groqApiKey: e.GROQ_API_KEY,
      baseUrl: e.GROQ_BASE_URL,
      models: Object.freeze([...e.LLM_MODELS]),
      systemPrompt: e.LLM_SYSTEM_PROMPT ?? DEFAULT_SYSTEM_PROMPT,
      forceLanguage: e.FORCE_LANGUAGE,
      temperature: e.LLM_TEMPERATURE,
      maxTokens: e.LLM_MAX_TOKENS,
      timeoutMs: e.LLM_TIMEOUT_MS,
      historyLimit: e.HISTORY_LIMIT,
    }),
    weather: Object.freeze({
      enabled: e.WEATHER_ENABLED,
      trigger: Object.freeze({ source: e.WEATHER_TRIGGER_PATTERN, flags: e.WEATHER_TRIGGER_FLAGS }),
      toolInstruction: e.WEATHER_TOOL_INSTRUCTION ?? DEFAULT_WEATHER_TOOL_INSTRUCTION,
      timeoutMs: e.WEATHER_TIMEOUT_MS,
    }),
    speech: Object.freeze({
      elevenLabsApiKey: e.ELEVENLABS_API_KEY,
      baseUrl: e.ELEVENLABS_BASE_URL,
      sttModel: e.ELEVENLABS_STT_MODEL,
      ttsModel: e.ELEVENLABS_TTS_MODEL,
      voiceId: e.ELEVENLABS_VOICE_ID,
      timeoutMs: e.SPEECH_TIMEOUT_MS,
    }),
  });
}

export const config = loadConfig(process.env);
