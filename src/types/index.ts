/**
 * Shared domain types for the assistant gateway.
 * Keeps API routes, the chat orchestrator and provider adapters aligned on the same shapes.
 */

export type ConversationRole = 'user' | 'assistant' | 'system';

export interface ConversationTurn {
  role: ConversationRole;
  content: string;
}

/** Chronological; index 0 is the oldest turn. */
export type ConversationHistory = readonly ConversationTurn[];

export interface ChatRequest {
  message: string;
  history: ConversationHistory;
  /** Replaces the configured default system prompt for this request only. */
  systemPrompt?: string | null;
}

export interface ModelCandidate {
  identifier: string;
  /** Lower is tried first. */
  priority: number;
}

export interface CompletionResult {
  text: string;
  modelUsed: string;
}

export interface WeatherQuery {
  location: string;
}

export interface WeatherResult {
  /** Resolved display name, e.g. "Paris, France". */
  location: string;
  latitude: number;
  longitude: number;
  /** Celsius */
  temperature: number | null;
  weatherCode: number;
  weatherDescription: string;
  /** km/h */
  windSpeed: number | null;
  /** Relative humidity, percent */
  humidity: number | null;
}

export type WeatherAugmentation =
  | { location: string; status: 'used'; data: WeatherResult }
  | { location: string; status: 'unavailable'; reason: string };

export interface ChatResult extends CompletionResult {
  /** Null when the reply did not ask for weather (or weather is disabled). */
  weather: WeatherAugmentation | null;
}

export type TargetLanguage = 'en' | 'ja';
