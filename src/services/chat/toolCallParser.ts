import type { WeatherTriggerConfig } from '../../config';
import type { WeatherQuery } from '../../types';

export type ToolCall = { type: 'none' } | ({ type: 'weather' } & WeatherQuery);

export interface ToolCallParser {
  parse(text: string): ToolCall;
}

const NO_TOOL_CALL: ToolCall = Object.freeze({ type: 'none' });

/**
 * Detects the weather tool call a model emits in plain text, e.g. `[[WEATHER: Paris]]`.
 * The grammar is a configured pattern whose first capture group is the location;
 * the first match wins.
 */
export function createToolCallParser(trigger: WeatherTriggerConfig): ToolCallParser {
  const pattern = new RegExp(trigger.source, trigger.flags.replace(/[gy]/g, ''));
  return {
    parse(text: string): ToolCall {
      const match = pattern.exec(text);
      const location = match?.[1]?.trim();
      if (!location) return NO_TOOL_CALL;
      return { type: 'weather', location };
    },
  };
}
