/**
 * Chat orchestrator: builds the conversation, walks the model fallback list, and
 * when the reply asks for weather, runs a single lookup-and-reprompt round trip.
 *
 * Flow per request:
 *   system + history + user -> completion (fallback list)
 *     -> no tool call: reply
 *     -> weather tool call: lookup -> + tool turn -> completion (fallback list from the top) -> reply
 *        lookup failed: first reply unchanged, weather marked unavailable
 */
import type {
  ChatRequest,
  ChatResult,
  CompletionResult,
  ModelCandidate,
  WeatherAugmentation,
  WeatherResult,
} from '../../types';
import type { ILLMService, LLMMessage, LLMOptions } from '../../ai/llm';
import type { IWeatherService } from '../../ai/weather';
import { formatWeatherForLLM } from '../../ai/weather';
import { buildSystemPrompt, buildWeatherToolContent } from '../../ai/prompts/templates';
import { logger } from '../../config/logger';
import { AllModelsExhaustedError } from './errors';
import { orderCandidates, runWithFallback } from './fallback';
import { buildMessages, parseHistory } from './history';
import type { ToolCallParser } from './toolCallParser';

export interface ChatOrchestratorOptions {
  candidates: readonly ModelCandidate[];
  defaultSystemPrompt: string;
  /** Language name the assistant must reply in; null leaves it to the model. */
  forceLanguage?: string | null;
  weather: { enabled: boolean; toolInstruction: string };
  completion?: LLMOptions;
}

export interface ChatOrchestratorDeps {
  llm: ILLMService;
  weather: IWeatherService;
  toolCalls: ToolCallParser;
}

export class ChatOrchestrator {
  private readonly candidates: readonly ModelCandidate[];

  constructor(
    private readonly deps: ChatOrchestratorDeps,
    private readonly options: ChatOrchestratorOptions
  ) {
    if (!options.candidates.length) {
      throw new Error('ChatOrchestrator needs at least one model candidate');
    }
    this.candidates = orderCandidates(options.candidates);
  }

  get models(): readonly string[] {
    return this.candidates.map((c) => c.identifier);
  }

  async respond(request: ChatRequest): Promise<ChatResult> {
    const history = parseHistory(request.history);
    const systemPrompt = buildSystemPrompt(request.systemPrompt?.trim() || this.options.defaultSystemPrompt, {
      forceLanguage: this.options.forceLanguage,
      weatherInstruction: this.options.weather.enabled ? this.options.weather.toolInstruction : null,
    });
    const messages = buildMessages(systemPrompt, history, request.message);

    const first = await this.complete(messages);
    if (!this.options.weather.enabled) return { ...first, weather: null };

    const toolCall = this.deps.toolCalls.parse(first.text);
    if (toolCall.type === 'none') return { ...first, weather: null };

    const location = toolCall.location;
    let data: WeatherResult;
    try {
      data = await this.deps.weather.getWeather(location);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.warn('Weather lookup failed; returning reply without weather data', { location, reason });
      return { ...first, weather: { location, status: 'unavailable', reason } };
    }

    const augmented: LLMMessage[] = [
      ...messages,
      { role: 'tool', content: buildWeatherToolContent(location, formatWeatherForLLM(data)) },
    ];
    const final = await this.complete(augmented);
    const weather: WeatherAugmentation = { location, status: 'used', data };
    return { ...final, weather };
  }

  /** One completion round over the whole candidate list. */
  async complete(messages: readonly LLMMessage[]): Promise<CompletionResult> {
    const outcome = await runWithFallback(
      this.candidates,
      (candidate) => this.deps.llm.chat(messages, candidate.identifier, this.options.completion),
      (failure, remaining) => {
        logger.warn('Model candidate failed', {
          model: failure.model,
          error: failure.error instanceof Error ? failure.error.message : String(failure.error),
          remaining,
        });
      }
    );

    if (!outcome.ok) {
      const error = new AllModelsExhaustedError(outcome.failures);
      logger.error('All model candidates failed', { attempts: error.attempts() });
      throw error;
    }
    if (outcome.failures.length) {
      logger.info('Completion served by fallback model', {
        model: outcome.candidate.identifier,
        failedBefore: outcome.failures.length,
      });
    }
    return { text: outcome.value.content, modelUsed: outcome.candidate.identifier };
  }
}
