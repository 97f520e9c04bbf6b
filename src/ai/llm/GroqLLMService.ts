import OpenAI from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import type { ILLMService, LLMMessage, LLMOptions, LLMResponse } from './types';
import { ProviderError, kindFromStatus, statusOf } from '../errors';

const PROVIDER = 'groq';

export type CreateCompletion = (
  params: ChatCompletionCreateParamsNonStreaming,
  requestOptions: { timeout: number; signal: AbortSignal }
) => Promise<ChatCompletion>;

export interface GroqLLMServiceOptions {
  apiKey: string;
  baseUrl: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  /** Replaces the SDK call; used by tests and alternate transports. */
  createCompletion?: CreateCompletion;
}

/**
 * LLM service using Groq (https://groq.com).
 * OpenAI-compatible API, so the openai SDK is pointed at Groq's base URL.
 * SDK retries are disabled: fallback across models is the orchestrator's job.
 */
export class GroqLLMService implements ILLMService {
  readonly provider = PROVIDER;
  private createCompletion: CreateCompletion | null = null;

  constructor(private readonly options: GroqLLMServiceOptions) {
    if (options.createCompletion) {
      this.createCompletion = options.createCompletion;
    } else if (options.apiKey) {
      const client = new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
        maxRetries: 0,
      });
      this.createCompletion = (params, requestOptions) => client.chat.completions.create(params, requestOptions);
    }
  }

  async chat(messages: readonly LLMMessage[], model: string, options?: LLMOptions): Promise<LLMResponse> {
    const createCompletion = this.createCompletion;
    if (!createCompletion) {
      throw new ProviderError(PROVIDER, 'auth', 'GROQ_API_KEY is not configured');
    }

    const timeoutMs = options?.timeoutMs ?? this.options.timeoutMs;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // reject before aborting so the race settles with the timeout, not the SDK's abort error
        reject(new ProviderError(PROVIDER, 'timeout', `Groq request timed out after ${timeoutMs}ms (model ${model})`));
        controller.abort();
      }, timeoutMs);
    });

    try {
      const completion = await Promise.race([
        createCompletion(
          {
            model,
            messages: messages.map(toProviderMessage),
            temperature: options?.temperature ?? this.options.temperature,
            max_tokens: options?.maxTokens ?? this.options.maxTokens,
            top_p: 1,
            stream: false,
          },
          { timeout: timeoutMs, signal: controller.signal }
        ),
        timeout,
      ]);

      const content = completion.choices[0]?.message?.content ?? '';
      if (!content.trim()) {
        throw new ProviderError(PROVIDER, 'unavailable', `Model ${model} returned an empty completion`);
      }
      return {
        content,
        model,
        usage: {
          promptTokens: completion.usage?.prompt_tokens ?? 0,
          completionTokens: completion.usage?.completion_tokens ?? 0,
        },
      };
    } catch (error) {
      throw toProviderError(error);
    } finally {
      clearTimeout(timer);
    }
  }
}

/** Injected tool data goes out as a system turn; OpenAI-style tool turns require a tool_call_id. */
function toProviderMessage(message: LLMMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'tool':
      return { role: 'system', content: message.content };
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

export function toProviderError(error: unknown): ProviderError {
  if (error instanceof ProviderError) return error;
  const status = statusOf(error);
  const message = error instanceof Error ? error.message : String(error);
  if (status === undefined && /timed? ?out|timeout/i.test(message)) {
    return new ProviderError(PROVIDER, 'timeout', message, { cause: error });
  }
  return new ProviderError(PROVIDER, kindFromStatus(status), message, { cause: error, status });
}
