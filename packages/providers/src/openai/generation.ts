import OpenAI, { APIConnectionError, APIError, APIUserAbortError } from 'openai';
import type {
  ChatCompletionChunk,
  ChatCompletionCreateParamsStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import {
  ConfigurationError,
  ConnectionError,
  createLogger,
  GenerationError,
  isAbortError,
  type GenerationChunk,
  type GenerationClient,
  type GenerationRequest,
  type Logger,
  type Message,
  type StreamOptions,
} from '@cascade-voice/core';
import { DEFAULT_SYSTEM_PROMPT } from '../prompt.js';

/**
 * The part of the OpenAI client this module calls. An `OpenAI` instance
 * satisfies it.
 */
export interface ChatCompletionsApi {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsStreaming,
        options?: { signal?: AbortSignal }
      ): PromiseLike<AsyncIterable<ChatCompletionChunk>>;
    };
  };
}

export interface OpenAIGenerationOptions {
  /** An OpenAI client, or anything shaped like one */
  client?: ChatCompletionsApi;
  /** Used to construct a client when none is given */
  apiKey?: string;
  model: string;
  /** @default 1000 */
  maxTokens?: number;
  /** @default 0 */
  temperature?: number;
  systemPrompt?: string;
  logger?: Logger;
}

/**
 * Streaming chat completions.
 *
 * Each content delta becomes one text chunk; the finish reason becomes the
 * end marker's reason. Failures are not retried.
 */
export class OpenAIGenerationClient implements GenerationClient {
  readonly name = 'openai';
  private readonly client: ChatCompletionsApi;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly systemPrompt: string;
  private readonly logger: Logger;

  constructor(options: OpenAIGenerationOptions) {
    if (options.client) {
      this.client = options.client;
    } else if (options.apiKey) {
      this.client = new OpenAI({ apiKey: options.apiKey });
    } else {
      throw new ConfigurationError('OpenAI API key is required for generation', ['apiKey']);
    }
    if (!options.model) {
      throw new ConfigurationError('A generation model is required', ['model']);
    }
    this.model = options.model;
    this.maxTokens = options.maxTokens ?? 1000;
    this.temperature = options.temperature ?? 0;
    this.systemPrompt = options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
    this.logger = options.logger ?? createLogger('generation');
  }

  async *generate(
    request: GenerationRequest,
    options: StreamOptions = {}
  ): AsyncGenerator<GenerationChunk, void, undefined> {
    const messages: ChatCompletionMessageParam[] = [
      { role: 'system', content: this.systemPrompt },
      ...request.history.map(toMessageParam),
      { role: 'user', content: request.prompt },
    ];

    let stream: AsyncIterable<ChatCompletionChunk>;
    try {
      stream = await this.client.chat.completions.create(
        {
          model: this.model,
          messages,
          stream: true,
          max_tokens: this.maxTokens,
          temperature: this.temperature,
        },
        { signal: options.signal }
      );
    } catch (error: unknown) {
      throw toOpenAIFailure(error);
    }
    this.logger.debug({ model: this.model, history: request.history.length }, 'generation stream open');

    let index = 0;
    let reason = 'stop';
    try {
      for await (const chunk of stream) {
        const choice = chunk.choices[0];
        if (!choice) continue;
        if (choice.delta.content) {
          yield { type: 'text', index: index++, text: choice.delta.content };
        }
        if (choice.finish_reason) {
          reason = choice.finish_reason;
        }
      }
    } catch (error: unknown) {
      throw toOpenAIFailure(error);
    }

    yield { type: 'end', index, reason };
  }
}

function toMessageParam(message: Message): ChatCompletionMessageParam {
  switch (message.role) {
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'system':
      return { role: 'system', content: message.content };
  }
}

/**
 * Map an OpenAI SDK error onto the pipeline taxonomy. Aborts pass through.
 */
export function toOpenAIFailure(error: unknown): unknown {
  if (error instanceof APIUserAbortError || isAbortError(error)) return error;
  if (error instanceof APIConnectionError) {
    return new ConnectionError('generation', `Could not reach OpenAI: ${error.message}`, error);
  }
  if (error instanceof APIError) {
    return new GenerationError(`OpenAI request failed: ${error.message}`, error.status, error);
  }
  if (error instanceof Error) {
    return new GenerationError(error.message, undefined, error);
  }
  return new GenerationError(String(error));
}
