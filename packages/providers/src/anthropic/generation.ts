import Anthropic, { APIConnectionError, APIError, APIUserAbortError } from '@anthropic-ai/sdk';
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
  type StreamOptions,
} from '@cascade-voice/core';
import { DEFAULT_SYSTEM_PROMPT } from '../prompt.js';

/**
 * The part of the Anthropic client this module calls. An `Anthropic`
 * instance satisfies it.
 */
export interface MessagesApi {
  messages: {
    create(
      body: Anthropic.MessageCreateParamsStreaming,
      options?: { signal?: AbortSignal }
    ): PromiseLike<AsyncIterable<Anthropic.RawMessageStreamEvent>>;
  };
}

export interface AnthropicGenerationOptions {
  /** An Anthropic client, or anything shaped like one */
  client?: MessagesApi;
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
 * Streaming Messages API generation.
 *
 * Text deltas become text chunks and the stop reason becomes the end
 * marker's reason. System messages in the history are folded into the
 * system prompt, since the API takes only user and assistant turns.
 */
export class AnthropicGenerationClient implements GenerationClient {
  readonly name = 'anthropic';
  private readonly client: MessagesApi;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly systemPrompt: string;
  private readonly logger: Logger;

  constructor(options: AnthropicGenerationOptions) {
    if (options.client) {
      this.client = options.client;
    } else if (options.apiKey) {
      this.client = new Anthropic({ apiKey: options.apiKey });
    } else {
      throw new ConfigurationError('Anthropic API key is required for generation', ['apiKey']);
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
    const system = [this.systemPrompt];
    const messages: Anthropic.MessageParam[] = [];
    for (const message of request.history) {
      if (message.role === 'system') {
        system.push(message.content);
      } else {
        messages.push({ role: message.role, content: message.content });
      }
    }
    messages.push({ role: 'user', content: request.prompt });

    let stream: AsyncIterable<Anthropic.RawMessageStreamEvent>;
    try {
      stream = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: this.maxTokens,
          temperature: this.temperature,
          system: system.join('\n\n'),
          messages,
          stream: true,
        },
        { signal: options.signal }
      );
    } catch (error: unknown) {
      throw toAnthropicFailure(error);
    }
    this.logger.debug({ model: this.model, history: request.history.length }, 'generation stream open');

    let index = 0;
    let reason = 'end_turn';
    try {
      for await (const event of stream) {
        if (event.type === 'content_block_delta' && event.delta.type === 'text_delta') {
          if (event.delta.text) {
            yield { type: 'text', index: index++, text: event.delta.text };
          }
        } else if (event.type === 'message_delta' && event.delta.stop_reason) {
          reason = event.delta.stop_reason;
        }
      }
    } catch (error: unknown) {
      throw toAnthropicFailure(error);
    }

    yield { type: 'end', index, reason };
  }
}

/**
 * Map an Anthropic SDK error onto the pipeline taxonomy. Aborts pass through.
 */
export function toAnthropicFailure(error: unknown): unknown {
  if (error instanceof APIUserAbortError || isAbortError(error)) return error;
  if (error instanceof APIConnectionError) {
    return new ConnectionError('generation', `Could not reach Anthropic: ${error.message}`, error);
  }
  if (error instanceof APIError) {
    return new GenerationError(`Anthropic request failed: ${error.message}`, error.status, error);
  }
  if (error instanceof Error) {
    return new GenerationError(error.message, undefined, error);
  }
  return new GenerationError(String(error));
}
