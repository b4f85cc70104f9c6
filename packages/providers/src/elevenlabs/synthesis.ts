import {
  abortable,
  Channel,
  ConfigurationError,
  ConnectionError,
  createLogger,
  isAbortError,
  linkedController,
  type AudioEncoding,
  type Logger,
  type StreamOptions,
  type SynthesisChunk,
  type SynthesisClient,
} from '@cascade-voice/core';
import {
  parseMessage,
  stringField,
  wsConnector,
  type SocketConnection,
  type SocketConnector,
} from '../socket.js';
import { ELEVENLABS_WS_URL } from './transcription.js';

export interface VoiceSettings {
  stability: number;
  similarity_boost: number;
}

export interface ElevenLabsSynthesisOptions {
  apiKey: string;
  voiceId: string;
  /** @default 'eleven_turbo_v2_5' */
  model?: string;
  /** `mp3_<rate>_<kbps>` or `pcm_<rate>`. @default 'mp3_44100_128' */
  outputFormat?: string;
  /** @default { stability: 0.5, similarity_boost: 0.8 } */
  voiceSettings?: VoiceSettings;
  /** @default 'wss://api.elevenlabs.io' */
  baseUrl?: string;
  /** @default 10000 */
  connectTimeoutMs?: number;
  connector?: SocketConnector;
  logger?: Logger;
}

/**
 * Map an ElevenLabs output format name to the encoding of its chunks.
 *
 * @throws ConfigurationError for formats the playback sink cannot decode
 */
export function parseOutputFormat(format: string): AudioEncoding {
  const pcm = /^pcm_(\d+)$/.exec(format);
  if (pcm) {
    return { codec: 'pcm', sampleRate: Number(pcm[1]), channels: 1 };
  }
  const mp3 = /^mp3_(\d+)_(\d+)$/.exec(format);
  if (mp3) {
    return { codec: 'mp3', sampleRate: Number(mp3[1]), bitrate: Number(mp3[2]) };
  }
  throw new ConfigurationError(`Unsupported output format "${format}"`, ['outputFormat']);
}

/**
 * Streaming text-to-speech over the ElevenLabs stream-input WebSocket.
 *
 * Every text piece is sent as soon as it is produced, without waiting for a
 * sentence boundary, and every audio chunk is yielded as soon as it arrives.
 */
export class ElevenLabsSynthesisClient implements SynthesisClient {
  readonly name = 'elevenlabs-stream-input';
  readonly encoding: AudioEncoding;
  private readonly apiKey: string;
  private readonly voiceId: string;
  private readonly model: string;
  private readonly outputFormat: string;
  private readonly voiceSettings: VoiceSettings;
  private readonly baseUrl: string;
  private readonly connectTimeoutMs: number;
  private readonly connector: SocketConnector;
  private readonly logger: Logger;

  constructor(options: ElevenLabsSynthesisOptions) {
    if (!options.apiKey) {
      throw new ConfigurationError('ElevenLabs API key is required for synthesis', ['apiKey']);
    }
    if (!options.voiceId) {
      throw new ConfigurationError('A voice id is required for synthesis', ['voiceId']);
    }
    this.apiKey = options.apiKey;
    this.voiceId = options.voiceId;
    this.model = options.model ?? 'eleven_turbo_v2_5';
    this.outputFormat = options.outputFormat ?? 'mp3_44100_128';
    this.encoding = parseOutputFormat(this.outputFormat);
    this.voiceSettings = options.voiceSettings ?? { stability: 0.5, similarity_boost: 0.8 };
    this.baseUrl = options.baseUrl ?? ELEVENLABS_WS_URL;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 10000;
    this.connector = options.connector ?? wsConnector;
    this.logger = options.logger ?? createLogger('synthesis');
  }

  streamUrl(): string {
    const url = new URL(`/v1/text-to-speech/${encodeURIComponent(this.voiceId)}/stream-input`, this.baseUrl);
    url.searchParams.set('model_id', this.model);
    url.searchParams.set('output_format', this.outputFormat);
    return url.toString();
  }

  async *synthesize(
    text: AsyncIterable<string>,
    options: StreamOptions = {}
  ): AsyncGenerator<SynthesisChunk, void, undefined> {
    const chunks = new Channel<SynthesisChunk>();
    const { controller, dispose } = linkedController(options.signal);
    let closing = false;
    let index = 0;

    let connection: SocketConnection;
    try {
      connection = await this.connector(
        this.streamUrl(),
        { timeoutMs: this.connectTimeoutMs, signal: controller.signal },
        {
          onMessage: (raw) => {
            const message = parseMessage(raw);
            if (!message) return;

            const audio = stringField(message, 'audio');
            if (audio) {
              chunks.push({
                index: index++,
                data: new Uint8Array(Buffer.from(audio, 'base64')),
                encoding: this.encoding,
              });
            }
            const error = stringField(message, 'error');
            if (error) {
              chunks.fail(new ConnectionError('synthesis', `Text-to-speech service error: ${error}`));
            }
            if (message.isFinal === true) {
              chunks.close();
            }
          },
          onClose: (code, reason) => {
            if (closing) return;
            chunks.fail(
              new ConnectionError(
                'synthesis',
                `Text-to-speech connection closed before the final chunk (code ${code}${reason ? `: ${reason}` : ''})`
              )
            );
          },
          onError: (error) => {
            chunks.fail(new ConnectionError('synthesis', `Text-to-speech socket error: ${error.message}`, error));
          },
        }
      );
    } catch (error: unknown) {
      dispose();
      if (isAbortError(error)) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new ConnectionError('synthesis', `Could not connect to text-to-speech: ${message}`, error);
    }
    this.logger.debug({ voiceId: this.voiceId, model: this.model }, 'synthesis connection open');

    connection.send(
      JSON.stringify({ text: ' ', voice_settings: this.voiceSettings, xi_api_key: this.apiKey })
    );
    const sending = this.sendText(text, connection, controller.signal).catch((error: unknown) => {
      chunks.fail(error);
    });

    try {
      for await (const chunk of chunks.iterate(controller.signal)) {
        yield chunk;
      }
    } finally {
      closing = true;
      controller.abort();
      await sending;
      if (connection.isOpen) connection.close(1000, 'done');
      dispose();
      this.logger.debug({ chunks: index }, 'synthesis connection closed');
    }
  }

  private async sendText(text: AsyncIterable<string>, connection: SocketConnection, signal: AbortSignal): Promise<void> {
    for await (const piece of abortable(text, signal)) {
      if (piece.length === 0) continue;
      connection.send(JSON.stringify({ text: piece, try_trigger_generation: true }));
    }
    connection.send(JSON.stringify({ text: '' }));
  }
}
