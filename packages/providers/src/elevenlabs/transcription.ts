import {
  Channel,
  ConfigurationError,
  ConnectionError,
  createLogger,
  isAbortError,
  type AudioFrame,
  type Logger,
  type PcmFormat,
  type StreamOptions,
  type TranscriptEvent,
  type TranscriptionClient,
  type TranscriptionStream,
} from '@cascade-voice/core';
import {
  parseMessage,
  stringField,
  wsConnector,
  type SocketConnection,
  type SocketConnector,
  type SocketHandlers,
} from '../socket.js';

export const ELEVENLABS_WS_URL = 'wss://api.elevenlabs.io';

export interface ElevenLabsTranscriptionOptions {
  apiKey: string;
  /** @default 'scribe_v2_realtime' */
  model?: string;
  /** ISO language code; the service detects the language when unset */
  language?: string;
  /** Sample rate of the mono s16le audio that will be fed. @default 16000 */
  sampleRate?: number;
  /** @default 'wss://api.elevenlabs.io' */
  baseUrl?: string;
  /** @default 10000 */
  connectTimeoutMs?: number;
  connector?: SocketConnector;
  logger?: Logger;
}

/**
 * Realtime speech-to-text over the ElevenLabs WebSocket API.
 *
 * Audio is streamed while the user is still speaking, with manual commits:
 * the service only finalizes the transcript once {@link TranscriptionStream.stop}
 * sends the commit, so the whole utterance becomes a single final result.
 */
export class ElevenLabsTranscriptionClient implements TranscriptionClient {
  readonly name = 'elevenlabs-realtime';
  readonly format: PcmFormat;
  private readonly apiKey: string;
  private readonly model: string;
  private readonly language?: string;
  private readonly baseUrl: string;
  private readonly connectTimeoutMs: number;
  private readonly connector: SocketConnector;
  private readonly logger: Logger;

  constructor(options: ElevenLabsTranscriptionOptions) {
    if (!options.apiKey) {
      throw new ConfigurationError('ElevenLabs API key is required for transcription', ['apiKey']);
    }
    this.apiKey = options.apiKey;
    this.model = options.model ?? 'scribe_v2_realtime';
    this.language = options.language;
    this.format = { sampleRate: options.sampleRate ?? 16000, channels: 1 };
    this.baseUrl = options.baseUrl ?? ELEVENLABS_WS_URL;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 10000;
    this.connector = options.connector ?? wsConnector;
    this.logger = options.logger ?? createLogger('transcription');
  }

  /** URL of the realtime endpoint, with the stream parameters */
  streamUrl(): string {
    const url = new URL('/v1/speech-to-text/realtime', this.baseUrl);
    url.searchParams.set('model_id', this.model);
    url.searchParams.set('audio_format', `pcm_${this.format.sampleRate}`);
    url.searchParams.set('commit_strategy', 'manual');
    if (this.language) {
      url.searchParams.set('language_code', this.language);
    }
    return url.toString();
  }

  async startStream(options: StreamOptions = {}): Promise<TranscriptionStream> {
    const stream = new ElevenLabsTranscriptionStream(this.format, this.logger);
    try {
      const connection = await this.connector(
        this.streamUrl(),
        {
          headers: { 'xi-api-key': this.apiKey },
          timeoutMs: this.connectTimeoutMs,
          signal: options.signal,
        },
        stream.handlers
      );
      stream.attach(connection);
    } catch (error: unknown) {
      if (isAbortError(error)) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new ConnectionError('transcription', `Could not connect to speech-to-text: ${message}`, error);
    }
    this.logger.debug({ model: this.model, sampleRate: this.format.sampleRate }, 'transcription connection open');
    return stream;
  }
}

class ElevenLabsTranscriptionStream implements TranscriptionStream {
  readonly format: PcmFormat;
  readonly handlers: SocketHandlers;
  private readonly logger: Logger;
  private readonly events = new Channel<TranscriptEvent>();
  private connection: SocketConnection | null = null;
  private failure: ConnectionError | null = null;
  private committedText = '';
  private seq = 0;
  private framesFed = 0;
  private stopped = false;
  private closed = false;

  constructor(format: PcmFormat, logger: Logger) {
    this.format = format;
    this.logger = logger;
    this.handlers = {
      onMessage: (text) => this.handleMessage(text),
      onClose: (code, reason) => {
        if (this.closed) return;
        this.fail(
          new ConnectionError(
            'transcription',
            `Speech-to-text connection closed unexpectedly (code ${code}${reason ? `: ${reason}` : ''})`
          )
        );
      },
      onError: (error) => {
        this.fail(new ConnectionError('transcription', `Speech-to-text socket error: ${error.message}`, error));
      },
    };
  }

  attach(connection: SocketConnection): void {
    this.connection = connection;
  }

  feed(frame: AudioFrame): void {
    if (frame.sampleRate !== this.format.sampleRate || frame.channels !== this.format.channels) {
      throw new ConfigurationError(
        `Frame format ${frame.sampleRate}Hz/${frame.channels}ch does not match the stream's ` +
          `${this.format.sampleRate}Hz/${this.format.channels}ch`,
        ['sampleRate']
      );
    }
    if (this.failure) throw this.failure;
    if (this.stopped || this.closed) {
      throw new ConnectionError('transcription', 'Speech-to-text stream no longer accepts audio');
    }

    this.send({
      message_type: 'input_audio_chunk',
      audio_base_64: Buffer.from(frame.data.buffer, frame.data.byteOffset, frame.data.byteLength).toString('base64'),
      commit: false,
      sample_rate: this.format.sampleRate,
    });
    this.framesFed++;
  }

  stop(): AsyncIterable<TranscriptEvent> {
    if (this.stopped) {
      throw new Error('Speech-to-text stream already stopped');
    }
    this.stopped = true;

    if (this.framesFed === 0) {
      this.events.push({ kind: 'final', text: '', seq: this.seq++ });
      this.events.close();
      return this.events.iterate();
    }

    if (!this.failure) {
      this.send({
        message_type: 'input_audio_chunk',
        audio_base_64: '',
        commit: true,
        sample_rate: this.format.sampleRate,
      });
    }
    return this.events.iterate();
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.events.close();
    if (this.connection?.isOpen) {
      this.connection.close(1000, 'done');
    }
    this.logger.debug({ frames: this.framesFed }, 'transcription connection closed');
  }

  private send(message: Record<string, unknown>): void {
    if (!this.connection) {
      throw new ConnectionError('transcription', 'Speech-to-text stream is not connected');
    }
    this.connection.send(JSON.stringify(message));
  }

  private handleMessage(text: string): void {
    const message = parseMessage(text);
    if (!message) {
      this.logger.warn('ignoring malformed speech-to-text message');
      return;
    }

    const type = stringField(message, 'message_type') ?? '';
    switch (type) {
      case 'session_started':
        this.logger.debug({ sessionId: stringField(message, 'session_id') }, 'speech-to-text session started');
        return;

      case 'partial_transcript': {
        const partial = join(this.committedText, stringField(message, 'text') ?? '');
        this.events.push({ kind: 'partial', text: partial, seq: this.seq++ });
        return;
      }

      case 'committed_transcript': {
        const committed = join(this.committedText, stringField(message, 'text') ?? '');
        if (!this.stopped) {
          // a segment the service committed on its own; it prefixes the rest
          this.committedText = committed;
          return;
        }
        this.events.push({ kind: 'final', text: committed, seq: this.seq++ });
        this.events.close();
        return;
      }

      default:
        if (type.includes('error')) {
          const detail = stringField(message, 'error') ?? stringField(message, 'message') ?? 'no detail';
          this.fail(new ConnectionError('transcription', `Speech-to-text service error (${type}): ${detail}`));
        }
    }
  }

  private fail(error: ConnectionError): void {
    if (this.failure || this.events.closed) return;
    this.failure = error;
    this.events.fail(error);
  }
}

function join(prefix: string, text: string): string {
  const next = text.trim();
  if (!prefix) return next;
  return next ? `${prefix} ${next}` : prefix;
}
