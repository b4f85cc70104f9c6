import type { AxiosInstance } from 'axios';
import {
  ConfigurationError,
  createLogger,
  PcmDecoder,
  PipelineCoordinator,
  PlaybackSink,
  VoiceSession,
  type AudioDecoder,
  type AudioOutput,
  type AudioSource,
  type GenerationClient,
  type Logger,
  type TurnResult,
} from '@cascade-voice/core';
import {
  AnthropicGenerationClient,
  CommandAudioOutput,
  CommandAudioSource,
  ElevenLabsSynthesisClient,
  ElevenLabsTranscriptionClient,
  Mp3Decoder,
  OpenAIGenerationClient,
  resolveVoiceId,
  WavFileOutput,
  WavFileSource,
  type ChatCompletionsApi,
  type MessagesApi,
  type MpegDecoderLike,
  type SocketConnector,
  type SpawnProcess,
  type Voice,
} from '@cascade-voice/providers';
import type { AssistantConfig } from './config.js';

/**
 * Everything that reaches outside the process. Each defaults to the real
 * implementation.
 */
export interface AssistantDependencies {
  connector?: SocketConnector;
  anthropic?: MessagesApi;
  openai?: ChatCompletionsApi;
  http?: AxiosInstance;
  spawn?: SpawnProcess;
  createDecoder?: () => MpegDecoderLike;
  /** Builds component loggers; defaults to pino at the configured level */
  logger?: (name: string) => Logger;
}

export interface AssistantOptions {
  /** Read user turns from this WAV file instead of the microphone */
  input?: string;
  /** Write replies to this WAV file instead of the speakers */
  output?: string;
  onTurn?: (result: TurnResult) => void;
}

export interface Assistant {
  session: VoiceSession;
  source: AudioSource;
  voice: Voice;
  /** Release the decoder */
  close(): void;
}

/**
 * Assemble the full pipeline from a validated configuration.
 *
 * Nothing here opens a streaming connection; the only network call is the
 * voice lookup, made when no voice id is configured.
 */
export async function createAssistant(
  config: AssistantConfig,
  options: AssistantOptions = {},
  deps: AssistantDependencies = {}
): Promise<Assistant> {
  const logger = deps.logger ?? ((name: string) => createLogger(name, config.logLevel));

  const source: AudioSource = options.input
    ? await WavFileSource.open(options.input, { frameMs: config.capture.frameMs, realtime: true })
    : new CommandAudioSource({
        sampleRate: config.capture.sampleRate,
        frameMs: config.capture.frameMs,
        spawn: deps.spawn,
        logger: logger('capture'),
      });
  if (source.format.channels !== 1) {
    throw new ConfigurationError(`${source.name} has ${source.format.channels} channels; mono audio is required`, [
      'input',
    ]);
  }

  const voice = await resolveVoiceId({
    apiKey: config.elevenLabsApiKey,
    voiceId: config.synthesis.voiceId,
    timeoutMs: config.connectTimeoutMs,
    http: deps.http,
  });
  logger('assistant').info({ voice: voice.name, voiceId: voice.voiceId }, 'using voice');

  const transcription = new ElevenLabsTranscriptionClient({
    apiKey: config.elevenLabsApiKey,
    model: config.transcription.model,
    language: config.transcription.language,
    sampleRate: source.format.sampleRate,
    connectTimeoutMs: config.connectTimeoutMs,
    connector: deps.connector,
    logger: logger('transcription'),
  });

  const { provider, ...generationOptions } = config.generation;
  const generation: GenerationClient =
    provider === 'openai'
      ? new OpenAIGenerationClient({ ...generationOptions, client: deps.openai, logger: logger('generation') })
      : new AnthropicGenerationClient({ ...generationOptions, client: deps.anthropic, logger: logger('generation') });

  const synthesis = new ElevenLabsSynthesisClient({
    apiKey: config.elevenLabsApiKey,
    voiceId: voice.voiceId,
    model: config.synthesis.model,
    outputFormat: config.synthesis.outputFormat,
    connectTimeoutMs: config.connectTimeoutMs,
    connector: deps.connector,
    logger: logger('synthesis'),
  });

  const encoding = synthesis.encoding;
  const decoder: AudioDecoder =
    encoding.codec === 'pcm'
      ? new PcmDecoder({ sampleRate: encoding.sampleRate, channels: encoding.channels })
      : new Mp3Decoder({ createDecoder: deps.createDecoder, logger: logger('mp3-decoder') });

  const output: AudioOutput = options.output
    ? new WavFileOutput(options.output)
    : new CommandAudioOutput({ spawn: deps.spawn, logger: logger('playback-output') });

  const playback = new PlaybackSink({
    decoder,
    output,
    preBufferBytes: config.playback.preBufferBytes,
    onDecodeFailure: config.playback.onDecodeFailure,
    logger: logger('playback'),
  });

  const coordinator = new PipelineCoordinator({
    transcription,
    generation,
    synthesis,
    playback,
    pollIntervalMs: config.cancelPollMs,
    logger: logger('coordinator'),
  });

  return {
    session: new VoiceSession({ coordinator, onTurn: options.onTurn }),
    source,
    voice,
    close: () => decoder.free(),
  };
}
