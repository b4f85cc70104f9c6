/**
 * @cascade-voice/core
 *
 * Core types, stage interfaces and orchestration for the cascade-voice
 * streaming voice pipeline.
 *
 * @packageDocumentation
 */

// Types
export type {
  PcmFormat,
  AudioFrame,
  TranscriptEvent,
  GenerationChunk,
  AudioEncoding,
  SynthesisChunk,
  DecodeResult,
  Message,
  Stage,
  TurnState,
  FailureReason,
  PlaybackReport,
  TurnMetrics,
} from './types.js';

// Stage interfaces
export type {
  StreamOptions,
  AudioSource,
  TranscriptionClient,
  TranscriptionStream,
  GenerationRequest,
  GenerationClient,
  SynthesisClient,
  AudioDecoder,
  AudioOutput,
} from './adapter.js';

// Errors
export {
  PipelineError,
  ConfigurationError,
  ConnectionError,
  GenerationError,
  DecodeError,
  isAbortError,
  abortError,
  failureReason,
} from './errors.js';
export type { ErrorCode, PipelineErrorOptions } from './errors.js';

// Streams
export { Channel, abortable, raceAbort, linkedController, delay } from './channel.js';

// Audio
export { FrameAssembler } from './frames.js';
export { PcmDecoder } from './decoders.js';
export { createWavHeader, encodeWav, parseWav, floatToPcm16, bytesPerMs } from './wav.js';
export type { WavData } from './wav.js';
export { PlaybackSink } from './playback.js';
export type { DecodeFailurePolicy, PlaybackSinkOptions, PlayOptions } from './playback.js';

// Metrics
export { TurnTimer, calculateStats, summarizeLatency } from './metrics.js';
export type { TurnMark, StatsSummary, LatencyReport } from './metrics.js';

// Orchestration
export { PipelineCoordinator } from './coordinator.js';
export type { PipelineCoordinatorOptions, TurnInput, TurnResult } from './coordinator.js';
export { VoiceSession } from './session.js';
export type { VoiceSessionOptions, ConverseOptions } from './session.js';

// Logging
export { createLogger, silentLogger } from './logger.js';
export type { Logger } from './logger.js';
