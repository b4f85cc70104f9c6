/**
 * Core types shared across all voice pipeline components.
 * @module types
 */

/**
 * Format of raw PCM audio. Samples are always signed 16-bit little-endian.
 */
export interface PcmFormat {
  /** Sample rate in Hz (e.g. 16000, 44100) */
  sampleRate: number;
  /** Number of interleaved channels (1 = mono, 2 = stereo) */
  channels: number;
}

/**
 * A fixed-duration slice of microphone audio.
 *
 * Produced by an {@link AudioSource} and handed to the transcription stream
 * exactly once.
 */
export interface AudioFrame extends PcmFormat {
  /** Position of the frame within its capture, starting at 0 */
  seq: number;
  /** Raw s16le samples */
  data: Uint8Array;
  /** Duration of the samples in `data` in milliseconds */
  durationMs: number;
}

/**
 * A speech-to-text result.
 *
 * `partial` results may still be revised; the single `final` result of a
 * stream is locked in and terminates the transcription phase of a turn.
 */
export interface TranscriptEvent {
  kind: 'partial' | 'final';
  text: string;
  /** Strictly increasing within one stream */
  seq: number;
}

/**
 * One unit of a streamed text-generation response. A sequence always ends
 * with exactly one `end` chunk.
 */
export type GenerationChunk =
  | { type: 'text'; index: number; text: string }
  | { type: 'end'; index: number; reason: string };

/**
 * Encoding of synthesized audio, shared by the synthesis client that
 * requests it and the playback sink that decodes it.
 */
export type AudioEncoding =
  | { codec: 'pcm'; sampleRate: number; channels: number }
  | { codec: 'mp3'; sampleRate: number; bitrate: number };

/**
 * An encoded audio segment as received from the synthesis service.
 */
export interface SynthesisChunk {
  index: number;
  data: Uint8Array;
  encoding: AudioEncoding;
}

/**
 * Outcome of decoding one {@link SynthesisChunk}. Decoders return `skip`
 * instead of throwing when a chunk cannot be used, and `pending` when the
 * chunk was accepted but only completes with a later one.
 */
export type DecodeResult =
  | { kind: 'ok'; pcm: Uint8Array; format: PcmFormat }
  | { kind: 'pending' }
  | { kind: 'skip'; reason: string };

/**
 * Represents a message in the conversation history.
 */
export interface Message {
  /** The role of the message sender */
  role: 'user' | 'assistant' | 'system';
  /** The text content of the message */
  content: string;
  /** Unix timestamp in milliseconds when the message was created */
  timestamp: number;
}

/**
 * The pipeline stage a failure is attributed to.
 */
export type Stage = 'capture' | 'transcription' | 'generation' | 'synthesis' | 'playback';

/**
 * State of the per-turn state machine.
 *
 * `capturing` overlaps remote transcription; `speaking` covers synthesis and
 * playback, which overlap generation.
 */
export type TurnState =
  | 'idle'
  | 'capturing'
  | 'transcribing'
  | 'generating'
  | 'speaking'
  | 'aborted';

/** User-facing name of a turn failure */
export type FailureReason =
  | 'CaptureFailed'
  | 'TranscriptionFailed'
  | 'GenerationFailed'
  | 'SynthesisFailed'
  | 'PlaybackFailed';

/**
 * Summary of one playback run.
 */
export interface PlaybackReport {
  chunksReceived: number;
  chunksPlayed: number;
  skipped: Array<{ index: number; reason: string }>;
  bytesPlayed: number;
  /** `performance.now()` at the first PCM write, if any audio was played */
  firstAudioAt?: number;
}

/**
 * Latency figures for one turn, in milliseconds.
 */
export interface TurnMetrics {
  totalMs: number;
  captureMs?: number;
  /** End of capture to the final transcript */
  transcriptionMs?: number;
  /** Final transcript to the first generated text */
  timeToFirstTokenMs?: number;
  /** End of capture to the first audio written to the output */
  timeToFirstAudioMs?: number;
}
