/**
 * Interfaces for the stages of a voice turn.
 *
 * Each stage exposes a lazy sequence rather than callbacks, so ordering,
 * backpressure and cancellation stay visible to the coordinator. Stages are
 * composed capture → transcription → generation → synthesis → playback by
 * the `PipelineCoordinator`:
 *
 * ```typescript
 * const stream = await transcription.startStream({ signal });
 * for (const frame of frames) stream.feed(frame);
 * for await (const event of stream.stop()) {
 *   if (event.kind === 'final') prompt = event.text;
 * }
 * ```
 *
 * @module adapter
 */

import type {
  AudioEncoding,
  AudioFrame,
  DecodeResult,
  GenerationChunk,
  Message,
  PcmFormat,
  SynthesisChunk,
  TranscriptEvent,
} from './types.js';

/**
 * Options accepted by every streaming operation.
 */
export interface StreamOptions {
  /** Aborted when the turn is cancelled or another stage fails */
  signal?: AbortSignal;
}

/**
 * Microphone (or any other) audio input, chunked into fixed-size frames.
 */
export interface AudioSource {
  /** Human-readable name of the source (e.g. 'sox', 'file:hello.wav') */
  readonly name: string;

  /** Format of the frames this source produces */
  readonly format: PcmFormat;

  /**
   * Capture until `stop` fires, then flush the last partial frame and end.
   *
   * @param stop - The user's stop action
   */
  frames(stop: AbortSignal): AsyncIterable<AudioFrame>;
}

/**
 * Speech-to-text service.
 */
export interface TranscriptionClient {
  readonly name: string;

  /**
   * Open a persistent streaming connection.
   *
   * @throws ConnectionError if the service cannot be reached
   */
  startStream(options?: StreamOptions): Promise<TranscriptionStream>;
}

/**
 * One open transcription connection. Not restartable: a new turn opens a new
 * stream.
 */
export interface TranscriptionStream {
  /** Audio format the stream was opened with */
  readonly format: PcmFormat;

  /**
   * Forward a frame to the service.
   *
   * @throws ConfigurationError if the frame format does not match the stream
   */
  feed(frame: AudioFrame): void;

  /**
   * Signal the end of audio and return the stream's events: buffered
   * partials followed by exactly one `final`.
   */
  stop(): AsyncIterable<TranscriptEvent>;

  /** Release the connection. Safe to call more than once. */
  close(): Promise<void>;
}

/**
 * Input to a generation request.
 */
export interface GenerationRequest {
  /** Earlier turns, read-only context */
  history: readonly Message[];
  /** The finalized user transcript for this turn */
  prompt: string;
}

/**
 * Text-generation service.
 */
export interface GenerationClient {
  readonly name: string;

  /**
   * Stream a response. The sequence ends with a single `end` chunk.
   *
   * @throws GenerationError on remote failure
   */
  generate(request: GenerationRequest, options?: StreamOptions): AsyncIterable<GenerationChunk>;
}

/**
 * Text-to-speech service.
 */
export interface SynthesisClient {
  readonly name: string;

  /** Encoding of the chunks this client requests */
  readonly encoding: AudioEncoding;

  /**
   * Synthesize text while it is still being produced. Chunks are forwarded
   * exactly as received; decoding is the playback sink's job.
   */
  synthesize(text: AsyncIterable<string>, options?: StreamOptions): AsyncIterable<SynthesisChunk>;
}

/**
 * Turns encoded chunks back into PCM.
 */
export interface AudioDecoder {
  /** Resolves once the decoder can accept chunks */
  ready(): Promise<void>;

  /** Decode one chunk. Never throws for malformed input. */
  decode(chunk: SynthesisChunk): DecodeResult;

  /** Drop any state carried between chunks, ready for the next stream */
  reset(): void;

  /** Release native or wasm resources */
  free(): void;
}

/**
 * Speaker (or any other) PCM output.
 */
export interface AudioOutput {
  readonly name: string;

  /** Prepare the device for the given format. Called once per playback. */
  open(format: PcmFormat): Promise<void>;

  /** Write samples, resolving when the output can take more. */
  write(pcm: Uint8Array): Promise<void>;

  /**
   * Release the device. `drain` (the default) lets buffered audio finish;
   * `discard` stops at once, as on cancellation.
   */
  close(mode?: 'drain' | 'discard'): Promise<void>;
}
