/**
 * Error taxonomy for the voice pipeline.
 * @module errors
 */

import type { FailureReason, Stage } from './types.js';

/**
 * Error codes carried by every {@link PipelineError}.
 */
export type ErrorCode =
  | 'CONFIGURATION'
  | 'CONNECTION'
  | 'GENERATION'
  | 'DECODE'
  | 'TURN_IN_PROGRESS';

export interface PipelineErrorOptions {
  stage?: Stage;
  cause?: unknown;
}

/**
 * Base class for all errors raised by pipeline components.
 */
export class PipelineError extends Error {
  readonly code: ErrorCode;
  readonly stage?: Stage;

  constructor(code: ErrorCode, message: string, options: PipelineErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'PipelineError';
    this.code = code;
    this.stage = options.stage;
  }
}

/**
 * Missing or malformed configuration. Raised before any connection is opened.
 */
export class ConfigurationError extends PipelineError {
  /** Names of the settings that were missing or invalid */
  readonly settings: string[];

  constructor(message: string, settings: string[] = [], options: PipelineErrorOptions = {}) {
    super('CONFIGURATION', message, options);
    this.name = 'ConfigurationError';
    this.settings = settings;
  }
}

/**
 * Failure to establish or keep a streaming connection to a remote service,
 * or to a local device. Fatal for the current turn.
 */
export class ConnectionError extends PipelineError {
  declare readonly stage: Stage;

  constructor(stage: Stage, message: string, cause?: unknown) {
    super('CONNECTION', message, { stage, cause });
    this.name = 'ConnectionError';
  }
}

/**
 * The text-generation service reported a failure.
 */
export class GenerationError extends PipelineError {
  readonly status?: number;

  constructor(message: string, status?: number, cause?: unknown) {
    super('GENERATION', message, { stage: 'generation', cause });
    this.name = 'GenerationError';
    this.status = status;
  }
}

/**
 * A synthesized chunk could not be decoded. Only thrown when the playback
 * sink runs with the `fail` decode policy; otherwise the chunk is skipped.
 */
export class DecodeError extends PipelineError {
  readonly chunkIndex: number;

  constructor(chunkIndex: number, reason: string) {
    super('DECODE', `Chunk ${chunkIndex} could not be decoded: ${reason}`, { stage: 'playback' });
    this.name = 'DecodeError';
    this.chunkIndex = chunkIndex;
  }
}

/**
 * True for the rejection produced by an aborted {@link AbortSignal}.
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Create the rejection used when a wait is cut short by cancellation.
 */
export function abortError(signal: AbortSignal): Error {
  if (signal.reason instanceof Error && signal.reason.name === 'AbortError') {
    return signal.reason;
  }
  const error = new Error('The operation was aborted', { cause: signal.reason });
  error.name = 'AbortError';
  return error;
}

const FAILURE_REASONS: Record<Stage, FailureReason> = {
  capture: 'CaptureFailed',
  transcription: 'TranscriptionFailed',
  generation: 'GenerationFailed',
  synthesis: 'SynthesisFailed',
  playback: 'PlaybackFailed',
};

/**
 * Map the stage of a fatal error to the reason reported to the user.
 */
export function failureReason(stage: Stage): FailureReason {
  return FAILURE_REASONS[stage];
}
