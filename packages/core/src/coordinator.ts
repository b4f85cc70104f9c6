/**
 * Drives one conversational turn through every stage.
 * @module coordinator
 */

import { randomUUID } from 'node:crypto';
import type {
  GenerationClient,
  SynthesisClient,
  TranscriptionClient,
  TranscriptionStream,
} from './adapter.js';
import { abortable, Channel, delay, linkedController } from './channel.js';
import {
  abortError,
  ConnectionError,
  failureReason,
  GenerationError,
  isAbortError,
  PipelineError,
} from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { TurnTimer } from './metrics.js';
import type { PlaybackSink } from './playback.js';
import type {
  AudioFrame,
  FailureReason,
  Message,
  PlaybackReport,
  Stage,
  TranscriptEvent,
  TurnMetrics,
  TurnState,
} from './types.js';

export interface PipelineCoordinatorOptions {
  transcription: TranscriptionClient;
  generation: GenerationClient;
  synthesis: SynthesisClient;
  playback: PlaybackSink;
  /**
   * Longest wait for a connection to close once a turn is over. A close that
   * takes longer is left to finish in the background. @default 100
   */
  pollIntervalMs?: number;
  logger?: Logger;
}

export interface TurnInput {
  /** Captured frames; the sequence ends when the user stops speaking */
  audio: AsyncIterable<AudioFrame>;
  /** Earlier turns, passed to generation as context */
  history?: readonly Message[];
  /** Cancels the turn */
  signal?: AbortSignal;
  onStateChange?: (state: TurnState) => void;
  /**
   * Partial and final transcripts. They arrive once capture has ended and
   * the stream is committed, so partials precede the final by moments only.
   */
  onTranscript?: (event: TranscriptEvent) => void;
  /** Generated text, in order, as it streams */
  onText?: (text: string) => void;
}

interface TurnSummary {
  turnId: string;
  transcript: string;
  response: string;
  metrics: TurnMetrics;
}

export type TurnResult =
  | (TurnSummary & { status: 'completed'; playback: PlaybackReport })
  | (TurnSummary & { status: 'no-input' })
  | (TurnSummary & {
      status: 'failed';
      stage: Stage;
      reason: FailureReason;
      error: PipelineError;
    })
  | (TurnSummary & { status: 'cancelled' });

/**
 * A fatal error tagged with the stage it came from.
 */
class StageFailure extends Error {
  readonly stage: Stage;
  readonly error: PipelineError;

  constructor(stage: Stage, error: unknown) {
    const wrapped = toPipelineError(stage, error);
    super(wrapped.message);
    this.name = 'StageFailure';
    this.stage = wrapped.stage ?? stage;
    this.error = wrapped;
  }
}

function toPipelineError(stage: Stage, error: unknown): PipelineError {
  if (error instanceof PipelineError) return error;
  const message = error instanceof Error ? error.message : String(error);
  if (stage === 'generation') return new GenerationError(message, undefined, error);
  return new ConnectionError(stage, message, error);
}

/**
 * Owns the lifecycle of a turn: capture → transcription → generation →
 * synthesis → playback.
 *
 * Adjacent stages overlap. Audio is transcribed remotely while it is still
 * being captured, and generated text is synthesized and played while
 * generation continues. One `AbortSignal` per turn reaches every open
 * connection: the first fatal stage error aborts it, and so does the
 * caller's signal. Every connection a turn opened is released before
 * `runTurn` settles, whatever the outcome.
 *
 * Only one turn may run at a time.
 *
 * @example
 * ```typescript
 * const coordinator = new PipelineCoordinator({ transcription, generation, synthesis, playback });
 * const result = await coordinator.runTurn({ audio: source.frames(stopRecording) });
 * if (result.status === 'failed') console.error(`${result.reason}: ${result.error.message}`);
 * ```
 */
export class PipelineCoordinator {
  private readonly transcription: TranscriptionClient;
  private readonly generation: GenerationClient;
  private readonly synthesis: SynthesisClient;
  private readonly playback: PlaybackSink;
  private readonly pollIntervalMs: number;
  private readonly logger: Logger;
  private state: TurnState = 'idle';
  private active = false;

  constructor(options: PipelineCoordinatorOptions) {
    this.transcription = options.transcription;
    this.generation = options.generation;
    this.synthesis = options.synthesis;
    this.playback = options.playback;
    this.pollIntervalMs = options.pollIntervalMs ?? 100;
    this.logger = options.logger ?? createLogger('coordinator');
  }

  /** Current state of the turn state machine */
  get currentState(): TurnState {
    return this.state;
  }

  /** True while a turn is running */
  get busy(): boolean {
    return this.active;
  }

  /**
   * Run one turn to completion, failure or cancellation. Stage failures are
   * reported in the result rather than thrown.
   *
   * @throws PipelineError `TURN_IN_PROGRESS` if another turn is running
   */
  async runTurn(input: TurnInput): Promise<TurnResult> {
    if (this.active) {
      throw new PipelineError('TURN_IN_PROGRESS', 'A turn is already running');
    }
    this.active = true;

    const turnId = randomUUID();
    const log = this.logger.child({ turnId });
    const timer = new TurnTimer();
    const { controller, dispose } = linkedController(input.signal);
    const signal = controller.signal;
    const summary = (): TurnSummary => ({ turnId, transcript, response, metrics: timer.finish() });
    const setState = (next: TurnState) => {
      if (next === this.state) return;
      this.state = next;
      input.onStateChange?.(next);
    };

    let transcript = '';
    let response = '';

    try {
      if (signal.aborted) {
        throw abortError(signal);
      }

      setState('capturing');
      transcript = await this.transcribe(input, signal, timer, setState, log);

      if (transcript.trim() === '') {
        log.info('no speech recognized');
        setState('idle');
        return { status: 'no-input', ...summary() };
      }

      setState('generating');
      const playback = await this.respond(
        { history: input.history ?? [], prompt: transcript },
        signal,
        timer,
        (text) => {
          response += text;
          input.onText?.(text);
        },
        () => setState('speaking'),
        log
      );

      const result: TurnResult = { status: 'completed', playback, ...summary() };
      log.info(
        { metrics: result.metrics, skippedChunks: playback.skipped.length },
        'turn completed'
      );
      setState('idle');
      return result;
    } catch (error: unknown) {
      setState('aborted');
      controller.abort();

      let result: TurnResult;
      if (input.signal?.aborted) {
        result = { status: 'cancelled', ...summary() };
        log.info('turn cancelled');
      } else if (error instanceof StageFailure) {
        result = {
          status: 'failed',
          stage: error.stage,
          reason: failureReason(error.stage),
          error: error.error,
          ...summary(),
        };
        log.error({ stage: error.stage, err: error.error }, 'turn failed');
      } else {
        throw error;
      }

      setState('idle');
      return result;
    } finally {
      dispose();
      this.active = false;
      if (this.state !== 'idle') {
        this.state = 'idle';
        input.onStateChange?.('idle');
      }
    }
  }

  /**
   * Stream the captured audio to the transcription service and wait for the
   * final transcript. The connection is closed before this returns.
   */
  private async transcribe(
    input: TurnInput,
    signal: AbortSignal,
    timer: TurnTimer,
    setState: (state: TurnState) => void,
    log: Logger
  ): Promise<string> {
    let stream: TranscriptionStream;
    try {
      stream = await this.transcription.startStream({ signal });
    } catch (error: unknown) {
      throw new StageFailure('transcription', error);
    }
    log.debug({ client: this.transcription.name }, 'transcription stream open');

    try {
      try {
        for await (const frame of abortable(input.audio, signal)) {
          try {
            stream.feed(frame);
          } catch (error: unknown) {
            throw new StageFailure('transcription', error);
          }
        }
      } catch (error: unknown) {
        if (error instanceof StageFailure) throw error;
        throw new StageFailure('capture', error);
      }

      timer.mark('capture_end');
      setState('transcribing');

      let finalText: string | null = null;
      try {
        for await (const event of abortable(stream.stop(), signal)) {
          input.onTranscript?.(event);
          if (event.kind === 'final') {
            finalText = event.text;
            break;
          }
        }
      } catch (error: unknown) {
        throw new StageFailure('transcription', error);
      }

      if (finalText === null) {
        throw new StageFailure(
          'transcription',
          new ConnectionError('transcription', 'Transcript stream ended without a final result')
        );
      }
      timer.mark('transcript_final');
      return finalText;
    } finally {
      await this.release('transcription', () => stream.close(), log);
    }
  }

  /**
   * Generate a reply and speak it. Text flows from generation into
   * synthesis through an ordered channel while generation is still running;
   * synthesized audio flows into the playback sink the same way.
   */
  private async respond(
    request: { history: readonly Message[]; prompt: string },
    signal: AbortSignal,
    timer: TurnTimer,
    onText: (text: string) => void,
    onFirstAudio: () => void,
    log: Logger
  ): Promise<PlaybackReport> {
    const text = new Channel<string>();
    const { controller, dispose } = linkedController(signal);
    const stageSignal = controller.signal;
    let failure: StageFailure | null = null;

    const record = (stage: Stage, error: unknown) => {
      if (failure === null && !(isAbortError(error) && stageSignal.aborted)) {
        failure = new StageFailure(stage, error);
      }
      controller.abort();
    };

    const generating = (async () => {
      let ended = false;
      try {
        const chunks = this.generation.generate(request, { signal: stageSignal });
        for await (const chunk of abortable(chunks, stageSignal)) {
          if (chunk.type === 'end') {
            log.debug({ reason: chunk.reason, chunks: chunk.index }, 'generation finished');
            ended = true;
            break;
          }
          if (chunk.text.length === 0) continue;
          timer.mark('first_token');
          onText(chunk.text);
          text.push(chunk.text);
        }
        if (!ended) {
          throw new GenerationError('Generation stream ended without an end marker');
        }
        text.close();
      } catch (error: unknown) {
        record('generation', error);
        text.fail(error);
      }
    })();

    const playing = this.playback
      .play(this.synthesis.synthesize(text.iterate(stageSignal), { signal: stageSignal }), {
        signal: stageSignal,
        onFirstAudio: (at) => {
          timer.mark('first_audio', at);
          onFirstAudio();
        },
      })
      .catch((error: unknown) => {
        record(error instanceof PipelineError && error.stage ? error.stage : 'synthesis', error);
        return null;
      });

    try {
      const [, report] = await Promise.all([generating, playing]);
      if (failure !== null) throw failure;
      if (signal.aborted) throw abortError(signal);
      if (report === null) {
        throw new StageFailure('synthesis', new ConnectionError('synthesis', 'Playback ended without a report'));
      }
      return report;
    } finally {
      dispose();
    }
  }

  private async release(stage: Stage, close: () => Promise<void>, log: Logger): Promise<void> {
    const closing = close().then(
      () => true,
      (error: unknown) => {
        log.warn({ stage, err: error }, 'failed to release connection');
        return true;
      }
    );
    const timeout = new AbortController();
    const waited = delay(this.pollIntervalMs, timeout.signal).then(
      () => false,
      () => true
    );
    const released = await Promise.race([closing, waited]);
    timeout.abort();
    if (!released) {
      log.warn({ stage, waitedMs: this.pollIntervalMs }, 'connection still closing');
    }
  }
}
