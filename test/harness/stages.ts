/**
 * Scripted Stages
 *
 * In-process stand-ins for the remote services. Each one follows a script,
 * records what it was given, and reports its connections to a
 * {@link ConnectionLedger}.
 */

import {
  abortable,
  abortError,
  Channel,
  ConnectionError,
  delay,
  GenerationError,
  type AudioEncoding,
  type AudioFrame,
  type AudioOutput,
  type GenerationChunk,
  type GenerationClient,
  type GenerationRequest,
  type PcmFormat,
  type StreamOptions,
  type SynthesisChunk,
  type SynthesisClient,
  type TranscriptEvent,
  type TranscriptionClient,
  type TranscriptionStream,
} from '@cascade-voice/core';
import { concat, SPEECH_FORMAT, textToPcm } from './audio.js';
import { ConnectionLedger } from './ledger.js';

export interface TranscriptionScript {
  /** Partial results produced after the commit */
  partials?: string[];
  /** @default 'what is the weather like' */
  final?: string;
  connectError?: Error;
  /** Fail the event stream after the partials */
  error?: Error;
  /** Never produce the final result */
  stall?: boolean;
}

export class ScriptedTranscriptionClient implements TranscriptionClient {
  readonly name = 'scripted-transcription';
  readonly frames: AudioFrame[] = [];
  readonly ledger: ConnectionLedger;
  private readonly script: TranscriptionScript;

  constructor(script: TranscriptionScript = {}, ledger: ConnectionLedger = new ConnectionLedger()) {
    this.script = script;
    this.ledger = ledger;
  }

  async startStream(options: StreamOptions = {}): Promise<TranscriptionStream> {
    if (options.signal?.aborted) throw abortError(options.signal);
    if (this.script.connectError) throw this.script.connectError;

    this.ledger.open('transcription');
    const script = this.script;
    const ledger = this.ledger;
    const frames = this.frames;
    const events = new Channel<TranscriptEvent>();
    let seq = 0;
    let fed = 0;
    let closed = false;

    return {
      format: SPEECH_FORMAT,
      feed(frame) {
        frames.push(frame);
        fed++;
      },
      stop() {
        if (fed === 0) {
          events.push({ kind: 'final', text: '', seq: seq++ });
          events.close();
          return events.iterate();
        }
        for (const partial of script.partials ?? []) {
          events.push({ kind: 'partial', text: partial, seq: seq++ });
        }
        if (script.error) {
          events.fail(script.error);
        } else if (!script.stall) {
          events.push({ kind: 'final', text: script.final ?? 'what is the weather like', seq: seq++ });
          events.close();
        }
        return events.iterate();
      },
      async close() {
        if (closed) return;
        closed = true;
        events.close();
        ledger.close('transcription');
      },
    };
  }
}

export interface GenerationScript {
  /** @default ['It is ', 'sunny ', 'today.'] */
  pieces?: string[];
  /** Wait before each piece */
  delayMs?: number;
  /** Throw `error` after this many pieces */
  failAfter?: number;
  /** @default GenerationError('model overloaded', 529) */
  error?: Error;
  /** Hang after this many pieces until aborted */
  stallAfter?: number;
  /** End without the end marker */
  omitEnd?: boolean;
}

export class ScriptedGenerationClient implements GenerationClient {
  readonly name = 'scripted-generation';
  readonly requests: GenerationRequest[] = [];
  readonly ledger: ConnectionLedger;
  private readonly script: GenerationScript;

  constructor(script: GenerationScript = {}, ledger: ConnectionLedger = new ConnectionLedger()) {
    this.script = script;
    this.ledger = ledger;
  }

  get pieces(): string[] {
    return this.script.pieces ?? ['It is ', 'sunny ', 'today.'];
  }

  async *generate(request: GenerationRequest, options: StreamOptions = {}): AsyncGenerator<GenerationChunk> {
    this.requests.push({ history: [...request.history], prompt: request.prompt });
    this.ledger.open('generation');
    try {
      let index = 0;
      for (const text of this.pieces) {
        if (this.script.delayMs) await delay(this.script.delayMs, options.signal);
        if (this.script.failAfter === index) {
          throw this.script.error ?? new GenerationError('model overloaded', 529);
        }
        if (this.script.stallAfter === index) {
          await delay(60_000, options.signal);
        }
        yield { type: 'text', index: index++, text };
      }
      if (this.script.failAfter === index) {
        throw this.script.error ?? new GenerationError('model overloaded', 529);
      }
      if (this.script.stallAfter === index) {
        await delay(60_000, options.signal);
      }
      if (!this.script.omitEnd) {
        yield { type: 'end', index, reason: 'stop' };
      }
    } finally {
      this.ledger.close('generation');
    }
  }
}

export interface SynthesisScript {
  /** @default pcm, 16 kHz mono */
  encoding?: AudioEncoding;
  /** Audio for one text piece. @default one sample per character */
  render?: (text: string, index: number) => Uint8Array;
  /** Wait before each chunk */
  delayMs?: number;
  connectError?: Error;
  /** Fail with `error` after this many chunks */
  failAfter?: number;
  /** @default ConnectionError('synthesis', 'socket hang up') */
  error?: Error;
}

export class ScriptedSynthesisClient implements SynthesisClient {
  readonly name = 'scripted-synthesis';
  readonly encoding: AudioEncoding;
  readonly received: string[] = [];
  readonly ledger: ConnectionLedger;
  private readonly script: SynthesisScript;

  constructor(script: SynthesisScript = {}, ledger: ConnectionLedger = new ConnectionLedger()) {
    this.script = script;
    this.ledger = ledger;
    this.encoding = script.encoding ?? { codec: 'pcm', sampleRate: 16000, channels: 1 };
  }

  async *synthesize(text: AsyncIterable<string>, options: StreamOptions = {}): AsyncGenerator<SynthesisChunk> {
    if (options.signal?.aborted) throw abortError(options.signal);
    if (this.script.connectError) throw this.script.connectError;

    this.ledger.open('synthesis');
    const render = this.script.render ?? textToPcm;
    try {
      let index = 0;
      for await (const piece of abortable(text, options.signal)) {
        this.received.push(piece);
        if (this.script.failAfter === index) {
          throw this.script.error ?? new ConnectionError('synthesis', 'socket hang up');
        }
        if (this.script.delayMs) await delay(this.script.delayMs, options.signal);
        yield { index, data: render(piece, index), encoding: this.encoding };
        index++;
      }
    } finally {
      this.ledger.close('synthesis');
    }
  }
}

/**
 * Output that keeps everything written to it.
 */
export class RecordingOutput implements AudioOutput {
  readonly name = 'recording';
  readonly writes: Uint8Array[] = [];
  readonly closes: Array<'drain' | 'discard'> = [];
  format: PcmFormat | null = null;
  opens = 0;
  /** Reject writes with this error */
  failWith?: Error;

  async open(format: PcmFormat): Promise<void> {
    this.opens++;
    this.format = format;
  }

  async write(pcm: Uint8Array): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.writes.push(pcm.slice());
  }

  async close(mode: 'drain' | 'discard' = 'drain'): Promise<void> {
    this.closes.push(mode);
  }

  get bytes(): Uint8Array {
    return concat(this.writes);
  }
}
