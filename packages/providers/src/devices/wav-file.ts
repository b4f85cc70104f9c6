import * as fs from 'fs/promises';
import * as path from 'path';
import {
  delay,
  encodeWav,
  FrameAssembler,
  isAbortError,
  parseWav,
  type AudioFrame,
  type AudioOutput,
  type AudioSource,
  type PcmFormat,
} from '@cascade-voice/core';

export interface WavFileSourceOptions {
  /** @default 100 */
  frameMs?: number;
  /** Pace frames at their real duration, as a microphone would. @default false */
  realtime?: boolean;
}

/**
 * Resolve after `ms`, or as soon as the signal fires.
 */
const pause = (ms: number, signal: AbortSignal): Promise<void> =>
  delay(ms, signal).catch((error: unknown) => {
    if (!isAbortError(error)) throw error;
  });

/**
 * Reads a 16-bit PCM WAV file as if it were being spoken into a microphone.
 */
export class WavFileSource implements AudioSource {
  readonly name: string;
  readonly format: PcmFormat;
  private readonly samples: Uint8Array;
  private readonly frameMs: number;
  private readonly realtime: boolean;

  constructor(name: string, wav: Uint8Array, options: WavFileSourceOptions = {}) {
    const parsed = parseWav(wav);
    this.name = name;
    this.format = { sampleRate: parsed.sampleRate, channels: parsed.channels };
    this.samples = parsed.samples;
    this.frameMs = options.frameMs ?? 100;
    this.realtime = options.realtime ?? false;
  }

  static async open(filePath: string, options: WavFileSourceOptions = {}): Promise<WavFileSource> {
    const buffer = await fs.readFile(filePath);
    return new WavFileSource(`file:${path.basename(filePath)}`, new Uint8Array(buffer), options);
  }

  /** Duration of the file in milliseconds */
  get durationMs(): number {
    return (this.samples.byteLength / (this.format.sampleRate * this.format.channels * 2)) * 1000;
  }

  async *frames(stop: AbortSignal): AsyncGenerator<AudioFrame, void, undefined> {
    const assembler = new FrameAssembler(this.format, this.frameMs);
    for (const frame of assembler.push(this.samples)) {
      if (stop.aborted) return;
      yield frame;
      if (this.realtime) await pause(frame.durationMs, stop);
    }
    const last = assembler.flush();
    if (last && !stop.aborted) yield last;
  }
}

/**
 * Collects played PCM and writes it to a WAV file when the output closes.
 */
export class WavFileOutput implements AudioOutput {
  readonly name: string;
  readonly filePath: string;
  private format: PcmFormat | null = null;
  private chunks: Uint8Array[] = [];

  constructor(filePath: string) {
    this.filePath = filePath;
    this.name = `file:${path.basename(filePath)}`;
  }

  async open(format: PcmFormat): Promise<void> {
    this.format = format;
    this.chunks = [];
  }

  async write(pcm: Uint8Array): Promise<void> {
    this.chunks.push(pcm.slice());
  }

  /** Written whether the playback drained or was discarded */
  async close(): Promise<void> {
    const format = this.format;
    if (!format) return;
    this.format = null;

    const length = this.chunks.reduce((sum, chunk) => sum + chunk.byteLength, 0);
    const samples = new Uint8Array(length);
    let offset = 0;
    for (const chunk of this.chunks) {
      samples.set(chunk, offset);
      offset += chunk.byteLength;
    }
    this.chunks = [];

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, encodeWav(samples, format));
  }
}
