import {
  Channel,
  ConnectionError,
  createLogger,
  FrameAssembler,
  type AudioFrame,
  type AudioSource,
  type Logger,
  type PcmFormat,
} from '@cascade-voice/core';
import { captureStderr, isRunning, rawFormatArgs, spawnProcess, type SpawnProcess } from './process.js';

export interface CommandAudioSourceOptions {
  /** @default 16000 */
  sampleRate?: number;
  /** @default 1 */
  channels?: number;
  /** @default 100 */
  frameMs?: number;
  /** Recorder executable. @default 'sox' */
  command?: string;
  /**
   * Recorder arguments. The recorder must write raw s16le in the configured
   * format to stdout. Defaults to recording the default device with sox.
   */
  args?: string[];
  spawn?: SpawnProcess;
  logger?: Logger;
}

/**
 * Microphone capture through an external recorder process.
 */
export class CommandAudioSource implements AudioSource {
  readonly name: string;
  readonly format: PcmFormat;
  private readonly frameMs: number;
  private readonly command: string;
  private readonly args: string[];
  private readonly spawn: SpawnProcess;
  private readonly logger: Logger;

  constructor(options: CommandAudioSourceOptions = {}) {
    this.format = { sampleRate: options.sampleRate ?? 16000, channels: options.channels ?? 1 };
    this.frameMs = options.frameMs ?? 100;
    this.command = options.command ?? 'sox';
    this.args = options.args ?? [
      '-q',
      '-d',
      ...rawFormatArgs(this.format.sampleRate, this.format.channels),
      '-',
    ];
    this.spawn = options.spawn ?? spawnProcess;
    this.logger = options.logger ?? createLogger('capture');
    this.name = this.command;
  }

  async *frames(stop: AbortSignal): AsyncGenerator<AudioFrame, void, undefined> {
    const assembler = new FrameAssembler(this.format, this.frameMs);
    const data = new Channel<Uint8Array>();
    let stopping = false;

    const child = this.spawn(this.command, this.args);
    const stderr = captureStderr(child);
    child.stdout?.on('data', (bytes: Buffer) => {
      data.push(new Uint8Array(bytes.buffer, bytes.byteOffset, bytes.byteLength));
    });
    child.once('error', (error) => {
      data.fail(new ConnectionError('capture', `Could not start ${this.command}: ${error.message}`, error));
    });
    child.once('close', (code, signal) => {
      if (stopping || code === 0) {
        data.close();
        return;
      }
      const detail = stderr();
      data.fail(
        new ConnectionError(
          'capture',
          `${this.command} exited with ${signal ?? `code ${code}`}${detail ? `: ${detail}` : ''}`
        )
      );
    });

    const onStop = () => {
      stopping = true;
      if (isRunning(child)) child.kill('SIGTERM');
    };
    stop.addEventListener('abort', onStop, { once: true });
    if (stop.aborted) onStop();
    this.logger.debug({ command: this.command, ...this.format }, 'recording started');

    try {
      for await (const bytes of data.iterate()) {
        yield* assembler.push(bytes);
      }
      const last = assembler.flush();
      if (last) yield last;
      this.logger.debug({ frames: assembler.framesEmitted }, 'recording stopped');
    } finally {
      stop.removeEventListener('abort', onStop);
      if (isRunning(child)) {
        stopping = true;
        child.kill('SIGTERM');
      }
    }
  }
}
