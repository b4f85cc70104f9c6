import type { AudioDecoder, AudioOutput, StreamOptions } from './adapter.js';
import { abortable, Channel, linkedController } from './channel.js';
import { DecodeError } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import type { PcmFormat, PlaybackReport, SynthesisChunk } from './types.js';

/**
 * What to do with a chunk the decoder cannot use.
 *
 * - `skip`: log it and carry on; the listener may hear a brief gap.
 * - `fail`: reject the playback with a {@link DecodeError}.
 */
export type DecodeFailurePolicy = 'skip' | 'fail';

export interface PlaybackSinkOptions {
  decoder: AudioDecoder;
  output: AudioOutput;
  /** PCM bytes to accumulate before the output is opened. @default 8192 */
  preBufferBytes?: number;
  /** @default 'skip' */
  onDecodeFailure?: DecodeFailurePolicy;
  logger?: Logger;
}

export interface PlayOptions extends StreamOptions {
  /** Called once, when the first PCM is written to the output */
  onFirstAudio?: (at: number) => void;
}

/**
 * Decodes synthesized chunks and plays them as one continuous stream.
 *
 * A reader task moves chunks from the network into an internal queue as they
 * arrive, so a slow decode or a blocked output never stalls the synthesis
 * connection. Playback starts once enough PCM is buffered to ride out
 * network jitter.
 */
export class PlaybackSink {
  readonly decoder: AudioDecoder;
  readonly output: AudioOutput;
  readonly preBufferBytes: number;
  readonly onDecodeFailure: DecodeFailurePolicy;
  private readonly logger: Logger;

  constructor(options: PlaybackSinkOptions) {
    this.decoder = options.decoder;
    this.output = options.output;
    this.preBufferBytes = options.preBufferBytes ?? 8192;
    this.onDecodeFailure = options.onDecodeFailure ?? 'skip';
    this.logger = options.logger ?? createLogger('playback');
  }

  /**
   * Play a chunk sequence to the end.
   *
   * @throws DecodeError under the `fail` policy
   * @throws whatever the chunk sequence throws (e.g. a synthesis `ConnectionError`)
   */
  async play(chunks: AsyncIterable<SynthesisChunk>, options: PlayOptions = {}): Promise<PlaybackReport> {
    const report: PlaybackReport = {
      chunksReceived: 0,
      chunksPlayed: 0,
      skipped: [],
      bytesPlayed: 0,
    };
    const queue = new Channel<SynthesisChunk>();
    const { controller, dispose } = linkedController(options.signal);
    const reader = this.readInto(chunks, queue, report, controller.signal);

    let format: PcmFormat | null = null;
    let opened = false;
    let prebuffer: Uint8Array[] = [];
    let prebufferBytes = 0;
    let completed = false;

    const write = async (pcm: Uint8Array) => {
      if (report.firstAudioAt === undefined) {
        report.firstAudioAt = performance.now();
        options.onFirstAudio?.(report.firstAudioAt);
      }
      await this.output.write(pcm);
      report.bytesPlayed += pcm.byteLength;
    };

    const startOutput = async (pcmFormat: PcmFormat) => {
      opened = true;
      this.logger.debug({ output: this.output.name, ...pcmFormat, prebufferBytes }, 'opening output');
      await this.output.open(pcmFormat);
      const buffered = prebuffer;
      prebuffer = [];
      prebufferBytes = 0;
      for (const pcm of buffered) {
        await write(pcm);
      }
    };

    try {
      await this.decoder.ready();

      for await (const chunk of queue.iterate(controller.signal)) {
        const result = this.decoder.decode(chunk);

        if (result.kind === 'skip') {
          if (this.onDecodeFailure === 'fail') {
            throw new DecodeError(chunk.index, result.reason);
          }
          this.logger.warn({ index: chunk.index, reason: result.reason }, 'skipping undecodable chunk');
          report.skipped.push({ index: chunk.index, reason: result.reason });
          continue;
        }
        if (result.kind === 'pending') continue;

        report.chunksPlayed++;
        format ??= result.format;
        if (result.pcm.byteLength === 0) continue;

        if (opened) {
          await write(result.pcm);
          continue;
        }

        prebuffer.push(result.pcm);
        prebufferBytes += result.pcm.byteLength;
        if (prebufferBytes >= this.preBufferBytes) {
          await startOutput(format);
        }
      }

      // short replies never fill the pre-buffer
      if (!opened && format && prebufferBytes > 0) {
        await startOutput(format);
      }
      completed = true;
    } finally {
      if (!completed) controller.abort();
      await reader;
      dispose();
      this.decoder.reset();
      if (opened) {
        await this.closeOutput(completed ? 'drain' : 'discard');
      }
    }

    this.logger.debug(
      {
        received: report.chunksReceived,
        played: report.chunksPlayed,
        skipped: report.skipped.length,
        bytes: report.bytesPlayed,
      },
      'playback finished'
    );
    return report;
  }

  private async readInto(
    chunks: AsyncIterable<SynthesisChunk>,
    queue: Channel<SynthesisChunk>,
    report: PlaybackReport,
    signal: AbortSignal
  ): Promise<void> {
    try {
      for await (const chunk of abortable(chunks, signal)) {
        report.chunksReceived++;
        queue.push(chunk);
      }
      queue.close();
    } catch (error: unknown) {
      queue.fail(error);
    }
  }

  private async closeOutput(mode: 'drain' | 'discard'): Promise<void> {
    if (mode === 'drain') {
      await this.output.close('drain');
      return;
    }
    // already unwinding from an error; a failing close must not mask it
    try {
      await this.output.close('discard');
    } catch (error: unknown) {
      this.logger.warn({ err: error, output: this.output.name }, 'failed to close output');
    }
  }
}
