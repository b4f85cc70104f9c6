import type { AudioFrame, PcmFormat } from './types.js';
import { bytesPerMs } from './wav.js';

/**
 * Cuts arbitrary runs of PCM bytes into fixed-duration {@link AudioFrame}s.
 *
 * Recorders deliver audio in whatever block size the OS picks; the
 * transcription stream wants regular frames. The frame size is rounded down
 * to whole sample frames so no sample is ever split.
 */
export class FrameAssembler {
  readonly format: PcmFormat;
  readonly frameBytes: number;
  private pending: Uint8Array = new Uint8Array(0);
  private seq = 0;

  constructor(format: PcmFormat, frameMs: number = 100) {
    if (frameMs <= 0) {
      throw new RangeError(`frameMs must be positive, got ${frameMs}`);
    }
    const blockAlign = format.channels * 2;
    const raw = Math.floor(bytesPerMs(format) * frameMs);
    this.format = format;
    this.frameBytes = Math.max(blockAlign, raw - (raw % blockAlign));
  }

  /** Number of frames emitted so far */
  get framesEmitted(): number {
    return this.seq;
  }

  /**
   * Add bytes and return every complete frame they finish.
   */
  push(bytes: Uint8Array): AudioFrame[] {
    const joined = new Uint8Array(this.pending.byteLength + bytes.byteLength);
    joined.set(this.pending, 0);
    joined.set(bytes, this.pending.byteLength);

    const frames: AudioFrame[] = [];
    let offset = 0;
    while (joined.byteLength - offset >= this.frameBytes) {
      frames.push(this.createFrame(joined.slice(offset, offset + this.frameBytes)));
      offset += this.frameBytes;
    }
    this.pending = joined.slice(offset);
    return frames;
  }

  /**
   * Emit what is left as a final short frame, dropping any trailing partial
   * sample. Returns null when nothing usable is buffered.
   */
  flush(): AudioFrame | null {
    const blockAlign = this.format.channels * 2;
    const usable = this.pending.byteLength - (this.pending.byteLength % blockAlign);
    const rest = this.pending.slice(0, usable);
    this.pending = new Uint8Array(0);
    return usable > 0 ? this.createFrame(rest) : null;
  }

  private createFrame(data: Uint8Array): AudioFrame {
    return {
      seq: this.seq++,
      data,
      sampleRate: this.format.sampleRate,
      channels: this.format.channels,
      durationMs: data.byteLength / bytesPerMs(this.format),
    };
  }
}
