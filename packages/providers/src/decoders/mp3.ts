import { MPEGDecoder } from 'mpg123-decoder';
import {
  createLogger,
  floatToPcm16,
  type AudioDecoder,
  type DecodeResult,
  type Logger,
  type PcmFormat,
  type SynthesisChunk,
} from '@cascade-voice/core';

/**
 * The part of `MPEGDecoder` used here.
 */
export interface MpegDecoderLike {
  readonly ready: Promise<void>;
  decode(data: Uint8Array): { channelData: Float32Array[]; samplesDecoded: number; sampleRate: number };
  reset(): Promise<void>;
  free(): void;
}

export interface Mp3DecoderOptions {
  /** @default () => new MPEGDecoder() */
  createDecoder?: () => MpegDecoderLike;
  logger?: Logger;
}

/**
 * Decoder for MP3 synthesis output, backed by the mpg123 wasm build.
 *
 * Chunk boundaries from the network rarely line up with MPEG frames. mpg123
 * keeps the incomplete tail of one chunk and finishes the frame with the
 * next, so a chunk that yields no samples is `pending`, not a failure.
 */
export class Mp3Decoder implements AudioDecoder {
  private readonly createDecoder: () => MpegDecoderLike;
  private readonly logger: Logger;
  private decoder: MpegDecoderLike | null = null;
  private resetting: Promise<void> | null = null;
  private format: PcmFormat | null = null;

  constructor(options: Mp3DecoderOptions = {}) {
    this.createDecoder = options.createDecoder ?? (() => new MPEGDecoder());
    this.logger = options.logger ?? createLogger('mp3-decoder');
  }

  async ready(): Promise<void> {
    if (this.resetting) {
      await this.resetting;
      this.resetting = null;
    }
    this.decoder ??= this.createDecoder();
    await this.decoder.ready;
  }

  decode(chunk: SynthesisChunk): DecodeResult {
    if (chunk.encoding.codec !== 'mp3') {
      return { kind: 'skip', reason: `unsupported codec ${chunk.encoding.codec}` };
    }
    if (chunk.data.byteLength === 0) {
      return { kind: 'skip', reason: 'empty chunk' };
    }
    if (!this.decoder) {
      return { kind: 'skip', reason: 'decoder not ready' };
    }

    let decoded: ReturnType<MpegDecoderLike['decode']>;
    try {
      decoded = this.decoder.decode(chunk.data);
    } catch (error: unknown) {
      return { kind: 'skip', reason: `decoder error: ${error instanceof Error ? error.message : String(error)}` };
    }

    if ('errors' in decoded && Array.isArray(decoded.errors) && decoded.errors.length > 0) {
      return { kind: 'skip', reason: `${decoded.errors.length} corrupt frame(s)` };
    }
    if (decoded.samplesDecoded === 0 || decoded.channelData.length === 0) {
      return { kind: 'pending' };
    }

    const format: PcmFormat = { sampleRate: decoded.sampleRate, channels: decoded.channelData.length };
    if (this.format && (this.format.sampleRate !== format.sampleRate || this.format.channels !== format.channels)) {
      return {
        kind: 'skip',
        reason: `format changed from ${this.format.sampleRate}Hz/${this.format.channels}ch to ${format.sampleRate}Hz/${format.channels}ch`,
      };
    }
    this.format = format;

    return { kind: 'ok', pcm: floatToPcm16(interleave(decoded.channelData, decoded.samplesDecoded)), format };
  }

  reset(): void {
    this.format = null;
    if (!this.decoder) return;
    this.resetting = this.decoder.reset().catch((error: unknown) => {
      this.logger.warn({ err: error }, 'mp3 decoder reset failed; recreating it');
      this.decoder?.free();
      this.decoder = null;
    });
  }

  free(): void {
    this.decoder?.free();
    this.decoder = null;
    this.resetting = null;
    this.format = null;
  }
}

/**
 * Interleave planar channels into one Float32Array.
 */
export function interleave(planes: Float32Array[], frames: number): Float32Array {
  if (planes.length === 1) {
    return planes[0].subarray(0, frames);
  }
  const out = new Float32Array(frames * planes.length);
  for (let i = 0; i < frames; i++) {
    for (let c = 0; c < planes.length; c++) {
      out[i * planes.length + c] = planes[c][i];
    }
  }
  return out;
}
