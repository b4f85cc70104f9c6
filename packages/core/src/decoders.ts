import type { AudioDecoder } from './adapter.js';
import type { DecodeResult, PcmFormat, SynthesisChunk } from './types.js';

/**
 * Decoder for raw s16le synthesis output (`pcm_<rate>` formats).
 *
 * PCM needs no real decoding, but network chunk boundaries do not respect
 * sample boundaries: a trailing partial sample frame is carried over to the
 * next chunk. The first chunk fixes the stream format; a later chunk in a
 * different format is skipped.
 */
export class PcmDecoder implements AudioDecoder {
  private readonly configured: PcmFormat | null;
  private format: PcmFormat | null;
  private carry: Uint8Array = new Uint8Array(0);

  constructor(format?: PcmFormat) {
    this.configured = format ?? null;
    this.format = this.configured;
  }

  async ready(): Promise<void> {}

  decode(chunk: SynthesisChunk): DecodeResult {
    const { encoding } = chunk;
    if (encoding.codec !== 'pcm') {
      return { kind: 'skip', reason: `unsupported codec ${encoding.codec}` };
    }
    if (chunk.data.byteLength === 0) {
      return { kind: 'skip', reason: 'empty chunk' };
    }

    const format: PcmFormat = this.format ?? {
      sampleRate: encoding.sampleRate,
      channels: encoding.channels,
    };
    if (format.sampleRate !== encoding.sampleRate || format.channels !== encoding.channels) {
      return {
        kind: 'skip',
        reason: `format changed from ${format.sampleRate}Hz/${format.channels}ch to ${encoding.sampleRate}Hz/${encoding.channels}ch`,
      };
    }
    this.format = format;

    const joined = new Uint8Array(this.carry.byteLength + chunk.data.byteLength);
    joined.set(this.carry, 0);
    joined.set(chunk.data, this.carry.byteLength);

    const blockAlign = format.channels * 2;
    const usable = joined.byteLength - (joined.byteLength % blockAlign);
    this.carry = joined.slice(usable);
    if (usable === 0) return { kind: 'pending' };

    return { kind: 'ok', pcm: joined.slice(0, usable), format };
  }

  reset(): void {
    this.carry = new Uint8Array(0);
    this.format = this.configured;
  }

  free(): void {
    this.reset();
  }
}
