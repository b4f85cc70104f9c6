/**
 * Minimal RIFF/WAVE support for 16-bit PCM.
 * @module wav
 */

import type { PcmFormat } from './types.js';

const HEADER_SIZE = 44;

export interface WavData extends PcmFormat {
  bitDepth: number;
  /** Raw sample bytes from the `data` chunk */
  samples: Uint8Array;
  durationMs: number;
}

/**
 * Build a canonical 44-byte WAV header.
 */
export function createWavHeader(dataLength: number, format: PcmFormat, bitDepth: number = 16): Uint8Array {
  const header = new Uint8Array(HEADER_SIZE);
  const view = new DataView(header.buffer);

  const byteRate = format.sampleRate * format.channels * (bitDepth / 8);
  const blockAlign = format.channels * (bitDepth / 8);

  // RIFF header
  writeString(view, 0, 'RIFF');
  view.setUint32(4, 36 + dataLength, true);
  writeString(view, 8, 'WAVE');

  // fmt chunk
  writeString(view, 12, 'fmt ');
  view.setUint32(16, 16, true); // chunk size
  view.setUint16(20, 1, true); // PCM format
  view.setUint16(22, format.channels, true);
  view.setUint32(24, format.sampleRate, true);
  view.setUint32(28, byteRate, true);
  view.setUint16(32, blockAlign, true);
  view.setUint16(34, bitDepth, true);

  // data chunk
  writeString(view, 36, 'data');
  view.setUint32(40, dataLength, true);

  return header;
}

/**
 * Wrap s16le samples in a WAV container.
 */
export function encodeWav(samples: Uint8Array, format: PcmFormat): Uint8Array {
  const wav = new Uint8Array(HEADER_SIZE + samples.byteLength);
  wav.set(createWavHeader(samples.byteLength, format), 0);
  wav.set(samples, HEADER_SIZE);
  return wav;
}

/**
 * Parse a PCM WAV file, walking the chunk list so files with extra chunks
 * (LIST, fact) are accepted.
 *
 * @throws Error if the buffer is not 16-bit PCM WAV
 */
export function parseWav(buffer: Uint8Array): WavData {
  if (buffer.byteLength < 12) {
    throw new Error('Not a WAV file: too short');
  }

  const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  if (readString(view, 0, 4) !== 'RIFF' || readString(view, 8, 4) !== 'WAVE') {
    throw new Error('Not a WAV file: missing RIFF/WAVE signature');
  }

  let format: { audioFormat: number; channels: number; sampleRate: number; bitDepth: number } | null =
    null;
  let offset = 12;

  while (offset + 8 <= buffer.byteLength) {
    const id = readString(view, offset, 4);
    const size = view.getUint32(offset + 4, true);
    const body = offset + 8;

    if (id === 'fmt ') {
      format = {
        audioFormat: view.getUint16(body, true),
        channels: view.getUint16(body + 2, true),
        sampleRate: view.getUint32(body + 4, true),
        bitDepth: view.getUint16(body + 14, true),
      };
    } else if (id === 'data') {
      if (!format) {
        throw new Error('Invalid WAV file: data chunk before fmt chunk');
      }
      if (format.audioFormat !== 1 || format.bitDepth !== 16) {
        throw new Error(
          `Unsupported WAV encoding: format ${format.audioFormat}, ${format.bitDepth}-bit (need 16-bit PCM)`
        );
      }
      const end = Math.min(body + size, buffer.byteLength);
      const samples = buffer.subarray(body, end);
      const bytesPerSecond = format.sampleRate * format.channels * 2;
      return {
        sampleRate: format.sampleRate,
        channels: format.channels,
        bitDepth: format.bitDepth,
        samples,
        durationMs: (samples.byteLength / bytesPerSecond) * 1000,
      };
    }

    // chunks are word aligned
    offset = body + size + (size % 2);
  }

  throw new Error('Invalid WAV file: no data chunk');
}

/**
 * Convert Float32 samples in [-1, 1] to s16le bytes.
 */
export function floatToPcm16(samples: Float32Array): Uint8Array {
  const output = new Uint8Array(samples.length * 2);
  const view = new DataView(output.buffer);
  for (let i = 0; i < samples.length; i++) {
    const s = Math.max(-1, Math.min(1, samples[i]));
    view.setInt16(i * 2, s < 0 ? s * 0x8000 : s * 0x7fff, true);
  }
  return output;
}

/**
 * Bytes per millisecond of s16le audio in the given format.
 */
export function bytesPerMs(format: PcmFormat): number {
  return (format.sampleRate * format.channels * 2) / 1000;
}

function writeString(view: DataView, offset: number, value: string): void {
  for (let i = 0; i < value.length; i++) {
    view.setUint8(offset + i, value.charCodeAt(i));
  }
}

function readString(view: DataView, offset: number, length: number): string {
  let value = '';
  for (let i = 0; i < length; i++) {
    value += String.fromCharCode(view.getUint8(offset + i));
  }
  return value;
}
