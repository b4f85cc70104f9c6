/**
 * MP3 decoder tests
 *
 * The wasm decoder is replaced by a scripted one; what matters here is how
 * its results are turned into PCM or skips.
 */

import { describe, it, expect, vi } from 'vitest';
import { PlaybackSink, silentLogger, type SynthesisChunk } from '@cascade-voice/core';
import { interleave, Mp3Decoder, type MpegDecoderLike } from '../src/index.js';
import { RecordingOutput } from '../../../test/harness/index.js';

type Decoded = ReturnType<MpegDecoderLike['decode']> & { errors?: unknown[] };

function mp3(index: number, bytes: number[] = [0xff, 0xfb, 0x90, 0x00]): SynthesisChunk {
  return { index, data: Uint8Array.from(bytes), encoding: { codec: 'mp3', sampleRate: 44100, bitrate: 128 } };
}

function scripted(...results: Array<Decoded | Error>) {
  const decoder = {
    ready: Promise.resolve(),
    decode: vi.fn((_data: Uint8Array): Decoded => {
      const next = results.shift();
      if (next === undefined) return { channelData: [], samplesDecoded: 0, sampleRate: 0 };
      if (next instanceof Error) throw next;
      return next;
    }),
    reset: vi.fn(async () => undefined),
    free: vi.fn(),
  };
  return decoder;
}

function mono(samples: number[], sampleRate = 44100): Decoded {
  return { channelData: [Float32Array.from(samples)], samplesDecoded: samples.length, sampleRate };
}

function samplesOf(pcm: Uint8Array): number[] {
  const view = new DataView(pcm.buffer, pcm.byteOffset, pcm.byteLength);
  const out: number[] = [];
  for (let i = 0; i < pcm.byteLength; i += 2) out.push(view.getInt16(i, true));
  return out;
}

async function readyDecoder(inner: MpegDecoderLike): Promise<Mp3Decoder> {
  const decoder = new Mp3Decoder({ createDecoder: () => inner, logger: silentLogger() });
  await decoder.ready();
  return decoder;
}

describe('Mp3Decoder', () => {
  it('converts decoded frames to s16le', async () => {
    const decoder = await readyDecoder(scripted(mono([0, 0.5, -1])));

    const result = decoder.decode(mp3(0));

    expect(result.kind).toBe('ok');
    if (result.kind !== 'ok') return;
    expect(result.format).toEqual({ sampleRate: 44100, channels: 1 });
    expect(samplesOf(result.pcm)).toEqual([0, 16383, -32768]);
  });

  it('holds a chunk that completes no frame yet', async () => {
    const decoder = await readyDecoder(scripted(mono([])));

    expect(decoder.decode(mp3(0))).toEqual({ kind: 'pending' });
  });

  it('skips corrupt frames instead of throwing', async () => {
    const decoder = await readyDecoder(
      scripted({ ...mono([0.1]), errors: [{ message: 'bad header' }] }, new Error('wasm trap'))
    );

    expect(decoder.decode(mp3(0))).toEqual({ kind: 'skip', reason: '1 corrupt frame(s)' });
    expect(decoder.decode(mp3(1))).toEqual({ kind: 'skip', reason: 'decoder error: wasm trap' });
  });

  it('skips chunks before it is ready and chunks of other codecs', () => {
    const decoder = new Mp3Decoder({ createDecoder: () => scripted(), logger: silentLogger() });

    expect(decoder.decode(mp3(0))).toEqual({ kind: 'skip', reason: 'decoder not ready' });
    expect(
      decoder.decode({ index: 1, data: Uint8Array.of(1, 2), encoding: { codec: 'pcm', sampleRate: 16000, channels: 1 } })
    ).toEqual({ kind: 'skip', reason: 'unsupported codec pcm' });
  });

  it('skips a chunk whose format changed mid-stream', async () => {
    const decoder = await readyDecoder(scripted(mono([0.1]), mono([0.1], 22050)));

    decoder.decode(mp3(0));

    expect(decoder.decode(mp3(1))).toEqual({
      kind: 'skip',
      reason: 'format changed from 44100Hz/1ch to 22050Hz/1ch',
    });
  });

  it('waits for a reset before the next stream', async () => {
    const inner = scripted(mono([0.1]), mono([0.1], 22050));
    const decoder = await readyDecoder(inner);
    decoder.decode(mp3(0));

    decoder.reset();
    await decoder.ready();

    expect(inner.reset).toHaveBeenCalledTimes(1);
    expect(decoder.decode(mp3(0)).kind).toBe('ok');
  });

  it('recreates the decoder when a reset fails', async () => {
    const first = scripted();
    first.reset.mockRejectedValueOnce(new Error('reset failed'));
    const second = scripted(mono([0.25]));
    const factory = vi.fn<() => MpegDecoderLike>().mockReturnValueOnce(first).mockReturnValueOnce(second);
    const decoder = new Mp3Decoder({ createDecoder: factory, logger: silentLogger() });
    await decoder.ready();

    decoder.reset();
    await decoder.ready();

    expect(first.free).toHaveBeenCalledTimes(1);
    expect(factory).toHaveBeenCalledTimes(2);
    expect(decoder.decode(mp3(0)).kind).toBe('ok');
  });
});

/**
 * Silent MPEG-1 Layer III frames: 128 kbps, 44.1 kHz, stereo, no padding.
 * Each is 417 bytes and decodes to 1152 samples per channel.
 */
function silentMp3(frames: number): Uint8Array {
  const frameBytes = 417;
  const out = new Uint8Array(frames * frameBytes);
  for (let i = 0; i < frames; i++) {
    out.set([0xff, 0xfb, 0x90, 0x00], i * frameBytes);
  }
  return out;
}

async function* split(data: Uint8Array, size: number): AsyncGenerator<SynthesisChunk> {
  for (let offset = 0, index = 0; offset < data.byteLength; offset += size, index++) {
    yield { index, data: data.slice(offset, offset + size), encoding: { codec: 'mp3', sampleRate: 44100, bitrate: 128 } };
  }
}

describe('Mp3Decoder with mpg123', () => {
  it('plays a stream whose frames straddle chunk boundaries without skipping', async () => {
    const decoder = new Mp3Decoder({ logger: silentLogger() });
    const output = new RecordingOutput();
    const sink = new PlaybackSink({
      decoder,
      output,
      preBufferBytes: 0,
      onDecodeFailure: 'fail',
      logger: silentLogger(),
    });

    try {
      const report = await sink.play(split(silentMp3(20), 200));

      expect(report.chunksReceived).toBe(42);
      expect(report.skipped).toEqual([]);
      expect(report.bytesPlayed).toBe(20 * 1152 * 2 * 2);
      expect(output.format).toEqual({ sampleRate: 44100, channels: 2 });
      expect(output.closes).toEqual(['drain']);
    } finally {
      await decoder.ready();
      decoder.free();
    }
  });
});

describe('interleave', () => {
  it('interleaves planar stereo', () => {
    const out = interleave([Float32Array.of(1, 2, 3), Float32Array.of(-1, -2, -3)], 2);

    expect(Array.from(out)).toEqual([1, -1, 2, -2]);
  });

  it('trims mono to the decoded length', () => {
    expect(Array.from(interleave([Float32Array.of(0.5, 0.25, 9)], 2))).toEqual([0.5, 0.25]);
  });
});
