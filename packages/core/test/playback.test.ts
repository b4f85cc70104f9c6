/**
 * Playback sink tests
 *
 * Chunks carry text encoded one character per sample, so the audio written
 * to the output can be read back and compared with what was sent.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  Channel,
  ConnectionError,
  DecodeError,
  delay,
  isAbortError,
  PcmDecoder,
  PlaybackSink,
  silentLogger,
  type SynthesisChunk,
} from '../src/index.js';
import { pcmToText, RecordingOutput, textToPcm } from '../../../test/harness/index.js';

function pcm(index: number, text: string): SynthesisChunk {
  return { index, data: textToPcm(text), encoding: { codec: 'pcm', sampleRate: 16000, channels: 1 } };
}

function mp3(index: number): SynthesisChunk {
  return { index, data: Uint8Array.of(0xff, 0xfb, 0x90), encoding: { codec: 'mp3', sampleRate: 44100, bitrate: 128 } };
}

async function* stream(...chunks: SynthesisChunk[]): AsyncGenerator<SynthesisChunk> {
  for (const chunk of chunks) yield chunk;
}

function createSink(options: { preBufferBytes?: number; onDecodeFailure?: 'skip' | 'fail' } = {}) {
  const output = new RecordingOutput();
  const decoder = new PcmDecoder();
  const sink = new PlaybackSink({ decoder, output, logger: silentLogger(), ...options });
  return { sink, output, decoder };
}

describe('PlaybackSink', () => {
  it('plays every chunk in order and drains the output', async () => {
    const { sink, output } = createSink({ preBufferBytes: 0 });

    const report = await sink.play(stream(pcm(0, 'It is '), pcm(1, 'sunny '), pcm(2, 'today.')));

    expect(pcmToText(output.bytes)).toBe('It is sunny today.');
    expect(output.format).toEqual({ sampleRate: 16000, channels: 1 });
    expect(output.opens).toBe(1);
    expect(output.closes).toEqual(['drain']);
    expect(report).toMatchObject({ chunksReceived: 3, chunksPlayed: 3, skipped: [], bytesPlayed: 36 });
  });

  it('holds the output closed until the pre-buffer fills', async () => {
    const { sink, output } = createSink({ preBufferBytes: 8 });
    const chunks = new Channel<SynthesisChunk>();

    const playing = sink.play(chunks.iterate());
    chunks.push(pcm(0, 'ab'));
    await delay(20);
    expect(output.opens).toBe(0);

    chunks.push(pcm(1, 'cd'));
    await vi.waitFor(() => expect(output.opens).toBe(1));
    expect(pcmToText(output.bytes)).toBe('abcd');

    chunks.close();
    await playing;
    expect(output.closes).toEqual(['drain']);
  });

  it('plays a reply shorter than the pre-buffer once the stream ends', async () => {
    const { sink, output } = createSink();

    const report = await sink.play(stream(pcm(0, 'Hi.')));

    expect(pcmToText(output.bytes)).toBe('Hi.');
    expect(report.bytesPlayed).toBe(6);
    expect(output.closes).toEqual(['drain']);
  });

  it('never opens the output for an empty stream', async () => {
    const { sink, output } = createSink();

    const report = await sink.play(stream());

    expect(output.opens).toBe(0);
    expect(output.closes).toEqual([]);
    expect(report.firstAudioAt).toBeUndefined();
  });

  it('skips an undecodable chunk and keeps playing', async () => {
    const { sink, output } = createSink({ preBufferBytes: 0 });

    const report = await sink.play(stream(pcm(0, 'one '), mp3(1), pcm(2, 'three')));

    expect(pcmToText(output.bytes)).toBe('one three');
    expect(report.chunksReceived).toBe(3);
    expect(report.chunksPlayed).toBe(2);
    expect(report.skipped).toEqual([{ index: 1, reason: 'unsupported codec mp3' }]);
    expect(output.closes).toEqual(['drain']);
  });

  it('rejects on an undecodable chunk under the fail policy', async () => {
    const { sink, output } = createSink({ preBufferBytes: 0, onDecodeFailure: 'fail' });

    const error = await sink.play(stream(pcm(0, 'one '), mp3(1), pcm(2, 'three'))).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DecodeError);
    expect(error).toMatchObject({ chunkIndex: 1, stage: 'playback' });
    expect(pcmToText(output.bytes)).toBe('one ');
    expect(output.closes).toEqual(['discard']);
  });

  it('waits for a sample split across chunks without counting a failure', async () => {
    const { sink, output } = createSink({ preBufferBytes: 0, onDecodeFailure: 'fail' });
    const bytes = textToPcm('hi');
    const encoding = { codec: 'pcm', sampleRate: 16000, channels: 1 } as const;

    const report = await sink.play(
      stream({ index: 0, data: bytes.slice(0, 1), encoding }, { index: 1, data: bytes.slice(1), encoding })
    );

    expect(pcmToText(output.bytes)).toBe('hi');
    expect(report).toMatchObject({ chunksReceived: 2, chunksPlayed: 1, skipped: [], bytesPlayed: 4 });
  });

  it('passes a synthesis failure through and discards the output', async () => {
    const { sink, output } = createSink({ preBufferBytes: 0 });
    async function* failing() {
      yield pcm(0, 'It is ');
      throw new ConnectionError('synthesis', 'socket hang up');
    }

    await expect(sink.play(failing())).rejects.toThrow('socket hang up');
    expect(output.closes).toEqual(['discard']);
  });

  it('rejects when the output fails', async () => {
    const { sink, output } = createSink({ preBufferBytes: 0 });
    output.failWith = new ConnectionError('playback', 'device unplugged');

    await expect(sink.play(stream(pcm(0, 'x')))).rejects.toThrow('device unplugged');
    expect(output.closes).toEqual(['discard']);
  });

  it('stops when the signal fires', async () => {
    const { sink, output } = createSink({ preBufferBytes: 0 });
    const chunks = new Channel<SynthesisChunk>();
    const controller = new AbortController();

    const playing = sink.play(chunks.iterate(), { signal: controller.signal });
    chunks.push(pcm(0, 'It is '));
    await vi.waitFor(() => expect(output.opens).toBe(1));
    controller.abort();

    const error = await playing.catch((e: unknown) => e);
    expect(isAbortError(error)).toBe(true);
    expect(output.closes).toEqual(['discard']);
  });

  it('reports the first audio once and resets the decoder afterwards', async () => {
    const { sink, decoder } = createSink({ preBufferBytes: 0 });
    const onFirstAudio = vi.fn();
    const reset = vi.spyOn(decoder, 'reset');

    const report = await sink.play(stream(pcm(0, 'a'), pcm(1, 'b')), { onFirstAudio });

    expect(onFirstAudio).toHaveBeenCalledTimes(1);
    expect(onFirstAudio).toHaveBeenCalledWith(report.firstAudioAt);
    expect(reset).toHaveBeenCalledTimes(1);
  });
});
