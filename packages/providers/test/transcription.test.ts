/**
 * ElevenLabs realtime speech-to-text tests
 *
 * Drives the client against an in-process socket server that answers the
 * commit message the way the service does.
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  ConnectionError,
  isAbortError,
  silentLogger,
  type AudioFrame,
  type TranscriptEvent,
} from '@cascade-voice/core';
import { ElevenLabsTranscriptionClient } from '../src/index.js';
import { FakeSocketServer } from '../../../test/harness/index.js';

function frame(seq: number, data: Uint8Array = Uint8Array.of(1, 2, 3, 4), sampleRate = 16000): AudioFrame {
  return { seq, data, sampleRate, channels: 1, durationMs: data.byteLength / ((sampleRate * 2) / 1000) };
}

async function collect(events: AsyncIterable<TranscriptEvent>): Promise<TranscriptEvent[]> {
  const out: TranscriptEvent[] = [];
  for await (const event of events) out.push(event);
  return out;
}

function setup(options: { language?: string; sampleRate?: number } = {}) {
  const server = new FakeSocketServer();
  const client = new ElevenLabsTranscriptionClient({
    apiKey: 'test-secret',
    connector: server.connector,
    logger: silentLogger(),
    ...options,
  });
  return { server, client };
}

describe('ElevenLabsTranscriptionClient', () => {
  it('requires an API key', () => {
    expect(() => new ElevenLabsTranscriptionClient({ apiKey: '' })).toThrow(ConfigurationError);
    expect(() => new ElevenLabsTranscriptionClient({ apiKey: '' })).toThrow(
      'ElevenLabs API key is required for transcription'
    );
  });

  it('builds the realtime URL for manual commits', () => {
    expect(setup().client.streamUrl()).toBe(
      'wss://api.elevenlabs.io/v1/speech-to-text/realtime?model_id=scribe_v2_realtime&audio_format=pcm_16000&commit_strategy=manual'
    );
    expect(setup({ language: 'en', sampleRate: 24000 }).client.streamUrl()).toBe(
      'wss://api.elevenlabs.io/v1/speech-to-text/realtime?model_id=scribe_v2_realtime&audio_format=pcm_24000&commit_strategy=manual&language_code=en'
    );
  });

  it('authenticates with the API key header', async () => {
    const { server, client } = setup();

    await client.startStream();

    expect(server.last.options.headers).toEqual({ 'xi-api-key': 'test-secret' });
    expect(server.last.options.timeoutMs).toBe(10000);
  });

  it('streams audio, commits on stop and ends with one final', async () => {
    const { server, client } = setup();
    server.onConnect = (socket) => {
      socket.onSend = (message, s) => {
        if (message.commit !== true) return;
        s.reply({ message_type: 'partial_transcript', text: 'what is' });
        s.reply({ message_type: 'committed_transcript', text: ' what is the weather like ' });
      };
    };

    const stream = await client.startStream();
    stream.feed(frame(0));
    const events = await collect(stream.stop());

    expect(events).toEqual([
      { kind: 'partial', text: 'what is', seq: 0 },
      { kind: 'final', text: 'what is the weather like', seq: 1 },
    ]);
    expect(server.last.messages).toEqual([
      { message_type: 'input_audio_chunk', audio_base_64: 'AQIDBA==', commit: false, sample_rate: 16000 },
      { message_type: 'input_audio_chunk', audio_base_64: '', commit: true, sample_rate: 16000 },
    ]);
  });

  it('prefixes later results with segments the service committed on its own', async () => {
    const { server, client } = setup();
    server.onConnect = (socket) => {
      socket.onSend = (message, s) => {
        if (message.commit === true) {
          s.reply({ message_type: 'partial_transcript', text: 'how' });
          s.reply({ message_type: 'committed_transcript', text: 'how are you' });
        } else if (s.sent.length === 1) {
          s.reply({ message_type: 'committed_transcript', text: 'hello there' });
        }
      };
    };

    const stream = await client.startStream();
    stream.feed(frame(0));
    stream.feed(frame(1));
    const events = await collect(stream.stop());

    expect(events).toEqual([
      { kind: 'partial', text: 'hello there how', seq: 0 },
      { kind: 'final', text: 'hello there how are you', seq: 1 },
    ]);
  });

  it('finishes with an empty final when no audio was fed', async () => {
    const { server, client } = setup();

    const stream = await client.startStream();
    const events = await collect(stream.stop());

    expect(events).toEqual([{ kind: 'final', text: '', seq: 0 }]);
    expect(server.last.sent).toEqual([]);
  });

  it('can only be stopped once', async () => {
    const { client } = setup();
    const stream = await client.startStream();
    stream.stop();

    expect(() => stream.stop()).toThrow('Speech-to-text stream already stopped');
  });

  it('rejects frames in another format', async () => {
    const { client } = setup();
    const stream = await client.startStream();

    expect(() => stream.feed(frame(0, new Uint8Array(4), 44100))).toThrow(ConfigurationError);
  });

  it('fails the events on a service error', async () => {
    const { server, client } = setup();
    server.onConnect = (socket) => {
      socket.onSend = (message, s) => {
        if (message.commit === true) s.reply({ message_type: 'input_error', error: 'audio too short' });
      };
    };

    const stream = await client.startStream();
    stream.feed(frame(0));

    await expect(collect(stream.stop())).rejects.toThrow('Speech-to-text service error (input_error): audio too short');
  });

  it('refuses audio once the connection dropped', async () => {
    const { server, client } = setup();
    const stream = await client.startStream();
    server.last.drop(1011, 'internal');

    expect(() => stream.feed(frame(0))).toThrow('Speech-to-text connection closed unexpectedly (code 1011: internal)');
  });

  it('closes the socket once', async () => {
    const { server, client } = setup();
    const stream = await client.startStream();

    await stream.close();
    await stream.close();

    expect(server.last.closedWith).toEqual({ code: 1000, reason: 'done' });
    expect(server.last.isOpen).toBe(false);
  });

  it('wraps a refused connection', async () => {
    const { server, client } = setup();
    server.refuseWith = new Error('connect ECONNREFUSED');

    const error = await client.startStream().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toMatchObject({
      stage: 'transcription',
      message: 'Could not connect to speech-to-text: connect ECONNREFUSED',
    });
  });

  it('lets an aborted connect through as an abort', async () => {
    const { client } = setup();
    const controller = new AbortController();
    controller.abort();

    const error = await client.startStream({ signal: controller.signal }).catch((e: unknown) => e);

    expect(isAbortError(error)).toBe(true);
  });
});
