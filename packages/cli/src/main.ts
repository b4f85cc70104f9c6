#!/usr/bin/env node
import 'dotenv/config';
import * as readline from 'readline';
import { Command } from 'commander';
import {
  Channel,
  ConfigurationError,
  isAbortError,
  PipelineError,
  type TurnResult,
} from '@cascade-voice/core';
import { createAssistant } from './assistant.js';
import { loadConfig, type AssistantConfig } from './config.js';

interface CliOptions {
  input?: string;
  output?: string;
  once?: boolean;
}

/**
 * Wait for the next line of input. Resolves false when input ends or the
 * signal fires.
 */
async function nextLine(lines: Channel<string>, signal: AbortSignal): Promise<boolean> {
  try {
    const result = await lines.pull(signal);
    return !result.done;
  } catch (error: unknown) {
    if (isAbortError(error)) return false;
    throw error;
  }
}

function report(result: TurnResult): void {
  switch (result.status) {
    case 'completed': {
      console.log();
      const ttfa = result.metrics.timeToFirstAudioMs;
      if (ttfa !== undefined) {
        console.log(`Time to first audio: ${(ttfa / 1000).toFixed(2)}s`);
      }
      if (result.playback.skipped.length > 0) {
        console.log(`(${result.playback.skipped.length} audio chunk(s) could not be decoded)`);
      }
      break;
    }
    case 'no-input':
      console.log('No speech detected.');
      break;
    case 'failed':
      console.log(`\n${result.reason} (${result.stage}): ${result.error.message}`);
      console.log('You can try again.');
      break;
    case 'cancelled':
      console.log('\nCancelled.');
      break;
  }
  console.log();
}

async function run(options: CliOptions): Promise<number> {
  let config: AssistantConfig;
  try {
    config = loadConfig();
  } catch (error: unknown) {
    if (error instanceof ConfigurationError) {
      console.error(error.message);
      console.error('Copy .env.example to .env and add your API keys.');
      return 1;
    }
    throw error;
  }

  const assistant = await createAssistant(config, options);
  const { session, source } = assistant;
  console.log(`=== cascade-voice ===\nVoice: ${assistant.voice.name}\nPress Ctrl+C to exit.\n`);

  const lines = new Channel<string>();
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  rl.on('line', (line) => lines.push(line));
  rl.on('close', () => lines.close());

  const quit = new AbortController();
  let interrupted = false;
  const onInterrupt = () => {
    if (session.busy && !interrupted) {
      interrupted = true;
      session.interrupt();
      console.log('\nCancelling... press Ctrl+C again to exit.');
      return;
    }
    quit.abort();
    session.interrupt();
    rl.close();
  };
  rl.on('SIGINT', onInterrupt);
  process.on('SIGINT', onInterrupt);

  let exitCode = 0;
  try {
    while (!quit.signal.aborted) {
      if (!options.input) {
        console.log('Press Enter to start recording...');
        if (!(await nextLine(lines, quit.signal))) break;
        console.log('Recording... press Enter to stop.');
      }

      const turn = new AbortController();
      const stopRecording = new AbortController();
      if (!options.input) {
        nextLine(lines, turn.signal)
          .then(() => stopRecording.abort())
          .catch((error: unknown) => console.error(error));
      }

      let replying = false;
      interrupted = false;
      let result: TurnResult;
      try {
        result = await session.converse(source.frames(stopRecording.signal), {
          onStateChange: (state) => {
            if (state === 'transcribing') console.log('Transcribing...');
          },
          onTranscript: (event) => {
            if (event.kind === 'final' && event.text) console.log(`You: ${event.text}`);
          },
          onText: (text) => {
            if (!replying) {
              replying = true;
              process.stdout.write('Assistant: ');
            }
            process.stdout.write(text);
          },
        });
      } finally {
        turn.abort();
      }

      report(result);
      exitCode = result.status === 'failed' ? 1 : 0;
      // a file holds exactly one turn
      if (options.once || options.input) break;
    }
  } finally {
    process.off('SIGINT', onInterrupt);
    rl.close();
    assistant.close();
  }

  const stats = session.latencyReport();
  if (stats.turns > 1) {
    console.log(
      `${stats.turns} turns, median time to first audio ${(stats.timeToFirstAudio.median / 1000).toFixed(2)}s`
    );
  }
  return exitCode;
}

const program = new Command();

program
  .name('cascade-voice')
  .description('Low-latency voice assistant: speak, and hear the reply while it is still being written')
  .version('0.1.0')
  .option('-i, --input <wav>', 'read the user turn from a 16-bit mono WAV file instead of the microphone')
  .option('-o, --output <wav>', 'write the reply to a WAV file instead of the speakers')
  .option('--once', 'run a single turn and exit')
  .action(async (options: CliOptions) => {
    try {
      process.exitCode = await run(options);
    } catch (error: unknown) {
      console.error(error instanceof PipelineError ? error.message : error);
      process.exitCode = 1;
    }
  });

await program.parseAsync(process.argv);
