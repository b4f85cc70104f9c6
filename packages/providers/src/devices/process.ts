import { spawn } from 'child_process';
import type { Readable, Writable } from 'stream';

/**
 * The part of a `ChildProcess` the audio devices use.
 */
export interface ChildProcessLike {
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'error', listener: (error: Error) => void): unknown;
  once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
}

export type SpawnProcess = (command: string, args: readonly string[]) => ChildProcessLike;

export const spawnProcess: SpawnProcess = (command, args) =>
  spawn(command, [...args], { stdio: ['pipe', 'pipe', 'pipe'] });

export function isRunning(child: ChildProcessLike): boolean {
  return child.exitCode === null && child.signalCode === null;
}

/**
 * Keep the last few hundred bytes a process writes to stderr, for error
 * messages.
 */
export function captureStderr(child: ChildProcessLike, limit = 512): () => string {
  let tail = '';
  child.stderr?.on('data', (data: Buffer) => {
    tail = (tail + data.toString('utf8')).slice(-limit);
  });
  return () => tail.trim();
}

/**
 * sox arguments describing raw s16le audio.
 */
export function rawFormatArgs(sampleRate: number, channels: number): string[] {
  return ['-t', 'raw', '-b', '16', '-e', 'signed-integer', '-L', '-r', String(sampleRate), '-c', String(channels)];
}
