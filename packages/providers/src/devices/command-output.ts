import {
  ConnectionError,
  createLogger,
  type AudioOutput,
  type Logger,
  type PcmFormat,
} from '@cascade-voice/core';
import {
  captureStderr,
  isRunning,
  rawFormatArgs,
  spawnProcess,
  type ChildProcessLike,
  type SpawnProcess,
} from './process.js';

export interface CommandAudioOutputOptions {
  /** Player executable. @default 'sox' */
  command?: string;
  /**
   * Build the player arguments for a format. The player must read raw s16le
   * from stdin. Defaults to playing on the default device with sox.
   */
  args?: (format: PcmFormat) => string[];
  spawn?: SpawnProcess;
  logger?: Logger;
}

interface Player {
  child: ChildProcessLike;
  exited: Promise<void>;
  failure: ConnectionError | null;
}

/**
 * Speaker output through an external player process fed on stdin.
 */
export class CommandAudioOutput implements AudioOutput {
  readonly name: string;
  private readonly command: string;
  private readonly args: (format: PcmFormat) => string[];
  private readonly spawn: SpawnProcess;
  private readonly logger: Logger;
  private player: Player | null = null;

  constructor(options: CommandAudioOutputOptions = {}) {
    this.command = options.command ?? 'sox';
    this.args =
      options.args ?? ((format) => ['-q', ...rawFormatArgs(format.sampleRate, format.channels), '-', '-d']);
    this.spawn = options.spawn ?? spawnProcess;
    this.logger = options.logger ?? createLogger('playback-output');
    this.name = this.command;
  }

  async open(format: PcmFormat): Promise<void> {
    if (this.player) {
      throw new ConnectionError('playback', `${this.command} is already open`);
    }
    const child = this.spawn(this.command, this.args(format));
    const stderr = captureStderr(child);
    const player: Player = { child, exited: Promise.resolve(), failure: null };

    player.exited = new Promise<void>((resolve) => {
      child.once('error', (error) => {
        player.failure ??= new ConnectionError('playback', `Could not start ${this.command}: ${error.message}`, error);
        resolve();
      });
      child.once('close', (code, signal) => {
        if (code !== 0 && signal === null) {
          const detail = stderr();
          player.failure ??= new ConnectionError(
            'playback',
            `${this.command} exited with code ${code}${detail ? `: ${detail}` : ''}`
          );
        }
        resolve();
      });
    });
    child.stdin?.on('error', (error: Error) => {
      player.failure ??= new ConnectionError('playback', `Writing to ${this.command} failed: ${error.message}`, error);
    });

    this.player = player;
    this.logger.debug({ command: this.command, ...format }, 'player started');
  }

  async write(pcm: Uint8Array): Promise<void> {
    const player = this.requirePlayer();
    if (player.failure) throw player.failure;
    const { stdin } = player.child;
    if (!stdin || !isRunning(player.child)) {
      throw new ConnectionError('playback', `${this.command} is not running`);
    }

    if (!stdin.write(pcm)) {
      // wait for the player to catch up, or die
      await Promise.race([
        new Promise<void>((resolve) => stdin.once('drain', () => resolve())),
        player.exited,
      ]);
      if (player.failure) throw player.failure;
    }
  }

  async close(mode: 'drain' | 'discard' = 'drain'): Promise<void> {
    const player = this.player;
    if (!player) return;
    this.player = null;

    if (mode === 'drain' && isRunning(player.child)) {
      player.child.stdin?.end();
    } else if (isRunning(player.child)) {
      player.child.kill('SIGTERM');
    }
    await player.exited;
    this.logger.debug({ command: this.command, mode }, 'player stopped');

    if (mode === 'drain' && player.failure) {
      throw player.failure;
    }
  }

  private requirePlayer(): Player {
    if (!this.player) {
      throw new ConnectionError('playback', `${this.command} is not open`);
    }
    return this.player;
  }
}
