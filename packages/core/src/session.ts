/**
 * Voice session for conversation orchestration.
 * @module session
 */

import { linkedController } from './channel.js';
import type { PipelineCoordinator, TurnInput, TurnResult } from './coordinator.js';
import { PipelineError } from './errors.js';
import { summarizeLatency, type LatencyReport } from './metrics.js';
import type { AudioFrame, Message, TurnMetrics } from './types.js';

/**
 * Options for creating a voice session.
 */
export interface VoiceSessionOptions {
  /** The coordinator that runs each turn */
  coordinator: PipelineCoordinator;

  /**
   * Number of most recent messages passed to generation as context.
   * @default 20
   */
  historyLimit?: number;

  /**
   * Callback invoked when a turn finishes, whatever its outcome.
   *
   * @param result - The outcome of the turn
   */
  onTurn?: (result: TurnResult) => void;
}

export type ConverseOptions = Omit<TurnInput, 'audio' | 'history'>;

/**
 * Manages a conversation.
 *
 * The history is the only state carried between turns. A completed turn
 * appends the user and assistant messages; a turn cancelled after the reply
 * started appends the user message and the partial reply. Failed turns and
 * turns without speech leave the history untouched.
 *
 * @example
 * ```typescript
 * const session = new VoiceSession({ coordinator });
 *
 * const result = await session.converse(microphone.frames(stopRecording), {
 *   onText: (text) => process.stdout.write(text),
 * });
 *
 * // User interrupts
 * session.interrupt();
 *
 * // Access conversation history
 * const history = session.getHistory();
 * ```
 */
export class VoiceSession {
  private readonly coordinator: PipelineCoordinator;
  private readonly historyLimit: number;
  private readonly onTurn?: (result: TurnResult) => void;
  private readonly history: Message[] = [];
  private readonly metrics: TurnMetrics[] = [];
  private current: AbortController | null = null;

  constructor(options: VoiceSessionOptions) {
    this.coordinator = options.coordinator;
    this.historyLimit = options.historyLimit ?? 20;
    this.onTurn = options.onTurn;
  }

  /** True while a turn is running */
  get busy(): boolean {
    return this.current !== null;
  }

  /**
   * Run one user turn and update the history with its outcome.
   *
   * @throws PipelineError `TURN_IN_PROGRESS` if a turn is already running
   */
  async converse(audio: AsyncIterable<AudioFrame>, options: ConverseOptions = {}): Promise<TurnResult> {
    if (this.current) {
      throw new PipelineError('TURN_IN_PROGRESS', 'A turn is already running');
    }

    const { controller, dispose } = linkedController(options.signal);
    this.current = controller;
    try {
      const result = await this.coordinator.runTurn({
        ...options,
        audio,
        history: this.historyLimit > 0 ? this.history.slice(-this.historyLimit) : [],
        signal: controller.signal,
      });
      this.record(result);
      this.onTurn?.(result);
      return result;
    } finally {
      this.current = null;
      dispose();
    }
  }

  /**
   * Cancel the running turn, if any. The partial reply may still be added
   * to history.
   */
  interrupt(): void {
    this.current?.abort();
  }

  /**
   * Get the full conversation history.
   *
   * @returns Array of messages in chronological order
   */
  getHistory(): Message[] {
    return [...this.history];
  }

  clearHistory(): void {
    this.history.length = 0;
  }

  /** Latency percentiles over the completed turns */
  latencyReport(): LatencyReport {
    return summarizeLatency(this.metrics);
  }

  private record(result: TurnResult): void {
    const now = Date.now();
    switch (result.status) {
      case 'completed':
        this.history.push(
          { role: 'user', content: result.transcript, timestamp: now },
          { role: 'assistant', content: result.response, timestamp: now }
        );
        this.metrics.push(result.metrics);
        break;
      case 'cancelled':
        if (result.response.length > 0) {
          this.history.push(
            { role: 'user', content: result.transcript, timestamp: now },
            { role: 'assistant', content: result.response, timestamp: now }
          );
        }
        break;
      case 'failed':
      case 'no-input':
        break;
    }
  }
}
