/**
 * Latency instrumentation for voice turns.
 *
 * A {@link TurnTimer} records named marks while a turn runs and derives the
 * per-turn {@link TurnMetrics}; {@link summarizeLatency} aggregates many
 * turns into percentiles.
 *
 * @module metrics
 */

import type { TurnMetrics } from './types.js';

export type TurnMark =
  | 'start'
  | 'capture_end'
  | 'transcript_final'
  | 'first_token'
  | 'first_audio'
  | 'end';

export interface StatsSummary {
  count: number;
  min: number;
  max: number;
  mean: number;
  median: number;
  p95: number;
  stdDev: number;
}

export interface LatencyReport {
  turns: number;
  total: StatsSummary;
  timeToFirstAudio: StatsSummary;
  timeToFirstToken: StatsSummary;
  transcription: StatsSummary;
}

/**
 * Records the first occurrence of each mark within one turn.
 */
export class TurnTimer {
  private readonly marks = new Map<TurnMark, number>();
  private readonly now: () => number;

  constructor(now: () => number = () => performance.now()) {
    this.now = now;
    this.mark('start');
  }

  /**
   * Record a mark. Later calls for the same mark are ignored, so stages can
   * mark "first" events without tracking it themselves.
   */
  mark(name: TurnMark, at: number = this.now()): void {
    if (!this.marks.has(name)) {
      this.marks.set(name, at);
    }
  }

  has(name: TurnMark): boolean {
    return this.marks.has(name);
  }

  /**
   * Close the turn and compute its metrics.
   */
  finish(): TurnMetrics {
    this.mark('end');
    const start = this.get('start') ?? 0;
    const end = this.get('end') ?? start;
    const captureEnd = this.get('capture_end');
    const final = this.get('transcript_final');
    const firstToken = this.get('first_token');
    const firstAudio = this.get('first_audio');

    return {
      totalMs: end - start,
      captureMs: captureEnd !== undefined ? captureEnd - start : undefined,
      transcriptionMs: span(captureEnd, final),
      timeToFirstTokenMs: span(final, firstToken),
      timeToFirstAudioMs: span(captureEnd, firstAudio),
    };
  }

  private get(name: TurnMark): number | undefined {
    return this.marks.get(name);
  }
}

function span(from: number | undefined, to: number | undefined): number | undefined {
  return from !== undefined && to !== undefined ? to - from : undefined;
}

/**
 * Calculate a statistical summary of an array of values
 */
export function calculateStats(values: number[]): StatsSummary {
  if (values.length === 0) {
    return { count: 0, min: 0, max: 0, mean: 0, median: 0, p95: 0, stdDev: 0 };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const sum = values.reduce((a, b) => a + b, 0);
  const mean = sum / values.length;

  const squaredDiffs = values.map((v) => Math.pow(v - mean, 2));
  const avgSquaredDiff = squaredDiffs.reduce((a, b) => a + b, 0) / values.length;

  return {
    count: values.length,
    min: sorted[0],
    max: sorted[sorted.length - 1],
    mean,
    median: sorted[Math.floor(sorted.length / 2)],
    p95: sorted[Math.min(sorted.length - 1, Math.floor(sorted.length * 0.95))],
    stdDev: Math.sqrt(avgSquaredDiff),
  };
}

/**
 * Aggregate the metrics of several turns. Turns missing a figure (for
 * example a failed turn with no audio) are left out of that figure only.
 */
export function summarizeLatency(turns: TurnMetrics[]): LatencyReport {
  const pick = (key: keyof TurnMetrics): number[] =>
    turns.map((turn) => turn[key]).filter((value): value is number => value !== undefined);

  return {
    turns: turns.length,
    total: calculateStats(pick('totalMs')),
    timeToFirstAudio: calculateStats(pick('timeToFirstAudioMs')),
    timeToFirstToken: calculateStats(pick('timeToFirstTokenMs')),
    transcription: calculateStats(pick('transcriptionMs')),
  };
}
