/**
 * Latency instrumentation tests
 */

import { describe, it, expect } from 'vitest';
import { calculateStats, summarizeLatency, TurnTimer } from '../src/index.js';

/** A clock that returns the given readings in order */
function clock(...readings: number[]): () => number {
  let i = 0;
  return () => readings[Math.min(i++, readings.length - 1)];
}

describe('TurnTimer', () => {
  it('derives the turn figures from its marks', () => {
    const timer = new TurnTimer(clock(1000));
    timer.mark('capture_end', 1500);
    timer.mark('transcript_final', 1700);
    timer.mark('first_token', 1800);
    timer.mark('first_audio', 2100);
    timer.mark('end', 2600);

    expect(timer.finish()).toEqual({
      totalMs: 1600,
      captureMs: 500,
      transcriptionMs: 200,
      timeToFirstTokenMs: 100,
      timeToFirstAudioMs: 600,
    });
  });

  it('keeps the first occurrence of a mark', () => {
    const timer = new TurnTimer(clock(0));
    timer.mark('first_token', 10);
    timer.mark('first_token', 50);
    timer.mark('transcript_final', 5);
    timer.mark('end', 60);

    expect(timer.finish().timeToFirstTokenMs).toBe(5);
  });

  it('leaves out figures whose marks are missing', () => {
    const timer = new TurnTimer(clock(0, 40));
    const metrics = timer.finish();

    expect(metrics).toEqual({
      totalMs: 40,
      captureMs: undefined,
      transcriptionMs: undefined,
      timeToFirstTokenMs: undefined,
      timeToFirstAudioMs: undefined,
    });
    expect(timer.has('first_audio')).toBe(false);
  });
});

describe('calculateStats', () => {
  it('summarizes a set of values', () => {
    const stats = calculateStats([30, 10, 20, 40]);

    expect(stats.count).toBe(4);
    expect(stats.min).toBe(10);
    expect(stats.max).toBe(40);
    expect(stats.mean).toBe(25);
    expect(stats.median).toBe(30);
    expect(stats.p95).toBe(40);
    expect(stats.stdDev).toBeCloseTo(Math.sqrt(125));
  });

  it('returns zeros for no values', () => {
    expect(calculateStats([])).toEqual({ count: 0, min: 0, max: 0, mean: 0, median: 0, p95: 0, stdDev: 0 });
  });
});

describe('summarizeLatency', () => {
  it('aggregates each figure over the turns that have it', () => {
    const report = summarizeLatency([
      { totalMs: 1000, timeToFirstAudioMs: 400, transcriptionMs: 100 },
      { totalMs: 2000, transcriptionMs: 300 },
    ]);

    expect(report.turns).toBe(2);
    expect(report.total.mean).toBe(1500);
    expect(report.timeToFirstAudio.count).toBe(1);
    expect(report.timeToFirstAudio.max).toBe(400);
    expect(report.transcription.min).toBe(100);
    expect(report.timeToFirstToken.count).toBe(0);
  });
});
