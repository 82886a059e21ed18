/**
 * Score Aggregator
 *
 * Batch statistics over sentiment scores: summary stats, IQR outliers,
 * half-over-half trend and a multi-timeframe view of a token's history.
 */

import type { BatchTrend, ScoreAggregate } from '@tokenpulse/core';
import type { SentimentHistory } from './history.js';

const MINUTE_MS = 60 * 1000;

export const TIMEFRAMES = {
  '5m': 5 * MINUTE_MS,
  '1h': 60 * MINUTE_MS,
  '4h': 4 * 60 * MINUTE_MS,
  '24h': 24 * 60 * MINUTE_MS,
} as const;

export type Timeframe = keyof typeof TIMEFRAMES;

export interface TimeframeAggregate extends ScoreAggregate {
  samples: number;
  trend: BatchTrend;
}

function sum(values: readonly number[]): number {
  return values.reduce((acc, v) => acc + v, 0);
}

export function aggregateScores(scores: readonly number[]): ScoreAggregate {
  if (scores.length === 0) {
    return { mean: 50, median: 50, std: 0, min: 50, max: 50 };
  }

  const sorted = [...scores].sort((a, b) => a - b);
  const n = sorted.length;
  const mean = sum(sorted) / n;
  const mid = Math.floor(n / 2);
  const median = n % 2 === 0 ? ((sorted[mid - 1] ?? 0) + (sorted[mid] ?? 0)) / 2 : (sorted[mid] ?? 0);

  // sample standard deviation
  const std = n > 1 ? Math.sqrt(sum(sorted.map((s) => (s - mean) ** 2)) / (n - 1)) : 0;

  return {
    mean,
    median,
    std,
    min: sorted[0] ?? 50,
    max: sorted[n - 1] ?? 50,
  };
}

/**
 * Indices of scores outside [Q1 - 1.5 IQR, Q3 + 1.5 IQR].
 * Quartiles are taken by index, not interpolated.
 */
export function detectOutliers(scores: readonly number[]): number[] {
  const n = scores.length;
  if (n < 4) return [];

  const sorted = [...scores].sort((a, b) => a - b);
  const q1 = sorted[Math.floor(n / 4)] ?? 0;
  const q3 = sorted[Math.floor((3 * n) / 4)] ?? 0;
  const iqr = q3 - q1;
  const lower = q1 - 1.5 * iqr;
  const upper = q3 + 1.5 * iqr;

  const outliers: number[] = [];
  scores.forEach((score, index) => {
    if (score < lower || score > upper) outliers.push(index);
  });
  return outliers;
}

/**
 * Compare the mean of the second half against the first (odd extra element
 * goes to the second half).
 */
export function calculateTrend(scores: readonly number[]): BatchTrend {
  if (scores.length < 2) return 'neutral';

  const mid = Math.floor(scores.length / 2);
  const first = scores.slice(0, mid);
  const second = scores.slice(mid);
  const firstAvg = sum(first) / first.length;
  const secondAvg = sum(second) / second.length;

  if (secondAvg > firstAvg * 1.1) return 'bullish';
  if (secondAvg < firstAvg * 0.9) return 'bearish';
  return 'neutral';
}

export function aggregateTimeframes(
  history: SentimentHistory,
  now: Date = new Date()
): Record<Timeframe, TimeframeAggregate> {
  const frame = (windowMs: number): TimeframeAggregate => {
    const scores = history.window(windowMs, now).map((s) => s.sentimentScore);
    return { ...aggregateScores(scores), samples: scores.length, trend: calculateTrend(scores) };
  };

  return {
    '5m': frame(TIMEFRAMES['5m']),
    '1h': frame(TIMEFRAMES['1h']),
    '4h': frame(TIMEFRAMES['4h']),
    '24h': frame(TIMEFRAMES['24h']),
  };
}
