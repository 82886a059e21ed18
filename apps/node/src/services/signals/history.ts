/**
 * Sentiment History
 *
 * Append-only per-token time series. Entries are never reordered or
 * mutated; the oldest are dropped once the cap is reached.
 */

import type { SentimentTrend, TokenSentiment, TokenSentimentJson } from '@tokenpulse/core';
import { sentimentToJson } from '@tokenpulse/core';

export const HOUR_MS = 60 * 60 * 1000;
export const DEFAULT_MAX_ENTRIES = 1000;

const TREND_THRESHOLD = 5;
const STRENGTH_SAMPLES = 10;

function inWindow(entries: readonly TokenSentiment[], windowMs: number, now: Date): TokenSentiment[] {
  const cutoff = now.getTime() - windowMs;
  return entries.filter((s) => s.timestamp.getTime() > cutoff);
}

function trendOf(entries: readonly TokenSentiment[]): SentimentTrend {
  const first = entries[0];
  const last = entries[entries.length - 1];
  if (entries.length < 2 || !first || !last) return 'insufficient_data';

  if (last.sentimentScore > first.sentimentScore + TREND_THRESHOLD) return 'rising';
  if (last.sentimentScore < first.sentimentScore - TREND_THRESHOLD) return 'falling';
  return 'stable';
}

function strengthOf(entries: readonly TokenSentiment[]): number {
  const recent = entries.slice(-STRENGTH_SAMPLES);
  const first = recent[0];
  const last = recent[recent.length - 1];
  if (recent.length < 2 || !first || !last) return 0;

  return Math.min(Math.abs(last.sentimentScore - first.sentimentScore) / 50, 1);
}

export class SentimentHistory {
  private items: TokenSentiment[] = [];

  constructor(
    readonly token: string,
    private readonly maxEntries = DEFAULT_MAX_ENTRIES
  ) {}

  get size(): number {
    return this.items.length;
  }

  add(entry: TokenSentiment): void {
    this.items.push(entry);
    if (this.items.length > this.maxEntries) {
      this.items.splice(0, this.items.length - this.maxEntries);
    }
  }

  /**
   * Append a fresh record with its trend fields computed over the history
   * including it. Returns the stored record.
   */
  record(entry: TokenSentiment, windowMs = 24 * HOUR_MS): TokenSentiment {
    const candidate = [...this.items, entry];
    const stored: TokenSentiment = Object.freeze({
      ...entry,
      trend: trendOf(inWindow(candidate, windowMs, entry.timestamp)),
      trendStrength: strengthOf(candidate),
    });
    this.add(stored);
    return stored;
  }

  latest(): TokenSentiment | undefined {
    return this.items[this.items.length - 1];
  }

  entries(): readonly TokenSentiment[] {
    return this.items;
  }

  /**
   * Entries strictly newer than `now - windowMs`
   */
  window(windowMs: number, now: Date = new Date()): TokenSentiment[] {
    return inWindow(this.items, windowMs, now);
  }

  getTrend(windowMs = 24 * HOUR_MS, now: Date = new Date()): SentimentTrend {
    return trendOf(this.window(windowMs, now));
  }

  getAverageSentiment(windowMs = 24 * HOUR_MS, now: Date = new Date()): number {
    const recent = this.window(windowMs, now);
    if (recent.length === 0) return 50;
    return recent.reduce((sum, s) => sum + s.sentimentScore, 0) / recent.length;
  }

  /**
   * Change across the last 10 entries, normalized to 0-1
   */
  trendStrength(): number {
    return strengthOf(this.items);
  }

  toJSON(): TokenSentimentJson[] {
    return this.items.map(sentimentToJson);
  }
}

// ============================================
// History Store
// ============================================

export interface TokenSummary {
  token: string;
  status: 'ok' | 'no_data';
  latestScore?: number;
  latestLabel?: string;
  average24h?: number;
  trend?: SentimentTrend;
  samples?: number;
  updatedAt?: string;
}

export interface HistorySnapshot {
  timestamp: string;
  tokens: Record<string, TokenSentimentJson[]>;
}

export class HistoryStore {
  private histories = new Map<string, SentimentHistory>();

  constructor(private readonly maxEntries = DEFAULT_MAX_ENTRIES) {}

  /**
   * History for a token, created on first observation
   */
  for(token: string): SentimentHistory {
    let history = this.histories.get(token);
    if (!history) {
      history = new SentimentHistory(token, this.maxEntries);
      this.histories.set(token, history);
    }
    return history;
  }

  get(token: string): SentimentHistory | undefined {
    return this.histories.get(token);
  }

  tokens(): string[] {
    return [...this.histories.keys()];
  }

  exportAll(now: Date = new Date()): HistorySnapshot {
    const tokens: Record<string, TokenSentimentJson[]> = {};
    for (const [token, history] of this.histories) {
      tokens[token] = history.toJSON();
    }
    return { timestamp: now.toISOString(), tokens };
  }

  summary(tokens: readonly string[], now: Date = new Date()): TokenSummary[] {
    return tokens.map((token): TokenSummary => {
      const history = this.histories.get(token);
      const latest = history?.latest();
      if (!history || !latest) return { token, status: 'no_data' };

      return {
        token,
        status: 'ok',
        latestScore: latest.sentimentScore,
        latestLabel: latest.sentimentLabel,
        average24h: history.getAverageSentiment(24 * HOUR_MS, now),
        trend: history.getTrend(24 * HOUR_MS, now),
        samples: history.size,
        updatedAt: latest.timestamp.toISOString(),
      };
    });
  }
}
