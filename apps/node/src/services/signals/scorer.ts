/**
 * Signal Scorer
 *
 * Pure scoring functions. Every function here is deterministic in its
 * inputs; time is passed in, never read.
 */

import type {
  ClassifiedPost,
  DevWalletMetrics,
  Prediction,
  SentimentClass,
  SentimentLabel,
  SnipeSignal,
  TokenPair,
  TokenSentiment,
  VolumeAnalysis,
  VolumeMetrics,
  VolumeTrend,
} from '@tokenpulse/core';

// ============================================
// Helpers
// ============================================

export function clamp(value: number, min = 0, max = 100): number {
  return Math.min(max, Math.max(min, value));
}

function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

// ============================================
// Sentiment
// ============================================

/**
 * Map one classification onto the 0-100 band of its label.
 * bearish [0,33], neutral [34,67], bullish [67,100]
 */
export function scoreClassification(classification: SentimentClass): number {
  switch (classification.label) {
    case 'bearish':
      return classification.confidence * 33;
    case 'neutral':
      return 34 + classification.confidence * 33;
    case 'bullish':
      return 67 + classification.confidence * 33;
  }
}

/**
 * Label with a strict majority (more than the other two combined), else neutral
 */
export function majorityLabel(counts: Record<SentimentLabel, number>): SentimentLabel {
  const total = counts.bullish + counts.neutral + counts.bearish;
  if (counts.bullish > total - counts.bullish) return 'bullish';
  if (counts.bearish > total - counts.bearish) return 'bearish';
  return 'neutral';
}

/**
 * Aggregate a batch of classified posts into a TokenSentiment.
 * Trend fields start as insufficient_data; the pipeline fills them from history.
 */
export function buildTokenSentiment(
  token: string,
  items: readonly ClassifiedPost[],
  now: Date
): TokenSentiment {
  const counts: Record<SentimentLabel, number> = { bullish: 0, neutral: 0, bearish: 0 };
  for (const item of items) {
    counts[item.classification.label] += 1;
  }

  const empty = items.length === 0;

  const sentiment: TokenSentiment = {
    token,
    timestamp: now,
    sentimentScore: empty ? 50 : mean(items.map((i) => scoreClassification(i.classification))),
    sentimentLabel: empty ? 'neutral' : majorityLabel(counts),
    confidence: mean(items.map((i) => i.classification.confidence)),
    sampleSize: items.length,
    bullishCount: counts.bullish,
    neutralCount: counts.neutral,
    bearishCount: counts.bearish,
    avgLikes: mean(items.map((i) => i.likes)),
    avgRetweets: mean(items.map((i) => i.retweets)),
    avgReplies: mean(items.map((i) => i.replies)),
    trend: 'insufficient_data',
    trendStrength: 0,
  };

  return Object.freeze(sentiment);
}

/**
 * Neutral record used when posts cannot be fetched or classified in time
 */
export function neutralSentiment(token: string, now: Date): TokenSentiment {
  return buildTokenSentiment(token, [], now);
}

/**
 * Sentiment sub-score for a snipe: bullish share pushes up, bearish share down.
 */
export function scoreSentimentBatch(classes: readonly SentimentClass[]): number {
  if (classes.length === 0) return 50;

  const bullish = classes.filter((c) => c.label === 'bullish').length;
  const bearish = classes.filter((c) => c.label === 'bearish').length;
  const bullishPct = (bullish / classes.length) * 100;
  const bearishPct = (bearish / classes.length) * 100;

  return clamp(bullishPct * 1.5 - bearishPct * 1.5 + 50);
}

// ============================================
// Volume
// ============================================

export function calculateBuyPressure(volume5m: number, volume1h: number, priceChange5m: number): number {
  const acceleration = volume1h > 0 ? Math.min(100, (volume5m / volume1h) * 100) : 0;
  const momentum = clamp(priceChange5m + 50);
  return clamp(acceleration * 0.6 + momentum * 0.4);
}

export function volumeTrend(volume5m: number, volume1h: number): VolumeTrend {
  if (volume5m === 0 || volume1h === 0) return 'stable';

  const ratio = volume5m / volume1h;
  if (ratio > 1.5) return 'increasing';
  if (ratio < 0.5) return 'decreasing';
  return 'stable';
}

export function analyzeVolume(metrics: VolumeMetrics): VolumeAnalysis {
  const buyPressure = calculateBuyPressure(metrics.volume5m, metrics.volume1h, metrics.priceChange5m);
  return {
    buyPressure,
    sellPressure: 100 - buyPressure,
    volumeTrend: volumeTrend(metrics.volume5m, metrics.volume1h),
  };
}

export function scoreVolume(metrics: VolumeMetrics | null): number {
  if (!metrics) return 0;

  const analysis = analyzeVolume(metrics);
  let score = 0;

  if (metrics.volume5m > 10_000) score += 30;
  else if (metrics.volume5m > 5_000) score += 20;

  if (analysis.volumeTrend === 'increasing') score += 30;
  else if (analysis.volumeTrend === 'stable') score += 15;

  score += (analysis.buyPressure / 100) * 40;

  return clamp(score);
}

// ============================================
// Liquidity & Dev Wallets
// ============================================

export function scoreLiquidity(liquidityUsd: number): number {
  if (liquidityUsd < 10_000) return 20;
  if (liquidityUsd < 50_000) return 40;
  if (liquidityUsd < 100_000) return 60;
  if (liquidityUsd < 500_000) return 80;
  return 100;
}

/**
 * How uniform the top holder balances are. Near-equal balances across
 * several wallets look like one operator splitting supply.
 */
export function clusteringScore(balances: readonly number[]): number {
  if (balances.length < 2) return 0;

  const avg = mean([...balances]);
  if (avg <= 0) return 0;

  const variance = mean(balances.map((b) => (b - avg) ** 2));
  const cv = Math.sqrt(variance) / avg;

  return Math.min(100, Math.max(0, 100 - cv * 100));
}

/**
 * 100 minus clustering. Without at least two holder balances there is no
 * evidence either way, so the neutral placeholder 50 is used.
 */
export function scoreDevWallet(metrics: DevWalletMetrics | null): number {
  if (!metrics || metrics.balances.length < 2) return 50;
  return 100 - clusteringScore(metrics.balances);
}

// ============================================
// Prediction
// ============================================

export const SCORE_WEIGHTS = {
  volume: 0.3,
  sentiment: 0.25,
  devWallet: 0.25,
  liquidity: 0.2,
} as const;

export interface SubScores {
  volume: number;
  sentiment: number;
  devWallet: number;
  liquidity: number;
}

export function overallScore(scores: SubScores): number {
  return (
    scores.volume * SCORE_WEIGHTS.volume +
    scores.sentiment * SCORE_WEIGHTS.sentiment +
    scores.devWallet * SCORE_WEIGHTS.devWallet +
    scores.liquidity * SCORE_WEIGHTS.liquidity
  );
}

/**
 * Tiered rule table, first match wins
 */
export function predict(
  overall: number,
  volume: number,
  sentiment: number
): { prediction: Prediction; confidence: number } {
  let prediction: Prediction;

  if (overall > 80 && volume > 70 && sentiment > 70) prediction = '100x';
  else if (overall > 70 && volume > 60) prediction = '10x';
  else if (overall > 60) prediction = '5x';
  else if (overall > 50) prediction = '2x';
  else if (overall > 40) prediction = 'hold';
  else prediction = 'avoid';

  return { prediction, confidence: overall };
}

export function extractKeySignals(
  metrics: VolumeMetrics | null,
  sentimentScore: number,
  devWalletScore: number
): string[] {
  const signals: string[] = [];

  if (metrics) {
    const analysis = analyzeVolume(metrics);
    if (analysis.volumeTrend === 'increasing') signals.push('Volume increasing rapidly');
    if (analysis.buyPressure > 70) signals.push('Strong buy pressure');
    if (metrics.priceChange5m > 5) signals.push('Price up 5%+ in 5m');
  }

  if (sentimentScore > 70) signals.push('Positive social sentiment');
  if (devWalletScore > 70) signals.push('Distributed dev wallets');

  return signals;
}

export function identifyRisks(
  metrics: VolumeMetrics | null,
  devWalletScore: number,
  liquidityUsd: number
): string[] {
  const risks: string[] = [];

  if (liquidityUsd < 50_000) risks.push('Low liquidity (<$50k)');
  if (metrics && metrics.volume24h < 100_000) risks.push('Low 24h volume');
  if (devWalletScore < 50) risks.push('Suspicious dev wallets');

  return risks;
}

export function recommend(prediction: Prediction, confidence: number, risks: readonly string[]): string {
  const pct = confidence.toFixed(0);

  switch (prediction) {
    case '100x':
      return `SNIPE SIGNAL: ${pct}% confidence. Monitor for entry. ${risks.length} risks identified.`;
    case '10x':
      return `STRONG BUY: ${pct}% confidence. Good risk/reward.`;
    case '5x':
      return `BUY: ${pct}% confidence. Decent potential.`;
    case '2x':
      return `HOLD: ${pct}% confidence. Limited upside.`;
    case 'hold':
      return `WATCH: ${pct}% confidence. Wait for stronger signals.`;
    case 'avoid':
      return `AVOID: ${pct}% confidence. Too risky.`;
  }
}

// ============================================
// Snipe Signal
// ============================================

export interface SnipeInputs {
  volume: VolumeMetrics | null;
  devWallet: DevWalletMetrics | null;
  sentiments: readonly SentimentClass[];
}

export function buildSnipeSignal(pair: TokenPair, inputs: SnipeInputs, now: Date): SnipeSignal {
  const liquidityUsd = inputs.volume?.liquidityUsd || pair.liquidityUsd;

  const scores: SubScores = {
    volume: scoreVolume(inputs.volume),
    sentiment: scoreSentimentBatch(inputs.sentiments),
    devWallet: scoreDevWallet(inputs.devWallet),
    liquidity: scoreLiquidity(liquidityUsd),
  };

  const overall = overallScore(scores);
  const { prediction, confidence } = predict(overall, scores.volume, scores.sentiment);
  const keySignals = extractKeySignals(inputs.volume, scores.sentiment, scores.devWallet);
  const risks = identifyRisks(inputs.volume, scores.devWallet, liquidityUsd);

  const signal: SnipeSignal = {
    tokenAddress: pair.tokenAddress,
    tokenSymbol: pair.tokenSymbol,
    tokenName: pair.tokenName,
    dex: pair.dex,
    poolAddress: pair.poolAddress,
    volumeScore: scores.volume,
    sentimentScore: scores.sentiment,
    devWalletScore: scores.devWallet,
    liquidityScore: scores.liquidity,
    overallScore: overall,
    prediction,
    confidence,
    keySignals,
    risks,
    recommendation: recommend(prediction, confidence, risks),
    createdAt: pair.createdAt,
    analysisTimestamp: now,
  };

  return Object.freeze(signal);
}
