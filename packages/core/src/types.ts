/**
 * TokenPulse Core Types
 *
 * Records shared by the engine, the connectors and the SDK.
 * Every record is created once and never mutated afterwards.
 */

// ============================================
// Sentiment Classification
// ============================================

export type SentimentLabel = 'bullish' | 'neutral' | 'bearish';

export const SENTIMENT_LABELS: readonly SentimentLabel[] = ['bearish', 'neutral', 'bullish'];

/**
 * Output of the classifier port for one unit of text.
 * `probabilities` sums to ~1 across the three labels.
 */
export interface SentimentClass {
  label: SentimentLabel;
  confidence: number; // 0-1
  probabilities: Record<SentimentLabel, number>;
}

// ============================================
// Social Posts
// ============================================

export interface SocialPost {
  id: string;
  text: string;
  author?: string;
  likes: number;
  retweets: number;
  replies: number;
  postedAt: Date;
}

/**
 * A post after classification, ready for aggregation
 */
export interface ClassifiedPost {
  classification: SentimentClass;
  likes: number;
  retweets: number;
  replies: number;
}

// ============================================
// Token Sentiment
// ============================================

export type SentimentTrend = 'rising' | 'falling' | 'stable' | 'insufficient_data';

export interface TokenSentiment {
  token: string;
  timestamp: Date;
  sentimentScore: number; // 0-100
  sentimentLabel: SentimentLabel;
  confidence: number; // 0-1
  sampleSize: number;

  // Label counts (sum = sampleSize)
  bullishCount: number;
  neutralCount: number;
  bearishCount: number;

  // Engagement
  avgLikes: number;
  avgRetweets: number;
  avgReplies: number;

  // Trend
  trend: SentimentTrend;
  trendStrength: number; // 0-1
}

/**
 * JSON form of TokenSentiment (dates as ISO strings)
 */
export type TokenSentimentJson = Omit<TokenSentiment, 'timestamp'> & { timestamp: string };

// ============================================
// Market Signal Sources
// ============================================

export type VolumeTrend = 'increasing' | 'stable' | 'decreasing';

/**
 * Point-in-time market snapshot for one pool
 */
export interface VolumeMetrics {
  volume5m: number;
  volume1h: number;
  volume24h: number;
  liquidityUsd: number;
  price: number;
  priceChange5m: number; // percentage
  priceChange1h: number; // percentage
  priceChange24h: number; // percentage
}

/**
 * Pressure and trend derived from a VolumeMetrics snapshot
 */
export interface VolumeAnalysis {
  buyPressure: number; // 0-100
  sellPressure: number; // 0-100
  volumeTrend: VolumeTrend;
}

export interface LiquidityMetrics {
  liquidityUsd: number;
}

export interface DevWalletMetrics {
  balances: number[];
}

/**
 * Identity of a DEX pool being scanned
 */
export interface TokenPair {
  tokenAddress: string;
  tokenSymbol: string;
  tokenName: string;
  dex: string;
  poolAddress: string;
  chain: string;
  liquidityUsd: number;
  createdAt: Date;
  deployerAddress?: string;
}

// ============================================
// Snipe Signals
// ============================================

export type Prediction = '100x' | '10x' | '5x' | '2x' | 'hold' | 'avoid';

export const PREDICTIONS: readonly Prediction[] = ['100x', '10x', '5x', '2x', 'hold', 'avoid'];

export interface SnipeSignal {
  // Identity
  tokenAddress: string;
  tokenSymbol: string;
  tokenName: string;
  dex: string;
  poolAddress: string;

  // Sub-scores (0-100)
  volumeScore: number;
  sentimentScore: number;
  devWalletScore: number;
  liquidityScore: number;

  // Combined
  overallScore: number;
  prediction: Prediction;
  confidence: number; // 0-100

  // Human-readable evidence
  keySignals: string[];
  risks: string[];
  recommendation: string;

  createdAt: Date;
  analysisTimestamp: Date;
}

export type SnipeSignalJson = Omit<SnipeSignal, 'createdAt' | 'analysisTimestamp'> & {
  createdAt: string;
  analysisTimestamp: string;
};

// ============================================
// Aggregation
// ============================================

export interface ScoreAggregate {
  mean: number;
  median: number;
  std: number;
  min: number;
  max: number;
}

export type BatchTrend = 'bullish' | 'bearish' | 'neutral';

// ============================================
// Rate Limiting
// ============================================

export interface RateLimitStats {
  limit: number;
  remaining: number;
  reset: number; // epoch seconds
}

// ============================================
// Serialization
// ============================================

export function sentimentToJson(sentiment: TokenSentiment): TokenSentimentJson {
  return { ...sentiment, timestamp: sentiment.timestamp.toISOString() };
}

export function snipeSignalToJson(signal: SnipeSignal): SnipeSignalJson {
  return {
    ...signal,
    keySignals: [...signal.keySignals],
    risks: [...signal.risks],
    createdAt: signal.createdAt.toISOString(),
    analysisTimestamp: signal.analysisTimestamp.toISOString(),
  };
}
