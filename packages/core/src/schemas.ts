/**
 * Wire schemas
 *
 * zod schemas for everything that crosses a process boundary.
 */

import { z } from 'zod';

// ============================================
// Identifiers
// ============================================

export const TokenSymbolSchema = z
  .string()
  .trim()
  .regex(/^[A-Za-z0-9]{1,20}$/, 'Token symbol must be 1-20 alphanumeric characters')
  .transform((s) => s.toUpperCase());

export const AddressSchema = z.string().trim().min(1).max(64);

export const TokenListSchema = z.array(TokenSymbolSchema).max(100);

// ============================================
// Sentiment Records
// ============================================

const LabelSchema = z.enum(['bullish', 'neutral', 'bearish']);

export const SentimentClassSchema = z.object({
  label: LabelSchema,
  confidence: z.number().min(0).max(1),
  probabilities: z.object({
    bullish: z.number().min(0).max(1),
    neutral: z.number().min(0).max(1),
    bearish: z.number().min(0).max(1),
  }),
});

export const TokenSentimentJsonSchema = z.object({
  token: z.string(),
  timestamp: z.string().datetime({ offset: true }),
  sentimentScore: z.number().min(0).max(100),
  sentimentLabel: LabelSchema,
  confidence: z.number().min(0).max(1),
  sampleSize: z.number().int().nonnegative(),
  bullishCount: z.number().int().nonnegative(),
  neutralCount: z.number().int().nonnegative(),
  bearishCount: z.number().int().nonnegative(),
  avgLikes: z.number(),
  avgRetweets: z.number(),
  avgReplies: z.number(),
  trend: z.enum(['rising', 'falling', 'stable', 'insufficient_data']),
  trendStrength: z.number().min(0).max(1),
});

export const SnipeSignalJsonSchema = z.object({
  tokenAddress: z.string(),
  tokenSymbol: z.string(),
  tokenName: z.string(),
  dex: z.string(),
  poolAddress: z.string(),
  volumeScore: z.number().min(0).max(100),
  sentimentScore: z.number().min(0).max(100),
  devWalletScore: z.number().min(0).max(100),
  liquidityScore: z.number().min(0).max(100),
  overallScore: z.number().min(0).max(100),
  prediction: z.enum(['100x', '10x', '5x', '2x', 'hold', 'avoid']),
  confidence: z.number().min(0).max(100),
  keySignals: z.array(z.string()),
  risks: z.array(z.string()),
  recommendation: z.string(),
  createdAt: z.string(),
  analysisTimestamp: z.string(),
});

const TimeframeAggregateSchema = z.object({
  mean: z.number(),
  median: z.number(),
  std: z.number(),
  min: z.number(),
  max: z.number(),
  samples: z.number().int().nonnegative(),
  trend: z.enum(['bullish', 'bearish', 'neutral']),
});

/**
 * A token's history over the last `hours`, with aggregate views
 */
export const HistoryWindowSchema = z.object({
  token: z.string(),
  hours: z.number().positive(),
  count: z.number().int().nonnegative(),
  averageScore: z.number(),
  trend: z.enum(['rising', 'falling', 'stable', 'insufficient_data']),
  trendStrength: z.number().min(0).max(1),
  outliers: z.array(z.number().int().nonnegative()),
  timeframes: z.object({
    '5m': TimeframeAggregateSchema,
    '1h': TimeframeAggregateSchema,
    '4h': TimeframeAggregateSchema,
    '24h': TimeframeAggregateSchema,
  }),
  entries: z.array(TokenSentimentJsonSchema),
});

export type HistoryWindow = z.infer<typeof HistoryWindowSchema>;

export const HistoryExportSchema = z.object({
  timestamp: z.string(),
  tokens: z.record(z.array(TokenSentimentJsonSchema)),
});

export const SentimentMapSchema = z.record(TokenSentimentJsonSchema);

export type HistoryExport = z.infer<typeof HistoryExportSchema>;

// ============================================
// Snipe Requests
// ============================================

export const TokenPairSchema = z.object({
  tokenAddress: AddressSchema,
  tokenSymbol: TokenSymbolSchema,
  tokenName: z.string().min(1).max(100),
  dex: z.string().min(1).max(50).default('unknown'),
  poolAddress: AddressSchema,
  chain: z.string().min(1).max(20).default('base'),
  liquidityUsd: z.number().nonnegative().default(0),
  createdAt: z.coerce.date().default(() => new Date()),
  deployerAddress: AddressSchema.optional(),
});

export type TokenPairInput = z.input<typeof TokenPairSchema>;

// ============================================
// Post Ingestion
// ============================================

export const SocialPostInputSchema = z.object({
  id: z.string().min(1).max(100),
  text: z.string().min(1).max(2000),
  author: z.string().max(100).optional(),
  likes: z.number().int().nonnegative().default(0),
  retweets: z.number().int().nonnegative().default(0),
  replies: z.number().int().nonnegative().default(0),
  postedAt: z.coerce.date().default(() => new Date()),
});

export const PostBatchSchema = z.object({
  posts: z.array(SocialPostInputSchema).min(1).max(500),
});

export type PostBatchInput = z.input<typeof PostBatchSchema>;

// ============================================
// Subscription Channel
// ============================================

export const ClientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ping') }),
  z.object({ type: z.literal('request_sentiment'), tokens: TokenListSchema.optional() }),
  z.object({ type: z.literal('subscribe'), tokens: TokenListSchema.optional() }),
  z.object({ type: z.literal('unsubscribe'), tokens: TokenListSchema.optional() }),
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;

export type ServerMessageType =
  | 'connection'
  | 'pong'
  | 'sentiment'
  | 'subscribed'
  | 'unsubscribed'
  | 'sentiment_update'
  | 'error';

export interface ServerMessage {
  type: ServerMessageType;
  timestamp: string;
  [key: string]: unknown;
}
