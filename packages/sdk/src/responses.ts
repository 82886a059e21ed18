/**
 * Response payload schemas for the REST API
 */

import { z } from 'zod';
import {
  HistoryExportSchema,
  HistoryWindowSchema,
  SentimentMapSchema,
  SnipeSignalJsonSchema,
  TokenSentimentJsonSchema,
} from '@tokenpulse/core';

const SourceSchema = z.enum(['cache', 'fresh', 'stale']);

export const SentimentResponseSchema = TokenSentimentJsonSchema.extend({
  cached: z.boolean(),
  source: SourceSchema,
  fallbackReason: z.string().nullable(),
});

export const AllSentimentResponseSchema = z.object({
  tokens: SentimentMapSchema,
  count: z.number().int(),
  cached: z.boolean(),
  source: SourceSchema,
});

export const HistoryResponseSchema = HistoryWindowSchema.extend({ cached: z.boolean() });

export const SummaryResponseSchema = z.object({
  tokens: z.array(
    z.object({
      token: z.string(),
      status: z.enum(['ok', 'no_data']),
      latestScore: z.number().optional(),
      latestLabel: z.string().optional(),
      average24h: z.number().optional(),
      trend: z.string().optional(),
      samples: z.number().int().optional(),
      updatedAt: z.string().optional(),
    })
  ),
  count: z.number().int(),
  timestamp: z.string(),
});

export const ExportResponseSchema = HistoryExportSchema;

export const SnipeResponseSchema = SnipeSignalJsonSchema.extend({ cached: z.boolean() });

export const TokenListResponseSchema = z.object({
  tokens: z.array(z.string()),
  count: z.number().int(),
});

export const TrackResponseSchema = z.object({
  token: z.string(),
  added: z.boolean(),
  tokens: z.array(z.string()),
});

export const UntrackResponseSchema = z.object({
  token: z.string(),
  removed: z.boolean(),
  tokens: z.array(z.string()),
});

export const IngestResponseSchema = z.object({
  token: z.string(),
  received: z.number().int(),
  stored: z.number().int(),
});

export const InvalidateResponseSchema = z.object({
  token: z.string().optional(),
  removed: z.number().int(),
});

export const RateLimitResponseSchema = z.object({
  clientId: z.string(),
  limit: z.number().int(),
  remaining: z.number().int(),
  reset: z.number().int(),
});

export const HealthResponseSchema = z.object({
  status: z.enum(['healthy', 'degraded', 'unhealthy']),
  timestamp: z.number(),
  version: z.string(),
  uptime: z.number(),
});

export type SentimentResponse = z.infer<typeof SentimentResponseSchema>;
export type AllSentimentResponse = z.infer<typeof AllSentimentResponseSchema>;
export type HistoryResponse = z.infer<typeof HistoryResponseSchema>;
export type SummaryResponse = z.infer<typeof SummaryResponseSchema>;
export type SnipeResponse = z.infer<typeof SnipeResponseSchema>;
export type RateLimitResponse = z.infer<typeof RateLimitResponseSchema>;
export type HealthResponse = z.infer<typeof HealthResponseSchema>;
