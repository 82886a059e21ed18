/**
 * @tokenpulse/sdk
 * Typed client SDK for the TokenPulse REST API
 *
 * Every response is checked against the API's zod schemas before it is
 * handed back.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { z } from 'zod';
import type { PostBatchInput, TokenPairInput } from '@tokenpulse/core';
import {
  AllSentimentResponseSchema,
  ExportResponseSchema,
  HealthResponseSchema,
  HistoryResponseSchema,
  IngestResponseSchema,
  InvalidateResponseSchema,
  RateLimitResponseSchema,
  SentimentResponseSchema,
  SnipeResponseSchema,
  SummaryResponseSchema,
  TokenListResponseSchema,
  TrackResponseSchema,
  UntrackResponseSchema,
} from './responses.js';

export * from './responses.js';

/**
 * SDK Configuration
 */
export interface TokenPulseSDKConfig {
  baseUrl: string;
  timeout?: number;
}

const ErrorEnvelopeSchema = z.object({
  success: z.literal(false),
  error: z.object({ code: z.string(), message: z.string() }).passthrough(),
});

/**
 * TokenPulse API error
 */
export class TokenPulseApiError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly status: number,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'TokenPulseApiError';
  }
}

/**
 * HTTP client wrapper
 */
async function request<T>(
  config: TokenPulseSDKConfig,
  method: string,
  path: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  body?: unknown
): Promise<T> {
  const response = await fetch(`${config.baseUrl}${path}`, {
    method,
    headers: body === undefined ? {} : { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
    signal: config.timeout ? AbortSignal.timeout(config.timeout) : undefined,
  });

  let json: unknown;
  try {
    json = await response.json();
  } catch {
    throw new TokenPulseApiError(`Non-JSON response from ${path}`, 'INVALID_RESPONSE', response.status);
  }

  const failure = ErrorEnvelopeSchema.safeParse(json);
  if (failure.success) {
    const { code, message, ...details } = failure.data.error;
    throw new TokenPulseApiError(message, code, response.status, details);
  }

  const parsed = z.object({ success: z.literal(true), data: schema }).safeParse(json);
  if (!response.ok || !parsed.success) {
    throw new TokenPulseApiError(`Unexpected response from ${path}`, 'INVALID_RESPONSE', response.status);
  }
  return parsed.data.data;
}

function query(params: Record<string, string | number | boolean | undefined>): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) search.set(key, String(value));
  }
  const text = search.toString();
  return text ? `?${text}` : '';
}

/**
 * TokenPulse SDK Client
 */
export class TokenPulseClient {
  private config: TokenPulseSDKConfig;

  constructor(config: TokenPulseSDKConfig) {
    this.config = { timeout: 10000, ...config, baseUrl: config.baseUrl.replace(/\/+$/, '') };
  }

  // ============================================
  // Health
  // ============================================

  async getHealth() {
    return request(this.config, 'GET', '/health', HealthResponseSchema);
  }

  // ============================================
  // Sentiment
  // ============================================

  async getSentiment(token: string, options: { useCache?: boolean } = {}) {
    return request(
      this.config,
      'GET',
      `/api/v1/sentiment/${encodeURIComponent(token)}${query({ useCache: options.useCache })}`,
      SentimentResponseSchema
    );
  }

  async getAllSentiment(options: { useCache?: boolean } = {}) {
    return request(this.config, 'GET', `/api/v1/sentiment${query({ useCache: options.useCache })}`, AllSentimentResponseSchema);
  }

  async getHistory(token: string, hours?: number) {
    return request(
      this.config,
      'GET',
      `/api/v1/sentiment/${encodeURIComponent(token)}/history${query({ hours })}`,
      HistoryResponseSchema
    );
  }

  async getSummary() {
    return request(this.config, 'GET', '/api/v1/sentiment/summary', SummaryResponseSchema);
  }

  async exportHistory() {
    return request(this.config, 'GET', '/api/v1/history/export', ExportResponseSchema);
  }

  async ingestPosts(token: string, batch: PostBatchInput) {
    return request(this.config, 'POST', `/api/v1/posts/${encodeURIComponent(token)}`, IngestResponseSchema, batch);
  }

  // ============================================
  // Tokens
  // ============================================

  async getTrackedTokens() {
    return request(this.config, 'GET', '/api/v1/tokens', TokenListResponseSchema);
  }

  async trackToken(token: string) {
    return request(this.config, 'POST', '/api/v1/tokens', TrackResponseSchema, { token });
  }

  async untrackToken(token: string) {
    return request(this.config, 'DELETE', `/api/v1/tokens/${encodeURIComponent(token)}`, UntrackResponseSchema);
  }

  // ============================================
  // Snipe
  // ============================================

  async analyzeSnipe(pair: TokenPairInput, options: { useCache?: boolean } = {}) {
    return request(
      this.config,
      'POST',
      `/api/v1/snipe/analyze${query({ useCache: options.useCache })}`,
      SnipeResponseSchema,
      pair
    );
  }

  // ============================================
  // Cache & Limits
  // ============================================

  async invalidateToken(token: string) {
    return request(this.config, 'POST', `/api/v1/cache/invalidate/${encodeURIComponent(token)}`, InvalidateResponseSchema);
  }

  async clearCache() {
    return request(this.config, 'POST', '/api/v1/cache/clear', InvalidateResponseSchema);
  }

  async getRateLimitStats() {
    return request(this.config, 'GET', '/api/v1/rate-limit/stats', RateLimitResponseSchema);
  }
}

/**
 * Create a TokenPulse client instance
 */
export function createTokenPulseClient(config: TokenPulseSDKConfig): TokenPulseClient {
  return new TokenPulseClient(config);
}
