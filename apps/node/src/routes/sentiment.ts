/**
 * Sentiment API Routes
 *
 * - GET    /api/v1/sentiment                 - All tracked tokens
 * - GET    /api/v1/sentiment/summary         - History summary per tracked token
 * - GET    /api/v1/sentiment/:token          - One token, cache-aside
 * - GET    /api/v1/sentiment/:token/history  - History window and timeframe aggregates
 * - GET    /api/v1/history/export            - Full history export
 * - GET    /api/v1/tokens                    - Tracked token list
 * - POST   /api/v1/tokens                    - Track a token
 * - DELETE /api/v1/tokens/:token             - Stop tracking a token
 * - POST   /api/v1/posts/:token              - Ingest social posts for a token
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { PostBatchSchema, TokenSymbolSchema } from '@tokenpulse/core';
import type { SignalEngine } from '../services/signals/index.js';
import { parseInput } from './respond.js';

// ============================================
// Schemas
// ============================================

const TokenParamsSchema = z.object({ token: TokenSymbolSchema });

const UseCacheQuerySchema = z.object({
  useCache: z
    .enum(['true', 'false'])
    .default('true')
    .transform((v) => v === 'true'),
});

const HistoryQuerySchema = z.object({
  hours: z.coerce.number().int().min(1).max(168).default(24),
});

const TrackBodySchema = z.object({ token: TokenSymbolSchema });

// ============================================
// Routes
// ============================================

export async function registerSentimentRoutes(fastify: FastifyInstance, engine: SignalEngine): Promise<void> {
  /**
   * GET /api/v1/sentiment
   */
  fastify.get('/api/v1/sentiment', async (request) => {
    const { useCache } = parseInput(UseCacheQuerySchema, request.query, 'query');
    const { value, source } = await engine.readAll({ useCache });

    return {
      success: true,
      data: {
        tokens: value,
        count: Object.keys(value).length,
        cached: source === 'cache',
        source,
      },
    };
  });

  /**
   * GET /api/v1/sentiment/summary
   */
  fastify.get('/api/v1/sentiment/summary', async () => {
    const tokens = engine.summary();
    return {
      success: true,
      data: { tokens, count: tokens.length, timestamp: new Date().toISOString() },
    };
  });

  /**
   * GET /api/v1/sentiment/:token
   * `?useCache=false` forces a recompute
   */
  fastify.get('/api/v1/sentiment/:token', async (request) => {
    const { token } = parseInput(TokenParamsSchema, request.params, 'token');
    const { useCache } = parseInput(UseCacheQuerySchema, request.query, 'query');

    const result = await engine.readSentiment(token, { useCache });

    return {
      success: true,
      data: {
        ...result.value,
        cached: result.source === 'cache',
        source: result.source,
        fallbackReason: result.fallback?.code ?? null,
      },
    };
  });

  /**
   * GET /api/v1/sentiment/:token/history?hours=24
   */
  fastify.get('/api/v1/sentiment/:token/history', async (request) => {
    const { token } = parseInput(TokenParamsSchema, request.params, 'token');
    const { hours } = parseInput(HistoryQuerySchema, request.query, 'query');

    const { value, source } = await engine.historyWindow(token, hours);
    return { success: true, data: { ...value, cached: source === 'cache' } };
  });

  /**
   * GET /api/v1/history/export
   */
  fastify.get('/api/v1/history/export', async () => {
    return { success: true, data: engine.exportHistory() };
  });

  /**
   * GET /api/v1/tokens
   */
  fastify.get('/api/v1/tokens', async () => {
    const tokens = engine.trackedTokens();
    return { success: true, data: { tokens, count: tokens.length } };
  });

  /**
   * POST /api/v1/tokens
   */
  fastify.post('/api/v1/tokens', async (request, reply) => {
    const { token } = parseInput(TrackBodySchema, request.body, 'request body');
    const added = await engine.trackToken(token);

    return reply.status(added ? 201 : 200).send({
      success: true,
      data: { token, added, tokens: engine.trackedTokens() },
    });
  });

  /**
   * DELETE /api/v1/tokens/:token
   */
  fastify.delete('/api/v1/tokens/:token', async (request, reply) => {
    const { token } = parseInput(TokenParamsSchema, request.params, 'token');
    const removed = await engine.untrackToken(token);

    if (!removed) {
      return reply.status(404).send({
        success: false,
        error: { code: 'NOT_FOUND', message: `${token} is not tracked` },
      });
    }

    return { success: true, data: { token, removed, tokens: engine.trackedTokens() } };
  });

  /**
   * POST /api/v1/posts/:token
   */
  fastify.post('/api/v1/posts/:token', async (request, reply) => {
    const { token } = parseInput(TokenParamsSchema, request.params, 'token');
    const { posts } = parseInput(PostBatchSchema, request.body, 'request body');

    const stored = await engine.ingestPosts(token, posts);
    return reply.status(202).send({
      success: true,
      data: { token, received: posts.length, stored },
    });
  });
}
