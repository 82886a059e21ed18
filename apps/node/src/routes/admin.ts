/**
 * Operational API Routes
 *
 * Cache administration, rate-limit standing, latency metrics and alerts.
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { TokenSymbolSchema } from '@tokenpulse/core';
import type { RateLimitGuard } from '../middleware/rateLimit.js';
import type { SignalEngine } from '../services/signals/index.js';
import { parseInput } from './respond.js';

const TokenParamsSchema = z.object({ token: TokenSymbolSchema });

const AlertsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

export async function registerAdminRoutes(
  fastify: FastifyInstance,
  engine: SignalEngine,
  guard: RateLimitGuard
): Promise<void> {
  // ============================================
  // Cache
  // ============================================

  fastify.post('/api/v1/cache/invalidate/:token', async (request) => {
    const { token } = parseInput(TokenParamsSchema, request.params, 'token');
    const removed = await engine.cache.invalidateToken(token);
    return { success: true, data: { token, removed } };
  });

  fastify.post('/api/v1/cache/clear', async () => {
    const removed = await engine.cache.invalidateAll();
    return { success: true, data: { removed } };
  });

  fastify.get('/api/v1/cache/stats', async () => {
    return { success: true, data: await engine.cache.stats() };
  });

  // ============================================
  // Rate Limit
  // ============================================

  /**
   * GET /api/v1/rate-limit/stats
   * The caller's standing against the default limits
   */
  fastify.get('/api/v1/rate-limit/stats', async (request) => {
    return {
      success: true,
      data: { clientId: guard.clientId(request), ...guard.peek(request) },
    };
  });

  // ============================================
  // Monitoring
  // ============================================

  fastify.get('/api/v1/metrics', async () => {
    return {
      success: true,
      data: {
        endpoints: engine.monitor.allStats(),
        cache: await engine.cache.stats(),
        websocket: engine.hub.stats(),
        rateLimit: { clients: engine.limiter.clientCount },
        timestamp: new Date().toISOString(),
      },
    };
  });

  fastify.get('/api/v1/alerts', async (request) => {
    const { limit } = parseInput(AlertsQuerySchema, request.query, 'query');
    const alerts = engine.alerts.recent(limit);
    return { success: true, data: { alerts, count: alerts.length } };
  });
}
