/**
 * Snipe API Routes
 *
 * - POST /api/v1/snipe/analyze - Score a freshly listed pair
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { TokenPairSchema } from '@tokenpulse/core';
import type { SignalEngine } from '../services/signals/index.js';
import { parseInput } from './respond.js';

const AnalyzeQuerySchema = z.object({
  useCache: z
    .enum(['true', 'false'])
    .default('true')
    .transform((v) => v === 'true'),
});

export async function registerSnipeRoutes(fastify: FastifyInstance, engine: SignalEngine): Promise<void> {
  fastify.post('/api/v1/snipe/analyze', async (request) => {
    const pair = parseInput(TokenPairSchema, request.body, 'pair');
    const { useCache } = parseInput(AnalyzeQuerySchema, request.query, 'query');

    const { value, source } = await engine.analyzeSnipe(pair, { useCache });

    return {
      success: true,
      data: { ...value, cached: source === 'cache' },
    };
  });
}
