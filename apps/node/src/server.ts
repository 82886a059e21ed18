/**
 * HTTP Server
 *
 * Fastify instance with rate limiting, latency recording, the error
 * envelope and every route module registered against one engine.
 */

import Fastify from 'fastify';
import type { FastifyError, FastifyInstance } from 'fastify';
import websocket from '@fastify/websocket';
import { ZodError } from 'zod';
import { TokenPulseError } from '@tokenpulse/core';
import { loggerOptions } from './logger.js';
import { registerRateLimiting } from './middleware/rateLimit.js';
import type { RateLimitConfig } from './middleware/rateLimit.js';
import { registerAdminRoutes } from './routes/admin.js';
import { registerHealthRoutes } from './routes/health.js';
import { statusFor } from './routes/respond.js';
import { registerSentimentRoutes } from './routes/sentiment.js';
import { registerSnipeRoutes } from './routes/snipe.js';
import type { SignalEngine } from './services/signals/index.js';
import { registerWebSocket } from './ws/index.js';

export interface ServerOptions {
  logLevel?: string;
  rateLimit?: Partial<RateLimitConfig>;
}

export async function buildServer(engine: SignalEngine, options: ServerOptions = {}): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: loggerOptions('http', options.logLevel ? { level: options.logLevel } : {}),
    trustProxy: true,
  });

  await fastify.register(websocket);

  const guard = registerRateLimiting(fastify, engine.limiter, options.rateLimit);

  fastify.addHook('onResponse', async (request, reply) => {
    const endpoint = `${request.method} ${request.routeOptions.url ?? request.url.split('?')[0]}`;
    engine.monitor.record(endpoint, reply.elapsedTime);
  });

  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof TokenPulseError) {
      return reply.status(statusFor(error.code)).send({ success: false, error: error.toJSON() });
    }
    if (error instanceof ZodError) {
      return reply.status(400).send({
        success: false,
        error: { code: 'INVALID_INPUT', message: error.issues[0]?.message ?? 'Invalid input' },
      });
    }
    if (error.validation || error.statusCode === 400) {
      return reply.status(400).send({ success: false, error: { code: 'INVALID_INPUT', message: error.message } });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.status(500).send({
      success: false,
      error: { code: 'INTERNAL_ERROR', message: 'Internal server error' },
    });
  });

  fastify.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      success: false,
      error: { code: 'NOT_FOUND', message: `Route ${request.method} ${request.url} not found` },
    });
  });

  await registerHealthRoutes(fastify, engine);
  await registerSentimentRoutes(fastify, engine);
  await registerSnipeRoutes(fastify, engine);
  await registerAdminRoutes(fastify, engine, guard);
  await registerWebSocket(fastify, engine.hub);

  fastify.addHook('onClose', async () => {
    await engine.close();
  });

  return fastify;
}
