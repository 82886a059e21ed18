/**
 * Rate Limiting Middleware
 *
 * Sliding-window request governor. Each client keeps the timestamps of its
 * admitted requests; a request is admitted while fewer than `maxRequests`
 * fall inside the trailing window.
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { RateLimitExceededError } from '@tokenpulse/core';
import type { RateLimitStats } from '@tokenpulse/core';
import { KeyedMutex } from '../utils/async.js';

// ============================================
// Types
// ============================================

export interface RateLimitConfig {
  windowMs: number;
  maxRequests: number;
  keyGenerator?: (request: FastifyRequest) => string;
  onRateLimited?: (request: FastifyRequest, stats: RateLimitStats) => void;
}

export interface RateLimitDecision {
  allowed: boolean;
  stats: RateLimitStats;
}

// ============================================
// Constants
// ============================================

const DEFAULT_CONFIG: Required<Omit<RateLimitConfig, 'keyGenerator' | 'onRateLimited'>> = {
  windowMs: 60000, // 1 minute
  maxRequests: 100,
};

// Route-specific limits, keyed by route pattern
export const ROUTE_LIMITS: Record<string, Partial<RateLimitConfig>> = {
  // Recomputation is the expensive path
  '/api/v1/sentiment/:token': { maxRequests: 60 },
  '/api/v1/snipe/analyze': { maxRequests: 20 },

  // Cache administration
  '/api/v1/cache/clear': { maxRequests: 5 },
  '/api/v1/cache/invalidate/:token': { maxRequests: 30 },
};

// Never limited
const EXEMPT_ROUTES = new Set(['/health', '/health/ready', '/ws/sentiment']);

// ============================================
// Sliding Window
// ============================================

export class SlidingWindowRateLimiter {
  private windows = new Map<string, number[]>();
  private largestWindowMs = 0;

  /**
   * Admit or reject one request. Rejected requests are not recorded, so a
   * client at the limit stays at the limit.
   *
   * `reset` is `now + window`, not the expiry of the oldest request.
   */
  isAllowed(clientId: string, maxRequests: number, windowSeconds: number, now: number = Date.now()): RateLimitDecision {
    const windowMs = windowSeconds * 1000;
    this.largestWindowMs = Math.max(this.largestWindowMs, windowMs);

    const timestamps = this.prune(clientId, windowMs, now);
    const allowed = timestamps.length < maxRequests;
    if (allowed) timestamps.push(now);

    if (timestamps.length > 0) this.windows.set(clientId, timestamps);
    else this.windows.delete(clientId);

    return {
      allowed,
      stats: {
        limit: maxRequests,
        remaining: Math.max(0, maxRequests - timestamps.length),
        reset: Math.floor((now + windowMs) / 1000),
      },
    };
  }

  /**
   * Current standing without recording a request
   */
  peek(clientId: string, maxRequests: number, windowSeconds: number, now: number = Date.now()): RateLimitStats {
    const windowMs = windowSeconds * 1000;
    const cutoff = now - windowMs;
    const count = (this.windows.get(clientId) ?? []).filter((t) => t > cutoff).length;
    return {
      limit: maxRequests,
      remaining: Math.max(0, maxRequests - count),
      reset: Math.floor((now + windowMs) / 1000),
    };
  }

  /**
   * Forget clients with no request inside the largest window seen.
   * Returns the number of clients dropped.
   */
  sweepIdle(now: number = Date.now()): number {
    const cutoff = now - this.largestWindowMs;
    let dropped = 0;
    for (const [clientId, timestamps] of this.windows) {
      const newest = timestamps[timestamps.length - 1];
      if (newest === undefined || newest <= cutoff) {
        this.windows.delete(clientId);
        dropped++;
      }
    }
    return dropped;
  }

  get clientCount(): number {
    return this.windows.size;
  }

  reset(): void {
    this.windows.clear();
  }

  private prune(clientId: string, windowMs: number, now: number): number[] {
    const cutoff = now - windowMs;
    const timestamps = this.windows.get(clientId) ?? [];
    const firstInside = timestamps.findIndex((t) => t > cutoff);
    if (firstInside === -1) return [];
    return firstInside === 0 ? timestamps : timestamps.slice(firstInside);
  }
}

// ============================================
// Fastify Hook
// ============================================

/**
 * Client id from the first X-Forwarded-For hop, else the socket address
 */
export function defaultKeyGenerator(request: FastifyRequest): string {
  const forwarded = request.headers['x-forwarded-for'];
  const ip = typeof forwarded === 'string' ? forwarded.split(',')[0]?.trim() : request.ip;
  return ip || 'unknown';
}

export class RateLimitGuard {
  private config: Required<Omit<RateLimitConfig, 'onRateLimited'>>;
  private onRateLimited?: RateLimitConfig['onRateLimited'];
  // Admission for one client is a read-prune-append; keep it per-client serial
  private locks = new KeyedMutex();

  constructor(
    readonly limiter: SlidingWindowRateLimiter,
    config: Partial<RateLimitConfig> = {}
  ) {
    this.config = {
      ...DEFAULT_CONFIG,
      ...config,
      keyGenerator: config.keyGenerator ?? defaultKeyGenerator,
    };
    this.onRateLimited = config.onRateLimited;
  }

  /**
   * Effective limits for a route pattern
   */
  limitsFor(routePath: string): { windowMs: number; maxRequests: number } {
    const routeConfig = ROUTE_LIMITS[routePath];
    return {
      windowMs: routeConfig?.windowMs ?? this.config.windowMs,
      maxRequests: routeConfig?.maxRequests ?? this.config.maxRequests,
    };
  }

  clientId(request: FastifyRequest): string {
    return this.config.keyGenerator(request);
  }

  async check(clientId: string, routePath: string): Promise<RateLimitDecision> {
    const { windowMs, maxRequests } = this.limitsFor(routePath);
    return this.locks.run(clientId, async () =>
      this.limiter.isAllowed(clientId, maxRequests, windowMs / 1000)
    );
  }

  /**
   * Standing of the caller against the default limits
   */
  peek(request: FastifyRequest): RateLimitStats {
    return this.limiter.peek(this.clientId(request), this.config.maxRequests, this.config.windowMs / 1000);
  }

  /**
   * Create Fastify hook for rate limiting
   */
  createHook() {
    return async (request: FastifyRequest, reply: FastifyReply) => {
      const routePath = request.routeOptions?.url || request.url.split('?')[0] || '';
      if (EXEMPT_ROUTES.has(routePath)) return;

      const { allowed, stats } = await this.check(this.clientId(request), routePath);

      reply.header('X-RateLimit-Limit', stats.limit);
      reply.header('X-RateLimit-Remaining', stats.remaining);
      reply.header('X-RateLimit-Reset', stats.reset);

      if (!allowed) {
        this.onRateLimited?.(request, stats);

        const retryAfter = Math.ceil(this.limitsFor(routePath).windowMs / 1000);
        reply.header('Retry-After', retryAfter);

        const error = new RateLimitExceededError(stats);
        return reply.status(429).send({
          success: false,
          error: { ...error.toJSON(), retryAfter },
        });
      }
    };
  }
}

/**
 * Register rate limiting on Fastify instance and start the idle sweep
 */
export function registerRateLimiting(
  fastify: FastifyInstance,
  limiter: SlidingWindowRateLimiter,
  config: Partial<RateLimitConfig> = {}
): RateLimitGuard {
  const guard = new RateLimitGuard(limiter, {
    ...config,
    onRateLimited: (request, stats) => {
      fastify.log.warn(
        {
          ip: request.ip,
          url: request.url,
          method: request.method,
          limit: stats.limit,
        },
        'Rate limit exceeded'
      );
    },
  });

  fastify.addHook('preHandler', guard.createHook());

  const sweep = setInterval(() => {
    const dropped = limiter.sweepIdle();
    if (dropped > 0) fastify.log.debug({ dropped }, 'Swept idle rate limit clients');
  }, guard.limitsFor('').windowMs);
  sweep.unref();
  fastify.addHook('onClose', async () => {
    clearInterval(sweep);
  });

  fastify.log.info('Rate limiting enabled');
  return guard;
}
