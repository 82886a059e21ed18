/**
 * Rate Limiting Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { SlidingWindowRateLimiter, registerRateLimiting } from './rateLimit.js';

const T0 = 1_700_000_000_000;

describe('SlidingWindowRateLimiter', () => {
  it('should admit up to the limit and then reject', () => {
    const limiter = new SlidingWindowRateLimiter();

    const results = [T0, T0 + 1, T0 + 2].map((now) => limiter.isAllowed('client', 2, 60, now));

    expect(results.map((r) => [r.allowed, r.stats.remaining])).toEqual([
      [true, 1],
      [true, 0],
      [false, 0],
    ]);
    expect(results[0]?.stats.limit).toBe(2);
  });

  it('should report reset as now + window in epoch seconds', () => {
    const limiter = new SlidingWindowRateLimiter();
    expect(limiter.isAllowed('client', 2, 60, T0).stats.reset).toBe(T0 / 1000 + 60);
  });

  it('should not record rejected requests', () => {
    const limiter = new SlidingWindowRateLimiter();
    limiter.isAllowed('client', 1, 60, T0);
    for (let i = 1; i <= 5; i++) limiter.isAllowed('client', 1, 60, T0 + i * 1000);

    // Only the first admitted request has to age out
    expect(limiter.isAllowed('client', 1, 60, T0 + 60_000).allowed).toBe(true);
  });

  it('should slide rather than reset at a fixed edge', () => {
    const limiter = new SlidingWindowRateLimiter();
    limiter.isAllowed('client', 2, 60, T0);
    limiter.isAllowed('client', 2, 60, T0 + 30_000);

    expect(limiter.isAllowed('client', 2, 60, T0 + 59_999).allowed).toBe(false);
    expect(limiter.isAllowed('client', 2, 60, T0 + 60_000).allowed).toBe(true);
    expect(limiter.isAllowed('client', 2, 60, T0 + 60_001).allowed).toBe(false);
  });

  it('should keep clients independent', () => {
    const limiter = new SlidingWindowRateLimiter();
    limiter.isAllowed('a', 1, 60, T0);

    expect(limiter.isAllowed('a', 1, 60, T0).allowed).toBe(false);
    expect(limiter.isAllowed('b', 1, 60, T0).allowed).toBe(true);
  });

  it('should peek without recording', () => {
    const limiter = new SlidingWindowRateLimiter();
    limiter.isAllowed('client', 3, 60, T0);

    expect(limiter.peek('client', 3, 60, T0)).toEqual({ limit: 3, remaining: 2, reset: T0 / 1000 + 60 });
    expect(limiter.peek('client', 3, 60, T0)).toEqual({ limit: 3, remaining: 2, reset: T0 / 1000 + 60 });
  });

  it('should sweep clients idle for longer than the largest window', () => {
    const limiter = new SlidingWindowRateLimiter();
    limiter.isAllowed('old', 5, 60, T0);
    limiter.isAllowed('recent', 5, 60, T0 + 30_000);

    expect(limiter.sweepIdle(T0 + 60_000)).toBe(1);
    expect(limiter.clientCount).toBe(1);
  });
});

describe('registerRateLimiting', () => {
  let app: FastifyInstance;

  afterEach(async () => {
    await app.close();
  });

  async function build(maxRequests: number): Promise<FastifyInstance> {
    app = Fastify();
    registerRateLimiting(app, new SlidingWindowRateLimiter(), { maxRequests, windowMs: 60_000 });
    app.get('/api/v1/tokens', async () => ({ success: true, data: [] }));
    app.get('/health', async () => ({ success: true }));
    await app.ready();
    return app;
  }

  it('should set rate limit headers', async () => {
    await build(2);

    const response = await app.inject({ method: 'GET', url: '/api/v1/tokens' });

    expect(response.statusCode).toBe(200);
    expect(response.headers['x-ratelimit-limit']).toBe('2');
    expect(response.headers['x-ratelimit-remaining']).toBe('1');
  });

  it('should reject with 429 and the current stats', async () => {
    await build(1);
    await app.inject({ method: 'GET', url: '/api/v1/tokens' });

    const response = await app.inject({ method: 'GET', url: '/api/v1/tokens' });
    const body = response.json();

    expect(response.statusCode).toBe(429);
    expect(response.headers['retry-after']).toBe('60');
    expect(body.success).toBe(false);
    expect(body.error).toMatchObject({ code: 'RATE_LIMITED', limit: 1, remaining: 0, retryAfter: 60 });
  });

  it('should key clients by the first forwarded hop', async () => {
    await build(1);
    await app.inject({ method: 'GET', url: '/api/v1/tokens', headers: { 'x-forwarded-for': '10.0.0.1, 10.0.0.9' } });

    const other = await app.inject({ method: 'GET', url: '/api/v1/tokens', headers: { 'x-forwarded-for': '10.0.0.2' } });
    const same = await app.inject({ method: 'GET', url: '/api/v1/tokens', headers: { 'x-forwarded-for': '10.0.0.1' } });

    expect(other.statusCode).toBe(200);
    expect(same.statusCode).toBe(429);
  });

  it('should not limit health checks', async () => {
    await build(1);
    await app.inject({ method: 'GET', url: '/health' });

    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.headers['x-ratelimit-limit']).toBeUndefined();
  });
});
