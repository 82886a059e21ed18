/**
 * Sentiment Cache
 *
 * TTL key-value cache in front of recomputation. Redis when REDIS_URL is
 * set, an in-process map otherwise. Store failures never reach callers:
 * reads miss and writes are dropped.
 */

import type { Redis } from 'ioredis';
import type { ZodType, ZodTypeDef } from 'zod';
import { CacheUnavailableError, errorMessage, isFallback } from '@tokenpulse/core';
import type { Result, TokenPulseError } from '@tokenpulse/core';
import type { Logger } from '../logger.js';

// ============================================
// Types
// ============================================

export interface CacheStoreStats {
  backend: 'redis' | 'memory';
  keys: number;
  hits: number;
  misses: number;
  hitRate: number;
  memoryUsed?: string;
}

/**
 * Raw string store. Implementations must give per-key atomic get/set/delete.
 */
export interface CacheStore {
  readonly backend: CacheStoreStats['backend'];
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<number>;
  clearPattern(pattern: string): Promise<number>;
  stats(): Promise<CacheStoreStats>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

export type CacheSource = 'cache' | 'fresh' | 'stale';

export interface CachedValue<T> {
  value: T;
  source: CacheSource;
  fallback?: TokenPulseError;
}

export interface SentimentCacheConfig {
  ttlSeconds: number;
  staleTtlSeconds: number;
}

const DEFAULT_CONFIG: SentimentCacheConfig = {
  ttlSeconds: 300,
  staleTtlSeconds: 24 * 60 * 60,
};

function hitRate(hits: number, misses: number): number {
  const total = hits + misses;
  return total > 0 ? hits / total : 0;
}

/**
 * Redis-style glob (`*` and `?`) to an anchored RegExp
 */
export function globToRegExp(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`^${escaped.replace(/\*/g, '.*').replace(/\?/g, '.')}$`);
}

// ============================================
// Memory Store
// ============================================

interface MemoryEntry {
  value: string;
  expiresAt: number;
}

export class MemoryCacheStore implements CacheStore {
  readonly backend = 'memory';

  private entries = new Map<string, MemoryEntry>();
  private hits = 0;
  private misses = 0;

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry || entry.expiresAt <= this.now()) {
      if (entry) this.entries.delete(key);
      this.misses++;
      return null;
    }
    this.hits++;
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  async delete(key: string): Promise<number> {
    return this.entries.delete(key) ? 1 : 0;
  }

  async clearPattern(pattern: string): Promise<number> {
    const matcher = globToRegExp(pattern);
    let deleted = 0;
    for (const key of [...this.entries.keys()]) {
      if (matcher.test(key)) {
        this.entries.delete(key);
        deleted++;
      }
    }
    return deleted;
  }

  async stats(): Promise<CacheStoreStats> {
    const now = this.now();
    let keys = 0;
    for (const entry of this.entries.values()) {
      if (entry.expiresAt > now) keys++;
    }
    return { backend: 'memory', keys, hits: this.hits, misses: this.misses, hitRate: hitRate(this.hits, this.misses) };
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.entries.clear();
  }
}

// ============================================
// Redis Store
// ============================================

export class RedisCacheStore implements CacheStore {
  readonly backend = 'redis';

  constructor(private readonly redis: Redis) {}

  async get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.redis.set(key, value, 'EX', ttlSeconds);
  }

  async delete(key: string): Promise<number> {
    return this.redis.del(key);
  }

  async clearPattern(pattern: string): Promise<number> {
    let cursor = '0';
    let deleted = 0;
    do {
      const [next, keys] = await this.redis.scan(cursor, 'MATCH', pattern, 'COUNT', 100);
      if (keys.length > 0) deleted += await this.redis.del(...keys);
      cursor = next;
    } while (cursor !== '0');
    return deleted;
  }

  async stats(): Promise<CacheStoreStats> {
    const [info, memory, keys] = await Promise.all([
      this.redis.info('stats'),
      this.redis.info('memory'),
      this.redis.dbsize(),
    ]);
    const hits = readInfoNumber(info, 'keyspace_hits');
    const misses = readInfoNumber(info, 'keyspace_misses');
    return {
      backend: 'redis',
      keys,
      hits,
      misses,
      hitRate: hitRate(hits, misses),
      memoryUsed: readInfoField(memory, 'used_memory_human'),
    };
  }

  async ping(): Promise<boolean> {
    return (await this.redis.ping()) === 'PONG';
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}

function readInfoField(info: string, field: string): string | undefined {
  const line = info.split('\r\n').find((l) => l.startsWith(`${field}:`));
  return line?.slice(field.length + 1).trim();
}

function readInfoNumber(info: string, field: string): number {
  const value = Number(readInfoField(info, field));
  return Number.isFinite(value) ? value : 0;
}

// ============================================
// Sentiment Cache
// ============================================

export const cacheKeys = {
  sentiment: (token: string) => `sentiment:${token.toUpperCase()}`,
  allSentiment: () => 'sentiment:all',
  history: (token: string, hours: number) => `history:${token.toUpperCase()}:${hours}h`,
  snipe: (address: string) => `snipe:${address.toLowerCase()}`,
  stale: (key: string) => `stale:${key}`,
};

export class SentimentCache {
  private config: SentimentCacheConfig;
  private failures = 0;

  constructor(
    private readonly store: CacheStore,
    private readonly logger: Logger,
    config: Partial<SentimentCacheConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get backend(): CacheStore['backend'] {
    return this.store.backend;
  }

  get ttlSeconds(): number {
    return this.config.ttlSeconds;
  }

  /**
   * Parsed value, or null on miss, store failure or a payload that no
   * longer matches the schema
   */
  async get<T>(key: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T | null> {
    const raw = await this.guard('get', key, () => this.store.get(key), null);
    if (raw === null) return null;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.logger.warn({ key, error: errorMessage(error) }, 'Discarding unparseable cache entry');
      return null;
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn({ key, issues: parsed.error.issues.length }, 'Discarding cache entry with unexpected shape');
      return null;
    }
    return parsed.data;
  }

  async set(key: string, value: unknown, ttlSeconds = this.config.ttlSeconds): Promise<void> {
    const raw = JSON.stringify(value);
    await this.guard('set', key, () => this.store.set(key, raw, ttlSeconds), undefined);
    await this.guard(
      'set',
      cacheKeys.stale(key),
      () => this.store.set(cacheKeys.stale(key), raw, this.config.staleTtlSeconds),
      undefined
    );
  }

  async delete(key: string): Promise<void> {
    await this.guard('delete', key, () => this.store.delete(key), 0);
  }

  /**
   * Read-through with write-back. A failed or fallback computation is
   * answered from the last good value when one is still held.
   */
  async cacheAside<T>(
    key: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    compute: () => Promise<Result<T>>,
    ttlSeconds = this.config.ttlSeconds
  ): Promise<Result<CachedValue<T>>> {
    const cached = await this.get(key, schema);
    if (cached !== null) {
      return { ok: true, value: { value: cached, source: 'cache' } };
    }

    return this.settle(key, schema, await compute(), ttlSeconds);
  }

  /**
   * Store a good result, or answer a failed or fallback one from the last
   * good value when one is still held
   */
  async settle<T>(
    key: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    result: Result<T>,
    ttlSeconds = this.config.ttlSeconds
  ): Promise<Result<CachedValue<T>>> {
    if (result.ok && !isFallback(result)) {
      await this.set(key, result.value, ttlSeconds);
      return { ok: true, value: { value: result.value, source: 'fresh' } };
    }

    const stale = await this.get(cacheKeys.stale(key), schema);
    const reason = result.ok ? result.fallback : result.error;
    if (stale !== null) {
      this.logger.info({ key, reason: reason?.code }, 'Serving stale cache entry');
      return { ok: true, value: { value: stale, source: 'stale', fallback: reason } };
    }

    if (!result.ok) return result;
    return { ok: true, value: { value: result.value, source: 'fresh', fallback: reason } };
  }

  /**
   * Drop everything held for a token, stale copies included
   */
  async invalidateToken(token: string): Promise<number> {
    const upper = token.toUpperCase();
    const keys = [cacheKeys.sentiment(upper), cacheKeys.allSentiment()];
    const patterns = [`history:${upper}:*`];
    const removed = await Promise.all([
      ...[...keys, ...keys.map(cacheKeys.stale)].map((key) =>
        this.guard('delete', key, () => this.store.delete(key), 0)
      ),
      ...[...patterns, ...patterns.map(cacheKeys.stale)].map((pattern) =>
        this.guard('clearPattern', pattern, () => this.store.clearPattern(pattern), 0)
      ),
    ]);
    const count = removed.reduce((sum, n) => sum + n, 0);
    this.logger.info({ token: upper, removed: count }, 'Invalidated token cache');
    return count;
  }

  /**
   * Drop cached history windows after the token's history grew
   */
  async invalidateHistory(token: string): Promise<number> {
    const pattern = `history:${token.toUpperCase()}:*`;
    return this.guard('clearPattern', pattern, () => this.store.clearPattern(pattern), 0);
  }

  async invalidateAll(): Promise<number> {
    let count = 0;
    for (const pattern of ['sentiment:*', 'history:*', 'snipe:*', 'stale:*']) {
      count += await this.guard('clearPattern', pattern, () => this.store.clearPattern(pattern), 0);
    }
    this.logger.info({ removed: count }, 'Cleared cache');
    return count;
  }

  async stats(): Promise<CacheStoreStats & { ttlSeconds: number; failures: number; available: boolean }> {
    const available = await this.ping();
    const stats = await this.guard('stats', '*', () => this.store.stats(), {
      backend: this.store.backend,
      keys: 0,
      hits: 0,
      misses: 0,
      hitRate: 0,
    });
    return { ...stats, ttlSeconds: this.config.ttlSeconds, failures: this.failures, available };
  }

  async ping(): Promise<boolean> {
    return this.guard('ping', '*', () => this.store.ping(), false);
  }

  async close(): Promise<void> {
    await this.guard('close', '*', () => this.store.close(), undefined);
  }

  /**
   * Run a store operation; on failure log CACHE_UNAVAILABLE and answer
   * with the empty-cache value instead
   */
  private async guard<T>(op: string, key: string, fn: () => Promise<T>, empty: T): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      this.failures++;
      const failure = new CacheUnavailableError(`${op} failed for ${key}`, { cause: error });
      this.logger.warn({ code: failure.code, op, key, error: errorMessage(error) }, failure.message);
      return empty;
    }
  }
}
