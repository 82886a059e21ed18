/**
 * Signal Engine
 *
 * The one context object of the process. Built once at start and handed to
 * route and WebSocket registration; nothing here lives at module level.
 */

import { Redis } from 'ioredis';
import {
  HistoryWindowSchema,
  SentimentMapSchema,
  SnipeSignalJsonSchema,
  TokenSentimentJsonSchema,
  isFallback,
  ok,
  sentimentToJson,
  snipeSignalToJson,
} from '@tokenpulse/core';
import type {
  HistoryWindow,
  Result,
  SnipeSignalJson,
  SocialPost,
  TokenPair,
  TokenSentiment,
  TokenSentimentJson,
} from '@tokenpulse/core';
import {
  DexScreenerConnector,
  ExplorerWalletConnector,
  KeywordClassifier,
  MemoryPostSource,
  OpenAIClassifier,
} from '@tokenpulse/connectors';
import type { Classifier, MarketDataSource, SignalSource, WalletSource } from '@tokenpulse/connectors';
import type { AppConfig } from '../../config.js';
import type { Logger } from '../../logger.js';
import { SlidingWindowRateLimiter } from '../../middleware/rateLimit.js';
import { BroadcastHub, WS_REQUEST_LIMIT } from '../../ws/hub.js';
import type { SentimentFeed, SentimentMap } from '../../ws/hub.js';
import { MemoryCacheStore, RedisCacheStore, SentimentCache, cacheKeys } from '../cache.js';
import type { CacheStore, CachedValue } from '../cache.js';
import { AlertLog, PerformanceMonitor } from '../monitoring.js';
import { aggregateTimeframes, detectOutliers } from './aggregator.js';
import { HOUR_MS, HistoryStore } from './history.js';
import { NoPostsError, SentimentPipeline } from './pipeline.js';
import { SnipeScanner } from './sniper.js';

export * from './scorer.js';
export * from './history.js';
export * from './aggregator.js';
export * from './pipeline.js';
export * from './sniper.js';

// ============================================
// Types
// ============================================

export interface EngineConfig {
  trackedTokens: string[];
  cacheTtlSeconds: number;
  snipeTtlSeconds: number;
  historyTtlSeconds: number;
  sourceTimeoutMs: number;
  historyMaxEntries: number;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  trackedTokens: [],
  cacheTtlSeconds: 300,
  snipeTtlSeconds: 60,
  historyTtlSeconds: 60,
  sourceTimeoutMs: 10000,
  historyMaxEntries: 1000,
};

export interface EngineDeps {
  posts: MemoryPostSource;
  classifier: Classifier;
  market: MarketDataSource;
  wallets: WalletSource;
  cacheStore: CacheStore;
  logger: Logger;
  now?: () => Date;
}

// ============================================
// Engine
// ============================================

function toJson(result: Result<TokenSentiment>): Result<TokenSentimentJson> {
  if (!result.ok) return result;
  const json = sentimentToJson(result.value);
  return isFallback(result) ? { ok: true, value: json, fallback: result.fallback } : ok(json);
}

export class SignalEngine implements SentimentFeed {
  readonly config: EngineConfig;
  readonly logger: Logger;

  readonly history: HistoryStore;
  readonly cache: SentimentCache;
  readonly limiter: SlidingWindowRateLimiter;
  readonly hub: BroadcastHub;
  readonly pipeline: SentimentPipeline;
  readonly scanner: SnipeScanner;
  readonly monitor: PerformanceMonitor;
  readonly alerts: AlertLog;

  private tracked: string[];
  private now: () => Date;

  constructor(
    private readonly deps: EngineDeps,
    config: Partial<EngineConfig> = {}
  ) {
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...config };
    this.logger = deps.logger;
    this.now = deps.now ?? (() => new Date());
    this.tracked = [...new Set(this.config.trackedTokens)];

    this.history = new HistoryStore(this.config.historyMaxEntries);
    this.cache = new SentimentCache(deps.cacheStore, deps.logger.child({ component: 'cache' }), {
      ttlSeconds: this.config.cacheTtlSeconds,
    });
    this.limiter = new SlidingWindowRateLimiter();
    this.hub = new BroadcastHub(this, deps.logger.child({ component: 'hub' }), {
      requestLimit: { limiter: this.limiter, ...WS_REQUEST_LIMIT },
    });
    this.pipeline = new SentimentPipeline(
      {
        posts: deps.posts,
        classifier: deps.classifier,
        history: this.history,
        logger: deps.logger.child({ component: 'pipeline' }),
        now: deps.now,
      },
      { sourceTimeoutMs: this.config.sourceTimeoutMs }
    );
    this.scanner = new SnipeScanner(
      {
        market: deps.market,
        wallets: deps.wallets,
        posts: deps.posts,
        classifier: deps.classifier,
        logger: deps.logger.child({ component: 'scanner' }),
        now: deps.now,
      },
      { sourceTimeoutMs: this.config.sourceTimeoutMs }
    );
    this.monitor = new PerformanceMonitor();
    this.alerts = new AlertLog(deps.logger.child({ component: 'alerts' }));
  }

  // ============================================
  // Tracked Tokens
  // ============================================

  trackedTokens(): string[] {
    return [...this.tracked];
  }

  async trackToken(token: string): Promise<boolean> {
    if (this.tracked.includes(token)) return false;
    this.tracked.push(token);
    await this.cache.delete(cacheKeys.allSentiment());
    this.logger.info({ token, tracked: this.tracked.length }, 'Token tracked');
    return true;
  }

  async untrackToken(token: string): Promise<boolean> {
    const index = this.tracked.indexOf(token);
    if (index === -1) return false;
    this.tracked.splice(index, 1);
    await this.cache.delete(cacheKeys.allSentiment());
    this.logger.info({ token, tracked: this.tracked.length }, 'Token untracked');
    return true;
  }

  // ============================================
  // Sentiment
  // ============================================

  /**
   * Cache-aside read of one token. `useCache: false` recomputes and
   * refreshes the cache. A fallback is answered from the last good value
   * when one is held.
   */
  async readSentiment(token: string, options: { useCache?: boolean } = {}): Promise<CachedValue<TokenSentimentJson>> {
    const key = cacheKeys.sentiment(token);
    const cached =
      options.useCache === false
        ? await this.cache.settle(key, TokenSentimentJsonSchema, await this.analyzeJson(token))
        : await this.cache.cacheAside(key, TokenSentimentJsonSchema, () => this.analyzeJson(token));
    if (!cached.ok) throw cached.error;
    return cached.value;
  }

  /**
   * Cache-aside read of several tokens
   */
  async read(tokens: readonly string[]): Promise<SentimentMap> {
    const entries = await Promise.all(
      tokens.map(async (token) => [token, (await this.readSentiment(token)).value] as const)
    );
    return Object.fromEntries(entries);
  }

  /**
   * Recompute every tracked token and write the results back. The combined
   * map is only cached when every token was computed without a fallback.
   */
  async refresh(): Promise<SentimentMap> {
    const results = await this.pipeline.analyzeAll(this.tracked);
    const data: SentimentMap = {};
    let degraded = false;

    for (const [token, result] of results) {
      await this.afterAnalysis(token, result);
      const settled = await this.cache.settle(cacheKeys.sentiment(token), TokenSentimentJsonSchema, toJson(result));
      if (!settled.ok || settled.value.fallback) degraded = true;
      if (settled.ok) data[token] = settled.value.value;
    }

    if (!degraded) await this.cache.set(cacheKeys.allSentiment(), data);
    return data;
  }

  async readAll(options: { useCache?: boolean } = {}): Promise<CachedValue<SentimentMap>> {
    if (options.useCache !== false) {
      const cached = await this.cache.get(cacheKeys.allSentiment(), SentimentMapSchema);
      if (cached !== null) return { value: cached, source: 'cache' };
    }
    return { value: await this.refresh(), source: 'fresh' };
  }

  // ============================================
  // History
  // ============================================

  async historyWindow(token: string, hours: number): Promise<CachedValue<HistoryWindow>> {
    const result = await this.cache.cacheAside(
      cacheKeys.history(token, hours),
      HistoryWindowSchema,
      async () => ok(this.buildHistoryWindow(token, hours)),
      this.config.historyTtlSeconds
    );
    if (!result.ok) throw result.error;
    return result.value;
  }

  summary() {
    return this.history.summary(this.tracked, this.now());
  }

  exportHistory() {
    return this.history.exportAll(this.now());
  }

  // ============================================
  // Snipe
  // ============================================

  async analyzeSnipe(pair: TokenPair, options: { useCache?: boolean } = {}): Promise<CachedValue<SnipeSignalJson>> {
    const compute = async () => ok(snipeSignalToJson(await this.scanner.analyzePair(pair)));

    if (options.useCache === false) {
      const fresh = await compute();
      await this.cache.set(cacheKeys.snipe(pair.tokenAddress), fresh.value, this.config.snipeTtlSeconds);
      return { value: fresh.value, source: 'fresh' };
    }

    const result = await this.cache.cacheAside(
      cacheKeys.snipe(pair.tokenAddress),
      SnipeSignalJsonSchema,
      compute,
      this.config.snipeTtlSeconds
    );
    if (!result.ok) throw result.error;
    return result.value;
  }

  // ============================================
  // Posts
  // ============================================

  async ingestPosts(token: string, posts: SocialPost[]): Promise<number> {
    const stored = this.deps.posts.ingest(token, posts);
    await this.cache.delete(cacheKeys.sentiment(token));
    this.logger.debug({ token, received: posts.length, stored }, 'Posts ingested');
    return stored;
  }

  // ============================================
  // Lifecycle
  // ============================================

  sources(): SignalSource[] {
    return [this.deps.market, this.deps.wallets, this.deps.posts];
  }

  start(streamIntervalMs: number): void {
    this.hub.startStreaming(streamIntervalMs);
  }

  async close(): Promise<void> {
    this.hub.close();
    await this.cache.close();
  }

  // ============================================
  // Internals
  // ============================================

  private async analyzeJson(token: string): Promise<Result<TokenSentimentJson>> {
    const result = await this.pipeline.analyzeToken(token);
    await this.afterAnalysis(token, result);
    return toJson(result);
  }

  private async afterAnalysis(token: string, result: Result<TokenSentiment>): Promise<void> {
    if (!result.ok) return;
    if (!isFallback(result)) {
      await this.cache.invalidateHistory(token);
      return;
    }
    if (!(result.fallback instanceof NoPostsError)) {
      await this.alerts.trigger('source_unavailable', `${token}: ${result.fallback.message}`);
    }
  }

  private buildHistoryWindow(token: string, hours: number): HistoryWindow {
    const now = this.now();
    const history = this.history.for(token);
    const windowMs = hours * HOUR_MS;
    const entries = history.window(windowMs, now);
    const scores = entries.map((e) => e.sentimentScore);

    return {
      token,
      hours,
      count: entries.length,
      averageScore: history.getAverageSentiment(windowMs, now),
      trend: history.getTrend(windowMs, now),
      trendStrength: history.trendStrength(),
      outliers: detectOutliers(scores),
      timeframes: aggregateTimeframes(history, now),
      entries: entries.map(sentimentToJson),
    };
  }
}

// ============================================
// Factory
// ============================================

function createCacheStore(redisUrl: string | undefined, logger: Logger): CacheStore {
  if (!redisUrl) return new MemoryCacheStore();

  const redis = new Redis(redisUrl, { maxRetriesPerRequest: 1 });
  // Connection errors surface per command as CACHE_UNAVAILABLE
  redis.on('error', (error: Error) => {
    logger.warn({ error: error.message }, 'Redis connection error');
  });
  return new RedisCacheStore(redis);
}

/**
 * Build the engine from configuration. Connectors can be overridden for
 * tests and embedding.
 */
export function createEngine(config: AppConfig, logger: Logger, overrides: Partial<EngineDeps> = {}): SignalEngine {
  const classifier =
    overrides.classifier ??
    (config.OPENAI_API_KEY
      ? new OpenAIClassifier({ apiKey: config.OPENAI_API_KEY, model: config.OPENAI_MODEL })
      : new KeywordClassifier());

  const cacheStore = overrides.cacheStore ?? createCacheStore(config.REDIS_URL, logger);

  logger.info(
    { classifier: classifier.id, cache: cacheStore.backend, tokens: config.TRACKED_TOKENS },
    'Creating signal engine'
  );

  return new SignalEngine(
    {
      posts: overrides.posts ?? new MemoryPostSource(),
      classifier,
      market: overrides.market ?? new DexScreenerConnector({ baseUrl: config.DEXSCREENER_API_URL }),
      wallets:
        overrides.wallets ??
        new ExplorerWalletConnector({ baseUrl: config.EXPLORER_API_URL, apiKey: config.EXPLORER_API_KEY }),
      cacheStore,
      logger,
      now: overrides.now,
    },
    {
      trackedTokens: config.TRACKED_TOKENS,
      cacheTtlSeconds: config.CACHE_TTL_SECONDS,
      sourceTimeoutMs: config.SOURCE_TIMEOUT_MS,
      historyMaxEntries: config.HISTORY_MAX_ENTRIES,
    }
  );
}
