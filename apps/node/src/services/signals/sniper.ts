/**
 * Snipe Scanner
 *
 * Scores newly listed pairs from market, wallet and social signals.
 * Each source is bounded by the source timeout; a missing source scores
 * with its documented default.
 */

import { errorMessage } from '@tokenpulse/core';
import type { DevWalletMetrics, SentimentClass, SnipeSignal, TokenPair, VolumeMetrics } from '@tokenpulse/core';
import type { Classifier, MarketDataSource, PostSource, WalletSource } from '@tokenpulse/connectors';
import type { Logger } from '../../logger.js';
import { withTimeout } from '../../utils/async.js';
import { buildSnipeSignal } from './scorer.js';

export interface SnipeScannerConfig {
  sourceTimeoutMs: number;
  maxPosts: number;
}

const DEFAULT_CONFIG: SnipeScannerConfig = {
  sourceTimeoutMs: 10000,
  maxPosts: 50,
};

export interface SnipeScannerDeps {
  market: MarketDataSource;
  wallets: WalletSource;
  posts: PostSource;
  classifier: Classifier;
  logger: Logger;
  now?: () => Date;
}

export class SnipeScanner {
  private config: SnipeScannerConfig;
  private now: () => Date;

  constructor(
    private readonly deps: SnipeScannerDeps,
    config: Partial<SnipeScannerConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.now = deps.now ?? (() => new Date());
  }

  async analyzePair(pair: TokenPair): Promise<SnipeSignal> {
    const log = this.deps.logger.child({ token: pair.tokenSymbol, pool: pair.poolAddress });

    const [volume, devWallet, sentiments] = await Promise.all([
      this.bounded<VolumeMetrics | null>(this.deps.market.id, log, null, () =>
        this.deps.market.isEnabled() ? this.deps.market.fetchVolumeMetrics(pair) : Promise.resolve(null)
      ),
      this.bounded<DevWalletMetrics | null>(this.deps.wallets.id, log, null, () =>
        this.deps.wallets.isEnabled() ? this.deps.wallets.fetchDevWalletMetrics(pair) : Promise.resolve(null)
      ),
      this.bounded<SentimentClass[]>(this.deps.classifier.id, log, [], () => this.classifyPosts(pair.tokenSymbol)),
    ]);

    const signal = buildSnipeSignal(pair, { volume, devWallet, sentiments }, this.now());
    log.info({ overall: Number(signal.overallScore.toFixed(1)), prediction: signal.prediction }, 'Pair analyzed');
    return signal;
  }

  /**
   * Analyze pairs concurrently, best first
   */
  async scan(pairs: readonly TokenPair[]): Promise<SnipeSignal[]> {
    const signals = await Promise.all(pairs.map((pair) => this.analyzePair(pair)));
    return signals.sort((a, b) => b.overallScore - a.overallScore);
  }

  private async classifyPosts(token: string): Promise<SentimentClass[]> {
    const posts = await this.deps.posts.fetchPosts(token, this.config.maxPosts);
    return Promise.all(posts.map((post) => this.deps.classifier.classify(post.text)));
  }

  private async bounded<T>(source: string, log: Logger, empty: T, task: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(task(), this.config.sourceTimeoutMs, source);
    } catch (error) {
      log.warn({ source, error: errorMessage(error) }, 'Signal source unavailable, using default');
      return empty;
    }
  }
}
