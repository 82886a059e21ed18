/**
 * Sentiment Pipeline
 *
 * posts -> classifier -> TokenSentiment -> history. Analyses of one token
 * run one at a time so history order matches completion order; different
 * tokens run concurrently.
 */

import { SourceUnavailableError, errorMessage, fallback, ok } from '@tokenpulse/core';
import type { ClassifiedPost, Result, SocialPost, TokenSentiment } from '@tokenpulse/core';
import type { Classifier, PostSource } from '@tokenpulse/connectors';
import type { Logger } from '../../logger.js';
import { KeyedMutex, withTimeout } from '../../utils/async.js';
import type { HistoryStore } from './history.js';
import { buildTokenSentiment, neutralSentiment } from './scorer.js';

/**
 * Fallback reason for a token nobody is posting about
 */
export class NoPostsError extends SourceUnavailableError {
  constructor(source: string, token: string) {
    super(source, `no posts for ${token}`);
  }
}

export interface SentimentPipelineConfig {
  sourceTimeoutMs: number;
  maxPostsPerAnalysis: number;
}

const DEFAULT_CONFIG: SentimentPipelineConfig = {
  sourceTimeoutMs: 10000,
  maxPostsPerAnalysis: 100,
};

export interface SentimentPipelineDeps {
  posts: PostSource;
  classifier: Classifier;
  history: HistoryStore;
  logger: Logger;
  now?: () => Date;
}

export class SentimentPipeline {
  private config: SentimentPipelineConfig;
  private locks = new KeyedMutex();
  private now: () => Date;

  constructor(
    private readonly deps: SentimentPipelineDeps,
    config: Partial<SentimentPipelineConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Analyze one token. Source failures and empty batches come back as the
   * neutral record flagged as a fallback; only real analyses enter history.
   */
  async analyzeToken(token: string): Promise<Result<TokenSentiment>> {
    return this.locks.run(token, () => this.analyze(token));
  }

  async analyzeAll(tokens: readonly string[]): Promise<Map<string, Result<TokenSentiment>>> {
    const results = await Promise.all(tokens.map(async (token) => [token, await this.analyzeToken(token)] as const));
    return new Map(results);
  }

  isAnalyzing(token: string): boolean {
    return this.locks.isLocked(token);
  }

  private async analyze(token: string): Promise<Result<TokenSentiment>> {
    const { posts: source, classifier, history, logger } = this.deps;
    const log = logger.child({ token });

    let posts: SocialPost[];
    try {
      posts = await withTimeout(
        source.fetchPosts(token, this.config.maxPostsPerAnalysis),
        this.config.sourceTimeoutMs,
        source.id
      );
    } catch (error) {
      return this.fallbackFor(token, error, source.id, log);
    }

    if (posts.length === 0) {
      log.debug('No posts found');
      return fallback(neutralSentiment(token, this.now()), new NoPostsError(source.id, token));
    }

    let items: ClassifiedPost[];
    try {
      items = await withTimeout(
        Promise.all(
          posts.map(async (post) => ({
            classification: await classifier.classify(post.text),
            likes: post.likes,
            retweets: post.retweets,
            replies: post.replies,
          }))
        ),
        this.config.sourceTimeoutMs,
        classifier.id
      );
    } catch (error) {
      return this.fallbackFor(token, error, classifier.id, log);
    }

    const stored = history.for(token).record(buildTokenSentiment(token, items, this.now()));
    log.info(
      { score: Number(stored.sentimentScore.toFixed(1)), label: stored.sentimentLabel, samples: stored.sampleSize },
      'Sentiment analyzed'
    );
    return ok(stored);
  }

  private fallbackFor(token: string, error: unknown, source: string, log: Logger): Result<TokenSentiment> {
    const reason =
      error instanceof SourceUnavailableError
        ? error
        : new SourceUnavailableError(source, errorMessage(error), { cause: error });
    log.warn({ code: reason.code, error: reason.message }, 'Falling back to neutral sentiment');
    return fallback(neutralSentiment(token, this.now()), reason);
  }
}
