import { describe, it, expect, vi, afterEach } from 'vitest';
import { TimeoutError } from '@tokenpulse/core';
import type { SentimentClass, SocialPost } from '@tokenpulse/core';
import type { Classifier, PostSource } from '@tokenpulse/connectors';
import { silentLogger } from '../../logger.js';
import { HistoryStore } from './history.js';
import { NoPostsError, SentimentPipeline } from './pipeline.js';

const NOW = new Date('2026-01-01T12:00:00.000Z');

function post(id: string, text: string, likes = 0): SocialPost {
  return { id, text, likes, retweets: 0, replies: 0, postedAt: NOW };
}

function postSource(fetchPosts: PostSource['fetchPosts']): PostSource {
  return {
    id: 'test-posts',
    name: 'Test posts',
    isEnabled: () => true,
    getStatus: async () => ({ connected: true }),
    fetchPosts,
  };
}

// "up" is bullish at 0.8, anything else bearish at 0.6
const classifier: Classifier = {
  id: 'test-classifier',
  classify: async (text: string): Promise<SentimentClass> =>
    text === 'up'
      ? { label: 'bullish', confidence: 0.8, probabilities: { bullish: 0.8, neutral: 0.1, bearish: 0.1 } }
      : { label: 'bearish', confidence: 0.6, probabilities: { bullish: 0.2, neutral: 0.2, bearish: 0.6 } },
};

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

function pipelineWith(posts: PostSource, history = new HistoryStore(), sourceTimeoutMs = 1000) {
  return {
    history,
    pipeline: new SentimentPipeline(
      { posts, classifier, history, logger: silentLogger(), now: () => NOW },
      { sourceTimeoutMs }
    ),
  };
}

describe('SentimentPipeline', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should score classified posts and record them in history', async () => {
    const { pipeline, history } = pipelineWith(
      postSource(async () => [post('1', 'up', 10), post('2', 'up', 20), post('3', 'down', 30)])
    );

    const result = await pipeline.analyzeToken('PEPE');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.fallback).toBeUndefined();
    expect(result.value.sentimentScore).toBeCloseTo((93.4 + 93.4 + 19.8) / 3);
    expect(result.value.sentimentLabel).toBe('bullish');
    expect(result.value.sampleSize).toBe(3);
    expect(result.value.avgLikes).toBe(20);
    expect(result.value.trend).toBe('insufficient_data');
    expect(history.get('PEPE')?.latest()).toBe(result.value);
  });

  it('should return the neutral fallback for an empty batch without touching history', async () => {
    const { pipeline, history } = pipelineWith(postSource(async () => []));

    const result = await pipeline.analyzeToken('PEPE');

    expect(result).toMatchObject({
      ok: true,
      value: { sentimentScore: 50, confidence: 0, sampleSize: 0, sentimentLabel: 'neutral' },
    });
    expect(result.ok && result.fallback?.code).toBe('SOURCE_UNAVAILABLE');
    expect(result.ok && result.fallback).toBeInstanceOf(NoPostsError);
    expect(history.get('PEPE')).toBeUndefined();
  });

  it('should fall back when the post source fails', async () => {
    const { pipeline } = pipelineWith(
      postSource(async () => {
        throw new Error('upstream 503');
      })
    );

    const result = await pipeline.analyzeToken('PEPE');

    expect(result.ok && result.fallback?.message).toBe('test-posts: upstream 503');
    expect(result.ok && result.value.sentimentScore).toBe(50);
  });

  it('should fall back when the post source times out', async () => {
    vi.useFakeTimers();
    const { pipeline } = pipelineWith(postSource(() => new Promise<SocialPost[]>(() => {})));

    const pending = pipeline.analyzeToken('PEPE');
    await vi.advanceTimersByTimeAsync(1000);
    const result = await pending;

    expect(result.ok && result.fallback).toBeInstanceOf(TimeoutError);
    expect(result.ok && result.value.sampleSize).toBe(0);
  });

  it('should serialize analyses of the same token in call order', async () => {
    const first = deferred<SocialPost[]>();
    const fetchPosts = vi
      .fn<PostSource['fetchPosts']>()
      .mockReturnValueOnce(first.promise)
      .mockResolvedValueOnce([post('2', 'down')]);
    const { pipeline, history } = pipelineWith(postSource(fetchPosts));

    const a = pipeline.analyzeToken('PEPE');
    const b = pipeline.analyzeToken('PEPE');
    await Promise.resolve();

    expect(fetchPosts).toHaveBeenCalledTimes(1);
    expect(pipeline.isAnalyzing('PEPE')).toBe(true);

    first.resolve([post('1', 'up')]);
    await Promise.all([a, b]);

    expect(history.get('PEPE')?.entries().map((e) => e.sentimentLabel)).toEqual(['bullish', 'bearish']);
    expect(pipeline.isAnalyzing('PEPE')).toBe(false);
  });

  it('should not hold one token behind another', async () => {
    const slow = deferred<SocialPost[]>();
    const { pipeline } = pipelineWith(
      postSource((token) => (token === 'SLOW' ? slow.promise : Promise.resolve([post('1', 'up')])))
    );

    const pendingSlow = pipeline.analyzeToken('SLOW');
    const fast = await pipeline.analyzeToken('FAST');

    expect(fast.ok && fast.value.sentimentLabel).toBe('bullish');
    expect(pipeline.isAnalyzing('SLOW')).toBe(true);

    slow.resolve([]);
    await pendingSlow;
  });

  it('should analyze every token', async () => {
    const { pipeline } = pipelineWith(postSource(async () => [post('1', 'up')]));

    const results = await pipeline.analyzeAll(['PEPE', 'DOGE']);

    expect([...results.keys()]).toEqual(['PEPE', 'DOGE']);
    expect(results.get('DOGE')?.ok).toBe(true);
  });
});
