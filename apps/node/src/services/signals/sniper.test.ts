import { describe, it, expect, vi, afterEach } from 'vitest';
import type { TokenPair, VolumeMetrics } from '@tokenpulse/core';
import type { Classifier, MarketDataSource, PostSource, WalletSource } from '@tokenpulse/connectors';
import { silentLogger } from '../../logger.js';
import { SnipeScanner } from './sniper.js';

const NOW = new Date('2026-01-01T12:00:00.000Z');

function pair(symbol: string, liquidityUsd: number): TokenPair {
  return {
    tokenAddress: `0x${symbol.toLowerCase()}`,
    tokenSymbol: symbol,
    tokenName: symbol,
    dex: 'uniswap',
    poolAddress: `0xpool${symbol.toLowerCase()}`,
    chain: 'base',
    liquidityUsd,
    createdAt: NOW,
  };
}

const HOT_VOLUME: VolumeMetrics = {
  volume5m: 20_000,
  volume1h: 10_000,
  volume24h: 500_000,
  liquidityUsd: 200_000,
  price: 0.01,
  priceChange5m: 50,
  priceChange1h: 10,
  priceChange24h: 100,
};

const source = { name: 'test', isEnabled: () => true, getStatus: async () => ({ connected: true }) };

function deps(overrides: { market?: MarketDataSource['fetchVolumeMetrics']; wallets?: WalletSource['fetchDevWalletMetrics'] } = {}) {
  const market: MarketDataSource = { ...source, id: 'market', fetchVolumeMetrics: overrides.market ?? (async () => HOT_VOLUME) };
  const wallets: WalletSource = { ...source, id: 'wallets', fetchDevWalletMetrics: overrides.wallets ?? (async () => null) };
  const posts: PostSource = {
    ...source,
    id: 'posts',
    fetchPosts: async () => [{ id: '1', text: 'gm', likes: 0, retweets: 0, replies: 0, postedAt: NOW }],
  };
  const classifier: Classifier = {
    id: 'classifier',
    classify: async () => ({ label: 'bullish', confidence: 0.9, probabilities: { bullish: 0.9, neutral: 0.05, bearish: 0.05 } }),
  };
  return { market, wallets, posts, classifier, logger: silentLogger(), now: () => NOW };
}

describe('SnipeScanner', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should score a pair from every source', async () => {
    const scanner = new SnipeScanner(deps());

    const signal = await scanner.analyzePair(pair('HOT', 0));

    expect(signal.volumeScore).toBe(100);
    expect(signal.sentimentScore).toBe(100);
    expect(signal.devWalletScore).toBe(50);
    expect(signal.liquidityScore).toBe(80);
    expect(signal.prediction).toBe('100x');
    expect(signal.analysisTimestamp).toBe(NOW);
  });

  it('should score a failing market source as missing data', async () => {
    const scanner = new SnipeScanner(
      deps({
        market: async () => {
          throw new Error('DexScreener API returned 500');
        },
      })
    );

    const signal = await scanner.analyzePair(pair('COLD', 5_000));

    expect(signal.volumeScore).toBe(0);
    expect(signal.liquidityScore).toBe(20);
  });

  it('should not wait past the source timeout', async () => {
    vi.useFakeTimers();
    const scanner = new SnipeScanner(deps({ market: () => new Promise(() => {}) }), { sourceTimeoutMs: 500 });

    const pending = scanner.analyzePair(pair('SLOW', 5_000));
    await vi.advanceTimersByTimeAsync(500);
    const signal = await pending;

    expect(signal.volumeScore).toBe(0);
  });

  it('should use wallet clustering when holders are known', async () => {
    const scanner = new SnipeScanner(deps({ wallets: async () => ({ balances: [100, 100, 100] }) }));

    const signal = await scanner.analyzePair(pair('HOT', 0));

    expect(signal.devWalletScore).toBe(0);
    expect(signal.risks).toContain('Suspicious dev wallets');
  });

  it('should rank scanned pairs best first', async () => {
    const scanner = new SnipeScanner(
      deps({ market: async (p) => (p.poolAddress === '0xpoolhot' ? HOT_VOLUME : null) })
    );

    const signals = await scanner.scan([pair('COLD', 1_000), pair('HOT', 0)]);

    expect(signals.map((s) => s.tokenSymbol)).toEqual(['HOT', 'COLD']);
  });
});
