/**
 * Signal source capabilities
 *
 * The engine depends only on these interfaces. Each adapter implements
 * one capability and reports its own status.
 */

import type {
  DevWalletMetrics,
  SentimentClass,
  SocialPost,
  TokenPair,
  VolumeMetrics,
} from '@tokenpulse/core';

export interface ConnectorStatus {
  connected: boolean;
  latencyMs?: number;
  error?: string;
}

export interface SignalSource {
  readonly id: string;
  readonly name: string;
  isEnabled(): boolean;
  getStatus(): Promise<ConnectorStatus>;
}

/**
 * Volume, price and liquidity snapshots for a pool
 */
export interface MarketDataSource extends SignalSource {
  fetchVolumeMetrics(pair: Pick<TokenPair, 'chain' | 'poolAddress'>): Promise<VolumeMetrics | null>;
}

/**
 * Holder balances around a token's deployer
 */
export interface WalletSource extends SignalSource {
  fetchDevWalletMetrics(pair: Pick<TokenPair, 'tokenAddress' | 'deployerAddress'>): Promise<DevWalletMetrics | null>;
}

/**
 * Recent social posts mentioning a token
 */
export interface PostSource extends SignalSource {
  fetchPosts(token: string, limit?: number): Promise<SocialPost[]>;
}

/**
 * Classifier port: text in, three-way sentiment out
 */
export interface Classifier {
  readonly id: string;
  classify(text: string): Promise<SentimentClass>;
}

export const USER_AGENT = 'TokenPulse/0.3.0';
