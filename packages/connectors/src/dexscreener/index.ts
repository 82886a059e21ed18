/**
 * DexScreener Connector
 *
 * Volume, price-change and liquidity snapshots for a DEX pool.
 * Public API, no key required.
 */

import { z } from 'zod';
import type { VolumeMetrics } from '@tokenpulse/core';
import { USER_AGENT, type ConnectorStatus, type MarketDataSource } from '../types.js';

// ============================================
// Types
// ============================================

export interface DexScreenerConfig {
  enabled?: boolean;
  baseUrl?: string;
  timeoutMs?: number;
}

const NumericSchema = z.union([z.number(), z.string()]).optional().nullable().transform((v) => {
  const n = typeof v === 'string' ? parseFloat(v) : v ?? 0;
  return Number.isFinite(n) ? n : 0;
});

const WindowSchema = z
  .object({ m5: NumericSchema, h1: NumericSchema, h24: NumericSchema })
  .partial()
  .optional()
  .nullable();

export const DexScreenerPairSchema = z.object({
  chainId: z.string(),
  pairAddress: z.string(),
  priceUsd: NumericSchema,
  volume: WindowSchema,
  priceChange: WindowSchema,
  liquidity: z.object({ usd: NumericSchema }).partial().optional().nullable(),
});

export type DexScreenerPair = z.infer<typeof DexScreenerPairSchema>;

const PairResponseSchema = z.object({
  pair: DexScreenerPairSchema.nullable().optional(),
  pairs: z.array(DexScreenerPairSchema).nullable().optional(),
});

// ============================================
// Constants
// ============================================

const DEFAULT_CONFIG: Required<DexScreenerConfig> = {
  enabled: true,
  baseUrl: 'https://api.dexscreener.com',
  timeoutMs: 5000,
};

// ============================================
// DexScreener Connector
// ============================================

export class DexScreenerConnector implements MarketDataSource {
  readonly id = 'dexscreener';
  readonly name = 'DexScreener';

  private config: Required<DexScreenerConfig>;

  constructor(config: Partial<DexScreenerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  isEnabled(): boolean {
    return this.config.enabled;
  }

  async getStatus(): Promise<ConnectorStatus> {
    const start = Date.now();

    try {
      const response = await this.request('/latest/dex/search?q=usdc');

      if (!response.ok) {
        return { connected: false, error: `DexScreener API returned ${response.status}` };
      }

      return { connected: true, latencyMs: Date.now() - start };
    } catch (error) {
      return {
        connected: false,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }

  /**
   * Snapshot for one pool. Returns null when the pool is unknown.
   * Transport failures propagate so the caller can apply its fallback.
   */
  async fetchVolumeMetrics(pair: { chain: string; poolAddress: string }): Promise<VolumeMetrics | null> {
    const path = `/latest/dex/pairs/${encodeURIComponent(pair.chain)}/${encodeURIComponent(pair.poolAddress)}`;
    const response = await this.request(path);

    if (response.status === 404) return null;
    if (!response.ok) {
      throw new Error(`DexScreener API returned ${response.status}`);
    }

    const parsed = PairResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('DexScreener returned an unexpected payload');
    }

    const raw = parsed.data.pair ?? parsed.data.pairs?.[0];
    return raw ? toVolumeMetrics(raw) : null;
  }

  private request(path: string): Promise<Response> {
    return fetch(`${this.config.baseUrl}${path}`, {
      headers: {
        'Accept': 'application/json',
        'User-Agent': USER_AGENT,
      },
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });
  }
}

export function toVolumeMetrics(pair: DexScreenerPair): VolumeMetrics {
  return {
    volume5m: pair.volume?.m5 ?? 0,
    volume1h: pair.volume?.h1 ?? 0,
    volume24h: pair.volume?.h24 ?? 0,
    liquidityUsd: pair.liquidity?.usd ?? 0,
    price: pair.priceUsd,
    priceChange5m: pair.priceChange?.m5 ?? 0,
    priceChange1h: pair.priceChange?.h1 ?? 0,
    priceChange24h: pair.priceChange?.h24 ?? 0,
  };
}
