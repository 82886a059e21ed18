/**
 * Block Explorer Wallet Connector
 *
 * Reads the largest holder balances of a token from an Etherscan-compatible
 * explorer API (Basescan, Etherscan, BscScan). Balances feed the dev-wallet
 * clustering score.
 */

import { z } from 'zod';
import type { DevWalletMetrics } from '@tokenpulse/core';
import { USER_AGENT, type ConnectorStatus, type WalletSource } from '../types.js';

// ============================================
// Types
// ============================================

export interface ExplorerConfig {
  enabled?: boolean;
  baseUrl?: string;
  apiKey?: string;
  maxHolders?: number;
  decimals?: number;
  timeoutMs?: number;
}

const HolderSchema = z.object({
  TokenHolderAddress: z.string(),
  TokenHolderQuantity: z.string(),
});

const HolderListResponseSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
  result: z.union([z.array(HolderSchema), z.string()]),
});

// ============================================
// Constants
// ============================================

const DEFAULT_CONFIG: Required<ExplorerConfig> = {
  enabled: true,
  baseUrl: 'https://api.basescan.org/api',
  apiKey: '',
  maxHolders: 10,
  decimals: 18,
  timeoutMs: 5000,
};

// ============================================
// Explorer Connector
// ============================================

export class ExplorerWalletConnector implements WalletSource {
  readonly id = 'explorer';
  readonly name = 'Block Explorer';

  private config: Required<ExplorerConfig>;

  constructor(config: Partial<ExplorerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Enabled only when configured with an API key
   */
  isEnabled(): boolean {
    return this.config.enabled && this.config.apiKey.length > 0;
  }

  async getStatus(): Promise<ConnectorStatus> {
    if (!this.isEnabled()) {
      return { connected: false, error: 'Explorer API key not configured' };
    }

    const start = Date.now();
    try {
      const response = await this.request({ module: 'stats', action: 'ethprice' });
      if (!response.ok) {
        return { connected: false, error: `Explorer API returned ${response.status}` };
      }
      return { connected: true, latencyMs: Date.now() - start };
    } catch (error) {
      return {
        connected: false,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }

  async fetchDevWalletMetrics(pair: { tokenAddress: string }): Promise<DevWalletMetrics | null> {
    if (!this.isEnabled()) return null;

    const response = await this.request({
      module: 'token',
      action: 'tokenholderlist',
      contractaddress: pair.tokenAddress,
      page: '1',
      offset: String(this.config.maxHolders),
    });

    if (!response.ok) {
      throw new Error(`Explorer API returned ${response.status}`);
    }

    const parsed = HolderListResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('Explorer returned an unexpected payload');
    }

    // status "0" with a string result means no holders / unknown token
    if (parsed.data.status !== '1' || typeof parsed.data.result === 'string') {
      return null;
    }

    const scale = 10 ** this.config.decimals;
    const balances = parsed.data.result
      .slice(0, this.config.maxHolders)
      .map((holder) => Number(holder.TokenHolderQuantity) / scale)
      .filter((balance) => Number.isFinite(balance));

    return { balances };
  }

  private request(params: Record<string, string>): Promise<Response> {
    const url = new URL(this.config.baseUrl);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    url.searchParams.set('apikey', this.config.apiKey);

    return fetch(url.toString(), {
      headers: { 'Accept': 'application/json', 'User-Agent': USER_AGENT },
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });
  }
}
