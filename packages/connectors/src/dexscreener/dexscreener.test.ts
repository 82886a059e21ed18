/**
 * DexScreener Connector Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DexScreenerConnector } from './index.js';

describe('DexScreenerConnector', () => {
  let connector: DexScreenerConnector;

  beforeEach(() => {
    connector = new DexScreenerConnector({ baseUrl: 'https://dex.test' });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('constructor', () => {
    it('should expose identity', () => {
      expect(connector.id).toBe('dexscreener');
      expect(connector.name).toBe('DexScreener');
    });

    it('should respect enabled config', () => {
      expect(connector.isEnabled()).toBe(true);
      expect(new DexScreenerConnector({ enabled: false }).isEnabled()).toBe(false);
    });
  });

  describe('getStatus', () => {
    it('should return connected status when API is reachable', async () => {
      vi.spyOn(global, 'fetch').mockResolvedValue({ ok: true, status: 200 } as Response);

      const status = await connector.getStatus();

      expect(status.connected).toBe(true);
      expect(status.latencyMs).toBeGreaterThanOrEqual(0);
    });

    it('should report the HTTP status on API error', async () => {
      vi.spyOn(global, 'fetch').mockResolvedValue({ ok: false, status: 503 } as Response);

      const status = await connector.getStatus();

      expect(status.connected).toBe(false);
      expect(status.error).toBe('DexScreener API returned 503');
    });

    it('should return disconnected status on network error', async () => {
      vi.spyOn(global, 'fetch').mockRejectedValue(new Error('Network error'));

      const status = await connector.getStatus();

      expect(status.connected).toBe(false);
      expect(status.error).toBe('Network error');
    });
  });

  describe('fetchVolumeMetrics', () => {
    it('should map a pair payload to volume metrics', async () => {
      const fetchSpy = vi.spyOn(global, 'fetch').mockResolvedValue({
        ok: true,
        status: 200,
        json: async () => ({
          pairs: [
            {
              chainId: 'base',
              pairAddress: '0xpool',
              priceUsd: '0.0042',
              volume: { m5: 12000, h1: 40000, h24: 250000 },
              priceChange: { m5: 3.5, h1: -2, h24: 18 },
              liquidity: { usd: 75000 },
            },
          ],
        }),
      } as Response);

      const metrics = await connector.fetchVolumeMetrics({ chain: 'base', poolAddress: '0xpool' });

      expect(metrics).toEqual({
        volume5m: 12000,
        volume1h: 40000,
        volume24h: 250000,
        liquidityUsd: 75000,
        price: 0.0042,
        priceChange5m: 3.5,
        priceChange1h: -2,
        priceChange24h: 18,
      });
      expect(fetchSpy.mock.calls[0]?.[0]).toBe('https://dex.test/latest/dex/pairs/base/0xpool');
    });

    it('should default missing windows to zero', async () => {
      vi.spyOn(global, 'fetch').mockResolvedValue({
        ok: true,
        status: 200,
        json: async () => ({ pair: { chainId: 'base', pairAddress: '0xpool' } }),
      } as Response);

      const metrics = await connector.fetchVolumeMetrics({ chain: 'base', poolAddress: '0xpool' });

      expect(metrics?.volume5m).toBe(0);
      expect(metrics?.liquidityUsd).toBe(0);
      expect(metrics?.price).toBe(0);
    });

    it('should return null for an unknown pool', async () => {
      vi.spyOn(global, 'fetch').mockResolvedValue({
        ok: true,
        status: 200,
        json: async () => ({ pairs: null }),
      } as Response);

      const metrics = await connector.fetchVolumeMetrics({ chain: 'base', poolAddress: '0xnone' });

      expect(metrics).toBeNull();
    });

    it('should throw on a server error so callers can fall back', async () => {
      vi.spyOn(global, 'fetch').mockResolvedValue({ ok: false, status: 500 } as Response);

      await expect(
        connector.fetchVolumeMetrics({ chain: 'base', poolAddress: '0xpool' })
      ).rejects.toThrow('DexScreener API returned 500');
    });
  });
});
