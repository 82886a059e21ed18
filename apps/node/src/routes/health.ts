/**
 * Health Check Routes
 *
 * - Basic liveness checks
 * - Readiness checks (cache store)
 * - Detailed system health
 */

import type { FastifyInstance } from 'fastify';
import os from 'node:os';
import type { SignalEngine } from '../services/signals/index.js';

// ============================================
// Types
// ============================================

type OverallStatus = 'healthy' | 'degraded' | 'unhealthy';

interface HealthStatus {
  status: OverallStatus;
  timestamp: number;
  version: string;
  uptime: number;
}

interface DependencyHealth {
  name: string;
  status: 'connected' | 'degraded' | 'disconnected';
  latencyMs?: number;
  error?: string;
}

interface SystemHealth extends HealthStatus {
  dependencies: DependencyHealth[];
  system: {
    platform: string;
    nodeVersion: string;
    cpuUsage: number;
    memoryUsage: {
      used: number;
      total: number;
      percentage: number;
    };
    loadAverage: number[];
  };
  services: {
    trackedTokens: number;
    historyTokens: number;
    activeWebSockets: number;
    streaming: boolean;
    alerts: number;
  };
}

const VERSION = process.env.npm_package_version || '0.3.0';

// ============================================
// Routes
// ============================================

export async function registerHealthRoutes(fastify: FastifyInstance, engine: SignalEngine): Promise<void> {
  /**
   * GET /health
   * Liveness - always 200 while the process serves requests
   */
  fastify.get('/health', async () => {
    return {
      success: true,
      data: {
        status: 'healthy',
        timestamp: Date.now(),
        version: VERSION,
        uptime: process.uptime(),
      } satisfies HealthStatus,
    };
  });

  /**
   * GET /health/ready
   * A failing cache only degrades the service; reads recompute
   */
  fastify.get('/health/ready', async () => {
    const cache = await checkCache(engine);
    const status: OverallStatus = cache.status === 'connected' ? 'healthy' : 'degraded';

    return {
      success: true,
      data: {
        status,
        timestamp: Date.now(),
        version: VERSION,
        uptime: process.uptime(),
        dependencies: [cache],
      },
    };
  });

  /**
   * GET /health/detailed
   * Dependencies, sources and host metrics
   */
  fastify.get('/health/detailed', async () => {
    const dependencies = [await checkCache(engine), ...(await checkSources(engine))];
    const status: OverallStatus = dependencies.every((d) => d.status === 'connected') ? 'healthy' : 'degraded';

    const totalMem = os.totalmem();
    const usedMem = totalMem - os.freemem();
    const hub = engine.hub.stats();

    const response: SystemHealth = {
      status,
      timestamp: Date.now(),
      version: VERSION,
      uptime: process.uptime(),
      dependencies,
      system: {
        platform: `${os.platform()} ${os.arch()}`,
        nodeVersion: process.version,
        cpuUsage: process.cpuUsage().user / 1000000, // seconds
        memoryUsage: {
          used: usedMem,
          total: totalMem,
          percentage: Math.round((usedMem / totalMem) * 100),
        },
        loadAverage: os.loadavg(),
      },
      services: {
        trackedTokens: engine.trackedTokens().length,
        historyTokens: engine.history.tokens().length,
        activeWebSockets: hub.activeConnections,
        streaming: hub.streaming,
        alerts: engine.alerts.recent(100).length,
      },
    };

    return { success: true, data: response };
  });
}

// ============================================
// Dependency Checks
// ============================================

async function checkCache(engine: SignalEngine): Promise<DependencyHealth> {
  const start = Date.now();
  const name = `cache:${engine.cache.backend}`;
  const available = await engine.cache.ping();

  return available
    ? { name, status: 'connected', latencyMs: Date.now() - start }
    : { name, status: 'disconnected', error: 'Cache store did not answer ping' };
}

async function checkSources(engine: SignalEngine): Promise<DependencyHealth[]> {
  return Promise.all(
    engine.sources().map(async (source): Promise<DependencyHealth> => {
      const name = `source:${source.id}`;
      if (!source.isEnabled()) return { name, status: 'degraded', error: 'Disabled' };

      const status = await source.getStatus();
      return status.connected
        ? { name, status: 'connected', latencyMs: status.latencyMs }
        : { name, status: 'disconnected', latencyMs: status.latencyMs, error: status.error };
    })
  );
}
