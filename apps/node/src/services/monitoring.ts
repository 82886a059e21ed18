/**
 * Monitoring
 *
 * Per-endpoint latency windows and a bounded alert log.
 */

import type { Logger } from '../logger.js';

// ============================================
// Performance
// ============================================

export interface EndpointStats {
  endpoint: string;
  requests: number;
  avgMs?: number;
  minMs?: number;
  maxMs?: number;
  p95Ms?: number;
  p99Ms?: number;
}

const SAMPLE_WINDOW = 1000;

function percentile(sorted: readonly number[], p: number): number {
  return sorted[Math.min(sorted.length - 1, Math.floor(sorted.length * p))] ?? 0;
}

export class PerformanceMonitor {
  private samples = new Map<string, number[]>();
  private counts = new Map<string, number>();

  record(endpoint: string, durationMs: number): void {
    const times = this.samples.get(endpoint) ?? [];
    times.push(durationMs);
    if (times.length > SAMPLE_WINDOW) times.splice(0, times.length - SAMPLE_WINDOW);
    this.samples.set(endpoint, times);
    this.counts.set(endpoint, (this.counts.get(endpoint) ?? 0) + 1);
  }

  endpointStats(endpoint: string): EndpointStats {
    const times = this.samples.get(endpoint);
    if (!times || times.length === 0) return { endpoint, requests: 0 };

    const sorted = [...times].sort((a, b) => a - b);
    return {
      endpoint,
      requests: this.counts.get(endpoint) ?? times.length,
      avgMs: sorted.reduce((sum, t) => sum + t, 0) / sorted.length,
      minMs: sorted[0],
      maxMs: sorted[sorted.length - 1],
      p95Ms: percentile(sorted, 0.95),
      p99Ms: percentile(sorted, 0.99),
    };
  }

  allStats(): EndpointStats[] {
    return [...this.samples.keys()].map((endpoint) => this.endpointStats(endpoint));
  }
}

// ============================================
// Alerts
// ============================================

export type AlertSeverity = 'info' | 'warning' | 'critical';

export interface Alert {
  type: string;
  message: string;
  severity: AlertSeverity;
  timestamp: string;
}

export type AlertHandler = (alert: Alert) => void | Promise<void>;

const MAX_ALERTS = 100;

export class AlertLog {
  private alerts: Alert[] = [];
  private handlers: AlertHandler[] = [];

  constructor(private readonly logger: Logger) {}

  onAlert(handler: AlertHandler): void {
    this.handlers.push(handler);
  }

  async trigger(type: string, message: string, severity: AlertSeverity = 'warning'): Promise<Alert> {
    const alert: Alert = { type, message, severity, timestamp: new Date().toISOString() };
    this.alerts.push(alert);
    if (this.alerts.length > MAX_ALERTS) this.alerts.splice(0, this.alerts.length - MAX_ALERTS);

    this.logger.warn({ type, severity }, `Alert: ${message}`);

    for (const handler of this.handlers) {
      try {
        await handler(alert);
      } catch (error) {
        this.logger.error({ type, error }, 'Alert handler failed');
      }
    }
    return alert;
  }

  recent(limit = 10): Alert[] {
    return this.alerts.slice(-limit);
  }

  clear(): void {
    this.alerts = [];
  }
}
