/**
 * Broadcast Hub
 *
 * Fan-out of sentiment messages to WebSocket subscribers. Delivery is
 * best-effort per subscriber: one failing sink is dropped without
 * affecting the rest of a broadcast.
 */

import { randomUUID } from 'node:crypto';
import { ClientMessageSchema, RateLimitExceededError, TokenPulseError, errorMessage } from '@tokenpulse/core';
import type { ClientMessage, ServerMessage, TokenSentimentJson } from '@tokenpulse/core';
import type { Logger } from '../logger.js';
import type { SlidingWindowRateLimiter } from '../middleware/rateLimit.js';

// ============================================
// Types
// ============================================

export type SubscriberState = 'connecting' | 'connected' | 'disconnected';

/**
 * Transport behind a subscriber. A throw or a rejected promise is a
 * delivery failure.
 */
export interface SubscriberSink {
  send(data: string): void | Promise<void>;
  close?(): void;
}

export interface Subscriber {
  readonly id: string;
  readonly connectedAt: Date;
  state: SubscriberState;
  // null: every token
  filter: Set<string> | null;
}

export type SentimentMap = Record<string, TokenSentimentJson>;

/**
 * What the hub needs from the engine
 */
export interface SentimentFeed {
  trackedTokens(): string[];
  /** Cache-aside read */
  read(tokens: readonly string[]): Promise<SentimentMap>;
  /** Recompute every tracked token */
  refresh(): Promise<SentimentMap>;
}

export interface BroadcastResult {
  delivered: number;
  failed: number;
}

export interface HubStats {
  activeConnections: number;
  totalConnections: number;
  totalMessages: number;
  failedDeliveries: number;
  lastActivity: string | null;
  streaming: boolean;
}

/**
 * Budget for `request_sentiment`, counted per subscriber on the shared
 * HTTP limiter
 */
export interface RequestLimit {
  limiter: SlidingWindowRateLimiter;
  maxRequests: number;
  windowSeconds: number;
}

export interface HubOptions {
  requestLimit?: RequestLimit;
}

type MessageFor = (subscriber: Subscriber) => ServerMessage | null;

export const STREAM_BACKOFF_MS = 5000;
export const WS_REQUEST_LIMIT = { maxRequests: 60, windowSeconds: 60 };

// ============================================
// Hub
// ============================================

export class BroadcastHub {
  private subscribers = new Map<string, { subscriber: Subscriber; sink: SubscriberSink }>();
  private totalConnections = 0;
  private totalMessages = 0;
  private failedDeliveries = 0;
  private lastActivity: Date | null = null;

  private streaming = false;
  private streamTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly feed: SentimentFeed,
    private readonly logger: Logger,
    private readonly options: HubOptions = {}
  ) {}

  get connectionCount(): number {
    return this.subscribers.size;
  }

  /**
   * Handshake a new sink. Returns null when the handshake cannot be delivered.
   */
  async register(sink: SubscriberSink): Promise<Subscriber | null> {
    const subscriber: Subscriber = {
      id: randomUUID(),
      connectedAt: new Date(),
      state: 'connecting',
      filter: null,
    };
    this.totalConnections++;

    const delivered = await this.deliver(subscriber, sink, {
      type: 'connection',
      status: 'connected',
      timestamp: new Date().toISOString(),
      tokens: this.feed.trackedTokens(),
      message: 'Connected to sentiment stream',
    });

    if (!delivered) {
      subscriber.state = 'disconnected';
      return null;
    }

    subscriber.state = 'connected';
    this.subscribers.set(subscriber.id, { subscriber, sink });
    this.logger.info({ subscriberId: subscriber.id, connections: this.subscribers.size }, 'Subscriber connected');
    return subscriber;
  }

  unsubscribe(subscriber: Subscriber): void {
    if (subscriber.state === 'disconnected') return;
    subscriber.state = 'disconnected';
    if (this.subscribers.delete(subscriber.id)) {
      this.logger.info({ subscriberId: subscriber.id, connections: this.subscribers.size }, 'Subscriber disconnected');
    }
  }

  /**
   * Send to every connected subscriber. A function message is evaluated per
   * subscriber; returning null skips that subscriber.
   */
  async broadcast(message: ServerMessage | MessageFor): Promise<BroadcastResult> {
    const targets = [...this.subscribers.values()];

    const outcomes = await Promise.all(
      targets.map(async ({ subscriber, sink }) => {
        const payload = typeof message === 'function' ? message(subscriber) : message;
        if (payload === null) return null;
        return this.deliver(subscriber, sink, payload);
      })
    );

    return {
      delivered: outcomes.filter((o) => o === true).length,
      failed: outcomes.filter((o) => o === false).length,
    };
  }

  async sendPersonal(subscriber: Subscriber, message: ServerMessage): Promise<boolean> {
    const entry = this.subscribers.get(subscriber.id);
    if (!entry) return false;
    return this.deliver(subscriber, entry.sink, message);
  }

  // ============================================
  // Client Messages
  // ============================================

  async handleMessage(subscriber: Subscriber, raw: string): Promise<void> {
    this.lastActivity = new Date();

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      await this.sendError(subscriber, 'INVALID_INPUT', 'Message is not valid JSON');
      return;
    }

    const parsed = ClientMessageSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      await this.sendError(subscriber, 'INVALID_INPUT', issue ? `${issue.path.join('.') || 'message'}: ${issue.message}` : 'Invalid message');
      return;
    }

    await this.dispatch(subscriber, parsed.data);
  }

  private async dispatch(subscriber: Subscriber, message: ClientMessage): Promise<void> {
    const timestamp = new Date().toISOString();

    switch (message.type) {
      case 'ping':
        await this.sendPersonal(subscriber, { type: 'pong', timestamp });
        return;

      case 'request_sentiment': {
        const limit = this.options.requestLimit;
        if (limit) {
          const decision = limit.limiter.isAllowed(`ws:${subscriber.id}`, limit.maxRequests, limit.windowSeconds);
          if (!decision.allowed) {
            const error = new RateLimitExceededError(decision.stats);
            await this.sendError(subscriber, error.code, error.message);
            return;
          }
        }
        const tokens = message.tokens ?? this.feed.trackedTokens();
        try {
          const data = await this.feed.read(tokens);
          await this.sendPersonal(subscriber, { type: 'sentiment', timestamp: new Date().toISOString(), data });
        } catch (error) {
          this.logger.error({ subscriberId: subscriber.id, error: errorMessage(error) }, 'Failed to read sentiment');
          const code = error instanceof TokenPulseError ? error.code : 'INTERNAL_ERROR';
          await this.sendError(subscriber, code, errorMessage(error));
        }
        return;
      }

      case 'subscribe': {
        if (message.tokens) {
          subscriber.filter = new Set([...(subscriber.filter ?? []), ...message.tokens]);
        } else {
          subscriber.filter = null;
        }
        await this.sendPersonal(subscriber, {
          type: 'subscribed',
          timestamp,
          tokens: subscriber.filter ? [...subscriber.filter] : this.feed.trackedTokens(),
        });
        return;
      }

      case 'unsubscribe': {
        if (message.tokens) {
          const current = subscriber.filter ?? new Set(this.feed.trackedTokens());
          for (const token of message.tokens) current.delete(token);
          subscriber.filter = current;
        } else {
          subscriber.filter = new Set();
        }
        await this.sendPersonal(subscriber, { type: 'unsubscribed', timestamp, tokens: [...subscriber.filter] });
        return;
      }
    }
  }

  // ============================================
  // Streaming
  // ============================================

  /**
   * Recompute tracked tokens and push to subscribers, each seeing only the
   * tokens it subscribed to
   */
  async pushUpdate(): Promise<BroadcastResult> {
    const data = await this.feed.refresh();
    const timestamp = new Date().toISOString();
    const connectionCount = this.subscribers.size;

    return this.broadcast((subscriber) => {
      if (!subscriber.filter) {
        return { type: 'sentiment_update', timestamp, data, connectionCount };
      }
      const filtered: SentimentMap = {};
      for (const [token, sentiment] of Object.entries(data)) {
        if (subscriber.filter.has(token)) filtered[token] = sentiment;
      }
      if (Object.keys(filtered).length === 0) return null;
      return { type: 'sentiment_update', timestamp, data: filtered, connectionCount };
    });
  }

  startStreaming(intervalMs: number): void {
    if (this.streaming) return;
    this.streaming = true;
    this.logger.info({ intervalMs }, 'Starting sentiment stream');

    const tick = async (): Promise<void> => {
      let delay = intervalMs;
      try {
        const result = await this.pushUpdate();
        this.logger.debug(result, 'Pushed sentiment update');
      } catch (error) {
        delay = STREAM_BACKOFF_MS;
        this.logger.error({ error: errorMessage(error) }, 'Sentiment stream update failed');
      }
      if (this.streaming) {
        this.streamTimer = setTimeout(() => void tick(), delay);
      }
    };

    this.streamTimer = setTimeout(() => void tick(), 0);
  }

  stopStreaming(): void {
    if (!this.streaming) return;
    this.streaming = false;
    if (this.streamTimer) clearTimeout(this.streamTimer);
    this.streamTimer = null;
    this.logger.info('Sentiment stream stopped');
  }

  get isStreaming(): boolean {
    return this.streaming;
  }

  stats(): HubStats {
    return {
      activeConnections: this.subscribers.size,
      totalConnections: this.totalConnections,
      totalMessages: this.totalMessages,
      failedDeliveries: this.failedDeliveries,
      lastActivity: this.lastActivity?.toISOString() ?? null,
      streaming: this.streaming,
    };
  }

  /**
   * Close every sink and stop streaming
   */
  close(): void {
    this.stopStreaming();
    for (const { subscriber, sink } of this.subscribers.values()) {
      subscriber.state = 'disconnected';
      sink.close?.();
    }
    this.subscribers.clear();
  }

  // ============================================
  // Delivery
  // ============================================

  private async sendError(subscriber: Subscriber, code: string, message: string): Promise<void> {
    await this.sendPersonal(subscriber, {
      type: 'error',
      timestamp: new Date().toISOString(),
      error: { code, message },
    });
  }

  private async deliver(subscriber: Subscriber, sink: SubscriberSink, message: ServerMessage): Promise<boolean> {
    try {
      await sink.send(JSON.stringify(message));
      this.totalMessages++;
      this.lastActivity = new Date();
      return true;
    } catch (error) {
      this.failedDeliveries++;
      this.logger.warn(
        { subscriberId: subscriber.id, type: message.type, error: errorMessage(error) },
        'Delivery failed, dropping subscriber'
      );
      this.unsubscribe(subscriber);
      return false;
    }
  }
}
