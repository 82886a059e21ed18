import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { sentimentToJson } from '@tokenpulse/core';
import type { ServerMessage, TokenSentimentJson } from '@tokenpulse/core';
import { silentLogger } from '../logger.js';
import { SlidingWindowRateLimiter } from '../middleware/rateLimit.js';
import { buildTokenSentiment } from '../services/signals/scorer.js';
import { BroadcastHub, STREAM_BACKOFF_MS } from './hub.js';
import type { SentimentFeed, SentimentMap, Subscriber, SubscriberSink } from './hub.js';

function sentiment(token: string): TokenSentimentJson {
  return sentimentToJson(buildTokenSentiment(token, [], new Date('2026-01-01T00:00:00.000Z')));
}

class RecordingSink implements SubscriberSink {
  messages: ServerMessage[] = [];
  failing = false;

  send(data: string): void {
    if (this.failing) throw new Error('socket closed');
    this.messages.push(JSON.parse(data));
  }

  last(): ServerMessage | undefined {
    return this.messages[this.messages.length - 1];
  }
}

function dataKeys(message: ServerMessage | undefined): string[] {
  const data = message?.data;
  return data && typeof data === 'object' ? Object.keys(data) : [];
}

function feed(overrides: Partial<SentimentFeed> = {}): SentimentFeed {
  const all: SentimentMap = { PEPE: sentiment('PEPE'), DOGE: sentiment('DOGE') };
  return {
    trackedTokens: () => ['PEPE', 'DOGE'],
    read: async (tokens) => Object.fromEntries(tokens.map((t) => [t, sentiment(t)])),
    refresh: async () => all,
    ...overrides,
  };
}

describe('BroadcastHub', () => {
  let hub: BroadcastHub;

  beforeEach(() => {
    hub = new BroadcastHub(feed(), silentLogger());
  });

  afterEach(() => {
    hub.close();
  });

  describe('register', () => {
    it('should send the connection handshake', async () => {
      const sink = new RecordingSink();

      const subscriber = await hub.register(sink);

      expect(subscriber?.state).toBe('connected');
      expect(sink.last()).toMatchObject({
        type: 'connection',
        status: 'connected',
        tokens: ['PEPE', 'DOGE'],
      });
      expect(hub.connectionCount).toBe(1);
    });

    it('should not add a subscriber whose handshake fails', async () => {
      const sink = new RecordingSink();
      sink.failing = true;

      expect(await hub.register(sink)).toBeNull();
      expect(hub.connectionCount).toBe(0);
      expect(hub.stats().totalConnections).toBe(1);
    });
  });

  describe('broadcast', () => {
    it('should keep delivering after one subscriber fails', async () => {
      const sinks = [new RecordingSink(), new RecordingSink(), new RecordingSink()];
      for (const sink of sinks) await hub.register(sink);
      const broken = sinks[1];
      if (broken) broken.failing = true;

      const result = await hub.broadcast({ type: 'sentiment_update', timestamp: 'now', data: {} });

      expect(result).toEqual({ delivered: 2, failed: 1 });
      expect(sinks[0]?.last()?.type).toBe('sentiment_update');
      expect(sinks[2]?.last()?.type).toBe('sentiment_update');
      expect(hub.connectionCount).toBe(2);
    });

    it('should treat a rejected send as a failure', async () => {
      const sink: SubscriberSink = { send: vi.fn().mockResolvedValueOnce(undefined).mockRejectedValue(new Error('gone')) };
      const subscriber = await hub.register(sink);

      const result = await hub.broadcast({ type: 'pong', timestamp: 'now' });

      expect(result).toEqual({ delivered: 0, failed: 1 });
      expect(subscriber?.state).toBe('disconnected');
    });
  });

  describe('unsubscribe', () => {
    it('should stop delivery to the subscriber', async () => {
      const sink = new RecordingSink();
      const subscriber = await hub.register(sink);
      if (!subscriber) throw new Error('expected a subscriber');

      hub.unsubscribe(subscriber);
      const result = await hub.broadcast({ type: 'pong', timestamp: 'now' });

      expect(subscriber.state).toBe('disconnected');
      expect(result).toEqual({ delivered: 0, failed: 0 });
      expect(await hub.sendPersonal(subscriber, { type: 'pong', timestamp: 'now' })).toBe(false);
    });
  });

  describe('handleMessage', () => {
    async function connect(): Promise<{ sink: RecordingSink; subscriber: Subscriber }> {
      const sink = new RecordingSink();
      const subscriber = await hub.register(sink);
      if (!subscriber) throw new Error('expected a subscriber');
      return { sink, subscriber };
    }

    it('should answer ping with pong', async () => {
      const { sink, subscriber } = await connect();

      await hub.handleMessage(subscriber, '{"type":"ping"}');

      expect(sink.last()?.type).toBe('pong');
    });

    it('should reply with sentiment for the requested tokens', async () => {
      const { sink, subscriber } = await connect();

      await hub.handleMessage(subscriber, '{"type":"request_sentiment","tokens":["pepe"]}');

      const reply = sink.last();
      expect(reply?.type).toBe('sentiment');
      expect(dataKeys(reply)).toEqual(['PEPE']);
    });

    it('should default sentiment requests to the tracked tokens', async () => {
      const { sink, subscriber } = await connect();

      await hub.handleMessage(subscriber, '{"type":"request_sentiment"}');

      expect(dataKeys(sink.last())).toEqual(['PEPE', 'DOGE']);
    });

    it('should acknowledge subscriptions and record the filter', async () => {
      const { sink, subscriber } = await connect();

      await hub.handleMessage(subscriber, '{"type":"subscribe","tokens":["doge"]}');

      expect(sink.last()).toMatchObject({ type: 'subscribed', tokens: ['DOGE'] });
      expect(subscriber.filter).toEqual(new Set(['DOGE']));
    });

    it('should remove tokens on unsubscribe', async () => {
      const { sink, subscriber } = await connect();

      await hub.handleMessage(subscriber, '{"type":"unsubscribe","tokens":["PEPE"]}');

      expect(sink.last()).toMatchObject({ type: 'unsubscribed', tokens: ['DOGE'] });
    });

    it('should reject malformed JSON and keep the connection', async () => {
      const { sink, subscriber } = await connect();

      await hub.handleMessage(subscriber, 'not json');

      expect(sink.last()).toMatchObject({
        type: 'error',
        error: { code: 'INVALID_INPUT', message: 'Message is not valid JSON' },
      });
      expect(subscriber.state).toBe('connected');
    });

    it('should reject unknown message types', async () => {
      const { sink, subscriber } = await connect();

      await hub.handleMessage(subscriber, '{"type":"teleport"}');

      expect(sink.last()?.type).toBe('error');
      expect(hub.connectionCount).toBe(1);
    });

    it('should reject invalid token symbols', async () => {
      const { sink, subscriber } = await connect();

      await hub.handleMessage(subscriber, '{"type":"subscribe","tokens":["not a token!"]}');

      expect(sink.last()).toMatchObject({ type: 'error', error: { code: 'INVALID_INPUT' } });
      expect(subscriber.filter).toBeNull();
    });

    it('should rate limit sentiment requests per subscriber', async () => {
      const read = vi.fn(async (tokens: readonly string[]) => Object.fromEntries(tokens.map((t) => [t, sentiment(t)])));
      const limiter = new SlidingWindowRateLimiter();
      hub = new BroadcastHub(feed({ read }), silentLogger(), {
        requestLimit: { limiter, maxRequests: 1, windowSeconds: 60 },
      });
      const { sink, subscriber } = await connect();
      const other = await connect();

      await hub.handleMessage(subscriber, '{"type":"request_sentiment"}');
      await hub.handleMessage(subscriber, '{"type":"request_sentiment"}');

      expect(sink.last()).toMatchObject({
        type: 'error',
        error: { code: 'RATE_LIMITED', message: 'Too many requests. Please try again later.' },
      });
      expect(read).toHaveBeenCalledTimes(1);

      await hub.handleMessage(other.subscriber, '{"type":"request_sentiment"}');
      expect(other.sink.last()?.type).toBe('sentiment');
      expect(read).toHaveBeenCalledTimes(2);
    });

    it('should not count pings against the request budget', async () => {
      const limiter = new SlidingWindowRateLimiter();
      hub = new BroadcastHub(feed(), silentLogger(), {
        requestLimit: { limiter, maxRequests: 1, windowSeconds: 60 },
      });
      const { sink, subscriber } = await connect();

      await hub.handleMessage(subscriber, '{"type":"ping"}');
      await hub.handleMessage(subscriber, '{"type":"request_sentiment"}');

      expect(sink.last()?.type).toBe('sentiment');
    });
  });

  describe('pushUpdate', () => {
    it('should send all tokens to unfiltered subscribers and only theirs to filtered ones', async () => {
      const all = new RecordingSink();
      const filtered = new RecordingSink();
      const none = new RecordingSink();
      await hub.register(all);
      const filteredSub = await hub.register(filtered);
      const noneSub = await hub.register(none);
      if (!filteredSub || !noneSub) throw new Error('expected subscribers');
      await hub.handleMessage(filteredSub, '{"type":"subscribe","tokens":["PEPE"]}');
      await hub.handleMessage(noneSub, '{"type":"unsubscribe"}');

      const result = await hub.pushUpdate();

      expect(result).toEqual({ delivered: 2, failed: 0 });
      expect(all.last()).toMatchObject({ type: 'sentiment_update', connectionCount: 3 });
      expect(dataKeys(all.last())).toEqual(['PEPE', 'DOGE']);
      expect(dataKeys(filtered.last())).toEqual(['PEPE']);
      expect(none.last()?.type).toBe('unsubscribed');
    });
  });

  describe('streaming', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should push on an interval until stopped', async () => {
      const refresh = vi.fn(async () => ({ PEPE: sentiment('PEPE') }));
      hub = new BroadcastHub(feed({ refresh }), silentLogger());

      hub.startStreaming(1000);
      await vi.advanceTimersByTimeAsync(0);
      await vi.advanceTimersByTimeAsync(2000);

      expect(refresh).toHaveBeenCalledTimes(3);

      hub.stopStreaming();
      await vi.advanceTimersByTimeAsync(5000);
      expect(refresh).toHaveBeenCalledTimes(3);
      expect(hub.isStreaming).toBe(false);
    });

    it('should back off after a failed update and keep going', async () => {
      const refresh = vi
        .fn<() => Promise<SentimentMap>>()
        .mockRejectedValueOnce(new Error('classifier down'))
        .mockResolvedValue({});
      hub = new BroadcastHub(feed({ refresh }), silentLogger());

      hub.startStreaming(1000);
      await vi.advanceTimersByTimeAsync(0);
      expect(refresh).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(STREAM_BACKOFF_MS - 1);
      expect(refresh).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1);
      expect(refresh).toHaveBeenCalledTimes(2);
      expect(hub.isStreaming).toBe(true);
    });
  });

  describe('stats', () => {
    it('should count connections and messages', async () => {
      const sink = new RecordingSink();
      const subscriber = await hub.register(sink);
      if (!subscriber) throw new Error('expected a subscriber');
      await hub.handleMessage(subscriber, '{"type":"ping"}');

      const stats = hub.stats();

      expect(stats.activeConnections).toBe(1);
      expect(stats.totalConnections).toBe(1);
      expect(stats.totalMessages).toBe(2);
      expect(stats.lastActivity).not.toBeNull();
    });
  });
});
