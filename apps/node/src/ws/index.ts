/**
 * WebSocket Handler
 * Live sentiment subscriptions
 *
 * - /ws/sentiment: handshake, client commands, periodic sentiment_update pushes
 * - /ws/stats: hub statistics
 */

import type { FastifyInstance } from 'fastify';
import type { RawData, WebSocket } from 'ws';
import { errorMessage } from '@tokenpulse/core';
import type { BroadcastHub, SubscriberSink } from './hub.js';

function decode(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

/**
 * Adapt a ws socket to the hub's sink. Sends to a socket that is no longer
 * open reject, which makes the hub drop the subscriber.
 */
export function socketSink(socket: WebSocket): SubscriberSink {
  return {
    send: (data) =>
      new Promise<void>((resolve, reject) => {
        if (socket.readyState !== socket.OPEN) {
          reject(new Error('Socket is not open'));
          return;
        }
        socket.send(data, (error) => (error ? reject(error) : resolve()));
      }),
    close: () => socket.close(1001, 'Server shutting down'),
  };
}

export async function registerWebSocket(fastify: FastifyInstance, hub: BroadcastHub): Promise<void> {
  fastify.get('/ws/sentiment', { websocket: true }, (connection) => {
    const socket = connection.socket;
    const ready = hub.register(socketSink(socket));

    // Commands from one client are handled in arrival order
    let queue: Promise<void> = ready.then(() => undefined);

    socket.on('message', (data: RawData) => {
      const raw = decode(data);
      queue = queue
        .then(async () => {
          const subscriber = await ready;
          if (subscriber) await hub.handleMessage(subscriber, raw);
        })
        .catch((error: unknown) => {
          fastify.log.error({ error: errorMessage(error) }, 'Failed to handle WebSocket message');
        });
    });

    socket.on('error', (error) => {
      fastify.log.error({ error: error.message }, 'WebSocket error');
    });

    socket.on('close', (code) => {
      ready
        .then((subscriber) => {
          if (subscriber) hub.unsubscribe(subscriber);
          fastify.log.debug({ subscriberId: subscriber?.id, code }, 'WebSocket closed');
        })
        .catch((error: unknown) => {
          fastify.log.error({ error: errorMessage(error) }, 'Failed to release WebSocket subscriber');
        });
    });
  });

  /**
   * GET /ws/stats
   */
  fastify.get('/ws/stats', async () => {
    return { success: true, data: hub.stats() };
  });
}
