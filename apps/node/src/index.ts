/**
 * TokenPulse Node
 *
 * Process entry: configuration, engine, HTTP/WebSocket server, streaming
 * and graceful shutdown.
 */

import { errorMessage } from '@tokenpulse/core';
import { ConfigError, loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { buildServer } from './server.js';
import { createEngine } from './services/signals/index.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger('tokenpulse', { level: config.LOG_LEVEL });

  const engine = createEngine(config, logger);
  const server = await buildServer(engine, {
    logLevel: config.LOG_LEVEL,
    rateLimit: {
      windowMs: config.RATE_LIMIT_WINDOW_MS,
      maxRequests: config.RATE_LIMIT_MAX_REQUESTS,
    },
  });

  await server.listen({ port: config.PORT, host: config.HOST });
  engine.start(config.STREAM_INTERVAL_MS);
  logger.info({ port: config.PORT, tokens: engine.trackedTokens() }, 'TokenPulse started');

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');

    server
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ error: errorMessage(error) }, 'Shutdown failed');
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(error.message);
  } else {
    console.error('Failed to start:', errorMessage(error));
  }
  process.exit(1);
});
