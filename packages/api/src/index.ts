/**
 * parkscan API Server Entry Point
 *
 * Starts the Hono server using the Node.js HTTP adapter.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createClassificationPipeline } from '../../../src/core/pipeline.js';
import {
  parseApiServerConfig,
  parseLogConfig,
  parseParkscanConfig,
  parseRateLimitConfig,
  parseStorageConfig,
} from '../../../src/utils/env-parser.js';
import { configureLogger, logger, logServerShutdown, logServerStart } from '../../../src/utils/logger.js';
import { TIMEOUTS } from '../../../src/utils/timeouts.js';
import { API_VERSION, createApp } from './app.js';
import { FixedWindowRateLimiter } from './middleware/rate-limit.js';
import { InMemoryApiKeyStore, InMemoryClassificationStore } from './services/memory-store.js';

const log = logger.server;

process.on('unhandledRejection', (reason) => {
  log.error('Unhandled rejection', { error: reason });
});

function main(): void {
  configureLogger(parseLogConfig());

  const serverConfig = parseApiServerConfig();
  const storageConfig = parseStorageConfig();
  const rateLimitConfig = parseRateLimitConfig();
  const pipelineConfig = parseParkscanConfig();

  const apiKeys = new InMemoryApiKeyStore();
  const results = new InMemoryClassificationStore();
  const limiter = new FixedWindowRateLimiter(rateLimitConfig);
  const pipeline = createClassificationPipeline(pipelineConfig);

  if (!serverConfig.masterKey) {
    log.warn('MASTER_API_KEY not set, API key management is disabled');
  }

  const app = createApp({
    runner: pipeline,
    apiKeys,
    results,
    limiter,
    defaultScheme: pipelineConfig.renderer.defaultScheme,
    resultTtlSeconds: storageConfig.resultTtlSeconds,
    masterKey: serverConfig.masterKey,
    exposeErrors: serverConfig.nodeEnv === 'development',
  });

  logServerStart(API_VERSION, {
    port: serverConfig.port,
    environment: serverConfig.nodeEnv,
    storage: 'memory',
    fallbackPolicy: pipelineConfig.classifier.fallbackPolicy,
  });

  const server = serve({ fetch: app.fetch, port: serverConfig.port, hostname: '0.0.0.0' }, (info) => {
    log.info('Server listening', { port: info.port });
  });

  const pruneTimer = setInterval(() => limiter.prune(), rateLimitConfig.windowSeconds * 1000);
  pruneTimer.unref();

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logServerShutdown(signal);
    clearInterval(pruneTimer);

    const forceExit = setTimeout(() => {
      log.error('Shutdown timed out, exiting');
      process.exit(1);
    }, TIMEOUTS.SHUTDOWN);
    forceExit.unref();

    server.close((error) => {
      if (error) {
        log.error('Error while closing server', { error });
        process.exitCode = 1;
      }
    });
  };

  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));
}

try {
  main();
} catch (error) {
  log.error('Failed to start server', { error });
  process.exitCode = 1;
}
