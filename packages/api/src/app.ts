/**
 * parkscan API Server
 *
 * Hono-based REST API around the classification pipeline. All dependencies
 * are passed in so tests can build an app with in-memory stores and a fake
 * runner.
 */

import { Hono } from 'hono';
import { secureHeaders } from 'hono/secure-headers';
import { HTTPException } from 'hono/http-exception';
import type { UrlScheme } from '../../../src/utils/config-schemas.js';
import { logger } from '../../../src/utils/logger.js';
import { createRequestLoggerMiddleware } from './middleware/request-logger.js';
import type { FixedWindowRateLimiter } from './middleware/rate-limit.js';
import type { ApiKeyStore, ClassificationStore } from './middleware/types.js';
import { createApiKeyRoutes } from './routes/api-keys.js';
import { createClassifyRoutes, type ClassificationRunner } from './routes/classify.js';
import { createHealthRoutes, probeCheck } from './routes/health.js';

const log = logger.server;

export const API_VERSION = '0.1.0';

export interface AppDependencies {
  runner: ClassificationRunner;
  apiKeys: ApiKeyStore;
  results: ClassificationStore;
  limiter: FixedWindowRateLimiter;
  defaultScheme: UrlScheme;
  resultTtlSeconds: number;
  masterKey: string | undefined;
  /** Include error messages of unexpected failures in responses */
  exposeErrors?: boolean;
}

const ERROR_CODES: Record<number, string> = {
  400: 'BAD_REQUEST',
  401: 'UNAUTHORIZED',
  403: 'FORBIDDEN',
  404: 'NOT_FOUND',
  429: 'RATE_LIMIT_EXCEEDED',
  503: 'SERVICE_UNAVAILABLE',
};

export function createApp(deps: AppDependencies): Hono {
  const app = new Hono();

  app.use('*', createRequestLoggerMiddleware());
  app.use(
    '*',
    secureHeaders({
      xContentTypeOptions: 'nosniff',
      xFrameOptions: 'DENY',
      referrerPolicy: 'no-referrer',
    })
  );

  app.route(
    '/health',
    createHealthRoutes({
      version: API_VERSION,
      checks: { storage: probeCheck(() => deps.results.ping()) },
    })
  );
  app.route('/api-keys', createApiKeyRoutes({ apiKeys: deps.apiKeys, masterKey: deps.masterKey }));
  app.route(
    '/',
    createClassifyRoutes({
      runner: deps.runner,
      apiKeys: deps.apiKeys,
      results: deps.results,
      limiter: deps.limiter,
      defaultScheme: deps.defaultScheme,
      resultTtlSeconds: deps.resultTtlSeconds,
    })
  );

  app.notFound((c) => {
    return c.json(
      {
        success: false,
        error: {
          code: 'NOT_FOUND',
          message: `Route ${c.req.method} ${c.req.path} not found`,
        },
      },
      404
    );
  });

  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      const status = err.status;
      return c.json(
        {
          success: false,
          error: {
            code: ERROR_CODES[status] ?? 'ERROR',
            message: err.message,
          },
        },
        status
      );
    }

    log.error('Unhandled error', { error: err, path: c.req.path });

    return c.json(
      {
        success: false,
        error: {
          code: 'INTERNAL_ERROR',
          message: deps.exposeErrors ? err.message : 'An internal error occurred',
        },
      },
      500
    );
  });

  return app;
}
