/**
 * Request Logger Middleware
 *
 * One structured log line per request with a request ID (also returned as
 * X-Request-Id), timing, status and the calling key's prefix. Secret query
 * parameters are redacted before logging.
 */

import { createMiddleware } from 'hono/factory';
import { randomUUID } from 'crypto';
import { logger } from '../../../../src/utils/logger.js';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
  }
}

const log = logger.create('Http');

const SENSITIVE_PARAMS = ['api_key', 'apikey', 'token', 'secret', 'password', 'key'];

export interface RequestLoggerConfig {
  skipPaths?: string[];
}

export function redactQuery(query: Record<string, string>): Record<string, string> {
  const redacted: Record<string, string> = {};
  for (const [key, value] of Object.entries(query)) {
    redacted[key] = SENSITIVE_PARAMS.includes(key.toLowerCase()) ? '[REDACTED]' : value;
  }
  return redacted;
}

function generateRequestId(): string {
  return `req_${Date.now().toString(36)}_${randomUUID().slice(0, 8)}`;
}

export function createRequestLoggerMiddleware(config: RequestLoggerConfig = {}) {
  const { skipPaths = ['/health', '/health/ready', '/health/live'] } = config;

  return createMiddleware(async (c, next) => {
    const path = c.req.path;
    if (skipPaths.includes(path)) {
      return next();
    }

    const requestId = generateRequestId();
    const startTime = Date.now();
    c.set('requestId', requestId);
    c.header('X-Request-Id', requestId);

    try {
      await next();
    } finally {
      const status = c.res.status;
      const apiKey = c.get('apiKey');
      const entry = {
        requestId,
        method: c.req.method,
        path,
        query: redactQuery(c.req.query()),
        status,
        keyPrefix: apiKey?.keyPrefix,
        durationMs: Date.now() - startTime,
      };

      if (status >= 500) {
        log.error('Request failed', entry);
      } else if (status >= 400) {
        log.warn('Request rejected', entry);
      } else {
        log.info('Request completed', entry);
      }
    }
  });
}
