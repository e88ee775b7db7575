/**
 * Classification Routes
 *
 * GET /classify-url?url=…     classify (or serve a fresh cached result)
 * GET /classifications?url=…  latest stored result for a URL
 *
 * Both require an API key and count against its rate limit. URLs are
 * normalized before cache lookup and storage, so `example.com` and
 * `http://example.com` share one entry.
 */

import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { ClassificationReport, CaptureOptions } from '../../../../src/types/index.js';
import type { UrlScheme } from '../../../../src/utils/config-schemas.js';
import { logger } from '../../../../src/utils/logger.js';
import { isClassifiableUrl, normalizeUrl } from '../../../../src/utils/url-normalizer.js';
import { createAuthMiddleware } from '../middleware/auth.js';
import { createRateLimitMiddleware, type FixedWindowRateLimiter } from '../middleware/rate-limit.js';
import type { ApiKeyStore, ClassificationRecord, ClassificationStore } from '../middleware/types.js';

/**
 * What the routes need from the classification pipeline
 */
export interface ClassificationRunner {
  run(url: string, options?: CaptureOptions): Promise<ClassificationReport>;
}

export interface ClassifyRouteDependencies {
  runner: ClassificationRunner;
  apiKeys: ApiKeyStore;
  results: ClassificationStore;
  limiter: FixedWindowRateLimiter;
  defaultScheme: UrlScheme;
  /** Max age of a reusable stored result; 0 disables the cache */
  resultTtlSeconds: number;
}

const log = logger.create('Classify');

function requireUrl(raw: string | undefined, scheme: UrlScheme): string {
  if (!raw || !raw.trim()) {
    throw new HTTPException(400, { message: 'url query parameter is required' });
  }
  if (!isClassifiableUrl(raw, scheme)) {
    throw new HTTPException(400, { message: 'Invalid URL. Expected a domain or an http(s) URL.' });
  }
  return normalizeUrl(raw, scheme);
}

function isFresh(record: ClassificationRecord, ttlSeconds: number): boolean {
  return Date.now() - record.createdAt.getTime() <= ttlSeconds * 1000;
}

export function createClassifyRoutes(deps: ClassifyRouteDependencies): Hono {
  const routes = new Hono();

  const auth = createAuthMiddleware(deps.apiKeys);
  const rateLimit = createRateLimitMiddleware(deps.limiter);

  routes.get('/classify-url', auth, rateLimit, async (c) => {
    const requested = c.req.query('url') ?? '';
    const url = requireUrl(requested, deps.defaultScheme);

    if (deps.resultTtlSeconds > 0) {
      const cached = await deps.results.findLatest(url, { successfulOnly: true });
      if (cached && isFresh(cached, deps.resultTtlSeconds)) {
        return c.json({
          url: requested,
          normalizedUrl: url,
          classification: cached.classification,
          mode: cached.mode,
          cached: true,
          classifiedAt: cached.createdAt.toISOString(),
        });
      }
    }

    const controller = new AbortController();
    const clientSignal = c.req.raw.signal;
    if (clientSignal.aborted) {
      controller.abort();
    } else {
      clientSignal.addEventListener('abort', () => controller.abort(), { once: true });
    }

    const report = await deps.runner.run(url, { signal: controller.signal });
    if (controller.signal.aborted) {
      log.info('Request cancelled, result not stored', { url, result: report.result });
      throw new HTTPException(503, { message: 'Request cancelled before classification finished' });
    }

    const record = await deps.results.save({
      url,
      classification: report.result,
      mode: report.mode,
    });

    return c.json({
      url: requested,
      normalizedUrl: url,
      classification: record.classification,
      mode: record.mode,
      cached: false,
      classifiedAt: record.createdAt.toISOString(),
    });
  });

  routes.get('/classifications', auth, rateLimit, async (c) => {
    const url = requireUrl(c.req.query('url'), deps.defaultScheme);
    const record = await deps.results.findLatest(url);

    if (!record) {
      throw new HTTPException(404, { message: `No classification stored for ${url}` });
    }

    return c.json({
      url: record.url,
      classification: record.classification,
      mode: record.mode,
      classifiedAt: record.createdAt.toISOString(),
    });
  });

  return routes;
}
