/**
 * Request Logger Tests
 */

import { describe, it, expect } from 'vitest';
import { Hono } from 'hono';
import { createRequestLoggerMiddleware, redactQuery } from '../src/middleware/request-logger.js';

describe('redactQuery', () => {
  it('redacts secret parameters and keeps the rest', () => {
    expect(redactQuery({ url: 'example.com', api_key: 'psk_test', Token: 't' })).toEqual({
      url: 'example.com',
      api_key: '[REDACTED]',
      Token: '[REDACTED]',
    });
  });
});

describe('Request Logger Middleware', () => {
  it('adds a request id header', async () => {
    const app = new Hono();
    app.use('*', createRequestLoggerMiddleware());
    app.get('/ping', (c) => c.json({ ok: true }));

    const res = await app.request('/ping');

    expect(res.headers.get('X-Request-Id')).toMatch(/^req_[a-z0-9]+_[a-f0-9]{8}$/);
  });

  it('skips configured paths', async () => {
    const app = new Hono();
    app.use('*', createRequestLoggerMiddleware({ skipPaths: ['/ping'] }));
    app.get('/ping', (c) => c.json({ ok: true }));

    const res = await app.request('/ping');

    expect(res.headers.get('X-Request-Id')).toBeNull();
  });
});
