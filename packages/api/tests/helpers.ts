/**
 * Shared fixtures for API tests: an app wired to in-memory stores and a fake
 * classification runner.
 */

import { vi } from 'vitest';
import type { Hono } from 'hono';
import { z } from 'zod';
import type {
  CaptureOptions,
  ClassificationMode,
  ClassificationReport,
  ClassificationResult,
} from '../../../src/types/index.js';
import { createApp } from '../src/app.js';
import { generateApiKey } from '../src/middleware/auth.js';
import { FixedWindowRateLimiter } from '../src/middleware/rate-limit.js';
import type { ApiKey, ApiKeyStore } from '../src/middleware/types.js';
import { InMemoryApiKeyStore, InMemoryClassificationStore } from '../src/services/memory-store.js';

export const MASTER_KEY = 'test-master-secret';

export interface Verdict {
  result: ClassificationResult;
  mode: ClassificationMode;
}

export interface TestAppOptions {
  verdict?: () => Verdict;
  resultTtlSeconds?: number;
  maxRequests?: number;
  masterKey?: string | undefined;
}

export function createTestApp(options: TestAppOptions = {}) {
  const verdict: () => Verdict = options.verdict ?? (() => ({ result: 'live website', mode: 'visual' }));
  const run = vi.fn(async (url: string, _options?: CaptureOptions): Promise<ClassificationReport> => {
    const { result, mode } = verdict();
    return { url, normalizedUrl: url, result, mode, renderAttempts: 1, durationMs: 5 };
  });

  const apiKeys = new InMemoryApiKeyStore();
  const results = new InMemoryClassificationStore();
  const limiter = new FixedWindowRateLimiter({
    maxRequests: options.maxRequests ?? 60,
    windowSeconds: 60,
  });

  const app: Hono = createApp({
    runner: { run },
    apiKeys,
    results,
    limiter,
    defaultScheme: 'http',
    resultTtlSeconds: options.resultTtlSeconds ?? 86400,
    masterKey: 'masterKey' in options ? options.masterKey : MASTER_KEY,
  });

  return { app, run, apiKeys, results, limiter };
}

/**
 * Store a fresh key and return it in plain text alongside its record
 */
export async function issueKey(
  store: ApiKeyStore,
  overrides: { rateLimit?: number | null; expiresAt?: Date | null } = {}
): Promise<{ key: string; record: ApiKey }> {
  const { key, keyHash, keyPrefix } = generateApiKey();
  const record = await store.create({
    keyHash,
    keyPrefix,
    name: 'test key',
    rateLimit: overrides.rateLimit ?? null,
    expiresAt: overrides.expiresAt ?? null,
  });
  return { key, record };
}

export const issuedKeySchema = z.object({
  success: z.literal(true),
  data: z.object({ id: z.string(), key: z.string(), keyPrefix: z.string() }),
});

export function errorBody(code: string, message: string) {
  return { success: false, error: { code, message } };
}
