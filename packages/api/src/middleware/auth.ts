/**
 * API Key Authentication Middleware
 *
 * Clients pass their key as the `api_key` query parameter or as a Bearer
 * token. Keys are hashed with SHA-256 before lookup; the plain key is only
 * shown once, when it is issued.
 * Format: psk_<32 hex chars>
 *
 * Key management routes are guarded by the master key (X-Master-Key header).
 */

import { createMiddleware } from 'hono/factory';
import { HTTPException } from 'hono/http-exception';
import { createHash, randomBytes, timingSafeEqual } from 'crypto';
import { logger } from '../../../../src/utils/logger.js';
import type { ApiKey, ApiKeyStore } from './types.js';

const log = logger.create('Auth');

declare module 'hono' {
  interface ContextVariableMap {
    apiKey: ApiKey;
  }
}

const KEY_PREFIX = 'psk_';
const KEY_PATTERN = /^psk_[a-f0-9]{32}$/;

/**
 * Hash an API key using SHA-256
 */
export function hashApiKey(key: string): string {
  return createHash('sha256').update(key).digest('hex');
}

/**
 * Generate a new API key with cryptographically secure randomness
 */
export function generateApiKey(): { key: string; keyHash: string; keyPrefix: string } {
  const key = `${KEY_PREFIX}${randomBytes(16).toString('hex')}`;
  return {
    key,
    keyHash: hashApiKey(key),
    keyPrefix: key.substring(0, 8),
  };
}

export function isValidApiKeyFormat(key: string): boolean {
  return KEY_PATTERN.test(key);
}

/**
 * Key from `?api_key=` or `Authorization: Bearer`, query parameter first
 */
export function extractApiKey(query: string | undefined, authHeader: string | undefined): string | null {
  if (query) {
    return query.trim();
  }
  if (authHeader?.startsWith('Bearer ')) {
    return authHeader.slice(7).trim();
  }
  return null;
}

/**
 * Same message for unknown, revoked and expired keys, so callers cannot tell
 * which keys exist
 */
const AUTH_FAILED_MESSAGE = 'Invalid or inactive API key';

export function createAuthMiddleware(store: ApiKeyStore) {
  return createMiddleware(async (c, next) => {
    const key = extractApiKey(c.req.query('api_key'), c.req.header('Authorization'));

    if (!key) {
      throw new HTTPException(401, {
        message: 'API key required. Pass api_key as a query parameter or a Bearer token.',
      });
    }

    if (!isValidApiKeyFormat(key)) {
      throw new HTTPException(401, { message: 'Invalid API key format' });
    }

    const record = await store.findByHash(hashApiKey(key));

    if (!record || record.revokedAt || (record.expiresAt && record.expiresAt < new Date())) {
      throw new HTTPException(401, { message: AUTH_FAILED_MESSAGE });
    }

    // Usage tracking must not fail the request
    store.recordUsage(record.id).catch((error: unknown) => {
      log.warn('Failed to record API key usage', {
        keyId: record.id,
        error: error instanceof Error ? error.message : String(error),
      });
    });

    c.set('apiKey', record);
    await next();
  });
}

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(hashApiKey(a), 'hex');
  const right = Buffer.from(hashApiKey(b), 'hex');
  return timingSafeEqual(left, right);
}

/**
 * Guards key management. With no master key configured, key management is
 * switched off entirely.
 */
export function createMasterKeyMiddleware(masterKey: string | undefined) {
  return createMiddleware(async (c, next) => {
    if (!masterKey) {
      throw new HTTPException(403, {
        message: 'API key management is disabled: MASTER_API_KEY is not set',
      });
    }

    const provided = c.req.header('X-Master-Key');
    if (!provided) {
      throw new HTTPException(401, { message: 'X-Master-Key header required' });
    }

    if (!safeEqual(provided, masterKey)) {
      throw new HTTPException(403, { message: 'Invalid master key' });
    }

    await next();
  });
}
