/**
 * API Key Management Routes (master key only)
 *
 * POST   /api-keys      issue a key; the plain key is returned once
 * GET    /api-keys      list key metadata
 * DELETE /api-keys/:id  revoke a key
 */

import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import { logger } from '../../../../src/utils/logger.js';
import { createMasterKeyMiddleware, generateApiKey } from '../middleware/auth.js';
import type { ApiKey, ApiKeyStore } from '../middleware/types.js';

const log = logger.create('ApiKeys');

const DAY_MS = 24 * 60 * 60 * 1000;

export interface ApiKeyRouteDependencies {
  apiKeys: ApiKeyStore;
  masterKey: string | undefined;
}

const createKeyValidator = zValidator(
  'json',
  z.object({
    name: z.string().trim().min(1).max(100),
    expiresInDays: z.number().int().min(1).max(3650).optional(),
    rateLimit: z.number().int().min(1).max(100000).optional(),
  }),
  (result, c) => {
    if (!result.success) {
      const message = result.error.issues
        .map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
        .join('; ');
      return c.json({ success: false, error: { code: 'BAD_REQUEST', message } }, 400);
    }
  }
);

function toPublicKey(key: ApiKey) {
  return {
    id: key.id,
    name: key.name,
    keyPrefix: key.keyPrefix,
    rateLimit: key.rateLimit,
    active: !key.revokedAt && !(key.expiresAt && key.expiresAt < new Date()),
    usageCount: key.usageCount,
    createdAt: key.createdAt.toISOString(),
    expiresAt: key.expiresAt?.toISOString() ?? null,
    revokedAt: key.revokedAt?.toISOString() ?? null,
    lastUsedAt: key.lastUsedAt?.toISOString() ?? null,
  };
}

export function createApiKeyRoutes(deps: ApiKeyRouteDependencies): Hono {
  const routes = new Hono();

  routes.use('*', createMasterKeyMiddleware(deps.masterKey));

  routes.post('/', createKeyValidator, async (c) => {
    const body = c.req.valid('json');
    const { key, keyHash, keyPrefix } = generateApiKey();

    const created = await deps.apiKeys.create({
      keyHash,
      keyPrefix,
      name: body.name,
      rateLimit: body.rateLimit ?? null,
      expiresAt: body.expiresInDays ? new Date(Date.now() + body.expiresInDays * DAY_MS) : null,
    });

    log.info('API key issued', { keyId: created.id, keyPrefix });

    return c.json({ success: true, data: { ...toPublicKey(created), key } }, 201);
  });

  routes.get('/', async (c) => {
    const keys = await deps.apiKeys.list();
    return c.json({ success: true, data: keys.map(toPublicKey) });
  });

  routes.delete('/:id', async (c) => {
    const id = c.req.param('id');
    const revoked = await deps.apiKeys.revoke(id);

    if (!revoked) {
      throw new HTTPException(404, { message: `API key ${id} not found` });
    }

    log.info('API key revoked', { keyId: id });
    return c.json({ success: true, data: toPublicKey(revoked) });
  });

  return routes;
}
