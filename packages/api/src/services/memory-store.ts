/**
 * In-memory stores
 *
 * Used by the server and the tests. Contents are lost on restart.
 */

import { randomUUID } from 'crypto';
import { CLASSIFICATION_FAILURE } from '../../../../src/types/index.js';
import type {
  ApiKey,
  ApiKeyStore,
  ClassificationRecord,
  ClassificationStore,
  CreateApiKeyData,
  CreateClassificationData,
} from '../middleware/types.js';

export function generateId(prefix: string): string {
  return `${prefix}_${Date.now().toString(36)}_${randomUUID().slice(0, 8)}`;
}

export class InMemoryApiKeyStore implements ApiKeyStore {
  private keys = new Map<string, ApiKey>();

  constructor(initial: ApiKey[] = []) {
    for (const key of initial) {
      this.keys.set(key.id, key);
    }
  }

  async findByHash(keyHash: string): Promise<ApiKey | null> {
    for (const key of this.keys.values()) {
      if (key.keyHash === keyHash) {
        return key;
      }
    }
    return null;
  }

  async findById(id: string): Promise<ApiKey | null> {
    return this.keys.get(id) ?? null;
  }

  async create(data: CreateApiKeyData): Promise<ApiKey> {
    const apiKey: ApiKey = {
      id: generateId('key'),
      keyHash: data.keyHash,
      keyPrefix: data.keyPrefix,
      name: data.name,
      rateLimit: data.rateLimit,
      revokedAt: null,
      expiresAt: data.expiresAt,
      lastUsedAt: null,
      usageCount: 0,
      createdAt: new Date(),
    };
    this.keys.set(apiKey.id, apiKey);
    return apiKey;
  }

  async list(): Promise<ApiKey[]> {
    return [...this.keys.values()].sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  async revoke(id: string): Promise<ApiKey | null> {
    const key = this.keys.get(id);
    if (!key) {
      return null;
    }
    if (!key.revokedAt) {
      key.revokedAt = new Date();
    }
    return key;
  }

  async recordUsage(id: string): Promise<void> {
    const key = this.keys.get(id);
    if (key) {
      key.lastUsedAt = new Date();
      key.usageCount++;
    }
  }
}

export class InMemoryClassificationStore implements ClassificationStore {
  private records: ClassificationRecord[] = [];

  async findLatest(
    url: string,
    options: { successfulOnly?: boolean } = {}
  ): Promise<ClassificationRecord | null> {
    for (let i = this.records.length - 1; i >= 0; i--) {
      const record = this.records[i];
      if (record.url !== url) continue;
      if (options.successfulOnly && record.classification === CLASSIFICATION_FAILURE) continue;
      return record;
    }
    return null;
  }

  async save(data: CreateClassificationData): Promise<ClassificationRecord> {
    const record: ClassificationRecord = {
      id: generateId('cls'),
      url: data.url,
      classification: data.classification,
      mode: data.mode,
      createdAt: new Date(),
    };
    this.records.push(record);
    return record;
  }

  async ping(): Promise<boolean> {
    return true;
  }
}
