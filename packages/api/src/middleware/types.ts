/**
 * Common Types for the API service
 */

import type { ClassificationMode, ClassificationResult } from '../../../../src/types/index.js';

export interface ApiKey {
  id: string;
  keyHash: string;
  keyPrefix: string;
  name: string;
  /** Requests per rate-limit window; null uses the server default */
  rateLimit: number | null;
  revokedAt: Date | null;
  expiresAt: Date | null;
  lastUsedAt: Date | null;
  usageCount: number;
  createdAt: Date;
}

/**
 * A stored classification, keyed by normalized URL
 */
export interface ClassificationRecord {
  id: string;
  url: string;
  classification: ClassificationResult;
  mode: ClassificationMode;
  createdAt: Date;
}

export interface CreateApiKeyData {
  keyHash: string;
  keyPrefix: string;
  name: string;
  rateLimit: number | null;
  expiresAt: Date | null;
}

export interface CreateClassificationData {
  url: string;
  classification: ClassificationResult;
  mode: ClassificationMode;
}

/**
 * API key persistence
 */
export interface ApiKeyStore {
  findByHash(keyHash: string): Promise<ApiKey | null>;
  findById(id: string): Promise<ApiKey | null>;
  create(data: CreateApiKeyData): Promise<ApiKey>;
  list(): Promise<ApiKey[]>;
  /** Marks the key revoked; null when no key has this id */
  revoke(id: string): Promise<ApiKey | null>;
  recordUsage(id: string): Promise<void>;
}

/**
 * Classification result persistence
 */
export interface ClassificationStore {
  /** Most recent record for the URL, optionally skipping failure sentinels */
  findLatest(url: string, options?: { successfulOnly?: boolean }): Promise<ClassificationRecord | null>;
  save(data: CreateClassificationData): Promise<ClassificationRecord>;
  ping(): Promise<boolean>;
}
