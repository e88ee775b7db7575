/**
 * Environment Variable Parser
 *
 * Type-safe environment variable parsing with validation.
 * Centralizes all env var access; components receive the parsed sections
 * through their constructors.
 */

import {
  logConfigSchema,
  rendererConfigSchema,
  modelConfigSchema,
  classifierConfigSchema,
  apiServerConfigSchema,
  storageConfigSchema,
  rateLimitConfigSchema,
  ConfigValidationError,
  type LogConfig,
  type RendererConfig,
  type ModelConfig,
  type ClassifierConfig,
  type ApiServerConfig,
  type StorageConfig,
  type RateLimitConfig,
  type ParkscanConfig,
} from './config-schemas.js';

export type Env = Record<string, string | undefined>;

// ============================================
// ENVIRONMENT VARIABLE MAPPING
// ============================================

function mapEnvToLogConfig(env: Env) {
  return {
    level: env.LOG_LEVEL,
    prettyPrint: env.LOG_PRETTY,
  };
}

function mapEnvToRendererConfig(env: Env) {
  return {
    timeoutMs: env.RENDER_TIMEOUT_MS,
    maxAttempts: env.RENDER_MAX_ATTEMPTS,
    retryDelayMs: env.RENDER_RETRY_DELAY_MS,
    defaultScheme: env.DEFAULT_URL_SCHEME,
    fullPage: env.SCREENSHOT_FULL_PAGE,
    screenshotType: env.SCREENSHOT_TYPE,
    viewportWidth: env.VIEWPORT_WIDTH,
    viewportHeight: env.VIEWPORT_HEIGHT,
    headless: env.BROWSER_HEADLESS,
  };
}

function mapEnvToModelConfig(env: Env) {
  return {
    apiKey: env.OPENAI_API_KEY || undefined,
    baseUrl: env.OPENAI_BASE_URL || undefined,
    model: env.OPENAI_MODEL,
    maxTokens: env.MODEL_MAX_TOKENS,
    timeoutMs: env.MODEL_TIMEOUT_MS,
  };
}

function mapEnvToClassifierConfig(env: Env) {
  return {
    fallbackPolicy: env.FALLBACK_POLICY,
    defaultLabel: env.DEFAULT_LABEL?.trim().toLowerCase(),
  };
}

function mapEnvToApiServerConfig(env: Env) {
  return {
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    masterKey: env.MASTER_API_KEY || undefined,
  };
}

function mapEnvToStorageConfig(env: Env) {
  return {
    resultTtlSeconds: env.RESULT_CACHE_TTL_SECONDS,
  };
}

function mapEnvToRateLimitConfig(env: Env) {
  return {
    maxRequests: env.RATE_LIMIT_MAX_REQUESTS,
    windowSeconds: env.RATE_LIMIT_WINDOW_SECONDS,
  };
}

// ============================================
// INDIVIDUAL CONFIG PARSERS
// ============================================

export function parseLogConfig(env: Env = process.env): LogConfig {
  const result = logConfigSchema.safeParse(mapEnvToLogConfig(env));
  if (!result.success) {
    throw new ConfigValidationError('logging', result.error);
  }
  return result.data;
}

export function parseRendererConfig(env: Env = process.env): RendererConfig {
  const result = rendererConfigSchema.safeParse(mapEnvToRendererConfig(env));
  if (!result.success) {
    throw new ConfigValidationError('renderer', result.error);
  }
  return result.data;
}

export function parseModelConfig(env: Env = process.env): ModelConfig {
  const result = modelConfigSchema.safeParse(mapEnvToModelConfig(env));
  if (!result.success) {
    throw new ConfigValidationError('model', result.error);
  }
  return result.data;
}

export function parseClassifierConfig(env: Env = process.env): ClassifierConfig {
  const result = classifierConfigSchema.safeParse(mapEnvToClassifierConfig(env));
  if (!result.success) {
    throw new ConfigValidationError('classifier', result.error);
  }
  return result.data;
}

export function parseApiServerConfig(env: Env = process.env): ApiServerConfig {
  const result = apiServerConfigSchema.safeParse(mapEnvToApiServerConfig(env));
  if (!result.success) {
    throw new ConfigValidationError('apiServer', result.error);
  }
  return result.data;
}

export function parseStorageConfig(env: Env = process.env): StorageConfig {
  const result = storageConfigSchema.safeParse(mapEnvToStorageConfig(env));
  if (!result.success) {
    throw new ConfigValidationError('storage', result.error);
  }
  return result.data;
}

export function parseRateLimitConfig(env: Env = process.env): RateLimitConfig {
  const result = rateLimitConfigSchema.safeParse(mapEnvToRateLimitConfig(env));
  if (!result.success) {
    throw new ConfigValidationError('rateLimit', result.error);
  }
  return result.data;
}

/**
 * Parse the sections the classification pipeline is built from.
 */
export function parseParkscanConfig(env: Env = process.env): ParkscanConfig {
  return {
    renderer: parseRendererConfig(env),
    model: parseModelConfig(env),
    classifier: parseClassifierConfig(env),
  };
}
