/**
 * Configuration Schemas
 *
 * Zod schemas for type-safe runtime configuration validation.
 * All environment variable parsing goes through these schemas for consistent
 * validation and clear error messages.
 */

import { z } from 'zod';
import { CANONICAL_LABELS } from '../types/index.js';
import { TIMEOUTS, RENDER_RETRY } from './timeouts.js';

// ============================================
// HELPER SCHEMAS
// ============================================

/**
 * Schema for parsing a string as a boolean.
 * Recognizes 'true', '1', 'yes' as true; everything else as false.
 */
export const booleanStringSchema = z
  .string()
  .optional()
  .transform((val) => {
    if (!val) return false;
    return ['true', '1', 'yes'].includes(val.toLowerCase());
  });

/**
 * Like booleanStringSchema, but an unset value yields the given default.
 */
export function booleanStringWithDefault(defaultVal: boolean) {
  return z
    .string()
    .optional()
    .transform((val) => {
      if (val === undefined || val === '') return defaultVal;
      return ['true', '1', 'yes'].includes(val.toLowerCase());
    });
}

/**
 * Schema for parsing a string as an integer with bounds.
 */
export function integerStringSchema(options: { min?: number; max?: number; default: number }) {
  const { min, max } = options;
  let schema = z.coerce.number().int();

  if (min !== undefined) schema = schema.min(min);
  if (max !== undefined) schema = schema.max(max);

  return schema.default(options.default);
}

// ============================================
// LOG CONFIGURATION
// ============================================

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const logConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  prettyPrint: booleanStringSchema,
});

export type LogConfig = z.infer<typeof logConfigSchema>;

// ============================================
// RENDERER CONFIGURATION
// ============================================

export const urlSchemeSchema = z.enum(['http', 'https']);
export type UrlScheme = z.infer<typeof urlSchemeSchema>;

export const rendererConfigSchema = z.object({
  timeoutMs: integerStringSchema({ min: 1000, max: 300000, default: TIMEOUTS.RENDER }),
  maxAttempts: integerStringSchema({ min: 1, max: 10, default: RENDER_RETRY.MAX_ATTEMPTS }),
  retryDelayMs: integerStringSchema({ min: 0, max: 60000, default: RENDER_RETRY.DELAY_MS }),
  defaultScheme: urlSchemeSchema.default('http'),
  fullPage: booleanStringWithDefault(true),
  screenshotType: z.enum(['png', 'jpeg']).default('png'),
  viewportWidth: integerStringSchema({ min: 320, max: 3840, default: 1280 }),
  viewportHeight: integerStringSchema({ min: 240, max: 2160, default: 800 }),
  headless: booleanStringWithDefault(true),
});

export type RendererConfig = z.infer<typeof rendererConfigSchema>;

// ============================================
// MODEL CONFIGURATION
// ============================================

export const modelConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
  model: z.string().min(1).default('gpt-4o'),
  maxTokens: integerStringSchema({ min: 1, max: 4096, default: 50 }),
  timeoutMs: integerStringSchema({ min: 1000, max: 600000, default: TIMEOUTS.MODEL_REQUEST }),
});

export type ModelConfig = z.infer<typeof modelConfigSchema>;

// ============================================
// CLASSIFIER CONFIGURATION
// ============================================

export const fallbackPolicySchema = z.enum(['text-only', 'fail']);

export const classifierConfigSchema = z.object({
  fallbackPolicy: fallbackPolicySchema.default('text-only'),
  defaultLabel: z.enum(CANONICAL_LABELS).default('nonactive domain'),
});

export type ClassifierConfig = z.infer<typeof classifierConfigSchema>;

// ============================================
// API SERVER CONFIGURATION
// ============================================

export const apiServerConfigSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  port: integerStringSchema({ min: 1, max: 65535, default: 8000 }),
  masterKey: z.string().min(16, 'MASTER_API_KEY must be at least 16 characters').optional(),
});

export type ApiServerConfig = z.infer<typeof apiServerConfigSchema>;

export const storageConfigSchema = z.object({
  resultTtlSeconds: integerStringSchema({ min: 0, max: 31536000, default: 86400 }),
});

export type StorageConfig = z.infer<typeof storageConfigSchema>;

export const rateLimitConfigSchema = z.object({
  maxRequests: integerStringSchema({ min: 1, max: 100000, default: 60 }),
  windowSeconds: integerStringSchema({ min: 1, max: 86400, default: 60 }),
});

export type RateLimitConfig = z.infer<typeof rateLimitConfigSchema>;

// ============================================
// COMPLETE CONFIGURATION
// ============================================

/**
 * Everything the classification pipeline needs
 */
export const parkscanConfigSchema = z.object({
  renderer: rendererConfigSchema,
  model: modelConfigSchema,
  classifier: classifierConfigSchema,
});

export type ParkscanConfig = z.infer<typeof parkscanConfigSchema>;

// ============================================
// ERROR FORMATTING
// ============================================

/**
 * Format Zod validation errors into readable messages.
 */
export function formatConfigErrors(error: z.ZodError<unknown>): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return `  - ${path}: ${issue.message}`;
    })
    .join('\n');
}

export class ConfigValidationError extends Error {
  constructor(
    public readonly section: string,
    public readonly zodError: z.ZodError
  ) {
    const formatted = formatConfigErrors(zodError);
    super(
      `Configuration validation failed for ${section}:\n${formatted}\n\n` +
      `Please check your environment variables or configuration file.`
    );
    this.name = 'ConfigValidationError';
  }
}
