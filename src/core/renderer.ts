/**
 * Renderer - turns a URL into a screenshot, or null
 *
 * Each attempt runs in a fresh browser session. Recoverable failures
 * (timeouts, DNS and connection errors, navigation errors, crashes) are
 * retried after a fixed delay; running out of attempts is an expected
 * outcome and yields null rather than an exception.
 */

import type { CaptureOptions, ImagePayload } from '../types/index.js';
import type { RendererConfig } from '../utils/config-schemas.js';
import { logger } from '../utils/logger.js';
import { retryOutcome } from '../utils/retry.js';
import { normalizeUrl } from '../utils/url-normalizer.js';
import type { RenderEngine } from './browser-session.js';

const log = logger.renderer;

export type RetryPolicy = Pick<RendererConfig, 'maxAttempts' | 'retryDelayMs' | 'defaultScheme'>;

export interface CaptureResult {
  image: ImagePayload | null;
  attempts: number;
  /** Reason of the last failed attempt, when no image was produced */
  failure?: string;
}

export class Renderer {
  private engine: RenderEngine;
  private policy: RetryPolicy;

  constructor(engine: RenderEngine, policy: RetryPolicy) {
    this.engine = engine;
    this.policy = policy;
  }

  /**
   * Screenshot of `url`, or null once every attempt has failed
   */
  async capture(url: string, options: CaptureOptions = {}): Promise<ImagePayload | null> {
    const { image } = await this.captureWithDetails(url, options);
    return image;
  }

  async captureWithDetails(url: string, options: CaptureOptions = {}): Promise<CaptureResult> {
    const { signal } = options;
    const startTime = Date.now();

    const { outcome, attempts } = await retryOutcome(
      (attempt) => {
        const target = normalizeUrl(url, this.policy.defaultScheme);
        log.debug('Render attempt', { url: target, attempt });
        return this.engine.render(target, { signal });
      },
      {
        maxAttempts: this.policy.maxAttempts,
        initialDelayMs: this.policy.retryDelayMs,
        backoffMultiplier: 1,
        signal,
      }
    );

    if (outcome.kind === 'success') {
      log.timed('Render succeeded', startTime, { url, attempts });
      return { image: outcome.value, attempts };
    }

    log.warn('Render gave up', {
      url,
      attempts,
      fatal: outcome.kind === 'fatal',
      reason: outcome.reason,
    });
    return { image: null, attempts, failure: outcome.reason };
  }
}
