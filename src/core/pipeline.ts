/**
 * Classification Pipeline
 *
 * START → RENDERING → RENDERED → CLASSIFYING_VISUAL → DONE
 *                   ↘ EXHAUSTED → CLASSIFYING_TEXT → DONE   (fallback 'text-only')
 *                               ↘ FAILED → DONE             (fallback 'fail' or cancelled)
 *
 * Every path ends in DONE with a ClassificationResult; run() and classify()
 * never reject.
 */

import {
  CLASSIFICATION_FAILURE,
  type CaptureOptions,
  type ClassificationMode,
  type ClassificationReport,
  type ClassificationResult,
  type FallbackPolicy,
  type PipelineState,
} from '../types/index.js';
import type { ParkscanConfig, UrlScheme } from '../utils/config-schemas.js';
import { logger } from '../utils/logger.js';
import { normalizeUrl } from '../utils/url-normalizer.js';
import { PlaywrightRenderEngine, type RenderEngine } from './browser-session.js';
import { Classifier } from './classifier.js';
import { encodeImage, releaseImage } from './encoder.js';
import { decideFallback, type FallbackDecision } from './fallback-policy.js';
import { OpenAIModelClient, type ModelClient } from './model-client.js';
import { Renderer } from './renderer.js';

const log = logger.pipeline;

export interface PipelineDependencies {
  renderer: Renderer;
  classifier: Classifier;
  fallbackPolicy: FallbackPolicy;
  defaultScheme: UrlScheme;
}

export class ClassificationPipeline {
  private renderer: Renderer;
  private classifier: Classifier;
  private fallbackPolicy: FallbackPolicy;
  private defaultScheme: UrlScheme;

  constructor(deps: PipelineDependencies) {
    this.renderer = deps.renderer;
    this.classifier = deps.classifier;
    this.fallbackPolicy = deps.fallbackPolicy;
    this.defaultScheme = deps.defaultScheme;
  }

  getFallbackPolicy(): FallbackPolicy {
    return this.fallbackPolicy;
  }

  async classify(url: string, options: CaptureOptions = {}): Promise<ClassificationResult> {
    const report = await this.run(url, options);
    return report.result;
  }

  /**
   * Classify URLs one after another. Stops once the signal aborts; the report
   * of the run that was interrupted is not passed on.
   */
  async runAll(
    urls: readonly string[],
    options: CaptureOptions = {},
    onReport: (report: ClassificationReport) => void = () => {}
  ): Promise<ClassificationReport[]> {
    const reports: ClassificationReport[] = [];
    for (const url of urls) {
      const report = await this.run(url, options);
      if (options.signal?.aborted) {
        log.warn('Interrupted, remaining URLs skipped', { skipped: urls.length - reports.length });
        break;
      }
      reports.push(report);
      onReport(report);
    }
    return reports;
  }

  async run(url: string, options: CaptureOptions = {}): Promise<ClassificationReport> {
    const startTime = Date.now();
    const normalizedUrl = normalizeUrl(url, this.defaultScheme);
    const runLog = log.child({ url: normalizedUrl });
    const transition = (state: PipelineState) => runLog.debug('Pipeline state', { state });

    let result: ClassificationResult = CLASSIFICATION_FAILURE;
    let mode: ClassificationMode = 'none';
    let renderAttempts = 0;
    let rawResponse: string | undefined;

    transition('START');
    try {
      transition('RENDERING');
      const capture = await this.renderer.captureWithDetails(normalizedUrl, options);
      renderAttempts = capture.attempts;

      let imageDataUrl: string | null = null;
      if (capture.image) {
        transition('RENDERED');
        try {
          imageDataUrl = encodeImage(capture.image);
        } finally {
          releaseImage(capture.image);
        }
      } else {
        transition('EXHAUSTED');
      }

      let decision: FallbackDecision;
      if (options.signal?.aborted) {
        runLog.info('Cancelled, skipping the model call');
        decision = { action: 'fail' };
      } else {
        decision = decideFallback(imageDataUrl, this.fallbackPolicy);
      }

      switch (decision.action) {
        case 'classify-visual': {
          transition('CLASSIFYING_VISUAL');
          mode = 'visual';
          const verdict = await this.classifier.classifyWithDetails(
            normalizedUrl,
            decision.imageDataUrl,
            options
          );
          result = verdict.result;
          rawResponse = verdict.rawResponse;
          break;
        }
        case 'classify-text': {
          transition('CLASSIFYING_TEXT');
          mode = 'text';
          const verdict = await this.classifier.classifyWithDetails(normalizedUrl, null, options);
          result = verdict.result;
          rawResponse = verdict.rawResponse;
          break;
        }
        case 'fail':
          transition('FAILED');
          result = CLASSIFICATION_FAILURE;
          break;
      }
    } catch (error) {
      runLog.error('Pipeline failed unexpectedly', { error });
      result = CLASSIFICATION_FAILURE;
    }

    transition('DONE');
    const durationMs = Date.now() - startTime;
    runLog.info('Classification finished', { result, mode, renderAttempts, durationMs });

    return { url, normalizedUrl, result, mode, renderAttempts, rawResponse, durationMs };
  }
}

export interface PipelineOverrides {
  engine?: RenderEngine;
  modelClient?: ModelClient;
}

/**
 * Wire a pipeline from parsed configuration. Overrides replace the
 * Playwright engine or the OpenAI client (tests, alternative providers).
 */
export function createClassificationPipeline(
  config: ParkscanConfig,
  overrides: PipelineOverrides = {}
): ClassificationPipeline {
  const engine = overrides.engine ?? new PlaywrightRenderEngine(config.renderer);
  const modelClient = overrides.modelClient ?? new OpenAIModelClient(config.model);

  return new ClassificationPipeline({
    renderer: new Renderer(engine, config.renderer),
    classifier: new Classifier(modelClient, config.classifier),
    fallbackPolicy: config.classifier.fallbackPolicy,
    defaultScheme: config.renderer.defaultScheme,
  });
}
