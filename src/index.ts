/**
 * parkscan
 *
 * Classifies a URL as a generic parked landing page, a live website or a
 * nonactive domain by screenshotting it in a headless browser and asking a
 * multimodal model what it sees.
 *
 * @example
 * ```typescript
 * import { createClassificationPipeline, parseParkscanConfig } from 'parkscan';
 *
 * const pipeline = createClassificationPipeline(parseParkscanConfig());
 * const label = await pipeline.classify('example.com');
 * ```
 */

export * from './types/index.js';

export {
  ClassificationPipeline,
  createClassificationPipeline,
  type PipelineDependencies,
  type PipelineOverrides,
} from './core/pipeline.js';
export { Renderer, type CaptureResult, type RetryPolicy } from './core/renderer.js';
export {
  PlaywrightRenderEngine,
  PlaywrightUnavailableError,
  classifyRenderError,
  launchChromium,
  type BrowserLauncher,
  type RenderEngine,
  type ScreenshotBrowser,
  type ScreenshotPage,
} from './core/browser-session.js';
export { encodeImage, releaseImage } from './core/encoder.js';
export {
  Classifier,
  buildTextPrompt,
  buildVisualPrompt,
  matchLabel,
  normalizeLabel,
  type ClassifierVerdict,
} from './core/classifier.js';
export {
  OpenAIModelClient,
  ModelResponseError,
  type ChatCompletionsApi,
  type ModelClient,
  type ModelRequest,
} from './core/model-client.js';
export { decideFallback, type FallbackDecision } from './core/fallback-policy.js';

export { normalizeUrl, isClassifiableUrl, DEFAULT_URL_SCHEME } from './utils/url-normalizer.js';
export { retryOutcome, type RetryOptions, type RetryResult } from './utils/retry.js';
export { TIMEOUTS, RENDER_RETRY } from './utils/timeouts.js';
export {
  ConfigValidationError,
  type ApiServerConfig,
  type ClassifierConfig,
  type LogConfig,
  type ModelConfig,
  type ParkscanConfig,
  type RateLimitConfig,
  type RendererConfig,
  type StorageConfig,
  type UrlScheme,
} from './utils/config-schemas.js';
export {
  parseApiServerConfig,
  parseClassifierConfig,
  parseLogConfig,
  parseModelConfig,
  parseParkscanConfig,
  parseRateLimitConfig,
  parseRendererConfig,
  parseStorageConfig,
  type Env,
} from './utils/env-parser.js';
export { Logger, logger, configureLogger, logServerStart, logServerShutdown } from './utils/logger.js';
