/**
 * Browser Session - one disposable headless Chromium per render attempt
 *
 * Playwright is loaded lazily so the rest of the package works (and tests
 * run) without browser binaries installed. A missing Playwright install or a
 * missing browser executable is reported as a fatal outcome: retrying cannot
 * fix either.
 */

import type { ImageMediaType, RenderOutcome } from '../types/index.js';
import type { RendererConfig } from '../utils/config-schemas.js';
import { logger } from '../utils/logger.js';

const log = logger.browser;

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const LAUNCH_ARGS = ['--disable-gpu', '--disable-dev-shm-usage', '--no-sandbox'];

/**
 * The slice of a Playwright page a render attempt touches
 */
export interface ScreenshotPage {
  goto(url: string, options: { timeout: number; waitUntil: 'load' }): Promise<unknown>;
  screenshot(options: {
    fullPage: boolean;
    type: 'png' | 'jpeg';
    timeout: number;
  }): Promise<Buffer>;
}

/**
 * The slice of a Playwright browser a render attempt touches
 */
export interface ScreenshotBrowser {
  newPage(options: {
    viewport: { width: number; height: number };
    userAgent: string;
    ignoreHTTPSErrors: boolean;
  }): Promise<ScreenshotPage>;
  close(): Promise<void>;
}

export type BrowserLauncher = (options: {
  headless: boolean;
  args: string[];
}) => Promise<ScreenshotBrowser>;

/**
 * Produces one screenshot per call. Implementations must release whatever
 * they acquired before resolving.
 */
export interface RenderEngine {
  render(url: string, options?: { signal?: AbortSignal }): Promise<RenderOutcome>;
}

export class PlaywrightUnavailableError extends Error {
  constructor(cause: string) {
    super(
      `Playwright is not available: ${cause}. ` +
      'Install it with: npm install playwright && npx playwright install chromium'
    );
    this.name = 'PlaywrightUnavailableError';
  }
}

let playwrightModule: typeof import('playwright') | null = null;

async function loadPlaywright(): Promise<typeof import('playwright')> {
  if (playwrightModule) {
    return playwrightModule;
  }
  try {
    playwrightModule = await import('playwright');
    return playwrightModule;
  } catch (error) {
    throw new PlaywrightUnavailableError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Default launcher: a fresh headless Chromium process
 */
export const launchChromium: BrowserLauncher = async (options) => {
  const pw = await loadPlaywright();
  return pw.chromium.launch(options);
};

export type SessionConfig = Pick<
  RendererConfig,
  'timeoutMs' | 'fullPage' | 'screenshotType' | 'viewportWidth' | 'viewportHeight' | 'headless'
>;

/**
 * Sort a thrown error into retryable or not
 */
export function classifyRenderError(error: unknown, timeoutMs: number): RenderOutcome {
  if (error instanceof PlaywrightUnavailableError) {
    return { kind: 'fatal', reason: error.message };
  }

  const message = error instanceof Error ? error.message : String(error);
  if (message.includes("Executable doesn't exist")) {
    return { kind: 'fatal', reason: 'browser executable missing' };
  }
  if (error instanceof Error && error.name === 'TimeoutError') {
    return { kind: 'recoverable', reason: `navigation timeout after ${timeoutMs}ms` };
  }
  return { kind: 'recoverable', reason: message.split('\n')[0] };
}

function mediaTypeFor(type: 'png' | 'jpeg'): ImageMediaType {
  return type === 'png' ? 'image/png' : 'image/jpeg';
}

export class PlaywrightRenderEngine implements RenderEngine {
  private config: SessionConfig;
  private launch: BrowserLauncher;

  constructor(config: SessionConfig, launch: BrowserLauncher = launchChromium) {
    this.config = config;
    this.launch = launch;
  }

  async render(url: string, options: { signal?: AbortSignal } = {}): Promise<RenderOutcome> {
    const { signal } = options;
    if (signal?.aborted) {
      return { kind: 'fatal', reason: 'aborted' };
    }

    let browser: ScreenshotBrowser | null = null;
    const onAbort = () => {
      if (browser) {
        void closeQuietly(browser, url);
      }
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      browser = await this.launch({ headless: this.config.headless, args: LAUNCH_ARGS });
      if (signal?.aborted) {
        return { kind: 'fatal', reason: 'aborted' };
      }

      const page = await browser.newPage({
        viewport: { width: this.config.viewportWidth, height: this.config.viewportHeight },
        userAgent: DEFAULT_USER_AGENT,
        ignoreHTTPSErrors: true,
      });

      await page.goto(url, { timeout: this.config.timeoutMs, waitUntil: 'load' });

      const data = await page.screenshot({
        fullPage: this.config.fullPage,
        type: this.config.screenshotType,
        timeout: this.config.timeoutMs,
      });

      if (data.length === 0) {
        return { kind: 'recoverable', reason: 'empty screenshot' };
      }

      return {
        kind: 'success',
        value: { data, mediaType: mediaTypeFor(this.config.screenshotType), released: false },
      };
    } catch (error) {
      if (signal?.aborted) {
        return { kind: 'fatal', reason: 'aborted' };
      }
      return classifyRenderError(error, this.config.timeoutMs);
    } finally {
      signal?.removeEventListener('abort', onAbort);
      if (browser) {
        await closeQuietly(browser, url);
      }
    }
  }
}

async function closeQuietly(browser: ScreenshotBrowser, url: string): Promise<void> {
  try {
    await browser.close();
  } catch (error) {
    log.debug('Browser close failed', {
      url,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
