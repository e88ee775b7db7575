import { describe, it, expect, vi } from 'vitest';
import {
  PlaywrightRenderEngine,
  PlaywrightUnavailableError,
  classifyRenderError,
  type BrowserLauncher,
  type ScreenshotBrowser,
  type ScreenshotPage,
  type SessionConfig,
} from '../../src/core/browser-session.js';

const config: SessionConfig = {
  timeoutMs: 40000,
  fullPage: true,
  screenshotType: 'png',
  viewportWidth: 1280,
  viewportHeight: 800,
  headless: true,
};

interface FakeBrowserOptions {
  goto?: ScreenshotPage['goto'];
  screenshot?: ScreenshotPage['screenshot'];
}

function fakeBrowser(options: FakeBrowserOptions = {}) {
  const goto: ScreenshotPage['goto'] = options.goto ?? (async () => null);
  const screenshot: ScreenshotPage['screenshot'] =
    options.screenshot ?? (async () => Buffer.from([137, 80, 78, 71]));
  const page: ScreenshotPage = {
    goto: vi.fn(goto),
    screenshot: vi.fn(screenshot),
  };
  const browser: ScreenshotBrowser = {
    newPage: vi.fn(async () => page),
    close: vi.fn(async () => {}),
  };
  const launch: BrowserLauncher = vi.fn(async () => browser);
  return { page, browser, launch };
}

function timeoutError(): Error {
  const error = new Error('page.goto: Timeout 40000ms exceeded.\nCall log: ...');
  error.name = 'TimeoutError';
  return error;
}

describe('classifyRenderError', () => {
  it('treats a timeout as recoverable', () => {
    expect(classifyRenderError(timeoutError(), 40000)).toEqual({
      kind: 'recoverable',
      reason: 'navigation timeout after 40000ms',
    });
  });

  it('keeps the first line of other errors as a recoverable reason', () => {
    expect(classifyRenderError(new Error('net::ERR_NAME_NOT_RESOLVED at http://x.invalid\nmore'), 1000)).toEqual({
      kind: 'recoverable',
      reason: 'net::ERR_NAME_NOT_RESOLVED at http://x.invalid',
    });
  });

  it('treats a missing browser executable as fatal', () => {
    const error = new Error("browserType.launch: Executable doesn't exist at /ms-playwright/chromium");
    expect(classifyRenderError(error, 1000)).toEqual({ kind: 'fatal', reason: 'browser executable missing' });
  });

  it('treats a missing Playwright install as fatal', () => {
    const outcome = classifyRenderError(new PlaywrightUnavailableError('Cannot find module'), 1000);
    expect(outcome.kind).toBe('fatal');
  });
});

describe('PlaywrightRenderEngine', () => {
  it('launches, navigates, screenshots and closes the browser', async () => {
    const { page, browser, launch } = fakeBrowser();
    const engine = new PlaywrightRenderEngine(config, launch);

    const outcome = await engine.render('http://example.com');

    expect(outcome).toEqual({
      kind: 'success',
      value: { data: Buffer.from([137, 80, 78, 71]), mediaType: 'image/png', released: false },
    });
    expect(launch).toHaveBeenCalledWith({
      headless: true,
      args: ['--disable-gpu', '--disable-dev-shm-usage', '--no-sandbox'],
    });
    expect(page.goto).toHaveBeenCalledWith('http://example.com', { timeout: 40000, waitUntil: 'load' });
    expect(page.screenshot).toHaveBeenCalledWith({ fullPage: true, type: 'png', timeout: 40000 });
    expect(browser.close).toHaveBeenCalledTimes(1);
  });

  it('reports jpeg screenshots with the jpeg media type', async () => {
    const { launch } = fakeBrowser();
    const engine = new PlaywrightRenderEngine({ ...config, screenshotType: 'jpeg' }, launch);

    const outcome = await engine.render('http://example.com');

    expect(outcome.kind === 'success' && outcome.value.mediaType).toBe('image/jpeg');
  });

  it('closes the browser when navigation fails', async () => {
    const { browser, launch } = fakeBrowser({
      goto: async () => {
        throw timeoutError();
      },
    });
    const engine = new PlaywrightRenderEngine(config, launch);

    const outcome = await engine.render('http://slow.example');

    expect(outcome).toEqual({ kind: 'recoverable', reason: 'navigation timeout after 40000ms' });
    expect(browser.close).toHaveBeenCalledTimes(1);
  });

  it('treats an empty screenshot as recoverable', async () => {
    const { browser, launch } = fakeBrowser({ screenshot: async () => Buffer.alloc(0) });
    const engine = new PlaywrightRenderEngine(config, launch);

    expect(await engine.render('http://blank.example')).toEqual({
      kind: 'recoverable',
      reason: 'empty screenshot',
    });
    expect(browser.close).toHaveBeenCalledTimes(1);
  });

  it('reports a launch failure without a browser to close', async () => {
    const launch: BrowserLauncher = vi.fn(async () => {
      throw new Error("browserType.launch: Executable doesn't exist at /nowhere");
    });
    const engine = new PlaywrightRenderEngine(config, launch);

    expect(await engine.render('http://example.com')).toEqual({
      kind: 'fatal',
      reason: 'browser executable missing',
    });
  });

  it('does not launch when the signal is already aborted', async () => {
    const { launch } = fakeBrowser();
    const engine = new PlaywrightRenderEngine(config, launch);
    const controller = new AbortController();
    controller.abort();

    expect(await engine.render('http://example.com', { signal: controller.signal })).toEqual({
      kind: 'fatal',
      reason: 'aborted',
    });
    expect(launch).not.toHaveBeenCalled();
  });

  it('closes the browser and reports aborted when cancelled mid-navigation', async () => {
    const controller = new AbortController();
    const { browser, launch } = fakeBrowser({
      goto: async () => {
        controller.abort();
        throw new Error('Target page, context or browser has been closed');
      },
    });
    const engine = new PlaywrightRenderEngine(config, launch);

    const outcome = await engine.render('http://example.com', { signal: controller.signal });

    expect(outcome).toEqual({ kind: 'fatal', reason: 'aborted' });
    expect(browser.close).toHaveBeenCalled();
  });

  it('ignores errors while closing the browser', async () => {
    const { browser, launch } = fakeBrowser();
    vi.mocked(browser.close).mockRejectedValueOnce(new Error('already closed'));
    const engine = new PlaywrightRenderEngine(config, launch);

    const outcome = await engine.render('http://example.com');

    expect(outcome.kind).toBe('success');
  });
});
