import { describe, it, expect, vi } from 'vitest';
import {
  ClassificationPipeline,
  createClassificationPipeline,
} from '../../src/core/pipeline.js';
import { Classifier, buildTextPrompt } from '../../src/core/classifier.js';
import type { RenderEngine } from '../../src/core/browser-session.js';
import type { ModelClient, ModelRequest } from '../../src/core/model-client.js';
import { Renderer } from '../../src/core/renderer.js';
import type { FallbackPolicy, ImagePayload, RenderOutcome } from '../../src/types/index.js';
import { parseParkscanConfig } from '../../src/utils/env-parser.js';

function screenshot(): ImagePayload {
  return { data: Buffer.from([1, 2, 3]), mediaType: 'image/png', released: false };
}

function engineReturning(outcome: () => RenderOutcome) {
  const engine: RenderEngine = { render: vi.fn(async () => outcome()) };
  return engine;
}

function modelAnswering(answer: string | Error) {
  const requests: ModelRequest[] = [];
  const client: ModelClient = {
    complete: vi.fn(async (request: ModelRequest) => {
      requests.push(request);
      if (answer instanceof Error) throw answer;
      return answer;
    }),
  };
  return { client, requests };
}

function buildPipeline(engine: RenderEngine, client: ModelClient, fallbackPolicy: FallbackPolicy = 'text-only') {
  return new ClassificationPipeline({
    renderer: new Renderer(engine, { maxAttempts: 3, retryDelayMs: 0, defaultScheme: 'http' }),
    classifier: new Classifier(client, { defaultLabel: 'nonactive domain' }),
    fallbackPolicy,
    defaultScheme: 'http',
  });
}

const unreachable: RenderOutcome = { kind: 'recoverable', reason: 'net::ERR_NAME_NOT_RESOLVED' };

describe('ClassificationPipeline', () => {
  it('classifies a rendered page visually', async () => {
    const engine = engineReturning(() => ({ kind: 'success', value: screenshot() }));
    const { client, requests } = modelAnswering('Live Website');
    const pipeline = buildPipeline(engine, client);

    const report = await pipeline.run('example.com');

    expect(report).toMatchObject({
      url: 'example.com',
      normalizedUrl: 'http://example.com',
      result: 'live website',
      mode: 'visual',
      renderAttempts: 1,
      rawResponse: 'Live Website',
    });
    expect(requests).toHaveLength(1);
    expect(requests[0].imageDataUrl).toBe('data:image/png;base64,AQID');
  });

  it('coerces an out-of-set answer to the default label', async () => {
    const engine = engineReturning(() => ({ kind: 'success', value: screenshot() }));
    const { client } = modelAnswering("I don't know");
    const pipeline = buildPipeline(engine, client);

    expect(await pipeline.classify('shop.example')).toBe('nonactive domain');
  });

  it('falls back to a text-only classification when rendering is exhausted', async () => {
    const engine = engineReturning(() => unreachable);
    const { client, requests } = modelAnswering('nonactive domain');
    const pipeline = buildPipeline(engine, client, 'text-only');

    const report = await pipeline.run('gone.example');

    expect(engine.render).toHaveBeenCalledTimes(3);
    expect(report.result).toBe('nonactive domain');
    expect(report.mode).toBe('text');
    expect(report.renderAttempts).toBe(3);
    expect(requests).toHaveLength(1);
    expect(requests[0].prompt).toBe(buildTextPrompt('http://gone.example'));
    expect(requests[0].imageDataUrl).toBeUndefined();
  });

  it('fails without calling the model under the fail policy', async () => {
    const engine = engineReturning(() => unreachable);
    const { client } = modelAnswering('live website');
    const pipeline = buildPipeline(engine, client, 'fail');

    const report = await pipeline.run('gone.example');

    expect(report.result).toBe('classification failure');
    expect(report.mode).toBe('none');
    expect(client.complete).not.toHaveBeenCalled();
  });

  it('does not call the model once the run is cancelled during rendering', async () => {
    const controller = new AbortController();
    const engine: RenderEngine = {
      render: vi.fn(async () => {
        controller.abort();
        return unreachable;
      }),
    };
    const { client } = modelAnswering('live website');
    const pipeline = buildPipeline(engine, client, 'text-only');

    const report = await pipeline.run('gone.example', { signal: controller.signal });

    expect(report.result).toBe('classification failure');
    expect(report.mode).toBe('none');
    expect(report.renderAttempts).toBe(1);
    expect(client.complete).not.toHaveBeenCalled();
  });

  it('drops a screenshot taken before cancellation without classifying it', async () => {
    const controller = new AbortController();
    const image = screenshot();
    const engine: RenderEngine = {
      render: vi.fn(async (): Promise<RenderOutcome> => {
        controller.abort();
        return { kind: 'success', value: image };
      }),
    };
    const { client } = modelAnswering('live website');
    const pipeline = buildPipeline(engine, client);

    const report = await pipeline.run('example.com', { signal: controller.signal });

    expect(report.result).toBe('classification failure');
    expect(report.mode).toBe('none');
    expect(image.released).toBe(true);
    expect(client.complete).not.toHaveBeenCalled();
  });

  it('classifies a batch in order', async () => {
    const engine = engineReturning(() => ({ kind: 'success', value: screenshot() }));
    const { client } = modelAnswering('live website');
    const pipeline = buildPipeline(engine, client);
    const seen: string[] = [];

    const reports = await pipeline.runAll(['a.example', 'b.example'], {}, (report) => {
      seen.push(report.url);
    });

    expect(seen).toEqual(['a.example', 'b.example']);
    expect(reports.map((report) => report.result)).toEqual(['live website', 'live website']);
  });

  it('stops a batch once it is cancelled', async () => {
    const controller = new AbortController();
    const engine: RenderEngine = {
      render: vi.fn(async () => {
        controller.abort();
        return unreachable;
      }),
    };
    const { client } = modelAnswering('live website');
    const pipeline = buildPipeline(engine, client);
    const onReport = vi.fn();

    const reports = await pipeline.runAll(
      ['a.example', 'b.example', 'c.example'],
      { signal: controller.signal },
      onReport
    );

    expect(reports).toEqual([]);
    expect(onReport).not.toHaveBeenCalled();
    expect(engine.render).toHaveBeenCalledTimes(1);
  });

  it('reports classification failure when the model call fails', async () => {
    const engine = engineReturning(() => ({ kind: 'success', value: screenshot() }));
    const { client } = modelAnswering(new Error('401 Incorrect API key provided'));
    const pipeline = buildPipeline(engine, client);

    const report = await pipeline.run('example.com');

    expect(report.result).toBe('classification failure');
    expect(report.mode).toBe('visual');
    expect(report.rawResponse).toBeUndefined();
  });

  it('releases the screenshot once it has been encoded', async () => {
    const image = screenshot();
    const engine = engineReturning(() => ({ kind: 'success', value: image }));
    const { client } = modelAnswering('generic parked landing page');
    const pipeline = buildPipeline(engine, client);

    await pipeline.run('parked.example');

    expect(image.released).toBe(true);
    expect([...image.data]).toEqual([0, 0, 0]);
  });

  it('still resolves when the renderer itself throws', async () => {
    const { client } = modelAnswering('live website');
    const renderer = new Renderer(engineReturning(() => unreachable), {
      maxAttempts: 1,
      retryDelayMs: 0,
      defaultScheme: 'http',
    });
    vi.spyOn(renderer, 'captureWithDetails').mockRejectedValue(new Error('boom'));
    const pipeline = new ClassificationPipeline({
      renderer,
      classifier: new Classifier(client, { defaultLabel: 'nonactive domain' }),
      fallbackPolicy: 'text-only',
      defaultScheme: 'http',
    });

    const report = await pipeline.run('example.com');

    expect(report.result).toBe('classification failure');
  });

  it('decides the same way for the same render outcome', async () => {
    const results: string[] = [];
    for (let i = 0; i < 3; i++) {
      const { client } = modelAnswering('live website');
      const pipeline = buildPipeline(engineReturning(() => unreachable), client, 'fail');
      results.push((await pipeline.run('gone.example')).result);
    }
    expect(results).toEqual(['classification failure', 'classification failure', 'classification failure']);
  });
});

describe('createClassificationPipeline', () => {
  it('wires the configured fallback policy and the injected engine and client', async () => {
    const config = parseParkscanConfig({ FALLBACK_POLICY: 'fail', RENDER_RETRY_DELAY_MS: '0' });
    const engine = engineReturning(() => ({ kind: 'success', value: screenshot() }));
    const { client } = modelAnswering('live website');

    const pipeline = createClassificationPipeline(config, { engine, modelClient: client });

    expect(pipeline.getFallbackPolicy()).toBe('fail');
    expect(await pipeline.classify('example.com')).toBe('live website');
  });
});
