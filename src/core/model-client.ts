/**
 * Multimodal model client
 *
 * Sends one prompt (optionally with an inline screenshot) and returns the
 * model's text. The client never retries: a failed call is reported to the
 * classifier as-is.
 */

import OpenAI from 'openai';
import type {
  ChatCompletion,
  ChatCompletionContentPart,
  ChatCompletionCreateParamsNonStreaming,
} from 'openai/resources/chat/completions';
import type { ModelConfig } from '../utils/config-schemas.js';
import { logger } from '../utils/logger.js';

const log = logger.model;

export interface ModelRequest {
  prompt: string;
  /** data: URL of the screenshot; omitted in text-only mode */
  imageDataUrl?: string;
  signal?: AbortSignal;
}

export interface ModelClient {
  complete(request: ModelRequest): Promise<string>;
}

/**
 * The part of the OpenAI SDK this client calls
 */
export interface ChatCompletionsApi {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal | null; timeout?: number }
      ): Promise<ChatCompletion>;
    };
  };
}

export class ModelResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ModelResponseError';
  }
}

export class OpenAIModelClient implements ModelClient {
  private client: ChatCompletionsApi;
  private config: ModelConfig;

  constructor(config: ModelConfig, client?: ChatCompletionsApi) {
    this.config = config;

    if (client) {
      this.client = client;
      return;
    }

    if (!config.apiKey) {
      throw new Error('OpenAI API key is required. Set OPENAI_API_KEY environment variable.');
    }

    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      maxRetries: 0,
    });
  }

  buildRequest(request: ModelRequest): ChatCompletionCreateParamsNonStreaming {
    const content: ChatCompletionContentPart[] = [{ type: 'text', text: request.prompt }];
    if (request.imageDataUrl) {
      content.push({ type: 'image_url', image_url: { url: request.imageDataUrl } });
    }

    return {
      model: this.config.model,
      messages: [{ role: 'user', content }],
      max_tokens: this.config.maxTokens,
      temperature: 0,
    };
  }

  async complete(request: ModelRequest): Promise<string> {
    const startTime = Date.now();
    const completion = await this.client.chat.completions.create(this.buildRequest(request), {
      signal: request.signal,
      timeout: this.config.timeoutMs,
    });

    const choice = completion.choices[0];
    if (!choice) {
      throw new ModelResponseError('Model returned no choices');
    }

    const text = choice.message.content;
    if (typeof text !== 'string') {
      throw new ModelResponseError(
        `Model returned no text content (finish_reason: ${choice.finish_reason})`
      );
    }

    log.timed('Model responded', startTime, {
      model: this.config.model,
      withImage: Boolean(request.imageDataUrl),
      totalTokens: completion.usage?.total_tokens,
    });

    return text;
  }
}
