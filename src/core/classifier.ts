/**
 * Classifier - asks the model for a verdict and pins it to the closed label set
 *
 * Two modes:
 * - visual: the screenshot is attached and the model judges what it sees
 * - text: only the URL is available (rendering failed) and the model judges
 *   from the name alone
 *
 * The caller always receives a ClassificationResult. Model failures become
 * CLASSIFICATION_FAILURE; unrecognised answers become the configured default
 * label.
 */

import {
  CANONICAL_LABELS,
  CLASSIFICATION_FAILURE,
  isClassificationLabel,
  type ClassificationLabel,
  type ClassificationResult,
} from '../types/index.js';
import type { ClassifierConfig } from '../utils/config-schemas.js';
import { logger } from '../utils/logger.js';
import type { ModelClient } from './model-client.js';

const log = logger.classifier;

const LABEL_LIST = CANONICAL_LABELS.join('\n');

/**
 * Prompt sent alongside the screenshot
 */
export function buildVisualPrompt(): string {
  return [
    'Look at the attached screenshot of a webpage and decide whether it is a generic parked landing page, a live website with a real business, or a nonactive domain.',
    'Some sites show a popup or overlay that blocks the page because the owner has locked down the account; treat those as a generic parked landing page.',
    'Read the text of any popup or overlay before deciding between a parked page and a live website.',
    'Answer with exactly one of the following labels and nothing else, no punctuation or explanation:',
    '',
    LABEL_LIST,
  ].join('\n');
}

/**
 * Prompt used when no screenshot could be taken
 */
export function buildTextPrompt(url: string): string {
  return [
    `The webpage at ${url} could not be loaded in a browser, so no screenshot is available.`,
    'Based on the URL alone, decide whether it is most likely a generic parked landing page, a live website with a real business, or a nonactive domain.',
    'Answer with exactly one of the following labels and nothing else, no punctuation or explanation:',
    '',
    LABEL_LIST,
  ].join('\n');
}

/**
 * The canonical label `raw` spells, or null.
 *
 * Comparison is case- and whitespace-insensitive. Any other deviation,
 * punctuation included, is no match.
 */
export function matchLabel(raw: string): ClassificationLabel | null {
  const cleaned = raw.trim().toLowerCase().replace(/\s+/g, ' ');

  return isClassificationLabel(cleaned) ? cleaned : null;
}

/**
 * Map free model text onto a canonical label, falling back to `defaultLabel`
 */
export function normalizeLabel(raw: string, defaultLabel: ClassificationLabel): ClassificationLabel {
  return matchLabel(raw) ?? defaultLabel;
}

export interface ClassifyOptions {
  signal?: AbortSignal;
}

export interface ClassifierVerdict {
  result: ClassificationResult;
  rawResponse?: string;
}

export class Classifier {
  private client: ModelClient;
  private defaultLabel: ClassificationLabel;

  constructor(client: ModelClient, config: Pick<ClassifierConfig, 'defaultLabel'>) {
    this.client = client;
    this.defaultLabel = config.defaultLabel;
  }

  /**
   * Visual mode when `imageDataUrl` is given, text-only mode otherwise
   */
  async classify(
    url: string,
    imageDataUrl: string | null,
    options: ClassifyOptions = {}
  ): Promise<ClassificationResult> {
    const { result } = await this.classifyWithDetails(url, imageDataUrl, options);
    return result;
  }

  async classifyWithDetails(
    url: string,
    imageDataUrl: string | null,
    options: ClassifyOptions = {}
  ): Promise<ClassifierVerdict> {
    const mode = imageDataUrl ? 'visual' : 'text';
    const prompt = imageDataUrl ? buildVisualPrompt() : buildTextPrompt(url);

    let rawResponse: string;
    try {
      rawResponse = await this.client.complete({
        prompt,
        imageDataUrl: imageDataUrl ?? undefined,
        signal: options.signal,
      });
    } catch (error) {
      log.error('Model invocation failed', { url, mode, error });
      return { result: CLASSIFICATION_FAILURE };
    }

    const matched = matchLabel(rawResponse);
    if (!matched) {
      log.warn('Model answer outside label set, using default', {
        url,
        mode,
        response: rawResponse.slice(0, 200),
        defaultLabel: this.defaultLabel,
      });
    }
    const result = matched ?? this.defaultLabel;

    log.debug('Classified', { url, mode, result });
    return { result, rawResponse };
  }
}
