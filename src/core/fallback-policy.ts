/**
 * Fallback Policy - what to do when no screenshot could be taken
 *
 * 'text-only' asks the model to judge from the URL alone (best effort, one
 * extra model call). 'fail' reports CLASSIFICATION_FAILURE without calling
 * the model, keeping every label backed by visual evidence.
 */

import type { FallbackPolicy } from '../types/index.js';

export type FallbackDecision =
  | { action: 'classify-visual'; imageDataUrl: string }
  | { action: 'classify-text' }
  | { action: 'fail' };

export function decideFallback(
  imageDataUrl: string | null,
  policy: FallbackPolicy
): FallbackDecision {
  if (imageDataUrl !== null) {
    return { action: 'classify-visual', imageDataUrl };
  }
  return policy === 'text-only' ? { action: 'classify-text' } : { action: 'fail' };
}
