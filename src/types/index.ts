/**
 * Shared types for the classification pipeline
 */

/**
 * The three outcomes a classification is allowed to produce
 */
export const CANONICAL_LABELS = [
  'generic parked landing page',
  'live website',
  'nonactive domain',
] as const;

export type ClassificationLabel = (typeof CANONICAL_LABELS)[number];

/**
 * Returned when no label could be obtained (model call failed, or rendering
 * failed under the 'fail' fallback policy)
 */
export const CLASSIFICATION_FAILURE = 'classification failure';

export const CLASSIFICATION_RESULTS = [...CANONICAL_LABELS, CLASSIFICATION_FAILURE] as const;

export type ClassificationResult = (typeof CLASSIFICATION_RESULTS)[number];

export function isClassificationLabel(value: string): value is ClassificationLabel {
  return CANONICAL_LABELS.some((label) => label === value);
}

export type ImageMediaType = 'image/png' | 'image/jpeg';

/**
 * Screenshot bytes owned by a single pipeline invocation
 */
export interface ImagePayload {
  data: Buffer;
  mediaType: ImageMediaType;
  released: boolean;
}

/**
 * Outcome of one operation that distinguishes failures worth retrying from
 * failures that will not go away on a second try
 */
export type Outcome<T> =
  | { kind: 'success'; value: T }
  | { kind: 'recoverable'; reason: string }
  | { kind: 'fatal'; reason: string };

export type RenderOutcome = Outcome<ImagePayload>;

/**
 * What the pipeline does when every render attempt failed
 */
export type FallbackPolicy = 'text-only' | 'fail';

export const CLASSIFICATION_MODES = ['visual', 'text', 'none'] as const;

export type ClassificationMode = (typeof CLASSIFICATION_MODES)[number];

export type PipelineState =
  | 'START'
  | 'RENDERING'
  | 'RENDERED'
  | 'EXHAUSTED'
  | 'CLASSIFYING_VISUAL'
  | 'CLASSIFYING_TEXT'
  | 'FAILED'
  | 'DONE';

/**
 * Detailed result of one pipeline run
 */
export interface ClassificationReport {
  url: string;
  normalizedUrl: string;
  result: ClassificationResult;
  mode: ClassificationMode;
  renderAttempts: number;
  /** Raw model text, when the model answered */
  rawResponse?: string;
  durationMs: number;
}

export interface CaptureOptions {
  signal?: AbortSignal;
}
