/**
 * Central Timeout Configuration
 *
 * Defaults for the policy knobs of the render/classify cycle. Each can be
 * overridden through the environment (see env-parser.ts).
 *
 * A shorter render timeout detects dead domains faster, but slow legitimate
 * sites then fall through to the fallback path more often and are more likely
 * to be reported as nonactive.
 */

export const TIMEOUTS = {
  /**
   * Navigation timeout for a single render attempt
   */
  RENDER: 40000,

  /**
   * Upper bound for one multimodal model request
   */
  MODEL_REQUEST: 60000,

  /**
   * Graceful shutdown window for the API server
   */
  SHUTDOWN: 10000,
} as const;

export const RENDER_RETRY = {
  /** Total attempts, including the first */
  MAX_ATTEMPTS: 3,
  /** Fixed pause between attempts */
  DELAY_MS: 2000,
} as const;
