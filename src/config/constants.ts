/**
 * Application Constants
 *
 * Static values that don't change per environment.
 * Includes challenge provider selectors, default attempt budgets,
 * browser timeouts, and error codes.
 */

// --- Challenge Provider ---
export const CHALLENGE = {
  /**
   * Selectors whose presence in the top-level document means the challenge
   * is still up. Checked in order; any hit counts.
   */
  INDICATORS: {
    interstitial: ['script[src*="/cdn-cgi/challenge-platform/"]'],
    turnstile: [
      'input[name="cf-turnstile-response"]',
      'script[src*="challenges.cloudflare.com/turnstile/v0"]',
    ],
  },
  /** The checkbox iframe lives under this URL path */
  IFRAME_SRC_PREFIX:
    "https://challenges.cloudflare.com/cdn-cgi/challenge-platform/",
  CHECKBOX_SELECTOR: 'input[type="checkbox"]',
  /** Rendered inside the widget iframe once the click was accepted */
  SUCCESS_MARKER_SELECTOR: 'div[id="success"]',
  /** Timeout for the domcontentloaded wait before each scan */
  LOAD_STATE_TIMEOUT_MS: 10000,
} as const;

// --- Default Attempt Budget ---
export const DEFAULT_BUDGET = {
  SOLVE_ATTEMPTS: 3,
  SOLVE_CLICK_DELAY_SECONDS: 6,
  WAIT_CHECKBOX_ATTEMPTS: 10,
  WAIT_CHECKBOX_DELAY_SECONDS: 6,
  CHECKBOX_CLICK_ATTEMPTS: 3,
  ATTEMPT_DELAY_SECONDS: 5,
  /** Pause before giving up so in-flight navigations can settle */
  DRAIN_DELAY_SECONDS: 2,
} as const;

// --- Detection Retry ---
// Indicator queries are retried when a navigation destroys the
// execution context mid-query.
export const DETECTION_RETRY = {
  MAX_ATTEMPTS: 3,
  DELAY_MS: 2000,
} as const;

// --- Shadow DOM Traversal ---
export const SHADOW_TRAVERSAL = {
  MAX_DEPTH: 32,
} as const;

// --- Diagnostics ---
export const PROBE = {
  /** Characters of body text logged by the page text probe */
  BODY_TEXT_CHARS: 300,
} as const;

// --- Navigation ---
export const NAVIGATION = {
  /** Tried in order on every navigation attempt */
  WAIT_UNTIL: ["domcontentloaded", "networkidle2"],
  /** Base delay before the next navigation round; grows per round */
  RETRY_BASE_DELAY_MS: 5000,
  RETRY_STEP_DELAY_MS: 3000,
} as const;

// --- Error Codes ---
export const ERROR_CODES = {
  CONTEXT_DESTROYED: "CONTEXT_DESTROYED",
  LOAD_TIMEOUT: "LOAD_TIMEOUT",
  TARGET_CRASHED: "TARGET_CRASHED",
  ELEMENT_INTERACTION: "ELEMENT_INTERACTION",
  EXHAUSTED_RETRIES: "EXHAUSTED_RETRIES",
  INVALID_CONFIG: "INVALID_CONFIG",
  PAGE_REPLACEMENT_FAILED: "PAGE_REPLACEMENT_FAILED",
  TARGET_UNREACHABLE: "TARGET_UNREACHABLE",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];
