/**
 * Environment Configuration
 *
 * Centralizes all environment variables into a typed configuration object.
 * All modules import config from here instead of reading process.env directly.
 *
 * Groups:
 * - Runtime: environment and log level
 * - Target: page to open and how to recognize that it is usable
 * - Solver: attempt budget for the challenge resolver
 * - Browser: executable, pool and timeout settings
 */
import dotenv from "dotenv";

dotenv.config();

const config = {
  // --- Runtime ---
  env: process.env.NODE_ENV || "development",
  logLevel: process.env.LOG_LEVEL || "info",

  // --- Target ---
  targetUrl: process.env.TARGET_URL || "",
  /** "interstitial", "turnstile" or "auto" (pick by indicator selectors) */
  challengeType: process.env.CHALLENGE_TYPE || "auto",
  expectedContentSelector: process.env.EXPECTED_CONTENT_SELECTOR || null,

  // --- Solver ---
  solveAttempts: parseInt(process.env.SOLVE_ATTEMPTS || "3", 10),
  solveClickDelaySeconds: parseFloat(process.env.SOLVE_CLICK_DELAY_SECONDS || "6"),
  waitCheckboxAttempts: parseInt(process.env.WAIT_CHECKBOX_ATTEMPTS || "10", 10),
  waitCheckboxDelaySeconds: parseFloat(
    process.env.WAIT_CHECKBOX_DELAY_SECONDS || "6"
  ),
  checkboxClickAttempts: parseInt(process.env.CHECKBOX_CLICK_ATTEMPTS || "3", 10),
  attemptDelaySeconds: parseFloat(process.env.ATTEMPT_DELAY_SECONDS || "5"),
  /** "indicator-absent" or "success-marker" */
  verification: process.env.VERIFICATION_MODE || "indicator-absent",

  // --- Browser ---
  chromeExecutablePath: process.env.CHROME_EXECUTABLE_PATH || "",
  headless: process.env.HEADLESS !== "false",
  browserPoolSize: parseInt(process.env.BROWSER_POOL_SIZE || "1", 10),
  maxSessionsPerBrowser: parseInt(process.env.MAX_SESSIONS_PER_BROWSER || "20", 10),
  pageTimeoutMs: parseInt(process.env.PAGE_TIMEOUT_MS || "30000", 10),
  navigationTimeoutMs: parseInt(
    process.env.NAVIGATION_TIMEOUT_MS || "30000",
    10
  ),
  navigationRetries: parseInt(process.env.NAVIGATION_RETRIES || "3", 10),
  /**
   * Element property holding the shadow root. Stock Chrome only exposes
   * open roots through `shadowRoot`, and the challenge widget attaches
   * closed ones, so with the default the checkbox is never found. Point
   * CHROME_EXECUTABLE_PATH at a build that exposes closed roots and name
   * its property here (`shadowRootUnl` on Camoufox-style patched builds).
   */
  shadowRootProperty: process.env.SHADOW_ROOT_PROPERTY || "shadowRoot",
};

export default config;
