/**
 * Entry Point: shadow-challenge-resolver
 *
 * Runs one navigate-and-resolve job:
 * 1. Launch a browser from the pool and open a session
 * 2. Navigate to TARGET_URL (or the first CLI argument)
 * 3. Resolve the checkbox challenge, if the page shows one
 *
 * Exits 0 when the page is usable, 1 otherwise.
 */
import config from "./config";
import { createChromePool } from "./scraping/browser/browser-pool";
import { BrowserSession } from "./scraping/browser/browser-session";
import { validateTargetSettings } from "./scraping/challenge/options-validator";
import { navigateAndResolve } from "./scraping/navigators/target-navigator";
import { ChallengeError, errorMessage } from "./shared/errors/challenge.errors";
import { logger } from "./monitoring/logger";
import { metrics } from "./monitoring/metrics.collector";

const browserPool = createChromePool();

async function main(): Promise<void> {
  const url = process.argv[2] || config.targetUrl;
  if (!url) {
    logger.fatal("No target URL: set TARGET_URL or pass it as the first argument");
    process.exit(1);
  }

  const { challengeType, verification } = validateTargetSettings({
    challengeType: config.challengeType,
    verification: config.verification,
  });

  logger.info({ env: config.env, url, challengeType }, "Starting challenge resolution job");

  const session = new BrowserSession(browserPool);
  try {
    const result = await navigateAndResolve(session, url, {
      challengeType,
      verification,
      expectedContentSelector: config.expectedContentSelector,
      solveAttempts: config.solveAttempts,
      solveClickDelaySeconds: config.solveClickDelaySeconds,
      waitCheckboxAttempts: config.waitCheckboxAttempts,
      waitCheckboxDelaySeconds: config.waitCheckboxDelaySeconds,
      checkboxClickAttempts: config.checkboxClickAttempts,
      attemptDelaySeconds: config.attemptDelaySeconds,
    });
    logger.info(result, "Target is usable");
    process.exitCode = 0;
  } catch (error) {
    if (!(error instanceof ChallengeError)) throw error;
    logger.error(
      { code: error.code, retryable: error.retryable, error: error.message },
      "Challenge resolution job failed"
    );
    process.exitCode = 1;
  } finally {
    await session.close();
    await browserPool.drain();
    logger.debug({ metrics: metrics.format() }, "Resolution metrics");
  }
}

// --- Graceful Shutdown ---
async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, "Shutdown signal received");

  try {
    await browserPool.drain();
    logger.info("Graceful shutdown complete");
    process.exit(0);
  } catch (error) {
    logger.error({ error: errorMessage(error) }, "Error during shutdown");
    process.exit(1);
  }
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));

process.on("unhandledRejection", (reason) => {
  logger.fatal({ reason }, "Unhandled rejection");
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.fatal(
    { error: errorMessage(error), stack: error instanceof Error ? error.stack : undefined },
    "Challenge resolution job crashed"
  );
  process.exit(1);
});
