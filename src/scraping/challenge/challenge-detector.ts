/**
 * Challenge Detector
 *
 * Checks the top-level document for the indicator selectors of a
 * challenge variant. Not shadow-aware: the indicators are plain scripts
 * and inputs on the host page.
 *
 * Queries race navigations. When the challenge page reloads itself the
 * execution context is destroyed under a pending query; those queries are
 * retried after the new document reaches domcontentloaded.
 */
import { CHALLENGE, DETECTION_RETRY } from "../../config/constants";
import {
  DetectionTransientError,
  LoadTimeoutError,
} from "../../shared/errors/challenge.errors";
import { CHALLENGE_TYPES, ChallengeType } from "../../shared/types/challenge.types";
import { ElementRef, Queryable } from "../../shared/types/dom.types";
import { retryWithBackoff, sleep } from "../../shared/utils/retry";
import { logger as defaultLogger, Logger } from "../../monitoring/logger";

export interface DetectionOptions {
  retries?: number;
  delayMs?: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export function indicatorSelectors(challengeType: ChallengeType): readonly string[] {
  return CHALLENGE.INDICATORS[challengeType];
}

/**
 * Query a selector, retrying only when the execution context was destroyed.
 * Every attempt first waits for domcontentloaded; a timeout there is not
 * fatal since the DOM is usually queryable already.
 */
export async function safeQuery(
  queryable: Queryable,
  selector: string,
  options: DetectionOptions = {}
): Promise<ElementRef | null> {
  const logger = options.logger ?? defaultLogger;

  return retryWithBackoff(
    async () => {
      try {
        await queryable.waitForLoadState(
          "domcontentloaded",
          CHALLENGE.LOAD_STATE_TIMEOUT_MS
        );
      } catch (error) {
        if (!(error instanceof LoadTimeoutError)) throw error;
        logger.debug({ selector }, "Page did not reach domcontentloaded before query");
      }
      return queryable.querySelector(selector);
    },
    {
      maxAttempts: options.retries ?? DETECTION_RETRY.MAX_ATTEMPTS,
      initialDelayMs: options.delayMs ?? DETECTION_RETRY.DELAY_MS,
      backoffFactor: 1,
      jitter: false,
      label: "indicator query",
      shouldRetry: (error) => error instanceof DetectionTransientError,
      sleep: options.sleep ?? sleep,
      logger,
    }
  );
}

/**
 * True as soon as one indicator selector of the variant matches.
 */
export async function detectChallenge(
  queryable: Queryable,
  challengeType: ChallengeType,
  options: DetectionOptions = {}
): Promise<boolean> {
  const logger = options.logger ?? defaultLogger;

  for (const selector of indicatorSelectors(challengeType)) {
    const element = await safeQuery(queryable, selector, options);
    if (!element) continue;

    logger.debug(
      { challengeType, selector },
      "Challenge detected by indicator selector"
    );
    return true;
  }

  return false;
}

/**
 * Pick the variant whose indicators are on the page, interstitial first.
 * Returns null when no challenge is showing.
 */
export async function detectChallengeType(
  queryable: Queryable,
  options: DetectionOptions = {}
): Promise<ChallengeType | null> {
  for (const challengeType of CHALLENGE_TYPES) {
    if (await detectChallenge(queryable, challengeType, options)) {
      return challengeType;
    }
  }
  return null;
}
