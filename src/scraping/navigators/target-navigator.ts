/**
 * Target Navigator
 *
 * Opens the target URL and gets the page past the checkbox challenge.
 *
 * Flow per round:
 * 1. Navigate, trying each waitUntil event in turn; a crashed page is
 *    replaced and the navigation retried
 * 2. Pick the challenge type (configured, or detected from the page)
 * 3. Resolve it; on failure wait (longer each round) and navigate again
 */
import { NAVIGATION } from "../../config/constants";
import config from "../../config";
import {
  errorMessage,
  ExhaustedRetriesError,
  PageReplacementError,
  TargetCrashedError,
  TargetUnreachableError,
} from "../../shared/errors/challenge.errors";
import { ChallengeType } from "../../shared/types/challenge.types";
import { NavigationSession, Queryable } from "../../shared/types/dom.types";
import { sleep as defaultSleep } from "../../shared/utils/retry";
import { logger as defaultLogger, Logger } from "../../monitoring/logger";
import { detectChallengeType } from "../challenge/challenge-detector";
import { solveCaptcha, SolveCaptchaOptions } from "../challenge/challenge-solver";

export interface NavigateOptions extends Omit<SolveCaptchaOptions, "challengeType"> {
  /** "auto" picks the variant from the indicators on the page */
  challengeType?: ChallengeType | "auto";
  navigationRetries?: number;
  navigationTimeoutMs?: number;
}

export interface NavigationResult {
  url: string;
  /** null when the page showed no challenge */
  challengeType: ChallengeType | null;
  resolved: true;
  /** Navigation rounds used */
  attempts: number;
}

export interface NavigatorDependencies {
  solve: (
    queryable: Queryable,
    session: NavigationSession,
    options: SolveCaptchaOptions
  ) => Promise<boolean>;
  detectType: (queryable: Queryable) => Promise<ChallengeType | null>;
  sleep: (ms: number) => Promise<void>;
  logger: Logger;
}

/**
 * Navigate to `url` and resolve its challenge.
 *
 * @throws TargetUnreachableError if the page never loads
 * @throws ExhaustedRetriesError if the challenge is still up after every round
 * @throws PageReplacementError if a crashed page cannot be replaced
 */
export async function navigateAndResolve(
  session: NavigationSession,
  url: string,
  options: NavigateOptions = {},
  dependencies: Partial<NavigatorDependencies> = {}
): Promise<NavigationResult> {
  const {
    challengeType: requestedType = "auto",
    navigationRetries = config.navigationRetries,
    navigationTimeoutMs = config.navigationTimeoutMs,
    ...solveOptions
  } = options;
  const logger = dependencies.logger ?? defaultLogger;
  const solve = dependencies.solve ?? solveCaptcha;
  const detectType =
    dependencies.detectType ?? ((queryable: Queryable) => detectChallengeType(queryable, { logger }));
  const sleep = dependencies.sleep ?? defaultSleep;
  const rounds = Math.max(1, navigationRetries);

  for (let round = 1; round <= rounds; round++) {
    const queryable = await openTarget(session, url, rounds, navigationTimeoutMs, logger);

    const challengeType =
      requestedType === "auto" ? await detectType(queryable) : requestedType;
    if (!challengeType) {
      logger.info({ url, round }, "No challenge detected on target");
      return { url, challengeType: null, resolved: true, attempts: round };
    }

    const resolved = await solve(queryable, session, { ...solveOptions, challengeType });
    if (resolved) {
      logger.info({ url, challengeType, round }, "Challenge resolved on target");
      return { url, challengeType, resolved: true, attempts: round };
    }

    if (round < rounds) {
      const delay = NAVIGATION.RETRY_BASE_DELAY_MS + (round - 1) * NAVIGATION.RETRY_STEP_DELAY_MS;
      logger.warn(
        { url, challengeType, round, rounds, delay },
        "Challenge still present, navigating again"
      );
      await sleep(delay);
    }
  }

  throw new ExhaustedRetriesError(
    `Challenge on ${url} not resolved after ${rounds} navigation rounds`
  );
}

async function openTarget(
  session: NavigationSession,
  url: string,
  maxAttempts: number,
  timeoutMs: number,
  logger: Logger
): Promise<Queryable> {
  let lastError: string | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    for (const waitUntil of NAVIGATION.WAIT_UNTIL) {
      try {
        logger.debug({ attempt, url, waitUntil }, "Navigating to target");
        return await session.goto(url, waitUntil, timeoutMs);
      } catch (error) {
        lastError = errorMessage(error);

        if (error instanceof TargetCrashedError) {
          logger.warn({ error: lastError }, "Page or browser crashed. Creating new page...");
          await replacePage(session, logger);
          continue;
        }

        logger.debug({ attempt, waitUntil, error: lastError }, "Navigation failed");
      }
    }
  }

  logger.error({ url, maxAttempts, error: lastError }, "Failed to navigate to target");
  throw new TargetUnreachableError(
    `Failed to navigate to ${url} after ${maxAttempts} attempts: ${lastError ?? "unknown error"}`
  );
}

async function replacePage(session: NavigationSession, logger: Logger): Promise<void> {
  try {
    await session.newPage();
  } catch (error) {
    logger.error({ error: errorMessage(error) }, "Failed to create new page after crash");
    throw new PageReplacementError(
      `Failed to create new page after crash: ${errorMessage(error)}`
    );
  }
}
