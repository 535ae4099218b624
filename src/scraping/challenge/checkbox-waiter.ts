/**
 * Checkbox Readiness Waiter
 *
 * Polls the challenge iframes until one of them shows a visible checkbox.
 * Checkboxes are re-collected every round: the widget re-renders while it
 * runs its own checks, so a handle found in round one may be gone by round
 * two, and visibility can flip between discovery and click.
 *
 * The widget shows at most one active checkbox, so the first visible one
 * wins.
 */
import { CHALLENGE } from "../../config/constants";
import { errorMessage } from "../../shared/errors/challenge.errors";
import { CheckboxCandidate } from "../../shared/types/challenge.types";
import { FrameRef } from "../../shared/types/dom.types";
import { sleep as defaultSleep } from "../../shared/utils/retry";
import { logger as defaultLogger, Logger } from "../../monitoring/logger";
import { findInShadow } from "./shadow-locator";

export interface WaiterOptions {
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  selector?: string;
}

/**
 * @param delayMs - Pause between polling rounds
 * @param maxAttempts - Polling rounds; values below 1 count as 1
 * @returns The first visible checkbox, or null once the rounds run out
 */
export async function waitForReadyCheckbox(
  iframes: FrameRef[],
  delayMs: number,
  maxAttempts: number,
  options: WaiterOptions = {}
): Promise<CheckboxCandidate | null> {
  const logger = options.logger ?? defaultLogger;
  const wait = options.sleep ?? defaultSleep;
  const selector = options.selector ?? CHALLENGE.CHECKBOX_SELECTOR;
  const attempts = Math.max(1, maxAttempts);

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      const candidates = await collectCheckboxes(iframes, selector, logger);
      logger.debug(
        { attempt, checkboxes: candidates.length, iframes: iframes.length },
        "Collected checkboxes from challenge iframes"
      );

      const ready = await firstVisible(candidates);
      if (ready) {
        logger.debug({ attempt }, "Checkbox is visible and ready to be clicked");
        return ready;
      }
    } catch (error) {
      logger.debug(
        { attempt, error: errorMessage(error) },
        "Error while waiting for checkbox"
      );
    }

    if (attempt < attempts) {
      logger.debug({ attempt, delayMs }, "Waiting for challenge checkbox");
      await wait(delayMs);
    }
  }

  logger.debug({ attempts }, "Max attempts reached while waiting for checkbox");
  return null;
}

async function collectCheckboxes(
  iframes: FrameRef[],
  selector: string,
  logger: Logger
): Promise<CheckboxCandidate[]> {
  const candidates: CheckboxCandidate[] = [];

  for (const iframe of iframes) {
    try {
      if (iframe.isDetached()) continue;

      const checkboxes = await findInShadow(iframe, selector, logger);
      for (const checkbox of checkboxes) {
        candidates.push({ iframe, checkbox });
      }
    } catch (error) {
      logger.debug(
        { error: errorMessage(error) },
        "Error searching for checkboxes in iframe"
      );
    }
  }

  return candidates;
}

async function firstVisible(
  candidates: CheckboxCandidate[]
): Promise<CheckboxCandidate | null> {
  for (const candidate of candidates) {
    if (await candidate.checkbox.isVisible()) return candidate;
  }
  return null;
}
