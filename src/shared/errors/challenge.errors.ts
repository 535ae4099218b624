/**
 * Custom Error Classes for Challenge Resolution
 *
 * Each error class maps to an ERROR_CODE in constants.ts.
 * The resolver uses these to decide between retrying locally, replacing
 * the page, logging and moving on, or giving up.
 */
import { ERROR_CODES, ErrorCode } from "../../config/constants";

/**
 * Base class for all challenge errors.
 * Includes an error code for classification in logs.
 */
export class ChallengeError extends Error {
  public readonly code: ErrorCode;
  public readonly retryable: boolean;

  constructor(message: string, code: ErrorCode, retryable: boolean = true) {
    super(message);
    this.name = "ChallengeError";
    this.code = code;
    this.retryable = retryable;
  }
}

/** A navigation destroyed the JS execution context mid-query */
export class DetectionTransientError extends ChallengeError {
  constructor(message: string = "Execution context was destroyed") {
    super(message, ERROR_CODES.CONTEXT_DESTROYED, true);
    this.name = "DetectionTransientError";
  }
}

/** The page did not reach the requested load state in time */
export class LoadTimeoutError extends ChallengeError {
  constructor(message: string = "Load state timeout") {
    super(message, ERROR_CODES.LOAD_TIMEOUT, true);
    this.name = "LoadTimeoutError";
  }
}

/** The page or browser behind a queryable was closed or crashed */
export class TargetCrashedError extends ChallengeError {
  constructor(message: string = "Target closed") {
    super(message, ERROR_CODES.TARGET_CRASHED, true);
    this.name = "TargetCrashedError";
  }
}

/** Click or other element operation failed (usually a stale element race) */
export class ElementInteractionError extends ChallengeError {
  constructor(message: string = "Element interaction failed") {
    super(message, ERROR_CODES.ELEMENT_INTERACTION, true);
    this.name = "ElementInteractionError";
  }
}

/** Challenge still present after the whole attempt budget was spent */
export class ExhaustedRetriesError extends ChallengeError {
  constructor(message: string = "Challenge not resolved after all attempts") {
    super(message, ERROR_CODES.EXHAUSTED_RETRIES, true);
    this.name = "ExhaustedRetriesError";
  }
}

/** Caller passed options the resolver cannot run with */
export class InvalidChallengeConfigError extends ChallengeError {
  constructor(message: string) {
    super(message, ERROR_CODES.INVALID_CONFIG, false);
    this.name = "InvalidChallengeConfigError";
  }
}

/** A crashed page could not be replaced; nothing left to drive */
export class PageReplacementError extends ChallengeError {
  constructor(message: string = "Failed to create a replacement page") {
    super(message, ERROR_CODES.PAGE_REPLACEMENT_FAILED, false);
    this.name = "PageReplacementError";
  }
}

/** Target URL could not be loaded (network error, DNS, timeout) */
export class TargetUnreachableError extends ChallengeError {
  constructor(message: string = "Target unreachable") {
    super(message, ERROR_CODES.TARGET_UNREACHABLE, true);
    this.name = "TargetUnreachableError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
