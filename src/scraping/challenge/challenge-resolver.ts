/**
 * Challenge Resolver: click-and-verify state machine
 *
 * Drives one resolution call through explicit states:
 *
 *   detecting ──► solved
 *       │
 *       ▼
 *   locating-iframes ──► waiting-checkbox ──► clicking ──► verifying ──► solved
 *       │                      │                  │            │
 *       └──────────────────────┴──────────────────┴────────────┴──► retry
 *
 *   retry ──► detecting (next attempt) | exhausted
 *
 * A crashed page is replaced and the run goes on with the replacement.
 * Detection gets one fresh look at the replacement within the same attempt;
 * a crash while clicking or verifying ends the attempt.
 *
 * Every attempt re-reads the live page; nothing found in one attempt is
 * reused by the next, because the widget replaces its frame tree freely.
 *
 * "Could not solve" is a false result, never an exception. Errors that
 * escape are bad options (rejected before any page access), a crashed
 * page that cannot be replaced, and driver errors with no recovery.
 */
import { v4 as uuidv4 } from "uuid";
import { CHALLENGE } from "../../config/constants";
import {
  errorMessage,
  LoadTimeoutError,
  PageReplacementError,
  TargetCrashedError,
} from "../../shared/errors/challenge.errors";
import {
  ChallengeType,
  CheckboxCandidate,
  ResolveOptions,
  ResolverState,
  ResolverStateName,
  ResolveSettings,
  RunAbort,
  StateTransition,
  StepResult,
  TransitionObserver,
} from "../../shared/types/challenge.types";
import { FrameRef, Queryable, SessionManager } from "../../shared/types/dom.types";
import { secondsToMs, sleep as defaultSleep } from "../../shared/utils/retry";
import { logger as defaultLogger, Logger } from "../../monitoring/logger";
import { metrics } from "../../monitoring/metrics.collector";
import { detectChallenge } from "./challenge-detector";
import { waitForReadyCheckbox } from "./checkbox-waiter";
import { detectExpectedContent } from "./expected-content";
import { createMetricsObserver, createPageTextProbe } from "./observers";
import { validateResolveOptions } from "./options-validator";
import { findIframesInShadow, findInShadow } from "./shadow-locator";

/**
 * Collaborators the resolver calls. Defaults are the real detector,
 * locator and waiter; tests replace them to count calls.
 */
export interface ResolverDependencies {
  detectChallenge(queryable: Queryable, challengeType: ChallengeType): Promise<boolean>;
  detectExpectedContent(queryable: Queryable, selector: string | null): Promise<boolean>;
  findChallengeIframes(queryable: Queryable): Promise<FrameRef[]>;
  waitForReadyCheckbox(
    iframes: FrameRef[],
    delayMs: number,
    maxAttempts: number
  ): Promise<CheckboxCandidate | null>;
  hasSuccessMarker(iframe: FrameRef): Promise<boolean>;
  sleep(ms: number): Promise<void>;
  createRunId(): string;
}

export interface ResolverOptions {
  logger?: Logger;
  /** Replaces the default page text probe and metrics observer */
  observers?: TransitionObserver[];
  dependencies?: Partial<ResolverDependencies>;
}

type ActiveState = Exclude<ResolverState, { name: "solved" } | { name: "exhausted" }>;

interface ResolveRun {
  runId: string;
  settings: ResolveSettings;
  /** Replaced when the page behind it crashes */
  queryable: Queryable;
  attempt: number;
  /** Set once the current attempt has re-run detection on a replacement page */
  redetected: boolean;
  current: ResolverStateName | null;
  lastKnownUrl: string;
  log: Logger;
}

function defaultDependencies(
  logger: Logger,
  sleep: (ms: number) => Promise<void>
): ResolverDependencies {
  return {
    detectChallenge: (queryable, challengeType) =>
      detectChallenge(queryable, challengeType, { logger, sleep }),
    detectExpectedContent: (queryable, selector) =>
      detectExpectedContent(queryable, selector),
    findChallengeIframes: (queryable) =>
      findIframesInShadow(queryable, CHALLENGE.IFRAME_SRC_PREFIX, logger),
    waitForReadyCheckbox: (iframes, delayMs, maxAttempts) =>
      waitForReadyCheckbox(iframes, delayMs, maxAttempts, { logger, sleep }),
    hasSuccessMarker: async (iframe) => {
      if (iframe.isDetached()) return false;
      const markers = await findInShadow(iframe, CHALLENGE.SUCCESS_MARKER_SELECTOR, logger);
      return markers.length > 0;
    },
    sleep,
    createRunId: () => uuidv4(),
  };
}

export class ChallengeResolver {
  private readonly logger: Logger;
  private readonly deps: ResolverDependencies;
  private readonly observers: TransitionObserver[];

  constructor(
    private readonly sessionManager: SessionManager,
    options: ResolverOptions = {}
  ) {
    this.logger = options.logger ?? defaultLogger;
    const sleep = options.dependencies?.sleep ?? defaultSleep;
    this.deps = {
      ...defaultDependencies(this.logger, sleep),
      ...options.dependencies,
    };
    this.observers = options.observers ?? [
      createPageTextProbe(this.logger),
      createMetricsObserver(metrics),
    ];
  }

  /**
   * Clear the challenge on the page behind `queryable`.
   *
   * @returns true when the challenge was cleared or never showed,
   *          false when the attempt budget ran out
   * @throws InvalidChallengeConfigError for bad options
   * @throws PageReplacementError when a crashed page cannot be replaced
   */
  async resolve(queryable: Queryable, options: ResolveOptions): Promise<boolean> {
    const settings = validateResolveOptions(options);
    const runId = this.deps.createRunId();
    const run: ResolveRun = {
      runId,
      settings,
      queryable,
      attempt: 1,
      redetected: false,
      current: null,
      lastKnownUrl: queryable.url(),
      log: this.logger.child({ runId, challengeType: settings.challengeType }),
    };

    run.log.debug({ settings }, "Starting challenge solving by click");

    try {
      let state: ResolverState = { name: "detecting" };
      await this.enter(run, state);

      for (;;) {
        if (state.name === "solved") {
          run.log.debug({ attempt: run.attempt, reason: state.reason }, "Solved successfully");
          return true;
        }

        if (state.name === "exhausted") {
          run.log.debug(
            { attempts: settings.solveAttempts },
            "Max solving attempts reached, giving up"
          );
          await this.pause(settings.drainDelaySeconds);
          return false;
        }

        state = await this.step(run, state);
        await this.enter(run, state);
      }
    } catch (error) {
      await this.abort(run, error);
      throw error;
    }
  }

  private async step(run: ResolveRun, state: ActiveState): Promise<ResolverState> {
    switch (state.name) {
      case "detecting":
        return this.detecting(run);
      case "locating-iframes":
        return this.afterStep(run, await this.locateIframes(run), (iframes) => ({
          name: "waiting-checkbox",
          iframes,
        }));
      case "waiting-checkbox":
        return this.afterStep(
          run,
          await this.waitForCheckbox(run, state.iframes),
          (candidate) => ({ name: "clicking", candidate })
        );
      case "clicking":
        return this.afterStep(run, await this.click(run, state.candidate), (candidate) => ({
          name: "verifying",
          candidate,
        }));
      case "verifying":
        return this.afterStep(run, await this.verify(run, state.candidate), (reason) => ({
          name: "solved",
          reason,
        }));
      case "retry":
        return this.retry(run);
    }
  }

  private afterStep<T>(
    run: ResolveRun,
    result: StepResult<T>,
    next: (value: T) => ResolverState
  ): ResolverState {
    switch (result.kind) {
      case "found":
        return next(result.value);
      case "not-found":
      case "transient":
        run.log.debug({ attempt: run.attempt, kind: result.kind }, result.reason);
        return { name: "retry", reason: result.reason };
    }
  }

  private async detecting(run: ResolveRun): Promise<ResolverState> {
    const { challengeType, expectedContentSelector } = run.settings;
    run.lastKnownUrl = run.queryable.url();

    let challengePresent: boolean;
    let expectedContentPresent: boolean;
    try {
      challengePresent = await this.deps.detectChallenge(run.queryable, challengeType);
      expectedContentPresent = await this.deps.detectExpectedContent(
        run.queryable,
        expectedContentSelector
      );
    } catch (error) {
      if (!(error instanceof TargetCrashedError)) throw error;
      await this.replacePage(run, error);
      // One fresh look at the replacement per attempt; a second crash spends it
      if (!run.redetected) {
        run.redetected = true;
        return { name: "detecting" };
      }
      return { name: "retry", reason: "page crashed during detection" };
    }

    if (!challengePresent) {
      return { name: "solved", reason: "no challenge detected" };
    }
    if (expectedContentPresent) {
      return { name: "solved", reason: "expected content present" };
    }

    await this.waitForDomContent(run);
    return { name: "locating-iframes" };
  }

  private async waitForDomContent(run: ResolveRun): Promise<void> {
    try {
      await run.queryable.waitForLoadState(
        "domcontentloaded",
        CHALLENGE.LOAD_STATE_TIMEOUT_MS
      );
    } catch (error) {
      if (error instanceof LoadTimeoutError) {
        run.log.debug("Page did not reach 'domcontentloaded'");
        return;
      }
      if (error instanceof TargetCrashedError) {
        await this.replacePage(run, error);
        return;
      }
      throw error;
    }
  }

  private async locateIframes(run: ResolveRun): Promise<StepResult<FrameRef[]>> {
    const iframes = await this.deps.findChallengeIframes(run.queryable);
    if (iframes.length === 0) {
      return { kind: "not-found", reason: "Challenge iframes not found" };
    }
    return { kind: "found", value: iframes };
  }

  private async waitForCheckbox(
    run: ResolveRun,
    iframes: FrameRef[]
  ): Promise<StepResult<CheckboxCandidate>> {
    const { waitCheckboxDelaySeconds, waitCheckboxAttempts } = run.settings;
    const candidate = await this.deps.waitForReadyCheckbox(
      iframes,
      secondsToMs(waitCheckboxDelaySeconds),
      waitCheckboxAttempts
    );
    if (!candidate) {
      return { kind: "not-found", reason: "Challenge checkbox not found or not ready" };
    }
    run.log.debug("Found checkbox in challenge iframe");
    return { kind: "found", value: candidate };
  }

  /**
   * Click with immediate retries. Failures here are stale-element races,
   * so waiting between clicks does not help.
   */
  private async click(
    run: ResolveRun,
    candidate: CheckboxCandidate
  ): Promise<StepResult<CheckboxCandidate>> {
    const { checkboxClickAttempts, solveClickDelaySeconds } = run.settings;

    for (let clickAttempt = 1; clickAttempt <= checkboxClickAttempts; clickAttempt++) {
      try {
        await candidate.checkbox.click();
        run.log.debug({ clickAttempt }, "Checkbox clicked successfully");
        await this.pause(solveClickDelaySeconds);
        return { kind: "found", value: candidate };
      } catch (error) {
        if (error instanceof TargetCrashedError) {
          await this.replacePage(run, error);
          return { kind: "transient", reason: "Page crashed during click" };
        }
        run.log.debug(
          { clickAttempt, checkboxClickAttempts, error: errorMessage(error) },
          "Error clicking checkbox"
        );
      }
    }

    return {
      kind: "transient",
      reason: `Failed to click checkbox after ${checkboxClickAttempts} attempts`,
    };
  }

  private async verify(
    run: ResolveRun,
    candidate: CheckboxCandidate
  ): Promise<StepResult<string>> {
    const { challengeType, expectedContentSelector, verification } = run.settings;

    let challengeCleared: boolean;
    let expectedContentPresent: boolean;
    try {
      challengeCleared =
        challengeType === "turnstile" && verification === "success-marker"
          ? await this.deps.hasSuccessMarker(candidate.iframe)
          : !(await this.deps.detectChallenge(run.queryable, challengeType));
      expectedContentPresent = await this.deps.detectExpectedContent(
        run.queryable,
        expectedContentSelector
      );
    } catch (error) {
      if (!(error instanceof TargetCrashedError)) throw error;
      await this.replacePage(run, error);
      return { kind: "transient", reason: "Page crashed during verification" };
    }

    run.log.debug(
      { challengeCleared, expectedContentPresent, verification },
      `Verified ${challengeType} challenge`
    );

    if (challengeCleared) return { kind: "found", value: "challenge cleared after click" };
    if (expectedContentPresent) return { kind: "found", value: "expected content present" };
    return { kind: "not-found", reason: "Failed to solve challenge" };
  }

  private async retry(run: ResolveRun): Promise<ResolverState> {
    if (run.attempt >= run.settings.solveAttempts) {
      return { name: "exhausted" };
    }

    await this.pause(run.settings.attemptDelaySeconds);
    run.attempt++;
    run.redetected = false;
    run.log.debug(
      { attempt: run.attempt, solveAttempts: run.settings.solveAttempts },
      "Retrying to solve"
    );
    return { name: "detecting" };
  }

  private async enter(run: ResolveRun, next: ResolverState): Promise<void> {
    const transition: StateTransition = {
      runId: run.runId,
      attempt: run.attempt,
      challengeType: run.settings.challengeType,
      from: run.current,
      to: next.name,
      reason: "reason" in next ? next.reason : undefined,
    };
    run.current = next.name;

    for (const observer of this.observers) {
      try {
        await observer.onTransition(transition, run.queryable);
      } catch (error) {
        if (error instanceof TargetCrashedError) {
          await this.replacePage(run, error);
          continue;
        }
        run.log.warn(
          { observer: observer.name, error: errorMessage(error) },
          "Transition observer failed"
        );
      }
    }
  }

  /** Tell observers the run ended with an error instead of a result */
  private async abort(run: ResolveRun, error: unknown): Promise<void> {
    const aborted: RunAbort = {
      runId: run.runId,
      attempt: run.attempt,
      challengeType: run.settings.challengeType,
      error,
    };

    for (const observer of this.observers) {
      if (!observer.onRunAborted) continue;
      try {
        await observer.onRunAborted(aborted);
      } catch (observerError) {
        run.log.warn(
          { observer: observer.name, error: errorMessage(observerError) },
          "Transition observer failed on abort"
        );
      }
    }
  }

  /**
   * Swap in a fresh page for the rest of the run.
   * @throws PageReplacementError when the session cannot open one
   */
  private async replacePage(run: ResolveRun, cause: TargetCrashedError): Promise<void> {
    const resumeUrl =
      run.lastKnownUrl && run.lastKnownUrl !== "about:blank" ? run.lastKnownUrl : undefined;
    run.log.warn(
      { error: cause.message, resumeUrl },
      "Page or browser crashed. Creating new page..."
    );

    try {
      run.queryable = await this.sessionManager.newPage(resumeUrl);
    } catch (error) {
      run.log.error(
        { error: errorMessage(error) },
        "Failed to create new page after crash, the browser likely crashed"
      );
      throw new PageReplacementError(
        `Failed to create new page after crash: ${errorMessage(error)}`
      );
    }
  }

  private async pause(seconds: number): Promise<void> {
    if (seconds <= 0) return;
    await this.deps.sleep(secondsToMs(seconds));
  }
}

/**
 * Clear the checkbox challenge on a page. See ChallengeResolver.resolve.
 */
export async function resolveChallenge(
  queryable: Queryable,
  sessionManager: SessionManager,
  options: ResolveOptions,
  resolverOptions: ResolverOptions = {}
): Promise<boolean> {
  return new ChallengeResolver(sessionManager, resolverOptions).resolve(queryable, options);
}
