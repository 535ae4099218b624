/**
 * Transition Observers
 *
 * Built-in hooks for the resolver's state changes. Diagnostics live here
 * so the resolver's control flow only deals with the challenge itself.
 */
import { PROBE } from "../../config/constants";
import {
  ResolverStateName,
  RunAbort,
  StateTransition,
  TransitionObserver,
} from "../../shared/types/challenge.types";
import { Queryable } from "../../shared/types/dom.types";
import { logger as defaultLogger, Logger } from "../../monitoring/logger";
import { MetricsCollector } from "../../monitoring/metrics.collector";

const PROBED_STATES: ReadonlySet<ResolverStateName> = new Set([
  "detecting",
  "verifying",
  "solved",
]);

/**
 * Logs the start of the page's body text when debug logging is on.
 * Reading the body is what surfaces a crashed page: the TargetCrashedError
 * it throws propagates to the resolver, which swaps in a new page.
 */
export function createPageTextProbe(
  logger: Logger = defaultLogger,
  maxChars: number = PROBE.BODY_TEXT_CHARS
): TransitionObserver {
  return {
    name: "page-text-probe",
    async onTransition(transition: StateTransition, queryable: Queryable) {
      if (!logger.isLevelEnabled("debug")) return;
      if (!PROBED_STATES.has(transition.to)) return;

      const body = await queryable.bodyText();
      logger.debug(
        { runId: transition.runId, state: transition.to, body: body.slice(0, maxChars) },
        "Current page body"
      );
    },
  };
}

/**
 * Feeds transition counts, results and run durations to the metrics collector.
 * Runs that throw are counted with result "error".
 */
export function createMetricsObserver(metrics: MetricsCollector): TransitionObserver {
  const startedAt = new Map<string, number>();

  const finish = (runId: string): void => {
    const started = startedAt.get(runId);
    if (started === undefined) return;
    metrics.recordDuration((Date.now() - started) / 1000);
    startedAt.delete(runId);
  };

  return {
    name: "metrics",
    onTransition(transition: StateTransition) {
      if (transition.from === null) {
        startedAt.set(transition.runId, Date.now());
      }

      metrics.increment("challenge_state_transitions_total", { state: transition.to });

      if (transition.to !== "solved" && transition.to !== "exhausted") return;

      metrics.increment("challenge_resolve_total", {
        result: transition.to === "solved" ? "success" : "failure",
        challenge_type: transition.challengeType,
      });

      finish(transition.runId);
    },
    onRunAborted(abort: RunAbort) {
      metrics.increment("challenge_resolve_total", {
        result: "error",
        challenge_type: abort.challengeType,
      });
      finish(abort.runId);
    },
  };
}
