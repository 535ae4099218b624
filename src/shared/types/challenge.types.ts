/**
 * Challenge Engine Types
 *
 * Options, step results and state names shared by the detector,
 * locator, waiter and resolver.
 */
import { ElementRef, FrameRef, Queryable } from "./dom.types";

export const CHALLENGE_TYPES = ["interstitial", "turnstile"] as const;
export type ChallengeType = (typeof CHALLENGE_TYPES)[number];

export const VERIFICATION_MODES = ["indicator-absent", "success-marker"] as const;
/**
 * How a click is confirmed:
 * - indicator-absent: the challenge indicators are gone from the page
 * - success-marker: the widget iframe shows its success element
 */
export type VerificationMode = (typeof VERIFICATION_MODES)[number];

/** A visible checkbox and the iframe that owns it */
export interface CheckboxCandidate {
  iframe: FrameRef;
  checkbox: ElementRef;
}

/**
 * Caller-facing options for one resolution call.
 * Everything except challengeType has a default.
 */
export interface ResolveOptions {
  challengeType: ChallengeType;
  expectedContentSelector?: string | null;
  solveAttempts?: number;
  solveClickDelaySeconds?: number;
  waitCheckboxAttempts?: number;
  waitCheckboxDelaySeconds?: number;
  checkboxClickAttempts?: number;
  attemptDelaySeconds?: number;
  drainDelaySeconds?: number;
  verification?: VerificationMode;
}

/** ResolveOptions after validation and defaulting */
export interface ResolveSettings {
  challengeType: ChallengeType;
  expectedContentSelector: string | null;
  solveAttempts: number;
  solveClickDelaySeconds: number;
  waitCheckboxAttempts: number;
  waitCheckboxDelaySeconds: number;
  checkboxClickAttempts: number;
  attemptDelaySeconds: number;
  drainDelaySeconds: number;
  verification: VerificationMode;
}

/** Outcome of one resolver step */
export type StepResult<T> =
  | { kind: "found"; value: T }
  | { kind: "not-found"; reason: string }
  | { kind: "transient"; reason: string };

export type ResolverStateName =
  | "detecting"
  | "locating-iframes"
  | "waiting-checkbox"
  | "clicking"
  | "verifying"
  | "retry"
  | "solved"
  | "exhausted";

export type ResolverState =
  | { name: "detecting" }
  | { name: "locating-iframes" }
  | { name: "waiting-checkbox"; iframes: FrameRef[] }
  | { name: "clicking"; candidate: CheckboxCandidate }
  | { name: "verifying"; candidate: CheckboxCandidate }
  | { name: "retry"; reason: string }
  | { name: "solved"; reason: string }
  | { name: "exhausted" };

export interface StateTransition {
  runId: string;
  attempt: number;
  challengeType: ChallengeType;
  from: ResolverStateName | null;
  to: ResolverStateName;
  reason?: string;
}

/** A run that ended by throwing rather than with solved or exhausted */
export interface RunAbort {
  runId: string;
  attempt: number;
  challengeType: ChallengeType;
  error: unknown;
}

/**
 * Called on every resolver state change. A TargetCrashedError thrown here
 * makes the resolver replace its page; other errors are logged.
 */
export interface TransitionObserver {
  name: string;
  onTransition(transition: StateTransition, queryable: Queryable): Promise<void> | void;
  onRunAborted?(abort: RunAbort): Promise<void> | void;
}
