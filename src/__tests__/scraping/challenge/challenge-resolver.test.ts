import { describe, expect, it, jest } from "@jest/globals";
import {
  ChallengeResolver,
  ResolverDependencies,
  resolveChallenge,
} from "../../../scraping/challenge/challenge-resolver";
import {
  InvalidChallengeConfigError,
  LoadTimeoutError,
  PageReplacementError,
  TargetCrashedError,
} from "../../../shared/errors/challenge.errors";
import {
  CheckboxCandidate,
  RunAbort,
  StateTransition,
  TransitionObserver,
} from "../../../shared/types/challenge.types";
import { Queryable, SessionManager } from "../../../shared/types/dom.types";
import { checkbox, FakeFrame } from "../../helpers/fake-dom";

const PAGE_URL = "https://example.test/protected";

function setup() {
  const page = new FakeFrame({ url: PAGE_URL });
  const iframe = new FakeFrame({
    url: "https://challenges.cloudflare.com/cdn-cgi/challenge-platform/h/b/turnstile",
  });
  const box = checkbox();
  const candidate: CheckboxCandidate = { iframe, checkbox: box };
  const replacement = new FakeFrame({ url: PAGE_URL });

  const deps = {
    detectChallenge: jest
      .fn<ResolverDependencies["detectChallenge"]>()
      .mockResolvedValue(true),
    detectExpectedContent: jest
      .fn<ResolverDependencies["detectExpectedContent"]>()
      .mockResolvedValue(false),
    findChallengeIframes: jest
      .fn<ResolverDependencies["findChallengeIframes"]>()
      .mockResolvedValue([iframe]),
    waitForReadyCheckbox: jest
      .fn<ResolverDependencies["waitForReadyCheckbox"]>()
      .mockResolvedValue(candidate),
    hasSuccessMarker: jest
      .fn<ResolverDependencies["hasSuccessMarker"]>()
      .mockResolvedValue(false),
    sleep: jest.fn<ResolverDependencies["sleep"]>().mockResolvedValue(undefined),
    createRunId: jest.fn<ResolverDependencies["createRunId"]>().mockReturnValue("run-1"),
  };
  const newPage = jest.fn<SessionManager["newPage"]>().mockResolvedValue(replacement);
  const sessionManager: SessionManager = { newPage };

  const transitions: StateTransition[] = [];
  const recorder: TransitionObserver = {
    name: "recorder",
    onTransition: (transition) => {
      transitions.push(transition);
    },
  };

  const resolver = new ChallengeResolver(sessionManager, {
    dependencies: deps,
    observers: [recorder],
  });

  return { page, iframe, box, candidate, replacement, deps, newPage, transitions, resolver };
}

describe("ChallengeResolver", () => {
  describe("when no challenge is showing", () => {
    it("should resolve immediately without touching iframes", async () => {
      const { page, deps, resolver, transitions } = setup();
      deps.detectChallenge.mockResolvedValue(false);

      expect(await resolver.resolve(page, { challengeType: "interstitial" })).toBe(true);
      expect(deps.findChallengeIframes).not.toHaveBeenCalled();
      expect(deps.sleep).not.toHaveBeenCalled();
      expect(transitions.map((t) => t.to)).toEqual(["detecting", "solved"]);
      expect(transitions[1].reason).toBe("no challenge detected");
    });

    it("should resolve when the expected content is already present", async () => {
      const { page, deps, resolver } = setup();
      deps.detectExpectedContent.mockResolvedValue(true);

      const resolved = await resolver.resolve(page, {
        challengeType: "turnstile",
        expectedContentSelector: "#results",
      });

      expect(resolved).toBe(true);
      expect(deps.detectExpectedContent).toHaveBeenCalledWith(page, "#results");
      expect(deps.findChallengeIframes).not.toHaveBeenCalled();
    });
  });

  describe("click and verify", () => {
    it("should click the ready checkbox and confirm the challenge is gone", async () => {
      const { page, box, deps, resolver, transitions } = setup();
      deps.detectChallenge.mockResolvedValueOnce(true).mockResolvedValueOnce(false);

      const resolved = await resolver.resolve(page, {
        challengeType: "interstitial",
        solveClickDelaySeconds: 6,
      });

      expect(resolved).toBe(true);
      expect(box.clicks).toBe(1);
      expect(deps.detectChallenge).toHaveBeenCalledTimes(2);
      expect(deps.sleep.mock.calls).toEqual([[6000]]);
      expect(transitions.map((t) => t.to)).toEqual([
        "detecting",
        "locating-iframes",
        "waiting-checkbox",
        "clicking",
        "verifying",
        "solved",
      ]);
    });

    it("should pass the waiter budget in milliseconds", async () => {
      const { page, iframe, deps, resolver } = setup();
      deps.detectChallenge.mockResolvedValueOnce(true).mockResolvedValueOnce(false);

      await resolver.resolve(page, {
        challengeType: "turnstile",
        waitCheckboxAttempts: 4,
        waitCheckboxDelaySeconds: 1.5,
      });

      expect(deps.waitForReadyCheckbox).toHaveBeenCalledWith([iframe], 1500, 4);
    });

    it("should retry the click immediately when it fails", async () => {
      const { page, box, deps, resolver } = setup();
      box.clickErrors.push(new Error("Node is detached from document"));
      deps.detectChallenge.mockResolvedValueOnce(true).mockResolvedValueOnce(false);

      const resolved = await resolver.resolve(page, {
        challengeType: "interstitial",
        solveClickDelaySeconds: 0,
      });

      expect(resolved).toBe(true);
      expect(box.clicks).toBe(2);
      expect(deps.sleep).not.toHaveBeenCalled();
    });

    it("should skip verification when every click fails", async () => {
      const { page, box, deps, resolver, transitions } = setup();
      box.clickErrors.push(new Error("a"), new Error("b"), new Error("c"));

      const resolved = await resolver.resolve(page, {
        challengeType: "interstitial",
        solveAttempts: 1,
        checkboxClickAttempts: 3,
        drainDelaySeconds: 0,
      });

      expect(resolved).toBe(false);
      expect(box.clicks).toBe(3);
      expect(deps.detectChallenge).toHaveBeenCalledTimes(1);
      expect(deps.sleep).not.toHaveBeenCalled();
      expect(transitions.map((t) => t.to)).toEqual([
        "detecting",
        "locating-iframes",
        "waiting-checkbox",
        "clicking",
        "retry",
        "exhausted",
      ]);
      expect(transitions[4].reason).toBe("Failed to click checkbox after 3 attempts");
    });

    it("should accept the expected content as proof of success", async () => {
      const { page, deps, resolver } = setup();
      deps.detectExpectedContent.mockResolvedValueOnce(false).mockResolvedValueOnce(true);

      const resolved = await resolver.resolve(page, {
        challengeType: "interstitial",
        expectedContentSelector: "#results",
        solveClickDelaySeconds: 0,
      });

      expect(resolved).toBe(true);
      expect(deps.detectChallenge).toHaveBeenCalledTimes(2);
    });

    it("should verify a turnstile click by its success marker when asked to", async () => {
      const { page, iframe, deps, resolver } = setup();
      deps.hasSuccessMarker.mockResolvedValue(true);

      const resolved = await resolver.resolve(page, {
        challengeType: "turnstile",
        verification: "success-marker",
        solveClickDelaySeconds: 0,
      });

      expect(resolved).toBe(true);
      expect(deps.hasSuccessMarker).toHaveBeenCalledWith(iframe);
      expect(deps.detectChallenge).toHaveBeenCalledTimes(1);
    });

    it("should verify the interstitial by its indicators even in success-marker mode", async () => {
      const { page, deps, resolver } = setup();
      deps.detectChallenge.mockResolvedValueOnce(true).mockResolvedValueOnce(false);

      const resolved = await resolver.resolve(page, {
        challengeType: "interstitial",
        verification: "success-marker",
        solveClickDelaySeconds: 0,
      });

      expect(resolved).toBe(true);
      expect(deps.hasSuccessMarker).not.toHaveBeenCalled();
    });
  });

  describe("retry budget", () => {
    it("should give up after solveAttempts with a delay between attempts", async () => {
      const { page, deps, resolver, transitions } = setup();
      deps.findChallengeIframes.mockResolvedValue([]);

      const resolved = await resolver.resolve(page, {
        challengeType: "interstitial",
        solveAttempts: 3,
        attemptDelaySeconds: 5,
        drainDelaySeconds: 0,
      });

      expect(resolved).toBe(false);
      expect(deps.findChallengeIframes).toHaveBeenCalledTimes(3);
      expect(deps.waitForReadyCheckbox).not.toHaveBeenCalled();
      expect(deps.sleep.mock.calls).toEqual([[5000], [5000]]);
      expect(transitions[transitions.length - 1]).toEqual({
        runId: "run-1",
        attempt: 3,
        challengeType: "interstitial",
        from: "retry",
        to: "exhausted",
        reason: undefined,
      });
    });

    it("should drain before returning false", async () => {
      const { page, box, deps, resolver } = setup();
      deps.waitForReadyCheckbox.mockResolvedValue(null);

      const resolved = await resolver.resolve(page, { challengeType: "turnstile" });

      expect(resolved).toBe(false);
      expect(box.clicks).toBe(0);
      expect(deps.waitForReadyCheckbox).toHaveBeenCalledTimes(3);
      expect(deps.sleep.mock.calls).toEqual([[5000], [5000], [2000]]);
    });

    it("should re-detect on every attempt", async () => {
      const { page, deps, resolver } = setup();
      deps.detectChallenge
        .mockResolvedValueOnce(true)
        .mockResolvedValueOnce(true)
        .mockResolvedValueOnce(false);

      const resolved = await resolver.resolve(page, {
        challengeType: "interstitial",
        solveClickDelaySeconds: 0,
        attemptDelaySeconds: 0,
      });

      expect(resolved).toBe(true);
      expect(deps.findChallengeIframes).toHaveBeenCalledTimes(1);
      expect(deps.detectChallenge).toHaveBeenCalledTimes(3);
    });

    it("should detect once when resolving a page it already cleared", async () => {
      const { page, box, deps, resolver } = setup();
      deps.detectChallenge
        .mockResolvedValueOnce(true)
        .mockResolvedValueOnce(false)
        .mockResolvedValue(false);
      const options = { challengeType: "interstitial" as const, solveClickDelaySeconds: 0 };

      expect(await resolver.resolve(page, options)).toBe(true);
      deps.detectChallenge.mockClear();
      deps.findChallengeIframes.mockClear();

      expect(await resolver.resolve(page, options)).toBe(true);
      expect(deps.detectChallenge).toHaveBeenCalledTimes(1);
      expect(deps.findChallengeIframes).not.toHaveBeenCalled();
      expect(box.clicks).toBe(1);
    });

    it("should carry on when the page misses domcontentloaded", async () => {
      const { page, deps, resolver } = setup();
      page.loadError = new LoadTimeoutError();
      deps.detectChallenge.mockResolvedValueOnce(true).mockResolvedValueOnce(false);

      const resolved = await resolver.resolve(page, {
        challengeType: "interstitial",
        solveClickDelaySeconds: 0,
      });

      expect(resolved).toBe(true);
      expect(page.loadWaits).toEqual([{ state: "domcontentloaded", timeoutMs: 10000 }]);
    });
  });

  describe("option validation", () => {
    it("should reject a bad budget before touching the page", async () => {
      const { page, deps, resolver } = setup();

      await expect(
        resolver.resolve(page, { challengeType: "interstitial", solveAttempts: 0 })
      ).rejects.toBeInstanceOf(InvalidChallengeConfigError);
      await expect(
        resolver.resolve(page, { challengeType: "interstitial", attemptDelaySeconds: -1 })
      ).rejects.toBeInstanceOf(InvalidChallengeConfigError);
      expect(deps.detectChallenge).not.toHaveBeenCalled();
    });
  });

  describe("crash recovery", () => {
    it("should re-detect on the replacement page within the same attempt", async () => {
      const { page, replacement, deps, newPage, resolver, transitions } = setup();
      deps.detectChallenge.mockImplementation(async (queryable) => {
        if (queryable === page) throw new TargetCrashedError();
        return false;
      });

      const resolved = await resolver.resolve(page, {
        challengeType: "interstitial",
        solveAttempts: 1,
      });

      expect(resolved).toBe(true);
      expect(newPage).toHaveBeenCalledWith(PAGE_URL);
      expect(deps.detectChallenge).toHaveBeenCalledTimes(2);
      expect(deps.detectChallenge.mock.calls[1][0]).toBe(replacement);
      expect(deps.sleep).not.toHaveBeenCalled();
      expect(transitions.map((t) => t.to)).toEqual(["detecting", "detecting", "solved"]);
    });

    it("should spend the attempt when the replacement crashes too", async () => {
      const { page, deps, newPage, resolver } = setup();
      deps.detectChallenge.mockRejectedValue(new TargetCrashedError());

      const resolved = await resolver.resolve(page, {
        challengeType: "interstitial",
        solveAttempts: 2,
        attemptDelaySeconds: 0,
        drainDelaySeconds: 0,
      });

      expect(resolved).toBe(false);
      expect(deps.detectChallenge).toHaveBeenCalledTimes(4);
      expect(newPage).toHaveBeenCalledTimes(4);
    });

    it("should replace the page when it crashes during the click", async () => {
      const { page, box, replacement, deps, newPage, resolver } = setup();
      box.clickErrors.push(
        new TargetCrashedError("Target closed"),
        new TargetCrashedError("Target closed"),
        new TargetCrashedError("Target closed")
      );
      deps.detectChallenge.mockResolvedValueOnce(true).mockResolvedValueOnce(false);

      const resolved = await resolver.resolve(page, {
        challengeType: "turnstile",
        solveAttempts: 2,
        checkboxClickAttempts: 3,
        attemptDelaySeconds: 0,
      });

      expect(resolved).toBe(true);
      expect(box.clicks).toBe(1);
      expect(newPage).toHaveBeenCalledTimes(1);
      expect(newPage).toHaveBeenCalledWith(PAGE_URL);
      expect(deps.detectChallenge.mock.calls[1][0]).toBe(replacement);
    });

    it("should continue on the replacement page when a probe finds the page crashed", async () => {
      const { page, replacement, deps, newPage } = setup();
      deps.detectChallenge.mockResolvedValueOnce(true).mockResolvedValueOnce(false);
      const probed: Queryable[] = [];
      const probe: TransitionObserver = {
        name: "crash-on-verify",
        onTransition: async (transition, queryable) => {
          probed.push(queryable);
          if (transition.to === "verifying" && queryable === page) {
            throw new TargetCrashedError("Target crashed");
          }
        },
      };
      const resolver = new ChallengeResolver(
        { newPage },
        { dependencies: deps, observers: [probe] }
      );

      const resolved = await resolver.resolve(page, {
        challengeType: "interstitial",
        solveClickDelaySeconds: 0,
      });

      expect(resolved).toBe(true);
      expect(newPage).toHaveBeenCalledTimes(1);
      expect(newPage).toHaveBeenCalledWith(PAGE_URL);
      expect(deps.detectChallenge.mock.calls[0][0]).toBe(page);
      expect(deps.detectChallenge.mock.calls[1][0]).toBe(replacement);
      expect(probed[probed.length - 1]).toBe(replacement);
    });

    it("should open a blank replacement when the page had no usable URL", async () => {
      const { page, deps, newPage, resolver } = setup();
      page.urlValue = "about:blank";
      deps.detectChallenge
        .mockRejectedValueOnce(new TargetCrashedError())
        .mockResolvedValueOnce(false);

      await resolver.resolve(page, { challengeType: "interstitial" });

      expect(newPage).toHaveBeenCalledWith(undefined);
    });

    it("should fail when no replacement page can be opened", async () => {
      const { page, deps, newPage, resolver } = setup();
      deps.detectChallenge.mockRejectedValue(new TargetCrashedError());
      newPage.mockRejectedValue(new Error("Browser has disconnected"));

      await expect(
        resolver.resolve(page, { challengeType: "interstitial" })
      ).rejects.toThrow(
        new PageReplacementError("Failed to create new page after crash: Browser has disconnected")
      );
    });

    it("should propagate detection errors it cannot recover from", async () => {
      const { page, deps, resolver } = setup();
      deps.detectChallenge.mockRejectedValue(new Error("Protocol error"));

      await expect(
        resolver.resolve(page, { challengeType: "interstitial" })
      ).rejects.toThrow("Protocol error");
    });
  });

  describe("observers", () => {
    it("should log and ignore observer failures", async () => {
      const { page, deps } = setup();
      deps.detectChallenge.mockResolvedValue(false);
      const failing: TransitionObserver = {
        name: "failing",
        onTransition: () => {
          throw new Error("observer bug");
        },
      };
      const resolver = new ChallengeResolver(
        { newPage: jest.fn<SessionManager["newPage"]>() },
        { dependencies: deps, observers: [failing] }
      );

      expect(await resolver.resolve(page, { challengeType: "interstitial" })).toBe(true);
    });

    it("should tell observers when a run ends with an error", async () => {
      const { page, deps, newPage } = setup();
      deps.detectChallenge.mockRejectedValue(new TargetCrashedError());
      newPage.mockRejectedValue(new Error("Browser has disconnected"));
      const aborts: RunAbort[] = [];
      const watcher: TransitionObserver = {
        name: "watcher",
        onTransition: () => undefined,
        onRunAborted: (abort) => {
          aborts.push(abort);
        },
      };
      const resolver = new ChallengeResolver(
        { newPage },
        { dependencies: deps, observers: [watcher] }
      );

      await expect(
        resolver.resolve(page, { challengeType: "turnstile" })
      ).rejects.toBeInstanceOf(PageReplacementError);
      expect(aborts).toHaveLength(1);
      expect(aborts[0]).toMatchObject({ runId: "run-1", attempt: 1, challengeType: "turnstile" });
      expect(aborts[0].error).toBeInstanceOf(PageReplacementError);
    });

    it("should report the previous state on every transition", async () => {
      const { page, deps, resolver, transitions } = setup();
      deps.detectChallenge.mockResolvedValue(false);

      await resolver.resolve(page, { challengeType: "turnstile" });

      expect(transitions[0]).toEqual({
        runId: "run-1",
        attempt: 1,
        challengeType: "turnstile",
        from: null,
        to: "detecting",
        reason: undefined,
      });
      expect(transitions[1].from).toBe("detecting");
    });
  });
});

describe("resolveChallenge", () => {
  it("should run a resolver with the given dependencies", async () => {
    const { page, deps, newPage } = setup();
    deps.detectChallenge.mockResolvedValue(false);

    const resolved = await resolveChallenge(
      page,
      { newPage },
      { challengeType: "turnstile" },
      { dependencies: deps, observers: [] }
    );

    expect(resolved).toBe(true);
    expect(deps.detectChallenge).toHaveBeenCalledWith(page, "turnstile");
  });
});
