/**
 * Challenge Solver: provider/method dispatch
 *
 * Single entry point for callers that name the challenge provider and the
 * solving method. Only the checkbox provider and the click method exist
 * today; anything else is rejected before the page is touched.
 */
import { InvalidChallengeConfigError } from "../../shared/errors/challenge.errors";
import { ResolveOptions } from "../../shared/types/challenge.types";
import { Queryable, SessionManager } from "../../shared/types/dom.types";
import { logger } from "../../monitoring/logger";
import { ChallengeResolver, ResolverOptions } from "./challenge-resolver";

export const CAPTCHA_PROVIDERS = ["cloudflare"] as const;
export type CaptchaProvider = (typeof CAPTCHA_PROVIDERS)[number];

export const SOLVE_METHODS = ["click"] as const;
export type SolveMethod = (typeof SOLVE_METHODS)[number];

export interface SolveCaptchaOptions extends Omit<ResolveOptions, "challengeType"> {
  captchaType?: string;
  method?: string;
  /** Defaults to "interstitial" */
  challengeType?: ResolveOptions["challengeType"];
}

function isProvider(value: string): value is CaptchaProvider {
  return CAPTCHA_PROVIDERS.some((provider) => provider === value);
}

function isMethod(value: string): value is SolveMethod {
  return SOLVE_METHODS.some((method) => method === value);
}

/**
 * Solve the challenge on a page with the named provider and method.
 *
 * @returns true when solved or absent, false when attempts ran out
 * @throws InvalidChallengeConfigError for an unsupported provider, method
 *         or challenge type
 */
export async function solveCaptcha(
  queryable: Queryable,
  sessionManager: SessionManager,
  options: SolveCaptchaOptions = {},
  resolverOptions: ResolverOptions = {}
): Promise<boolean> {
  const {
    captchaType = "cloudflare",
    method = "click",
    challengeType = "interstitial",
    ...budget
  } = options;

  if (!isProvider(captchaType)) {
    throw new InvalidChallengeConfigError(
      `Unsupported captcha type: '${captchaType}'. Supported types are: ${CAPTCHA_PROVIDERS.join(", ")}`
    );
  }

  if (!isMethod(method)) {
    throw new InvalidChallengeConfigError(
      `Unsupported method '${method}' for ${captchaType} captcha. Supported methods are: ${SOLVE_METHODS.join(", ")}`
    );
  }

  (resolverOptions.logger ?? logger).debug(
    { captchaType, method, challengeType },
    "Dispatching challenge solve"
  );

  const resolver = new ChallengeResolver(sessionManager, resolverOptions);
  return resolver.resolve(queryable, { ...budget, challengeType });
}
