/**
 * Resolve Options Validator
 *
 * Validates caller options with Joi and fills in the default attempt
 * budget. Runs before the resolver touches the page, so a bad challenge
 * type or a negative budget fails fast instead of mid-loop.
 */
import Joi from "joi";
import { DEFAULT_BUDGET } from "../../config/constants";
import { InvalidChallengeConfigError } from "../../shared/errors/challenge.errors";
import {
  CHALLENGE_TYPES,
  ChallengeType,
  ResolveOptions,
  ResolveSettings,
  VERIFICATION_MODES,
  VerificationMode,
} from "../../shared/types/challenge.types";

const resolveOptionsSchema = Joi.object<ResolveSettings>({
  challengeType: Joi.string()
    .valid(...CHALLENGE_TYPES)
    .required(),
  expectedContentSelector: Joi.string().allow(null, "").empty("").default(null),
  solveAttempts: Joi.number().integer().min(1).default(DEFAULT_BUDGET.SOLVE_ATTEMPTS),
  solveClickDelaySeconds: Joi.number()
    .min(0)
    .default(DEFAULT_BUDGET.SOLVE_CLICK_DELAY_SECONDS),
  waitCheckboxAttempts: Joi.number()
    .integer()
    .min(0)
    .default(DEFAULT_BUDGET.WAIT_CHECKBOX_ATTEMPTS),
  waitCheckboxDelaySeconds: Joi.number()
    .min(0)
    .default(DEFAULT_BUDGET.WAIT_CHECKBOX_DELAY_SECONDS),
  checkboxClickAttempts: Joi.number()
    .integer()
    .min(1)
    .default(DEFAULT_BUDGET.CHECKBOX_CLICK_ATTEMPTS),
  attemptDelaySeconds: Joi.number().min(0).default(DEFAULT_BUDGET.ATTEMPT_DELAY_SECONDS),
  drainDelaySeconds: Joi.number().min(0).default(DEFAULT_BUDGET.DRAIN_DELAY_SECONDS),
  verification: Joi.string()
    .valid(...VERIFICATION_MODES)
    .default("indicator-absent"),
});

export interface TargetSettings {
  challengeType: ChallengeType | "auto";
  verification: VerificationMode;
}

/** Schema for the string settings read from the environment */
const targetSettingsSchema = Joi.object<TargetSettings>({
  challengeType: Joi.string()
    .valid(...CHALLENGE_TYPES, "auto")
    .required(),
  verification: Joi.string()
    .valid(...VERIFICATION_MODES)
    .required(),
});

/**
 * Validate the challenge type and verification mode from configuration.
 */
export function validateTargetSettings(settings: {
  challengeType: string;
  verification: string;
}): TargetSettings {
  const { error, value } = targetSettingsSchema.validate(settings, {
    abortEarly: false,
  });

  if (error) {
    const details = error.details.map((d) => d.message).join("; ");
    throw new InvalidChallengeConfigError(`Invalid target settings: ${details}`);
  }

  return value;
}

/**
 * Validate resolve options and apply defaults.
 * Throws InvalidChallengeConfigError listing every problem found.
 */
export function validateResolveOptions(options: ResolveOptions): ResolveSettings {
  const { error, value } = resolveOptionsSchema.validate(options, {
    abortEarly: false,
    convert: false,
  });

  if (error) {
    const details = error.details.map((d) => d.message).join("; ");
    throw new InvalidChallengeConfigError(`Invalid resolve options: ${details}`);
  }

  return value;
}
