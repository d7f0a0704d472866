import { CoachError } from "../shared/errors";
import { CoachPolicy } from "../shared/types/policy.types";

export const DEFAULT_POLICY: CoachPolicy = Object.freeze({
  importanceWeights: Object.freeze({ mustHave: 2, niceToHave: 1 }),
  adaptiveFollowUps: true,
  followUpThreshold: 0.5,
  questionCount: 5,
  questionSeed: 1,
  gapSeedCount: 5,
  weakAreaThreshold: 0.6,
  recommendationWeights: Object.freeze({ gap: 0.6, session: 0.4 }),
  priorityCutoff: 0.5,
  finishedSessionTtlMs: 15 * 60 * 1000,
});

export function buildPolicy(overrides: Partial<CoachPolicy> = {}): CoachPolicy {
  const policy: CoachPolicy = {
    ...DEFAULT_POLICY,
    ...overrides,
    importanceWeights: Object.freeze({
      ...DEFAULT_POLICY.importanceWeights,
      ...(overrides.importanceWeights ?? {}),
    }),
    recommendationWeights: Object.freeze({
      ...DEFAULT_POLICY.recommendationWeights,
      ...(overrides.recommendationWeights ?? {}),
    }),
  };
  validatePolicy(policy);
  return Object.freeze(policy);
}

export function validatePolicy(policy: CoachPolicy): void {
  const { mustHave, niceToHave } = policy.importanceWeights;
  if (!isFiniteNonNegative(mustHave) || !isFiniteNonNegative(niceToHave) || niceToHave <= 0) {
    throw invalid("Importance weights must be positive numbers.");
  }
  if (mustHave <= niceToHave) {
    throw invalid("Must-have weight must be greater than nice-to-have weight.");
  }
  if (!isUnitInterval(policy.followUpThreshold)) {
    throw invalid(`Invalid follow-up threshold: ${policy.followUpThreshold}`);
  }
  if (!isUnitInterval(policy.weakAreaThreshold)) {
    throw invalid(`Invalid weak area threshold: ${policy.weakAreaThreshold}`);
  }
  if (!isUnitInterval(policy.priorityCutoff)) {
    throw invalid(`Invalid priority cutoff: ${policy.priorityCutoff}`);
  }
  if (!Number.isInteger(policy.questionCount) || policy.questionCount < 1) {
    throw invalid(`Invalid question count: ${policy.questionCount}`);
  }
  if (!Number.isInteger(policy.gapSeedCount) || policy.gapSeedCount < 1) {
    throw invalid(`Invalid gap seed count: ${policy.gapSeedCount}`);
  }
  if (!Number.isInteger(policy.questionSeed)) {
    throw invalid(`Invalid question seed: ${policy.questionSeed}`);
  }
  const { gap, session } = policy.recommendationWeights;
  if (!isFiniteNonNegative(gap) || !isFiniteNonNegative(session) || gap + session <= 0) {
    throw invalid("Recommendation weights must be non-negative and not both zero.");
  }
  if (
    policy.sessionTimeoutMs !== undefined &&
    (!Number.isInteger(policy.sessionTimeoutMs) || policy.sessionTimeoutMs <= 0)
  ) {
    throw invalid(`Invalid session timeout: ${policy.sessionTimeoutMs}`);
  }
  if (!Number.isInteger(policy.finishedSessionTtlMs) || policy.finishedSessionTtlMs <= 0) {
    throw invalid(`Invalid finished session TTL: ${policy.finishedSessionTtlMs}`);
  }
}

function isFiniteNonNegative(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

function isUnitInterval(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

function invalid(message: string): CoachError {
  return new CoachError("InvalidConfiguration", message);
}
