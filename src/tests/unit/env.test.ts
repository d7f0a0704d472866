import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { loadEnv } from "../../config/env";
import { buildPolicy } from "../../config/policy";
import { isCoachError } from "../../shared/errors";

describe("loadEnv", () => {
  test("falls back to defaults for an empty environment", () => {
    const env = loadEnv({});
    assert.equal(env.port, 3000);
    assert.equal(env.logLevel, "info");
    assert.equal(env.openaiApiKey, undefined);
    assert.equal(env.sessionStorageDir, "data/sessions");
    assert.equal(env.policy.adaptiveFollowUps, true);
    assert.equal(env.policy.followUpThreshold, 0.5);
    assert.equal(env.policy.questionCount, 5);
    assert.deepEqual(env.policy.importanceWeights, { mustHave: 2, niceToHave: 1 });
    assert.deepEqual(env.policy.recommendationWeights, { gap: 0.6, session: 0.4 });
    assert.equal(env.policy.sessionTimeoutMs, undefined);
    assert.equal(env.policy.finishedSessionTtlMs, 900000);
  });

  test("derives the session weight from the gap weight", () => {
    const env = loadEnv({ RECOMMENDATION_GAP_WEIGHT: "0.7" });
    assert.deepEqual(env.policy.recommendationWeights, { gap: 0.7, session: 0.3 });
  });

  test("reads adaptive mode and the session timeout", () => {
    const env = loadEnv({ ADAPTIVE_FOLLOW_UPS_ENABLED: "no", SESSION_TIMEOUT_MS: "60000", OPENAI_API_KEY: "  test-key " });
    assert.equal(env.policy.adaptiveFollowUps, false);
    assert.equal(env.policy.sessionTimeoutMs, 60000);
    assert.equal(env.openaiApiKey, "test-key");
  });

  test("reads how long finished sessions are kept", () => {
    assert.equal(loadEnv({ FINISHED_SESSION_TTL_MS: "5000" }).policy.finishedSessionTtlMs, 5000);
    assert.throws(() => loadEnv({ FINISHED_SESSION_TTL_MS: "-1" }), { message: "Invalid FINISHED_SESSION_TTL_MS value: -1" });
  });

  test("rejects malformed values", () => {
    assert.throws(() => loadEnv({ PORT: "x" }), { message: "Invalid PORT value: x" });
    assert.throws(() => loadEnv({ LOG_LEVEL: "loud" }), { message: "Invalid LOG_LEVEL value: loud" });
    assert.throws(() => loadEnv({ ADAPTIVE_FOLLOW_UP_THRESHOLD: "1.5" }), {
      message: "Invalid ADAPTIVE_FOLLOW_UP_THRESHOLD value: 1.5. Expected number between 0 and 1.",
    });
    assert.throws(() => loadEnv({ MUST_HAVE_WEIGHT: "1", NICE_TO_HAVE_WEIGHT: "1" }), /Invalid importance weights/);
    assert.throws(() => loadEnv({ QUESTION_COUNT: "0" }), { message: "Invalid QUESTION_COUNT value: 0" });
  });
});

describe("buildPolicy", () => {
  test("rejects a nice-to-have weight that is not positive", () => {
    assert.throws(
      () => buildPolicy({ importanceWeights: { mustHave: 2, niceToHave: 0 } }),
      (error: unknown) => isCoachError(error, "InvalidConfiguration"),
    );
  });

  test("rejects recommendation weights that are both zero", () => {
    assert.throws(
      () => buildPolicy({ recommendationWeights: { gap: 0, session: 0 } }),
      (error: unknown) => isCoachError(error, "InvalidConfiguration"),
    );
  });
});
