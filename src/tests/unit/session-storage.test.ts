import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { after, before, describe, test } from "node:test";
import { isCoachError } from "../../shared/errors";
import { InterviewSession } from "../../shared/types/session.types";
import { cloneSession, deserializeSession } from "../../storage/session-serialization";
import { SessionStorageService } from "../../storage/session-storage.service";
import { createRecordingLogger, noopLogger, skill } from "../helpers/fixtures";

function sessionFixture(id: string, updatedAt: string): InterviewSession {
  return {
    id,
    interviewType: "technical",
    state: "Completed",
    currentIndex: 2,
    createdAt: "2026-01-05T10:00:00.000Z",
    updatedAt,
    questions: [
      { id: "q1", text: "Walk me through a Python service you built.", type: "technical", targetSkill: skill("Python") },
      { id: "q1-f1", text: "What would you change next time?", type: "technical", followUpOf: "q1" },
    ],
    answers: {
      q1: {
        questionId: "q1",
        rawText: "I built a queue worker.",
        inputType: "voice",
        evaluation: {
          score: 0.4,
          strengths: ["on topic"],
          weaknesses: ["answer is too brief"],
          feedback: { detailedFeedback: "Score 40/100.", suggestions: ["Add numbers."], quickTips: [] },
        },
      },
      "q1-f1": {
        questionId: "q1-f1",
        rawText: "More tests.",
        inputType: "text",
        evaluation: { score: 0.3, strengths: [], weaknesses: [] },
      },
    },
  };
}

describe("SessionStorageService", () => {
  let dir = "";

  before(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "coach-sessions-"));
  });

  after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("saves and loads a session snapshot", async () => {
    const storage = new SessionStorageService(dir, noopLogger);
    const session = sessionFixture("abc-1", "2026-01-05T10:10:00.000Z");
    const filePath = await storage.save(session);
    assert.equal(filePath, path.join(dir, "session_abc-1.json"));
    assert.deepEqual(await storage.load("abc-1"), session);
  });

  test("returns null for an unknown session", async () => {
    const storage = new SessionStorageService(dir, noopLogger);
    assert.equal(await storage.load("missing"), null);
  });

  test("lists sessions newest first and skips unreadable files", async () => {
    const { logger, logs } = createRecordingLogger();
    const storage = new SessionStorageService(dir, logger);
    await storage.save(sessionFixture("abc-2", "2026-01-05T11:00:00.000Z"));
    await writeFile(path.join(dir, "session_broken.json"), "{ not json", "utf-8");

    const sessions = await storage.list();
    assert.deepEqual(
      sessions.map((session) => session.id),
      ["abc-2", "abc-1"],
    );
    assert.deepEqual(
      logs.filter((entry) => entry.message === "session.snapshot.unreadable").map((entry) => entry.meta?.fileName),
      ["session_broken.json"],
    );
  });

  test("keeps ids that differ only in punctuation in separate files", async () => {
    const storage = new SessionStorageService(dir, noopLogger);
    const slashed = await storage.save(sessionFixture("team/a", "2026-01-05T12:00:00.000Z"));
    const underscored = await storage.save(sessionFixture("team_a", "2026-01-05T12:05:00.000Z"));
    assert.equal(slashed, path.join(dir, "session_team%2Fa.json"));
    assert.equal(underscored, path.join(dir, "session_team_a.json"));
    assert.equal((await storage.load("team/a"))?.updatedAt, "2026-01-05T12:00:00.000Z");
    assert.equal((await storage.load("team_a"))?.updatedAt, "2026-01-05T12:05:00.000Z");
  });
});

describe("deserializeSession", () => {
  test("clones without sharing nested objects", () => {
    const session = sessionFixture("abc-3", "2026-01-05T10:10:00.000Z");
    const copy = cloneSession(session);
    assert.deepEqual(copy, session);
    assert.notEqual(copy.questions, session.questions);
    assert.notEqual(copy.answers.q1, session.answers.q1);
  });

  test("rejects an answer for a question the session does not have", () => {
    const session = sessionFixture("abc-4", "2026-01-05T10:10:00.000Z");
    const raw = { ...session, answers: { ...session.answers, q9: { questionId: "q9", rawText: "", inputType: "text" } } };
    assert.throws(() => deserializeSession(raw), (error: unknown) => isCoachError(error, "InvalidConfiguration"));
  });

  test("rejects scores outside [0, 1]", () => {
    const session = sessionFixture("abc-5", "2026-01-05T10:10:00.000Z");
    const raw = {
      ...session,
      answers: { ...session.answers, q1: { ...session.answers.q1, evaluation: { score: 1.2, strengths: [], weaknesses: [] } } },
    };
    assert.throws(() => deserializeSession(raw), (error: unknown) => isCoachError(error, "InvalidConfiguration"));
  });

  test("rejects reserved question ids", () => {
    const session = sessionFixture("abc-7", "2026-01-05T10:10:00.000Z");
    const raw = { ...session, questions: [...session.questions, { id: "__proto__", text: "Anything else?", type: "technical" }] };
    assert.throws(() => deserializeSession(raw), (error: unknown) => isCoachError(error, "InvalidConfiguration"));
  });

  test("rejects a current index past the question list", () => {
    assert.throws(
      () => deserializeSession({ ...sessionFixture("abc-6", "2026-01-05T10:10:00.000Z"), currentIndex: 3 }),
      (error: unknown) => isCoachError(error, "InvalidConfiguration"),
    );
  });
});
