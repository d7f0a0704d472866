import assert from "node:assert/strict";
import { afterEach, describe, test } from "node:test";
import { AudioTranscriber } from "../../ai/transcription.client";
import { parseDocumentInput, parseTechnicalStack, statusForError } from "../../app";
import { createCoach } from "../../coach/coach.factory";
import { InterviewCoachService } from "../../coach/interview-coach.service";
import { loadEnv } from "../../config/env";
import { parseResourceCatalog } from "../../recommendations/resource-catalog";
import { CoachError, isCoachError } from "../../shared/errors";
import { noopLogger, testVocabulary } from "../helpers/fixtures";

const resumeText = ["Skills: Python, SQL", "4 years of backend experience."].join("\n");

const jobDescriptionText = [
  "Backend Engineer",
  "Requirements:",
  "- 3+ years of experience with Python",
  "- Strong SQL skills",
  "- Kubernetes (k8s) in production",
  "Nice to have:",
  "- Terraform",
  "- Go",
  "Responsibilities:",
  "- Build and operate payment services",
].join("\n");

const catalog = parseResourceCatalog({
  resources: [
    { id: "k8s-basics", title: "Kubernetes basics", category: "skill-development", skills: ["Kubernetes"] },
    { id: "go-tour", title: "Go tour", category: "skill-development", skills: ["Go"] },
  ],
});

class FakeTranscriber implements AudioTranscriber {
  async transcribe(): Promise<string> {
    return "  I deployed Kubernetes clusters\n for 3 teams.  ";
  }
}

function textDocument(text: string) {
  return { format: "text", content: Buffer.from(text, "utf-8") };
}

let coach: InterviewCoachService | null = null;

function buildCoach(): InterviewCoachService {
  let counter = 0;
  coach = createCoach(
    loadEnv({ QUESTION_COUNT: "2" }),
    { vocabulary: testVocabulary, catalog },
    noopLogger,
    {
      llmClient: null,
      transcriber: new FakeTranscriber(),
      storage: null,
      idFactory: () => {
        counter += 1;
        return `session-${counter}`;
      },
    },
  );
  return coach;
}

afterEach(() => {
  coach?.dispose();
  coach = null;
});

describe("interview coach end to end", () => {
  test("analyzes documents into a profile, requirement and ranked gaps", async () => {
    const analysis = await buildCoach().analyzeDocuments(textDocument(resumeText), textDocument(jobDescriptionText));

    assert.deepEqual(
      analysis.profile.skills.map((item) => item.canonicalName),
      ["Python", "SQL"],
    );
    assert.equal(analysis.profile.experienceYears, 4);
    assert.deepEqual(
      analysis.gaps.map((gap) => [gap.skill.canonicalName, gap.priorityScore]),
      [
        ["Kubernetes", 2],
        ["Terraform", 1],
        ["Go", 1],
        ["Python", 0],
        ["SQL", 0],
      ],
    );
  });

  test("runs a technical session with follow-ups and a voice answer through to the report", async () => {
    const service = buildCoach();
    const started = await service.startSession({
      type: "technical",
      resume: textDocument(resumeText),
      jobDescription: textDocument(jobDescriptionText),
    });
    assert.equal(started.session.id, "session-1");
    assert.equal(started.session.state, "AwaitingAnswer");
    assert.deepEqual(
      started.session.questions.map((question) => [question.id, question.targetSkill?.canonicalName]),
      [
        ["q1", "Kubernetes"],
        ["q2", "Terraform"],
      ],
    );

    await assert.rejects(service.submitAnswer("session-1", "q2", "out of turn"), (error: unknown) =>
      isCoachError(error, "OutOfOrderSubmission"),
    );

    const first = await service.submitAnswer("session-1", "q1", "   ");
    assert.equal(first.kind, "next_question");
    if (first.kind !== "next_question") {
      return;
    }
    assert.equal(first.evaluation.score, 0);
    assert.equal(first.followUpInserted, true);
    assert.equal(first.nextQuestion.id, "q1-followup");
    assert.equal(first.nextQuestion.followUpOf, "q1");

    const voice = await service.submitVoiceAnswer("session-1", "q1-followup", Buffer.from("fake-audio"));
    assert.equal(voice.transcript, "I deployed Kubernetes clusters for 3 teams.");
    assert.equal(voice.result.kind, "next_question");
    assert.equal(service.getSession("session-1").answers["q1-followup"]?.inputType, "voice");

    await assert.rejects(service.buildReport("session-1"), (error: unknown) => isCoachError(error, "NotCompleted"));

    const second = await service.submitAnswer("session-1", "q2", "");
    assert.equal(second.kind, "next_question");
    const last = await service.submitAnswer("session-1", "q2-followup", "");
    assert.equal(last.kind, "completed");

    const report = await service.buildReport("session-1");
    assert.equal(report.summary.questionCount, 4);
    assert.deepEqual(
      report.summary.questionScores.map((item) => item.questionId),
      ["q1", "q1-followup", "q2", "q2-followup"],
    );
    assert.deepEqual(
      report.summary.weakAreas.map((area) => [area.label, area.lowestScore]),
      [
        ["Kubernetes", 0],
        ["Terraform", 0],
      ],
    );
    assert.deepEqual(
      report.recommendations.map((item) => [item.rank, item.resourceId, item.score, item.category]),
      [
        [1, "k8s-basics", 1, "priority"],
        [2, "guide:terraform", 0.7, "priority"],
        [3, "go-tour", 0.3, "skill-development"],
      ],
    );
  });

  test("aborts a session and refuses further answers", async () => {
    const service = buildCoach();
    const started = await service.startSession({
      type: "technical",
      resume: textDocument(resumeText),
      jobDescription: textDocument(jobDescriptionText),
    });
    const aborted = await service.abort(started.session.id, "candidate left");
    assert.equal(aborted.state, "Aborted");
    assert.equal(aborted.abortReason, "candidate left");
    await assert.rejects(service.submitAnswer(started.session.id, "q1", "late"), (error: unknown) =>
      isCoachError(error, "InvalidState"),
    );
  });

  test("asks about the chosen technical stack next to the top gap", async () => {
    const service = buildCoach();
    const started = await service.startSession({
      type: "technical",
      resume: textDocument(resumeText),
      jobDescription: textDocument(jobDescriptionText),
      technicalStack: ["go", "Elixir"],
    });
    assert.deepEqual(
      started.session.questions.map((question) => [question.id, question.targetSkill?.canonicalName]),
      [
        ["q1", "Kubernetes"],
        ["q2", "Go"],
      ],
    );
  });

  test("releases a finished session and reports capabilities", async () => {
    const service = buildCoach();
    const started = await service.startSession({
      type: "technical",
      resume: textDocument(resumeText),
      jobDescription: textDocument(jobDescriptionText),
    });
    assert.throws(() => service.releaseSession(started.session.id), (error: unknown) =>
      isCoachError(error, "InvalidState"),
    );
    assert.deepEqual(service.capabilities(), { transcription: true, resourceSuggestions: false, activeSessions: 1 });

    await service.abort(started.session.id, "done early");
    service.releaseSession(started.session.id);

    assert.throws(() => service.getSession(started.session.id), (error: unknown) =>
      isCoachError(error, "SessionNotFound"),
    );
    assert.equal(service.capabilities().activeSessions, 0);
  });

  test("rejects a technical session when the job description names no skills", async () => {
    const service = buildCoach();
    await assert.rejects(
      service.startSession({
        type: "technical",
        resume: textDocument(resumeText),
        jobDescription: textDocument("We are hiring friendly people."),
      }),
      (error: unknown) => isCoachError(error, "InsufficientContext"),
    );
    const session = service.getSession("session-1");
    assert.equal(session.state, "Aborted");
    assert.equal(session.abortReason, "InsufficientContext");
  });
});

describe("http helpers", () => {
  test("maps error codes to statuses", () => {
    assert.equal(statusForError(new CoachError("SessionNotFound", "missing")), 404);
    assert.equal(statusForError(new CoachError("OutOfOrderSubmission", "late")), 409);
    assert.equal(statusForError(new CoachError("UnsupportedFormat", "rtf")), 415);
    assert.equal(statusForError(new CoachError("ExtractionFailure", "empty")), 422);
    assert.equal(statusForError(new Error("boom")), 500);
  });

  test("reads documents given as text or base64", () => {
    assert.deepEqual(parseDocumentInput({ format: "text", text: "hi" }, "resume"), {
      format: "text",
      content: Buffer.from("hi"),
    });
    assert.deepEqual(parseDocumentInput({ format: "pdf", base64: "aGk=" }, "resume"), {
      format: "pdf",
      content: Buffer.from("hi"),
    });
    assert.throws(() => parseDocumentInput({ format: "text" }, "resume"), (error: unknown) =>
      isCoachError(error, "InvalidConfiguration"),
    );
  });

  test("detects the document format from the file name or mime type", () => {
    assert.equal(parseDocumentInput({ fileName: "CV.PDF", base64: "aGk=" }, "resume").format, "pdf");
    assert.equal(
      parseDocumentInput(
        { mimeType: "application/vnd.openxmlformats-officedocument.wordprocessingml.document", base64: "aGk=" },
        "resume",
      ).format,
      "docx",
    );
    assert.equal(parseDocumentInput({ text: "hi" }, "resume").format, "text");
    assert.throws(() => parseDocumentInput({ fileName: "cv.rtf", base64: "aGk=" }, "resume"), (error: unknown) =>
      isCoachError(error, "UnsupportedFormat"),
    );
  });

  test("reads the technical stack as a list of names", () => {
    assert.deepEqual(parseTechnicalStack(undefined), []);
    assert.deepEqual(parseTechnicalStack(["Go", "Docker"]), ["Go", "Docker"]);
    assert.throws(() => parseTechnicalStack("Go, Docker"), (error: unknown) =>
      isCoachError(error, "InvalidConfiguration"),
    );
  });
});
