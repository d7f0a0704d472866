import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { detectDocumentFormat, DocumentService, normalizeDocumentText } from "../../documents/document.service";
import {
  buildVocabularyTerms,
  DocumentEntityExtractor,
  extractEntitiesFromText,
  findVocabularyMentions,
} from "../../extraction/entity-extractor";
import { isCoachError } from "../../shared/errors";
import { noopLogger, testVocabulary } from "../helpers/fixtures";

const terms = buildVocabularyTerms(testVocabulary);

const jobDescription = [
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
  "- Mentor junior engineers",
].join("\n");

const resume = [
  "Jane Doe",
  "Senior engineer with 6 years of professional experience.",
  "Skills: Python, PostgreSQL, k8s, Team Leadership",
  "Experience",
  "- Led migration of billing service to Kubernetes.",
  "Education",
  "B.Sc. in Computer Science, State University",
].join("\n");

describe("extractEntitiesFromText", () => {
  test("reads sectioned job requirements with their importance", () => {
    const entities = extractEntitiesFromText(jobDescription, terms);
    assert.deepEqual(entities.requirements, [
      { mention: "Python", importance: "must-have" },
      { mention: "SQL", importance: "must-have" },
      { mention: "Kubernetes", importance: "must-have" },
      { mention: "Terraform", importance: "nice-to-have" },
      { mention: "Go", importance: "nice-to-have" },
    ]);
    assert.deepEqual(entities.responsibilities, ["Build and operate payment services", "Mentor junior engineers"]);
    assert.equal(entities.experienceYears, 3);
    assert.deepEqual(entities.skills, ["Python", "SQL", "Kubernetes", "Go"]);
  });

  test("reads résumé skills, experience and education", () => {
    const entities = extractEntitiesFromText(resume, terms);
    assert.deepEqual(entities.skills, ["Python", "PostgreSQL", "k8s", "Team Leadership", "Kubernetes", "Leadership"]);
    assert.equal(entities.experienceYears, 6);
    assert.deepEqual(entities.experience, [
      "Senior engineer with 6 years of professional experience.",
      "Led migration of billing service to Kubernetes.",
    ]);
    assert.deepEqual(entities.education, ["B.Sc. in Computer Science, State University"]);
    assert.deepEqual(entities.responsibilities, []);
  });

  test("keeps slash-joined skill names whole and splits on spaced slashes", () => {
    const entities = extractEntitiesFromText("Skills: CI/CD, TCP/IP, Python / Go", terms);
    assert.deepEqual(entities.skills, ["CI/CD", "TCP/IP", "Python", "Go"]);
  });

  test("picks up phrase mentions outside of sections", () => {
    const text = "Looking for someone with experience in Terraform and Ansible.\nKnowledge of Go is a plus.";
    assert.deepEqual(extractEntitiesFromText(text, terms).requirements, [
      { mention: "Terraform", importance: "must-have" },
      { mention: "Ansible", importance: "must-have" },
      { mention: "Go", importance: "nice-to-have" },
    ]);
  });

  test("falls back to every vocabulary hit when nothing else marks a requirement", () => {
    const entities = extractEntitiesFromText("We use Python and Go daily.", terms);
    assert.deepEqual(entities.requirements, [
      { mention: "Python", importance: "must-have" },
      { mention: "Go", importance: "must-have" },
    ]);
    assert.equal(entities.experienceYears, null);
  });
});

describe("findVocabularyMentions", () => {
  test("matches short terms only in their exact casing", () => {
    assert.deepEqual(findVocabularyMentions("Ready to go live with node and GO", terms), ["Node.js"]);
  });

  test("does not match a term inside a longer word", () => {
    assert.deepEqual(findVocabularyMentions("PostgreSQL and Kubernetes", terms), ["Kubernetes"]);
  });
});

describe("DocumentService", () => {
  const documents = new DocumentService(noopLogger);

  test("normalizes plain text documents", async () => {
    const text = await documents.extractText(Buffer.from("\uFEFFLine one  \r\n\r\n\r\n\r\nLine   two"), "text");
    assert.equal(text, "Line one\n\nLine two");
  });

  test("rejects unknown formats", async () => {
    await assert.rejects(documents.extractText(Buffer.from("x"), "rtf"), (error: unknown) =>
      isCoachError(error, "UnsupportedFormat"),
    );
  });

  test("reports documents without text", async () => {
    await assert.rejects(documents.extractText(Buffer.from(" \n\u0000\n "), "text"), (error: unknown) =>
      isCoachError(error, "ExtractionFailure"),
    );
  });

  test("detects formats from file names and mime types", () => {
    assert.equal(detectDocumentFormat("cv.PDF"), "pdf");
    assert.equal(detectDocumentFormat(undefined, "text/markdown"), "text");
    assert.equal(detectDocumentFormat("cv.docx"), "docx");
    assert.equal(detectDocumentFormat("cv.rtf", "application/rtf"), null);
  });

  test("collapses spacing per line", () => {
    assert.equal(normalizeDocumentText("a\t\tb\n\n\n\nc"), "a b\n\nc");
  });
});

describe("DocumentEntityExtractor", () => {
  test("extracts entities from a text buffer", async () => {
    const extractor = new DocumentEntityExtractor(new DocumentService(noopLogger), testVocabulary, noopLogger);
    const entities = await extractor.extract(Buffer.from(jobDescription), "text");
    assert.deepEqual(
      entities.requirements.map((item) => item.mention),
      ["Python", "SQL", "Kubernetes", "Terraform", "Go"],
    );
  });
});
