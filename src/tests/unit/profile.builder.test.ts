import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { extractEntitiesFromText, buildVocabularyTerms } from "../../extraction/entity-extractor";
import { parseEducationLevel } from "../../profiles/parsers/education.parser";
import { parseExperienceYears } from "../../profiles/parsers/experience.parser";
import { ProfileBuilder } from "../../profiles/profile.builder";
import { ExtractedEntities } from "../../shared/types/extraction.types";
import { SkillNormalizer } from "../../skills/skill-normalizer";
import { createRecordingLogger, testVocabulary } from "../helpers/fixtures";

const builder = new ProfileBuilder(new SkillNormalizer(testVocabulary));

function entities(overrides: Partial<ExtractedEntities>): ExtractedEntities {
  return {
    skills: [],
    experienceYears: null,
    experience: [],
    education: [],
    requirements: [],
    responsibilities: [],
    segments: [],
    ...overrides,
  };
}

describe("ProfileBuilder", () => {
  test("builds a candidate profile from résumé text", () => {
    const text = [
      "Skills: Python, PostgreSQL, k8s, Team Leadership",
      "6 years of professional experience leading Kubernetes migrations.",
      "Education",
      "B.Sc. in Computer Science",
    ].join("\n");
    const profile = builder.buildCandidateProfile(extractEntitiesFromText(text, buildVocabularyTerms(testVocabulary)));

    assert.deepEqual(
      profile.skills.map((item) => [item.canonicalName, item.category]),
      [
        ["Python", "technical"],
        ["PostgreSQL", "technical"],
        ["Kubernetes", "technical"],
        ["Team Leadership", "technical"],
        ["Leadership", "behavioral"],
      ],
    );
    assert.equal(profile.experienceYears, 6);
    assert.equal(profile.educationLevel, "bachelor");
    assert.ok(Object.isFrozen(profile));
  });

  test("clamps experience years", () => {
    assert.equal(builder.buildCandidateProfile(entities({ experienceYears: null })).experienceYears, 0);
    assert.equal(builder.buildCandidateProfile(entities({ experienceYears: 75 })).experienceYears, 60);
    assert.equal(builder.buildCandidateProfile(entities({ experienceYears: 2.5 })).experienceYears, 2.5);
  });

  test("merges repeated requirements, keeping the first position and the stronger importance", () => {
    const requirement = builder.buildJobRequirement(
      entities({
        requirements: [
          { mention: "Go", importance: "nice-to-have" },
          { mention: "golang", importance: "must-have" },
          { mention: "Python", importance: "must-have" },
          { mention: "py", importance: "nice-to-have" },
          { mention: "  ", importance: "must-have" },
        ],
        responsibilities: ["Ship APIs", " ship  apis ", "", "Review code"],
      }),
    );
    assert.deepEqual(
      requirement.requiredSkills.map((item) => [item.skill.canonicalName, item.importance]),
      [
        ["Go", "must-have"],
        ["Python", "must-have"],
      ],
    );
    assert.deepEqual(requirement.responsibilities, ["Ship APIs", "Review code"]);
  });
});

describe("ProfileBuilder.buildTechnicalStack", () => {
  test("normalizes the chosen stack and reports skills outside the vocabulary", () => {
    const { logger, logs } = createRecordingLogger();
    const stack = new ProfileBuilder(new SkillNormalizer(testVocabulary), logger).buildTechnicalStack([
      "k8s",
      "Python",
      "python3",
      "Elixir",
      " ",
    ]);
    assert.deepEqual(
      stack.map((item) => item.canonicalName),
      ["Kubernetes", "Python", "Elixir"],
    );
    assert.deepEqual(logs, [{ level: "info", message: "profile.stack.unrecognized_skills", meta: { skills: ["Elixir"] } }]);
  });
});

describe("profile parsers", () => {
  test("takes the largest stated years of experience", () => {
    assert.equal(parseExperienceYears("2 years experience in support, then 5+ yrs of backend experience"), 5);
    assert.equal(parseExperienceYears("Founded in 1999, 300 years experience combined"), null);
    assert.equal(parseExperienceYears("No numbers here"), null);
  });

  test("reports the highest education level found", () => {
    assert.equal(parseEducationLevel(["BSc Physics", "MSc Data Science"]), "master");
    assert.equal(parseEducationLevel(["PhD in Biology"]), "doctorate");
    assert.equal(parseEducationLevel(["Self-taught developer"]), "none");
    assert.equal(parseEducationLevel([]), "unknown");
  });
});
