import { Logger } from "../../config/logger";
import { CandidateProfile, JobRequirement, RequirementImportance } from "../../shared/types/profile.types";
import { Skill, SkillCategory } from "../../shared/types/skill.types";
import { createSkillVocabulary } from "../../skills/skill-vocabulary";

export const noopLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export interface RecordedLog {
  level: string;
  message: string;
  meta?: Record<string, unknown>;
}

export function createRecordingLogger(): { logger: Logger; logs: RecordedLog[] } {
  const logs: RecordedLog[] = [];
  const record = (level: string) => (message: string, meta?: Record<string, unknown>) => {
    logs.push({ level, message, meta });
  };
  return {
    logs,
    logger: {
      debug: record("debug"),
      info: record("info"),
      warn: record("warn"),
      error: record("error"),
    },
  };
}

export const testVocabulary = createSkillVocabulary([
  { canonicalName: "Python", category: "technical", aliases: ["py", "python3"] },
  { canonicalName: "SQL", category: "technical", aliases: [] },
  { canonicalName: "Kubernetes", category: "technical", aliases: ["k8s", "kube"] },
  { canonicalName: "Go", category: "technical", aliases: ["Golang"] },
  { canonicalName: "Node.js", category: "technical", aliases: ["Node", "NodeJS"] },
  { canonicalName: "C++", category: "technical", aliases: ["cpp"] },
  { canonicalName: "Communication", category: "behavioral", aliases: [] },
  { canonicalName: "Leadership", category: "behavioral", aliases: [] },
  { canonicalName: "FinTech", category: "domain", aliases: [] },
]);

export function skill(canonicalName: string, category: SkillCategory = "technical", aliases: string[] = []): Skill {
  return Object.freeze({ canonicalName, category, aliases: Object.freeze(aliases) });
}

export function profileWith(skills: Skill[], experienceYears = 3): CandidateProfile {
  return Object.freeze({
    skills: Object.freeze(skills),
    experienceYears,
    educationLevel: "bachelor",
    rawSegments: Object.freeze([]),
  });
}

export function requirementWith(
  items: Array<[Skill, RequirementImportance]>,
  responsibilities: string[] = [],
): JobRequirement {
  return Object.freeze({
    requiredSkills: Object.freeze(items.map(([item, importance]) => Object.freeze({ skill: item, importance }))),
    responsibilities: Object.freeze(responsibilities),
  });
}
