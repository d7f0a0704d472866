import { CoachError } from "../shared/errors";
import { ImportanceWeights } from "../shared/types/policy.types";
import {
  CandidateProfile,
  GapEntry,
  JobRequirement,
  RequirementImportance,
} from "../shared/types/profile.types";
import { Skill } from "../shared/types/skill.types";

export type RelevanceFactor = (skill: Skill, importance: RequirementImportance) => number;

interface GapAnalyzerOptions {
  weights: ImportanceWeights;
  relevanceFactor?: RelevanceFactor;
}

const DEFAULT_RELEVANCE: RelevanceFactor = () => 1;

export class GapAnalyzer {
  private readonly weights: ImportanceWeights;
  private readonly relevanceFactor: RelevanceFactor;

  constructor(options: GapAnalyzerOptions) {
    if (options.weights.mustHave <= options.weights.niceToHave) {
      throw new CoachError(
        "InvalidConfiguration",
        "Must-have weight must be greater than nice-to-have weight.",
        { ...options.weights },
      );
    }
    this.weights = options.weights;
    this.relevanceFactor = options.relevanceFactor ?? DEFAULT_RELEVANCE;
  }

  analyze(profile: CandidateProfile, requirement: JobRequirement): GapEntry[] {
    const held = new Set(profile.skills.map((skill) => skill.canonicalName));

    const entries = requirement.requiredSkills.map((required, declarationIndex) => {
      const candidateHasSkill = held.has(required.skill.canonicalName);
      const factor = normalizeFactor(this.relevanceFactor(required.skill, required.importance));
      const priorityScore = candidateHasSkill
        ? 0
        : round4(this.importanceWeight(required.importance) * factor);
      return {
        declarationIndex,
        entry: Object.freeze({
          skill: required.skill,
          importance: required.importance,
          candidateHasSkill,
          priorityScore,
        }),
      };
    });

    entries.sort(
      (a, b) => b.entry.priorityScore - a.entry.priorityScore || a.declarationIndex - b.declarationIndex,
    );
    return entries.map((item) => item.entry);
  }

  importanceWeight(importance: RequirementImportance): number {
    return importance === "must-have" ? this.weights.mustHave : this.weights.niceToHave;
  }
}

export function topGapSeeds(gaps: ReadonlyArray<GapEntry>, count: number): GapEntry[] {
  const missing = gaps.filter((gap) => gap.priorityScore > 0);
  const held = gaps.filter((gap) => gap.priorityScore <= 0);
  return [...missing, ...held].slice(0, Math.max(0, count));
}

function normalizeFactor(value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    return 0;
  }
  return value;
}

function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}
