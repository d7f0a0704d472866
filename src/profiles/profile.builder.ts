import { Logger } from "../config/logger";
import { ExtractedEntities } from "../shared/types/extraction.types";
import { CandidateProfile, JobRequirement, RequiredSkill } from "../shared/types/profile.types";
import { Skill } from "../shared/types/skill.types";
import { SkillNormalizer } from "../skills/skill-normalizer";
import { parseEducationLevel } from "./parsers/education.parser";

const MAX_EXPERIENCE_YEARS = 60;
export const MAX_STACK_SKILLS = 10;

export class ProfileBuilder {
  constructor(
    private readonly normalizer: SkillNormalizer,
    private readonly logger?: Logger,
  ) {}

  buildCandidateProfile(entities: ExtractedEntities): CandidateProfile {
    return Object.freeze({
      skills: Object.freeze(this.normalizer.normalize(entities.skills)),
      experienceYears: normalizeYears(entities.experienceYears),
      educationLevel: parseEducationLevel(entities.education),
      rawSegments: Object.freeze(entities.segments.map((segment) => segment.trim()).filter(Boolean)),
    });
  }

  /**
   * Resolves requirement mentions to canonical skills. A skill named twice keeps
   * its first position and the stronger importance.
   */
  buildJobRequirement(entities: ExtractedEntities): JobRequirement {
    const requiredSkills: RequiredSkill[] = [];
    const positions = new Map<string, number>();
    for (const requirement of entities.requirements) {
      const skill = this.normalizer.resolve(requirement.mention);
      if (!skill) {
        continue;
      }
      const position = positions.get(skill.canonicalName);
      if (position === undefined) {
        positions.set(skill.canonicalName, requiredSkills.length);
        requiredSkills.push({ skill, importance: requirement.importance });
        continue;
      }
      if (requirement.importance === "must-have") {
        requiredSkills[position] = { skill: requiredSkills[position].skill, importance: "must-have" };
      }
    }

    const seen = new Set<string>();
    const responsibilities: string[] = [];
    for (const item of entities.responsibilities) {
      const text = item.replace(/\s+/g, " ").trim();
      const key = text.toLowerCase();
      if (text && !seen.has(key)) {
        seen.add(key);
        responsibilities.push(text);
      }
    }

    return Object.freeze({
      requiredSkills: Object.freeze(requiredSkills.map((item) => Object.freeze(item))),
      responsibilities: Object.freeze(responsibilities),
    });
  }

  // The skills a candidate picked to be tested on, in their order.
  buildTechnicalStack(mentions: ReadonlyArray<string>): Skill[] {
    const stack = this.normalizer.normalize(mentions).slice(0, MAX_STACK_SKILLS);
    const unrecognized = mentions.filter((mention) => mention.trim() && !this.normalizer.isKnown(mention));
    if (unrecognized.length) {
      this.logger?.info("profile.stack.unrecognized_skills", { skills: unrecognized });
    }
    return stack.map((skill) => Object.freeze(skill));
  }
}

function normalizeYears(value: number | null): number {
  if (value === null || !Number.isFinite(value) || value < 0) {
    return 0;
  }
  return Math.min(value, MAX_EXPERIENCE_YEARS);
}
