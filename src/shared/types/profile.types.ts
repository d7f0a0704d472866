import { Skill } from "./skill.types";

export type EducationLevel =
  | "none"
  | "high_school"
  | "associate"
  | "bachelor"
  | "master"
  | "doctorate"
  | "unknown";

export type RequirementImportance = "must-have" | "nice-to-have";

export interface CandidateProfile {
  readonly skills: ReadonlyArray<Skill>;
  readonly experienceYears: number;
  readonly educationLevel: EducationLevel;
  readonly rawSegments: ReadonlyArray<string>;
}

export interface RequiredSkill {
  readonly skill: Skill;
  readonly importance: RequirementImportance;
}

export interface JobRequirement {
  readonly requiredSkills: ReadonlyArray<RequiredSkill>;
  readonly responsibilities: ReadonlyArray<string>;
}

export interface GapEntry {
  readonly skill: Skill;
  readonly importance: RequirementImportance;
  readonly candidateHasSkill: boolean;
  readonly priorityScore: number;
}
