export type SkillCategory = "technical" | "behavioral" | "domain";

export interface Skill {
  readonly canonicalName: string;
  readonly aliases: ReadonlyArray<string>;
  readonly category: SkillCategory;
}

export interface SkillVocabularyEntry {
  readonly canonicalName: string;
  readonly category: SkillCategory;
  readonly aliases: ReadonlyArray<string>;
}

export interface SkillVocabulary {
  readonly defaultCategory: SkillCategory;
  readonly entries: ReadonlyArray<SkillVocabularyEntry>;
}

export type SkillMention = string | Skill;
