import { InterviewType } from "./session.types";
import { Skill } from "./skill.types";

export type RecommendationCategory = "priority" | "skill-development" | "interview-prep" | "additional";

export type CatalogResourceCategory = Exclude<RecommendationCategory, "priority">;

export interface CatalogResource {
  readonly id: string;
  readonly title: string;
  readonly url?: string;
  readonly category: CatalogResourceCategory;
  readonly skills: ReadonlyArray<string>;
  readonly interviewTypes: ReadonlyArray<InterviewType>;
}

export interface ResourceCatalog {
  readonly resources: ReadonlyArray<CatalogResource>;
}

export interface Recommendation {
  readonly resourceId: string;
  readonly title: string;
  readonly url?: string;
  readonly category: RecommendationCategory;
  readonly relatedSkill?: Skill;
  readonly score: number;
  readonly rank: number;
}
