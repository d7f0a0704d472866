import { RequirementImportance } from "./profile.types";

export type DocumentFormat = "pdf" | "docx" | "text";

export const DOCUMENT_FORMATS: ReadonlyArray<DocumentFormat> = ["pdf", "docx", "text"];

export interface ExtractedRequirement {
  readonly mention: string;
  readonly importance: RequirementImportance;
}

export interface ExtractedEntities {
  readonly skills: ReadonlyArray<string>;
  readonly experienceYears: number | null;
  readonly experience: ReadonlyArray<string>;
  readonly education: ReadonlyArray<string>;
  readonly requirements: ReadonlyArray<ExtractedRequirement>;
  readonly responsibilities: ReadonlyArray<string>;
  readonly segments: ReadonlyArray<string>;
}
