import { StructuredJsonClient } from "../ai/llm.client";
import { callJsonPromptSafe } from "../ai/llm.safe";
import { buildResourceSuggestionsV1Prompt } from "../ai/prompts/recommendations/resource-suggestions.v1.prompt";
import { Logger } from "../config/logger";
import { GapEntry } from "../shared/types/profile.types";
import { CatalogResource } from "../shared/types/recommendation.types";
import { SessionSummary } from "../shared/types/session.types";
import { Skill } from "../shared/types/skill.types";
import { toNameKey } from "../skills/skill-normalizer";
import { slugify } from "./recommendation.engine";
import { RESOURCE_CATEGORIES } from "./resource-catalog";

const MAX_FOCUS_SKILLS = 5;
const MAX_SUGGESTIONS = 10;

export interface ResourceSuggester {
  suggest(gaps: ReadonlyArray<GapEntry>, summary: SessionSummary): Promise<CatalogResource[]>;
}

/**
 * Asks the model for resources on the weakest skills of a finished session.
 *
 * Suggestions only supplement the catalog, so any failure yields an empty list.
 */
export class LlmResourceSuggesterService implements ResourceSuggester {
  constructor(
    private readonly llmClient: StructuredJsonClient,
    private readonly logger: Logger,
  ) {}

  async suggest(gaps: ReadonlyArray<GapEntry>, summary: SessionSummary): Promise<CatalogResource[]> {
    const focus = focusSkills(gaps, summary);
    const needsInterviewPractice = summary.weakAreas.some((area) => !area.skill);
    if (!focus.length && !needsInterviewPractice) {
      return [];
    }

    const safe = await callJsonPromptSafe<Record<string, unknown>>({
      llmClient: this.llmClient,
      logger: this.logger,
      prompt: buildResourceSuggestionsV1Prompt({
        interviewType: summary.interviewType,
        focusSkills: focus.map((skill) => skill.canonicalName),
        needsInterviewPractice,
      }),
      maxTokens: 900,
      timeoutMs: 45_000,
      promptName: "resource_suggestions_v1",
      schemaHint: "Object with resources: array of { title: string, url: string | null, skill: string | null, category: string }.",
    });
    if (!safe.ok) {
      this.logger.warn("recommendations.suggester.failed", {
        sessionId: summary.sessionId,
        errorCode: safe.error_code,
      });
      return [];
    }

    const skillsByKey = new Map(focus.map((skill) => [toNameKey(skill.canonicalName), skill]));
    const resources = toSuggestions(safe.data.resources, skillsByKey, summary);
    this.logger.debug("recommendations.suggester.done", {
      sessionId: summary.sessionId,
      focusSkills: focus.length,
      suggestions: resources.length,
    });
    return resources;
  }
}

export function focusSkills(gaps: ReadonlyArray<GapEntry>, summary: SessionSummary): Skill[] {
  const candidates = [
    ...summary.weakAreas.flatMap((area) => (area.skill ? [area.skill] : [])),
    ...gaps.filter((gap) => gap.priorityScore > 0).map((gap) => gap.skill),
  ];
  const seen = new Set<string>();
  return candidates
    .filter((skill) => {
      if (seen.has(skill.canonicalName)) {
        return false;
      }
      seen.add(skill.canonicalName);
      return true;
    })
    .slice(0, MAX_FOCUS_SKILLS);
}

function toSuggestions(
  value: unknown,
  skillsByKey: Map<string, Skill>,
  summary: SessionSummary,
): CatalogResource[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const items: unknown[] = value;
  const ids = new Set<string>();
  const resources: CatalogResource[] = [];
  for (const item of items) {
    if (typeof item !== "object" || item === null || !("title" in item) || typeof item.title !== "string") {
      continue;
    }
    const title = item.title.replace(/\s+/g, " ").trim();
    const skillName = "skill" in item && typeof item.skill === "string" ? item.skill : "";
    const skill = skillName ? skillsByKey.get(toNameKey(skillName)) : undefined;
    const rawCategory: unknown = "category" in item ? item.category : undefined;
    const listed = RESOURCE_CATEGORIES.find((category) => category === rawCategory);
    const category = listed ?? (skill ? "skill-development" : "interview-prep");
    // Only general interview practice may come without a focus skill.
    if (!title || (!skill && (skillName || category !== "interview-prep"))) {
      continue;
    }
    const id = `suggested:${slugify(skill?.canonicalName ?? summary.interviewType)}:${slugify(title)}`;
    if (ids.has(id)) {
      continue;
    }
    ids.add(id);
    const url = "url" in item && typeof item.url === "string" && /^https?:\/\//i.test(item.url.trim()) ? item.url.trim() : "";
    resources.push(
      Object.freeze({
        id,
        title,
        category,
        skills: Object.freeze(skill ? [skill.canonicalName] : []),
        interviewTypes: Object.freeze([summary.interviewType]),
        ...(url ? { url } : {}),
      }),
    );
    if (resources.length >= MAX_SUGGESTIONS) {
      break;
    }
  }
  return resources;
}
