import { Logger } from "../config/logger";
import { CoachError } from "../shared/errors";
import { RecommendationWeights } from "../shared/types/policy.types";
import { GapEntry } from "../shared/types/profile.types";
import {
  CatalogResource,
  CatalogResourceCategory,
  Recommendation,
  ResourceCatalog,
} from "../shared/types/recommendation.types";
import { InterviewType, SessionSummary } from "../shared/types/session.types";
import { Skill } from "../shared/types/skill.types";
import { toNameKey } from "../skills/skill-normalizer";

interface RecommendationEngineOptions {
  catalog: ResourceCatalog;
  weights: RecommendationWeights;
  priorityCutoff: number;
  logger?: Logger;
}

interface Signal {
  skill?: Skill;
  strength: number;
}

interface ResourceCandidate {
  id: string;
  title: string;
  url?: string;
  category: CatalogResourceCategory;
}

const GENERAL_SIGNAL_KEY = "general";

/**
 * Turns skill gaps and session weak areas into a ranked resource list.
 *
 * Gap signals are scaled against the largest gap so both sources share the 0..1 range
 * before the configured weights apply.
 */
export class RecommendationEngine {
  private readonly catalog: ResourceCatalog;
  private readonly weights: RecommendationWeights;
  private readonly priorityCutoff: number;

  constructor(private readonly options: RecommendationEngineOptions) {
    const { gap, session } = options.weights;
    if (!(gap >= 0) || !(session >= 0) || gap + session <= 0) {
      throw new CoachError("InvalidConfiguration", "Recommendation weights must be non-negative and not both zero.", {
        ...options.weights,
      });
    }
    this.catalog = options.catalog;
    this.weights = options.weights;
    this.priorityCutoff = options.priorityCutoff;
  }

  /**
   * `supplementary` resources are matched alongside the catalog. One whose id the
   * catalog already uses is ignored.
   */
  recommend(
    gaps: ReadonlyArray<GapEntry>,
    summary?: SessionSummary | null,
    supplementary: ReadonlyArray<CatalogResource> = [],
  ): Recommendation[] {
    const signals = this.collectSignals(gaps, summary ?? null);
    const interviewType = summary?.interviewType ?? "technical";
    const pool = this.resourcePool(supplementary);

    const byResource = new Map<string, { recommendation: Omit<Recommendation, "rank">; order: number }>();
    for (const [key, signal] of signals) {
      const score = round4(signal.strength);
      if (score <= 0) {
        continue;
      }
      const resources = key === GENERAL_SIGNAL_KEY
        ? interviewPrepResources(pool, interviewType)
        : skillResources(pool, signal.skill);
      for (const resource of resources) {
        const recommendation: Omit<Recommendation, "rank"> = {
          resourceId: resource.id,
          title: resource.title,
          category: score >= this.priorityCutoff ? "priority" : resource.category,
          score,
          ...(resource.url ? { url: resource.url } : {}),
          ...(signal.skill ? { relatedSkill: signal.skill } : {}),
        };
        const existing = byResource.get(resource.id);
        if (!existing) {
          byResource.set(resource.id, { recommendation, order: byResource.size });
        } else if (score > existing.recommendation.score) {
          existing.recommendation = recommendation;
        }
      }
    }

    const ranked = Array.from(byResource.values())
      .sort((a, b) => b.recommendation.score - a.recommendation.score || a.order - b.order)
      .map((item, index) => Object.freeze({ ...item.recommendation, rank: index + 1 }));

    this.options.logger?.debug("recommendations.built", {
      signalCount: signals.size,
      supplementaryCount: pool.length - this.catalog.resources.length,
      recommendationCount: ranked.length,
    });
    return ranked;
  }

  private collectSignals(gaps: ReadonlyArray<GapEntry>, summary: SessionSummary | null): Map<string, Signal> {
    const signals = new Map<string, Signal>();
    const add = (key: string, strength: number, skill?: Skill): void => {
      const existing = signals.get(key);
      if (existing) {
        existing.strength += strength;
        return;
      }
      signals.set(key, { strength, ...(skill ? { skill } : {}) });
    };

    const maxGapScore = gaps.reduce((max, gap) => Math.max(max, gap.priorityScore), 0);
    if (maxGapScore > 0) {
      for (const gap of gaps) {
        if (gap.priorityScore > 0) {
          add(skillKey(gap.skill), (this.weights.gap * gap.priorityScore) / maxGapScore, gap.skill);
        }
      }
    }

    for (const area of summary?.weakAreas ?? []) {
      const strength = this.weights.session * (1 - area.lowestScore);
      if (area.skill) {
        add(skillKey(area.skill), strength, area.skill);
      } else {
        add(GENERAL_SIGNAL_KEY, strength);
      }
    }
    return signals;
  }

  private resourcePool(supplementary: ReadonlyArray<CatalogResource>): CatalogResource[] {
    const ids = new Set(this.catalog.resources.map((resource) => resource.id));
    const extra = supplementary.filter((resource) => {
      if (ids.has(resource.id)) {
        return false;
      }
      ids.add(resource.id);
      return true;
    });
    return [...this.catalog.resources, ...extra];
  }
}

function skillResources(pool: ReadonlyArray<CatalogResource>, skill: Skill | undefined): ResourceCandidate[] {
  if (!skill) {
    return [];
  }
  const key = toNameKey(skill.canonicalName);
  const matches: ResourceCandidate[] = pool.filter((resource) =>
    resource.skills.some((name) => toNameKey(name) === key),
  );
  if (matches.length) {
    return matches;
  }
  return [
    {
      id: `guide:${slugify(skill.canonicalName)}`,
      title: `${skill.canonicalName} study guide`,
      category: "skill-development",
    },
  ];
}

function interviewPrepResources(pool: ReadonlyArray<CatalogResource>, type: InterviewType): ResourceCandidate[] {
  const matches: ResourceCandidate[] = pool.filter(
    (resource) => resource.category === "interview-prep" && resource.interviewTypes.includes(type),
  );
  if (matches.length) {
    return matches;
  }
  return [
    {
      id: `guide:${type}-interview`,
      title: `${type} interview practice guide`,
      category: "interview-prep",
    },
  ];
}

function skillKey(skill: Skill): string {
  return `skill:${skill.canonicalName}`;
}

export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/\+/g, "plus")
    .replace(/#/g, "sharp")
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}
