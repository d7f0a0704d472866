import { readFile } from "node:fs/promises";
import path from "node:path";
import { CoachError } from "../shared/errors";
import {
  CatalogResource,
  CatalogResourceCategory,
  ResourceCatalog,
} from "../shared/types/recommendation.types";
import { INTERVIEW_TYPES, InterviewType } from "../shared/types/session.types";

export const RESOURCE_CATEGORIES: ReadonlyArray<CatalogResourceCategory> = ["skill-development", "interview-prep", "additional"];

export async function loadResourceCatalog(filePath: string): Promise<ResourceCatalog> {
  const resolved = path.resolve(process.cwd(), filePath);
  const raw = await readFile(resolved, "utf-8");
  return parseResourceCatalog(JSON.parse(raw));
}

export function parseResourceCatalog(raw: unknown): ResourceCatalog {
  if (!isRecord(raw) || !Array.isArray(raw.resources)) {
    throw new CoachError("InvalidConfiguration", "Resource catalog must be an object with a resources array.");
  }
  const ids = new Set<string>();
  const resources = raw.resources.map((item, index) => {
    const resource = parseResource(item, index);
    if (ids.has(resource.id)) {
      throw new CoachError("InvalidConfiguration", `Duplicate resource id: ${resource.id}`);
    }
    ids.add(resource.id);
    return resource;
  });
  return Object.freeze({ resources: Object.freeze(resources) });
}

function parseResource(raw: unknown, index: number): CatalogResource {
  if (!isRecord(raw) || typeof raw.id !== "string" || !raw.id.trim() || typeof raw.title !== "string") {
    throw new CoachError("InvalidConfiguration", `Resource #${index + 1} needs an id and a title.`);
  }
  const category = RESOURCE_CATEGORIES.find((item) => item === raw.category);
  if (!category) {
    throw new CoachError("InvalidConfiguration", `Resource ${raw.id} has invalid category: ${String(raw.category)}`);
  }
  const listedTypes: unknown = raw.interviewTypes;
  const interviewTypes: InterviewType[] = Array.isArray(listedTypes)
    ? INTERVIEW_TYPES.filter((type) => listedTypes.includes(type))
    : [...INTERVIEW_TYPES];
  const skills = Array.isArray(raw.skills)
    ? raw.skills.filter((skill): skill is string => typeof skill === "string" && skill.trim().length > 0)
    : [];
  return Object.freeze({
    id: raw.id.trim(),
    title: raw.title.trim(),
    category,
    skills: Object.freeze(skills.map((skill) => skill.trim())),
    interviewTypes: Object.freeze(interviewTypes),
    ...(typeof raw.url === "string" && raw.url.trim() ? { url: raw.url.trim() } : {}),
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
