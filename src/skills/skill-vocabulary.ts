import { readFile } from "node:fs/promises";
import path from "node:path";
import { CoachError } from "../shared/errors";
import {
  SkillCategory,
  SkillVocabulary,
  SkillVocabularyEntry,
} from "../shared/types/skill.types";

const SKILL_CATEGORIES: ReadonlyArray<SkillCategory> = ["technical", "behavioral", "domain"];

export async function loadSkillVocabulary(filePath: string): Promise<SkillVocabulary> {
  const resolved = path.resolve(process.cwd(), filePath);
  const raw = await readFile(resolved, "utf-8");
  return parseSkillVocabulary(JSON.parse(raw));
}

export function parseSkillVocabulary(raw: unknown): SkillVocabulary {
  if (!isRecord(raw) || !Array.isArray(raw.entries)) {
    throw new CoachError("InvalidConfiguration", "Skill vocabulary must be an object with an entries array.");
  }
  const defaultCategory = raw.defaultCategory === undefined ? "technical" : toCategory(raw.defaultCategory);
  if (!defaultCategory) {
    throw new CoachError("InvalidConfiguration", `Invalid default skill category: ${String(raw.defaultCategory)}`);
  }
  return createSkillVocabulary(raw.entries.map((item, index) => parseEntry(item, index)), defaultCategory);
}

export function createSkillVocabulary(
  entries: ReadonlyArray<SkillVocabularyEntry>,
  defaultCategory: SkillCategory = "technical",
): SkillVocabulary {
  const seen = new Set<string>();
  const frozen = entries.map((entry) => {
    const key = entry.canonicalName.trim().toLowerCase();
    if (!key) {
      throw new CoachError("InvalidConfiguration", "Skill vocabulary entry has an empty canonical name.");
    }
    if (seen.has(key)) {
      throw new CoachError("InvalidConfiguration", `Duplicate skill vocabulary entry: ${entry.canonicalName}`);
    }
    seen.add(key);
    return Object.freeze({
      canonicalName: entry.canonicalName.trim(),
      category: entry.category,
      aliases: Object.freeze(
        Array.from(new Set(entry.aliases.map((alias) => alias.trim()).filter((alias) => alias.length > 0))),
      ),
    });
  });
  return Object.freeze({ defaultCategory, entries: Object.freeze(frozen) });
}

function parseEntry(raw: unknown, index: number): SkillVocabularyEntry {
  if (!isRecord(raw) || typeof raw.canonicalName !== "string") {
    throw new CoachError("InvalidConfiguration", `Skill vocabulary entry #${index + 1} has no canonicalName.`);
  }
  const category = toCategory(raw.category);
  if (!category) {
    throw new CoachError(
      "InvalidConfiguration",
      `Skill vocabulary entry ${raw.canonicalName} has invalid category: ${String(raw.category)}`,
    );
  }
  const aliases = Array.isArray(raw.aliases)
    ? raw.aliases.filter((alias): alias is string => typeof alias === "string")
    : [];
  return { canonicalName: raw.canonicalName, category, aliases };
}

function toCategory(value: unknown): SkillCategory | null {
  return SKILL_CATEGORIES.find((category) => category === value) ?? null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
