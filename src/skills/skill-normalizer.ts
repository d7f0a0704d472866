import { Logger } from "../config/logger";
import {
  Skill,
  SkillMention,
  SkillVocabulary,
  SkillVocabularyEntry,
} from "../shared/types/skill.types";

interface VocabularyIndex {
  readonly byName: Map<string, Skill>;
  readonly byStrippedName: Map<string, Skill>;
  readonly byAlias: Map<string, Skill>;
  readonly byStrippedAlias: Map<string, Skill>;
}

/**
 * Resolves free-text skill mentions to canonical skills.
 *
 * Matching runs case-insensitively first, then on punctuation-stripped forms, then
 * through the vocabulary alias table. Mentions that resolve to nothing become new
 * canonical skills named after their first spelling.
 */
export class SkillNormalizer {
  private readonly index: VocabularyIndex;

  constructor(
    private readonly vocabulary: SkillVocabulary,
    private readonly logger?: Logger,
  ) {
    this.index = buildIndex(vocabulary.entries);
  }

  normalize(rawMentions: ReadonlyArray<SkillMention>): Skill[] {
    const emitted: Skill[] = [];
    const emittedByName = new Map<string, Skill>();
    const emittedByStripped = new Map<string, Skill>();

    for (const mention of rawMentions) {
      const text = typeof mention === "string" ? mention : mention.canonicalName;
      const nameKey = toNameKey(text);
      if (!nameKey) {
        this.logger?.debug("skill.normalizer.blank_mention_skipped");
        continue;
      }
      const strippedKey = toStrippedKey(text);

      const resolved =
        this.index.byName.get(nameKey) ??
        emittedByName.get(nameKey) ??
        (strippedKey ? this.index.byStrippedName.get(strippedKey) ?? emittedByStripped.get(strippedKey) : undefined) ??
        this.index.byAlias.get(nameKey) ??
        (strippedKey ? this.index.byStrippedAlias.get(strippedKey) : undefined) ??
        createUnknownSkill(mention, text, this.vocabulary);

      const resolvedKey = toNameKey(resolved.canonicalName);
      if (emittedByName.has(resolvedKey)) {
        continue;
      }
      emitted.push(resolved);
      emittedByName.set(resolvedKey, resolved);
      const resolvedStripped = toStrippedKey(resolved.canonicalName);
      if (resolvedStripped && !emittedByStripped.has(resolvedStripped)) {
        emittedByStripped.set(resolvedStripped, resolved);
      }
    }

    return emitted;
  }

  resolve(mention: SkillMention): Skill | null {
    return this.normalize([mention])[0] ?? null;
  }

  isKnown(mention: string): boolean {
    const nameKey = toNameKey(mention);
    const strippedKey = toStrippedKey(mention);
    return Boolean(
      this.index.byName.get(nameKey) ??
        this.index.byAlias.get(nameKey) ??
        (strippedKey ? this.index.byStrippedName.get(strippedKey) ?? this.index.byStrippedAlias.get(strippedKey) : undefined),
    );
  }
}

export function toNameKey(value: string): string {
  return value.trim().replace(/\s+/g, " ").toLowerCase();
}

// "+" and "#" carry meaning in names like C++ and C#.
export function toStrippedKey(value: string): string {
  return value.toLowerCase().replace(/[^\p{L}\p{N}+#]/gu, "");
}

function buildIndex(entries: ReadonlyArray<SkillVocabularyEntry>): VocabularyIndex {
  const index: VocabularyIndex = {
    byName: new Map(),
    byStrippedName: new Map(),
    byAlias: new Map(),
    byStrippedAlias: new Map(),
  };
  for (const entry of entries) {
    const skill: Skill = Object.freeze({
      canonicalName: entry.canonicalName,
      aliases: entry.aliases,
      category: entry.category,
    });
    setIfAbsent(index.byName, toNameKey(entry.canonicalName), skill);
    setIfAbsent(index.byStrippedName, toStrippedKey(entry.canonicalName), skill);
    for (const alias of entry.aliases) {
      setIfAbsent(index.byAlias, toNameKey(alias), skill);
      setIfAbsent(index.byStrippedAlias, toStrippedKey(alias), skill);
    }
  }
  return index;
}

function setIfAbsent(map: Map<string, Skill>, key: string, skill: Skill): void {
  if (key && !map.has(key)) {
    map.set(key, skill);
  }
}

function createUnknownSkill(mention: SkillMention, text: string, vocabulary: SkillVocabulary): Skill {
  return Object.freeze({
    canonicalName: text.trim().replace(/\s+/g, " "),
    aliases: Object.freeze([]),
    category: typeof mention === "string" ? vocabulary.defaultCategory : mention.category,
  });
}
