import { Logger } from "../config/logger";
import { DocumentService } from "../documents/document.service";
import { DEGREE_KEYWORD_PATTERN } from "../profiles/parsers/education.parser";
import { parseExperienceYears } from "../profiles/parsers/experience.parser";
import { ExtractedEntities, ExtractedRequirement } from "../shared/types/extraction.types";
import { RequirementImportance } from "../shared/types/profile.types";
import { SkillVocabulary } from "../shared/types/skill.types";
import { toNameKey } from "../skills/skill-normalizer";

export interface EntityExtractor {
  extract(document: Buffer, format: string): Promise<ExtractedEntities>;
}

type SectionKind = "skills" | "requirements" | "preferred" | "responsibilities" | "experience" | "education";

interface DocumentLine {
  text: string;
  section: SectionKind | null;
  bullet: boolean;
}

interface VocabularyTerm {
  canonicalName: string;
  pattern: RegExp;
}

const HEADER_PATTERN =
  /^(?:#+\s*)?(technical skills|core skills|key skills|skills|required qualifications|requirements|qualifications|must[- ]have|preferred qualifications|nice[- ]to[- ]have|preferred|bonus points|bonus|key responsibilities|responsibilities|what you will do|what you'll do|duties|work experience|professional experience|employment history|experience|education)\s*(?::\s*(.*))?$/i;
const BULLET_PATTERN = /^(?:[-*•·▪–]|\d+[.)])\s+/;
const NICE_TO_HAVE_PATTERN = /\b(nice[- ]to[- ]have|preferred|bonus|a plus|optional)\b/i;
const PHRASE_PATTERN =
  /\b(?:proficient in|proficiency (?:in|with)|experience (?:with|in)|knowledge of|familiarity with|familiar with|expertise in)\s+([^.;:\n]+)/gi;
// A slash only separates when spaced, so "CI/CD" and "TCP/IP" stay whole.
const LIST_SEPARATOR = /,|;|\||\s\/\s|&|\(|\)|\band\b|\bor\b|\bsuch as\b|\bincluding\b|\be\.g\./i;
const LEADING_FILLER = /^(?:the|a|an|strong|solid|good|deep|working|modern)\s+/i;
const MAX_MENTION_WORDS = 4;
const MAX_MENTION_CHARS = 40;
const MIN_RESPONSIBILITY_CHARS = 10;

/**
 * Reads a résumé or job description and pulls out raw entities.
 *
 * Everything returned is untrusted text; skill mentions still go through the
 * normalizer before they become part of a profile or requirement.
 */
export class DocumentEntityExtractor implements EntityExtractor {
  private readonly terms: VocabularyTerm[];

  constructor(
    private readonly documentService: DocumentService,
    vocabulary: SkillVocabulary,
    private readonly logger: Logger,
  ) {
    this.terms = buildVocabularyTerms(vocabulary);
  }

  async extract(document: Buffer, format: string): Promise<ExtractedEntities> {
    const text = await this.documentService.extractText(document, format);
    const entities = extractEntitiesFromText(text, this.terms);
    this.logger.info("entities.extracted", {
      format,
      skills: entities.skills.length,
      requirements: entities.requirements.length,
      responsibilities: entities.responsibilities.length,
      experienceYears: entities.experienceYears,
    });
    return entities;
  }
}

export function buildVocabularyTerms(vocabulary: SkillVocabulary): VocabularyTerm[] {
  return vocabulary.entries.flatMap((entry) =>
    [entry.canonicalName, ...entry.aliases].map((term) => ({
      canonicalName: entry.canonicalName,
      // Short terms like "Go" or "JS" only count in their exact casing.
      pattern: new RegExp(
        `(?<![\\p{L}\\p{N}])${escapeRegExp(term)}(?![\\p{L}\\p{N}+#])`,
        term.length <= 2 ? "u" : "iu",
      ),
    })),
  );
}

export function extractEntitiesFromText(text: string, terms: ReadonlyArray<VocabularyTerm>): ExtractedEntities {
  const lines = splitLines(text);

  const sectionSkills = lines
    .filter((line) => line.section === "skills")
    .flatMap((line) => splitSkillList(stripLabel(line.text)));
  const skills = uniqueByKey([...sectionSkills, ...findVocabularyMentions(text, terms)]);

  const experience = uniqueByKey(
    lines
      .filter((line) => line.section === "experience" || /experience/i.test(line.text))
      .map((line) => line.text),
  );
  const education = uniqueByKey(
    lines
      .filter((line) => line.section === "education" || DEGREE_KEYWORD_PATTERN.test(line.text))
      .map((line) => line.text),
  );

  const entities: ExtractedEntities = {
    skills,
    experienceYears: parseExperienceYears(text),
    experience,
    education,
    requirements: extractRequirements(lines, text, terms),
    responsibilities: extractResponsibilities(lines),
    segments: lines.map((line) => line.text),
  };
  return Object.freeze(entities);
}

function splitLines(text: string): DocumentLine[] {
  const output: DocumentLine[] = [];
  let section: SectionKind | null = null;
  for (const rawLine of text.split("\n")) {
    const trimmed = rawLine.trim();
    if (!trimmed) {
      continue;
    }
    const header = trimmed.match(HEADER_PATTERN);
    if (header) {
      section = toSectionKind(header[1]);
      const inline = header[2]?.trim();
      if (inline) {
        output.push({ text: inline, section, bullet: false });
      }
      continue;
    }
    const bullet = BULLET_PATTERN.test(trimmed);
    const lineText = trimmed.replace(BULLET_PATTERN, "").trim();
    if (lineText) {
      output.push({ text: lineText, section, bullet });
    }
  }
  return output;
}

function toSectionKind(header: string): SectionKind {
  const lower = header.toLowerCase();
  if (/nice|preferred|bonus/.test(lower)) {
    return "preferred";
  }
  if (/skills/.test(lower)) {
    return "skills";
  }
  if (/requirement|qualification|must/.test(lower)) {
    return "requirements";
  }
  if (/responsibilit|what you|duties/.test(lower)) {
    return "responsibilities";
  }
  if (/education/.test(lower)) {
    return "education";
  }
  return "experience";
}

function extractRequirements(
  lines: ReadonlyArray<DocumentLine>,
  text: string,
  terms: ReadonlyArray<VocabularyTerm>,
): ExtractedRequirement[] {
  const requirements: ExtractedRequirement[] = [];
  const push = (mentions: ReadonlyArray<string>, importance: RequirementImportance): void => {
    for (const mention of mentions) {
      requirements.push(Object.freeze({ mention, importance }));
    }
  };

  for (const line of lines) {
    const niceByWording = NICE_TO_HAVE_PATTERN.test(line.text);
    if (line.section === "requirements" || line.section === "preferred" || line.section === "skills") {
      const importance: RequirementImportance =
        line.section === "preferred" || niceByWording ? "nice-to-have" : "must-have";
      const fromVocabulary = findVocabularyMentions(line.text, terms);
      const fromPhrases = fromVocabulary.length ? [] : findPhraseMentions(line.text, terms);
      const mentions = fromVocabulary.length || fromPhrases.length
        ? [...fromVocabulary, ...fromPhrases]
        : line.section === "skills"
          ? splitSkillList(stripLabel(line.text))
          : shortMention(line.text);
      push(mentions, importance);
      continue;
    }
    push(findPhraseMentions(line.text, terms), niceByWording ? "nice-to-have" : "must-have");
  }

  if (!requirements.length) {
    push(findVocabularyMentions(text, terms), "must-have");
  }
  return requirements;
}

function extractResponsibilities(lines: ReadonlyArray<DocumentLine>): string[] {
  const inSection = lines.filter((line) => line.section === "responsibilities");
  const candidates = inSection.length ? inSection : lines.filter((line) => line.bullet && line.section === null);
  return uniqueByKey(
    candidates.map((line) => line.text.replace(/\.$/, "")).filter((item) => item.length > MIN_RESPONSIBILITY_CHARS),
  );
}

export function findVocabularyMentions(text: string, terms: ReadonlyArray<VocabularyTerm>): string[] {
  const firstIndex = new Map<string, number>();
  for (const term of terms) {
    const match = term.pattern.exec(text);
    if (!match) {
      continue;
    }
    const previous = firstIndex.get(term.canonicalName);
    if (previous === undefined || match.index < previous) {
      firstIndex.set(term.canonicalName, match.index);
    }
  }
  return Array.from(firstIndex.entries())
    .sort((a, b) => a[1] - b[1])
    .map(([name]) => name);
}

function findPhraseMentions(text: string, terms: ReadonlyArray<VocabularyTerm>): string[] {
  const mentions: string[] = [];
  for (const match of text.matchAll(PHRASE_PATTERN)) {
    const captured = match[1];
    const known = findVocabularyMentions(captured, terms);
    mentions.push(...(known.length ? known : splitSkillList(captured)));
  }
  return uniqueByKey(mentions);
}

function splitSkillList(value: string): string[] {
  return value
    .split(LIST_SEPARATOR)
    .map((item) => cleanMention(item))
    .filter((item) => isMentionSized(item));
}

function shortMention(value: string): string[] {
  const cleaned = cleanMention(value);
  return isMentionSized(cleaned) ? [cleaned] : [];
}

function cleanMention(value: string): string {
  let cleaned = value.replace(/\s+/g, " ").trim().replace(/[.:]+$/, "").trim();
  while (LEADING_FILLER.test(cleaned)) {
    cleaned = cleaned.replace(LEADING_FILLER, "");
  }
  return cleaned;
}

function isMentionSized(value: string): boolean {
  return (
    value.length > 0 &&
    value.length <= MAX_MENTION_CHARS &&
    value.split(" ").length <= MAX_MENTION_WORDS
  );
}

// "Languages: Python, Go" carries a label before the list.
function stripLabel(value: string): string {
  const colon = value.indexOf(":");
  if (colon < 0) {
    return value;
  }
  const label = value.slice(0, colon).trim();
  return label.split(/\s+/).length <= 3 ? value.slice(colon + 1) : value;
}

function uniqueByKey(values: ReadonlyArray<string>): string[] {
  const seen = new Set<string>();
  const output: string[] = [];
  for (const value of values) {
    const key = toNameKey(value);
    if (!key || seen.has(key)) {
      continue;
    }
    seen.add(key);
    output.push(value.trim());
  }
  return output;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
