import { CandidateProfile } from "../shared/types/profile.types";
import { Answer, AnswerFeedback, Evaluation, InterviewType, Question } from "../shared/types/session.types";
import { Skill } from "../shared/types/skill.types";

export interface AnswerEvaluator {
  evaluate(question: Question, answer: Answer, profile: CandidateProfile): Promise<Evaluation>;
}

export const NO_RESPONSE_WEAKNESS = "no response provided";
export const NO_RESPONSE_SUGGESTION = "Give an answer, even a partial one. An unanswered question scores zero.";

export const QUICK_TIPS: Record<InterviewType, ReadonlyArray<string>> = {
  technical: [
    "Name the tools and versions you actually used.",
    "State the trade-off you chose and what it cost.",
  ],
  behavioral: [
    "Structure the story as situation, task, action and result.",
    "Close with what you would do differently next time.",
  ],
  competency: [
    "Quantify the scope: team size, users or budget.",
    "Make clear which decisions were yours.",
  ],
  general: [
    "Tie each answer back to this role.",
    "Keep answers under two minutes.",
  ],
};

const RELEVANCE_WEIGHT = 0.45;
const COMPLETENESS_WEIGHT = 0.35;
const SPECIFICITY_WEIGHT = 0.2;
const KEYWORD_TARGET = 4;
const BASE_EXPECTED_TOKENS = 60;
const TOKENS_PER_YEAR = 5;
const MAX_COUNTED_YEARS = 8;

const STOPWORDS = new Set([
  "about", "after", "again", "also", "approach", "because", "been", "before", "being", "could",
  "describe", "does", "doing", "explain", "from", "give", "have", "how", "into", "just", "like",
  "make", "made", "more", "most", "much", "only", "other", "over", "some", "such", "tell", "than",
  "that", "their", "them", "then", "there", "these", "they", "this", "time", "through", "used",
  "using", "walk", "want", "were", "what", "when", "where", "which", "while", "with", "would",
  "your", "yours", "will", "know", "already", "first", "month", "next", "sprint", "role",
]);

const OWNERSHIP_PATTERN = /\b(i|my|me|myself|owned|led|implemented|built|designed|wrote)\b/i;
const NUMBER_PATTERN = /\d/;
const ARTIFACT_PATTERN =
  /\b(api|endpoint|table|index|schema|query|latency|throughput|p95|queue|pipeline|service|migration|deploy\w*|release|incident|metric\w*|test\w*|benchmark|customer\w*|user\w*|deadline|budget|result\w*|outcome\w*|revenue|team)\b/i;

export function emptyAnswerEvaluation(type: InterviewType): Evaluation {
  const weaknesses = [NO_RESPONSE_WEAKNESS];
  return Object.freeze({
    score: 0,
    strengths: Object.freeze([]),
    weaknesses: Object.freeze(weaknesses),
    feedback: buildFeedback(type, 0, [], weaknesses, [NO_RESPONSE_SUGGESTION]),
  });
}

export function describeEvaluation(
  score: number,
  strengths: ReadonlyArray<string>,
  weaknesses: ReadonlyArray<string>,
): string {
  return [
    `Score ${Math.round(score * 100)}/100.`,
    strengths.length ? `Strong points: ${strengths.join(", ")}.` : "No clear strong points yet.",
    weaknesses.length ? `To improve: ${weaknesses.join(", ")}.` : "No major gaps found.",
  ].join(" ");
}

export function buildFeedback(
  type: InterviewType,
  score: number,
  strengths: ReadonlyArray<string>,
  weaknesses: ReadonlyArray<string>,
  suggestions: ReadonlyArray<string>,
): AnswerFeedback {
  return Object.freeze({
    detailedFeedback: describeEvaluation(score, strengths, weaknesses),
    suggestions: Object.freeze([...suggestions]),
    quickTips: Object.freeze([...QUICK_TIPS[type]]),
  });
}

export function isEmptyAnswer(answer: Answer): boolean {
  return answer.rawText.trim().length === 0;
}

/**
 * Keyword and shape based scorer.
 *
 * Each signal only grows as on-topic content is added to an answer, so the score
 * never drops when an answer gets more specific.
 */
export class HeuristicAnswerEvaluator implements AnswerEvaluator {
  async evaluate(question: Question, answer: Answer, profile: CandidateProfile): Promise<Evaluation> {
    return scoreAnswer(question, answer, profile);
  }
}

export function scoreAnswer(question: Question, answer: Answer, profile: CandidateProfile): Evaluation {
  const text = answer.rawText.trim();
  if (!text) {
    return emptyAnswerEvaluation(question.type);
  }

  const answerText = toSearchText(text);
  const tokenCount = text.split(/\s+/).filter(Boolean).length;
  const skill = question.targetSkill;

  const keywords = extractKeywords(question.text, skill);
  const keywordHits = keywords.filter((keyword) => answerText.includes(` ${keyword} `)).length;
  const keywordCoverage = keywords.length
    ? Math.min(1, keywordHits / Math.min(keywords.length, KEYWORD_TARGET))
    : 0.5;
  const skillMentioned = skill ? mentionsSkill(answerText, skill) : false;
  const relevance = skill ? 0.5 * (skillMentioned ? 1 : 0) + 0.5 * keywordCoverage : keywordCoverage;

  const expectedTokens =
    BASE_EXPECTED_TOKENS + TOKENS_PER_YEAR * Math.min(Math.max(profile.experienceYears, 0), MAX_COUNTED_YEARS);
  const completeness = Math.min(1, tokenCount / expectedTokens);

  const specificSignals = [NUMBER_PATTERN.test(text), OWNERSHIP_PATTERN.test(text), ARTIFACT_PATTERN.test(text)];
  const specificity = specificSignals.filter(Boolean).length / specificSignals.length;

  const score = clamp01(
    round2(RELEVANCE_WEIGHT * relevance + COMPLETENESS_WEIGHT * completeness + SPECIFICITY_WEIGHT * specificity),
  );

  const strengths: string[] = [];
  const weaknesses: string[] = [];
  const suggestions: string[] = [];
  const flag = (weakness: string, suggestion: string): void => {
    weaknesses.push(weakness);
    suggestions.push(suggestion);
  };

  if (relevance >= 0.6) {
    strengths.push("addresses the question directly");
  } else {
    flag("answer drifts away from the question", "Answer the question in your first sentence, then add detail.");
  }
  if (skill) {
    if (skillMentioned) {
      strengths.push(`refers to ${skill.canonicalName} explicitly`);
    } else {
      flag(`does not mention ${skill.canonicalName}`, `Name ${skill.canonicalName} and say what you used it for.`);
    }
  }
  if (completeness >= 0.8) {
    strengths.push("well-developed answer");
  } else if (completeness < 0.4) {
    flag("answer is too brief", "Add the context, the steps you took and the outcome.");
  }
  if (specificity >= 2 / 3) {
    strengths.push("includes concrete specifics");
  } else if (specificity <= 1 / 3) {
    flag("lacks concrete examples or numbers", "Back the answer with one real example and a number.");
  }
  if (skill && score < 0.5 && profile.skills.some((item) => item.canonicalName === skill.canonicalName)) {
    flag(
      `depth does not yet match the ${skill.canonicalName} experience on the résumé`,
      `Prepare a deeper ${skill.canonicalName} story: a problem you debugged and the trade-offs you weighed.`,
    );
  }

  return Object.freeze({
    score,
    strengths: Object.freeze(strengths),
    weaknesses: Object.freeze(weaknesses),
    feedback: buildFeedback(question.type, score, strengths, weaknesses, suggestions),
  });
}

export function extractKeywords(questionText: string, skill?: Skill): string[] {
  const skillWords = new Set(skill ? toSearchText(skill.canonicalName).trim().split(" ") : []);
  const words = toSearchText(questionText)
    .trim()
    .split(" ")
    .filter((word) => word.length >= 4 && !STOPWORDS.has(word) && !skillWords.has(word));
  return Array.from(new Set(words));
}

function mentionsSkill(answerText: string, skill: Skill): boolean {
  return [skill.canonicalName, ...skill.aliases].some((term) => {
    const needle = toSearchText(term);
    return needle.trim().length > 0 && answerText.includes(needle);
  });
}

// Lower-cased, punctuation collapsed to single spaces and padded, so " word " lookups
// only match whole words.
function toSearchText(value: string): string {
  return ` ${value.toLowerCase().replace(/[^\p{L}\p{N}+#]+/gu, " ").trim()} `;
}

export function clamp01(value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    return 0;
  }
  return value > 1 ? 1 : value;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
