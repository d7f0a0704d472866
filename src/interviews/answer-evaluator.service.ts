import { StructuredJsonClient } from "../ai/llm.client";
import { callJsonPromptSafe } from "../ai/llm.safe";
import { buildAnswerEvaluatorV1Prompt } from "../ai/prompts/interview/answer-evaluator.v1.prompt";
import { Logger } from "../config/logger";
import { CandidateProfile } from "../shared/types/profile.types";
import { Answer, Evaluation, Question } from "../shared/types/session.types";
import {
  AnswerEvaluator,
  clamp01,
  describeEvaluation,
  emptyAnswerEvaluation,
  isEmptyAnswer,
  QUICK_TIPS,
} from "./answer-evaluator";

const MAX_FEEDBACK_ITEMS = 4;

export class AnswerEvaluatorService implements AnswerEvaluator {
  constructor(
    private readonly llmClient: StructuredJsonClient,
    private readonly fallback: AnswerEvaluator,
    private readonly logger: Logger,
  ) {}

  async evaluate(question: Question, answer: Answer, profile: CandidateProfile): Promise<Evaluation> {
    if (isEmptyAnswer(answer)) {
      return emptyAnswerEvaluation(question.type);
    }

    const targetSkill = question.targetSkill?.canonicalName ?? null;
    const prompt = buildAnswerEvaluatorV1Prompt({
      question: question.text,
      targetSkill,
      candidateClaimsSkill: Boolean(
        targetSkill && profile.skills.some((skill) => skill.canonicalName === targetSkill),
      ),
      experienceYears: profile.experienceYears,
      answer: answer.rawText.trim(),
    });
    const safe = await callJsonPromptSafe<Record<string, unknown>>({
      llmClient: this.llmClient,
      logger: this.logger,
      prompt,
      maxTokens: 900,
      timeoutMs: 45_000,
      promptName: "interview_answer_evaluator_v1",
      schemaHint:
        "Answer evaluation JSON with score (0..1), strengths (string[]), weaknesses (string[]), detailed_feedback (string), suggestions (string[]), quick_tips (string[]).",
    });

    if (!safe.ok) {
      this.logger.warn("answer.evaluator.fallback", {
        questionId: question.id,
        errorCode: safe.error_code,
      });
      return this.fallback.evaluate(question, answer, profile);
    }

    const score = normalizeScore(safe.data.score);
    if (score === null) {
      this.logger.warn("answer.evaluator.fallback", {
        questionId: question.id,
        errorCode: "score_missing",
      });
      return this.fallback.evaluate(question, answer, profile);
    }

    const strengths = toStringArray(safe.data.strengths, MAX_FEEDBACK_ITEMS);
    const weaknesses = toStringArray(safe.data.weaknesses, MAX_FEEDBACK_ITEMS);
    const detailed = typeof safe.data.detailed_feedback === "string" ? collapse(safe.data.detailed_feedback) : "";
    const quickTips = toStringArray(safe.data.quick_tips, MAX_FEEDBACK_ITEMS);
    return Object.freeze({
      score,
      strengths: Object.freeze(strengths),
      weaknesses: Object.freeze(weaknesses),
      feedback: Object.freeze({
        detailedFeedback: detailed || describeEvaluation(score, strengths, weaknesses),
        suggestions: Object.freeze(toStringArray(safe.data.suggestions, MAX_FEEDBACK_ITEMS)),
        quickTips: Object.freeze(quickTips.length ? quickTips : [...QUICK_TIPS[question.type]]),
      }),
    });
  }
}

// Models sometimes answer on a 0-100 scale.
export function normalizeScore(value: unknown): number | null {
  const numeric = typeof value === "number" ? value : typeof value === "string" && value.trim() ? Number(value.trim()) : Number.NaN;
  if (!Number.isFinite(numeric)) {
    return null;
  }
  const scaled = numeric > 1 ? numeric / 100 : numeric;
  return Math.round(clamp01(scaled) * 100) / 100;
}

// A single string counts as a one-item list.
function toStringArray(value: unknown, limit: number): string[] {
  const items: unknown[] = Array.isArray(value) ? value : [value];
  return items
    .map((item) => (typeof item === "string" ? collapse(item) : ""))
    .filter((item) => Boolean(item))
    .slice(0, limit);
}

function collapse(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}
