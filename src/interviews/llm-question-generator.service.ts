import { StructuredJsonClient } from "../ai/llm.client";
import { callJsonPromptSafe } from "../ai/llm.safe";
import { buildFollowUpV1Prompt } from "../ai/prompts/interview/follow-up.v1.prompt";
import { buildQuestionGenerationV1Prompt } from "../ai/prompts/interview/question-generation.v1.prompt";
import { Logger } from "../config/logger";
import { Question } from "../shared/types/session.types";
import { Skill } from "../shared/types/skill.types";
import { toNameKey } from "../skills/skill-normalizer";
import { buildQuestionSequence, freezeQuestion } from "./question-plan.guard";
import {
  assertGenerationContext,
  collectSkillSeeds,
  FollowUpInput,
  QuestionContext,
  QuestionGenerator,
} from "./question-generator";

interface RawQuestion {
  text: string;
  target_skill: string | null;
}

export class LlmQuestionGeneratorService implements QuestionGenerator {
  constructor(
    private readonly llmClient: StructuredJsonClient,
    private readonly fallback: QuestionGenerator,
    private readonly logger: Logger,
  ) {}

  async generate(context: QuestionContext): Promise<Question[]> {
    assertGenerationContext(context);
    const seeds = collectSkillSeeds(context);
    const prompt = buildQuestionGenerationV1Prompt({
      interviewType: context.type,
      questionCount: context.questionCount,
      targetSkills: seeds.map((seed) => ({
        skill: seed.skill.canonicalName,
        importance: findImportance(context, seed.skill),
        candidateHasSkill: !seed.missing,
      })),
      responsibilities: context.requirement.responsibilities,
      technicalStack: (context.technicalStack ?? []).map((item) => item.canonicalName),
      priorAnswers: context.priorAnswers.map((item) => ({
        question: item.question.text,
        answer: item.answer.rawText,
      })),
    });

    const safe = await callJsonPromptSafe<Record<string, unknown>>({
      llmClient: this.llmClient,
      logger: this.logger,
      prompt,
      maxTokens: 900,
      timeoutMs: 45_000,
      promptName: "interview_question_generation_v1",
      schemaHint: "Object with questions: array of { text: string, target_skill: string | null }.",
    });

    if (!safe.ok) {
      this.logger.warn("question.generator.fallback", {
        interviewType: context.type,
        errorCode: safe.error_code,
      });
      return this.fallback.generate(context);
    }

    const skillsByKey = new Map(seeds.map((seed) => [toNameKey(seed.skill.canonicalName), seed.skill]));
    const drafts = toRawQuestions(safe.data.questions).map((item) => ({
      text: item.text,
      targetSkill: resolveTargetSkill(item.target_skill, skillsByKey),
    }));
    const questions = buildQuestionSequence(context.type, drafts, context.questionCount);
    if (!questions.length) {
      this.logger.warn("question.generator.fallback", {
        interviewType: context.type,
        errorCode: "empty_question_list",
      });
      return this.fallback.generate(context);
    }
    return questions;
  }

  async generateFollowUp(input: FollowUpInput): Promise<Question> {
    const skill = input.targetSkill ?? input.question.targetSkill;
    const prompt = buildFollowUpV1Prompt({
      interviewType: input.question.type,
      question: input.question.text,
      answer: input.answer.rawText.trim(),
      targetSkill: skill?.canonicalName ?? null,
      weaknesses: input.evaluation.weaknesses,
      priorExchanges: (input.priorExchanges ?? []).map((item) => ({
        question: item.question.text,
        answer: item.answer.rawText,
        score: item.answer.evaluation?.score ?? null,
      })),
    });

    const safe = await callJsonPromptSafe<Record<string, unknown>>({
      llmClient: this.llmClient,
      logger: this.logger,
      prompt,
      maxTokens: 300,
      timeoutMs: 30_000,
      promptName: "interview_follow_up_v1",
      schemaHint: "Object with text: string.",
    });
    const text = safe.ok && typeof safe.data.text === "string" ? safe.data.text.replace(/\s+/g, " ").trim() : "";
    if (!text) {
      this.logger.warn("question.followup.fallback", {
        questionId: input.question.id,
        errorCode: safe.ok ? "empty_follow_up" : safe.error_code,
      });
      return this.fallback.generateFollowUp(input);
    }

    return freezeQuestion({
      id: `${input.question.id}-followup`,
      text,
      type: input.question.type,
      followUpOf: input.question.id,
      ...(skill ? { targetSkill: skill } : {}),
    });
  }
}

function toRawQuestions(value: unknown): RawQuestion[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.flatMap((item: unknown): RawQuestion[] => {
    if (typeof item === "string") {
      return [{ text: item, target_skill: null }];
    }
    if (typeof item !== "object" || item === null || !("text" in item) || typeof item.text !== "string") {
      return [];
    }
    const target = "target_skill" in item && typeof item.target_skill === "string" ? item.target_skill : null;
    return [{ text: item.text, target_skill: target }];
  });
}

function resolveTargetSkill(name: string | null, skillsByKey: Map<string, Skill>): Skill | undefined {
  if (!name) {
    return undefined;
  }
  return skillsByKey.get(toNameKey(name));
}

function findImportance(context: QuestionContext, skill: Skill): string {
  const gap = context.gaps.find((item) => item.skill.canonicalName === skill.canonicalName);
  if (gap) {
    return gap.importance;
  }
  const required = context.requirement.requiredSkills.find(
    (item) => item.skill.canonicalName === skill.canonicalName,
  );
  return required?.importance ?? "nice-to-have";
}
